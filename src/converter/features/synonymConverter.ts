import type { StepResult } from '../../types/sql';
import { mapSegments, splitTerminator } from '../../utils/sqlText';
import { StepRecorder, type ConversionContext, type FeatureConverter } from '../context';
import { IDENTIFIER, SQL_PATTERNS } from '../sqlPatterns';
import { createWarning } from '../warnings';

const CREATE_SYNONYM = new RegExp(
  `^(\\s*)CREATE\\s+(?:OR\\s+REPLACE\\s+)?(?:EDITIONABLE\\s+|NONEDITIONABLE\\s+)?(PUBLIC\\s+)?SYNONYM\\s+(${IDENTIFIER})\\s+FOR\\s+(${IDENTIFIER})(?:\\s*@\\s*([\\w$.]+))?\\s*$`,
  'i',
);
const DROP_SYNONYM = new RegExp(`^(\\s*)DROP\\s+(PUBLIC\\s+)?SYNONYM\\s+(${IDENTIFIER})(?:\\s+FORCE)?\\s*$`, 'i');

/** Synonyms exist only in Oracle; elsewhere they become views. */
export class SynonymConverter implements FeatureConverter {
  readonly name = 'synonym';

  applies(masked: string, ctx: ConversionContext): boolean {
    return ctx.target !== 'oracle' && ctx.config.ddl.convertViews && SQL_PATTERNS.SYNONYM.test(masked);
  }

  convert(masked: string, ctx: ConversionContext): StepResult {
    const recorder = new StepRecorder();
    const sql = mapSegments(
      masked,
      segment => SQL_PATTERNS.SYNONYM.test(segment),
      segment => {
        const { body, terminator } = splitTerminator(segment);
        const created = CREATE_SYNONYM.exec(body);
        if (created) return this.createSynonym(created, terminator, ctx, recorder);
        const dropped = DROP_SYNONYM.exec(body);
        if (dropped) {
          recorder.rule('Synonym: DROP SYNONYM → DROP VIEW');
          const name = this.viewName(dropped[3], Boolean(dropped[2]), ctx);
          const cascade = ctx.target === 'postgresql' ? ' CASCADE' : '';
          return `${dropped[1]}DROP VIEW IF EXISTS ${name}${cascade}${terminator || ';'}`;
        }
        recorder.warn(createWarning('manual-review-needed', 'Synonym statement was not recognized', 'warning'));
        return segment;
      },
    );
    return recorder.result(sql);
  }

  private viewName(name: string, isPublic: boolean, ctx: ConversionContext): string {
    return isPublic && ctx.target === 'postgresql' && !name.includes('.') ? `public.${name}` : name;
  }

  private createSynonym(
    match: RegExpExecArray,
    terminator: string,
    ctx: ConversionContext,
    recorder: StepRecorder,
  ): string {
    const [, lead, publicKeyword, name, target, link] = match;
    const end = terminator || ';';

    if (link) {
      recorder.rule('Synonym: database link synonym → migration stub');
      recorder.warn(
        createWarning(
          'unsupported-function',
          `Synonym ${name} points across database link ${link} and cannot be emulated`,
          'error',
          ctx.target === 'postgresql'
            ? 'Create a foreign table through postgres_fdw and a view over it'
            : 'Create a FEDERATED table and a view over it',
        ),
      );
      return `${lead}${ctx.mask.comment(`Synonym ${name} FOR ${target}@${link}: migrate manually`)}${end}`;
    }

    const isPublic = Boolean(publicKeyword);
    if (isPublic) {
      recorder.warn(
        createWarning(
          'partial-support',
          `PUBLIC synonym ${name} became a view; grants do not follow automatically`,
          'warning',
          `GRANT SELECT ON ${this.viewName(name, true, ctx)} TO ${ctx.target === 'postgresql' ? 'PUBLIC' : "'user'@'host'"}`,
        ),
      );
    }
    recorder.rule('Synonym: CREATE SYNONYM → CREATE VIEW');
    return (
      `${lead}--${ctx.mask.addText(' Synonym converted to VIEW')}\n` +
      `CREATE OR REPLACE VIEW ${this.viewName(name, isPublic, ctx)} AS\nSELECT * FROM ${target}${end}`
    );
  }
}
