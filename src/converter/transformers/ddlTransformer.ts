import { dataTypeMappingsFor } from '../../mappings/dataTypes';
import type { DataTypeMapping, StepResult } from '../../types/sql';
import { findClosingParen, mapSegments, rewriteFunctionCalls, topLevelView } from '../../utils/sqlText';
import { StepRecorder, type ConversionContext } from '../context';
import { SQL_PATTERNS } from '../sqlPatterns';
import { createWarning } from '../warnings';

const COMPOSITE_TYPE = /\bCREATE\s+(?:OR\s+REPLACE\s+)?TYPE\s+[\w$."]+\s+AS\s*\(/i;

const COLUMN_PREFIX =
  '((?:^|[(,]|\\bADD(?:\\s+COLUMN)?|\\bMODIFY(?:\\s+COLUMN)?|\\bALTER\\s+COLUMN)\\s*(?:"[^"]+"|`[^`]+`|[\\w$]+)\\s+(?:(?:SET\\s+DATA\\s+)?TYPE\\s+)?)';

/** MySQL CAST accepts only a handful of target types. */
function mysqlCastType(type: string): string {
  if (/^(?:TINY|SMALL|MEDIUM|BIG)?INT(?:EGER)?\b/i.test(type)) return 'SIGNED';
  if (/^(?:N?VARCHAR2?|N?CHAR|(?:TINY|MEDIUM|LONG)?TEXT|CLOB)\s*(\([^)]*\))?$/i.test(type)) {
    const length = /\((\d+)/.exec(type);
    return length ? `CHAR(${length[1]})` : 'CHAR';
  }
  if (/^(?:DOUBLE|REAL|FLOAT)/i.test(type)) return 'DOUBLE';
  return type;
}

export class DDLTransformer {
  /** Map column and CAST data types through the type table. */
  transformDataTypes(masked: string, ctx: ConversionContext): StepResult {
    const recorder = new StepRecorder();
    const mappings = dataTypeMappingsFor(ctx.source, ctx.target).filter(
      mapping => mapping.rule === undefined || ctx.config.dataType[mapping.rule],
    );
    if (mappings.length === 0) return recorder.result(masked);

    const typeAlternation = mappings.map(mapping => mapping.sourceType.replace(/\s+/g, '\\s+')).join('|');
    const convertType = (type: string, args: string | undefined): string => {
      const mapping = mappings.find(
        candidate => candidate.sourceType.toUpperCase() === type.toUpperCase().replace(/\s+/g, ' '),
      );
      if (!mapping) return type + (args ?? '');
      this.recordType(mapping, recorder);
      return this.renderType(mapping, args, ctx);
    };

    const columnPattern = new RegExp(`${COLUMN_PREFIX}(${typeAlternation})(\\s*\\([^()]*\\))?(?![\\w$])`, 'gi');
    const rewriteColumns = (text: string) =>
      text.replace(columnPattern, (_match, prefix: string, type: string, args: string | undefined) =>
        prefix + convertType(type, args),
      );

    let sql = mapSegments(
      masked,
      segment => SQL_PATTERNS.CREATE_TABLE.test(segment) || SQL_PATTERNS.ALTER_TABLE.test(segment) || COMPOSITE_TYPE.test(segment),
      segment => {
        if (SQL_PATTERNS.ALTER_TABLE.test(segment)) return this.stripUnsigned(rewriteColumns(segment), ctx, recorder);
        const header = /\b(?:TABLE|TYPE)\s+[^(]*?\(/i.exec(segment);
        if (!header) return segment;
        const open = header.index + header[0].length - 1;
        const close = findClosingParen(segment, open);
        if (close === -1) return segment;
        const body = this.stripUnsigned(rewriteColumns(segment.slice(open, close + 1)), ctx, recorder);
        return segment.slice(0, open) + body + segment.slice(close + 1);
      },
    );

    const domainPattern = new RegExp(`(\\bCREATE\\s+DOMAIN\\s+[\\w$."]+\\s+AS\\s+)(${typeAlternation})(\\s*\\([^()]*\\))?(?![\\w$])`, 'gi');
    sql = sql.replace(domainPattern, (_match, prefix: string, type: string, args: string | undefined) =>
      prefix + convertType(type, args),
    );

    const castPattern = new RegExp(`^(${typeAlternation})(\\s*\\([^()]*\\))?$`, 'i');
    sql = rewriteFunctionCalls(sql, ['CAST'], call => {
      const lastAs = [...topLevelView(call.inner).matchAll(/\s+AS\s+/gi)].pop();
      if (!lastAs || lastAs.index === undefined) return undefined;
      const head = call.inner.slice(0, lastAs.index + lastAs[0].length);
      const type = call.inner.slice(lastAs.index + lastAs[0].length).trim();
      const found = castPattern.exec(type);
      let converted = found ? convertType(found[1], found[2]) : type;
      if (ctx.target === 'mysql') converted = mysqlCastType(converted);
      if (converted === type) return undefined;
      return `${call.name}${call.gap}(${head}${converted})`;
    });

    return recorder.result(sql);
  }

  private recordType(mapping: DataTypeMapping, recorder: StepRecorder): void {
    recorder.rule(`Data type: ${mapping.sourceType} → ${mapping.targetType}`);
    if (mapping.warning) {
      recorder.warn(createWarning('data-type-mismatch', `${mapping.sourceType}: ${mapping.warning}`, 'warning'));
    }
  }

  private renderType(mapping: DataTypeMapping, args: string | undefined, ctx: ConversionContext): string {
    if (!mapping.keepPrecision || mapping.targetType.includes('(')) return mapping.targetType;
    if (args === undefined) return mapping.targetType + (mapping.defaultPrecision ?? '');
    const precision = ctx.config.dataType.removeByteSuffix ? args.replace(/\s+(?:BYTE|CHAR)\s*\)/i, ')') : args;
    return mapping.targetType + precision;
  }

  private stripUnsigned(text: string, ctx: ConversionContext, recorder: StepRecorder): string {
    if (ctx.target === 'mysql') return text;
    return text.replace(/\s+(?:UNSIGNED|ZEROFILL)\b/gi, () => {
      recorder.warn(
        createWarning(
          'data-type-mismatch',
          'UNSIGNED/ZEROFILL removed; the target type is signed',
          'warning',
          'Add a CHECK (col >= 0) constraint if negative values must be rejected',
        ),
      );
      return '';
    });
  }

  /** FORCE views and WITH READ ONLY exist only in Oracle. */
  transformViews(masked: string, ctx: ConversionContext): StepResult {
    const recorder = new StepRecorder();
    if (ctx.target === 'oracle' || !ctx.config.ddl.convertViews) return recorder.result(masked);

    let sql = recorder.apply(masked, 'View: FORCE removed', text =>
      text.replace(/\b(CREATE\s+(?:OR\s+REPLACE\s+)?)(?:NO\s*)?FORCE\s+(?=(?:EDITIONABLE\s+)?VIEW\b)/gi, '$1'),
    );
    sql = sql.replace(/\s+WITH\s+READ\s+ONLY(?:\s+CONSTRAINT\s+[\w$"]+)?/gi, () => {
      recorder.rule('View: WITH READ ONLY removed');
      recorder.warn(
        createWarning(
          'partial-support',
          'WITH READ ONLY views are not supported',
          'warning',
          'Grant only SELECT on the view to keep it read-only',
        ),
      );
      return '';
    });
    sql = recorder.apply(sql, 'View: CHECK OPTION constraint name removed', text =>
      text.replace(/(\bWITH\s+CHECK\s+OPTION)\s+CONSTRAINT\s+[\w$"]+/gi, '$1'),
    );
    return recorder.result(sql);
  }

  /** Oracle trigger bodies cannot be translated reliably; only the pseudo-records are adapted. */
  transformTriggers(masked: string, ctx: ConversionContext): StepResult {
    const recorder = new StepRecorder();
    if (ctx.source !== 'oracle' || ctx.target === 'oracle' || !SQL_PATTERNS.TRIGGER.test(masked)) {
      return recorder.result(masked);
    }
    if (!ctx.config.ddl.convertTriggers) {
      recorder.warn(
        createWarning(
          'manual-review-needed',
          'Trigger left unconverted',
          'warning',
          'Enable convertTriggers or rewrite the trigger by hand',
        ),
      );
      return recorder.result(masked);
    }

    const sql = recorder.apply(masked, 'Trigger: :NEW/:OLD references', text =>
      text.replace(/:(NEW|OLD)\s*\./gi, (_match, record: string) => `${record.toUpperCase()}.`),
    );
    recorder.warn(
      createWarning(
        'manual-review-needed',
        'Trigger body needs manual review',
        'warning',
        ctx.target === 'postgresql'
          ? 'Move the body into a trigger function (RETURNS TRIGGER) and reference it with EXECUTE FUNCTION'
          : 'MySQL triggers fire per event; split multi-event triggers and replace PL/SQL constructs',
      ),
    );
    return recorder.result(sql);
  }
}
