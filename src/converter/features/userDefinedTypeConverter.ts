import type { StepResult } from '../../types/sql';
import { findClosingParen, mapSegments, splitTerminator, splitTopLevel, unqualified } from '../../utils/sqlText';
import { StepRecorder, type ConversionContext, type FeatureConverter } from '../context';
import { SQL_PATTERNS } from '../sqlPatterns';
import { createWarning } from '../warnings';

const TYPE_HEAD = /^(\s*)CREATE\s+(?:OR\s+REPLACE\s+)?(?:EDITIONABLE\s+|NONEDITIONABLE\s+)?TYPE\s+(?!BODY\b)([\w$."]+)(?:\s+FORCE)?\s+(?:AS|IS)\s+/i;
// A type body runs to its `/` terminator line; its members contain `;`
const TYPE_BODY = /\bCREATE\s+(?:OR\s+REPLACE\s+)?(?:EDITIONABLE\s+|NONEDITIONABLE\s+)?TYPE\s+BODY\b[\s\S]*?(?:\n[ \t]*\/[ \t]*(?=\n|$)|$)/gi;
const METHOD = /^(?:(?:NOT\s+)?(?:FINAL|INSTANTIABLE|OVERRIDING)\s+)*(?:MEMBER|STATIC|MAP|ORDER|CONSTRUCTOR)\b/i;

/**
 * Oracle object, VARRAY and nested table types. PostgreSQL gets composite
 * types and array domains, MySQL gets tables or JSON columns.
 */
export class UserDefinedTypeConverter implements FeatureConverter {
  readonly name = 'user-defined type';

  applies(masked: string, ctx: ConversionContext): boolean {
    return ctx.source === 'oracle' && ctx.target !== 'oracle' && SQL_PATTERNS.USER_DEFINED_TYPE.test(masked);
  }

  convert(masked: string, ctx: ConversionContext): StepResult {
    const recorder = new StepRecorder();
    let sql = masked.replace(TYPE_BODY, (block: string) => {
      const name = /\bBODY\s+([\w$."]+)/i.exec(block)?.[1] ?? 'type';
      recorder.rule('Type: TYPE BODY commented out');
      recorder.warn(
        createWarning(
          'manual-review-needed',
          `Type body ${name} was commented out; object methods must become standalone functions`,
          'warning',
          `Rewrite each member as a function taking the ${unqualified(name)} value as its first parameter`,
        ),
      );
      return ctx.mask.comment(block.trim());
    });
    sql = mapSegments(
      sql,
      segment => TYPE_HEAD.test(segment),
      segment => this.convertType(segment, ctx, recorder),
    );
    this.flagTypeAnchors(sql, ctx, recorder);
    return recorder.result(sql);
  }

  private convertType(segment: string, ctx: ConversionContext, recorder: StepRecorder): string {
    const { body, terminator } = splitTerminator(segment);
    const head = TYPE_HEAD.exec(body);
    if (!head) return segment;
    const [, lead, name] = head;
    const definition = body.slice(head[0].length);
    const end = terminator || ';';

    const object = /^OBJECT\s*\(/i.exec(definition);
    if (object) {
      const open = object[0].length - 1;
      const close = findClosingParen(definition, open);
      if (close === -1) return segment;
      return lead + this.objectType(name, definition.slice(open + 1, close), ctx, recorder) + end;
    }

    const collection = /^(?:VARRAY|VARYING\s+ARRAY)\s*\(\s*(\d+)\s*\)\s+OF\s+([\s\S]+?)(\s+NOT\s+NULL)?$|^TABLE\s+OF\s+([\s\S]+?)(\s+NOT\s+NULL)?$/i.exec(
      definition.trim(),
    );
    if (collection) {
      const element = (collection[2] ?? collection[4]).trim();
      const limit = collection[1];
      return lead + this.collectionType(name, element, limit, ctx, recorder) + end;
    }

    recorder.warn(
      createWarning('manual-review-needed', `Type ${name} was not recognized and was left unchanged`, 'warning'),
    );
    return segment;
  }

  private objectType(name: string, attributes: string, ctx: ConversionContext, recorder: StepRecorder): string {
    const fields: string[] = [];
    let methods = 0;
    for (const attribute of splitTopLevel(attributes)) {
      if (METHOD.test(attribute)) methods++;
      else fields.push(attribute);
    }
    if (methods > 0) {
      recorder.warn(
        createWarning(
          'unsupported-function',
          `Type ${name}: ${methods} method declaration(s) dropped`,
          'warning',
          'Implement methods as standalone functions',
        ),
      );
    }

    if (ctx.target === 'postgresql') {
      recorder.rule('Type: OBJECT → composite type');
      return `CREATE TYPE ${name} AS (\n  ${fields.join(',\n  ')}\n)`;
    }

    recorder.rule('Type: OBJECT → table');
    recorder.warn(
      createWarning(
        'partial-support',
        `Object type ${name} emulated as a table; columns of this type should become JSON columns`,
        'warning',
        `Store ${unqualified(name)} values in a JSON column, or reference rows of the ${unqualified(name)} table by key`,
      ),
    );
    return (
      `--${ctx.mask.addText(` Object type ${name} emulated as a table`)}\n` +
      `CREATE TABLE ${name} (\n  ${fields.join(',\n  ')}\n)`
    );
  }

  private collectionType(
    name: string,
    element: string,
    limit: string | undefined,
    ctx: ConversionContext,
    recorder: StepRecorder,
  ): string {
    const kind = limit === undefined ? 'Nested table' : 'VARRAY';
    if (ctx.target === 'postgresql') {
      recorder.rule(`Type: ${kind} → array domain`);
      if (limit !== undefined) {
        recorder.warn(
          createWarning(
            'partial-support',
            `VARRAY ${name}: the size limit ${limit} is not enforced`,
            'warning',
            `Add CHECK (cardinality(VALUE) <= ${limit}) to the domain`,
          ),
        );
      }
      return `CREATE DOMAIN ${name} AS ${element}[]`;
    }

    recorder.rule(`Type: ${kind} commented out`);
    recorder.warn(
      createWarning(
        'unsupported-function',
        `${kind} type ${name} has no MySQL equivalent`,
        'warning',
        'Use a JSON column holding an array, or a child table',
      ),
    );
    return ctx.mask.comment(`${kind} type ${name} of ${element}: use a JSON column`);
  }

  /** %TYPE and %ROWTYPE anchors and REF columns pass through with a warning. */
  private flagTypeAnchors(sql: string, ctx: ConversionContext, recorder: StepRecorder): void {
    const anchors = [...new Set([...sql.matchAll(/[\w$.]+%(ROW)?TYPE\b/gi)].map(match => match[0]))];
    if (anchors.length > 0) {
      recorder.warn(
        ctx.target === 'postgresql'
          ? createWarning(
              'syntax-difference',
              `${anchors.join(', ')}: %TYPE/%ROWTYPE anchors are valid only inside PL/pgSQL`,
              'info',
            )
          : createWarning(
              'unsupported-function',
              `${anchors.join(', ')}: MySQL has no %TYPE/%ROWTYPE anchors`,
              'warning',
              'Declare variables with the explicit column type',
            ),
      );
    }
    if (/\bREF\s+(?!CURSOR\b)[\w$]+\s*(?=[,)]|\s+SCOPE\b|\s+NOT\b|$)/im.test(sql)) {
      recorder.warn(
        createWarning(
          'unsupported-function',
          'REF object references are not supported',
          'warning',
          'Store the primary key of the referenced row and add a foreign key',
        ),
      );
    }
  }
}
