import type { Dialect, StepResult } from '../../types/sql';
import { mapSegments, splitTerminator } from '../../utils/sqlText';
import { StepRecorder, type ConversionContext, type FeatureConverter } from '../context';
import { SQL_PATTERNS } from '../sqlPatterns';
import { createWarning } from '../warnings';

const BIGINT_MAX = 9223372036854775807n;

type SequenceOp = 'NEXTVAL' | 'CURRVAL';

export interface SequenceOptions {
  startWith?: string;
  incrementBy?: string;
  minValue?: string | null;
  maxValue?: string | null;
  cache?: string | null;
  cycle?: boolean;
  order?: boolean;
}

/**
 * Parse the option list of CREATE SEQUENCE. A `null` value records an explicit
 * NOMINVALUE / NOMAXVALUE / NOCACHE.
 */
export function parseSequenceOptions(text: string): SequenceOptions {
  const options: SequenceOptions = {};
  const number = '([+-]?\\d+)';
  const read = (pattern: string) => new RegExp(pattern, 'i').exec(text)?.[1];

  options.startWith = read(`\\bSTART\\s+(?:WITH\\s+)?${number}`);
  options.incrementBy = read(`\\bINCREMENT\\s+(?:BY\\s+)?${number}`);
  options.minValue = /\bNO\s*MINVALUE\b/i.test(text) ? null : read(`\\bMINVALUE\\s+${number}`);
  options.maxValue = /\bNO\s*MAXVALUE\b/i.test(text) ? null : read(`\\bMAXVALUE\\s+${number}`);
  options.cache = /\bNO\s*CACHE\b/i.test(text) ? null : read(`\\bCACHE\\s+${number}`);
  if (/\bNO\s*CYCLE\b/i.test(text)) options.cycle = false;
  else if (/\bCYCLE\b/i.test(text)) options.cycle = true;
  if (/\bNO\s*ORDER\b/i.test(text)) options.order = false;
  else if (/\bORDER\b/i.test(text)) options.order = true;
  return options;
}

function exceedsBigint(value: string): boolean {
  return BigInt(value) > BIGINT_MAX || BigInt(value) < -BIGINT_MAX - 1n;
}

export function renderSequence(name: string, options: SequenceOptions, target: Dialect): string {
  const parts = [`CREATE SEQUENCE ${name}`];
  const oracle = target === 'oracle';
  if (options.startWith !== undefined) parts.push(`START WITH ${options.startWith}`);
  if (options.incrementBy !== undefined) parts.push(`INCREMENT BY ${options.incrementBy}`);
  if (options.minValue === null) parts.push(oracle ? 'NOMINVALUE' : 'NO MINVALUE');
  else if (options.minValue !== undefined) parts.push(`MINVALUE ${options.minValue}`);
  if (options.maxValue === null) parts.push(oracle ? 'NOMAXVALUE' : 'NO MAXVALUE');
  else if (options.maxValue !== undefined) parts.push(`MAXVALUE ${options.maxValue}`);
  if (options.cache === null) parts.push(oracle || target === 'mysql' ? 'NOCACHE' : 'CACHE 1');
  else if (options.cache !== undefined) parts.push(`CACHE ${options.cache}`);
  if (options.cycle !== undefined) {
    parts.push(options.cycle ? 'CYCLE' : target === 'postgresql' ? 'NO CYCLE' : 'NOCYCLE');
  }
  if (oracle && options.order !== undefined) parts.push(options.order ? 'ORDER' : 'NOORDER');
  return parts.join(' ');
}

const SERIAL_COLUMN =
  /(\s)(SMALLSERIAL|BIGSERIAL|SERIAL[248]?)(?=\s*(?:[,)]|NOT\b|NULL\b|PRIMARY\b|UNIQUE\b|CONSTRAINT\b|REFERENCES\b|CHECK\b))/gi;

const SERIAL_TYPES: Record<string, string> = {
  SERIAL: 'INT',
  SERIAL4: 'INT',
  BIGSERIAL: 'BIGINT',
  SERIAL8: 'BIGINT',
  SMALLSERIAL: 'SMALLINT',
  SERIAL2: 'SMALLINT',
};

/** Sequences, their references and auto-increment column idioms. */
export class SequenceConverter implements FeatureConverter {
  readonly name = 'sequence';

  applies(masked: string, ctx: ConversionContext): boolean {
    return (
      (ctx.config.ddl.convertSequences && SQL_PATTERNS.SEQUENCE_DDL.test(masked)) ||
      (ctx.config.function.convertSequences && SQL_PATTERNS.SEQUENCE_REFERENCE.test(masked))
    );
  }

  convert(masked: string, ctx: ConversionContext): StepResult {
    const recorder = new StepRecorder();
    let sql = masked;
    if (ctx.config.ddl.convertSequences) {
      sql = mapSegments(
        sql,
        segment => SQL_PATTERNS.SEQUENCE_DDL.test(segment),
        segment => this.convertDdl(segment, ctx, recorder),
      );
    }
    if (ctx.config.function.convertSequences) {
      sql = this.convertReferences(sql, ctx, recorder);
      sql = this.convertIdentity(sql, ctx, recorder);
    }
    return recorder.result(sql);
  }

  private convertDdl(segment: string, ctx: ConversionContext, recorder: StepRecorder): string {
    const { body, terminator } = splitTerminator(segment);
    const end = terminator || ';';

    const dropped = /^(\s*)DROP\s+SEQUENCE\s+(?:IF\s+EXISTS\s+)?([\w$."`]+)(\s+(?:CASCADE|RESTRICT))?\s*$/i.exec(body);
    if (dropped) {
      const drop =
        ctx.target === 'oracle'
          ? `DROP SEQUENCE ${dropped[2]}`
          : `DROP SEQUENCE IF EXISTS ${dropped[2]}${ctx.target === 'postgresql' ? ' CASCADE' : ''}`;
      if (dropped[1] + drop !== body) recorder.rule('Sequence: DROP SEQUENCE');
      return dropped[1] + drop + end;
    }

    const created = /^(\s*)CREATE\s+SEQUENCE\s+(?:IF\s+NOT\s+EXISTS\s+)?([\w$."`]+)([\s\S]*)$/i.exec(body);
    if (!created) return segment;
    const [, lead, name, rest] = created;
    const options = parseSequenceOptions(rest);

    if (ctx.target === 'postgresql') {
      for (const key of ['minValue', 'maxValue', 'startWith'] as const) {
        const value = options[key];
        if (typeof value === 'string' && exceedsBigint(value)) {
          recorder.warn(
            createWarning(
              'data-type-mismatch',
              `Sequence ${name}: ${value} exceeds the BIGINT range and was dropped`,
              'warning',
            ),
          );
          if (key === 'startWith') options.startWith = undefined;
          else options[key] = null;
        }
      }
    }
    if (options.order !== undefined && ctx.target !== 'oracle') {
      recorder.warn(createWarning('syntax-difference', `Sequence ${name}: ORDER/NOORDER has no effect and was dropped`, 'info'));
    }
    if (ctx.target === 'mysql') {
      recorder.warn(
        createWarning(
          'partial-support',
          `Sequence ${name}: CREATE SEQUENCE needs MariaDB 10.3+; MySQL has only AUTO_INCREMENT columns`,
          'warning',
          'Use an AUTO_INCREMENT column or a single-row counter table on MySQL',
        ),
      );
    }

    // A terminator added on its own is not an option change
    const rendered = lead + renderSequence(name, options, ctx.target);
    if (rendered !== body) recorder.rule('Sequence: CREATE SEQUENCE options');
    return rendered + end;
  }

  private convertReferences(sql: string, ctx: ConversionContext, recorder: StepRecorder): string {
    const emit = (sequence: string, op: SequenceOp): string => {
      recorder.rule(`Sequence: ${op} reference`);
      switch (ctx.target) {
        case 'oracle':
          return `${sequence}.${op}`;
        case 'postgresql':
          return `${op.toLowerCase()}(${ctx.mask.addLiteral(sequence)})`;
        case 'mysql':
          return op === 'NEXTVAL' ? `NEXTVAL(${sequence})` : `LASTVAL(${sequence})`;
      }
    };

    let out = sql;
    if (ctx.source === 'oracle') {
      out = out.replace(
        /(?<![\w$])([\w$"]+(?:\.[\w$"]+)?)\s*\.\s*(NEXTVAL|CURRVAL)\b/gi,
        (_match, sequence: string, op: string) => emit(sequence, this.op(op)),
      );
    } else if (ctx.source === 'postgresql') {
      out = out.replace(
        /\b(nextval|currval)\s*\(\s*('[^']*')(?:\s*::\s*regclass)?\s*\)/gi,
        (match: string, op: string, literal: string) => {
          const sequence = ctx.mask.literalValue(literal);
          return sequence === undefined ? match : emit(sequence, this.op(op));
        },
      );
    } else {
      out = out
        .replace(/\b(NEXTVAL|LASTVAL)\s*\(\s*([\w$."`]+)\s*\)/gi, (_match, op: string, sequence: string) =>
          emit(sequence, op.toUpperCase() === 'LASTVAL' ? 'CURRVAL' : 'NEXTVAL'),
        )
        .replace(/\bNEXT\s+VALUE\s+FOR\s+([\w$."`]+)/gi, (_match, sequence: string) => emit(sequence, 'NEXTVAL'));
    }

    if (out !== sql && ctx.target === 'mysql') {
      recorder.warn(
        createWarning(
          'partial-support',
          'NEXTVAL()/LASTVAL() sequence functions need MariaDB 10.3+',
          'warning',
          'On MySQL, replace sequence calls with an AUTO_INCREMENT column and LAST_INSERT_ID()',
        ),
      );
    }
    return out;
  }

  private op(word: string): SequenceOp {
    return word.toUpperCase() === 'CURRVAL' ? 'CURRVAL' : 'NEXTVAL';
  }

  private convertIdentity(sql: string, ctx: ConversionContext, recorder: StepRecorder): string {
    if (ctx.source === 'mysql') {
      const intColumn =
        /((?:"[^"]+"|`[^`]+`|[\w$]+)\s+)((?:TINY|SMALL|MEDIUM|BIG)?INT(?:EGER)?)(\s*\(\s*\d+\s*\))?((?:\s+UNSIGNED)?)([^,()]*?)\s+AUTO_INCREMENT\b/gi;
      return sql.replace(intColumn, (_match, column: string, type: string, width: string | undefined, unsigned: string, rest: string) => {
        if (ctx.target === 'postgresql') {
          recorder.rule('Sequence: AUTO_INCREMENT → SERIAL');
          const upper = type.toUpperCase();
          const serial = upper === 'BIGINT' ? 'BIGSERIAL' : /^(?:SMALL|TINY)INT$/.test(upper) ? 'SMALLSERIAL' : 'SERIAL';
          return `${column}${serial}${rest}`;
        }
        recorder.rule('Sequence: AUTO_INCREMENT → IDENTITY');
        return `${column}${type}${width ?? ''}${unsigned} GENERATED BY DEFAULT AS IDENTITY${rest}`;
      });
    }

    const identity = /\bGENERATED\s+(?:ALWAYS|BY\s+DEFAULT(?:\s+ON\s+NULL)?)\s+AS\s+IDENTITY(?:\s*\([^()]*\))?/gi;
    if (ctx.target === 'mysql') {
      let out = sql.replace(identity, () => {
        recorder.rule('Sequence: IDENTITY → AUTO_INCREMENT');
        return 'AUTO_INCREMENT';
      });
      if (ctx.source === 'postgresql') {
        out = out.replace(SERIAL_COLUMN, (_match, space: string, serial: string) => {
          recorder.rule('Sequence: SERIAL → AUTO_INCREMENT');
          return `${space}${SERIAL_TYPES[serial.toUpperCase()] ?? 'INT'} AUTO_INCREMENT`;
        });
      }
      return out;
    }

    if (ctx.source === 'postgresql' && ctx.target === 'oracle') {
      return sql.replace(SERIAL_COLUMN, (_match, space: string, serial: string) => {
        recorder.rule('Sequence: SERIAL → IDENTITY');
        return `${space}${SERIAL_TYPES[serial.toUpperCase()] ?? 'INT'} GENERATED BY DEFAULT AS IDENTITY`;
      });
    }
    return sql;
  }
}
