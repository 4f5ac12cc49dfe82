import type { StepResult } from '../../types/sql';
import { operandStart, rewriteFunctionCalls } from '../../utils/sqlText';
import { StepRecorder, type ConversionContext, type FeatureConverter } from '../context';
import { SQL_PATTERNS } from '../sqlPatterns';
import { createWarning } from '../warnings';

const UNITS = ['MICROSECOND', 'SECOND', 'MINUTE', 'HOUR', 'DAY', 'WEEK', 'MONTH', 'QUARTER', 'YEAR'] as const;
type IntervalUnit = (typeof UNITS)[number];

const MONTH_FACTOR: Partial<Record<IntervalUnit, number>> = { MONTH: 1, QUARTER: 3, YEAR: 12 };

const NUMBER = /^-?\d+(?:\.\d+)?$/;

const INTERVAL_OPERATOR = new RegExp(
  `([+-])\\s*INTERVAL\\s+(-?\\d+(?:\\.\\d+)?|'[^']*')(?:\\s+(${UNITS.join('|')})S?\\b(?:\\s*\\(\\s*\\d+\\s*\\))?)?(?!\\s+TO\\b)`,
  'gi',
);

// Oracle DATE arithmetic in days: SYSDATE + 1, hire_date - 7
const DATE_PLUS_DAYS =
  /(?<![\w$.])(SYSDATE|SYSTIMESTAMP|CURRENT_DATE|CURRENT_TIMESTAMP|[\w$.]*_(?:date|at|time)|date)\s*([+-])\s*(\d+(?:\.\d+)?)(?![\w.]|\s*[*/(])/gi;

const DATE_KEYWORD = /^(?:SYSDATE|SYSTIMESTAMP|CURRENT_DATE|CURRENT_TIMESTAMP)$/i;

function toUnit(word: string): IntervalUnit | undefined {
  const upper = word.toUpperCase().replace(/S$/, '');
  return UNITS.find(unit => unit === upper);
}

/** Scale `amount` by `factor`, folding numeric literals. */
function scale(amount: string, factor: number, negate = false): string {
  if (NUMBER.test(amount)) return String(Number(amount) * factor * (negate ? -1 : 1));
  const scaled = factor === 1 ? amount : `(${amount}) * ${factor}`;
  return negate ? `-(${scaled})` : scaled;
}

/**
 * Date arithmetic across dialects: Oracle day arithmetic and ADD_MONTHS,
 * MySQL DATE_ADD / DATE_SUB and DATEDIFF, and interval literals.
 */
export class DateArithmeticConverter implements FeatureConverter {
  readonly name = 'date arithmetic';

  applies(masked: string, ctx: ConversionContext): boolean {
    return (
      ctx.config.function.convertDateFunctions &&
      (SQL_PATTERNS.DATE_ARITHMETIC.test(masked) || /\b(?:DATEDIFF|ADDDATE|SUBDATE)\s*\(|[\w$]_(?:date|at|time)\s*[+-]\s*\d/i.test(masked))
    );
  }

  convert(masked: string, ctx: ConversionContext): StepResult {
    const recorder = new StepRecorder();
    let sql = this.convertIntervalOperators(masked, ctx, recorder);
    if (ctx.source === 'oracle') {
      sql = this.convertOracleFunctions(sql, ctx, recorder);
      sql = this.convertDayArithmetic(sql, ctx, recorder);
    }
    if (ctx.source === 'mysql') {
      sql = this.convertMysqlFunctions(sql, ctx, recorder);
    }
    return recorder.result(sql);
  }

  /** `date ± amount unit` in the target's idiom. */
  private addInterval(date: string, sign: string, amount: string, unit: IntervalUnit, ctx: ConversionContext): string {
    const minus = sign === '-';
    switch (ctx.target) {
      case 'mysql':
        return `${minus ? 'DATE_SUB' : 'DATE_ADD'}(${date}, INTERVAL ${amount} ${unit})`;
      case 'postgresql': {
        const interval = NUMBER.test(amount)
          ? `INTERVAL ${ctx.mask.addLiteral(`${amount} ${unit.toLowerCase()}`)}`
          : `(${amount}) * INTERVAL ${ctx.mask.addLiteral(`1 ${unit.toLowerCase()}`)}`;
        return `(${date} ${sign} ${interval})`;
      }
      case 'oracle': {
        const months = MONTH_FACTOR[unit];
        if (months !== undefined) return `ADD_MONTHS(${date}, ${scale(amount, months, minus)})`;
        if (unit === 'DAY') return `(${date} ${sign} ${amount})`;
        if (unit === 'WEEK') return `(${date} ${sign} ${scale(amount, 7)})`;
        if (unit === 'MICROSECOND') {
          return `(${date} ${sign} NUMTODSINTERVAL(${amount} / 1000000, ${ctx.mask.addLiteral('SECOND')}))`;
        }
        return `(${date} ${sign} NUMTODSINTERVAL(${amount}, ${ctx.mask.addLiteral(unit)}))`;
      }
    }
  }

  /** Numeric text of an interval amount written as a number or a quoted literal. */
  private amountOf(raw: string, ctx: ConversionContext): string | undefined {
    const literal = ctx.mask.literalValue(raw);
    const value = (literal ?? raw).trim();
    return NUMBER.test(value) ? value : literal === undefined ? raw : undefined;
  }

  private convertIntervalOperators(sql: string, ctx: ConversionContext, recorder: StepRecorder): string {
    let out = sql;
    const matches = [...sql.matchAll(INTERVAL_OPERATOR)].reverse();
    // Right to left; a match inside an operand already rewritten is left alone
    let boundary = sql.length;
    for (const match of matches) {
      const index = match.index ?? 0;
      const [whole, sign, rawValue, rawUnit] = match;
      if (index + whole.length > boundary) continue;
      let amount: string | undefined;
      let unit: IntervalUnit | undefined;
      if (rawUnit !== undefined) {
        amount = this.amountOf(rawValue, ctx);
        unit = toUnit(rawUnit);
      } else {
        // PostgreSQL style: the unit lives inside the literal, '3 days'
        const parsed = /^\s*(-?\d+(?:\.\d+)?)\s*([a-z]+)\s*$/i.exec(ctx.mask.literalValue(rawValue) ?? '');
        if (parsed) {
          amount = parsed[1];
          unit = toUnit(parsed[2]);
        }
      }
      const start = operandStart(out, index);
      if (amount === undefined || unit === undefined || start === -1) {
        if (rawUnit === undefined && ctx.mask.literalValue(rawValue) !== undefined) {
          recorder.warn(
            createWarning(
              'manual-review-needed',
              `Interval ${ctx.mask.unmask(rawValue)} could not be converted`,
              'warning',
              'Split compound intervals into one addition per unit',
            ),
          );
        }
        continue;
      }
      boundary = start;
      const date = out.slice(start, index).trim();
      const replacement = this.addInterval(date, sign, amount, unit, ctx);
      out = out.slice(0, start) + replacement + out.slice(index + whole.length);
      recorder.rule(`Date: ${sign} INTERVAL ${unit} → ${ctx.target} interval arithmetic`);
    }
    return out;
  }

  private convertOracleFunctions(sql: string, ctx: ConversionContext, recorder: StepRecorder): string {
    if (ctx.target === 'oracle') return sql;
    let out = rewriteFunctionCalls(sql, ['ADD_MONTHS'], ({ args }) => {
      if (args.length !== 2) return undefined;
      recorder.rule('Date: ADD_MONTHS → interval arithmetic');
      return this.addInterval(args[0], '+', args[1], 'MONTH', ctx);
    });
    out = rewriteFunctionCalls(out, ['MONTHS_BETWEEN'], ({ args }) => {
      if (args.length !== 2) return undefined;
      const [later, earlier] = args;
      recorder.rule('Date: MONTHS_BETWEEN → month difference');
      recorder.warn(
        createWarning(
          'partial-support',
          'MONTHS_BETWEEN now returns whole months; the fractional part is lost',
          'warning',
        ),
      );
      if (ctx.target === 'mysql') return `TIMESTAMPDIFF(MONTH, ${earlier}, ${later})`;
      return `(EXTRACT(YEAR FROM AGE(${later}, ${earlier})) * 12 + EXTRACT(MONTH FROM AGE(${later}, ${earlier})))`;
    });
    return out;
  }

  private convertDayArithmetic(sql: string, ctx: ConversionContext, recorder: StepRecorder): string {
    if (ctx.target === 'oracle') return sql;
    const guessed = new Set<string>();
    const out = sql.replace(DATE_PLUS_DAYS, (_match, date: string, sign: string, days: string) => {
      if (!DATE_KEYWORD.test(date)) guessed.add(date);
      recorder.rule('Date: date ± n days → interval arithmetic');
      return this.addInterval(date, sign, days, 'DAY', ctx);
    });
    for (const column of guessed) {
      recorder.warn(
        createWarning(
          'manual-review-needed',
          `Column ${column} was taken for a date from its name`,
          'warning',
          'If the column is numeric, restore the plain arithmetic',
        ),
      );
    }
    return out;
  }

  private convertMysqlFunctions(sql: string, ctx: ConversionContext, recorder: StepRecorder): string {
    let out = rewriteFunctionCalls(sql, ['DATE_ADD', 'DATE_SUB', 'ADDDATE', 'SUBDATE'], call => {
      if (call.args.length !== 2) return undefined;
      const [date, second] = call.args;
      const sign = /SUB/i.test(call.name) ? '-' : '+';
      const interval = /^INTERVAL\s+([\s\S]+?)\s+(\w+)$/i.exec(second);
      const amount = interval ? this.amountOf(interval[1], ctx) : this.amountOf(second, ctx);
      const unit = interval ? toUnit(interval[2]) : 'DAY';
      if (amount === undefined || unit === undefined) {
        recorder.warn(
          createWarning(
            'manual-review-needed',
            `${call.name.toUpperCase()} with interval ${ctx.mask.unmask(second)} was not converted`,
            'warning',
            'Composite interval units such as DAY_HOUR must be split into separate additions',
          ),
        );
        return undefined;
      }
      recorder.rule(`Date: ${call.name.toUpperCase()} → interval arithmetic`);
      return this.addInterval(date, sign, amount, unit, ctx);
    });

    out = rewriteFunctionCalls(out, ['DATEDIFF'], ({ args }) => {
      if (args.length !== 2) return undefined;
      const [later, earlier] = args;
      recorder.rule('Date: DATEDIFF → date subtraction');
      if (ctx.target === 'postgresql') return `(CAST(${later} AS DATE) - CAST(${earlier} AS DATE))`;
      return `(TRUNC(${later}) - TRUNC(${earlier}))`;
    });
    return out;
  }
}
