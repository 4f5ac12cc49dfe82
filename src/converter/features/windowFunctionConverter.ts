import type { Dialect, StepResult } from '../../types/sql';
import { escapeRegExp, findClosingParen, splitTopLevel, topLevelView } from '../../utils/sqlText';
import { StepRecorder, type ConversionContext, type FeatureConverter } from '../context';
import { SQL_PATTERNS } from '../sqlPatterns';
import { createWarning } from '../warnings';

const FULL_FRAME = 'ROWS BETWEEN UNBOUNDED PRECEDING AND UNBOUNDED FOLLOWING';
const KEEP_AGGREGATES = ['MIN', 'MAX', 'SUM', 'AVG', 'COUNT'];
const NULL_TREATMENT = ['FIRST_VALUE', 'LAST_VALUE', 'NTH_VALUE', 'LAG', 'LEAD'];

/** A function call together with the analytic clauses written after it. */
interface CallSite {
  name: string;
  inner: string;
  keep?: string;
  within?: string;
  nulls?: 'IGNORE' | 'RESPECT';
  over?: string;
}

interface StringAggregate {
  distinct: boolean;
  expression: string;
  separator?: string;
  orderBy?: string;
}

/**
 * Rewrite calls to `names` including any trailing KEEP, WITHIN GROUP,
 * IGNORE/RESPECT NULLS and OVER clauses. Returning undefined keeps the call,
 * and its arguments are still scanned for nested calls.
 */
function rewriteCallSites(
  text: string,
  names: readonly string[],
  rewrite: (site: CallSite) => string | undefined,
): string {
  const pattern = new RegExp(`(?<![\\w.$"\`])(${names.map(escapeRegExp).join('|')})\\s*\\(`, 'gi');
  let out = '';
  let cursor = 0;
  for (const match of text.matchAll(pattern)) {
    const start = match.index ?? 0;
    if (start < cursor) continue;
    const open = start + match[0].length - 1;
    const close = findClosingParen(text, open);
    if (close === -1) continue;

    let end = close + 1;
    const clause = (head: RegExp): string | undefined => {
      const found = head.exec(text.slice(end));
      if (!found) return undefined;
      const clauseOpen = end + found[0].length - 1;
      const clauseClose = findClosingParen(text, clauseOpen);
      if (clauseClose === -1) return undefined;
      end = clauseClose + 1;
      return text.slice(clauseOpen + 1, clauseClose);
    };
    const site: CallSite = { name: match[1].toUpperCase(), inner: text.slice(open + 1, close) };
    site.keep = clause(/^\s*KEEP\s*\(/i);
    site.within = clause(/^\s*WITHIN\s+GROUP\s*\(/i);
    const nulls = /^\s*(IGNORE|RESPECT)\s+NULLS\b/i.exec(text.slice(end));
    if (nulls) {
      site.nulls = nulls[1].toUpperCase() === 'IGNORE' ? 'IGNORE' : 'RESPECT';
      end += nulls[0].length;
    }
    site.over = clause(/^\s*OVER\s*\(/i);

    const replacement = rewrite(site);
    if (replacement === undefined) continue;
    out += text.slice(cursor, start) + replacement;
    cursor = end;
  }
  return out + text.slice(cursor);
}

function over(site: CallSite): string {
  return site.over === undefined ? '' : ` OVER (${site.over.trim()})`;
}

/** Split `[DISTINCT] args [ORDER BY ...] [SEPARATOR ...]` as written inside GROUP_CONCAT or STRING_AGG. */
function readAggregateArgs(inner: string): { distinct: boolean; args: string[]; orderBy?: string; separator?: string } {
  const distinct = /^\s*DISTINCT\s+/i.exec(inner);
  const body = distinct ? inner.slice(distinct[0].length) : inner;
  const view = topLevelView(body);
  const order = /\bORDER\s+BY\b/i.exec(view);
  const separator = /\bSEPARATOR\b/i.exec(view);
  const argsEnd = Math.min(order?.index ?? body.length, separator?.index ?? body.length);
  const orderEnd = separator && order && separator.index > order.index ? separator.index : body.length;
  return {
    distinct: distinct !== null,
    args: splitTopLevel(body.slice(0, argsEnd)),
    ...(order ? { orderBy: body.slice(order.index + order[0].length, orderEnd).trim() } : {}),
    ...(separator ? { separator: body.slice(separator.index + separator[0].length).trim() } : {}),
  };
}

function renderStringAggregate(aggregate: StringAggregate, target: Dialect, emptyLiteral: () => string): string {
  const distinct = aggregate.distinct ? 'DISTINCT ' : '';
  const separator = aggregate.separator ?? emptyLiteral();
  switch (target) {
    case 'mysql': {
      const order = aggregate.orderBy ? ` ORDER BY ${aggregate.orderBy}` : '';
      return `GROUP_CONCAT(${distinct}${aggregate.expression}${order} SEPARATOR ${separator})`;
    }
    case 'postgresql': {
      const order = aggregate.orderBy ? ` ORDER BY ${aggregate.orderBy}` : '';
      return `STRING_AGG(${distinct}${aggregate.expression}, ${separator}${order})`;
    }
    case 'oracle':
      return `LISTAGG(${distinct}${aggregate.expression}, ${separator}) WITHIN GROUP (ORDER BY ${aggregate.orderBy ?? 'NULL'})`;
  }
}

/**
 * Vendor-specific analytic and aggregate syntax: KEEP (DENSE_RANK FIRST/LAST),
 * ordered string aggregation, percentiles, RATIO_TO_REPORT and null treatment.
 */
export class WindowFunctionConverter implements FeatureConverter {
  readonly name = 'window function';

  applies(masked: string, ctx: ConversionContext): boolean {
    return (
      SQL_PATTERNS.WINDOW_EXTENSION.test(masked) ||
      /\bMEDIAN\s*\(/i.test(masked) ||
      (ctx.target === 'mysql' && ctx.source !== 'mysql' && /\bOVER\s*\(/i.test(masked))
    );
  }

  convert(masked: string, ctx: ConversionContext): StepResult {
    const recorder = new StepRecorder();
    let sql = masked;
    if (ctx.config.function.convertAnalyticFunctions) {
      if (ctx.source === 'oracle') {
        sql = this.convertKeep(sql, ctx, recorder);
        sql = this.convertRatioToReport(sql, recorder);
        sql = this.convertMedian(sql, ctx, recorder);
      }
      sql = this.convertPercentiles(sql, ctx, recorder);
      sql = this.convertNullTreatment(sql, ctx, recorder);
    }
    if (ctx.config.function.convertAggregateFunctions) {
      sql = this.convertStringAggregates(sql, ctx, recorder);
    }
    if (ctx.target === 'mysql' && ctx.source !== 'mysql' && /\bOVER\s*\(/i.test(sql)) {
      recorder.warn(
        createWarning(
          'syntax-difference',
          'Window functions require MySQL 8.0 or later',
          'info',
          'On MySQL 5.7, rewrite with correlated subqueries or session variables',
        ),
      );
    }
    return recorder.result(sql);
  }

  private convertKeep(sql: string, ctx: ConversionContext, recorder: StepRecorder): string {
    if (ctx.target === 'oracle') return sql;
    return rewriteCallSites(sql, KEEP_AGGREGATES, site => {
      if (site.keep === undefined) return undefined;
      const keep = /^\s*DENSE_RANK\s+(FIRST|LAST)\s+ORDER\s+BY\s+([\s\S]+?)\s*$/i.exec(site.keep);
      if (!keep) return undefined;
      const fn = keep[1].toUpperCase() === 'FIRST' ? 'FIRST_VALUE' : 'LAST_VALUE';
      const partition = site.over?.trim() ?? '';
      recorder.rule(`Window: ${site.name} KEEP (DENSE_RANK ${keep[1].toUpperCase()}) → ${fn}`);
      recorder.warn(
        createWarning(
          'partial-support',
          site.over === undefined
            ? `${site.name} ... KEEP became the window function ${fn}; it now yields one value per row instead of per group`
            : `${site.name} ... KEEP became ${fn}; ties in the ORDER BY are no longer aggregated with ${site.name}`,
          'warning',
          site.over === undefined ? 'Select DISTINCT or wrap the query to collapse rows per group' : undefined,
        ),
      );
      const frame = `${partition ? `${partition} ` : ''}ORDER BY ${keep[2]} ${FULL_FRAME}`;
      return `${fn}(${site.inner.trim()}) OVER (${frame})`;
    });
  }

  private convertRatioToReport(sql: string, recorder: StepRecorder): string {
    return rewriteCallSites(sql, ['RATIO_TO_REPORT'], site => {
      const [value] = splitTopLevel(site.inner);
      if (value === undefined || site.over === undefined) return undefined;
      recorder.rule('Window: RATIO_TO_REPORT → SUM() OVER');
      recorder.warn(
        createWarning(
          'syntax-difference',
          'RATIO_TO_REPORT rewritten as value / SUM(value) OVER (...)',
          'info',
          'Cast an integer value to a decimal type to avoid integer division',
        ),
      );
      const operand = /^[\w$."]+$/.test(value) ? value : `(${value})`;
      return `${operand} / SUM(${value})${over(site)}`;
    });
  }

  private convertMedian(sql: string, ctx: ConversionContext, recorder: StepRecorder): string {
    if (ctx.target === 'oracle') return sql;
    return rewriteCallSites(sql, ['MEDIAN'], site => {
      const [value] = splitTopLevel(site.inner);
      if (value === undefined) return undefined;
      if (ctx.target === 'postgresql' && site.over === undefined) {
        recorder.rule('Window: MEDIAN → PERCENTILE_CONT(0.5)');
        return `PERCENTILE_CONT(0.5) WITHIN GROUP (ORDER BY ${value})`;
      }
      recorder.rule('Window: MEDIAN commented out');
      recorder.warn(
        createWarning(
          'unsupported-function',
          `MEDIAN${site.over === undefined ? '' : ' OVER'} is not supported by ${ctx.target === 'mysql' ? 'MySQL' : 'PostgreSQL'}`,
          'warning',
          'Compute the median with ROW_NUMBER() and COUNT() in a subquery',
        ),
      );
      return `${ctx.mask.comment('MEDIAN not supported')} NULL`;
    });
  }

  private convertPercentiles(sql: string, ctx: ConversionContext, recorder: StepRecorder): string {
    if (ctx.target !== 'mysql') return sql;
    return rewriteCallSites(sql, ['PERCENTILE_CONT', 'PERCENTILE_DISC'], site => {
      if (site.within === undefined) return undefined;
      recorder.rule(`Window: ${site.name} commented out`);
      recorder.warn(
        createWarning(
          'unsupported-function',
          `${site.name} is not supported by MySQL`,
          'warning',
          'Compute the percentile with ROW_NUMBER() and COUNT() in a subquery',
        ),
      );
      return `${ctx.mask.comment(`${site.name} not supported`)} NULL`;
    });
  }

  private convertNullTreatment(sql: string, ctx: ConversionContext, recorder: StepRecorder): string {
    if (ctx.target === 'oracle') return sql;
    return rewriteCallSites(sql, NULL_TREATMENT, site => {
      // Oracle also accepts the clause inside the parentheses
      const inside = /\s+(IGNORE|RESPECT)\s+NULLS\s*$/i.exec(site.inner);
      const treatment = site.nulls ?? (inside ? inside[1].toUpperCase() : undefined);
      if (treatment === undefined) return undefined;
      const inner = inside ? site.inner.slice(0, inside.index) : site.inner;
      if (treatment === 'IGNORE') {
        recorder.rule(`Window: ${site.name} IGNORE NULLS removed`);
        recorder.warn(
          createWarning(
            'partial-support',
            `${site.name} ... IGNORE NULLS is not supported by ${ctx.target === 'mysql' ? 'MySQL' : 'PostgreSQL'}; NULL values are no longer skipped`,
            'warning',
            'Filter NULLs in a subquery, or use a conditional aggregate over the frame',
          ),
        );
      } else {
        recorder.rule(`Window: ${site.name} RESPECT NULLS removed`);
      }
      return `${site.name}(${inner.trim()})${over(site)}`;
    });
  }

  private convertStringAggregates(sql: string, ctx: ConversionContext, recorder: StepRecorder): string {
    const emptyLiteral = () => ctx.mask.addLiteral('');
    const names = (['LISTAGG', 'GROUP_CONCAT', 'STRING_AGG'] as const).filter(
      name => name !== { oracle: 'LISTAGG', mysql: 'GROUP_CONCAT', postgresql: 'STRING_AGG' }[ctx.target],
    );
    return rewriteCallSites(sql, names, site => {
      const aggregate = this.readStringAggregate(site, ctx);
      if (aggregate === undefined) return undefined;
      if (site.over !== undefined && ctx.target === 'mysql') {
        recorder.warn(
          createWarning(
            'unsupported-function',
            'GROUP_CONCAT cannot be used as a window function',
            'warning',
            'Aggregate in a derived table and join it back',
          ),
        );
      }
      const rendered = renderStringAggregate(aggregate, ctx.target, emptyLiteral);
      recorder.rule(`Window: ${site.name} → ${/^\w+/.exec(rendered)?.[0] ?? rendered}`);
      return rendered + over(site);
    });
  }

  private readStringAggregate(site: CallSite, ctx: ConversionContext): StringAggregate | undefined {
    switch (site.name) {
      case 'LISTAGG': {
        const distinct = /^\s*DISTINCT\s+/i.exec(site.inner);
        const args = splitTopLevel(distinct ? site.inner.slice(distinct[0].length) : site.inner);
        const [expression, rawSeparator] = args;
        if (expression === undefined || args.length > 2) return undefined;
        // ON OVERFLOW has no counterpart; the separator keeps its literal
        const separator = rawSeparator?.replace(/\s+ON\s+OVERFLOW\b[\s\S]*$/i, '');
        const order = site.within === undefined ? undefined : /^\s*ORDER\s+BY\s+([\s\S]+?)\s*$/i.exec(site.within)?.[1];
        const orderBy = order !== undefined && !/^NULL$/i.test(order) ? order : undefined;
        return {
          distinct: distinct !== null,
          expression,
          ...(separator !== undefined ? { separator } : {}),
          ...(orderBy !== undefined ? { orderBy } : {}),
        };
      }
      case 'GROUP_CONCAT': {
        const parsed = readAggregateArgs(site.inner);
        if (parsed.args.length === 0) return undefined;
        const expression = parsed.args.length === 1 ? parsed.args[0] : `CONCAT(${parsed.args.join(', ')})`;
        return {
          distinct: parsed.distinct,
          expression,
          separator: parsed.separator ?? ctx.mask.addLiteral(','),
          ...(parsed.orderBy !== undefined ? { orderBy: parsed.orderBy } : {}),
        };
      }
      case 'STRING_AGG': {
        const parsed = readAggregateArgs(site.inner);
        const [expression, separator] = parsed.args;
        if (expression === undefined || separator === undefined || parsed.args.length > 2) return undefined;
        return {
          distinct: parsed.distinct,
          expression,
          separator,
          ...(parsed.orderBy !== undefined ? { orderBy: parsed.orderBy } : {}),
        };
      }
      default:
        return undefined;
    }
  }
}
