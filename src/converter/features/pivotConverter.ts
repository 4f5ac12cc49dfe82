import type { StepResult } from '../../types/sql';
import { escapeRegExp, findClosingParen, mapSegments, splitTerminator, splitTopLevel, topLevelView, unqualified } from '../../utils/sqlText';
import { StepRecorder, type ConversionContext, type FeatureConverter } from '../context';
import { SQL_PATTERNS } from '../sqlPatterns';
import { createWarning } from '../warnings';

interface PivotStatement {
  lead: string;
  selectList: string[];
  source: string;
  unpivot: boolean;
  includeNulls: boolean;
  spec: string;
  alias?: string;
  where?: string;
  orderBy?: string;
}

interface Aggregate {
  fn: string;
  distinct: boolean;
  argument: string;
  alias?: string;
}

interface PivotColumn {
  name: string;
  expression: string;
}

const AGGREGATE = /^([\w$]+)\s*\(\s*(DISTINCT\s+)?([\s\S]*?)\s*\)(?:\s+(?:AS\s+)?([\w$]+|"[^"]+"))?$/i;
const PIVOT_VALUE = /^('[^']*'|[-+]?\d+(?:\.\d+)?|[\w$.]+)(?:\s+(?:AS\s+)?([\w$]+|"[^"]+"))?$/i;
const UNPIVOT_ITEM = /^([\w$."]+)(?:\s+AS\s+('[^']*'|[-+]?\d+))?$/i;
const REST = /^\s*(?:(?:AS\s+)?(?!WHERE\b|ORDER\b)([\w$]+))?\s*(?:WHERE\s+([\s\S]*?))?\s*(?:ORDER\s+BY\s+([\s\S]*?))?\s*$/i;

/** Split a select-list item into its expression and alias. */
function splitAlias(item: string): { expression: string; alias?: string } {
  const trimmed = item.trim();
  const match = /^([\s\S]*?[\w$)"'\uE001])\s+(?:AS\s+)?([\w$]+|"[^"]+")$/i.exec(trimmed);
  if (!match || /^(?:END|NULL)$/i.test(match[2]) || /^(?:DISTINCT|ALL)$/i.test(match[1])) {
    return { expression: trimmed };
  }
  return { expression: match[1], alias: match[2] };
}

/** Name a select-list item produces: its alias, or the unqualified column. */
function outputName(item: string): string | undefined {
  const { expression, alias } = splitAlias(item);
  if (alias !== undefined) return alias;
  return /^[\w$."]+$/.test(expression) ? unqualified(expression) : undefined;
}

function sameName(a: string, b: string): boolean {
  return a.replace(/"/g, '').toLowerCase() === b.replace(/"/g, '').toLowerCase();
}

function parseStatement(body: string): PivotStatement | undefined {
  const head = /^(\s*)SELECT\s+/i.exec(body);
  if (!head) return undefined;
  const view = topLevelView(body);
  const from = /\bFROM\b/i.exec(view);
  const keyword = /\b(UN)?PIVOT\b(?:\s+(INCLUDE|EXCLUDE)\s+NULLS)?\s*$/i;
  const pivot = /\b(?:UN)?PIVOT\b/i.exec(view.slice(from?.index ?? 0));
  if (!from || !pivot) return undefined;
  const pivotStart = from.index + pivot.index;
  const open = body.indexOf('(', pivotStart);
  if (open === -1) return undefined;
  const close = findClosingParen(body, open);
  if (close === -1) return undefined;
  const parts = keyword.exec(body.slice(pivotStart, open));
  const rest = REST.exec(body.slice(close + 1));
  if (!parts || !rest) return undefined;

  return {
    lead: head[1],
    selectList: splitTopLevel(body.slice(head[0].length, from.index)),
    source: body.slice(from.index + 4, pivotStart).trim(),
    unpivot: parts[1] !== undefined,
    includeNulls: parts[2]?.toUpperCase() === 'INCLUDE',
    spec: body.slice(open + 1, close),
    ...(rest[1] ? { alias: rest[1] } : {}),
    ...(rest[2] ? { where: rest[2].trim() } : {}),
    ...(rest[3] ? { orderBy: rest[3].trim() } : {}),
  };
}

/**
 * Oracle PIVOT and UNPIVOT. PIVOT becomes conditional aggregation with
 * GROUP BY, UNPIVOT one UNION ALL branch per column.
 */
export class PivotConverter implements FeatureConverter {
  readonly name = 'pivot';

  applies(masked: string, ctx: ConversionContext): boolean {
    return ctx.config.syntax.convertPivot && ctx.target !== 'oracle' && SQL_PATTERNS.PIVOT.test(masked);
  }

  convert(masked: string, ctx: ConversionContext): StepResult {
    const recorder = new StepRecorder();
    const sql = mapSegments(
      masked,
      segment => SQL_PATTERNS.PIVOT.test(segment),
      segment => {
        const { body, terminator } = splitTerminator(segment);
        const statement = parseStatement(body);
        const converted =
          statement === undefined
            ? undefined
            : statement.unpivot
              ? this.unpivot(statement, ctx, recorder)
              : this.pivot(statement, ctx, recorder);
        if (converted === undefined) {
          recorder.warn(
            createWarning(
              'manual-review-needed',
              'PIVOT/UNPIVOT query could not be rewritten automatically',
              'warning',
              'Rewrite PIVOT as SUM(CASE WHEN ...) with GROUP BY, and UNPIVOT as UNION ALL',
            ),
          );
          return segment;
        }
        return converted + terminator;
      },
    );
    return recorder.result(sql);
  }

  private pivot(statement: PivotStatement, ctx: ConversionContext, recorder: StepRecorder): string | undefined {
    const view = topLevelView(statement.spec);
    const forKeyword = /\bFOR\b/i.exec(view);
    if (!forKeyword) return undefined;
    const target = /^\s*([\w$."]+)\s+IN\s*\(([\s\S]*)\)\s*$/i.exec(statement.spec.slice(forKeyword.index + 3));
    if (!target || /^\s*(?:ANY\b|SELECT\b)/i.test(target[2])) return undefined;
    const [, pivotColumn, valueList] = target;

    const aggregates: Aggregate[] = [];
    for (const item of splitTopLevel(statement.spec.slice(0, forKeyword.index))) {
      const match = AGGREGATE.exec(item);
      if (!match) return undefined;
      aggregates.push({
        fn: match[1].toUpperCase(),
        distinct: match[2] !== undefined,
        argument: match[3],
        ...(match[4] ? { alias: match[4] } : {}),
      });
    }

    const columns: PivotColumn[] = [];
    for (const item of splitTopLevel(valueList)) {
      const value = PIVOT_VALUE.exec(item);
      if (!value) return undefined;
      const valueName = value[2] ?? this.valueAlias(value[1], ctx);
      aggregates.forEach((aggregate, i) => {
        const suffix = aggregate.alias ? `_${aggregate.alias}` : aggregates.length > 1 ? `_${i + 1}` : '';
        const then = aggregate.argument === '*' ? '1' : aggregate.argument;
        columns.push({
          name: suffix === '' ? valueName : this.joinName(valueName, suffix),
          expression: `${aggregate.fn}(${aggregate.distinct ? 'DISTINCT ' : ''}CASE WHEN ${pivotColumn} = ${value[1]} THEN ${then} END)`,
        });
      });
    }
    if (columns.length === 0) return undefined;

    const consumed = [unqualified(pivotColumn), ...aggregates.map(aggregate => unqualified(aggregate.argument))];
    const stripAlias = (item: string) =>
      statement.alias ? item.replace(new RegExp(`(?<![\\w$.])${statement.alias}\\.`, 'gi'), '') : item;
    const selectItems: string[] = [];
    const groupBy: string[] = [];
    const star = statement.selectList.length === 1 && statement.selectList[0] === '*';

    if (star) {
      const derived = this.sourceColumns(statement.source);
      if (derived === undefined) {
        recorder.warn(
          createWarning(
            'manual-review-needed',
            'PIVOT over SELECT *: the grouping columns could not be determined',
            'warning',
            'List the non-pivoted columns in the SELECT list and the GROUP BY clause',
          ),
        );
      }
      for (const column of derived ?? []) {
        if (consumed.some(name => sameName(name, column))) continue;
        selectItems.push(column);
        groupBy.push(column);
      }
      selectItems.push(...columns.map(column => `${column.expression} AS ${column.name}`));
    } else {
      for (const raw of statement.selectList) {
        const item = stripAlias(raw);
        const name = outputName(item);
        const pivoted = name === undefined ? undefined : columns.find(column => sameName(column.name, name));
        if (pivoted) {
          selectItems.push(`${pivoted.expression} AS ${name}`);
        } else {
          selectItems.push(item);
          groupBy.push(splitAlias(item).expression);
        }
      }
    }

    const where = statement.where;
    const mentions = (name: string) => new RegExp(`(?<![\\w$])${escapeRegExp(name)}(?![\\w$])`, 'i');
    // A filter on pivoted columns would have to move into HAVING
    if (where !== undefined && columns.some(column => mentions(column.name).test(where))) return undefined;

    recorder.rule('Pivot: PIVOT → CASE WHEN aggregation');
    recorder.warn(
      createWarning('syntax-difference', 'PIVOT rewritten as conditional aggregation', 'info', 'Check the GROUP BY column list'),
    );
    const lines = [`${statement.lead}SELECT ${selectItems.join(',\n  ')}`, `FROM ${statement.source}`];
    if (statement.where !== undefined) lines.push(`WHERE ${stripAlias(statement.where)}`);
    if (groupBy.length > 0) lines.push(`GROUP BY ${groupBy.join(', ')}`);
    if (statement.orderBy !== undefined) lines.push(`ORDER BY ${stripAlias(statement.orderBy)}`);
    return lines.join('\n');
  }

  private unpivot(statement: PivotStatement, ctx: ConversionContext, recorder: StepRecorder): string | undefined {
    const spec = /^\s*([\w$"]+)\s+FOR\s+([\w$"]+)\s+IN\s*\(([\s\S]*)\)\s*$/i.exec(statement.spec);
    if (!spec) return undefined;
    const [, valueColumn, nameColumn, list] = spec;

    const branches: string[] = [];
    const items = splitTopLevel(list);
    const star = statement.selectList.length === 1 && statement.selectList[0] === '*';
    if (star) {
      recorder.warn(
        createWarning(
          'manual-review-needed',
          'UNPIVOT over SELECT *: only the unpivoted value and name columns are selected',
          'warning',
          'Add the remaining columns to the SELECT list',
        ),
      );
    }
    for (const item of items) {
      const match = UNPIVOT_ITEM.exec(item);
      if (!match) return undefined;
      const [, column, label] = match;
      const name = label ?? ctx.mask.addLiteral(unqualified(column).replace(/"/g, ''));
      const selected = star
        ? [`${column} AS ${valueColumn}`, `${name} AS ${nameColumn}`]
        : statement.selectList.map(raw => {
            const item = statement.alias
              ? raw.replace(new RegExp(`(?<![\\w$.])${statement.alias}\\.`, 'gi'), '')
              : raw;
            if (sameName(item, valueColumn)) return `${column} AS ${valueColumn}`;
            if (sameName(item, nameColumn)) return `${name} AS ${nameColumn}`;
            return item;
          });
      const filter = statement.includeNulls ? '' : ` WHERE ${column} IS NOT NULL`;
      branches.push(`SELECT ${selected.join(', ')} FROM ${statement.source}${filter}`);
    }
    if (branches.length === 0) return undefined;

    recorder.rule('Pivot: UNPIVOT → UNION ALL');
    recorder.warn(createWarning('syntax-difference', 'UNPIVOT rewritten as UNION ALL', 'info'));
    const union = branches.join('\nUNION ALL\n');
    if (statement.where === undefined && statement.orderBy === undefined) return statement.lead + union;

    const lines = [`${statement.lead}SELECT * FROM (\n${union}\n) unpivoted`];
    if (statement.where !== undefined) lines.push(`WHERE ${statement.where}`);
    if (statement.orderBy !== undefined) lines.push(`ORDER BY ${statement.orderBy}`);
    return lines.join('\n');
  }

  /** Output column name for a pivot value written without an alias. */
  private valueAlias(value: string, ctx: ConversionContext): string {
    const text = ctx.mask.literalValue(value) ?? value;
    if (/^[A-Za-z_][\w$]*$/.test(text)) return text;
    const quote = ctx.target === 'mysql' ? '`' : '"';
    return `${quote}${text.replace(/["`]/g, '')}${quote}`;
  }

  private joinName(base: string, suffix: string): string {
    const quoted = /^(["`])(.*)\1$/.exec(base);
    return quoted ? `${quoted[1]}${quoted[2]}${suffix}${quoted[1]}` : `${base}${suffix}`;
  }

  /** Columns of a derived-table source, when its select list names them all. */
  private sourceColumns(source: string): string[] | undefined {
    const subquery = /^\(\s*SELECT\s+([\s\S]*)\)\s*(?:AS\s+)?[\w$]*\s*$/i.exec(source);
    if (!subquery) return undefined;
    const inner = subquery[1];
    const from = /\bFROM\b/i.exec(topLevelView(inner));
    if (!from) return undefined;
    const names: string[] = [];
    for (const item of splitTopLevel(inner.slice(0, from.index))) {
      const name = outputName(item);
      if (name === undefined) return undefined;
      names.push(name);
    }
    return names;
  }
}
