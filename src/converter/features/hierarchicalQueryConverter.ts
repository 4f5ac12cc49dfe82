import type { StepResult } from '../../types/sql';
import { mapSegments, rewriteFunctionCalls, splitTerminator, topLevelView, unqualified } from '../../utils/sqlText';
import { StepRecorder, type ConversionContext, type FeatureConverter } from '../context';
import { IDENTIFIER } from '../sqlPatterns';
import { createWarning } from '../warnings';

const CTE_NAME = 'hierarchy_cte';

type ClauseName = 'from' | 'where' | 'start' | 'connect' | 'group' | 'having' | 'order';

const CLAUSES: ReadonlyArray<[ClauseName, RegExp]> = [
  ['from', /\bFROM\b/i],
  ['where', /\bWHERE\b/i],
  ['start', /\bSTART\s+WITH\b/i],
  ['connect', /\bCONNECT\s+BY\b/i],
  ['group', /\bGROUP\s+BY\b/i],
  ['having', /\bHAVING\b/i],
  ['order', /\bORDER\s+(?:SIBLINGS\s+)?BY\b/i],
];

interface HierarchicalQuery {
  lead: string;
  selectList: string;
  table: string;
  alias?: string;
  clauses: Partial<Record<ClauseName, string>>;
  siblings: boolean;
}

interface ParentLink {
  parentColumn: string;
  childColumn: string;
}

const FROM_ITEM = new RegExp(`^\\s*(${IDENTIFIER})(?:\\s+(?:AS\\s+)?([\\w$]+))?\\s*$`, 'i');
const PRIOR_LEFT = new RegExp(`^\\s*PRIOR\\s+(${IDENTIFIER})\\s*=\\s*(${IDENTIFIER})\\s*$`, 'i');
const PRIOR_RIGHT = new RegExp(`^\\s*(${IDENTIFIER})\\s*=\\s*PRIOR\\s+(${IDENTIFIER})\\s*$`, 'i');
const LEVEL_LIMIT = /^\s*(?:LEVEL|ROWNUM)\s*(<=?)\s*([\w$:.]+)\s*$/i;

function splitClauses(body: string): HierarchicalQuery | undefined {
  const head = /^(\s*)SELECT\b/i.exec(body);
  if (!head) return undefined;
  const view = topLevelView(body);
  if (/\b(?:UNION|INTERSECT|MINUS|EXCEPT)\b/i.test(view)) return undefined;

  const found: Array<{ name: ClauseName; start: number; end: number }> = [];
  for (const [name, pattern] of CLAUSES) {
    const global = new RegExp(pattern.source, 'gi');
    const matches = [...view.matchAll(global)];
    if (matches.length > 1) return undefined;
    const match = matches[0];
    if (match?.index !== undefined) found.push({ name, start: match.index, end: match.index + match[0].length });
  }
  found.sort((a, b) => a.start - b.start);
  if (found[0]?.name !== 'from') return undefined;

  const clauses: Partial<Record<ClauseName, string>> = {};
  found.forEach((clause, i) => {
    const next = found[i + 1];
    clauses[clause.name] = body.slice(clause.end, next ? next.start : body.length).trim();
  });

  const from = FROM_ITEM.exec(clauses.from ?? '');
  if (!from) return undefined;
  const alias = from[2];
  if (alias && /^(?:WHERE|START|CONNECT)$/i.test(alias)) return undefined;

  return {
    lead: head[1],
    selectList: body.slice(head[0].length, found[0].start).trim(),
    table: from[1],
    ...(alias ? { alias } : {}),
    clauses,
    siblings: /\bORDER\s+SIBLINGS\s+BY\b/i.test(view),
  };
}

function parentLink(condition: string): ParentLink | undefined {
  const left = PRIOR_LEFT.exec(condition);
  if (left) return { parentColumn: unqualified(left[1]), childColumn: unqualified(left[2]) };
  const right = PRIOR_RIGHT.exec(condition);
  if (right) return { parentColumn: unqualified(right[2]), childColumn: unqualified(right[1]) };
  return undefined;
}

/**
 * Oracle CONNECT BY queries rewritten as recursive CTEs. Handles a single
 * table with one PRIOR equality, LEVEL, SYS_CONNECT_BY_PATH, CONNECT_BY_ROOT,
 * CONNECT_BY_ISLEAF and the `CONNECT BY LEVEL <= n` row generator.
 */
export class HierarchicalQueryConverter implements FeatureConverter {
  readonly name = 'hierarchical query';

  applies(masked: string, ctx: ConversionContext): boolean {
    return (
      ctx.config.syntax.convertHierarchicalQuery &&
      ctx.source === 'oracle' &&
      ctx.target !== 'oracle' &&
      /\bCONNECT\s+BY\b/i.test(masked)
    );
  }

  convert(masked: string, ctx: ConversionContext): StepResult {
    const recorder = new StepRecorder();
    const sql = mapSegments(
      masked,
      segment => /\bCONNECT\s+BY\b/i.test(segment),
      segment => this.convertStatement(segment, ctx, recorder),
    );
    return recorder.result(sql);
  }

  private convertStatement(segment: string, ctx: ConversionContext, recorder: StepRecorder): string {
    const { body, terminator } = splitTerminator(segment);
    const query = splitClauses(body);
    const connect = query?.clauses.connect;
    if (!query || connect === undefined) return this.fallback(segment, ctx, recorder);

    const generator = LEVEL_LIMIT.exec(connect);
    if (generator) {
      if (!/^DUAL$/i.test(unqualified(query.table)) || query.clauses.start !== undefined) {
        return this.fallback(segment, ctx, recorder);
      }
      recorder.rule('Hierarchical: CONNECT BY LEVEL → recursive row generator');
      const [, operator, limit] = generator;
      const outer = this.outerQuery(query, query.alias, CTE_NAME);
      return (
        `${query.lead}WITH RECURSIVE ${CTE_NAME} AS (\n` +
        '  SELECT 1 AS level\n' +
        '  UNION ALL\n' +
        `  SELECT level + 1 FROM ${CTE_NAME} WHERE level + 1 ${operator} ${limit}\n` +
        `)\n${outer}${terminator}`
      );
    }

    const nocycle = /^\s*NOCYCLE\s+/i.exec(connect);
    const link = parentLink(nocycle ? connect.slice(nocycle[0].length) : connect);
    if (!link) return this.fallback(segment, ctx, recorder);
    if (nocycle) {
      recorder.warn(
        createWarning(
          'partial-support',
          'CONNECT BY NOCYCLE dropped; the recursive query does not stop on cycles',
          'warning',
          ctx.target === 'postgresql'
            ? `Add CYCLE ${link.parentColumn} SET is_cycle USING cycle_path to the CTE (PostgreSQL 14+)`
            : 'Track visited keys in a path column and stop when a key repeats',
        ),
      );
    }
    if (query.siblings) {
      recorder.warn(
        createWarning(
          'partial-support',
          'ORDER SIBLINGS BY became ORDER BY; rows are no longer grouped under their parents',
          'warning',
          'Order by a materialized path column to keep the tree order',
        ),
      );
    }

    recorder.rule('Hierarchical: CONNECT BY → WITH RECURSIVE');
    const source = query.alias ?? query.table;
    const anchorColumns = [`${source}.*`, '1 AS level'];
    const recursiveColumns = ['child.*', 'parent.level + 1'];
    const mysql = ctx.target === 'mysql';

    // Pseudo-columns become extra CTE columns read by the outer query
    const paths: string[] = [];
    let selectList = rewriteFunctionCalls(query.selectList, ['SYS_CONNECT_BY_PATH'], call => {
      const [column, separator] = call.args;
      if (column === undefined || separator === undefined) return undefined;
      const name = paths.length === 0 ? 'path' : `path_${paths.length + 1}`;
      paths.push(name);
      const childColumn = `child.${unqualified(column)}`;
      anchorColumns.push(
        mysql
          ? `CAST(CONCAT(${separator}, ${column}) AS CHAR(4000)) AS ${name}`
          : `CAST(${separator} || ${column} AS TEXT) AS ${name}`,
      );
      recursiveColumns.push(
        mysql ? `CONCAT(parent.${name}, ${separator}, ${childColumn})` : `parent.${name} || ${separator} || ${childColumn}`,
      );
      return name;
    });
    if (paths.length > 0) recorder.rule('Hierarchical: SYS_CONNECT_BY_PATH → path column');

    selectList = selectList.replace(/\bCONNECT_BY_ROOT\s+([\w$."]+)/gi, (_match, column: string) => {
      const name = `root_${unqualified(column).replace(/"/g, '')}`;
      if (!anchorColumns.includes(`${column} AS ${name}`)) {
        anchorColumns.push(`${column} AS ${name}`);
        recursiveColumns.push(`parent.${name}`);
      }
      recorder.rule('Hierarchical: CONNECT_BY_ROOT → root column');
      return name;
    });

    const outerAlias = query.alias ?? CTE_NAME;
    selectList = selectList.replace(/\bCONNECT_BY_ISLEAF\b/gi, () => {
      recorder.rule('Hierarchical: CONNECT_BY_ISLEAF → NOT EXISTS');
      return (
        `CASE WHEN NOT EXISTS (SELECT 1 FROM ${query.table} leaf ` +
        `WHERE leaf.${link.childColumn} = ${outerAlias}.${link.parentColumn}) THEN 1 ELSE 0 END`
      );
    });

    const start = query.clauses.start;
    const cte = [
      `WITH RECURSIVE ${CTE_NAME} AS (`,
      `  SELECT ${anchorColumns.join(', ')}`,
      `  FROM ${query.table}${query.alias ? ` ${query.alias}` : ''}`,
      ...(start !== undefined ? [`  WHERE ${start}`] : []),
      '  UNION ALL',
      `  SELECT ${recursiveColumns.join(', ')}`,
      `  FROM ${query.table} child`,
      `  JOIN ${CTE_NAME} parent ON child.${link.childColumn} = parent.${link.parentColumn}`,
      ')',
    ].join('\n');
    const outer = this.outerQuery({ ...query, selectList }, query.alias, CTE_NAME);
    return `${query.lead}${cte}\n${outer}${terminator}`;
  }

  private outerQuery(query: HierarchicalQuery, alias: string | undefined, from: string): string {
    const level = (text: string) => text.replace(/\bLEVEL\b/gi, 'level');
    const lines = [`SELECT ${level(query.selectList)}`, `FROM ${from}${alias ? ` ${alias}` : ''}`];
    const { where, group, having, order } = query.clauses;
    if (where !== undefined) lines.push(`WHERE ${level(where)}`);
    if (group !== undefined) lines.push(`GROUP BY ${level(group)}`);
    if (having !== undefined) lines.push(`HAVING ${level(having)}`);
    if (order !== undefined) lines.push(`ORDER BY ${level(order)}`);
    return lines.join('\n');
  }

  private fallback(segment: string, ctx: ConversionContext, recorder: StepRecorder): string {
    recorder.warn(
      createWarning(
        'manual-review-needed',
        'CONNECT BY query could not be rewritten automatically',
        'warning',
        'Rewrite as WITH RECURSIVE: an anchor SELECT for the START WITH rows joined back to the CTE on the PRIOR columns',
      ),
    );
    const lead = /^\s*/.exec(segment)?.[0] ?? '';
    recorder.rule('Hierarchical: manual rewrite guide added');
    return `${lead}--${ctx.mask.addText(' Manual rewrite needed: CONNECT BY to WITH RECURSIVE')}\n${segment.slice(lead.length)}`;
  }
}
