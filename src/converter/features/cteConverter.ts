import type { StepResult } from '../../types/sql';
import { escapeRegExp, findClosingParen, mapSegments } from '../../utils/sqlText';
import { StepRecorder, type ConversionContext, type FeatureConverter } from '../context';
import { SQL_PATTERNS } from '../sqlPatterns';
import { createWarning } from '../warnings';

const CTE_HEAD = /^\s*([\w$]+|"[^"]+"|`[^`]+`)\s*(\([^()]*\))?\s*AS\s*(?:(?:NOT\s+)?MATERIALIZED\s+)?\(/i;
const SEARCH_CLAUSE = /^\s*SEARCH\s+(?:DEPTH|BREADTH)\s+FIRST\s+BY\s+[\s\S]+?\s+SET\s+[\w$"]+/i;
const CYCLE_CLAUSE =
  /^\s*CYCLE\s+[\w$.,\s"]+?\s+SET\s+[\w$"]+(?:\s+TO\s+\S+\s+DEFAULT\s+\S+)?(?:\s+USING\s+[\w$"]+)?/i;

interface CteDefinition {
  name: string;
  columns?: string;
  body: string;
  /** Offsets of any SEARCH / CYCLE clause text after the body. */
  clauses: Array<{ start: number; end: number }>;
}

interface WithClause {
  keywordStart: number;
  /** Just past `WITH`, or past `RECURSIVE` when present. */
  keywordEnd: number;
  recursive: boolean;
  ctes: CteDefinition[];
}

function parseWith(sql: string): WithClause | undefined {
  const head =
    /(?:^|[\s(;])(WITH)(\s+RECURSIVE)?\s+(?=(?:[\w$]+|"[^"]+"|`[^`]+`)\s*(?:\([^()]*\)\s*)?AS\s*(?:(?:NOT\s+)?MATERIALIZED\s+)?\()/i.exec(
      sql,
    );
  if (!head) return undefined;
  const keywordStart = head.index + head[0].indexOf(head[1]);
  const keywordEnd = keywordStart + head[1].length + (head[2]?.length ?? 0);
  const ctes: CteDefinition[] = [];

  let cursor = head.index + head[0].length;
  for (;;) {
    const cte = CTE_HEAD.exec(sql.slice(cursor));
    if (!cte) break;
    const open = cursor + cte[0].length - 1;
    const close = findClosingParen(sql, open);
    if (close === -1) return undefined;
    const definition: CteDefinition = {
      name: cte[1],
      ...(cte[2] ? { columns: cte[2] } : {}),
      body: sql.slice(open + 1, close),
      clauses: [],
    };
    cursor = close + 1;
    for (const clause of [SEARCH_CLAUSE, CYCLE_CLAUSE]) {
      const match = clause.exec(sql.slice(cursor));
      if (!match) continue;
      definition.clauses.push({ start: cursor, end: cursor + match[0].length });
      cursor += match[0].length;
    }
    ctes.push(definition);
    const comma = /^\s*,/.exec(sql.slice(cursor));
    if (!comma) break;
    cursor += comma[0].length;
  }
  if (ctes.length === 0) return undefined;
  return { keywordStart, keywordEnd, recursive: head[2] !== undefined, ctes };
}

function selfReferencing(cte: CteDefinition): boolean {
  const name = cte.name.replace(/^["`]|["`]$/g, '');
  return new RegExp(`(?<![\\w$.])["\`]?${escapeRegExp(name)}["\`]?(?![\\w$])`, 'i').test(cte.body);
}

/** Common table expressions: the RECURSIVE keyword and SEARCH / CYCLE clauses. */
export class CteConverter implements FeatureConverter {
  readonly name = 'cte';

  applies(masked: string): boolean {
    return SQL_PATTERNS.WITH_CLAUSE.test(masked);
  }

  convert(masked: string, ctx: ConversionContext): StepResult {
    const recorder = new StepRecorder();
    const sql = mapSegments(
      masked,
      segment => SQL_PATTERNS.WITH_CLAUSE.test(segment),
      segment => this.convertStatement(segment, ctx, recorder),
    );
    if (ctx.target === 'mysql' && ctx.source !== 'mysql') {
      recorder.warn(
        createWarning('syntax-difference', 'Common table expressions require MySQL 8.0 or later', 'info'),
      );
    }
    return recorder.result(sql);
  }

  private convertStatement(segment: string, ctx: ConversionContext, recorder: StepRecorder): string {
    const clause = parseWith(segment);
    if (!clause) return segment;
    const recursive = clause.ctes.filter(selfReferencing);
    let out = segment;

    // Edits run back to front so earlier offsets stay valid
    if (ctx.target === 'mysql') {
      const clauses = clause.ctes.flatMap(cte => cte.clauses).sort((a, b) => b.start - a.start);
      for (const { start, end } of clauses) {
        const text = out.slice(start, end);
        out = `${out.slice(0, start)} ${ctx.mask.comment(text.trim())}${out.slice(end)}`;
        recorder.rule('CTE: SEARCH/CYCLE clause commented out');
        recorder.warn(
          createWarning(
            'partial-support',
            `MySQL has no ${/^\s*SEARCH/i.test(text) ? 'SEARCH' : 'CYCLE'} clause for recursive CTEs; it was commented out`,
            'warning',
            'Order by a path column, or stop recursion with a depth limit in the recursive member',
          ),
        );
      }
    }

    if (ctx.target === 'oracle') {
      if (clause.recursive) {
        out = `${out.slice(0, clause.keywordStart)}WITH${out.slice(clause.keywordEnd)}`;
        recorder.rule('CTE: RECURSIVE removed');
      }
      for (const cte of recursive) {
        if (cte.columns === undefined) {
          recorder.warn(
            createWarning(
              'manual-review-needed',
              `Recursive WITH clause ${cte.name} needs a column alias list in Oracle`,
              'warning',
              `Write it as ${cte.name} (col1, col2, ...) AS (...)`,
            ),
          );
        }
      }
      return out;
    }

    if (!clause.recursive && recursive.length > 0) {
      out = `${out.slice(0, clause.keywordEnd)} RECURSIVE${out.slice(clause.keywordEnd)}`;
      recorder.rule('CTE: RECURSIVE added');
    }
    return out;
  }
}
