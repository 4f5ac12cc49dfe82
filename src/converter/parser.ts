import { Parser } from 'node-sql-parser';
import type { Dialect, Difficulty, StatementComplexity } from '../types/sql';
import { createLogger } from '../utils/logger';
import { AGGREGATE_FUNCTIONS } from './sqlPatterns';

const logger = createLogger('parser');

/** node-sql-parser grammar used for each source dialect. */
const PARSER_DATABASE: Record<Dialect, string> = {
  oracle: 'PostgresQL',
  mysql: 'MySQL',
  postgresql: 'PostgresQL',
};

export interface ParsedStatements {
  ok: true;
  tree: unknown;
  statementCount: number;
  complexity: StatementComplexity;
}

export interface ParseFailure {
  ok: false;
  message: string;
  line?: number;
  column?: number;
  sql: string;
}

export type ParseOutcome = ParsedStatements | ParseFailure;

type Node = Record<string, unknown>;

const isNode = (value: unknown): value is Node =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function errorLocation(error: unknown): { line?: number; column?: number } {
  if (!isNode(error) || !isNode(error.location) || !isNode(error.location.start)) return {};
  const { line, column } = error.location.start;
  return {
    ...(typeof line === 'number' ? { line } : {}),
    ...(typeof column === 'number' ? { column } : {}),
  };
}

function functionName(node: Node): string {
  const name = node.name;
  if (typeof name === 'string') return name;
  // node-sql-parser 5 wraps names as { name: [{ type, value }] }
  if (isNode(name) && Array.isArray(name.name)) {
    return name.name
      .map(part => (isNode(part) && typeof part.value === 'string' ? part.value : ''))
      .join('.');
  }
  return '';
}

export function emptyComplexity(): StatementComplexity {
  return { joins: 0, subqueries: 0, functions: 0, aggregates: 0, windows: 0, ctes: 0 };
}

/** Count joins, subqueries, functions, aggregates, windows and CTEs in a statement tree. */
export function measureComplexity(tree: unknown): StatementComplexity {
  const metrics = emptyComplexity();
  const aggregates = new Set(AGGREGATE_FUNCTIONS);

  const walk = (value: unknown, depth: number): void => {
    if (Array.isArray(value)) {
      value.forEach(item => walk(item, depth));
      return;
    }
    if (!isNode(value)) return;

    if (typeof value.join === 'string') metrics.joins++;
    if (value.type === 'select' && depth > 0) metrics.subqueries++;
    if (value.type === 'function') {
      metrics.functions++;
      if (aggregates.has(functionName(value).toUpperCase())) metrics.aggregates++;
    }
    if (value.type === 'aggr_func') metrics.aggregates++;
    if (isNode(value.over)) metrics.windows++;
    if (Array.isArray(value.with)) metrics.ctes += value.with.length;

    for (const [key, child] of Object.entries(value)) {
      if (child !== null && typeof child === 'object') {
        const nested = key === 'ast' || (isNode(child) && child.type === 'select');
        walk(child, nested ? depth + 1 : depth);
      }
    }
  };

  walk(tree, 0);
  return metrics;
}

export function classifyDifficulty(metrics: StatementComplexity): Difficulty {
  const score =
    metrics.joins * 2 +
    metrics.subqueries * 3 +
    metrics.functions +
    metrics.aggregates +
    metrics.windows * 2 +
    metrics.ctes * 2;
  if (score < 5) return 'simple';
  if (score < 15) return 'moderate';
  return 'complex';
}

/**
 * Structural parser adapter. Wraps node-sql-parser and turns its exceptions
 * into `ParseFailure` values.
 */
export class SQLParser {
  private parser: Parser;

  constructor() {
    this.parser = new Parser();
  }

  parse(sql: string, dialect: Dialect): ParseOutcome {
    try {
      const tree = this.parser.astify(sql, { database: PARSER_DATABASE[dialect] });
      const statementCount = Array.isArray(tree) ? tree.length : 1;
      return { ok: true, tree, statementCount, complexity: measureComplexity(tree) };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.debug(`Structural parse failed: ${message}`);
      return { ok: false, message, sql, ...errorLocation(error) };
    }
  }
}
