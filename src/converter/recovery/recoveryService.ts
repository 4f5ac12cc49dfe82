import type { ConversionWarning, RecoveryAttempt, RecoverySummary } from '../../types/sql';
import { createLogger } from '../../utils/logger';
import { maskSql, splitSegments } from '../../utils/sqlText';
import type { ParseFailure, ParsedStatements, SQLParser } from '../parser';
import { createWarning } from '../warnings';
import { RECOVERY_STRATEGIES, type RecoveryContext, type RecoveryStrategy } from './strategies';

export type { RecoveryContext, RecoveryStrategy } from './strategies';

const logger = createLogger('recovery');

export type RecoveryMode = RecoverySummary['mode'];

export interface RecoveredOutcome {
  state: 'recovered';
  /** Text with every successful repair applied. */
  sql: string;
  parsed: ParsedStatements;
  attempts: RecoveryAttempt[];
  warnings: ConversionWarning[];
  summary: RecoverySummary;
}

export interface UnrecoveredOutcome {
  state: 'unrecovered';
  /** The input, unchanged: repairs are discarded when the retry fails. */
  sql: string;
  failure: ParseFailure;
  attempts: RecoveryAttempt[];
  warnings: ConversionWarning[];
  summary: RecoverySummary;
}

export type RecoveryOutcome = RecoveredOutcome | UnrecoveredOutcome;

/** Count of non-blank statements in `sql`. */
export function statementCount(sql: string, ctx: Pick<RecoveryContext, 'source'>): number {
  const masked = maskSql(sql, { backslashEscapes: ctx.source === 'mysql' }).text;
  return splitSegments(masked).filter(segment => segment.replace(/;/g, '').trim().length > 0).length;
}

/**
 * Ordered fallback for SQL the structural parser rejected.
 *
 * Repairs accumulate: each applicable strategy works on the text the previous
 * one produced. Single-statement input is re-parsed after every repair and
 * stops at the first success. Multi-statement input, where the failing
 * statement cannot be pinned down, runs every applicable strategy and is
 * re-parsed once at the end.
 */
export class RecoveryService {
  private readonly parser: SQLParser;
  private readonly strategies: readonly RecoveryStrategy[];

  constructor(parser: SQLParser, strategies: readonly RecoveryStrategy[] = RECOVERY_STRATEGIES) {
    this.parser = parser;
    this.strategies = strategies;
  }

  modeFor(sql: string, ctx: RecoveryContext): RecoveryMode {
    return statementCount(sql, ctx) > 1 ? 'sequential' : 'single-shot';
  }

  /** Apply every applicable strategy in turn, without parsing. */
  attempt(sql: string, failure: ParseFailure, ctx: RecoveryContext): RecoveryAttempt[] {
    const attempts: RecoveryAttempt[] = [];
    let current = sql;
    for (const strategy of this.strategies) {
      const result = this.applyStrategy(strategy, current, failure, ctx);
      if (!result) continue;
      attempts.push(result);
      current = result.recoveredSql;
    }
    return attempts;
  }

  recover(sql: string, failure: ParseFailure, ctx: RecoveryContext): RecoveryOutcome {
    const mode = this.modeFor(sql, ctx);

    if (mode === 'sequential') {
      const attempts = this.attempt(sql, failure, ctx);
      const last = attempts[attempts.length - 1];
      if (last !== undefined) {
        const retry = this.parser.parse(last.recoveredSql, ctx.source);
        if (retry.ok) return this.recovered(last.recoveredSql, retry, attempts, mode);
      }
      return this.unrecovered(sql, failure, attempts, mode);
    }

    const attempts: RecoveryAttempt[] = [];
    let current = sql;
    for (const strategy of this.strategies) {
      const result = this.applyStrategy(strategy, current, failure, ctx);
      if (!result) continue;
      attempts.push(result);
      current = result.recoveredSql;
      const retry = this.parser.parse(current, ctx.source);
      if (retry.ok) return this.recovered(current, retry, attempts, mode);
    }
    return this.unrecovered(sql, failure, attempts, mode);
  }

  private applyStrategy(
    strategy: RecoveryStrategy,
    sql: string,
    failure: ParseFailure,
    ctx: RecoveryContext,
  ): RecoveryAttempt | undefined {
    if (!strategy.canHandle(sql, failure, ctx)) return undefined;
    const result = strategy.recover(sql, failure, ctx);
    logger.debug(`${strategy.name}: ${result.success ? 'changed' : 'no change'}`);
    return result.success ? result : undefined;
  }

  private recovered(sql: string, parsed: ParsedStatements, attempts: RecoveryAttempt[], mode: RecoveryMode): RecoveredOutcome {
    const strategies = attempts.map(item => item.strategy);
    const confidence = attempts.reduce((lowest, item) => Math.min(lowest, item.confidence), 1);
    logger.debug(`Recovered with ${strategies.join(', ')}`);
    return {
      state: 'recovered',
      sql,
      parsed,
      attempts,
      warnings: attempts.flatMap(item => (item.warning ? [item.warning] : [])),
      summary: { state: 'recovered', mode, strategies, confidence },
    };
  }

  private unrecovered(
    sql: string,
    failure: ParseFailure,
    attempts: RecoveryAttempt[],
    mode: RecoveryMode,
  ): UnrecoveredOutcome {
    logger.warn(`Recovery failed after ${attempts.length} strategies: ${failure.message}`);
    const where = failure.line !== undefined ? ` at line ${failure.line}` : '';
    const location =
      failure.line !== undefined
        ? { line: failure.line, ...(failure.column !== undefined ? { column: failure.column } : {}) }
        : undefined;
    return {
      state: 'unrecovered',
      sql,
      failure,
      attempts,
      warnings: [
        createWarning(
          'manual-review-needed',
          `SQL could not be parsed${where}; converted with text rules only`,
          'error',
          'Review the converted statement by hand',
          location,
        ),
      ],
      summary: { state: 'unrecovered', mode, strategies: attempts.map(item => item.strategy), confidence: 0 },
    };
  }
}
