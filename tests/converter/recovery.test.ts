import { describe, expect, it } from 'vitest';
import { DEFAULT_RULE_CONFIG } from '../../src/config/ruleConfig';
import { SQLParser, type ParseFailure, type ParseOutcome } from '../../src/converter/parser';
import { RecoveryService, statementCount, type RecoveryContext } from '../../src/converter/recovery/recoveryService';
import {
  commentRemovalStrategy,
  hierarchicalRewriteStrategy,
  hintRemovalStrategy,
  parenthesisBalanceStrategy,
  physicalAttributeStrategy,
  reservedWordQuotingStrategy,
  stringEscapeStrategy,
} from '../../src/converter/recovery/strategies';
import type { Dialect } from '../../src/types/sql';

const context = (source: Dialect, target: Dialect = 'postgresql'): RecoveryContext => ({
  source,
  target,
  config: DEFAULT_RULE_CONFIG,
});

const failure = (sql: string, message = 'Syntax error'): ParseFailure => ({ ok: false, message, sql });

class FailingParser extends SQLParser {
  override parse(sql: string): ParseOutcome {
    return { ok: false, message: 'Expected end of input', line: 2, column: 5, sql };
  }
}

describe('recovery strategies', () => {
  it('removes physical attributes', () => {
    const sql = 'CREATE TABLE t (id INT) TABLESPACE users';
    const ctx = context('oracle');
    expect(physicalAttributeStrategy.canHandle(sql, failure(sql), ctx)).toBe(true);
    const result = physicalAttributeStrategy.recover(sql, failure(sql), ctx);
    expect(result.recoveredSql).toBe('CREATE TABLE t (id INT)');
    expect(result.success).toBe(true);
    expect(result.confidence).toBe(0.95);
  });

  it('removes comments but keeps line breaks', () => {
    const sql = 'SELECT 1 -- note\nFROM t';
    const result = commentRemovalStrategy.recover(sql, failure(sql), context('oracle'));
    expect(result.recoveredSql).toBe('SELECT 1\nFROM t');
  });

  it('removes optimizer hints', () => {
    const sql = 'SELECT /*+ FULL(t) */ a FROM t';
    const ctx = context('oracle');
    expect(hintRemovalStrategy.canHandle(sql, failure(sql), ctx)).toBe(true);
    expect(hintRemovalStrategy.recover(sql, failure(sql), ctx).recoveredSql).toBe('SELECT a FROM t');
  });

  it('closes open parentheses before the terminator', () => {
    const sql = 'SELECT (1;';
    expect(parenthesisBalanceStrategy.recover(sql, failure(sql), context('oracle')).recoveredSql).toBe('SELECT (1);');
  });

  it('opens parentheses that are closed too often', () => {
    const sql = 'SELECT 1)';
    expect(parenthesisBalanceStrategy.recover(sql, failure(sql), context('oracle')).recoveredSql).toBe('(SELECT 1)');
  });

  it('closes an unterminated string', () => {
    const sql = "SELECT 'abc";
    const ctx = context('oracle');
    expect(stringEscapeStrategy.canHandle(sql, failure(sql), ctx)).toBe(true);
    expect(stringEscapeStrategy.recover(sql, failure(sql), ctx).recoveredSql).toBe("SELECT 'abc'");
  });

  it('reports no change when the string is already closed', () => {
    const sql = "SELECT 'abc'";
    const result = stringEscapeStrategy.recover(sql, failure(sql, 'unterminated string'), context('oracle'));
    expect(result.success).toBe(false);
  });

  it('quotes reserved words with the source quote character', () => {
    const sql = 'SELECT t.order FROM t';
    expect(reservedWordQuotingStrategy.recover(sql, failure(sql), context('oracle')).recoveredSql).toBe(
      'SELECT t."order" FROM t',
    );
    expect(reservedWordQuotingStrategy.recover(sql, failure(sql), context('mysql')).recoveredSql).toBe(
      'SELECT t.`order` FROM t',
    );
  });

  it('quotes a reserved word used as a column definition', () => {
    const sql = 'CREATE TABLE t (id INT, date DATE)';
    expect(reservedWordQuotingStrategy.recover(sql, failure(sql), context('oracle')).recoveredSql).toBe(
      'CREATE TABLE t (id INT, "date" DATE)',
    );
  });

  it('only rewrites hierarchical queries leaving Oracle', () => {
    const sql = 'SELECT id FROM t CONNECT BY PRIOR id = parent_id';
    expect(hierarchicalRewriteStrategy.canHandle(sql, failure(sql), context('oracle', 'postgresql'))).toBe(true);
    expect(hierarchicalRewriteStrategy.canHandle(sql, failure(sql), context('oracle', 'oracle'))).toBe(false);
  });
});

describe('RecoveryService', () => {
  it('counts statements outside literals', () => {
    expect(statementCount("SELECT ';' FROM t; SELECT 2;", context('oracle'))).toBe(2);
  });

  it('repairs a missing parenthesis and reparses', () => {
    const service = new RecoveryService(new SQLParser());
    const sql = 'SELECT * FROM t WHERE id IN (1,2,3';
    const outcome = service.recover(sql, failure(sql), context('mysql'));
    expect(outcome.state).toBe('recovered');
    expect(outcome.sql).toBe('SELECT * FROM t WHERE id IN (1,2,3)');
    expect(outcome.summary).toEqual({
      state: 'recovered',
      mode: 'single-shot',
      strategies: ['parenthesis balance repair'],
      confidence: 0.7,
    });
    expect(outcome.warnings.map(w => w.message)).toEqual(['Unbalanced parentheses were closed automatically']);
  });

  it('runs every applicable strategy on multi-statement input', () => {
    const service = new RecoveryService(new SQLParser());
    const sql = 'SELECT /*+ FULL(t) */ a FROM t; SELECT (1;';
    const ctx = context('oracle');
    expect(service.modeFor(sql, ctx)).toBe('sequential');
    const attempts = service.attempt(sql, failure(sql), ctx);
    expect(attempts.map(item => item.strategy)).toEqual(['hint removal', 'parenthesis balance repair']);
    expect(attempts[1]?.recoveredSql).toBe('SELECT a FROM t; SELECT (1);');
  });

  it('keeps repairing after a repair that does not parse', () => {
    const service = new RecoveryService(new SQLParser());
    const sql = '-- pick rows\nSELECT * FROM t WHERE id IN (1,2,3';
    const outcome = service.recover(sql, failure(sql), context('mysql'));
    expect(outcome.state).toBe('recovered');
    expect(outcome.sql).toBe('SELECT * FROM t WHERE id IN (1,2,3)');
    expect(outcome.summary).toEqual({
      state: 'recovered',
      mode: 'single-shot',
      strategies: ['comment removal', 'parenthesis balance repair'],
      confidence: 0.7,
    });
  });

  it('repairs an unbalanced statement carrying a block comment', () => {
    const service = new RecoveryService(new SQLParser());
    const sql = 'SELECT /* note */ * FROM t WHERE id IN (1,2,3';
    const outcome = service.recover(sql, failure(sql), context('mysql'));
    expect(outcome.state).toBe('recovered');
    expect(outcome.sql).toBe('SELECT * FROM t WHERE id IN (1,2,3)');
    expect(outcome.summary.strategies).toEqual(['comment removal', 'parenthesis balance repair']);
  });

  it('keeps the input and reports an error when the retry fails', () => {
    const service = new RecoveryService(new FailingParser());
    const sql = 'SELECT (1';
    const outcome = service.recover(sql, { ...failure(sql), line: 2, column: 5 }, context('oracle'));
    expect(outcome.state).toBe('unrecovered');
    expect(outcome.sql).toBe(sql);
    expect(outcome.summary.confidence).toBe(0);
    expect(outcome.summary.strategies).toEqual(['parenthesis balance repair']);
    expect(outcome.warnings).toEqual([
      {
        kind: 'manual-review-needed',
        message: 'SQL could not be parsed at line 2; converted with text rules only',
        severity: 'error',
        suggestion: 'Review the converted statement by hand',
        location: { line: 2, column: 5 },
      },
    ]);
  });

  it('does not retry when no strategy applies', () => {
    const service = new RecoveryService(new FailingParser());
    const outcome = service.recover('SELECT 1', failure('SELECT 1'), context('oracle'));
    expect(outcome.state).toBe('unrecovered');
    expect(outcome.attempts).toEqual([]);
    expect(outcome.warnings[0]?.message).toBe('SQL could not be parsed; converted with text rules only');
  });
});
