import { describe, expect, it } from 'vitest';
import { resolveRuleConfig } from '../../src/config/ruleConfig';
import { emptyComplexity } from '../../src/converter/parser';
import { validate, validationInfo, type ValidationOptions } from '../../src/converter/validation';
import { createWarning, filterWarnings } from '../../src/converter/warnings';

const messages = (sql: string, converted = sql, options: ValidationOptions = {}) => validate(sql, converted, options).map(w => w.message);

describe('validate', () => {
  it('reports unbalanced parentheses as an error', () => {
    const issues = validate('SELECT a FROM t', 'SELECT (a FROM t');
    expect(issues).toEqual([
      {
        kind: 'manual-review-needed',
        message: 'Unbalanced parentheses in converted SQL: 1 opening, 0 closing',
        severity: 'error',
      },
    ]);
  });

  it('reports an unterminated string literal', () => {
    expect(messages('SELECT 1', "SELECT 'a")).toEqual(['Unterminated string literal in converted SQL']);
  });

  it('reports a dropped WHERE clause', () => {
    expect(messages('SELECT a FROM t WHERE b = 1', 'SELECT a FROM t')).toEqual([
      'WHERE was present in the input but is missing from the output',
    ]);
  });

  it('reports function calls that disappeared', () => {
    expect(messages('SELECT UPPER(a), LOWER(b), TRIM(c) FROM t', 'SELECT a, b, c FROM t')).toEqual([
      'Function calls dropped from 3 to 0 during conversion',
    ]);
  });

  it('counts CASE expressions as calls', () => {
    const converted = 'SELECT CASE WHEN a IS NOT NULL THEN 1 ELSE 0 END, CASE b WHEN 1 THEN 2 END FROM t';
    expect(messages('SELECT NVL2(a, 1, 0), DECODE(b, 1, 2) FROM t', converted)).toEqual([]);
  });

  it('flags an IN list over the configured size', () => {
    const config = resolveRuleConfig({ warnings: { maxInClauseSize: 3 } });
    expect(messages('SELECT a FROM t WHERE id IN (1, 2, 3, 4)', undefined, { config })).toEqual([
      'IN list with 4 values exceeds 3',
    ]);
  });

  it('ignores IN subqueries', () => {
    const config = resolveRuleConfig({ warnings: { maxInClauseSize: 1 } });
    expect(messages('SELECT a FROM t WHERE id IN (SELECT id FROM u)', undefined, { config })).toEqual([]);
  });

  it('notes SELECT * unless switched off', () => {
    expect(messages('SELECT * FROM t')).toEqual(['SELECT * returns every column']);
    const config = resolveRuleConfig({ warnings: { warnOnSelectStar: false } });
    expect(messages('SELECT * FROM t', undefined, { config })).toEqual([]);
  });

  it('notes a leading wildcard LIKE', () => {
    expect(messages("SELECT a FROM t WHERE name LIKE '%x'")).toEqual([
      'LIKE pattern with a leading wildcard cannot use an index',
    ]);
  });

  it('notes a function applied to a filtered column', () => {
    expect(messages('SELECT a FROM t WHERE UPPER(name) = 1')).toEqual([
      'UPPER() on column name in WHERE prevents index use',
    ]);
  });

  it('notes deeply nested subqueries', () => {
    const sql = 'SELECT a FROM (SELECT a FROM (SELECT a FROM (SELECT a FROM (SELECT a FROM t) x) y) z) w';
    expect(messages(sql)).toEqual(['Subqueries nested 4 levels deep']);
  });

  it('reports Oracle constructs left in non-Oracle output', () => {
    expect(messages('SELECT NVL(a, 0) FROM t', undefined, { target: 'postgresql' })).toEqual([
      'Oracle-only construct NVL( remains in the output',
    ]);
    expect(messages('SELECT NVL(a, 0) FROM t', undefined, { target: 'oracle' })).toEqual([]);
  });

  it('notes deprecated syntax in the input', () => {
    expect(messages('CREATE TABLE t (body LONG)', 'CREATE TABLE t (body TEXT)')).toEqual(['Deprecated syntax: LONG data type']);
  });

  it('ignores keywords inside literals', () => {
    expect(messages("SELECT 'WHERE' FROM t", "SELECT 'x' FROM t")).toEqual([]);
  });
});

describe('validationInfo', () => {
  it('is valid without errors and classifies complexity', () => {
    const info = validationInfo([createWarning('performance', 'slow', 'info')], {
      parseMode: 'structural',
      complexity: emptyComplexity(),
    });
    expect(info.valid).toBe(true);
    expect(info.parseMode).toBe('structural');
    expect(info.difficulty).toBe('simple');
  });

  it('is invalid with an error', () => {
    const info = validationInfo([createWarning('manual-review-needed', 'broken', 'error')], { parseMode: 'text-only' });
    expect(info.valid).toBe(false);
    expect(info.difficulty).toBeUndefined();
  });
});

describe('filterWarnings', () => {
  it('drops switched-off kinds but keeps errors', () => {
    const { warnings } = resolveRuleConfig({ warnings: { warnOnPartialConversion: false } });
    const kept = filterWarnings(
      [
        createWarning('partial-support', 'partial', 'warning'),
        createWarning('partial-support', 'fatal', 'error'),
        createWarning('performance', 'slow', 'info'),
      ],
      warnings,
    );
    expect(kept.map(w => w.message)).toEqual(['fatal', 'slow']);
  });
});
