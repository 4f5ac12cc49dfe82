import { describe, expect, it } from 'vitest';
import { convert, convertAsync, convertRequest, SqlDialectConverter } from '../../src/converter';
import { ConfigurationError } from '../../src/converter/errors';

describe('SqlDialectConverter', () => {
  it('converts NVL to IFNULL for MySQL', () => {
    const result = convert('SELECT NVL(a, 0) FROM t', 'oracle', 'mysql');
    expect(result.convertedSql).toBe('SELECT IFNULL(a, 0) FROM t');
    expect(result.appliedRules).toEqual(['Function: NVL → IFNULL']);
    expect(result.warnings).toEqual([]);
    expect(result.validation?.valid).toBe(true);
    expect(result.validation?.parseMode).toBe('structural');
  });

  it('round-trips NVL through MySQL', () => {
    const there = convert('SELECT NVL(a, 0) FROM t', 'oracle', 'mysql');
    const back = convert(there.convertedSql, 'mysql', 'oracle');
    expect(back.convertedSql).toBe('SELECT NVL(a, 0) FROM t');
  });

  it('accepts dialect names in any case', () => {
    expect(convert('SELECT NVL(a, 0) FROM t', 'Oracle', 'POSTGRESQL').convertedSql).toBe('SELECT COALESCE(a, 0) FROM t');
  });

  it('returns the input untouched when both dialects match', () => {
    const result = convert('SELECT NVL(a, 0) FROM t', 'oracle', 'oracle');
    expect(result.convertedSql).toBe('SELECT NVL(a, 0) FROM t');
    expect(result.appliedRules).toEqual([]);
    expect(result.validation).toBeUndefined();
  });

  it('rejects an unknown dialect before converting', () => {
    expect(() => convert('SELECT 1', 'oracle', 'sqlserver')).toThrow(ConfigurationError);
    try {
      convert('SELECT 1', 'oracle', 'sqlserver');
    } catch (error) {
      expect(error instanceof ConfigurationError && error.code).toBe('INVALID_DIALECT');
    }
  });

  it('rejects an invalid rule configuration', () => {
    const converter = new SqlDialectConverter({ ruleConfig: { warnings: { maxInClauseSize: 0 } } });
    expect(() => converter.convert('SELECT 1', 'oracle', 'mysql')).toThrow(ConfigurationError);
  });

  it('recovers a missing closing parenthesis', () => {
    const result = convert('SELECT * FROM t WHERE id IN (1,2,3', 'mysql', 'postgresql');
    expect(result.convertedSql).toBe('SELECT * FROM t WHERE id IN (1,2,3)');
    expect(result.appliedRules).toContain('Recovery: parenthesis balance repair');
    expect(result.validation?.parseMode).toBe('recovered');
    expect(result.validation?.recovery).toEqual({
      state: 'recovered',
      mode: 'single-shot',
      strategies: ['parenthesis balance repair'],
      confidence: 0.7,
    });
    expect(result.validation?.valid).toBe(true);
  });

  it('recovers a missing parenthesis behind a leading comment', () => {
    const result = convert('-- pick rows\nSELECT * FROM t WHERE id IN (1,2,3', 'mysql', 'postgresql');
    expect(result.convertedSql).toBe('SELECT * FROM t WHERE id IN (1,2,3)');
    expect(result.validation?.recovery).toEqual({
      state: 'recovered',
      mode: 'single-shot',
      strategies: ['comment removal', 'parenthesis balance repair'],
      confidence: 0.7,
    });
    expect(result.validation?.valid).toBe(true);
  });

  it('rewrites MySQL backslash-escaped quotes for PostgreSQL', () => {
    const result = convert("SELECT 'a\\'b' FROM t", 'mysql', 'postgresql');
    expect(result.convertedSql).toBe("SELECT 'a''b' FROM t");
    expect(result.warnings).toEqual([]);
  });

  it('keeps MySQL backslash escapes between MySQL texts', () => {
    expect(convert("SELECT 'a\\'b' FROM t", 'mysql', 'mysql').convertedSql).toBe("SELECT 'a\\'b' FROM t");
  });

  it('turns ON CONFLICT DO NOTHING into INSERT IGNORE', () => {
    const result = convert('INSERT INTO t VALUES(1) ON CONFLICT (id) DO NOTHING', 'postgresql', 'mysql');
    expect(result.convertedSql).toBe('INSERT IGNORE INTO t VALUES(1)');
    expect(result.appliedRules).toContain('Upsert: ON CONFLICT DO NOTHING → INSERT IGNORE');
  });

  it('formats the output on request', () => {
    const result = convert('SELECT NVL(a, 0) FROM t', 'oracle', 'mysql', { format: true });
    expect(result.convertedSql).toBe('SELECT\n  IFNULL(a, 0)\nFROM\n  t');
  });

  it('honors rule switches', () => {
    const result = convert('SELECT NVL(a, 0) FROM t', 'oracle', 'mysql', {
      ruleConfig: { function: { convertNvl: false } },
    });
    expect(result.convertedSql).toBe('SELECT NVL(a, 0) FROM t');
    expect(result.warnings.map(w => w.message)).toEqual(['Oracle-only construct NVL( remains in the output']);
  });
});

describe('large inputs', () => {
  const script = 'SELECT NVL(a, 0) FROM t;\nSELECT NVL(b, 1) FROM u;';
  const options = { largeSqlThreshold: 10, chunkSize: 1, concurrency: 2 };

  it('converts chunks and keeps their order', async () => {
    const result = await convertAsync(script, 'oracle', 'postgresql', options);
    expect(result.convertedSql).toBe('SELECT COALESCE(a, 0) FROM t;\n\nSELECT COALESCE(b, 1) FROM u;');
    expect(result.appliedRules).toEqual(['Function: NVL → COALESCE', 'Function: NVL → COALESCE']);
    expect(result.validation?.parseMode).toBe('structural');
  });

  it('gives the same text synchronously', () => {
    expect(convert(script, 'oracle', 'postgresql', options).convertedSql).toBe(
      'SELECT COALESCE(a, 0) FROM t;\n\nSELECT COALESCE(b, 1) FROM u;',
    );
  });

  it('tags chunk warnings with the chunk number', async () => {
    const result = await convertAsync('SELECT 1 FROM t;\nSELECT * FROM u;', 'oracle', 'postgresql', options);
    expect(result.warnings.map(w => [w.message, w.location?.chunk])).toEqual([['SELECT * returns every column', 2]]);
  });
});

describe('convertRequest', () => {
  it('prefers the request rule configuration', () => {
    const result = convertRequest(
      { sql: 'SELECT NVL(a, 0) FROM t', source: 'oracle', target: 'mysql', ruleConfig: { function: { convertNvl: false } } },
      { ruleConfig: 'default' },
    );
    expect(result.convertedSql).toBe('SELECT NVL(a, 0) FROM t');
  });
});
