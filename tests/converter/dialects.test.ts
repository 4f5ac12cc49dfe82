import { describe, expect, it } from 'vitest';
import { isDialect, parseDialect, strategyFor } from '../../src/converter/dialects';
import { ConfigurationError } from '../../src/converter/errors';
import type { RuleConfigInput } from '../../src/config/ruleConfig';
import type { Dialect } from '../../src/types/sql';
import { contextFor } from '../helpers/context';

function run(sql: string, source: Dialect, target: Dialect, overrides?: RuleConfigInput) {
  const { ctx, masked } = contextFor(sql, source, target, overrides);
  const result = strategyFor(target).convert(masked, ctx);
  return { ...result, sql: ctx.mask.unmask(result.sql) };
}

describe('parseDialect', () => {
  it('accepts full names and one-letter forms in any case', () => {
    expect(parseDialect('Oracle')).toBe('oracle');
    expect(parseDialect('m')).toBe('mysql');
    expect(parseDialect('P')).toBe('postgresql');
    expect(parseDialect('postgres')).toBe('postgresql');
  });

  it('rejects anything else', () => {
    expect(() => parseDialect('sqlserver')).toThrow(ConfigurationError);
    expect(() => parseDialect('sqlserver')).toThrow(
      'Unsupported dialect: sqlserver. Expected one of oracle, mysql, postgresql (or O, M, P)',
    );
    expect(() => parseDialect(42)).toThrow(ConfigurationError);
  });

  it('narrows known names', () => {
    expect(isDialect('mysql')).toBe(true);
    expect(isDialect('MySQL')).toBe(false);
  });
});

describe('functions', () => {
  it('renames NVL for MySQL', () => {
    const result = run('SELECT NVL(a, 0) FROM t', 'oracle', 'mysql');
    expect(result.sql).toBe('SELECT IFNULL(a, 0) FROM t');
    expect(result.appliedRules).toEqual(['Function: NVL → IFNULL']);
  });

  it('renames IFNULL back to NVL for Oracle', () => {
    expect(run('SELECT IFNULL(a, 0) FROM t', 'mysql', 'oracle').sql).toBe('SELECT NVL(a, 0) FROM t');
  });

  it('rewrites NVL2 as CASE', () => {
    expect(run('SELECT NVL2(a, 1, 0) FROM t', 'oracle', 'mysql').sql).toBe(
      'SELECT CASE WHEN a IS NOT NULL THEN 1 ELSE 0 END FROM t',
    );
  });

  it('rewrites DECODE as a simple CASE', () => {
    expect(run("SELECT DECODE(s, 1, 'A', 2, 'B', 'C') FROM t", 'oracle', 'postgresql').sql).toBe(
      "SELECT CASE s WHEN 1 THEN 'A' WHEN 2 THEN 'B' ELSE 'C' END FROM t",
    );
  });

  it('matches NULL searches in DECODE with IS NULL', () => {
    expect(run("SELECT DECODE(s, NULL, 'none', s) FROM t", 'oracle', 'postgresql').sql).toBe(
      "SELECT CASE WHEN s IS NULL THEN 'none' ELSE s END FROM t",
    );
  });

  it('keeps DECODE when the rule is off', () => {
    const sql = "SELECT DECODE(s, 1, 'A') FROM t";
    expect(run(sql, 'oracle', 'postgresql', { function: { convertDecode: false } }).sql).toBe(sql);
  });

  it('remaps date format masks', () => {
    expect(run("SELECT TO_CHAR(d, 'YYYY-MM-DD HH24:MI:SS') FROM t", 'oracle', 'mysql').sql).toBe(
      "SELECT DATE_FORMAT(d, '%Y-%m-%d %H:%i:%s') FROM t",
    );
  });

  it('leaves numeric TO_CHAR masks alone with a warning', () => {
    const result = run("SELECT TO_CHAR(n, '999.99') FROM t", 'oracle', 'mysql');
    expect(result.sql).toBe("SELECT TO_CHAR(n, '999.99') FROM t");
    expect(result.warnings.map(warning => warning.message)).toEqual([
      "TO_CHAR with numeric format '999.99' was not converted",
    ]);
  });

  it('swaps INSTR arguments into LOCATE', () => {
    expect(run("SELECT INSTR(name, 'a') FROM t", 'oracle', 'mysql').sql).toBe("SELECT LOCATE('a', name) FROM t");
  });

  it('replaces bare SYSDATE and drops FROM DUAL for PostgreSQL', () => {
    const result = run('SELECT SYSDATE FROM dual', 'oracle', 'postgresql');
    expect(result.sql).toBe('SELECT CURRENT_TIMESTAMP');
    expect(result.appliedRules).toEqual(['FROM DUAL removed', 'Function: SYSDATE → CURRENT_TIMESTAMP']);
  });
});

describe('MySQL strategy', () => {
  it('turns || chains into CONCAT', () => {
    expect(run("SELECT first || ' ' || last FROM t", 'oracle', 'mysql').sql).toBe(
      "SELECT CONCAT(first, ' ', last) FROM t",
    );
  });

  it('drops NULLS LAST with a warning', () => {
    const result = run('SELECT a FROM t ORDER BY a NULLS LAST', 'postgresql', 'mysql');
    expect(result.sql).toBe('SELECT a FROM t ORDER BY a');
    expect(result.warnings[0].kind).toBe('partial-support');
  });

  it('quotes identifiers with backticks', () => {
    expect(run('SELECT "Name" FROM t', 'oracle', 'mysql').sql).toBe('SELECT `Name` FROM t');
  });

  it('removes optimizer hints', () => {
    const result = run('SELECT /*+ FULL(t) */ a FROM t', 'oracle', 'mysql');
    expect(result.sql).toBe('SELECT a FROM t');
    expect(result.warnings[0].message).toBe('Optimizer hints removed: FULL(t)');
  });

  it('turns ROWNUM filters into LIMIT', () => {
    expect(run('SELECT * FROM t WHERE ROWNUM <= 10', 'oracle', 'mysql').sql).toBe('SELECT * FROM t LIMIT 10');
    expect(run('SELECT a FROM t WHERE ROWNUM <= 5 AND b = 1;', 'oracle', 'mysql').sql).toBe(
      'SELECT a FROM t WHERE b = 1 LIMIT 5;',
    );
  });
});

describe('PostgreSQL strategy', () => {
  it('rewrites the two-table (+) join as LEFT JOIN', () => {
    const result = run('SELECT e.name, d.name FROM emp e, dept d WHERE e.dept_id = d.id(+)', 'oracle', 'postgresql');
    expect(result.sql).toBe('SELECT e.name, d.name FROM emp e LEFT JOIN dept d ON e.dept_id = d.id');
    expect(result.appliedRules).toEqual(['Oracle (+) join → LEFT JOIN']);
  });

  it('rewrites MySQL quoting and LIMIT offset, count', () => {
    expect(run('SELECT `id` FROM t LIMIT 5, 10', 'mysql', 'postgresql').sql).toBe(
      'SELECT "id" FROM t LIMIT 10 OFFSET 5',
    );
  });

  it('maps column types and drops BYTE length semantics', () => {
    const result = run(
      'CREATE TABLE t (id NUMBER(10), name VARCHAR2(50 BYTE), body CLOB, created DATE)',
      'oracle',
      'postgresql',
    );
    expect(result.sql).toBe('CREATE TABLE t (id NUMERIC(10), name VARCHAR(50), body TEXT, created TIMESTAMP(0))');
    expect(result.appliedRules).toEqual([
      'Data type: NUMBER → NUMERIC',
      'Data type: VARCHAR2 → VARCHAR',
      'Data type: CLOB → TEXT',
      'Data type: DATE → TIMESTAMP(0)',
    ]);
  });
});

describe('Oracle strategy', () => {
  it('turns :: casts into CAST and LIMIT into FETCH FIRST', () => {
    const result = run('SELECT a::integer FROM t LIMIT 10', 'postgresql', 'oracle');
    expect(result.sql).toBe('SELECT CAST(a AS NUMBER(10)) FROM t FETCH FIRST 10 ROWS ONLY');
    expect(result.appliedRules).toEqual([
      '::type → CAST()',
      'LIMIT → FETCH FIRST',
      'Data type: INTEGER → NUMBER(10)',
    ]);
  });

  it('adds FROM DUAL to FROM-less selects', () => {
    const result = run('SELECT 1', 'mysql', 'oracle');
    expect(result.sql).toBe('SELECT 1 FROM DUAL');
    expect(result.appliedRules).toEqual(['FROM DUAL added']);
  });

  it('turns LIMIT with OFFSET into OFFSET ... FETCH NEXT', () => {
    const result = run('SELECT a FROM t ORDER BY a LIMIT 10 OFFSET 20', 'postgresql', 'oracle');
    expect(result.sql).toBe('SELECT a FROM t ORDER BY a OFFSET 20 ROWS FETCH NEXT 10 ROWS ONLY');
    expect(result.appliedRules).toEqual(['LIMIT → FETCH FIRST']);
  });

  it('turns MySQL LIMIT offset, count into OFFSET ... FETCH NEXT', () => {
    expect(run('SELECT a FROM t LIMIT 20, 10', 'mysql', 'oracle').sql).toBe(
      'SELECT a FROM t OFFSET 20 ROWS FETCH NEXT 10 ROWS ONLY',
    );
  });

  it('adds ROWS to a bare multi-digit OFFSET', () => {
    expect(run('SELECT a FROM t ORDER BY a OFFSET 15', 'postgresql', 'oracle').sql).toBe(
      'SELECT a FROM t ORDER BY a OFFSET 15 ROWS',
    );
  });

  it('adds FROM DUAL inside subqueries and CTE bodies', () => {
    expect(run('SELECT a FROM (SELECT 1 AS a) x', 'mysql', 'oracle').sql).toBe(
      'SELECT a FROM (SELECT 1 AS a FROM DUAL) x',
    );
    expect(run('WITH x AS (SELECT 1 AS a) SELECT a FROM x', 'mysql', 'oracle').sql).toBe(
      'WITH x AS (SELECT 1 AS a FROM DUAL) SELECT a FROM x',
    );
  });

  it('adds FROM DUAL to a scalar subquery inside a function call', () => {
    expect(run('SELECT COALESCE((SELECT 1), 0) FROM t', 'mysql', 'oracle').sql).toBe(
      'SELECT COALESCE((SELECT 1 FROM DUAL), 0) FROM t',
    );
  });

  it('adds FROM DUAL to each arm of a UNION', () => {
    const result = run('SELECT 1 UNION ALL SELECT 2;', 'mysql', 'oracle');
    expect(result.sql).toBe('SELECT 1 FROM DUAL UNION ALL SELECT 2 FROM DUAL;');
    expect(result.appliedRules).toEqual(['FROM DUAL added']);
  });

  it('leaves privilege lists alone', () => {
    expect(run('GRANT SELECT ON t TO app_user', 'mysql', 'oracle').sql).toBe('GRANT SELECT ON t TO app_user');
  });
});
