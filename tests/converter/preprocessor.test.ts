import { describe, expect, it } from 'vitest';
import { resolveRuleConfig } from '../../src/config/ruleConfig';
import { preprocess } from '../../src/converter/preprocessor';

describe('preprocess', () => {
  it('removes Oracle physical attributes for MySQL', () => {
    const result = preprocess('CREATE TABLE emp (id NUMBER(10)) TABLESPACE users PCTFREE 10 NOLOGGING;', 'mysql');
    expect(result.sql).toBe('CREATE TABLE emp (id NUMBER(10));');
    expect(result.appliedRules).toEqual([
      'Preprocess: TABLESPACE clause',
      'Preprocess: Block space parameters',
      'Preprocess: LOGGING clause',
    ]);
  });

  it('is idempotent', () => {
    const sql = 'CREATE TABLE hr.emp (id NUMBER) STORAGE (INITIAL 64K NEXT 1M) PCTFREE 10 NOLOGGING;';
    const once = preprocess(sql, 'postgresql');
    const twice = preprocess(once.sql, 'postgresql');
    expect(twice.sql).toBe(once.sql);
    expect(twice.appliedRules).toEqual([]);
  });

  it('strips a multi-part qualifier in one pass', () => {
    const sql = 'CREATE TABLE a.b.c (x INT REFERENCES a.b.d (id));';
    const once = preprocess(sql, 'postgresql');
    expect(once.sql).toBe('CREATE TABLE c (x INT REFERENCES d (id));');
    expect(once.appliedRules).toEqual(['Preprocess: Schema prefix']);
    const twice = preprocess(once.sql, 'postgresql');
    expect(twice.sql).toBe(once.sql);
    expect(twice.appliedRules).toEqual([]);
  });

  it('removes STORAGE and the schema prefix', () => {
    const result = preprocess('CREATE TABLE hr.emp (id NUMBER) STORAGE (INITIAL 64K NEXT 1M);', 'postgresql');
    expect(result.sql).toBe('CREATE TABLE emp (id NUMBER);');
    expect(result.appliedRules).toEqual(['Preprocess: STORAGE clause', 'Preprocess: Schema prefix']);
  });

  it('keeps a column named like a physical keyword', () => {
    const sql = 'CREATE TABLE t (id INT, logging VARCHAR(10));';
    expect(preprocess(sql, 'mysql').sql).toBe(sql);
  });

  it('rewrites DEFAULT SYSDATE', () => {
    expect(preprocess('CREATE TABLE t (created DATE DEFAULT SYSDATE);', 'postgresql').sql).toBe(
      'CREATE TABLE t (created DATE DEFAULT CURRENT_TIMESTAMP);',
    );
  });

  it('keeps TABLESPACE for PostgreSQL', () => {
    const sql = 'CREATE TABLE t (id NUMBER) TABLESPACE users;';
    expect(preprocess(sql, 'postgresql').sql).toBe(sql);
  });

  it('leaves Oracle targets alone', () => {
    const sql = 'CREATE TABLE t (id NUMBER) PCTFREE 10 NOLOGGING;';
    expect(preprocess(sql, 'oracle').sql).toBe(sql);
  });

  it('never touches string literals', () => {
    const sql = "INSERT INTO t VALUES ('TABLESPACE users NOLOGGING');";
    expect(preprocess(sql, 'mysql').sql).toBe(sql);
  });

  it('drops constraint states', () => {
    const result = preprocess('CREATE TABLE t (id NUMBER, CONSTRAINT pk PRIMARY KEY (id) ENABLE VALIDATE);', 'postgresql');
    expect(result.sql).toBe('CREATE TABLE t (id NUMBER, CONSTRAINT pk PRIMARY KEY (id));');
  });

  it('warns about disabled constraints', () => {
    const result = preprocess('CREATE TABLE t (id NUMBER, CONSTRAINT pk PRIMARY KEY (id) DISABLE);', 'mysql');
    expect(result.sql).toBe('CREATE TABLE t (id NUMBER, CONSTRAINT pk PRIMARY KEY (id));');
    expect(result.warnings.map(warning => warning.message)).toEqual([
      'Disabled constraint will be enforced in the target database',
    ]);
  });

  it('turns COMMENT ON TABLE into ALTER TABLE for MySQL', () => {
    expect(preprocess("COMMENT ON TABLE emp IS 'Employees';", 'mysql').sql).toBe(
      "ALTER TABLE emp COMMENT = 'Employees';",
    );
  });

  it('comments out COMMENT ON COLUMN for MySQL', () => {
    const result = preprocess("COMMENT ON COLUMN emp.name IS 'Full name';", 'mysql');
    expect(result.sql).toBe("/* COMMENT ON COLUMN emp.name IS 'Full name' */");
    expect(result.warnings[0].message).toBe('Column comment on emp.name commented out');
  });

  it('moves MySQL inline comments to COMMENT ON statements', () => {
    const result = preprocess("CREATE TABLE t (id INT COMMENT 'key') COMMENT='Things';", 'postgresql', {
      source: 'mysql',
    });
    expect(result.sql).toBe(
      "CREATE TABLE t (id INT);\nCOMMENT ON TABLE t IS 'Things';\nCOMMENT ON COLUMN t.id IS 'key';",
    );
  });

  it('strips MySQL table options and notes a non-default AUTO_INCREMENT start', () => {
    const result = preprocess(
      'CREATE TABLE t (id INT) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4 AUTO_INCREMENT=100;',
      'postgresql',
      { source: 'mysql' },
    );
    expect(result.sql).toBe('CREATE TABLE t (id INT);');
    expect(result.appliedRules).toEqual(['Preprocess: MySQL table options']);
    expect(result.warnings[0].message).toBe('Initial AUTO_INCREMENT value 100 dropped');
  });

  it('keeps partition clauses unless partition conversion is enabled', () => {
    const sql = 'CREATE TABLE s (d DATE) PARTITION BY RANGE (d) (PARTITION p1 VALUES LESS THAN (10));';
    const kept = preprocess(sql, 'postgresql');
    expect(kept.sql).toBe(sql);
    expect(kept.warnings[0].message).toBe('Oracle partition clause kept as written');

    const config = resolveRuleConfig({ ddl: { convertPartitions: true } });
    expect(preprocess(sql, 'postgresql', { config }).sql).toBe('CREATE TABLE s (d DATE);');
  });

  it('honors disabled rules', () => {
    const config = resolveRuleConfig({ ddl: { removePhysicalAttributes: false } });
    const sql = 'CREATE TABLE t (id NUMBER) PCTFREE 10;';
    expect(preprocess(sql, 'mysql', { config }).sql).toBe(sql);
  });
});
