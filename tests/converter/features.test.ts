import { describe, expect, it } from 'vitest';
import {
  CteConverter,
  DatabaseLinkConverter,
  DateArithmeticConverter,
  HierarchicalQueryConverter,
  IndexConverter,
  MaterializedViewConverter,
  MergeConverter,
  PackageCallConverter,
  PivotConverter,
  SequenceConverter,
  SynonymConverter,
  UserDefinedTypeConverter,
  WindowFunctionConverter,
} from '../../src/converter/features';
import { parseSequenceOptions, renderSequence } from '../../src/converter/features/sequenceConverter';
import { runFeature } from '../helpers/context';

const messages = (result: { warnings: Array<{ message: string }> }) => result.warnings.map(w => w.message);

describe('MergeConverter', () => {
  const merge = new MergeConverter();
  const oracleMerge =
    'MERGE INTO emp t USING new_emp s ON (t.id = s.id) ' +
    'WHEN MATCHED THEN UPDATE SET t.name = s.name ' +
    'WHEN NOT MATCHED THEN INSERT (id, name) VALUES (s.id, s.name);';

  it('rewrites MERGE as INSERT ... ON CONFLICT for PostgreSQL', () => {
    const result = runFeature(merge, oracleMerge, 'oracle', 'postgresql');
    expect(result.applies).toBe(true);
    expect(result.sql).toBe(
      'INSERT INTO emp AS t (id, name)\nSELECT s.id, s.name\nFROM new_emp s\nON CONFLICT (id) DO UPDATE SET name = EXCLUDED.name;',
    );
    expect(result.appliedRules).toEqual(['Merge: MERGE → INSERT ... ON CONFLICT']);
    expect(messages(result)).toEqual(['ON CONFLICT (id) requires a unique index or constraint on those columns']);
  });

  it('rewrites MERGE as ON DUPLICATE KEY UPDATE for MySQL', () => {
    const result = runFeature(merge, oracleMerge, 'oracle', 'mysql');
    expect(result.sql).toBe(
      'INSERT INTO emp (id, name)\nSELECT s.id, s.name\nFROM new_emp s\nON DUPLICATE KEY UPDATE name = VALUES(name);',
    );
  });

  it('warns about a DELETE branch', () => {
    const sql =
      'MERGE INTO emp t USING new_emp s ON (t.id = s.id) ' +
      'WHEN MATCHED THEN DELETE ' +
      'WHEN NOT MATCHED THEN INSERT (id) VALUES (s.id);';
    const result = runFeature(merge, sql, 'oracle', 'postgresql');
    expect(messages(result)).toContain('MERGE WHEN MATCHED ... DELETE branch has no upsert equivalent and was not converted');
  });

  it('leaves a MERGE with only a DELETE branch unchanged', () => {
    const sql = 'MERGE INTO emp t USING old_emp s ON (t.id = s.id) WHEN MATCHED THEN DELETE;';
    const result = runFeature(merge, sql, 'oracle', 'postgresql');
    expect(result.sql).toBe(sql);
    expect(messages(result)).toContain('MERGE with only a DELETE branch was left unchanged');
  });

  it('turns ON CONFLICT DO NOTHING into INSERT IGNORE', () => {
    const result = runFeature(merge, 'INSERT INTO t VALUES(1) ON CONFLICT (id) DO NOTHING', 'postgresql', 'mysql');
    expect(result.sql).toBe('INSERT IGNORE INTO t VALUES(1)');
    expect(result.appliedRules).toEqual(['Upsert: ON CONFLICT DO NOTHING → INSERT IGNORE']);
  });

  it('turns ON CONFLICT DO UPDATE into ON DUPLICATE KEY UPDATE', () => {
    const result = runFeature(
      merge,
      'INSERT INTO t (id, n) VALUES (1, 2) ON CONFLICT (id) DO UPDATE SET n = EXCLUDED.n;',
      'postgresql',
      'mysql',
    );
    expect(result.sql).toBe('INSERT INTO t (id, n) VALUES (1, 2) ON DUPLICATE KEY UPDATE n = VALUES(n);');
  });

  it('turns ON DUPLICATE KEY UPDATE into ON CONFLICT with an inferred key', () => {
    const result = runFeature(
      merge,
      "INSERT INTO users (id, name) VALUES (1, 'a') ON DUPLICATE KEY UPDATE name = VALUES(name);",
      'mysql',
      'postgresql',
    );
    expect(result.sql).toBe("INSERT INTO users (id, name) VALUES (1, 'a') ON CONFLICT (id) DO UPDATE SET name = EXCLUDED.name;");
    expect(result.warnings).toEqual([]);
  });

  it('turns INSERT IGNORE into ON CONFLICT DO NOTHING', () => {
    const result = runFeature(merge, 'INSERT IGNORE INTO t (id) VALUES (1);', 'mysql', 'postgresql');
    expect(result.sql).toBe('INSERT INTO t (id) VALUES (1) ON CONFLICT DO NOTHING;');
  });

  it('builds an Oracle MERGE from an upsert', () => {
    const result = runFeature(
      merge,
      'INSERT INTO t (id, n) VALUES (1, 2) ON CONFLICT (id) DO UPDATE SET n = EXCLUDED.n;',
      'postgresql',
      'oracle',
    );
    expect(result.sql).toBe(
      'MERGE INTO t tgt\nUSING (SELECT 1 AS id, 2 AS n FROM DUAL) src\nON (tgt.id = src.id)\n' +
        'WHEN MATCHED THEN UPDATE SET tgt.n = src.n\n' +
        'WHEN NOT MATCHED THEN INSERT (id, n) VALUES (src.id, src.n);',
    );
    expect(result.appliedRules).toEqual(['Upsert: rewritten as MERGE']);
  });

  it('is off when convertMerge is disabled', () => {
    const { applies } = runFeature(merge, oracleMerge, 'oracle', 'postgresql', { syntax: { convertMerge: false } });
    expect(applies).toBe(false);
  });
});

describe('SynonymConverter', () => {
  const synonym = new SynonymConverter();

  it('turns a public synonym into a view', () => {
    const result = runFeature(synonym, 'CREATE PUBLIC SYNONYM emp FOR hr.employees;', 'oracle', 'postgresql');
    expect(result.sql).toBe('-- Synonym converted to VIEW\nCREATE OR REPLACE VIEW public.emp AS\nSELECT * FROM hr.employees;');
    expect(result.warnings.map(w => w.kind)).toEqual(['partial-support']);
  });

  it('drops the replacement view', () => {
    const result = runFeature(synonym, 'DROP SYNONYM emp;', 'oracle', 'mysql');
    expect(result.sql).toBe('DROP VIEW IF EXISTS emp;');
  });

  it('leaves a synonym over a database link for manual migration', () => {
    const result = runFeature(synonym, 'CREATE SYNONYM remote_emp FOR emp@hq;', 'oracle', 'postgresql');
    expect(result.sql).toBe('/* Synonym remote_emp FOR emp@hq: migrate manually */;');
    expect(result.warnings.map(w => w.severity)).toEqual(['error']);
  });
});

describe('DatabaseLinkConverter', () => {
  const link = new DatabaseLinkConverter();

  it('creates a postgres_fdw server without echoing the password', () => {
    const result = runFeature(
      link,
      `CREATE DATABASE LINK hq CONNECT TO scott IDENTIFIED BY "test-secret" USING 'dbhost:1521/orcl';`,
      'oracle',
      'postgresql',
    );
    expect(result.sql).toBe(
      'CREATE EXTENSION IF NOT EXISTS postgres_fdw;\n' +
        "CREATE SERVER hq FOREIGN DATA WRAPPER postgres_fdw OPTIONS (host 'dbhost', dbname 'orcl', port '1521');\n" +
        "CREATE USER MAPPING FOR CURRENT_USER SERVER hq OPTIONS (user 'scott', password '********');",
    );
    expect(result.sql).not.toContain('test-secret');
  });

  it('renames remote table references', () => {
    const result = runFeature(link, 'SELECT * FROM emp@hq e', 'oracle', 'mysql');
    expect(result.sql).toBe('SELECT * FROM hq_emp e');
    expect(messages(result)).toEqual(['References through database link hq were renamed to local hq_<table> objects']);
  });
});

describe('SequenceConverter', () => {
  const sequence = new SequenceConverter();

  it('maps CREATE SEQUENCE options to PostgreSQL', () => {
    const result = runFeature(
      sequence,
      'CREATE SEQUENCE emp_seq START WITH 1 INCREMENT BY 1 NOCACHE NOCYCLE;',
      'oracle',
      'postgresql',
    );
    expect(result.sql).toBe('CREATE SEQUENCE emp_seq START WITH 1 INCREMENT BY 1 CACHE 1 NO CYCLE;');
    expect(result.appliedRules).toEqual(['Sequence: CREATE SEQUENCE options']);
  });

  it('adds a missing terminator without recording an option change', () => {
    const result = runFeature(sequence, 'CREATE SEQUENCE emp_seq START WITH 1', 'oracle', 'postgresql');
    expect(result.sql).toBe('CREATE SEQUENCE emp_seq START WITH 1;');
    expect(result.appliedRules).toEqual([]);
  });

  it('rewrites NEXTVAL references', () => {
    const result = runFeature(sequence, 'INSERT INTO t (id) VALUES (emp_seq.NEXTVAL);', 'oracle', 'postgresql');
    expect(result.sql).toBe("INSERT INTO t (id) VALUES (nextval('emp_seq'));");
    expect(result.appliedRules).toEqual(['Sequence: NEXTVAL reference']);
  });

  it('turns SERIAL into AUTO_INCREMENT', () => {
    const result = runFeature(sequence, 'CREATE TABLE t (id SERIAL PRIMARY KEY, name TEXT);', 'postgresql', 'mysql');
    expect(result.sql).toBe('CREATE TABLE t (id INT AUTO_INCREMENT PRIMARY KEY, name TEXT);');
  });

  it('turns AUTO_INCREMENT into SERIAL', () => {
    const result = runFeature(
      sequence,
      'CREATE TABLE t (id INT NOT NULL AUTO_INCREMENT, name VARCHAR(20));',
      'mysql',
      'postgresql',
    );
    expect(result.sql).toBe('CREATE TABLE t (id SERIAL NOT NULL, name VARCHAR(20));');
  });

  it('drops a MAXVALUE beyond the BIGINT range', () => {
    const result = runFeature(sequence, 'CREATE SEQUENCE s MAXVALUE 9999999999999999999999999999;', 'oracle', 'postgresql');
    expect(result.sql).toBe('CREATE SEQUENCE s NO MAXVALUE;');
    expect(messages(result)).toEqual(['Sequence s: 9999999999999999999999999999 exceeds the BIGINT range and was dropped']);
  });

  it('parses and renders sequence options', () => {
    const options = parseSequenceOptions('START WITH 10 INCREMENT BY 5 MAXVALUE 100 CACHE 20 CYCLE ORDER');
    expect(options).toEqual({ startWith: '10', incrementBy: '5', maxValue: '100', cache: '20', cycle: true, order: true });
    expect(renderSequence('s', options, 'oracle')).toBe(
      'CREATE SEQUENCE s START WITH 10 INCREMENT BY 5 MAXVALUE 100 CACHE 20 CYCLE ORDER',
    );
  });
});

describe('IndexConverter', () => {
  const index = new IndexConverter();

  it('removes BITMAP for MySQL', () => {
    const result = runFeature(index, 'CREATE BITMAP INDEX idx ON t(c)', 'oracle', 'mysql');
    expect(result.sql).toBe('CREATE INDEX idx ON t(c)');
    expect(result.appliedRules).toEqual(['Index: BITMAP removed']);
    expect(messages(result)).toEqual(['BITMAP indexes are not supported by MySQL; a B-tree index was created']);
  });

  it('turns ONLINE into CONCURRENTLY', () => {
    const result = runFeature(index, 'CREATE INDEX idx ON t (c) ONLINE;', 'oracle', 'postgresql');
    expect(result.sql).toBe('CREATE INDEX CONCURRENTLY idx ON t (c);');
  });

  it('drops prefix lengths for PostgreSQL', () => {
    const result = runFeature(index, 'CREATE INDEX idx_name ON users (name(20));', 'mysql', 'postgresql');
    expect(result.sql).toBe('CREATE INDEX idx_name ON users (name);');
    expect(messages(result)).toEqual(['Index prefix lengths were removed; the whole column value is indexed']);
  });

  it('moves inline indexes out of CREATE TABLE', () => {
    const result = runFeature(
      index,
      'CREATE TABLE t (id INT, name VARCHAR(20), INDEX idx_name (name));',
      'mysql',
      'postgresql',
    );
    expect(result.sql).toBe('CREATE TABLE t (id INT, name VARCHAR(20));\nCREATE INDEX idx_name ON t (name);');
  });

  it('flags DROP INDEX without a table for MySQL', () => {
    const result = runFeature(index, 'DROP INDEX idx;', 'oracle', 'mysql');
    expect(result.sql).toBe('DROP INDEX idx /* ON <table> required */;');
  });
});

describe('MaterializedViewConverter', () => {
  const view = new MaterializedViewConverter();

  it('keeps a materialized view for PostgreSQL and warns about refresh options', () => {
    const result = runFeature(
      view,
      'CREATE MATERIALIZED VIEW mv REFRESH FAST ON COMMIT AS SELECT a FROM t;',
      'oracle',
      'postgresql',
    );
    expect(result.sql).toBe('CREATE MATERIALIZED VIEW mv AS\nSELECT a FROM t\nWITH DATA;');
    expect(result.warnings.map(w => w.kind)).toEqual(['partial-support', 'partial-support']);
  });

  it('emulates a materialized view in MySQL', () => {
    const result = runFeature(view, 'CREATE MATERIALIZED VIEW mv AS SELECT a FROM t;', 'oracle', 'mysql');
    expect(result.sql).toBe(
      '-- Materialized view mv emulated as a table plus refresh procedure\n' +
        'CREATE TABLE mv AS\nSELECT a FROM t;\n' +
        'CREATE PROCEDURE mv_refresh()\nBEGIN\n  TRUNCATE TABLE mv;\n  INSERT INTO mv\n  SELECT a FROM t;\nEND;',
    );
  });

  it('turns DBMS_MVIEW.REFRESH into refresh procedure calls', () => {
    const result = runFeature(view, "EXEC DBMS_MVIEW.REFRESH('mv1, mv2');", 'oracle', 'mysql');
    expect(result.sql).toBe('CALL mv1_refresh();\nCALL mv2_refresh();');
  });
});

describe('UserDefinedTypeConverter', () => {
  const types = new UserDefinedTypeConverter();

  it('turns an object type into a composite type', () => {
    const result = runFeature(
      types,
      'CREATE TYPE address_t AS OBJECT (street VARCHAR2(100), city VARCHAR2(50));',
      'oracle',
      'postgresql',
    );
    expect(result.sql).toBe('CREATE TYPE address_t AS (\n  street VARCHAR2(100),\n  city VARCHAR2(50)\n);');
    expect(result.appliedRules).toEqual(['Type: OBJECT → composite type']);
  });

  it('turns a VARRAY into an array domain', () => {
    const result = runFeature(types, 'CREATE TYPE phones_t AS VARRAY(5) OF VARCHAR2(20);', 'oracle', 'postgresql');
    expect(result.sql).toBe('CREATE DOMAIN phones_t AS VARCHAR2(20)[];');
    expect(messages(result)).toEqual(['VARRAY phones_t: the size limit 5 is not enforced']);
  });

  it('comments out a nested table type for MySQL', () => {
    const result = runFeature(types, 'CREATE TYPE ids_t AS TABLE OF NUMBER;', 'oracle', 'mysql');
    expect(result.sql).toBe('/* Nested table type ids_t of NUMBER: use a JSON column */;');
  });
});

describe('PackageCallConverter', () => {
  const packages = new PackageCallConverter();

  it('turns DBMS_OUTPUT.PUT_LINE into RAISE NOTICE', () => {
    const result = runFeature(packages, "BEGIN DBMS_OUTPUT.PUT_LINE('hi'); END;", 'oracle', 'postgresql');
    expect(result.sql).toBe("BEGIN RAISE NOTICE '%', 'hi'; END;");
    expect(result.appliedRules).toEqual(['Package: DBMS_OUTPUT.PUT_LINE']);
  });

  it('scales DBMS_RANDOM.VALUE for MySQL', () => {
    const result = runFeature(packages, 'SELECT DBMS_RANDOM.VALUE(1, 10) FROM dual', 'oracle', 'mysql');
    expect(result.sql).toBe('SELECT (1 + (10 - 1) * RAND()) FROM dual');
  });

  it('rewrites a bare DBMS_RANDOM.VALUE', () => {
    const result = runFeature(packages, 'SELECT DBMS_RANDOM.VALUE FROM dual', 'oracle', 'postgresql');
    expect(result.sql).toBe('SELECT random() FROM dual');
  });

  it('turns RAISE_APPLICATION_ERROR into SIGNAL', () => {
    const result = runFeature(packages, "RAISE_APPLICATION_ERROR(-20001, 'bad');", 'oracle', 'mysql');
    expect(result.sql).toBe("SIGNAL SQLSTATE '45000' SET MESSAGE_TEXT = 'bad';");
  });

  it('comments out an unknown package call', () => {
    const result = runFeature(packages, 'BEGIN UTL_FILE.FCLOSE(f); END;', 'oracle', 'postgresql');
    expect(result.sql).toBe('BEGIN NULL /* UTL_FILE.FCLOSE(f) */; END;');
    expect(messages(result)).toEqual(['UTL_FILE.FCLOSE has no PostgreSQL equivalent and was commented out']);
  });
});

describe('HierarchicalQueryConverter', () => {
  const hierarchy = new HierarchicalQueryConverter();

  it('rewrites CONNECT BY as a recursive CTE', () => {
    const result = runFeature(
      hierarchy,
      'SELECT employee_id, LEVEL FROM emp START WITH manager_id IS NULL CONNECT BY PRIOR employee_id = manager_id;',
      'oracle',
      'postgresql',
    );
    expect(result.sql).toBe(
      [
        'WITH RECURSIVE hierarchy_cte AS (',
        '  SELECT emp.*, 1 AS level',
        '  FROM emp',
        '  WHERE manager_id IS NULL',
        '  UNION ALL',
        '  SELECT child.*, parent.level + 1',
        '  FROM emp child',
        '  JOIN hierarchy_cte parent ON child.manager_id = parent.employee_id',
        ')',
        'SELECT employee_id, level',
        'FROM hierarchy_cte;',
      ].join('\n'),
    );
    expect(result.appliedRules).toEqual(['Hierarchical: CONNECT BY → WITH RECURSIVE']);
  });

  it('rewrites the CONNECT BY LEVEL row generator', () => {
    const result = runFeature(hierarchy, 'SELECT LEVEL AS n FROM dual CONNECT BY LEVEL <= 5', 'oracle', 'mysql');
    expect(result.sql).toBe(
      [
        'WITH RECURSIVE hierarchy_cte AS (',
        '  SELECT 1 AS level',
        '  UNION ALL',
        '  SELECT level + 1 FROM hierarchy_cte WHERE level + 1 <= 5',
        ')',
        'SELECT level AS n',
        'FROM hierarchy_cte',
      ].join('\n'),
    );
  });

  it('does not apply when disabled', () => {
    const { applies } = runFeature(hierarchy, 'SELECT 1 FROM t CONNECT BY PRIOR a = b', 'oracle', 'postgresql', {
      syntax: { convertHierarchicalQuery: false },
    });
    expect(applies).toBe(false);
  });
});

describe('CteConverter', () => {
  const cte = new CteConverter();

  it('adds RECURSIVE to a self-referencing CTE', () => {
    const result = runFeature(
      cte,
      'WITH t AS (SELECT 1 AS n FROM dual UNION ALL SELECT n + 1 FROM t WHERE n < 3) SELECT n FROM t',
      'oracle',
      'postgresql',
    );
    expect(result.sql).toBe(
      'WITH RECURSIVE t AS (SELECT 1 AS n FROM dual UNION ALL SELECT n + 1 FROM t WHERE n < 3) SELECT n FROM t',
    );
    expect(result.appliedRules).toEqual(['CTE: RECURSIVE added']);
  });

  it('removes RECURSIVE for Oracle', () => {
    const result = runFeature(
      cte,
      'WITH RECURSIVE t(n) AS (SELECT 1 UNION ALL SELECT n + 1 FROM t WHERE n < 3) SELECT n FROM t',
      'postgresql',
      'oracle',
    );
    expect(result.sql).toBe('WITH t(n) AS (SELECT 1 UNION ALL SELECT n + 1 FROM t WHERE n < 3) SELECT n FROM t');
    expect(result.warnings).toEqual([]);
  });
});

describe('PivotConverter', () => {
  const pivot = new PivotConverter();

  it('rewrites PIVOT as conditional aggregation', () => {
    const result = runFeature(
      pivot,
      "SELECT * FROM (SELECT dept, job, sal FROM emp) PIVOT (SUM(sal) FOR job IN ('CLERK' AS clerk, 'MANAGER' AS manager))",
      'oracle',
      'postgresql',
    );
    expect(result.sql).toBe(
      [
        'SELECT dept,',
        "  SUM(CASE WHEN job = 'CLERK' THEN sal END) AS clerk,",
        "  SUM(CASE WHEN job = 'MANAGER' THEN sal END) AS manager",
        'FROM (SELECT dept, job, sal FROM emp)',
        'GROUP BY dept',
      ].join('\n'),
    );
    expect(result.appliedRules).toEqual(['Pivot: PIVOT → CASE WHEN aggregation']);
  });

  it('rewrites UNPIVOT as UNION ALL', () => {
    const result = runFeature(
      pivot,
      "SELECT id, quarter, amount FROM sales UNPIVOT (amount FOR quarter IN (q1 AS 'Q1', q2 AS 'Q2'))",
      'oracle',
      'mysql',
    );
    expect(result.sql).toBe(
      "SELECT id, 'Q1' AS quarter, q1 AS amount FROM sales WHERE q1 IS NOT NULL\n" +
        'UNION ALL\n' +
        "SELECT id, 'Q2' AS quarter, q2 AS amount FROM sales WHERE q2 IS NOT NULL",
    );
  });
});

describe('WindowFunctionConverter', () => {
  const window = new WindowFunctionConverter();

  it('turns LISTAGG into STRING_AGG', () => {
    const result = runFeature(
      window,
      "SELECT dept, LISTAGG(name, ', ') WITHIN GROUP (ORDER BY name) FROM emp GROUP BY dept",
      'oracle',
      'postgresql',
    );
    expect(result.sql).toBe("SELECT dept, STRING_AGG(name, ', ' ORDER BY name) FROM emp GROUP BY dept");
    expect(result.appliedRules).toEqual(['Window: LISTAGG → STRING_AGG']);
  });

  it('turns GROUP_CONCAT into STRING_AGG', () => {
    const result = runFeature(
      window,
      "SELECT GROUP_CONCAT(DISTINCT name ORDER BY name SEPARATOR ';') FROM t",
      'mysql',
      'postgresql',
    );
    expect(result.sql).toBe("SELECT STRING_AGG(DISTINCT name, ';' ORDER BY name) FROM t");
  });

  it('turns MEDIAN into PERCENTILE_CONT', () => {
    const result = runFeature(window, 'SELECT MEDIAN(sal) FROM emp', 'oracle', 'postgresql');
    expect(result.sql).toBe('SELECT PERCENTILE_CONT(0.5) WITHIN GROUP (ORDER BY sal) FROM emp');
  });
});

describe('DateArithmeticConverter', () => {
  const dates = new DateArithmeticConverter();

  it('turns ADD_MONTHS into interval arithmetic', () => {
    const result = runFeature(dates, 'SELECT ADD_MONTHS(hire_date, 3) FROM emp', 'oracle', 'postgresql');
    expect(result.sql).toBe("SELECT (hire_date + INTERVAL '3 month') FROM emp");
    expect(result.appliedRules).toEqual(['Date: ADD_MONTHS → interval arithmetic']);
  });

  it('turns Oracle day arithmetic into DATE_ADD', () => {
    const result = runFeature(dates, 'SELECT SYSDATE + 7 FROM dual', 'oracle', 'mysql');
    expect(result.sql).toBe('SELECT DATE_ADD(SYSDATE, INTERVAL 7 DAY) FROM dual');
    expect(messages(result)).toEqual([]);
  });

  it('flags a column taken for a date from its name', () => {
    const result = runFeature(dates, 'SELECT retry_at + 3 FROM jobs', 'oracle', 'mysql');
    expect(result.sql).toBe('SELECT DATE_ADD(retry_at, INTERVAL 3 DAY) FROM jobs');
    expect(messages(result)).toEqual(['Column retry_at was taken for a date from its name']);
  });

  it('turns DATE_ADD into a PostgreSQL interval', () => {
    const result = runFeature(dates, 'SELECT DATE_ADD(created_at, INTERVAL 2 HOUR) FROM t', 'mysql', 'postgresql');
    expect(result.sql).toBe("SELECT (created_at + INTERVAL '2 hour') FROM t");
    expect(result.appliedRules).toEqual(['Date: DATE_ADD → interval arithmetic']);
  });

  it('turns DATEDIFF into date subtraction', () => {
    const result = runFeature(dates, 'SELECT DATEDIFF(end_date, start_date) FROM t', 'mysql', 'postgresql');
    expect(result.sql).toBe('SELECT (CAST(end_date AS DATE) - CAST(start_date AS DATE)) FROM t');
  });

  it('turns a PostgreSQL interval literal into DATE_ADD', () => {
    const result = runFeature(dates, "SELECT created_at + INTERVAL '3 days' FROM t", 'postgresql', 'mysql');
    expect(result.sql).toBe('SELECT DATE_ADD(created_at, INTERVAL 3 DAY) FROM t');
  });
});
