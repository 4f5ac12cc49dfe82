/** Regex source for a possibly qualified, possibly quoted identifier. */
export const IDENTIFIER = '(?:"[^"]+"|`[^`]+`|[\\w$]+)(?:\\s*\\.\\s*(?:"[^"]+"|`[^`]+`|[\\w$]+))*';

// Applicability checks and shared regexes. Every pattern is matched against
// masked text, so literal and comment bodies never trigger them.
export const SQL_PATTERNS = {
  // DDL
  CREATE_TABLE: /\bCREATE\s+(?:GLOBAL\s+TEMPORARY\s+)?TABLE\b/i,
  ALTER_TABLE: /\bALTER\s+TABLE\b/i,
  TABLE_DDL: /\b(?:CREATE|ALTER)\s+(?:GLOBAL\s+TEMPORARY\s+)?(?:TABLE|(?:UNIQUE\s+|BITMAP\s+)?INDEX)\b/i,
  CREATE_SEQUENCE: /\bCREATE\s+SEQUENCE\b/i,
  SEQUENCE_DDL: /\b(?:CREATE|DROP|ALTER)\s+SEQUENCE\b/i,
  SEQUENCE_REFERENCE: /\.\s*(?:NEXTVAL|CURRVAL)\b|\b(?:NEXTVAL|CURRVAL|LASTVAL)\s*\(|\bAUTO_INCREMENT\b|\b(?:BIG|SMALL)?SERIAL\b|\bGENERATED\s+(?:ALWAYS|BY\s+DEFAULT)\s+AS\s+IDENTITY\b/i,
  INDEX_DDL: /\b(?:CREATE|DROP|ALTER)\s+(?:UNIQUE\s+|BITMAP\s+)?INDEX\b/i,
  MATERIALIZED_VIEW: /\bMATERIALIZED\s+VIEW\b|\bDBMS_MVIEW\s*\.\s*REFRESH\b/i,
  SYNONYM: /\b(?:CREATE|DROP)\s+(?:OR\s+REPLACE\s+)?(?:PUBLIC\s+)?SYNONYM\b/i,
  CREATE_VIEW: /\bCREATE\s+(?:OR\s+REPLACE\s+)?(?:(?:NO\s*)?FORCE\s+)?VIEW\b/i,
  TRIGGER: /\bCREATE\s+(?:OR\s+REPLACE\s+)?TRIGGER\b/i,
  USER_DEFINED_TYPE: /\bCREATE\s+(?:OR\s+REPLACE\s+)?TYPE\b|%(?:ROW)?TYPE\b|\bREF\s+\w+/i,
  DATABASE_LINK: /\bDATABASE\s+LINK\b|\w@\w/i,

  // DML and queries
  MERGE: /\bMERGE\s+INTO\b/i,
  UPSERT: /\bON\s+CONFLICT\b|\bON\s+DUPLICATE\s+KEY\s+UPDATE\b|\bINSERT\s+IGNORE\b|\bREPLACE\s+INTO\b/i,
  WITH_CLAUSE: /(?:^|[\s(;])WITH\s+(?:RECURSIVE\s+)?[\w"`]+\s*(?:\([^)]*\)\s*)?AS\s*\(/i,
  CONNECT_BY: /\bCONNECT\s+BY\b|\bSTART\s+WITH\b/i,
  PIVOT: /\b(?:UN)?PIVOT\s*\(/i,
  WINDOW_EXTENSION: /\bKEEP\s*\(|\bLISTAGG\s*\(|\bGROUP_CONCAT\s*\(|\bSTRING_AGG\s*\(|\bPERCENTILE_(?:CONT|DISC)\s*\(|\bRATIO_TO_REPORT\s*\(|\bIGNORE\s+NULLS\b/i,
  DATE_ARITHMETIC: /\bADD_MONTHS\s*\(|\bMONTHS_BETWEEN\s*\(|\bDATE_(?:ADD|SUB)\s*\(|\bSYSDATE\s*[+-]\s*\d|\bINTERVAL\b/i,
  PACKAGE_CALL: /\b(?:DBMS_\w+|UTL_\w+)\s*\.|\bRAISE_APPLICATION_ERROR\s*\(/i,
  ROWNUM: /\bROWNUM\b/i,
  LIMIT: /\bLIMIT\s+\d+/i,
  DUAL: /\bFROM\s+DUAL\b/i,
  ORACLE_OUTER_JOIN: /\(\s*\+\s*\)/,
  RETURNING: /\bRETURNING\b/i,
  HINT: /\/\*\+[\s\S]*?\*\//,
  PG_CAST: /::\s*[A-Za-z]/,
  CONCAT_OPERATOR: /\|\|/,

  // Misc
  SELECT_STAR: /\bSELECT\s+(?:DISTINCT\s+)?\*\s+FROM\b/i,
  LEADING_WILDCARD_LIKE: /\bLIKE\s+'%/i,
  IN_LIST: /\bIN\s*\(/gi,
};

/** Words the structural parser rejects as bare column names. */
export const RESERVED_IDENTIFIERS = [
  'USER',
  'DATE',
  'TIME',
  'ORDER',
  'GROUP',
  'INDEX',
  'KEY',
  'VALUE',
  'LEVEL',
  'COMMENT',
  'STATUS',
  'TYPE',
  'NAME',
  'SIZE',
];

/** Keywords whose disappearance suggests a rule deleted too much. */
export const CRITICAL_KEYWORDS = ['WHERE', 'GROUP BY', 'ORDER BY', 'HAVING', 'DISTINCT'];

/** Oracle-only constructs that should be gone after converting to another dialect. */
export const ORACLE_LEFTOVERS: ReadonlyArray<{ label: string; pattern: RegExp }> = [
  { label: 'NVL(', pattern: /\bNVL\s*\(/i },
  { label: 'DECODE(', pattern: /\bDECODE\s*\(/i },
  { label: 'ROWNUM', pattern: /\bROWNUM\b/i },
  { label: 'SYSDATE', pattern: /\bSYSDATE\b/i },
  { label: 'CONNECT BY', pattern: /\bCONNECT\s+BY\b/i },
  { label: '(+)', pattern: /\(\s*\+\s*\)/ },
];

export const DEPRECATED_SYNTAX: ReadonlyArray<{ label: string; pattern: RegExp; suggestion: string }> = [
  { label: 'LONG data type', pattern: /\bLONG(?:\s+RAW)?\b(?!\s*\()/i, suggestion: 'Use CLOB/BLOB or TEXT/BYTEA instead' },
  { label: 'WM_CONCAT', pattern: /\bWM_CONCAT\s*\(/i, suggestion: 'Use LISTAGG, STRING_AGG or GROUP_CONCAT' },
  { label: 'Oracle (+) outer join', pattern: /\(\s*\+\s*\)/, suggestion: 'Use ANSI LEFT/RIGHT JOIN syntax' },
];

export const AGGREGATE_FUNCTIONS = ['COUNT', 'SUM', 'AVG', 'MIN', 'MAX', 'LISTAGG', 'GROUP_CONCAT', 'STRING_AGG', 'ARRAY_AGG'];

/** Words followed by `(` that are not function calls. */
export const NON_FUNCTION_WORDS = new Set([
  'IN', 'EXISTS', 'VALUES', 'AS', 'ON', 'AND', 'OR', 'NOT', 'FROM', 'JOIN', 'USING', 'OVER', 'INTO', 'TABLE',
  'WHERE', 'SELECT', 'KEY', 'CHECK', 'UNIQUE', 'REFERENCES', 'INDEX', 'WITH', 'RECURSIVE', 'ALL', 'ANY', 'SOME',
  'WHEN', 'THEN', 'ELSE', 'IF', 'VIEW', 'SET', 'BY', 'CONFLICT', 'PARTITION', 'PIVOT', 'UNPIVOT', 'KEEP', 'FOR',
  'VARCHAR', 'VARCHAR2', 'NVARCHAR2', 'CHAR', 'NCHAR', 'NUMBER', 'NUMERIC', 'DECIMAL', 'INT', 'INTEGER', 'BIGINT',
  'SMALLINT', 'TINYINT', 'FLOAT', 'DOUBLE', 'RAW', 'VARBINARY', 'BINARY', 'TIMESTAMP', 'DATETIME', 'TIME', 'ENUM',
]);
