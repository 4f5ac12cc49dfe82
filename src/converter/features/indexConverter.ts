import type { StepResult } from '../../types/sql';
import {
  findClosingParen,
  mapSegments,
  splitTerminator,
  splitTopLevel,
  splitTopLevelRaw,
  unqualified,
} from '../../utils/sqlText';
import { StepRecorder, type ConversionContext, type FeatureConverter } from '../context';
import { IDENTIFIER, SQL_PATTERNS } from '../sqlPatterns';
import { createWarning } from '../warnings';

const INLINE_INDEX =
  /^(\s*)(UNIQUE\s+|FULLTEXT\s+|SPATIAL\s+)?(?:INDEX|KEY)(?:\s+(?!USING\b)("[^"]+"|`[^`]+`|[\w$]+))?\s*(?:USING\s+\w+\s*)?\(([\s\S]*)\)(?:\s+USING\s+\w+)?(?:\s+(?:IN)?VISIBLE)?\s*$/i;

// `key VARCHAR(10)` is a column named key, not an index
const COLUMN_TYPE =
  /^(?:N?VARCHAR2?|N?CHAR|(?:TINY|SMALL|MEDIUM|BIG)?INT(?:EGER)?|DECIMAL|NUMERIC|NUMBER|FLOAT|DOUBLE|REAL|BIT|BINARY|VARBINARY|TIMESTAMP|DATETIME|TIME|YEAR|ENUM|SET)$/i;

/** MySQL prefix lengths such as `name(20)` are index-only syntax. */
function stripPrefixLengths(columns: string): { columns: string; stripped: boolean } {
  let stripped = false;
  const parts = splitTopLevel(columns).map(part =>
    part.replace(/^((?:"[^"]+"|`[^`]+`|[\w$]+))\s*\(\s*\d+\s*\)/, (_match, column: string) => {
      stripped = true;
      return column;
    }),
  );
  return { columns: parts.join(', '), stripped };
}

/**
 * Index DDL: vendor-only index kinds and options, MySQL inline index
 * definitions, and DROP INDEX differences.
 */
export class IndexConverter implements FeatureConverter {
  readonly name = 'index';

  applies(masked: string, ctx: ConversionContext): boolean {
    if (!ctx.config.ddl.convertIndexes) return false;
    return (
      SQL_PATTERNS.INDEX_DDL.test(masked) ||
      (ctx.source === 'mysql' && SQL_PATTERNS.CREATE_TABLE.test(masked) && /\b(?:INDEX|KEY)\s+[\w$`"]*\s*\(/i.test(masked))
    );
  }

  convert(masked: string, ctx: ConversionContext): StepResult {
    const recorder = new StepRecorder();
    let sql = mapSegments(
      masked,
      segment => SQL_PATTERNS.INDEX_DDL.test(segment),
      segment => {
        if (/^\s*DROP\s+INDEX\b/i.test(segment)) return this.convertDrop(segment, ctx, recorder);
        return ctx.source === 'mysql'
          ? this.fromMysql(segment, ctx, recorder)
          : this.fromOracleOrPostgres(segment, ctx, recorder);
      },
    );
    if (ctx.source === 'mysql' && ctx.target !== 'mysql') {
      sql = mapSegments(
        sql,
        segment => SQL_PATTERNS.CREATE_TABLE.test(segment),
        segment => this.extractInlineIndexes(segment, ctx, recorder),
      );
    }
    return recorder.result(sql);
  }

  private fromOracleOrPostgres(segment: string, ctx: ConversionContext, recorder: StepRecorder): string {
    if (ctx.target === 'oracle') return this.fromPostgresToOracle(segment, recorder);
    let sql = segment;

    sql = sql.replace(/\b(CREATE\s+(?:UNIQUE\s+)?)BITMAP\s+(INDEX)\b/i, (_match, create: string, index: string) => {
      recorder.rule('Index: BITMAP removed');
      recorder.warn(
        createWarning(
          'unsupported-function',
          `BITMAP indexes are not supported by ${ctx.target === 'mysql' ? 'MySQL' : 'PostgreSQL'}; a B-tree index was created`,
          'warning',
          ctx.target === 'postgresql'
            ? 'Consider a BRIN index for large, naturally ordered tables or GIN for multi-valued columns'
            : 'Low-cardinality columns rarely benefit from a B-tree index; check the query plans',
        ),
      );
      return create + index;
    });

    sql = sql.replace(/(\))\s+REVERSE\b/i, (_match, paren: string) => {
      recorder.rule('Index: REVERSE removed');
      recorder.warn(
        createWarning(
          'partial-support',
          'REVERSE key indexes are not supported; a regular index was created',
          'warning',
          ctx.target === 'postgresql' ? 'Use USING HASH for equality-only lookups on sequential keys' : undefined,
        ),
      );
      return paren;
    });
    sql = recorder.apply(sql, 'Index: NOREVERSE/NOSORT removed', text => text.replace(/\s+\b(?:NOREVERSE|NOSORT)\b/gi, ''));
    sql = recorder.apply(sql, 'Index: COMPUTE STATISTICS removed', text =>
      text.replace(/\s+COMPUTE\s+STATISTICS\b/gi, ''),
    );

    if (/\)[^()]*\bONLINE\b/i.test(sql)) {
      sql = sql.replace(/(\)[^()]*?)\s+ONLINE\b/i, '$1');
      if (ctx.target === 'postgresql') {
        sql = sql.replace(/\b(CREATE\s+(?:UNIQUE\s+)?INDEX)\b(?!\s+CONCURRENTLY)/i, '$1 CONCURRENTLY');
        recorder.rule('Index: ONLINE → CONCURRENTLY');
      } else {
        recorder.rule('Index: ONLINE removed');
        recorder.warn(createWarning('syntax-difference', 'InnoDB builds secondary indexes online by default', 'info'));
      }
    }

    if (ctx.target === 'postgresql') {
      sql = sql.replace(/(\))\s+(?:IN)?VISIBLE\b/i, (_match, paren: string) => {
        recorder.rule('Index: VISIBLE/INVISIBLE removed');
        recorder.warn(
          createWarning('unsupported-function', 'Invisible indexes are not supported by PostgreSQL', 'warning'),
        );
        return paren;
      });
    }

    if (ctx.target === 'mysql' && ctx.source === 'postgresql') {
      sql = recorder.apply(sql, 'Index: CONCURRENTLY removed', text => text.replace(/(\bINDEX)\s+CONCURRENTLY\b/i, '$1'));
      sql = this.dropAccessMethod(sql, recorder);
    }
    if (ctx.target === 'mysql') sql = this.wrapExpressions(sql, recorder);
    return sql;
  }

  /** MySQL 8 takes functional key parts only inside their own parentheses. */
  private wrapExpressions(segment: string, recorder: StepRecorder): string {
    const on = new RegExp(`\\bON\\s+${IDENTIFIER}\\s*\\(`, 'i').exec(segment);
    if (!on) return segment;
    const open = on.index + on[0].length - 1;
    const close = findClosingParen(segment, open);
    if (close === -1) return segment;
    const parts = splitTopLevelRaw(segment.slice(open + 1, close));
    let wrapped = false;
    const keyParts = parts.map(part => {
      const trimmed = part.trim();
      if (!/[\w$]\s*\(/.test(trimmed) || /^\(/.test(trimmed)) return part;
      wrapped = true;
      const order = /\s+(ASC|DESC)$/i.exec(trimmed);
      const expr = order ? trimmed.slice(0, order.index) : trimmed;
      return part.replace(trimmed, `(${expr})${order ? ` ${order[1]}` : ''}`);
    });
    if (!wrapped) return segment;
    recorder.rule('Index: functional key parts wrapped');
    return segment.slice(0, open + 1) + keyParts.join(',') + segment.slice(close);
  }

  private fromPostgresToOracle(segment: string, recorder: StepRecorder): string {
    const sql = recorder.apply(segment, 'Index: CONCURRENTLY → ONLINE', text => {
      if (!/\bINDEX\s+CONCURRENTLY\b/i.test(text)) return text;
      const { body, terminator } = splitTerminator(text.replace(/(\bINDEX)\s+CONCURRENTLY\b/i, '$1'));
      return `${body} ONLINE${terminator}`;
    });
    return this.dropAccessMethod(sql, recorder);
  }

  private dropAccessMethod(segment: string, recorder: StepRecorder): string {
    const pattern = new RegExp(`(\\bON\\s+${IDENTIFIER})\\s+USING\\s+(\\w+)\\s*(?=\\()`, 'i');
    return segment.replace(pattern, (_match, on: string, method: string) => {
      recorder.rule('Index: access method removed');
      if (!/^btree$/i.test(method)) {
        recorder.warn(
          createWarning(
            'unsupported-function',
            `${method.toUpperCase()} index access method is not available; a B-tree index was created`,
            'warning',
          ),
        );
      }
      return `${on} `;
    });
  }

  private fromMysql(segment: string, ctx: ConversionContext, recorder: StepRecorder): string {
    if (ctx.target === 'mysql') return segment;
    const head = new RegExp(
      `^(\\s*)CREATE\\s+(UNIQUE\\s+|FULLTEXT\\s+|SPATIAL\\s+)?INDEX\\s+([\\w$\`"]+)(?:\\s+USING\\s+(\\w+))?\\s+ON\\s+(${IDENTIFIER})\\s*\\(`,
      'i',
    ).exec(segment);
    if (!head) return segment;
    const open = head.index + head[0].length - 1;
    const close = findClosingParen(segment, open);
    if (close === -1) return segment;

    const [, lead, kind, name, leadingMethod, table] = head;
    const trailing = /^\s*USING\s+(\w+)/i.exec(segment.slice(close + 1));
    const method = leadingMethod ?? trailing?.[1];
    const rest = segment.slice(close + 1 + (trailing?.[0].length ?? 0)).replace(/^\s+(?:IN)?VISIBLE\b/i, () => {
      if (ctx.target === 'postgresql') {
        recorder.warn(createWarning('unsupported-function', 'Invisible indexes are not supported by PostgreSQL', 'warning'));
        return '';
      }
      return ' INVISIBLE';
    });
    const columns = this.keyColumns(segment.slice(open + 1, close), recorder);
    const index = this.renderIndex(kind, name, table, columns, method, ctx, recorder);
    recorder.rule('Index: MySQL index definition');
    return lead + index + rest;
  }

  private keyColumns(columns: string, recorder: StepRecorder): string {
    const result = stripPrefixLengths(columns);
    if (result.stripped) {
      recorder.warn(
        createWarning(
          'syntax-difference',
          'Index prefix lengths were removed; the whole column value is indexed',
          'warning',
          'Index an expression such as LEFT(col, n) / SUBSTR(col, 1, n) if the key is too long',
        ),
      );
    }
    return result.columns;
  }

  private renderIndex(
    kind: string | undefined,
    name: string,
    table: string,
    columns: string,
    method: string | undefined,
    ctx: ConversionContext,
    recorder: StepRecorder,
  ): string {
    const type = kind?.trim().toUpperCase();
    if (type === 'FULLTEXT') {
      recorder.warn(
        createWarning(
          'syntax-difference',
          'FULLTEXT index converted; MATCH ... AGAINST queries must be rewritten',
          'warning',
          ctx.target === 'postgresql'
            ? "Query with to_tsvector(...) @@ plainto_tsquery('simple', ...)"
            : 'Query with CONTAINS(column, ...) > 0',
        ),
      );
      if (ctx.target === 'postgresql') {
        const document = splitTopLevel(columns)
          .map(column => `coalesce(${column}, ${ctx.mask.addLiteral('')})`)
          .join(` || ${ctx.mask.addLiteral(' ')} || `);
        return `CREATE INDEX ${name} ON ${table} USING GIN (to_tsvector(${ctx.mask.addLiteral('simple')}, ${document}))`;
      }
      return `CREATE INDEX ${name} ON ${table} (${columns}) INDEXTYPE IS CTXSYS.CONTEXT`;
    }
    if (type === 'SPATIAL') {
      recorder.warn(
        createWarning(
          'partial-support',
          'SPATIAL index needs a spatial extension on the target',
          'warning',
          ctx.target === 'postgresql' ? 'Install PostGIS and use geometry columns' : 'Register USER_SDO_GEOM_METADATA first',
        ),
      );
      if (ctx.target === 'postgresql') return `CREATE INDEX ${name} ON ${table} USING GIST (${columns})`;
      return `CREATE INDEX ${name} ON ${table} (${columns}) INDEXTYPE IS MDSYS.SPATIAL_INDEX`;
    }
    const unique = type === 'UNIQUE' ? 'UNIQUE ' : '';
    const using =
      ctx.target === 'postgresql' && method !== undefined && !/^btree$/i.test(method) ? ` USING ${method.toLowerCase()}` : '';
    return `CREATE ${unique}INDEX ${name} ON ${table}${using} (${columns})`;
  }

  /** Move MySQL `INDEX name (cols)` table elements into CREATE INDEX statements. */
  private extractInlineIndexes(segment: string, ctx: ConversionContext, recorder: StepRecorder): string {
    const header = new RegExp(`\\bCREATE\\s+(?:TEMPORARY\\s+)?TABLE\\s+(?:IF\\s+NOT\\s+EXISTS\\s+)?(${IDENTIFIER})\\s*\\(`, 'i').exec(segment);
    if (!header) return segment;
    const open = header.index + header[0].length - 1;
    const close = findClosingParen(segment, open);
    if (close === -1) return segment;
    const table = header[1];

    const kept: string[] = [];
    const created: string[] = [];
    let changed = false;
    for (const element of splitTopLevelRaw(segment.slice(open + 1, close))) {
      const inline = INLINE_INDEX.exec(element);
      if (!inline || (inline[3] !== undefined && COLUMN_TYPE.test(inline[3]))) {
        kept.push(element);
        continue;
      }
      changed = true;
      const [, lead, kind, name, columns] = inline;
      const type = kind?.trim().toUpperCase();
      const keyColumns = this.keyColumns(columns, recorder);
      if (type === 'UNIQUE') {
        kept.push(`${lead}${name ? `CONSTRAINT ${name} ` : ''}UNIQUE (${keyColumns})`);
        continue;
      }
      const indexName = name ?? `${unqualified(table).replace(/["`]/g, '')}_${keyColumns.split(',')[0].trim().replace(/["`]/g, '')}_idx`;
      created.push(this.renderIndex(kind, indexName, table, keyColumns, undefined, ctx, recorder));
    }
    if (!changed) return segment;
    recorder.rule('Index: inline index moved to CREATE INDEX');
    const rebuilt = segment.slice(0, open + 1) + kept.join(',') + segment.slice(close);
    if (created.length === 0) return rebuilt;
    const { body, terminator } = splitTerminator(rebuilt);
    return `${body};\n${created.join(';\n')}${terminator.includes(';') ? terminator : `;${terminator}`}`;
  }

  private convertDrop(segment: string, ctx: ConversionContext, recorder: StepRecorder): string {
    const { body, terminator } = splitTerminator(segment);
    const drop = new RegExp(`^(\\s*)DROP\\s+INDEX\\s+(?:CONCURRENTLY\\s+)?(?:IF\\s+EXISTS\\s+)?(${IDENTIFIER})(?:\\s+ON\\s+(${IDENTIFIER}))?(?:\\s+(?:CASCADE|RESTRICT|FORCE|ONLINE))?\\s*$`, 'i').exec(body);
    if (!drop) return segment;
    const [, lead, name, table] = drop;

    if (ctx.target === 'mysql') {
      if (table) return segment;
      recorder.rule('Index: DROP INDEX flagged');
      recorder.warn(
        createWarning(
          'manual-review-needed',
          `MySQL DROP INDEX requires the table name: DROP INDEX ${unqualified(name)} ON <table>`,
          'warning',
        ),
      );
      return `${lead}DROP INDEX ${unqualified(name)} ${ctx.mask.comment('ON <table> required')}${terminator}`;
    }
    const next = `${lead}DROP INDEX ${ctx.target === 'postgresql' ? 'IF EXISTS ' : ''}${name}${terminator}`;
    if (next !== segment) recorder.rule('Index: DROP INDEX');
    return next;
  }
}
