import { DEFAULT_RULE_CONFIG, type RuleConfig } from '../config/ruleConfig';
import type { ConversionWarning, Dialect, StepResult } from '../types/sql';
import { createLogger } from '../utils/logger';
import { findClosingParen, mapSegments, maskSql, splitTopLevelRaw, type MaskedSql } from '../utils/sqlText';
import { SQL_PATTERNS } from './sqlPatterns';
import { createWarning } from './warnings';

const logger = createLogger('preprocess');

export interface PreprocessOptions {
  source?: Dialect;
  config?: Readonly<RuleConfig>;
}

interface ProcessorContext {
  source: Dialect;
  target: Dialect;
  config: Readonly<RuleConfig>;
  mask: MaskedSql;
  warnings: ConversionWarning[];
}

interface Processor {
  name: string;
  enabled(ctx: ProcessorContext): boolean;
  apply(text: string, ctx: ProcessorContext): string;
}

// Options that may follow one another in the physical-attributes tail of a
// table or index definition.
const PHYSICAL_OPTION = [
  '(?:NO)?(?:LOGGING|COMPRESS|PARALLEL|CACHE|MONITORING|ROWDEPENDENCIES)\\b',
  'PCTFREE\\b',
  'PCTUSED\\b',
  'INITRANS\\b',
  'MAXTRANS\\b',
  'STORAGE\\s*\\(',
  'TABLESPACE\\b',
  'SEGMENT\\s+CREATION\\b',
  'RESULT_CACHE\\b',
  '(?:ENABLE|DISABLE)\\s+ROW\\s+MOVEMENT\\b',
  '(?:NO\\s+)?FLASHBACK\\s+ARCHIVE\\b',
  'LOB\\s*\\(',
  'PARTITION\\s+BY\\b',
].join('|');

/** A bare physical keyword counts only when another option, `;`, `)` or the end follows it. */
const TAIL = `(?=\\s*(?:;|\\)|$|${PHYSICAL_OPTION}))`;

const tailed = (body: string) => new RegExp(`\\s+(?:${body})${TAIL}`, 'gi');

/** Constraint states follow a column list, NOT NULL, or a deferral clause. */
const CONSTRAINT_END = '(?<=\\)|\\bNULL|\\bKEY|\\bUNIQUE|\\bDEFERRABLE|\\bDEFERRED|\\bIMMEDIATE)';

const isTableDdl = (segment: string) =>
  SQL_PATTERNS.TABLE_DDL.test(segment) || /\bCREATE\s+MATERIALIZED\s+VIEW\b/i.test(segment);

const inTableDdl = (text: string, transform: (segment: string) => string) =>
  mapSegments(text, isTableDdl, transform);

const notOracleTarget = (ctx: ProcessorContext) => ctx.target !== 'oracle';

function stripPartitionClause(segment: string): string {
  const start = /\s+PARTITION\s+BY\s+(?:RANGE|LIST|HASH)\s*\(/i.exec(segment);
  if (!start) return segment;
  let end = findClosingParen(segment, start.index + start[0].length - 1);
  if (end === -1) return segment;
  // INTERVAL (...), SUBPARTITION BY ... (...) and the partition list itself
  for (;;) {
    const rest = segment.slice(end + 1);
    const next = /^\s*(?:INTERVAL\s*|SUBPARTITION\s+BY\s+\w+\s*|SUBPARTITIONS\s+\d+\s*|STORE\s+IN\s*)?\(/i.exec(rest);
    if (!next) break;
    const close = findClosingParen(segment, end + 1 + next[0].length - 1);
    if (close === -1) break;
    end = close;
  }
  return segment.slice(0, start.index) + segment.slice(end + 1);
}

function moveMysqlInlineComments(segment: string, ctx: ProcessorContext): string {
  const header = /\bCREATE\s+(?:TEMPORARY\s+)?TABLE\s+(?:IF\s+NOT\s+EXISTS\s+)?([\w$.`"]+)\s*\(/i.exec(segment);
  if (!header) return segment;
  const open = header.index + header[0].length - 1;
  const close = findClosingParen(segment, open);
  if (close === -1) return segment;

  const table = header[1].replace(/[`]/g, '');
  const statements: string[] = [];
  const columns = splitTopLevelRaw(segment.slice(open + 1, close)).map(column => {
    const comment = /\s+COMMENT\s+('[^']*')/i.exec(column);
    const name = /^\s*([`"]?)([\w$]+)\1/.exec(column);
    if (!comment || !name) return column;
    statements.push(`COMMENT ON COLUMN ${table}.${name[2]} IS ${comment[1]};`);
    return column.slice(0, comment.index) + column.slice(comment.index + comment[0].length);
  });

  let tail = segment.slice(close + 1);
  const tableComment = /\s*COMMENT\s*=?\s*('[^']*')/i.exec(tail);
  if (tableComment) {
    statements.unshift(`COMMENT ON TABLE ${table} IS ${tableComment[1]};`);
    tail = tail.slice(0, tableComment.index) + tail.slice(tableComment.index + tableComment[0].length);
  }
  if (statements.length === 0) return segment;

  ctx.warnings.push(
    createWarning('syntax-difference', 'Inline COMMENT clauses moved to COMMENT ON statements', 'info'),
  );
  const rebuilt = segment.slice(0, open + 1) + columns.join(',') + ')' + tail;
  const terminated = rebuilt.trimEnd().endsWith(';') ? rebuilt.trimEnd() : `${rebuilt.trimEnd()};`;
  return `${terminated}\n${statements.join('\n')}`;
}

const PROCESSORS: Processor[] = [
  {
    name: 'Partition clause',
    enabled: ctx => ctx.source === 'oracle' && notOracleTarget(ctx),
    apply(text, ctx) {
      if (!/\bPARTITION\s+BY\s+(?:RANGE|LIST|HASH)\b/i.test(text)) return text;
      if (!ctx.config.ddl.convertPartitions) {
        ctx.warnings.push(
          createWarning(
            'partial-support',
            'Oracle partition clause kept as written',
            'warning',
            'Review the partitioning scheme for the target database or enable convertPartitions',
          ),
        );
        return text;
      }
      ctx.warnings.push(
        createWarning(
          'partial-support',
          'Oracle partition clause removed',
          'warning',
          'Recreate partitions with the target database partitioning syntax',
        ),
      );
      return inTableDdl(text, stripPartitionClause);
    },
  },
  {
    name: 'LOCAL/GLOBAL index qualifier',
    enabled: ctx => notOracleTarget(ctx) && ctx.config.ddl.removePhysicalAttributes,
    apply(text, ctx) {
      return mapSegments(
        text,
        segment => SQL_PATTERNS.INDEX_DDL.test(segment),
        segment => {
          const found = /\)\s*(LOCAL|GLOBAL)\b\s*/i.exec(segment);
          if (!found) return segment;
          const start = found.index + 1;
          let end = found.index + found[0].length;
          if (/^\(/.test(segment.slice(end))) {
            const close = findClosingParen(segment, end);
            if (close !== -1) end = close + 1;
          }
          ctx.warnings.push(
            createWarning(
              'partial-support',
              `${found[1].toUpperCase()} partitioned index qualifier removed`,
              'info',
              'Partitioned indexes follow the table partitioning in the target database',
            ),
          );
          const rest = segment.slice(end);
          return segment.slice(0, start) + (/^\s*(?:;|$)/.test(rest) ? '' : ' ') + rest.trimStart();
        },
      );
    },
  },
  {
    name: 'LOB storage clause',
    enabled: ctx => notOracleTarget(ctx) && ctx.config.ddl.removeStorageClause,
    apply(text) {
      return inTableDdl(text, segment => {
        let out = segment;
        for (;;) {
          const lob = /\s+LOB\s*\([^)]*\)\s*STORE\s+AS\s*(?:(?:SECUREFILE|BASICFILE)\s*)?(?:[\w$"]+\s*)?/i.exec(out);
          if (!lob) break;
          let end = lob.index + lob[0].length;
          if (out[end] === '(') {
            const close = findClosingParen(out, end);
            if (close !== -1) end = close + 1;
          }
          out = out.slice(0, lob.index) + out.slice(end);
        }
        return out.replace(tailed('SECUREFILE|BASICFILE'), '');
      });
    },
  },
  {
    name: 'TABLESPACE clause',
    enabled: ctx => ctx.target === 'mysql' && ctx.config.ddl.removeTablespace,
    apply(text) {
      return inTableDdl(text, segment =>
        segment.replace(/(?:\s+USING\s+INDEX)?\s+TABLESPACE\s+(?:"[^"]+"|[\w$]+)/gi, ''),
      );
    },
  },
  {
    name: 'STORAGE clause',
    enabled: ctx => notOracleTarget(ctx) && ctx.config.ddl.removeStorageClause,
    apply(text) {
      return inTableDdl(text, segment => {
        let out = segment;
        for (;;) {
          const storage = /\s+STORAGE\s*\(/i.exec(out);
          if (!storage) break;
          const close = findClosingParen(out, storage.index + storage[0].length - 1);
          if (close === -1) break;
          out = out.slice(0, storage.index) + out.slice(close + 1);
        }
        return out;
      });
    },
  },
  {
    name: 'Block space parameters',
    enabled: ctx => notOracleTarget(ctx) && ctx.config.ddl.removePhysicalAttributes,
    apply(text) {
      return inTableDdl(text, segment => segment.replace(/\s+(?:PCTFREE|PCTUSED|INITRANS|MAXTRANS)\s+\d+/gi, ''));
    },
  },
  {
    name: 'Constraint state',
    enabled: ctx => notOracleTarget(ctx) && ctx.config.ddl.convertConstraints,
    apply(text, ctx) {
      return inTableDdl(text, segment => {
        if (new RegExp(`${CONSTRAINT_END}\\s+DISABLE\\b(?!\\s+ROW\\s+MOVEMENT)`, 'i').test(segment)) {
          ctx.warnings.push(
            createWarning(
              'manual-review-needed',
              'Disabled constraint will be enforced in the target database',
              'warning',
              'Drop the constraint after migration if it must stay disabled',
            ),
          );
        }
        return segment.replace(
          new RegExp(
            `${CONSTRAINT_END}\\s+(?:(?:NO)?RELY\\s+)?(?:ENABLE|DISABLE)(?:\\s+(?:NO)?VALIDATE)?(?!\\s+ROW\\s+MOVEMENT)(?=\\s*(?:,|\\)|;|$))`,
            'gi',
          ),
          '',
        );
      });
    },
  },
  {
    name: 'Table compression',
    enabled: ctx => notOracleTarget(ctx) && ctx.config.ddl.removePhysicalAttributes,
    apply(text) {
      return inTableDdl(text, segment =>
        segment
          .replace(
            /\s+(?:ROW\s+STORE\s+)?COMPRESS\s+(?:FOR\s+(?:OLTP|ALL\s+OPERATIONS|DIRECT_LOAD\s+OPERATIONS|(?:QUERY|ARCHIVE)\s+(?:LOW|HIGH))|ADVANCED|BASIC|\d+)/gi,
            '',
          )
          .replace(tailed('(?:NO)?COMPRESS'), ''),
      );
    },
  },
  {
    name: 'COMMENT ON',
    enabled: ctx => ctx.config.ddl.convertComments,
    apply(text, ctx) {
      if (ctx.target !== 'mysql') {
        if (ctx.source !== 'mysql') return text;
        return mapSegments(
          text,
          segment => SQL_PATTERNS.CREATE_TABLE.test(segment) && /\bCOMMENT\b/i.test(segment),
          segment => moveMysqlInlineComments(segment, ctx),
        );
      }
      return text
        .replace(
          /\bCOMMENT\s+ON\s+TABLE\s+([\w$.`"]+)\s+IS\s+('[^']*')/gi,
          (_match, table: string, comment: string) => `ALTER TABLE ${table} COMMENT = ${comment}`,
        )
        .replace(
          /\bCOMMENT\s+ON\s+COLUMN\s+([\w$.`"]+)\s+IS\s+('[^']*')\s*;?/gi,
          (_match, column: string, comment: string) => {
            const content = ctx.mask.literalValue(comment) ?? '';
            const safe = ctx.mask.addLiteral(content.replace(/\*\//g, '* /'));
            ctx.warnings.push(
              createWarning(
                'syntax-difference',
                `Column comment on ${column} commented out`,
                'info',
                `Add COMMENT ${safe} to the column definition in ALTER TABLE ... MODIFY COLUMN`,
              ),
            );
            return `/* COMMENT ON COLUMN ${column} IS ${safe} */`;
          },
        );
    },
  },
  {
    name: 'Schema prefix',
    enabled: ctx => ctx.config.ddl.removeSchemaPrefix,
    apply(text) {
      const ident = '(?:"[^"]+"|`[^`]+`|[\\w$]+)';
      // Every qualifier up to the object name, so a.b.c loses a.b. at once
      const qualifiers = `(?:${ident}\\.)+`;
      return text
        .replace(
          new RegExp(
            `(\\b(?:CREATE|ALTER|DROP|TRUNCATE)\\s+(?:GLOBAL\\s+TEMPORARY\\s+)?TABLE\\s+(?:IF\\s+(?:NOT\\s+)?EXISTS\\s+)?)${qualifiers}(?=${ident})`,
            'gi',
          ),
          '$1',
        )
        .replace(new RegExp(`(\\bREFERENCES\\s+)${qualifiers}(?=${ident})`, 'gi'), '$1')
        .replace(
          new RegExp(`(\\bCOMMENT\\s+ON\\s+TABLE\\s+)${qualifiers}(?=${ident}\\s)`, 'gi'),
          '$1',
        )
        .replace(
          new RegExp(`(\\bCOMMENT\\s+ON\\s+COLUMN\\s+)${qualifiers}(?=${ident}\\.${ident})`, 'gi'),
          '$1',
        )
        .replace(
          new RegExp(`(\\bINDEX\\s+${ident}\\s+ON\\s+)${qualifiers}(?=${ident})`, 'gi'),
          '$1',
        );
    },
  },
  {
    name: 'SEGMENT CREATION',
    enabled: ctx => notOracleTarget(ctx) && ctx.config.ddl.removePhysicalAttributes,
    apply(text) {
      return inTableDdl(text, segment => segment.replace(/\s+SEGMENT\s+CREATION\s+(?:IMMEDIATE|DEFERRED)/gi, ''));
    },
  },
  {
    name: 'LOGGING clause',
    enabled: ctx => notOracleTarget(ctx) && ctx.config.ddl.removePhysicalAttributes,
    apply(text) {
      return inTableDdl(text, segment => segment.replace(tailed('(?:NO)?LOGGING'), ''));
    },
  },
  {
    name: 'PARALLEL clause',
    enabled: ctx => notOracleTarget(ctx) && ctx.config.ddl.removePhysicalAttributes,
    apply(text) {
      return inTableDdl(text, segment =>
        segment.replace(/\s+PARALLEL\s+\d+/gi, '').replace(tailed('(?:NO)?PARALLEL'), ''),
      );
    },
  },
  {
    name: 'CACHE clause',
    enabled: ctx => notOracleTarget(ctx) && ctx.config.ddl.removePhysicalAttributes,
    apply(text) {
      return inTableDdl(text, segment => segment.replace(tailed('(?:NO)?CACHE'), ''));
    },
  },
  {
    name: 'RESULT_CACHE',
    enabled: ctx => notOracleTarget(ctx) && ctx.config.ddl.removePhysicalAttributes,
    apply(text) {
      return inTableDdl(text, segment =>
        segment
          .replace(/\s+RESULT_CACHE\s*\(\s*MODE\s+\w+\s*\)/gi, '')
          .replace(tailed('RESULT_CACHE'), ''),
      );
    },
  },
  {
    name: 'ROWDEPENDENCIES',
    enabled: ctx => notOracleTarget(ctx) && ctx.config.ddl.removePhysicalAttributes,
    apply(text) {
      return inTableDdl(text, segment => segment.replace(tailed('(?:NO)?ROWDEPENDENCIES'), ''));
    },
  },
  {
    name: 'MONITORING',
    enabled: ctx => notOracleTarget(ctx) && ctx.config.ddl.removePhysicalAttributes,
    apply(text) {
      return inTableDdl(text, segment => segment.replace(tailed('(?:NO)?MONITORING'), ''));
    },
  },
  {
    name: 'DEFAULT SYSDATE',
    enabled: ctx => notOracleTarget(ctx) && ctx.config.function.convertDateFunctions,
    apply(text) {
      return text.replace(/\bDEFAULT\s+(?:SYSDATE|SYSTIMESTAMP)\b/gi, 'DEFAULT CURRENT_TIMESTAMP');
    },
  },
  {
    name: 'FLASHBACK ARCHIVE',
    enabled: ctx => notOracleTarget(ctx) && ctx.config.ddl.removePhysicalAttributes,
    apply(text, ctx) {
      return inTableDdl(text, segment => {
        const out = segment
          .replace(/\s+NO\s+FLASHBACK\s+ARCHIVE\b/gi, '')
          .replace(/\s+FLASHBACK\s+ARCHIVE(?:\s+(?!ENABLE\b|DISABLE\b)(?:"[^"]+"|[\w$]+))?/gi, '');
        if (out !== segment && /\bFLASHBACK\s+ARCHIVE\s+(?!ENABLE\b|DISABLE\b)[\w$"]/i.test(segment)) {
          ctx.warnings.push(
            createWarning(
              'unsupported-function',
              'Flashback data archive has no equivalent in the target database',
              'warning',
              'Use audit tables or temporal tables to keep row history',
            ),
          );
        }
        return out;
      });
    },
  },
  {
    name: 'ROW MOVEMENT',
    enabled: ctx => notOracleTarget(ctx) && ctx.config.ddl.removePhysicalAttributes,
    apply(text) {
      return inTableDdl(text, segment => segment.replace(/\s+(?:ENABLE|DISABLE)\s+ROW\s+MOVEMENT\b/gi, ''));
    },
  },
  {
    name: 'MySQL table options',
    enabled: ctx => ctx.source === 'mysql' && ctx.target !== 'mysql' && ctx.config.ddl.removePhysicalAttributes,
    apply(text, ctx) {
      return inTableDdl(text, segment => {
        const start = /\s+AUTO_INCREMENT\s*=\s*(\d+)/i.exec(segment);
        if (start && start[1] !== '1') {
          ctx.warnings.push(
            createWarning(
              'manual-review-needed',
              `Initial AUTO_INCREMENT value ${start[1]} dropped`,
              'info',
              `Restart the identity or sequence at ${start[1]} after creating the table`,
            ),
          );
        }
        return segment
          .replace(/\s+ENGINE\s*=\s*\w+/gi, '')
          .replace(/\s+(?:DEFAULT\s+)?(?:CHARSET|CHARACTER\s+SET)\s*=?\s*\w+/gi, '')
          .replace(/\s+(?:DEFAULT\s+)?COLLATE\s*=?\s*\w+/gi, '')
          .replace(/\s+AUTO_INCREMENT\s*=\s*\d+/gi, '')
          .replace(/\s+ROW_FORMAT\s*=\s*\w+/gi, '');
      });
    },
  },
];

/**
 * Strip and adapt source-only physical syntax ahead of structural parsing.
 *
 * Processors run in a fixed order: schema prefixes are removed only after
 * tablespace clauses are gone. Running the pipeline twice gives the same text
 * as running it once.
 */
export function preprocess(sql: string, target: Dialect, options: PreprocessOptions = {}): StepResult {
  const config = options.config ?? DEFAULT_RULE_CONFIG;
  const source = options.source ?? 'oracle';
  const mask = maskSql(sql, { backslashEscapes: source === 'mysql' });
  const ctx: ProcessorContext = { source, target, config, mask, warnings: [] };
  const appliedRules: string[] = [];

  let text = mask.text;
  for (const processor of PROCESSORS) {
    if (!processor.enabled(ctx)) continue;
    const before = text;
    text = processor.apply(text, ctx);
    if (text !== before) {
      appliedRules.push(`Preprocess: ${processor.name}`);
      logger.debug(`${processor.name} applied`);
    }
  }

  text = text.replace(/\n[ \t]*\n(?:[ \t]*\n)+/g, '\n\n').trim();
  return { sql: mask.unmask(text), warnings: ctx.warnings, appliedRules };
}
