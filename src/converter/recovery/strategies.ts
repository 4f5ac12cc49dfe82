import type { RuleConfig } from '../../config/ruleConfig';
import type { ConversionWarning, Dialect, RecoveryAttempt } from '../../types/sql';
import { countChar, maskSql, splitTerminator, withMaskedSql } from '../../utils/sqlText';
import { HierarchicalQueryConverter } from '../features/hierarchicalQueryConverter';
import type { ParseFailure } from '../parser';
import { RESERVED_IDENTIFIERS, SQL_PATTERNS } from '../sqlPatterns';
import { createWarning } from '../warnings';

export interface RecoveryContext {
  readonly source: Dialect;
  readonly target: Dialect;
  readonly config: Readonly<RuleConfig>;
}

/** One targeted repair for SQL the structural parser rejected. */
export interface RecoveryStrategy {
  readonly name: string;
  /** Reported with every attempt; never used to skip a strategy. */
  readonly confidence: number;
  canHandle(sql: string, failure: ParseFailure, ctx: RecoveryContext): boolean;
  recover(sql: string, failure: ParseFailure, ctx: RecoveryContext): RecoveryAttempt;
}

const maskOptions = (ctx: RecoveryContext) => ({ backslashEscapes: ctx.source === 'mysql' });

function attempt(
  strategy: RecoveryStrategy,
  sql: string,
  recoveredSql: string,
  warning?: ConversionWarning,
): RecoveryAttempt {
  const base = { strategy: strategy.name, recoveredSql, success: recoveredSql !== sql, confidence: strategy.confidence };
  return warning ? { ...base, warning } : base;
}

const tidy = (text: string) => text.replace(/[ \t]{2,}/g, ' ').replace(/[ \t]+(\r?\n)/g, '$1').trim();

const PHYSICAL_KEYWORD = '(?:NO)?(?:LOGGING|COMPRESS|PARALLEL|MONITORING|ROWDEPENDENCIES|CACHE)';
// Bare physical keywords count only at the end of a statement or ahead of
// another physical option, so a column named `logging` is left alone.
const PHYSICAL_FOLLOW = `(?=\\s*(?:;|$|${PHYSICAL_KEYWORD}\\b|TABLESPACE\\b|STORAGE\\b|PCT(?:FREE|USED)\\b|(?:INI|MAX)TRANS\\b|SEGMENT\\b))`;

const PHYSICAL_ATTRIBUTES = [
  /\bTABLESPACE\s+["`]?[\w$]+["`]?/gi,
  /\bSTORAGE\s*\([^)]*\)/gi,
  /\b(?:PCTFREE|PCTUSED|INITRANS|MAXTRANS)\s+\d+/gi,
  /\bSEGMENT\s+CREATION\s+(?:IMMEDIATE|DEFERRED)\b/gi,
  new RegExp(`\\b(?:NO)?PARALLEL(?:\\s*\\(\\s*(?:DEGREE\\s+)?\\d+\\s*\\)|\\s+\\d+)?${PHYSICAL_FOLLOW}`, 'gi'),
  new RegExp(`\\b${PHYSICAL_KEYWORD}\\b${PHYSICAL_FOLLOW}`, 'gi'),
];

export const physicalAttributeStrategy: RecoveryStrategy = {
  name: 'physical attribute removal',
  confidence: 0.95,
  canHandle(sql, _failure, ctx) {
    const masked = maskSql(sql, maskOptions(ctx)).text;
    return PHYSICAL_ATTRIBUTES.some(pattern => new RegExp(pattern.source, 'i').test(masked));
  },
  recover(sql, _failure, ctx) {
    const recovered = withMaskedSql(
      sql,
      masked => tidy(PHYSICAL_ATTRIBUTES.reduce((text, pattern) => text.replace(pattern, ''), masked)),
      maskOptions(ctx),
    );
    return attempt(
      physicalAttributeStrategy,
      sql,
      recovered,
      createWarning(
        'syntax-difference',
        'Physical storage attributes were removed so the statement could be parsed',
        'info',
        'Configure storage settings separately on the target database',
      ),
    );
  },
};

export const commentRemovalStrategy: RecoveryStrategy = {
  name: 'comment removal',
  confidence: 0.9,
  canHandle(sql, _failure, ctx) {
    return /--|\/\*(?!\+)/.test(maskSql(sql, maskOptions(ctx)).text);
  },
  recover(sql, _failure, ctx) {
    const recovered = withMaskedSql(
      sql,
      masked => tidy(masked.replace(/\/\*(?!\+)[\s\S]*?(?:\*\/|$)/g, ' ').replace(/--[^\n]*/g, '')),
      maskOptions(ctx),
    );
    return attempt(commentRemovalStrategy, sql, recovered, createWarning('syntax-difference', 'Comments were removed', 'info'));
  },
};

export const hintRemovalStrategy: RecoveryStrategy = {
  name: 'hint removal',
  confidence: 0.85,
  canHandle(sql, _failure, ctx) {
    return SQL_PATTERNS.HINT.test(maskSql(sql, maskOptions(ctx)).text);
  },
  recover(sql, _failure, ctx) {
    const recovered = withMaskedSql(sql, masked => tidy(masked.replace(/\/\*\+[\s\S]*?\*\//g, ' ')), maskOptions(ctx));
    return attempt(
      hintRemovalStrategy,
      sql,
      recovered,
      createWarning(
        'unsupported-function',
        'Optimizer hints were removed',
        'warning',
        'Replace hint-driven plans with indexes or the target database hint syntax',
      ),
    );
  },
};

export const parenthesisBalanceStrategy: RecoveryStrategy = {
  name: 'parenthesis balance repair',
  confidence: 0.7,
  canHandle(sql, _failure, ctx) {
    const masked = maskSql(sql, maskOptions(ctx)).text;
    return countChar(masked, '(') !== countChar(masked, ')');
  },
  recover(sql, _failure, ctx) {
    const recovered = withMaskedSql(
      sql,
      masked => {
        const open = countChar(masked, '(');
        const close = countChar(masked, ')');
        if (open > close) {
          const { body, terminator } = splitTerminator(masked);
          return `${body}${')'.repeat(open - close)}${terminator}`;
        }
        return `${'('.repeat(close - open)}${masked}`;
      },
      maskOptions(ctx),
    );
    return attempt(
      parenthesisBalanceStrategy,
      sql,
      recovered,
      createWarning(
        'syntax-difference',
        'Unbalanced parentheses were closed automatically',
        'warning',
        'Check where the added parentheses belong',
      ),
    );
  },
};

export const stringEscapeStrategy: RecoveryStrategy = {
  name: 'string escape repair',
  confidence: 0.6,
  canHandle(sql, failure, ctx) {
    const masked = maskSql(sql, maskOptions(ctx)).text;
    return countChar(masked, "'") % 2 !== 0 || /unterminated|string/i.test(failure.message);
  },
  recover(sql, _failure, ctx) {
    const masked = maskSql(sql, maskOptions(ctx)).text;
    const recovered = countChar(masked, "'") % 2 !== 0 ? `${sql}'` : sql;
    return attempt(
      stringEscapeStrategy,
      sql,
      recovered,
      createWarning('syntax-difference', 'An unterminated string literal was closed', 'warning'),
    );
  },
};

const RESERVED = RESERVED_IDENTIFIERS.join('|');
// KEY and INDEX open index definitions in MySQL column lists
const RESERVED_COLUMN = RESERVED_IDENTIFIERS.filter(word => word !== 'KEY' && word !== 'INDEX').join('|');

// A reserved word standing where a column name goes: after a qualifier dot,
// as a select-list item, as a column definition, or left of a comparison.
const RESERVED_AS_COLUMN = [
  new RegExp(`(\\.)(${RESERVED})\\b`, 'gi'),
  new RegExp(`((?:^|[,(]|\\bSELECT)\\s*)(${RESERVED})(?=\\s*(?:[,)]|\\bFROM\\b|$))`, 'gi'),
  new RegExp(
    `((?:^|[,(])\\s*)(${RESERVED_COLUMN})(?=\\s+(?!BY\\b)[A-Z]\\w*\\s*(?:\\(|,|\\)|\\bNOT\\b|\\bNULL\\b|\\bDEFAULT\\b))`,
    'gi',
  ),
  new RegExp(`(\\b(?:WHERE|AND|OR|ON|SET)\\s+)(${RESERVED})(?=\\s*(?:=|<>|!=|<=|>=|<|>|\\bIS\\b|\\bIN\\b|\\bLIKE\\b))`, 'gi'),
];

export const reservedWordQuotingStrategy: RecoveryStrategy = {
  name: 'reserved word quoting',
  confidence: 0.55,
  canHandle(sql, failure, ctx) {
    const masked = maskSql(sql, maskOptions(ctx)).text;
    return /reserved|keyword/i.test(failure.message) || RESERVED_AS_COLUMN.some(pattern => new RegExp(pattern.source, 'i').test(masked));
  },
  recover(sql, _failure, ctx) {
    const quote = ctx.source === 'mysql' ? '`' : '"';
    const recovered = withMaskedSql(
      sql,
      masked =>
        RESERVED_AS_COLUMN.reduce(
          (text, pattern) => text.replace(pattern, (_match, lead: string, word: string) => `${lead}${quote}${word}${quote}`),
          masked,
        ),
      maskOptions(ctx),
    );
    return attempt(
      reservedWordQuotingStrategy,
      sql,
      recovered,
      createWarning(
        'syntax-difference',
        'Reserved words used as column names were quoted',
        'info',
        'Quoted identifiers are case-sensitive on some databases',
      ),
    );
  },
};

const hierarchicalConverter = new HierarchicalQueryConverter();

export const hierarchicalRewriteStrategy: RecoveryStrategy = {
  name: 'hierarchical query rewrite',
  confidence: 0.5,
  canHandle(sql, _failure, ctx) {
    const mask = maskSql(sql, maskOptions(ctx));
    return hierarchicalConverter.applies(mask.text, { ...ctx, mask });
  },
  recover(sql, _failure, ctx) {
    const mask = maskSql(sql, maskOptions(ctx));
    const result = hierarchicalConverter.convert(mask.text, { ...ctx, mask });
    return attempt(
      hierarchicalRewriteStrategy,
      sql,
      mask.unmask(result.sql),
      createWarning(
        'manual-review-needed',
        'CONNECT BY query was rewritten as WITH RECURSIVE during recovery',
        'warning',
        'Compare row order and depth with the original hierarchy',
      ),
    );
  },
};

/** Strategies in the order they are tried, highest confidence first. */
export const RECOVERY_STRATEGIES: readonly RecoveryStrategy[] = Object.freeze([
  physicalAttributeStrategy,
  commentRemovalStrategy,
  hintRemovalStrategy,
  parenthesisBalanceStrategy,
  stringEscapeStrategy,
  reservedWordQuotingStrategy,
  hierarchicalRewriteStrategy,
]);
