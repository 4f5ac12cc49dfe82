import { DEFAULT_RULE_CONFIG, type RuleConfig } from '../config/ruleConfig';
import type {
  ConversionWarning,
  Dialect,
  ParseMode,
  RecoverySummary,
  StatementComplexity,
  ValidationInfo,
} from '../types/sql';
import { countChar, findClosingParen, maskSql, splitTopLevel, type MaskedSql } from '../utils/sqlText';
import { classifyDifficulty } from './parser';
import { CRITICAL_KEYWORDS, DEPRECATED_SYNTAX, NON_FUNCTION_WORDS, ORACLE_LEFTOVERS } from './sqlPatterns';
import { createWarning } from './warnings';

export interface ValidationOptions {
  source?: Dialect;
  target?: Dialect;
  config?: Readonly<RuleConfig>;
}

const MAX_SUBQUERY_DEPTH = 3;

const keywordPattern = (keyword: string) => new RegExp(`\\b${keyword.replace(/\s+/g, '\\s+')}\\b`, 'i');

/** Function calls plus CASE expressions, which stand in for NVL2 and DECODE. */
function countCalls(masked: string): number {
  let count = 0;
  for (const match of masked.matchAll(/\b([A-Za-z_][\w$]*)\s*\(/g)) {
    if (!NON_FUNCTION_WORDS.has(match[1].toUpperCase())) count++;
  }
  return count + (masked.match(/\bCASE\b/gi)?.length ?? 0);
}

function subqueryDepth(masked: string): number {
  const stack: boolean[] = [];
  let depth = 0;
  let deepest = 0;
  for (let i = 0; i < masked.length; i++) {
    const char = masked[i];
    if (char === '(') {
      const select = /^\(\s*(?:SELECT|WITH)\b/i.test(masked.slice(i, i + 16));
      stack.push(select);
      if (select) deepest = Math.max(deepest, ++depth);
    } else if (char === ')') {
      if (stack.pop()) depth--;
    }
  }
  return deepest;
}

function balanceChecks(mask: MaskedSql): ConversionWarning[] {
  const issues: ConversionWarning[] = [];
  const open = countChar(mask.text, '(');
  const close = countChar(mask.text, ')');
  if (open !== close) {
    issues.push(
      createWarning(
        'manual-review-needed',
        `Unbalanced parentheses in converted SQL: ${open} opening, ${close} closing`,
        'error',
      ),
    );
  }
  // Doubled quotes live inside masked literal bodies, so only delimiters are counted
  if (countChar(mask.text, "'") % 2 !== 0) {
    issues.push(createWarning('manual-review-needed', 'Unterminated string literal in converted SQL', 'error'));
  }
  return issues;
}

function keywordChecks(original: MaskedSql, converted: MaskedSql): ConversionWarning[] {
  return CRITICAL_KEYWORDS.filter(keyword => {
    const pattern = keywordPattern(keyword);
    return pattern.test(original.text) && !pattern.test(converted.text);
  }).map(keyword =>
    createWarning(
      'manual-review-needed',
      `${keyword} was present in the input but is missing from the output`,
      'warning',
      'Check that no clause was dropped during conversion',
    ),
  );
}

function functionCountCheck(original: MaskedSql, converted: MaskedSql): ConversionWarning[] {
  const before = countCalls(original.text);
  const after = countCalls(converted.text);
  if (before < 2 || after * 2 >= before) return [];
  return [
    createWarning(
      'manual-review-needed',
      `Function calls dropped from ${before} to ${after} during conversion`,
      'warning',
      'Check for expressions that were removed or commented out',
    ),
  ];
}

function performanceChecks(converted: MaskedSql, config: Readonly<RuleConfig>): ConversionWarning[] {
  const issues: ConversionWarning[] = [];
  const { warnings } = config;
  const text = converted.text;

  if (warnings.warnOnLargeInClause) {
    for (const match of text.matchAll(/\bIN\s*\(/gi)) {
      const open = (match.index ?? 0) + match[0].length - 1;
      const close = findClosingParen(text, open);
      if (close === -1) continue;
      const inner = text.slice(open + 1, close);
      if (/^\s*(?:SELECT|WITH)\b/i.test(inner)) continue;
      const size = splitTopLevel(inner).length;
      if (size > warnings.maxInClauseSize) {
        issues.push(
          createWarning(
            'performance',
            `IN list with ${size} values exceeds ${warnings.maxInClauseSize}`,
            'warning',
            'Load the values into a temporary table and join against it',
          ),
        );
      }
    }
  }

  const depth = subqueryDepth(text);
  if (depth > MAX_SUBQUERY_DEPTH) {
    issues.push(
      createWarning(
        'performance',
        `Subqueries nested ${depth} levels deep`,
        'warning',
        'Flatten nested subqueries into joins or common table expressions',
      ),
    );
  }

  for (const match of text.matchAll(/\bLIKE\s+('[^']*')/gi)) {
    if (converted.literalValue(match[1])?.startsWith('%')) {
      issues.push(
        createWarning(
          'performance',
          'LIKE pattern with a leading wildcard cannot use an index',
          'info',
          'Consider full-text search for substring matching',
        ),
      );
      break;
    }
  }

  if (warnings.warnOnSelectStar && /\bSELECT\s+(?:DISTINCT\s+)?\*/i.test(text)) {
    issues.push(
      createWarning('performance', 'SELECT * returns every column', 'info', 'List the columns the query needs'),
    );
  }
  return issues;
}

const WHERE_CLAUSE = /\bWHERE\b([\s\S]*?)(?=\bGROUP\s+BY\b|\bORDER\s+BY\b|\bHAVING\b|\bLIMIT\b|\bUNION\b|;|$)/gi;
const FUNCTION_ON_COLUMN =
  /\b([A-Za-z_][\w$]*)\s*\(\s*([A-Za-z_][\w$]*(?:\.[A-Za-z_][\w$]*)?)\s*(?:,[^()]*)?\)\s*(?:=|<>|!=|<=|>=|<|>|\bLIKE\b|\bIN\b|\bBETWEEN\b)/gi;

function indexChecks(converted: MaskedSql): ConversionWarning[] {
  const issues: ConversionWarning[] = [];
  const seen = new Set<string>();
  for (const clause of converted.text.matchAll(WHERE_CLAUSE)) {
    for (const call of clause[1].matchAll(FUNCTION_ON_COLUMN)) {
      const [, fn, column] = call;
      const key = `${fn.toUpperCase()}(${column})`;
      if (NON_FUNCTION_WORDS.has(fn.toUpperCase()) || seen.has(key)) continue;
      seen.add(key);
      issues.push(
        createWarning(
          'performance',
          `${fn.toUpperCase()}() on column ${column} in WHERE prevents index use`,
          'info',
          'Compare the bare column, or add an expression index',
        ),
      );
    }
  }
  return issues;
}

function leftoverChecks(converted: MaskedSql): ConversionWarning[] {
  return ORACLE_LEFTOVERS.filter(({ pattern }) => pattern.test(converted.text)).map(({ label }) =>
    createWarning(
      'manual-review-needed',
      `Oracle-only construct ${label} remains in the output`,
      'warning',
      'Rewrite it for the target database',
    ),
  );
}

function deprecationChecks(original: MaskedSql): ConversionWarning[] {
  return DEPRECATED_SYNTAX.filter(({ pattern }) => pattern.test(original.text)).map(({ label, suggestion }) =>
    createWarning('syntax-difference', `Deprecated syntax: ${label}`, 'info', suggestion),
  );
}

/**
 * Static checks comparing input and output. Never changes either text and
 * never throws.
 */
export function validate(original: string, converted: string, options: ValidationOptions = {}): ConversionWarning[] {
  const config = options.config ?? DEFAULT_RULE_CONFIG;
  const originalMask = maskSql(original, { backslashEscapes: options.source === 'mysql' });
  const convertedMask = maskSql(converted, { backslashEscapes: options.target === 'mysql' });

  const issues = [
    ...balanceChecks(convertedMask),
    ...keywordChecks(originalMask, convertedMask),
    ...functionCountCheck(originalMask, convertedMask),
    ...performanceChecks(convertedMask, config),
  ];
  if (config.warnings.warnOnMissingIndex) issues.push(...indexChecks(convertedMask));
  if (options.target !== undefined && options.target !== 'oracle') issues.push(...leftoverChecks(convertedMask));
  if (config.warnings.warnOnDeprecatedSyntax) issues.push(...deprecationChecks(originalMask));
  return issues;
}

export interface ValidationDetails {
  parseMode: ParseMode;
  complexity?: StatementComplexity;
  recovery?: RecoverySummary;
}

export function validationInfo(issues: readonly ConversionWarning[], details: ValidationDetails): ValidationInfo {
  return {
    valid: !issues.some(issue => issue.severity === 'error'),
    issues,
    parseMode: details.parseMode,
    ...(details.complexity ? { complexity: details.complexity, difficulty: classifyDifficulty(details.complexity) } : {}),
    ...(details.recovery ? { recovery: details.recovery } : {}),
  };
}
