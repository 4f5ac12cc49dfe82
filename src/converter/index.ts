import { format } from 'sql-formatter';
import { resolveRuleConfig, type RuleConfig, type RuleConfigInput, type RuleProfile } from '../config/ruleConfig';
import type {
  ConversionRequest,
  ConversionResult,
  ConversionWarning,
  Dialect,
  ParseMode,
  RecoverySummary,
  StatementComplexity,
  ValidationInfo,
} from '../types/sql';
import { createLogger } from '../utils/logger';
import { defaultConcurrency, mapCooperatively } from '../utils/pool';
import { maskSql } from '../utils/sqlText';
import type { ConversionContext, FeatureConverter } from './context';
import { parseDialect, strategyFor } from './dialects';
import { errorMessage } from './errors';
import { FEATURE_CONVERTERS } from './features';
import {
  DEFAULT_CHUNK_SIZE,
  DEFAULT_LARGE_SQL_THRESHOLD,
  failedChunkText,
  reassemble,
  splitIntoChunks,
  type SqlChunk,
} from './largeSql';
import { emptyComplexity, SQLParser } from './parser';
import { preprocess } from './preprocessor';
import { RecoveryService } from './recovery/recoveryService';
import { validate, validationInfo } from './validation';
import { createWarning, filterWarnings, withLocation } from './warnings';

const logger = createLogger('converter');

export interface ConversionOptions {
  /** Profile name or partial configuration; unset keys take the default profile. */
  ruleConfig?: RuleProfile | (RuleConfigInput & { profile?: RuleProfile });
  /** Pretty-print the output with sql-formatter. */
  format?: boolean;
  /** Inputs longer than this many characters are converted in chunks. */
  largeSqlThreshold?: number;
  /** Statements per chunk. */
  chunkSize?: number;
  /** Chunk lanes for `convertAsync`. */
  concurrency?: number;
}

interface RunOutput {
  sql: string;
  warnings: ConversionWarning[];
  appliedRules: string[];
  validation: ValidationInfo;
}

interface ChunkOutput extends RunOutput {
  index: number;
}

const FORMATTER_LANGUAGE = {
  oracle: 'plsql',
  mysql: 'mysql',
  postgresql: 'postgresql',
} as const satisfies Record<Dialect, string>;

const PARSE_MODE_RANK: Record<ParseMode, number> = { structural: 0, recovered: 1, 'text-only': 2 };

function addComplexity(a: StatementComplexity, b: StatementComplexity): StatementComplexity {
  return {
    joins: a.joins + b.joins,
    subqueries: a.subqueries + b.subqueries,
    functions: a.functions + b.functions,
    aggregates: a.aggregates + b.aggregates,
    windows: a.windows + b.windows,
    ctes: a.ctes + b.ctes,
  };
}

/**
 * Converts SQL text between Oracle, MySQL and PostgreSQL.
 *
 * Each run preprocesses the text, parses it (recovering when the parser
 * rejects it), applies the feature converters and then the target dialect
 * strategy, and finally validates the output against the input.
 */
export class SqlDialectConverter {
  private readonly options: ConversionOptions;
  private readonly parser = new SQLParser();
  private readonly recovery: RecoveryService;
  private readonly converters: readonly FeatureConverter[];

  constructor(options: ConversionOptions = {}, converters: readonly FeatureConverter[] = FEATURE_CONVERTERS) {
    this.options = options;
    this.recovery = new RecoveryService(this.parser);
    this.converters = converters;
  }

  public convert(sql: string, source: Dialect | string, target: Dialect | string): ConversionResult {
    const started = performance.now();
    const from = parseDialect(source);
    const to = parseDialect(target);
    const config = resolveRuleConfig(this.options.ruleConfig);
    if (from === to) return this.unchanged(sql, started);

    if (this.isLarge(sql)) {
      const chunks = splitIntoChunks(sql, from, this.options.chunkSize ?? DEFAULT_CHUNK_SIZE);
      logger.info(`Converting ${chunks.length} chunks`);
      const outputs = chunks.map(chunk => this.convertChunk(chunk, from, to, config));
      return this.joinChunks(outputs, started);
    }
    return this.toResult(this.run(sql, from, to, config), started);
  }

  /** Same result as `convert`; chunks of large inputs run on a bounded pool. */
  public async convertAsync(sql: string, source: Dialect | string, target: Dialect | string): Promise<ConversionResult> {
    const started = performance.now();
    const from = parseDialect(source);
    const to = parseDialect(target);
    const config = resolveRuleConfig(this.options.ruleConfig);
    if (from === to) return this.unchanged(sql, started);

    if (!this.isLarge(sql)) return this.toResult(this.run(sql, from, to, config), started);

    const chunks = splitIntoChunks(sql, from, this.options.chunkSize ?? DEFAULT_CHUNK_SIZE);
    const concurrency = this.options.concurrency ?? defaultConcurrency();
    logger.info(`Converting ${chunks.length} chunks on ${concurrency} lanes`);
    const outputs = await mapCooperatively(chunks, concurrency, chunk => this.convertChunk(chunk, from, to, config));
    return this.joinChunks(outputs, started);
  }

  private isLarge(sql: string): boolean {
    return sql.length > (this.options.largeSqlThreshold ?? DEFAULT_LARGE_SQL_THRESHOLD);
  }

  private unchanged(sql: string, started: number): ConversionResult {
    return { convertedSql: sql, warnings: [], appliedRules: [], elapsedMs: performance.now() - started };
  }

  private toResult(output: RunOutput, started: number): ConversionResult {
    return {
      convertedSql: output.sql,
      warnings: output.warnings,
      appliedRules: output.appliedRules,
      elapsedMs: performance.now() - started,
      validation: output.validation,
    };
  }

  /** One full run over a single piece of text. */
  private run(sql: string, source: Dialect, target: Dialect, config: Readonly<RuleConfig>): RunOutput {
    const warnings: ConversionWarning[] = [];
    const appliedRules: string[] = [];

    const preprocessed = preprocess(sql, target, { source, config });
    warnings.push(...preprocessed.warnings);
    appliedRules.push(...preprocessed.appliedRules);
    logger.debug(`preprocess: ${preprocessed.appliedRules.length} rules`);

    let text = preprocessed.sql;
    let parseMode: ParseMode = 'structural';
    let complexity: StatementComplexity | undefined;
    let recovery: RecoverySummary | undefined;

    const parsed = this.parser.parse(text, source);
    if (parsed.ok) {
      complexity = parsed.complexity;
      logger.debug(`parse: ${parsed.statementCount} statements`);
    } else {
      logger.debug(`parse failed: ${parsed.message}`);
      const outcome = this.recovery.recover(text, parsed, { source, target, config });
      warnings.push(...outcome.warnings);
      recovery = outcome.summary;
      if (outcome.state === 'recovered') {
        text = outcome.sql;
        parseMode = 'recovered';
        complexity = outcome.parsed.complexity;
        appliedRules.push(...outcome.attempts.map(attempt => `Recovery: ${attempt.strategy}`));
      } else {
        parseMode = 'text-only';
      }
    }

    let converted = this.applyConverters(text, source, target, config, warnings, appliedRules);
    if (this.options.format) converted = this.formatSQL(converted, target, warnings);

    const issues = validate(sql, converted, { source, target, config });
    logger.debug(`validate: ${issues.length} issues`);
    warnings.push(...issues);

    return {
      sql: converted,
      warnings: filterWarnings(warnings, config.warnings),
      appliedRules,
      validation: validationInfo(issues, {
        parseMode,
        ...(complexity ? { complexity } : {}),
        ...(recovery ? { recovery } : {}),
      }),
    };
  }

  /** Feature converters in order, then the target strategy, on masked text. */
  private applyConverters(
    sql: string,
    source: Dialect,
    target: Dialect,
    config: Readonly<RuleConfig>,
    warnings: ConversionWarning[],
    appliedRules: string[],
  ): string {
    const mask = maskSql(sql, { backslashEscapes: source === 'mysql', standardEscapes: target !== 'mysql' });
    const ctx: ConversionContext = { source, target, config, mask };
    const steps: FeatureConverter[] = [
      ...this.converters,
      { name: `${target} dialect`, applies: () => true, convert: (text, context) => strategyFor(target).convert(text, context) },
    ];

    let masked = mask.text;
    for (const step of steps) {
      if (!step.applies(masked, ctx)) continue;
      try {
        const result = step.convert(masked, ctx);
        warnings.push(...result.warnings);
        // A step that left the text alone has not applied anything
        if (result.sql !== masked) appliedRules.push(...result.appliedRules);
        masked = result.sql;
        logger.debug(`${step.name}: ${result.appliedRules.length} rules`);
      } catch (error) {
        logger.error(`${step.name} converter failed`, error);
        warnings.push(
          createWarning(
            'manual-review-needed',
            `The ${step.name} converter failed: ${errorMessage(error)}`,
            'warning',
            'The affected statements were left as they were; convert them by hand',
          ),
        );
      }
    }
    return mask.unmask(masked);
  }

  private formatSQL(sql: string, target: Dialect, warnings: ConversionWarning[]): string {
    try {
      return format(sql, {
        language: FORMATTER_LANGUAGE[target],
        keywordCase: 'upper',
        indentStyle: 'standard',
        linesBetweenQueries: 2,
      });
    } catch (error) {
      logger.warn(`Formatting skipped: ${errorMessage(error)}`);
      warnings.push(createWarning('syntax-difference', `Output was not formatted: ${errorMessage(error)}`, 'info'));
      return sql;
    }
  }

  private convertChunk(chunk: SqlChunk, source: Dialect, target: Dialect, config: Readonly<RuleConfig>): ChunkOutput {
    const location = { chunk: chunk.index };
    try {
      const output = this.run(chunk.sql, source, target, config);
      return {
        ...output,
        index: chunk.index,
        warnings: output.warnings.map(warning => withLocation(warning, location)),
      };
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`Chunk ${chunk.index} failed`, error);
      const failure = createWarning(
        'manual-review-needed',
        `Chunk ${chunk.index} could not be converted: ${message}`,
        'error',
        'Convert the statements of this chunk by hand',
        location,
      );
      return {
        index: chunk.index,
        sql: failedChunkText(chunk, message),
        warnings: [failure],
        appliedRules: [],
        validation: validationInfo([failure], { parseMode: 'text-only' }),
      };
    }
  }

  private joinChunks(outputs: readonly ChunkOutput[], started: number): ConversionResult {
    const ordered = [...outputs].sort((a, b) => a.index - b.index);
    const issues = ordered.flatMap(output => output.validation.issues);
    const parseMode = ordered.reduce<ParseMode>(
      (worst, output) =>
        PARSE_MODE_RANK[output.validation.parseMode] > PARSE_MODE_RANK[worst] ? output.validation.parseMode : worst,
      'structural',
    );
    const complexity = ordered.reduce(
      (total, output) => (output.validation.complexity ? addComplexity(total, output.validation.complexity) : total),
      emptyComplexity(),
    );
    return {
      convertedSql: reassemble(ordered),
      warnings: ordered.flatMap(output => output.warnings),
      appliedRules: ordered.flatMap(output => output.appliedRules),
      elapsedMs: performance.now() - started,
      validation: validationInfo(issues, { parseMode, complexity }),
    };
  }
}

/** Convert `sql` from `source` to `target` in one call. */
export function convert(
  sql: string,
  source: Dialect | string,
  target: Dialect | string,
  options: ConversionOptions = {},
): ConversionResult {
  return new SqlDialectConverter(options).convert(sql, source, target);
}

export function convertAsync(
  sql: string,
  source: Dialect | string,
  target: Dialect | string,
  options: ConversionOptions = {},
): Promise<ConversionResult> {
  return new SqlDialectConverter(options).convertAsync(sql, source, target);
}

/** Convert a request object; its `ruleConfig` overrides the one in `options`. */
export function convertRequest(request: ConversionRequest, options: ConversionOptions = {}): ConversionResult {
  const ruleConfig = request.ruleConfig ?? options.ruleConfig;
  return convert(request.sql, request.source, request.target, {
    ...options,
    ...(ruleConfig !== undefined ? { ruleConfig } : {}),
  });
}
