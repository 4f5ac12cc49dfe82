import { DEFAULT_RULE_CONFIG, resolveRuleConfig, type RuleConfigInput } from '../../src/config/ruleConfig';
import type { ConversionContext, FeatureConverter } from '../../src/converter/context';
import type { Dialect, StepResult } from '../../src/types/sql';
import { maskSql } from '../../src/utils/sqlText';

/** Masked text plus a context for driving one step directly. */
export function contextFor(sql: string, source: Dialect, target: Dialect, overrides?: RuleConfigInput) {
  const mask = maskSql(sql, { backslashEscapes: source === 'mysql' });
  const config = overrides ? resolveRuleConfig(overrides) : DEFAULT_RULE_CONFIG;
  const ctx: ConversionContext = { source, target, config, mask };
  return { ctx, masked: mask.text };
}

/** Run a feature converter over plain SQL and unmask its output. */
export function runFeature(
  converter: FeatureConverter,
  sql: string,
  source: Dialect,
  target: Dialect,
  overrides?: RuleConfigInput,
): StepResult & { applies: boolean } {
  const { ctx, masked } = contextFor(sql, source, target, overrides);
  const applies = converter.applies(masked, ctx);
  const result = converter.convert(masked, ctx);
  return { ...result, sql: ctx.mask.unmask(result.sql), applies };
}
