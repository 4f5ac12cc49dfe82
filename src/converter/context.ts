import type { RuleConfig } from '../config/ruleConfig';
import type { ConversionWarning, Dialect, StepResult } from '../types/sql';
import type { MaskedSql } from '../utils/sqlText';

/** Read-only inputs shared by every step of one conversion. */
export interface ConversionContext {
  readonly source: Dialect;
  readonly target: Dialect;
  readonly config: Readonly<RuleConfig>;
  /** Literal table for the masked text the steps rewrite. */
  readonly mask: MaskedSql;
}

/**
 * Accumulates the warnings and rule labels of one step. A rule label is kept
 * only when its rewrite actually changed the text.
 */
export class StepRecorder {
  readonly warnings: ConversionWarning[] = [];
  readonly appliedRules: string[] = [];

  warn(warning: ConversionWarning): void {
    this.warnings.push(warning);
  }

  rule(label: string): void {
    this.appliedRules.push(label);
  }

  apply(text: string, label: string, rewrite: (text: string) => string): string {
    const next = rewrite(text);
    if (next !== text) this.appliedRules.push(label);
    return next;
  }

  result(sql: string): StepResult {
    return { sql, warnings: this.warnings, appliedRules: this.appliedRules };
  }
}

/** A feature converter owns one family of SQL constructs. */
export interface FeatureConverter {
  readonly name: string;
  /** Cheap keyword check run before `convert`. */
  applies(masked: string, ctx: ConversionContext): boolean;
  convert(masked: string, ctx: ConversionContext): StepResult;
}
