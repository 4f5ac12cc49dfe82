import type { RuleConfig } from '../config/ruleConfig';
import type { ConversionWarning, StepResult, WarningKind, WarningLocation, WarningSeverity } from '../types/sql';

export function createWarning(
  kind: WarningKind,
  message: string,
  severity: WarningSeverity = 'warning',
  suggestion?: string,
  location?: WarningLocation,
): ConversionWarning {
  const warning: ConversionWarning = { kind, message, severity };
  if (suggestion !== undefined && location !== undefined) return { ...warning, suggestion, location };
  if (suggestion !== undefined) return { ...warning, suggestion };
  if (location !== undefined) return { ...warning, location };
  return warning;
}

export function withLocation(warning: ConversionWarning, location: WarningLocation): ConversionWarning {
  return { ...warning, location: { ...warning.location, ...location } };
}

/** Step output that changed nothing. */
export function unchanged(sql: string): StepResult {
  return { sql, warnings: [], appliedRules: [] };
}

/**
 * Drop warnings the caller switched off. Error severity always survives.
 */
export function filterWarnings(
  warnings: readonly ConversionWarning[],
  rules: Readonly<RuleConfig['warnings']>,
): ConversionWarning[] {
  return warnings.filter(warning => {
    if (warning.severity === 'error') return true;
    switch (warning.kind) {
      case 'unsupported-function':
        return rules.warnOnUnsupportedSyntax;
      case 'partial-support':
        return rules.warnOnPartialConversion;
      case 'data-type-mismatch':
        return rules.warnOnPotentialDataLoss;
      default:
        return true;
    }
  });
}
