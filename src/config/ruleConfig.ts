import { z } from 'zod';
import { ConfigurationError } from '../converter/errors';

const flag = (value: boolean) => z.boolean().default(value);

export const DataTypeRulesSchema = z.object({
  convertVarchar2: flag(true),
  convertNumber: flag(true),
  convertClob: flag(true),
  convertBlob: flag(true),
  convertDate: flag(true),
  convertBoolean: flag(true),
  convertRaw: flag(true),
  convertFloat: flag(true),
  removeByteSuffix: flag(true),
});

export const FunctionRulesSchema = z.object({
  convertNvl: flag(true),
  convertNvl2: flag(true),
  convertDecode: flag(true),
  convertDateFunctions: flag(true),
  convertStringFunctions: flag(true),
  convertAggregateFunctions: flag(true),
  convertAnalyticFunctions: flag(true),
  convertRownum: flag(true),
  handleDualTable: flag(true),
  convertSequences: flag(true),
});

export const DdlRulesSchema = z.object({
  removeTablespace: flag(true),
  removeStorageClause: flag(true),
  removePhysicalAttributes: flag(true),
  removeSchemaPrefix: flag(true),
  convertComments: flag(true),
  convertConstraints: flag(true),
  convertIndexes: flag(true),
  convertSequences: flag(true),
  convertTriggers: flag(false),
  convertViews: flag(true),
  convertPartitions: flag(false),
});

export const SyntaxRulesSchema = z.object({
  convertOracleJoin: flag(true),
  convertHierarchicalQuery: flag(true),
  convertPivot: flag(true),
  convertMerge: flag(true),
  handleOracleHints: flag(true),
  convertCasting: flag(true),
  convertReturning: flag(true),
});

export const WarningRulesSchema = z.object({
  warnOnSelectStar: flag(true),
  warnOnLargeInClause: flag(true),
  maxInClauseSize: z.number().int().positive().default(100),
  warnOnMissingIndex: flag(true),
  warnOnUnsupportedSyntax: flag(true),
  warnOnPartialConversion: flag(true),
  warnOnDeprecatedSyntax: flag(true),
  warnOnPotentialDataLoss: flag(true),
});

export const RuleConfigSchema = z.object({
  dataType: DataTypeRulesSchema.default({}),
  function: FunctionRulesSchema.default({}),
  ddl: DdlRulesSchema.default({}),
  syntax: SyntaxRulesSchema.default({}),
  warnings: WarningRulesSchema.default({}),
});

export type RuleConfig = z.infer<typeof RuleConfigSchema>;

/** Partial configuration accepted from callers; unset keys take defaults. */
export type RuleConfigInput = z.input<typeof RuleConfigSchema>;

export type RuleProfile = 'default' | 'minimal' | 'strict';

const PROFILE_OVERRIDES: Record<RuleProfile, RuleConfigInput> = {
  default: {},
  minimal: {
    function: {
      convertNvl2: false,
      convertDecode: false,
      convertAnalyticFunctions: false,
      convertRownum: false,
      handleDualTable: false,
      convertSequences: false,
    },
    ddl: {
      removePhysicalAttributes: false,
      removeSchemaPrefix: false,
      convertComments: false,
      convertConstraints: false,
      convertIndexes: false,
      convertSequences: false,
      convertViews: false,
    },
    syntax: {
      convertOracleJoin: false,
      convertHierarchicalQuery: false,
      convertPivot: false,
      convertMerge: false,
      convertCasting: false,
      convertReturning: false,
    },
  },
  strict: {
    warnings: { maxInClauseSize: 50 },
  },
};

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

function mergeInput(base: RuleConfigInput, override: RuleConfigInput): RuleConfigInput {
  return {
    dataType: { ...base.dataType, ...override.dataType },
    function: { ...base.function, ...override.function },
    ddl: { ...base.ddl, ...override.ddl },
    syntax: { ...base.syntax, ...override.syntax },
    warnings: { ...base.warnings, ...override.warnings },
  };
}

export function isRuleProfile(value: unknown): value is RuleProfile {
  return value === 'default' || value === 'minimal' || value === 'strict';
}

/**
 * Build the immutable configuration snapshot a conversion reads from.
 *
 * Accepts a profile name, a partial configuration (merged over the default
 * profile), or a partial with a `profile` key to start from another profile.
 */
export function resolveRuleConfig(
  input?: RuleProfile | (RuleConfigInput & { profile?: RuleProfile }),
): Readonly<RuleConfig> {
  let merged: RuleConfigInput;
  if (input === undefined) {
    merged = PROFILE_OVERRIDES.default;
  } else if (typeof input === 'string') {
    if (!isRuleProfile(input)) {
      throw new ConfigurationError(`Unknown rule profile: ${String(input)}`, 'INVALID_RULE_CONFIG');
    }
    merged = PROFILE_OVERRIDES[input];
  } else {
    const { profile = 'default', ...overrides } = input;
    if (!isRuleProfile(profile)) {
      throw new ConfigurationError(`Unknown rule profile: ${String(profile)}`, 'INVALID_RULE_CONFIG');
    }
    merged = mergeInput(PROFILE_OVERRIDES[profile], overrides);
  }

  const parsed = RuleConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid rule configuration: ${details}`, 'INVALID_RULE_CONFIG');
  }
  return deepFreeze(parsed.data);
}

export const DEFAULT_RULE_CONFIG: Readonly<RuleConfig> = resolveRuleConfig('default');
