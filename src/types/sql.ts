import type { RuleConfigInput } from '../config/ruleConfig';

export const Dialect = {
  ORACLE: 'oracle',
  MYSQL: 'mysql',
  POSTGRESQL: 'postgresql',
} as const;

export type Dialect = (typeof Dialect)[keyof typeof Dialect];

export const ALL_DIALECTS: readonly Dialect[] = [Dialect.ORACLE, Dialect.MYSQL, Dialect.POSTGRESQL];

export type WarningKind =
  | 'unsupported-function'
  | 'syntax-difference'
  | 'manual-review-needed'
  | 'performance'
  | 'data-type-mismatch'
  | 'partial-support';

export type WarningSeverity = 'info' | 'warning' | 'error';

export interface WarningLocation {
  line?: number;
  column?: number;
  chunk?: number;
}

export interface ConversionWarning {
  readonly kind: WarningKind;
  readonly message: string;
  readonly severity: WarningSeverity;
  readonly suggestion?: string;
  readonly location?: WarningLocation;
}

export type ParameterTransform = 'rename' | 'swap-first-two' | 'case-when' | 'date-format';

export interface FunctionMappingRule {
  readonly source: Dialect;
  readonly target: Dialect;
  readonly sourceName: string;
  readonly targetName: string;
  readonly transform: ParameterTransform;
  /** Source form is written without parentheses (SYSDATE, CURRENT_DATE). */
  readonly bare: boolean;
  /** Target is emitted as written, without an argument list (SYSTIMESTAMP). */
  readonly targetBare: boolean;
  readonly minArgs?: number;
  readonly maxArgs?: number;
  readonly warning?: string;
  readonly rule?: FunctionRuleKey;
}

export type FunctionRuleKey =
  | 'convertNvl'
  | 'convertNvl2'
  | 'convertDecode'
  | 'convertDateFunctions'
  | 'convertStringFunctions'
  | 'convertAggregateFunctions'
  | 'convertAnalyticFunctions';

export type DataTypeRuleKey =
  | 'convertVarchar2'
  | 'convertNumber'
  | 'convertClob'
  | 'convertBlob'
  | 'convertDate'
  | 'convertBoolean'
  | 'convertRaw'
  | 'convertFloat';

export interface DataTypeMapping {
  readonly source: Dialect;
  readonly target: Dialect;
  readonly sourceType: string;
  readonly targetType: string;
  /** Carry the source `(p[,s])` over to the target type. */
  readonly keepPrecision: boolean;
  /** Appended when the source type carries no precision of its own. */
  readonly defaultPrecision?: string;
  readonly warning?: string;
  readonly rule?: DataTypeRuleKey;
}

export interface StatementComplexity {
  joins: number;
  subqueries: number;
  functions: number;
  aggregates: number;
  windows: number;
  ctes: number;
}

export type Difficulty = 'simple' | 'moderate' | 'complex';

export type ParseMode = 'structural' | 'recovered' | 'text-only';

export interface RecoveryAttempt {
  readonly strategy: string;
  readonly recoveredSql: string;
  readonly success: boolean;
  /** In [0, 1]; reported, never used for gating. */
  readonly confidence: number;
  readonly warning?: ConversionWarning;
}

export interface RecoverySummary {
  readonly state: 'recovered' | 'unrecovered';
  readonly mode: 'single-shot' | 'sequential';
  readonly strategies: readonly string[];
  readonly confidence: number;
}

export interface ValidationInfo {
  readonly valid: boolean;
  readonly issues: readonly ConversionWarning[];
  readonly parseMode: ParseMode;
  readonly complexity?: StatementComplexity;
  readonly difficulty?: Difficulty;
  readonly recovery?: RecoverySummary;
}

export interface ConversionResult {
  readonly convertedSql: string;
  readonly warnings: readonly ConversionWarning[];
  readonly appliedRules: readonly string[];
  readonly elapsedMs: number;
  readonly validation?: ValidationInfo;
}

/** Output of a single pipeline step; merged in order by the orchestrator. */
export interface StepResult {
  sql: string;
  warnings: ConversionWarning[];
  appliedRules: string[];
}

export interface ConversionRequest {
  sql: string;
  source: Dialect;
  target: Dialect;
  ruleConfig?: RuleConfigInput;
}
