export { convert, convertAsync, convertRequest, SqlDialectConverter, type ConversionOptions } from './converter';
export { isDialect, parseDialect, strategyFor, type DialectStrategy } from './converter/dialects';
export { ConfigurationError, ConversionError, type ConversionErrorCode } from './converter/errors';
export { FEATURE_CONVERTERS } from './converter/features';
export { splitStatements, splitIntoChunks } from './converter/largeSql';
export { SQLParser, classifyDifficulty, measureComplexity } from './converter/parser';
export { preprocess } from './converter/preprocessor';
export { RecoveryService } from './converter/recovery/recoveryService';
export { RECOVERY_STRATEGIES, type RecoveryStrategy } from './converter/recovery/strategies';
export { validate } from './converter/validation';
export {
  DEFAULT_RULE_CONFIG,
  resolveRuleConfig,
  RuleConfigSchema,
  type RuleConfig,
  type RuleConfigInput,
  type RuleProfile,
} from './config/ruleConfig';
export { consoleLogger, getLogger, noopLogger, setLogger, type Logger } from './utils/logger';
export { ALL_DIALECTS, Dialect } from './types/sql';
export type {
  ConversionRequest,
  ConversionResult,
  ConversionWarning,
  Difficulty,
  ParseMode,
  RecoveryAttempt,
  RecoverySummary,
  StatementComplexity,
  ValidationInfo,
  WarningKind,
  WarningSeverity,
} from './types/sql';
