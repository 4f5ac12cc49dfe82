export type ConversionErrorCode = 'INVALID_DIALECT' | 'INVALID_RULE_CONFIG' | 'INTERNAL';

export class ConversionError extends Error {
  readonly code: ConversionErrorCode;

  constructor(message: string, code: ConversionErrorCode = 'INTERNAL') {
    super(message);
    this.name = 'ConversionError';
    this.code = code;
  }
}

/** Rejected before any conversion work starts. */
export class ConfigurationError extends ConversionError {
  constructor(message: string, code: ConversionErrorCode = 'INVALID_DIALECT') {
    super(message, code);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
