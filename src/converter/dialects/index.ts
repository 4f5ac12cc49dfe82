import { ALL_DIALECTS, type Dialect } from '../../types/sql';
import { ConfigurationError } from '../errors';
import type { DialectStrategy } from './base';
import { MySqlStrategy } from './mysql';
import { OracleStrategy } from './oracle';
import { PostgreSqlStrategy } from './postgresql';

export type { DialectStrategy } from './base';

/** One strategy per target dialect; source-specific behavior comes from the mapping tables. */
export const DIALECT_STRATEGIES: Readonly<Record<Dialect, DialectStrategy>> = Object.freeze({
  oracle: new OracleStrategy(),
  mysql: new MySqlStrategy(),
  postgresql: new PostgreSqlStrategy(),
});

export function strategyFor(target: Dialect): DialectStrategy {
  return DIALECT_STRATEGIES[target];
}

const DIALECT_ALIASES: Readonly<Record<string, Dialect>> = {
  o: 'oracle',
  m: 'mysql',
  p: 'postgresql',
  postgres: 'postgresql',
};

export function isDialect(value: unknown): value is Dialect {
  return typeof value === 'string' && ALL_DIALECTS.some(dialect => dialect === value);
}

/**
 * Normalize a dialect name. Accepts the full names and the one-letter forms
 * `O`, `M` and `P`, in any case.
 */
export function parseDialect(value: unknown): Dialect {
  if (typeof value === 'string') {
    const key = value.trim().toLowerCase();
    if (isDialect(key)) return key;
    const alias = DIALECT_ALIASES[key];
    if (alias !== undefined) return alias;
  }
  throw new ConfigurationError(
    `Unsupported dialect: ${String(value)}. Expected one of ${ALL_DIALECTS.join(', ')} (or O, M, P)`,
  );
}
