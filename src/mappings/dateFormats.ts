import { z } from 'zod';
import rawDateFormats from './dateFormats.json';
import type { Dialect } from '../types/sql';

const TokenTableSchema = z.array(z.tuple([z.string().min(1), z.string()]));

const DateFormatsSchema = z.object({
  oracleToMysql: TokenTableSchema,
  mysqlToOracle: TokenTableSchema,
});

const dateFormats = DateFormatsSchema.parse(rawDateFormats);

const byLength = (table: Array<[string, string]>) =>
  [...table].sort((a, b) => b[0].length - a[0].length);

const ORACLE_TO_MYSQL = byLength(dateFormats.oracleToMysql);
const MYSQL_TO_ORACLE = byLength(dateFormats.mysqlToOracle);

/** Oracle and PostgreSQL share the `YYYY-MM-DD HH24:MI:SS` token family. */
const usesPercentTokens = (dialect: Dialect) => dialect === 'mysql';

/** A mask made only of digits, `9`, `0`, separators and currency marks is a number format. */
export function isNumericFormat(format: string): boolean {
  return /^[\s90.,$GDSLVXMIPRBEFMC+-]+$/i.test(format) && /[90]/.test(format);
}

function convertOracleTokens(format: string): string {
  let out = '';
  let i = 0;
  while (i < format.length) {
    // Double-quoted text in an Oracle mask is literal
    if (format[i] === '"') {
      const end = format.indexOf('"', i + 1);
      const stop = end === -1 ? format.length : end;
      out += format.slice(i + 1, stop);
      i = stop + 1;
      continue;
    }
    const rest = format.slice(i).toUpperCase();
    const token = ORACLE_TO_MYSQL.find(([from]) => rest.startsWith(from));
    if (token) {
      out += token[1];
      i += token[0].length;
    } else {
      out += format[i];
      i++;
    }
  }
  return out;
}

function convertPercentTokens(format: string): string {
  let out = '';
  let i = 0;
  while (i < format.length) {
    const pair = format.slice(i, i + 2);
    const token = format[i] === '%' ? MYSQL_TO_ORACLE.find(([from]) => from === pair) : undefined;
    if (token) {
      out += token[1];
      i += 2;
    } else {
      out += format[i];
      i++;
    }
  }
  return out;
}

/**
 * Remap a date format mask between dialects. Returns the mask unchanged when
 * both sides use the same token family.
 */
export function convertDateFormat(format: string, source: Dialect, target: Dialect): string {
  const from = usesPercentTokens(source);
  const to = usesPercentTokens(target);
  if (from === to) return format;
  return from ? convertPercentTokens(format) : convertOracleTokens(format);
}
