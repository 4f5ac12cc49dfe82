import type { Dialect } from '../types/sql';
import { maskSql } from '../utils/sqlText';

export const DEFAULT_LARGE_SQL_THRESHOLD = 100_000;
export const DEFAULT_CHUNK_SIZE = 50;

export interface SqlChunk {
  /** 1-based position in the script. */
  index: number;
  sql: string;
  statementCount: number;
}

// Oracle program units run until a line holding only `/`
const BLOCK_START =
  /\s*(?:CREATE\s+(?:OR\s+REPLACE\s+)?(?:(?:NON)?EDITIONABLE\s+)?(?:PROCEDURE|FUNCTION|TRIGGER|PACKAGE|TYPE\s+BODY)\b|DECLARE\b|BEGIN\b)/iy;
const SLASH_LINE = /[ \t]*\/[ \t]*(?:\r?\n|$)/y;
const COMMENT = /--[^\n]*|\/\*[\s\S]*?(?:\*\/|$)/y;

function matchAt(pattern: RegExp, text: string, index: number): RegExpExecArray | null {
  pattern.lastIndex = index;
  return pattern.exec(text);
}

/**
 * Split a script into statements. `;` ends a statement outside literals,
 * comments and parentheses; for Oracle sources a PL/SQL block ends at a line
 * holding only `/`, which stays attached to the block.
 */
export function splitStatements(sql: string, source: Dialect = 'oracle'): string[] {
  const mask = maskSql(sql, { backslashEscapes: source === 'mysql' });
  const text = mask.text;
  const statements: string[] = [];
  let current = '';
  let depth = 0;
  let started = false;
  let inBlock = false;

  const flush = () => {
    const statement = mask.unmask(current).trim();
    if (statement.length > 0) statements.push(statement);
    current = '';
    depth = 0;
    started = false;
    inBlock = false;
  };

  let i = 0;
  while (i < text.length) {
    if (i === 0 || text[i - 1] === '\n') {
      const slash = matchAt(SLASH_LINE, text, i);
      if (slash) {
        if (inBlock) current = `${current.trimEnd()}\n/`;
        flush();
        i += slash[0].length;
        continue;
      }
    }

    const char = text[i];
    if (!started && !/\s/.test(char)) {
      // Leading comments belong to the statement but do not start it
      const comment = matchAt(COMMENT, text, i);
      if (comment) {
        current += comment[0];
        i += comment[0].length;
        continue;
      }
      started = true;
      inBlock = source === 'oracle' && matchAt(BLOCK_START, text, i) !== null;
    }

    current += char;
    if (char === '(') depth++;
    if (char === ')') depth = Math.max(0, depth - 1);
    if (char === ';' && depth === 0 && !inBlock) flush();
    i++;
  }
  flush();
  return statements;
}

/** Group statements into chunks of at most `chunkSize`, in script order. */
export function chunkStatements(statements: readonly string[], chunkSize = DEFAULT_CHUNK_SIZE): SqlChunk[] {
  const size = Math.max(1, Math.floor(chunkSize));
  const chunks: SqlChunk[] = [];
  for (let start = 0; start < statements.length; start += size) {
    const slice = statements.slice(start, start + size);
    chunks.push({ index: chunks.length + 1, sql: slice.join('\n'), statementCount: slice.length });
  }
  return chunks;
}

export function splitIntoChunks(sql: string, source: Dialect, chunkSize = DEFAULT_CHUNK_SIZE): SqlChunk[] {
  return chunkStatements(splitStatements(sql, source), chunkSize);
}

/** Failed chunk: its original text behind a comment naming the error. */
export function failedChunkText(chunk: SqlChunk, message: string): string {
  return `/* conversion failed: ${message.replace(/\*\//g, '* /')} */\n${chunk.sql}`;
}

/** Join chunk outputs in chunk order, whatever order they finished in. */
export function reassemble(parts: ReadonlyArray<{ index: number; sql: string }>): string {
  return [...parts]
    .sort((a, b) => a.index - b.index)
    .map(part => part.sql.trim())
    .filter(sql => sql.length > 0)
    .join('\n\n');
}
