import { describe, expect, it } from 'vitest';
import {
  chunkStatements,
  failedChunkText,
  reassemble,
  splitIntoChunks,
  splitStatements,
} from '../../src/converter/largeSql';

describe('splitStatements', () => {
  it('keeps PL/SQL blocks together up to the slash line', () => {
    const script = [
      'SELECT 1 FROM dual;',
      'CREATE OR REPLACE PROCEDURE p AS',
      'BEGIN',
      '  NULL;',
      'END;',
      '/',
      "SELECT 'a;b' FROM dual;",
    ].join('\n');
    expect(splitStatements(script, 'oracle')).toEqual([
      'SELECT 1 FROM dual;',
      'CREATE OR REPLACE PROCEDURE p AS\nBEGIN\n  NULL;\nEND;\n/',
      "SELECT 'a;b' FROM dual;",
    ]);
  });

  it('splits MySQL scripts on semicolons', () => {
    expect(splitStatements('SELECT 1; SELECT 2', 'mysql')).toEqual(['SELECT 1;', 'SELECT 2']);
  });

  it('ignores semicolons inside parentheses and comments', () => {
    expect(splitStatements('SELECT (1;2);\n-- a; b\nSELECT 3;', 'postgresql')).toEqual([
      'SELECT (1;2);',
      '-- a; b\nSELECT 3;',
    ]);
  });
});

describe('chunkStatements', () => {
  it('groups statements in order with 1-based indexes', () => {
    expect(chunkStatements(['a', 'b', 'c'], 2)).toEqual([
      { index: 1, sql: 'a\nb', statementCount: 2 },
      { index: 2, sql: 'c', statementCount: 1 },
    ]);
  });

  it('treats a chunk size below one as one', () => {
    expect(chunkStatements(['a', 'b'], 0).map(chunk => chunk.sql)).toEqual(['a', 'b']);
  });

  it('splits and chunks a script', () => {
    expect(splitIntoChunks('SELECT 1; SELECT 2; SELECT 3;', 'postgresql', 2).map(chunk => chunk.statementCount)).toEqual([
      2, 1,
    ]);
  });
});

describe('failedChunkText', () => {
  it('keeps the original text behind a comment', () => {
    expect(failedChunkText({ index: 1, sql: 'SELECT 1', statementCount: 1 }, 'bad */ thing')).toBe(
      '/* conversion failed: bad * / thing */\nSELECT 1',
    );
  });
});

describe('reassemble', () => {
  it('joins parts in index order and drops empty ones', () => {
    expect(
      reassemble([
        { index: 2, sql: 'B' },
        { index: 1, sql: ' A ' },
        { index: 3, sql: '  ' },
      ]),
    ).toBe('A\n\nB');
  });
});
