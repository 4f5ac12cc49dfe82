import { describe, expect, it } from 'vitest';
import {
  countChar,
  lineAndColumn,
  maskSql,
  rewriteFunctionCalls,
  splitSegments,
  splitTerminator,
  splitTopLevel,
  swapFirstTwoArgs,
  topLevelView,
  unqualified,
  withMaskedSql,
} from '../../src/utils/sqlText';

describe('maskSql', () => {
  it('hides literal and comment bodies and restores them on unmask', () => {
    const sql = "SELECT 'a;b' FROM t -- x;\n";
    const mask = maskSql(sql);
    expect(mask.text).not.toContain(';');
    expect(mask.unmask(mask.text)).toBe(sql);
  });

  it('exposes the content of a masked literal', () => {
    const mask = maskSql("SELECT 'it''s' FROM dual");
    const literal = /'[^']*'/.exec(mask.text);
    expect(literal).not.toBeNull();
    expect(mask.literalValue(literal?.[0] ?? '')).toBe("it''s");
  });

  it('keeps optimizer hints visible', () => {
    const sql = 'SELECT /*+ FULL(t) */ a FROM t';
    expect(maskSql(sql).text).toBe(sql);
  });

  it('leaves an odd quote count for an unclosed literal', () => {
    const mask = maskSql("SELECT 'abc");
    expect(countChar(mask.text, "'")).toBe(1);
    expect(mask.unmask(mask.text)).toBe("SELECT 'abc");
  });

  it('treats backslash-escaped quotes as literal content only when asked', () => {
    const sql = "SELECT 'a\\'b' FROM t";
    expect(countChar(maskSql(sql, { backslashEscapes: true }).text, "'")).toBe(2);
    expect(countChar(maskSql(sql).text, "'")).toBe(3);
  });

  it('restores backslash escapes in standard form when asked', () => {
    const mask = maskSql("SELECT 'a\\'b', 'C:\\\\tmp', 'x\\ny' FROM t", { backslashEscapes: true, standardEscapes: true });
    expect(mask.unmask(mask.text)).toBe("SELECT 'a''b', 'C:\\tmp', 'x\\ny' FROM t");
  });

  it('masks dollar-quoted bodies', () => {
    const mask = maskSql('SELECT $$a;b$$');
    expect(mask.text).not.toContain(';');
    expect(mask.text.startsWith('SELECT $$')).toBe(true);
  });

  it('registers new literals that survive unmasking', () => {
    const mask = maskSql('SELECT 1');
    expect(mask.unmask(`SELECT ${mask.addLiteral('x')}`)).toBe("SELECT 'x'");
  });
});

describe('withMaskedSql', () => {
  it('never rewrites inside literals', () => {
    const out = withMaskedSql("SELECT nvl(a, 'nvl(b)') FROM t", masked => masked.replace(/nvl/g, 'COALESCE'));
    expect(out).toBe("SELECT COALESCE(a, 'nvl(b)') FROM t");
  });
});

describe('rewriteFunctionCalls', () => {
  it('rewrites nested calls innermost first', () => {
    const out = rewriteFunctionCalls('SELECT nvl(nvl(a, b), c) FROM t', ['NVL'], call => `COALESCE(${call.inner})`);
    expect(out).toBe('SELECT COALESCE(COALESCE(a, b), c) FROM t');
  });

  it('keeps the call when the callback declines', () => {
    const out = rewriteFunctionCalls('SELECT f (x)', ['f'], () => undefined);
    expect(out).toBe('SELECT f (x)');
  });

  it('ignores qualified names', () => {
    const out = rewriteFunctionCalls('SELECT pkg.nvl(a, b)', ['NVL'], () => 'X');
    expect(out).toBe('SELECT pkg.nvl(a, b)');
  });
});

describe('argument helpers', () => {
  it('splits on top-level commas only', () => {
    expect(splitTopLevel('a, f(b, c), d')).toEqual(['a', 'f(b, c)', 'd']);
    expect(splitTopLevel('  ')).toEqual([]);
  });

  it('swaps the first two arguments keeping spacing', () => {
    expect(swapFirstTwoArgs('a, b, c')).toBe('b, a, c');
    expect(swapFirstTwoArgs('a')).toBe('a');
  });
});

describe('statement helpers', () => {
  it('splits segments at top-level semicolons and keeps them', () => {
    expect(splitSegments('SELECT 1; SELECT (2;3);')).toEqual(['SELECT 1;', ' SELECT (2;3);']);
  });

  it('separates the terminator from the body', () => {
    expect(splitTerminator('SELECT 1;\n')).toEqual({ body: 'SELECT 1', terminator: ';\n' });
    expect(splitTerminator('SELECT 1')).toEqual({ body: 'SELECT 1', terminator: '' });
  });

  it('blanks parenthesised groups in the top-level view', () => {
    expect(topLevelView('a(b)c')).toBe('a   c');
  });

  it('reports 1-based line and column', () => {
    expect(lineAndColumn('ab\ncd', 4)).toEqual({ line: 2, column: 2 });
  });

  it('takes the last component of a dotted name', () => {
    expect(unqualified('s.t.col')).toBe('col');
  });
});
