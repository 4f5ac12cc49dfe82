/**
 * Text helpers shared by every regex-driven stage.
 *
 * Rewrites must never fire inside string literals or comments, so stages work
 * on a masked copy of the SQL where literal and comment bodies are swapped for
 * placeholder tokens built from private-use code points. Quotes and comment
 * delimiters stay in place, so quote balance and statement boundaries are
 * unaffected by masking.
 */

const LITERAL_OPEN = '\uE000';
const LITERAL_CLOSE = '\uE001';
const TOKEN_PATTERN = /\uE000(\d+)\uE001/g;

export interface MaskOptions {
  /** MySQL treats `\'` inside a string as an escaped quote. */
  backslashEscapes?: boolean;
  /**
   * Store backslash-escaped literals in standard form, so `\'` comes back as
   * `''` and `\\` as `\`. For MySQL text headed to a dialect where backslash
   * is an ordinary character.
   */
  standardEscapes?: boolean;
}

export class MaskedSql {
  readonly text: string;
  private readonly bodies: string[];

  constructor(text: string, bodies: string[]) {
    this.text = text;
    this.bodies = bodies;
  }

  /** Restore every placeholder in `text` to its original body. */
  unmask(text: string): string {
    return text.replace(TOKEN_PATTERN, (token, index: string) => this.bodies[Number(index)] ?? token);
  }

  /**
   * Content of a quoted literal such as `'<token>'` appearing in masked text.
   * Returns undefined when the value is not a single masked literal.
   */
  literalValue(quoted: string): string | undefined {
    const match = /^'\uE000(\d+)\uE001'$/.exec(quoted.trim());
    if (!match) return undefined;
    return this.bodies[Number(match[1])];
  }

  /** Register new literal content and return the quoted, masked form. */
  addLiteral(content: string): string {
    return `'${this.addText(content)}'`;
  }

  /** Register text that later stages must not rewrite, such as a generated comment body. */
  addText(content: string): string {
    this.bodies.push(content);
    return `${LITERAL_OPEN}${this.bodies.length - 1}${LITERAL_CLOSE}`;
  }

  /** A block comment whose body is hidden from later stages. */
  comment(content: string): string {
    return `/*${this.addText(` ${this.unmask(content).replace(/\*\//g, '* /')} `)}*/`;
  }
}

function placeholder(bodies: string[], body: string): string {
  if (body.length === 0) return '';
  bodies.push(body);
  return `${LITERAL_OPEN}${bodies.length - 1}${LITERAL_CLOSE}`;
}

export function maskSql(sql: string, options: MaskOptions = {}): MaskedSql {
  const bodies: string[] = [];
  let out = '';
  let i = 0;

  while (i < sql.length) {
    const char = sql[i];
    const next = sql[i + 1] ?? '';

    // String literal
    if (char === "'") {
      let j = i + 1;
      let body = '';
      let closed = false;
      while (j < sql.length) {
        const c = sql[j];
        if (options.backslashEscapes && c === '\\' && j + 1 < sql.length) {
          const escaped = sql[j + 1];
          if (options.standardEscapes && (escaped === "'" || escaped === '\\')) {
            body += escaped === "'" ? "''" : '\\';
          } else {
            body += c + escaped;
          }
          j += 2;
          continue;
        }
        if (c === "'") {
          if (sql[j + 1] === "'") {
            body += "''";
            j += 2;
            continue;
          }
          closed = true;
          break;
        }
        body += c;
        j++;
      }
      out += `'${placeholder(bodies, body)}${closed ? "'" : ''}`;
      i = closed ? j + 1 : j;
      continue;
    }

    // Dollar-quoted body
    if (char === '$') {
      const tag = /^\$([A-Za-z_]\w*)?\$/.exec(sql.slice(i));
      if (tag) {
        const delimiter = tag[0];
        const end = sql.indexOf(delimiter, i + delimiter.length);
        const bodyEnd = end === -1 ? sql.length : end;
        out += delimiter + placeholder(bodies, sql.slice(i + delimiter.length, bodyEnd));
        if (end !== -1) out += delimiter;
        i = end === -1 ? sql.length : end + delimiter.length;
        continue;
      }
    }

    // Line comment
    if (char === '-' && next === '-') {
      const end = sql.indexOf('\n', i);
      const bodyEnd = end === -1 ? sql.length : end;
      out += '--' + placeholder(bodies, sql.slice(i + 2, bodyEnd));
      i = bodyEnd;
      continue;
    }

    // Block comment; optimizer hints stay visible
    if (char === '/' && next === '*') {
      const end = sql.indexOf('*/', i + 2);
      const bodyEnd = end === -1 ? sql.length : end;
      const body = sql.slice(i + 2, bodyEnd);
      out += '/*' + (body.startsWith('+') ? body : placeholder(bodies, body));
      if (end !== -1) out += '*/';
      i = end === -1 ? sql.length : end + 2;
      continue;
    }

    // Quoted identifier: copied verbatim so `;` or `'` inside it stay inert
    if (char === '"' || char === '`') {
      const end = sql.indexOf(char, i + 1);
      const stop = end === -1 ? sql.length : end + 1;
      out += sql.slice(i, stop);
      i = stop;
      continue;
    }

    out += char;
    i++;
  }

  return new MaskedSql(out, bodies);
}

/** Run `transform` over the masked text and restore literals afterwards. */
export function withMaskedSql(
  sql: string,
  transform: (masked: string, mask: MaskedSql) => string,
  options: MaskOptions = {},
): string {
  const mask = maskSql(sql, options);
  return mask.unmask(transform(mask.text, mask));
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Index of the parenthesis closing the one at `openIndex`, or -1. */
export function findClosingParen(text: string, openIndex: number): number {
  let depth = 0;
  for (let i = openIndex; i < text.length; i++) {
    const char = text[i];
    if (char === '(') depth++;
    else if (char === ')') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/** Split on top-level separators, keeping surrounding whitespace. */
export function splitTopLevelRaw(text: string, separator = ','): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = '';
  for (const char of text) {
    if (char === '(') depth++;
    if (char === ')') depth--;
    if (char === separator && depth === 0) {
      parts.push(current);
      current = '';
      continue;
    }
    current += char;
  }
  parts.push(current);
  return parts;
}

/** Split an argument list on top-level commas. Expects masked text. */
export function splitTopLevel(text: string, separator = ','): string[] {
  if (text.trim() === '') return [];
  return splitTopLevelRaw(text, separator).map(part => part.trim());
}

export interface FunctionCall {
  /** Name as written in the source text. */
  name: string;
  /** Whitespace between the name and the opening parenthesis. */
  gap: string;
  /** Argument text with nested calls already rewritten, spacing intact. */
  inner: string;
  args: string[];
}

/** Swap the first two arguments of an argument list, keeping its spacing. */
export function swapFirstTwoArgs(inner: string): string {
  const parts = splitTopLevelRaw(inner);
  if (parts.length < 2) return inner;
  const wrap = (part: string) => {
    const lead = /^\s*/.exec(part)?.[0] ?? '';
    const trail = /\s*$/.exec(part)?.[0] ?? '';
    return { lead, trail, core: part.trim() };
  };
  const first = wrap(parts[0]);
  const second = wrap(parts[1]);
  parts[0] = first.lead + second.core + first.trail;
  parts[1] = second.lead + first.core + second.trail;
  return parts.join(',');
}

/**
 * Rewrite every call whose name matches `names`, innermost arguments first.
 *
 * `rewrite` receives the call with already-rewritten arguments and returns the
 * replacement text, or undefined to keep the call as written.
 */
export function rewriteFunctionCalls(
  text: string,
  names: readonly string[],
  rewrite: (call: FunctionCall) => string | undefined,
): string {
  if (names.length === 0) return text;
  const pattern = new RegExp(
    `(?<![\\w.$"\`])(${names.map(escapeRegExp).join('|')})(\\s*)\\(`,
    'gi',
  );

  const visit = (input: string): string => {
    const matches: Array<{ index: number; name: string; gap: string; open: number }> = [];
    pattern.lastIndex = 0;
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(input)) !== null) {
      matches.push({
        index: match.index,
        name: match[1],
        gap: match[2],
        open: match.index + match[0].length - 1,
      });
    }

    let out = '';
    let cursor = 0;
    for (const found of matches) {
      if (found.index < cursor) continue;
      const close = findClosingParen(input, found.open);
      if (close === -1) continue;
      const inner = visit(input.slice(found.open + 1, close));
      const call: FunctionCall = { name: found.name, gap: found.gap, inner, args: splitTopLevel(inner) };
      const replacement = rewrite(call) ?? `${found.name}${found.gap}(${inner})`;
      out += input.slice(cursor, found.index) + replacement;
      cursor = close + 1;
    }
    return out + input.slice(cursor);
  };

  return visit(text);
}

/** Statement segments of masked text, each keeping its terminating `;`. */
export function splitSegments(masked: string): string[] {
  const segments: string[] = [];
  let depth = 0;
  let current = '';
  for (const char of masked) {
    current += char;
    if (char === '(') depth++;
    if (char === ')') depth = Math.max(0, depth - 1);
    if (char === ';' && depth === 0) {
      segments.push(current);
      current = '';
    }
  }
  if (current.length > 0) segments.push(current);
  return segments;
}

/** Apply `transform` only to statements accepted by `predicate`. */
export function mapSegments(
  masked: string,
  predicate: (segment: string) => boolean,
  transform: (segment: string) => string,
): string {
  return splitSegments(masked)
    .map(segment => (predicate(segment) ? transform(segment) : segment))
    .join('');
}

export function countChar(text: string, char: string): number {
  let count = 0;
  for (const c of text) if (c === char) count++;
  return count;
}

/** 1-based line and column of `offset` in `text`. */
export function lineAndColumn(text: string, offset: number): { line: number; column: number } {
  const before = text.slice(0, offset);
  const lines = before.split('\n');
  return { line: lines.length, column: lines[lines.length - 1].length + 1 };
}

/** Replace the argument at `index`, keeping the whitespace around it. */
export function replaceArg(inner: string, index: number, value: string): string {
  const parts = splitTopLevelRaw(inner);
  if (index >= parts.length) return inner;
  const part = parts[index];
  const lead = /^\s*/.exec(part)?.[0] ?? '';
  const trail = /\s*$/.exec(part)?.[0] ?? '';
  parts[index] = lead + value + trail;
  return parts.join(',');
}

/** Index of the parenthesis opening the one closed at `closeIndex`, or -1. */
export function findOpeningParen(text: string, closeIndex: number): number {
  let depth = 0;
  for (let i = closeIndex; i >= 0; i--) {
    const char = text[i];
    if (char === ')') depth++;
    else if (char === '(') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

const TERM_CHAR = /[\w$."`]/;

/**
 * Start of the operand that ends right before `end` (exclusive): a literal,
 * an identifier path, a parenthesised group or a function call.
 */
export function operandStart(text: string, end: number): number {
  let i = end - 1;
  while (i >= 0 && /\s/.test(text[i])) i--;
  if (i < 0) return -1;
  if (text[i] === "'") {
    const open = text.lastIndexOf("'", i - 1);
    return open;
  }
  if (text[i] === ')') {
    const open = findOpeningParen(text, i);
    if (open === -1) return -1;
    i = open - 1;
    while (i >= 0 && /[\w$.]/.test(text[i])) i--;
    return i + 1;
  }
  const stop = i;
  while (i >= 0 && TERM_CHAR.test(text[i])) i--;
  return i === stop ? -1 : i + 1;
}

/** End (exclusive) of the operand starting at or after `start`. */
export function operandEnd(text: string, start: number): number {
  let i = start;
  while (i < text.length && /\s/.test(text[i])) i++;
  if (i >= text.length) return -1;
  if (text[i] === "'") {
    const close = text.indexOf("'", i + 1);
    return close === -1 ? -1 : close + 1;
  }
  if (text[i] === '(') {
    const close = findClosingParen(text, i);
    return close === -1 ? -1 : close + 1;
  }
  const begin = i;
  while (i < text.length && TERM_CHAR.test(text[i])) i++;
  if (i === begin) return -1;
  if (text[i] === '(') {
    const close = findClosingParen(text, i);
    return close === -1 ? -1 : close + 1;
  }
  return i;
}

/** Text with every parenthesised group blanked out, offsets preserved. */
export function topLevelView(text: string): string {
  let depth = 0;
  let out = '';
  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (char === '(') depth++;
    out += depth > 0 ? ' ' : char;
    if (char === ')') depth = Math.max(0, depth - 1);
  }
  return out;
}

/** Split a statement into its body and the trailing `;` plus whitespace. */
export function splitTerminator(segment: string): { body: string; terminator: string } {
  const match = /\s*;?\s*$/.exec(segment);
  const at = match ? match.index : segment.length;
  return { body: segment.slice(0, at), terminator: segment.slice(at) };
}

/** Last component of a dotted name: `s.t.col` gives `col`. */
export function unqualified(name: string): string {
  const parts = name.split('.');
  return parts[parts.length - 1].trim();
}
