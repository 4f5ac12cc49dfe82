import type { ConversionWarning } from '../../types/sql';
import {
  findClosingParen,
  mapSegments,
  operandEnd,
  operandStart,
  splitTerminator,
  topLevelView,
} from '../../utils/sqlText';
import type { ConversionContext, StepRecorder } from '../context';
import { SQL_PATTERNS } from '../sqlPatterns';
import { createWarning } from '../warnings';

const NOT_AN_OPERAND = /^(?:END|THEN|ELSE|WHEN|SELECT|AND|OR|NOT|CASE)$/i;

/** Split a condition on top-level AND, leaving BETWEEN ... AND ... intact. */
function splitConditions(where: string): string[] {
  const view = topLevelView(where);
  const parts: string[] = [];
  let start = 0;
  let pendingBetween = false;
  const tokens = /\bBETWEEN\b|\bAND\b/gi;
  let match: RegExpExecArray | null;
  while ((match = tokens.exec(view)) !== null) {
    if (/^BETWEEN$/i.test(match[0])) {
      pendingBetween = true;
      continue;
    }
    if (pendingBetween) {
      pendingBetween = false;
      continue;
    }
    parts.push(where.slice(start, match.index).trim());
    start = match.index + match[0].length;
  }
  parts.push(where.slice(start).trim());
  return parts.filter(part => part.length > 0);
}

/** Offset of the end of the statement body, before any trailing `;` and whitespace. */
function bodyEnd(segment: string): number {
  const trailing = /\s*;?\s*$/.exec(segment);
  return trailing ? trailing.index : segment.length;
}

/** Index of the unmatched `(` enclosing `offset`, or -1 at top level. */
function enclosingParen(text: string, offset: number): number {
  let depth = 0;
  for (let i = offset - 1; i >= 0; i--) {
    if (text[i] === ')') depth++;
    else if (text[i] === '(') {
      if (depth === 0) return i;
      depth--;
    }
  }
  return -1;
}

const SET_OPERATOR = /\b(?:UNION(?:\s+ALL)?|INTERSECT|MINUS|EXCEPT)\b/gi;

/** Apply `addDual` to the queries nested in parentheses, at any depth. */
function nestedDual(text: string): string {
  let out = '';
  let cursor = 0;
  for (let i = 0; i < text.length; i++) {
    if (text[i] !== '(') continue;
    const close = findClosingParen(text, i);
    if (close === -1) break;
    const inner = text.slice(i + 1, close);
    out += text.slice(cursor, i + 1) + (/^\s*(?:SELECT|WITH)\b/i.test(inner) ? addDual(inner) : nestedDual(inner)) + ')';
    cursor = close + 1;
    i = close;
  }
  return out + text.slice(cursor);
}

/**
 * Append FROM DUAL to every FROM-less SELECT in `block`, including those
 * nested in subqueries and CTE bodies.
 */
function addDual(block: string): string {
  const nested = nestedDual(block);

  // Each arm of a set operation is its own query block
  const view = topLevelView(nested);
  const bounds: number[] = [0];
  for (const match of view.matchAll(SET_OPERATOR)) {
    if (match.index !== undefined) bounds.push(match.index, match.index + match[0].length);
  }
  bounds.push(nested.length);

  let result = '';
  for (let k = 0; k < bounds.length; k += 2) {
    const start = bounds[k];
    const end = bounds[k + 1];
    const arm = nested.slice(start, end);
    const armView = view.slice(start, end);
    const select = /\bSELECT\b/i.exec(armView);
    const needsDual =
      select !== null &&
      !/\b(?:GRANT|REVOKE|AUDIT)\b/i.test(armView.slice(0, select.index)) &&
      !/\bFROM\b/i.test(armView.slice(select.index));
    const at = arm.trimEnd().length;
    result += needsDual ? `${arm.slice(0, at)} FROM DUAL${arm.slice(at)}` : arm;
    if (k + 2 < bounds.length) result += nested.slice(end, bounds[k + 2]);
  }
  return result;
}

export class DMLTransformer {
  /** Oracle `ROWNUM <= n` filters become `LIMIT n` in the same query block. */
  transformRownum(text: string, ctx: ConversionContext, recorder: StepRecorder): string {
    if (ctx.source !== 'oracle' || ctx.target === 'oracle' || !ctx.config.function.convertRownum) return text;
    return mapSegments(
      text,
      segment => SQL_PATTERNS.ROWNUM.test(segment),
      segment => this.rownumToLimit(segment, recorder),
    );
  }

  private rownumToLimit(segment: string, recorder: StepRecorder): string {
    let out = segment;
    for (let guard = 0; guard < 10; guard++) {
      const match = /\bROWNUM\s*(<=|<|=)\s*(\d+)/i.exec(out);
      if (!match) break;
      const bound = Number(match[2]);
      if (match[1] === '=' && bound !== 1) {
        recorder.warn(createWarning('manual-review-needed', `ROWNUM = ${bound} never matches a row`, 'warning'));
        break;
      }
      const limit = match[1] === '<' ? bound - 1 : bound;

      let before = out.slice(0, match.index);
      let after = out.slice(match.index + match[0].length);
      if (/\bWHERE\s+$/i.test(before)) {
        if (/^\s+AND\s+/i.test(after)) after = after.replace(/^\s+AND\s+/i, '');
        else before = before.replace(/\s*\bWHERE\s+$/i, '');
      } else if (/\s+AND\s+$/i.test(before)) {
        before = before.replace(/\s+AND\s+$/i, '');
      } else {
        recorder.warn(
          createWarning(
            'manual-review-needed',
            'ROWNUM condition could not be turned into LIMIT',
            'warning',
            'Use LIMIT or ROW_NUMBER() OVER () instead of ROWNUM',
          ),
        );
        break;
      }

      out = before + after;
      const open = enclosingParen(out, before.length);
      let insertAt: number;
      if (open === -1) {
        insertAt = bodyEnd(out);
      } else {
        const close = findClosingParen(out, open);
        insertAt = close === -1 ? bodyEnd(out) : out.slice(0, close).trimEnd().length;
      }
      const scope = out.slice(open + 1, insertAt);
      if (/\bORDER\s+BY\b/i.test(topLevelView(scope))) {
        recorder.warn(
          createWarning(
            'syntax-difference',
            'ROWNUM is evaluated before ORDER BY in Oracle; LIMIT applies after sorting',
            'info',
          ),
        );
      }
      out = `${out.slice(0, insertAt)} LIMIT ${limit}${out.slice(insertAt)}`;
      recorder.rule('ROWNUM → LIMIT');
    }

    // ROWNUM left in a select list
    return out.replace(/\bROWNUM\b(?!\s*[<>=!])/gi, () => {
      recorder.rule('ROWNUM → ROW_NUMBER() OVER ()');
      return 'ROW_NUMBER() OVER ()';
    });
  }

  /** LIMIT/OFFSET forms for the target dialect. */
  transformLimit(text: string, ctx: ConversionContext, recorder: StepRecorder): string {
    if (ctx.source === 'oracle' || !ctx.config.function.convertRownum) return text;
    if (ctx.target === 'oracle') {
      return recorder.apply(text, 'LIMIT → FETCH FIRST', sql =>
        sql
          .replace(/\bLIMIT\s+(\d+)\s*,\s*(\d+)/gi, 'OFFSET $1 ROWS FETCH NEXT $2 ROWS ONLY')
          .replace(/\bLIMIT\s+(\d+)\s+OFFSET\s+(\d+)/gi, 'OFFSET $2 ROWS FETCH NEXT $1 ROWS ONLY')
          .replace(/\bOFFSET\s+(\d+)\s+LIMIT\s+(\d+)/gi, 'OFFSET $1 ROWS FETCH NEXT $2 ROWS ONLY')
          .replace(/\bLIMIT\s+(\d+)/gi, 'FETCH FIRST $1 ROWS ONLY')
          .replace(/\bOFFSET\s+(\d+)\b(?!\s+ROWS?\b)/gi, 'OFFSET $1 ROWS'),
      );
    }
    if (ctx.source === 'mysql' && ctx.target === 'postgresql') {
      return recorder.apply(text, 'LIMIT a, b → LIMIT b OFFSET a', sql =>
        sql.replace(/\bLIMIT\s+(\d+)\s*,\s*(\d+)/gi, 'LIMIT $2 OFFSET $1'),
      );
    }
    return text;
  }

  /** DUAL is dropped for PostgreSQL and added to FROM-less SELECTs for Oracle. */
  transformDual(text: string, ctx: ConversionContext, recorder: StepRecorder): string {
    if (!ctx.config.function.handleDualTable) return text;
    if (ctx.target === 'postgresql') {
      return recorder.apply(text, 'FROM DUAL removed', sql => sql.replace(/\s+FROM\s+DUAL\b/gi, ''));
    }
    if (ctx.target !== 'oracle') return text;
    return mapSegments(
      text,
      segment => /\bSELECT\b/i.test(segment),
      segment => {
        const { body, terminator } = splitTerminator(segment);
        const converted = addDual(body);
        if (converted !== body) recorder.rule('FROM DUAL added');
        return converted + terminator;
      },
    );
  }

  /** Oracle `(+)` outer joins become ANSI LEFT JOIN for the two-table case. */
  transformOuterJoin(text: string, ctx: ConversionContext, recorder: StepRecorder): string {
    if (ctx.source !== 'oracle' || ctx.target === 'oracle' || !ctx.config.syntax.convertOracleJoin) return text;
    return mapSegments(
      text,
      segment => SQL_PATTERNS.ORACLE_OUTER_JOIN.test(segment),
      segment => {
        const converted = this.outerJoinSegment(segment);
        if (converted === undefined) {
          recorder.warn(
            createWarning(
              'manual-review-needed',
              'Oracle (+) outer join needs manual conversion',
              'warning',
              'Rewrite the join with LEFT JOIN ... ON',
            ),
          );
          return segment;
        }
        recorder.rule('Oracle (+) join → LEFT JOIN');
        return converted;
      },
    );
  }

  private outerJoinSegment(segment: string): string | undefined {
    const from = /\bFROM\s+([\w$.]+)(?:\s+(?:AS\s+)?(?!WHERE\b)([\w$]+))?\s*,\s*([\w$.]+)(?:\s+(?:AS\s+)?(?!WHERE\b)([\w$]+))?\s+WHERE\s+/i.exec(
      segment,
    );
    if (!from) return undefined;
    const whereStart = from.index + from[0].length;
    const tail = segment.slice(whereStart);
    const stop = /\b(?:GROUP\s+BY|ORDER\s+BY|HAVING|UNION|INTERSECT|MINUS|EXCEPT)\b|;|$/i.exec(topLevelView(tail));
    const whereEnd = whereStart + (stop ? stop.index : tail.length);
    const conditions = splitConditions(segment.slice(whereStart, whereEnd));

    const tables = [
      { name: from[1], alias: from[2] },
      { name: from[3], alias: from[4] },
    ];
    const refersTo = (column: string) =>
      tables.findIndex(table => {
        const qualifier = column.slice(0, column.lastIndexOf('.'));
        return qualifier === (table.alias ?? table.name) || qualifier === table.name;
      });

    const joinConditions: string[] = [];
    const rest: string[] = [];
    let optional = -1;
    for (const condition of conditions) {
      const outer = /([\w$.]+)\s*\(\s*\+\s*\)/.exec(condition);
      if (!outer) {
        rest.push(condition);
        continue;
      }
      const side = refersTo(outer[1]);
      if (side === -1 || (optional !== -1 && optional !== side)) return undefined;
      optional = side;
      joinConditions.push(condition.replace(/\s*\(\s*\+\s*\)/g, ''));
    }
    if (optional === -1 || joinConditions.some(condition => /\(\s*\+\s*\)/.test(condition))) return undefined;

    const render = (table: { name: string; alias?: string }) =>
      table.alias ? `${table.name} ${table.alias}` : table.name;
    const preserved = tables[1 - optional];
    const joined = `FROM ${render(preserved)} LEFT JOIN ${render(tables[optional])} ON ${joinConditions.join(' AND ')}`;
    const where = rest.length > 0 ? ` WHERE ${rest.join(' AND ')}` : '';
    const after = segment.slice(whereEnd);
    return segment.slice(0, from.index) + joined + where + (/^\s*(?:;|$)/.test(after) ? '' : ' ') + after.trimStart();
  }

  /** RETURNING support differs per dialect. */
  transformReturning(text: string, ctx: ConversionContext, recorder: StepRecorder): string {
    if (!ctx.config.syntax.convertReturning || !SQL_PATTERNS.RETURNING.test(text)) return text;
    if (ctx.target === 'mysql') {
      return text.replace(/\s+(RETURNING\s+[^;]*?)(?=\s*;|\s*$)/gi, (_match, clause: string) => {
        recorder.rule('RETURNING commented out');
        recorder.warn(
          createWarning(
            'unsupported-function',
            'MySQL does not support RETURNING',
            'warning',
            'Read generated keys with LAST_INSERT_ID() after the statement',
          ),
        );
        return ` /* ${clause} */`;
      });
    }
    if (ctx.target === 'postgresql') {
      return recorder.apply(text, 'RETURNING INTO bind variables', sql =>
        sql.replace(/(\bRETURNING\s+[^;]*?\bINTO\s+)([^;]+)/gi, (_match, head: string, targets: string) =>
          head + targets.replace(/:(\w+)/g, '$1'),
        ),
      );
    }
    if (!/\bRETURNING\b[^;]*\bINTO\b/i.test(text)) {
      recorder.warn(
        createWarning(
          'manual-review-needed',
          'Oracle RETURNING requires an INTO clause inside PL/SQL',
          'warning',
          'Add RETURNING ... INTO variables or query the row again',
        ),
      );
    }
    return text;
  }

  /** `a || b` is logical OR in MySQL; rewrite chains as CONCAT(a, b). */
  transformConcat(text: string, ctx: ConversionContext, recorder: StepRecorder): string {
    if (ctx.target !== 'mysql' || !SQL_PATTERNS.CONCAT_OPERATOR.test(text)) return text;
    const warnings: ConversionWarning[] = [];
    const out = this.concatify(text, recorder, warnings);
    if (warnings.length > 0) recorder.warn(warnings[0]);
    return out;
  }

  private concatify(text: string, recorder: StepRecorder, warnings: ConversionWarning[]): string {
    let rebuilt = '';
    let i = 0;
    while (i < text.length) {
      if (text[i] === '(') {
        const close = findClosingParen(text, i);
        if (close === -1) {
          rebuilt += text.slice(i);
          break;
        }
        rebuilt += `(${this.concatify(text.slice(i + 1, close), recorder, warnings)})`;
        i = close + 1;
        continue;
      }
      rebuilt += text[i];
      i++;
    }

    let out = rebuilt;
    let from = 0;
    for (;;) {
      const position = topLevelView(out).indexOf('||', from);
      if (position === -1) break;
      const start = operandStart(out, position);
      const operands: string[] = start === -1 ? [] : [out.slice(start, position).trim()];
      let cursor = position + 2;
      let end = -1;
      while (operands.length > 0) {
        const next = operandEnd(out, cursor);
        if (next === -1) {
          operands.length = 0;
          break;
        }
        operands.push(out.slice(cursor, next).trim());
        end = next;
        const chained = /^\s*\|\|/.exec(out.slice(next));
        if (!chained) break;
        cursor = next + chained[0].length;
      }
      if (operands.length < 2 || operands.some(operand => NOT_AN_OPERAND.test(operand))) {
        warnings.push(
          createWarning(
            'manual-review-needed',
            'String concatenation operator || left as written',
            'warning',
            'Rewrite it with CONCAT(); MySQL reads || as OR',
          ),
        );
        from = position + 2;
        continue;
      }
      const replacement = `CONCAT(${operands.join(', ')})`;
      out = out.slice(0, start) + replacement + out.slice(end);
      from = start + replacement.length;
      recorder.rule('|| → CONCAT()');
    }
    return out;
  }

  /** PostgreSQL `expr::type` becomes `CAST(expr AS type)`. */
  transformCasts(text: string, ctx: ConversionContext, recorder: StepRecorder): string {
    if (ctx.source !== 'postgresql' || ctx.target === 'postgresql' || !ctx.config.syntax.convertCasting) return text;
    let out = text;
    let from = 0;
    for (;;) {
      const position = out.indexOf('::', from);
      if (position === -1) break;
      const type = /^::\s*([A-Za-z_]\w*(?:\s+(?:precision|varying|with(?:out)?\s+time\s+zone))?(?:\s*\([^()]*\))?)(\[\])?/i.exec(
        out.slice(position),
      );
      const start = operandStart(out, position);
      if (!type || start === -1) {
        from = position + 2;
        continue;
      }
      if (type[2]) {
        recorder.warn(createWarning('unsupported-function', `Array cast ::${type[1]}[] has no equivalent`, 'warning'));
        from = position + 2;
        continue;
      }
      const replacement = `CAST(${out.slice(start, position).trim()} AS ${type[1]})`;
      out = out.slice(0, start) + replacement + out.slice(position + type[0].length);
      from = start + replacement.length;
      recorder.rule('::type → CAST()');
    }
    return out;
  }

  /** MySQL has no NULLS FIRST/LAST. */
  transformNullOrdering(text: string, ctx: ConversionContext, recorder: StepRecorder): string {
    if (ctx.target !== 'mysql') return text;
    return text.replace(/\s+NULLS\s+(FIRST|LAST)\b/gi, (_match, placement: string) => {
      recorder.rule(`NULLS ${placement.toUpperCase()} removed`);
      recorder.warn(
        createWarning(
          'partial-support',
          `NULLS ${placement.toUpperCase()} is not supported by MySQL`,
          'warning',
          'Sort on an extra (col IS NULL) expression to control NULL placement',
        ),
      );
      return '';
    });
  }

  /** Quoted identifiers: backticks for MySQL, double quotes elsewhere. */
  transformQuoting(text: string, ctx: ConversionContext, recorder: StepRecorder): string {
    if (ctx.target === 'mysql') {
      return recorder.apply(text, 'Identifier quoting → backticks', sql => sql.replace(/"([^"\n]+)"/g, '`$1`'));
    }
    if (ctx.source === 'mysql') {
      return recorder.apply(text, 'Identifier quoting → double quotes', sql => sql.replace(/`([^`\n]+)`/g, '"$1"'));
    }
    return text;
  }
}
