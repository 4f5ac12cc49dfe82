import type { Dialect, StepResult } from '../../types/sql';
import {
  escapeRegExp,
  findClosingParen,
  mapSegments,
  splitTerminator,
  splitTopLevel,
  topLevelView,
  unqualified,
} from '../../utils/sqlText';
import { StepRecorder, type ConversionContext, type FeatureConverter } from '../context';
import { IDENTIFIER, SQL_PATTERNS } from '../sqlPatterns';
import { createWarning } from '../warnings';

const CONFLICT_KEY = /^["`]?(?:id|\w+_id|uuid|code|key)["`]?$/i;
const CONFLICT_TARGET = '(?:\\s*\\([^()]*\\)|\\s+ON\\s+CONSTRAINT\\s+[\\w$"]+)?';

interface MergeStatement {
  target: string;
  targetAlias?: string;
  source: string;
  sourceAlias: string;
  on: string;
  updateSet?: string;
  updateWhere?: string;
  deleteBranch: boolean;
  insertColumns?: string[];
  insertValues?: string[];
  insertWhere?: string;
}

interface InsertStatement {
  table: string;
  columns: string[];
  values: string[];
}

/** Assignment `lhs = rhs` split at its first top-level equals sign. */
function splitAssignment(assignment: string): [string, string] | undefined {
  const at = topLevelView(assignment).indexOf('=');
  if (at === -1) return undefined;
  return [assignment.slice(0, at).trim(), assignment.slice(at + 1).trim()];
}

function dropQualifier(expr: string, alias: string): string {
  return expr.replace(new RegExp(`(?<![\\w$.])${escapeRegExp(alias)}\\s*\\.\\s*`, 'g'), '');
}

/**
 * Cross-converts Oracle MERGE, PostgreSQL ON CONFLICT, and MySQL
 * ON DUPLICATE KEY UPDATE / INSERT IGNORE / REPLACE INTO.
 */
export class MergeConverter implements FeatureConverter {
  readonly name = 'merge';

  applies(masked: string, ctx: ConversionContext): boolean {
    return ctx.config.syntax.convertMerge && (SQL_PATTERNS.MERGE.test(masked) || SQL_PATTERNS.UPSERT.test(masked));
  }

  convert(masked: string, ctx: ConversionContext): StepResult {
    const recorder = new StepRecorder();
    const sql = mapSegments(
      masked,
      segment => SQL_PATTERNS.MERGE.test(segment) || SQL_PATTERNS.UPSERT.test(segment),
      segment => {
        if (SQL_PATTERNS.MERGE.test(segment)) return this.convertMerge(segment, ctx, recorder);
        if (ctx.target === 'oracle') return this.upsertToMerge(segment, ctx, recorder);
        if (ctx.target === 'mysql') return this.conflictToDuplicateKey(segment, recorder);
        return this.duplicateKeyToConflict(segment, ctx, recorder);
      },
    );
    return recorder.result(sql);
  }

  // Oracle MERGE

  private convertMerge(segment: string, ctx: ConversionContext, recorder: StepRecorder): string {
    if (ctx.target === 'oracle') return segment;
    const merge = this.parseMerge(segment);
    if (!merge) {
      recorder.warn(
        createWarning(
          'manual-review-needed',
          'MERGE statement could not be parsed and was left unchanged',
          'warning',
          ctx.target === 'postgresql'
            ? 'Rewrite as INSERT ... ON CONFLICT, or use MERGE on PostgreSQL 15+'
            : 'Rewrite as INSERT ... ON DUPLICATE KEY UPDATE',
        ),
      );
      return segment;
    }

    if (merge.deleteBranch) {
      recorder.warn(
        createWarning(
          'partial-support',
          'MERGE WHEN MATCHED ... DELETE branch has no upsert equivalent and was not converted',
          'warning',
          'Run a separate DELETE ... WHERE EXISTS (...) before or after the upsert',
        ),
      );
    }

    const { terminator } = splitTerminator(segment);
    const lead = /^\s*/.exec(segment)?.[0] ?? '';
    const rebuilt =
      merge.insertColumns && merge.insertValues
        ? this.mergeAsInsert(merge, ctx.target, recorder)
        : merge.updateSet
          ? this.mergeAsUpdate(merge, ctx.target)
          : undefined;
    if (rebuilt === undefined) {
      recorder.warn(
        createWarning('manual-review-needed', 'MERGE with only a DELETE branch was left unchanged', 'warning'),
      );
      return segment;
    }
    recorder.rule(`Merge: MERGE → ${ctx.target === 'postgresql' ? 'INSERT ... ON CONFLICT' : 'INSERT ... ON DUPLICATE KEY UPDATE'}`);
    return lead + rebuilt + terminator;
  }

  private parseMerge(segment: string): MergeStatement | undefined {
    const head = new RegExp(
      `\\bMERGE\\s+INTO\\s+(${IDENTIFIER})(?:\\s+(?:AS\\s+)?(?!USING\\b)([\\w$]+))?\\s+USING\\s+`,
      'i',
    ).exec(segment);
    if (!head) return undefined;

    let pos = head.index + head[0].length;
    let source: string;
    if (segment[pos] === '(') {
      const close = findClosingParen(segment, pos);
      if (close === -1) return undefined;
      source = segment.slice(pos, close + 1);
      pos = close + 1;
    } else {
      const table = new RegExp(`^${IDENTIFIER}`).exec(segment.slice(pos));
      if (!table) return undefined;
      source = table[0];
      pos += table[0].length;
    }

    const alias = /^\s+(?:AS\s+)?(?!ON\b)([\w$]+)/i.exec(segment.slice(pos));
    if (alias) pos += alias[0].length;
    const on = /^\s*ON\s*\(/i.exec(segment.slice(pos));
    if (!on) return undefined;
    const open = pos + on[0].length - 1;
    const close = findClosingParen(segment, open);
    if (close === -1) return undefined;

    const merge: MergeStatement = {
      target: head[1],
      targetAlias: head[2],
      source,
      sourceAlias: alias?.[1] ?? (source.startsWith('(') ? 'src' : unqualified(source)),
      on: segment.slice(open + 1, close).trim(),
      deleteBranch: false,
    };

    const rest = splitTerminator(segment.slice(close + 1)).body;
    const clauses = [...topLevelView(rest).matchAll(/\bWHEN\s+(NOT\s+)?MATCHED\s+THEN\b/gi)];
    if (clauses.length === 0) return undefined;
    clauses.forEach((clause, i) => {
      const start = (clause.index ?? 0) + clause[0].length;
      const end = clauses[i + 1]?.index ?? rest.length;
      const body = rest.slice(start, end).trim();
      if (clause[1]) this.parseInsertBranch(body, merge);
      else this.parseMatchedBranch(body, merge);
    });
    return merge;
  }

  private parseMatchedBranch(body: string, merge: MergeStatement): void {
    if (/^DELETE\b/i.test(body)) {
      merge.deleteBranch = true;
      return;
    }
    const update = /^UPDATE\s+SET\s+/i.exec(body);
    if (!update) return;
    let set = body.slice(update[0].length);
    const view = topLevelView(set);
    const deleteAt = view.search(/\bDELETE\s+WHERE\b/i);
    if (deleteAt !== -1) {
      merge.deleteBranch = true;
      set = set.slice(0, deleteAt);
    }
    const whereAt = topLevelView(set).search(/\bWHERE\b/i);
    if (whereAt !== -1) {
      merge.updateWhere = set.slice(whereAt + 'WHERE'.length).trim();
      set = set.slice(0, whereAt);
    }
    merge.updateSet = set.trim();
  }

  private parseInsertBranch(body: string, merge: MergeStatement): void {
    const insert = /^INSERT\s*\(/i.exec(body);
    if (!insert) return;
    const colsOpen = insert[0].length - 1;
    const colsClose = findClosingParen(body, colsOpen);
    if (colsClose === -1) return;
    const afterCols = body.slice(colsClose + 1);
    const values = /^\s*VALUES\s*\(/i.exec(afterCols);
    if (!values) return;
    const valuesOpen = colsClose + 1 + values[0].length - 1;
    const valuesClose = findClosingParen(body, valuesOpen);
    if (valuesClose === -1) return;
    merge.insertColumns = splitTopLevel(body.slice(colsOpen + 1, colsClose)).map(unqualified);
    merge.insertValues = splitTopLevel(body.slice(valuesOpen + 1, valuesClose));
    const where = /^\s*WHERE\s+([\s\S]+)$/i.exec(body.slice(valuesClose + 1));
    if (where) merge.insertWhere = where[1].trim();
  }

  /** Target columns the ON condition compares; they become the conflict target. */
  private conflictColumns(merge: MergeStatement): string[] {
    const targetRef = merge.targetAlias ?? unqualified(merge.target);
    const columns: string[] = [];
    const equality = new RegExp(`(${IDENTIFIER})\\s*=\\s*(${IDENTIFIER})`, 'g');
    for (const match of merge.on.matchAll(equality)) {
      const [left, right] = [match[1], match[2]];
      const qualifier = (name: string) => (name.includes('.') ? name.slice(0, name.lastIndexOf('.')).trim() : '');
      const column =
        qualifier(right) === targetRef && qualifier(left) !== targetRef ? unqualified(right) : unqualified(left);
      if (!columns.includes(column)) columns.push(column);
    }
    return columns;
  }

  /** Rewrite `src.x` references of an update expression to the target's inserted-row form. */
  private insertedRowRefs(expr: string, merge: MergeStatement, target: Dialect): string {
    const byValue = new Map<string, string>();
    merge.insertColumns?.forEach((column, i) => {
      const value = merge.insertValues?.[i];
      if (value !== undefined) byValue.set(value.replace(/\s+/g, ''), column);
    });
    const pattern = new RegExp(`(?<![\\w$.])${escapeRegExp(merge.sourceAlias)}\\s*\\.\\s*("[^"]+"|[\\w$]+)`, 'g');
    return expr.replace(pattern, (ref: string, column: string) => {
      const inserted = byValue.get(ref.replace(/\s+/g, '')) ?? column;
      return target === 'postgresql' ? `EXCLUDED.${inserted}` : `VALUES(${inserted})`;
    });
  }

  private mergeAsInsert(merge: MergeStatement, target: Dialect, recorder: StepRecorder): string {
    const columns = merge.insertColumns ?? [];
    const values = merge.insertValues ?? [];
    const into =
      target === 'postgresql' && merge.targetAlias ? `${merge.target} AS ${merge.targetAlias}` : merge.target;
    const where = merge.insertWhere ? `\nWHERE ${merge.insertWhere}` : '';
    const insert = `INSERT INTO ${into} (${columns.join(', ')})\nSELECT ${values.join(', ')}\nFROM ${merge.source} ${merge.sourceAlias}${where}`;

    const conflict = this.conflictColumns(merge);
    if (!merge.updateSet) {
      if (target === 'mysql') return insert.replace(/^INSERT INTO/, 'INSERT IGNORE INTO');
      return `${insert}\nON CONFLICT (${conflict.join(', ')}) DO NOTHING`;
    }

    const assignments = splitTopLevel(merge.updateSet).flatMap(assignment => {
      const pair = splitAssignment(assignment);
      return pair ? [pair] : [];
    });

    if (target === 'postgresql') {
      const set = assignments
        .map(([lhs, rhs]) => `${unqualified(lhs)} = ${this.insertedRowRefs(rhs, merge, target)}`)
        .join(', ');
      const where = merge.updateWhere ? ` WHERE ${this.insertedRowRefs(merge.updateWhere, merge, target)}` : '';
      recorder.warn(
        createWarning(
          'syntax-difference',
          `ON CONFLICT (${conflict.join(', ')}) requires a unique index or constraint on those columns`,
          'info',
        ),
      );
      return `${insert}\nON CONFLICT (${conflict.join(', ')}) DO UPDATE SET ${set}${where}`;
    }

    const localize = (expr: string) => {
      const rows = this.insertedRowRefs(expr, merge, target);
      return merge.targetAlias ? dropQualifier(rows, merge.targetAlias) : rows;
    };
    const condition = merge.updateWhere ? localize(merge.updateWhere) : undefined;
    const set = assignments
      .map(([lhs, rhs]) => {
        const column = unqualified(lhs);
        const value = localize(rhs);
        return `${column} = ${condition ? `IF(${condition}, ${value}, ${column})` : value}`;
      })
      .join(', ');
    return `${insert}\nON DUPLICATE KEY UPDATE ${set}`;
  }

  private mergeAsUpdate(merge: MergeStatement, target: Dialect): string {
    const alias = merge.targetAlias ? ` ${merge.targetAlias}` : '';
    const where = merge.updateWhere ? ` AND ${merge.updateWhere}` : '';
    if (target === 'postgresql') {
      const set = splitTopLevel(merge.updateSet ?? '')
        .map(assignment => {
          const pair = splitAssignment(assignment);
          return pair ? `${unqualified(pair[0])} = ${pair[1]}` : assignment;
        })
        .join(', ');
      return `UPDATE ${merge.target}${alias}\nSET ${set}\nFROM ${merge.source} ${merge.sourceAlias}\nWHERE ${merge.on}${where}`;
    }
    const condition = merge.updateWhere ? `\nWHERE ${merge.updateWhere}` : '';
    return `UPDATE ${merge.target}${alias}\nJOIN ${merge.source} ${merge.sourceAlias} ON ${merge.on}\nSET ${merge.updateSet}${condition}`;
  }

  // PostgreSQL and MySQL upserts

  private conflictToDuplicateKey(segment: string, recorder: StepRecorder): string {
    const doNothing = new RegExp(`\\s*\\bON\\s+CONFLICT\\b${CONFLICT_TARGET}\\s*DO\\s+NOTHING\\b`, 'i');
    if (doNothing.test(segment)) {
      recorder.rule('Upsert: ON CONFLICT DO NOTHING → INSERT IGNORE');
      return segment.replace(doNothing, '').replace(/\bINSERT\s+INTO\b/i, 'INSERT IGNORE INTO');
    }

    const doUpdate = new RegExp(`\\bON\\s+CONFLICT\\b${CONFLICT_TARGET}\\s*DO\\s+UPDATE\\s+SET\\b`, 'i');
    const found = doUpdate.exec(segment);
    if (!found) return segment;
    recorder.rule('Upsert: ON CONFLICT DO UPDATE → ON DUPLICATE KEY UPDATE');
    const head = segment.slice(0, found.index);
    let tail = segment.slice(found.index + found[0].length).replace(/\bEXCLUDED\s*\.\s*("[^"]+"|[\w$]+)/gi, 'VALUES($1)');
    const whereAt = topLevelView(tail).search(/\bWHERE\b/i);
    if (whereAt !== -1) {
      recorder.warn(
        createWarning(
          'partial-support',
          'ON CONFLICT ... DO UPDATE WHERE condition has no ON DUPLICATE KEY UPDATE equivalent and was dropped',
          'warning',
          'Guard each assignment with IF(condition, new_value, column)',
        ),
      );
      const { terminator } = splitTerminator(tail);
      tail = tail.slice(0, whereAt).trimEnd() + terminator;
    }
    return `${head}ON DUPLICATE KEY UPDATE${tail}`;
  }

  private parseInsert(segment: string): InsertStatement | undefined {
    const head = new RegExp(`\\b(?:INSERT(?:\\s+IGNORE)?|REPLACE)\\s+INTO\\s+(${IDENTIFIER})\\s*\\(`, 'i').exec(segment);
    if (!head) return undefined;
    const colsOpen = head.index + head[0].length - 1;
    const colsClose = findClosingParen(segment, colsOpen);
    if (colsClose === -1) return undefined;
    const values = /^\s*VALUES\s*\(/i.exec(segment.slice(colsClose + 1));
    const columns = splitTopLevel(segment.slice(colsOpen + 1, colsClose));
    if (!values) return { table: head[1], columns, values: [] };
    const valuesOpen = colsClose + 1 + values[0].length - 1;
    const valuesClose = findClosingParen(segment, valuesOpen);
    if (valuesClose === -1) return undefined;
    return { table: head[1], columns, values: splitTopLevel(segment.slice(valuesOpen + 1, valuesClose)) };
  }

  private inferConflictColumn(columns: readonly string[]): string | undefined {
    return columns.find(column => CONFLICT_KEY.test(column));
  }

  private duplicateKeyToConflict(segment: string, ctx: ConversionContext, recorder: StepRecorder): string {
    const insert = this.parseInsert(segment);
    const key = insert ? this.inferConflictColumn(insert.columns) : undefined;
    const target = key ?? ctx.mask.comment('conflict column');
    const flagMissingKey = () => {
      if (key !== undefined) return;
      recorder.warn(
        createWarning(
          'manual-review-needed',
          'Could not infer the conflict column for ON CONFLICT',
          'warning',
          'Name the unique or primary key column in ON CONFLICT (...)',
        ),
      );
    };

    const duplicateKey = /\bON\s+DUPLICATE\s+KEY\s+UPDATE\b/i.exec(segment);
    if (duplicateKey) {
      recorder.rule('Upsert: ON DUPLICATE KEY UPDATE → ON CONFLICT DO UPDATE');
      flagMissingKey();
      let head = segment.slice(0, duplicateKey.index);
      let tail = segment.slice(duplicateKey.index + duplicateKey[0].length);
      tail = tail.replace(/\bVALUES\s*\(\s*("[^"]+"|`[^`]+`|[\w$]+)\s*\)/gi, 'EXCLUDED.$1');
      const rowAlias = /\)\s+AS\s+([\w$]+)(?:\s*\([^()]*\))?\s*$/i.exec(head);
      if (rowAlias) {
        head = head.slice(0, rowAlias.index + 1) + ' ';
        tail = tail.replace(new RegExp(`(?<![\\w$.])${escapeRegExp(rowAlias[1])}\\s*\\.`, 'g'), 'EXCLUDED.');
      }
      return `${head}ON CONFLICT (${target}) DO UPDATE SET${tail}`;
    }

    const { body, terminator } = splitTerminator(segment);
    if (/\bINSERT\s+IGNORE\s+INTO\b/i.test(body)) {
      recorder.rule('Upsert: INSERT IGNORE → ON CONFLICT DO NOTHING');
      return `${body.replace(/\bINSERT\s+IGNORE\s+INTO\b/i, 'INSERT INTO')} ON CONFLICT DO NOTHING${terminator}`;
    }

    if (/\bREPLACE\s+INTO\b/i.test(body)) {
      recorder.rule('Upsert: REPLACE INTO → INSERT ... ON CONFLICT DO UPDATE');
      flagMissingKey();
      const updates = (insert?.columns ?? []).filter(column => column !== key).map(column => `${column} = EXCLUDED.${column}`);
      const action = updates.length > 0 ? `DO UPDATE SET ${updates.join(', ')}` : 'DO NOTHING';
      recorder.warn(
        createWarning(
          'syntax-difference',
          'REPLACE INTO deletes and re-inserts; ON CONFLICT DO UPDATE updates in place',
          'info',
          'Check triggers and foreign keys with ON DELETE actions',
        ),
      );
      return `${body.replace(/\bREPLACE\s+INTO\b/i, 'INSERT INTO')} ON CONFLICT (${target}) ${action}${terminator}`;
    }
    return segment;
  }

  // Upserts to Oracle MERGE

  private upsertToMerge(segment: string, ctx: ConversionContext, recorder: StepRecorder): string {
    const insert = this.parseInsert(segment);
    const { terminator } = splitTerminator(segment);
    const lead = /^\s*/.exec(segment)?.[0] ?? '';

    const conflict = new RegExp(`\\bON\\s+CONFLICT\\s*\\(([^()]*)\\)\\s*DO\\s+(NOTHING|UPDATE\\s+SET\\s+([\\s\\S]*?))\\s*;?\\s*$`, 'i').exec(segment);
    const duplicateKey = /\bON\s+DUPLICATE\s+KEY\s+UPDATE\s+([\s\S]*?)\s*;?\s*$/i.exec(segment);
    const ignore = /\bINSERT\s+IGNORE\s+INTO\b/i.test(segment);
    const replace = /\bREPLACE\s+INTO\b/i.test(segment);

    let keys: string[] = [];
    let set: string | undefined;
    if (conflict) {
      keys = splitTopLevel(conflict[1]);
      set = conflict[3];
    } else if (insert) {
      const key = this.inferConflictColumn(insert.columns);
      keys = key ? [key] : [];
      if (duplicateKey) set = duplicateKey[1];
      if (replace) set = insert.columns.filter(column => column !== key).map(column => `${column} = VALUES(${column})`).join(', ');
    }
    if (!conflict && !duplicateKey && !ignore && !replace && !/\bON\s+CONFLICT\b/i.test(segment)) return segment;

    const merge =
      insert && insert.values.length === insert.columns.length && keys.length > 0
        ? this.buildOracleMerge(insert, keys, set)
        : undefined;
    if (merge === undefined) {
      recorder.rule('Upsert: flagged for MERGE rewrite');
      recorder.warn(
        createWarning(
          'manual-review-needed',
          'Upsert could not be rewritten as MERGE automatically',
          'warning',
          'Use MERGE INTO target USING (SELECT ... FROM DUAL) src ON (...) WHEN MATCHED THEN UPDATE ... WHEN NOT MATCHED THEN INSERT ...',
        ),
      );
      return `${ctx.mask.comment('Oracle: rewrite as MERGE INTO ... USING ... ON (...)')}\n${segment.trimStart()}`;
    }
    recorder.rule('Upsert: rewritten as MERGE');
    return lead + merge + terminator;
  }

  private buildOracleMerge(insert: InsertStatement, keys: readonly string[], set: string | undefined): string | undefined {
    const assignments: string[] = [];
    for (const assignment of set ? splitTopLevel(set) : []) {
      const pair = splitAssignment(assignment);
      const inserted = pair
        ? /^(?:EXCLUDED\s*\.\s*("[^"]+"|[\w$]+)|VALUES\s*\(\s*("[^"]+"|`[^`]+`|[\w$]+)\s*\))$/i.exec(pair[1])
        : null;
      if (!pair || !inserted) return undefined;
      // Columns of the ON clause cannot be updated by MERGE
      if (keys.includes(unqualified(pair[0]))) continue;
      assignments.push(`tgt.${unqualified(pair[0])} = src.${inserted[1] ?? inserted[2]}`);
    }
    const selectList = insert.values.map((value, i) => `${value} AS ${insert.columns[i]}`).join(', ');
    const on = keys.map(key => `tgt.${key} = src.${key}`).join(' AND ');
    const matched = assignments.length > 0 ? `\nWHEN MATCHED THEN UPDATE SET ${assignments.join(', ')}` : '';
    return (
      `MERGE INTO ${insert.table} tgt\nUSING (SELECT ${selectList} FROM DUAL) src\nON (${on})${matched}` +
      `\nWHEN NOT MATCHED THEN INSERT (${insert.columns.join(', ')}) VALUES (${insert.columns.map(column => `src.${column}`).join(', ')})`
    );
  }
}
