import type { StepResult } from '../../types/sql';
import { mapSegments, rewriteFunctionCalls, splitTerminator, unqualified } from '../../utils/sqlText';
import { StepRecorder, type ConversionContext, type FeatureConverter } from '../context';
import { SQL_PATTERNS } from '../sqlPatterns';
import { createWarning } from '../warnings';

const CREATE_MVIEW = /^(\s*)CREATE\s+MATERIALIZED\s+VIEW\s+(?:IF\s+NOT\s+EXISTS\s+)?([\w$."`]+)([\s\S]*?)\bAS\s+((?:SELECT|WITH)\b[\s\S]*)$/i;
const DROP_MVIEW = /^(\s*)DROP\s+MATERIALIZED\s+VIEW\s+(?:IF\s+EXISTS\s+)?([\w$."`]+)(?:\s+(?:CASCADE|RESTRICT|PRESERVE\s+TABLE))?\s*$/i;
const REFRESH_MVIEW = /^(\s*)REFRESH\s+MATERIALIZED\s+VIEW\s+(?:CONCURRENTLY\s+)?([\w$."`]+)(?:\s+WITH\s+(?:NO\s+)?DATA)?\s*$/i;

function refreshProcedure(name: string): string {
  return `${unqualified(name).replace(/["`]/g, '')}_refresh`;
}

/**
 * Materialized views: native on PostgreSQL and Oracle, emulated on MySQL with
 * a table plus a refresh procedure.
 */
export class MaterializedViewConverter implements FeatureConverter {
  readonly name = 'materialized view';

  applies(masked: string, ctx: ConversionContext): boolean {
    return ctx.config.ddl.convertViews && SQL_PATTERNS.MATERIALIZED_VIEW.test(masked);
  }

  convert(masked: string, ctx: ConversionContext): StepResult {
    const recorder = new StepRecorder();
    let sql = mapSegments(
      masked,
      segment => /\bMATERIALIZED\s+VIEW\b/i.test(segment),
      segment => this.convertStatement(segment, ctx, recorder),
    );
    if (ctx.target !== 'oracle') {
      sql = this.convertRefreshCalls(sql, ctx, recorder);
    }
    return recorder.result(sql);
  }

  private convertStatement(segment: string, ctx: ConversionContext, recorder: StepRecorder): string {
    const { body, terminator } = splitTerminator(segment);
    const end = terminator || ';';

    if (/^\s*(?:CREATE|DROP)\s+MATERIALIZED\s+VIEW\s+LOG\b/i.test(body)) {
      if (ctx.target === 'oracle') return segment;
      recorder.rule('Materialized view: view log commented out');
      recorder.warn(
        createWarning(
          'unsupported-function',
          'Materialized view logs have no equivalent; fast refresh is not available',
          'warning',
        ),
      );
      return `${/^\s*/.exec(body)?.[0] ?? ''}${ctx.mask.comment(body.trim())}${terminator}`;
    }

    const created = CREATE_MVIEW.exec(body);
    if (created) {
      const [, lead, name, options, query] = created;
      const rebuilt =
        ctx.target === 'mysql'
          ? this.emulate(name, query.trim(), recorder, ctx)
          : ctx.target === 'postgresql'
            ? this.toPostgres(name, options, query.trim(), recorder)
            : this.toOracle(name, query.trim(), recorder);
      return lead + rebuilt + end;
    }

    const dropped = DROP_MVIEW.exec(body);
    if (dropped) {
      const [, lead, name] = dropped;
      recorder.rule('Materialized view: DROP');
      if (ctx.target === 'mysql') {
        return `${lead}DROP PROCEDURE IF EXISTS ${refreshProcedure(name)};\nDROP TABLE IF EXISTS ${name}${end}`;
      }
      return `${lead}DROP MATERIALIZED VIEW ${ctx.target === 'postgresql' ? 'IF EXISTS ' : ''}${name}${end}`;
    }

    const refreshed = REFRESH_MVIEW.exec(body);
    if (refreshed && ctx.target !== 'postgresql') {
      const [, lead, name] = refreshed;
      recorder.rule('Materialized view: REFRESH');
      if (ctx.target === 'mysql') return `${lead}CALL ${refreshProcedure(name)}()${end}`;
      return `${lead}BEGIN DBMS_MVIEW.REFRESH(${ctx.mask.addLiteral(name)}); END${end}`;
    }
    return segment;
  }

  private toPostgres(name: string, options: string, query: string, recorder: StepRecorder): string {
    const warnIf = (pattern: RegExp, message: string, suggestion: string) => {
      if (pattern.test(options)) recorder.warn(createWarning('partial-support', message, 'warning', suggestion));
    };
    warnIf(
      /\bON\s+COMMIT\b/i,
      'REFRESH ON COMMIT is not supported; the view refreshes only on demand',
      'Refresh from a trigger or after the writing transaction commits',
    );
    warnIf(
      /\bREFRESH\s+FAST\b/i,
      'REFRESH FAST (incremental) is not supported; every refresh recomputes the view',
      'Use REFRESH MATERIALIZED VIEW CONCURRENTLY with a unique index to avoid blocking readers',
    );
    warnIf(
      /\bQUERY\s+REWRITE\b/i,
      'QUERY REWRITE is not supported; queries must reference the view directly',
      'Point queries at the materialized view by name',
    );
    warnIf(
      /\bSTART\s+WITH\b|\bNEXT\b/i,
      'Scheduled refresh (START WITH / NEXT) was dropped',
      'Schedule REFRESH MATERIALIZED VIEW with pg_cron or an external scheduler',
    );
    recorder.rule('Materialized view: options → WITH DATA');
    const data = /\bBUILD\s+DEFERRED\b/i.test(options) ? 'WITH NO DATA' : 'WITH DATA';
    return `CREATE MATERIALIZED VIEW ${name} AS\n${query}\n${data}`;
  }

  private toOracle(name: string, query: string, recorder: StepRecorder): string {
    const noData = /\s+WITH\s+NO\s+DATA\s*$/i.test(query);
    const body = query.replace(/\s+WITH\s+(?:NO\s+)?DATA\s*$/i, '');
    recorder.rule('Materialized view: WITH DATA → BUILD/REFRESH options');
    return `CREATE MATERIALIZED VIEW ${name}\nBUILD ${noData ? 'DEFERRED' : 'IMMEDIATE'}\nREFRESH COMPLETE ON DEMAND\nAS\n${body}`;
  }

  private emulate(name: string, query: string, recorder: StepRecorder, ctx: ConversionContext): string {
    const procedure = refreshProcedure(name);
    recorder.rule('Materialized view: emulated with table and refresh procedure');
    recorder.warn(
      createWarning(
        'partial-support',
        `Materialized view ${name} emulated as a table; refresh with CALL ${procedure}()`,
        'warning',
        `Schedule CALL ${procedure}() with a MySQL EVENT or an external scheduler`,
      ),
    );
    return [
      `--${ctx.mask.addText(` Materialized view ${name} emulated as a table plus refresh procedure`)}`,
      `CREATE TABLE ${name} AS`,
      `${query};`,
      `CREATE PROCEDURE ${procedure}()`,
      'BEGIN',
      `  TRUNCATE TABLE ${name};`,
      `  INSERT INTO ${name}`,
      `  ${query};`,
      'END',
    ].join('\n');
  }

  private convertRefreshCalls(sql: string, ctx: ConversionContext, recorder: StepRecorder): string {
    const out = rewriteFunctionCalls(sql, ['DBMS_MVIEW.REFRESH'], call => {
      const list = call.args[0] === undefined ? undefined : ctx.mask.literalValue(call.args[0]);
      if (list === undefined) return undefined;
      const names = list.split(',').map(name => name.trim()).filter(name => name.length > 0);
      if (names.length === 0) return undefined;
      recorder.rule('Materialized view: DBMS_MVIEW.REFRESH');
      const statements =
        ctx.target === 'mysql'
          ? names.map(name => `CALL ${refreshProcedure(name)}()`)
          : names.map(name => `REFRESH MATERIALIZED VIEW ${name}`);
      return statements.join(';\n');
    });
    return out.replace(/\bEXEC(?:UTE)?\s+(?=REFRESH\s+MATERIALIZED\b|CALL\b)/gi, '');
  }
}
