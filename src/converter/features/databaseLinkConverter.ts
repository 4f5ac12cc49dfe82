import type { StepResult } from '../../types/sql';
import { mapSegments, splitTerminator } from '../../utils/sqlText';
import { StepRecorder, type ConversionContext, type FeatureConverter } from '../context';
import { SQL_PATTERNS } from '../sqlPatterns';
import { createWarning } from '../warnings';

const CREATE_LINK =
  /^(\s*)CREATE\s+(?:SHARED\s+)?(?:PUBLIC\s+)?DATABASE\s+LINK\s+([\w$.]+)(?:\s+CONNECT\s+TO\s+([\w$"]+)\s+IDENTIFIED\s+BY\s+(?:"[^"]*"|'[^']*'|[\w$]+))?(?:\s+USING\s+('[^']*'))?\s*$/i;
const DROP_LINK = /^(\s*)DROP\s+(?:PUBLIC\s+)?DATABASE\s+LINK\s+([\w$.]+)\s*$/i;
const LINK_REFERENCE = /(?<![\w$"'])([\w$]+(?:\.[\w$]+)?)@([\w$]+(?:\.[\w$]+)*)/g;

interface RemoteEndpoint {
  host: string;
  port?: string;
  database?: string;
}

/** `host:port/service` style connect strings; TNS aliases give undefined. */
function parseConnectString(value: string): RemoteEndpoint | undefined {
  const match = /^\/{0,2}([\w.-]+)(?::(\d+))?(?:\/([\w.$-]+))?$/.exec(value.trim());
  if (!match || (match[2] === undefined && match[3] === undefined)) return undefined;
  return { host: match[1], port: match[2], database: match[3] };
}

/**
 * Oracle database links map to postgres_fdw servers or MySQL FEDERATED
 * servers. Passwords never reach the output.
 */
export class DatabaseLinkConverter implements FeatureConverter {
  readonly name = 'database link';

  applies(masked: string, ctx: ConversionContext): boolean {
    return ctx.source === 'oracle' && ctx.target !== 'oracle' && SQL_PATTERNS.DATABASE_LINK.test(masked);
  }

  convert(masked: string, ctx: ConversionContext): StepResult {
    const recorder = new StepRecorder();
    let sql = mapSegments(
      masked,
      segment => /\bDATABASE\s+LINK\b/i.test(segment),
      segment => this.convertLinkStatement(segment, ctx, recorder),
    );

    const links = new Set<string>();
    sql = sql.replace(LINK_REFERENCE, (_match, table: string, link: string) => {
      links.add(link);
      recorder.rule('Database link: remote reference renamed');
      return `${link.replace(/\./g, '_')}_${table.replace(/\./g, '_')}`;
    });
    for (const link of links) {
      recorder.warn(
        createWarning(
          'manual-review-needed',
          `References through database link ${link} were renamed to local ${link.replace(/\./g, '_')}_<table> objects`,
          'warning',
          ctx.target === 'postgresql'
            ? `IMPORT FOREIGN SCHEMA ... FROM SERVER ${link} and create the renamed foreign tables`
            : `Create the renamed tables with ENGINE=FEDERATED CONNECTION='${link}/<table>'`,
        ),
      );
    }
    return recorder.result(sql);
  }

  private convertLinkStatement(segment: string, ctx: ConversionContext, recorder: StepRecorder): string {
    const { body, terminator } = splitTerminator(segment);
    const end = terminator || ';';
    const dropped = DROP_LINK.exec(body);
    if (dropped) {
      recorder.rule('Database link: DROP DATABASE LINK → DROP SERVER');
      return `${dropped[1]}DROP SERVER IF EXISTS ${dropped[2]}${ctx.target === 'postgresql' ? ' CASCADE' : ''}${end}`;
    }

    const created = CREATE_LINK.exec(body);
    if (!created) {
      recorder.warn(createWarning('manual-review-needed', 'Database link statement was not recognized', 'warning'));
      return segment.replace(/(\bIDENTIFIED\s+BY\s+)(?:"[^"]*"|'[^']*'|[\w$]+)/gi, '$1********');
    }
    const [, lead, name, user, using] = created;
    const connect = using === undefined ? undefined : ctx.mask.literalValue(using);
    const endpoint = connect === undefined ? undefined : parseConnectString(connect);
    if (!endpoint) {
      recorder.warn(
        createWarning(
          'manual-review-needed',
          `Connect string of database link ${name} is not host:port/database; fill in the server options`,
          'warning',
        ),
      );
    }
    recorder.warn(
      createWarning(
        'partial-support',
        `Database link ${name} converted to a foreign server; the password was not carried over`,
        'warning',
        'Set the remote password in the user mapping or server definition by hand',
      ),
    );

    const host = ctx.mask.addLiteral(endpoint?.host ?? 'localhost');
    const database = ctx.mask.addLiteral(endpoint?.database ?? name);
    const remoteUser = user === undefined ? undefined : ctx.mask.addLiteral(user.replace(/"/g, ''));

    if (ctx.target === 'postgresql') {
      recorder.rule('Database link: CREATE DATABASE LINK → postgres_fdw server');
      const port = endpoint?.port ? `, port ${ctx.mask.addLiteral(endpoint.port)}` : '';
      const statements = [
        'CREATE EXTENSION IF NOT EXISTS postgres_fdw',
        `CREATE SERVER ${name} FOREIGN DATA WRAPPER postgres_fdw OPTIONS (host ${host}, dbname ${database}${port})`,
      ];
      if (remoteUser !== undefined) {
        const password = ctx.mask.addLiteral('********');
        statements.push(`CREATE USER MAPPING FOR CURRENT_USER SERVER ${name} OPTIONS (user ${remoteUser}, password ${password})`);
      }
      return `${lead}${statements.join(';\n')}${end}`;
    }

    recorder.rule('Database link: CREATE DATABASE LINK → FEDERATED server');
    recorder.warn(
      createWarning(
        'syntax-difference',
        'FEDERATED tables need the FEDERATED storage engine enabled on the server',
        'info',
        `CREATE TABLE t (...) ENGINE=FEDERATED CONNECTION='${name}/t'`,
      ),
    );
    const options = [
      ...(remoteUser === undefined ? [] : [`USER ${remoteUser}`]),
      `HOST ${host}`,
      `DATABASE ${database}`,
      ...(endpoint?.port ? [`PORT ${endpoint.port}`] : []),
    ];
    return `${lead}CREATE SERVER ${name} FOREIGN DATA WRAPPER mysql OPTIONS (${options.join(', ')})${end}`;
  }
}
