import type { Dialect, StepResult } from '../../types/sql';
import { rewriteFunctionCalls, type FunctionCall } from '../../utils/sqlText';
import { StepRecorder, type ConversionContext, type FeatureConverter } from '../context';
import { SQL_PATTERNS } from '../sqlPatterns';
import { createWarning } from '../warnings';

type PackageRewrite = (call: FunctionCall, ctx: ConversionContext) => string | undefined;

const UNSUPPORTED_PACKAGES: Record<string, string> = {
  UTL_FILE: 'Read and write files from the application or with COPY / LOAD DATA',
  UTL_HTTP: 'Make HTTP calls from the application layer',
  UTL_SMTP: 'Send mail from the application layer',
  UTL_MAIL: 'Send mail from the application layer',
  DBMS_SQL: 'Use EXECUTE (PostgreSQL) or PREPARE / EXECUTE (MySQL) for dynamic SQL',
  DBMS_SCHEDULER: 'Schedule with pg_cron, a MySQL EVENT or an external scheduler',
  DBMS_JOB: 'Schedule with pg_cron, a MySQL EVENT or an external scheduler',
  DBMS_PIPE: 'Use LISTEN/NOTIFY or an external queue',
  DBMS_ALERT: 'Use LISTEN/NOTIFY or an external queue',
  DBMS_AQ: 'Use an external message queue',
};

function hashAlgorithm(arg: string | undefined): 'MD5' | 'SHA1' | 'SHA256' | 'SHA512' | undefined {
  if (arg === undefined) return undefined;
  const value = arg.toUpperCase().replace(/\s+/g, '');
  if (/HASH_MD5$|^2$/.test(value)) return 'MD5';
  if (/HASH_SH1$|^3$/.test(value)) return 'SHA1';
  if (/HASH_SH256$|^4$/.test(value)) return 'SHA256';
  if (/HASH_SH512$|^6$/.test(value)) return 'SHA512';
  return undefined;
}

function byTarget(target: Dialect, mysql: string, postgres: string): string {
  return target === 'mysql' ? mysql : postgres;
}

/** Known Oracle package calls and their target built-ins. */
const PACKAGE_CALLS: Record<string, PackageRewrite> = {
  'DBMS_OUTPUT.PUT_LINE': ({ args }, ctx) =>
    args.length === 1
      ? byTarget(ctx.target, `SELECT ${args[0]} AS debug_output`, `RAISE NOTICE ${ctx.mask.addLiteral('%')}, ${args[0]}`)
      : undefined,
  'DBMS_OUTPUT.PUT': ({ args }, ctx) =>
    args.length === 1
      ? byTarget(ctx.target, `SELECT ${args[0]} AS debug_output`, `RAISE NOTICE ${ctx.mask.addLiteral('%')}, ${args[0]}`)
      : undefined,
  'DBMS_RANDOM.VALUE': ({ args }, ctx) => {
    const random = byTarget(ctx.target, 'RAND()', 'random()');
    if (args.length === 0) return random;
    if (args.length === 2) return `(${args[0]} + (${args[1]} - ${args[0]}) * ${random})`;
    return undefined;
  },
  'DBMS_RANDOM.RANDOM': (_call, ctx) =>
    byTarget(ctx.target, 'FLOOR(RAND() * 4294967296) - 2147483648', 'FLOOR(random() * 4294967296)::bigint - 2147483648'),
  'DBMS_LOB.GETLENGTH': ({ args }, ctx) =>
    args.length === 1 ? byTarget(ctx.target, `CHAR_LENGTH(${args[0]})`, `LENGTH(${args[0]})`) : undefined,
  'DBMS_LOB.SUBSTR': ({ args }) => {
    if (args.length < 1 || args.length > 3) return undefined;
    const [lob, amount = '32767', offset = '1'] = args;
    return `SUBSTRING(${lob}, ${offset}, ${amount})`;
  },
  'DBMS_LOB.INSTR': ({ args }, ctx) =>
    args.length === 2
      ? byTarget(ctx.target, `LOCATE(${args[1]}, ${args[0]})`, `STRPOS(${args[0]}, ${args[1]})`)
      : undefined,
  'DBMS_LOB.APPEND': ({ args }, ctx) =>
    args.length === 2
      ? byTarget(ctx.target, `SET ${args[0]} = CONCAT(${args[0]}, ${args[1]})`, `${args[0]} := ${args[0]} || ${args[1]}`)
      : undefined,
  'DBMS_UTILITY.GET_TIME': (_call, ctx) =>
    byTarget(ctx.target, 'FLOOR(UNIX_TIMESTAMP(NOW(3)) * 100)', 'FLOOR(EXTRACT(EPOCH FROM clock_timestamp()) * 100)'),
  'DBMS_LOCK.SLEEP': ({ args }, ctx) =>
    args.length === 1 ? byTarget(ctx.target, `DO SLEEP(${args[0]})`, `PERFORM pg_sleep(${args[0]})`) : undefined,
  'DBMS_SESSION.SLEEP': ({ args }, ctx) =>
    args.length === 1 ? byTarget(ctx.target, `DO SLEEP(${args[0]})`, `PERFORM pg_sleep(${args[0]})`) : undefined,
  'DBMS_CRYPTO.HASH': ({ args }, ctx) => {
    const algorithm = hashAlgorithm(args[1]);
    if (algorithm === undefined) return undefined;
    const [source] = args;
    if (ctx.target === 'mysql') {
      if (algorithm === 'MD5') return `MD5(${source})`;
      if (algorithm === 'SHA1') return `SHA1(${source})`;
      return `SHA2(${source}, ${algorithm.slice(3)})`;
    }
    if (algorithm === 'MD5') return `md5(${source})`;
    return `encode(digest(${source}, ${ctx.mask.addLiteral(algorithm.toLowerCase())}), ${ctx.mask.addLiteral('hex')})`;
  },
  RAISE_APPLICATION_ERROR: ({ args }, ctx) => {
    if (args.length < 2) return undefined;
    const message = args[1];
    if (ctx.target === 'mysql') {
      return `SIGNAL SQLSTATE ${ctx.mask.addLiteral('45000')} SET MESSAGE_TEXT = ${message}`;
    }
    return `RAISE EXCEPTION ${ctx.mask.addLiteral('%')}, ${message} USING ERRCODE = ${ctx.mask.addLiteral('P0001')}`;
  },
};

const BARE_CALLS: Record<string, PackageRewrite> = {
  'DBMS_RANDOM.VALUE': (call, ctx) => PACKAGE_CALLS['DBMS_RANDOM.VALUE'](call, ctx),
  'DBMS_RANDOM.RANDOM': (call, ctx) => PACKAGE_CALLS['DBMS_RANDOM.RANDOM'](call, ctx),
  'DBMS_UTILITY.GET_TIME': (call, ctx) => PACKAGE_CALLS['DBMS_UTILITY.GET_TIME'](call, ctx),
};

/**
 * Oracle supplied packages. Well-known calls map to built-ins; anything else
 * is commented out in place, never dropped.
 */
export class PackageCallConverter implements FeatureConverter {
  readonly name = 'package call';

  applies(masked: string, ctx: ConversionContext): boolean {
    return ctx.source === 'oracle' && ctx.target !== 'oracle' && SQL_PATTERNS.PACKAGE_CALL.test(masked);
  }

  convert(masked: string, ctx: ConversionContext): StepResult {
    const recorder = new StepRecorder();
    const names = new Set<string>(['RAISE_APPLICATION_ERROR']);
    for (const match of masked.matchAll(/\b((?:DBMS|UTL)_\w+\s*\.\s*\w+)\s*\(/gi)) {
      names.add(match[1].replace(/\s+/g, ''));
    }

    let sql = rewriteFunctionCalls(masked, [...names], call => {
      const key = call.name.toUpperCase();
      const known = PACKAGE_CALLS[key];
      const converted = known ? known(call, ctx) : undefined;
      if (converted !== undefined) {
        recorder.rule(`Package: ${key}`);
        if (key === 'DBMS_CRYPTO.HASH' && ctx.target === 'postgresql' && !/^md5\(/.test(converted)) {
          recorder.warn(createWarning('syntax-difference', 'digest() requires the pgcrypto extension', 'info'));
        }
        return converted;
      }
      return this.commentOut(`${call.name}(${call.inner})`, key, ctx, recorder);
    });

    for (const [name, rewrite] of Object.entries(BARE_CALLS)) {
      const [pkg, member] = name.split('.');
      const pattern = new RegExp(`(?<![\\w$.])${pkg}\\s*\\.\\s*${member}(?![\\w$]|\\s*\\()`, 'gi');
      sql = sql.replace(pattern, () => {
        const converted = rewrite({ name, gap: '', inner: '', args: [] }, ctx);
        if (converted === undefined) return name;
        recorder.rule(`Package: ${name}`);
        return converted;
      });
    }

    sql = sql.replace(/(?<![\w$.])((?:DBMS|UTL)_\w+)\s*\.\s*(\w+)(?![\w$]|\s*\()/gi, (call: string, pkg: string) =>
      BARE_CALLS[call.toUpperCase()] ? call : this.commentOut(call, pkg.toUpperCase(), ctx, recorder),
    );
    return recorder.result(sql);
  }

  private commentOut(call: string, key: string, ctx: ConversionContext, recorder: StepRecorder): string {
    const pkg = key.split('.')[0];
    recorder.rule(`Package: ${key} commented out`);
    recorder.warn(
      createWarning(
        'unsupported-function',
        `${key} has no ${ctx.target === 'mysql' ? 'MySQL' : 'PostgreSQL'} equivalent and was commented out`,
        'warning',
        UNSUPPORTED_PACKAGES[pkg] ?? 'Reimplement the call in the application or as a stored routine',
      ),
    );
    return `NULL ${ctx.mask.comment(call)}`;
  }
}
