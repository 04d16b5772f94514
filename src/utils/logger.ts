import { env } from '../config.js';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type Meta = Record<string, unknown>;
const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function serialize(meta: Meta): Meta {
  const out: Meta = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = v instanceof Error ? { name: v.name, message: v.message } : v;
  }
  return out;
}

function log(level: LogLevel, message: string, meta?: Meta): void {
  if (LEVELS[level] < LEVELS[env.LOG_LEVEL]) return;
  const ts = new Date().toISOString();
  const fields = meta ? serialize(meta) : undefined;
  const out = env.LOG_FORMAT === 'json'
    ? JSON.stringify({ timestamp: ts, level, message, ...fields })
    : fields ? `[${ts}] [${level.toUpperCase()}] ${message} ${JSON.stringify(fields)}`
             : `[${ts}] [${level.toUpperCase()}] ${message}`;
  level === 'error' ? process.stderr.write(out + '\n') : process.stdout.write(out + '\n');
}

export interface Logger {
  debug(msg: string, meta?: Meta): void;
  info(msg: string, meta?: Meta): void;
  warn(msg: string, meta?: Meta): void;
  error(msg: string, meta?: Meta): void;
  scoped(bindings: Meta): Logger;
}

function build(bindings: Meta | undefined): Logger {
  const merge = (meta?: Meta): Meta | undefined =>
    bindings ? { ...bindings, ...meta } : meta;
  return {
    debug: (msg, meta) => log('debug', msg, merge(meta)),
    info:  (msg, meta) => log('info',  msg, merge(meta)),
    warn:  (msg, meta) => log('warn',  msg, merge(meta)),
    error: (msg, meta) => log('error', msg, merge(meta)),
    scoped: (more) => build({ ...bindings, ...more }),
  };
}

export const logger: Logger = build(undefined);
