const LEVELS = { debug: 0, info: 1, warn: 2, error: 3 } as const;
type Level = keyof typeof LEVELS;

function isLevel(value: string): value is Level {
  return value in LEVELS;
}

function getThreshold(): number {
  const env = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isLevel(env) ? LEVELS[env] : LEVELS.info;
}

export type LogBindings = Record<string, unknown>;

export interface Logger {
  debug(msg: string, data?: LogBindings): void;
  info(msg: string, data?: LogBindings): void;
  warn(msg: string, data?: LogBindings): void;
  error(msg: string, data?: LogBindings): void;
  /** Logger whose entries always carry `bindings` */
  child(bindings: LogBindings): Logger;
}

export function createLogger(namespace: string, bindings: LogBindings = {}): Logger {
  const write = (level: Level, msg: string, data?: LogBindings) => {
    if (LEVELS[level] < getThreshold()) return;
    const entry: Record<string, unknown> = {
      ts: new Date().toISOString(),
      level,
      ns: namespace,
      msg,
    };
    const merged = data === undefined ? bindings : { ...bindings, ...data };
    if (Object.keys(merged).length > 0) entry.data = merged;
    const line = JSON.stringify(entry);
    if (level === 'error') process.stderr.write(line + '\n');
    else process.stdout.write(line + '\n');
  };

  return {
    debug: (msg, data?) => write('debug', msg, data),
    info: (msg, data?) => write('info', msg, data),
    warn: (msg, data?) => write('warn', msg, data),
    error: (msg, data?) => write('error', msg, data),
    child: (extra) => createLogger(namespace, { ...bindings, ...extra }),
  };
}
