export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const satisfies readonly LogLevel[];

const ORDER: Record<Exclude<LogLevel, 'silent'>, number> = {
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export interface Logger {
  error(msg: string, meta?: unknown): void;
  warn(msg: string, meta?: unknown): void;
  info(msg: string, meta?: unknown): void;
  debug(msg: string, meta?: unknown): void;
  /** Same sink and level, messages prefixed with `[scope]`. */
  child(scope: string): Logger;
}

function fmtMeta(meta: unknown) {
  if (meta === undefined) return '';
  if (typeof meta === 'string') return ` ${meta}`;
  if (meta instanceof Error) return ` ${meta.name}: ${meta.message}`;
  try {
    return ` ${JSON.stringify(meta)}`;
  } catch {
    return ' [meta-unserializable]';
  }
}

export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export function createLogger(level: LogLevel = 'info', sink: LogSink = consoleSink, scopes: string[] = []): Logger {
  const child = (scope: string) => createLogger(level, sink, [...scopes, scope]);

  if (level === 'silent') {
    const quiet: Logger = {
      error: () => {},
      warn: () => {},
      info: () => {},
      debug: () => {},
      child: () => quiet,
    };
    return quiet;
  }

  const threshold = ORDER[level];
  const scopeTag = scopes.map((s) => `[${s}] `).join('');
  const line = (lvl: Exclude<LogLevel, 'silent'>, msg: string, meta: unknown) =>
    `${new Date().toISOString()} ${lvl.toUpperCase()} ${scopeTag}${msg}${fmtMeta(meta)}`;

  const can = (lvl: Exclude<LogLevel, 'silent'>) => ORDER[lvl] <= threshold;

  return {
    error: (msg, meta) => {
      if (can('error')) sink.err(line('error', msg, meta));
    },
    warn: (msg, meta) => {
      if (can('warn')) sink.err(line('warn', msg, meta));
    },
    info: (msg, meta) => {
      if (can('info')) sink.out(line('info', msg, meta));
    },
    debug: (msg, meta) => {
      if (can('debug')) sink.out(line('debug', msg, meta));
    },
    child,
  };
}
