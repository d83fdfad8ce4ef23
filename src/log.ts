export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

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
  /** Same sink and level, every line tagged with `[scope]`. */
  child(scope: string): Logger;
}

/** Where formatted lines go. Defaults to stderr so progress output on stdout stays clean. */
export type LogSink = (level: Exclude<LogLevel, 'silent'>, line: string) => void;

const stderrSink: LogSink = (_level, line) => {
  console.error(line);
};

function fmtMeta(meta: unknown) {
  if (meta === undefined) return '';
  if (typeof meta === 'string') return ` ${meta}`;
  try {
    return ` ${JSON.stringify(meta)}`;
  } catch {
    return ' [meta-unserializable]';
  }
}

export function createLogger(level: LogLevel = 'info', sink: LogSink = stderrSink, scope?: string): Logger {
  if (level === 'silent') {
    const silent: Logger = {
      error: () => {},
      warn: () => {},
      info: () => {},
      debug: () => {},
      child: () => silent,
    };
    return silent;
  }

  const threshold = ORDER[level];
  const tag = scope ? `[${scope}] ` : '';
  const prefix = (lvl: string) => `${new Date().toISOString()} ${lvl.toUpperCase()} ${tag}`;

  const emit = (lvl: Exclude<LogLevel, 'silent'>, msg: string, meta: unknown) => {
    if (ORDER[lvl] <= threshold) sink(lvl, prefix(lvl) + msg + fmtMeta(meta));
  };

  return {
    error: (msg, meta) => emit('error', msg, meta),
    warn: (msg, meta) => emit('warn', msg, meta),
    info: (msg, meta) => emit('info', msg, meta),
    debug: (msg, meta) => emit('debug', msg, meta),
    child: (name) => createLogger(level, sink, scope ? `${scope}:${name}` : name),
  };
}
