export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function parseLevel(raw: string): LogLevel | null {
  const v = raw.trim().toLowerCase();
  if (!v) return 'info';
  if (v === 'silent' || v === 'off' || v === 'none' || v === '0') return null;
  if (v === 'debug' || v === 'info' || v === 'warn' || v === 'error') return v;
  return 'info';
}

function getConfiguredLevel(): LogLevel | null {
  return parseLevel(String(process.env.REFGRAPH_LOG_LEVEL ?? process.env.LOG_LEVEL ?? ''));
}

export function serializeError(e: unknown): { name?: string; message?: string; stack?: string } | undefined {
  if (!e) return undefined;
  if (e instanceof Error) return { name: e.name, message: e.message, stack: e.stack };
  return { message: String(e) };
}

export interface Logger {
  debug(msg: string, fields?: Record<string, unknown>): void;
  info(msg: string, fields?: Record<string, unknown>): void;
  warn(msg: string, fields?: Record<string, unknown>): void;
  error(msg: string, fields?: Record<string, unknown>): void;
  child(fields: Record<string, unknown>): Logger;
  span<T>(name: string, fields: Record<string, unknown>, fn: () => Promise<T>): Promise<T>;
  /** Same as `span` for the synchronous graph/rename/migration paths. */
  spanSync<T>(name: string, fields: Record<string, unknown>, fn: () => T): T;
}

/**
 * JSON-lines logger on stderr. The level is read from REFGRAPH_LOG_LEVEL
 * (or LOG_LEVEL) each time a logger is created; `silent` turns it off.
 */
export function createLogger(baseFields: Record<string, unknown> = {}): Logger {
  const configured = getConfiguredLevel();
  const threshold = configured ? levelOrder[configured] : Infinity;

  const write = (level: LogLevel, msg: string, fields?: Record<string, unknown>) => {
    if (levelOrder[level] < threshold) return;
    const rec = {
      ts: new Date().toISOString(),
      level,
      msg,
      ...baseFields,
      ...(fields ?? {}),
    };
    process.stderr.write(JSON.stringify(rec) + '\n');
  };

  const logger: Logger = {
    debug: (msg, fields) => write('debug', msg, fields),
    info: (msg, fields) => write('info', msg, fields),
    warn: (msg, fields) => write('warn', msg, fields),
    error: (msg, fields) => write('error', msg, fields),
    child: (fields) => createLogger({ ...baseFields, ...fields }),
    span: async (name, fields, fn) => {
      const startedAt = Date.now();
      try {
        const out = await fn();
        write('info', name, { ...fields, ok: true, duration_ms: Date.now() - startedAt });
        return out;
      } catch (e) {
        write('error', name, { ...fields, ok: false, duration_ms: Date.now() - startedAt, err: serializeError(e) });
        throw e;
      }
    },
    spanSync: (name, fields, fn) => {
      const startedAt = Date.now();
      try {
        const out = fn();
        write('debug', name, { ...fields, ok: true, duration_ms: Date.now() - startedAt });
        return out;
      } catch (e) {
        write('error', name, { ...fields, ok: false, duration_ms: Date.now() - startedAt, err: serializeError(e) });
        throw e;
      }
    },
  };

  return logger;
}
