export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function getMinLevel(): LogLevel {
  const raw = String(process.env.LOG_LEVEL || '').toLowerCase();
  if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error') return raw;
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function shouldLog(level: LogLevel): boolean {
  return levelOrder[level] >= levelOrder[getMinLevel()];
}

function safeJsonStringify(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return JSON.stringify({ error: 'LOG_SERIALIZATION_FAILED' });
  }
}

export type LogMeta = Record<string, unknown>;

export type Logger = {
  debug: (event: string, meta?: LogMeta) => void;
  info: (event: string, meta?: LogMeta) => void;
  warn: (event: string, meta?: LogMeta) => void;
  error: (event: string, meta?: LogMeta) => void;
};

export function formatLogLine(level: LogLevel, event: string, meta: LogMeta = {}, now: Date = new Date()): string {
  const payload = {
    ts: now.toISOString(),
    level,
    event,
    ...meta,
  };
  return safeJsonStringify(payload) + '\n';
}

export function log(level: LogLevel, event: string, meta: LogMeta = {}): void {
  if (!shouldLog(level)) return;

  const line = formatLogLine(level, event, meta);

  // stdout/stderr directly, so host console overrides do not swallow SDK logs.
  if (level === 'error') {
    process.stderr.write(line);
  } else {
    process.stdout.write(line);
  }
}

export const logger: Logger = {
  debug: (event, meta) => log('debug', event, meta),
  info: (event, meta) => log('info', event, meta),
  warn: (event, meta) => log('warn', event, meta),
  error: (event, meta) => log('error', event, meta),
};
