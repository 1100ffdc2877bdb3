import type { AppConfig, LogLevel } from '../../shared/config';

const levelWeights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

type LogMeta = Record<string, unknown>;

export interface Logger {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
}

export type LogSink = (line: string) => void;

// stdout belongs to the CLI's progress lines
const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

const serializeMeta = (meta: LogMeta): LogMeta => {
  const out: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return out;
};

export const createLogger = (config: Pick<AppConfig, 'observability'>, sink: LogSink = stderrSink): Logger => {
  const threshold = levelWeights[config.observability.logLevel];
  const shouldLog = (level: LogLevel) => levelWeights[level] >= threshold;

  const emit = (level: LogLevel, message: string, meta?: LogMeta) => {
    if (!shouldLog(level)) return;
    const payload = {
      level,
      message,
      ts: new Date().toISOString(),
      ...(meta ? serializeMeta(meta) : {}),
    };
    sink(JSON.stringify(payload));
  };

  return {
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta),
  };
};

export const createSilentLogger = (): Logger => createLogger({ observability: { logLevel: 'error' } }, () => {});
