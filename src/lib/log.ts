import type { LogLevel } from './config';

export type Logger = {
  debug(event: string, detail?: Record<string, unknown>): void;
  info(event: string, detail?: Record<string, unknown>): void;
  warn(event: string, detail?: Record<string, unknown>): void;
  error(event: string, detail?: Record<string, unknown>): void;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * JSON-lines logger. `base` fields (service, workerId, ...) are merged into every line.
 */
export function createLogger(options: { level?: LogLevel; base?: Record<string, unknown> } = {}): Logger {
  const minRank = LEVEL_ORDER[options.level ?? 'info'];
  const base = { service: 'episode-pipeline', ...options.base };

  const write = (level: LogLevel, event: string, detail: Record<string, unknown> = {}) => {
    if (LEVEL_ORDER[level] < minRank) return;
    const line = JSON.stringify({
      ts: new Date().toISOString(),
      level,
      event,
      ...base,
      ...detail,
    });
    if (level === 'error') {
      console.error(line);
      return;
    }
    if (level === 'warn') {
      console.warn(line);
      return;
    }
    console.log(line);
  };

  return {
    debug: (event, detail) => write('debug', event, detail),
    info: (event, detail) => write('info', event, detail),
    warn: (event, detail) => write('warn', event, detail),
    error: (event, detail) => write('error', event, detail),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
