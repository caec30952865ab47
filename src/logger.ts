/**
 * Console logger with component tags
 *
 * Format: [HH:MM:SS.mmm] [Component] message
 */

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

type Level = keyof Logger;

/**
 * Format timestamp as [HH:MM:SS.mmm]
 */
export function formatTimestamp(now: Date = new Date()): string {
  const hours = String(now.getHours()).padStart(2, '0');
  const minutes = String(now.getMinutes()).padStart(2, '0');
  const seconds = String(now.getSeconds()).padStart(2, '0');
  const milliseconds = String(now.getMilliseconds()).padStart(3, '0');
  return `[${hours}:${minutes}:${seconds}.${milliseconds}]`;
}

export function formatLine(component: string, message: string, now?: Date): string {
  return `${formatTimestamp(now)} [${component}] ${message}`;
}

const sinks: Record<Level, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

/**
 * Console-backed logger for one component
 */
export function createLogger(component: string): Logger {
  const write =
    (level: Level) =>
    (message: string, ...details: unknown[]) =>
      sinks[level](formatLine(component, message), ...details);

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
