import pino from 'pino';

export function createLogger(level = process.env.LOG_LEVEL || 'info'): pino.Logger {
  return pino({
    level,
    base: { service: 'candle-sync' },
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

function formatArgs(args: unknown[]): string {
  return args
    .map((a) => {
      if (a instanceof Error) return a.stack || a.message;
      if (typeof a === 'object' && a !== null) {
        try {
          return JSON.stringify(a);
        } catch {
          return String(a);
        }
      }
      return String(a);
    })
    .join(' ');
}

/**
 * Route console.* through `target` so library code that logs via console
 * still produces structured JSON lines.
 */
export function redirectConsole(target: pino.Logger): void {
  console.log = (...args: unknown[]) => target.info(formatArgs(args));
  console.error = (...args: unknown[]) => target.error(formatArgs(args));
  console.warn = (...args: unknown[]) => target.warn(formatArgs(args));
  console.info = (...args: unknown[]) => target.info(formatArgs(args));
  console.debug = (...args: unknown[]) => target.debug(formatArgs(args));
}

const logger = createLogger();

export default logger;
