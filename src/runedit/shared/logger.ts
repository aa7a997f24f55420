export type Logger = {
  debug(tag: string, message: string, context?: Record<string, unknown>): void;
};

export function createLogger(enabled: boolean): Logger {
  return {
    debug(tag, message, context) {
      if (!enabled) {
        return;
      }
      if (context) {
        console.debug(`[${tag}] ${message}`, context);
      } else {
        console.debug(`[${tag}] ${message}`);
      }
    },
  };
}

export const silentLogger: Logger = createLogger(false);
