import { DEBUG_LOGGING } from '@driftguard/env';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export const createLogger = (scope: string, debugEnabled = DEBUG_LOGGING): Logger => {
  const prefix = `[${scope}]`;
  return {
    debug: message => {
      if (debugEnabled) console.debug(prefix, message);
    },
    info: message => console.log(prefix, message),
    warn: message => console.warn(prefix, message),
    error: (message, error) => {
      if (error === undefined) console.error(prefix, message);
      else console.error(prefix, message, error instanceof Error ? error.message : String(error));
    },
  };
};

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
