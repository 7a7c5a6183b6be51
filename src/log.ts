/**
 * Console logging with a [scope] prefix.
 * debug() output only appears with DEBUG=1.
 */

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
}

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.DEBUG === '1';
}

export function createLogger(scope: string, debug = isDebugEnabled()): Logger {
  const tag = `[${scope}]`;
  return {
    debug(message, ...details) {
      if (debug) {
        console.log(`${tag} ${message}`, ...details);
      }
    },
    info(message, ...details) {
      console.log(`${tag} ${message}`, ...details);
    },
    warn(message, ...details) {
      console.warn(`${tag} ${message}`, ...details);
    },
  };
}
