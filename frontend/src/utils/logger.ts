/**
 * Console-backed scoped loggers. Every line is prefixed with `[scope]`;
 * `debug` only prints when VITE_LOG_DEBUG=1.
 */
import { LOG_DEBUG } from '../config';

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export const createLogger = (scope: string, debugEnabled: boolean = LOG_DEBUG): Logger => {
  const prefix = `[${scope}]`;
  return {
    debug: (...args) => {
      if (debugEnabled) console.log(prefix, ...args);
    },
    info: (...args) => console.log(prefix, ...args),
    warn: (...args) => console.warn(prefix, ...args),
    error: (...args) => console.error(prefix, ...args),
  };
};
