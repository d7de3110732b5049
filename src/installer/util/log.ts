/* src/installer/util/log.ts
 * Console logger with the "backport:" prefix and semantic colors.
 * Components take a Logger so tests can capture lines instead of console output.
 */
import { error as red, warn as orange } from './color';
import { debug } from './debug';

export type Logger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug: (scope: string, message: string) => void;
};

/**
 * Create the default console logger.
 *
 * @param stream - Where info lines go. The stdin request server passes
 * 'stderr' so stdout carries only JSON responses.
 */
export const createConsoleLogger = (
  stream: 'stdout' | 'stderr' = 'stdout',
): Logger => {
  const out = (line: string): void => {
    try {
      if (stream === 'stderr') console.error(line);
      else console.log(line);
    } catch {
      /* ignore */
    }
  };
  return {
    info: (message) => out(`backport: ${message}`),
    warn: (message) => {
      try {
        console.error(orange(`backport: warning: ${message}`));
      } catch {
        /* ignore */
      }
    },
    error: (message) => {
      try {
        console.error(red(`backport: error: ${message}`));
      } catch {
        /* ignore */
      }
    },
    debug,
  };
};

