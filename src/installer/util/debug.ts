/* src/installer/util/debug.ts
 * Opt-in debug output. Emits only when BACKPORT_DEBUG=1 to avoid noisy output in normal mode.
 */

export const debugEnabled = (): boolean => {
  try {
    return process.env.BACKPORT_DEBUG === '1';
  } catch {
    return false;
  }
};

/** Log a concise debug notice under BACKPORT_DEBUG=1 (scope: area:function). */
export const debug = (scope: string, message: string): void => {
  if (!debugEnabled()) return;
  try {
    // stderr to keep separation from normal logs and JSON responses
    console.error(`backport: debug: ${scope}: ${message}`);
  } catch {
    /* ignore */
  }
};
