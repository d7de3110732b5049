/* src/installer/util/color.ts
 * Colors for warning and error lines; plain under BACKPORT_BORING=1,
 * NO_COLOR=1, FORCE_COLOR=0 or a non-TTY stdout.
 */
import chalk from 'chalk';

export function isBoring(): boolean {
  // read per call: the CLI flips the env after import
  const tty = Boolean(process.stdout.isTTY);
  return (
    process.env.BACKPORT_BORING === '1' ||
    process.env.NO_COLOR === '1' ||
    process.env.FORCE_COLOR === '0' ||
    !tty
  );
}

export function error(s: string): string {
  return isBoring() ? s : chalk.red(s);
}
export function warn(s: string): string {
  return isBoring() ? s : chalk.hex('#FFA500')(s);
} // orange

