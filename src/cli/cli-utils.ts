/** Shared Commander helpers for the backport CLI. */
import type { Command, Option } from 'commander';

import { loadConfigFileSync } from '@/cli/config/load';

const cwdSafe = (): string => {
  try {
    return process.cwd();
  } catch {
    return '.';
  }
};

/**
 * Throw CommanderError instead of calling process.exit, so the bin decides
 * the exit code and tests can parse without ending the worker.
 */
export function applyCliSafety(cmd: Command): void {
  cmd.exitOverride();
  cmd.showHelpAfterError('(add --help for usage)');
}

/** Tag an Option description with (default) when active. */
export function tagDefault(opt: Option, on: boolean): void {
  if (on && !opt.description.includes('(default)')) {
    opt.description = `${opt.description} (default)`;
  }
}

/** Root-level boolean defaults (debug/boring) from cliDefaults or built-ins. */
export const rootDefaults = (
  dir = cwdSafe(),
): { debugDefault: boolean; boringDefault: boolean } => {
  try {
    const { cliDefaults } = loadConfigFileSync(dir);
    return {
      debugDefault: cliDefaults.debug ?? false,
      boringDefault: cliDefaults.boring ?? false,
    };
  } catch {
    // no readable config here; subcommands report load errors themselves
    return { debugDefault: false, boringDefault: false };
  }
};

/** Print a JSON document on stdout. */
export const printJson = (value: unknown): void => {
  console.log(JSON.stringify(value, null, 2));
};
