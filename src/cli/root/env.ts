// src/cli/root/env.ts
import type { Command } from 'commander';

/** Install root preAction to resolve BACKPORT_DEBUG/BACKPORT_BORING and color flags. */
export const installRootEnvPreAction = (
  cli: Command,
  safeRootDefaults: () => { debugDefault: boolean; boringDefault: boolean },
): void => {
  cli.hook('preAction', (thisCommand) => {
    const envDebugActive = process.env.BACKPORT_DEBUG === '1';
    const opts = thisCommand.opts<{ debug?: boolean; boring?: boolean }>();
    const { debugDefault, boringDefault } = safeRootDefaults();

    const debugFromCli =
      thisCommand.getOptionValueSource('debug') === 'cli'
        ? Boolean(opts.debug)
        : undefined;
    const boringFromCli =
      thisCommand.getOptionValueSource('boring') === 'cli'
        ? Boolean(opts.boring)
        : undefined;

    let debugFinal = debugDefault;
    if (typeof debugFromCli === 'boolean') debugFinal = debugFromCli;
    else if (envDebugActive) debugFinal = true;

    const boringFinal =
      typeof boringFromCli === 'boolean' ? boringFromCli : boringDefault;

    if (debugFinal) process.env.BACKPORT_DEBUG = '1';
    else delete process.env.BACKPORT_DEBUG;

    if (boringFinal) {
      process.env.BACKPORT_BORING = '1';
      process.env.FORCE_COLOR = '0';
      process.env.NO_COLOR = '1';
    } else {
      delete process.env.BACKPORT_BORING;
      delete process.env.FORCE_COLOR;
      delete process.env.NO_COLOR;
    }
  });
};
