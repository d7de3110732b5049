/* src/cli/index.ts
 * Root CLI factory for the "backport" tool.
 * - Subcommands: run, do, config.
 * - Global -d/--debug and -b/--boring, defaulted from cliDefaults in the
 *   configuration file found in the working directory.
 * - Never calls process.exit; the bin maps errors to exit codes.
 */
import { Command, Option } from 'commander';

import { applyCliSafety, rootDefaults, tagDefault } from './cli-utils';
import { registerConfig } from './config/register';
import { registerDo } from './do';
import { installRootEnvPreAction } from './root/env';
import { registerRun } from './run';

/**
 * Build the root CLI (`backport`) without side effects (safe for tests).
 *
 * @returns New Commander `Command` instance.
 */
export const makeCli = (): Command => {
  const cli = new Command();
  const { debugDefault, boringDefault } = rootDefaults();

  cli
    .name('backport')
    .description(
      'Keep a backported system package installed: download, install, restart services, verify.',
    );

  const optDebug = new Option('-d, --debug', 'enable verbose debug logging');
  const optNoDebug = new Option(
    '-D, --no-debug',
    'disable verbose debug logging',
  );
  tagDefault(debugDefault ? optDebug : optNoDebug, true);
  cli.addOption(optDebug).addOption(optNoDebug);

  const optBoring = new Option(
    '-b, --boring',
    'disable all color and styling (useful for tests/CI)',
  );
  const optNoBoring = new Option(
    '-B, --no-boring',
    'do not disable color/styling',
  );
  tagDefault(boringDefault ? optBoring : optNoBoring, true);
  cli.addOption(optBoring).addOption(optNoBoring);

  applyCliSafety(cli);
  installRootEnvPreAction(cli, () => rootDefaults());

  registerRun(cli);
  registerDo(cli);
  registerConfig(cli);
  return cli;
};
