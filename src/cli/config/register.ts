/** src/cli/config/register.ts
 * `backport config`: validate the configuration file and print the
 * normalized settings, or every rejection message.
 */
import type { Command } from 'commander';

import { type ConfigState, resolveConfigState } from '@/installer/config/state';
import { configToWire } from '@/installer/dispatch';
import { createConsoleLogger } from '@/installer/util/log';

import { applyCliSafety, printJson } from '../cli-utils';
import { loadConfigFile } from './load';

export const checkConfig = async (
  cwd: string,
  config?: string,
): Promise<ConfigState> => {
  const loaded = await loadConfigFile(cwd, config);
  return resolveConfigState(loaded.attributes);
};

/** Register the `config` subcommand on the provided root CLI. */
export function registerConfig(cli: Command): Command {
  const sub = cli
    .command('config')
    .description('Validate the configuration and print the effective settings')
    .option('-c, --config <path>', 'configuration file');
  applyCliSafety(sub);

  sub.action(async (opts: { config?: string }) => {
    const state = await checkConfig(process.cwd(), opts.config);
    if (state.configured) {
      printJson(configToWire(state.config));
      return;
    }
    const logger = createConsoleLogger();
    for (const e of state.errors) logger.error(e);
    throw new Error('configuration rejected');
  });
  return sub;
}
