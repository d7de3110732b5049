/** src/cli/do/index.ts
 * `backport do <command>`: run one command and print its JSON result.
 */
import type { Command } from 'commander';

import { COMMAND_NAMES } from '@/installer/dispatch';

import { applyCliSafety } from '../cli-utils';
import { runOnce } from './action';

/** Register the `do` subcommand on the provided root CLI. */
export function registerDo(cli: Command): Command {
  const sub = cli
    .command('do')
    .description('Run one command with the background loop disabled')
    .argument('<command>', `one of: ${COMMAND_NAMES.join(', ')}`)
    .option('-c, --config <path>', 'configuration file')
    .option('-f, --force', 'install even when the target version is active');
  applyCliSafety(sub);

  sub.action(
    async (command: string, opts: { config?: string; force?: boolean }) => {
      const result = await runOnce(command, {
        cwd: process.cwd(),
        config: opts.config,
        force: opts.force,
      });
      if (typeof result.error === 'string') {
        throw new Error(`${command}: ${result.error}`);
      }
    },
  );
  return sub;
}
