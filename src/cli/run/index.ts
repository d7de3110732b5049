/** src/cli/run/index.ts
 * `backport run`: keep the backport installed and serve requests on stdin.
 */
import type { Command } from 'commander';

import { applyCliSafety } from '../cli-utils';
import { runServe } from './action';

/** Register the `run` subcommand on the provided root CLI. */
export function registerRun(cli: Command): Command {
  const sub = cli
    .command('run')
    .description(
      'Reconcile in the background and answer JSON requests read from stdin (one per line)',
    )
    .option('-c, --config <path>', 'configuration file');
  applyCliSafety(sub);

  sub.action(async (opts: { config?: string }) => {
    await runServe({ cwd: process.cwd(), config: opts.config });
  });
  return sub;
}
