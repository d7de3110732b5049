/* src/cli/do/action.ts
 * One-shot dispatch: configure a component with the loop disabled, run one
 * command, print the result.
 */
import { loadConfigFile } from '@/cli/config/load';
import type { WireResult } from '@/installer/dispatch';
import {
  BackportInstaller,
  type BackportInstallerOptions,
} from '@/installer/service';
import { createConsoleLogger } from '@/installer/util/log';

import { printJson } from '../cli-utils';

export type DoOptions = {
  cwd: string;
  config?: string;
  force?: boolean;
  /** Collaborator overrides (tests). */
  deps?: Omit<BackportInstallerOptions, 'background'>;
  print?: (result: WireResult) => void;
};

export const runOnce = async (
  command: string,
  opts: DoOptions,
): Promise<WireResult> => {
  const loaded = await loadConfigFile(opts.cwd, opts.config);
  const installer = new BackportInstaller('backport', {
    logger: createConsoleLogger('stderr'),
    ...opts.deps,
    background: false,
  });
  try {
    await installer.reconfigure(loaded.attributes);
    const result = await installer.doCommand({
      command,
      ...(opts.force ? { force: true } : {}),
    });
    (opts.print ?? printJson)(result);
    return result;
  } finally {
    await installer.close();
  }
};
