/* src/installer/status.ts
 * Status Inspector: current version (via the version-query command) and
 * leftover package files in the work directory. Read-only; never throws.
 */
import fg from 'fast-glob';
import { pathExists } from 'fs-extra';

import type { BackportConfig } from '@/installer/config/state';
import { PACKAGE_EXTENSION } from '@/installer/exec/commands';
import { succeeded } from '@/installer/exec/run-command';
import type { InstallationStatus, InstallerContext } from '@/installer/types';

/** Reported when the version query fails. */
export const UNKNOWN_VERSION = 'unknown';

/** Case-sensitive substring match of the target against the reported version. */
export const isTargetVersion = (current: string, target: string): boolean =>
  current.includes(target);

/** Package files (absolute paths, sorted) directly inside the work directory. */
export const listPackageFiles = async (dir: string): Promise<string[]> => {
  if (!(await pathExists(dir))) return [];
  const files = await fg(`*${PACKAGE_EXTENSION}`, {
    cwd: dir,
    absolute: true,
    onlyFiles: true,
    dot: false,
  });
  return files.sort();
};

export type VersionQuery =
  | { ok: true; version: string }
  | { ok: false; stderr: string };

/** Run the version-query command for the managed service. */
export const queryVersion = async (
  ctx: InstallerContext,
  config: BackportConfig,
): Promise<VersionQuery> => {
  const r = await ctx.run(ctx.commands.version(config.managedService), {
    timeoutMs: config.commandTimeoutSec * 1000,
  });
  return succeeded(r)
    ? { ok: true, version: r.stdout.trim() }
    : { ok: false, stderr: r.stderr };
};

/** Take an installation snapshot for the given configuration generation. */
export const inspectStatus = async (
  ctx: InstallerContext,
  config: BackportConfig,
): Promise<InstallationStatus> => {
  try {
    const q = await queryVersion(ctx, config);
    const currentVersion = q.ok ? q.version : UNKNOWN_VERSION;
    const isTargetActive = isTargetVersion(currentVersion, config.targetVersion);
    const leftoversExist =
      (await listPackageFiles(config.backupDir)).length > 0;
    return {
      status: isTargetActive ? 'installed' : 'needs_install',
      currentVersion,
      targetVersion: config.targetVersion,
      isTargetActive,
      leftoversExist,
      autoInstallEnabled: config.autoInstall,
      platform: config.platform,
      ...(config.description !== undefined
        ? { description: config.description }
        : {}),
      backportUrl: config.backportUrl,
    };
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    ctx.logger.error(`checking backport status: ${message}`);
    return { status: 'error', error: message };
  }
};
