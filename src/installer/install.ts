/* src/installer/install.ts
 * Install Procedure: download → extract → install packages (with one dependency
 * repair attempt) → restart services with settle waits → cleanup → re-inspect.
 * Idempotent: an already-active target is skipped unless forced.
 */
import path from 'node:path';

import { ensureDir } from 'fs-extra';

import { cleanupFiles } from '@/installer/cleanup';
import type { BackportConfig } from '@/installer/config/state';
import { PACKAGE_EXTENSION } from '@/installer/exec/commands';
import {
  type CommandResult,
  failureText,
  succeeded,
} from '@/installer/exec/run-command';
import { inspectStatus, listPackageFiles } from '@/installer/status';
import type { InstallerContext, InstallResult } from '@/installer/types';
import { debug } from '@/installer/util/debug';
import { DBG_SCOPE_INSTALL } from '@/installer/util/debug-scopes';
import { sha256File } from '@/installer/util/hash';
import {
  CancelledError,
  sleep,
  throwIfCancelled,
} from '@/installer/util/sleep';

export type InstallOptions = {
  /** Proceed even when the target version is already active. */
  force: boolean;
  /** Observed between steps and during settle waits. */
  signal?: AbortSignal;
};

const messageOf = (e: unknown): string =>
  e instanceof CancelledError
    ? 'installation cancelled'
    : e instanceof Error
      ? e.message
      : String(e);

const label = (config: BackportConfig): string =>
  config.description ?? `${config.targetVersion} backport (${config.platform})`;

/** Steps 2–6: everything up to and including the package install. */
const applyPackages = async (
  ctx: InstallerContext,
  config: BackportConfig,
  exec: (argv: string[], cwd?: string) => Promise<CommandResult>,
  signal?: AbortSignal,
): Promise<void> => {
  const { logger } = ctx;
  await ensureDir(config.backupDir);

  const archivePath = path.join(config.backupDir, config.archiveName);
  logger.info(`downloading backport from ${config.backportUrl}`);
  const download = await exec(
    ctx.commands.fetch(config.backportUrl, archivePath),
  );
  if (!succeeded(download)) {
    throw new Error(`Failed to download backport: ${failureText(download)}`);
  }
  throwIfCancelled(signal);

  if (config.verifyChecksum && config.expectedChecksum) {
    const actual = await sha256File(archivePath);
    if (actual !== config.expectedChecksum) {
      throw new Error('Archive checksum verification failed');
    }
  }

  logger.info('extracting backport archive');
  const extract = await exec(
    ctx.commands.extract(config.archiveName),
    config.backupDir,
  );
  if (!succeeded(extract)) {
    throw new Error(`Failed to extract archive: ${failureText(extract)}`);
  }
  throwIfCancelled(signal);

  const packages = await listPackageFiles(config.backupDir);
  if (packages.length === 0) {
    throw new Error(`No ${PACKAGE_EXTENSION} files found in extracted archive`);
  }

  logger.info(`installing ${String(packages.length)} package(s)`);
  const install = await exec(ctx.commands.install(packages));
  if (!succeeded(install)) {
    logger.warn('package install failed, attempting to fix dependencies');
    const repair = await exec(ctx.commands.repair());
    if (!succeeded(repair)) {
      throw new Error(`Failed to install packages: ${failureText(install)}`);
    }
    debug(DBG_SCOPE_INSTALL, 'dependency repair succeeded');
  }
  throwIfCancelled(signal);
};

/**
 * Run the install procedure for one configuration generation.
 * Never rejects: failures come back as `{ success: false, action: 'failed' }`.
 */
export const installBackport = async (
  ctx: InstallerContext,
  config: BackportConfig,
  opts: InstallOptions,
): Promise<InstallResult> => {
  const { logger } = ctx;
  const { signal } = opts;
  const warnings: string[] = [];
  const errors: string[] = [];
  const timeoutMs = config.commandTimeoutSec * 1000;
  const exec = (argv: string[], cwd?: string) =>
    ctx.run(argv, { cwd, timeoutMs });
  const failed = (e: unknown): InstallResult => {
    const error = messageOf(e);
    logger.error(`installing backport: ${error}`);
    return {
      success: false,
      action: 'failed',
      message: 'Backport installation failed',
      error,
      warnings,
      errors,
    };
  };

  const before = await inspectStatus(ctx, config);
  if (before.status !== 'error' && before.isTargetActive && !opts.force) {
    return {
      success: true,
      action: 'skipped',
      message: 'Backport already installed',
      version: before.currentVersion,
      isTargetActive: true,
      warnings,
      errors,
    };
  }

  try {
    throwIfCancelled(signal);
    logger.info(`installing ${label(config)}; target ${config.targetVersion}`);
    await applyPackages(ctx, config, exec, signal);
  } catch (e) {
    return failed(e);
  }

  // Packages are in place; from here on failures are recorded, not fatal.
  const svc = config.managedService;
  let serviceActive: boolean | undefined;
  try {
    logger.info(`restarting ${svc}`);
    const restart = await exec(ctx.commands.service('restart', svc));
    if (!succeeded(restart)) {
      const w = `Failed to restart ${svc}: ${failureText(restart)}`;
      warnings.push(w);
      logger.warn(w);
    } else {
      await sleep(ctx.timing.serviceSettleMs, signal);
      const active = await exec(ctx.commands.service('is-active', svc));
      serviceActive = succeeded(active);
      if (!serviceActive) {
        const err = `${svc} did not become active after restart`;
        errors.push(err);
        logger.error(err);
      } else if (config.restartDependentService) {
        const dep = config.dependentService;
        logger.info(`restarting ${dep}`);
        const depRestart = await exec(ctx.commands.service('restart', dep));
        if (!succeeded(depRestart)) {
          const w = `Failed to restart ${dep}: ${failureText(depRestart)}`;
          warnings.push(w);
          logger.warn(w);
        }
        await sleep(ctx.timing.dependentSettleMs, signal);
      }
    }
  } catch (e) {
    if (e instanceof CancelledError) return failed(e);
    const w = `Service restart failed: ${messageOf(e)}`;
    warnings.push(w);
    logger.warn(w);
  }

  if (config.cleanupAfterInstall) {
    const cleaned = await cleanupFiles(config);
    if (!cleaned.success) {
      const w = `Cleanup failed: ${cleaned.error}`;
      warnings.push(w);
      logger.warn(w);
    }
  }

  const after = await inspectStatus(ctx, config);
  logger.info('backport installed');
  return {
    success: true,
    action: 'installed',
    message: 'Backport installed successfully',
    ...(after.status !== 'error'
      ? { version: after.currentVersion, isTargetActive: after.isTargetActive }
      : { isTargetActive: false }),
    ...(serviceActive !== undefined ? { serviceActive } : {}),
    warnings,
    errors,
  };
};
