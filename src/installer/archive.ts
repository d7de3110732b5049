/* src/installer/archive.ts
 * validate_archive: dry-run download into a private temporary directory,
 * list entries without extracting, report package files. The temporary
 * directory is removed on every exit path.
 */
import { mkdtemp, stat } from 'node:fs/promises';
import path from 'node:path';

import { remove } from 'fs-extra';

import type { BackportConfig } from '@/installer/config/state';
import { PACKAGE_EXTENSION } from '@/installer/exec/commands';
import { failureText, succeeded } from '@/installer/exec/run-command';
import type { InstallerContext } from '@/installer/types';
import { sha256File } from '@/installer/util/hash';

export type ArchiveValidation =
  | {
      valid: true;
      archiveSize: number;
      fileCount: number;
      packageFiles: string[];
      allFiles: string[];
    }
  | { valid: false; error: string };

/** Split `tar -t` output into entries (blank lines dropped). */
export const parseListing = (stdout: string): string[] =>
  stdout
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0);

export const validateArchive = async (
  ctx: InstallerContext,
  config: BackportConfig,
): Promise<ArchiveValidation> => {
  let tmp: string | undefined;
  try {
    tmp = await mkdtemp(path.join(ctx.tmpRoot, 'backport-validate-'));
    const archivePath = path.join(tmp, config.archiveName);
    const timeoutMs = config.commandTimeoutSec * 1000;

    const download = await ctx.run(
      ctx.commands.fetch(config.backportUrl, archivePath),
      { timeoutMs },
    );
    if (!succeeded(download)) {
      return {
        valid: false,
        error: `Failed to download: ${failureText(download)}`,
      };
    }

    if (config.verifyChecksum && config.expectedChecksum) {
      if ((await sha256File(archivePath)) !== config.expectedChecksum) {
        return { valid: false, error: 'Checksum verification failed' };
      }
    }

    const listing = await ctx.run(ctx.commands.list(config.archiveName), {
      cwd: tmp,
      timeoutMs,
    });
    if (!succeeded(listing)) {
      return {
        valid: false,
        error: `Failed to examine archive: ${failureText(listing)}`,
      };
    }

    const allFiles = parseListing(listing.stdout);
    const packageFiles = allFiles.filter((f) =>
      f.endsWith(PACKAGE_EXTENSION),
    );
    const { size } = await stat(archivePath);
    return {
      valid: true,
      archiveSize: size,
      fileCount: allFiles.length,
      packageFiles,
      allFiles,
    };
  } catch (e) {
    return { valid: false, error: e instanceof Error ? e.message : String(e) };
  } finally {
    if (tmp) {
      try {
        await remove(tmp);
      } catch (e) {
        ctx.logger.warn(
          `could not remove ${tmp}: ${e instanceof Error ? e.message : String(e)}`,
        );
      }
    }
  }
};
