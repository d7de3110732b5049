/* src/installer/cleanup.ts
 * Remove the work directory wholesale. Failures are reported, not thrown.
 */
import { pathExists, remove } from 'fs-extra';

import type { BackportConfig } from '@/installer/config/state';
import type { CleanupResult } from '@/installer/types';

export const cleanupFiles = async (
  config: BackportConfig,
): Promise<CleanupResult> => {
  try {
    if (!(await pathExists(config.backupDir))) {
      return { success: true, message: 'No files to clean up' };
    }
    await remove(config.backupDir);
    return { success: true, message: `Cleaned up ${config.backupDir}` };
  } catch (e) {
    return { success: false, error: e instanceof Error ? e.message : String(e) };
  }
};
