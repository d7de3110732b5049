/* src/installer/types.ts
 * Shared context and result types for the installer operations.
 */
import type { SystemCommands } from '@/installer/exec/commands';
import type { CommandRunner } from '@/installer/exec/run-command';
import type { Logger } from '@/installer/util/log';

/** Settle waits after service restarts (milliseconds). */
export type SettleTiming = {
  /** Wait after restarting the managed service, before the is-active check. */
  serviceSettleMs: number;
  /** Wait after restarting the dependent service. */
  dependentSettleMs: number;
};

export const DEFAULT_SETTLE_TIMING: SettleTiming = {
  serviceSettleMs: 5_000,
  dependentSettleMs: 10_000,
};

/** Collaborators shared by every operation of one component instance. */
export type InstallerContext = {
  run: CommandRunner;
  commands: SystemCommands;
  logger: Logger;
  timing: SettleTiming;
  /** Parent directory for validate_archive temporary directories. */
  tmpRoot: string;
};

export type StatusLabel = 'installed' | 'needs_install';

/** Point-in-time installation snapshot; recomputed on every inspection. */
export type InstallationStatus =
  | {
      status: StatusLabel;
      currentVersion: string;
      targetVersion: string;
      /** Target version is a substring of the current version. */
      isTargetActive: boolean;
      /** Work directory exists and holds at least one package file. */
      leftoversExist: boolean;
      autoInstallEnabled: boolean;
      platform: string;
      description?: string;
      backportUrl: string;
    }
  | { status: 'error'; error: string };

export type InstallAction = 'skipped' | 'installed' | 'failed';

export type InstallResult = {
  success: boolean;
  action: InstallAction;
  message: string;
  /** Version reported after the procedure (or before, when skipped). */
  version?: string;
  isTargetActive?: boolean;
  /** Managed service became active after the restart (undefined: not checked). */
  serviceActive?: boolean;
  /** Non-critical failures (service restarts, cleanup). */
  warnings: string[];
  /** Non-fatal errors recorded after the packages were installed. */
  errors: string[];
  /** Cause of a failed install. */
  error?: string;
};

export type CleanupResult =
  | { success: true; message: string }
  | { success: false; error: string };
