/* src/installer/health.ts
 * health_check: service activity + installation status, with one inline
 * install attempt when the target is not met and auto-install is enabled.
 * An unreadable status counts as not met.
 */
import type { BackportConfig } from '@/installer/config/state';
import { succeeded } from '@/installer/exec/run-command';
import { inspectStatus } from '@/installer/status';
import type {
  InstallationStatus,
  InstallerContext,
  InstallResult,
} from '@/installer/types';

export type OverallHealth = 'healthy' | 'degraded' | 'error';

export type HealthReport = {
  overallHealth: OverallHealth;
  serviceActive: boolean;
  status: InstallationStatus;
  shouldAutoInstall: boolean;
  /** ISO timestamp of the check. */
  timestamp: string;
  autoInstallResult?: InstallResult;
};

export const healthCheck = async (
  ctx: InstallerContext,
  config: BackportConfig,
  install: () => Promise<InstallResult>,
): Promise<HealthReport> => {
  const active = await ctx.run(
    ctx.commands.service('is-active', config.managedService),
    { timeoutMs: config.commandTimeoutSec * 1000 },
  );
  const serviceActive = succeeded(active);
  const status = await inspectStatus(ctx, config);
  const targetActive = status.status !== 'error' && status.isTargetActive;
  const shouldAutoInstall = config.autoInstall && !targetActive;

  const report: HealthReport = {
    overallHealth:
      status.status === 'error'
        ? 'error'
        : serviceActive && targetActive
          ? 'healthy'
          : 'degraded',
    serviceActive,
    status,
    shouldAutoInstall,
    timestamp: new Date().toISOString(),
  };

  if (shouldAutoInstall) {
    ctx.logger.info('auto-installing backport from health check');
    report.autoInstallResult = await install();
  }
  return report;
};
