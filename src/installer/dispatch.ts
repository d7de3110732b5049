/* src/installer/dispatch.ts
 * Command Dispatcher: maps `{ command: <name>, ... }` requests onto the
 * installer operations and renders snake_case result mappings.
 * Never rejects; unknown names and unexpected failures come back as data.
 */
import { validateArchive } from '@/installer/archive';
import { KNOWN_BACKPORTS } from '@/installer/catalog';
import { cleanupFiles } from '@/installer/cleanup';
import type { BackportConfig, ConfigState } from '@/installer/config/state';
import { healthCheck } from '@/installer/health';
import { inspectStatus, queryVersion } from '@/installer/status';
import type {
  CleanupResult,
  InstallationStatus,
  InstallerContext,
  InstallResult,
} from '@/installer/types';

export const COMMAND_NAMES = [
  'check_status',
  'install_backport',
  'get_nm_version',
  'get_config',
  'list_backports',
  'validate_archive',
  'health_check',
  'cleanup_files',
] as const;

export type CommandName = (typeof COMMAND_NAMES)[number];

export type WireValue =
  | string
  | number
  | boolean
  | null
  | WireValue[]
  | { [key: string]: WireValue };

export type WireResult = { [key: string]: WireValue };

/** What the dispatcher needs from the owning component. */
export type CommandHost = {
  readonly configState: ConfigState;
  readonly context: InstallerContext;
  /** Serialized install for the given generation. */
  install: (config: BackportConfig, force: boolean) => Promise<InstallResult>;
};

export const isCommandName = (v: unknown): v is CommandName =>
  typeof v === 'string' && COMMAND_NAMES.some((n) => n === v);

/** Drop undefined members so results stay plain JSON. */
const compact = (o: Record<string, WireValue | undefined>): WireResult => {
  const out: WireResult = {};
  for (const [k, v] of Object.entries(o)) if (v !== undefined) out[k] = v;
  return out;
};

export const statusToWire = (s: InstallationStatus): WireResult =>
  s.status === 'error'
    ? { status: 'error', error: s.error }
    : compact({
        is_backported: s.isTargetActive,
        current_version: s.currentVersion,
        target_version: s.targetVersion,
        backport_files_exist: s.leftoversExist,
        auto_install_enabled: s.autoInstallEnabled,
        platform: s.platform,
        description: s.description,
        backport_url: s.backportUrl,
        status: s.status,
      });

export const installToWire = (r: InstallResult): WireResult =>
  compact({
    success: r.success,
    action: r.action,
    message: r.message,
    version: r.version,
    is_backported: r.isTargetActive,
    service_active: r.serviceActive,
    warnings: r.warnings,
    errors: r.errors,
    error: r.error,
  });

const cleanupToWire = (r: CleanupResult): WireResult =>
  r.success
    ? { success: true, message: r.message }
    : { success: false, error: r.error };

export const configToWire = (c: BackportConfig): WireResult =>
  compact({
    configured: true,
    backport_url: c.backportUrl,
    target_version: c.targetVersion,
    archive_name: c.archiveName,
    work_dir: c.workDir,
    platform: c.platform,
    description: c.description,
    auto_install: c.autoInstall,
    check_interval: c.checkIntervalSec,
    force_reinstall: c.forceReinstall,
    cleanup_after_install: c.cleanupAfterInstall,
    restart_dependent_service: c.restartDependentService,
    managed_service: c.managedService,
    dependent_service: c.dependentService,
    verify_checksum: c.verifyChecksum,
    command_timeout: c.commandTimeoutSec,
    backup_dir: c.backupDir,
  });

const notConfigured = (errors: readonly string[]): WireResult => ({
  success: false,
  configured: false,
  error: 'not configured',
  errors: [...errors],
});

const unknownCommand = (name: string): WireResult => ({
  error: `Unknown command: ${name}`,
  available_commands: [...COMMAND_NAMES],
});

const run = async (
  host: CommandHost,
  name: CommandName,
  request: Record<string, unknown>,
): Promise<WireResult> => {
  const state = host.configState;
  const ctx = host.context;

  if (name === 'list_backports') {
    return {
      available_backports: KNOWN_BACKPORTS.map((b) => ({
        ...b,
        features: [...b.features],
      })),
      current_config: state.configured
        ? {
            target_version: state.config.targetVersion,
            platform: state.config.platform,
          }
        : null,
    };
  }
  if (!state.configured) return notConfigured(state.errors);
  const config = state.config;

  switch (name) {
    case 'check_status':
      return statusToWire(await inspectStatus(ctx, config));
    case 'install_backport': {
      const raw = request.force;
      if (raw !== undefined && typeof raw !== 'boolean') {
        return {
          success: false,
          action: 'failed',
          error: 'force must be a boolean',
        };
      }
      const force = typeof raw === 'boolean' ? raw : config.forceReinstall;
      const r = await host.install(config, force);
      return installToWire(r);
    }
    case 'get_nm_version': {
      const q = await queryVersion(ctx, config);
      return q.ok
        ? {
            version: q.version,
            is_target_version: q.version.includes(config.targetVersion),
          }
        : {
            error: `Failed to get ${config.managedService} version`,
            stderr: q.stderr,
          };
    }
    case 'get_config':
      return configToWire(config);
    case 'validate_archive': {
      const v = await validateArchive(ctx, config);
      return v.valid
        ? {
            valid: true,
            archive_size: v.archiveSize,
            file_count: v.fileCount,
            deb_files: v.packageFiles,
            deb_count: v.packageFiles.length,
            all_files: v.allFiles,
          }
        : { valid: false, error: v.error };
    }
    case 'health_check': {
      const h = await healthCheck(ctx, config, () =>
        host.install(config, config.forceReinstall),
      );
      return compact({
        overall_health: h.overallHealth,
        service_active: h.serviceActive,
        backport_status: statusToWire(h.status),
        should_auto_install: h.shouldAutoInstall,
        timestamp: h.timestamp,
        auto_install_result: h.autoInstallResult
          ? installToWire(h.autoInstallResult)
          : undefined,
      });
    }
    case 'cleanup_files':
      return cleanupToWire(await cleanupFiles(config));
  }
};

/**
 * Dispatch one request.
 *
 * @param request - Mapping with a `command` name plus command arguments.
 */
export const dispatchCommand = async (
  host: CommandHost,
  request: Record<string, unknown>,
): Promise<WireResult> => {
  const name = request.command;
  if (!isCommandName(name)) {
    const shown =
      typeof name === 'string'
        ? name
        : name === undefined
          ? ''
          : JSON.stringify(name);
    return unknownCommand(shown);
  }
  try {
    return await run(host, name, request);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    host.context.logger.error(`${name}: ${message}`);
    return { error: message };
  }
};
