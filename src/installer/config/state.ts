/* src/installer/config/state.ts
 * Configuration State: one immutable generation per reconfigure() call.
 * Either fully configured (all required settings + derived archive name) or
 * unconfigured with the rejection messages; there is no partial state.
 */
import os from 'node:os';
import path from 'node:path';

import { debug } from '@/installer/util/debug';
import { DBG_SCOPE_CONFIG_RESOLVE } from '@/installer/util/debug-scopes';

import { attributesSchema } from './schema';

export const DEFAULT_CHECK_INTERVAL_SEC = 60;
export const DEFAULT_COMMAND_TIMEOUT_SEC = 600;
export const DEFAULT_MANAGED_SERVICE = 'NetworkManager';
export const DEFAULT_DEPENDENT_SERVICE = 'viam-agent';

export type BackportConfig = Readonly<{
  backportUrl: string;
  /** Trimmed target version; matched as a substring of the reported version. */
  targetVersion: string;
  /** Final URL path segment. */
  archiveName: string;
  workDir: string;
  platform: string;
  description?: string;
  baseDir: string;
  /** Absolute work directory: <baseDir>/<workDir>. */
  backupDir: string;
  autoInstall: boolean;
  checkIntervalSec: number;
  forceReinstall: boolean;
  cleanupAfterInstall: boolean;
  restartDependentService: boolean;
  managedService: string;
  dependentService: string;
  verifyChecksum: boolean;
  expectedChecksum?: string;
  commandTimeoutSec: number;
}>;

export type ConfigState =
  | { readonly configured: true; readonly config: BackportConfig }
  | { readonly configured: false; readonly errors: readonly string[] };

/** State of a component that has not received a configuration yet. */
export const UNCONFIGURED: ConfigState = {
  configured: false,
  errors: ['not configured'],
};

/**
 * Derive the archive file name from the final path segment of a URL.
 *
 * @returns The decoded segment, or null when the URL does not parse or the
 * segment is empty or would escape the work directory.
 */
export const deriveArchiveName = (url: string): string | null => {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return null;
  }
  const last = pathname.split('/').pop() ?? '';
  let name = last;
  try {
    name = decodeURIComponent(last);
  } catch {
    /* keep the raw segment */
  }
  if (!name || name === '.' || name === '..' || /[\\/]/.test(name)) {
    return null;
  }
  return name;
};

export type ResolveOptions = {
  /** Base directory when the base_dir attribute is absent (default: home). */
  homeDir?: string;
};

/**
 * Validate and normalize a raw attribute mapping.
 * Never throws; a rejection lists every failed rule.
 */
export const resolveConfigState = (
  raw: unknown,
  opts: ResolveOptions = {},
): ConfigState => {
  const input: Record<string, unknown> =
    raw && typeof raw === 'object' && !Array.isArray(raw)
      ? Object.fromEntries(Object.entries(raw))
      : {};
  const errors: string[] = [];

  const parsed = attributesSchema.safeParse(input);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) errors.push(issue.message);
  }

  // Cross-field rule, checked on the raw input so it is reported alongside the rest.
  const checksum = input.expected_checksum;
  if (
    input.verify_checksum === true &&
    (typeof checksum !== 'string' || !checksum.trim())
  ) {
    errors.push(
      'expected_checksum must be provided when verify_checksum is true',
    );
  }

  const url = input.backport_url;
  const archiveName =
    typeof url === 'string' && /^https?:\/\//.test(url)
      ? deriveArchiveName(url)
      : undefined;
  if (archiveName === null) {
    errors.push('backport_url must end with an archive file name');
  }

  const baseDir = parsed.success
    ? (parsed.data.base_dir ?? opts.homeDir ?? os.homedir())
    : undefined;
  const backupDir =
    parsed.success && baseDir !== undefined
      ? path.join(baseDir, parsed.data.work_dir)
      : undefined;
  if (baseDir !== undefined && backupDir !== undefined) {
    // cleanup removes backupDir recursively
    const rel = path.relative(baseDir, backupDir);
    if (!rel || rel === '..' || rel.startsWith(`..${path.sep}`)) {
      errors.push('work_dir must name a directory inside the base directory');
    }
  }

  if (
    !parsed.success ||
    errors.length > 0 ||
    !archiveName ||
    baseDir === undefined ||
    backupDir === undefined
  ) {
    debug(DBG_SCOPE_CONFIG_RESOLVE, `rejected: ${errors.join('; ')}`);
    const rejected: ConfigState = {
      configured: false,
      errors: Object.freeze(errors),
    };
    return Object.freeze(rejected);
  }

  const a = parsed.data;
  const config: BackportConfig = Object.freeze({
    backportUrl: a.backport_url,
    targetVersion: a.target_version,
    archiveName,
    workDir: a.work_dir,
    platform: a.platform,
    ...(a.description !== undefined ? { description: a.description } : {}),
    baseDir,
    backupDir,
    autoInstall: a.auto_install ?? true,
    checkIntervalSec: a.check_interval ?? DEFAULT_CHECK_INTERVAL_SEC,
    forceReinstall: a.force_reinstall ?? false,
    cleanupAfterInstall: a.cleanup_after_install ?? true,
    restartDependentService: a.restart_dependent_service ?? true,
    managedService: a.managed_service ?? DEFAULT_MANAGED_SERVICE,
    dependentService: a.dependent_service ?? DEFAULT_DEPENDENT_SERVICE,
    verifyChecksum: a.verify_checksum ?? false,
    ...(a.expected_checksum !== undefined
      ? { expectedChecksum: a.expected_checksum.toLowerCase() }
      : {}),
    commandTimeoutSec: a.command_timeout ?? DEFAULT_COMMAND_TIMEOUT_SEC,
  });
  debug(
    DBG_SCOPE_CONFIG_RESOLVE,
    `configured ${config.targetVersion} from ${config.backportUrl} (${config.backupDir})`,
  );
  const accepted: ConfigState = { configured: true, config };
  return Object.freeze(accepted);
};
