/* src/index.ts
 * Library entry: the component, its building blocks and the public types.
 */
export { validateArchive } from './installer/archive';
export { KNOWN_BACKPORTS, type CatalogEntry } from './installer/catalog';
export { cleanupFiles } from './installer/cleanup';
export {
  type BackportConfig,
  type ConfigState,
  deriveArchiveName,
  resolveConfigState,
  UNCONFIGURED,
} from './installer/config/state';
export {
  COMMAND_NAMES,
  type CommandHost,
  type CommandName,
  dispatchCommand,
  type WireResult,
  type WireValue,
} from './installer/dispatch';
export {
  debianCommands,
  type SystemCommands,
} from './installer/exec/commands';
export {
  type CommandOptions,
  type CommandResult,
  type CommandRunner,
  createCommandRunner,
  failureText,
  succeeded,
} from './installer/exec/run-command';
export { healthCheck, type HealthReport } from './installer/health';
export { installBackport, type InstallOptions } from './installer/install';
export {
  type LoopState,
  type PassOutcome,
  ReconcileLoop,
  type StopReason,
} from './installer/loop/reconcile-loop';
export {
  BackportInstaller,
  type BackportInstallerOptions,
} from './installer/service';
export { inspectStatus, queryVersion } from './installer/status';
export type {
  InstallationStatus,
  InstallerContext,
  InstallResult,
  SettleTiming,
} from './installer/types';
export { createConsoleLogger, type Logger } from './installer/util/log';
