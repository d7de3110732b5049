/* src/installer/service.ts
 * BackportInstaller: the single owner of one configured instance.
 * - reconfigure(): stop + await the loop, swap the configuration generation
 *   atomically, start a new loop when configured with auto_install.
 * - doCommand(): request/response surface (see dispatch.ts).
 * - close(): cancel the loop unconditionally.
 * Installs from the loop, the dispatcher and health_check are serialized.
 */
import os from 'node:os';

import { cleanupFiles } from '@/installer/cleanup';
import {
  type BackportConfig,
  type ConfigState,
  resolveConfigState,
  UNCONFIGURED,
} from '@/installer/config/state';
import {
  type CommandHost,
  dispatchCommand,
  type WireResult,
} from '@/installer/dispatch';
import { debianCommands, type SystemCommands } from '@/installer/exec/commands';
import {
  type CommandRunner,
  createCommandRunner,
} from '@/installer/exec/run-command';
import { installBackport } from '@/installer/install';
import {
  type LoopState,
  type PassOutcome,
  ReconcileLoop,
  type StopReason,
} from '@/installer/loop/reconcile-loop';
import { inspectStatus } from '@/installer/status';
import {
  DEFAULT_SETTLE_TIMING,
  type InstallerContext,
  type InstallResult,
  type SettleTiming,
} from '@/installer/types';
import { createConsoleLogger, type Logger } from '@/installer/util/log';

export type BackportInstallerOptions = {
  run?: CommandRunner;
  commands?: SystemCommands;
  logger?: Logger;
  timing?: Partial<SettleTiming>;
  /** Parent of validate_archive temporary directories (default: OS temp dir). */
  tmpRoot?: string;
  /** Base directory when base_dir is not configured (default: home). */
  homeDir?: string;
  /** Start the reconcile loop when auto_install is set (default true). */
  background?: boolean;
};

export class BackportInstaller implements CommandHost {
  private state: ConfigState = UNCONFIGURED;
  private readonly ctx: InstallerContext;
  private readonly loop: ReconcileLoop;
  private readonly homeDir: string | undefined;
  private readonly background: boolean;
  private installQueue: Promise<unknown> = Promise.resolve();

  constructor(
    readonly name = 'backport-installer',
    opts: BackportInstallerOptions = {},
  ) {
    const logger = opts.logger ?? createConsoleLogger();
    this.ctx = {
      run: opts.run ?? createCommandRunner(),
      commands: opts.commands ?? debianCommands,
      logger,
      timing: { ...DEFAULT_SETTLE_TIMING, ...opts.timing },
      tmpRoot: opts.tmpRoot ?? os.tmpdir(),
    };
    this.loop = new ReconcileLoop(logger);
    this.homeDir = opts.homeDir;
    this.background = opts.background ?? true;
  }

  get configState(): ConfigState {
    return this.state;
  }
  get context(): InstallerContext {
    return this.ctx;
  }
  get loopState(): LoopState {
    return this.loop.state;
  }
  get loopStopReason(): StopReason | undefined {
    return this.loop.stopReason;
  }
  get loopLastError(): string | undefined {
    return this.loop.lastError;
  }

  /**
   * Apply a new raw attribute mapping. The previous generation is discarded in
   * full; a rejected mapping leaves the instance unconfigured.
   */
  async reconfigure(raw: unknown): Promise<ConfigState> {
    await this.loop.stop();
    const next = resolveConfigState(raw, { homeDir: this.homeDir });
    this.state = next;
    const { logger } = this.ctx;
    if (!next.configured) {
      logger.error(
        `${this.name}: configuration rejected: ${next.errors.join('; ')}`,
      );
      return next;
    }
    const c = next.config;
    logger.info(
      `reconfigured ${this.name} for ${c.description ?? `${c.platform} backport`}`,
    );
    logger.info(`target: ${c.targetVersion} from ${c.backportUrl}`);
    logger.info(
      `auto-install: ${String(c.autoInstall)}, force: ${String(c.forceReinstall)}`,
    );
    if (c.autoInstall && this.background) {
      await this.loop.start(
        (signal) => this.reconcileOnce(c, signal),
        c.checkIntervalSec * 1000,
      );
    }
    return next;
  }

  /** Run the install procedure after any install already in flight. */
  install(
    config: BackportConfig,
    force: boolean,
    signal?: AbortSignal,
  ): Promise<InstallResult> {
    const next = this.installQueue.then(() =>
      installBackport(this.ctx, config, { force, signal }),
    );
    this.installQueue = next.catch(() => undefined);
    return next;
  }

  doCommand(request: Record<string, unknown>): Promise<WireResult> {
    return dispatchCommand(this, request);
  }

  /** Resolves when the current loop run has stopped (converged or cancelled). */
  waitForLoop(): Promise<void> {
    return this.loop.settled();
  }

  async close(): Promise<void> {
    await this.loop.stop();
  }

  private async reconcileOnce(
    config: BackportConfig,
    signal: AbortSignal,
  ): Promise<PassOutcome> {
    const status = await inspectStatus(this.ctx, config);
    if (status.status === 'error') throw new Error(status.error);

    if (!status.isTargetActive) {
      const result = await this.install(config, config.forceReinstall, signal);
      if (result.success) return 'converged';
      throw new Error(result.error ?? result.message);
    }

    if (status.leftoversExist && config.cleanupAfterInstall) {
      const cleaned = await cleanupFiles(config);
      if (!cleaned.success) {
        this.ctx.logger.warn(`removing leftovers: ${cleaned.error}`);
      }
    }
    return 'converged';
  }
}
