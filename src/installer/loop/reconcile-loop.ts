/* src/installer/loop/reconcile-loop.ts
 * Cancellable background reconciliation task (RUNNING | STOPPED).
 * - start() replaces any previous run (cancel + await, never stacked).
 * - Each iteration sleeps, then runs one pass; passes never overlap.
 * - A 'converged' pass stops the loop (self-termination); errors are
 *   recorded and retried after the next interval.
 * - stop() aborts at the next suspension point and waits for the task to end.
 */
import { DBG_SCOPE_LOOP } from '@/installer/util/debug-scopes';
import type { Logger } from '@/installer/util/log';
import { CancelledError, sleep } from '@/installer/util/sleep';

export type PassOutcome = 'converged' | 'retry';
export type LoopState = 'running' | 'stopped';
export type StopReason = 'converged' | 'cancelled';

/** One reconciliation pass; observes the signal at its own suspension points. */
export type ReconcilePass = (signal: AbortSignal) => Promise<PassOutcome>;

type Run = {
  controller: AbortController;
  task: Promise<void>;
};

export class ReconcileLoop {
  private current: Run | null = null;
  private loopState: LoopState = 'stopped';
  private reason: StopReason | undefined;
  private lastErr: string | undefined;
  private passCount = 0;
  // start/stop transitions run one at a time
  private transitions: Promise<void> = Promise.resolve();

  constructor(private readonly logger: Logger) {}

  get state(): LoopState {
    return this.loopState;
  }
  /** How the last run ended (undefined while running or before the first run). */
  get stopReason(): StopReason | undefined {
    return this.reason;
  }
  /** Message of the most recent failed pass in the current/last run. */
  get lastError(): string | undefined {
    return this.lastErr;
  }
  /** Passes started since construction. */
  get passes(): number {
    return this.passCount;
  }

  /** Cancel any running task, then start a new one. */
  start(pass: ReconcilePass, intervalMs: number): Promise<void> {
    return this.transition(async () => {
      await this.halt();
      const controller = new AbortController();
      this.loopState = 'running';
      this.reason = undefined;
      this.lastErr = undefined;
      const run: Run = {
        controller,
        task: Promise.resolve(),
      };
      run.task = this.execute(run, pass, intervalMs);
      this.current = run;
      this.logger.debug(
        DBG_SCOPE_LOOP,
        `started (interval ${String(intervalMs)}ms)`,
      );
    });
  }

  /** Cancel the running task (if any) and wait for it to acknowledge. */
  stop(): Promise<void> {
    return this.transition(() => this.halt());
  }

  /** Resolves once the current task has ended, by convergence or cancellation. */
  async settled(): Promise<void> {
    await this.transitions;
    if (this.current) await this.current.task;
  }

  private transition(fn: () => Promise<void>): Promise<void> {
    const next = this.transitions.then(fn);
    // keep the chain alive when a transition fails
    this.transitions = next.catch(() => undefined);
    return next;
  }

  private async halt(): Promise<void> {
    const run = this.current;
    if (!run) return;
    run.controller.abort();
    await run.task;
    this.current = null;
  }

  private finish(run: Run, reason: StopReason): void {
    if (this.current !== run && this.current !== null) return;
    this.loopState = 'stopped';
    this.reason = reason;
    this.logger.debug(DBG_SCOPE_LOOP, `stopped (${reason})`);
  }

  private async execute(
    run: Run,
    pass: ReconcilePass,
    intervalMs: number,
  ): Promise<void> {
    const { signal } = run.controller;
    try {
      for (;;) {
        await sleep(intervalMs, signal);
        this.passCount += 1;
        let outcome: PassOutcome;
        try {
          outcome = await pass(signal);
        } catch (e) {
          if (e instanceof CancelledError || signal.aborted) break;
          const msg = e instanceof Error ? e.message : String(e);
          this.lastErr = msg;
          this.logger.warn(
            `reconcile pass failed: ${msg}; retrying in ${String(intervalMs / 1000)}s`,
          );
          continue;
        }
        if (signal.aborted) break;
        if (outcome === 'converged') {
          this.finish(run, 'converged');
          return;
        }
        this.logger.debug(DBG_SCOPE_LOOP, 'target not reached; will retry');
      }
    } catch (e) {
      if (!(e instanceof CancelledError)) {
        this.lastErr = e instanceof Error ? e.message : String(e);
        this.logger.error(`reconcile loop aborted: ${this.lastErr}`);
      }
    }
    this.finish(run, 'cancelled');
  }
}
