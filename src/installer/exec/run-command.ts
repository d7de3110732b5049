/* src/installer/exec/run-command.ts
 * External command execution (argv, no shell): capture exit status, stdout and stderr
 * into one completed-result value. Never rejects on nonzero exit or spawn failure.
 */
import { spawn } from 'node:child_process';

import treeKill from 'tree-kill';

import { debug } from '@/installer/util/debug';
import { DBG_SCOPE_EXEC } from '@/installer/util/debug-scopes';
import { MAX_TIMER_MS } from '@/installer/util/sleep';

export type CommandOptions = {
  /** Working directory for the child process. */
  cwd?: string;
  /** Terminate the process tree after this many milliseconds (0/absent: no limit). */
  timeoutMs?: number;
};

export type CommandResult = {
  argv: readonly string[];
  /** null when the process could not be spawned or was killed by a signal. */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  durationMs: number;
  /** Original spawn-level error (e.g. ENOENT). */
  error?: Error;
};

export type CommandRunner = (
  argv: readonly string[],
  opts?: CommandOptions,
) => Promise<CommandResult>;

/** Grace between SIGTERM and SIGKILL when a command exceeds its timeout. */
const KILL_GRACE_MS = 5000;

/** True when the command ran and exited 0. */
export const succeeded = (r: CommandResult): boolean =>
  r.exitCode === 0 && !r.timedOut && r.error === undefined;

/** Best human-readable cause for a failed command. */
export const failureText = (r: CommandResult): string => {
  const text = r.stderr.trim() || r.stdout.trim();
  if (text) return text;
  if (r.error) return r.error.message;
  return `exit code ${String(r.exitCode)}`;
};

const killTree = (pid: number | undefined, signal: NodeJS.Signals): void => {
  if (typeof pid !== 'number') return;
  try {
    treeKill(pid, signal);
  } catch {
    // process already gone
  }
};

/**
 * Create the Node.js command runner.
 *
 * @returns Runner that spawns argv[0] with the remaining arguments.
 */
export const createCommandRunner = (): CommandRunner => {
  return async (argv, opts = {}) => {
    const startedAt = Date.now();
    const [file, ...args] = argv;
    if (!file) {
      return {
        argv,
        exitCode: null,
        stdout: '',
        stderr: 'empty command',
        timedOut: false,
        durationMs: 0,
        error: new Error('empty command'),
      };
    }

    return await new Promise<CommandResult>((resolveP) => {
      const child = spawn(file, args, {
        cwd: opts.cwd,
        windowsHide: true,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let spawnError: Error | undefined;
      let settled = false;
      let killTimer: NodeJS.Timeout | undefined;

      const timeoutMs =
        typeof opts.timeoutMs === 'number' && opts.timeoutMs > 0
          ? opts.timeoutMs
          : 0;
      // longer timers would fire at once
      const timerMs = Math.min(timeoutMs, MAX_TIMER_MS);
      const timer =
        timeoutMs > 0
          ? setTimeout(() => {
              timedOut = true;
              killTree(child.pid, 'SIGTERM');
              // escalate to SIGKILL after grace
              killTimer = setTimeout(
                () => killTree(child.pid, 'SIGKILL'),
                KILL_GRACE_MS,
              );
            }, timerMs)
          : undefined;

      const finish = (exitCode: number | null): void => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        if (killTimer) clearTimeout(killTimer);
        if (timedOut) {
          stderr += `${stderr && !stderr.endsWith('\n') ? '\n' : ''}timed out after ${String(timeoutMs)}ms`;
        }
        if (spawnError && !stderr) stderr = spawnError.message;
        const result: CommandResult = {
          argv,
          exitCode: spawnError ? null : exitCode,
          stdout,
          stderr,
          timedOut,
          durationMs: Date.now() - startedAt,
          ...(spawnError ? { error: spawnError } : {}),
        };
        debug(
          DBG_SCOPE_EXEC,
          `${argv.join(' ')} -> ${String(result.exitCode)} (${String(result.durationMs)}ms)`,
        );
        resolveP(result);
      };

      child.stdout.on('data', (d: Buffer) => {
        stdout += d.toString('utf8');
      });
      child.stderr.on('data', (d: Buffer) => {
        stderr += d.toString('utf8');
      });
      child.on('error', (e) => {
        spawnError = e instanceof Error ? e : new Error(String(e));
        // 'close' does not always follow a spawn failure
        finish(null);
      });
      child.on('close', (code) => finish(code));
    });
  };
};
