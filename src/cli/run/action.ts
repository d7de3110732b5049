/* src/cli/run/action.ts
 * Long-running host: one BackportInstaller configured from the config file.
 * - SIGHUP: reload the file and reconfigure (a bad file keeps the current generation).
 * - SIGINT/SIGTERM: close the component and return.
 * - stdin: newline-delimited JSON requests, answered on stdout.
 * Logs go to stderr so stdout carries only responses.
 */
import { once } from 'node:events';
import path from 'node:path';

import { loadConfigFile } from '@/cli/config/load';
import { BackportInstaller } from '@/installer/service';
import { createConsoleLogger } from '@/installer/util/log';

import { serveRequests } from './serve';

export type RunOptions = {
  cwd: string;
  config?: string;
};

/**
 * Resolve once the signal fires. Abort listeners alone do not keep the
 * process up, so a ref'd timer is held until then.
 */
export const holdUntilAbort = async (signal: AbortSignal): Promise<void> => {
  if (signal.aborted) return;
  const keepAlive = setInterval(() => undefined, 2 ** 30);
  try {
    await once(signal, 'abort');
  } finally {
    clearInterval(keepAlive);
  }
};

export const runServe = async (opts: RunOptions): Promise<void> => {
  const logger = createConsoleLogger('stderr');
  const loaded = await loadConfigFile(opts.cwd, opts.config);
  const installer = new BackportInstaller(
    path.basename(loaded.path).replace(/\.(ya?ml|json)$/, ''),
    { logger },
  );
  await installer.reconfigure(loaded.attributes);

  let reloads: Promise<void> = Promise.resolve();
  const reload = (): void => {
    reloads = reloads.then(async () => {
      logger.info(`reloading ${loaded.path}`);
      try {
        const next = await loadConfigFile(opts.cwd, opts.config);
        await installer.reconfigure(next.attributes);
      } catch (e) {
        logger.error(
          `reload failed: ${e instanceof Error ? e.message : String(e)}`,
        );
      }
    });
  };

  const ac = new AbortController();
  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info(`received ${signal}; shutting down`);
    ac.abort();
  };

  process.on('SIGHUP', reload);
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  const serving = serveRequests({
    input: process.stdin,
    write: (line) => {
      process.stdout.write(`${line}\n`);
    },
    handle: (request) => installer.doCommand(request),
    logger,
    signal: ac.signal,
  }).catch((e: unknown) => {
    logger.error(
      `request stream failed: ${e instanceof Error ? e.message : String(e)}`,
    );
  });

  try {
    await holdUntilAbort(ac.signal);
  } finally {
    process.off('SIGHUP', reload);
    process.off('SIGINT', shutdown);
    process.off('SIGTERM', shutdown);
    await reloads;
    await installer.close();
    await serving;
  }
};
