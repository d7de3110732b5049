/* src/installer/util/debug-scopes.ts
 * Centralized labels for debug() calls.
 */

/** configuration resolver (attribute normalization) */
export const DBG_SCOPE_CONFIG_RESOLVE = 'config:resolve';

/** config file loader */
export const DBG_SCOPE_CONFIG_LOAD = 'cli.config:load';

/** command runner (argv, exit code, duration) */
export const DBG_SCOPE_EXEC = 'exec:run';

/** reconcile loop lifecycle (start/stop/pass) */
export const DBG_SCOPE_LOOP = 'loop:reconcile';

/** install procedure steps */
export const DBG_SCOPE_INSTALL = 'install:step';

/** stdin request server (run command) */
export const DBG_SCOPE_SERVE = 'cli.run:serve';
