/* src/installer/exec/commands.ts
 * Argv builders for the external collaborators (fetch, archive, package manager,
 * service manager, version query). Black boxes: exit code + stdout/stderr only.
 */

/** Extension of the package files shipped in a backport archive. */
export const PACKAGE_EXTENSION = '.deb';

export type ServiceAction = 'restart' | 'is-active';

export type SystemCommands = {
  /** HTTP(S) download of `url` to `outPath`; exit 0 on success. */
  fetch: (url: string, outPath: string) => string[];
  /** List archive entries (newline-delimited on stdout) without extracting. */
  list: (archive: string) => string[];
  /** Extract the archive into the working directory. */
  extract: (archive: string) => string[];
  /** Install the given package files. */
  install: (files: readonly string[]) => string[];
  /** Repair broken dependencies after a failed install; no arguments. */
  repair: () => string[];
  /** Service control; `is-active` exits 0 when the service is running. */
  service: (action: ServiceAction, name: string) => string[];
  /** Version query for the managed service; free-form version on stdout. */
  version: (service: string) => string[];
};

/** Debian/Ubuntu defaults (curl, tar, dpkg, apt-get, systemctl). */
export const debianCommands: SystemCommands = {
  fetch: (url, outPath) => ['curl', '-fsSL', url, '-o', outPath],
  list: (archive) => ['tar', '-tf', archive],
  extract: (archive) => ['tar', '-xvf', archive],
  install: (files) => ['sudo', 'dpkg', '-i', ...files],
  repair: () => ['sudo', 'apt-get', 'install', '-f', '-y'],
  service: (action, name) =>
    action === 'restart'
      ? ['sudo', 'systemctl', 'restart', name]
      : ['systemctl', 'is-active', name],
  version: (service) => [service, '--version'],
};
