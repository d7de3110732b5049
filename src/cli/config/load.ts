/* src/cli/config/load.ts
 * Locate, parse and validate backport.config.* (or an explicit --config path).
 */
import { existsSync, readFileSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { ZodError } from 'zod';

import {
  type CliDefaults,
  configFileSchema,
} from '@/cli/config/schema';
import { parseText } from '@/common/config/parse';
import { debug } from '@/installer/util/debug';
import { DBG_SCOPE_CONFIG_LOAD } from '@/installer/util/debug-scopes';

export const CONFIG_FILE_NAMES = [
  'backport.config.yml',
  'backport.config.yaml',
  'backport.config.json',
] as const;

export type LoadedConfig = {
  /** Absolute path of the file that was read. */
  path: string;
  /** Raw attribute mapping, handed to BackportInstaller.reconfigure(). */
  attributes: Record<string, unknown>;
  cliDefaults: CliDefaults;
};

const formatZodError = (e: unknown): string =>
  e instanceof ZodError
    ? e.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('\n')
    : String(e);

const rel = (p: string): string => p.replace(/\\/g, '/');

/** First backport.config.* found in `cwd`, or null. */
export const findConfigPathSync = (cwd: string): string | null => {
  for (const name of CONFIG_FILE_NAMES) {
    const p = path.join(cwd, name);
    if (existsSync(p)) return p;
  }
  return null;
};

const resolvePath = (cwd: string, explicit?: string): string => {
  if (explicit) return path.resolve(cwd, explicit);
  const found = findConfigPathSync(cwd);
  if (!found) {
    throw new Error(
      `no configuration file found in ${rel(cwd)} (looked for ${CONFIG_FILE_NAMES.join(', ')})`,
    );
  }
  return found;
};

const parseConfigNode = (node: unknown, cfgPath: string): LoadedConfig => {
  const parsed = configFileSchema.safeParse(node ?? {});
  if (!parsed.success) {
    throw new Error(
      `invalid config in ${rel(cfgPath)}\n${formatZodError(parsed.error)}`,
    );
  }
  debug(DBG_SCOPE_CONFIG_LOAD, `loaded ${rel(cfgPath)}`);
  return {
    path: cfgPath,
    attributes: parsed.data.attributes,
    cliDefaults: parsed.data.cliDefaults ?? {},
  };
};

/**
 * Load and validate the configuration file.
 *
 * @param cwd - Directory searched for backport.config.* and base of `explicit`.
 * @param explicit - Path given with --config.
 */
export const loadConfigFile = async (
  cwd: string,
  explicit?: string,
): Promise<LoadedConfig> => {
  const cfgPath = resolvePath(cwd, explicit);
  const text = await readFile(cfgPath, 'utf8');
  return parseConfigNode(parseText(cfgPath, text), cfgPath);
};

/** Synchronous variant for CLI construction (default tagging). */
export const loadConfigFileSync = (
  cwd: string,
  explicit?: string,
): LoadedConfig => {
  const cfgPath = resolvePath(cwd, explicit);
  const text = readFileSync(cfgPath, 'utf8');
  return parseConfigNode(parseText(cfgPath, text), cfgPath);
};
