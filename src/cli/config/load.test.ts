import { mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { rootDefaults } from '@/cli/cli-utils';
import { rmDirWithRetries } from '@/test';

import { loadConfigFile, loadConfigFileSync } from './load';

const YML = [
  'attributes:',
  '  backport_url: https://packages.example.test/ubuntu/jammy-nm-backports.tar',
  '  target_version: "1.42.8"',
  '  work_dir: nm-backport',
  '  platform: ubuntu-22.04',
  '  check_interval: 120',
  'cliDefaults:',
  '  debug: "1"',
  '  boring: false',
  '',
].join('\n');

describe('config file loading', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'backport-load-'));
  });
  afterEach(async () => {
    await rmDirWithRetries(dir);
  });

  it('finds and parses backport.config.yml', async () => {
    await writeFile(path.join(dir, 'backport.config.yml'), YML, 'utf8');
    const loaded = await loadConfigFile(dir);
    expect(loaded).toEqual({
      path: path.join(dir, 'backport.config.yml'),
      attributes: {
        backport_url:
          'https://packages.example.test/ubuntu/jammy-nm-backports.tar',
        target_version: '1.42.8',
        work_dir: 'nm-backport',
        platform: 'ubuntu-22.04',
        check_interval: 120,
      },
      cliDefaults: { debug: true, boring: false },
    });
    expect(loadConfigFileSync(dir)).toEqual(loaded);
  });

  it('prefers YAML over JSON in the same directory', async () => {
    await writeFile(path.join(dir, 'backport.config.yml'), YML, 'utf8');
    await writeFile(
      path.join(dir, 'backport.config.json'),
      '{"attributes":{}}',
      'utf8',
    );
    const loaded = await loadConfigFile(dir);
    expect(path.basename(loaded.path)).toBe('backport.config.yml');
  });

  it('reads an explicit JSON path relative to cwd', async () => {
    await mkdir(path.join(dir, 'conf'));
    await writeFile(
      path.join(dir, 'conf', 'site.json'),
      JSON.stringify({ attributes: { platform: 'ubuntu-22.04' } }),
      'utf8',
    );
    const loaded = await loadConfigFile(dir, 'conf/site.json');
    expect(loaded.path).toBe(path.join(dir, 'conf', 'site.json'));
    expect(loaded.attributes).toEqual({ platform: 'ubuntu-22.04' });
    expect(loaded.cliDefaults).toEqual({});
  });

  it('fails when no file is present', async () => {
    await expect(loadConfigFile(dir)).rejects.toThrow(
      'no configuration file found in',
    );
  });

  it('rejects a file whose attributes are not a mapping', async () => {
    await writeFile(
      path.join(dir, 'backport.config.yml'),
      'attributes:\n  - backport_url\n',
      'utf8',
    );
    await expect(loadConfigFile(dir)).rejects.toThrow(
      'attributes: attributes must be a mapping',
    );
  });

  it('reports syntax errors with the file path', async () => {
    await writeFile(
      path.join(dir, 'backport.config.json'),
      '{"attributes":',
      'utf8',
    );
    await expect(loadConfigFile(dir)).rejects.toThrow(
      `cannot parse ${path.join(dir, 'backport.config.json').replace(/\\/g, '/')}`,
    );
  });
});

describe('rootDefaults', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'backport-defaults-'));
  });
  afterEach(async () => {
    await rmDirWithRetries(dir);
  });

  it('reads cliDefaults from the config file', async () => {
    await writeFile(path.join(dir, 'backport.config.yml'), YML, 'utf8');
    expect(rootDefaults(dir)).toEqual({
      debugDefault: true,
      boringDefault: false,
    });
  });

  it('falls back to built-ins without a config file', () => {
    expect(rootDefaults(dir)).toEqual({
      debugDefault: false,
      boringDefault: false,
    });
  });
});
