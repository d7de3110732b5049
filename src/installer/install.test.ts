import { createHash } from 'node:crypto';
import { mkdtemp } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { pathExists } from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  type CapturingLogger,
  configFor,
  contextFor,
  createCapturingLogger,
  DEFAULT_PACKAGES,
  FakeSystem,
  rmDirWithRetries,
} from '@/test';

import { installBackport } from './install';

const URL_ =
  'https://packages.example.test/ubuntu/jammy-nm-backports.tar';
const INSTALLED = '1.42.8-1ubuntu1';

describe('installBackport', () => {
  let dir: string;
  let logger: CapturingLogger;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'backport-install-'));
    logger = createCapturingLogger();
  });
  afterEach(async () => {
    await rmDirWithRetries(dir);
  });

  const setup = (
    sys: FakeSystem,
    extra: Record<string, unknown> = {},
  ) => ({
    ctx: contextFor(sys, dir, logger),
    config: configFor(dir, extra),
  });

  it('skips without side effects when the target is already active', async () => {
    const sys = new FakeSystem({ version: '1.42.8' });
    const { ctx, config } = setup(sys);
    const r = await installBackport(ctx, config, { force: false });
    expect(r).toEqual({
      success: true,
      action: 'skipped',
      message: 'Backport already installed',
      version: '1.42.8',
      isTargetActive: true,
      warnings: [],
      errors: [],
    });
    expect(sys.verbs()).toEqual(['version']);
    expect(await pathExists(config.backupDir)).toBe(false);
  });

  it('reinstalls an active target when forced', async () => {
    const sys = new FakeSystem({ version: '1.42.8' });
    const { ctx, config } = setup(sys);
    const r = await installBackport(ctx, config, { force: true });
    expect(r.action).toBe('installed');
    expect(sys.verbs()).toContain('fetch');
  });

  it('runs the full procedure and cleans up', async () => {
    const sys = new FakeSystem({ installedVersion: INSTALLED });
    const { ctx, config } = setup(sys);
    const r = await installBackport(ctx, config, { force: false });

    expect(r).toEqual({
      success: true,
      action: 'installed',
      message: 'Backport installed successfully',
      version: INSTALLED,
      isTargetActive: true,
      serviceActive: true,
      warnings: [],
      errors: [],
    });
    expect(sys.verbs()).toEqual([
      'version',
      'fetch',
      'extract',
      'install',
      'restart',
      'is-active',
      'restart',
      'version',
    ]);
    const archive = path.join(config.backupDir, 'jammy-nm-backports.tar');
    expect(sys.calls[1]?.argv).toEqual(['curl', '-fsSL', URL_, '-o', archive]);
    expect(sys.calls[2]?.argv).toEqual([
      'tar',
      '-xvf',
      'jammy-nm-backports.tar',
    ]);
    expect(sys.calls[2]?.cwd).toBe(config.backupDir);
    expect(sys.calls[3]?.argv).toEqual([
      'sudo',
      'dpkg',
      '-i',
      ...DEFAULT_PACKAGES.map((p) => path.join(config.backupDir, p)),
    ]);
    expect(sys.calls[4]?.argv).toEqual([
      'sudo',
      'systemctl',
      'restart',
      'NetworkManager',
    ]);
    expect(sys.calls[6]?.argv).toEqual([
      'sudo',
      'systemctl',
      'restart',
      'viam-agent',
    ]);
    expect(sys.calls.every((c) => c.timeoutMs === 600_000)).toBe(true);
    expect(await pathExists(config.backupDir)).toBe(false);
  });

  it('keeps the work directory when cleanup is disabled', async () => {
    const sys = new FakeSystem({ installedVersion: INSTALLED });
    const { ctx, config } = setup(sys, { cleanup_after_install: false });
    await installBackport(ctx, config, { force: false });
    expect(
      await pathExists(path.join(config.backupDir, DEFAULT_PACKAGES[0] ?? '')),
    ).toBe(true);
  });

  it('fails on a download error', async () => {
    const sys = new FakeSystem({
      replies: {
        fetch: [
          {
            exitCode: 22,
            stderr: 'curl: (22) The requested URL returned error: 404\n',
          },
        ],
      },
    });
    const { ctx, config } = setup(sys);
    const r = await installBackport(ctx, config, { force: false });
    expect(r).toEqual({
      success: false,
      action: 'failed',
      message: 'Backport installation failed',
      error:
        'Failed to download backport: curl: (22) The requested URL returned error: 404',
      warnings: [],
      errors: [],
    });
    expect(sys.verbs()).toEqual(['version', 'fetch']);
    expect(logger.messages('error')).toEqual([
      'installing backport: Failed to download backport: curl: (22) The requested URL returned error: 404',
    ]);
  });

  it('fails on an extraction error', async () => {
    const sys = new FakeSystem({
      replies: {
        extract: [{ exitCode: 2, stderr: 'tar: Unexpected EOF in archive' }],
      },
    });
    const { ctx, config } = setup(sys);
    const r = await installBackport(ctx, config, { force: false });
    expect(r.error).toBe(
      'Failed to extract archive: tar: Unexpected EOF in archive',
    );
    expect(sys.verbs()).toEqual(['version', 'fetch', 'extract']);
  });

  it('fails when the archive holds no package files', async () => {
    const sys = new FakeSystem({ packages: [], extraEntries: ['README'] });
    const { ctx, config } = setup(sys);
    const r = await installBackport(ctx, config, { force: false });
    expect(r.success).toBe(false);
    expect(r.error).toBe('No .deb files found in extracted archive');
    expect(sys.verbs()).not.toContain('install');
  });

  it('recovers through the dependency repair', async () => {
    const sys = new FakeSystem({
      installedVersion: INSTALLED,
      replies: {
        install: [{ exitCode: 1, stderr: 'dpkg: dependency problems' }],
      },
    });
    const { ctx, config } = setup(sys);
    const r = await installBackport(ctx, config, { force: false });
    expect(r.success).toBe(true);
    expect(r.action).toBe('installed');
    expect(sys.verbs().slice(0, 5)).toEqual([
      'version',
      'fetch',
      'extract',
      'install',
      'repair',
    ]);
    expect(sys.calls[4]?.argv).toEqual([
      'sudo',
      'apt-get',
      'install',
      '-f',
      '-y',
    ]);
    expect(logger.messages('warn')).toEqual([
      'package install failed, attempting to fix dependencies',
    ]);
  });

  it('reports the original install error when the repair fails', async () => {
    const sys = new FakeSystem({
      replies: {
        install: [
          {
            exitCode: 1,
            stderr: 'dpkg: dependency problems prevent configuration',
          },
        ],
        repair: [{ exitCode: 100, stderr: 'E: Unmet dependencies' }],
      },
    });
    const { ctx, config } = setup(sys);
    const r = await installBackport(ctx, config, { force: false });
    expect(r.success).toBe(false);
    expect(r.error).toBe(
      'Failed to install packages: dpkg: dependency problems prevent configuration',
    );
    expect(sys.verbs()).not.toContain('restart');
  });

  it('treats a failed service restart as a warning', async () => {
    const sys = new FakeSystem({
      installedVersion: INSTALLED,
      replies: {
        restart: [
          {
            exitCode: 1,
            stderr: 'Failed to restart NetworkManager.service: Access denied',
          },
        ],
      },
    });
    const { ctx, config } = setup(sys);
    const r = await installBackport(ctx, config, { force: false });
    expect(r.success).toBe(true);
    expect(r.serviceActive).toBeUndefined();
    expect(r.warnings).toEqual([
      'Failed to restart NetworkManager: Failed to restart NetworkManager.service: Access denied',
    ]);
    expect(sys.verbs()).toEqual([
      'version',
      'fetch',
      'extract',
      'install',
      'restart',
      'version',
    ]);
  });

  it('records an inactive service and skips the dependent restart', async () => {
    const sys = new FakeSystem({
      installedVersion: INSTALLED,
      replies: { 'is-active': [{ exitCode: 3, stdout: 'inactive' }] },
    });
    const { ctx, config } = setup(sys);
    const r = await installBackport(ctx, config, { force: false });
    expect(r.success).toBe(true);
    expect(r.serviceActive).toBe(false);
    expect(r.errors).toEqual([
      'NetworkManager did not become active after restart',
    ]);
    expect(sys.verbs().filter((v) => v === 'restart')).toHaveLength(1);
  });

  it('treats a failed dependent restart as a warning', async () => {
    const sys = new FakeSystem({
      installedVersion: INSTALLED,
      replies: {
        restart: [{}, { exitCode: 5, stderr: 'Unit viam-agent.service not found.' }],
      },
    });
    const { ctx, config } = setup(sys);
    const r = await installBackport(ctx, config, { force: false });
    expect(r.success).toBe(true);
    expect(r.serviceActive).toBe(true);
    expect(r.warnings).toEqual([
      'Failed to restart viam-agent: Unit viam-agent.service not found.',
    ]);
  });

  it('leaves the dependent service alone when disabled', async () => {
    const sys = new FakeSystem({ installedVersion: INSTALLED });
    const { ctx, config } = setup(sys, { restart_dependent_service: false });
    await installBackport(ctx, config, { force: false });
    expect(sys.verbs()).toEqual([
      'version',
      'fetch',
      'extract',
      'install',
      'restart',
      'is-active',
      'version',
    ]);
  });

  it('verifies the archive checksum when enabled', async () => {
    const sys = new FakeSystem({ installedVersion: INSTALLED });
    const digest = createHash('sha256').update(sys.archiveBody).digest('hex');
    const { ctx, config } = setup(sys, {
      verify_checksum: true,
      expected_checksum: digest,
    });
    const r = await installBackport(ctx, config, { force: false });
    expect(r.success).toBe(true);
  });

  it('fails on a checksum mismatch', async () => {
    const sys = new FakeSystem();
    const { ctx, config } = setup(sys, {
      verify_checksum: true,
      expected_checksum: '0'.repeat(64),
    });
    const r = await installBackport(ctx, config, { force: false });
    expect(r.error).toBe('Archive checksum verification failed');
    expect(sys.verbs()).toEqual(['version', 'fetch']);
  });

  it('reports completion even when the target is still not reported', async () => {
    const sys = new FakeSystem();
    const { ctx, config } = setup(sys);
    const r = await installBackport(ctx, config, { force: false });
    expect(r.success).toBe(true);
    expect(r.version).toBe('1.36.6');
    expect(r.isTargetActive).toBe(false);
  });

  it('returns a cancelled result when the signal has fired', async () => {
    const sys = new FakeSystem();
    const { ctx, config } = setup(sys);
    const ac = new AbortController();
    ac.abort();
    const r = await installBackport(ctx, config, {
      force: false,
      signal: ac.signal,
    });
    expect(r.success).toBe(false);
    expect(r.error).toBe('installation cancelled');
    expect(sys.verbs()).toEqual(['version']);
  });
});
