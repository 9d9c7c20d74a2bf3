import { afterEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn(async () => undefined),
  logSystemCommand: vi.fn(async () => undefined),
}));

import { cloneDefaultConfig } from '../../src/config/deploy-config.js';
import { ReleaseBuilder } from '../../src/services/release-builder.js';
import { createFakeHost, removeAll, type FakeHostOptions } from '../harness/fake-host.js';

describe('ReleaseBuilder', () => {
  const dirs: string[] = [];

  afterEach(async () => {
    await removeAll(dirs);
  });

  async function releaseDir(): Promise<string> {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'releasectl-build-'));
    dirs.push(dir);
    return dir;
  }

  function builderWith(failures: FakeHostOptions['failures'] = {}) {
    const config = cloneDefaultConfig();
    config.build.dependencies = ['composer install --no-dev'];
    config.build.finalize = ['php artisan optimize'];
    const host = createFakeHost({ revisions: {}, failures });
    return { host, builder: new ReleaseBuilder(config, { runner: host.runner, timeoutMs: 1000 }) };
  }

  it('skips the asset build when the release has no lockfile', async () => {
    const dir = await releaseDir();
    const { host, builder } = builderWith();

    const report = await builder.build(dir);

    expect(report.assetsBuilt).toBe(false);
    expect(report.commands).toEqual(['composer install --no-dev', 'php artisan optimize']);
    expect(host.calls.every((call) => call.cwd === dir)).toBe(true);
  });

  it('builds assets between dependencies and finalize when a lockfile exists', async () => {
    const dir = await releaseDir();
    await writeFile(path.join(dir, 'package-lock.json'), '{}', 'utf8');
    const { builder } = builderWith();

    const report = await builder.build(dir);

    expect(report.assetsBuilt).toBe(true);
    expect(report.commands).toEqual([
      'composer install --no-dev',
      'npm ci --silent --no-progress',
      'npm run build --silent',
      'php artisan optimize',
    ]);
  });

  it('stops at the first failing command with BUILD_FAILED', async () => {
    const dir = await releaseDir();
    await writeFile(path.join(dir, 'package-lock.json'), '{}', 'utf8');
    const { host, builder } = builderWith({ 'npm run build': {} });

    await expect(builder.build(dir)).rejects.toMatchObject({
      code: 'BUILD_FAILED',
      stage: 'build',
      message: '`npm run build --silent` failed (exit 1): npm run build failed',
    });
    expect(host.count('php artisan optimize')).toBe(0);
  });

  it('reinstalls only dependencies', async () => {
    const dir = await releaseDir();
    const { host, builder } = builderWith();

    await builder.reinstallDependencies(dir);

    expect(host.calls.map((call) => call.command)).toEqual(['composer install --no-dev']);
  });
});
