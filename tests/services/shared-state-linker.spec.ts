import { afterEach, describe, expect, it } from 'vitest';
import { mkdir, mkdtemp, readFile, readlink, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { cloneDefaultConfig } from '../../src/config/deploy-config.js';
import { resolveLayout } from '../../src/release/layout.js';
import { SharedStateLinker } from '../../src/services/shared-state-linker.js';

describe('SharedStateLinker', () => {
  const workspaces: string[] = [];

  afterEach(async () => {
    await Promise.all(workspaces.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
  });

  async function setup(withEnv = true): Promise<{ base: string; release: string; linker: SharedStateLinker }> {
    const base = await mkdtemp(path.join(os.tmpdir(), 'releasectl-linker-'));
    workspaces.push(base);
    await mkdir(path.join(base, 'shared'), { recursive: true });
    if (withEnv) {
      await writeFile(path.join(base, 'shared', '.env'), 'APP_ENV=production\n', 'utf8');
    }
    const release = path.join(base, 'releases', '20250101000001');
    await mkdir(release, { recursive: true });
    return { base, release, linker: new SharedStateLinker(resolveLayout('symlink', base), cloneDefaultConfig()) };
  }

  it('rejects a host whose shared configuration file is missing', async () => {
    const { base, linker } = await setup(false);

    await expect(linker.assertReady()).rejects.toMatchObject({
      code: 'MISSING_SHARED_CONFIG',
      message: `Shared configuration is missing at ${path.join(base, 'shared', '.env')}; refusing to link a release without it.`,
    });
  });

  it('seeds shared directories by moving the release copy, then links everything', async () => {
    const { base, release, linker } = await setup();
    await mkdir(path.join(release, 'storage', 'app'), { recursive: true });
    await writeFile(path.join(release, 'storage', 'app', 'upload.txt'), 'first upload', 'utf8');
    await writeFile(path.join(release, '.env'), 'APP_ENV=local\n', 'utf8');

    const report = await linker.link(release);

    expect(report).toEqual({ linked: ['.env', 'storage'], seeded: ['storage'], unchanged: [] });
    expect(await readlink(path.join(release, '.env'))).toBe(path.join(base, 'shared', '.env'));
    expect(await readlink(path.join(release, 'storage'))).toBe(path.join(base, 'shared', 'storage'));
    expect(await readFile(path.join(base, 'shared', 'storage', 'app', 'upload.txt'), 'utf8')).toBe('first upload');
    expect(await readFile(path.join(release, '.env'), 'utf8')).toBe('APP_ENV=production\n');
  });

  it('is a no-op when run twice', async () => {
    const { release, linker } = await setup();

    await linker.link(release);
    const second = await linker.link(release);

    expect(second).toEqual({ linked: [], seeded: [], unchanged: ['.env', 'storage'] });
  });

  it('creates an empty shared directory when neither side has one', async () => {
    const { base, release, linker } = await setup();

    const report = await linker.link(release);

    expect(report.seeded).toEqual(['storage']);
    expect(await readlink(path.join(release, 'storage'))).toBe(path.join(base, 'shared', 'storage'));
  });

  it('replaces a release copy of an already seeded directory without touching shared data', async () => {
    const { base, release, linker } = await setup();
    await mkdir(path.join(base, 'shared', 'storage'), { recursive: true });
    await writeFile(path.join(base, 'shared', 'storage', 'keep.txt'), 'persistent', 'utf8');
    await mkdir(path.join(release, 'storage'), { recursive: true });
    await writeFile(path.join(release, 'storage', 'keep.txt'), 'from git', 'utf8');

    const report = await linker.link(release);

    expect(report.seeded).toEqual([]);
    expect(report.linked).toEqual(['.env', 'storage']);
    expect(await readFile(path.join(release, 'storage', 'keep.txt'), 'utf8')).toBe('persistent');
  });
});
