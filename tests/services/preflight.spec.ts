import { afterEach, describe, expect, it, vi } from 'vitest';
import { mkdir, mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn(async () => undefined),
  logSystemCommand: vi.fn(async () => undefined),
}));

import { cloneDefaultConfig } from '../../src/config/deploy-config.js';
import { resolveLayout } from '../../src/release/layout.js';
import { executableOf, requiredTools, runPreflight } from '../../src/services/preflight.js';
import type { CommandRunner } from '../../src/types/release.js';

function runnerMissing(...tools: string[]): CommandRunner {
  return async (command) => ({
    ok: !tools.some((tool) => command === `command -v ${tool}`),
    exitCode: tools.some((tool) => command === `command -v ${tool}`) ? 1 : 0,
    output: '',
    durationMs: 1,
  });
}

describe('preflight', () => {
  const workspaces: string[] = [];

  afterEach(async () => {
    await Promise.all(workspaces.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
  });

  async function tempDir(): Promise<string> {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'releasectl-preflight-'));
    workspaces.push(dir);
    return dir;
  }

  it('reads the executable from a command line', () => {
    expect(executableOf('php artisan migrate --force')).toBe('php');
    expect(executableOf('COMPOSER_ALLOW_SUPERUSER=1 composer install')).toBe('composer');
    expect(executableOf('   ')).toBeNull();
  });

  it('derives the tool list from the configured commands', () => {
    const config = cloneDefaultConfig();

    expect(requiredTools(config, 'symlink')).toEqual(['git', 'composer', 'npm', 'php', 'systemctl', 'supervisorctl']);

    config.migrations.policy = 'skip';
    config.migrations.command = 'artisan-migrate';
    config.backups.databaseDumpCommand = 'mysqldump app';
    expect(requiredTools(config, 'symlink')).not.toContain('artisan-migrate');
    expect(requiredTools(config, 'in-place')).toContain('mysqldump');
  });

  it('lists every missing tool at once', async () => {
    const base = await tempDir();

    await expect(
      runPreflight(resolveLayout('symlink', base), cloneDefaultConfig(), {
        runner: runnerMissing('npm', 'supervisorctl'),
        timeoutMs: 1000,
      }),
    ).rejects.toMatchObject({
      code: 'PREFLIGHT_MISSING_TOOL',
      message: 'Required tools not found on PATH: npm, supervisorctl',
    });
  });

  it('rejects a missing base path and backups inside the application', async () => {
    const root = await tempDir();
    const commands = { runner: runnerMissing(), timeoutMs: 1000 };

    await expect(
      runPreflight(resolveLayout('symlink', path.join(root, 'absent')), cloneDefaultConfig(), commands),
    ).rejects.toMatchObject({ code: 'CONFIG_INVALID' });

    const app = path.join(root, 'app');
    await mkdir(app);
    await expect(
      runPreflight(resolveLayout('in-place', app, path.join(app, 'backups')), cloneDefaultConfig(), commands),
    ).rejects.toMatchObject({ code: 'CONFIG_INVALID' });

    await expect(runPreflight(resolveLayout('in-place', app), cloneDefaultConfig(), commands)).resolves.toBeUndefined();
  });
});
