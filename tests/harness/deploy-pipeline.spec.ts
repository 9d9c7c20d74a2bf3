import { afterEach, describe, expect, it, vi } from 'vitest';
import { existsSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { mkdir, readdir, readFile, readlink, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

vi.mock('../../src/utils/logger.js', () => ({
  configureLogger: vi.fn(),
  logThought: vi.fn(async () => undefined),
  logWarning: vi.fn(async () => undefined),
  logError: vi.fn(async () => undefined),
  logSystemCommand: vi.fn(async () => undefined),
}));

import type { DeployConfig } from '../../src/config/deploy-config.js';
import { exitCodeFor } from '../../src/release/cli.js';
import { resolveLayout, type ReleaseLayout } from '../../src/release/layout.js';
import { DeployPipelineService } from '../../src/services/deploy-pipeline.js';
import { DeploymentLedger } from '../../src/services/deployment-ledger.js';
import type { CommandRunner, HealthProbe } from '../../src/types/release.js';
import {
  BAD_GATEWAY,
  createFakeHost,
  createWorkspace,
  HEALTHY,
  removeAll,
  revision,
  staticProbe,
  testConfig,
} from './fake-host.js';

const R1 = '20250101000001';
const R2 = '20250101000002';
const MAIN = revision('a1b2c3d4e5f60718', 'v1');
const NEXT = revision('b2c3d4e5f6071829', 'v2');

function createService(
  layout: ReleaseLayout,
  options: {
    runner: CommandRunner;
    probe?: HealthProbe;
    signal?: AbortSignal;
    sleep?: (ms: number) => Promise<void>;
    config?: DeployConfig;
  },
): DeployPipelineService {
  return new DeployPipelineService({
    layout,
    config: options.config ?? testConfig(),
    commandRunner: options.runner,
    healthProbe: options.probe ?? staticProbe(HEALTHY),
    sleep: options.sleep ?? (async () => undefined),
    signal: options.signal,
  });
}

function migrateAfterSwitch(): DeployConfig {
  const config = testConfig();
  config.migrations.policy = 'after-switch';
  return config;
}

function indexOfCall(calls: { command: string }[], fragment: string): number {
  return calls.findIndex((call) => call.command.includes(fragment));
}

function ledgerStatus(layout: ReleaseLayout, releaseId: string): string | undefined {
  const ledger = new DeploymentLedger(layout.ledgerPath);
  try {
    return ledger.getRelease(releaseId)?.status;
  } finally {
    ledger.close();
  }
}

describe('DeployPipelineService (symlinked releases)', () => {
  const workspaces: string[] = [];

  afterEach(async () => {
    await removeAll(workspaces);
  });

  async function setup(): Promise<{ base: string; layout: ReleaseLayout }> {
    const { root, base } = await createWorkspace('releasectl-pipeline-');
    workspaces.push(root);
    return { base, layout: resolveLayout('symlink', base) };
  }

  it('deploys the first release on a fresh host and links shared state', async () => {
    const { base, layout } = await setup();
    const host = createFakeHost({ revisions: { main: MAIN } });

    const outcome = await createService(layout, { runner: host.runner }).deploy({ ref: 'main', releaseId: R1 });

    expect(outcome.status).toBe('succeeded');
    expect(outcome.liveTarget).toBe(`releases/${R1}`);
    expect(outcome.commit).toBe('a1b2c3d4e5f60718');
    expect(outcome.previousReleaseId).toBeNull();
    expect(await readlink(path.join(base, 'current'))).toBe(path.join('releases', R1));
    expect(await readlink(path.join(base, 'releases', R1, '.env'))).toBe(path.join(base, 'shared', '.env'));
    expect(await readlink(path.join(base, 'releases', R1, 'storage'))).toBe(path.join(base, 'shared', 'storage'));
    expect(await readFile(path.join(base, 'shared', 'storage', 'app', '.gitignore'), 'utf8')).toBe('*');
    expect(host.count('git clone --no-checkout')).toBe(1);
    expect(ledgerStatus(layout, R1)).toBe('live');
    expect(exitCodeFor(outcome)).toBe(0);
  });

  it('copies the live release for the next deploy and retires the previous one', async () => {
    const { base, layout } = await setup();
    const host = createFakeHost({ revisions: { main: MAIN, next: NEXT } });
    const service = createService(layout, { runner: host.runner });

    await service.deploy({ ref: 'main', releaseId: R1 });
    const outcome = await service.deploy({ ref: 'next', releaseId: R2 });

    expect(outcome.status).toBe('succeeded');
    expect(outcome.previousReleaseId).toBe(R1);
    expect(host.count('git clone')).toBe(1);
    expect(existsSync(path.join(base, 'releases', R2, 'vendor', 'autoload.php'))).toBe(true);
    expect(await readFile(path.join(base, 'releases', R2, 'public', 'index.php'), 'utf8')).toBe("<?php echo 'v2';");
    expect(await readlink(path.join(base, 'current'))).toBe(path.join('releases', R2));
    expect(ledgerStatus(layout, R1)).toBe('retired');
    expect(ledgerStatus(layout, R2)).toBe('live');
  });

  it('keeps R1 live and leaves no partial release when the build fails', async () => {
    const { base, layout } = await setup();
    await createService(layout, { runner: createFakeHost({ revisions: { main: MAIN } }).runner })
      .deploy({ ref: 'main', releaseId: R1 });

    const failing = createFakeHost({ revisions: { next: NEXT }, failures: { 'composer install': {} } });
    const outcome = await createService(layout, { runner: failing.runner }).deploy({ ref: 'next', releaseId: R2 });

    expect(outcome.status).toBe('rolled-back');
    expect(outcome.failedStage).toBe('build');
    expect(outcome.errorCode).toBe('BUILD_FAILED');
    expect(outcome.liveTarget).toBe(`releases/${R1}`);
    expect(outcome.rollback?.deletedRelease).toBe(true);
    expect(existsSync(path.join(base, 'releases', R2))).toBe(false);
    expect(await readlink(path.join(base, 'current'))).toBe(path.join('releases', R1));
    expect(failing.count('systemctl reload')).toBe(0);
    expect(ledgerStatus(layout, R1)).toBe('live');
    expect(ledgerStatus(layout, R2)).toBe('failed');
    expect(exitCodeFor(outcome)).toBe(1);
  });

  it('restores R1 after five failed probes and keeps R2 on disk as failed', async () => {
    const { base, layout } = await setup();
    await createService(layout, { runner: createFakeHost({ revisions: { main: MAIN } }).runner })
      .deploy({ ref: 'main', releaseId: R1 });

    const host = createFakeHost({ revisions: { next: NEXT } });
    const probe = vi.fn<HealthProbe>(async () => BAD_GATEWAY);
    const sleep = vi.fn(async (_ms: number) => undefined);
    const outcome = await createService(layout, { runner: host.runner, probe, sleep })
      .deploy({ ref: 'next', releaseId: R2 });

    expect(outcome.status).toBe('rolled-back');
    expect(outcome.failedStage).toBe('probe');
    expect(outcome.errorCode).toBe('PROBE_EXHAUSTED');
    expect(outcome.error).toBe(
      'Health probe of http://app.example.test/up failed after 5 attempt(s); last failure: server-error (Health endpoint returned HTTP 502.)',
    );
    expect(probe).toHaveBeenCalledTimes(5);
    expect(sleep).toHaveBeenCalledTimes(4);
    expect(sleep.mock.calls.every(([ms]) => ms === 3000)).toBe(true);
    expect(await readlink(path.join(base, 'current'))).toBe(path.join('releases', R1));
    expect(existsSync(path.join(base, 'releases', R2))).toBe(true);
    expect(host.count('systemctl reload nginx')).toBe(2);
    expect(ledgerStatus(layout, R1)).toBe('live');
    expect(ledgerStatus(layout, R2)).toBe('failed');
  });

  it('removes current again when the very first release fails after the switch', async () => {
    const { base, layout } = await setup();
    const host = createFakeHost({ revisions: { main: MAIN } });

    const outcome = await createService(layout, { runner: host.runner, probe: staticProbe(BAD_GATEWAY) })
      .deploy({ ref: 'main', releaseId: R1 });

    expect(outcome.status).toBe('rolled-back');
    expect(outcome.liveTarget).toBe('none');
    expect(outcome.rollback?.restoredPointer).toBe(true);
    expect(existsSync(path.join(base, 'current'))).toBe(false);
    expect(existsSync(path.join(base, 'releases', R1))).toBe(true);
    expect(ledgerStatus(layout, R1)).toBe('failed');
  });

  it('leaves five releases after seven deploys with retention 5', async () => {
    const { base, layout } = await setup();
    const service = createService(layout, { runner: createFakeHost({ revisions: { main: MAIN } }).runner });

    let lastPruned: string[] = [];
    for (let index = 1; index <= 7; index += 1) {
      const outcome = await service.deploy({ ref: 'main', releaseId: `2025010100000${index}` });
      expect(outcome.status).toBe('succeeded');
      lastPruned = outcome.pruned;
    }

    const remaining = (await readdir(path.join(base, 'releases'))).sort();
    expect(remaining).toEqual([
      '20250101000003',
      '20250101000004',
      '20250101000005',
      '20250101000006',
      '20250101000007',
    ]);
    expect(lastPruned).toEqual(['20250101000002']);
    expect(await readlink(path.join(base, 'current'))).toBe(path.join('releases', '20250101000007'));
  });

  it('treats an operator interrupt before the switch like a pre-switch failure', async () => {
    const { base, layout } = await setup();
    await createService(layout, { runner: createFakeHost({ revisions: { main: MAIN } }).runner })
      .deploy({ ref: 'main', releaseId: R1 });

    const controller = new AbortController();
    const host = createFakeHost({
      revisions: { next: NEXT },
      hooks: { 'composer install': () => controller.abort() },
    });
    const outcome = await createService(layout, { runner: host.runner, signal: controller.signal })
      .deploy({ ref: 'next', releaseId: R2 });

    expect(outcome.status).toBe('aborted');
    expect(outcome.errorCode).toBe('INTERRUPTED');
    expect(outcome.failedStage).toBe('migrate');
    expect(existsSync(path.join(base, 'releases', R2))).toBe(false);
    expect(await readlink(path.join(base, 'current'))).toBe(path.join('releases', R1));
    expect(host.count('php artisan migrate')).toBe(0);
  });

  it('rejects a release id that already exists without touching the live release', async () => {
    const { base, layout } = await setup();
    const service = createService(layout, { runner: createFakeHost({ revisions: { main: MAIN } }).runner });
    await service.deploy({ ref: 'main', releaseId: R1 });

    await expect(service.deploy({ ref: 'main', releaseId: R1 })).rejects.toMatchObject({ code: 'RELEASE_EXISTS' });
    expect(await readlink(path.join(base, 'current'))).toBe(path.join('releases', R1));

    const next = await service.deploy({ ref: 'main', releaseId: R2 });
    expect(next.status).toBe('succeeded');
  });

  it('refuses to deploy without the shared configuration file', async () => {
    const { base, layout } = await setup();
    await rm(path.join(base, 'shared', '.env'));
    const service = createService(layout, { runner: createFakeHost({ revisions: { main: MAIN } }).runner });

    await expect(service.deploy({ ref: 'main', releaseId: R1 })).rejects.toMatchObject({
      code: 'MISSING_SHARED_CONFIG',
    });
    expect(existsSync(path.join(base, 'releases'))).toBe(false);
  });

  it('rejects malformed refs before anything is written', async () => {
    const { base, layout } = await setup();
    const host = createFakeHost({ revisions: { main: MAIN } });

    await expect(createService(layout, { runner: host.runner }).deploy({ ref: 'main..evil' })).rejects.toMatchObject({
      code: 'INVALID_REF',
    });
    expect(host.calls).toHaveLength(0);
    expect(existsSync(path.join(base, '.releasectl'))).toBe(false);
  });

  it('rolls back manually to the release that served before current', async () => {
    const { base, layout } = await setup();
    const service = createService(layout, { runner: createFakeHost({ revisions: { main: MAIN, next: NEXT } }).runner });
    await service.deploy({ ref: 'main', releaseId: R1 });
    await service.deploy({ ref: 'next', releaseId: R2 });

    const result = await service.rollbackToPrevious();

    expect(result).toMatchObject({ from: R2, to: R1, liveTarget: `releases/${R1}` });
    expect(await readlink(path.join(base, 'current'))).toBe(path.join('releases', R1));
    expect(ledgerStatus(layout, R1)).toBe('live');
    expect(ledgerStatus(layout, R2)).toBe('retired');
  });

  it('runs after-switch migrations once services have reloaded onto the new release', async () => {
    const { base, layout } = await setup();
    const host = createFakeHost({ revisions: { main: MAIN } });

    const outcome = await createService(layout, { runner: host.runner, config: migrateAfterSwitch() })
      .deploy({ ref: 'main', releaseId: R1 });

    expect(outcome.status).toBe('succeeded');
    expect(host.count('php artisan migrate')).toBe(1);
    expect(indexOfCall(host.calls, 'php artisan migrate')).toBeGreaterThan(indexOfCall(host.calls, 'supervisorctl restart'));
    expect(indexOfCall(host.calls, 'systemctl reload nginx')).toBeGreaterThan(indexOfCall(host.calls, 'php artisan about'));
    expect(host.calls.find((call) => call.command.includes('php artisan migrate'))?.cwd).toBe(path.join(base, 'releases', R1));
  });

  it('discards the release when a migration fails before the switch', async () => {
    const { base, layout } = await setup();
    await createService(layout, { runner: createFakeHost({ revisions: { main: MAIN } }).runner })
      .deploy({ ref: 'main', releaseId: R1 });

    const host = createFakeHost({ revisions: { next: NEXT }, failures: { 'php artisan migrate': { output: 'SQLSTATE[42S01]' } } });
    const outcome = await createService(layout, { runner: host.runner }).deploy({ ref: 'next', releaseId: R2 });

    expect(outcome.status).toBe('rolled-back');
    expect(outcome.failedStage).toBe('migrate');
    expect(outcome.errorCode).toBe('MIGRATION_FAILED');
    expect(outcome.rollback?.restoredPointer).toBe(false);
    expect(existsSync(path.join(base, 'releases', R2))).toBe(false);
    expect(await readlink(path.join(base, 'current'))).toBe(path.join('releases', R1));
    expect(host.count('php artisan about')).toBe(0);
    expect(host.count('systemctl reload')).toBe(0);
    expect(ledgerStatus(layout, R2)).toBe('failed');
  });

  it('restores the previous pointer when a migration fails after the switch', async () => {
    const { base, layout } = await setup();
    await createService(layout, { runner: createFakeHost({ revisions: { main: MAIN } }).runner, config: migrateAfterSwitch() })
      .deploy({ ref: 'main', releaseId: R1 });

    const host = createFakeHost({ revisions: { next: NEXT }, failures: { 'php artisan migrate': {} } });
    const probe = vi.fn<HealthProbe>(async () => HEALTHY);
    const outcome = await createService(layout, { runner: host.runner, probe, config: migrateAfterSwitch() })
      .deploy({ ref: 'next', releaseId: R2 });

    expect(outcome.status).toBe('rolled-back');
    expect(outcome.failedStage).toBe('migrate');
    expect(outcome.liveTarget).toBe(`releases/${R1}`);
    expect(outcome.rollback?.restoredPointer).toBe(true);
    expect(await readlink(path.join(base, 'current'))).toBe(path.join('releases', R1));
    expect(existsSync(path.join(base, 'releases', R2))).toBe(true);
    expect(probe).not.toHaveBeenCalled();
    expect(host.count('systemctl reload nginx')).toBe(2);
    expect(ledgerStatus(layout, R1)).toBe('live');
    expect(ledgerStatus(layout, R2)).toBe('failed');
  });

  it('restores the previous pointer when the operator interrupts after the switch', async () => {
    const { base, layout } = await setup();
    await createService(layout, { runner: createFakeHost({ revisions: { main: MAIN } }).runner })
      .deploy({ ref: 'main', releaseId: R1 });

    const controller = new AbortController();
    const host = createFakeHost({
      revisions: { next: NEXT },
      hooks: { 'systemctl reload nginx': () => controller.abort() },
    });
    const probe = vi.fn<HealthProbe>(async () => HEALTHY);
    const outcome = await createService(layout, { runner: host.runner, probe, signal: controller.signal })
      .deploy({ ref: 'next', releaseId: R2 });

    expect(outcome.status).toBe('aborted');
    expect(outcome.errorCode).toBe('INTERRUPTED');
    expect(outcome.failedStage).toBe('probe');
    expect(outcome.rollback?.restoredPointer).toBe(true);
    expect(probe).not.toHaveBeenCalled();
    expect(await readlink(path.join(base, 'current'))).toBe(path.join('releases', R1));
    expect(host.count('systemctl reload nginx')).toBe(2);
    expect(ledgerStatus(layout, R1)).toBe('live');
    expect(exitCodeFor(outcome)).toBe(1);
  });

  it('reports the pointer as it stands when the rollback cannot restore it', async () => {
    const { base, layout } = await setup();
    await createService(layout, { runner: createFakeHost({ revisions: { main: MAIN } }).runner })
      .deploy({ ref: 'main', releaseId: R1 });

    const host = createFakeHost({
      revisions: { next: NEXT },
      hooks: { 'systemctl reload nginx': () => rmSync(path.join(base, 'releases', R1), { recursive: true, force: true }) },
    });
    const outcome = await createService(layout, { runner: host.runner, probe: staticProbe(BAD_GATEWAY) })
      .deploy({ ref: 'next', releaseId: R2 });

    expect(outcome.status).toBe('rollback-failed');
    expect(outcome.liveTarget).toBe(`releases/${R2}`);
    expect(await readlink(path.join(base, 'current'))).toBe(path.join('releases', R2));
    expect(exitCodeFor(outcome)).toBe(2);
  });

  it('rejects a release id that does not sort after the newest release', async () => {
    const { base, layout } = await setup();
    const host = createFakeHost({ revisions: { main: MAIN } });
    const service = createService(layout, { runner: host.runner });
    await service.deploy({ ref: 'main', releaseId: R2 });

    await expect(service.deploy({ ref: 'main', releaseId: R1 })).rejects.toMatchObject({
      code: 'CONFIG_INVALID',
      message: `Release id '${R1}' must sort after the newest release '${R2}'.`,
    });
    expect(host.count('git fetch')).toBe(1);
    expect(existsSync(path.join(base, 'releases', R1))).toBe(false);
    expect(await readlink(path.join(base, 'current'))).toBe(path.join('releases', R2));
  });

  it('orders a failed release that left nothing on disk through the ledger', async () => {
    const { layout } = await setup();
    const failing = createFakeHost({ revisions: { main: MAIN }, failures: { 'composer install': {} } });
    await createService(layout, { runner: failing.runner }).deploy({ ref: 'main', releaseId: R2 });

    const service = createService(layout, { runner: createFakeHost({ revisions: { main: MAIN } }).runner });
    await expect(service.deploy({ ref: 'main', releaseId: R1 })).rejects.toMatchObject({ code: 'CONFIG_INVALID' });
    expect((await service.deploy({ ref: 'main', releaseId: '20250101000003' })).status).toBe('succeeded');
  });

  it('reports status and history from the ledger', async () => {
    const { layout } = await setup();
    const service = createService(layout, { runner: createFakeHost({ revisions: { main: MAIN } }).runner });
    const outcome = await service.deploy({ ref: 'main', releaseId: R1 });

    const status = await service.status();
    expect(status.current).toBe(R1);
    expect(status.locked).toBe(false);
    expect(status.releases).toEqual([
      { id: R1, path: path.join(layout.collectionDir, R1), status: 'live', isCurrent: true },
    ]);

    const history = service.history(5);
    expect(history).toHaveLength(1);
    expect(history[0]?.id).toBe(outcome.deploymentId);
    expect(history[0]?.outcome).toBe('succeeded');
    expect(history[0]?.events.map((event) => `${event.stage}:${event.status}`)).toContain('probe:passed');
  });
});

describe('DeployPipelineService (in-place)', () => {
  const workspaces: string[] = [];

  afterEach(async () => {
    await removeAll(workspaces);
  });

  async function setup(): Promise<{ base: string; root: string; layout: ReleaseLayout }> {
    const { root, base } = await createWorkspace('releasectl-inplace-');
    workspaces.push(root);
    await mkdir(path.join(base, 'public'), { recursive: true });
    await writeFile(path.join(base, 'public', 'index.php'), 'old', 'utf8');
    return { root, base, layout: resolveLayout('in-place', base) };
  }

  it('backs up the serving tree and updates it in place', async () => {
    const { root, base, layout } = await setup();
    const host = createFakeHost({ revisions: { main: MAIN } });

    const outcome = await createService(layout, { runner: host.runner }).deploy({ ref: 'main', releaseId: R1 });

    expect(outcome.status).toBe('succeeded');
    expect(outcome.liveTarget).toBe(`${base} (${R1})`);
    expect(await readFile(path.join(base, 'public', 'index.php'), 'utf8')).toBe("<?php echo 'v1';");
    expect(await readFile(path.join(root, 'backups', R1, 'tree', 'public', 'index.php'), 'utf8')).toBe('old');
    expect(existsSync(path.join(root, 'backups', R1, 'metadata.json'))).toBe(true);
    expect(host.count('php artisan down')).toBe(1);
    expect(host.count('php artisan up')).toBe(1);
  });

  it('restores the backup and reinstalls missing dependencies when the probe fails', async () => {
    const { base, layout } = await setup();
    const host = createFakeHost({ revisions: { main: MAIN } });

    const outcome = await createService(layout, { runner: host.runner, probe: staticProbe(BAD_GATEWAY) })
      .deploy({ ref: 'main', releaseId: R1 });

    expect(outcome.status).toBe('rolled-back');
    expect(outcome.failedStage).toBe('probe');
    expect(outcome.liveTarget).toBe(`${base} (restored from backup ${R1})`);
    expect(outcome.rollback?.restoredFromBackup).toBe(R1);
    expect(outcome.rollback?.reinstalledDependencies).toBe(true);
    expect(await readFile(path.join(base, 'public', 'index.php'), 'utf8')).toBe('old');
    expect(existsSync(path.join(base, 'vendor', 'autoload.php'))).toBe(true);
    expect(existsSync(`${base}.failed-${R1}`)).toBe(false);
    expect(host.count('php artisan up')).toBe(2);
    expect(ledgerStatus(layout, R1)).toBe('failed');
  });

  it('restores the backup and discards it when the build fails before services reload', async () => {
    const { root, base, layout } = await setup();
    await createService(layout, { runner: createFakeHost({ revisions: { main: MAIN } }).runner })
      .deploy({ ref: 'main', releaseId: R1 });

    const host = createFakeHost({ revisions: { next: NEXT }, failures: { 'php artisan optimize:clear': {} } });
    const outcome = await createService(layout, { runner: host.runner }).deploy({ ref: 'next', releaseId: R2 });

    expect(outcome.status).toBe('rolled-back');
    expect(outcome.failedStage).toBe('build');
    expect(outcome.liveTarget).toBe(`${base} (restored from backup ${R2})`);
    expect(outcome.rollback?.restoredFromBackup).toBe(R2);
    expect(outcome.rollback?.retainedDatabaseDump).toBeNull();
    expect(await readFile(path.join(base, 'public', 'index.php'), 'utf8')).toBe("<?php echo 'v1';");
    expect((await readdir(path.join(root, 'backups'))).sort()).toEqual(['.releasectl', R1]);
    expect(existsSync(`${base}.failed-${R2}`)).toBe(false);
    expect(host.count('systemctl reload')).toBe(2);
    expect(host.count('php artisan migrate')).toBe(0);
    expect(ledgerStatus(layout, R1)).toBe('live');
    expect(ledgerStatus(layout, R2)).toBe('failed');
  });

  it('keeps the database dump of a consumed backup under the state directory', async () => {
    const { root, base, layout } = await setup();
    const config = testConfig();
    config.backups.databaseDumpCommand = 'mysqldump app';
    const dumpPath = path.join(root, 'backups', R1, 'database.sql');
    const host = createFakeHost({
      revisions: { main: MAIN },
      failures: { 'php artisan optimize:clear': {} },
      hooks: { mysqldump: () => writeFileSync(dumpPath, '-- dump', 'utf8') },
    });

    const outcome = await createService(layout, { runner: host.runner, config }).deploy({ ref: 'main', releaseId: R1 });

    const keptDump = path.join(root, 'backups', '.releasectl', 'dumps', `${R1}.sql`);
    expect(outcome.status).toBe('rolled-back');
    expect(outcome.rollback?.retainedDatabaseDump).toBe(keptDump);
    expect(await readFile(keptDump, 'utf8')).toBe('-- dump');
    expect(existsSync(path.join(root, 'backups', R1))).toBe(false);
    expect(await readFile(path.join(base, 'public', 'index.php'), 'utf8')).toBe('old');
  });

  it('generates an id after the newest recorded release when the clock has not moved', async () => {
    const { root, layout } = await setup();
    mkdirSync(path.join(root, 'backups', '29991231235959'), { recursive: true });

    const outcome = await createService(layout, { runner: createFakeHost({ revisions: { main: MAIN } }).runner })
      .deploy({ ref: 'main' });

    expect(outcome.releaseId).toBe('29991231235959-1');
    expect(existsSync(path.join(root, 'backups', '29991231235959-1', 'metadata.json'))).toBe(true);
  });
});
