import { randomUUID } from 'node:crypto';
import type { DeployConfig } from '../config/deploy-config.js';
import { DeployError } from '../release/deploy-error.js';
import { compactTimestamp, type ReleaseLayout } from '../release/layout.js';
import type {
  BackupMetadata,
  CommandRunner,
  DeployOutcome,
  DeployOutcomeStatus,
  DeployStage,
  HealthProbe,
  PruneReport,
  ReleaseEntry,
  RollbackReport,
} from '../types/release.js';
import { entryExists, errorMessage } from '../utils/fs-helpers.js';
import { logError, logThought, logWarning } from '../utils/logger.js';
import { defaultCommandRunner, type CommandContext } from './command-runner.js';
import { CurrentPointer } from './current-pointer.js';
import { DeployLock } from './deploy-lock.js';
import { DeploymentLedger, type DeploymentEventRow, type DeploymentRow } from './deployment-ledger.js';
import { HealthGate } from './health-gate.js';
import { MigrationRunner } from './migration-runner.js';
import { runPreflight } from './preflight.js';
import { ReleaseBuilder } from './release-builder.js';
import { ReleaseMaterializer } from './release-materializer.js';
import { ReleaseStore } from './release-store.js';
import { RetentionPruner } from './retention-pruner.js';
import { describeLiveRelease, RollbackManager } from './rollback-manager.js';
import { ServiceReloader } from './service-reloader.js';
import { SharedStateLinker } from './shared-state-linker.js';
import { assertValidRef, SourceControl } from './source-control.js';

export interface DeployPipelineOptions {
  layout: ReleaseLayout;
  config: DeployConfig;
  commandRunner?: CommandRunner;
  healthProbe?: HealthProbe;
  /** Delay between probe attempts; injectable so tests do not wait. */
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  /** Operator interrupt (SIGINT/SIGTERM). Checked between stages and passed to running commands. */
  signal?: AbortSignal;
}

export interface DeployRequest {
  ref: string;
  releaseId?: string;
}

export interface ManualRollbackResult {
  from: string;
  to: string;
  liveTarget: string;
  reloadWarnings: string[];
}

export interface StatusReport {
  mode: ReleaseLayout['mode'];
  basePath: string;
  current: string | null;
  liveTarget: string;
  locked: boolean;
  releases: ReleaseEntry[];
  lastDeployment: DeploymentRow | null;
}

export interface HistoryEntry extends DeploymentRow {
  events: DeploymentEventRow[];
}

interface Collaborators {
  ledger: DeploymentLedger;
  store: ReleaseStore;
  pointer: CurrentPointer;
  materializer: ReleaseMaterializer;
  linker: SharedStateLinker;
  builder: ReleaseBuilder;
  migrations: MigrationRunner;
  health: HealthGate;
  reloader: ServiceReloader;
  rollback: RollbackManager;
  pruner: RetentionPruner;
}

/** Mutable progress of one deployment, read by the single failure handler. */
interface DeploymentProgress {
  deploymentId: string;
  releaseId: string;
  previousId: string | null;
  stage: DeployStage;
  switched: boolean;
  commit: string | null;
  backup: BackupMetadata | null;
  warnings: string[];
  pruned: string[];
}

/**
 * What serves traffic right now, read from disk: `releases/<id>` or `none` for
 * symlinked releases; the base path (with the live release, when the ledger
 * knows it) for in-place ones.
 */
export async function describeLiveTarget(layout: ReleaseLayout, ledger?: DeploymentLedger): Promise<string> {
  try {
    if (layout.mode === 'symlink') {
      return describeLiveRelease(await new CurrentPointer(layout).read());
    }
    if (!(await entryExists(layout.basePath))) {
      return 'none';
    }
    if (ledger) {
      const live = ledger.findLive();
      return live ? `${layout.basePath} (${live.id})` : layout.basePath;
    }
    if (!(await entryExists(layout.ledgerPath))) {
      return layout.basePath;
    }
    const opened = new DeploymentLedger(layout.ledgerPath);
    try {
      const live = opened.findLive();
      return live ? `${layout.basePath} (${live.id})` : layout.basePath;
    } finally {
      opened.close();
    }
  } catch (error: unknown) {
    return `unknown (${errorMessage(error)})`;
  }
}

/**
 * Drives one deployment end to end:
 * preflight, lock, materialize, link shared state, build, migrate, self-check,
 * switch, reload, probe, then prune. Any failure after the release exists goes
 * through exactly one rollback, chosen by whether the switch has happened.
 */
export class DeployPipelineService {
  readonly #layout: ReleaseLayout;
  readonly #config: DeployConfig;
  readonly #runner: CommandRunner;
  readonly #healthProbe: HealthProbe | undefined;
  readonly #sleep: ((ms: number) => Promise<void>) | undefined;
  readonly #now: () => Date;
  readonly #signal: AbortSignal | undefined;
  readonly #lock: DeployLock;

  constructor(options: DeployPipelineOptions) {
    this.#layout = options.layout;
    this.#config = options.config;
    this.#runner = options.commandRunner ?? defaultCommandRunner;
    this.#healthProbe = options.healthProbe;
    this.#sleep = options.sleep;
    this.#now = options.now ?? (() => new Date());
    this.#signal = options.signal;
    this.#lock = new DeployLock(this.#layout.stateDir);
  }

  /**
   * Errors raised before the release exists (bad ref, preflight, lock, missing
   * shared config, id collision) are thrown: nothing has changed. Everything
   * later is reported through the returned outcome.
   */
  async deploy(request: DeployRequest): Promise<DeployOutcome> {
    assertValidRef(request.ref);
    const commands = this.#commands(true);
    await runPreflight(this.#layout, this.#config, commands);

    const releaseLock = await this.#lock.acquire();
    const parts = this.#collaborators();
    try {
      if (this.#layout.mode === 'symlink') {
        await parts.linker.assertReady();
      }
      return await this.#runDeployment(parts, request);
    } finally {
      parts.ledger.close();
      await releaseLock();
    }
  }

  /** Manual rollback: re-point `current` to the release that served before it. */
  async rollbackToPrevious(): Promise<ManualRollbackResult> {
    if (this.#layout.mode !== 'symlink') {
      throw DeployError.configInvalid('Manual rollback is only available for symlinked releases.');
    }

    const releaseLock = await this.#lock.acquire();
    const parts = this.#collaborators();
    try {
      const current = await parts.pointer.read();
      if (!current) {
        throw DeployError.configInvalid('Nothing is live; there is nothing to roll back.');
      }

      const target = await this.#previousOnDisk(parts, current);
      if (!target) {
        throw DeployError.configInvalid(`No earlier release of ${current} remains on disk.`);
      }

      const deploymentId = this.#newDeploymentId();
      parts.ledger.startDeployment({
        id: deploymentId,
        mode: 'symlink',
        revision: `rollback:${current}`,
        previousReleaseId: current,
      });

      await logThought(`[Rollback] Manual rollback from ${current} to ${target}.`);
      parts.ledger.recordEvent(deploymentId, 'switch', 'started', `${current} -> ${target}`);
      try {
        await parts.pointer.switchTo(target);
      } catch (error: unknown) {
        const failure = DeployError.from(error, 'switch');
        parts.ledger.recordEvent(deploymentId, 'switch', 'failed', failure.message);
        parts.ledger.completeDeployment(deploymentId, {
          outcome: 'rollback-failed',
          releaseId: target,
          failedStage: 'switch',
          errorCode: failure.code,
          detail: failure.message,
        });
        throw failure;
      }

      const currentRecord = parts.ledger.getRelease(current);
      if (currentRecord?.status === 'live') {
        parts.ledger.transition(current, 'retired');
      }
      const targetRecord = parts.ledger.getRelease(target);
      if (targetRecord && targetRecord.status !== 'live') {
        parts.ledger.transition(target, 'rolled-back-target');
        parts.ledger.transition(target, 'live');
      }

      const reloadWarnings = await parts.reloader.reload(parts.pointer.linkPath);
      for (const warning of reloadWarnings) {
        parts.ledger.recordEvent(deploymentId, 'reload', 'warning', warning);
      }
      parts.ledger.completeDeployment(deploymentId, { outcome: 'rolled-back', releaseId: target });
      return { from: current, to: target, liveTarget: describeLiveRelease(target), reloadWarnings };
    } finally {
      parts.ledger.close();
      await releaseLock();
    }
  }

  async prune(retention: number = this.#config.releases.retention): Promise<PruneReport> {
    if (!Number.isInteger(retention) || retention < 1) {
      throw DeployError.configInvalid(`Retention must be an integer >= 1, got ${retention}.`);
    }
    const releaseLock = await this.#lock.acquire();
    const parts = this.#collaborators();
    try {
      const current = await this.#currentId(parts);
      const previous = current ? await this.#previousOnDisk(parts, current) : null;
      return await parts.pruner.prune({ retention, current, previous });
    } finally {
      parts.ledger.close();
      await releaseLock();
    }
  }

  async status(): Promise<StatusReport> {
    const parts = this.#collaborators();
    try {
      const current = await this.#currentId(parts);
      const stored = await parts.store.list();
      const releases: ReleaseEntry[] = stored.map((entry) => ({
        id: entry.id,
        path: entry.path,
        status: parts.ledger.getRelease(entry.id)?.status ?? null,
        isCurrent: entry.id === current,
      }));
      const liveTarget = this.#layout.mode === 'symlink'
        ? describeLiveRelease(current)
        : this.#layout.basePath;
      return {
        mode: this.#layout.mode,
        basePath: this.#layout.basePath,
        current,
        liveTarget,
        locked: await this.#lock.isLocked(),
        releases,
        lastDeployment: parts.ledger.listDeployments(1)[0] ?? null,
      };
    } finally {
      parts.ledger.close();
    }
  }

  history(limit = 20): HistoryEntry[] {
    const ledger = new DeploymentLedger(this.#layout.ledgerPath, this.#now);
    try {
      return ledger.listDeployments(limit).map((row) => ({ ...row, events: ledger.listEvents(row.id) }));
    } finally {
      ledger.close();
    }
  }

  // ── Deployment ─────────────────────────────────────────────────────────────

  async #runDeployment(parts: Collaborators, request: DeployRequest): Promise<DeployOutcome> {
    const { ledger, store } = parts;
    const startedAt = this.#now().toISOString();
    const previousId = this.#layout.mode === 'symlink'
      ? await parts.pointer.capture()
      : ledger.findLive()?.id ?? null;

    const onDisk = await store.newestOnDisk();
    const recorded = ledger.newestReleaseId();
    const newest = onDisk && (!recorded || onDisk > recorded) ? onDisk : recorded;
    const releaseId = request.releaseId ?? store.generateId(newest);
    await store.assertAvailable(releaseId, (id) => ledger.getRelease(id) !== undefined, newest);

    const progress: DeploymentProgress = {
      deploymentId: this.#newDeploymentId(),
      releaseId,
      previousId,
      stage: 'materialize',
      switched: false,
      commit: null,
      backup: null,
      warnings: [],
      pruned: [],
    };

    const releasePath = this.#layout.mode === 'symlink' ? store.pathFor(releaseId) : this.#layout.basePath;
    ledger.startDeployment({
      id: progress.deploymentId,
      mode: this.#layout.mode,
      revision: request.ref,
      previousReleaseId: previousId,
      startedAt,
    });
    ledger.createRelease({ id: releaseId, mode: this.#layout.mode, path: releasePath, revision: request.ref });
    ledger.attachRelease(progress.deploymentId, releaseId);

    await logThought(
      `[Deploy] ${progress.deploymentId}: ${request.ref} as ${releaseId} (${this.#layout.mode}); live now: ${previousId ?? 'none'}.`,
    );

    try {
      if (this.#layout.mode === 'symlink') {
        await this.#deploySymlinked(parts, progress, request.ref, releasePath);
      } else {
        await this.#deployInPlace(parts, progress, request.ref);
      }
    } catch (error: unknown) {
      return this.#handleFailure(parts, progress, request.ref, startedAt, error);
    }

    const liveTarget = this.#layout.mode === 'symlink'
      ? describeLiveRelease(releaseId)
      : `${this.#layout.basePath} (${releaseId})`;
    ledger.completeDeployment(progress.deploymentId, { outcome: 'succeeded', releaseId });
    await logThought(`[Deploy] ${progress.deploymentId} succeeded; live: ${liveTarget}.`);
    return this.#outcome(progress, request.ref, startedAt, 'succeeded', liveTarget);
  }

  async #deploySymlinked(parts: Collaborators, progress: DeploymentProgress, ref: string, releasePath: string): Promise<void> {
    const { ledger } = parts;
    const id = progress.releaseId;

    await this.#stage(parts, progress, 'materialize', async () => {
      const materialized = await parts.materializer.materializeSymlinked({
        releaseId: id,
        ref,
        lastGoodId: progress.previousId,
      });
      this.#recordCommit(parts, progress, materialized.commit);
      return materialized.seededFrom ? `copied from ${materialized.seededFrom}` : 'cloned';
    });

    await this.#stage(parts, progress, 'link-shared', async () => {
      const report = await parts.linker.link(releasePath);
      return `linked ${report.linked.length}, seeded ${report.seeded.length}, unchanged ${report.unchanged.length}`;
    });

    await this.#stage(parts, progress, 'build', async () => {
      const report = await parts.builder.build(releasePath);
      ledger.transition(id, 'built');
      return `${report.commands.length} command(s) in ${report.durationMs}ms`;
    });

    await this.#migrateIfPolicy(parts, progress, 'before-switch', releasePath);

    await this.#stage(parts, progress, 'self-check', async () => {
      await parts.health.selfCheck(releasePath);
      ledger.transition(id, 'health-checked');
      return null;
    });

    await this.#stage(parts, progress, 'switch', async () => {
      progress.switched = true;
      await parts.pointer.switchTo(id);
      return `current -> releases/${id}`;
    });

    await this.#reload(parts, progress, parts.pointer.linkPath);
    await this.#migrateIfPolicy(parts, progress, 'after-switch', releasePath);
    await this.#probe(parts, progress);
    this.#promote(parts, progress);
    await this.#pruneAfterSuccess(parts, progress);
  }

  async #deployInPlace(parts: Collaborators, progress: DeploymentProgress, ref: string): Promise<void> {
    const { ledger } = parts;
    const base = this.#layout.basePath;
    const id = progress.releaseId;

    await this.#stage(parts, progress, 'materialize', async () => {
      const downWarning = await parts.reloader.maintenanceDown(base);
      if (downWarning) {
        progress.warnings.push(downWarning);
      }
      progress.backup = await parts.materializer.createBackup(id);
      const synced = await parts.materializer.syncInPlace(ref);
      this.#recordCommit(parts, progress, synced.commit);
      return `backup ${progress.backup.backupId}`;
    });

    await this.#stage(parts, progress, 'build', async () => {
      const report = await parts.builder.build(base);
      ledger.transition(id, 'built');
      return `${report.commands.length} command(s) in ${report.durationMs}ms`;
    });

    await this.#migrateIfPolicy(parts, progress, 'before-switch', base);

    await this.#stage(parts, progress, 'self-check', async () => {
      await parts.health.selfCheck(base);
      ledger.transition(id, 'health-checked');
      return null;
    });

    // The updated tree is already in place; reloading services is what exposes it.
    progress.stage = 'switch';
    this.#checkpoint('switch');
    progress.switched = true;
    await this.#reload(parts, progress, base);
    await this.#migrateIfPolicy(parts, progress, 'after-switch', base);

    const upWarning = await parts.reloader.maintenanceUp(base);
    if (upWarning) {
      progress.warnings.push(upWarning);
    }

    await this.#probe(parts, progress);
    this.#promote(parts, progress);
    await this.#pruneAfterSuccess(parts, progress);
  }

  async #stage(
    parts: Collaborators,
    progress: DeploymentProgress,
    stage: DeployStage,
    run: () => Promise<string | null>,
  ): Promise<void> {
    progress.stage = stage;
    this.#checkpoint(stage);
    parts.ledger.recordEvent(progress.deploymentId, stage, 'started');
    const detail = await run();
    parts.ledger.recordEvent(progress.deploymentId, stage, 'passed', detail);
  }

  async #migrateIfPolicy(
    parts: Collaborators,
    progress: DeploymentProgress,
    when: 'before-switch' | 'after-switch',
    releasePath: string,
  ): Promise<void> {
    if (this.#config.migrations.policy !== when) {
      if (when === 'before-switch' && this.#config.migrations.policy === 'skip') {
        parts.ledger.recordEvent(progress.deploymentId, 'migrate', 'skipped', 'policy: skip');
      }
      return;
    }
    await this.#stage(parts, progress, 'migrate', async () => {
      const result = await parts.migrations.run({ id: progress.releaseId, path: releasePath });
      if (when === 'before-switch') {
        parts.ledger.transition(progress.releaseId, 'migrated');
      }
      return result.skipped ? 'already applied' : `${when} in ${result.durationMs}ms`;
    });
  }

  async #reload(parts: Collaborators, progress: DeploymentProgress, cwd: string): Promise<void> {
    progress.stage = 'reload';
    const warnings = await parts.reloader.reload(cwd);
    for (const warning of warnings) {
      parts.ledger.recordEvent(progress.deploymentId, 'reload', 'warning', warning);
    }
    progress.warnings.push(...warnings);
  }

  async #probe(parts: Collaborators, progress: DeploymentProgress): Promise<void> {
    await this.#stage(parts, progress, 'probe', async () => {
      const report = await parts.health.assertHealthy();
      return `healthy after ${report.attempts.length} attempt(s)`;
    });
  }

  #promote(parts: Collaborators, progress: DeploymentProgress): void {
    const { ledger } = parts;
    ledger.transition(progress.releaseId, 'live');
    if (!progress.previousId) {
      return;
    }
    const previous = ledger.getRelease(progress.previousId);
    if (previous && (previous.status === 'live' || previous.status === 'rolled-back-target')) {
      ledger.transition(progress.previousId, 'retired');
    }
  }

  /** Pruning happens after the release is live; its failures never fail the deploy. */
  async #pruneAfterSuccess(parts: Collaborators, progress: DeploymentProgress): Promise<void> {
    progress.stage = 'prune';
    try {
      const report = await parts.pruner.prune({
        retention: this.#config.releases.retention,
        current: progress.releaseId,
        previous: progress.previousId,
      });
      progress.pruned = report.removed;
      for (const failed of report.failed) {
        const warning = `Could not prune ${failed.id}: ${failed.detail}`;
        progress.warnings.push(warning);
        parts.ledger.recordEvent(progress.deploymentId, 'prune', 'warning', warning);
      }
      parts.ledger.recordEvent(progress.deploymentId, 'prune', 'passed', `removed ${report.removed.length}`);
    } catch (error: unknown) {
      const warning = `Pruning failed: ${errorMessage(error)}`;
      progress.warnings.push(warning);
      parts.ledger.recordEvent(progress.deploymentId, 'prune', 'warning', warning);
      await logWarning(`[Prune] ${warning}`);
    }
  }

  async #handleFailure(
    parts: Collaborators,
    progress: DeploymentProgress,
    ref: string,
    startedAt: string,
    error: unknown,
  ): Promise<DeployOutcome> {
    const { ledger } = parts;
    const failure = this.#signal?.aborted ? DeployError.interrupted(progress.stage) : DeployError.from(error, progress.stage);
    const failedStage = failure.stage ?? progress.stage;
    await this.#bookkeep(() =>
      ledger.recordEvent(progress.deploymentId, failedStage, 'failed', `${failure.code}: ${failure.message}`),
    );
    await logError(`[Deploy] ${failedStage} failed (${failure.code}): ${failure.message}`);
    await this.#bookkeep(() =>
      ledger.recordEvent(progress.deploymentId, 'rollback', 'started', progress.switched ? 'switched' : 'not switched'),
    );

    let rollback: RollbackReport;
    try {
      rollback = this.#layout.mode === 'symlink'
        ? await parts.rollback.rollbackSymlink({
            releaseId: progress.releaseId,
            previousId: progress.previousId,
            switched: progress.switched,
          })
        : await parts.rollback.rollbackInPlace({ releaseId: progress.releaseId, backup: progress.backup });
    } catch (rollbackError: unknown) {
      const rollbackFailure = DeployError.from(rollbackError, 'rollback');
      await this.#bookkeep(() => {
        ledger.recordEvent(progress.deploymentId, 'rollback', 'failed', rollbackFailure.message);
        ledger.completeDeployment(progress.deploymentId, {
          outcome: 'rollback-failed',
          releaseId: progress.releaseId,
          failedStage,
          errorCode: failure.code,
          detail: `${failure.message} | rollback: ${rollbackFailure.message}`,
        });
      });
      await logError(`[Rollback] FAILED: ${rollbackFailure.message}. Operator intervention required.`);
      const liveTarget = await describeLiveTarget(this.#layout, ledger);
      const outcome = this.#outcome(progress, ref, startedAt, 'rollback-failed', liveTarget);
      return {
        ...outcome,
        failedStage,
        errorCode: failure.code,
        error: `${failure.message}; rollback failed: ${rollbackFailure.message}`,
      };
    }

    const status: DeployOutcomeStatus = failure.code === 'INTERRUPTED' ? 'aborted' : 'rolled-back';
    await this.#bookkeep(() => {
      ledger.recordEvent(progress.deploymentId, 'rollback', 'passed', rollback.liveTarget);
      for (const warning of rollback.reloadWarnings) {
        ledger.recordEvent(progress.deploymentId, 'rollback', 'warning', warning);
      }
      ledger.completeDeployment(progress.deploymentId, {
        outcome: status,
        releaseId: progress.releaseId,
        failedStage,
        errorCode: failure.code,
        detail: failure.message,
      });
    });
    await logThought(`[Rollback] Complete; live: ${rollback.liveTarget}.`);

    const outcome = this.#outcome(progress, ref, startedAt, status, rollback.liveTarget);
    return {
      ...outcome,
      failedStage,
      errorCode: failure.code,
      error: failure.message,
      rollback,
      warnings: [...outcome.warnings, ...rollback.reloadWarnings],
    };
  }

  /** Ledger writes on the failure path; losing one must not keep the rollback from running. */
  async #bookkeep(write: () => void): Promise<void> {
    try {
      write();
    } catch (error: unknown) {
      await logWarning(`[Deploy] Could not update the deployment ledger: ${errorMessage(error)}`);
    }
  }

  #outcome(
    progress: DeploymentProgress,
    revision: string,
    startedAt: string,
    status: DeployOutcomeStatus,
    liveTarget: string,
  ): DeployOutcome {
    return {
      status,
      deploymentId: progress.deploymentId,
      mode: this.#layout.mode,
      releaseId: progress.releaseId,
      previousReleaseId: progress.previousId,
      revision,
      commit: progress.commit,
      pruned: progress.pruned,
      warnings: [...progress.warnings],
      liveTarget,
      startedAt,
      completedAt: this.#now().toISOString(),
    };
  }

  // ── Helpers ────────────────────────────────────────────────────────────────

  #checkpoint(stage: DeployStage): void {
    if (this.#signal?.aborted) {
      throw DeployError.interrupted(stage);
    }
  }

  #recordCommit(parts: Collaborators, progress: DeploymentProgress, commit: string | null): void {
    progress.commit = commit;
    if (commit) {
      parts.ledger.setCommit(progress.releaseId, commit);
    }
  }

  async #currentId(parts: Collaborators): Promise<string | null> {
    if (this.#layout.mode === 'symlink') {
      return parts.pointer.read();
    }
    return parts.ledger.findLive()?.id ?? null;
  }

  /** The ledger's rollback target when it still exists on disk, else the next older release directory. */
  async #previousOnDisk(parts: Collaborators, current: string): Promise<string | null> {
    const recorded = parts.ledger.findRollbackTarget(current);
    if (recorded && (await parts.store.exists(recorded))) {
      return recorded;
    }
    const stored = await parts.store.list();
    return stored.find((entry) => entry.id < current && parts.ledger.getRelease(entry.id)?.status !== 'failed')?.id ?? null;
  }

  #newDeploymentId(): string {
    return `deploy-${compactTimestamp(this.#now)}-${randomUUID().slice(0, 8)}`;
  }

  #commands(withSignal: boolean): CommandContext {
    return {
      runner: this.#runner,
      timeoutMs: this.#config.commands.timeoutMs,
      signal: withSignal ? this.#signal : undefined,
    };
  }

  #collaborators(): Collaborators {
    const layout = this.#layout;
    const config = this.#config;
    const commands = this.#commands(true);
    // Rollback must still run after an interrupt has aborted the deploy signal.
    const recovery = this.#commands(false);

    const ledger = new DeploymentLedger(layout.ledgerPath, this.#now);
    const store = new ReleaseStore(layout, this.#now);
    const pointer = new CurrentPointer(layout);
    const source = new SourceControl(commands, config.source.remote);
    const reloader = new ServiceReloader(config, commands);

    return {
      ledger,
      store,
      pointer,
      materializer: new ReleaseMaterializer({ layout, config, store, source, commands, now: this.#now }),
      linker: new SharedStateLinker(layout, config),
      builder: new ReleaseBuilder(config, commands),
      migrations: new MigrationRunner(config, commands, ledger),
      health: new HealthGate({
        config,
        commands,
        probe: this.#healthProbe,
        sleep: this.#sleep,
        signal: this.#signal,
      }),
      reloader,
      rollback: new RollbackManager({
        layout,
        config,
        ledger,
        store,
        pointer,
        builder: new ReleaseBuilder(config, recovery),
        reloader: new ServiceReloader(config, recovery),
      }),
      pruner: new RetentionPruner(store, ledger),
    };
  }
}
