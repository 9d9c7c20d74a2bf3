import { cp, mkdir, rename, rm } from 'node:fs/promises';
import path from 'node:path';
import type { DeployConfig } from '../config/deploy-config.js';
import { DeployError } from '../release/deploy-error.js';
import type { ReleaseLayout } from '../release/layout.js';
import type { BackupMetadata, RollbackReport } from '../types/release.js';
import { entryExists, errorMessage, isErrnoException, pathExists } from '../utils/fs-helpers.js';
import { logThought, logWarning } from '../utils/logger.js';
import type { CurrentPointer } from './current-pointer.js';
import { canTransition, type DeploymentLedger } from './deployment-ledger.js';
import type { ReleaseBuilder } from './release-builder.js';
import type { ReleaseStore } from './release-store.js';
import type { ServiceReloader } from './service-reloader.js';

export interface RollbackManagerOptions {
  layout: ReleaseLayout;
  config: DeployConfig;
  ledger: DeploymentLedger;
  store: ReleaseStore;
  pointer: CurrentPointer;
  /** Must run without the deploy's abort signal so an interrupt can still be undone. */
  builder: ReleaseBuilder;
  reloader: ServiceReloader;
}

export interface SymlinkRollbackInput {
  releaseId: string;
  previousId: string | null;
  switched: boolean;
}

export interface InPlaceRollbackInput {
  releaseId: string;
  backup: BackupMetadata | null;
}

export function describeLiveRelease(releaseId: string | null): string {
  return releaseId ? `releases/${releaseId}` : 'none';
}

/**
 * Single failure handler for a deployment. Which branch runs is decided by the
 * caller's `switched` flag, never by inspecting the filesystem.
 */
export class RollbackManager {
  readonly #layout: ReleaseLayout;
  readonly #config: DeployConfig;
  readonly #ledger: DeploymentLedger;
  readonly #store: ReleaseStore;
  readonly #pointer: CurrentPointer;
  readonly #builder: ReleaseBuilder;
  readonly #reloader: ServiceReloader;

  constructor(options: RollbackManagerOptions) {
    this.#layout = options.layout;
    this.#config = options.config;
    this.#ledger = options.ledger;
    this.#store = options.store;
    this.#pointer = options.pointer;
    this.#builder = options.builder;
    this.#reloader = options.reloader;
  }

  async rollbackSymlink(input: SymlinkRollbackInput): Promise<RollbackReport> {
    const report: RollbackReport = {
      liveTarget: describeLiveRelease(input.previousId),
      restoredPointer: false,
      deletedRelease: false,
      restoredFromBackup: null,
      reinstalledDependencies: false,
      retainedDatabaseDump: null,
      reloadWarnings: [],
    };

    if (!input.switched) {
      await logThought(`[Rollback] ${input.releaseId} never went live; discarding it.`);
      try {
        await this.#store.remove(input.releaseId);
        report.deletedRelease = true;
      } catch (error: unknown) {
        await logWarning(`[Rollback] Could not delete ${input.releaseId}: ${errorMessage(error)}`);
      }
      await this.#markFailed(input.releaseId);
      return report;
    }

    await logThought(
      `[Rollback] Re-pointing current from ${input.releaseId} to ${describeLiveRelease(input.previousId)}.`,
    );
    try {
      await this.#pointer.restore(input.previousId);
    } catch (error: unknown) {
      await this.#markFailed(input.releaseId);
      throw DeployError.rollbackRestoreFailed(
        `Could not restore current to ${describeLiveRelease(input.previousId)}: ${errorMessage(error)}`,
      );
    }
    report.restoredPointer = true;

    await this.#markFailed(input.releaseId);
    if (input.previousId) {
      await this.#reinstate(input.previousId);
    }

    const cwd = input.previousId ? this.#pointer.linkPath : this.#layout.basePath;
    report.reloadWarnings = await this.#reloader.reload(cwd);
    return report;
  }

  /**
   * Swaps the backup tree back into the serving path. The updated tree is parked
   * beside it until the swap has succeeded.
   */
  async rollbackInPlace(input: InPlaceRollbackInput): Promise<RollbackReport> {
    const base = this.#layout.basePath;
    const report: RollbackReport = {
      liveTarget: `${base} (unchanged)`,
      restoredPointer: false,
      deletedRelease: false,
      restoredFromBackup: null,
      reinstalledDependencies: false,
      retainedDatabaseDump: null,
      reloadWarnings: [],
    };

    if (!input.backup) {
      await logThought(`[Rollback] No backup was taken for ${input.releaseId}; ${base} was not modified.`);
      await this.#markFailed(input.releaseId);
      const upWarning = await this.#reloader.maintenanceUp(base);
      report.reloadWarnings = upWarning ? [upWarning] : [];
      return report;
    }

    const backup = input.backup;
    const parkedPath = `${base}.failed-${input.releaseId}`;
    await logThought(`[Rollback] Restoring ${base} from backup ${backup.backupId}.`);

    try {
      await rm(parkedPath, { recursive: true, force: true });
      await rename(base, parkedPath);
    } catch (error: unknown) {
      await this.#markFailed(input.releaseId);
      throw DeployError.rollbackRestoreFailed(`Could not move ${base} aside: ${errorMessage(error)}`);
    }

    try {
      await this.#moveTree(backup.treePath, base);
    } catch (error: unknown) {
      const detail = errorMessage(error);
      if (!(await entryExists(base))) {
        await rename(parkedPath, base).catch(async (undo: unknown) => {
          await logWarning(`[Rollback] Could not put ${parkedPath} back: ${errorMessage(undo)}`);
        });
      }
      await this.#markFailed(input.releaseId);
      throw DeployError.rollbackRestoreFailed(`Restoring backup ${backup.backupId} failed: ${detail}`);
    }
    report.restoredPointer = true;
    report.restoredFromBackup = backup.backupId;
    report.liveTarget = `${base} (restored from backup ${backup.backupId})`;

    const missing: string[] = [];
    for (const artifact of this.#config.rollback.requiredArtifacts) {
      if (!(await pathExists(path.join(base, artifact)))) {
        missing.push(artifact);
      }
    }
    if (missing.length > 0) {
      await logThought(`[Rollback] Restored tree lacks ${missing.join(', ')}; reinstalling dependencies.`);
      try {
        await this.#builder.reinstallDependencies(base);
      } catch (error: unknown) {
        await this.#markFailed(input.releaseId);
        throw DeployError.rollbackRestoreFailed(
          `Backup restored but dependency reinstall failed: ${errorMessage(error)}`,
        );
      }
      report.reinstalledDependencies = true;
    }

    await this.#markFailed(input.releaseId);
    report.retainedDatabaseDump = await this.#discardBackup(backup);

    const warnings: string[] = [];
    const upWarning = await this.#reloader.maintenanceUp(base);
    if (upWarning) {
      warnings.push(upWarning);
    }
    warnings.push(...(await this.#reloader.reload(base)));
    report.reloadWarnings = warnings;

    try {
      await rm(parkedPath, { recursive: true, force: true });
      report.deletedRelease = true;
    } catch (error: unknown) {
      await logWarning(`[Rollback] Could not remove ${parkedPath}: ${errorMessage(error)}`);
    }
    return report;
  }

  /**
   * The restore consumed the backup tree, so the backup entry goes too. A
   * database dump is moved under the state directory for the operator.
   */
  async #discardBackup(backup: BackupMetadata): Promise<string | null> {
    let keptDump: string | null = null;
    try {
      if (backup.databaseDumpPath && (await pathExists(backup.databaseDumpPath))) {
        const dumpsDir = path.join(this.#layout.stateDir, 'dumps');
        keptDump = path.join(dumpsDir, `${backup.backupId}.sql`);
        await mkdir(dumpsDir, { recursive: true });
        await rename(backup.databaseDumpPath, keptDump);
        await logThought(`[Rollback] Database dump taken before ${backup.backupId} kept at ${keptDump}.`);
      }
      await this.#store.remove(backup.backupId);
    } catch (error: unknown) {
      await logWarning(`[Rollback] Could not discard backup ${backup.backupId}: ${errorMessage(error)}`);
    }
    return keptDump;
  }

  async #moveTree(source: string, destination: string): Promise<void> {
    try {
      await rename(source, destination);
    } catch (error: unknown) {
      if (!isErrnoException(error) || error.code !== 'EXDEV') {
        throw error;
      }
      await cp(source, destination, { recursive: true, verbatimSymlinks: true });
    }
  }

  async #markFailed(releaseId: string): Promise<void> {
    const record = this.#ledger.getRelease(releaseId);
    if (!record) {
      return;
    }
    if (record.status !== 'failed' && !canTransition(record.status, 'failed')) {
      await logWarning(`[Rollback] Ledger keeps ${releaseId} as '${record.status}'; it cannot be marked failed.`);
      return;
    }
    await this.#ledgerWrite(() => this.#ledger.transition(releaseId, 'failed'));
  }

  /** live | retired → rolled-back-target → live */
  async #reinstate(releaseId: string): Promise<void> {
    const record = this.#ledger.getRelease(releaseId);
    if (!record) {
      return;
    }
    if (record.status !== 'rolled-back-target') {
      if (!canTransition(record.status, 'rolled-back-target')) {
        await logWarning(`[Rollback] Ledger keeps ${releaseId} as '${record.status}'; it cannot be marked live.`);
        return;
      }
      await this.#ledgerWrite(() => this.#ledger.transition(releaseId, 'rolled-back-target'));
    }
    await this.#ledgerWrite(() => this.#ledger.transition(releaseId, 'live'));
  }

  /** The filesystem is already restored; a ledger that cannot record it only warns. */
  async #ledgerWrite(write: () => void): Promise<void> {
    try {
      write();
    } catch (error: unknown) {
      await logWarning(`[Rollback] Could not update the deployment ledger: ${errorMessage(error)}`);
    }
  }
}
