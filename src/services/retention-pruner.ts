import type { PruneReport } from '../types/release.js';
import { errorMessage } from '../utils/fs-helpers.js';
import { logThought, logWarning } from '../utils/logger.js';
import type { DeploymentLedger } from './deployment-ledger.js';
import type { ReleaseStore } from './release-store.js';

export interface PruneInput {
  retention: number;
  current: string | null;
  previous: string | null;
}

/** Which ids survive: the newest `retention`, plus `current` and `previous` whatever their age. */
export function selectForRemoval(idsNewestFirst: readonly string[], input: PruneInput): { kept: string[]; removed: string[] } {
  const retention = Math.max(1, Math.floor(input.retention));
  const protectedIds = new Set([input.current, input.previous].filter((id): id is string => Boolean(id)));
  const kept: string[] = [];
  const removed: string[] = [];
  idsNewestFirst.forEach((id, index) => {
    if (index < retention || protectedIds.has(id)) {
      kept.push(id);
    } else {
      removed.push(id);
    }
  });
  return { kept, removed };
}

export class RetentionPruner {
  readonly #store: ReleaseStore;
  readonly #ledger: DeploymentLedger;

  constructor(store: ReleaseStore, ledger: DeploymentLedger) {
    this.#store = store;
    this.#ledger = ledger;
  }

  async prune(input: PruneInput): Promise<PruneReport> {
    const stored = await this.#store.list();
    const plan = selectForRemoval(
      stored.map((entry) => entry.id),
      input,
    );
    const report: PruneReport = { kept: plan.kept, removed: [], failed: [] };

    for (const id of plan.removed) {
      try {
        await this.#store.remove(id);
        report.removed.push(id);
      } catch (error: unknown) {
        const detail = errorMessage(error);
        report.failed.push({ id, detail });
        await logWarning(`[Prune] Could not delete ${id}: ${detail}`);
        continue;
      }

      const record = this.#ledger.getRelease(id);
      if (record && (record.status === 'live' || record.status === 'rolled-back-target')) {
        this.#ledger.transition(id, 'retired');
      }
    }

    if (report.removed.length > 0) {
      await logThought(`[Prune] Removed ${report.removed.join(', ')}; keeping ${report.kept.length}.`);
    }
    return report;
  }
}
