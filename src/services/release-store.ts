import { mkdir, readdir, rm } from 'node:fs/promises';
import { compactTimestamp, releasePath, RELEASE_ID_PATTERN, type ReleaseLayout } from '../release/layout.js';
import { DeployError } from '../release/deploy-error.js';
import { entryExists } from '../utils/fs-helpers.js';

export interface StoredRelease {
  id: string;
  path: string;
}

/**
 * The releases collection on disk: one directory per release id
 * (or per backup snapshot in in-place mode).
 */
export class ReleaseStore {
  readonly #layout: ReleaseLayout;
  readonly #now: () => Date;

  constructor(layout: ReleaseLayout, now: () => Date = () => new Date()) {
    this.#layout = layout;
    this.#now = now;
  }

  /**
   * A `YYYYMMDDHHMMSS` id, or `<newest>-<n>` when the clock has not moved past
   * the newest id (two deployments in one second, a clock step backwards).
   */
  generateId(newest: string | null = null): string {
    const timestamp = compactTimestamp(this.#now);
    if (!newest || timestamp > newest) {
      return timestamp;
    }
    const suffixed = /^(.*)-(\d+)$/.exec(newest);
    return suffixed ? `${suffixed[1]}-${Number(suffixed[2]) + 1}` : `${newest}-1`;
  }

  /** Highest id among the release directories on disk. */
  async newestOnDisk(): Promise<string | null> {
    return (await this.list())[0]?.id ?? null;
  }

  pathFor(releaseId: string): string {
    return releasePath(this.#layout, releaseId);
  }

  /**
   * Rejects ids that are malformed, already taken, or that would not sort after
   * the newest release, then creates the collection root. `isKnown` and
   * `newestKnown` fold in the ledger's view of past releases.
   */
  async assertAvailable(
    releaseId: string,
    isKnown: (id: string) => boolean = () => false,
    newestKnown: string | null = null,
  ): Promise<void> {
    if (!RELEASE_ID_PATTERN.test(releaseId)) {
      throw DeployError.configInvalid(`Invalid release id '${releaseId}'.`);
    }
    if (isKnown(releaseId) || (await entryExists(this.pathFor(releaseId)))) {
      throw DeployError.releaseExists(releaseId);
    }
    const onDisk = await this.newestOnDisk();
    const newest = onDisk && (!newestKnown || onDisk > newestKnown) ? onDisk : newestKnown;
    if (newest && releaseId <= newest) {
      throw DeployError.configInvalid(
        `Release id '${releaseId}' must sort after the newest release '${newest}'.`,
      );
    }
    await mkdir(this.#layout.collectionDir, { recursive: true });
  }

  async exists(releaseId: string): Promise<boolean> {
    return entryExists(this.pathFor(releaseId));
  }

  /** Newest first. Dot-entries (the state directory) are never releases. */
  async list(): Promise<StoredRelease[]> {
    if (!(await entryExists(this.#layout.collectionDir))) {
      return [];
    }
    const entries = await readdir(this.#layout.collectionDir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.') && RELEASE_ID_PATTERN.test(entry.name))
      .map((entry) => entry.name)
      .sort()
      .reverse()
      .map((id) => ({ id, path: this.pathFor(id) }));
  }

  async remove(releaseId: string): Promise<void> {
    await rm(this.pathFor(releaseId), { recursive: true, force: true });
  }
}
