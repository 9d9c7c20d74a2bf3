import { readlink, rename, rm, stat, symlink, unlink } from 'node:fs/promises';
import path from 'node:path';
import { DeployError } from '../release/deploy-error.js';
import type { ReleaseLayout } from '../release/layout.js';
import { errorMessage, isErrnoException } from '../utils/fs-helpers.js';

/**
 * The `current` symlink: the single authoritative answer to "which release is live".
 *
 * Writes go through a temporary link renamed over `current`, so a reader resolves
 * either the old or the new release and never a missing path. Callers serialize
 * writers with the deploy lock.
 */
export class CurrentPointer {
  readonly #layout: ReleaseLayout;

  constructor(layout: ReleaseLayout) {
    this.#layout = layout;
  }

  get linkPath(): string {
    return this.#layout.currentLink;
  }

  /** The release id `current` points at, or `null` before the first deployment. */
  async read(): Promise<string | null> {
    try {
      const target = await readlink(this.#layout.currentLink);
      return path.basename(target);
    } catch (error: unknown) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw DeployError.switchFailed(
        `Cannot read current pointer at ${this.#layout.currentLink}: ${errorMessage(error)}`,
      );
    }
  }

  /** Records the target a rollback must return to; taken before every switch. */
  capture(): Promise<string | null> {
    return this.read();
  }

  /** Puts `current` back to `previous`, or removes it when there was none. */
  async restore(previous: string | null): Promise<void> {
    if (previous) {
      await this.switchTo(previous);
      return;
    }
    await this.clear();
  }

  /** Raw link text, for byte-for-byte comparisons. */
  async readRaw(): Promise<string | null> {
    try {
      return await readlink(this.#layout.currentLink);
    } catch (error: unknown) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  async switchTo(releaseId: string): Promise<void> {
    const target = path.join(path.basename(this.#layout.collectionDir), releaseId);
    const resolved = path.join(this.#layout.basePath, target);
    const tempLink = `${this.#layout.currentLink}.${releaseId}.tmp`;

    try {
      const info = await stat(resolved);
      if (!info.isDirectory()) {
        throw new Error(`${resolved} is not a directory`);
      }
    } catch (error: unknown) {
      throw DeployError.switchFailed(`Refusing to point current at ${resolved}: ${errorMessage(error)}`);
    }

    try {
      await rm(tempLink, { force: true });
      await symlink(target, tempLink);
      await rename(tempLink, this.#layout.currentLink);
    } catch (error: unknown) {
      await rm(tempLink, { force: true });
      throw DeployError.switchFailed(`Atomic switch to ${releaseId} failed: ${errorMessage(error)}`);
    }
  }

  /** Removes `current`; only used to undo a first-ever deployment. */
  async clear(): Promise<void> {
    try {
      await unlink(this.#layout.currentLink);
    } catch (error: unknown) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return;
      }
      throw DeployError.switchFailed(`Cannot remove current pointer: ${errorMessage(error)}`);
    }
  }
}
