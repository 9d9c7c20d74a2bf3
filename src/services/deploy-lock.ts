import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import lockfile from 'proper-lockfile';
import { DeployError } from '../release/deploy-error.js';
import { isErrnoException } from '../utils/fs-helpers.js';
import { logThought, logWarning } from '../utils/logger.js';

const LOCK_FILE_NAME = 'deploy.lock';
const STALE_AFTER_MS = 10 * 60 * 1000;

export type ReleaseLock = () => Promise<void>;

/**
 * Exclusive lock over one application's releases. A second deploy fails
 * immediately; it never waits.
 */
export class DeployLock {
  readonly #stateDir: string;

  constructor(stateDir: string) {
    this.#stateDir = stateDir;
  }

  get lockPath(): string {
    return path.join(this.#stateDir, LOCK_FILE_NAME);
  }

  async acquire(): Promise<ReleaseLock> {
    await mkdir(this.#stateDir, { recursive: true });
    try {
      const release = await lockfile.lock(this.#stateDir, {
        lockfilePath: this.lockPath,
        realpath: false,
        retries: 0,
        stale: STALE_AFTER_MS,
        onCompromised: (error: Error) => {
          logWarning(`[Lock] Deploy lock at ${this.lockPath} was compromised: ${error.message}`).catch(
            (logFailure: unknown) => console.error('[Lock] Could not record lock compromise:', logFailure),
          );
        },
      });
      await logThought(`[Lock] Acquired ${this.lockPath}.`);
      return release;
    } catch (error: unknown) {
      if (isErrnoException(error) && error.code === 'ELOCKED') {
        throw DeployError.lockHeld(this.lockPath);
      }
      throw error;
    }
  }

  async isLocked(): Promise<boolean> {
    return lockfile.check(this.#stateDir, {
      lockfilePath: this.lockPath,
      realpath: false,
      stale: STALE_AFTER_MS,
    });
  }
}
