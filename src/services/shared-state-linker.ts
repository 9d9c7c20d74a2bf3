import { mkdir, readlink, rename, rm, symlink } from 'node:fs/promises';
import path from 'node:path';
import type { DeployConfig } from '../config/deploy-config.js';
import { DeployError } from '../release/deploy-error.js';
import type { ReleaseLayout } from '../release/layout.js';
import { entryExists, isSymlink, pathExists } from '../utils/fs-helpers.js';
import { logThought } from '../utils/logger.js';

export interface LinkReport {
  linked: string[];
  seeded: string[];
  unchanged: string[];
}

/**
 * Wires a release to the persistent state under `shared/`.
 * Linking is idempotent: a path that already points at its shared target is left alone.
 */
export class SharedStateLinker {
  readonly #layout: ReleaseLayout;
  readonly #config: DeployConfig;

  constructor(layout: ReleaseLayout, config: DeployConfig) {
    this.#layout = layout;
    this.#config = config;
  }

  async assertReady(): Promise<void> {
    for (const file of this.#config.shared.configFiles) {
      const target = path.join(this.#layout.sharedDir, file);
      if (!(await pathExists(target))) {
        throw DeployError.missingSharedConfig(target);
      }
    }
  }

  async link(releasePath: string): Promise<LinkReport> {
    const report: LinkReport = { linked: [], seeded: [], unchanged: [] };

    for (const file of this.#config.shared.configFiles) {
      await this.#linkEntry(releasePath, file, report);
    }

    for (const directory of this.#config.shared.directories) {
      const sharedTarget = path.join(this.#layout.sharedDir, directory);
      if (!(await entryExists(sharedTarget))) {
        const releaseCopy = path.join(releasePath, directory);
        await mkdir(path.dirname(sharedTarget), { recursive: true });
        if ((await pathExists(releaseCopy)) && !(await isSymlink(releaseCopy))) {
          await rename(releaseCopy, sharedTarget);
          await logThought(`[Deploy] Seeded shared/${directory} from release contents.`);
        } else {
          await mkdir(sharedTarget, { recursive: true });
          await logThought(`[Deploy] Created empty shared/${directory}.`);
        }
        report.seeded.push(directory);
      }
      await this.#linkEntry(releasePath, directory, report);
    }

    return report;
  }

  async #linkEntry(releasePath: string, entry: string, report: LinkReport): Promise<void> {
    const target = path.join(this.#layout.sharedDir, entry);
    const linkPath = path.join(releasePath, entry);

    if ((await isSymlink(linkPath)) && (await readlink(linkPath)) === target) {
      report.unchanged.push(entry);
      return;
    }

    await rm(linkPath, { recursive: true, force: true });
    await mkdir(path.dirname(linkPath), { recursive: true });
    await symlink(target, linkPath);
    report.linked.push(entry);
  }
}
