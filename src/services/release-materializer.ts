import { cp, mkdir, rm } from 'node:fs/promises';
import path from 'node:path';
import type { DeployConfig } from '../config/deploy-config.js';
import { DeployError } from '../release/deploy-error.js';
import type { ReleaseLayout } from '../release/layout.js';
import type { BackupMetadata } from '../types/release.js';
import { errorMessage, pathExists, writeJson } from '../utils/fs-helpers.js';
import { logThought } from '../utils/logger.js';
import { describeFailure, runInContext, shellQuote, type CommandContext } from './command-runner.js';
import type { ReleaseStore } from './release-store.js';
import type { SourceControl } from './source-control.js';

export interface MaterializedRelease {
  path: string;
  commit: string | null;
  /** Release the tree was copied from; `null` for a fresh clone. */
  seededFrom: string | null;
}

export interface MaterializerOptions {
  layout: ReleaseLayout;
  config: DeployConfig;
  store: ReleaseStore;
  source: SourceControl;
  commands: CommandContext;
  now?: () => Date;
}

/** True when `relative` is one of `excluded` or sits below one of them. */
export function isExcludedPath(relative: string, excluded: readonly string[]): boolean {
  if (!relative) {
    return false;
  }
  const normalized = relative.split(path.sep).join('/');
  return excluded.some((entry) => {
    const candidate = entry.replace(/\\/g, '/').replace(/\/+$/, '');
    return normalized === candidate || normalized.startsWith(`${candidate}/`);
  });
}

async function copyTree(sourceRoot: string, destination: string, excluded: readonly string[]): Promise<void> {
  await cp(sourceRoot, destination, {
    recursive: true,
    verbatimSymlinks: true,
    filter: (source) => !isExcludedPath(path.relative(sourceRoot, source), excluded),
  });
}

/**
 * Produces a release tree at a target revision that shares no mutable state
 * with the tree currently serving traffic.
 */
export class ReleaseMaterializer {
  readonly #layout: ReleaseLayout;
  readonly #config: DeployConfig;
  readonly #store: ReleaseStore;
  readonly #source: SourceControl;
  readonly #commands: CommandContext;
  readonly #now: () => Date;

  constructor(options: MaterializerOptions) {
    this.#layout = options.layout;
    this.#config = options.config;
    this.#store = options.store;
    this.#source = options.source;
    this.#commands = options.commands;
    this.#now = options.now ?? (() => new Date());
  }

  /**
   * Symlinked strategy: copy the last known-good release (minus shared paths),
   * then fast-forward the copy to `ref`. A fresh host clones instead.
   */
  async materializeSymlinked(input: { releaseId: string; ref: string; lastGoodId: string | null }): Promise<MaterializedRelease> {
    const targetPath = this.#store.pathFor(input.releaseId);
    const lastGoodPath = input.lastGoodId ? this.#store.pathFor(input.lastGoodId) : null;
    let seededFrom: string | null = null;

    if (input.lastGoodId && lastGoodPath && (await pathExists(lastGoodPath))) {
      const excluded = [
        ...this.#config.shared.configFiles,
        ...this.#config.shared.directories,
        ...this.#config.releases.copyExclude,
      ];
      await logThought(`[Deploy] Copying release ${input.lastGoodId} into ${input.releaseId} (excluding ${excluded.join(', ')}).`);
      try {
        await copyTree(lastGoodPath, targetPath, excluded);
      } catch (error: unknown) {
        throw DeployError.sourceSyncFailed(`Copying ${lastGoodPath} failed: ${errorMessage(error)}`);
      }
      seededFrom = input.lastGoodId;
    } else {
      const repository = this.#config.source.repository.trim();
      if (!repository) {
        throw DeployError.sourceSyncFailed(
          'No previous release to copy from and no source.repository configured for a first clone.',
        );
      }
      await logThought(`[Deploy] No previous release; cloning repository into ${input.releaseId}.`);
      await mkdir(path.dirname(targetPath), { recursive: true });
      await this.#source.clone(repository, targetPath);
    }

    await this.#source.syncTo(targetPath, input.ref);
    const commit = await this.#source.resolveHead(targetPath);
    await logThought(`[Deploy] Release ${input.releaseId} materialized at ${commit ?? input.ref}.`);
    return { path: targetPath, commit, seededFrom };
  }

  /** In-place strategy, step one: snapshot the serving directory before it is touched. */
  async createBackup(backupId: string): Promise<BackupMetadata> {
    const backupDir = this.#store.pathFor(backupId);
    const treePath = path.join(backupDir, 'tree');
    const sourcePath = this.#layout.basePath;
    const excluded = [...this.#config.backups.exclude];

    await logThought(`[Deploy] Backing up ${sourcePath} to ${treePath}.`);
    try {
      await mkdir(backupDir, { recursive: true });
      await copyTree(sourcePath, treePath, excluded);
    } catch (error: unknown) {
      await rm(backupDir, { recursive: true, force: true });
      throw DeployError.backupFailed(`Backup of ${sourcePath} failed: ${errorMessage(error)}`);
    }

    let databaseDumpPath: string | null = null;
    const dumpCommand = this.#config.backups.databaseDumpCommand.trim();
    if (dumpCommand) {
      databaseDumpPath = path.join(backupDir, 'database.sql');
      const command = `${dumpCommand} > ${shellQuote(databaseDumpPath)}`;
      const result = await runInContext(this.#commands, command, sourcePath);
      if (!result.ok) {
        await rm(backupDir, { recursive: true, force: true });
        throw DeployError.backupFailed(describeFailure(dumpCommand, result));
      }
    }

    const metadata: BackupMetadata = {
      backupId,
      sourcePath,
      treePath,
      databaseDumpPath,
      excluded,
      createdAt: this.#now().toISOString(),
    };
    await writeJson(path.join(backupDir, 'metadata.json'), metadata);
    return metadata;
  }

  async syncInPlace(ref: string): Promise<MaterializedRelease> {
    await this.#source.syncTo(this.#layout.basePath, ref);
    const commit = await this.#source.resolveHead(this.#layout.basePath);
    await logThought(`[Deploy] ${this.#layout.basePath} updated in place to ${commit ?? ref}.`);
    return { path: this.#layout.basePath, commit, seededFrom: null };
  }
}
