import path from 'node:path';
import type { DeployConfig } from '../config/deploy-config.js';
import { DeployError } from '../release/deploy-error.js';
import { pathExists } from '../utils/fs-helpers.js';
import { logThought } from '../utils/logger.js';
import { describeFailure, runInContext, type CommandContext } from './command-runner.js';

export interface BuildReport {
  commands: string[];
  assetsBuilt: boolean;
  durationMs: number;
}

/**
 * Dependency install, asset compilation and cache warm-up, always scoped to the
 * release directory. Any non-zero exit stops the build; there are no retries.
 */
export class ReleaseBuilder {
  readonly #config: DeployConfig;
  readonly #commands: CommandContext;

  constructor(config: DeployConfig, commands: CommandContext) {
    this.#config = config;
    this.#commands = commands;
  }

  async build(releasePath: string): Promise<BuildReport> {
    const startedAt = Date.now();
    const executed: string[] = [];

    await this.#runAll(this.#config.build.dependencies, releasePath, executed);

    const assetsBuilt = await this.needsAssetBuild(releasePath);
    if (assetsBuilt) {
      await this.#runAll(this.#config.build.assets, releasePath, executed);
    } else {
      await logThought('[Deploy] No asset lockfile in release; skipping asset build.');
    }

    await this.#runAll(this.#config.build.finalize, releasePath, executed);

    return { commands: executed, assetsBuilt, durationMs: Date.now() - startedAt };
  }

  async needsAssetBuild(releasePath: string): Promise<boolean> {
    for (const lockfile of this.#config.build.assetLockfiles) {
      if (await pathExists(path.join(releasePath, lockfile))) {
        return true;
      }
    }
    return false;
  }

  /** Reinstalls runtime dependencies only; used after a backup restore drops them. */
  async reinstallDependencies(targetPath: string): Promise<void> {
    await this.#runAll(this.#config.build.dependencies, targetPath, []);
  }

  async #runAll(commands: readonly string[], cwd: string, executed: string[]): Promise<void> {
    for (const command of commands) {
      const result = await runInContext(this.#commands, command, cwd);
      executed.push(command);
      if (!result.ok) {
        throw DeployError.buildFailed(describeFailure(command, result));
      }
    }
  }
}
