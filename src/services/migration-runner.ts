import type { DeployConfig } from '../config/deploy-config.js';
import { DeployError } from '../release/deploy-error.js';
import { logThought } from '../utils/logger.js';
import { describeFailure, runInContext, type CommandContext } from './command-runner.js';
import type { DeploymentLedger } from './deployment-ledger.js';

export interface MigrationResult {
  skipped: boolean;
  durationMs: number;
}

/**
 * Applies schema migrations at most once per release. The ledger's
 * `migrated_at` marker makes a second run a no-op.
 */
export class MigrationRunner {
  readonly #config: DeployConfig;
  readonly #commands: CommandContext;
  readonly #ledger: DeploymentLedger;

  constructor(config: DeployConfig, commands: CommandContext, ledger: DeploymentLedger) {
    this.#config = config;
    this.#commands = commands;
    this.#ledger = ledger;
  }

  async run(release: { id: string; path: string }): Promise<MigrationResult> {
    const startedAt = Date.now();
    const record = this.#ledger.getRelease(release.id);
    if (record?.migratedAt) {
      await logThought(`[Deploy] Migrations already applied for ${release.id} at ${record.migratedAt}; skipping.`);
      return { skipped: true, durationMs: 0 };
    }

    if (this.#config.migrations.policy === 'before-switch') {
      await logThought('[Deploy] Migrating before switch: the live release must tolerate the new schema (expand/contract).');
    }

    const command = this.#config.migrations.command;
    const result = await runInContext(this.#commands, command, release.path);
    if (!result.ok) {
      throw DeployError.migrationFailed(describeFailure(command, result));
    }

    if (record) {
      this.#ledger.markMigrated(release.id);
    }
    return { skipped: false, durationMs: Date.now() - startedAt };
  }
}
