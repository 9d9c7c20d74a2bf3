import type { DeployConfig } from '../config/deploy-config.js';
import { logWarning } from '../utils/logger.js';
import { describeFailure, runInContext, type CommandContext } from './command-runner.js';

/**
 * Best-effort service control. Failures come back as warnings and never stop
 * a deploy or a rollback.
 */
export class ServiceReloader {
  readonly #config: DeployConfig;
  readonly #commands: CommandContext;

  constructor(config: DeployConfig, commands: CommandContext) {
    this.#config = config;
    this.#commands = commands;
  }

  async reload(cwd: string): Promise<string[]> {
    const warnings: string[] = [];
    for (const command of this.#config.services.reload) {
      const warning = await this.#bestEffort(command, cwd);
      if (warning) {
        warnings.push(warning);
      }
    }
    return warnings;
  }

  maintenanceDown(cwd: string): Promise<string | null> {
    return this.#bestEffort(this.#config.maintenance.down, cwd);
  }

  maintenanceUp(cwd: string): Promise<string | null> {
    return this.#bestEffort(this.#config.maintenance.up, cwd);
  }

  async #bestEffort(command: string, cwd: string): Promise<string | null> {
    if (!command.trim()) {
      return null;
    }
    const result = await runInContext(this.#commands, command, cwd);
    if (result.ok) {
      return null;
    }
    const warning = describeFailure(command, result);
    await logWarning(`[Services] ${warning}`);
    return warning;
  }
}
