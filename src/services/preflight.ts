import path from 'node:path';
import type { DeployConfig } from '../config/deploy-config.js';
import { DeployError } from '../release/deploy-error.js';
import type { ReleaseLayout } from '../release/layout.js';
import { pathExists } from '../utils/fs-helpers.js';
import { logThought } from '../utils/logger.js';
import { runInContext, shellQuote, type CommandContext } from './command-runner.js';

/** The executable a shell command line starts with, skipping leading `VAR=value` assignments. */
export function executableOf(command: string): string | null {
  for (const token of command.trim().split(/\s+/)) {
    if (!token) {
      continue;
    }
    if (/^[A-Za-z_][A-Za-z0-9_]*=/.test(token)) {
      continue;
    }
    return token;
  }
  return null;
}

export function requiredTools(config: DeployConfig, mode: ReleaseLayout['mode']): string[] {
  const commands = [
    ...config.build.dependencies,
    ...config.build.assets,
    ...config.build.finalize,
    config.health.selfCheckCommand,
    ...config.services.reload,
  ];
  if (config.migrations.policy !== 'skip') {
    commands.push(config.migrations.command);
  }
  if (mode === 'in-place') {
    commands.push(config.maintenance.down, config.maintenance.up, config.backups.databaseDumpCommand);
  }

  const tools = new Set<string>(['git']);
  for (const command of commands) {
    const tool = executableOf(command);
    if (tool) {
      tools.add(tool);
    }
  }
  return [...tools];
}

/**
 * Checks the host before anything is locked or written: the application path
 * exists, backups live outside it, and every configured tool resolves on PATH.
 */
export async function runPreflight(layout: ReleaseLayout, config: DeployConfig, commands: CommandContext): Promise<void> {
  if (!(await pathExists(layout.basePath))) {
    throw DeployError.configInvalid(`Base path ${layout.basePath} does not exist.`);
  }

  if (layout.mode === 'in-place') {
    const relative = path.relative(layout.basePath, layout.collectionDir);
    if (!relative || (!relative.startsWith('..') && !path.isAbsolute(relative))) {
      throw DeployError.configInvalid(
        `Backups directory ${layout.collectionDir} must be outside the application directory ${layout.basePath}.`,
      );
    }
  }

  const missing: string[] = [];
  for (const tool of requiredTools(config, layout.mode)) {
    const result = await runInContext(commands, `command -v ${shellQuote(tool)}`, layout.basePath);
    if (!result.ok) {
      missing.push(tool);
    }
  }
  if (missing.length > 0) {
    throw DeployError.missingTools(missing);
  }
  await logThought(`[Deploy] Preflight passed for ${layout.basePath} (${layout.mode}).`);
}
