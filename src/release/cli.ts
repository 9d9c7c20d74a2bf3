import {
  applyEnvOverrides,
  getConfigPath,
  isMigrationPolicy,
  readConfig,
  validateConfig,
  type DeployConfig,
} from '../config/deploy-config.js';
import { DeployPipelineService, describeLiveTarget, type HistoryEntry, type StatusReport } from '../services/deploy-pipeline.js';
import type { CommandRunner, DeployMode, DeployOutcome, HealthProbe, MigrationPolicy, PruneReport } from '../types/release.js';
import { configureLogger, logError } from '../utils/logger.js';
import { DeployError, EXIT_CODES } from './deploy-error.js';
import { resolveLayout } from './layout.js';

const COMMANDS = ['deploy', 'deploy-in-place', 'rollback', 'prune', 'status', 'history'] as const;
type CliCommand = (typeof COMMANDS)[number];

export interface ParsedArgs {
  command: CliCommand | undefined;
  unknownCommand?: string;
  base?: string;
  ref?: string;
  healthUrl?: string;
  retention?: number;
  migrate?: MigrationPolicy;
  configPath?: string;
  releaseId?: string;
  backups?: string;
  limit?: number;
  inPlace: boolean;
  json: boolean;
  help: boolean;
  errors: string[];
}

function isCliCommand(value: string): value is CliCommand {
  return COMMANDS.some((command) => command === value);
}

function parsePositiveInteger(flag: string, value: string, errors: string[]): number | undefined {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    errors.push(`${flag} expects an integer >= 1, got '${value}'`);
    return undefined;
  }
  return parsed;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const [first, ...rest] = argv;
  const parsed: ParsedArgs = { command: undefined, inPlace: false, json: false, help: false, errors: [] };

  if (first === '--help' || first === '-h' || first === 'help') {
    parsed.help = true;
  } else if (first !== undefined) {
    if (isCliCommand(first)) {
      parsed.command = first;
    } else {
      parsed.unknownCommand = first;
    }
  }

  for (let index = 0; index < rest.length; index += 1) {
    const token = rest[index];
    const next = rest[index + 1];

    if (token === '--help' || token === '-h') {
      parsed.help = true;
      continue;
    }
    if (token === '--json') {
      parsed.json = true;
      continue;
    }
    if (token === '--in-place') {
      parsed.inPlace = true;
      continue;
    }
    if (next === undefined || next.startsWith('--')) {
      parsed.errors.push(`Missing value for ${token}`);
      continue;
    }

    switch (token) {
      case '--base':
        parsed.base = next;
        break;
      case '--ref':
        parsed.ref = next;
        break;
      case '--health-url':
        parsed.healthUrl = next;
        break;
      case '--config':
        parsed.configPath = next;
        break;
      case '--release-id':
        parsed.releaseId = next;
        break;
      case '--backups':
        parsed.backups = next;
        break;
      case '--retention':
        parsed.retention = parsePositiveInteger(token, next, parsed.errors);
        break;
      case '--limit':
        parsed.limit = parsePositiveInteger(token, next, parsed.errors);
        break;
      case '--migrate':
        if (isMigrationPolicy(next)) {
          parsed.migrate = next;
        } else {
          parsed.errors.push(`--migrate expects before-switch, after-switch or skip, got '${next}'`);
        }
        break;
      default:
        parsed.errors.push(`Unknown option ${token}`);
        break;
    }
    index += 1;
  }

  return parsed;
}

export const USAGE = [
  'Usage:',
  '  releasectl deploy --base <path> --ref <branch|tag|sha> [--health-url <url>] [--retention <n>]',
  '                    [--migrate before-switch|after-switch|skip] [--config <file>] [--release-id <id>] [--json]',
  '  releasectl deploy-in-place --base <app-path> --ref <ref> [--backups <path>] [--health-url <url>] ...',
  '  releasectl rollback --base <path>',
  '  releasectl prune --base <path> [--retention <n>] [--in-place [--backups <path>]]',
  '  releasectl status --base <path> [--in-place [--backups <path>]] [--json]',
  '  releasectl history --base <path> [--limit <n>] [--in-place [--backups <path>]] [--json]',
  '',
  'Exit codes: 0 success, 1 deploy failed and rolled back (or nothing changed), 2 rollback failed.',
].join('\n');

export interface CliDependencies {
  commandRunner?: CommandRunner;
  healthProbe?: HealthProbe;
  sleep?: (ms: number) => Promise<void>;
  env?: NodeJS.ProcessEnv;
  /** When absent, SIGINT and SIGTERM abort the running deployment. */
  signal?: AbortSignal;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
}

export function exitCodeFor(outcome: DeployOutcome): number {
  switch (outcome.status) {
    case 'succeeded':
      return EXIT_CODES.success;
    case 'rollback-failed':
      return EXIT_CODES.rollbackFailed;
    default:
      return EXIT_CODES.deployFailed;
  }
}

export function formatOutcome(outcome: DeployOutcome): string {
  const lines: string[] = [];
  if (outcome.status === 'succeeded') {
    lines.push(`Deployed ${outcome.revision} as ${outcome.releaseId ?? 'unknown'} (${outcome.commit ?? 'commit unknown'}).`);
    if (outcome.pruned.length > 0) {
      lines.push(`Pruned: ${outcome.pruned.join(', ')}`);
    }
  } else {
    lines.push(`Deployment ${outcome.status} at ${outcome.failedStage ?? 'unknown stage'} [${outcome.errorCode ?? 'UNKNOWN'}]: ${outcome.error ?? ''}`);
    if (outcome.status === 'rollback-failed') {
      lines.push('Rollback failed: operator intervention required.');
    }
    if (outcome.rollback?.retainedDatabaseDump) {
      lines.push(`Database dump taken before the deploy: ${outcome.rollback.retainedDatabaseDump}`);
    }
  }
  for (const warning of outcome.warnings) {
    lines.push(`warning: ${warning}`);
  }
  lines.push(`Live: ${outcome.liveTarget}`);
  return lines.join('\n');
}

function formatStatus(report: StatusReport): string {
  const lines = [`Mode: ${report.mode}`, `Base: ${report.basePath}`, `Live: ${report.liveTarget}`];
  if (report.locked) {
    lines.push('A deployment is in progress (lock held).');
  }
  for (const release of report.releases) {
    const marker = release.isCurrent ? '*' : ' ';
    lines.push(`${marker} ${release.id}  ${release.status ?? 'untracked'}`);
  }
  if (report.lastDeployment) {
    lines.push(`Last deployment: ${report.lastDeployment.id} ${report.lastDeployment.outcome}`);
  }
  return lines.join('\n');
}

function formatHistory(entries: HistoryEntry[]): string {
  if (entries.length === 0) {
    return 'No deployments recorded.';
  }
  return entries
    .map((entry) => {
      const failed = entry.failed_stage ? ` at ${entry.failed_stage} [${entry.error_code ?? 'UNKNOWN'}]` : '';
      return `${entry.started_at}  ${entry.id}  ${entry.revision}  ${entry.release_id ?? '-'}  ${entry.outcome}${failed}`;
    })
    .join('\n');
}

function formatPrune(report: PruneReport): string {
  const lines = [`Kept: ${report.kept.join(', ') || 'none'}`, `Removed: ${report.removed.join(', ') || 'none'}`];
  for (const failed of report.failed) {
    lines.push(`warning: could not remove ${failed.id}: ${failed.detail}`);
  }
  return lines.join('\n');
}

async function loadConfig(parsed: ParsedArgs, basePath: string, env: NodeJS.ProcessEnv): Promise<DeployConfig> {
  const fromFile = await readConfig(getConfigPath(basePath, parsed.configPath, env));
  const config = applyEnvOverrides(fromFile, env);
  if (parsed.healthUrl) config.health.url = parsed.healthUrl;
  if (parsed.retention !== undefined) config.releases.retention = parsed.retention;
  if (parsed.migrate) config.migrations.policy = parsed.migrate;
  return config;
}

function withOperatorInterrupt(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    process.stderr.write(`\nReceived ${signal}; stopping after the current step and rolling back.\n`);
    controller.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
    },
  };
}

export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const out = deps.stdout ?? ((text: string) => console.log(text));
  const err = deps.stderr ?? ((text: string) => console.error(text));
  const env = deps.env ?? process.env;
  const parsed = parseArgs(argv);

  if (parsed.help) {
    out(USAGE);
    return EXIT_CODES.success;
  }
  if (parsed.unknownCommand !== undefined) {
    err(`Unknown command: ${parsed.unknownCommand}\n${USAGE}`);
    return EXIT_CODES.deployFailed;
  }
  if (!parsed.command) {
    err(USAGE);
    return EXIT_CODES.deployFailed;
  }
  if (parsed.errors.length > 0) {
    err(parsed.errors.join('\n'));
    return EXIT_CODES.deployFailed;
  }
  if (!parsed.base) {
    err('--base <path> is required.');
    return EXIT_CODES.deployFailed;
  }

  const command = parsed.command;
  const mode: DeployMode = command === 'deploy-in-place' || parsed.inPlace ? 'in-place' : 'symlink';
  const layout = resolveLayout(mode, parsed.base, parsed.backups);
  configureLogger({ logDir: layout.logDir });

  const interrupt = deps.signal ? null : withOperatorInterrupt();
  try {
    const config = await loadConfig(parsed, layout.basePath, env);
    const service = new DeployPipelineService({
      layout,
      config,
      commandRunner: deps.commandRunner,
      healthProbe: deps.healthProbe,
      sleep: deps.sleep,
      signal: deps.signal ?? interrupt?.signal,
    });

    switch (command) {
      case 'deploy':
      case 'deploy-in-place': {
        if (!parsed.ref) {
          err('--ref <branch|tag|sha> is required.');
          return EXIT_CODES.deployFailed;
        }
        validateConfig(config);
        const outcome = await service.deploy({ ref: parsed.ref, releaseId: parsed.releaseId });
        out(parsed.json ? JSON.stringify(outcome, null, 2) : formatOutcome(outcome));
        return exitCodeFor(outcome);
      }
      case 'rollback': {
        const result = await service.rollbackToPrevious();
        out(parsed.json ? JSON.stringify(result, null, 2) : `Rolled back ${result.from} -> ${result.to}.\nLive: ${result.liveTarget}`);
        return EXIT_CODES.success;
      }
      case 'prune': {
        const report = await service.prune(config.releases.retention);
        out(parsed.json ? JSON.stringify(report, null, 2) : formatPrune(report));
        return EXIT_CODES.success;
      }
      case 'status': {
        const report = await service.status();
        out(parsed.json ? JSON.stringify(report, null, 2) : formatStatus(report));
        return EXIT_CODES.success;
      }
      case 'history': {
        const entries = service.history(parsed.limit ?? 20);
        out(parsed.json ? JSON.stringify(entries, null, 2) : formatHistory(entries));
        return EXIT_CODES.success;
      }
    }
  } catch (error: unknown) {
    if (error instanceof DeployError) {
      err(`error [${error.code}]: ${error.message}\nLive: ${await describeLiveTarget(layout)}`);
      await logError(`[CLI] ${command} failed [${error.code}]: ${error.message}`);
      return error.code === 'ROLLBACK_RESTORE_FAILED' ? EXIT_CODES.rollbackFailed : EXIT_CODES.deployFailed;
    }
    throw error;
  } finally {
    interrupt?.dispose();
  }
}
