import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { DeployError } from '../release/deploy-error.js';
import type { MigrationPolicy } from '../types/release.js';
import { isErrnoException, isObjectRecord } from '../utils/fs-helpers.js';

export const CONFIG_FILE_NAME = 'deploy.json';

export interface DeployConfig {
    source: {
        /** Clone URL, only needed for the very first symlinked release. */
        repository: string;
        remote: string;
    };
    releases: {
        retention: number;
        /** Top-level entries never copied from the previous release. */
        copyExclude: string[];
    };
    shared: {
        configFiles: string[];
        directories: string[];
    };
    build: {
        dependencies: string[];
        assets: string[];
        assetLockfiles: string[];
        finalize: string[];
    };
    migrations: {
        policy: MigrationPolicy;
        command: string;
    };
    health: {
        url: string;
        selfCheckCommand: string;
        attempts: number;
        delayMs: number;
        timeoutMs: number;
    };
    services: {
        reload: string[];
    };
    maintenance: {
        down: string;
        up: string;
    };
    backups: {
        databaseDumpCommand: string;
        exclude: string[];
    };
    rollback: {
        requiredArtifacts: string[];
    };
    commands: {
        timeoutMs: number;
    };
}

export const DEFAULT_CONFIG: DeployConfig = {
    source: {
        repository: '',
        remote: 'origin',
    },
    releases: {
        retention: 5,
        copyExclude: ['node_modules'],
    },
    shared: {
        configFiles: ['.env'],
        directories: ['storage'],
    },
    build: {
        dependencies: [
            'composer install --no-dev --prefer-dist --no-ansi --no-progress --no-interaction --optimize-autoloader',
        ],
        assets: ['npm ci --silent --no-progress', 'npm run build --silent'],
        assetLockfiles: ['package-lock.json'],
        finalize: ['php artisan optimize:clear', 'php artisan optimize'],
    },
    migrations: {
        policy: 'before-switch',
        command: 'php artisan migrate --force --no-interaction',
    },
    health: {
        url: '',
        selfCheckCommand: 'php artisan about --only=environment',
        attempts: 5,
        delayMs: 3000,
        timeoutMs: 5000,
    },
    services: {
        reload: [
            'systemctl reload php8.2-fpm',
            'systemctl reload nginx',
            'php artisan queue:restart',
            'supervisorctl restart app-worker:*',
        ],
    },
    maintenance: {
        down: 'php artisan down --retry=60',
        up: 'php artisan up',
    },
    backups: {
        databaseDumpCommand: '',
        exclude: ['node_modules'],
    },
    rollback: {
        requiredArtifacts: ['vendor'],
    },
    commands: {
        timeoutMs: 15 * 60 * 1000,
    },
};

const MIGRATION_POLICIES: readonly MigrationPolicy[] = ['before-switch', 'after-switch', 'skip'];

export function isMigrationPolicy(value: unknown): value is MigrationPolicy {
    return typeof value === 'string' && MIGRATION_POLICIES.some((policy) => policy === value);
}

export function cloneDefaultConfig(): DeployConfig {
    return structuredClone(DEFAULT_CONFIG);
}

/**
 * Resolves the config file: explicit path, then `RELEASECTL_CONFIG_PATH`,
 * then `deploy.json` inside the application base path.
 */
export function getConfigPath(
    basePath: string,
    overridePath?: string,
    env: NodeJS.ProcessEnv = process.env,
): string {
    if (overridePath) return path.resolve(overridePath);
    if (env.RELEASECTL_CONFIG_PATH) {
        return path.resolve(env.RELEASECTL_CONFIG_PATH);
    }
    return path.join(path.resolve(basePath), CONFIG_FILE_NAME);
}

export async function readConfig(configPath: string): Promise<DeployConfig> {
    let rawData: string;
    try {
        rawData = await fs.readFile(configPath, 'utf-8');
    } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') return mergeWithDefaults({});
        throw error;
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(rawData);
    } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        throw DeployError.configInvalid(`Failed to parse config file at ${configPath}: ${detail}`);
    }
    return mergeWithDefaults(parsed);
}

function section(record: Record<string, unknown>, key: string): Record<string, unknown> {
    const value = record[key];
    return isObjectRecord(value) ? value : {};
}

function pickString(record: Record<string, unknown>, key: string, fallback: string): string {
    const value = record[key];
    return typeof value === 'string' ? value : fallback;
}

function pickNumber(record: Record<string, unknown>, key: string, fallback: number): number {
    const value = record[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function pickStringArray(record: Record<string, unknown>, key: string, fallback: string[]): string[] {
    const value = record[key];
    return Array.isArray(value)
        ? value.filter((entry): entry is string => typeof entry === 'string')
        : fallback;
}

export function mergeWithDefaults(loaded: unknown): DeployConfig {
    const root = isObjectRecord(loaded) ? loaded : {};
    const config = cloneDefaultConfig();

    const source = section(root, 'source');
    config.source = {
        repository: pickString(source, 'repository', config.source.repository),
        remote: pickString(source, 'remote', config.source.remote),
    };

    const releases = section(root, 'releases');
    config.releases = {
        retention: pickNumber(releases, 'retention', config.releases.retention),
        copyExclude: pickStringArray(releases, 'copyExclude', config.releases.copyExclude),
    };

    const shared = section(root, 'shared');
    config.shared = {
        configFiles: pickStringArray(shared, 'configFiles', config.shared.configFiles),
        directories: pickStringArray(shared, 'directories', config.shared.directories),
    };

    const build = section(root, 'build');
    config.build = {
        dependencies: pickStringArray(build, 'dependencies', config.build.dependencies),
        assets: pickStringArray(build, 'assets', config.build.assets),
        assetLockfiles: pickStringArray(build, 'assetLockfiles', config.build.assetLockfiles),
        finalize: pickStringArray(build, 'finalize', config.build.finalize),
    };

    const migrations = section(root, 'migrations');
    const policy = migrations.policy;
    if (policy !== undefined && !isMigrationPolicy(policy)) {
        throw DeployError.configInvalid(`Unknown migration policy in config: ${String(policy)}`);
    }
    config.migrations = {
        policy: isMigrationPolicy(policy) ? policy : config.migrations.policy,
        command: pickString(migrations, 'command', config.migrations.command),
    };

    const health = section(root, 'health');
    config.health = {
        url: pickString(health, 'url', config.health.url),
        selfCheckCommand: pickString(health, 'selfCheckCommand', config.health.selfCheckCommand),
        attempts: pickNumber(health, 'attempts', config.health.attempts),
        delayMs: pickNumber(health, 'delayMs', config.health.delayMs),
        timeoutMs: pickNumber(health, 'timeoutMs', config.health.timeoutMs),
    };

    const services = section(root, 'services');
    config.services = {
        reload: pickStringArray(services, 'reload', config.services.reload),
    };

    const maintenance = section(root, 'maintenance');
    config.maintenance = {
        down: pickString(maintenance, 'down', config.maintenance.down),
        up: pickString(maintenance, 'up', config.maintenance.up),
    };

    const backups = section(root, 'backups');
    config.backups = {
        databaseDumpCommand: pickString(backups, 'databaseDumpCommand', config.backups.databaseDumpCommand),
        exclude: pickStringArray(backups, 'exclude', config.backups.exclude),
    };

    const rollback = section(root, 'rollback');
    config.rollback = {
        requiredArtifacts: pickStringArray(rollback, 'requiredArtifacts', config.rollback.requiredArtifacts),
    };

    const commands = section(root, 'commands');
    config.commands = {
        timeoutMs: pickNumber(commands, 'timeoutMs', config.commands.timeoutMs),
    };

    return config;
}

/**
 * Applies the explicit `RELEASECTL_*` environment overrides on top of the file config.
 */
export function applyEnvOverrides(config: DeployConfig, env: NodeJS.ProcessEnv = process.env): DeployConfig {
    const next = structuredClone(config);

    const healthUrl = env.RELEASECTL_HEALTH_URL?.trim();
    if (healthUrl) next.health.url = healthUrl;

    const repository = env.RELEASECTL_REPOSITORY?.trim();
    if (repository) next.source.repository = repository;

    const retention = env.RELEASECTL_RETENTION?.trim();
    if (retention) {
        const parsed = Number(retention);
        if (!Number.isInteger(parsed)) {
            throw DeployError.configInvalid(`RELEASECTL_RETENTION must be an integer, got '${retention}'.`);
        }
        next.releases.retention = parsed;
    }

    const policy = env.RELEASECTL_MIGRATION_POLICY?.trim();
    if (policy) {
        if (!isMigrationPolicy(policy)) {
            throw DeployError.configInvalid(`RELEASECTL_MIGRATION_POLICY must be one of ${MIGRATION_POLICIES.join(', ')}.`);
        }
        next.migrations.policy = policy;
    }

    return next;
}

export function validateConfig(config: DeployConfig): void {
    const problems: string[] = [];

    if (!Number.isInteger(config.releases.retention) || config.releases.retention < 1) {
        problems.push('releases.retention must be an integer >= 1');
    }
    if (!Number.isInteger(config.health.attempts) || config.health.attempts < 1) {
        problems.push('health.attempts must be an integer >= 1');
    }
    if (config.health.delayMs < 0) {
        problems.push('health.delayMs must not be negative');
    }
    if (config.health.timeoutMs <= 0) {
        problems.push('health.timeoutMs must be positive');
    }
    if (config.commands.timeoutMs <= 0) {
        problems.push('commands.timeoutMs must be positive');
    }
    if (!config.health.url.trim()) {
        problems.push('health.url is required (config, RELEASECTL_HEALTH_URL or --health-url)');
    } else if (!/^https?:\/\//i.test(config.health.url)) {
        problems.push(`health.url must be an http(s) URL, got '${config.health.url}'`);
    }
    if (config.migrations.policy !== 'skip' && !config.migrations.command.trim()) {
        problems.push('migrations.command is required unless migrations.policy is "skip"');
    }
    if (config.shared.configFiles.length === 0) {
        problems.push('shared.configFiles must name at least one configuration file');
    }
    for (const entry of [...config.shared.configFiles, ...config.shared.directories]) {
        if (path.isAbsolute(entry) || entry.split(/[\\/]/).includes('..')) {
            problems.push(`shared path '${entry}' must be relative to the release root`);
        }
    }

    if (problems.length > 0) {
        throw DeployError.configInvalid(`Invalid deploy configuration: ${problems.join('; ')}`);
    }
}
