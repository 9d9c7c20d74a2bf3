import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { fileURLToPath } from 'url';
import {
    applyEnvOverrides,
    cloneDefaultConfig,
    getConfigPath,
    mergeWithDefaults,
    readConfig,
    validateConfig,
} from '../../src/config/deploy-config.js';

describe('Deploy config', () => {
    let tempDir: string;
    let configPath: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'releasectl-config-'));
        configPath = path.join(tempDir, 'deploy.json');
    });

    afterEach(async () => {
        vi.unstubAllEnvs();
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('loads default config when file is missing', async () => {
        const config = await readConfig(configPath);
        expect(config).toEqual(cloneDefaultConfig());
        expect(config.releases.retention).toBe(5);
        expect(config.migrations.policy).toBe('before-switch');
    });

    it('merges a partial file over the defaults', async () => {
        await fs.writeFile(
            configPath,
            JSON.stringify({
                releases: { retention: 3 },
                shared: { directories: ['storage', 'bootstrap/cache'] },
                health: { url: 'https://app.example.test/up', attempts: 'many' },
            }),
            'utf8',
        );

        const config = await readConfig(configPath);
        expect(config.releases.retention).toBe(3);
        expect(config.releases.copyExclude).toEqual(['node_modules']);
        expect(config.shared.directories).toEqual(['storage', 'bootstrap/cache']);
        expect(config.shared.configFiles).toEqual(['.env']);
        expect(config.health.url).toBe('https://app.example.test/up');
        expect(config.health.attempts).toBe(5);
    });

    it('handles malformed JSON by throwing an error', async () => {
        await fs.writeFile(configPath, '{ malformed: true ', 'utf8');
        await expect(readConfig(configPath)).rejects.toThrow(/Failed to parse config file/);
    });

    it('rejects an unknown migration policy', () => {
        expect(() => mergeWithDefaults({ migrations: { policy: 'sometimes' } })).toThrow(
            'Unknown migration policy in config: sometimes',
        );
    });

    it('resolves the config path from the flag, then the environment, then the base path', () => {
        vi.stubEnv('RELEASECTL_CONFIG_PATH', '/etc/releasectl/deploy.json');
        expect(getConfigPath('/srv/app', '/opt/deploy.json')).toBe('/opt/deploy.json');
        expect(getConfigPath('/srv/app')).toBe('/etc/releasectl/deploy.json');
        vi.stubEnv('RELEASECTL_CONFIG_PATH', '');
        expect(getConfigPath('/srv/app')).toBe('/srv/app/deploy.json');
    });

    it('reads the config path variable from the environment it is given', () => {
        vi.stubEnv('RELEASECTL_CONFIG_PATH', '/etc/releasectl/process.json');
        expect(getConfigPath('/srv/app', undefined, { RELEASECTL_CONFIG_PATH: '/etc/releasectl/injected.json' })).toBe(
            '/etc/releasectl/injected.json',
        );
        expect(getConfigPath('/srv/app', undefined, {})).toBe('/srv/app/deploy.json');
    });

    it('ships an example that fixes storage ownership and permissions before optimizing', async () => {
        const examplePath = fileURLToPath(new URL('../../deploy.example.json', import.meta.url));
        const config = await readConfig(examplePath);

        expect(config.build.finalize).toEqual([
            'chown -R www-data:www-data storage/ bootstrap/cache',
            'find storage/ bootstrap/cache -type d -exec chmod 775 {} +',
            'find storage/ bootstrap/cache -type f -exec chmod 664 {} +',
            'php artisan optimize:clear',
            'php artisan optimize',
        ]);
        expect(() => validateConfig(config)).not.toThrow();
    });

    it('applies environment overrides without mutating the input', () => {
        const base = cloneDefaultConfig();
        const config = applyEnvOverrides(base, {
            RELEASECTL_HEALTH_URL: ' http://app.example.test/up ',
            RELEASECTL_RETENTION: '8',
            RELEASECTL_MIGRATION_POLICY: 'skip',
        });

        expect(config.health.url).toBe('http://app.example.test/up');
        expect(config.releases.retention).toBe(8);
        expect(config.migrations.policy).toBe('skip');
        expect(base.health.url).toBe('');
    });

    it('rejects malformed environment overrides', () => {
        expect(() => applyEnvOverrides(cloneDefaultConfig(), { RELEASECTL_RETENTION: 'five' })).toThrow(
            "RELEASECTL_RETENTION must be an integer, got 'five'.",
        );
        expect(() => applyEnvOverrides(cloneDefaultConfig(), { RELEASECTL_MIGRATION_POLICY: 'never' })).toThrow(
            /RELEASECTL_MIGRATION_POLICY must be one of/,
        );
    });

    it('lists every validation problem at once', () => {
        const config = cloneDefaultConfig();
        config.releases.retention = 0;
        config.health.url = 'app.example.test/up';
        config.shared.directories = ['../outside'];

        expect(() => validateConfig(config)).toThrow(
            "Invalid deploy configuration: releases.retention must be an integer >= 1; health.url must be an http(s) URL, got 'app.example.test/up'; shared path '../outside' must be relative to the release root",
        );
    });

    it('accepts the defaults once a health URL is set', () => {
        const config = cloneDefaultConfig();
        config.health.url = 'http://127.0.0.1/up';
        expect(() => validateConfig(config)).not.toThrow();
    });
});
