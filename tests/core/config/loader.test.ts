/**
 * Config loader tests.
 *
 * Priority: defaults <- YAML file <- VERSIONER_* env <- overrides
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import {
    ConfigValidationError,
    DEFAULT_CONFIG_FILE,
    loadConfig,
    readConfigFile,
} from '../../../src/core/config/index.js';
import { observer } from '../../../src/core/observer.js';

describe('config: loader', () => {

    let testDir: string;
    const envBackup: Record<string, string | undefined> = {};

    beforeEach(async () => {

        testDir = await mkdtemp(join(tmpdir(), 'versioner-config-'));

        for (const key of Object.keys(process.env)) {

            if (key.startsWith('VERSIONER_')) {

                envBackup[key] = process.env[key];
                delete process.env[key];

            }

        }

    });

    afterEach(async () => {

        for (const key of Object.keys(process.env)) {

            if (key.startsWith('VERSIONER_')) delete process.env[key];

        }

        for (const [key, value] of Object.entries(envBackup)) {

            if (value !== undefined) process.env[key] = value;

        }

        await rm(testDir, { recursive: true, force: true });

    });

    async function writeConfig(content: string, name = 'custom.yml'): Promise<string> {

        const path = join(testDir, name);
        await writeFile(path, content);

        return path;

    }

    describe('loadConfig', () => {

        it('should return defaults when there is no file', async () => {

            const config = await loadConfig({ cwd: testDir });

            expect(config).toEqual({
                logging: { enabled: true, level: 'info', color: false },
                transactional: true,
                bootstrap: { enabled: true, version: 0 },
            });

        });

        it('should read an explicit YAML file', async () => {

            const file = await writeConfig([
                'connection:',
                '  dialect: sqlite',
                '  database: ./app.db',
                'logging:',
                '  level: verbose',
                'transactional: false',
            ].join('\n'));

            const config = await loadConfig({ file, cwd: testDir });

            expect(config).toEqual({
                connection: { dialect: 'sqlite', database: './app.db' },
                logging: { enabled: true, level: 'verbose', color: false },
                transactional: false,
                bootstrap: { enabled: true, version: 0 },
            });

        });

        it('should find the default file in the working directory', async () => {

            await writeConfig('bootstrap:\n  version: 10\n', DEFAULT_CONFIG_FILE);

            const config = await loadConfig({ cwd: testDir });

            expect(config.bootstrap).toEqual({ enabled: true, version: 10 });

        });

        it('should read the file named by VERSIONER_CONFIG', async () => {

            process.env['VERSIONER_CONFIG'] = await writeConfig('transactional: false\n');

            const config = await loadConfig({ cwd: testDir });

            expect(config.transactional).toBe(false);

        });

        it('should let env vars override the file', async () => {

            const file = await writeConfig('logging:\n  level: verbose\n  color: true\n');
            process.env['VERSIONER_LOGGING_LEVEL'] = 'warn';

            const config = await loadConfig({ file });

            expect(config.logging).toEqual({ enabled: true, level: 'warn', color: true });

        });

        it('should let overrides win over env vars', async () => {

            process.env['VERSIONER_LOGGING_LEVEL'] = 'warn';

            const config = await loadConfig({
                cwd: testDir,
                overrides: { logging: { level: 'error' } },
            });

            expect(config.logging.level).toBe('error');

        });

        it('should treat an empty file as empty config', async () => {

            const file = await writeConfig('');

            const config = await loadConfig({ file });

            expect(config.transactional).toBe(true);

        });

        it('should reject invalid values with the failing field', async () => {

            const file = await writeConfig('logging:\n  level: loud\n');

            const err = await loadConfig({ file }).catch((e: unknown) => e);

            expect(err).toBeInstanceOf(ConfigValidationError);
            expect(err).toMatchObject({ field: 'logging.level' });

        });

        it('should validate the merged config', async () => {

            const file = await writeConfig('connection:\n  dialect: postgres\n  database: app\n');

            await expect(loadConfig({ file })).rejects.toThrow(
                "Config validation failed at 'connection.host': Host is required for non-SQLite databases",
            );

        });

        it('should emit config:loaded', async () => {

            const file = await writeConfig('transactional: true\n');
            const events: unknown[] = [];
            observer.on('config:loaded', (data) => events.push(data));

            try {

                await loadConfig({ file });
                await loadConfig({ cwd: testDir });

            }
            finally {

                observer.removeAllListeners('config:loaded');

            }

            expect(events).toEqual([
                { path: file, fromFile: true },
                { path: null, fromFile: false },
            ]);

        });

    });

    describe('readConfigFile', () => {

        it('should reject a missing file', async () => {

            await expect(readConfigFile(join(testDir, 'missing.yml')))
                .rejects.toThrow(/^Failed to read config file: /);

        });

        it('should reject invalid YAML', async () => {

            const file = await writeConfig('logging: [unclosed\n');

            await expect(readConfigFile(file)).rejects.toThrow(/^Invalid YAML in config file: /);

        });

    });

});
