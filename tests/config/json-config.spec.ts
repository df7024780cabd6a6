import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import {
    applyEnvOverrides,
    DEFAULT_CONFIG,
    type DiffwatchConfig,
    getConfigPath,
    loadConfig,
    mergeWithDefaults,
    readConfig,
    writeConfig,
} from '../../src/config/json-config.js';

describe('Config JSON Foundation', () => {
    let tempDir = '';
    let tempConfigPath = '';

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'diffwatch-test-config-'));
        tempConfigPath = path.join(tempDir, 'diffwatch.json');
        vi.stubEnv('DIFFWATCH_CONFIG_PATH', tempConfigPath);
    });

    afterEach(async () => {
        vi.unstubAllEnvs();
        vi.restoreAllMocks();
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('resolves the config path from the argument, then the environment', () => {
        expect(getConfigPath()).toBe(tempConfigPath);
        expect(getConfigPath(path.join(tempDir, 'other.json'))).toBe(path.join(tempDir, 'other.json'));
    });

    it('loads default config when file is missing', async () => {
        const config = await readConfig();
        expect(config).toEqual(DEFAULT_CONFIG);
        expect(config.watcher.debounceMs).toBe(100);
        expect(config.diff.maxFileSizeBytes).toBe(1048576);
    });

    it('saves and reads structured config correctly', async () => {
        const customConfig: DiffwatchConfig = JSON.parse(JSON.stringify(DEFAULT_CONFIG));
        customConfig.watcher.debounceMs = 250;
        customConfig.watcher.excludedDirectories = ['coverage'];
        customConfig.diff.contextLines = 5;

        const written = await writeConfig(customConfig);
        expect(written).toBe(tempConfigPath);

        const loaded = await readConfig();
        expect(loaded.watcher.debounceMs).toBe(250);
        expect(loaded.watcher.excludedDirectories).toEqual(['coverage']);
        expect(loaded.diff.contextLines).toBe(5);
        expect(await fs.readdir(tempDir)).toEqual(['diffwatch.json']);
    });

    it('handles malformed JSON by throwing an error', async () => {
        await fs.writeFile(tempConfigPath, '{ malformed: true ', 'utf8');
        await expect(readConfig()).rejects.toThrow(/Failed to parse config file/);
    });

    it('falls back to defaults for fields of the wrong type or out of range', () => {
        const merged = mergeWithDefaults({
            watcher: { debounceMs: -5, eventBufferSize: 0, excludedDirectories: ['out', 42], usePolling: 'yes' },
            diff: { binaryThreshold: 2, contextLines: 1.5, maxFileSizeBytes: 2048 },
            logging: 'loud',
        });

        expect(merged.watcher.debounceMs).toBe(100);
        expect(merged.watcher.eventBufferSize).toBe(100);
        expect(merged.watcher.excludedDirectories).toEqual(['out']);
        expect(merged.watcher.usePolling).toBe(false);
        expect(merged.diff.binaryThreshold).toBe(0.3);
        expect(merged.diff.contextLines).toBe(3);
        expect(merged.diff.maxFileSizeBytes).toBe(2048);
        expect(merged.logging).toEqual(DEFAULT_CONFIG.logging);
    });

    it('applies environment overrides on top of the file', async () => {
        await writeConfig(mergeWithDefaults({ watcher: { debounceMs: 250 } }));
        vi.stubEnv('DIFFWATCH_DEBOUNCE_MS', '40');
        vi.stubEnv('DIFFWATCH_USE_POLLING', 'on');
        vi.stubEnv('DIFFWATCH_LOG_DIR', tempDir);

        const config = await loadConfig();

        expect(config.watcher.debounceMs).toBe(40);
        expect(config.watcher.usePolling).toBe(true);
        expect(config.logging.directory).toBe(tempDir);
    });

    it('ignores unparsable environment values with a warning', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

        const config = applyEnvOverrides(DEFAULT_CONFIG, {
            DIFFWATCH_MAX_FILE_SIZE_BYTES: '1MB',
            DIFFWATCH_LOG_ENABLED: 'off',
        });

        expect(config.diff.maxFileSizeBytes).toBe(1048576);
        expect(config.logging.enabled).toBe(false);
        expect(DEFAULT_CONFIG.logging.enabled).toBe(true);
        expect(warn).toHaveBeenCalledWith(
            "[Diffwatch Config] Ignoring DIFFWATCH_MAX_FILE_SIZE_BYTES='1MB': expected integer.",
        );
    });
});
