import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdir, mkdtemp, rm, unlink, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { ChangeMonitor, type ChangeOutcome } from '../../src/services/change-monitor.js';
import { BoundedChannel } from '../../src/utils/bounded-channel.js';
import type { WatchEvent, WatchOperation } from '../../src/types/file-watcher.js';
import { errnoError } from '../harness/fake-watch-backend.js';

vi.mock('../../src/utils/logger.js', () => ({
    logThought: vi.fn().mockResolvedValue(undefined),
}));

function watchEvent(filePath: string, operation: WatchOperation): WatchEvent {
    return { path: filePath, operation, timestamp: '2026-03-01T10:20:30.000Z' };
}

describe('ChangeMonitor', () => {
    let tempDir = '';

    beforeEach(async () => {
        tempDir = await mkdtemp(path.join(os.tmpdir(), 'diffwatch-monitor-'));
    });

    afterEach(async () => {
        await rm(tempDir, { recursive: true, force: true });
    });

    it('diffs a new file against an empty history', async () => {
        const file = path.join(tempDir, 'a.txt');
        await writeFile(file, 'a\n', 'utf8');
        const monitor = new ChangeMonitor();

        const outcome = await monitor.process(watchEvent(file, 'create'));

        expect(outcome.kind).toBe('diff');
        if (outcome.kind !== 'diff') return;
        expect(outcome.result.isNew).toBe(true);
        expect(outcome.result.unifiedText).toBe(`--- /dev/null\n+++ ${file}\n@@ -0,0 +1 @@\n+a\n`);
    });

    it('reports unchanged content and then a modification', async () => {
        const file = path.join(tempDir, 'a.txt');
        await writeFile(file, 'a\nb\nc\n', 'utf8');
        const monitor = new ChangeMonitor();
        await monitor.process(watchEvent(file, 'create'));

        expect((await monitor.process(watchEvent(file, 'write'))).kind).toBe('unchanged');

        await writeFile(file, 'a\nx\nc\n', 'utf8');
        const outcome = await monitor.process(watchEvent(file, 'write'));

        expect(outcome.kind).toBe('diff');
        if (outcome.kind !== 'diff') return;
        expect(outcome.result.unifiedText).toBe(`--- ${file}\n+++ ${file}\n@@ -1,3 +1,3 @@\n a\n-b\n+x\n c\n`);
    });

    it('diffs a removed file against its last snapshot', async () => {
        const file = path.join(tempDir, 'gone.txt');
        await writeFile(file, 'bye\n', 'utf8');
        const monitor = new ChangeMonitor();
        await monitor.process(watchEvent(file, 'create'));

        await unlink(file);
        const outcome = await monitor.process(watchEvent(file, 'remove'));

        expect(outcome.kind).toBe('diff');
        if (outcome.kind !== 'diff') return;
        expect(outcome.result.isDeleted).toBe(true);
        expect(outcome.result.unifiedText).toBe(`--- ${file}\n+++ /dev/null\n@@ -1 +0,0 @@\n-bye\n`);
    });

    it('reports a removal with no snapshot as unchanged', async () => {
        const monitor = new ChangeMonitor();
        const outcome = await monitor.process(watchEvent(path.join(tempDir, 'never.txt'), 'remove'));

        expect(outcome.kind).toBe('unchanged');
    });

    it('skips paths that vanished before they could be read', async () => {
        const monitor = new ChangeMonitor();
        const outcome = await monitor.process(watchEvent(path.join(tempDir, 'missing.txt'), 'write'));

        expect(outcome.kind).toBe('missing');
        expect(monitor.store.size).toBe(0);
    });

    it('does not diff directories', async () => {
        const dir = path.join(tempDir, 'sub');
        await mkdir(dir);
        const monitor = new ChangeMonitor();

        expect((await monitor.process(watchEvent(dir, 'create'))).kind).toBe('directory');
    });

    it('reports files above the size limit without reading them', async () => {
        const file = path.join(tempDir, 'big.txt');
        await writeFile(file, 'hello world', 'utf8');
        const monitor = new ChangeMonitor({ maxFileSizeBytes: 4 });

        const outcome = await monitor.process(watchEvent(file, 'write'));

        expect(outcome).toEqual({
            kind: 'too-large',
            event: watchEvent(file, 'write'),
            sizeBytes: 11,
            limitBytes: 4,
        });
        expect(monitor.store.size).toBe(0);
    });

    it('rejects stat failures other than a missing file', async () => {
        const monitor = new ChangeMonitor({
            stat: () => Promise.reject(errnoError('EACCES')),
        });

        await expect(monitor.process(watchEvent('secret.txt', 'write'))).rejects.toThrow(
            "[ChangeMonitor] Cannot stat 'secret.txt': EACCES: simulated",
        );
    });

    it('drains events and errors until both streams end', async () => {
        const file = path.join(tempDir, 'a.txt');
        await writeFile(file, 'one\n', 'utf8');

        const events = new BoundedChannel<WatchEvent>(10);
        const errors = new BoundedChannel<Error>(10);
        events.trySend(watchEvent(file, 'create'));
        events.trySend(watchEvent(path.join(tempDir, 'missing.txt'), 'write'));
        errors.trySend(new Error('watch limit reached'));
        events.close();
        errors.close();

        const outcomes: ChangeOutcome[] = [];
        const failures: string[] = [];
        const monitor = new ChangeMonitor();

        await monitor.run({ events, errors }, {
            onOutcome: (outcome) => {
                outcomes.push(outcome);
            },
            onError: (error) => {
                failures.push(error.message);
            },
        });

        expect(outcomes.map((outcome) => outcome.kind)).toEqual(['diff', 'missing']);
        expect(failures).toEqual(['watch limit reached']);
    });

    it('routes processing failures to onError and keeps going', async () => {
        const events = new BoundedChannel<WatchEvent>(10);
        const errors = new BoundedChannel<Error>(10);
        events.trySend(watchEvent('locked.txt', 'write'));
        events.trySend(watchEvent('gone.txt', 'write'));
        events.close();
        errors.close();

        const monitor = new ChangeMonitor({
            stat: (filePath) => Promise.reject(errnoError(filePath === 'locked.txt' ? 'EACCES' : 'ENOENT')),
        });
        const onOutcome = vi.fn();
        const onError = vi.fn();

        await monitor.run({ events, errors }, { onOutcome, onError });

        expect(onError).toHaveBeenCalledTimes(1);
        expect(onError.mock.calls[0][0]).toBeInstanceOf(Error);
        expect(onOutcome).toHaveBeenCalledWith({ kind: 'missing', event: watchEvent('gone.txt', 'write') });
    });
});
