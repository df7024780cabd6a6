import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, rm, unlink, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { SnapshotStore } from '../../src/services/snapshot-store.js';

function errnoError(code: string): NodeJS.ErrnoException {
    const err: NodeJS.ErrnoException = new Error(`${code}: simulated`);
    err.code = code;
    return err;
}

describe('SnapshotStore', () => {
    let tempDir = '';

    beforeEach(async () => {
        tempDir = await mkdtemp(path.join(os.tmpdir(), 'diffwatch-snapshots-'));
    });

    afterEach(async () => {
        await rm(tempDir, { recursive: true, force: true });
    });

    it('reports an absent previous snapshot on first read', async () => {
        const file = path.join(tempDir, 'notes.txt');
        await writeFile(file, 'first\n', 'utf8');
        const store = new SnapshotStore();

        const { previous, current } = await store.update(file);

        expect(previous).toEqual({ path: file, exists: false });
        expect(current.exists).toBe(true);
        expect(current.exists && current.content.toString('utf8')).toBe('first\n');
        expect(store.size).toBe(1);
    });

    it('returns the prior capture as previous', async () => {
        const file = path.join(tempDir, 'notes.txt');
        const store = new SnapshotStore();

        await writeFile(file, 'one\n', 'utf8');
        await store.update(file);
        await writeFile(file, 'two\n', 'utf8');
        const { previous, current } = await store.update(file);

        expect(previous.exists && previous.content.toString('utf8')).toBe('one\n');
        expect(current.exists && current.content.toString('utf8')).toBe('two\n');
    });

    it('stores an absent snapshot for a file that disappeared', async () => {
        const file = path.join(tempDir, 'gone.txt');
        await writeFile(file, 'bye\n', 'utf8');
        const store = new SnapshotStore();
        await store.update(file);

        await unlink(file);
        const { previous, current } = await store.update(file);

        expect(previous.exists).toBe(true);
        expect(current).toEqual({ path: file, exists: false });
        expect(store.get(file)).toEqual({ path: file, exists: false });
    });

    it('treats a never-existing file as absent on both sides', async () => {
        const file = path.join(tempDir, 'never.txt');
        const store = new SnapshotStore();

        expect(await store.update(file)).toEqual({
            previous: { path: file, exists: false },
            current: { path: file, exists: false },
        });
    });

    it('rejects other read errors and leaves the stored entry alone', async () => {
        const reads: Array<Buffer | NodeJS.ErrnoException> = [Buffer.from('kept\n'), errnoError('EACCES')];
        const store = new SnapshotStore({
            readFile: async () => {
                const next = reads.shift();
                if (next === undefined || next instanceof Error) throw next ?? new Error('no more reads');
                return next;
            },
        });

        await store.update('locked.txt');
        await expect(store.update('locked.txt')).rejects.toThrow(
            "[SnapshotStore] Failed to read 'locked.txt': EACCES: simulated",
        );

        expect(store.get('locked.txt')).toEqual({ path: 'locked.txt', exists: true, content: Buffer.from('kept\n') });
    });

    it('runs concurrent updates of one path in call order', async () => {
        const releases: Array<() => void> = [];
        let reads = 0;
        const store = new SnapshotStore({
            readFile: () => {
                reads += 1;
                const content = Buffer.from(`v${reads}`);
                return new Promise<Buffer>((resolve) => {
                    releases.push(() => resolve(content));
                });
            },
        });

        const first = store.update('a.txt');
        const second = store.update('a.txt');

        await vi.waitFor(() => expect(releases).toHaveLength(1));
        expect(reads).toBe(1);
        releases[0]();

        await vi.waitFor(() => expect(releases).toHaveLength(2));
        releases[1]();

        const [firstUpdate, secondUpdate] = await Promise.all([first, second]);
        expect(firstUpdate.previous.exists).toBe(false);
        expect(firstUpdate.current).toEqual({ path: 'a.txt', exists: true, content: Buffer.from('v1') });
        expect(secondUpdate.previous).toEqual(firstUpdate.current);
        expect(secondUpdate.current).toEqual({ path: 'a.txt', exists: true, content: Buffer.from('v2') });
    });

    it('forgets entries on remove and clear', async () => {
        const store = new SnapshotStore({ readFile: async () => Buffer.from('x') });
        await store.update('a');
        await store.update('b');

        expect(store.remove('a')).toBe(true);
        expect(store.remove('a')).toBe(false);
        expect(store.size).toBe(1);

        store.clear();
        expect(store.size).toBe(0);
        expect(store.get('b')).toBeUndefined();
    });
});
