/** Captured content of a file that existed when it was read. */
export interface PresentSnapshot {
    readonly path: string;
    readonly exists: true;
    readonly content: Buffer;
}

/** A file that did not exist (or was never read) at capture time. */
export interface AbsentSnapshot {
    readonly path: string;
    readonly exists: false;
}

export type Snapshot = PresentSnapshot | AbsentSnapshot;

/** Snapshot pair returned by `SnapshotStore.update`. */
export interface SnapshotUpdate {
    previous: Snapshot;
    current: Snapshot;
}

export type DiffLineKind = 'unchanged' | 'added' | 'deleted';

export interface DiffLine {
    kind: DiffLineKind;
    /** 1-based line number in the old content; absent for added lines. */
    oldLineNumber?: number;
    /** 1-based line number in the new content; absent for deleted lines. */
    newLineNumber?: number;
    content: string;
}

export interface DiffResult {
    path: string;
    lines: DiffLine[];
    hasDiff: boolean;
    isNew: boolean;
    isDeleted: boolean;
    /** When set, `lines` is always empty. */
    isBinary: boolean;
    unifiedText: string;
}

export type OpcodeTag = 'equal' | 'delete' | 'insert' | 'replace';

/** Half-open spans: `a[i1, i2)` aligns with `b[j1, j2)`. */
export interface Opcode {
    readonly tag: OpcodeTag;
    readonly i1: number;
    readonly i2: number;
    readonly j1: number;
    readonly j2: number;
}

export interface DiffEngineOptions {
    /** Unchanged lines shown around each hunk of the unified text. @default 3 */
    contextLines: number;
    /** Bytes inspected by the binary heuristic. @default 8192 */
    binarySampleBytes: number;
    /** Non-printable ratio above which content counts as binary. @default 0.3 */
    binaryThreshold: number;
}
