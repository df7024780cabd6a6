import type { Opcode, OpcodeTag } from '../types/diff.js';

export interface UnifiedDiffOptions {
    fromFile: string;
    toFile: string;
    /** Unchanged lines kept around each change. @default 3 */
    context?: number;
    /** The last line of `a` has no terminating newline. */
    fromMissingNewline?: boolean;
    /** The last line of `b` has no terminating newline. */
    toMissingNewline?: boolean;
}

export const DEFAULT_CONTEXT_LINES = 3;

export const NO_NEWLINE_MARKER = '\\ No newline at end of file';

/**
 * Upper bound on the edit distance explored from each end when splitting one
 * sub-range. A sub-range that needs more is reported as a single change.
 */
const MAX_SEARCH_STEPS = 2048;

interface LineMatch {
    i: number;
    j: number;
}

interface SearchRange {
    aLo: number;
    aHi: number;
    bLo: number;
    bHi: number;
}

/**
 * Align two line sequences and describe the result as opcodes.
 *
 * The alignment is a longest common subsequence found with the linear-space
 * variant of Myers' O(ND) search. Lines that occur nowhere in the other
 * sequence are set aside first, since they can never be matched. Changes
 * between two matched runs are merged into a single `replace`.
 */
export function computeOpcodes(a: readonly string[], b: readonly string[]): Opcode[] {
    const opcodes: Opcode[] = [];
    let i = 0;
    let j = 0;

    const matches = matchLines(a, b);
    let index = 0;
    while (index < matches.length) {
        const first = matches[index];
        let last = first;
        index += 1;
        while (index < matches.length && matches[index].i === last.i + 1 && matches[index].j === last.j + 1) {
            last = matches[index];
            index += 1;
        }

        pushChange(opcodes, i, first.i, j, first.j);
        opcodes.push({ tag: 'equal', i1: first.i, i2: last.i + 1, j1: first.j, j2: last.j + 1 });
        i = last.i + 1;
        j = last.j + 1;
    }

    pushChange(opcodes, i, a.length, j, b.length);
    return opcodes;
}

function pushChange(opcodes: Opcode[], i1: number, i2: number, j1: number, j2: number): void {
    if (i1 === i2 && j1 === j2) return;

    let tag: OpcodeTag = 'insert';
    if (i1 < i2 && j1 < j2) {
        tag = 'replace';
    } else if (i1 < i2) {
        tag = 'delete';
    }
    opcodes.push({ tag, i1, i2, j1, j2 });
}

/**
 * Split opcodes into hunks with at most `context` unchanged lines on either
 * side of each change. Returns no hunks when nothing changed.
 */
export function groupOpcodes(opcodes: readonly Opcode[], context: number = DEFAULT_CONTEXT_LINES): Opcode[][] {
    if (!opcodes.some((op) => op.tag !== 'equal')) return [];

    const codes: Opcode[] = [...opcodes];

    const first = codes[0];
    if (first.tag === 'equal') {
        codes[0] = {
            ...first,
            i1: Math.max(first.i1, first.i2 - context),
            j1: Math.max(first.j1, first.j2 - context),
        };
    }

    const lastIndex = codes.length - 1;
    const last = codes[lastIndex];
    if (last.tag === 'equal') {
        codes[lastIndex] = {
            ...last,
            i2: Math.min(last.i2, last.i1 + context),
            j2: Math.min(last.j2, last.j1 + context),
        };
    }

    const groups: Opcode[][] = [];
    let group: Opcode[] = [];

    for (const op of codes) {
        let { i1, j1 } = op;

        // Long unchanged run: close the current hunk and open the next one.
        if (op.tag === 'equal' && op.i2 - op.i1 > context * 2) {
            group.push({
                tag: 'equal',
                i1,
                i2: Math.min(op.i2, i1 + context),
                j1,
                j2: Math.min(op.j2, j1 + context),
            });
            groups.push(group);
            group = [];
            i1 = Math.max(i1, op.i2 - context);
            j1 = Math.max(j1, op.j2 - context);
        }

        group.push({ tag: op.tag, i1, i2: op.i2, j1, j2: op.j2 });
    }

    if (group.length > 0 && !(group.length === 1 && group[0].tag === 'equal')) {
        groups.push(group);
    }

    return groups;
}

/** `start,length` range of a unified hunk header (1-based, `length` omitted when 1). */
export function formatUnifiedRange(start: number, stop: number): string {
    const length = stop - start;
    if (length === 1) return `${start + 1}`;
    const beginning = length === 0 ? start : start + 1;
    return `${beginning},${length}`;
}

/**
 * Render opcodes as a unified diff. Every emitted line ends with `\n`; a side
 * whose last line lacks a newline gets `\ No newline at end of file` after it.
 * Returns an empty string when the sequences are equal.
 */
export function formatUnifiedDiff(
    a: readonly string[],
    b: readonly string[],
    opcodes: readonly Opcode[],
    options: UnifiedDiffOptions,
): string {
    const groups = groupOpcodes(opcodes, options.context ?? DEFAULT_CONTEXT_LINES);
    if (groups.length === 0) return '';

    // Index of the line followed by the no-newline marker, or -1.
    const fromLast = options.fromMissingNewline ? a.length - 1 : -1;
    const toLast = options.toMissingNewline ? b.length - 1 : -1;
    const out: string[] = [`--- ${options.fromFile}\n`, `+++ ${options.toFile}\n`];

    for (const group of groups) {
        const first = group[0];
        const last = group[group.length - 1];
        out.push(
            `@@ -${formatUnifiedRange(first.i1, last.i2)} +${formatUnifiedRange(first.j1, last.j2)} @@\n`,
        );

        for (const op of group) {
            if (op.tag === 'equal') {
                for (let i = op.i1; i < op.i2; i++) {
                    out.push(` ${a[i]}\n`);
                    if (fromLast === i) out.push(`${NO_NEWLINE_MARKER}\n`);
                }
                continue;
            }
            if (op.tag === 'delete' || op.tag === 'replace') {
                for (let i = op.i1; i < op.i2; i++) {
                    out.push(`-${a[i]}\n`);
                    if (fromLast === i) out.push(`${NO_NEWLINE_MARKER}\n`);
                }
            }
            if (op.tag === 'insert' || op.tag === 'replace') {
                for (let j = op.j1; j < op.j2; j++) {
                    out.push(`+${b[j]}\n`);
                    if (toLast === j) out.push(`${NO_NEWLINE_MARKER}\n`);
                }
            }
        }
    }

    return out.join('');
}

// ── Myers search ──────────────────────────────────────────────────────────────

/** Matched line pairs, ascending in both sequences. */
function matchLines(a: readonly string[], b: readonly string[]): LineMatch[] {
    const ids = new Map<string, number>();
    const intern = (line: string): number => {
        let id = ids.get(line);
        if (id === undefined) {
            id = ids.size;
            ids.set(line, id);
        }
        return id;
    };

    const aIds = a.map(intern);
    const bIds = b.map(intern);
    const inA = new Set(aIds);
    const inB = new Set(bIds);

    const aKept: number[] = [];
    aIds.forEach((id, index) => {
        if (inB.has(id)) aKept.push(index);
    });
    const bKept: number[] = [];
    bIds.forEach((id, index) => {
        if (inA.has(id)) bKept.push(index);
    });

    const x = Int32Array.from(aKept, (index) => aIds[index]);
    const y = Int32Array.from(bKept, (index) => bIds[index]);

    const matches: LineMatch[] = [];
    const pending: SearchRange[] = [{ aLo: 0, aHi: x.length, bLo: 0, bHi: y.length }];

    for (let range = pending.pop(); range; range = pending.pop()) {
        let { aLo, aHi, bLo, bHi } = range;

        while (aLo < aHi && bLo < bHi && x[aLo] === y[bLo]) {
            matches.push({ i: aKept[aLo], j: bKept[bLo] });
            aLo += 1;
            bLo += 1;
        }
        while (aLo < aHi && bLo < bHi && x[aHi - 1] === y[bHi - 1]) {
            aHi -= 1;
            bHi -= 1;
            matches.push({ i: aKept[aHi], j: bKept[bHi] });
        }
        if (aLo === aHi || bLo === bHi) continue;

        const split = findSplit(x, y, { aLo, aHi, bLo, bHi });
        if (!split) continue;

        pending.push(
            { aLo, aHi: split.i, bLo, bHi: split.j },
            { aLo: split.i, aHi, bLo: split.j, bHi },
        );
    }

    return matches.sort((p, q) => p.i - q.i);
}

/**
 * Bisect a range whose ends differ: run the search forward from the start and
 * backward from the end until the two frontiers overlap, and return the point
 * where they meet. Both halves then need strictly fewer edits than the whole.
 * Returns `null` once `MAX_SEARCH_STEPS` is exhausted.
 */
function findSplit(x: Int32Array, y: Int32Array, range: SearchRange): LineMatch | null {
    const n = range.aHi - range.aLo;
    const m = range.bHi - range.bLo;
    const delta = n - m;
    const frontOverlaps = delta % 2 !== 0;
    const steps = Math.min(Math.ceil((n + m) / 2), MAX_SEARCH_STEPS);
    const offset = steps + 1;
    const length = 2 * steps + 3;

    const forward = new Int32Array(length).fill(-1);
    const backward = new Int32Array(length).fill(-1);
    forward[offset + 1] = 0;
    backward[offset + 1] = 0;

    // Diagonals that ran off the grid are skipped in later rounds.
    let forwardStart = 0;
    let forwardEnd = 0;
    let backwardStart = 0;
    let backwardEnd = 0;

    for (let d = 0; d < steps; d++) {
        for (let k = -d + forwardStart; k <= d - forwardEnd; k += 2) {
            const at = offset + k;
            let px = k === -d || (k !== d && forward[at - 1] < forward[at + 1])
                ? forward[at + 1]
                : forward[at - 1] + 1;
            let py = px - k;
            while (px < n && py < m && x[range.aLo + px] === y[range.bLo + py]) {
                px += 1;
                py += 1;
            }
            forward[at] = px;

            if (px > n) {
                forwardEnd += 2;
            } else if (py > m) {
                forwardStart += 2;
            } else if (frontOverlaps) {
                const mirror = offset + delta - k;
                if (mirror >= 0 && mirror < length && backward[mirror] !== -1 && px >= n - backward[mirror]) {
                    return { i: range.aLo + px, j: range.bLo + py };
                }
            }
        }

        for (let k = -d + backwardStart; k <= d - backwardEnd; k += 2) {
            const at = offset + k;
            let px = k === -d || (k !== d && backward[at - 1] < backward[at + 1])
                ? backward[at + 1]
                : backward[at - 1] + 1;
            let py = px - k;
            while (px < n && py < m && x[range.aHi - 1 - px] === y[range.bHi - 1 - py]) {
                px += 1;
                py += 1;
            }
            backward[at] = px;

            if (px > n) {
                backwardEnd += 2;
            } else if (py > m) {
                backwardStart += 2;
            } else if (!frontOverlaps) {
                const mirror = offset + delta - k;
                if (mirror >= 0 && mirror < length && forward[mirror] !== -1) {
                    const fx = forward[mirror];
                    const fy = fx - (delta - k);
                    if (fx >= n - px) {
                        return { i: range.aLo + fx, j: range.bLo + fy };
                    }
                }
            }
        }
    }

    return null;
}
