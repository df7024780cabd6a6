import type {
    DiffEngineOptions,
    DiffLine,
    DiffResult,
    Opcode,
    Snapshot,
} from '../types/diff.js';
import {
    DEFAULT_CONTEXT_LINES,
    NO_NEWLINE_MARKER,
    computeOpcodes,
    formatUnifiedDiff,
    formatUnifiedRange,
} from './line-matcher.js';

export const DEFAULT_BINARY_SAMPLE_BYTES = 8192;
export const DEFAULT_BINARY_THRESHOLD = 0.3;

const TAB = 0x09;
const LF = 0x0a;
const CR = 0x0d;

/**
 * Approximate binary sniffing over the first `sampleBytes` bytes.
 *
 * Any NUL byte marks the content as binary. Otherwise control bytes (except
 * tab, LF and CR) and every byte from 0x7F up count as non-printable, and the
 * content is binary when they make up more than `threshold` of the sample.
 * This is a heuristic, not a file-format detector.
 */
export function isBinaryContent(
    content: Uint8Array,
    options: { sampleBytes?: number; threshold?: number } = {},
): boolean {
    const sampleLength = Math.min(content.length, options.sampleBytes ?? DEFAULT_BINARY_SAMPLE_BYTES);
    if (sampleLength === 0) return false;

    let nonPrintable = 0;
    for (let i = 0; i < sampleLength; i++) {
        const byte = content[i];
        if (byte === 0x00) return true;
        if ((byte < 0x20 && byte !== TAB && byte !== LF && byte !== CR) || byte >= 0x7f) {
            nonPrintable += 1;
        }
    }

    return nonPrintable / sampleLength > (options.threshold ?? DEFAULT_BINARY_THRESHOLD);
}

/**
 * Decode as UTF-8 and split on `\n`. A terminating newline does not open an
 * extra empty line; a `\r` before it stays part of the line.
 */
export function splitLines(content: Buffer): string[] {
    const text = content.toString('utf8');
    if (text.length === 0) return [];

    const lines = text.split('\n');
    if (lines[lines.length - 1] === '') lines.pop();
    return lines;
}

/** Non-empty content whose last byte is not a line feed. */
export function lacksFinalNewline(content: Uint8Array): boolean {
    return content.length > 0 && content[content.length - 1] !== LF;
}

/**
 * Lines as compared by the matcher. An unterminated last line never equals a
 * terminated one, so gaining or losing the final newline is a change.
 */
function comparisonKeys(lines: readonly string[], missingNewline: boolean): string[] {
    if (!missingNewline || lines.length === 0) return [...lines];
    const keys = [...lines];
    keys[keys.length - 1] += '\n';
    return keys;
}

/** Computes structured and unified diffs between two snapshots of one path. */
export class DiffEngine {
    readonly #options: DiffEngineOptions;

    constructor(options: Partial<DiffEngineOptions> = {}) {
        this.#options = {
            contextLines: Math.max(0, Math.floor(options.contextLines ?? DEFAULT_CONTEXT_LINES)),
            binarySampleBytes: Math.max(1, Math.floor(options.binarySampleBytes ?? DEFAULT_BINARY_SAMPLE_BYTES)),
            binaryThreshold: options.binaryThreshold ?? DEFAULT_BINARY_THRESHOLD,
        };
    }

    get options(): Readonly<DiffEngineOptions> {
        return this.#options;
    }

    isBinary(content: Uint8Array): boolean {
        return isBinaryContent(content, {
            sampleBytes: this.#options.binarySampleBytes,
            threshold: this.#options.binaryThreshold,
        });
    }

    compute(previous: Snapshot, current: Snapshot): DiffResult {
        const result: DiffResult = {
            path: current.path,
            lines: [],
            hasDiff: false,
            isNew: false,
            isDeleted: false,
            isBinary: false,
            unifiedText: '',
        };

        if (previous.exists && !current.exists) {
            result.hasDiff = true;
            result.isDeleted = true;

            if (this.isBinary(previous.content)) {
                result.isBinary = true;
                result.unifiedText = `Binary file ${previous.path} deleted\n`;
                return result;
            }

            const oldLines = splitLines(previous.content);
            result.lines = oldLines.map((content, index): DiffLine => ({
                kind: 'deleted',
                oldLineNumber: index + 1,
                content,
            }));
            result.unifiedText = wholeFileDiff(
                previous.path,
                '/dev/null',
                oldLines,
                '-',
                lacksFinalNewline(previous.content),
            );
            return result;
        }

        if (!previous.exists && current.exists) {
            result.hasDiff = true;
            result.isNew = true;

            if (this.isBinary(current.content)) {
                result.isBinary = true;
                result.unifiedText = `Binary file ${current.path} created\n`;
                return result;
            }

            const newLines = splitLines(current.content);
            result.lines = newLines.map((content, index): DiffLine => ({
                kind: 'added',
                newLineNumber: index + 1,
                content,
            }));
            result.unifiedText = wholeFileDiff(
                '/dev/null',
                current.path,
                newLines,
                '+',
                lacksFinalNewline(current.content),
            );
            return result;
        }

        if (previous.exists && current.exists) {
            const oldIsBinary = this.isBinary(previous.content);
            const newIsBinary = this.isBinary(current.content);

            if (oldIsBinary || newIsBinary) {
                result.isBinary = true;
                result.hasDiff = true;
                if (oldIsBinary && newIsBinary) {
                    result.unifiedText = `Binary file ${current.path} modified\n`;
                } else if (newIsBinary) {
                    result.unifiedText = `File ${current.path} changed from text to binary\n`;
                } else {
                    result.unifiedText = `File ${current.path} changed from binary to text\n`;
                }
                return result;
            }

            const oldLines = splitLines(previous.content);
            const newLines = splitLines(current.content);
            const fromMissingNewline = lacksFinalNewline(previous.content);
            const toMissingNewline = lacksFinalNewline(current.content);
            const opcodes = computeOpcodes(
                comparisonKeys(oldLines, fromMissingNewline),
                comparisonKeys(newLines, toMissingNewline),
            );

            result.lines = toDiffLines(opcodes, oldLines, newLines);
            result.unifiedText = formatUnifiedDiff(oldLines, newLines, opcodes, {
                fromFile: previous.path,
                toFile: current.path,
                context: this.#options.contextLines,
                fromMissingNewline,
                toMissingNewline,
            });
            result.hasDiff = result.unifiedText.length > 0;
        }

        return result;
    }
}

/** Replace spans are emitted as the whole old block followed by the whole new block. */
function toDiffLines(opcodes: readonly Opcode[], oldLines: readonly string[], newLines: readonly string[]): DiffLine[] {
    const lines: DiffLine[] = [];

    for (const op of opcodes) {
        switch (op.tag) {
            case 'equal':
                for (let i = op.i1; i < op.i2; i++) {
                    lines.push({
                        kind: 'unchanged',
                        oldLineNumber: i + 1,
                        newLineNumber: op.j1 + (i - op.i1) + 1,
                        content: oldLines[i],
                    });
                }
                break;
            case 'delete':
            case 'insert':
            case 'replace':
                for (let i = op.i1; i < op.i2; i++) {
                    lines.push({ kind: 'deleted', oldLineNumber: i + 1, content: oldLines[i] });
                }
                for (let j = op.j1; j < op.j2; j++) {
                    lines.push({ kind: 'added', newLineNumber: j + 1, content: newLines[j] });
                }
                break;
        }
    }

    return lines;
}

function wholeFileDiff(
    fromFile: string,
    toFile: string,
    lines: readonly string[],
    marker: '-' | '+',
    missingNewline: boolean,
): string {
    const header = `--- ${fromFile}\n+++ ${toFile}\n`;
    if (lines.length === 0) return header;

    const full = formatUnifiedRange(0, lines.length);
    const empty = formatUnifiedRange(0, 0);
    const hunk = marker === '-' ? `@@ -${full} +${empty} @@\n` : `@@ -${empty} +${full} @@\n`;
    const tail = missingNewline ? `${NO_NEWLINE_MARKER}\n` : '';
    return header + hunk + lines.map((line) => `${marker}${line}\n`).join('') + tail;
}
