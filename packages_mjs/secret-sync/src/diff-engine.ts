/**
 * Unified-diff rendering for push previews.
 *
 * Lines are compared by position, not by longest common subsequence: row i of
 * the old text is compared with row i of the new text. Consecutive differing
 * rows form a change block (removals, then additions) and each block carries up
 * to CONTEXT_LINES unchanged rows on either side. Blocks whose context would
 * touch are rendered as one hunk.
 */
import { DiffResult, SecretPayload } from './domain.js';
import { encodePayload } from './yaml-codec.js';

export const CONTEXT_LINES = 3;
export const EMPTY_HASH = '0000000';

const FILE_MODE = '100644';
const HASH_MODULUS = 0xfffffff;

interface ChangeBlock {
    start: number;
    end: number; // exclusive
}

/**
 * Cosmetic 7-hex-digit fingerprint for `index` lines. Not an integrity check.
 */
export function shortHash(content: string): string {
    let hash = 0;
    for (let i = 0; i < content.length; i++) {
        hash = (Math.imul(hash, 31) + content.charCodeAt(i)) | 0;
    }
    return (Math.abs(hash) % HASH_MODULUS).toString(16).padStart(7, '0');
}

export function splitLines(text: string): string[] {
    if (text === '') return [];
    const lines = text.split('\n');
    if (lines[lines.length - 1] === '') {
        lines.pop();
    }
    return lines;
}

function changeBlocks(oldLines: string[], newLines: string[]): ChangeBlock[] {
    const rows = Math.max(oldLines.length, newLines.length);
    const blocks: ChangeBlock[] = [];
    let current: ChangeBlock | null = null;

    for (let i = 0; i < rows; i++) {
        const differs = i >= oldLines.length || i >= newLines.length || oldLines[i] !== newLines[i];
        if (differs) {
            if (current) {
                current.end = i + 1;
            } else {
                current = { start: i, end: i + 1 };
                blocks.push(current);
            }
        } else {
            current = null;
        }
    }
    return blocks;
}

function groupIntoHunks(blocks: ChangeBlock[]): ChangeBlock[][] {
    const hunks: ChangeBlock[][] = [];
    for (const block of blocks) {
        const last = hunks[hunks.length - 1];
        const previous = last?.[last.length - 1];
        if (last && previous && block.start - previous.end <= 2 * CONTEXT_LINES) {
            last.push(block);
        } else {
            hunks.push([block]);
        }
    }
    return hunks;
}

function renderHunk(blocks: ChangeBlock[], oldLines: string[], newLines: string[]): string[] {
    const rows = Math.max(oldLines.length, newLines.length);
    const from = Math.max(0, blocks[0].start - CONTEXT_LINES);
    const to = Math.min(rows, blocks[blocks.length - 1].end + CONTEXT_LINES);

    const body: string[] = [];
    let oldCount = 0;
    let newCount = 0;
    let next = 0;

    for (let i = from; i < to;) {
        const block = blocks[next];
        if (block && i === block.start) {
            for (let j = block.start; j < block.end && j < oldLines.length; j++) {
                body.push(`-${oldLines[j]}`);
                oldCount++;
            }
            for (let j = block.start; j < block.end && j < newLines.length; j++) {
                body.push(`+${newLines[j]}`);
                newCount++;
            }
            i = block.end;
            next++;
            continue;
        }
        body.push(` ${oldLines[i]}`);
        oldCount++;
        newCount++;
        i++;
    }

    const oldStart = oldCount === 0 ? Math.min(from, oldLines.length) : from + 1;
    const newStart = newCount === 0 ? Math.min(from, newLines.length) : from + 1;
    return [`@@ -${oldStart},${oldCount} +${newStart},${newCount} @@`, ...body];
}

/**
 * Unified diff between two texts, or the empty string when they are equal.
 */
export function renderUnifiedDiff(oldText: string, newText: string, label: string): string {
    if (oldText === newText) {
        return '';
    }

    const oldLines = splitLines(oldText);
    const newLines = splitLines(newText);

    const lines = [
        `diff --git a/${label} b/${label}`,
        `index ${shortHash(oldText)}..${shortHash(newText)} ${FILE_MODE}`,
        `--- a/${label}`,
        `+++ b/${label}`
    ];
    for (const hunk of groupIntoHunks(changeBlocks(oldLines, newLines))) {
        lines.push(...renderHunk(hunk, oldLines, newLines));
    }
    return lines.join('\n') + '\n';
}

/**
 * Diff for a secret that does not exist remotely yet.
 */
export function renderNewFileDiff(newText: string, label: string): string {
    const newLines = splitLines(newText);
    const lines = [
        `diff --git a/${label} b/${label}`,
        `new file mode ${FILE_MODE}`,
        `index ${EMPTY_HASH}..${shortHash(newText)}`,
        '--- /dev/null',
        `+++ b/${label}`,
        `@@ -0,0 +1,${newLines.length} @@`,
        ...newLines.map(line => `+${line}`)
    ];
    return lines.join('\n') + '\n';
}

/**
 * Compares the remote payload (undefined when the secret is absent) with the
 * proposed one.
 */
export function diffPayloads(existing: SecretPayload | undefined, next: SecretPayload, label: string): DiffResult {
    const newText = encodePayload(next);
    const hash = shortHash(newText);

    if (existing === undefined) {
        return { changed: true, text: renderNewFileDiff(newText, label), hash };
    }

    const text = renderUnifiedDiff(encodePayload(existing), newText, label);
    return { changed: text !== '', text, hash };
}
