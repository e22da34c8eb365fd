import { splitLines } from '../text.js';

/**
 * Line-level diff used to preview a change before it is written.
 *
 * Common leading and trailing lines are skipped; the middle is aligned with a
 * longest-common-subsequence table.
 */
export type DiffLineKind = 'same' | 'added' | 'removed';

export interface DiffLine {
  kind: DiffLineKind;
  text: string;
}

export interface DiffResult {
  changed: boolean;
  added: number;
  removed: number;
  lines: DiffLine[];
}

function alignMiddle(oldLines: readonly string[], newLines: readonly string[]): DiffLine[] {
  const rows = oldLines.length;
  const cols = newLines.length;
  // table[i][j]: LCS length of oldLines[i..] and newLines[j..]
  const table: number[][] = Array.from({ length: rows + 1 }, () => new Array<number>(cols + 1).fill(0));
  for (let i = rows - 1; i >= 0; i -= 1) {
    const row = table[i] ?? [];
    const below = table[i + 1] ?? [];
    for (let j = cols - 1; j >= 0; j -= 1) {
      row[j] = oldLines[i] === newLines[j] ? (below[j + 1] ?? 0) + 1 : Math.max(below[j] ?? 0, row[j + 1] ?? 0);
    }
  }

  const out: DiffLine[] = [];
  let i = 0;
  let j = 0;
  while (i < rows && j < cols) {
    const oldLine = oldLines[i] ?? '';
    const newLine = newLines[j] ?? '';
    if (oldLine === newLine) {
      out.push({ kind: 'same', text: oldLine });
      i += 1;
      j += 1;
    } else if ((table[i + 1]?.[j] ?? 0) >= (table[i]?.[j + 1] ?? 0)) {
      out.push({ kind: 'removed', text: oldLine });
      i += 1;
    } else {
      out.push({ kind: 'added', text: newLine });
      j += 1;
    }
  }
  for (; i < rows; i += 1) out.push({ kind: 'removed', text: oldLines[i] ?? '' });
  for (; j < cols; j += 1) out.push({ kind: 'added', text: newLines[j] ?? '' });
  return out;
}

export function previewDiff(oldText: string, newText: string): DiffResult {
  const oldLines = splitLines(oldText).lines;
  const newLines = splitLines(newText).lines;

  let prefix = 0;
  while (prefix < oldLines.length && prefix < newLines.length && oldLines[prefix] === newLines[prefix]) {
    prefix += 1;
  }
  let suffix = 0;
  while (
    suffix < oldLines.length - prefix &&
    suffix < newLines.length - prefix &&
    oldLines[oldLines.length - 1 - suffix] === newLines[newLines.length - 1 - suffix]
  ) {
    suffix += 1;
  }

  const lines: DiffLine[] = [
    ...oldLines.slice(0, prefix).map((text): DiffLine => ({ kind: 'same', text })),
    ...alignMiddle(oldLines.slice(prefix, oldLines.length - suffix), newLines.slice(prefix, newLines.length - suffix)),
    ...oldLines.slice(oldLines.length - suffix).map((text): DiffLine => ({ kind: 'same', text })),
  ];
  const added = lines.filter((line) => line.kind === 'added').length;
  const removed = lines.filter((line) => line.kind === 'removed').length;
  return { changed: added > 0 || removed > 0 || oldText !== newText, added, removed, lines };
}

/**
 * Changed lines only, `− old` / `+ new`, or `(no changes)`.
 */
export function formatDiff(result: DiffResult): string {
  const changed = result.lines.filter((line) => line.kind !== 'same');
  if (changed.length === 0) return '(no changes)';
  return changed.map((line) => `${line.kind === 'removed' ? '−' : '+'} ${line.text}`).join('\n');
}
