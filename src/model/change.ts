export type ChangeKind = 'added' | 'modified' | 'deleted' | 'renamed' | 'binary';

/** Inclusive line span in the post-change file. */
export interface LineRange {
  start: number;
  end: number;
}

export interface FileChangeRecord {
  path: string;
  oldPath?: string;
  kind: ChangeKind;
  insertions: number;
  deletions: number;
  /** Non-overlapping, ascending. */
  ranges: LineRange[];
  /** Functions, methods and types declared near changed lines. Sorted, unique. */
  symbols: string[];
  /** Subset of `symbols` that are type declarations. */
  types: string[];
  /** Set when the diff could not be read and the record carries no line data. */
  anomaly?: string;
}

/**
 * Sorts ranges and merges those that overlap or touch.
 */
export function normalizeRanges(ranges: readonly LineRange[]): LineRange[] {
  const sorted = [...ranges].sort((a, b) => a.start - b.start || a.end - b.end);
  const merged: LineRange[] = [];

  for (const range of sorted) {
    const last = merged[merged.length - 1];
    if (last && range.start <= last.end + 1) {
      last.end = Math.max(last.end, range.end);
    } else {
      merged.push({ start: range.start, end: range.end });
    }
  }

  return merged;
}
