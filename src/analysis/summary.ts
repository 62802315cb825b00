import type { FileChangeRecord } from '../model/change.js';
import type { CommitTotals } from '../model/analysis.js';
import { getExtension } from '../utils/path.js';
import { basename } from 'node:path';

function extensionLabel(path: string): string {
  return getExtension(path) || basename(path);
}

/**
 * The extension touched by the most files. Ties go to the one with more
 * changed lines, then alphabetical.
 */
export function topExtension(files: readonly FileChangeRecord[]): string | undefined {
  const stats = new Map<string, { files: number; lines: number }>();
  for (const file of files) {
    const label = extensionLabel(file.path);
    const entry = stats.get(label) ?? { files: 0, lines: 0 };
    entry.files++;
    entry.lines += file.insertions + file.deletions;
    stats.set(label, entry);
  }

  let best: string | undefined;
  let bestStats = { files: -1, lines: -1 };
  for (const [label, entry] of [...stats.entries()].sort(([a], [b]) => a.localeCompare(b))) {
    if (entry.files > bestStats.files || (entry.files === bestStats.files && entry.lines > bestStats.lines)) {
      best = label;
      bestStats = entry;
    }
  }
  return best;
}

export function heuristicSummary(files: readonly FileChangeRecord[], totals: CommitTotals): string {
  const noun = totals.files === 1 ? 'file' : 'files';
  let text = `Updated ${totals.files} ${noun}, total +${totals.insertions}/-${totals.deletions} lines`;
  const top = topExtension(files);
  if (top) text += `, primarily touching ${top}`;
  return text;
}

export function heuristicRationale(files: readonly FileChangeRecord[]): string {
  if (files.length === 0) return 'No file changes.';

  let largest = files[0];
  for (const file of files) {
    if (file.insertions + file.deletions > largest.insertions + largest.deletions) largest = file;
  }

  const parts = [`Largest change: ${largest.path} (+${largest.insertions}/-${largest.deletions}).`];
  const symbols = [...new Set(files.flatMap(f => f.symbols))].sort();
  if (symbols.length > 0) {
    const shown = symbols.slice(0, 8).join(', ');
    parts.push(`Changed symbols: ${shown}${symbols.length > 8 ? `, +${symbols.length - 8} more` : ''}.`);
  }
  return parts.join(' ');
}
