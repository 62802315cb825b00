import type { Category, CommitAnalysis } from '../src/model/analysis.js';
import type { FileChangeRecord } from '../src/model/change.js';
import type { CommitDescriptor, FileDiff } from '../src/git/types.js';

export function diffOf(lines: string[]): string {
  return lines.join('\n') + '\n';
}

/** A modified file whose only hunk removes `removed` lines and adds `added`. */
export function changedFile(path: string, added: number, removed = 0): FileDiff {
  const lines = [`diff --git a/${path} b/${path}`, `--- a/${path}`, `+++ b/${path}`, `@@ -1,${removed} +1,${added} @@`];
  for (let i = 0; i < removed; i++) lines.push(`-old line ${i}`);
  for (let i = 0; i < added; i++) lines.push(`+new line ${i}`);
  return { path, diff: diffOf(lines) };
}

export function descriptor(
  id: string,
  message: string,
  files: FileDiff[],
  timestamp = '2024-03-04T09:00:00+00:00',
  author = 'Ada',
): CommitDescriptor {
  return { id, author, timestamp, message, files };
}

export interface CommitShape {
  subject: string;
  category: Category;
  insertions?: number;
  deletions?: number;
  paths?: string[];
  timestamp?: string;
  author?: string;
  breaking?: boolean;
}

/** A ready-made analysis; the first path carries all the line counts. */
export function analysis(id: string, shape: CommitShape): CommitAnalysis {
  const insertions = shape.insertions ?? 0;
  const deletions = shape.deletions ?? 0;
  const paths = shape.paths ?? ['src/index.ts'];
  const files: FileChangeRecord[] = paths.map((path, i) => ({
    path,
    kind: 'modified',
    insertions: i === 0 ? insertions : 0,
    deletions: i === 0 ? deletions : 0,
    ranges: [],
    symbols: [],
    types: [],
  }));

  return {
    id,
    author: shape.author ?? 'Ada',
    timestamp: shape.timestamp ?? '2024-03-04T09:00:00Z',
    subject: shape.subject,
    files,
    totals: { files: files.length, insertions, deletions },
    breaking: shape.breaking ?? false,
    breakingReasons: shape.breaking ? ['marked breaking'] : [],
    category: shape.category,
    summary: `Updated ${files.length} files`,
    rationale: 'test rationale',
    summarySource: 'heuristic',
  };
}
