import { z } from 'zod';
import type { FileChangeRecord } from './change.js';

export type Category = 'feature' | 'fix' | 'refactor' | 'docs' | 'other';

/** Tie-break order, strongest first. */
export const CATEGORY_PRIORITY: readonly Category[] = ['fix', 'feature', 'refactor', 'docs', 'other'];

export type SummarySource = 'ai' | 'heuristic';

export interface CommitTotals {
  files: number;
  insertions: number;
  deletions: number;
}

export interface CommitAnalysis {
  id: string;
  author: string;
  timestamp: string;
  subject: string;
  files: FileChangeRecord[];
  totals: CommitTotals;
  breaking: boolean;
  breakingReasons: string[];
  category: Category;
  summary: string;
  rationale?: string;
  summarySource: SummarySource;
}

const lineRangeSchema = z.object({
  start: z.number().int(),
  end: z.number().int(),
});

const fileChangeRecordSchema = z.object({
  path: z.string(),
  oldPath: z.string().optional(),
  kind: z.enum(['added', 'modified', 'deleted', 'renamed', 'binary']),
  insertions: z.number().int().nonnegative(),
  deletions: z.number().int().nonnegative(),
  ranges: z.array(lineRangeSchema),
  symbols: z.array(z.string()),
  types: z.array(z.string()),
  anomaly: z.string().optional(),
});

/** Shape check for analyses read back from storage. */
export const commitAnalysisSchema = z.object({
  id: z.string().min(1),
  author: z.string(),
  timestamp: z.string(),
  subject: z.string(),
  files: z.array(fileChangeRecordSchema),
  totals: z.object({
    files: z.number().int().nonnegative(),
    insertions: z.number().int().nonnegative(),
    deletions: z.number().int().nonnegative(),
  }),
  breaking: z.boolean(),
  breakingReasons: z.array(z.string()),
  category: z.enum(['feature', 'fix', 'refactor', 'docs', 'other']),
  summary: z.string(),
  rationale: z.string().optional(),
  summarySource: z.enum(['ai', 'heuristic']),
}) satisfies z.ZodType<CommitAnalysis>;

/** Fixed-width short commit id, padded when the id itself is shorter. */
export function shortId(id: string, width = 7): string {
  return id.slice(0, width).padEnd(width, ' ');
}
