import type { Category, CommitAnalysis } from '../model/analysis.js';
import { CATEGORY_PRIORITY, shortId } from '../model/analysis.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { RenderConflictError } from '../errors.js';

export type GroupingPolicy =
  | { kind: 'day' }
  /** A session ends after each listed commit (full id or a prefix of at least 7 characters). */
  | { kind: 'batch'; boundaries: readonly string[] };

export interface SessionEntry {
  shortId: string;
  text: string;
  author: string;
  breaking: boolean;
}

export interface Mood {
  emoji: string;
  label: string;
}

export interface ChangelogSession {
  key: string;
  date: string;
  commits: CommitAnalysis[];
  commitCount: number;
  fileCount: number;
  insertions: number;
  deletions: number;
  netDelta: number;
  buckets: Record<Category, SessionEntry[]>;
  contributors: string[];
  dominant: Category;
  mood: Mood;
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}/;

/** Calendar date of a timestamp as written by the source, without shifting time zones. */
export function dateOf(timestamp: string): string {
  const m = ISO_DATE.exec(timestamp.trim());
  if (m) return m[0];
  const parsed = new Date(timestamp);
  return Number.isNaN(parsed.getTime()) ? 'unknown' : parsed.toISOString().slice(0, 10);
}

export function entryFor(analysis: CommitAnalysis): SessionEntry {
  return {
    shortId: shortId(analysis.id),
    text: analysis.summarySource === 'ai' ? analysis.summary : analysis.subject,
    author: analysis.author,
    breaking: analysis.breaking,
  };
}

/** Majority category; ties go to the stronger category. */
export function dominantCategory(commits: readonly CommitAnalysis[]): Category {
  const counts = new Map<Category, number>();
  for (const commit of commits) {
    counts.set(commit.category, (counts.get(commit.category) ?? 0) + 1);
  }

  let best: Category = 'other';
  let bestCount = 0;
  for (const category of CATEGORY_PRIORITY) {
    const count = counts.get(category) ?? 0;
    if (count > bestCount) {
      best = category;
      bestCount = count;
    }
  }
  return best;
}

export function moodFor(dominant: Category, netDelta: number): Mood {
  switch (dominant) {
    case 'fix':
      return { emoji: '🐛', label: 'Bug Squashing Session' };
    case 'feature':
      return netDelta > 0 ? { emoji: '🚀', label: 'Feature Blast' } : { emoji: '✨', label: 'Feature Tuning' };
    case 'refactor':
      return netDelta < 0 ? { emoji: '🧹', label: 'Spring Cleaning' } : { emoji: '♻️', label: 'Cleanup Spree' };
    case 'docs':
      return { emoji: '📚', label: 'Docs Day' };
    case 'other':
      if (netDelta > 0) return { emoji: '📈', label: 'Growth Spurt' };
      if (netDelta < 0) return { emoji: '✂️', label: 'Trim Down' };
      return { emoji: '⚡', label: 'Steady Progress' };
  }
}

export function buildSession(key: string, date: string, commits: CommitAnalysis[]): ChangelogSession {
  const buckets: Record<Category, SessionEntry[]> = { feature: [], fix: [], refactor: [], docs: [], other: [] };
  const paths = new Set<string>();
  const contributors = new Set<string>();
  let insertions = 0;
  let deletions = 0;

  for (const commit of commits) {
    buckets[commit.category].push(entryFor(commit));
    for (const file of commit.files) paths.add(file.path);
    contributors.add(commit.author);
    insertions += commit.totals.insertions;
    deletions += commit.totals.deletions;
  }

  const netDelta = insertions - deletions;
  const dominant = dominantCategory(commits);

  return {
    key,
    date,
    commits,
    commitCount: commits.length,
    fileCount: paths.size,
    insertions,
    deletions,
    netDelta,
    buckets,
    contributors: [...contributors].sort(),
    dominant,
    mood: moodFor(dominant, netDelta),
  };
}

function isBoundary(id: string, boundaries: readonly string[]): boolean {
  return boundaries.some(b => b === id || (b.length >= 7 && id.startsWith(b)));
}

/**
 * Folds analyses, in source order, into sessions.
 *
 * By day, a session only ever moves forward in time: a commit dated before
 * the running session stays in it (source order wins over clock skew).
 */
export function groupSessions(
  analyses: readonly CommitAnalysis[],
  policy: GroupingPolicy,
  logger: Logger = silentLogger,
): ChangelogSession[] {
  const sessions: ChangelogSession[] = [];
  let run: CommitAnalysis[] = [];
  let runKey = '';
  let runDate = '';

  const flush = () => {
    if (run.length > 0) sessions.push(buildSession(runKey, runDate, run));
    run = [];
  };

  for (const analysis of analyses) {
    const date = dateOf(analysis.timestamp);

    if (policy.kind === 'day') {
      if (run.length === 0 || date > runDate) {
        flush();
        runKey = date;
        runDate = date;
      } else if (date < runDate) {
        const conflict = new RenderConflictError(
          analysis.id,
          `Out-of-order commit ${shortId(analysis.id)}: dated ${date}, kept in session ${runDate}`,
        );
        logger.warn(conflict.message, { commit: analysis.id });
      }
      run.push(analysis);
      continue;
    }

    if (run.length === 0) {
      runKey = `batch-${analysis.id.slice(0, 7)}`;
      runDate = date;
    }
    run.push(analysis);
    if (isBoundary(analysis.id, policy.boundaries)) flush();
  }

  flush();
  return sessions;
}
