import { describe, it, expect, vi } from 'vitest';
import { CommitAnalyzer, breakingReasons, sumTotals } from '../src/analysis/analyzer.js';
import type { AiSummary, Summarizer, SummaryRequest } from '../src/ai/summarizer.js';
import { CommitCache } from '../src/storage/cache.js';
import { createLogger } from '../src/utils/logger.js';
import { changedFile, descriptor, diffOf } from './helpers.js';

function capture() {
  const lines: string[] = [];
  const logger = createLogger({ level: 'info', colors: false, sink: line => lines.push(line) });
  return { lines, logger };
}

function fakeSummarizer(reply: AiSummary | (() => Promise<AiSummary>)) {
  const calls: SummaryRequest[] = [];
  const summarizer: Summarizer = {
    name: 'fake',
    summarize: vi.fn(async (request: SummaryRequest) => {
      calls.push(request);
      return typeof reply === 'function' ? reply() : reply;
    }),
  };
  return { summarizer, calls };
}

const deletedLegacy = {
  path: 'src/legacy.ts',
  status: 'deleted' as const,
  priorLineCount: 80,
  diff: diffOf([
    'diff --git a/src/legacy.ts b/src/legacy.ts',
    'deleted file mode 100644',
    '--- a/src/legacy.ts',
    '+++ /dev/null',
    '@@ -1,2 +0,0 @@',
    '-const a = 1;',
    '-const b = 2;',
  ]),
};

describe('breaking flag', () => {
  it('flags a single file over the line threshold', async () => {
    const analyzer = new CommitAnalyzer();
    const result = await analyzer.analyze(descriptor('a1b2c3d4e5', 'Add big module', [changedFile('src/big.ts', 150)]));

    expect(result.breaking).toBe(true);
    expect(result.breakingReasons).toEqual(['src/big.ts changed 150 lines (threshold 100)']);
  });

  it('leaves small commits alone', async () => {
    const analyzer = new CommitAnalyzer();
    const result = await analyzer.analyze(
      descriptor('b1b2c3d4e5', 'Tweak handlers', [changedFile('src/a.ts', 30, 10), changedFile('src/b.ts', 20, 10)]),
    );

    expect(result.totals).toEqual({ files: 2, insertions: 50, deletions: 20 });
    expect(result.breaking).toBe(false);
    expect(result.breakingReasons).toEqual([]);
  });

  it('flags deleted files with their prior size', async () => {
    const analyzer = new CommitAnalyzer();
    const result = await analyzer.analyze(descriptor('c1b2c3d4e5', 'Remove legacy module', [deletedLegacy]));

    expect(result.files[0]).toMatchObject({ kind: 'deleted', deletions: 80, insertions: 0 });
    expect(result.breaking).toBe(true);
    expect(result.breakingReasons).toEqual([
      'src/legacy.ts was deleted (80 lines)',
      'deletions are 100% of changed lines (threshold 40%)',
    ]);
  });

  it('uses configured thresholds', () => {
    const files = [
      { path: 'a.ts', kind: 'modified' as const, insertions: 12, deletions: 18, ranges: [], symbols: [], types: [] },
    ];
    const totals = sumTotals(files);
    expect(breakingReasons(files, totals, { lineThreshold: 100, deletionRatio: 0.5, ratioMinLines: 50 })).toEqual([]);
    expect(breakingReasons(files, totals, { lineThreshold: 25, deletionRatio: 0.5, ratioMinLines: 20 })).toEqual([
      'a.ts changed 30 lines (threshold 25)',
      'deletions are 60% of changed lines (threshold 50%)',
    ]);
  });

  it('applies the deletion ratio to small commits when the minimum is 0', () => {
    const files = [
      { path: 'b.ts', kind: 'modified' as const, insertions: 1, deletions: 2, ranges: [], symbols: [], types: [] },
    ];
    const totals = sumTotals(files);
    expect(breakingReasons(files, totals, { lineThreshold: 100, deletionRatio: 0.4, ratioMinLines: 20 })).toEqual([]);
    expect(breakingReasons(files, totals, { lineThreshold: 100, deletionRatio: 0.4, ratioMinLines: 0 })).toEqual([
      'deletions are 67% of changed lines (threshold 40%)',
    ]);
  });
});

describe('CommitAnalyzer', () => {
  it('builds a heuristic summary when no summarizer is configured', async () => {
    const analyzer = new CommitAnalyzer();
    const result = await analyzer.analyze(descriptor('d1b2c3d4e5', 'Add big module', [changedFile('src/big.ts', 150)]));

    expect(result).toMatchObject({
      id: 'd1b2c3d4e5',
      author: 'Ada',
      subject: 'Add big module',
      category: 'feature',
      summary: 'Updated 1 file, total +150/-0 lines, primarily touching .ts',
      rationale: 'Largest change: src/big.ts (+150/-0).',
      summarySource: 'heuristic',
    });
  });

  it('is idempotent without a cache', async () => {
    const analyzer = new CommitAnalyzer();
    const input = descriptor('e1b2c3d4e5', 'Fix rounding', [changedFile('src/math.ts', 3, 2), deletedLegacy]);
    expect(await analyzer.analyze(input)).toEqual(await analyzer.analyze(input));
  });

  it('uses the AI summary and caps the diff it sends', async () => {
    const { summarizer, calls } = fakeSummarizer({ summary: ' Adds the big module ', intent: 'Needed for reports', model: 'fake-1' });
    const analyzer = new CommitAnalyzer({ summarizer, maxDiffLines: 5 });

    const result = await analyzer.analyze(descriptor('f1b2c3d4e5', 'Add big module', [changedFile('src/big.ts', 150)]));

    expect(result.summarySource).toBe('ai');
    expect(result.summary).toBe('Adds the big module');
    expect(result.rationale).toBe('Needed for reports');
    expect(result.category).toBe('feature');

    const sent = calls[0].diff.split('\n');
    expect(sent).toHaveLength(6);
    expect(sent[5]).toBe('... (150 more lines truncated)');
    expect(calls[0]).toMatchObject({ commitId: 'f1b2c3d4e5', insertions: 150, deletions: 0, files: ['src/big.ts'] });
  });

  it('falls back to the heuristic path when the summarizer times out', async () => {
    const { lines, logger } = capture();
    const summarizer: Summarizer = {
      name: 'fake',
      summarize: (_request, signal) =>
        new Promise<AiSummary>((_resolve, reject) => {
          signal.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    };
    const analyzer = new CommitAnalyzer({ summarizer, logger, timeoutMs: 20 });

    const result = await analyzer.analyze(descriptor('0a1b2c3d4e', 'Add big module', [changedFile('src/big.ts', 150)]));

    expect(result.summarySource).toBe('heuristic');
    expect(result.summary).toBe('Updated 1 file, total +150/-0 lines, primarily touching .ts');
    expect(lines).toEqual(['warn [0a1b2c3] AI summary unavailable: fake timed out after 20ms; using heuristic summary']);
  });

  it('falls back when the summarizer fails or replies with nothing', async () => {
    const failing = fakeSummarizer(async () => {
      throw new Error('boom');
    });
    const empty = fakeSummarizer({ summary: '   ', intent: '', model: 'fake-1' });

    for (const { summarizer } of [failing, empty]) {
      const { lines, logger } = capture();
      const analyzer = new CommitAnalyzer({ summarizer, logger });
      const result = await analyzer.analyze(descriptor('1a1b2c3d4e', 'Fix it', [changedFile('src/a.ts', 1, 1)]));
      expect(result.summarySource).toBe('heuristic');
      expect(lines).toHaveLength(1);
    }
  });

  it('logs unreadable file diffs with commit and path', async () => {
    const { lines, logger } = capture();
    const analyzer = new CommitAnalyzer({ logger });
    const result = await analyzer.analyze(
      descriptor('abcdef1234', 'Update things', [{ path: 'bad.ts', diff: '@@ nonsense\n' }, changedFile('ok.ts', 2)]),
    );

    expect(result.files).toHaveLength(2);
    expect(result.files[0].anomaly).toBe('Unreadable diff for bad.ts: malformed hunk header "@@ nonsense"');
    expect(result.totals).toEqual({ files: 2, insertions: 2, deletions: 0 });
    expect(lines).toEqual(['warn [abcdef1] [bad.ts] Unreadable diff for bad.ts: malformed hunk header "@@ nonsense"']);
  });

  it('reads through the cache and writes results back', async () => {
    const cache = CommitCache.open(':memory:');
    const { summarizer } = fakeSummarizer({ summary: 'Adds a module', intent: 'Reports', model: 'fake-1' });
    const analyzer = new CommitAnalyzer({ summarizer, cache });
    const input = descriptor('2a1b2c3d4e', 'Add module', [changedFile('src/mod.ts', 5)]);

    const first = await analyzer.analyze(input);
    const second = await analyzer.analyze(input);

    expect(second).toEqual(first);
    expect(cache.get('2a1b2c3d4e')).toEqual(first);
    expect(summarizer.summarize).toHaveBeenCalledTimes(1);
    cache.close();
  });
});
