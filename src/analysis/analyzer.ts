import type { CommitDescriptor } from '../git/types.js';
import { commitSubject } from '../git/types.js';
import type { FileChangeRecord } from '../model/change.js';
import type { CommitAnalysis, CommitTotals } from '../model/analysis.js';
import type { DetectorRegistry } from '../parser/registry.js';
import { createDefaultRegistry } from '../parser/detectors/index.js';
import { parseFileDiff } from '../parser/diff-parser.js';
import type { Summarizer, SummaryResult } from '../ai/summarizer.js';
import { capDiff, summarizeWithTimeout } from '../ai/summarizer.js';
import type { AnalysisStore } from '../storage/cache.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { SummarizationUnavailableError } from '../errors.js';
import { classifyCommit, shapeOf } from './classifier.js';
import { heuristicRationale, heuristicSummary } from './summary.js';

export interface BreakingThresholds {
  /** A single file changing more lines than this is breaking. */
  lineThreshold: number;
  /** Share of deleted lines above which a commit is breaking. */
  deletionRatio: number;
  /** The deletion ratio only applies to commits at least this large; 0 applies it to every commit. */
  ratioMinLines: number;
}

export const DEFAULT_THRESHOLDS: BreakingThresholds = {
  lineThreshold: 100,
  deletionRatio: 0.4,
  ratioMinLines: 20,
};

export interface AnalyzerOptions {
  registry?: DetectorRegistry;
  cache?: AnalysisStore;
  summarizer?: Summarizer;
  logger?: Logger;
  thresholds?: Partial<BreakingThresholds>;
  timeoutMs?: number;
  maxDiffLines?: number;
}

export function sumTotals(files: readonly FileChangeRecord[]): CommitTotals {
  return files.reduce<CommitTotals>(
    (acc, file) => ({
      files: acc.files + 1,
      insertions: acc.insertions + file.insertions,
      deletions: acc.deletions + file.deletions,
    }),
    { files: 0, insertions: 0, deletions: 0 },
  );
}

/** Reasons a commit counts as breaking; empty when it does not. */
export function breakingReasons(
  files: readonly FileChangeRecord[],
  totals: CommitTotals,
  thresholds: BreakingThresholds = DEFAULT_THRESHOLDS,
): string[] {
  const reasons: string[] = [];

  for (const file of files) {
    const changed = file.insertions + file.deletions;
    if (changed > thresholds.lineThreshold) {
      reasons.push(`${file.path} changed ${changed} lines (threshold ${thresholds.lineThreshold})`);
    }
    if (file.kind === 'deleted' && file.deletions > 0) {
      reasons.push(`${file.path} was deleted (${file.deletions} lines)`);
    }
  }

  const total = totals.insertions + totals.deletions;
  if (total >= thresholds.ratioMinLines && total > 0) {
    const ratio = totals.deletions / total;
    if (ratio > thresholds.deletionRatio) {
      reasons.push(
        `deletions are ${Math.round(ratio * 100)}% of changed lines (threshold ${Math.round(thresholds.deletionRatio * 100)}%)`,
      );
    }
  }

  return reasons;
}

export class CommitAnalyzer {
  private registry: DetectorRegistry;
  private cache?: AnalysisStore;
  private summarizer?: Summarizer;
  private logger: Logger;
  private thresholds: BreakingThresholds;
  private timeoutMs: number;
  private maxDiffLines: number;

  constructor(options: AnalyzerOptions = {}) {
    this.registry = options.registry ?? createDefaultRegistry();
    this.cache = options.cache;
    this.summarizer = options.summarizer;
    this.logger = options.logger ?? silentLogger;
    this.thresholds = { ...DEFAULT_THRESHOLDS, ...options.thresholds };
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.maxDiffLines = options.maxDiffLines ?? 500;
  }

  async analyze(descriptor: CommitDescriptor): Promise<CommitAnalysis> {
    const log = this.logger.child({ commit: descriptor.id });

    const cached = this.cache?.get(descriptor.id);
    if (cached) {
      log.debug('cache hit');
      return cached;
    }

    const files = descriptor.files.map(fileDiff => {
      const record = parseFileDiff(fileDiff, this.registry);
      if (record.anomaly) {
        log.warn(record.anomaly, { file: record.path });
      }
      return record;
    });

    const totals = sumTotals(files);
    const reasons = breakingReasons(files, totals, this.thresholds);
    const category = classifyCommit(descriptor.message, shapeOf(files.map(f => f.path)));
    const summary = await this.summarize(descriptor, files, totals, log);

    const analysis: CommitAnalysis = {
      id: descriptor.id,
      author: descriptor.author,
      timestamp: descriptor.timestamp,
      subject: commitSubject(descriptor.message),
      files,
      totals,
      breaking: reasons.length > 0,
      breakingReasons: reasons,
      category,
      summary: summary.summary,
      rationale: summary.rationale,
      summarySource: summary.source,
    };

    this.cache?.put(descriptor.id, analysis);
    log.debug(`analyzed ${totals.files} files as ${category}${analysis.breaking ? ' (breaking)' : ''}`);
    return analysis;
  }

  private async summarize(
    descriptor: CommitDescriptor,
    files: FileChangeRecord[],
    totals: CommitTotals,
    log: Logger,
  ): Promise<SummaryResult> {
    if (this.summarizer) {
      try {
        const ai = await summarizeWithTimeout(
          this.summarizer,
          {
            commitId: descriptor.id,
            message: descriptor.message,
            diff: capDiff(descriptor.files.map(f => f.diff).join('\n'), this.maxDiffLines),
            insertions: totals.insertions,
            deletions: totals.deletions,
            files: files.map(f => f.path),
          },
          this.timeoutMs,
        );
        return {
          source: 'ai',
          summary: ai.summary,
          rationale: ai.intent || heuristicRationale(files),
          model: ai.model,
        };
      } catch (err) {
        if (!(err instanceof SummarizationUnavailableError)) throw err;
        log.warn(`${err.message}; using heuristic summary`);
      }
    }

    return {
      source: 'heuristic',
      summary: heuristicSummary(files, totals),
      rationale: heuristicRationale(files),
    };
  }
}
