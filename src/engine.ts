import { existsSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { CommitDescriptor, CommitRange, CommitSource } from './git/types.js';
import { describeRange } from './git/types.js';
import type { CommitAnalysis } from './model/analysis.js';
import { shortId } from './model/analysis.js';
import { CommitAnalyzer } from './analysis/analyzer.js';
import type { Summarizer } from './ai/summarizer.js';
import { AnthropicSummarizer } from './ai/anthropic.js';
import { CommitCache } from './storage/cache.js';
import type { DiffscribeConfig } from './config/config.js';
import { defaultConfig } from './config/config.js';
import type { GroupingPolicy } from './changelog/sessions.js';
import { groupSessions } from './changelog/sessions.js';
import type { ChangelogDocument } from './changelog/document.js';
import { listDocumentedCommits, parseDocument } from './changelog/document.js';
import { renderChangelog } from './changelog/renderer.js';
import type { Logger } from './utils/logger.js';
import { silentLogger } from './utils/logger.js';
import { settingsFingerprint } from './utils/hash.js';
import { RenderConflictError } from './errors.js';

export interface EngineOptions {
  /** Repository root; relative config paths resolve against it. */
  root: string;
  source: CommitSource;
  config?: DiffscribeConfig;
  logger?: Logger;
  /** Defaults to the cache named by the config. */
  cache?: CommitCache;
  /** Defaults to the Anthropic summarizer when AI is enabled and a key is set. */
  summarizer?: Summarizer;
  env?: NodeJS.ProcessEnv;
}

export interface WriteResult {
  path: string;
  /** Sessions added or extended by this write. */
  sessions: number;
  /** Commits in those sessions, earlier ones included. */
  commits: number;
  /** False when the file already had this exact content. */
  changed: boolean;
}

export function analysisFingerprint(config: DiffscribeConfig): string {
  return settingsFingerprint({
    breakingLineThreshold: config.analysis.breakingLineThreshold,
    breakingDeletionRatio: config.analysis.breakingDeletionRatio,
    breakingRatioMinLines: config.analysis.breakingRatioMinLines,
  });
}

function createSummarizer(config: DiffscribeConfig, env: NodeJS.ProcessEnv, logger: Logger): Summarizer | undefined {
  if (!config.ai.enabled) return undefined;
  const apiKey = env[config.ai.apiKeyEnv];
  if (!apiKey) {
    logger.warn(`AI summaries are enabled but ${config.ai.apiKeyEnv} is not set; using heuristic summaries`);
    return undefined;
  }
  return new AnthropicSummarizer({ apiKey, model: config.ai.model });
}

export class ChangelogEngine {
  readonly config: DiffscribeConfig;
  readonly cache: CommitCache;
  private root: string;
  private source: CommitSource;
  private logger: Logger;
  private analyzer: CommitAnalyzer;

  constructor(options: EngineOptions) {
    this.root = options.root;
    this.source = options.source;
    this.config = options.config ?? defaultConfig();
    this.logger = options.logger ?? silentLogger;

    this.cache =
      options.cache ??
      (this.config.cache.enabled
        ? CommitCache.open(resolve(this.root, this.config.cache.path), {
            logger: this.logger,
            fingerprint: analysisFingerprint(this.config),
          })
        : CommitCache.disabled());

    this.analyzer = new CommitAnalyzer({
      cache: this.cache,
      summarizer: options.summarizer ?? createSummarizer(this.config, options.env ?? process.env, this.logger),
      logger: this.logger,
      thresholds: {
        lineThreshold: this.config.analysis.breakingLineThreshold,
        deletionRatio: this.config.analysis.breakingDeletionRatio,
        ratioMinLines: this.config.analysis.breakingRatioMinLines,
      },
      timeoutMs: this.config.ai.timeoutMs,
      maxDiffLines: this.config.ai.maxDiffLines,
    });
  }

  get changelogPath(): string {
    return resolve(this.root, this.config.changelog.file);
  }

  /** Grouping policy the config asks for. */
  defaultPolicy(): GroupingPolicy {
    return this.config.changelog.grouping === 'batch' ? { kind: 'batch', boundaries: [] } : { kind: 'day' };
  }

  /**
   * Analyzes every commit in the range, oldest first. All descriptors are
   * fetched before anything is analyzed, so a source failure leaves the
   * cache untouched.
   */
  async analyze(range: CommitRange): Promise<CommitAnalysis[]> {
    const descriptors = await this.source.listCommits(range);
    this.logger.debug(`analyzing ${descriptors.length} commits (${describeRange(range)})`);

    const analyses: CommitAnalysis[] = [];
    for (const descriptor of descriptors) {
      analyses.push(await this.analyzer.analyze(descriptor));
    }
    return analyses;
  }

  renderChangelog(analyses: readonly CommitAnalysis[], policy: GroupingPolicy, previous?: string): string {
    return renderChangelog(analyses, policy, {
      previous,
      maxMessageLength: this.config.changelog.maxMessageLength,
      showAuthor: this.config.changelog.showAuthor,
      order: this.config.changelog.order,
      logger: this.logger,
    });
  }

  /** Drops one cached analysis (id or prefix), or all of them. Returns how many. */
  invalidateCache(target: string): number {
    const removed = target === 'all' ? this.cache.clear() : this.cache.invalidate(target);
    this.logger.debug(`invalidated ${removed} cached analyses`);
    return removed;
  }

  readChangelog(): string {
    return existsSync(this.changelogPath) ? readFileSync(this.changelogPath, 'utf-8') : '';
  }

  /** The changelog text `writeChangelog` would produce for this range, without writing it. */
  async previewChangelog(range: CommitRange, policy: GroupingPolicy = this.defaultPolicy()): Promise<string> {
    const draft = await this.draft(range, policy);
    return draft.text;
  }

  /** Analyzes the range and merges it into the changelog file. */
  async writeChangelog(range: CommitRange, policy: GroupingPolicy = this.defaultPolicy()): Promise<WriteResult> {
    const { text, previous, analyses } = await this.draft(range, policy);
    const path = this.changelogPath;

    const result: WriteResult = {
      path,
      sessions: groupSessions(analyses, policy).length,
      commits: analyses.length,
      changed: text !== previous,
    };
    if (!result.changed) return result;

    const tmp = `${path}.${process.pid}.tmp`;
    writeFileSync(tmp, text, 'utf-8');
    renameSync(tmp, path);
    this.logger.info(`wrote ${result.sessions} sessions to ${path}`);
    return result;
  }

  /** Commits in the range that no session marker in the changelog names yet. */
  async pending(range: CommitRange): Promise<CommitDescriptor[]> {
    const descriptors = await this.source.listCommits(range);
    const documented = listDocumentedCommits(this.readChangelog());
    return descriptors.filter(d => !documented.has(d.id));
  }

  close(): void {
    this.cache.close();
  }

  /**
   * Renders the range against the current changelog. Only sessions with
   * commits the changelog does not list yet are rendered; `analyses` are
   * the commits those sessions hold.
   */
  private async draft(
    range: CommitRange,
    policy: GroupingPolicy,
  ): Promise<{ text: string; previous: string; analyses: CommitAnalysis[] }> {
    const inRange = await this.analyze(range);
    const previous = this.readChangelog();
    const analyses = this.extendDocumentedSessions(inRange, policy, parseDocument(previous));
    return { text: this.renderChangelog(analyses, policy, previous), previous, analyses };
  }

  /**
   * Commits a session marker already names stay in their block. The rest
   * are grouped on their own; a new session whose key matches an existing
   * block is merged into it, with the block's earlier commits taken from
   * the range or the cache. When one of those is no longer cached the block
   * is left alone and its new commits stay pending.
   */
  private extendDocumentedSessions(
    analyses: readonly CommitAnalysis[],
    policy: GroupingPolicy,
    doc: ChangelogDocument,
  ): CommitAnalysis[] {
    const documented = new Set(doc.blocks.flatMap(b => b.commits));
    const known = new Map(analyses.map(a => [a.id, a]));
    const blocks = new Map(doc.blocks.map(b => [b.key, b]));
    const result: CommitAnalysis[] = [];

    const undocumented = analyses.filter(a => !documented.has(a.id));
    for (const session of groupSessions(undocumented, policy)) {
      const block = blocks.get(session.key);
      if (!block) {
        result.push(...session.commits);
        continue;
      }

      const earlier: CommitAnalysis[] = [];
      let missing: string | undefined;
      for (const id of block.commits) {
        const analysis = known.get(id) ?? this.cache.get(id);
        if (!analysis) {
          missing = id;
          break;
        }
        earlier.push(analysis);
      }

      if (missing !== undefined) {
        const first = session.commits[0];
        const conflict = new RenderConflictError(
          first.id,
          `Cannot add ${shortId(first.id)} to session ${session.key}: ` +
            `earlier commit ${shortId(missing)} is no longer cached; leaving the session unchanged`,
        );
        this.logger.warn(conflict.message);
        continue;
      }
      result.push(...earlier, ...session.commits);
    }

    return result;
  }
}
