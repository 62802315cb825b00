import type { Category, CommitAnalysis } from '../model/analysis.js';
import type { Logger } from '../utils/logger.js';
import type { ChangelogSession, GroupingPolicy, SessionEntry } from './sessions.js';
import { groupSessions } from './sessions.js';
import type { DocumentBlock, SessionOrder } from './document.js';
import { finalize, mergeDocument, parseDocument } from './document.js';

export interface RenderOptions {
  maxMessageLength?: number;
  showAuthor?: boolean;
  order?: SessionOrder;
}

export interface ChangelogRenderOptions extends RenderOptions {
  /** Existing changelog text to merge into. */
  previous?: string;
  logger?: Logger;
}

export const DEFAULT_PREAMBLE = `# Changelog

Generated by diffscribe. Each session lists what changed and how the codebase grew.
`;

const BUCKETS: Array<{ category: Category; title: string }> = [
  { category: 'feature', title: '✨ Features' },
  { category: 'fix', title: '🐛 Fixes' },
  { category: 'refactor', title: '♻️ Refactoring' },
  { category: 'docs', title: '📚 Documentation' },
  { category: 'other', title: '🔄 Other' },
];

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`;
}

export function formatDelta(delta: number): string {
  if (delta > 0) return `+${delta}`;
  if (delta < 0) return `${delta}`;
  return '±0';
}

export function truncate(text: string, max: number): string {
  const line = text.replace(/\s*\n\s*/g, ' ').trim();
  if (line.length <= max) return line;
  return `${line.slice(0, Math.max(0, max - 3)).trimEnd()}...`;
}

export function sessionHeading(session: ChangelogSession): string {
  return [
    `## ${session.date}`,
    `${session.mood.emoji} ${session.mood.label}`,
    plural(session.commitCount, 'commit'),
    plural(session.fileCount, 'file'),
    `${formatDelta(session.netDelta)} lines`,
  ].join(' · ');
}

export function growthSentence(session: ChangelogSession): string {
  const tally = `(+${session.insertions}/-${session.deletions})`;
  if (session.netDelta > 0) return `The codebase grew by ${plural(session.netDelta, 'line')} ${tally}.`;
  if (session.netDelta < 0) return `The codebase shrank by ${plural(-session.netDelta, 'line')} ${tally}.`;
  return `Line count unchanged ${tally}.`;
}

function bullet(entry: SessionEntry, options: Required<RenderOptions>): string {
  const flag = entry.breaking ? '⚠️ ' : '';
  const author = options.showAuthor ? ` — ${entry.author}` : '';
  return `- ${flag}${truncate(entry.text, options.maxMessageLength)} (\`${entry.shortId}\`)${author}`;
}

function withDefaults(options: RenderOptions): Required<RenderOptions> {
  return {
    maxMessageLength: options.maxMessageLength ?? 72,
    showAuthor: options.showAuthor ?? false,
    order: options.order ?? 'chronological',
  };
}

/** One session as a marked block, ending with a newline. */
export function renderSession(session: ChangelogSession, options: RenderOptions = {}): string {
  const opts = withDefaults(options);
  const lines: string[] = [
    `<!-- diffscribe:session key=${session.key} commits=${session.commits.map(c => c.id).join(',')} -->`,
    sessionHeading(session),
    '',
    growthSentence(session),
    '',
  ];

  for (const { category, title } of BUCKETS) {
    const entries = session.buckets[category];
    if (entries.length === 0) continue;
    lines.push(`### ${title}`, ...entries.map(e => bullet(e, opts)), '');
  }

  lines.push(`**Contributors:** ${session.contributors.join(', ')}`);
  lines.push('<!-- diffscribe:end -->');
  return lines.join('\n') + '\n';
}

export function toBlock(session: ChangelogSession, options: RenderOptions = {}): DocumentBlock {
  return {
    key: session.key,
    commits: session.commits.map(c => c.id),
    text: renderSession(session, options),
    trailing: '',
  };
}

/**
 * Renders analyses as sessions and merges them into `previous`, if given.
 * Sessions already present with the same commits keep their exact text.
 */
export function renderChangelog(
  analyses: readonly CommitAnalysis[],
  policy: GroupingPolicy,
  options: ChangelogRenderOptions = {},
): string {
  const opts = withDefaults(options);
  const sessions = groupSessions(analyses, policy, options.logger);
  const blocks = sessions.map(s => toBlock(s, opts));

  const previous = options.previous ?? '';
  const existing = previous.trim() === '' ? { preamble: DEFAULT_PREAMBLE, blocks: [] } : parseDocument(previous);

  return finalize(mergeDocument(existing, blocks, opts.order));
}
