import chalk from 'chalk';
import type { Category, CommitAnalysis } from '../../model/analysis.js';
import { shortId } from '../../model/analysis.js';
import type { ChangeKind } from '../../model/change.js';
import type { CommitDescriptor } from '../../git/types.js';
import { commitSubject } from '../../git/types.js';

const SYMBOLS: Record<ChangeKind, string> = {
  added: chalk.green('⊕'),
  modified: chalk.yellow('∆'),
  deleted: chalk.red('⊖'),
  renamed: chalk.cyan('↻'),
  binary: chalk.magenta('◆'),
};

const CATEGORY_COLORS: Record<Category, (s: string) => string> = {
  feature: chalk.green,
  fix: chalk.red,
  refactor: chalk.blue,
  docs: chalk.cyan,
  other: chalk.gray,
};

export function formatAnalysis(analysis: CommitAnalysis): string {
  const lines: string[] = [];
  const tag = CATEGORY_COLORS[analysis.category](`[${analysis.category}]`);
  const breaking = analysis.breaking ? ` ${chalk.red.bold('⚠ breaking')}` : '';

  lines.push(`${chalk.yellow(shortId(analysis.id))} ${tag}${breaking} ${analysis.subject}`);
  lines.push(chalk.dim(`  ${analysis.author} · ${analysis.timestamp}`));

  const header = `─ ${analysis.summary} `;
  const padLen = Math.max(0, 55 - header.length);
  lines.push(chalk.dim(`┌${header}${'─'.repeat(padLen)}`));

  for (const file of analysis.files) {
    const counts = `${chalk.green(`+${file.insertions}`)}/${chalk.red(`-${file.deletions}`)}`;
    lines.push(chalk.dim('│  ') + `${SYMBOLS[file.kind]} ${chalk.bold(file.path)} ${counts}`);

    if (file.oldPath) {
      lines.push(chalk.dim('│    ') + chalk.dim(`from ${file.oldPath}`));
    }
    if (file.symbols.length > 0) {
      lines.push(chalk.dim('│    ') + chalk.dim(`symbols: ${file.symbols.join(', ')}`));
    }
    if (file.anomaly) {
      lines.push(chalk.dim('│    ') + chalk.yellow(file.anomaly));
    }
  }

  for (const reason of analysis.breakingReasons) {
    lines.push(chalk.dim('│  ') + chalk.red(`⚠ ${reason}`));
  }

  lines.push(chalk.dim('└' + '─'.repeat(55)));

  const source = analysis.summarySource === 'ai' ? 'AI summary' : 'heuristic summary';
  lines.push(
    `Summary: ${chalk.green(`+${analysis.totals.insertions}`)} ${chalk.red(`-${analysis.totals.deletions}`)} ` +
      `across ${analysis.totals.files} file${analysis.totals.files !== 1 ? 's' : ''} ${chalk.dim(`(${source})`)}`,
  );

  return lines.join('\n');
}

export function formatAnalyses(analyses: readonly CommitAnalysis[]): string {
  if (analyses.length === 0) {
    return chalk.dim('No commits to analyze.');
  }
  return analyses.map(formatAnalysis).join('\n\n');
}

export function formatPending(descriptors: readonly CommitDescriptor[]): string {
  if (descriptors.length === 0) {
    return chalk.dim('Changelog is up to date.');
  }
  const lines = descriptors.map(
    d => `${chalk.yellow(shortId(d.id))} ${commitSubject(d.message)} ${chalk.dim(`(${d.author})`)}`,
  );
  lines.push('', `${descriptors.length} commit${descriptors.length !== 1 ? 's' : ''} not in the changelog yet`);
  return lines.join('\n');
}
