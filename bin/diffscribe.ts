#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { initCommand } from '../src/cli/commands/init.js';
import { analyzeCommand } from '../src/cli/commands/analyze.js';
import { changelogCommand } from '../src/cli/commands/changelog.js';
import { pendingCommand } from '../src/cli/commands/pending.js';
import { cacheClearCommand } from '../src/cli/commands/cache.js';
import type { GlobalOptions } from '../src/cli/workspace.js';
import { DiffscribeError } from '../src/errors.js';

const program = new Command();

program
  .name('diffscribe')
  .description('Commit analysis and session changelogs on top of Git')
  .version('0.1.0')
  .option('--debug', 'Verbose logging')
  .option('-q, --quiet', 'Only log errors');

const globals = (): GlobalOptions => program.opts<GlobalOptions>();

function withRange(command: Command): Command {
  return command
    .option('-n, --count <n>', 'Analyze the last N commits', '10')
    .option('--since <ref>', 'Commits after <ref>, up to HEAD')
    .option('--from <ref>', 'Start of commit range (exclusive)')
    .option('--to <ref>', 'End of commit range (defaults to HEAD)');
}

program
  .command('init')
  .description('Write .diffscribe/config.yaml and create the commit cache')
  .option('--force', 'Overwrite an existing config file')
  .action(async (opts: { force?: boolean }) => {
    await initCommand({ force: opts.force });
  });

withRange(
  program
    .command('analyze')
    .description('Analyze commits and print their change records')
    .option('-f, --format <format>', 'Output format: terminal or json', 'terminal')
    .option('--ai', 'Use AI summaries')
    .option('--no-ai', 'Use heuristic summaries only'),
).action(async (opts: { count?: string; since?: string; from?: string; to?: string; format?: string; ai?: boolean }) => {
  await analyzeCommand({ ...opts, format: opts.format === 'json' ? 'json' : 'terminal' }, globals());
});

withRange(
  program
    .command('changelog')
    .description('Analyze commits and merge them into the changelog')
    .option('-g, --grouping <policy>', 'Session grouping: day or batch')
    .option('-b, --boundary <commits...>', 'Commits that end a batch (push heads)')
    .option('-o, --order <order>', 'Session order: chronological or newest-first')
    .option('--dry-run', 'Print the merged changelog instead of writing it')
    .option('--ai', 'Use AI summaries')
    .option('--no-ai', 'Use heuristic summaries only'),
).action(async (opts: {
  count?: string;
  since?: string;
  from?: string;
  to?: string;
  grouping?: string;
  boundary?: string[];
  order?: string;
  dryRun?: boolean;
  ai?: boolean;
}) => {
  await changelogCommand(opts, globals());
});

withRange(
  program
    .command('pending')
    .description('List commits that are not in the changelog yet')
    .option('-f, --format <format>', 'Output format: terminal or json', 'terminal'),
).action(async (opts: { count?: string; since?: string; from?: string; to?: string; format?: string }) => {
  await pendingCommand({ ...opts, format: opts.format === 'json' ? 'json' : 'terminal' }, globals());
});

const cache = program.command('cache').description('Manage the commit analysis cache');

cache
  .command('clear [commit]')
  .description('Forget cached analyses (one commit, or all of them)')
  .action(async (commit: string | undefined) => {
    await cacheClearCommand(commit, globals());
  });

program.parseAsync().catch((err: unknown) => {
  if (err instanceof DiffscribeError) {
    console.error(chalk.red(`Error: ${err.message}`));
    process.exitCode = err.exitCode;
    return;
  }
  console.error(chalk.red(err instanceof Error ? (err.stack ?? err.message) : String(err)));
  process.exitCode = 1;
});
