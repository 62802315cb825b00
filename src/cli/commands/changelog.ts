import chalk from 'chalk';
import type { GlobalOptions, RangeOptions } from '../workspace.js';
import { openEngine, openWorkspace, parseRange } from '../workspace.js';
import type { ConfigOverrides } from '../../config/config.js';
import type { GroupingPolicy } from '../../changelog/sessions.js';
import { DiffscribeError } from '../../errors.js';

export interface ChangelogOptions extends RangeOptions {
  grouping?: string;
  boundary?: string[];
  order?: string;
  dryRun?: boolean;
  ai?: boolean;
}

function buildOverrides(opts: ChangelogOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (opts.ai !== undefined) overrides.ai = { enabled: opts.ai };

  const changelog: ConfigOverrides['changelog'] = {};
  if (opts.grouping !== undefined) {
    if (opts.grouping !== 'day' && opts.grouping !== 'batch') {
      throw new DiffscribeError(`--grouping must be "day" or "batch", got "${opts.grouping}".`);
    }
    changelog.grouping = opts.grouping;
  }
  if (opts.order !== undefined) {
    if (opts.order !== 'chronological' && opts.order !== 'newest-first') {
      throw new DiffscribeError(`--order must be "chronological" or "newest-first", got "${opts.order}".`);
    }
    changelog.order = opts.order;
  }
  if (Object.keys(changelog).length > 0) overrides.changelog = changelog;

  return overrides;
}

export async function changelogCommand(opts: ChangelogOptions, global: GlobalOptions = {}): Promise<void> {
  const range = parseRange(opts);
  const workspace = await openWorkspace(global, buildOverrides(opts));
  const engine = openEngine(workspace);

  const policy: GroupingPolicy =
    workspace.config.changelog.grouping === 'batch'
      ? { kind: 'batch', boundaries: opts.boundary ?? [] }
      : { kind: 'day' };

  try {
    if (opts.dryRun) {
      process.stdout.write(await engine.previewChangelog(range, policy));
      return;
    }

    const result = await engine.writeChangelog(range, policy);
    if (!result.changed) {
      console.log(chalk.dim(`${result.path} is already up to date.`));
      return;
    }
    console.log(
      chalk.green(`Updated ${result.path}`) +
        chalk.dim(` (${result.commits} commits in ${result.sessions} session${result.sessions !== 1 ? 's' : ''})`),
    );
  } finally {
    engine.close();
  }
}
