import chalk from 'chalk';
import type { GlobalOptions } from '../workspace.js';
import { openEngine, openWorkspace } from '../workspace.js';

export async function cacheClearCommand(commit: string | undefined, global: GlobalOptions = {}): Promise<void> {
  const workspace = await openWorkspace(global);
  const engine = openEngine(workspace);

  try {
    if (!engine.cache.enabled) {
      console.log(chalk.yellow('Cache is disabled; nothing to clear.'));
      return;
    }
    const removed = engine.invalidateCache(commit ?? 'all');
    const what = commit ? `entries matching ${commit}` : 'entries';
    console.log(chalk.green(`Removed ${removed} cached ${what}.`));
  } finally {
    engine.close();
  }
}
