import type { GlobalOptions, RangeOptions } from '../workspace.js';
import { openEngine, openWorkspace, parseRange } from '../workspace.js';
import { formatPending } from '../formatters/terminal.js';
import { formatPendingJson } from '../formatters/json.js';

export interface PendingOptions extends RangeOptions {
  format?: 'terminal' | 'json';
}

export async function pendingCommand(opts: PendingOptions, global: GlobalOptions = {}): Promise<void> {
  const range = parseRange(opts);
  const workspace = await openWorkspace(global);
  const engine = openEngine(workspace);

  try {
    const pending = await engine.pending(range);
    console.log(opts.format === 'json' ? formatPendingJson(pending) : formatPending(pending));
  } finally {
    engine.close();
  }
}
