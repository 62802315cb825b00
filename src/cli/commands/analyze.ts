import type { GlobalOptions, RangeOptions } from '../workspace.js';
import { openEngine, openWorkspace, parseRange } from '../workspace.js';
import { formatAnalyses } from '../formatters/terminal.js';
import { formatAnalysesJson } from '../formatters/json.js';

export interface AnalyzeOptions extends RangeOptions {
  format?: 'terminal' | 'json';
  ai?: boolean;
}

export async function analyzeCommand(opts: AnalyzeOptions, global: GlobalOptions = {}): Promise<void> {
  const range = parseRange(opts);
  const workspace = await openWorkspace(global, opts.ai === undefined ? undefined : { ai: { enabled: opts.ai } });
  const engine = openEngine(workspace);

  try {
    const analyses = await engine.analyze(range);
    console.log(opts.format === 'json' ? formatAnalysesJson(analyses) : formatAnalyses(analyses));
  } finally {
    engine.close();
  }
}
