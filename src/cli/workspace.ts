import { GitBridge } from '../git/bridge.js';
import type { CommitRange } from '../git/types.js';
import type { ConfigOverrides, DiffscribeConfig } from '../config/config.js';
import { loadConfig } from '../config/config.js';
import { ChangelogEngine } from '../engine.js';
import type { Logger, LogLevel } from '../utils/logger.js';
import { createLogger } from '../utils/logger.js';
import { DiffscribeError, SourceUnavailableError } from '../errors.js';

export interface GlobalOptions {
  debug?: boolean;
  quiet?: boolean;
}

export interface RangeOptions {
  count?: string;
  since?: string;
  from?: string;
  to?: string;
}

export interface Workspace {
  git: GitBridge;
  root: string;
  config: DiffscribeConfig;
  logger: Logger;
}

export function logLevelFor(global: GlobalOptions, configured: LogLevel): LogLevel {
  if (global.debug) return 'debug';
  if (global.quiet) return 'error';
  return configured;
}

/** Default range is the last 10 commits. */
export function parseRange(opts: RangeOptions): CommitRange {
  if (opts.since && opts.from) {
    throw new DiffscribeError('Use either --since or --from/--to, not both.');
  }
  if (opts.since) return { kind: 'since', ref: opts.since };
  if (opts.from) return { kind: 'between', from: opts.from, to: opts.to ?? 'HEAD' };
  if (opts.to) throw new DiffscribeError('--to needs --from.');

  const raw = opts.count ?? '10';
  const count = Number(raw);
  if (!Number.isInteger(count) || count <= 0) {
    throw new DiffscribeError(`--count must be a positive whole number, got "${raw}".`);
  }
  return { kind: 'last', count };
}

export async function openWorkspace(
  global: GlobalOptions,
  overrides?: ConfigOverrides,
  cwd: string = process.cwd(),
): Promise<Workspace> {
  const git = new GitBridge(cwd);
  if (!(await git.isRepo())) {
    throw new SourceUnavailableError('the working directory', 'Not inside a Git repository.');
  }

  const root = await git.getRepoRoot();
  const config = loadConfig(root, { overrides });
  const logger = createLogger({ level: logLevelFor(global, config.log.level) });
  return { git, root, config, logger };
}

export function openEngine(workspace: Workspace): ChangelogEngine {
  return new ChangelogEngine({
    root: workspace.root,
    source: workspace.git,
    config: workspace.config,
    logger: workspace.logger,
  });
}
