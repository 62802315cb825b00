import { mkdirSync, existsSync, writeFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import chalk from 'chalk';
import { GitBridge } from '../../git/bridge.js';
import { CommitCache } from '../../storage/cache.js';
import { configPath, defaultConfigYaml, loadConfig } from '../../config/config.js';
import { SourceUnavailableError } from '../../errors.js';
import { analysisFingerprint } from '../../engine.js';

export interface InitOptions {
  cwd?: string;
  force?: boolean;
}

export async function initCommand(opts: InitOptions = {}): Promise<void> {
  const cwd = opts.cwd ?? process.cwd();
  const git = new GitBridge(cwd);

  if (!(await git.isRepo())) {
    throw new SourceUnavailableError('the working directory', 'Not inside a Git repository.');
  }

  const repoRoot = await git.getRepoRoot();
  const file = configPath(repoRoot);

  if (existsSync(file) && !opts.force) {
    console.log(chalk.yellow(`${file} already exists. Use --force to overwrite it.`));
  } else {
    mkdirSync(dirname(file), { recursive: true });
    writeFileSync(file, defaultConfigYaml(), 'utf-8');
    console.log(chalk.green(`Wrote ${file}`));
  }

  const config = loadConfig(repoRoot);
  if (config.cache.enabled) {
    const cachePath = resolve(repoRoot, config.cache.path);
    const cache = CommitCache.open(cachePath, { fingerprint: analysisFingerprint(config) });
    console.log(chalk.dim(`  Cache: ${cachePath} (${cache.enabled ? `${cache.size()} entries` : 'unavailable'})`));
    cache.close();
  }
  console.log(chalk.dim(`  Changelog: ${resolve(repoRoot, config.changelog.file)}`));
}
