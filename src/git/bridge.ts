import { simpleGit, type SimpleGit, type DefaultLogFields, type ListLogLine } from 'simple-git';
import type { CommitDescriptor, CommitRange, CommitSource } from './types.js';
import { describeRange } from './types.js';
import { splitCommitDiff } from './diff-reader.js';
import { SourceUnavailableError, errorMessage } from '../errors.js';

type LogEntry = DefaultLogFields & ListLogLine;

export class GitBridge implements CommitSource {
  private git: SimpleGit;

  constructor(repoPath: string) {
    this.git = simpleGit(repoPath);
  }

  async isRepo(): Promise<boolean> {
    try {
      await this.git.revparse(['--is-inside-work-tree']);
      return true;
    } catch {
      return false;
    }
  }

  async getRepoRoot(): Promise<string> {
    const root = await this.git.revparse(['--show-toplevel']);
    return root.trim();
  }

  /**
   * Commits in the range, oldest first, each with its full per-file patch.
   * Throws SourceUnavailableError when the range cannot be read or is empty.
   */
  async listCommits(range: CommitRange): Promise<CommitDescriptor[]> {
    let entries: readonly LogEntry[];
    try {
      entries = await this.readLog(range);
    } catch (err) {
      throw new SourceUnavailableError(describeRange(range), errorMessage(err));
    }

    if (entries.length === 0) {
      throw new SourceUnavailableError(describeRange(range), 'The range contains no commits.');
    }

    const descriptors: CommitDescriptor[] = [];
    for (const entry of [...entries].reverse()) {
      let patch: string;
      try {
        patch = await this.git.raw([
          'show', '--format=', '--patch', '--find-renames', '--no-color', '--no-ext-diff',
          '-m', '--first-parent', entry.hash,
        ]);
      } catch (err) {
        throw new SourceUnavailableError(`the patch of ${entry.hash.slice(0, 7)}`, errorMessage(err));
      }

      descriptors.push({
        id: entry.hash,
        author: entry.author_name,
        timestamp: entry.date,
        message: entry.body.trim() ? `${entry.message}\n\n${entry.body.trim()}` : entry.message,
        files: splitCommitDiff(patch),
      });
    }

    return descriptors;
  }

  private async readLog(range: CommitRange): Promise<readonly LogEntry[]> {
    switch (range.kind) {
      case 'last': {
        const log = await this.git.log({ maxCount: range.count });
        return log.all;
      }
      case 'since': {
        const log = await this.git.log({ from: range.ref, to: 'HEAD' });
        return log.all;
      }
      case 'between': {
        const log = await this.git.log({ from: range.from, to: range.to });
        return log.all;
      }
    }
  }
}
