export type CommitRange =
  | { kind: 'last'; count: number }           // Most recent N commits
  | { kind: 'since'; ref: string }            // Commits after ref, up to HEAD
  | { kind: 'between'; from: string; to: string };  // Commits in from..to

export type FileStatus = 'added' | 'modified' | 'deleted' | 'renamed';

export interface FileDiff {
  /** New path; the old path for deletions. */
  path: string;
  oldPath?: string;
  /** Raw unified diff for this file, header block included when available. */
  diff: string;
  status?: FileStatus;
  /** Line count of the file before the commit, when known. */
  priorLineCount?: number;
}

export interface CommitDescriptor {
  id: string;
  author: string;
  timestamp: string;
  message: string;
  files: FileDiff[];
}

/**
 * Anything that can hand out commit descriptors, oldest first.
 */
export interface CommitSource {
  listCommits(range: CommitRange): Promise<CommitDescriptor[]>;
}

export function describeRange(range: CommitRange): string {
  switch (range.kind) {
    case 'last': return `last ${range.count} commit${range.count === 1 ? '' : 's'}`;
    case 'since': return `commits since ${range.ref}`;
    case 'between': return `${range.from}..${range.to}`;
  }
}

export function commitSubject(message: string): string {
  return message.split('\n')[0].trim();
}
