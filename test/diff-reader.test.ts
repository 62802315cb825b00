import { describe, it, expect } from 'vitest';
import { parseGitHeaderPaths, splitCommitDiff } from '../src/git/diff-reader.js';
import { parseFileDiff } from '../src/parser/diff-parser.js';

const PATCH = [
  'diff --git a/src/a.ts b/src/a.ts',
  'index 1111111..2222222 100644',
  '--- a/src/a.ts',
  '+++ b/src/a.ts',
  '@@ -1 +1 @@',
  '-old',
  '+new',
  'diff --git a/docs/old.md b/docs/new.md',
  'similarity index 90%',
  'rename from docs/old.md',
  'rename to docs/new.md',
  'diff --git a/gone.py b/gone.py',
  'deleted file mode 100644',
  'index 3333333..0000000',
  '--- a/gone.py',
  '+++ /dev/null',
  '@@ -1,2 +0,0 @@',
  '-a',
  '-b',
  '',
].join('\n');

describe('splitCommitDiff', () => {
  it('splits a commit patch into per-file diffs', () => {
    const files = splitCommitDiff(PATCH);

    expect(files.map(({ diff: _diff, ...rest }) => rest)).toEqual([
      { path: 'src/a.ts', status: 'modified' },
      { path: 'docs/new.md', oldPath: 'docs/old.md', status: 'renamed' },
      { path: 'gone.py', status: 'deleted' },
    ]);
    expect(files[0].diff).toBe(PATCH.split('\n').slice(0, 7).join('\n') + '\n');
  });

  it('produces diffs the parser reads', () => {
    const records = splitCommitDiff(PATCH).map(file => parseFileDiff(file));
    expect(records.map(r => [r.path, r.kind, r.insertions, r.deletions])).toEqual([
      ['src/a.ts', 'modified', 1, 1],
      ['docs/new.md', 'renamed', 0, 0],
      ['gone.py', 'deleted', 0, 2],
    ]);
  });

  it('ignores text before the first file header', () => {
    expect(splitCommitDiff('commit message noise\n')).toEqual([]);
  });
});

describe('parseGitHeaderPaths', () => {
  it('splits names that contain " b/"', () => {
    expect(parseGitHeaderPaths('diff --git a/my b/file.txt b/my b/file.txt')).toEqual({
      oldPath: 'my b/file.txt',
      newPath: 'my b/file.txt',
    });
  });

  it('handles renames', () => {
    expect(parseGitHeaderPaths('diff --git a/x/one.ts b/y/two.ts')).toEqual({ oldPath: 'x/one.ts', newPath: 'y/two.ts' });
  });
});
