import { describe, it, expect } from 'vitest';
import { countMarkers, parseFileDiff } from '../src/parser/diff-parser.js';
import { diffOf } from './helpers.js';

describe('parseFileDiff', () => {
  it('records one added declaration inside unchanged context', () => {
    const record = parseFileDiff({
      path: 'lib/calc.py',
      diff: diffOf([
        'diff --git a/lib/calc.py b/lib/calc.py',
        'index 1111111..2222222 100644',
        '--- a/lib/calc.py',
        '+++ b/lib/calc.py',
        '@@ -10,3 +10,6 @@',
        ' def add(a, b):',
        '     return a + b',
        ' ',
        '+def subtract(a, b):',
      ]),
    });

    expect(record).toEqual({
      path: 'lib/calc.py',
      kind: 'modified',
      insertions: 1,
      deletions: 0,
      ranges: [{ start: 13, end: 13 }],
      symbols: ['subtract'],
      types: [],
    });
  });

  it('tallies markers and maps ranges across hunks', () => {
    const diff = diffOf([
      'diff --git a/src/greet.ts b/src/greet.ts',
      '--- a/src/greet.ts',
      '+++ b/src/greet.ts',
      '@@ -1,3 +1,4 @@',
      ' export function greet(name: string): string {',
      "-  return 'Hi ' + name;",
      "+  const greeting = 'Hello';",
      '+  return `${greeting} ${name}`;',
      ' }',
      '@@ -20,3 +21,3 @@ export class Greeter {',
      '   constructor() {}',
      '-  old() {}',
      '+  renamed() {}',
      ' }',
    ]);

    const record = parseFileDiff({ path: 'src/greet.ts', diff });
    const raw = countMarkers(diff);

    expect(record.insertions).toBe(raw.added);
    expect(record.deletions).toBe(raw.removed);
    expect(record.insertions).toBe(3);
    expect(record.deletions).toBe(2);
    expect(record.ranges).toEqual([
      { start: 2, end: 3 },
      { start: 22, end: 22 },
    ]);
    expect(record.symbols).toEqual(['Greeter', 'greet']);
    expect(record.types).toEqual(['Greeter']);
  });

  it('detects changed blocks in indentation-style files', () => {
    const record = parseFileDiff({
      path: 'geo/shape.py',
      diff: diffOf([
        '@@ -1,6 +1,6 @@',
        ' class Shape:',
        '     def area(self):',
        '-        return 0',
        '+        return self.w * self.h',
        ' ',
        ' def helper():',
      ]),
    });

    expect(record.ranges).toEqual([{ start: 3, end: 3 }]);
    expect(record.symbols).toEqual(['Shape', 'area']);
    expect(record.types).toEqual(['Shape']);
  });

  it('keeps removals that follow an addition on the added line', () => {
    const record = parseFileDiff({
      path: 'notes.txt',
      diff: diffOf(['@@ -1,3 +1,2 @@', '+a', '-b', '-c', ' d']),
    });

    expect(record.insertions).toBe(1);
    expect(record.deletions).toBe(2);
    expect(record.ranges).toEqual([{ start: 1, end: 1 }]);
  });

  it('reads removed declarations against the old side', () => {
    const record = parseFileDiff({
      path: 'util.py',
      diff: diffOf(['@@ -1,3 +1,1 @@', '-def gone():', '-    pass', ' x = 1']),
    });

    expect(record.symbols).toEqual(['gone']);
    expect(record.deletions).toBe(2);
    expect(record.ranges).toEqual([{ start: 1, end: 1 }]);
  });

  it('treats new files as added with one range', () => {
    const record = parseFileDiff({
      path: 'notes.txt',
      diff: diffOf([
        'diff --git a/notes.txt b/notes.txt',
        'new file mode 100644',
        '--- /dev/null',
        '+++ b/notes.txt',
        '@@ -0,0 +1,3 @@',
        '+one',
        '+two',
        '+three',
      ]),
    });

    expect(record.kind).toBe('added');
    expect(record.insertions).toBe(3);
    expect(record.ranges).toEqual([{ start: 1, end: 3 }]);
    expect(record.symbols).toEqual([]);
  });

  it('gives binary files zero counts', () => {
    const record = parseFileDiff({
      path: 'img/logo.png',
      diff: diffOf([
        'diff --git a/img/logo.png b/img/logo.png',
        'index 1111111..2222222 100644',
        'Binary files a/img/logo.png and b/img/logo.png differ',
      ]),
    });

    expect(record).toEqual({
      path: 'img/logo.png',
      kind: 'binary',
      insertions: 0,
      deletions: 0,
      ranges: [],
      symbols: [],
      types: [],
    });
  });

  it('reports pure renames with zero counts', () => {
    const record = parseFileDiff({
      path: 'src/new.ts',
      diff: diffOf([
        'diff --git a/src/old.ts b/src/new.ts',
        'similarity index 100%',
        'rename from src/old.ts',
        'rename to src/new.ts',
      ]),
    });

    expect(record).toEqual({
      path: 'src/new.ts',
      oldPath: 'src/old.ts',
      kind: 'renamed',
      insertions: 0,
      deletions: 0,
      ranges: [],
      symbols: [],
      types: [],
    });
  });

  describe('deleted files', () => {
    const diff = diffOf([
      'diff --git a/src/legacy.ts b/src/legacy.ts',
      'deleted file mode 100644',
      '--- a/src/legacy.ts',
      '+++ /dev/null',
      '@@ -1,2 +0,0 @@',
      '-const a = 1;',
      '-const b = 2;',
    ]);

    it('uses the prior line count when known', () => {
      const record = parseFileDiff({ path: 'src/legacy.ts', status: 'deleted', priorLineCount: 80, diff });
      expect(record.kind).toBe('deleted');
      expect(record.deletions).toBe(80);
      expect(record.insertions).toBe(0);
      expect(record.ranges).toEqual([]);
    });

    it('falls back to the removed-line tally', () => {
      const record = parseFileDiff({ path: 'src/legacy.ts', diff });
      expect(record.kind).toBe('deleted');
      expect(record.deletions).toBe(2);
    });
  });

  describe('anomalies', () => {
    it('returns a minimal record for a corrupted hunk header', () => {
      const record = parseFileDiff({
        path: 'src/broken.ts',
        status: 'modified',
        diff: diffOf(['--- a/src/broken.ts', '+++ b/src/broken.ts', '@@ -1,2 +1,3', '+x']),
      });

      expect(record).toEqual({
        path: 'src/broken.ts',
        kind: 'modified',
        insertions: 0,
        deletions: 0,
        ranges: [],
        symbols: [],
        types: [],
        anomaly: 'Unreadable diff for src/broken.ts: malformed hunk header "@@ -1,2 +1,3"',
      });
    });

    it('flags text that is not a diff', () => {
      const record = parseFileDiff({ path: 'a.ts', diff: 'hello world\n' });
      expect(record.anomaly).toBe('Unreadable diff for a.ts: unexpected line before first hunk "hello world"');
      expect(record.insertions).toBe(0);
    });
  });

  it('ignores the no-newline marker', () => {
    const record = parseFileDiff({
      path: 'a.txt',
      diff: diffOf(['@@ -1 +1 @@', '-a', '\\ No newline at end of file', '+b', '\\ No newline at end of file']),
    });
    expect(record.anomaly).toBeUndefined();
    expect(record.insertions).toBe(1);
    expect(record.deletions).toBe(1);
    expect(record.ranges).toEqual([{ start: 1, end: 1 }]);
  });
});
