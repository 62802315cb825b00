import type { ChangeKind, FileChangeRecord, LineRange } from '../model/change.js';
import { normalizeRanges } from '../model/change.js';
import type { FileDiff } from '../git/types.js';
import type { HunkLine, SymbolDetector } from './detector.js';
import type { DetectorRegistry } from './registry.js';
import { createDefaultRegistry } from './detectors/index.js';
import { DiffParseAnomalyError } from '../errors.js';

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@ ?(.*)$/;

const HEADER_PREFIXES = [
  'diff --git ',
  'index ',
  '--- ',
  '+++ ',
  'new file mode',
  'deleted file mode',
  'old mode',
  'new mode',
  'similarity index',
  'dissimilarity index',
  'rename from ',
  'rename to ',
  'copy from ',
  'copy to ',
];

interface Hunk {
  /** New-file line number of the first line in the hunk. */
  start: number;
  /** Git's enclosing-function text after the second `@@`. */
  section: string;
  lines: HunkLine[];
}

interface ParsedDiff {
  headers: string[];
  hunks: Hunk[];
  binary: boolean;
}

let defaultRegistry: DetectorRegistry | undefined;

function getDefaultRegistry(): DetectorRegistry {
  defaultRegistry ??= createDefaultRegistry();
  return defaultRegistry;
}

/**
 * Splits one file's diff text into header lines and hunks.
 * Throws DiffParseAnomalyError on anything that is not unified-diff shaped.
 */
function readDiff(filePath: string, text: string): ParsedDiff {
  const lines = text.replace(/\r\n/g, '\n').split('\n');
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();

  const parsed: ParsedDiff = { headers: [], hunks: [], binary: false };
  let hunk: Hunk | undefined;

  for (const line of lines) {
    if (line.startsWith('Binary files ') || line.startsWith('GIT binary patch')) {
      parsed.binary = true;
      return parsed;
    }

    if (line.startsWith('@@')) {
      const m = HUNK_HEADER.exec(line);
      if (!m) {
        throw new DiffParseAnomalyError(filePath, `malformed hunk header "${line}"`);
      }
      const newStart = Number(m[3]);
      const newCount = m[4] === undefined ? 1 : Number(m[4]);
      // A zero-length new side names the line before the change.
      hunk = { start: newCount === 0 ? newStart + 1 : newStart, section: m[5].trim(), lines: [] };
      parsed.hunks.push(hunk);
      continue;
    }

    if (!hunk) {
      if (HEADER_PREFIXES.some(p => line.startsWith(p))) {
        parsed.headers.push(line);
        continue;
      }
      throw new DiffParseAnomalyError(filePath, `unexpected line before first hunk "${line.slice(0, 60)}"`);
    }

    const marker = line.charAt(0);
    if (marker === '+' || marker === '-' || marker === ' ') {
      hunk.lines.push({ marker, text: line.slice(1) });
    } else if (line === '') {
      hunk.lines.push({ marker: ' ', text: '' });
    } else if (marker !== '\\') {
      throw new DiffParseAnomalyError(filePath, `unexpected line inside hunk "${line.slice(0, 60)}"`);
    }
  }

  return parsed;
}

function headerValue(headers: readonly string[], prefix: string): string | undefined {
  const line = headers.find(h => h.startsWith(prefix));
  return line?.slice(prefix.length).trim();
}

function resolveKind(file: FileDiff, headers: readonly string[]): ChangeKind {
  const has = (prefix: string) => headers.some(h => h.startsWith(prefix));

  if (has('deleted file mode') || headers.includes('+++ /dev/null') || file.status === 'deleted') {
    return 'deleted';
  }
  if (has('new file mode') || headers.includes('--- /dev/null') || file.status === 'added') {
    return 'added';
  }
  if (has('rename from ') || file.status === 'renamed' || (file.oldPath !== undefined && file.oldPath !== file.path)) {
    return 'renamed';
  }
  return 'modified';
}

function isChanged(line: HunkLine): boolean {
  return line.marker !== ' ';
}

/**
 * Names declared in a hunk whose block contains a changed line. The hunk
 * header's enclosing function counts when a change comes before the first
 * declaration the hunk itself shows.
 */
function detectSymbols(hunk: Hunk, detector: SymbolDetector, symbols: Set<string>, types: Set<string>): void {
  const declarations = detector.findDeclarations(hunk.lines);

  for (const decl of declarations) {
    let changed = false;
    for (let i = decl.line; i <= decl.endLine && !changed; i++) {
      changed = isChanged(hunk.lines[i]);
    }
    if (changed) {
      symbols.add(decl.name);
      if (decl.kind === 'type') types.add(decl.name);
    }
  }

  if (!hunk.section) return;
  const enclosing = detector.matchDeclaration(hunk.section);
  if (!enclosing) return;

  const firstDeclaration = declarations.length > 0 ? declarations[0].line : hunk.lines.length;
  if (hunk.lines.slice(0, firstDeclaration).some(isChanged)) {
    symbols.add(enclosing.name);
    if (enclosing.kind === 'type') types.add(enclosing.name);
  }
}

/** Merges consecutive changed positions into ranges; context closes a range. */
class RangeCollector {
  readonly ranges: LineRange[] = [];
  private current: LineRange | undefined;

  touch(position: number): void {
    if (this.current && position <= this.current.end + 1) {
      this.current.end = Math.max(this.current.end, position);
      return;
    }
    this.close();
    this.current = { start: position, end: position };
  }

  close(): void {
    if (this.current) this.ranges.push(this.current);
    this.current = undefined;
  }
}

function minimalRecord(file: FileDiff, anomaly: string): FileChangeRecord {
  return {
    path: file.path,
    ...(file.oldPath !== undefined ? { oldPath: file.oldPath } : {}),
    kind: file.status ?? 'modified',
    insertions: 0,
    deletions: 0,
    ranges: [],
    symbols: [],
    types: [],
    anomaly,
  };
}

/**
 * Builds a FileChangeRecord from one file's unified diff.
 *
 * Never throws: a diff that cannot be read yields a record with zero counts
 * and `anomaly` set.
 */
export function parseFileDiff(file: FileDiff, registry: DetectorRegistry = getDefaultRegistry()): FileChangeRecord {
  let parsed: ParsedDiff;
  try {
    parsed = readDiff(file.path, file.diff);
  } catch (err) {
    if (err instanceof DiffParseAnomalyError) {
      return minimalRecord(file, err.message);
    }
    throw err;
  }

  const oldPath = file.oldPath ?? headerValue(parsed.headers, 'rename from ');
  const base = {
    path: file.path,
    ...(oldPath !== undefined && oldPath !== file.path ? { oldPath } : {}),
  };

  if (parsed.binary) {
    return { ...base, kind: 'binary', insertions: 0, deletions: 0, ranges: [], symbols: [], types: [] };
  }

  const kind = resolveKind(file, parsed.headers);
  const detector = registry.getDetector(file.path);
  const symbols = new Set<string>();
  const types = new Set<string>();
  const collector = new RangeCollector();
  let insertions = 0;
  let deletions = 0;

  for (const hunk of parsed.hunks) {
    let line = hunk.start;
    // Removals after an addition in the same run belong to the added line, not the next one.
    let afterAddition = false;
    for (const hunkLine of hunk.lines) {
      switch (hunkLine.marker) {
        case '+':
          insertions++;
          collector.touch(line);
          line++;
          afterAddition = true;
          break;
        case '-':
          deletions++;
          collector.touch(afterAddition ? line - 1 : line);
          break;
        case ' ':
          collector.close();
          line++;
          afterAddition = false;
          break;
      }
    }
    collector.close();

    detectSymbols(hunk, detector, symbols, types);
  }

  if (kind === 'deleted') {
    return {
      ...base,
      kind,
      insertions: 0,
      deletions: file.priorLineCount ?? deletions,
      ranges: [],
      symbols: [...symbols].sort(),
      types: [...types].sort(),
    };
  }

  return {
    ...base,
    kind,
    insertions,
    deletions,
    ranges: normalizeRanges(collector.ranges),
    symbols: [...symbols].sort(),
    types: [...types].sort(),
  };
}

/** Counts `+`/`-` lines the way a reader of the raw text would. */
export function countMarkers(diffText: string): { added: number; removed: number } {
  let added = 0;
  let removed = 0;
  let inHunk = false;
  for (const line of diffText.split('\n')) {
    if (line.startsWith('@@')) inHunk = true;
    else if (!inHunk) continue;
    else if (line.startsWith('+')) added++;
    else if (line.startsWith('-')) removed++;
  }
  return { added, removed };
}
