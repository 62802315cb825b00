import type { FileDiff, FileStatus } from './types.js';

const FILE_HEADER = /^diff --(?:git|cc|combined) /;

function unquote(path: string): string {
  if (path.length >= 2 && path.startsWith('"') && path.endsWith('"')) {
    return path.slice(1, -1).replace(/\\(["\\])/g, '$1');
  }
  return path;
}

function stripPrefix(path: string): string {
  const clean = unquote(path);
  return clean.startsWith('a/') || clean.startsWith('b/') ? clean.slice(2) : clean;
}

/**
 * Paths from a `diff --git a/X b/Y` line. When old and new names are equal
 * the split point is exact even if the name contains " b/".
 */
export function parseGitHeaderPaths(line: string): { oldPath: string; newPath: string } | undefined {
  const rest = line.replace(FILE_HEADER, '');
  if (rest.startsWith('a/')) {
    const half = (rest.length - 1) / 2;
    if (Number.isInteger(half) && rest.slice(2, half) === rest.slice(half + 3)) {
      const path = rest.slice(2, half);
      return { oldPath: path, newPath: path };
    }
  }
  const split = rest.lastIndexOf(' b/');
  if (split === -1) {
    const single = stripPrefix(rest.trim());
    return single ? { oldPath: single, newPath: single } : undefined;
  }
  return { oldPath: stripPrefix(rest.slice(0, split)), newPath: stripPrefix(rest.slice(split + 1)) };
}

function readFileDiff(chunk: string[]): FileDiff | undefined {
  const headerPaths = parseGitHeaderPaths(chunk[0]);
  let oldPath = headerPaths?.oldPath;
  let newPath = headerPaths?.newPath;
  let status: FileStatus = 'modified';

  for (const line of chunk.slice(1)) {
    if (line.startsWith('@@')) break;
    if (line.startsWith('new file mode')) status = 'added';
    else if (line.startsWith('deleted file mode')) status = 'deleted';
    else if (line.startsWith('rename from ')) { oldPath = unquote(line.slice(12)); status = 'renamed'; }
    else if (line.startsWith('rename to ')) newPath = unquote(line.slice(10));
    else if (line.startsWith('--- ') && line !== '--- /dev/null') oldPath = stripPrefix(line.slice(4));
    else if (line.startsWith('+++ ') && line !== '+++ /dev/null') newPath = stripPrefix(line.slice(4));
  }

  const path = status === 'deleted' ? oldPath : newPath ?? oldPath;
  if (!path) return undefined;

  return {
    path,
    ...(status === 'renamed' && oldPath && oldPath !== path ? { oldPath } : {}),
    status,
    diff: chunk.join('\n') + '\n',
  };
}

/**
 * Splits the patch of a whole commit into one FileDiff per file, in the
 * order Git printed them. Text before the first file header is ignored.
 */
export function splitCommitDiff(patch: string): FileDiff[] {
  const files: FileDiff[] = [];
  let chunk: string[] | undefined;

  const flush = () => {
    if (!chunk) return;
    const file = readFileDiff(chunk);
    if (file) files.push(file);
  };

  const lines = patch.replace(/\r\n/g, '\n').split('\n');
  if (lines[lines.length - 1] === '') lines.pop();

  for (const line of lines) {
    if (FILE_HEADER.test(line)) {
      flush();
      chunk = [line];
    } else if (chunk) {
      chunk.push(line);
    }
  }
  flush();

  return files;
}
