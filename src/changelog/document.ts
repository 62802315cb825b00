export const SESSION_MARKER = /^<!-- diffscribe:session key=(\S+) commits=(\S*) -->\s*$/;
export const END_MARKER = /^<!-- diffscribe:end -->\s*$/;

export interface DocumentBlock {
  key: string;
  /** Full commit ids, in the order the block lists them. */
  commits: string[];
  /** From the session marker through the end marker, line terminators included. */
  text: string;
  /** Foreign text between this block and the next one. */
  trailing: string;
}

export interface ChangelogDocument {
  preamble: string;
  blocks: DocumentBlock[];
}

export type SessionOrder = 'chronological' | 'newest-first';

/** Splits into lines, keeping each line's terminator. */
function splitLines(text: string): string[] {
  return text.split(/(?<=\n)/).filter(line => line !== '');
}

/**
 * Reads a changelog into preamble and session blocks. Lossless:
 * `serialize(parseDocument(text)) === text`.
 *
 * A session marker with no end marker runs until the next session marker.
 */
export function parseDocument(text: string): ChangelogDocument {
  const doc: ChangelogDocument = { preamble: '', blocks: [] };
  let block: DocumentBlock | undefined;
  let open = false;

  for (const line of splitLines(text)) {
    const bare = line.replace(/\r?\n$/, '');
    const start = SESSION_MARKER.exec(bare);

    if (start) {
      block = {
        key: start[1],
        commits: start[2] ? start[2].split(',') : [],
        text: line,
        trailing: '',
      };
      doc.blocks.push(block);
      open = true;
      continue;
    }

    if (!block) {
      doc.preamble += line;
    } else if (open) {
      block.text += line;
      if (END_MARKER.test(bare)) open = false;
    } else {
      block.trailing += line;
    }
  }

  return doc;
}

export function serialize(doc: ChangelogDocument): string {
  return doc.preamble + doc.blocks.map(b => b.text + b.trailing).join('');
}

/** Every commit id named by a session marker. */
export function listDocumentedCommits(text: string): Set<string> {
  const ids = new Set<string>();
  for (const block of parseDocument(text).blocks) {
    for (const id of block.commits) ids.add(id);
  }
  return ids;
}

function sameCommits(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((id, i) => id === b[i]);
}

function covers(existing: readonly string[], rendered: readonly string[]): boolean {
  const known = new Set(existing);
  return rendered.every(id => known.has(id));
}

/**
 * Folds freshly rendered blocks (chronological) into an existing document.
 *
 * - same key, same commits: the existing block is kept byte for byte
 * - same key, commits already all listed: kept as well
 * - same key, new commits: replaced in place
 * - new key: inserted after its nearest earlier neighbour that exists,
 *   else before its nearest later one, else at the end of the run
 *
 * Preamble and foreign text stay where they are.
 */
export function mergeDocument(
  existing: ChangelogDocument,
  rendered: readonly DocumentBlock[],
  order: SessionOrder = 'chronological',
): ChangelogDocument {
  const newestFirst = order === 'newest-first';
  const blocks = newestFirst ? [...existing.blocks].reverse() : [...existing.blocks];
  const added = new Set<DocumentBlock>();

  const indexOfKey = (key: string) => blocks.findIndex(b => b.key === key);

  rendered.forEach((block, i) => {
    const at = indexOfKey(block.key);
    if (at >= 0) {
      const current = blocks[at];
      if (sameCommits(current.commits, block.commits) || covers(current.commits, block.commits)) return;
      blocks[at] = { ...block, trailing: current.trailing };
      return;
    }

    const fresh = { ...block, trailing: '' };
    added.add(fresh);

    for (let j = i - 1; j >= 0; j--) {
      const prev = indexOfKey(rendered[j].key);
      if (prev >= 0) {
        blocks.splice(prev + 1, 0, fresh);
        return;
      }
    }
    for (let j = i + 1; j < rendered.length; j++) {
      const next = indexOfKey(rendered[j].key);
      if (next >= 0) {
        blocks.splice(next, 0, fresh);
        return;
      }
    }
    blocks.push(fresh);
  });

  const ordered = newestFirst ? blocks.reverse() : blocks;
  return { preamble: existing.preamble, blocks: spaceOut(ordered, added) };
}

/**
 * Makes sure a blank line separates every new block from its neighbours,
 * without touching existing block text.
 */
function spaceOut(blocks: readonly DocumentBlock[], added: ReadonlySet<DocumentBlock>): DocumentBlock[] {
  const result = blocks.map(b => ({ ...b }));

  for (let i = 1; i < result.length; i++) {
    if (!added.has(blocks[i]) && !added.has(blocks[i - 1])) continue;
    const prev = result[i - 1];
    prev.trailing = padBlank(prev.text + prev.trailing).slice(prev.text.length);
  }

  return result;
}

function padBlank(text: string): string {
  if (text.endsWith('\n\n')) return text;
  if (text.endsWith('\n')) return text + '\n';
  return text + '\n\n';
}

/** Serializes a merged document, padding the preamble and ending with one newline. */
export function finalize(doc: ChangelogDocument): string {
  const preamble = doc.blocks.length > 0 && doc.preamble !== '' ? padBlank(doc.preamble) : doc.preamble;
  const text = serialize({ preamble, blocks: doc.blocks });
  return text.replace(/\n*$/, '\n');
}
