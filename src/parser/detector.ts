export type DeclarationKind = 'function' | 'type';

/** One line of a hunk, marker split off. */
export interface HunkLine {
  marker: '+' | '-' | ' ';
  text: string;
}

export interface DeclarationMatch {
  name: string;
  kind: DeclarationKind;
}

export interface Declaration extends DeclarationMatch {
  /** Index of the declaration line within the hunk. */
  line: number;
  /** Last hunk index covered by the declaration's block. */
  endLine: number;
}

export interface SymbolDetector {
  id: string;
  extensions: string[];
  matchDeclaration(text: string): DeclarationMatch | undefined;
  findDeclarations(lines: readonly HunkLine[]): Declaration[];
}

/**
 * Whether a hunk line belongs to the same side of the diff as the line at
 * `anchor`. A removed declaration is read against the old file, anything
 * else against the new one.
 */
export function sameSide(lines: readonly HunkLine[], anchor: number, index: number): boolean {
  const marker = lines[index].marker;
  if (lines[anchor].marker === '-') return marker !== '+';
  return marker !== '-';
}

export function scanDeclarations(
  lines: readonly HunkLine[],
  detector: Pick<SymbolDetector, 'matchDeclaration'>,
  spanEnd: (lines: readonly HunkLine[], index: number) => number,
): Declaration[] {
  const found: Declaration[] = [];
  for (let i = 0; i < lines.length; i++) {
    const match = detector.matchDeclaration(lines[i].text);
    if (match) {
      found.push({ ...match, line: i, endLine: spanEnd(lines, i) });
    }
  }
  return found;
}
