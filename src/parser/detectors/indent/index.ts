import type { Declaration, DeclarationKind, DeclarationMatch, HunkLine, SymbolDetector } from '../../detector.js';
import { sameSide, scanDeclarations } from '../../detector.js';

const PATTERNS: Array<{ kind: DeclarationKind; regex: RegExp }> = [
  { kind: 'function', regex: /^\s*(?:async\s+)?def\s+(?:self\.)?([A-Za-z_]\w*[?!]?)/ },
  { kind: 'type', regex: /^\s*class\s+([A-Za-z_][\w:]*)/ },
  { kind: 'type', regex: /^\s*module\s+([A-Za-z_][\w:]*)/ },
];

export function indentOf(text: string): number {
  let width = 0;
  for (const ch of text) {
    if (ch === ' ') width++;
    else if (ch === '\t') width += 4;
    else break;
  }
  return width;
}

/**
 * Block end for an indentation-delimited declaration: the line before the
 * next non-blank line at the same or a shallower indent.
 */
function indentSpanEnd(lines: readonly HunkLine[], index: number): number {
  const base = indentOf(lines[index].text);
  let end = index;

  for (let j = index + 1; j < lines.length; j++) {
    if (!sameSide(lines, index, j)) continue;
    const text = lines[j].text;
    if (text.trim() === '') continue;
    if (indentOf(text) <= base) break;
    end = j;
  }

  // Trailing changed lines on the other side still sit inside the block.
  while (end + 1 < lines.length && !sameSide(lines, index, end + 1)) {
    end++;
  }

  return end;
}

export class IndentBlockDetector implements SymbolDetector {
  id = 'indent';
  extensions = ['.py', '.pyi', '.pyw', '.rb', '.rake'];

  matchDeclaration(text: string): DeclarationMatch | undefined {
    for (const { kind, regex } of PATTERNS) {
      const m = regex.exec(text);
      if (m) return { name: m[1], kind };
    }
    return undefined;
  }

  findDeclarations(lines: readonly HunkLine[]): Declaration[] {
    return scanDeclarations(lines, this, indentSpanEnd);
  }
}
