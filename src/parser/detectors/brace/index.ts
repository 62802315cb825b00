import type { Declaration, DeclarationKind, DeclarationMatch, HunkLine, SymbolDetector } from '../../detector.js';
import { sameSide, scanDeclarations } from '../../detector.js';
import { CONTROL_KEYWORDS, STATEMENT_PREFIX } from '../keywords.js';

interface Pattern {
  kind: DeclarationKind;
  regex: RegExp;
}

const IDENT = '[A-Za-z_$][\\w$]*';

const PATTERNS: Pattern[] = [
  // class / interface / struct / enum / trait, with leading modifiers
  {
    kind: 'type',
    regex: new RegExp(
      '^\\s*(?:export\\s+)?(?:default\\s+)?(?:declare\\s+)?' +
      '(?:(?:public|private|protected|internal|abstract|final|sealed|static|partial|data|open|pub(?:\\([^)]*\\))?)\\s+)*' +
      '(?:(?:enum|annotation)\\s+)?(?:class|interface|struct|enum|trait|record|union|object)\\s+(' + IDENT + ')',
    ),
  },
  // type Foo = ...
  { kind: 'type', regex: new RegExp('^\\s*(?:export\\s+)?(?:declare\\s+)?type\\s+(' + IDENT + ')\\s*(?:<[^>]*>)?\\s*=') },
  // Go: type Foo struct / interface
  { kind: 'type', regex: /^\s*type\s+([A-Za-z_]\w*)\s+(?:struct|interface)\b/ },
  // Rust: impl [Trait for] Foo
  { kind: 'type', regex: /^\s*impl(?:\s*<[^>]*>)?\s+(?:[A-Za-z_][\w:]*(?:<[^>]*>)?\s+for\s+)?([A-Za-z_]\w*)/ },

  { kind: 'function', regex: new RegExp('^\\s*(?:export\\s+)?(?:default\\s+)?(?:async\\s+)?function\\s*\\*?\\s*(' + IDENT + ')\\s*[<(]') },
  // Go: func (r *Recv) Name(
  { kind: 'function', regex: /^\s*func\s+(?:\([^)]*\)\s*)?([A-Za-z_]\w*)\s*[[(]/ },
  // Rust
  { kind: 'function', regex: /^\s*(?:pub(?:\([^)]*\))?\s+)?(?:const\s+)?(?:async\s+)?(?:unsafe\s+)?(?:extern\s+"[^"]*"\s+)?fn\s+([A-Za-z_]\w*)/ },
  // Kotlin / Swift / Scala
  { kind: 'function', regex: /^\s*(?:(?:public|private|protected|internal|open|override|static|final|inline|suspend|mutating|class|@\w+)\s+)*(?:fun|func|def)\s+(?:<[^>]*>\s*)?([A-Za-z_]\w*)/ },
  // PHP methods
  { kind: 'function', regex: /^\s*(?:(?:public|private|protected|static|final|abstract)\s+)*function\s+&?\s*([A-Za-z_]\w*)\s*\(/ },
  // const foo = (...) => / const foo = function
  {
    kind: 'function',
    regex: new RegExp(
      '^\\s*(?:export\\s+)?(?:const|let|var)\\s+(' + IDENT + ')\\s*(?::[^=]+)?=\\s*(?:async\\s+)?' +
      '(?:function\\b|\\([^)]*\\)\\s*(?::\\s*[^=]*)?=>|' + IDENT + '\\s*=>)',
    ),
  },
  // Brace-opening signature: methods, C-family functions
  {
    kind: 'function',
    regex: new RegExp(
      '^\\s*(?:(?:public|private|protected|internal|static|async|override|readonly|abstract|final|virtual|synchronized|extern|inline|unsafe|const|export|default)\\s+)*' +
      '(?:[A-Za-z_$][\\w$.<>\\[\\],?*&:]*\\s+)*?[*&]?(?:[A-Za-z_]\\w*::)*(' + '[A-Za-z_$~][\\w$]*' + ')\\s*(?:<[^>]*>)?\\s*' +
      '\\([^;()\'"`]*\\)\\s*(?:const\\s*)?(?::\\s*[^{;=]+|->\\s*[^{;=]+|throws\\s+[^{;=]+)?\\s*\\{\\s*$',
    ),
  },
];

function countBraces(text: string): number {
  let delta = 0;
  for (const ch of text) {
    if (ch === '{') delta++;
    else if (ch === '}') delta--;
  }
  return delta;
}

/**
 * Block end for a brace-delimited declaration: where its braces balance, or
 * the end of the hunk. Declarations that open no block on their line (or the
 * following one) cover only themselves.
 */
function braceSpanEnd(lines: readonly HunkLine[], index: number): number {
  let depth = 0;
  let opened = false;
  let seen = 0;

  for (let j = index; j < lines.length; j++) {
    if (!sameSide(lines, index, j)) continue;
    const text = lines[j].text;
    if (text.includes('{')) opened = true;
    depth += countBraces(text);
    seen++;

    if (!opened && seen >= 2) return index;
    if (opened && depth <= 0) return j;
  }

  return opened ? lines.length - 1 : index;
}

export class BraceBlockDetector implements SymbolDetector {
  id = 'brace';
  extensions = [
    '.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs',
    '.java', '.c', '.h', '.cc', '.cpp', '.cxx', '.hpp', '.cs',
    '.go', '.rs', '.swift', '.kt', '.kts', '.scala', '.php', '.dart',
  ];

  matchDeclaration(text: string): DeclarationMatch | undefined {
    if (STATEMENT_PREFIX.test(text)) return undefined;
    for (const { kind, regex } of PATTERNS) {
      const m = regex.exec(text);
      if (m && !CONTROL_KEYWORDS.has(m[1])) {
        return { name: m[1], kind };
      }
    }
    return undefined;
  }

  findDeclarations(lines: readonly HunkLine[]): Declaration[] {
    return scanDeclarations(lines, this, braceSpanEnd);
  }
}
