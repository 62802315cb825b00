import type { Declaration, DeclarationMatch, SymbolDetector } from '../../detector.js';

/** Used for files with no known declaration syntax: reports nothing. */
export class FallbackDetector implements SymbolDetector {
  id = 'fallback';
  extensions: string[] = [];

  matchDeclaration(): DeclarationMatch | undefined {
    return undefined;
  }

  findDeclarations(): Declaration[] {
    return [];
  }
}
