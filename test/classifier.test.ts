import { describe, it, expect } from 'vitest';
import { classifyCommit, matchCategories, shapeOf } from '../src/analysis/classifier.js';

describe('classifyCommit', () => {
  it('maps keyword families to categories', () => {
    expect(classifyCommit('Add user settings page')).toBe('feature');
    expect(classifyCommit('Implement retry queue')).toBe('feature');
    expect(classifyCommit('Fix crash on empty input')).toBe('fix');
    expect(classifyCommit('Refactor parser internals')).toBe('refactor');
    expect(classifyCommit('Clean up old code')).toBe('refactor');
    expect(classifyCommit('Update README')).toBe('docs');
    expect(classifyCommit('Bump version')).toBe('other');
  });

  it('prefers fix over feature when both match', () => {
    expect(matchCategories('Fix crash when adding items')).toEqual(['fix', 'feature']);
    expect(classifyCommit('Fix crash when adding items')).toBe('fix');
  });

  it('matches whole words and their inflections', () => {
    expect(classifyCommit('Prefix handling')).toBe('other');
    expect(classifyCommit('fixes #12')).toBe('fix');
    expect(classifyCommit('Cleaned up imports')).toBe('refactor');
    expect(classifyCommit('Simplified retry loop')).toBe('refactor');
  });

  it('ignores words that only start like a keyword', () => {
    expect(matchCategories('Add test fixtures for parser')).toEqual(['feature']);
    expect(classifyCommit('Update docker compose')).toBe('other');
    expect(classifyCommit('Newline handling in addresses')).toBe('other');
  });

  it('does not call test-only changes features', () => {
    const shape = shapeOf(['test/parser.test.ts', 'src/__tests__/cache.spec.ts']);
    expect(shape).toEqual({ files: 2, testFiles: 2, docFiles: 0 });
    expect(classifyCommit('Add parser cases', shape)).toBe('refactor');
    expect(classifyCommit('Fix flaky case', shape)).toBe('fix');
  });

  it('labels documentation-only changes as docs', () => {
    const shape = shapeOf(['README.md', 'docs/usage.md']);
    expect(classifyCommit('Tweak wording', shape)).toBe('docs');
    expect(classifyCommit('Add usage guide', shape)).toBe('feature');
  });

  it('is total and deterministic', () => {
    const categories = new Set(['feature', 'fix', 'refactor', 'docs', 'other']);
    for (const message of ['', '   ', '🎉', 'merge branch main', 'FEAT: x', 'a\nfix: b']) {
      const first = classifyCommit(message);
      expect(categories.has(first)).toBe(true);
      expect(classifyCommit(message)).toBe(first);
    }
  });
});
