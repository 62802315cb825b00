import { describe, it, expect } from 'vitest';
import { BraceBlockDetector } from '../src/parser/detectors/brace/index.js';
import { IndentBlockDetector } from '../src/parser/detectors/indent/index.js';
import { createDefaultRegistry } from '../src/parser/detectors/index.js';
import type { HunkLine } from '../src/parser/detector.js';

function hunk(...lines: string[]): HunkLine[] {
  return lines.map(line => {
    const marker = line.charAt(0);
    return { marker: marker === '+' || marker === '-' ? marker : ' ', text: line.slice(1) };
  });
}

describe('BraceBlockDetector', () => {
  const detector = new BraceBlockDetector();

  it('recognizes declarations across brace languages', () => {
    expect(detector.matchDeclaration('func (s *Server) Start(ctx context.Context) error {')).toEqual({ name: 'Start', kind: 'function' });
    expect(detector.matchDeclaration('pub fn parse(input: &str) -> Result<Ast> {')).toEqual({ name: 'parse', kind: 'function' });
    expect(detector.matchDeclaration('export const handler = async (event) => {')).toEqual({ name: 'handler', kind: 'function' });
    expect(detector.matchDeclaration('interface Props {')).toEqual({ name: 'Props', kind: 'type' });
    expect(detector.matchDeclaration('type Id = string;')).toEqual({ name: 'Id', kind: 'type' });
  });

  it('ignores control flow and calls', () => {
    expect(detector.matchDeclaration('  if (ready) {')).toBeUndefined();
    expect(detector.matchDeclaration('while (running) {')).toBeUndefined();
    expect(detector.matchDeclaration('  foo(bar);')).toBeUndefined();
  });

  it('spans a declaration to its closing brace or the hunk end', () => {
    const lines = hunk(' function a() {', '+  x();', ' }', ' function b() {', '   y();');
    expect(detector.findDeclarations(lines)).toEqual([
      { name: 'a', kind: 'function', line: 0, endLine: 2 },
      { name: 'b', kind: 'function', line: 3, endLine: 4 },
    ]);
  });
});

describe('IndentBlockDetector', () => {
  const detector = new IndentBlockDetector();

  it('recognizes Python and Ruby declarations', () => {
    expect(detector.matchDeclaration('    async def fetch(self):')).toEqual({ name: 'fetch', kind: 'function' });
    expect(detector.matchDeclaration('  def self.build')).toEqual({ name: 'build', kind: 'function' });
    expect(detector.matchDeclaration('class Foo(Base):')).toEqual({ name: 'Foo', kind: 'type' });
    expect(detector.matchDeclaration('module Billing')).toEqual({ name: 'Billing', kind: 'type' });
    expect(detector.matchDeclaration('x = define(1)')).toBeUndefined();
  });

  it('ends a block at the next line with the same indent', () => {
    const lines = hunk(' class Shape:', '     def area(self):', '-        return 0', '+        return 1', ' ', ' def helper():');
    expect(detector.findDeclarations(lines)).toEqual([
      { name: 'Shape', kind: 'type', line: 0, endLine: 3 },
      { name: 'area', kind: 'function', line: 1, endLine: 3 },
      { name: 'helper', kind: 'function', line: 5, endLine: 5 },
    ]);
  });
});

describe('DetectorRegistry', () => {
  const registry = createDefaultRegistry();

  it('selects a detector by extension', () => {
    expect(registry.getDetector('src/Main.TS').id).toBe('brace');
    expect(registry.getDetector('app/models.py').id).toBe('indent');
    expect(registry.getDetector('Rakefile.rake').id).toBe('indent');
  });

  it('falls back for unknown files', () => {
    expect(registry.getDetector('data.unknown').id).toBe('fallback');
    expect(registry.getDetector('Makefile').id).toBe('fallback');
  });

  it('lets a later detector take over an extension', () => {
    const custom = createDefaultRegistry().register({
      id: 'custom-ts',
      extensions: ['.ts'],
      matchDeclaration: () => undefined,
      findDeclarations: () => [],
    });
    expect(custom.getDetector('src/index.ts').id).toBe('custom-ts');
    expect(custom.getDetector('src/index.js').id).toBe('brace');
  });
});
