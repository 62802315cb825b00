import { extname, basename } from 'node:path';

export function getExtension(filePath: string): string {
  return extname(filePath).toLowerCase();
}

const TEST_PATTERNS = [
  /(^|\/)(test|tests|__tests__|spec|specs)\//,
  /\.(test|spec)\.[^/.]+$/,
  /(^|\/)test_[^/]+\.py$/,
  /_test\.(go|py|rb)$/,
];

export function isTestFile(filePath: string): boolean {
  const normalized = filePath.replace(/\\/g, '/');
  return TEST_PATTERNS.some(p => p.test(normalized));
}

const DOC_EXTENSIONS = new Set(['.md', '.mdx', '.rst', '.adoc']);

export function isDocFile(filePath: string): boolean {
  const normalized = filePath.replace(/\\/g, '/');
  if (DOC_EXTENSIONS.has(getExtension(normalized))) return true;
  if (/(^|\/)docs?\//.test(normalized)) return true;
  return /^(readme|changelog|license|contributing)$/i.test(basename(normalized).replace(/\.[^.]*$/, ''));
}
