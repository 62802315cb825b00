import { createHash } from 'node:crypto';

export function contentHash(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

export function shortHash(content: string, length = 8): string {
  return contentHash(content).slice(0, length);
}

/**
 * Stable fingerprint of the settings an analysis depends on. Keys are sorted
 * so property order does not matter.
 */
export function settingsFingerprint(settings: Record<string, string | number | boolean>): string {
  const canonical = Object.keys(settings)
    .sort()
    .map(key => `${key}=${String(settings[key])}`)
    .join(';');
  return shortHash(canonical, 16);
}
