import { DetectorRegistry } from '../registry.js';
import { BraceBlockDetector } from './brace/index.js';
import { IndentBlockDetector } from './indent/index.js';
import { FallbackDetector } from './fallback/index.js';

export function createDefaultRegistry(): DetectorRegistry {
  return new DetectorRegistry(new FallbackDetector())
    .register(new BraceBlockDetector())
    .register(new IndentBlockDetector());
}
