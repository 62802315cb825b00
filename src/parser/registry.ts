import type { SymbolDetector } from './detector.js';
import { getExtension } from '../utils/path.js';

/** Symbol detectors by file extension. Files no detector claims get the fallback. */
export class DetectorRegistry {
  private byExtension = new Map<string, SymbolDetector>();

  constructor(private readonly fallback: SymbolDetector) {}

  register(detector: SymbolDetector): this {
    for (const ext of detector.extensions) {
      this.byExtension.set(ext, detector);
    }
    return this;
  }

  getDetector(filePath: string): SymbolDetector {
    return this.byExtension.get(getExtension(filePath)) ?? this.fallback;
  }
}
