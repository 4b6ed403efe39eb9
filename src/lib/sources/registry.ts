/**
 * Source registry, kept in priority order (first registered wins conflicts)
 */

import { SourceAdapter } from './types';

export class SourceRegistry {
  private sources = new Map<string, SourceAdapter>();

  /** Register a source at the lowest priority so far */
  register(source: SourceAdapter): void {
    if (this.sources.has(source.sourceId)) {
      throw new Error(`Source already registered: ${source.sourceId}`);
    }
    this.sources.set(source.sourceId, source);
  }

  /** All sources, highest priority first */
  getAll(): SourceAdapter[] {
    return Array.from(this.sources.values());
  }

  /** Priority rank of a source (0 is highest) */
  rankOf(sourceId: string): number {
    return this.getIds().indexOf(sourceId);
  }

  getIds(): string[] {
    return Array.from(this.sources.keys());
  }
}
