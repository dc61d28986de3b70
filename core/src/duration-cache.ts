import type { AudioSegmentFile, DurationLookup, DurationProbe } from './types.js';

/**
 * Memoizes duration lookups per file path for the lifetime of one run.
 *
 * Concurrent lookups of the same path share one probe call.
 */
export class DurationCache {
  private readonly durations = new Map<string, Promise<number>>();

  constructor(private readonly probe: DurationProbe) {}

  durationOf(filePath: string): Promise<number> {
    const cached = this.durations.get(filePath);
    if (cached) {
      return cached;
    }
    const pending = this.probe.probe(filePath);
    this.durations.set(filePath, pending);
    pending.catch(() => {
      this.durations.delete(filePath);
    });
    return pending;
  }

  readonly lookup: DurationLookup = (segment: AudioSegmentFile) => this.durationOf(segment.path);
}
