import { describe, expect, it } from 'vitest';
import { DurationCache } from './duration-cache.js';
import { createFakeProbe } from './testing/fakes.js';

const segment = (name: string) => ({ path: `/rec/${name}`, name, creationTime: new Date(0) });

describe('DurationCache', () => {
  it('probes each file at most once', async () => {
    const probe = createFakeProbe({ 'a.mp3': 100, 'b.mp3': 50 });
    const cache = new DurationCache(probe);

    const durations = await Promise.all([
      cache.lookup(segment('a.mp3')),
      cache.lookup(segment('a.mp3')),
      cache.lookup(segment('b.mp3')),
      cache.durationOf('/rec/a.mp3'),
    ]);

    expect(durations).toEqual([100, 100, 50, 100]);
    expect(probe.calls).toEqual(['/rec/a.mp3', '/rec/b.mp3']);
  });

  it('does not keep a failed lookup', async () => {
    const probe = createFakeProbe({});
    const cache = new DurationCache(probe);

    await expect(cache.durationOf('/rec/missing.mp3')).rejects.toThrow('no duration configured for missing.mp3');
    await expect(cache.durationOf('/rec/missing.mp3')).rejects.toThrow('no duration configured for missing.mp3');
    expect(probe.calls).toEqual(['/rec/missing.mp3', '/rec/missing.mp3']);
  });
});
