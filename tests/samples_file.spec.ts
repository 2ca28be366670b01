import { describe, it, expect } from 'vitest';
import { parseSamples } from '../src/samples_file.js';

describe('parseSamples', () => {
  it('accepts epoch ms and ISO timestamps and drops bad rows', () => {
    const { samples, dropped } = parseSamples([
      { ts: 1_734_427_800_000, bpm: 72 },
      { ts: '2024-12-17T09:30:00Z', bpm: '75' },
      { ts: '1734427800000', bpm: 70 },
      { ts: 'yesterday', bpm: 70 },
      { ts: 1, bpm: 0 },
      'nope',
    ]);
    expect(samples).toEqual([
      { ts: 1_734_427_800_000, bpm: 72 },
      { ts: Date.UTC(2024, 11, 17, 9, 30), bpm: 75 },
      { ts: 1_734_427_800_000, bpm: 70 },
    ]);
    expect(dropped).toBe(3);
  });

  it('requires an array', () => {
    expect(() => parseSamples({ samples: [] })).toThrow(TypeError);
  });
});
