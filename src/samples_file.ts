import fs from 'node:fs';
import { isRecord } from './rpc.js';
import { isValidSample, type HeartRateSample } from './biometrics.js';

function toMs(v: unknown): number {
  if (typeof v === 'number') return v;
  if (typeof v === 'string') return /^\d+$/.test(v) ? Number(v) : Date.parse(v);
  return NaN;
}

/** Accepts `[{ ts, bpm }]` where ts is epoch ms or an ISO date string. Invalid rows are dropped. */
export function parseSamples(raw: unknown): { samples: HeartRateSample[]; dropped: number } {
  if (!Array.isArray(raw)) throw new TypeError('samples file must contain a JSON array');
  const samples: HeartRateSample[] = [];
  let dropped = 0;
  for (const row of raw) {
    const s = isRecord(row) ? { ts: toMs(row.ts), bpm: Number(row.bpm) } : null;
    if (s && isValidSample(s)) samples.push(s);
    else dropped++;
  }
  return { samples, dropped };
}

export function readSamplesFile(path: string) {
  const raw: unknown = JSON.parse(fs.readFileSync(path, 'utf8'));
  return parseSamples(raw);
}
