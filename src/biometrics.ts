import crypto from 'node:crypto';
import { Redis } from 'ioredis';
import { Breaker } from './circuit.js';
import { recordBiometric } from './metrics.js';
import { errorMessage, logger } from './observability/log.js';
import type { PipelineConfig } from './config/pipeline.js';

/** One heart-rate reading; `ts` is epoch ms, `bpm` is beats per minute. */
export type HeartRateSample = { ts: number; bpm: number };

export interface BiometricStore {
  /** Mean bpm of samples with `startMs <= ts < endMs`, or null when there are none. */
  averageBetween(startMs: number, endMs: number): Promise<number | null>;
  record(sample: HeartRateSample): Promise<void>;
}

/** Read consent is granted elsewhere; the resolver only asks. */
export interface ReadAuthorization {
  isReadGranted(): boolean;
}

export function envReadAuthorization(env: NodeJS.ProcessEnv = process.env): ReadAuthorization {
  return { isReadGranted: () => env.BIOMETRIC_READ_GRANTED === 'true' };
}

export function staticReadAuthorization(granted: boolean): ReadAuthorization {
  return { isReadGranted: () => granted };
}

export function isValidSample(s: HeartRateSample): boolean {
  return Number.isFinite(s.ts) && Number.isFinite(s.bpm) && s.bpm > 0;
}

function mean(values: number[]): number | null {
  if (!values.length) return null;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

export class MemoryBiometricStore implements BiometricStore {
  private samples: HeartRateSample[] = [];
  constructor(initial: HeartRateSample[] = []) {
    for (const s of initial) if (isValidSample(s)) this.samples.push({ ...s });
  }
  async averageBetween(startMs: number, endMs: number) {
    return mean(this.samples.filter(s => s.ts >= startMs && s.ts < endMs).map(s => s.bpm));
  }
  async record(sample: HeartRateSample) {
    if (!isValidSample(sample)) throw new RangeError(`invalid heart-rate sample ts=${sample.ts} bpm=${sample.bpm}`);
    this.samples.push({ ...sample });
  }
  size() { return this.samples.length; }
}

/** The two sorted-set commands the Redis store needs. */
export interface SampleZSet {
  zadd(key: string, score: number, member: string): Promise<unknown>;
  zrangebyscore(key: string, min: number | string, max: number | string): Promise<string[]>;
}

export function redisSampleZSet(client: Redis): SampleZSet {
  return {
    zadd: (key, score, member) => client.zadd(key, score, member),
    zrangebyscore: (key, min, max) => client.zrangebyscore(key, min, max),
  };
}

export function encodeSampleMember(s: HeartRateSample, nonce = crypto.randomBytes(4).toString('hex')): string {
  return `${s.ts}:${s.bpm}:${nonce}`;
}

export function decodeSampleMember(member: string): HeartRateSample | null {
  const [ts, bpm] = member.split(':');
  const s = { ts: Number(ts), bpm: Number(bpm) };
  return isValidSample(s) ? s : null;
}

/** Samples live in one sorted set scored by epoch ms. */
export class RedisBiometricStore implements BiometricStore {
  constructor(private zset: SampleZSet, private key = 'hr:samples') {}

  async averageBetween(startMs: number, endMs: number) {
    const members = await this.zset.zrangebyscore(this.key, startMs, `(${endMs}`);
    const values: number[] = [];
    for (const m of members) {
      const s = decodeSampleMember(m);
      if (s) values.push(s.bpm);
    }
    return mean(values);
  }

  async record(sample: HeartRateSample) {
    if (!isValidSample(sample)) throw new RangeError(`invalid heart-rate sample ts=${sample.ts} bpm=${sample.bpm}`);
    await this.zset.zadd(this.key, sample.ts, encodeSampleMember(sample));
  }
}

export function biometricStoreFromConfig(cfg: PipelineConfig): BiometricStore {
  return cfg.REDIS_URL
    ? new RedisBiometricStore(redisSampleZSet(new Redis(cfg.REDIS_URL)), cfg.HR_SAMPLES_KEY)
    : new MemoryBiometricStore();
}

export const WINDOW_HALF_MS = 30_000;

export type WindowResolverOptions = {
  store: BiometricStore;
  auth: ReadAuthorization;
  timeoutMs?: number;
  breaker?: Breaker;
};

export class WindowResolver {
  readonly breaker: Breaker;
  private store: BiometricStore;
  private auth: ReadAuthorization;
  private timeoutMs: number;

  constructor(opts: WindowResolverOptions) {
    this.store = opts.store;
    this.auth = opts.auth;
    this.timeoutMs = opts.timeoutMs ?? 3000;
    this.breaker = opts.breaker ?? new Breaker();
  }

  /**
   * Average heart rate in `[t - 30s, t + 30s)`, truncated toward zero.
   * Never rejects; any lookup problem comes back as undefined.
   */
  async averageAround(at: Date): Promise<number | undefined> {
    const t = at.getTime();
    try {
      if (!this.auth.isReadGranted() || !this.breaker.allow()) {
        recordBiometric('skipped');
        return undefined;
      }
      const avg = await this.withTimeout(this.store.averageBetween(t - WINDOW_HALF_MS, t + WINDOW_HALF_MS));
      this.breaker.success();
      if (avg === null || !Number.isFinite(avg)) {
        recordBiometric('miss');
        return undefined;
      }
      recordBiometric('hit');
      return Math.trunc(avg);
    } catch (e) {
      this.breaker.fail();
      recordBiometric('error');
      logger.warn('biometric_query_failed', { atMs: t, message: errorMessage(e), breaker: this.breaker.state() });
      return undefined;
    }
  }

  private withTimeout<T>(p: Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => reject(new Error(`biometric query timed out after ${this.timeoutMs}ms`)), this.timeoutMs);
      p.then(
        (v) => { clearTimeout(timer); resolve(v); },
        (e: unknown) => { clearTimeout(timer); reject(e); },
      );
    });
  }
}
