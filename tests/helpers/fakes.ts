import type { HttpImpl, HttpResponse, FetchError } from '../../src/rpc.js';
import type { SignatureInfo, SignaturePage, SignatureSource } from '../../src/signatures.js';
import type { SampleZSet } from '../../src/biometrics.js';

export function jsonResponse(body: unknown, statusCode = 200): HttpResponse {
  return { statusCode, body: { json: async () => body } };
}

export function brokenBodyResponse(statusCode = 200): HttpResponse {
  return { statusCode, body: { json: async () => { throw new SyntaxError('Unexpected token < in JSON'); } } };
}

/** Never settles until the request signal aborts. */
export const hangingHttp: HttpImpl = (_url, init) =>
  new Promise<HttpResponse>((_resolve, reject) => {
    init.signal.addEventListener('abort', () => reject(new Error('aborted')));
  });

export type Deferred<T> = { promise: Promise<T>; resolve(v: T): void };
export function deferred<T>(): Deferred<T> {
  let resolve: (v: T) => void = () => {};
  const promise = new Promise<T>((r) => { resolve = r; });
  return { promise, resolve };
}

export type PageCall = { address: string; limit: number; before?: string };

/** Serves queued pages in order; a queued Deferred lets a test hold a fetch open. */
export class FakeSource implements SignatureSource {
  calls: PageCall[] = [];
  private queue: Array<SignaturePage | Deferred<SignaturePage>> = [];

  pushPage(page: SignatureInfo[]) { this.queue.push({ ok: true, value: page }); return this; }
  pushError(error: FetchError) { this.queue.push({ ok: false, error }); return this; }
  pushDeferred(): Deferred<SignaturePage> { const d = deferred<SignaturePage>(); this.queue.push(d); return d; }

  async fetchPage(address: string, limit: number, before?: string): Promise<SignaturePage> {
    this.calls.push({ address, limit, before });
    const next = this.queue.shift();
    if (!next) return { ok: true, value: [] };
    return 'promise' in next ? next.promise : next;
  }
}

export function sig(signature: string, blockTime?: number, extra: Partial<SignatureInfo> = {}): SignatureInfo {
  return { signature, slot: 1000, ...(blockTime !== undefined ? { blockTime } : {}), ...extra };
}

/** In-memory stand-in for a Redis sorted set. */
export class FakeZSet implements SampleZSet {
  entries: Array<{ key: string; score: number; member: string }> = [];
  failWith: Error | null = null;

  async zadd(key: string, score: number, member: string) {
    if (this.failWith) throw this.failWith;
    this.entries.push({ key, score, member });
    return 1;
  }

  async zrangebyscore(key: string, min: number | string, max: number | string) {
    if (this.failWith) throw this.failWith;
    const bound = (b: number | string) => {
      const s = String(b);
      return s.startsWith('(') ? { v: Number(s.slice(1)), excl: true } : { v: Number(s), excl: false };
    };
    const lo = bound(min);
    const hi = bound(max);
    return this.entries
      .filter(e => e.key === key)
      .filter(e => (lo.excl ? e.score > lo.v : e.score >= lo.v) && (hi.excl ? e.score < hi.v : e.score <= hi.v))
      .sort((a, b) => a.score - b.score)
      .map(e => e.member);
  }
}
