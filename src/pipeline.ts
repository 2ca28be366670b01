import crypto from 'node:crypto';
import { EventEmitter } from 'node:events';
import { PipelineState, type EnrichedRecord, type PipelineSnapshot } from './state.js';
import type { SignatureInfo, SignatureSource } from './signatures.js';
import type { FetchError } from './rpc.js';
import type { WindowResolver } from './biometrics.js';
import { recordsAppended } from './metrics.js';
import { errorMessage, logger } from './observability/log.js';

export type RejectReason = 'busy' | 'no_cursor' | 'exhausted' | 'empty_address';

export type LoadOutcome =
  | { status: 'loaded'; added: number }
  | { status: 'exhausted' }
  | { status: 'rejected'; reason: RejectReason }
  | { status: 'failed'; error: FetchError };

export type PipelineOptions = {
  source: SignatureSource;
  resolver: Pick<WindowResolver, 'averageAround'>;
  pageLimit?: number;
  now?: () => Date;
  newId?: () => string;
};

/** Block time when the ledger reports one, otherwise the time of the fetch. */
export function recordTimestamp(info: SignatureInfo, now: () => Date): Date {
  return info.blockTime !== undefined ? new Date(info.blockTime * 1000) : now();
}

/**
 * Fetches signature pages for one address and attaches the heart-rate average around each
 * transaction. Loads never overlap: a request arriving while another is in flight is refused.
 */
export class CorrelationPipeline {
  private state = new PipelineState();
  private events = new EventEmitter();
  private source: SignatureSource;
  private resolver: Pick<WindowResolver, 'averageAround'>;
  private pageLimit: number;
  private now: () => Date;
  private newId: () => string;

  constructor(opts: PipelineOptions) {
    this.source = opts.source;
    this.resolver = opts.resolver;
    this.pageLimit = opts.pageLimit ?? 30;
    if (!Number.isInteger(this.pageLimit) || this.pageLimit < 1) throw new RangeError(`pageLimit must be a positive integer, got ${this.pageLimit}`);
    this.now = opts.now ?? (() => new Date());
    this.newId = opts.newId ?? (() => crypto.randomUUID());
  }

  get records(): readonly EnrichedRecord[] { return this.state.records; }
  get cursor() { return this.state.cursor; }
  get isLoadingInitial() { return this.state.loading === 'loading_initial'; }
  get isLoadingMore() { return this.state.loading === 'loading_more'; }
  get isLoading() { return this.state.loading !== 'idle'; }
  get isExhausted() { return this.state.exhausted; }
  get lastError() { return this.state.lastError; }
  snapshot(): PipelineSnapshot { return this.state.snapshot(); }

  on(event: 'change', listener: () => void): this;
  on(event: 'failed', listener: (error: FetchError) => void): this;
  on(event: 'change' | 'failed', listener: (...args: FetchError[]) => void): this {
    this.events.on(event, listener);
    return this;
  }

  async initialFetch(address: string): Promise<LoadOutcome> {
    const addr = address.trim();
    if (!addr) return { status: 'rejected', reason: 'empty_address' };
    if (!this.state.begin('loading_initial')) return this.reject('busy');
    this.state.reset(addr);
    this.notify('change');
    return this.run(addr, undefined);
  }

  async loadMore(): Promise<LoadOutcome> {
    if (this.state.loading !== 'idle') return this.reject('busy');
    const address = this.state.address;
    const cursor = this.state.cursor;
    if (!address || cursor === null) return this.reject('no_cursor');
    if (this.state.exhausted) return this.reject('exhausted');
    this.state.begin('loading_more');
    this.notify('change');
    return this.run(address, cursor);
  }

  // A throwing listener must not leave the state stuck in a loading phase.
  private notify(event: 'change' | 'failed', ...args: FetchError[]) {
    try {
      this.events.emit(event, ...args);
    } catch (e) {
      logger.error('listener_failed', { event, message: errorMessage(e) });
    }
  }

  private reject(reason: RejectReason): LoadOutcome {
    logger.debug('load_rejected', { reason, loading: this.state.loading });
    return { status: 'rejected', reason };
  }

  private async run(address: string, before: string | undefined): Promise<LoadOutcome> {
    try {
      const page = await this.source.fetchPage(address, this.pageLimit, before);
      if (!page.ok) {
        this.state.fail(page.error);
        this.notify('failed', page.error);
        return { status: 'failed', error: page.error };
      }
      const enriched = await this.enrich(page.value);
      this.state.commit(enriched);
      recordsAppended.inc(enriched.length);
      logger.info('page_loaded', { address, before, added: enriched.length, cursor: this.state.cursor });
      return enriched.length ? { status: 'loaded', added: enriched.length } : { status: 'exhausted' };
    } finally {
      this.state.finish();
      this.notify('change');
    }
  }

  private async lookupMetric(signature: string, at: Date): Promise<number | undefined> {
    try {
      return await this.resolver.averageAround(at);
    } catch (e) {
      logger.warn('metric_lookup_failed', { signature, message: errorMessage(e) });
      return undefined;
    }
  }

  // One outstanding biometric query at a time, in page order.
  private async enrich(page: SignatureInfo[]): Promise<EnrichedRecord[]> {
    const out: EnrichedRecord[] = [];
    for (const info of page) {
      const timestamp = recordTimestamp(info, this.now);
      const metric = await this.lookupMetric(info.signature, timestamp);
      const record: EnrichedRecord = {
        id: this.newId(),
        signature: info.signature,
        slot: info.slot,
        timestamp,
        failed: info.err !== undefined,
        ...(metric !== undefined ? { metric } : {}),
        ...(info.memo !== undefined ? { memo: info.memo } : {}),
      };
      out.push(record);
    }
    return out;
  }
}
