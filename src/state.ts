import type { FetchError } from './rpc.js';

export type LoadingState = 'idle' | 'loading_initial' | 'loading_more';

export type EnrichedRecord = Readonly<{
  id: string;
  signature: string;
  slot: number;
  timestamp: Date;
  metric?: number;
  failed: boolean;
  memo?: string;
}>;

export type PipelineSnapshot = {
  address: string | null;
  records: readonly EnrichedRecord[];
  cursor: string | null;
  loading: LoadingState;
  exhausted: boolean;
  lastError: FetchError | null;
};

/**
 * Session state of one pipeline. Held privately by CorrelationPipeline;
 * everything handed out is a frozen copy.
 */
export class PipelineState {
  private _records: EnrichedRecord[] = [];
  private _cursor: string | null = null;
  private _loading: LoadingState = 'idle';
  private _exhausted = false;
  private _address: string | null = null;
  private _lastError: FetchError | null = null;

  get records(): readonly EnrichedRecord[] { return Object.freeze([...this._records]); }
  get cursor() { return this._cursor; }
  get loading() { return this._loading; }
  get exhausted() { return this._exhausted; }
  get address() { return this._address; }
  get lastError() { return this._lastError; }

  begin(kind: Exclude<LoadingState, 'idle'>): boolean {
    if (this._loading !== 'idle') return false;
    this._loading = kind;
    return true;
  }

  finish() { this._loading = 'idle'; }

  reset(address: string) {
    this._address = address;
    this._records = [];
    this._cursor = null;
    this._exhausted = false;
    this._lastError = null;
  }

  /** Appends in page order; cursor moves to the page's last signature, or the history is marked exhausted. */
  commit(page: EnrichedRecord[]) {
    this._lastError = null;
    if (!page.length) {
      this._exhausted = true;
      return;
    }
    for (const r of page) this._records.push(Object.freeze({ ...r }));
    this._cursor = page[page.length - 1].signature;
  }

  fail(error: FetchError) { this._lastError = error; }

  snapshot(): PipelineSnapshot {
    return {
      address: this._address,
      records: this.records,
      cursor: this._cursor,
      loading: this._loading,
      exhausted: this._exhausted,
      lastError: this._lastError,
    };
  }
}
