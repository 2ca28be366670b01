import { request } from 'undici';
import { err, ok, type Result } from './result.js';
import { errorMessage } from './observability/log.js';

export interface RpcEndpoint { url: string }

export type FetchError =
  | { kind: 'transport'; message: string }
  | { kind: 'decode'; message: string }
  | { kind: 'remote_rejected'; code: number; message: string };

export type HttpRequestInit = {
  method: 'POST';
  headers: Record<string, string>;
  body: string;
  signal: AbortSignal;
};
export type HttpResponse = { statusCode: number; body: { json(): Promise<unknown> } };
export type HttpImpl = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

const undiciHttp: HttpImpl = (url, init) => request(url, init);

export type RpcClientOptions = { timeoutMs?: number; http?: HttpImpl };

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/** JSON-RPC 2.0 over HTTP POST. One request per call; endpoints rotate round-robin between calls. */
export class RpcClient {
  private endpoints: RpcEndpoint[];
  private idx = -1;
  private timeoutMs: number;
  private http: HttpImpl;

  constructor(endpoints: RpcEndpoint[], opts: RpcClientOptions = {}) {
    this.endpoints = endpoints.filter(e => Boolean(e.url));
    if (!this.endpoints.length) throw new Error('RpcClient needs at least one endpoint');
    this.timeoutMs = opts.timeoutMs ?? 7000;
    this.http = opts.http ?? undiciHttp;
  }

  private next(): RpcEndpoint {
    this.idx = (this.idx + 1) % this.endpoints.length;
    return this.endpoints[this.idx];
  }

  async call(method: string, params: unknown[]): Promise<Result<unknown, FetchError>> {
    const body = JSON.stringify({ jsonrpc: '2.0', id: 1, method, params });
    const ep = this.next();
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    let status = 0;
    let payload: unknown;
    try {
      const res = await this.http(ep.url, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body,
        signal: controller.signal,
      });
      status = res.statusCode;
      try {
        payload = await res.body.json();
      } catch (e) {
        if (controller.signal.aborted) return err({ kind: 'transport', message: `timeout after ${this.timeoutMs}ms` });
        if (status >= 400) return err({ kind: 'transport', message: `HTTP ${status}` });
        return err({ kind: 'decode', message: `invalid JSON body: ${errorMessage(e)}` });
      }
    } catch (e) {
      if (controller.signal.aborted) return err({ kind: 'transport', message: `timeout after ${this.timeoutMs}ms` });
      return err({ kind: 'transport', message: errorMessage(e) });
    } finally {
      clearTimeout(timer);
    }

    if (!isRecord(payload)) {
      if (status >= 400) return err({ kind: 'transport', message: `HTTP ${status}` });
      return err({ kind: 'decode', message: 'response is not a JSON-RPC envelope' });
    }
    const rpcError = payload.error;
    if (rpcError !== undefined && rpcError !== null) {
      if (!isRecord(rpcError)) return err({ kind: 'decode', message: 'malformed error field' });
      const code = typeof rpcError.code === 'number' ? rpcError.code : status;
      const message = typeof rpcError.message === 'string' ? rpcError.message : 'rpc error';
      return err({ kind: 'remote_rejected', code, message });
    }
    if (status >= 400) return err({ kind: 'transport', message: `HTTP ${status}` });
    if (!('result' in payload)) return err({ kind: 'decode', message: 'missing result field' });
    return ok(payload.result);
  }
}
