import { RpcClient, isRecord, type FetchError, type HttpImpl } from './rpc.js';
import { err, ok, type Result } from './result.js';
import { withApiKey, type PipelineConfig } from './config/pipeline.js';
import { recordRpc } from './metrics.js';
import { logger } from './observability/log.js';

export type SignatureInfo = {
  signature: string;
  slot: number;
  blockTime?: number;
  err?: unknown;
  memo?: string;
};

export type SignaturePage = Result<SignatureInfo[], FetchError>;

export interface SignatureSource {
  fetchPage(address: string, limit: number, before?: string): Promise<SignaturePage>;
}

function pick(o: Record<string, unknown>, camel: string, snake: string): unknown {
  return o[camel] !== undefined ? o[camel] : o[snake];
}

// Seconds; anything past the Date range (±8.64e15 ms) cannot become a timestamp.
const MAX_BLOCK_TIME = 8.64e12;
function isBlockTime(v: unknown): v is number {
  return typeof v === 'number' && Number.isInteger(v) && Math.abs(v) <= MAX_BLOCK_TIME;
}

export function decodeSignatureInfo(raw: unknown): SignatureInfo | null {
  if (!isRecord(raw)) return null;
  const { signature, slot } = raw;
  if (typeof signature !== 'string' || !signature) return null;
  if (typeof slot !== 'number' || !Number.isInteger(slot)) return null;
  const blockTime = pick(raw, 'blockTime', 'block_time');
  if (blockTime !== undefined && blockTime !== null && !isBlockTime(blockTime)) return null;
  const txErr = pick(raw, 'err', 'error');
  const memo = raw.memo;
  const out: SignatureInfo = { signature, slot };
  if (isBlockTime(blockTime)) out.blockTime = blockTime;
  if (txErr !== undefined && txErr !== null) out.err = txErr;
  if (typeof memo === 'string') out.memo = memo;
  return out;
}

export function decodeSignaturePage(result: unknown): Result<SignatureInfo[], FetchError> {
  if (!Array.isArray(result)) return err({ kind: 'decode', message: 'result is not an array' });
  const page: SignatureInfo[] = [];
  for (let i = 0; i < result.length; i++) {
    const info = decodeSignatureInfo(result[i]);
    if (!info) return err({ kind: 'decode', message: `malformed signature entry at index ${i}` });
    page.push(info);
  }
  return ok(page);
}

export function buildSignatureParams(address: string, limit: number, before?: string): [string, { limit: number; before?: string }] {
  return [address, before ? { limit, before } : { limit }];
}

export class SignatureClient implements SignatureSource {
  constructor(private rpc: RpcClient) {}

  async fetchPage(address: string, limit: number, before?: string): Promise<SignaturePage> {
    if (!address) throw new TypeError('address must be a non-empty string');
    if (!Number.isInteger(limit) || limit < 1) throw new TypeError(`limit must be a positive integer, got ${limit}`);

    const t0 = Date.now();
    const res = await this.rpc.call('getSignaturesForAddress', buildSignatureParams(address, limit, before));
    const page = res.ok ? decodeSignaturePage(res.value) : res;
    recordRpc(page.ok ? 'ok' : page.error.kind, Date.now() - t0);
    if (page.ok) {
      logger.debug('rpc_page', { address, before, count: page.value.length, ms: Date.now() - t0 });
    } else {
      logger.warn('rpc_page_failed', { address, before, kind: page.error.kind, message: page.error.message });
    }
    return page;
  }
}

export function signatureClientFromConfig(cfg: PipelineConfig, http?: HttpImpl): SignatureClient {
  const endpoints = cfg.RPC_URLS.map(url => ({ url: withApiKey(url, cfg.RPC_API_KEY) }));
  return new SignatureClient(new RpcClient(endpoints, { timeoutMs: cfg.RPC_TIMEOUT_MS, http }));
}
