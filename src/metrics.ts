import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export const registry = new Registry();

let defaultsStarted = false;
/** Process-level metrics are only collected by long-running entry points. */
export function startDefaultMetrics() {
  if (defaultsStarted) return;
  defaultsStarted = true;
  collectDefaultMetrics({ register: registry });
}

export type RpcOutcome = 'ok' | 'transport' | 'decode' | 'remote_rejected';
export type BiometricOutcome = 'hit' | 'miss' | 'error' | 'skipped';

export const rpcRequests = new Counter<'outcome'>({
  name: 'pulsetrace_rpc_requests_total',
  help: 'Signature page requests by outcome',
  labelNames: ['outcome'],
  registers: [registry],
});

export const rpcLatency = new Histogram({
  name: 'pulsetrace_rpc_latency_seconds',
  help: 'Signature page request latency',
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

export const biometricQueries = new Counter<'outcome'>({
  name: 'pulsetrace_biometric_queries_total',
  help: 'Heart-rate window lookups by outcome',
  labelNames: ['outcome'],
  registers: [registry],
});

export const recordsAppended = new Counter({
  name: 'pulsetrace_records_appended_total',
  help: 'Enriched records appended to pipeline state',
  registers: [registry],
});

export function recordRpc(outcome: RpcOutcome, latencyMs: number) {
  rpcRequests.inc({ outcome });
  rpcLatency.observe(Math.max(0, latencyMs) / 1000);
}

export function recordBiometric(outcome: BiometricOutcome) {
  biometricQueries.inc({ outcome });
}
