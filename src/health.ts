import http from 'node:http';
import { registry } from './metrics.js';
import type { CorrelationPipeline } from './pipeline.js';
import type { Breaker } from './circuit.js';
import { errorMessage, logger } from './observability/log.js';

export type StatusDeps = { pipeline: CorrelationPipeline; breaker?: Breaker };

function sendJson(res: http.ServerResponse, status: number, body: unknown) {
  res.writeHead(status, { 'content-type': 'application/json' });
  res.end(JSON.stringify(body));
}

export function statePayload(pipeline: CorrelationPipeline) {
  const s = pipeline.snapshot();
  return {
    address: s.address,
    cursor: s.cursor,
    loading: s.loading,
    exhausted: s.exhausted,
    lastError: s.lastError,
    count: s.records.length,
    records: s.records.map(r => ({ ...r, timestamp: r.timestamp.toISOString() })),
  };
}

export async function handleStatus(req: http.IncomingMessage, res: http.ServerResponse, deps: StatusDeps) {
  const url = req.url || '/';
  if (url.startsWith('/live') || url.startsWith('/healthz')) {
    res.writeHead(200, { 'content-type': 'text/plain' });
    res.end('ok');
    return;
  }
  if (url.startsWith('/ready')) {
    if (deps.breaker?.state() === 'open') {
      res.writeHead(503, { 'content-type': 'text/plain', 'Retry-After': '30' });
      res.end('not ready');
    } else {
      res.writeHead(200, { 'content-type': 'text/plain' });
      res.end('ready');
    }
    return;
  }
  if (url.startsWith('/metrics')) {
    const body = await registry.metrics();
    res.writeHead(200, { 'content-type': registry.contentType });
    res.end(body);
    return;
  }
  if (url.startsWith('/state')) {
    sendJson(res, 200, statePayload(deps.pipeline));
    return;
  }
  res.writeHead(404, { 'content-type': 'text/plain' });
  res.end('not found');
}

export function startHealthServer(port: number, deps: StatusDeps): http.Server {
  const srv = http.createServer((req, res) => {
    handleStatus(req, res, deps).catch((e: unknown) => {
      logger.error('status_handler_failed', { url: req.url, message: errorMessage(e) });
      if (!res.headersSent) res.writeHead(500, { 'content-type': 'text/plain' });
      res.end('error');
    });
  });
  srv.listen(port, () => logger.info('status_server_listening', { port }));
  return srv;
}
