#!/usr/bin/env node
import 'dotenv/config';
import type { Server } from 'node:http';
import { readPipelineConfig } from './config/pipeline.js';
import { signatureClientFromConfig } from './signatures.js';
import { WindowResolver, biometricStoreFromConfig, envReadAuthorization, type BiometricStore } from './biometrics.js';
import { Breaker } from './circuit.js';
import { CorrelationPipeline } from './pipeline.js';
import { readSamplesFile } from './samples_file.js';
import { startHealthServer } from './health.js';
import { startDefaultMetrics } from './metrics.js';
import { renderTable } from './ui.js';
import { errorMessage, logger } from './observability/log.js';

function arg(name: string, def = '') { const i = process.argv.indexOf(`--${name}`); return i > -1 ? (process.argv[i + 1] || def) : def; }
function positional(): string[] {
  const out: string[] = [];
  const argv = process.argv.slice(2);
  for (let i = 0; i < argv.length; i++) {
    if (argv[i].startsWith('--')) { i++; continue; }
    out.push(argv[i]);
  }
  return out;
}

const USAGE = 'usage: pulsetrace <address> [--pages N] [--samples file.json]\n       pulsetrace import-samples <file.json>';

async function importSamples(store: BiometricStore, path: string) {
  const { samples, dropped } = readSamplesFile(path);
  for (const s of samples) await store.record(s);
  logger.info('samples_imported', { path, imported: samples.length, dropped });
}

async function main() {
  const cfg = readPipelineConfig();
  const [first, second] = positional();
  if (!first) {
    console.error(USAGE);
    process.exitCode = 2;
    return;
  }

  if (first === 'import-samples') {
    if (!second) { console.error(USAGE); process.exitCode = 2; return; }
    if (!cfg.REDIS_URL) logger.warn('import_without_redis', { note: 'samples kept in memory only; set REDIS_URL to persist' });
    await importSamples(biometricStoreFromConfig(cfg), second);
    process.exit(0);
  }

  const samplesPath = arg('samples');
  const store = biometricStoreFromConfig(cfg);
  if (samplesPath) await importSamples(store, samplesPath);
  const breaker = new Breaker({ threshold: cfg.BREAKER_THRESHOLD, cooldownMs: cfg.BREAKER_COOLDOWN_MS, closeAfter: cfg.BREAKER_CLOSE_AFTER });
  const resolver = new WindowResolver({ store, auth: envReadAuthorization(), timeoutMs: cfg.BIOMETRIC_TIMEOUT_MS, breaker });
  const pipeline = new CorrelationPipeline({ source: signatureClientFromConfig(cfg), resolver, pageLimit: cfg.PAGE_LIMIT });
  pipeline.on('failed', (e) => console.error(`fetch failed (${e.kind}): ${e.message}`));

  let server: Server | null = null;
  if (cfg.HEALTH_PORT > 0) {
    startDefaultMetrics();
    server = startHealthServer(cfg.HEALTH_PORT, { pipeline, breaker });
  }

  const pages = Math.max(1, Math.floor(Number(arg('pages', '1'))) || 1);
  let outcome = await pipeline.initialFetch(first);
  for (let p = 1; p < pages && outcome.status === 'loaded'; p++) outcome = await pipeline.loadMore();

  console.log(renderTable(pipeline.records));
  if (outcome.status === 'failed') process.exitCode = 1;
  if (server) server.close();
  // ioredis keeps the socket open
  process.exit();
}

main().catch((e: unknown) => {
  logger.error('fatal', { message: errorMessage(e) });
  process.exit(1);
});
