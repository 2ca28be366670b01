import { describe, it, expect } from 'vitest';
import { readPipelineConfig, withApiKey, DEFAULT_RPC_URL } from '../src/config/pipeline.js';
import { withEnv } from './helpers/mockEnv.js';

describe('pipeline config', () => {
  it('falls back to defaults', () => {
    const cfg = readPipelineConfig({});
    expect(cfg).toEqual({
      RPC_URLS: [DEFAULT_RPC_URL],
      RPC_API_KEY: '',
      PAGE_LIMIT: 30,
      RPC_TIMEOUT_MS: 7000,
      BIOMETRIC_TIMEOUT_MS: 3000,
      BREAKER_THRESHOLD: 3,
      BREAKER_COOLDOWN_MS: 60_000,
      BREAKER_CLOSE_AFTER: 1,
      REDIS_URL: '',
      HR_SAMPLES_KEY: 'hr:samples',
      HEALTH_PORT: 0,
    });
  });

  it('reads process.env by default and splits the RPC list', () => {
    const cfg = withEnv({ SOL_RPC: ' https://a.example , ,https://b.example', PAGE_LIMIT: '50' }, () => readPipelineConfig());
    expect(cfg.RPC_URLS).toEqual(['https://a.example', 'https://b.example']);
    expect(cfg.PAGE_LIMIT).toBe(50);
  });

  it('ignores numbers it cannot parse and clamps to the minimum', () => {
    const cfg = readPipelineConfig({ PAGE_LIMIT: 'lots', RPC_TIMEOUT_MS: '-5', BREAKER_THRESHOLD: '2.7' });
    expect(cfg.PAGE_LIMIT).toBe(30);
    expect(cfg.RPC_TIMEOUT_MS).toBe(1);
    expect(cfg.BREAKER_THRESHOLD).toBe(2);
  });

  it('adds the api key as a query parameter and keeps existing ones', () => {
    expect(withApiKey('https://rpc.example/', '')).toBe('https://rpc.example/');
    expect(withApiKey('https://rpc.example/?cluster=main', 'test-key')).toBe('https://rpc.example/?cluster=main&api-key=test-key');
  });
});
