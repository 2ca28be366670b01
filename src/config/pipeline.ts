export type PipelineConfig = {
  RPC_URLS: string[];
  RPC_API_KEY: string;
  PAGE_LIMIT: number;
  RPC_TIMEOUT_MS: number;
  BIOMETRIC_TIMEOUT_MS: number;
  BREAKER_THRESHOLD: number;
  BREAKER_COOLDOWN_MS: number;
  BREAKER_CLOSE_AFTER: number;
  REDIS_URL: string;
  HR_SAMPLES_KEY: string;
  HEALTH_PORT: number;
};

export const DEFAULT_RPC_URL = 'https://api.mainnet-beta.solana.com';

export function readPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const num = (k: string, d: number, min = 0) => {
    const n = Number(env[k] ?? d);
    return Number.isFinite(n) ? Math.max(min, n) : d;
  };
  const urls = (env.SOL_RPC || '').split(',').map(s => s.trim()).filter(Boolean);
  return {
    RPC_URLS: urls.length ? urls : [DEFAULT_RPC_URL],
    RPC_API_KEY: env.RPC_API_KEY || '',
    PAGE_LIMIT: Math.floor(num('PAGE_LIMIT', 30, 1)),
    RPC_TIMEOUT_MS: num('RPC_TIMEOUT_MS', 7000, 1),
    BIOMETRIC_TIMEOUT_MS: num('BIOMETRIC_TIMEOUT_MS', 3000, 1),
    BREAKER_THRESHOLD: Math.floor(num('BREAKER_THRESHOLD', 3, 1)),
    BREAKER_COOLDOWN_MS: num('BREAKER_COOLDOWN_MS', 60_000),
    BREAKER_CLOSE_AFTER: Math.floor(num('BREAKER_CLOSE_AFTER', 1, 1)),
    REDIS_URL: env.REDIS_URL || '',
    HR_SAMPLES_KEY: env.HR_SAMPLES_KEY || 'hr:samples',
    HEALTH_PORT: Math.floor(num('HEALTH_PORT', 0)),
  };
}

/** Appends the provider API key as `api-key`, the way hosted Solana RPCs expect it. */
export function withApiKey(url: string, apiKey: string): string {
  if (!apiKey) return url;
  const u = new URL(url);
  u.searchParams.set('api-key', apiKey);
  return u.toString();
}
