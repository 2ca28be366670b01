import { describe, it, expect, vi, afterEach } from 'vitest';
import { formatLine, logger } from '../src/observability/log.js';
import { mask, maskSig, maskText } from '../src/security/log_mask.js';
import { withEnv } from './helpers/mockEnv.js';

const ADDR = 'So11111111111111111111111111111111111111112';

describe('log masking', () => {
  it('keeps both ends of long identifiers', () => {
    expect(mask('abcdefghijklmnopqrstuvwxyz')).toBe('abcdef…uvwxyz');
    expect(mask('short')).toBe('short');
    expect(maskSig('5VERv8NMvzbJMEkV8xnrLkEaWRtSz9CosKDYjCJjBRnb')).toBe('5VERv8NM…jCJjBRnb');
    expect(maskText(`owner ${ADDR} ok`)).toBe('owner So1111…111112 ok');
  });
});

describe('formatLine', () => {
  it('prints key=value pairs and masks addresses', () => {
    const line = withEnv({ JSON_LOGS: undefined, PII_MASK: undefined, LOG_REDACT_LIST: undefined }, () =>
      formatLine('info', 'page_loaded', { address: ADDR, added: 3, before: undefined }));
    expect(line).toBe('[page_loaded] address=So1111…111112 added=3');
  });

  it('leaves addresses alone when masking is off', () => {
    const line = withEnv({ JSON_LOGS: undefined, PII_MASK: 'false' }, () => formatLine('info', 'page_loaded', { address: ADDR }));
    expect(line).toBe(`[page_loaded] address=${ADDR}`);
  });

  it('emits one JSON object per line when JSON_LOGS is on', () => {
    const line = withEnv({ JSON_LOGS: 'true', PII_MASK: 'false' }, () => formatLine('warn', 'rpc_page_failed', { kind: 'transport', count: 0 }));
    const parsed: unknown = JSON.parse(line);
    expect(parsed).toMatchObject({ level: 'warn', event: 'rpc_page_failed', kind: 'transport', count: 0 });
  });

  it('redacts configured values', () => {
    const line = withEnv({ JSON_LOGS: undefined, LOG_REDACT_LIST: 'test-secret' }, () => formatLine('info', 'cfg', { key: 'test-secret' }));
    expect(line).toBe('[cfg] key=[REDACTED]');
  });
});

describe('logger', () => {
  afterEach(() => { vi.restoreAllMocks(); });

  it('drops lines below LOG_LEVEL and routes warnings to stderr', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    withEnv({ LOG_LEVEL: 'warn', JSON_LOGS: undefined }, () => {
      logger.info('quiet');
      logger.warn('loud', { n: 1 });
    });
    expect(out).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[loud] n=1');
  });
});
