import { maskText, maskingEnabled } from '../security/log_mask.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFields = Record<string, string | number | boolean | null | undefined>;

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function threshold(): number {
  const lvl = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return lvl === 'debug' || lvl === 'info' || lvl === 'warn' || lvl === 'error' ? ORDER[lvl] : ORDER.info;
}

function redact(line: string): string {
  const redactList = String(process.env.LOG_REDACT_LIST || '')
    .split(',').map(s => s.trim()).filter(Boolean);
  let out = line;
  for (const needle of redactList) out = out.split(needle).join('[REDACTED]');
  return maskingEnabled() ? maskText(out) : out;
}

export function formatLine(level: LogLevel, event: string, fields: LogFields = {}): string {
  if (process.env.JSON_LOGS === 'true') {
    return redact(JSON.stringify({ ts: new Date().toISOString(), level, event, ...fields }));
  }
  const kv = Object.entries(fields)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${v}`)
    .join(' ');
  return redact(kv ? `[${event}] ${kv}` : `[${event}]`);
}

export function log(level: LogLevel, event: string, fields?: LogFields): void {
  if (ORDER[level] < threshold()) return;
  const line = formatLine(level, event, fields);
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
}

export const logger = {
  debug: (event: string, fields?: LogFields) => log('debug', event, fields),
  info: (event: string, fields?: LogFields) => log('info', event, fields),
  warn: (event: string, fields?: LogFields) => log('warn', event, fields),
  error: (event: string, fields?: LogFields) => log('error', event, fields),
};

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e ?? 'error');
}
