import type { EnrichedRecord } from './state.js';

export const Divider = '━━━━━━━━━━━━━━━━';
export const EXPLORER_TX_URL = 'https://solscan.io/tx/';

export function truncateSignature(sig: string, keep = 6) {
  return sig.length > keep ? `${sig.slice(0, keep)}...` : sig;
}

export function explorerLink(sig: string) { return `${EXPLORER_TX_URL}${sig}`; }

export function formatMetric(metric?: number) { return metric !== undefined ? `${metric} bpm` : 'No Data'; }

const dateFmt = new Intl.DateTimeFormat(undefined, { dateStyle: 'medium', timeStyle: 'short' });
export function formatTimestamp(d: Date) { return dateFmt.format(d); }

export function renderRecordLine(r: EnrichedRecord, fmtDate: (d: Date) => string = formatTimestamp) {
  const flag = r.failed ? ' ✗' : '';
  return `${fmtDate(r.timestamp).padEnd(22)} ${truncateSignature(r.signature).padEnd(10)} ${formatMetric(r.metric).padStart(8)}${flag}  ${explorerLink(r.signature)}`;
}

export function renderTable(records: readonly EnrichedRecord[], fmtDate?: (d: Date) => string) {
  if (!records.length) return 'No transactions found';
  const head = `${'Date/Time'.padEnd(22)} ${'Signature'.padEnd(10)} ${'BPM'.padStart(8)}\n${Divider}`;
  return [head, ...records.map(r => renderRecordLine(r, fmtDate))].join('\n');
}
