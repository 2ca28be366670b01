export const mask = (s: string, keep = 6) => (s.length > keep * 2 ? s.slice(0, keep) + '…' + s.slice(-keep) : s);
export const maskSig = (s?: string) => (s ? mask(s, 8) : s);

const BASE58_RUN = /[1-9A-HJ-NP-Za-km-z]{32,88}/g;
export const maskText = (s: string) => s.replace(BASE58_RUN, (m) => mask(m, 6));

export function maskingEnabled(env: NodeJS.ProcessEnv = process.env) {
  return env.PII_MASK !== 'false';
}
