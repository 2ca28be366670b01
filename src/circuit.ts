export type BreakerState = 'ok' | 'open' | 'half-open';

export type BreakerOptions = {
  threshold?: number;
  cooldownMs?: number;
  closeAfter?: number;
  now?: () => number;
};

/** Consecutive-failure breaker guarding a flaky dependency. */
export class Breaker {
  private fails = 0;
  private openedUntil = 0;
  private successStreak = 0;
  private readonly threshold: number;
  private readonly cooldownMs: number;
  private readonly closeAfter: number;
  private readonly now: () => number;

  constructor(opts: BreakerOptions = {}) {
    this.threshold = Math.max(1, opts.threshold ?? 3);
    this.cooldownMs = Math.max(0, opts.cooldownMs ?? 60_000);
    this.closeAfter = Math.max(1, opts.closeAfter ?? 1);
    this.now = opts.now ?? Date.now;
  }

  allow() { return this.now() >= this.openedUntil; }

  success() {
    this.fails = 0;
    if (this.openedUntil === 0) return;
    this.successStreak++;
    // cooldown elapsed and enough trial calls succeeded
    if (this.successStreak >= this.closeAfter) {
      this.openedUntil = 0;
      this.successStreak = 0;
    }
  }

  fail() {
    this.fails += 1;
    this.successStreak = 0;
    // any failure while half-open reopens at once
    if (this.openedUntil !== 0 || this.fails >= this.threshold) this.openedUntil = this.now() + this.cooldownMs;
  }

  state(): BreakerState {
    if (!this.allow()) return 'open';
    return this.openedUntil !== 0 ? 'half-open' : 'ok';
  }
}
