export type RepGateResult =
  | { kind: 'accept' }
  | { kind: 'belowThreshold' }
  | { kind: 'cooldown'; elapsed: number; required: number };

/**
 * Minimum-interval gate between counted reps.
 * Only an accepted candidate moves the last-rep timestamp.
 */
export class RepCooldownGate {
  private lastRepTime: number | null = null;

  constructor(private cooldown_s: number) {}

  isOpen(timestamp: number): boolean {
    return this.lastRepTime === null || timestamp - this.lastRepTime >= this.cooldown_s;
  }

  check(value: number, threshold: number, timestamp: number): RepGateResult {
    if (!(value >= threshold)) return { kind: 'belowThreshold' };

    if (this.lastRepTime !== null) {
      const elapsed = timestamp - this.lastRepTime;
      if (elapsed < this.cooldown_s) {
        return { kind: 'cooldown', elapsed, required: this.cooldown_s };
      }
    }

    return { kind: 'accept' };
  }

  /** check() and, on acceptance, record the timestamp. */
  evaluate(value: number, threshold: number, timestamp: number): RepGateResult {
    const result = this.check(value, threshold, timestamp);
    if (result.kind === 'accept') this.lastRepTime = timestamp;
    return result;
  }

  markRep(timestamp: number) {
    this.lastRepTime = timestamp;
  }

  getLastRepTime(): number | null {
    return this.lastRepTime;
  }

  setCooldown(cooldown_s: number) {
    this.cooldown_s = cooldown_s;
  }

  reset() {
    this.lastRepTime = null;
  }
}
