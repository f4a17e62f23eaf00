import { isGlobalTradingEnabled } from "@ptb/futures-engine";

/**
 * New entries are allowed when the kill switch is on and no circuit-breaker
 * cooldown is running. Exits never consult the gate.
 */
export class TradingGate {
  private pausedUntil = 0;

  constructor(
    private readonly killSwitch: () => boolean = () => isGlobalTradingEnabled(),
    private readonly now: () => number = Date.now
  ) {}

  pause(ms: number) {
    this.pausedUntil = Math.max(this.pausedUntil, this.now() + ms);
  }

  get pausedUntilMs(): number | null {
    return this.pausedUntil > this.now() ? this.pausedUntil : null;
  }

  isOpen(): boolean {
    return this.pausedUntilMs === null && this.killSwitch();
  }
}
