import type { Bar, IndicatorSnapshot, TradeSignal } from "@ptb/futures-core";
import type { IndicatorEngine } from "@ptb/indicators";
import type { SignalGenerator } from "@ptb/strategies";
import type { PositionStateMachine } from "./state-machine.js";

export type BarOutcome = {
  snapshot: IndicatorSnapshot;
  signal: TradeSignal;
};

/** Indicator engine, signal generator and state machine, one bar at a time. */
export class TradingPipeline {
  constructor(
    private readonly engine: IndicatorEngine,
    private readonly strategy: SignalGenerator,
    private readonly machine: PositionStateMachine
  ) {}

  /** Feeds history through the indicators only; no signals, no orders. */
  warmUp(bars: Iterable<Bar>): number {
    let count = 0;
    for (const bar of bars) {
      this.engine.update(bar);
      count += 1;
    }
    return count;
  }

  get latestAtr(): number | null {
    return this.engine.current?.atr ?? null;
  }

  async handleBar(bar: Bar): Promise<BarOutcome> {
    const snapshot = this.engine.update(bar);
    const previous = this.engine.previous;
    const signal = await this.machine.onBar(bar, snapshot, (side) =>
      this.strategy.evaluate(previous, snapshot, side)
    );
    return { snapshot, signal };
  }
}
