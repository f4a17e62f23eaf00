import type { Bar, IndicatorConfig, IndicatorSnapshot } from "@ptb/futures-core";
import { OutOfOrderBarError } from "@ptb/futures-core";
import { WilderAtr } from "./atr.js";
import { StreamingEma } from "./ema.js";
import { RollingSma } from "./sma.js";
import { StochasticOscillator } from "./stochastic.js";

/**
 * Owns every rolling indicator for one symbol. Holds the latest two snapshots
 * and nothing else of the bar history.
 */
export class IndicatorEngine {
  private readonly emaFast: StreamingEma;
  private readonly emaSlow: StreamingEma;
  private readonly stochastic: StochasticOscillator;
  private readonly atr: WilderAtr;
  private readonly volume: RollingSma;

  private lastTimestamp: number | null = null;
  private currentSnapshot: IndicatorSnapshot | null = null;
  private previousSnapshot: IndicatorSnapshot | null = null;

  constructor(readonly config: IndicatorConfig) {
    this.emaFast = new StreamingEma(config.fastEma);
    this.emaSlow = new StreamingEma(config.slowEma);
    this.stochastic = new StochasticOscillator(config.stochPeriod, config.stochKPeriod);
    this.atr = new WilderAtr(config.atrPeriod);
    this.volume = new RollingSma(config.volumePeriod);
  }

  get current(): IndicatorSnapshot | null {
    return this.currentSnapshot;
  }

  get previous(): IndicatorSnapshot | null {
    return this.previousSnapshot;
  }

  get lastBarTimestamp(): number | null {
    return this.lastTimestamp;
  }

  update(bar: Bar): IndicatorSnapshot {
    if (this.lastTimestamp !== null && bar.timestamp <= this.lastTimestamp) {
      throw new OutOfOrderBarError(this.lastTimestamp, bar.timestamp);
    }
    this.lastTimestamp = bar.timestamp;

    const stoch = this.stochastic.next(bar.high, bar.low, bar.close);
    const snapshot: IndicatorSnapshot = {
      timestamp: bar.timestamp,
      close: bar.close,
      volume: bar.volume,
      emaFast: this.emaFast.next(bar.close),
      emaSlow: this.emaSlow.next(bar.close),
      stochK: stoch.k,
      stochD: stoch.d,
      atr: this.atr.next(bar.high, bar.low, bar.close),
      volAvg: this.volume.next(bar.volume)
    };

    this.previousSnapshot = this.currentSnapshot;
    this.currentSnapshot = snapshot;
    return snapshot;
  }
}
