import { RingBuffer } from "./ring-buffer.js";
import { RollingSma } from "./sma.js";

export type StochasticValue = {
  k: number | null;
  d: number | null;
};

const FLAT_RANGE_K = 50;

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export class StochasticOscillator {
  private readonly highs: RingBuffer<number>;
  private readonly lows: RingBuffer<number>;
  private readonly dLine: RollingSma;

  constructor(readonly period: number, readonly dPeriod: number) {
    this.highs = new RingBuffer<number>(period);
    this.lows = new RingBuffer<number>(period);
    this.dLine = new RollingSma(dPeriod);
  }

  next(high: number, low: number, close: number): StochasticValue {
    this.highs.push(high);
    this.lows.push(low);
    if (!this.highs.full) return { k: null, d: null };

    const highestHigh = Math.max(...this.highs.toArray());
    const lowestLow = Math.min(...this.lows.toArray());
    const range = highestHigh - lowestLow;
    const k = range === 0 ? FLAT_RANGE_K : clamp((100 * (close - lowestLow)) / range, 0, 100);

    return { k, d: this.dLine.next(k) };
  }
}
