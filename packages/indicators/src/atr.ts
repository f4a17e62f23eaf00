import { WEMA } from "technicalindicators";

export function trueRange(high: number, low: number, prevClose: number | null): number {
  if (prevClose === null) return high - low;
  return Math.max(high - low, Math.abs(high - prevClose), Math.abs(low - prevClose));
}

/**
 * Average true range with Wilder's smoothing. The first value is the plain
 * average of the first `period` true ranges; the first bar's range is high - low.
 */
export class WilderAtr {
  private readonly smoothing: WEMA;
  private prevClose: number | null = null;
  private current: number | null = null;

  constructor(readonly period: number) {
    this.smoothing = new WEMA({ period, values: [] });
  }

  get value(): number | null {
    return this.current;
  }

  next(high: number, low: number, close: number): number | null {
    const tr = trueRange(high, low, this.prevClose);
    this.prevClose = close;

    const result = this.smoothing.nextValue(tr);
    if (result !== undefined) this.current = result;
    return this.current;
  }
}
