import { EMA } from "technicalindicators";

/**
 * EMA seeded with the simple average of the first `period` values.
 */
export class StreamingEma {
  private readonly ema: EMA;
  private current: number | null = null;

  constructor(readonly period: number) {
    this.ema = new EMA({ period, values: [] });
  }

  get value(): number | null {
    return this.current;
  }

  next(value: number): number | null {
    const result = this.ema.nextValue(value);
    if (result !== undefined) this.current = result;
    return this.current;
  }
}
