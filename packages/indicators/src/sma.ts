import { SMA } from "technicalindicators";

/** Simple moving average fed one value at a time. */
export class RollingSma {
  private readonly sma: SMA;
  private current: number | null = null;

  constructor(readonly period: number) {
    this.sma = new SMA({ period, values: [] });
  }

  get value(): number | null {
    return this.current;
  }

  next(value: number): number | null {
    const result = this.sma.nextValue(value);
    if (result !== undefined) this.current = result;
    return this.current;
  }
}
