import type { IndicatorSnapshot, IntentSide, TradeSignal } from "@ptb/futures-core";
import type { SignalGenerator } from "./strategy.interface.js";

export type EmaStochParams = {
  oversold: number;
  overbought: number;
};

type ValidSnapshot = {
  volume: number;
  emaFast: number;
  emaSlow: number;
  stochK: number;
  stochD: number;
  atr: number;
  volAvg: number;
};

export const DEFAULT_EMA_STOCH_PARAMS: EmaStochParams = {
  oversold: 20,
  overbought: 80
};

function toValid(snapshot: IndicatorSnapshot | null): ValidSnapshot | null {
  if (!snapshot) return null;
  const { emaFast, emaSlow, stochK, stochD, atr, volAvg } = snapshot;
  if (emaFast === null || emaSlow === null) return null;
  if (stochK === null || stochD === null) return null;
  if (atr === null || volAvg === null) return null;
  return { volume: snapshot.volume, emaFast, emaSlow, stochK, stochD, atr, volAvg };
}

function emaCrossedUp(prev: ValidSnapshot, curr: ValidSnapshot): boolean {
  return prev.emaFast <= prev.emaSlow && curr.emaFast > curr.emaSlow;
}

function emaCrossedDown(prev: ValidSnapshot, curr: ValidSnapshot): boolean {
  return prev.emaFast >= prev.emaSlow && curr.emaFast < curr.emaSlow;
}

/**
 * Trend entries on an EMA crossover, confirmed by %K turning out of the
 * oversold/overbought zone and by volume at or above its average. Exits only
 * on trend reversal; stops and targets are handled by the position machine.
 */
export class EmaStochStrategy implements SignalGenerator {
  constructor(private readonly params: EmaStochParams = DEFAULT_EMA_STOCH_PARAMS) {}

  private stochTurnedUp(prev: ValidSnapshot, curr: ValidSnapshot): boolean {
    return (
      prev.stochK < this.params.oversold &&
      prev.stochK <= prev.stochD &&
      curr.stochK > prev.stochK &&
      curr.stochK > curr.stochD
    );
  }

  private stochTurnedDown(prev: ValidSnapshot, curr: ValidSnapshot): boolean {
    return (
      prev.stochK > this.params.overbought &&
      prev.stochK >= prev.stochD &&
      curr.stochK < prev.stochK &&
      curr.stochK < curr.stochD
    );
  }

  evaluate(prevRaw: IndicatorSnapshot | null, currRaw: IndicatorSnapshot, side: IntentSide): TradeSignal {
    const prev = toValid(prevRaw);
    const curr = toValid(currRaw);
    if (!prev || !curr) return "none";

    const volumeOk = curr.volume >= curr.volAvg;

    if (side === "flat") {
      if (emaCrossedUp(prev, curr) && this.stochTurnedUp(prev, curr) && volumeOk) return "enter_long";
      if (emaCrossedDown(prev, curr) && this.stochTurnedDown(prev, curr) && volumeOk) return "enter_short";
      return "none";
    }

    if (side === "long" && curr.emaFast < curr.emaSlow) return "exit_long";
    if (side === "short" && curr.emaFast > curr.emaSlow) return "exit_short";
    return "none";
  }
}
