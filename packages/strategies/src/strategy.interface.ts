import type { IndicatorSnapshot, IntentSide, TradeSignal } from "@ptb/futures-core";

export interface SignalGenerator {
  evaluate(prev: IndicatorSnapshot | null, curr: IndicatorSnapshot, side: IntentSide): TradeSignal;
}
