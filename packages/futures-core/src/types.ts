export type PositionSide = "long" | "short";
export type IntentSide = "flat" | PositionSide;
export type OrderSide = "buy" | "sell";
export type OrderType = "market" | "limit";

export type FuturesSymbol = string;

export type Bar = {
  timestamp: number;    // bar open time, epoch ms
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
};

export type IndicatorSnapshot = {
  timestamp: number;
  close: number;
  volume: number;
  emaFast: number | null;
  emaSlow: number | null;
  stochK: number | null;
  stochD: number | null;
  atr: number | null;
  volAvg: number | null;
};

export type TradeSignal = "none" | "enter_long" | "enter_short" | "exit_long" | "exit_short";

export type PositionIntent = {
  side: IntentSide;
  size: number;
  entryPrice: number;
  stopLoss: number | null;
  takeProfit: number | null;
};

export type ExchangePosition = {
  symbol: FuturesSymbol;
  side: IntentSide;
  size: number;
  avgEntryPrice: number;
};

export type AccountState = {
  equity: number;
  availableMargin?: number;
};

export type BracketLevels = {
  stopLoss: number;
  takeProfit: number;
};

export type InstrumentRules = {
  qtyStep: number;
  minQty: number;
  tickSize: number;
};

export const FLAT_INTENT: Readonly<PositionIntent> = Object.freeze({
  side: "flat",
  size: 0,
  entryPrice: 0,
  stopLoss: null,
  takeProfit: null
});

export function toOrderSide(positionSide: PositionSide): OrderSide {
  return positionSide === "long" ? "buy" : "sell";
}

export function closingOrderSide(positionSide: PositionSide): OrderSide {
  return positionSide === "long" ? "sell" : "buy";
}

export function isBracketValid(side: PositionSide, entryPrice: number, levels: BracketLevels): boolean {
  if (side === "long") return levels.stopLoss < entryPrice && entryPrice < levels.takeProfit;
  return levels.takeProfit < entryPrice && entryPrice < levels.stopLoss;
}
