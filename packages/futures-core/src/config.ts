import type { FuturesSymbol, InstrumentRules } from "./types.js";

export type ExecutionMode = "paper" | "exchange";

export type SizingPolicyConfig =
  | { kind: "fixed"; positionSize: number; scaleWithLeverage: boolean }
  | { kind: "equity_fraction"; fraction: number };

export type IndicatorConfig = {
  fastEma: number;
  slowEma: number;
  stochPeriod: number;
  stochKPeriod: number;
  atrPeriod: number;
  volumePeriod: number;
};

export type RiskConfig = {
  leverage: number;
  riskRewardRatio: number;
  atrMultiplier: number;
  sizing: SizingPolicyConfig;
};

export type ExecutionConfig = {
  confirmTimeoutMs: number;
  pollIntervalMs: number;
};

export type ReconcileConfig = {
  intervalMs: number;
  sizeTolerance: number;
};

/**
 * Immutable bot configuration, built once at startup and injected into every
 * component that needs a slice of it.
 */
export type TradingConfig = {
  symbol: FuturesSymbol;
  testnet: boolean;
  executionMode: ExecutionMode;
  klineInterval: string;
  warmupBars: number;
  paperEquity: number;
  indicators: IndicatorConfig;
  risk: RiskConfig;
  instrument: InstrumentRules;
  execution: ExecutionConfig;
  reconcile: ReconcileConfig;
};
