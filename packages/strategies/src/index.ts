export { DEFAULT_EMA_STOCH_PARAMS, EmaStochStrategy, type EmaStochParams } from "./ema-stoch.strategy.js";
export type { SignalGenerator } from "./strategy.interface.js";
