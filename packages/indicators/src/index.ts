export { trueRange, WilderAtr } from "./atr.js";
export { StreamingEma } from "./ema.js";
export { IndicatorEngine } from "./engine.js";
export { RingBuffer } from "./ring-buffer.js";
export { RollingSma } from "./sma.js";
export { StochasticOscillator, type StochasticValue } from "./stochastic.js";
