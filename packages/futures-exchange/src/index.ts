export * from "./futures-exchange.interface.js";
export * from "./paper/paper.gateway.js";
export * from "./bybit/bybit.adapter.js";
export * from "./bybit/bybit.constants.js";
export * from "./bybit/bybit.errors.js";
export * from "./bybit/bybit.rest.js";
export * from "./bybit/bybit.types.js";
export * from "./bybit/bybit.ws.js";
export * from "./bybit/bybit.ws.public.js";
