import { BYBIT_CATEGORY, BYBIT_KLINE_MAX_LIMIT } from "./bybit.constants.js";
import { BybitRestClient } from "./bybit.rest.js";
import type { BybitKlineRow, BybitListResult } from "./bybit.types.js";

export class BybitMarketApi {
  constructor(private readonly rest: BybitRestClient) {}

  getKlines(params: {
    symbol: string;
    interval: string;
    limit?: number;
  }): Promise<BybitListResult<BybitKlineRow>> {
    return this.rest.requestPublic("GET", "/v5/market/kline", {
      category: BYBIT_CATEGORY,
      symbol: params.symbol,
      interval: params.interval,
      limit: Math.min(params.limit ?? 200, BYBIT_KLINE_MAX_LIMIT)
    });
  }
}
