import { BYBIT_CATEGORY, BYBIT_POSITION_IDX } from "./bybit.constants.js";
import { BybitRestClient } from "./bybit.rest.js";
import type { BybitListResult, BybitPositionRaw, BybitTradingStopRequest } from "./bybit.types.js";

export class BybitPositionApi {
  constructor(private readonly rest: BybitRestClient) {}

  getPositions(symbol: string): Promise<BybitListResult<BybitPositionRaw>> {
    return this.rest.requestPrivate({
      method: "GET",
      endpoint: "/v5/position/list",
      query: {
        category: BYBIT_CATEGORY,
        symbol
      }
    });
  }

  setLeverage(params: { symbol: string; leverage: number }): Promise<unknown> {
    return this.rest.requestPrivate({
      method: "POST",
      endpoint: "/v5/position/set-leverage",
      body: {
        category: BYBIT_CATEGORY,
        symbol: params.symbol,
        buyLeverage: String(params.leverage),
        sellLeverage: String(params.leverage)
      }
    });
  }

  setTradingStop(params: { symbol: string; stopLoss: string; takeProfit: string }): Promise<unknown> {
    const payload: BybitTradingStopRequest = {
      category: BYBIT_CATEGORY,
      symbol: params.symbol,
      tpslMode: "Full",
      positionIdx: BYBIT_POSITION_IDX,
      stopLoss: params.stopLoss,
      takeProfit: params.takeProfit,
      slTriggerBy: "LastPrice",
      tpTriggerBy: "LastPrice"
    };
    return this.rest.requestPrivate({
      method: "POST",
      endpoint: "/v5/position/trading-stop",
      body: payload
    });
  }
}
