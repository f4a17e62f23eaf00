import { BYBIT_CATEGORY } from "./bybit.constants.js";
import { BybitRestClient } from "./bybit.rest.js";
import type {
  BybitListResult,
  BybitOrderCreateRequest,
  BybitOrderCreateResult,
  BybitOrderRaw
} from "./bybit.types.js";

export class BybitTradeApi {
  constructor(private readonly rest: BybitRestClient) {}

  // No automatic retry: a retried create after a lost response could double the position.
  createOrder(payload: BybitOrderCreateRequest): Promise<BybitOrderCreateResult> {
    return this.rest.requestPrivate({
      method: "POST",
      endpoint: "/v5/order/create",
      body: payload,
      retry: false
    });
  }

  cancelOrder(params: { symbol: string; orderId: string }): Promise<BybitOrderCreateResult> {
    return this.rest.requestPrivate({
      method: "POST",
      endpoint: "/v5/order/cancel",
      body: {
        category: BYBIT_CATEGORY,
        symbol: params.symbol,
        orderId: params.orderId
      }
    });
  }

  getOpenOrder(params: { symbol: string; orderId: string }): Promise<BybitListResult<BybitOrderRaw>> {
    return this.rest.requestPrivate({
      method: "GET",
      endpoint: "/v5/order/realtime",
      query: {
        category: BYBIT_CATEGORY,
        symbol: params.symbol,
        orderId: params.orderId
      }
    });
  }

  getOrderHistory(params: { symbol: string; orderId: string }): Promise<BybitListResult<BybitOrderRaw>> {
    return this.rest.requestPrivate({
      method: "GET",
      endpoint: "/v5/order/history",
      query: {
        category: BYBIT_CATEGORY,
        symbol: params.symbol,
        orderId: params.orderId
      }
    });
  }
}
