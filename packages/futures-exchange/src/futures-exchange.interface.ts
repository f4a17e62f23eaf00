import type {
  AccountState,
  BracketLevels,
  ExchangePosition,
  FuturesSymbol,
  OrderSide,
  OrderType
} from "@ptb/futures-core";

export type SubmitOrderRequest = {
  side: OrderSide;
  qty: number;
  type: OrderType;
  price?: number;
  reduceOnly?: boolean;
  clientOrderId?: string;
};

export type OrderHandle = {
  orderId: string;
  symbol: FuturesSymbol;
  clientOrderId?: string;
};

export type OrderStatus = "pending" | "filled" | "rejected";

export type OrderStatusReport = {
  status: OrderStatus;
  avgPrice?: number;
  filledQty?: number;
  reason?: string;
};

/**
 * Order API of the venue for the single configured symbol. Every method
 * rejects with a GatewayError on transport or venue failure.
 */
export interface ExecutionGateway {
  readonly symbol: FuturesSymbol;
  submitOrder(req: SubmitOrderRequest): Promise<OrderHandle>;
  cancelOrder(handle: OrderHandle): Promise<void>;
  queryPosition(): Promise<ExchangePosition>;
  queryOrderStatus(handle: OrderHandle): Promise<OrderStatusReport>;
  getAccountState(): Promise<AccountState>;
  setTradingStop(levels: BracketLevels): Promise<void>;
  setLeverage(leverage: number): Promise<void>;
}
