import type {
  AccountState,
  Bar,
  BracketLevels,
  ExchangePosition,
  FuturesSymbol,
  InstrumentRules
} from "@ptb/futures-core";
import { GatewayError, roundPriceToTick, roundQtyToStep, validatePrice, validateQty } from "@ptb/futures-core";
import type {
  ExecutionGateway,
  OrderHandle,
  OrderStatusReport,
  SubmitOrderRequest
} from "../futures-exchange.interface.js";
import { BybitAccountApi } from "./bybit.account.api.js";
import { BYBIT_ACCOUNT_TYPE, BYBIT_CATEGORY, BYBIT_POSITION_IDX, BYBIT_RET_CODES } from "./bybit.constants.js";
import { BybitApiError } from "./bybit.errors.js";
import { BybitMarketApi } from "./bybit.market.api.js";
import { BybitPositionApi } from "./bybit.position.api.js";
import { BybitRestClient } from "./bybit.rest.js";
import { BybitTradeApi } from "./bybit.trade.api.js";
import type { BybitAdapterConfig, BybitKlineRow, BybitOrderRaw, BybitPositionRaw } from "./bybit.types.js";

export type BybitGatewayConfig = BybitAdapterConfig & {
  symbol: FuturesSymbol;
  instrument: InstrumentRules;
};

function toNumber(value: unknown): number | null {
  if (value === undefined || value === null || value === "") return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

function stepDecimals(step: number): number {
  const text = String(step);
  if (text.includes("e-")) return Number(text.split("e-")[1]);
  const dot = text.indexOf(".");
  return dot === -1 ? 0 : text.length - dot - 1;
}

export function formatToStep(value: number, step: number): string {
  return value.toFixed(stepDecimals(step));
}

function hasRetCode(error: unknown, code: number): boolean {
  return error instanceof BybitApiError && error.details.retCode === code;
}

export function mapOrderStatus(row: BybitOrderRaw): OrderStatusReport {
  const filledQty = toNumber(row.cumExecQty) ?? 0;
  const avgPrice = toNumber(row.avgPrice) ?? undefined;

  switch (row.orderStatus) {
    case "Filled":
    case "PartiallyFilledCanceled":
      return { status: "filled", avgPrice, filledQty };
    case "Cancelled":
    case "Rejected":
    case "Deactivated":
      if (filledQty > 0) return { status: "filled", avgPrice, filledQty };
      return { status: "rejected", reason: row.rejectReason || row.orderStatus };
    default:
      return { status: "pending" };
  }
}

export function mapPosition(symbol: FuturesSymbol, rows: BybitPositionRaw[]): ExchangePosition {
  const row = rows.find((item) => item.symbol === symbol && (toNumber(item.size) ?? 0) > 0);
  if (!row || row.side === "") {
    return { symbol, side: "flat", size: 0, avgEntryPrice: 0 };
  }
  return {
    symbol,
    side: row.side === "Buy" ? "long" : "short",
    size: toNumber(row.size) ?? 0,
    avgEntryPrice: toNumber(row.avgPrice) ?? 0
  };
}

export function mapKlineRow(row: BybitKlineRow): Bar {
  return {
    timestamp: Number(row[0]),
    open: Number(row[1]),
    high: Number(row[2]),
    low: Number(row[3]),
    close: Number(row[4]),
    volume: Number(row[5])
  };
}

/**
 * Linear USDT perpetual gateway on Bybit v5, one-way position mode.
 */
export class BybitGateway implements ExecutionGateway {
  readonly symbol: FuturesSymbol;
  readonly rest: BybitRestClient;
  readonly tradeApi: BybitTradeApi;
  readonly positionApi: BybitPositionApi;
  readonly accountApi: BybitAccountApi;
  readonly marketApi: BybitMarketApi;

  private readonly instrument: InstrumentRules;
  private orderSequence = 0;

  constructor(config: BybitGatewayConfig) {
    this.symbol = config.symbol;
    this.instrument = config.instrument;
    this.rest = new BybitRestClient(config);
    this.tradeApi = new BybitTradeApi(this.rest);
    this.positionApi = new BybitPositionApi(this.rest);
    this.accountApi = new BybitAccountApi(this.rest);
    this.marketApi = new BybitMarketApi(this.rest);
  }

  async submitOrder(req: SubmitOrderRequest): Promise<OrderHandle> {
    const qty = roundQtyToStep(req.qty, this.instrument.qtyStep, "down");
    const check = validateQty(qty, this.instrument, this.symbol);
    if (!check.ok) {
      throw new GatewayError(check.error.message, { operation: "submitOrder", cause: check.error });
    }
    if (req.type === "limit" && req.price === undefined) {
      throw new GatewayError("Limit order requires a price", { operation: "submitOrder" });
    }

    this.orderSequence += 1;
    const clientOrderId = req.clientOrderId ?? `ptb-${Date.now()}-${this.orderSequence}`;

    const result = await this.tradeApi.createOrder({
      category: BYBIT_CATEGORY,
      symbol: this.symbol,
      side: req.side === "buy" ? "Buy" : "Sell",
      orderType: req.type === "market" ? "Market" : "Limit",
      qty: formatToStep(qty, this.instrument.qtyStep),
      price: req.type === "limit" && req.price !== undefined ? this.tickPrice(req.price, "submitOrder") : undefined,
      timeInForce: req.type === "market" ? "IOC" : "GTC",
      reduceOnly: req.reduceOnly ? true : undefined,
      orderLinkId: clientOrderId,
      positionIdx: BYBIT_POSITION_IDX
    });

    return { orderId: result.orderId, symbol: this.symbol, clientOrderId };
  }

  async cancelOrder(handle: OrderHandle): Promise<void> {
    try {
      await this.tradeApi.cancelOrder({ symbol: this.symbol, orderId: handle.orderId });
    } catch (error) {
      // already filled or cancelled
      if (hasRetCode(error, BYBIT_RET_CODES.orderNotExists)) return;
      throw error;
    }
  }

  async queryOrderStatus(handle: OrderHandle): Promise<OrderStatusReport> {
    const open = await this.tradeApi.getOpenOrder({ symbol: this.symbol, orderId: handle.orderId });
    const live = open.list.find((row) => row.orderId === handle.orderId);
    if (live) return mapOrderStatus(live);

    const history = await this.tradeApi.getOrderHistory({ symbol: this.symbol, orderId: handle.orderId });
    const done = history.list.find((row) => row.orderId === handle.orderId);
    return done ? mapOrderStatus(done) : { status: "pending" };
  }

  async queryPosition(): Promise<ExchangePosition> {
    const result = await this.positionApi.getPositions(this.symbol);
    return mapPosition(this.symbol, result.list);
  }

  async getAccountState(): Promise<AccountState> {
    const result = await this.accountApi.getWalletBalance(BYBIT_ACCOUNT_TYPE);
    const wallet = result.list[0];
    const equity = toNumber(wallet?.totalEquity);
    if (equity === null) {
      throw new GatewayError("Wallet balance response has no totalEquity", { operation: "getAccountState" });
    }
    return {
      equity,
      availableMargin: toNumber(wallet?.totalAvailableBalance) ?? undefined
    };
  }

  async setTradingStop(levels: BracketLevels): Promise<void> {
    await this.positionApi.setTradingStop({
      symbol: this.symbol,
      stopLoss: this.tickPrice(levels.stopLoss, "setTradingStop"),
      takeProfit: this.tickPrice(levels.takeProfit, "setTradingStop")
    });
  }

  /** Rounds a price to the tick and formats it for the wire; unusable prices never reach the venue. */
  private tickPrice(price: number, operation: string): string {
    const tick = this.instrument.tickSize;
    const rounded = roundPriceToTick(price, tick);
    const check = validatePrice(rounded, tick, this.symbol);
    if (!check.ok) {
      throw new GatewayError(check.error.message, { operation, cause: check.error });
    }
    return formatToStep(rounded, tick);
  }

  async setLeverage(leverage: number): Promise<void> {
    try {
      await this.positionApi.setLeverage({ symbol: this.symbol, leverage });
    } catch (error) {
      if (hasRetCode(error, BYBIT_RET_CODES.leverageNotModified)) return;
      throw error;
    }
  }

  /** Closed bars oldest first; the still-forming newest kline is dropped. */
  async fetchRecentBars(interval: string, limit: number): Promise<Bar[]> {
    const result = await this.marketApi.getKlines({ symbol: this.symbol, interval, limit: limit + 1 });
    return result.list.slice(1).reverse().map(mapKlineRow);
  }
}
