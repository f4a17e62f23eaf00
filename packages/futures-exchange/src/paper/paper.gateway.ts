import type {
  AccountState,
  BracketLevels,
  ExchangePosition,
  FuturesSymbol,
  InstrumentRules,
  OrderSide
} from "@ptb/futures-core";
import { GatewayError, roundQtyToStep, validateQty } from "@ptb/futures-core";
import type {
  ExecutionGateway,
  OrderHandle,
  OrderStatusReport,
  SubmitOrderRequest
} from "../futures-exchange.interface.js";

type PaperOrder = {
  handle: OrderHandle;
  request: SubmitOrderRequest;
  report: OrderStatusReport;
};

export type PaperGatewayConfig = {
  symbol: FuturesSymbol;
  equity: number;
  instrument: InstrumentRules;
};

function signedQty(side: OrderSide, qty: number): number {
  return side === "buy" ? qty : -qty;
}

/**
 * In-process venue for paper trading. Market orders fill at the last mark
 * price, limit orders rest until the mark crosses them. One-way netting.
 */
export class PaperGateway implements ExecutionGateway {
  readonly symbol: FuturesSymbol;

  private balance: number;
  private netQty = 0;
  private avgEntryPrice = 0;
  private markPrice: number | null = null;
  private leverage = 1;
  private protection: BracketLevels | null = null;
  private sequence = 0;
  private readonly orders = new Map<string, PaperOrder>();

  constructor(private readonly config: PaperGatewayConfig) {
    this.symbol = config.symbol;
    this.balance = config.equity;
  }

  get tradingStop(): BracketLevels | null {
    return this.protection;
  }

  get currentLeverage(): number {
    return this.leverage;
  }

  setMarkPrice(price: number): void {
    if (!Number.isFinite(price) || price <= 0) return;
    this.markPrice = price;

    for (const order of this.orders.values()) {
      if (order.report.status !== "pending" || order.request.price === undefined) continue;
      const crossed =
        order.request.side === "buy" ? price <= order.request.price : price >= order.request.price;
      if (crossed) this.fill(order, order.request.price);
    }
  }

  async submitOrder(req: SubmitOrderRequest): Promise<OrderHandle> {
    if (this.markPrice === null) {
      throw new GatewayError("Paper venue has no mark price yet", { operation: "submitOrder", retryable: true });
    }

    this.sequence += 1;
    const handle: OrderHandle = {
      orderId: `paper-${this.sequence}`,
      symbol: this.symbol,
      clientOrderId: req.clientOrderId
    };
    const order: PaperOrder = { handle, request: req, report: { status: "pending" } };
    this.orders.set(handle.orderId, order);

    const qty = roundQtyToStep(req.qty, this.config.instrument.qtyStep, "down");
    const check = validateQty(qty, this.config.instrument, this.symbol);
    if (!check.ok) {
      order.report = { status: "rejected", reason: check.error.message };
      return handle;
    }
    order.request = { ...req, qty };

    if (req.reduceOnly && !this.reduces(req.side, qty)) {
      order.report = { status: "rejected", reason: "reduce-only order would not reduce the position" };
      return handle;
    }

    if (req.type === "market") {
      this.fill(order, this.markPrice);
    } else if (req.price === undefined) {
      order.report = { status: "rejected", reason: "limit order without price" };
    } else {
      this.setMarkPrice(this.markPrice);
    }

    return handle;
  }

  async cancelOrder(handle: OrderHandle): Promise<void> {
    const order = this.requireOrder(handle, "cancelOrder");
    if (order.report.status === "pending") {
      order.report = { status: "rejected", reason: "cancelled" };
    }
  }

  async queryOrderStatus(handle: OrderHandle): Promise<OrderStatusReport> {
    return { ...this.requireOrder(handle, "queryOrderStatus").report };
  }

  async queryPosition(): Promise<ExchangePosition> {
    if (this.netQty === 0) {
      return { symbol: this.symbol, side: "flat", size: 0, avgEntryPrice: 0 };
    }
    return {
      symbol: this.symbol,
      side: this.netQty > 0 ? "long" : "short",
      size: Math.abs(this.netQty),
      avgEntryPrice: this.avgEntryPrice
    };
  }

  async getAccountState(): Promise<AccountState> {
    const mark = this.markPrice ?? this.avgEntryPrice;
    const unrealized = this.netQty * (mark - this.avgEntryPrice);
    return { equity: this.balance + unrealized };
  }

  async setTradingStop(levels: BracketLevels): Promise<void> {
    if (this.netQty === 0) {
      throw new GatewayError("Cannot set trading stop without a position", { operation: "setTradingStop" });
    }
    this.protection = { ...levels };
  }

  async setLeverage(leverage: number): Promise<void> {
    this.leverage = leverage;
  }

  private reduces(side: OrderSide, qty: number): boolean {
    const delta = signedQty(side, qty);
    return this.netQty !== 0 && Math.sign(delta) !== Math.sign(this.netQty) && qty <= Math.abs(this.netQty);
  }

  private requireOrder(handle: OrderHandle, operation: string): PaperOrder {
    const order = this.orders.get(handle.orderId);
    if (!order) {
      throw new GatewayError(`Unknown paper order ${handle.orderId}`, { operation });
    }
    return order;
  }

  private fill(order: PaperOrder, price: number): void {
    const delta = signedQty(order.request.side, order.request.qty);
    const before = this.netQty;
    const after = roundQtyToStep(before + delta, this.config.instrument.qtyStep, "nearest");

    if (before === 0) {
      this.avgEntryPrice = price;
    } else if (Math.sign(before) === Math.sign(delta)) {
      this.avgEntryPrice = (Math.abs(before) * this.avgEntryPrice + Math.abs(delta) * price) / Math.abs(after);
    } else {
      const closedQty = Math.min(Math.abs(before), Math.abs(delta));
      this.balance += Math.sign(before) * closedQty * (price - this.avgEntryPrice);
      if (Math.sign(after) !== Math.sign(before) && after !== 0) {
        this.avgEntryPrice = price;
      }
    }

    this.netQty = after;
    if (after === 0) {
      this.avgEntryPrice = 0;
      this.protection = null;
    }

    order.report = { status: "filled", avgPrice: price, filledQty: order.request.qty };
  }
}
