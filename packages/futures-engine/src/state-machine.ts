import type {
  Bar,
  BracketLevels,
  ExchangePosition,
  ExecutionConfig,
  IndicatorSnapshot,
  IntentSide,
  PositionIntent,
  PositionSide,
  ReconcileConfig,
  TradeSignal
} from "@ptb/futures-core";
import {
  DivergenceDetectedError,
  FLAT_INTENT,
  FuturesValidationError,
  StuckPositionError,
  closingOrderSide,
  isBracketValid,
  toOrderSide
} from "@ptb/futures-core";
import type { ExecutionGateway, OrderHandle, OrderStatusReport } from "@ptb/futures-exchange";
import type { RiskSizer } from "@ptb/risk";
import type { EmitEngineEvent, EngineEvent, EngineEventType } from "./events.js";
import { isGlobalTradingEnabled } from "./kill-switch.js";
import { Mutex } from "./mutex.js";

export type MachineState = "flat" | "pending_entry" | "open" | "pending_exit";

export type ExitReason = "stop_loss" | "take_profit" | "signal";

export type SignalDecider = (side: IntentSide) => TradeSignal;

export type PositionStateMachineOptions = {
  execution: ExecutionConfig;
  reconcile: ReconcileConfig;
  emitEvent?: EmitEngineEvent;
  isTradingEnabled?: () => boolean | Promise<boolean>;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

type ExitAttempt = { ok: true } | { ok: false; error: string };

type Confirmation = OrderStatusReport | { status: "timeout"; lastError?: string };

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const FILL_EPSILON = 1e-9;

function isPositive(value: number | null | undefined): value is number {
  return typeof value === "number" && Number.isFinite(value) && value > 0;
}

/**
 * Owns the single position of one symbol. Every operation that reads or
 * mutates the intent runs under one FIFO lock, so a bar, a reconciliation
 * tick and shutdown never interleave.
 */
export class PositionStateMachine {
  private currentState: MachineState = "flat";
  private currentIntent: PositionIntent = { ...FLAT_INTENT };
  private halted = false;
  private stuck = false;
  private closed = false;
  private orderSequence = 0;

  private readonly mutex = new Mutex();
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly gateway: ExecutionGateway,
    private readonly sizer: RiskSizer,
    private readonly options: PositionStateMachineOptions
  ) {
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get state(): MachineState {
    return this.currentState;
  }

  get intent(): Readonly<PositionIntent> {
    return this.currentIntent;
  }

  get entriesHalted(): boolean {
    return this.halted;
  }

  get isStuck(): boolean {
    return this.stuck;
  }

  get isShutdown(): boolean {
    return this.closed;
  }

  /**
   * Rebuilds the intent from the exchange. A live position is adopted as
   * `open`; its brackets come from `atr` when given, otherwise from the first
   * bar with a valid ATR.
   */
  async initialize(atr?: number | null): Promise<MachineState> {
    return this.exclusive(async () => {
      const position = await this.gateway.queryPosition();
      if (position.side === "flat" || position.size <= 0) {
        this.currentIntent = { ...FLAT_INTENT };
        await this.transition("flat", "startup");
        return this.currentState;
      }

      this.adoptPosition(position);
      await this.transition("open", "recovered", { size: position.size, avgEntryPrice: position.avgEntryPrice });
      if (isPositive(atr)) {
        await this.applyBracket(atr);
      }
      return this.currentState;
    });
  }

  async onBar(bar: Bar, snapshot: IndicatorSnapshot, decide: SignalDecider): Promise<TradeSignal> {
    return this.exclusive(async () => {
      if (this.stuck) return "none";

      if (this.currentState === "open") {
        if (this.currentIntent.stopLoss === null && isPositive(snapshot.atr)) {
          await this.applyBracket(snapshot.atr);
        }
        const hit = this.bracketHit(bar);
        if (hit) {
          await this.exit(hit, bar);
          return "none";
        }
      }

      const side = this.currentIntent.side;
      const signal = decide(side);
      if (signal !== "none") {
        await this.emit("SIGNAL_GENERATED", `Signal ${signal}`, {
          signal,
          side,
          barTimestamp: bar.timestamp,
          close: bar.close
        });
      }

      if (this.currentState === "open") {
        if ((signal === "exit_long" && side === "long") || (signal === "exit_short" && side === "short")) {
          await this.exit("signal", bar);
        }
        return signal;
      }

      if (this.currentState === "flat" && (signal === "enter_long" || signal === "enter_short")) {
        const entrySide: PositionSide = signal === "enter_long" ? "long" : "short";
        if (this.halted) {
          await this.emit("ENTRY_BLOCKED", "Entries halted until the stuck position is resolved", {
            signal,
            reason: "halted"
          });
        } else if (!(await this.tradingEnabled())) {
          await this.emit("ENTRY_BLOCKED", "Global kill switch is engaged. Entry blocked.", {
            signal,
            reason: "kill_switch"
          });
        } else {
          await this.enter(entrySide, bar, snapshot);
        }
      }

      return signal;
    });
  }

  /**
   * Compares the intent with the exchange position and forces the intent to
   * match on divergence. Returns the divergence, or null when in sync.
   */
  async reconcile(): Promise<DivergenceDetectedError | null> {
    return this.exclusive(async () => {
      let position: ExchangePosition;
      try {
        position = await this.gateway.queryPosition();
      } catch (error) {
        await this.emit("RECONCILE_FAILED", `Position query failed: ${errorMessage(error)}`, {
          error: errorMessage(error)
        });
        return null;
      }

      if (this.stuck) {
        if (position.side === "flat") {
          this.stuck = false;
          this.halted = false;
          this.currentIntent = { ...FLAT_INTENT };
          await this.transition("flat", "stuck_position_closed");
        } else {
          this.currentIntent = { ...this.currentIntent, side: position.side, size: position.size };
        }
        return null;
      }

      const sizeDiff = Math.abs(position.size - this.currentIntent.size);
      if (position.side === this.currentIntent.side && sizeDiff <= this.options.reconcile.sizeTolerance) {
        return null;
      }

      const divergence = new DivergenceDetectedError(this.gateway.symbol, { ...this.currentIntent }, position);
      await this.emit("DIVERGENCE_DETECTED", divergence.message, {
        intent: divergence.intent,
        exchange: position
      });

      if (position.side === "flat" || position.size <= 0) {
        this.currentIntent = { ...FLAT_INTENT };
        await this.transition("flat", "reconciled");
      } else {
        this.adoptPosition(position);
        await this.transition("open", "reconciled");
      }
      return divergence;
    });
  }

  /**
   * Clears the entry halt. A stuck machine re-reads the exchange and goes back
   * to `open` (or `flat`) so the next bar can retry the exit.
   */
  async resumeEntries(): Promise<void> {
    await this.exclusive(async () => {
      this.halted = false;
      if (!this.stuck) return;

      const position = await this.gateway.queryPosition();
      this.stuck = false;
      if (position.side === "flat") {
        this.currentIntent = { ...FLAT_INTENT };
        await this.transition("flat", "resumed");
      } else {
        this.adoptPosition(position);
        await this.transition("open", "resumed");
      }
    });
  }

  async shutdown(): Promise<void> {
    if (this.closed) return;
    await this.mutex.runExclusive(async () => {
      this.closed = true;
    });
  }

  private async exclusive<T>(fn: () => Promise<T>): Promise<T> {
    if (this.closed) throw new Error("Position state machine is shut down");
    return this.mutex.runExclusive(async () => {
      if (this.closed) throw new Error("Position state machine is shut down");
      return fn();
    });
  }

  private async tradingEnabled(): Promise<boolean> {
    if (this.options.isTradingEnabled) return await this.options.isTradingEnabled();
    return isGlobalTradingEnabled();
  }

  private async emit(type: EngineEventType, message: string, meta: Record<string, unknown> = {}) {
    if (!this.options.emitEvent) return;
    const event: EngineEvent = {
      type,
      symbol: this.gateway.symbol,
      timestamp: new Date(this.now()).toISOString(),
      message,
      meta
    };
    await this.options.emitEvent(event);
  }

  private async transition(next: MachineState, reason: string, meta: Record<string, unknown> = {}) {
    const from = this.currentState;
    this.currentState = next;
    await this.emit("STATE_TRANSITION", `${from} -> ${next} (${reason})`, {
      from,
      to: next,
      reason,
      intent: { ...this.currentIntent },
      ...meta
    });
  }

  private adoptPosition(position: ExchangePosition) {
    if (position.side === "flat") {
      this.currentIntent = { ...FLAT_INTENT };
      return;
    }
    const keepLevels =
      this.currentIntent.side === position.side &&
      this.currentIntent.stopLoss !== null &&
      this.currentIntent.takeProfit !== null &&
      isBracketValid(position.side, position.avgEntryPrice, {
        stopLoss: this.currentIntent.stopLoss,
        takeProfit: this.currentIntent.takeProfit
      });

    this.currentIntent = {
      side: position.side,
      size: position.size,
      entryPrice: position.avgEntryPrice,
      stopLoss: keepLevels ? this.currentIntent.stopLoss : null,
      takeProfit: keepLevels ? this.currentIntent.takeProfit : null
    };
  }

  private nextClientOrderId(kind: "entry" | "exit"): string {
    this.orderSequence += 1;
    return `ptb-${kind}-${this.now()}-${this.orderSequence}`;
  }

  private async applyBracket(atr: number) {
    const side = this.currentIntent.side;
    if (side === "flat") return;

    let levels: BracketLevels;
    try {
      levels = this.sizer.bracket(this.currentIntent.entryPrice, atr, side);
    } catch (error) {
      if (!(error instanceof FuturesValidationError)) throw error;
      await this.emit("PROTECTION_FAILED", `Cannot compute brackets: ${error.message}`, { atr });
      return;
    }

    this.currentIntent = { ...this.currentIntent, ...levels };
    await this.protect(levels);
  }

  private async protect(levels: BracketLevels) {
    try {
      await this.gateway.setTradingStop(levels);
    } catch (error) {
      await this.emit("PROTECTION_FAILED", `Exchange-side protection not set: ${errorMessage(error)}`, {
        stopLoss: levels.stopLoss,
        takeProfit: levels.takeProfit,
        error: errorMessage(error)
      });
    }
  }

  private bracketHit(bar: Bar): Exclude<ExitReason, "signal"> | null {
    const { side, stopLoss, takeProfit } = this.currentIntent;
    if (side === "flat") return null;

    // stop-loss first when one bar touches both levels
    if (side === "long") {
      if (stopLoss !== null && bar.low <= stopLoss) return "stop_loss";
      if (takeProfit !== null && bar.high >= takeProfit) return "take_profit";
      return null;
    }
    if (stopLoss !== null && bar.high >= stopLoss) return "stop_loss";
    if (takeProfit !== null && bar.low <= takeProfit) return "take_profit";
    return null;
  }

  /** Polls until filled or rejected, or reports a timeout once the confirm window elapses. */
  private async awaitConfirmation(handle: OrderHandle): Promise<Confirmation> {
    const deadline = this.now() + this.options.execution.confirmTimeoutMs;
    let lastError: string | undefined;
    for (;;) {
      try {
        const report = await this.gateway.queryOrderStatus(handle);
        if (report.status !== "pending") return report;
      } catch (error) {
        lastError = errorMessage(error);
      }
      if (this.now() >= deadline) return { status: "timeout", lastError };
      await this.sleep(this.options.execution.pollIntervalMs);
    }
  }

  private async cancelQuietly(handle: OrderHandle): Promise<string | null> {
    try {
      await this.gateway.cancelOrder(handle);
      return null;
    } catch (error) {
      return errorMessage(error);
    }
  }

  private async revertToFlat(message: string, meta: Record<string, unknown>) {
    this.currentIntent = { ...FLAT_INTENT };
    await this.emit("ORDER_FAILED", message, meta);
    await this.transition("flat", "entry_failed");
  }

  private async enter(side: PositionSide, bar: Bar, snapshot: IndicatorSnapshot) {
    const atr = snapshot.atr;
    if (!isPositive(atr)) return;
    const entryPrice = bar.close;

    let size: number;
    let levels: BracketLevels;
    try {
      const account = await this.gateway.getAccountState();
      const sized = this.sizer.size({ equity: account.equity, entryPrice, atr, side });
      size = sized.size;
      levels = { stopLoss: sized.stopLoss, takeProfit: sized.takeProfit };
    } catch (error) {
      await this.emit("ORDER_FAILED", `Entry discarded: ${errorMessage(error)}`, {
        side,
        entryPrice,
        error: errorMessage(error),
        errorName: error instanceof Error ? error.name : undefined
      });
      return;
    }

    this.currentIntent = { side, size, entryPrice, ...levels };
    await this.transition("pending_entry", "entry_signal");

    let handle: OrderHandle;
    try {
      handle = await this.gateway.submitOrder({
        side: toOrderSide(side),
        qty: size,
        type: "market",
        clientOrderId: this.nextClientOrderId("entry")
      });
    } catch (error) {
      await this.revertToFlat(`Entry submission failed: ${errorMessage(error)}`, {
        side,
        size,
        error: errorMessage(error)
      });
      return;
    }
    await this.emit("ORDER_SUBMITTED", `Entry ${side} ${size} submitted`, {
      orderId: handle.orderId,
      clientOrderId: handle.clientOrderId,
      side,
      size
    });

    const report = await this.awaitConfirmation(handle);
    if (report.status === "filled") {
      const filledQty = isPositive(report.filledQty) ? report.filledQty : size;
      const fillPrice = isPositive(report.avgPrice) ? report.avgPrice : entryPrice;
      await this.confirmEntry(side, filledQty, fillPrice, atr, handle.orderId);
      return;
    }

    if (report.status === "rejected") {
      await this.revertToFlat(`Entry rejected: ${report.reason ?? "unknown reason"}`, {
        orderId: handle.orderId,
        reason: report.reason
      });
      return;
    }

    // timeout: the exchange decides whether the order went through
    let position: ExchangePosition | null = null;
    try {
      position = await this.gateway.queryPosition();
    } catch (error) {
      await this.emit("ORDER_FAILED", `Position query after entry timeout failed: ${errorMessage(error)}`, {
        orderId: handle.orderId
      });
    }
    if (position && position.side === side && position.size > 0) {
      await this.confirmEntry(side, position.size, position.avgEntryPrice, atr, handle.orderId);
      return;
    }

    const cancelError = await this.cancelQuietly(handle);
    await this.revertToFlat(`Entry not confirmed within ${this.options.execution.confirmTimeoutMs}ms`, {
      orderId: handle.orderId,
      lastError: report.lastError,
      cancelError
    });
  }

  private async confirmEntry(side: PositionSide, size: number, fillPrice: number, atr: number, orderId: string) {
    const levels = this.sizer.bracket(fillPrice, atr, side);
    this.currentIntent = { side, size, entryPrice: fillPrice, ...levels };
    await this.transition("open", "entry_filled", { orderId });
    await this.protect(levels);
  }

  private async submitExit(side: PositionSide, size: number, reason: ExitReason): Promise<ExitAttempt> {
    let handle: OrderHandle;
    try {
      handle = await this.gateway.submitOrder({
        side: closingOrderSide(side),
        qty: size,
        type: "market",
        reduceOnly: true,
        clientOrderId: this.nextClientOrderId("exit")
      });
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    }
    await this.emit("ORDER_SUBMITTED", `Exit ${side} ${size} submitted (${reason})`, {
      orderId: handle.orderId,
      clientOrderId: handle.clientOrderId,
      side,
      size,
      reason
    });

    const report = await this.awaitConfirmation(handle);
    if (report.status === "filled") {
      if (!isPositive(report.filledQty) || report.filledQty + FILL_EPSILON >= size) return { ok: true };
      const remaining = await this.queryPositionOrNull();
      if (remaining?.side === "flat") return { ok: true };
      return { ok: false, error: `partial fill ${report.filledQty} of ${size}` };
    }
    if (report.status === "rejected") return { ok: false, error: report.reason ?? "rejected" };

    const cancelError = await this.cancelQuietly(handle);
    return {
      ok: false,
      error: cancelError ? `confirmation timeout (cancel failed: ${cancelError})` : "confirmation timeout"
    };
  }

  private async queryPositionOrNull(): Promise<ExchangePosition | null> {
    try {
      return await this.gateway.queryPosition();
    } catch (error) {
      await this.emit("RECONCILE_FAILED", `Position query during exit failed: ${errorMessage(error)}`, {
        error: errorMessage(error)
      });
      return null;
    }
  }

  private async closeOut(reason: string, meta: Record<string, unknown> = {}) {
    this.currentIntent = { ...FLAT_INTENT };
    await this.transition("flat", reason, meta);
  }

  private async exit(reason: ExitReason, bar: Bar) {
    const side = this.currentIntent.side;
    if (side === "flat") return;
    const size = this.currentIntent.size;

    await this.transition("pending_exit", reason, { barTimestamp: bar.timestamp, close: bar.close });

    const first = await this.submitExit(side, size, reason);
    if (first.ok) {
      await this.closeOut("exit_filled");
      return;
    }
    await this.emit("ORDER_FAILED", `Exit failed: ${first.error}`, { side, size, attempt: 1 });

    const position = await this.queryPositionOrNull();
    if (position && position.side === "flat") {
      await this.closeOut("closed_on_exchange");
      return;
    }

    const retrySide = position && position.side !== "flat" ? position.side : side;
    const retrySize = position && position.side !== "flat" ? position.size : size;
    const second = await this.submitExit(retrySide, retrySize, reason);
    if (second.ok) {
      await this.closeOut("exit_filled", { attempt: 2 });
      return;
    }
    await this.emit("ORDER_FAILED", `Exit retry failed: ${second.error}`, {
      side: retrySide,
      size: retrySize,
      attempt: 2
    });

    const remaining = await this.queryPositionOrNull();
    if (remaining && remaining.side === "flat") {
      await this.closeOut("closed_on_exchange");
      return;
    }

    const stuckPosition: ExchangePosition = remaining ?? {
      symbol: this.gateway.symbol,
      side: retrySide,
      size: retrySize,
      avgEntryPrice: this.currentIntent.entryPrice
    };
    this.stuck = true;
    this.halted = true;
    this.currentIntent = { ...this.currentIntent, side: stuckPosition.side, size: stuckPosition.size };

    const stuckError = new StuckPositionError(this.gateway.symbol, stuckPosition, second.error);
    await this.emit("FATAL_CONDITION", stuckError.message, {
      position: stuckPosition,
      lastError: second.error
    });
    throw stuckError;
  }
}
