import assert from "node:assert/strict";
import test from "node:test";
import type {
  AccountState,
  Bar,
  BracketLevels,
  ExchangePosition,
  IndicatorSnapshot,
  TradeSignal
} from "@ptb/futures-core";
import { DivergenceDetectedError, GatewayError, StuckPositionError } from "@ptb/futures-core";
import type {
  ExecutionGateway,
  OrderHandle,
  OrderStatusReport,
  SubmitOrderRequest
} from "@ptb/futures-exchange";
import { RiskSizer } from "@ptb/risk";
import type { EngineEvent } from "./events.js";
import { PositionStateMachine, type PositionStateMachineOptions } from "./state-machine.js";

type SubmitBehavior = "fill" | "half" | "reject" | "pending" | "pending_filled" | "reject_flat" | "throw";

const FLAT: ExchangePosition = { symbol: "BTCUSDT", side: "flat", size: 0, avgEntryPrice: 0 };

class FakeGateway implements ExecutionGateway {
  readonly symbol = "BTCUSDT";
  equity = 10_000;
  fillPrice = 30_000;
  position: ExchangePosition = FLAT;
  failTradingStop = false;
  failPositionQuery = false;
  readonly behaviors: SubmitBehavior[] = [];
  readonly submitted: SubmitOrderRequest[] = [];
  readonly cancelled: string[] = [];
  readonly stops: BracketLevels[] = [];
  private readonly statuses = new Map<string, OrderStatusReport>();

  async submitOrder(req: SubmitOrderRequest): Promise<OrderHandle> {
    this.submitted.push(req);
    const behavior = this.behaviors.shift() ?? "fill";
    if (behavior === "throw") {
      throw new GatewayError("connection reset", { operation: "submitOrder", retryable: true });
    }

    const orderId = `o-${this.submitted.length}`;
    if (behavior === "fill" || behavior === "pending_filled") {
      this.applyFill(req);
    }
    if (behavior === "reject_flat") {
      this.position = FLAT;
    }
    if (behavior === "half") {
      const filledQty = req.qty / 2;
      const left = this.position.size - filledQty;
      this.position = left > 0 ? { ...this.position, size: left } : FLAT;
      this.statuses.set(orderId, { status: "filled", avgPrice: this.fillPrice, filledQty });
      return { orderId, symbol: this.symbol, clientOrderId: req.clientOrderId };
    }

    if (behavior === "fill") {
      this.statuses.set(orderId, { status: "filled", avgPrice: this.fillPrice, filledQty: req.qty });
    } else if (behavior === "reject" || behavior === "reject_flat") {
      this.statuses.set(orderId, { status: "rejected", reason: "venue rejected order" });
    } else {
      this.statuses.set(orderId, { status: "pending" });
    }
    return { orderId, symbol: this.symbol, clientOrderId: req.clientOrderId };
  }

  async cancelOrder(handle: OrderHandle): Promise<void> {
    this.cancelled.push(handle.orderId);
  }

  async queryPosition(): Promise<ExchangePosition> {
    if (this.failPositionQuery) {
      throw new GatewayError("position endpoint unavailable", { operation: "queryPosition" });
    }
    return { ...this.position };
  }

  async queryOrderStatus(handle: OrderHandle): Promise<OrderStatusReport> {
    return this.statuses.get(handle.orderId) ?? { status: "pending" };
  }

  async getAccountState(): Promise<AccountState> {
    return { equity: this.equity };
  }

  async setTradingStop(levels: BracketLevels): Promise<void> {
    if (this.failTradingStop) {
      throw new GatewayError("trading stop rejected", { operation: "setTradingStop" });
    }
    this.stops.push(levels);
  }

  async setLeverage(): Promise<void> {}

  /** Fills the most recent order, which was left pending. */
  completeLast() {
    const req = this.submitted.at(-1);
    if (!req) return;
    this.applyFill(req);
    this.statuses.set(`o-${this.submitted.length}`, { status: "filled", avgPrice: this.fillPrice, filledQty: req.qty });
  }

  private applyFill(req: SubmitOrderRequest) {
    if (req.reduceOnly) {
      this.position = FLAT;
      return;
    }
    this.position = {
      symbol: this.symbol,
      side: req.side === "buy" ? "long" : "short",
      size: req.qty,
      avgEntryPrice: this.fillPrice
    };
  }
}

function bar(overrides: Partial<Bar> = {}): Bar {
  return { timestamp: 1_700_000_000_000, open: 30_000, high: 30_050, low: 29_950, close: 30_000, volume: 10, ...overrides };
}

function snapshot(overrides: Partial<IndicatorSnapshot> = {}): IndicatorSnapshot {
  return {
    timestamp: 1_700_000_000_000,
    close: 30_000,
    volume: 10,
    emaFast: 30_010,
    emaSlow: 30_000,
    stochK: 30,
    stochD: 25,
    atr: 200,
    volAvg: 8,
    ...overrides
  };
}

function always(signal: TradeSignal) {
  return () => signal;
}

function setup(options: Partial<PositionStateMachineOptions> = {}) {
  const gateway = new FakeGateway();
  const events: EngineEvent[] = [];
  let clock = 0;
  const sizer = new RiskSizer(
    "BTCUSDT",
    {
      leverage: 1,
      riskRewardRatio: 2,
      atrMultiplier: 1.75,
      sizing: { kind: "fixed", positionSize: 0.001, scaleWithLeverage: false }
    },
    { qtyStep: 0.001, minQty: 0.001, tickSize: 0.1 }
  );
  const machine = new PositionStateMachine(gateway, sizer, {
    execution: { confirmTimeoutMs: 2_000, pollIntervalMs: 500 },
    reconcile: { intervalMs: 30_000, sizeTolerance: 0.0005 },
    emitEvent: (event) => {
      events.push(event);
    },
    isTradingEnabled: () => true,
    now: () => clock,
    sleep: async (ms) => {
      clock += ms;
    },
    ...options
  });
  return { gateway, machine, events, elapsed: () => clock };
}

function eventTypes(events: EngineEvent[]) {
  return events.map((event) => event.type);
}

function transitions(events: EngineEvent[]) {
  return events
    .filter((event) => event.type === "STATE_TRANSITION")
    .map((event) => `${String(event.meta.from)}->${String(event.meta.to)}`);
}

test("confirmed entry opens with brackets around the fill price", async () => {
  const { gateway, machine, events } = setup();
  gateway.fillPrice = 30_010;

  const signal = await machine.onBar(bar(), snapshot(), always("enter_long"));

  assert.equal(signal, "enter_long");
  assert.equal(machine.state, "open");
  assert.deepEqual(machine.intent, {
    side: "long",
    size: 0.001,
    entryPrice: 30_010,
    stopLoss: 29_660,
    takeProfit: 30_710
  });
  assert.deepEqual(gateway.submitted.map(({ side, qty, type, reduceOnly }) => ({ side, qty, type, reduceOnly })), [
    { side: "buy", qty: 0.001, type: "market", reduceOnly: undefined }
  ]);
  assert.deepEqual(gateway.stops, [{ stopLoss: 29_660, takeProfit: 30_710 }]);
  assert.deepEqual(transitions(events), ["flat->pending_entry", "pending_entry->open"]);
  assert.deepEqual(eventTypes(events).slice(0, 3), ["SIGNAL_GENERATED", "STATE_TRANSITION", "ORDER_SUBMITTED"]);
});

test("rejected entry reverts to flat without retrying", async () => {
  const { gateway, machine, events } = setup();
  gateway.behaviors.push("reject");

  await machine.onBar(bar(), snapshot(), always("enter_short"));

  assert.equal(machine.state, "flat");
  assert.equal(machine.intent.side, "flat");
  assert.equal(gateway.submitted.length, 1);
  const failure = events.find((event) => event.type === "ORDER_FAILED");
  assert.equal(failure?.message, "Entry rejected: venue rejected order");
  assert.deepEqual(transitions(events), ["flat->pending_entry", "pending_entry->flat"]);
});

test("submission failure reverts to flat", async () => {
  const { gateway, machine, events } = setup();
  gateway.behaviors.push("throw");

  await machine.onBar(bar(), snapshot(), always("enter_long"));

  assert.equal(machine.state, "flat");
  assert.ok(eventTypes(events).includes("ORDER_FAILED"));
  assert.ok(!eventTypes(events).includes("ORDER_SUBMITTED"));
});

test("unconfirmed entry is cancelled after the timeout when the exchange is flat", async () => {
  const { gateway, machine, events, elapsed } = setup();
  gateway.behaviors.push("pending");

  await machine.onBar(bar(), snapshot(), always("enter_long"));

  assert.equal(machine.state, "flat");
  assert.equal(elapsed(), 2_000);
  assert.deepEqual(gateway.cancelled, ["o-1"]);
  const failure = events.find((event) => event.type === "ORDER_FAILED");
  assert.equal(failure?.message, "Entry not confirmed within 2000ms");
});

test("unconfirmed entry that reached the exchange is adopted", async () => {
  const { gateway, machine } = setup();
  gateway.behaviors.push("pending_filled");
  gateway.fillPrice = 30_000;

  await machine.onBar(bar(), snapshot(), always("enter_long"));

  assert.equal(machine.state, "open");
  assert.deepEqual(machine.intent, {
    side: "long",
    size: 0.001,
    entryPrice: 30_000,
    stopLoss: 29_650,
    takeProfit: 30_700
  });
  assert.deepEqual(gateway.cancelled, []);
});

test("insufficient equity discards the entry before any order", async () => {
  const { gateway, machine, events } = setup();
  gateway.equity = 10;

  await machine.onBar(bar(), snapshot(), always("enter_long"));

  assert.equal(machine.state, "flat");
  assert.equal(gateway.submitted.length, 0);
  const failure = events.find((event) => event.type === "ORDER_FAILED");
  assert.equal(failure?.meta.errorName, "InsufficientEquityError");
});

test("restart adopts an open long and recomputes its brackets", async () => {
  const { gateway, machine } = setup();
  gateway.position = { symbol: "BTCUSDT", side: "long", size: 0.002, avgEntryPrice: 30_000 };

  assert.equal(await machine.initialize(200), "open");
  assert.deepEqual(machine.intent, {
    side: "long",
    size: 0.002,
    entryPrice: 30_000,
    stopLoss: 29_650,
    takeProfit: 30_700
  });
  assert.deepEqual(gateway.stops, [{ stopLoss: 29_650, takeProfit: 30_700 }]);
});

test("restart without atr fills in brackets on the first valid bar", async () => {
  const { gateway, machine } = setup();
  gateway.position = { symbol: "BTCUSDT", side: "short", size: 0.002, avgEntryPrice: 30_000 };

  await machine.initialize();
  assert.equal(machine.intent.stopLoss, null);

  await machine.onBar(bar(), snapshot({ atr: null }), always("none"));
  assert.equal(machine.intent.stopLoss, null);

  await machine.onBar(bar({ timestamp: 1_700_000_900_000 }), snapshot(), always("none"));
  assert.equal(machine.intent.stopLoss, 30_350);
  assert.equal(machine.intent.takeProfit, 29_300);
  assert.equal(machine.state, "open");
});

test("restart on a flat exchange starts flat", async () => {
  const { machine } = setup();
  assert.equal(await machine.initialize(200), "flat");
});

test("stop-loss wins when one bar touches both levels", async () => {
  const { gateway, machine, events } = setup();
  gateway.position = { symbol: "BTCUSDT", side: "long", size: 0.002, avgEntryPrice: 30_000 };
  await machine.initialize(200);

  let decided = false;
  const signal = await machine.onBar(bar({ low: 29_600, high: 30_800 }), snapshot(), () => {
    decided = true;
    return "none";
  });

  assert.equal(signal, "none");
  assert.equal(decided, false);
  assert.equal(machine.state, "flat");
  assert.deepEqual(gateway.submitted.at(-1), {
    side: "sell",
    qty: 0.002,
    type: "market",
    reduceOnly: true,
    clientOrderId: gateway.submitted.at(-1)?.clientOrderId
  });
  const toPendingExit = events.find(
    (event) => event.type === "STATE_TRANSITION" && event.meta.to === "pending_exit"
  );
  assert.equal(toPendingExit?.meta.reason, "stop_loss");
});

test("take-profit on a short exits with a buy", async () => {
  const { gateway, machine } = setup();
  gateway.position = { symbol: "BTCUSDT", side: "short", size: 0.001, avgEntryPrice: 30_000 };
  await machine.initialize(200);

  await machine.onBar(bar({ low: 29_250, high: 29_900 }), snapshot(), always("none"));

  assert.equal(machine.state, "flat");
  assert.equal(gateway.submitted[0].side, "buy");
  assert.equal(gateway.submitted[0].reduceOnly, true);
});

test("exit signal closes the matching side only", async () => {
  const { gateway, machine } = setup();
  gateway.position = { symbol: "BTCUSDT", side: "long", size: 0.001, avgEntryPrice: 30_000 };
  await machine.initialize(200);

  await machine.onBar(bar(), snapshot(), always("exit_short"));
  assert.equal(machine.state, "open");
  assert.equal(gateway.submitted.length, 0);

  await machine.onBar(bar({ timestamp: 1_700_000_900_000 }), snapshot(), always("exit_long"));
  assert.equal(machine.state, "flat");
  assert.equal(gateway.submitted.length, 1);
});

test("failed exit is retried once with the exchange size", async () => {
  const { gateway, machine, events } = setup();
  gateway.position = { symbol: "BTCUSDT", side: "long", size: 0.002, avgEntryPrice: 30_000 };
  await machine.initialize(200);
  gateway.position = { symbol: "BTCUSDT", side: "long", size: 0.003, avgEntryPrice: 30_000 };
  gateway.behaviors.push("reject", "fill");

  await machine.onBar(bar(), snapshot(), always("exit_long"));

  assert.equal(machine.state, "flat");
  assert.deepEqual(
    gateway.submitted.map((req) => req.qty),
    [0.002, 0.003]
  );
  assert.equal(events.filter((event) => event.type === "ORDER_FAILED").length, 1);
});

test("partially filled exit is retried with the remaining exchange size", async () => {
  const { gateway, machine, events } = setup();
  gateway.position = { symbol: "BTCUSDT", side: "long", size: 0.004, avgEntryPrice: 30_000 };
  await machine.initialize(200);
  gateway.behaviors.push("half", "fill");

  await machine.onBar(bar({ low: 29_600 }), snapshot(), always("none"));

  assert.equal(machine.state, "flat");
  assert.equal(gateway.position.side, "flat");
  assert.deepEqual(
    gateway.submitted.map((req) => ({ side: req.side, qty: req.qty, reduceOnly: req.reduceOnly })),
    [
      { side: "sell", qty: 0.004, reduceOnly: true },
      { side: "sell", qty: 0.002, reduceOnly: true }
    ]
  );
  const failure = events.find((event) => event.type === "ORDER_FAILED");
  assert.equal(failure?.message, "Exit failed: partial fill 0.002 of 0.004");
  const last = events.filter((event) => event.type === "STATE_TRANSITION").at(-1);
  assert.deepEqual(last?.meta.attempt, 2);
});

test("partially filled exit that left nothing on the exchange closes out", async () => {
  const { gateway, machine, events } = setup();
  gateway.position = { symbol: "BTCUSDT", side: "long", size: 0.002, avgEntryPrice: 30_000 };
  await machine.initialize(200);
  gateway.position = { symbol: "BTCUSDT", side: "long", size: 0.001, avgEntryPrice: 30_000 };
  gateway.behaviors.push("half");

  await machine.onBar(bar(), snapshot(), always("exit_long"));

  assert.equal(machine.state, "flat");
  assert.equal(gateway.submitted.length, 1);
  assert.ok(!eventTypes(events).includes("ORDER_FAILED"));
});

test("failed exit on an already flat exchange goes flat", async () => {
  const { gateway, machine, events } = setup();
  gateway.position = { symbol: "BTCUSDT", side: "long", size: 0.002, avgEntryPrice: 30_000 };
  await machine.initialize(200);
  gateway.behaviors.push("reject_flat");

  await machine.onBar(bar(), snapshot(), always("exit_long"));

  assert.equal(machine.state, "flat");
  assert.equal(gateway.submitted.length, 1);
  const last = events.filter((event) => event.type === "STATE_TRANSITION").at(-1);
  assert.equal(last?.meta.reason, "closed_on_exchange");
});

test("second exit failure leaves a stuck position and halts entries", async () => {
  const { gateway, machine, events } = setup();
  gateway.position = { symbol: "BTCUSDT", side: "long", size: 0.002, avgEntryPrice: 30_000 };
  await machine.initialize(200);
  gateway.behaviors.push("reject", "reject");

  await assert.rejects(() => machine.onBar(bar(), snapshot(), always("exit_long")), StuckPositionError);

  assert.equal(machine.state, "pending_exit");
  assert.equal(machine.entriesHalted, true);
  assert.equal(machine.isStuck, true);
  assert.equal(events.at(-1)?.type, "FATAL_CONDITION");

  assert.equal(await machine.onBar(bar({ timestamp: 1_700_000_900_000 }), snapshot(), always("exit_long")), "none");
  assert.equal(gateway.submitted.length, 2);

  assert.equal(await machine.reconcile(), null);
  assert.equal(machine.state, "pending_exit");

  gateway.position = FLAT;
  assert.equal(await machine.reconcile(), null);
  assert.equal(machine.state, "flat");
  assert.equal(machine.entriesHalted, false);
});

test("resumeEntries puts a stuck machine back to open", async () => {
  const { gateway, machine } = setup();
  gateway.position = { symbol: "BTCUSDT", side: "long", size: 0.002, avgEntryPrice: 30_000 };
  await machine.initialize(200);
  gateway.behaviors.push("reject", "reject");
  await assert.rejects(() => machine.onBar(bar(), snapshot(), always("exit_long")), StuckPositionError);

  await machine.resumeEntries();

  assert.equal(machine.state, "open");
  assert.equal(machine.entriesHalted, false);
  assert.equal(machine.intent.size, 0.002);
});

test("reconcile forces the intent to the exchange on divergence", async () => {
  const { gateway, machine, events } = setup();
  await machine.initialize();

  assert.equal(await machine.reconcile(), null);

  gateway.position = { symbol: "BTCUSDT", side: "short", size: 0.002, avgEntryPrice: 31_000 };
  const divergence = await machine.reconcile();

  assert.ok(divergence instanceof DivergenceDetectedError);
  assert.equal(divergence.intent.side, "flat");
  assert.equal(machine.state, "open");
  assert.deepEqual(machine.intent, {
    side: "short",
    size: 0.002,
    entryPrice: 31_000,
    stopLoss: null,
    takeProfit: null
  });
  assert.ok(eventTypes(events).includes("DIVERGENCE_DETECTED"));
});

test("reconcile waits for an entry that is still being confirmed", async () => {
  let release = () => {};
  const paused = new Promise<void>((resolve) => {
    release = resolve;
  });
  const { gateway, machine, events } = setup({ sleep: () => paused });
  gateway.behaviors.push("pending");

  const entry = machine.onBar(bar(), snapshot(), always("enter_long"));
  await new Promise<void>((resolve) => setImmediate(resolve));
  assert.equal(machine.state, "pending_entry");

  const reconciled = machine.reconcile();
  gateway.completeLast();
  release();

  assert.equal(await entry, "enter_long");
  assert.equal(await reconciled, null);
  assert.equal(machine.state, "open");
  assert.equal(machine.intent.size, 0.001);
  assert.ok(!eventTypes(events).includes("DIVERGENCE_DETECTED"));
});

test("size differences within tolerance are not a divergence", async () => {
  const { gateway, machine } = setup();
  gateway.position = { symbol: "BTCUSDT", side: "long", size: 0.002, avgEntryPrice: 30_000 };
  await machine.initialize(200);

  gateway.position = { ...gateway.position, size: 0.0024 };
  assert.equal(await machine.reconcile(), null);

  gateway.position = { ...gateway.position, size: 0.003 };
  assert.ok((await machine.reconcile()) instanceof DivergenceDetectedError);
  assert.equal(machine.intent.size, 0.003);
  assert.equal(machine.intent.stopLoss, 29_650);
});

test("reconcile reports a failed position query", async () => {
  const { gateway, machine, events } = setup();
  await machine.initialize();
  gateway.failPositionQuery = true;

  assert.equal(await machine.reconcile(), null);
  assert.equal(events.at(-1)?.type, "RECONCILE_FAILED");
});

test("kill switch blocks entries but not exits", async () => {
  const { gateway, machine, events } = setup({ isTradingEnabled: () => false });

  await machine.onBar(bar(), snapshot(), always("enter_long"));
  assert.equal(machine.state, "flat");
  assert.equal(gateway.submitted.length, 0);
  assert.equal(events.at(-1)?.type, "ENTRY_BLOCKED");
  assert.equal(events.at(-1)?.meta.reason, "kill_switch");

  gateway.position = { symbol: "BTCUSDT", side: "long", size: 0.001, avgEntryPrice: 30_000 };
  await machine.reconcile();
  await machine.onBar(bar({ timestamp: 1_700_000_900_000 }), snapshot(), always("exit_long"));
  assert.equal(machine.state, "flat");
  assert.equal(gateway.submitted.length, 1);
});

test("protection failure keeps the position open", async () => {
  const { gateway, machine, events } = setup();
  gateway.failTradingStop = true;

  await machine.onBar(bar(), snapshot(), always("enter_long"));

  assert.equal(machine.state, "open");
  assert.ok(eventTypes(events).includes("PROTECTION_FAILED"));
  assert.equal(machine.intent.stopLoss, 29_650);
});

test("shutdown refuses further work", async () => {
  const { machine } = setup();
  await machine.initialize();
  await machine.shutdown();

  assert.equal(machine.isShutdown, true);
  await assert.rejects(() => machine.onBar(bar(), snapshot(), always("enter_long")), /shut down/);
  await assert.rejects(() => machine.reconcile(), /shut down/);
});
