import "dotenv/config";
import type { ExecutionGateway, BybitLogEntry } from "@ptb/futures-exchange";
import { BybitGateway, BybitKlineFeed, PaperGateway } from "@ptb/futures-exchange";
import { PositionStateMachine, TradingPipeline } from "@ptb/futures-engine";
import { IndicatorEngine } from "@ptb/indicators";
import { RiskSizer } from "@ptb/risk";
import { EmaStochStrategy } from "@ptb/strategies";
import { CircuitBreaker } from "./circuit-breaker.js";
import { describeConfig, loadConfig } from "./config.js";
import { createHealthServer, setBotStatus, setPositionState } from "./health.js";
import { log } from "./logger.js";
import { BotLoop } from "./loop.js";
import { TradingGate } from "./trading-gate.js";

function logRestFailure(entry: BybitLogEntry) {
  if (entry.ok) return;
  log.warn(
    {
      endpoint: entry.endpoint,
      method: entry.method,
      status: entry.status,
      retCode: entry.retCode,
      durationMs: entry.durationMs,
      requestId: entry.requestId
    },
    entry.message ?? "bybit request failed"
  );
}

async function main() {
  const config = loadConfig();
  const { trading } = config;
  log.info(describeConfig(config), "runner config loaded");

  // candles always come from the public endpoints, paper mode included
  const market = new BybitGateway({
    symbol: trading.symbol,
    instrument: trading.instrument,
    testnet: trading.testnet,
    log: logRestFailure
  });

  let paper: PaperGateway | null = null;
  let gateway: ExecutionGateway;
  if (trading.executionMode === "paper") {
    paper = new PaperGateway({
      symbol: trading.symbol,
      equity: trading.paperEquity,
      instrument: trading.instrument
    });
    gateway = paper;
  } else {
    if (!config.credentials) throw new Error("exchange mode requires API credentials");
    gateway = new BybitGateway({
      symbol: trading.symbol,
      instrument: trading.instrument,
      testnet: trading.testnet,
      apiKey: config.credentials.apiKey,
      apiSecret: config.credentials.apiSecret,
      log: logRestFailure
    });
  }
  await gateway.setLeverage(trading.risk.leverage);

  const gate = new TradingGate();
  const breaker = new CircuitBreaker(config.circuitBreaker);
  const sizer = new RiskSizer(trading.symbol, trading.risk, trading.instrument);
  const machine: PositionStateMachine = new PositionStateMachine(gateway, sizer, {
    execution: trading.execution,
    reconcile: trading.reconcile,
    isTradingEnabled: () => gate.isOpen(),
    emitEvent: (event) => loop.onEngineEvent(event)
  });
  const pipeline: TradingPipeline = new TradingPipeline(new IndicatorEngine(trading.indicators), new EmaStochStrategy(), machine);

  const feed = new BybitKlineFeed({
    symbol: trading.symbol,
    interval: trading.klineInterval,
    testnet: trading.testnet,
    log: logRestFailure
  });
  const loop: BotLoop = new BotLoop({
    source: feed,
    pipeline,
    machine,
    beforeBar: paper ? (bar) => paper?.setMarkPrice(bar.close) : undefined,
    reconcileIntervalMs: trading.reconcile.intervalMs,
    breaker,
    gate
  });

  const server = config.healthPort > 0 ? createHealthServer("runner", { onResume: () => loop.resumeEntries() }) : null;
  if (server) {
    server.listen(config.healthPort, "0.0.0.0", () => {
      log.info({ port: config.healthPort }, "runner health server listening");
    });
  }

  const history = trading.warmupBars > 0 ? await market.fetchRecentBars(trading.klineInterval, trading.warmupBars) : [];
  const warmed = pipeline.warmUp(history);
  const last = history.at(-1);
  if (paper && last) paper.setMarkPrice(last.close);
  log.info({ bars: warmed, lastBarAt: last?.timestamp ?? null, atr: pipeline.latestAtr }, "indicators warmed up");

  const initialState = await machine.initialize(pipeline.latestAtr);
  setPositionState(initialState);
  log.info({ state: initialState, intent: machine.intent }, "position state recovered");

  await feed.start();

  const onSignal = (signal: NodeJS.Signals) => {
    loop.stop(signal).catch((error: unknown) => {
      log.error({ err: String(error) }, "shutdown failed");
    });
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    await loop.run();
  } finally {
    if (server) {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  }
}

main().catch((error: unknown) => {
  setBotStatus("ERROR", String(error));
  log.error({ err: error instanceof Error ? error.stack ?? error.message : String(error) }, "runner crashed");
  process.exit(1);
});
