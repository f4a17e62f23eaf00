import type { Bar } from "@ptb/futures-core";
import { OutOfOrderBarError, StuckPositionError } from "@ptb/futures-core";
import type { EngineEvent, PositionStateMachine, TradingPipeline } from "@ptb/futures-engine";
import { eventSeverity } from "@ptb/futures-engine";
import type { CircuitBreaker } from "./circuit-breaker.js";
import { noteBar, setBotStatus, setPositionState } from "./health.js";
import { log as defaultLog, type Logger } from "./logger.js";
import type { TradingGate } from "./trading-gate.js";

export type BarSource = AsyncIterable<Bar> & { close(): Promise<void> };

export type BotLoopOptions = {
  source: BarSource;
  pipeline: Pick<TradingPipeline, "handleBar">;
  machine: Pick<PositionStateMachine, "state" | "reconcile" | "resumeEntries" | "shutdown">;
  /** Runs before each bar reaches the pipeline, e.g. to move the paper mark price. */
  beforeBar?: (bar: Bar) => void;
  reconcileIntervalMs: number;
  breaker: CircuitBreaker;
  gate: TradingGate;
  log?: Logger;
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class BotLoop {
  private readonly log: Logger;
  private running = false;
  private stopReason: string | null = null;
  private failed = false;
  private paused = false;
  private reconciling: Promise<void> | null = null;

  constructor(private readonly options: BotLoopOptions) {
    this.log = options.log ?? defaultLog;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Consumes bars until the source ends or stop() is called. */
  async run(): Promise<void> {
    if (this.running) throw new Error("Bot loop already running");
    this.running = true;
    setBotStatus("RUNNING");

    const timer = setInterval(() => {
      this.reconcileTick().catch((error: unknown) => {
        this.log.error({ err: errorMessage(error) }, "reconcile tick failed");
      });
    }, this.options.reconcileIntervalMs);

    try {
      for await (const bar of this.options.source) {
        await this.processBar(bar);
        if (this.stopReason) break;
      }
    } finally {
      clearInterval(timer);
      if (this.reconciling) await this.reconciling;
      await this.options.machine.shutdown();
      this.running = false;
      if (this.failed) {
        setBotStatus("ERROR", this.stopReason);
      } else {
        setBotStatus("STOPPED");
      }
      this.log.info({ reason: this.stopReason ?? "source_ended" }, "bot loop stopped");
    }
  }

  async stop(reason: string): Promise<void> {
    if (!this.stopReason) this.stopReason = reason;
    await this.options.source.close();
  }

  /** One reconciliation pass; skipped while the previous one is still running. */
  async reconcileTick(): Promise<void> {
    if (this.reconciling) return;
    this.reconciling = this.reconcileOnce();
    try {
      await this.reconciling;
    } finally {
      this.reconciling = null;
    }
  }

  /** Operator release of an entry halt or stuck position. */
  async resumeEntries(): Promise<void> {
    await this.options.machine.resumeEntries();
    setPositionState(this.options.machine.state);
    if (this.running && !this.paused && !this.failed) setBotStatus("RUNNING");
    this.log.info({ state: this.options.machine.state }, "entries resumed");
  }

  /** Sink for state machine events: logs them and feeds failures to the breaker. */
  readonly onEngineEvent = (event: EngineEvent): void => {
    const severity = eventSeverity(event.type);
    this.log[severity]({ event: event.type, symbol: event.symbol, ...event.meta }, event.message);
    if (severity === "error" && event.type !== "FATAL_CONDITION") {
      this.recordFailure(`${event.type}: ${event.message}`);
    }
  };

  private async reconcileOnce(): Promise<void> {
    try {
      const divergence = await this.options.machine.reconcile();
      if (divergence) {
        this.log.warn({ intent: divergence.intent, exchange: divergence.exchange }, "position divergence resolved");
      }
    } catch (error) {
      this.log.warn({ err: errorMessage(error) }, "reconcile skipped");
    } finally {
      setPositionState(this.options.machine.state);
    }
  }

  private async processBar(bar: Bar) {
    noteBar();
    if (this.paused && this.options.gate.pausedUntilMs === null) {
      this.paused = false;
      setBotStatus("RUNNING");
      this.log.info({}, "circuit breaker cooldown over, entries allowed again");
    }
    try {
      this.options.beforeBar?.(bar);
      const { snapshot, signal } = await this.options.pipeline.handleBar(bar);
      this.log.info(
        {
          ts: bar.timestamp,
          close: bar.close,
          emaFast: snapshot.emaFast,
          emaSlow: snapshot.emaSlow,
          stochK: snapshot.stochK,
          atr: snapshot.atr,
          signal
        },
        "bar processed"
      );
    } catch (error) {
      this.handleBarError(bar, error);
    } finally {
      setPositionState(this.options.machine.state);
    }
  }

  private handleBarError(bar: Bar, error: unknown) {
    if (error instanceof OutOfOrderBarError) {
      this.log.warn({ ts: bar.timestamp, err: error.message }, "out-of-order bar skipped");
      return;
    }
    if (error instanceof StuckPositionError) {
      setBotStatus("ERROR", error.message);
      this.log.error(
        { symbol: error.symbol, position: error.position, lastError: error.lastError },
        "position could not be closed, entries halted"
      );
      return;
    }
    this.log.error({ ts: bar.timestamp, err: errorMessage(error) }, "bar handling failed");
    this.recordFailure(errorMessage(error));
  }

  private recordFailure(message: string) {
    if (!this.options.breaker.recordError(message)) return;

    const { action, cooldownSeconds, maxErrors, windowSeconds } = this.options.breaker.config;
    this.log.error({ action, maxErrors, windowSeconds, lastError: message }, "circuit breaker tripped");

    if (action === "cooldown") {
      this.options.gate.pause(cooldownSeconds * 1000);
      this.paused = true;
      setBotStatus("PAUSED");
      return;
    }

    this.failed = true;
    this.stop(`circuit_breaker: ${message}`).catch((error: unknown) => {
      this.log.error({ err: errorMessage(error) }, "failed to close bar source");
    });
  }
}
