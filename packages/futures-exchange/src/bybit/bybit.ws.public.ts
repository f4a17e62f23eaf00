import type { Bar, FuturesSymbol } from "@ptb/futures-core";
import { BybitWsClient } from "./bybit.ws.js";
import type { BybitAdapterConfig, BybitWsPayload } from "./bybit.types.js";

export type KlineSource = Pick<BybitWsClient, "onMessage" | "connect" | "disconnect" | "subscribe">;

export type BybitKlineFeedOptions = Pick<BybitAdapterConfig, "testnet" | "wsUrl" | "log"> & {
  symbol: FuturesSymbol;
  interval: string;
  source?: KlineSource;
};

export function klineTopic(interval: string, symbol: FuturesSymbol): string {
  return `kline.${interval}.${symbol}`;
}

function finite(value: unknown): number | null {
  const n = typeof value === "number" ? value : typeof value === "string" && value !== "" ? Number(value) : NaN;
  return Number.isFinite(n) ? n : null;
}

function toClosedBar(item: unknown): Bar | null {
  if (!item || typeof item !== "object") return null;
  const row = Object.fromEntries(Object.entries(item));
  if (row.confirm !== true) return null;

  const timestamp = finite(row.start);
  const open = finite(row.open);
  const high = finite(row.high);
  const low = finite(row.low);
  const close = finite(row.close);
  const volume = finite(row.volume);
  if (
    timestamp === null ||
    open === null ||
    high === null ||
    low === null ||
    close === null ||
    volume === null
  ) {
    return null;
  }
  return { timestamp, open, high, low, close, volume };
}

/** Closed bars carried by a kline push on `topic`; in-progress updates are skipped. */
export function parseKlineMessage(payload: BybitWsPayload, topic: string): Bar[] {
  if (payload.topic !== topic || !Array.isArray(payload.data)) return [];
  const bars: Bar[] = [];
  for (const item of payload.data) {
    const bar = toClosedBar(item);
    if (bar) bars.push(bar);
  }
  return bars.sort((a, b) => a.timestamp - b.timestamp);
}

/**
 * Closed klines of one symbol as an async stream. Single consumer; the
 * stream ends when close() is called.
 */
export class BybitKlineFeed implements AsyncIterable<Bar> {
  readonly topic: string;

  private readonly source: KlineSource;
  private readonly queue: Bar[] = [];
  private readonly waiters: Array<(result: IteratorResult<Bar>) => void> = [];
  private lastTimestamp = Number.NEGATIVE_INFINITY;
  private closed = false;
  private iterating = false;
  private detach: (() => void) | null = null;

  constructor(options: BybitKlineFeedOptions) {
    this.topic = klineTopic(options.interval, options.symbol);
    this.source =
      options.source ??
      new BybitWsClient({ url: options.wsUrl, testnet: options.testnet, log: options.log });
  }

  async start(): Promise<void> {
    if (this.closed) throw new Error("Kline feed already closed");
    if (!this.detach) {
      this.detach = this.source.onMessage((payload) => {
        for (const bar of parseKlineMessage(payload, this.topic)) this.push(bar);
      });
    }
    await this.source.connect();
    this.source.subscribe(this.topic);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.detach?.();
    this.detach = null;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ done: true, value: undefined });
    }
    await this.source.disconnect();
  }

  /** Bars at or before the last delivered timestamp are dropped. */
  push(bar: Bar): void {
    if (this.closed || bar.timestamp <= this.lastTimestamp) return;
    this.lastTimestamp = bar.timestamp;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ done: false, value: bar });
    } else {
      this.queue.push(bar);
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<Bar> {
    if (this.iterating) throw new Error("Kline feed supports a single consumer");
    this.iterating = true;

    return {
      next: () => {
        const bar = this.queue.shift();
        if (bar) return Promise.resolve<IteratorResult<Bar>>({ done: false, value: bar });
        if (this.closed) return Promise.resolve<IteratorResult<Bar>>({ done: true, value: undefined });
        return new Promise<IteratorResult<Bar>>((resolve) => {
          this.waiters.push(resolve);
        });
      },
      return: async () => {
        await this.close();
        return { done: true, value: undefined };
      }
    };
  }
}
