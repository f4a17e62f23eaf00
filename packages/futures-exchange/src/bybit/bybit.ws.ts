import WebSocket from "ws";
import {
  BYBIT_DEFAULT_PING_INTERVAL_MS,
  BYBIT_DEFAULT_RECONNECT_BASE_DELAY_MS,
  BYBIT_DEFAULT_RECONNECT_MAX_DELAY_MS,
  BYBIT_MAINNET_PUBLIC_WS_URL,
  BYBIT_TESTNET_PUBLIC_WS_URL
} from "./bybit.constants.js";
import type { BybitAdapterConfig, BybitWsPayload, BybitWsRequest } from "./bybit.types.js";

type WsHandler = (payload: BybitWsPayload) => void;

export type BybitWsClientOptions = {
  url?: string;
  testnet?: boolean;
  log?: BybitAdapterConfig["log"];
  pingIntervalMs?: number;
  reconnectBaseDelayMs?: number;
  reconnectMaxDelayMs?: number;
};

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function toWsPayload(value: unknown): BybitWsPayload | null {
  if (!value || typeof value !== "object" || Array.isArray(value)) return null;
  const obj = Object.fromEntries(Object.entries(value));
  return {
    topic: optionalString(obj.topic),
    type: optionalString(obj.type),
    ts: typeof obj.ts === "number" ? obj.ts : undefined,
    data: obj.data,
    op: optionalString(obj.op),
    success: typeof obj.success === "boolean" ? obj.success : undefined,
    ret_msg: optionalString(obj.ret_msg),
    conn_id: optionalString(obj.conn_id)
  };
}

function parsePayload(raw: WebSocket.RawData): BybitWsPayload | null {
  const buffer = Array.isArray(raw) ? Buffer.concat(raw) : Buffer.isBuffer(raw) ? raw : Buffer.from(raw);
  try {
    return toWsPayload(JSON.parse(buffer.toString("utf8")));
  } catch {
    return null;
  }
}

export class BybitWsClient {
  private readonly url: string;
  private readonly pingIntervalMs: number;
  private readonly reconnectBaseDelayMs: number;
  private readonly reconnectMaxDelayMs: number;

  private ws: WebSocket | null = null;
  private pingTimer: NodeJS.Timeout | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private reconnectAttempt = 0;
  private manualClose = false;

  private readonly handlers = new Set<WsHandler>();
  private readonly topics = new Set<string>();

  constructor(private readonly options: BybitWsClientOptions = {}) {
    this.url = options.url ?? (options.testnet ? BYBIT_TESTNET_PUBLIC_WS_URL : BYBIT_MAINNET_PUBLIC_WS_URL);
    this.pingIntervalMs = options.pingIntervalMs ?? BYBIT_DEFAULT_PING_INTERVAL_MS;
    this.reconnectBaseDelayMs = options.reconnectBaseDelayMs ?? BYBIT_DEFAULT_RECONNECT_BASE_DELAY_MS;
    this.reconnectMaxDelayMs = options.reconnectMaxDelayMs ?? BYBIT_DEFAULT_RECONNECT_MAX_DELAY_MS;
  }

  onMessage(handler: WsHandler): () => void {
    this.handlers.add(handler);
    return () => this.handlers.delete(handler);
  }

  async connect(): Promise<void> {
    if (this.ws && this.ws.readyState === WebSocket.OPEN) return;
    this.manualClose = false;
    await this.openSocket();
  }

  async disconnect(): Promise<void> {
    this.manualClose = true;
    this.clearTimers();

    if (!this.ws) return;
    const ws = this.ws;
    this.ws = null;
    if (ws.readyState === WebSocket.CLOSED) return;

    await new Promise<void>((resolve) => {
      ws.once("close", () => resolve());
      ws.terminate();
    });
  }

  subscribe(topic: string): void {
    this.topics.add(topic);
    this.send({ op: "subscribe", args: [topic] });
  }

  unsubscribe(topic: string): void {
    this.topics.delete(topic);
    this.send({ op: "unsubscribe", args: [topic] });
  }

  private send(payload: BybitWsRequest): void {
    if (!this.ws || this.ws.readyState !== WebSocket.OPEN) return;
    this.ws.send(JSON.stringify(payload));
  }

  private logError(endpoint: string, message: string) {
    this.options.log?.({
      at: new Date().toISOString(),
      endpoint,
      method: "GET",
      durationMs: 0,
      ok: false,
      message
    });
  }

  private clearTimers() {
    if (this.pingTimer) clearInterval(this.pingTimer);
    if (this.reconnectTimer) clearTimeout(this.reconnectTimer);
    this.pingTimer = null;
    this.reconnectTimer = null;
  }

  private openSocket(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const ws = new WebSocket(this.url);
      this.ws = ws;

      ws.once("open", () => {
        this.reconnectAttempt = 0;
        this.startPingLoop();
        if (this.topics.size > 0) {
          this.send({ op: "subscribe", args: [...this.topics] });
        }
        resolve();
      });

      ws.on("message", (raw) => {
        const payload = parsePayload(raw);
        if (!payload) return;
        if (payload.op === "pong" || payload.op === "ping") return;
        if (payload.op === "subscribe" && payload.success === false) {
          this.logError("ws-subscribe", payload.ret_msg ?? "subscribe rejected");
          return;
        }

        for (const handler of this.handlers) {
          handler(payload);
        }
      });

      ws.on("error", (error) => {
        this.logError("ws", String(error));
      });

      ws.on("close", () => {
        this.clearTimers();
        if (this.manualClose || this.ws !== ws) return;
        this.scheduleReconnect();
      });

      ws.once("unexpected-response", () => {
        reject(new Error("Bybit websocket unexpected response"));
      });

      ws.once("error", (error) => {
        reject(error);
      });
    });
  }

  private startPingLoop() {
    this.pingTimer = setInterval(() => {
      this.send({ op: "ping" });
    }, this.pingIntervalMs);
  }

  private scheduleReconnect() {
    this.reconnectAttempt += 1;
    const delay = Math.min(
      this.reconnectBaseDelayMs * 2 ** (this.reconnectAttempt - 1),
      this.reconnectMaxDelayMs
    );

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.manualClose) return;
      // a failed attempt also emits close, which schedules the next one
      this.openSocket().catch((error: unknown) => {
        this.logError("ws-reconnect", String(error));
      });
    }, delay);
  }
}
