import {
  BYBIT_RET_CODES,
  BYBIT_DEFAULT_RECV_WINDOW_MS,
  BYBIT_DEFAULT_RETRY_ATTEMPTS,
  BYBIT_DEFAULT_RETRY_BASE_DELAY_MS,
  BYBIT_DEFAULT_TIMEOUT_MS,
  BYBIT_MAINNET_REST_BASE_URL,
  BYBIT_TESTNET_REST_BASE_URL
} from "./bybit.constants.js";
import { BybitApiError, isRetryableError, toBybitError } from "./bybit.errors.js";
import { buildBodyString, buildPrivateHeaders, buildQueryString } from "./bybit.signing.js";
import type {
  BybitAdapterConfig,
  BybitLogEntry,
  BybitServerTime,
  FetchLike,
  HttpMethod
} from "./bybit.types.js";

function sleep(ms: number) {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function nowIso() {
  return new Date().toISOString();
}

function asRecord(value: unknown): Record<string, unknown> {
  if (!value || typeof value !== "object") return {};
  return Object.fromEntries(Object.entries(value));
}

export class BybitTimeSync {
  private offsetMs = 0;
  private lastSyncAt = 0;

  constructor(private readonly fetchServerTime: () => Promise<number>) {}

  async syncIfStale(maxAgeMs = 30_000): Promise<void> {
    if (Date.now() - this.lastSyncAt < maxAgeMs) return;
    await this.sync();
  }

  async sync(): Promise<void> {
    const before = Date.now();
    const server = await this.fetchServerTime();
    const after = Date.now();
    const localApprox = Math.floor((before + after) / 2);
    this.offsetMs = Number.isFinite(server) ? server - localApprox : 0;
    this.lastSyncAt = Date.now();
  }

  getTimestampMs(): string {
    return String(Date.now() + this.offsetMs);
  }
}

export type BybitRestClientOptions = Pick<
  BybitAdapterConfig,
  | "apiKey"
  | "apiSecret"
  | "testnet"
  | "restBaseUrl"
  | "recvWindowMs"
  | "timeoutMs"
  | "retryAttempts"
  | "retryBaseDelayMs"
  | "syncServerTime"
  | "fetchImpl"
  | "log"
>;

export class BybitRestClient {
  readonly baseUrl: string;
  readonly recvWindowMs: number;
  readonly timeoutMs: number;
  readonly retryAttempts: number;
  readonly retryBaseDelayMs: number;

  readonly timeSync: BybitTimeSync;

  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: BybitRestClientOptions = {}) {
    const defaultBaseUrl = options.testnet ? BYBIT_TESTNET_REST_BASE_URL : BYBIT_MAINNET_REST_BASE_URL;
    this.baseUrl = (options.restBaseUrl ?? defaultBaseUrl).replace(/\/+$/, "");
    this.recvWindowMs = options.recvWindowMs ?? BYBIT_DEFAULT_RECV_WINDOW_MS;
    this.timeoutMs = options.timeoutMs ?? BYBIT_DEFAULT_TIMEOUT_MS;
    this.retryAttempts = options.retryAttempts ?? BYBIT_DEFAULT_RETRY_ATTEMPTS;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? BYBIT_DEFAULT_RETRY_BASE_DELAY_MS;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));

    this.timeSync = new BybitTimeSync(async () => {
      const res = await this.requestPublic<BybitServerTime>("GET", "/v5/market/time");
      return Math.floor(Number(res.timeNano) / 1_000_000);
    });
  }

  private log(entry: Omit<BybitLogEntry, "at">) {
    if (!this.options.log) return;
    this.options.log({
      at: nowIso(),
      ...entry
    });
  }

  private async doRequest<T>(params: {
    method: HttpMethod;
    endpoint: string;
    query?: Record<string, unknown>;
    body?: unknown;
    privateAuth: boolean;
  }): Promise<T> {
    const start = Date.now();
    const requestId = `${Date.now()}-${Math.random().toString(16).slice(2, 8)}`;

    const queryString = buildQueryString(params.query);
    const bodyString = params.method === "POST" ? buildBodyString(params.body ?? {}) : "";
    const url = `${this.baseUrl}${params.endpoint}${queryString ? `?${queryString}` : ""}`;

    let headers: Record<string, string> = {
      "Content-Type": "application/json"
    };

    if (params.privateAuth) {
      if (!this.options.apiKey || !this.options.apiSecret) {
        throw toBybitError({
          endpoint: params.endpoint,
          method: params.method,
          retCode: BYBIT_RET_CODES.invalidApiKey,
          message: "Missing Bybit API credentials"
        });
      }

      if (this.options.syncServerTime !== false) {
        await this.timeSync.syncIfStale();
      }
      headers = buildPrivateHeaders({
        apiKey: this.options.apiKey,
        apiSecret: this.options.apiSecret,
        timestamp: this.timeSync.getTimestampMs(),
        recvWindowMs: this.recvWindowMs,
        method: params.method,
        queryString,
        bodyString
      });
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      let res: Response;
      try {
        res = await this.fetchImpl(url, {
          method: params.method,
          headers,
          body: params.method === "POST" ? bodyString : undefined,
          signal: controller.signal
        });
      } catch (error) {
        throw new BybitApiError(
          controller.signal.aborted ? `Bybit request timed out after ${this.timeoutMs}ms` : `Bybit network error: ${String(error)}`,
          { endpoint: params.endpoint, method: params.method, cause: error },
          true
        );
      }

      const text = await res.text();
      let json: unknown;
      try {
        json = text ? JSON.parse(text) : {};
      } catch {
        json = { retMsg: text };
      }

      const obj = asRecord(json);
      const retCode = typeof obj.retCode === "number" ? obj.retCode : undefined;
      const ok = res.ok && retCode === 0;

      if (!ok) {
        throw toBybitError({
          endpoint: params.endpoint,
          method: params.method,
          status: res.status,
          retCode,
          message: typeof obj.retMsg === "string" && obj.retMsg ? obj.retMsg : `HTTP ${res.status}`,
          responseBody: json
        });
      }

      this.log({
        endpoint: params.endpoint,
        method: params.method,
        durationMs: Date.now() - start,
        status: res.status,
        retCode,
        ok: true,
        requestId
      });
      return obj.result as T;
    } catch (error) {
      this.log({
        endpoint: params.endpoint,
        method: params.method,
        durationMs: Date.now() - start,
        status: error instanceof BybitApiError ? error.details.status : undefined,
        retCode: error instanceof BybitApiError ? error.details.retCode : undefined,
        ok: false,
        message: String(error),
        requestId
      });
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }

  private async withRetry<T>(fn: () => Promise<T>): Promise<T> {
    let attempt = 0;
    let lastError: unknown;
    while (attempt < this.retryAttempts) {
      attempt += 1;
      try {
        return await fn();
      } catch (error) {
        lastError = error;
        if (!isRetryableError(error) || attempt >= this.retryAttempts) break;
        const delay = this.retryBaseDelayMs * 2 ** (attempt - 1);
        await sleep(delay);
      }
    }
    throw lastError;
  }

  async requestPublic<T>(
    method: HttpMethod,
    endpoint: string,
    query?: Record<string, unknown>
  ): Promise<T> {
    return this.withRetry(() =>
      this.doRequest<T>({
        method,
        endpoint,
        query,
        privateAuth: false
      })
    );
  }

  async requestPrivate<T>(params: {
    method: HttpMethod;
    endpoint: string;
    query?: Record<string, unknown>;
    body?: unknown;
    retry?: boolean;
  }): Promise<T> {
    const run = () =>
      this.doRequest<T>({
        method: params.method,
        endpoint: params.endpoint,
        query: params.query,
        body: params.body,
        privateAuth: true
      });
    return params.retry === false ? run() : this.withRetry(run);
  }
}
