import crypto from "node:crypto";
import type { HttpMethod } from "./bybit.types.js";

export function buildQueryString(query: Record<string, unknown> | undefined): string {
  if (!query) return "";
  return Object.entries(query)
    .filter(([, value]) => value !== undefined && value !== null)
    .sort((a, b) => a[0].localeCompare(b[0]))
    .map(([key, value]) => `${key}=${encodeURIComponent(String(value))}`)
    .join("&");
}

export function buildBodyString(body: unknown): string {
  if (body === undefined || body === null) return "";
  return JSON.stringify(body);
}

/**
 * v5 pre-sign string: timestamp + apiKey + recvWindow + (query string for
 * GET | raw JSON body for POST).
 */
export function buildPrehash(params: {
  timestamp: string;
  apiKey: string;
  recvWindow: string;
  payload: string;
}): string {
  return `${params.timestamp}${params.apiKey}${params.recvWindow}${params.payload}`;
}

export function signBybitRequest(params: {
  timestamp: string;
  apiKey: string;
  apiSecret: string;
  recvWindow: string;
  payload: string;
}): string {
  return crypto
    .createHmac("sha256", params.apiSecret)
    .update(buildPrehash(params))
    .digest("hex");
}

export function buildPrivateHeaders(params: {
  apiKey: string;
  apiSecret: string;
  timestamp: string;
  recvWindowMs: number;
  method: HttpMethod;
  queryString: string;
  bodyString: string;
}): Record<string, string> {
  const recvWindow = String(Math.floor(params.recvWindowMs));
  const signature = signBybitRequest({
    timestamp: params.timestamp,
    apiKey: params.apiKey,
    apiSecret: params.apiSecret,
    recvWindow,
    payload: params.method === "GET" ? params.queryString : params.bodyString
  });

  return {
    "X-BAPI-API-KEY": params.apiKey,
    "X-BAPI-TIMESTAMP": params.timestamp,
    "X-BAPI-RECV-WINDOW": recvWindow,
    "X-BAPI-SIGN": signature,
    "Content-Type": "application/json"
  };
}
