export type HttpMethod = "GET" | "POST";

export type BybitListResult<T> = {
  category?: string;
  list: T[];
  nextPageCursor?: string;
};

export type BybitLogEntry = {
  at: string;
  endpoint: string;
  method: HttpMethod;
  durationMs: number;
  status?: number;
  retCode?: number;
  ok: boolean;
  message?: string;
  requestId?: string;
};

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type BybitAdapterConfig = {
  apiKey?: string;
  apiSecret?: string;
  testnet?: boolean;
  restBaseUrl?: string;
  wsUrl?: string;
  recvWindowMs?: number;
  timeoutMs?: number;
  retryAttempts?: number;
  retryBaseDelayMs?: number;
  syncServerTime?: boolean;
  fetchImpl?: FetchLike;
  log?: (entry: BybitLogEntry) => void;
};

export type BybitSide = "Buy" | "Sell";

export type BybitOrderCreateRequest = {
  category: "linear";
  symbol: string;
  side: BybitSide;
  orderType: "Market" | "Limit";
  qty: string;
  price?: string;
  timeInForce: "GTC" | "IOC";
  reduceOnly?: boolean;
  orderLinkId?: string;
  positionIdx: number;
};

export type BybitOrderCreateResult = {
  orderId: string;
  orderLinkId?: string;
};

export type BybitOrderRaw = {
  orderId: string;
  orderLinkId?: string;
  symbol: string;
  side?: BybitSide;
  orderStatus: string;
  avgPrice?: string;
  cumExecQty?: string;
  qty?: string;
  rejectReason?: string;
};

export type BybitPositionRaw = {
  symbol: string;
  side: BybitSide | "";
  size: string;
  avgPrice: string;
  positionIdx?: number;
  markPrice?: string;
  unrealisedPnl?: string;
};

export type BybitWalletRaw = {
  accountType?: string;
  totalEquity?: string;
  totalAvailableBalance?: string;
};

export type BybitTradingStopRequest = {
  category: "linear";
  symbol: string;
  tpslMode: "Full";
  positionIdx: number;
  stopLoss: string;
  takeProfit: string;
  slTriggerBy: "LastPrice" | "MarkPrice";
  tpTriggerBy: "LastPrice" | "MarkPrice";
};

// [startTime, open, high, low, close, volume, turnover], newest first
export type BybitKlineRow = [string, string, string, string, string, string, string];

export type BybitServerTime = {
  timeSecond: string;
  timeNano: string;
};


export type BybitWsPayload = {
  topic?: string;
  type?: string;
  ts?: number;
  data?: unknown;
  op?: string;
  success?: boolean;
  ret_msg?: string;
  conn_id?: string;
};

export type BybitWsRequest = {
  op: "subscribe" | "unsubscribe" | "ping";
  args?: string[];
};
