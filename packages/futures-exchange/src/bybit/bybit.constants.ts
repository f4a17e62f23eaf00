export const BYBIT_MAINNET_REST_BASE_URL = "https://api.bybit.com";
export const BYBIT_TESTNET_REST_BASE_URL = "https://api-testnet.bybit.com";
export const BYBIT_MAINNET_PUBLIC_WS_URL = "wss://stream.bybit.com/v5/public/linear";
export const BYBIT_TESTNET_PUBLIC_WS_URL = "wss://stream-testnet.bybit.com/v5/public/linear";

export const BYBIT_CATEGORY = "linear" as const;
export const BYBIT_ACCOUNT_TYPE = "UNIFIED";
// one-way mode
export const BYBIT_POSITION_IDX = 0;

export const BYBIT_DEFAULT_RECV_WINDOW_MS = 5_000;
export const BYBIT_DEFAULT_TIMEOUT_MS = 10_000;
export const BYBIT_DEFAULT_RETRY_ATTEMPTS = 3;
export const BYBIT_DEFAULT_RETRY_BASE_DELAY_MS = 300;

export const BYBIT_DEFAULT_PING_INTERVAL_MS = 20_000;
export const BYBIT_DEFAULT_RECONNECT_BASE_DELAY_MS = 1_000;
export const BYBIT_DEFAULT_RECONNECT_MAX_DELAY_MS = 30_000;

export const BYBIT_KLINE_MAX_LIMIT = 1_000;

export const BYBIT_RET_CODES = {
  ok: 0,
  invalidParams: 10001,
  timestampOutOfWindow: 10002,
  invalidApiKey: 10003,
  signatureError: 10004,
  permissionDenied: 10005,
  tooManyVisits: 10006,
  serverError: 10016,
  ipRateLimit: 10018,
  orderNotExists: 110001,
  insufficientBalance: 110007,
  reduceOnlyRejected: 110017,
  leverageNotModified: 110043
} as const;
