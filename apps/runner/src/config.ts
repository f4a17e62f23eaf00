import type { TradingConfig } from "@ptb/futures-core";
import { z } from "zod";
import type { CircuitBreakerConfig } from "./circuit-breaker.js";

export const KLINE_INTERVALS = ["1", "3", "5", "15", "30", "60", "120", "240", "360", "720", "D", "W", "M"] as const;

export type ExchangeCredentials = {
  apiKey: string;
  apiSecret: string;
};

export type RunnerConfig = {
  trading: TradingConfig;
  credentials: ExchangeCredentials | null;
  healthPort: number;
  circuitBreaker: CircuitBreakerConfig;
};

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

function booleanFlag(fallback: boolean) {
  return z
    .string()
    .trim()
    .toLowerCase()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value === "") return fallback;
      if (value === "1" || value === "true" || value === "yes" || value === "on") return true;
      if (value === "0" || value === "false" || value === "no" || value === "off") return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${value}"` });
      return z.NEVER;
    });
}

const positive = (fallback: number) => z.coerce.number().finite().positive().default(fallback);
const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const optionalSecret = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z
  .object({
    SYMBOL: z.string().trim().toUpperCase().min(1).default("BTCUSDT"),
    LEVERAGE: z.coerce.number().finite().min(1).max(100).default(1),
    POSITION_SIZE: positive(0.001),
    RISK_REWARD_RATIO: positive(2),
    ATR_MULTIPLIER: positive(1.5),
    FAST_EMA: positiveInt(8),
    SLOW_EMA: positiveInt(21),
    STOCH_PERIOD: positiveInt(14),
    STOCH_K_PERIOD: positiveInt(3),
    ATR_PERIOD: positiveInt(14),
    VOLUME_PERIOD: positiveInt(20),
    TESTNET: booleanFlag(true),
    EXECUTION_MODE: z.enum(["paper", "exchange"]).default("paper"),
    SIZING_POLICY: z.enum(["fixed", "equity_fraction"]).default("fixed"),
    EQUITY_FRACTION: z.coerce.number().finite().positive().max(1).default(0.1),
    SCALE_SIZE_WITH_LEVERAGE: booleanFlag(false),
    QTY_STEP: positive(0.001),
    MIN_QTY: positive(0.001),
    TICK_SIZE: positive(0.1),
    KLINE_INTERVAL: z.enum(KLINE_INTERVALS).default("15"),
    WARMUP_BARS: z.coerce.number().int().min(0).max(999).default(200),
    ORDER_CONFIRM_TIMEOUT_MS: positiveInt(10_000),
    ORDER_POLL_INTERVAL_MS: positiveInt(500),
    RECONCILE_INTERVAL_MS: positiveInt(30_000),
    RECONCILE_SIZE_TOLERANCE: z.coerce.number().finite().min(0).default(0.0005),
    PAPER_EQUITY: positive(10_000),
    BYBIT_API_KEY: optionalSecret,
    BYBIT_API_SECRET: optionalSecret,
    HEALTH_PORT: z.coerce.number().int().min(0).max(65_535).default(0),
    BOT_CB_MAX_ERRORS: positiveInt(5),
    BOT_CB_WINDOW_SECONDS: positiveInt(300),
    BOT_CB_COOLDOWN_SECONDS: positiveInt(900),
    BOT_CB_ACTION: z
      .string()
      .trim()
      .toLowerCase()
      .optional()
      .transform((value): CircuitBreakerConfig["action"] => (value === "cooldown" ? "cooldown" : "stop"))
  })
  .superRefine((env, ctx) => {
    if (env.FAST_EMA >= env.SLOW_EMA) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["FAST_EMA"],
        message: `must be less than SLOW_EMA (${env.FAST_EMA} >= ${env.SLOW_EMA})`
      });
    }
    if (env.MIN_QTY < env.QTY_STEP) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["MIN_QTY"], message: "must be at least QTY_STEP" });
    }
    if (env.EXECUTION_MODE === "exchange" && (!env.BYBIT_API_KEY || !env.BYBIT_API_SECRET)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["BYBIT_API_KEY"],
        message: "BYBIT_API_KEY and BYBIT_API_SECRET are required when EXECUTION_MODE=exchange"
      });
    }
  });

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const nested: unknown = Reflect.get(value, key);
    if (typeof nested === "object" && nested !== null && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<RunnerConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
    );
  }
  const e = parsed.data;

  const config: RunnerConfig = {
    trading: {
      symbol: e.SYMBOL,
      testnet: e.TESTNET,
      executionMode: e.EXECUTION_MODE,
      klineInterval: e.KLINE_INTERVAL,
      warmupBars: e.WARMUP_BARS,
      paperEquity: e.PAPER_EQUITY,
      indicators: {
        fastEma: e.FAST_EMA,
        slowEma: e.SLOW_EMA,
        stochPeriod: e.STOCH_PERIOD,
        stochKPeriod: e.STOCH_K_PERIOD,
        atrPeriod: e.ATR_PERIOD,
        volumePeriod: e.VOLUME_PERIOD
      },
      risk: {
        leverage: e.LEVERAGE,
        riskRewardRatio: e.RISK_REWARD_RATIO,
        atrMultiplier: e.ATR_MULTIPLIER,
        sizing:
          e.SIZING_POLICY === "equity_fraction"
            ? { kind: "equity_fraction", fraction: e.EQUITY_FRACTION }
            : { kind: "fixed", positionSize: e.POSITION_SIZE, scaleWithLeverage: e.SCALE_SIZE_WITH_LEVERAGE }
      },
      instrument: {
        qtyStep: e.QTY_STEP,
        minQty: e.MIN_QTY,
        tickSize: e.TICK_SIZE
      },
      execution: {
        confirmTimeoutMs: e.ORDER_CONFIRM_TIMEOUT_MS,
        pollIntervalMs: e.ORDER_POLL_INTERVAL_MS
      },
      reconcile: {
        intervalMs: e.RECONCILE_INTERVAL_MS,
        sizeTolerance: e.RECONCILE_SIZE_TOLERANCE
      }
    },
    credentials:
      e.BYBIT_API_KEY && e.BYBIT_API_SECRET ? { apiKey: e.BYBIT_API_KEY, apiSecret: e.BYBIT_API_SECRET } : null,
    healthPort: e.HEALTH_PORT,
    circuitBreaker: {
      maxErrors: e.BOT_CB_MAX_ERRORS,
      windowSeconds: e.BOT_CB_WINDOW_SECONDS,
      cooldownSeconds: e.BOT_CB_COOLDOWN_SECONDS,
      action: e.BOT_CB_ACTION
    }
  };

  return deepFreeze(config);
}

/** Config summary safe to log: credentials are reduced to a flag. */
export function describeConfig(config: Readonly<RunnerConfig>): Record<string, unknown> {
  const { trading } = config;
  return {
    symbol: trading.symbol,
    executionMode: trading.executionMode,
    testnet: trading.testnet,
    live: trading.executionMode === "exchange" && !trading.testnet,
    klineInterval: trading.klineInterval,
    leverage: trading.risk.leverage,
    sizing: trading.risk.sizing.kind,
    hasCredentials: config.credentials !== null,
    healthPort: config.healthPort
  };
}
