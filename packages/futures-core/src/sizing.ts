import { InvalidStepError, InvalidTickError, QtyOutOfRangeError } from "./errors.js";
import type { InstrumentRules } from "./types.js";

export type RoundingMode = "down" | "up" | "nearest";

export type ValidationResult =
  | { ok: true }
  | { ok: false; error: Error };

// ratios like 0.003 / 0.001 land a hair below the integer
const RATIO_EPSILON = 1e-9;

function countDecimals(value: number): number {
  const text = String(value).toLowerCase();
  if (text.includes("e-")) {
    const [, exp] = text.split("e-");
    const expValue = Number(exp);
    return Number.isFinite(expValue) ? expValue : 0;
  }

  const dot = text.indexOf(".");
  if (dot < 0) return 0;
  return text.length - dot - 1;
}

function normalizeFloat(value: number, increment: number): number {
  const decimals = Math.max(countDecimals(increment), 0);
  return Number(value.toFixed(Math.min(12, decimals + 2)));
}

function isValidIncrement(increment: number): boolean {
  return Number.isFinite(increment) && increment > 0;
}

function align(value: number, increment: number, mode: RoundingMode): number {
  if (!isValidIncrement(increment)) return value;
  const ratio = value / increment;

  if (mode === "down") return Math.floor(ratio + RATIO_EPSILON) * increment;
  if (mode === "up") return Math.ceil(ratio - RATIO_EPSILON) * increment;
  return Math.round(ratio) * increment;
}

function isAligned(value: number, increment: number): boolean {
  if (!isValidIncrement(increment)) return false;
  const ratio = value / increment;
  const nearest = Math.round(ratio);
  return Math.abs(ratio - nearest) <= RATIO_EPSILON;
}

export function roundPriceToTick(price: number, tickSize: number, mode: RoundingMode = "nearest"): number {
  if (!isValidIncrement(tickSize)) return price;
  return normalizeFloat(align(price, tickSize, mode), tickSize);
}

export function roundQtyToStep(qty: number, stepSize: number, mode: RoundingMode = "down"): number {
  if (!isValidIncrement(stepSize)) return qty;
  return normalizeFloat(align(qty, stepSize, mode), stepSize);
}

export function validatePrice(price: number, tickSize: number, symbol: string): ValidationResult {
  if (!isValidIncrement(tickSize)) {
    return {
      ok: false,
      error: new InvalidTickError(symbol, `Missing tick size for ${symbol}`)
    };
  }

  if (price <= 0 || !Number.isFinite(price)) {
    return {
      ok: false,
      error: new InvalidTickError(symbol, `Invalid price ${price} for ${symbol}`)
    };
  }

  if (!isAligned(price, tickSize)) {
    return {
      ok: false,
      error: new InvalidTickError(symbol, `Price ${price} not aligned to tickSize ${tickSize}`)
    };
  }

  return { ok: true };
}

export function validateQty(qty: number, rules: InstrumentRules, symbol: string): ValidationResult {
  if (!isValidIncrement(rules.qtyStep)) {
    return {
      ok: false,
      error: new InvalidStepError(symbol, `Missing step size for ${symbol}`)
    };
  }

  if (qty <= 0 || !Number.isFinite(qty)) {
    return {
      ok: false,
      error: new QtyOutOfRangeError(symbol, `Quantity ${qty} is invalid for ${symbol}`)
    };
  }

  if (!isAligned(qty, rules.qtyStep)) {
    return {
      ok: false,
      error: new InvalidStepError(symbol, `Quantity ${qty} not aligned to stepSize ${rules.qtyStep}`)
    };
  }

  if (qty < rules.minQty) {
    return {
      ok: false,
      error: new QtyOutOfRangeError(symbol, `Quantity ${qty} below minQty ${rules.minQty}`)
    };
  }

  return { ok: true };
}

export function notionalFromQty(qty: number, price: number): number {
  if (!Number.isFinite(qty) || qty <= 0 || !Number.isFinite(price) || price <= 0) return 0;
  return qty * price;
}

export function qtyFromNotionalUsd(notionalUsd: number, price: number): number {
  if (!Number.isFinite(notionalUsd) || notionalUsd <= 0 || !Number.isFinite(price) || price <= 0) return 0;
  return notionalUsd / price;
}

export function marginRequired(notionalUsd: number, leverage: number): number {
  if (!Number.isFinite(notionalUsd) || notionalUsd <= 0) return 0;
  if (!Number.isFinite(leverage) || leverage <= 0) return Number.POSITIVE_INFINITY;
  return notionalUsd / leverage;
}
