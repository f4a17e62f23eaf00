import type { ExchangePosition, PositionIntent } from "./types.js";

export class FuturesValidationError extends Error {
  constructor(message: string, public readonly symbol: string) {
    super(message);
    this.name = "FuturesValidationError";
  }
}

export class InvalidTickError extends FuturesValidationError {
  constructor(symbol: string, message = `Invalid tick size for ${symbol}`) {
    super(message, symbol);
    this.name = "InvalidTickError";
  }
}

export class InvalidStepError extends FuturesValidationError {
  constructor(symbol: string, message = `Invalid step size for ${symbol}`) {
    super(message, symbol);
    this.name = "InvalidStepError";
  }
}

export class QtyOutOfRangeError extends FuturesValidationError {
  constructor(symbol: string, message = `Quantity out of range for ${symbol}`) {
    super(message, symbol);
    this.name = "QtyOutOfRangeError";
  }
}

export class InsufficientEquityError extends FuturesValidationError {
  constructor(symbol: string, message = `Insufficient equity to size an order for ${symbol}`) {
    super(message, symbol);
    this.name = "InsufficientEquityError";
  }
}

export class OutOfOrderBarError extends Error {
  constructor(
    public readonly lastTimestamp: number,
    public readonly timestamp: number
  ) {
    super(`Bar at ${timestamp} does not follow last processed bar at ${lastTimestamp}`);
    this.name = "OutOfOrderBarError";
  }
}

/**
 * Transient failure talking to the execution venue: submission, cancellation
 * or query. Adapters subclass it with venue-specific detail.
 */
export class GatewayError extends Error {
  constructor(
    message: string,
    public readonly options: {
      operation: string;
      retryable?: boolean;
      cause?: unknown;
    }
  ) {
    super(message);
    this.name = "GatewayError";
  }
}

export class DivergenceDetectedError extends Error {
  constructor(
    public readonly symbol: string,
    public readonly intent: PositionIntent,
    public readonly exchange: ExchangePosition
  ) {
    super(
      `Position divergence on ${symbol}: intent ${intent.side} ${intent.size}, exchange ${exchange.side} ${exchange.size}`
    );
    this.name = "DivergenceDetectedError";
  }
}

export class StuckPositionError extends Error {
  constructor(
    public readonly symbol: string,
    public readonly position: ExchangePosition,
    public readonly lastError: string
  ) {
    super(
      `Exit for ${symbol} failed twice, ${position.side} ${position.size} still open on the exchange: ${lastError}`
    );
    this.name = "StuckPositionError";
  }
}
