import type {
  BracketLevels,
  FuturesSymbol,
  InstrumentRules,
  PositionSide,
  RiskConfig
} from "@ptb/futures-core";
import {
  FuturesValidationError,
  InsufficientEquityError,
  marginRequired,
  notionalFromQty,
  roundQtyToStep
} from "@ptb/futures-core";
import { createSizingPolicy, type SizingPolicy } from "./sizing-policy.js";

export type SizeRequest = {
  equity: number;
  entryPrice: number;
  atr: number;
  side: PositionSide;
};

export type SizedOrder = BracketLevels & {
  size: number;
};

function isPositive(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

export class RiskSizer {
  private readonly policy: SizingPolicy;

  constructor(
    private readonly symbol: FuturesSymbol,
    private readonly config: RiskConfig,
    private readonly instrument: InstrumentRules,
    policy?: SizingPolicy
  ) {
    this.policy = policy ?? createSizingPolicy(config.sizing);
  }

  get policyKind(): SizingPolicy["kind"] {
    return this.policy.kind;
  }

  bracket(entryPrice: number, atr: number, side: PositionSide): BracketLevels {
    if (!isPositive(entryPrice)) {
      throw new FuturesValidationError(`Invalid entry price ${entryPrice}`, this.symbol);
    }
    if (!isPositive(atr)) {
      throw new FuturesValidationError(`Invalid ATR ${atr}`, this.symbol);
    }
    if (!isPositive(this.config.atrMultiplier) || !isPositive(this.config.riskRewardRatio)) {
      throw new FuturesValidationError(
        `atrMultiplier and riskRewardRatio must be positive (got ${this.config.atrMultiplier}, ${this.config.riskRewardRatio})`,
        this.symbol
      );
    }

    const stopDistance = atr * this.config.atrMultiplier;
    const targetDistance = stopDistance * this.config.riskRewardRatio;

    if (side === "long") {
      return {
        stopLoss: entryPrice - stopDistance,
        takeProfit: entryPrice + targetDistance
      };
    }

    return {
      stopLoss: entryPrice + stopDistance,
      takeProfit: entryPrice - targetDistance
    };
  }

  size(req: SizeRequest): SizedOrder {
    const levels = this.bracket(req.entryPrice, req.atr, req.side);

    const raw = this.policy.quantity({
      equity: req.equity,
      entryPrice: req.entryPrice,
      leverage: this.config.leverage,
      side: req.side
    });
    const size = roundQtyToStep(raw, this.instrument.qtyStep, "down");
    if (!isPositive(size) || size < this.instrument.minQty) {
      throw new InsufficientEquityError(
        this.symbol,
        `Sized quantity ${raw} rounds to ${size}, below minQty ${this.instrument.minQty}`
      );
    }

    const margin = marginRequired(notionalFromQty(size, req.entryPrice), this.config.leverage);
    if (!(margin <= req.equity)) {
      throw new InsufficientEquityError(
        this.symbol,
        `Margin ${margin} for ${size} @ ${req.entryPrice} exceeds equity ${req.equity}`
      );
    }

    return { size, ...levels };
  }
}
