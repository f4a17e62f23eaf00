import type { PositionSide, SizingPolicyConfig } from "@ptb/futures-core";
import { qtyFromNotionalUsd } from "@ptb/futures-core";

export type SizingContext = {
  equity: number;
  entryPrice: number;
  leverage: number;
  side: PositionSide;
};

/** Raw (unrounded) order quantity in base units. */
export interface SizingPolicy {
  readonly kind: SizingPolicyConfig["kind"];
  quantity(ctx: SizingContext): number;
}

export class FixedSizePolicy implements SizingPolicy {
  readonly kind = "fixed" as const;

  constructor(
    private readonly positionSize: number,
    private readonly scaleWithLeverage = false
  ) {}

  quantity(ctx: SizingContext): number {
    return this.scaleWithLeverage ? this.positionSize * ctx.leverage : this.positionSize;
  }
}

export class EquityFractionPolicy implements SizingPolicy {
  readonly kind = "equity_fraction" as const;

  constructor(private readonly fraction: number) {}

  quantity(ctx: SizingContext): number {
    return qtyFromNotionalUsd(ctx.equity * this.fraction * ctx.leverage, ctx.entryPrice);
  }
}

export function createSizingPolicy(config: SizingPolicyConfig): SizingPolicy {
  switch (config.kind) {
    case "fixed":
      return new FixedSizePolicy(config.positionSize, config.scaleWithLeverage);
    case "equity_fraction":
      return new EquityFractionPolicy(config.fraction);
  }
}
