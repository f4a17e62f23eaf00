export { RiskSizer, type SizedOrder, type SizeRequest } from "./risk-sizer.js";
export {
  createSizingPolicy,
  EquityFractionPolicy,
  FixedSizePolicy,
  type SizingContext,
  type SizingPolicy
} from "./sizing-policy.js";
