function normalize(raw: string | null | undefined): string {
  return (raw ?? "").trim().toLowerCase();
}

/** Global kill switch; enabled unless GLOBAL_TRADING_ENABLED says off. */
export function isGlobalTradingEnabled(
  raw: string | null | undefined = process.env.GLOBAL_TRADING_ENABLED
): boolean {
  const normalized = normalize(raw);
  if (normalized === "off" || normalized === "false" || normalized === "0") return false;
  return true;
}
