export type EngineEventType =
  | "SIGNAL_GENERATED"
  | "ORDER_SUBMITTED"
  | "ORDER_FAILED"
  | "STATE_TRANSITION"
  | "PROTECTION_FAILED"
  | "DIVERGENCE_DETECTED"
  | "ENTRY_BLOCKED"
  | "FATAL_CONDITION"
  | "RECONCILE_FAILED";

export type EngineEvent = {
  type: EngineEventType;
  symbol: string;
  timestamp: string;
  message: string;
  meta: Record<string, unknown>;
};

export type EmitEngineEvent = (event: EngineEvent) => void | Promise<void>;

export type EventSeverity = "info" | "warn" | "error";

export function eventSeverity(type: EngineEventType): EventSeverity {
  switch (type) {
    case "FATAL_CONDITION":
    case "ORDER_FAILED":
      return "error";
    case "DIVERGENCE_DETECTED":
    case "ENTRY_BLOCKED":
    case "PROTECTION_FAILED":
    case "RECONCILE_FAILED":
      return "warn";
    default:
      return "info";
  }
}
