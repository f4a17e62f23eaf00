import { createServer, type Server } from "node:http";

export type BotStatus = "INIT" | "RUNNING" | "PAUSED" | "STOPPED" | "ERROR";

type RunnerState = {
  startedAt: number;
  lastBarAt: number;
  botStatus: BotStatus;
  lastErrorReason: string | null;
  positionState: string;
};

const state: RunnerState = {
  startedAt: Date.now(),
  lastBarAt: 0,
  botStatus: "INIT",
  lastErrorReason: null,
  positionState: "flat"
};

export function noteBar(at = Date.now()) {
  state.lastBarAt = at;
}

export function setBotStatus(status: BotStatus, reason?: string | null) {
  state.botStatus = status;
  if (status === "ERROR") {
    state.lastErrorReason = reason ?? state.lastErrorReason ?? "unknown";
  }
  if (status === "RUNNING") {
    state.lastErrorReason = null;
  }
}

export function setPositionState(positionState: string) {
  state.positionState = positionState;
}

export function getRunnerHealth() {
  return {
    startedAt: state.startedAt,
    lastBarAt: state.lastBarAt,
    botStatus: state.botStatus,
    lastErrorReason: state.lastErrorReason,
    positionState: state.positionState
  };
}

export type HealthServerOptions = {
  /** Served as POST /resume when given. */
  onResume?: () => Promise<void>;
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** GET /health serves the runner snapshot, POST /resume lifts an entry halt; everything else is 404. */
export function createHealthServer(service = "runner", options: HealthServerOptions = {}): Server {
  return createServer((req, res) => {
    res.setHeader("content-type", "application/json");
    const path = req.url?.split("?")[0];

    const onResume = options.onResume;
    if (req.method === "POST" && path === "/resume" && onResume) {
      onResume().then(
        () => {
          res.statusCode = 200;
          res.end(JSON.stringify({ ok: true, service, ...getRunnerHealth() }));
        },
        (error: unknown) => {
          res.statusCode = 500;
          res.end(JSON.stringify({ ok: false, error: errorMessage(error) }));
        }
      );
      return;
    }

    if (req.method !== "GET" || path !== "/health") {
      res.statusCode = 404;
      res.end(JSON.stringify({ error: "not_found" }));
      return;
    }
    const health = getRunnerHealth();
    res.statusCode = 200;
    res.end(JSON.stringify({ ok: health.botStatus !== "ERROR", service, ...health }));
  });
}
