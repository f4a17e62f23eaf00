type LogLevel = "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export type LogSink = (line: string) => void;

let sink: LogSink = (line) => {
  console.log(line);
};

/** Redirects log lines, e.g. to collect them in tests. Returns the previous sink. */
export function setLogSink(next: LogSink): LogSink {
  const previous = sink;
  sink = next;
  return previous;
}

function write(level: LogLevel, meta: LogMeta, msg: string) {
  const entry = {
    level,
    msg,
    time: Date.now(),
    ...meta
  };
  // JSON line for log collectors / Docker logs
  sink(JSON.stringify(entry));
}

export const log = {
  info: (meta: LogMeta, msg: string) => write("info", meta, msg),
  warn: (meta: LogMeta, msg: string) => write("warn", meta, msg),
  error: (meta: LogMeta, msg: string) => write("error", meta, msg)
};

export type Logger = typeof log;
