export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogThreshold = LogLevel | "silent";

const severity: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 50
};

let threshold: LogThreshold = "warn";

export function setLogLevel(level: LogThreshold) {
  threshold = level;
}

// stdout belongs to the menu; every log line goes to stderr.
function write(level: LogLevel, event: string, payload: Record<string, unknown>) {
  if (severity[level] < severity[threshold]) {
    return;
  }

  const line = {
    ts: new Date().toISOString(),
    level,
    event,
    ...payload
  };
  console.error(JSON.stringify(line));
}

export function logDebug(event: string, payload: Record<string, unknown> = {}) {
  write("debug", event, payload);
}

export function logInfo(event: string, payload: Record<string, unknown> = {}) {
  write("info", event, payload);
}

export function logError(event: string, payload: Record<string, unknown> = {}) {
  write("error", event, payload);
}
