export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];
export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
  child(scope: string): Logger;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function serializeError(value: unknown) {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

// One JSON object per line; warn and error go to stderr.
export function createLogger(scope: string, level: LogLevel = "info"): Logger {
  const threshold = LEVEL_RANK[level];

  function write(entryLevel: Exclude<LogLevel, "silent">, msg: string, fields: LogFields = {}) {
    if (LEVEL_RANK[entryLevel] < threshold) return;
    const entry: LogFields = { level: entryLevel, scope, msg, time: new Date().toISOString() };
    for (const [key, value] of Object.entries(fields)) {
      entry[key] = serializeError(value);
    }
    const line = JSON.stringify(entry);
    if (entryLevel === "warn" || entryLevel === "error") {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  return {
    debug: (msg, fields) => write("debug", msg, fields),
    info: (msg, fields) => write("info", msg, fields),
    warn: (msg, fields) => write("warn", msg, fields),
    error: (msg, fields) => write("error", msg, fields),
    child: (childScope) => createLogger(`${scope}.${childScope}`, level)
  };
}

export const silentLogger: Logger = createLogger("silent", "silent");
