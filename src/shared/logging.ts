import { Writable } from "node:stream";
import pino from "pino";
import pinoPretty from "pino-pretty";

export type LogLevel = "error" | "warn" | "info" | "debug";
export type LogFormat = "text" | "json" | "plain";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

function isValidLevel(s: string): s is LogLevel {
  return LOG_LEVELS.some((level) => level === s);
}

function messageOf(line: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return line;
  }
  if (typeof parsed === "object" && parsed !== null && "msg" in parsed && typeof parsed.msg === "string") {
    return parsed.msg;
  }
  return line;
}

/** Writable that parses pino JSON lines and writes only the message (no time/level). */
function plainMessageStderr(): Writable {
  let buffer = "";
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      buffer += typeof chunk === "string" ? chunk : chunk.toString("utf8");
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";
      for (const line of lines) {
        if (!line.trim()) continue;
        process.stderr.write(messageOf(line) + "\n");
      }
      cb();
    },
  });
}

let rootLogger: pino.Logger | null = null;

function createLogger(level: string, format: LogFormat): pino.Logger {
  const options = { level: isValidLevel(level) ? level : "info", name: "lsp-wire" };
  if (format === "plain") return pino(options, plainMessageStderr());
  if (format === "text") return pino(options, pinoPretty({ colorize: true, destination: 2 }));
  return pino(options, pino.destination(2));
}

export function initLogger(level = "info", format: LogFormat = "text"): void {
  rootLogger = createLogger(level, format);
}

function ensureLogger(): pino.Logger {
  if (!rootLogger) rootLogger = createLogger("info", "plain");
  return rootLogger;
}

export function getLogger(): pino.Logger {
  return ensureLogger();
}

type Level = "info" | "warn" | "error" | "debug" | "trace";

function forward(level: Level) {
  return (objOrMsg: object | string, msg?: string): void => {
    const logger = ensureLogger();
    if (typeof objOrMsg === "string") logger[level](objOrMsg);
    else logger[level](objOrMsg, msg);
  };
}

export const log = {
  info: forward("info"),
  warn: forward("warn"),
  error: forward("error"),
  debug: forward("debug"),
  trace: forward("trace"),
};
