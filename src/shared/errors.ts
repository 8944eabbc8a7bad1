import { getLogger } from "./logging.js";

/** CLI exit codes. */
export const EXIT = {
  SUCCESS: 0,
  GENERIC_ERROR: 1,
  INVALID_ARGS: 2,
  INVALID_INPUT: 3,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exit(code: ExitCode, message?: string): never {
  if (message) {
    if (code === EXIT.SUCCESS) getLogger().info(message);
    else getLogger().error(message);
  }
  process.exit(code);
}

/**
 * Logs and records a failing exit code. The process ends on its own once
 * stdout drains.
 */
export function fail(code: ExitCode, message?: string): void {
  if (message) getLogger().error(message);
  process.exitCode = code;
}

/**
 * Thrown when a JSON value is read as a kind it does not hold, or an object
 * entry is borrowed that does not exist. This is a programming error: callers
 * are expected to test with the matching predicate first.
 */
export class JsonAccessError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JsonAccessError";
  }
}

/** Thrown when CLI options or their environment fallbacks fail validation. */
export class InvalidArgsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgsError";
  }
}
