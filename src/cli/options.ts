import { type } from "arktype";
import { DEFAULT_LOG_FORMAT, DEFAULT_LOG_LEVEL } from "../shared/constants.js";
import { getEnv } from "../shared/env.js";
import { InvalidArgsError } from "../shared/errors.js";

export const GlobalOptionsSchema = type({
  logLevel: "'error' | 'warn' | 'info' | 'debug'",
  logFormat: "'text' | 'json' | 'plain'",
});

export type GlobalOptions = typeof GlobalOptionsSchema.infer;

/** Global options as commander hands them over, before defaults and validation. */
export interface RawGlobalOptions {
  verbose?: boolean;
  logLevel?: string;
  logFormat?: string;
}

/** Flag, then environment, then default. Throws InvalidArgsError on an unknown value. */
export function resolveGlobalOptions(raw: RawGlobalOptions): GlobalOptions {
  const candidate = {
    logLevel: raw.verbose ? "debug" : (raw.logLevel ?? getEnv("LOG_LEVEL") ?? DEFAULT_LOG_LEVEL),
    logFormat: raw.logFormat ?? getEnv("LOG_FORMAT") ?? DEFAULT_LOG_FORMAT,
  };
  const out = GlobalOptionsSchema(candidate);
  if (out instanceof type.errors) {
    throw new InvalidArgsError(`Invalid options: ${out.summary}`);
  }
  return out;
}
