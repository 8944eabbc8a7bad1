import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { resolveGlobalOptions } from "../../src/cli/options.js";
import { InvalidArgsError } from "../../src/shared/errors.js";

describe("resolveGlobalOptions", () => {
  beforeEach(() => {
    vi.stubEnv("LSP_WIRE_LOG_LEVEL", "");
    vi.stubEnv("LSP_WIRE_LOG_FORMAT", "");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("falls back to the defaults", () => {
    expect(resolveGlobalOptions({})).toEqual({ logLevel: "info", logFormat: "text" });
  });

  it("reads the environment when no flag is given", () => {
    vi.stubEnv("LSP_WIRE_LOG_LEVEL", "warn");
    vi.stubEnv("LSP_WIRE_LOG_FORMAT", "json");
    expect(resolveGlobalOptions({})).toEqual({ logLevel: "warn", logFormat: "json" });
  });

  it("prefers flags over the environment", () => {
    vi.stubEnv("LSP_WIRE_LOG_LEVEL", "warn");
    expect(resolveGlobalOptions({ logLevel: "error", logFormat: "plain" })).toEqual({
      logLevel: "error",
      logFormat: "plain",
    });
  });

  it("turns --verbose into debug", () => {
    expect(resolveGlobalOptions({ verbose: true, logLevel: "error" }).logLevel).toBe("debug");
  });

  it("rejects unknown values", () => {
    expect(() => resolveGlobalOptions({ logLevel: "loud" })).toThrow(InvalidArgsError);
    expect(() => resolveGlobalOptions({ logFormat: "xml" })).toThrow(/^Invalid options: /);
  });

  it("rejects an unknown value from the environment", () => {
    vi.stubEnv("LSP_WIRE_LOG_FORMAT", "yaml");
    expect(() => resolveGlobalOptions({})).toThrow(InvalidArgsError);
  });
});
