/** Environment variable names read by the CLI. */
export const WIRE_ENV = {
  LOG_LEVEL: "LSP_WIRE_LOG_LEVEL",
  LOG_FORMAT: "LSP_WIRE_LOG_FORMAT",
} as const;

export function getEnv(key: keyof typeof WIRE_ENV): string | undefined {
  const value = process.env[WIRE_ENV[key]];
  return value === "" ? undefined : value;
}
