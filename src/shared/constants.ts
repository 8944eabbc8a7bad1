/** The only `jsonrpc` version accepted and emitted. */
export const JSONRPC_VERSION = "2.0";

/** Distance from a whole number still accepted where the protocol types a field `integer`. */
export const INT_CONVERSION_TOLERANCE = 0.000000001;

/** Deepest array/object nesting the parser accepts. */
export const MAX_DEPTH = 512;

export const DEFAULT_LOG_LEVEL = "info";
export const DEFAULT_LOG_FORMAT = "text";
