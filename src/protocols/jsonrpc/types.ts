import type { JsonArray, JsonObjectValue } from "../../json/index.js";

/** Request id: a string, or an integer. */
export type RequestId = string | number;

/** Response id; null only answers a request that could not be read. */
export type ResponseId = RequestId | null;

/** Request and notification params are structured: an array or an object. */
export type MessageParams = JsonArray | JsonObjectValue;

/**
 * Error codes defined by JSON-RPC and the Language Server Protocol.
 * https://microsoft.github.io/language-server-protocol/specifications/lsp/3.17/specification/#errorCodes
 */
export const ErrorCode = {
  // Defined by JSON-RPC
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
  /**
   * A notification or request arrived before the server received the
   * `initialize` request.
   */
  ServerNotInitialized: -32002,
  UnknownErrorCode: -32001,
  /**
   * The request was syntactically correct and the method known, but it
   * failed. The message should say why.
   */
  RequestFailed: -32803,
  /** Only for requests that explicitly support being server cancellable. */
  ServerCancelled: -32802,
  /**
   * A document changed outside normal conditions. Not sent for changes seen
   * in unprocessed messages: a result computed on an older state may still
   * be useful to the client.
   */
  ContentModified: -32801,
  /** The client cancelled a request and the server noticed. */
  RequestCancelled: -32800,
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export const JSONRPC_RESERVED_ERROR_RANGE = { start: -32099, end: -32000 } as const;
export const LSP_RESERVED_ERROR_RANGE = { start: -32899, end: -32800 } as const;

const ERROR_CODES: ReadonlySet<number> = new Set(Object.values(ErrorCode));

export function isErrorCode(code: number): code is ErrorCode {
  return ERROR_CODES.has(code);
}

/** Reverse lookup for logs and CLI output. */
export function errorCodeName(code: ErrorCode): string {
  for (const [name, value] of Object.entries(ErrorCode)) {
    if (value === code) return name;
  }
  return "UnknownErrorCode";
}
