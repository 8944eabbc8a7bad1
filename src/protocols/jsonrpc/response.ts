import {
  isObject,
  isString,
  number,
  object,
  string,
  tryInteger,
  type JsonObject,
  type Value,
} from "../../json/index.js";
import { INT_CONVERSION_TOLERANCE } from "../../shared/constants.js";
import { Message, dumpId, readResponseId } from "./message.js";
import { isErrorCode, type ErrorCode, type RequestId, type ResponseId } from "./types.js";

/** https://microsoft.github.io/language-server-protocol/specifications/lsp/3.17/specification/#responseError */
export interface ResponseError {
  readonly code: ErrorCode;
  readonly message: string;
  readonly data?: Value;
}

export const ResponseError = {
  validate(value: Value): ResponseError | undefined {
    if (!isObject(value)) return undefined;
    const obj = value.entries;

    const rawCode = obj.remove("code");
    const code = rawCode && tryInteger(rawCode, INT_CONVERSION_TOLERANCE);
    if (code === undefined || !isErrorCode(code)) return undefined;

    const message = obj.remove("message");
    if (!message || !isString(message)) return undefined;

    const data = obj.remove("data");
    return data ? { code, message: message.value, data } : { code, message: message.value };
  },

  dump(error: ResponseError, target: JsonObject): void {
    target.set("code", number(error.code));
    target.set("message", string(error.message));
    if (error.data) target.set("data", error.data);
  },
};

/**
 * Exactly one of `result` and `error` is set.
 *
 * https://microsoft.github.io/language-server-protocol/specifications/lsp/3.17/specification/#responseMessage
 */
export type ResponseMessage =
  | Readonly<{ id: ResponseId; result: Value; error?: undefined }>
  | Readonly<{ id: ResponseId; error: ResponseError; result?: undefined }>;

export const ResponseMessage = {
  ok(id: ResponseId, result: Value): ResponseMessage {
    return { id, result };
  },

  err(id: ResponseId, error: ResponseError): ResponseMessage {
    return { id, error };
  },

  validate(value: Value): ResponseMessage | undefined {
    if (!Message.validate(value)) return undefined;
    const obj = value.entries;

    const rawId = obj.remove("id");
    const id = rawId && readResponseId(rawId);
    if (id === undefined) return undefined;

    const result = obj.remove("result");
    const rawError = obj.remove("error");
    if (result && !rawError) return { id, result };
    if (!rawError || result) return undefined;

    const error = ResponseError.validate(rawError);
    return error ? { id, error } : undefined;
  },

  dump(message: ResponseMessage, target: JsonObject): void {
    Message.dump(target);
    target.set("id", dumpId(message.id));
    const { result, error } = message;
    if (error) {
      const rendered = object();
      ResponseError.dump(error, rendered.entries);
      target.set("error", rendered);
    } else if (result) {
      target.set("result", result);
    }
  },
};

/**
 * Build an error response.
 * @param id - Request id (or null when the request could not be read).
 * @param message - Fallback message when `errorOrData` is not an Error.
 * @param errorOrData - If Error, its message is used; otherwise it becomes `error.data`.
 */
export function jsonRpcError(
  id: ResponseId,
  code: ErrorCode,
  message: string,
  errorOrData?: Error | Value,
): ResponseMessage {
  if (errorOrData instanceof Error) {
    return ResponseMessage.err(id, { code, message: errorOrData.message });
  }
  return ResponseMessage.err(id, errorOrData ? { code, message, data: errorOrData } : { code, message });
}

export function jsonRpcResult(id: RequestId, result: Value): ResponseMessage {
  return ResponseMessage.ok(id, result);
}
