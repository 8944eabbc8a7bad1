import {
  isArray,
  isNull,
  isObject,
  isString,
  nullValue,
  number,
  object,
  string,
  tryInteger,
  type JsonObject,
  type JsonObjectValue,
  type Value,
} from "../../json/index.js";
import { INT_CONVERSION_TOLERANCE, JSONRPC_VERSION } from "../../shared/constants.js";
import type { MessageParams, RequestId, ResponseId } from "./types.js";

// Validation here is destructive: each recognised field is removed from the
// input object as it is read. Unknown fields are left behind.

/** Reads `string | integer`; `undefined` for anything else. */
export function readRequestId(value: Value): RequestId | undefined {
  if (isString(value)) return value.value;
  return tryInteger(value, INT_CONVERSION_TOLERANCE);
}

/** Reads `string | integer | null`; `undefined` for anything else. */
export function readResponseId(value: Value): ResponseId | undefined {
  return isNull(value) ? null : readRequestId(value);
}

export function dumpId(id: ResponseId): Value {
  if (id === null) return nullValue();
  return typeof id === "string" ? string(id) : number(id);
}

/** Removes `params`. Absent is fine; present must be an array or object. */
function takeParams(obj: JsonObject): { ok: true; params?: MessageParams } | { ok: false } {
  const params = obj.remove("params");
  if (!params) return { ok: true };
  if (isArray(params) || isObject(params)) return { ok: true, params };
  return { ok: false };
}

function takeMethod(obj: JsonObject): string | undefined {
  const method = obj.remove("method");
  return method && isString(method) ? method.value : undefined;
}

/** https://microsoft.github.io/language-server-protocol/specifications/lsp/3.17/specification/#abstractMessage */
export const Message = {
  /** Checks the value is an object whose `jsonrpc` is "2.0", consuming that field. */
  validate(value: Value): value is JsonObjectValue {
    if (!isObject(value)) return false;
    const jsonrpc = value.entries.remove("jsonrpc");
    return jsonrpc !== undefined && isString(jsonrpc) && jsonrpc.value === JSONRPC_VERSION;
  },

  dump(target: JsonObject): void {
    target.set("jsonrpc", string(JSONRPC_VERSION));
  },
};

/** https://microsoft.github.io/language-server-protocol/specifications/lsp/3.17/specification/#requestMessage */
export interface RequestMessage {
  readonly id: RequestId;
  readonly method: string;
  readonly params?: MessageParams;
}

export const RequestMessage = {
  /**
   * Tells a request from a notification before committing to validation:
   * only a request carries an `id`. Field validity is not checked.
   */
  identify(value: Value): boolean {
    return isObject(value) && value.entries.hasKey("id") && value.entries.hasKey("method");
  },

  validate(value: Value): RequestMessage | undefined {
    if (!Message.validate(value)) return undefined;
    const obj = value.entries;

    const rawId = obj.remove("id");
    const id = rawId && readRequestId(rawId);
    if (id === undefined) return undefined;

    const method = takeMethod(obj);
    if (method === undefined) return undefined;

    const params = takeParams(obj);
    if (!params.ok) return undefined;

    return params.params ? { id, method, params: params.params } : { id, method };
  },

  dump(message: RequestMessage, target: JsonObject): void {
    Message.dump(target);
    target.set("id", dumpId(message.id));
    target.set("method", string(message.method));
    if (message.params) target.set("params", message.params);
  },
};

/** https://microsoft.github.io/language-server-protocol/specifications/lsp/3.17/specification/#notificationMessage */
export interface NotificationMessage {
  readonly method: string;
  readonly params?: MessageParams;
}

export const NotificationMessage = {
  validate(value: Value): NotificationMessage | undefined {
    if (!Message.validate(value)) return undefined;
    const obj = value.entries;

    const method = takeMethod(obj);
    if (method === undefined) return undefined;

    const params = takeParams(obj);
    if (!params.ok) return undefined;

    return params.params ? { method, params: params.params } : { method };
  },

  dump(message: NotificationMessage, target: JsonObject): void {
    Message.dump(target);
    target.set("method", string(message.method));
    if (message.params) target.set("params", message.params);
  },
};

/**
 * Params of `$/cancelRequest`. A cancelled request still gets a response,
 * usually an error with `ErrorCode.RequestCancelled`.
 *
 * https://microsoft.github.io/language-server-protocol/specifications/lsp/3.17/specification/#cancelRequest
 */
export interface CancelParams {
  readonly id: RequestId;
}

export const CancelParams = {
  validate(value: Value): CancelParams | undefined {
    if (!isObject(value)) return undefined;
    const rawId = value.entries.remove("id");
    const id = rawId && readRequestId(rawId);
    return id === undefined ? undefined : { id };
  },

  dump(params: CancelParams, target: JsonObject): void {
    target.set("id", dumpId(params.id));
  },

  toValue(params: CancelParams): JsonObjectValue {
    const obj = object();
    obj.entries.set("id", dumpId(params.id));
    return obj;
  },
};
