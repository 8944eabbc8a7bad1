/**
 * Text-level JSON-RPC codec: one JSON text in, one classified message out,
 * and the reverse. Transport framing is the caller's concern.
 */

import { isObject, object, parse, stringify, type Value } from "../../json/index.js";
import { log } from "../../shared/logging.js";
import { CancelParams, NotificationMessage, RequestMessage, readRequestId } from "./message.js";
import { ResponseMessage, jsonRpcError } from "./response.js";
import { ErrorCode, type ResponseId } from "./types.js";

export const CANCEL_REQUEST_METHOD = "$/cancelRequest";

export type DecodeFailure = "parse_error" | "invalid_request";

export type DecodedMessage =
  | Readonly<{ kind: "request"; message: RequestMessage }>
  | Readonly<{ kind: "notification"; message: NotificationMessage }>
  | Readonly<{ kind: "response"; message: ResponseMessage }>
  | Readonly<{ kind: "invalid"; reason: DecodeFailure; reply: ResponseMessage }>;

export type OutgoingMessage =
  | Readonly<{ kind: "request"; message: RequestMessage }>
  | Readonly<{ kind: "notification"; message: NotificationMessage }>
  | Readonly<{ kind: "response"; message: ResponseMessage }>;

function invalid(reason: DecodeFailure, id: ResponseId, detail: string): DecodedMessage {
  log.debug({ reason, id, detail }, "rejected JSON-RPC message");
  const reply =
    reason === "parse_error"
      ? jsonRpcError(id, ErrorCode.ParseError, "Parse error")
      : jsonRpcError(id, ErrorCode.InvalidRequest, `Invalid request: ${detail}`);
  return { kind: "invalid", reason, reply };
}

/**
 * Parses and classifies one message. A value with both `id` and `method` is a
 * request, `method` alone a notification, `id` alone a response. Failures
 * carry the error response a server sends back, echoing the request id when
 * it could be read.
 */
export function decodeMessage(text: string): DecodedMessage {
  const value = parse(text);
  if (!value) return invalid("parse_error", null, "malformed JSON");
  if (!isObject(value)) return invalid("invalid_request", null, `expected an object, found ${value.kind}`);

  const obj = value.entries;
  const rawId = obj.hasKey("id") ? readRequestId(obj.expect("id")) : undefined;
  const echoId: ResponseId = rawId ?? null;

  if (RequestMessage.identify(value)) {
    const message = RequestMessage.validate(value);
    return message ? { kind: "request", message } : invalid("invalid_request", echoId, "malformed request");
  }
  if (obj.hasKey("method")) {
    const message = NotificationMessage.validate(value);
    return message ? { kind: "notification", message } : invalid("invalid_request", null, "malformed notification");
  }
  if (obj.hasKey("id")) {
    const message = ResponseMessage.validate(value);
    return message ? { kind: "response", message } : invalid("invalid_request", echoId, "malformed response");
  }
  return invalid("invalid_request", null, "neither id nor method present");
}

export function toValue(outgoing: OutgoingMessage): Value {
  const target = object();
  switch (outgoing.kind) {
    case "request":
      RequestMessage.dump(outgoing.message, target.entries);
      break;
    case "notification":
      NotificationMessage.dump(outgoing.message, target.entries);
      break;
    case "response":
      ResponseMessage.dump(outgoing.message, target.entries);
      break;
  }
  return target;
}

/** Renders one message as compact JSON text. */
export function encodeMessage(outgoing: OutgoingMessage): string {
  return stringify(toValue(outgoing));
}

/**
 * Methods starting with `$/` depend on the protocol implementation. Unknown
 * notifications of this kind may be ignored; unknown requests must be
 * answered with `MethodNotFound`.
 */
export function isImplementationDependent(method: string): boolean {
  return method.startsWith("$/");
}

export function methodNotFound(request: RequestMessage): ResponseMessage {
  return jsonRpcError(request.id, ErrorCode.MethodNotFound, `Unhandled method ${request.method}`);
}

export function cancelNotification(params: CancelParams): NotificationMessage {
  return { method: CANCEL_REQUEST_METHOD, params: CancelParams.toValue(params) };
}

export function isCancelRequest(notification: NotificationMessage): boolean {
  return notification.method === CANCEL_REQUEST_METHOD;
}

/** Decodes the params of a `$/cancelRequest` notification; `undefined` for any other message. */
export function decodeCancelRequest(notification: NotificationMessage): CancelParams | undefined {
  if (!isCancelRequest(notification) || !notification.params) return undefined;
  return CancelParams.validate(notification.params);
}
