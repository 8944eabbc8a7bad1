import { describe, it, expect } from "vitest";
import { array, number, object, string } from "../../src/json/index.js";
import {
  CANCEL_REQUEST_METHOD,
  ErrorCode,
  cancelNotification,
  decodeCancelRequest,
  decodeMessage,
  encodeMessage,
  isCancelRequest,
  isImplementationDependent,
  methodNotFound,
  stringify,
  type DecodedMessage,
} from "../../src/lib.js";

function replyOf(decoded: DecodedMessage): string {
  if (decoded.kind !== "invalid") throw new Error(`expected an invalid message, got ${decoded.kind}`);
  return encodeMessage({ kind: "response", message: decoded.reply });
}

describe("decodeMessage", () => {
  it("classifies a request", () => {
    const decoded = decodeMessage('{"jsonrpc":"2.0","id":1,"method":"initialize","params":{}}');
    expect(decoded).toEqual({ kind: "request", message: { id: 1, method: "initialize", params: object() } });
  });

  it("classifies a notification", () => {
    const decoded = decodeMessage('{"jsonrpc":"2.0","method":"initialized"}');
    expect(decoded).toEqual({ kind: "notification", message: { method: "initialized" } });
  });

  it("classifies a response", () => {
    const decoded = decodeMessage('{"jsonrpc":"2.0","id":"a","result":[]}');
    expect(decoded).toEqual({ kind: "response", message: { id: "a", result: array() } });
  });

  it("answers malformed JSON with a parse error", () => {
    const decoded = decodeMessage('{"jsonrpc":"2.0",');
    expect(decoded.kind === "invalid" && decoded.reason).toBe("parse_error");
    expect(replyOf(decoded)).toBe('{"jsonrpc":"2.0","id":null,"error":{"code":-32700,"message":"Parse error"}}');
  });

  it("rejects a value that is not an object", () => {
    expect(replyOf(decodeMessage("[1]"))).toBe(
      '{"jsonrpc":"2.0","id":null,"error":{"code":-32600,"message":"Invalid request: expected an object, found array"}}',
    );
  });

  it("echoes the id of a malformed request", () => {
    expect(replyOf(decodeMessage('{"jsonrpc":"2.0","id":5,"method":7}'))).toBe(
      '{"jsonrpc":"2.0","id":5,"error":{"code":-32600,"message":"Invalid request: malformed request"}}',
    );
  });

  it("answers with a null id when the request id is unreadable", () => {
    expect(replyOf(decodeMessage('{"jsonrpc":"2.0","id":1.5,"method":"m"}'))).toBe(
      '{"jsonrpc":"2.0","id":null,"error":{"code":-32600,"message":"Invalid request: malformed request"}}',
    );
  });

  it("answers a malformed notification with a null id", () => {
    expect(replyOf(decodeMessage('{"jsonrpc":"1.0","method":"m"}'))).toBe(
      '{"jsonrpc":"2.0","id":null,"error":{"code":-32600,"message":"Invalid request: malformed notification"}}',
    );
  });

  it("rejects a response carrying both result and error", () => {
    const text = '{"jsonrpc":"2.0","id":"x","result":1,"error":{"code":-32603,"message":"m"}}';
    expect(replyOf(decodeMessage(text))).toBe(
      '{"jsonrpc":"2.0","id":"x","error":{"code":-32600,"message":"Invalid request: malformed response"}}',
    );
  });

  it("answers deeply nested params with a parse error", () => {
    const params = "[".repeat(200_000) + "]".repeat(200_000);
    const decoded = decodeMessage(`{"jsonrpc":"2.0","method":"m","params":${params}}`);
    expect(decoded.kind === "invalid" && decoded.reason).toBe("parse_error");
    expect(replyOf(decoded)).toBe('{"jsonrpc":"2.0","id":null,"error":{"code":-32700,"message":"Parse error"}}');
  });

  it("rejects an object with neither id nor method", () => {
    expect(replyOf(decodeMessage('{"jsonrpc":"2.0"}'))).toBe(
      '{"jsonrpc":"2.0","id":null,"error":{"code":-32600,"message":"Invalid request: neither id nor method present"}}',
    );
  });
});

describe("encodeMessage", () => {
  it("renders a request with array params", () => {
    const params = array([number(1), string("two")]);
    expect(encodeMessage({ kind: "request", message: { id: 3, method: "sum", params } })).toBe(
      '{"jsonrpc":"2.0","id":3,"method":"sum","params":[1,"two"]}',
    );
  });

  it("renders a notification without params", () => {
    expect(encodeMessage({ kind: "notification", message: { method: "exit" } })).toBe(
      '{"jsonrpc":"2.0","method":"exit"}',
    );
  });

  it("re-encodes a decoded request to the same text", () => {
    const text = '{"jsonrpc":"2.0","id":"q","method":"textDocument\\/hover","params":{"position":{"line":0}}}';
    const decoded = decodeMessage(text);
    if (decoded.kind !== "request") throw new Error("expected a request");
    expect(encodeMessage(decoded)).toBe(text);
  });
});

describe("method helpers", () => {
  it("flags $/ methods as implementation dependent", () => {
    expect(isImplementationDependent("$/progress")).toBe(true);
    expect(isImplementationDependent("textDocument/didOpen")).toBe(false);
  });

  it("answers unknown requests with MethodNotFound", () => {
    const reply = methodNotFound({ id: 9, method: "$/unknown" });
    expect(reply.error).toEqual({ code: ErrorCode.MethodNotFound, message: "Unhandled method $/unknown" });
    expect(reply.id).toBe(9);
  });
});

describe("$/cancelRequest", () => {
  it("builds the notification", () => {
    const notification = cancelNotification({ id: 12 });
    expect(notification.method).toBe(CANCEL_REQUEST_METHOD);
    expect(encodeMessage({ kind: "notification", message: notification })).toBe(
      '{"jsonrpc":"2.0","method":"$\\/cancelRequest","params":{"id":12}}',
    );
  });

  it("reads the cancelled id back", () => {
    const decoded = decodeMessage('{"jsonrpc":"2.0","method":"$/cancelRequest","params":{"id":"r-3"}}');
    if (decoded.kind !== "notification") throw new Error("expected a notification");
    expect(decodeCancelRequest(decoded.message)).toEqual({ id: "r-3" });
  });

  it("recognises the method", () => {
    expect(isCancelRequest({ method: CANCEL_REQUEST_METHOD })).toBe(true);
    expect(isCancelRequest({ method: "$/progress" })).toBe(false);
  });

  it("ignores other notifications and bad params", () => {
    expect(decodeCancelRequest({ method: "exit" })).toBeUndefined();
    expect(decodeCancelRequest({ method: CANCEL_REQUEST_METHOD })).toBeUndefined();
    expect(decodeCancelRequest({ method: CANCEL_REQUEST_METHOD, params: array([number(1)]) })).toBeUndefined();
    expect(stringify(cancelNotification({ id: "s" }).params ?? object())).toBe('{"id":"s"}');
  });
});
