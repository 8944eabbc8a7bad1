import { JsonAccessError } from "../shared/errors.js";
import { JsonObject } from "./object.js";

export type JsonNull = Readonly<{ kind: "null" }>;
export type JsonBool = Readonly<{ kind: "bool"; value: boolean }>;
export type JsonNumber = Readonly<{ kind: "number"; value: number }>;
/** `value` is a sequence of UTF-16 code units; lone surrogates are allowed. */
export type JsonString = Readonly<{ kind: "string"; value: string }>;
export type JsonArray = Readonly<{ kind: "array"; items: Value[] }>;
export type JsonObjectValue = Readonly<{ kind: "object"; entries: JsonObject }>;

/** A JSON value. Exactly one kind is active; containers own their children. */
export type Value = JsonNull | JsonBool | JsonNumber | JsonString | JsonArray | JsonObjectValue;

export type ValueKind = Value["kind"];

const NULL: JsonNull = Object.freeze({ kind: "null" });

export function nullValue(): JsonNull {
  return NULL;
}

export function bool(value: boolean): JsonBool {
  return { kind: "bool", value };
}

export function number(value: number): JsonNumber {
  return { kind: "number", value };
}

export function string(value: string): JsonString {
  return { kind: "string", value };
}

export function array(items: Value[] = []): JsonArray {
  return { kind: "array", items };
}

export function object(entries: JsonObject = new JsonObject()): JsonObjectValue {
  return { kind: "object", entries };
}

export function isNull(v: Value): v is JsonNull {
  return v.kind === "null";
}

export function isBool(v: Value): v is JsonBool {
  return v.kind === "bool";
}

export function isNumber(v: Value): v is JsonNumber {
  return v.kind === "number";
}

export function isString(v: Value): v is JsonString {
  return v.kind === "string";
}

export function isArray(v: Value): v is JsonArray {
  return v.kind === "array";
}

export function isObject(v: Value): v is JsonObjectValue {
  return v.kind === "object";
}

function mismatch(expected: ValueKind, actual: Value): JsonAccessError {
  return new JsonAccessError(`expected a JSON ${expected}, found ${actual.kind}`);
}

export function asBool(v: Value): boolean {
  if (!isBool(v)) throw mismatch("bool", v);
  return v.value;
}

export function asNumber(v: Value): number {
  if (!isNumber(v)) throw mismatch("number", v);
  return v.value;
}

export function asString(v: Value): string {
  if (!isString(v)) throw mismatch("string", v);
  return v.value;
}

export function asArray(v: Value): Value[] {
  if (!isArray(v)) throw mismatch("array", v);
  return v.items;
}

export function asObject(v: Value): JsonObject {
  if (!isObject(v)) throw mismatch("object", v);
  return v.entries;
}

/**
 * Reads a number as an integer when it sits within `tolerance` above its
 * floor. Returns the floor, or `undefined` for non-numbers, non-finite
 * numbers, values further from their floor, and results outside the safe
 * integer range.
 */
export function tryInteger(v: Value, tolerance: number): number | undefined {
  if (!isNumber(v)) return undefined;
  const floor = Math.floor(v.value);
  if (!(v.value - floor <= tolerance)) return undefined;
  return Number.isSafeInteger(floor) ? floor : undefined;
}

/** Structural equality. Object entries are compared by key, not by position. */
export function equals(a: Value, b: Value): boolean {
  switch (a.kind) {
    case "null":
      return b.kind === "null";
    case "bool":
      return b.kind === "bool" && b.value === a.value;
    case "number":
      return b.kind === "number" && b.value === a.value;
    case "string":
      return b.kind === "string" && b.value === a.value;
    case "array": {
      if (b.kind !== "array" || a.items.length !== b.items.length) return false;
      const other = b.items;
      return a.items.every((item, i) => equals(item, other[i]));
    }
    case "object": {
      if (b.kind !== "object" || a.entries.size !== b.entries.size) return false;
      for (const [key, value] of a.entries.entries()) {
        if (!b.entries.hasKey(key) || !equals(value, b.entries.expect(key))) return false;
      }
      return true;
    }
  }
}

/**
 * Converts plain host data (what `JSON.parse` produces) into a Value.
 * Anything else (functions, symbols, bigints, `undefined`, non-finite
 * numbers, class instances, cycles) yields `undefined`.
 */
export function fromNative(input: unknown): Value | undefined {
  return convertNative(input, new Set());
}

function convertNative(input: unknown, seen: Set<object>): Value | undefined {
  if (input === null) return NULL;
  if (typeof input === "boolean") return bool(input);
  if (typeof input === "number") return Number.isFinite(input) ? number(input) : undefined;
  if (typeof input === "string") return string(input);
  if (typeof input !== "object") return undefined;
  if (seen.has(input)) return undefined;
  seen.add(input);
  try {
    if (Array.isArray(input)) {
      const items: Value[] = [];
      for (const item of input) {
        const converted = convertNative(item, seen);
        if (!converted) return undefined;
        items.push(converted);
      }
      return array(items);
    }
    const proto: unknown = Object.getPrototypeOf(input);
    if (proto !== Object.prototype && proto !== null) return undefined;
    const entries = new JsonObject();
    for (const [key, item] of Object.entries(input)) {
      const converted = convertNative(item, seen);
      if (!converted) return undefined;
      entries.set(key, converted);
    }
    return object(entries);
  } finally {
    seen.delete(input);
  }
}

export type NativeJson = null | boolean | number | string | NativeJson[] | { [key: string]: NativeJson };

/** Converts a Value into plain host data. Integer-like keys are reordered by the host. */
export function toNative(v: Value): NativeJson {
  switch (v.kind) {
    case "null":
      return null;
    case "bool":
    case "number":
    case "string":
      return v.value;
    case "array":
      return v.items.map(toNative);
    case "object": {
      const out: { [key: string]: NativeJson } = {};
      for (const [key, item] of v.entries.entries()) {
        // "__proto__" is an ordinary key in JSON
        Object.defineProperty(out, key, {
          value: toNative(item),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
      return out;
    }
  }
}
