import { describe, it, expect } from "vitest";
import { JsonObject, asNumber, number, string } from "../../src/json/index.js";
import { JsonAccessError } from "../../src/shared/errors.js";

describe("JsonObject", () => {
  it("iterates in insertion order", () => {
    const obj = new JsonObject();
    obj.set("b", number(1));
    obj.set("a", number(2));
    obj.set("10", number(3));
    expect([...obj.keys()]).toEqual(["b", "a", "10"]);
  });

  it("set refuses an existing key and leaves the entry unchanged", () => {
    const obj = new JsonObject();
    expect(obj.set("k", number(1))).toBe(true);
    expect(obj.set("k", number(2))).toBe(false);
    expect(obj.size).toBe(1);
    expect(asNumber(obj.expect("k"))).toBe(1);
  });

  it("hasKey peeks without consuming", () => {
    const obj = new JsonObject();
    obj.set("k", string("v"));
    expect(obj.hasKey("k")).toBe(true);
    expect(obj.hasKey("missing")).toBe(false);
    expect(obj.size).toBe(1);
  });

  it("remove detaches the entry", () => {
    const obj = new JsonObject();
    obj.set("k", number(7));
    obj.set("other", number(8));
    const removed = obj.remove("k");
    expect(removed).toEqual(number(7));
    expect(obj.hasKey("k")).toBe(false);
    expect([...obj.keys()]).toEqual(["other"]);
  });

  it("remove of an absent key returns undefined and changes nothing", () => {
    const obj = new JsonObject();
    obj.set("k", number(7));
    expect(obj.remove("absent")).toBeUndefined();
    expect(obj.size).toBe(1);
  });

  it("expect and removeExpect throw on a missing key", () => {
    const obj = new JsonObject();
    expect(() => obj.expect("nope")).toThrow(JsonAccessError);
    expect(() => obj.removeExpect("nope")).toThrow('missing object key "nope"');
  });

  it("removeExpect returns and detaches", () => {
    const obj = new JsonObject();
    obj.set("k", string("v"));
    expect(obj.removeExpect("k")).toEqual(string("v"));
    expect(obj.size).toBe(0);
  });

  it("a re-added key goes to the end", () => {
    const obj = new JsonObject();
    obj.set("a", number(1));
    obj.set("b", number(2));
    obj.remove("a");
    obj.set("a", number(3));
    expect([...obj.entries()].map(([key]) => key)).toEqual(["b", "a"]);
  });

  it("from rejects duplicate keys", () => {
    expect(JsonObject.from([["x", number(1)], ["x", number(2)]])).toBeUndefined();
    expect(JsonObject.from([["x", number(1)], ["y", number(2)]])?.size).toBe(2);
  });
});
