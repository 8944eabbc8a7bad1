import { JsonAccessError } from "../shared/errors.js";
import type { Value } from "./value.js";

/**
 * Ordered string-keyed map of JSON values. Keys are unique and iteration
 * follows insertion order, which is also the order the serializer writes.
 */
export class JsonObject {
  private readonly assocs = new Map<string, Value>();

  /** Builds an object from pairs; `undefined` if a key repeats. */
  static from(pairs: Iterable<readonly [string, Value]>): JsonObject | undefined {
    const obj = new JsonObject();
    for (const [key, value] of pairs) {
      if (!obj.set(key, value)) return undefined;
    }
    return obj;
  }

  get size(): number {
    return this.assocs.size;
  }

  /** Adds an entry. Returns false, leaving the object unchanged, if the key exists. */
  set(key: string, value: Value): boolean {
    if (this.assocs.has(key)) return false;
    this.assocs.set(key, value);
    return true;
  }

  hasKey(key: string): boolean {
    return this.assocs.has(key);
  }

  /** Borrows an entry. The key must exist. */
  expect(key: string): Value {
    const value = this.assocs.get(key);
    if (value === undefined) throw new JsonAccessError(`missing object key "${key}"`);
    return value;
  }

  /** Detaches an entry and hands it to the caller. */
  remove(key: string): Value | undefined {
    const value = this.assocs.get(key);
    if (value !== undefined) this.assocs.delete(key);
    return value;
  }

  /** Detaches an entry. The key must exist. */
  removeExpect(key: string): Value {
    const value = this.expect(key);
    this.assocs.delete(key);
    return value;
  }

  keys(): IterableIterator<string> {
    return this.assocs.keys();
  }

  entries(): IterableIterator<[string, Value]> {
    return this.assocs.entries();
  }

  [Symbol.iterator](): IterableIterator<[string, Value]> {
    return this.entries();
  }
}
