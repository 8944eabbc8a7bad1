import { MAX_DEPTH } from "../shared/constants.js";
import { JsonObject } from "./object.js";
import { array, bool, nullValue, number, object, string, type Value } from "./value.js";

const LITERALS: ReadonlyArray<readonly [string, () => Value]> = [
  ["false", () => bool(false)],
  ["true", () => bool(true)],
  ["null", () => nullValue()],
];

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  '"': '"',
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
};

function isWhitespace(c: string | undefined): boolean {
  return c === " " || c === "\n" || c === "\r" || c === "\t";
}

function isDigit(c: string | undefined): boolean {
  return c !== undefined && c >= "0" && c <= "9";
}

function hexValue(c: string | undefined): number | undefined {
  if (c === undefined) return undefined;
  if (c >= "0" && c <= "9") return c.charCodeAt(0) - 48;
  if (c >= "a" && c <= "f") return c.charCodeAt(0) - 87;
  if (c >= "A" && c <= "F") return c.charCodeAt(0) - 55;
  return undefined;
}

/**
 * Recursive-descent JSON parser that bails on the first error.
 *
 * Every `parse*` method returns `undefined` on failure; there is no error
 * position or message. The source is read one UTF-16 code unit at a time.
 * Nesting deeper than `MAX_DEPTH` arrays and objects fails.
 */
export class JsonParser {
  private index = 0;
  private depth = 0;

  constructor(private readonly source: string) {}

  /** True once the cursor has consumed the whole source. */
  get atEnd(): boolean {
    return this.index >= this.source.length;
  }

  private current(): string | undefined {
    return this.atEnd ? undefined : this.source[this.index];
  }

  private skipWhitespace(): void {
    while (isWhitespace(this.current())) this.index++;
  }

  private skipDigits(): void {
    while (isDigit(this.current())) this.index++;
  }

  parseValue(): Value | undefined {
    this.skipWhitespace();
    const c = this.current();
    if (c === undefined) return undefined;

    let value: Value | undefined;
    const literal = LITERALS.find(([text]) => this.source.startsWith(text, this.index));
    if (literal) {
      this.index += literal[0].length;
      value = literal[1]();
    } else if (c === "-" || isDigit(c)) {
      value = this.parseNumber();
    } else if (c === "{" || c === "[") {
      if (this.depth >= MAX_DEPTH) return undefined;
      this.index++;
      this.depth++;
      value = c === "{" ? this.parseObject() : this.parseArray();
      this.depth--;
    } else if (c === '"') {
      this.index++;
      const s = this.parseString();
      value = s === undefined ? undefined : string(s);
    } else {
      return undefined;
    }

    this.skipWhitespace();
    return value;
  }

  private parseNumber(): Value | undefined {
    const start = this.index;
    if (this.current() === "-") this.index++;

    // no leading zeroes: a zero integral part is exactly "0"
    const lead = this.current();
    if (lead === "0") {
      this.index++;
    } else if (isDigit(lead)) {
      this.skipDigits();
    } else {
      return undefined;
    }

    if (this.current() === ".") {
      this.index++;
      if (!isDigit(this.current())) return undefined;
      this.skipDigits();
    }

    const e = this.current();
    if (e === "e" || e === "E") {
      this.index++;
      const sign = this.current();
      if (sign === "+" || sign === "-") this.index++;
      if (!isDigit(this.current())) return undefined;
      this.skipDigits();
    }

    // lexeme is grammar-checked; overflow to infinity is rejected
    const parsed = Number(this.source.slice(start, this.index));
    return Number.isFinite(parsed) ? number(parsed) : undefined;
  }

  private parseFourHex(): string | undefined {
    let unit = 0;
    for (let i = 0; i < 4; i++) {
      const digit = hexValue(this.current());
      if (digit === undefined) return undefined;
      unit = (unit << 4) | digit;
      this.index++;
    }
    return String.fromCharCode(unit);
  }

  /** Assumes the backslash was just accepted. */
  private parseEscape(): string | undefined {
    const c = this.current();
    if (c === undefined) return undefined;
    this.index++;
    if (c === "u") return this.parseFourHex();
    return Object.prototype.hasOwnProperty.call(SIMPLE_ESCAPES, c) ? SIMPLE_ESCAPES[c] : undefined;
  }

  /** Assumes the opening quote was just accepted. */
  private parseString(): string | undefined {
    const units: string[] = [];
    let runStart = this.index;
    for (;;) {
      const c = this.current();
      if (c === undefined) return undefined; // unterminated
      if (c === '"') break;
      if (c === "\\") {
        units.push(this.source.slice(runStart, this.index));
        this.index++;
        const escaped = this.parseEscape();
        if (escaped === undefined) return undefined;
        units.push(escaped);
        runStart = this.index;
      } else {
        this.index++;
      }
    }
    units.push(this.source.slice(runStart, this.index));
    this.index++;
    return units.join("");
  }

  /** Assumes the opening bracket was just accepted. */
  private parseArray(): Value | undefined {
    const items: Value[] = [];
    this.skipWhitespace();
    if (this.current() !== "]") {
      for (;;) {
        const item = this.parseValue();
        if (!item) return undefined;
        items.push(item);
        if (this.current() !== ",") break;
        this.index++;
      }
    }
    if (this.current() !== "]") return undefined;
    this.index++;
    return array(items);
  }

  /** Assumes the opening brace was just accepted. */
  private parseObject(): Value | undefined {
    const entries = new JsonObject();
    this.skipWhitespace();
    if (this.current() !== "}") {
      for (;;) {
        this.skipWhitespace();
        if (this.current() !== '"') return undefined;
        this.index++;
        const key = this.parseString();
        if (key === undefined) return undefined;
        this.skipWhitespace();
        if (this.current() !== ":") return undefined;
        this.index++;
        const value = this.parseValue();
        if (!value) return undefined;
        if (!entries.set(key, value)) return undefined; // duplicate key
        if (this.current() !== ",") break;
        this.index++;
      }
    }
    if (this.current() !== "}") return undefined;
    this.index++;
    return object(entries);
  }
}

/** Parses a text holding exactly one JSON value, with optional surrounding whitespace. */
export function parse(source: string): Value | undefined {
  const parser = new JsonParser(source);
  const value = parser.parseValue();
  if (!value || !parser.atEnd) return undefined;
  return value;
}
