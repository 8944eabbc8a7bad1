import type { Value } from "./value.js";

const NAMED_ESCAPES: Readonly<Record<string, string>> = {
  '"': '\\"',
  "\\": "\\\\",
  "/": "\\/",
  "\b": "\\b",
  "\f": "\\f",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
};

// Everything outside printable ASCII, plus the characters with named escapes.
const NEEDS_ESCAPE = /["\\/\u0000-\u001f\u007f-\uffff]/g;

function escapeUnit(unit: string): string {
  const named = NAMED_ESCAPES[unit];
  if (named !== undefined) return named;
  return "\\u" + unit.charCodeAt(0).toString(16).padStart(4, "0");
}

/** Quotes a string of code units, escaping every unit that is not printable ASCII. */
export function quote(value: string): string {
  return `"${value.replace(NEEDS_ESCAPE, escapeUnit)}"`;
}

function formatNumber(value: number): string {
  return Number.isFinite(value) ? String(value) : "null";
}

/** Renders a Value as compact JSON text. Object keys keep insertion order. */
export function stringify(value: Value): string {
  const out: string[] = [];
  write(value, out);
  return out.join("");
}

function write(value: Value, out: string[]): void {
  switch (value.kind) {
    case "null":
      out.push("null");
      return;
    case "bool":
      out.push(value.value ? "true" : "false");
      return;
    case "number":
      out.push(formatNumber(value.value));
      return;
    case "string":
      out.push(quote(value.value));
      return;
    case "array": {
      out.push("[");
      value.items.forEach((item, i) => {
        if (i > 0) out.push(",");
        write(item, out);
      });
      out.push("]");
      return;
    }
    case "object": {
      out.push("{");
      let first = true;
      for (const [key, item] of value.entries.entries()) {
        if (!first) out.push(",");
        first = false;
        out.push(quote(key), ":");
        write(item, out);
      }
      out.push("}");
      return;
    }
  }
}
