import { existsSync, readFileSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { text } from "node:stream/consumers";
import { isObject, isString, parse } from "../json/index.js";

const FALLBACK_VERSION = "0.1.0";

/** Reads the whole input: a file path, or stdin when absent or "-". */
export async function readInput(file?: string): Promise<string> {
  if (file && file !== "-") return readFile(file, "utf8");
  return text(process.stdin);
}

/** Version from the package.json two levels above this module (src/ or dist/). */
export function getPackageJsonVersion(): string {
  const location = new URL("../../package.json", import.meta.url);
  if (!existsSync(location)) return FALLBACK_VERSION;
  const pkg = parse(readFileSync(location, "utf8"));
  if (!pkg || !isObject(pkg) || !pkg.entries.hasKey("version")) return FALLBACK_VERSION;
  const version = pkg.entries.expect("version");
  return isString(version) ? version.value : FALLBACK_VERSION;
}
