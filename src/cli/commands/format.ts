import { parse, stringify } from "../../json/index.js";
import { log } from "../../shared/logging.js";
import { EXIT, fail } from "../../shared/errors.js";
import { readInput } from "../utils.js";

/** Normalizes JSON text to its compact form; `undefined` if it does not parse. */
export function formatJson(text: string): string | undefined {
  const value = parse(text);
  return value ? stringify(value) : undefined;
}

export async function runFormat(file?: string): Promise<void> {
  const input = await readInput(file);
  log.debug({ file: file ?? "<stdin>", length: input.length }, "formatting input");
  const formatted = formatJson(input);
  if (formatted === undefined) {
    fail(EXIT.INVALID_INPUT, "input is not valid JSON");
    return;
  }
  process.stdout.write(formatted + "\n");
}
