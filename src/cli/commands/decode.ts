import chalk from "chalk";
import { JsonObject, number, object, string, stringify, type Value } from "../../json/index.js";
import {
  decodeCancelRequest,
  decodeMessage,
  dumpId,
  encodeMessage,
  errorCodeName,
  type DecodedMessage,
} from "../../protocols/jsonrpc/index.js";
import { log } from "../../shared/logging.js";
import { EXIT, fail } from "../../shared/errors.js";
import { readInput } from "../utils.js";

function summaryOf(fields: Array<readonly [string, Value]>): Value {
  const entries = new JsonObject();
  for (const [key, value] of fields) entries.set(key, value);
  return object(entries);
}

/** One-line JSON description of a decoded message, for humans and scripts. */
export function summarize(decoded: DecodedMessage): string {
  switch (decoded.kind) {
    case "request":
      return stringify(
        summaryOf([
          ["kind", string("request")],
          ["id", dumpId(decoded.message.id)],
          ["method", string(decoded.message.method)],
        ]),
      );
    case "notification": {
      const fields: Array<readonly [string, Value]> = [
        ["kind", string("notification")],
        ["method", string(decoded.message.method)],
      ];
      const cancel = decodeCancelRequest(decoded.message);
      if (cancel) fields.push(["cancels", dumpId(cancel.id)]);
      return stringify(summaryOf(fields));
    }
    case "response": {
      const { id, error } = decoded.message;
      const fields: Array<readonly [string, Value]> = [
        ["kind", string("response")],
        ["id", dumpId(id)],
        ["outcome", string(error ? "error" : "result")],
      ];
      if (error) {
        fields.push(["code", number(error.code)], ["codeName", string(errorCodeName(error.code))]);
      }
      return stringify(summaryOf(fields));
    }
    case "invalid":
      return encodeMessage({ kind: "response", message: decoded.reply });
  }
}

export async function runDecode(file?: string): Promise<void> {
  const input = await readInput(file);
  const decoded = decodeMessage(input);
  log.debug({ kind: decoded.kind }, "decoded message");
  process.stdout.write(summarize(decoded) + "\n");
  if (decoded.kind === "invalid") {
    process.stderr.write(`${chalk.bold.red("ERROR")} ${decoded.reason}\n`);
    fail(EXIT.INVALID_INPUT);
    return;
  }
  process.stderr.write(`${chalk.bold.green("OK")} ${decoded.kind}\n`);
}
