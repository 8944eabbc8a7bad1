import { Command } from "commander";
import { initLogger } from "../shared/logging.js";
import { runDecode } from "./commands/decode.js";
import { runFormat } from "./commands/format.js";
import { resolveGlobalOptions, type RawGlobalOptions } from "./options.js";
import { getPackageJsonVersion } from "./utils.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("lsp-wire")
    .description("lsp-wire: strict JSON and JSON-RPC base protocol tooling for language servers")
    .version(getPackageJsonVersion())
    .option("-v, --verbose", "Verbose logging")
    .option("--log-level <level>", "Log level: error, warn, info, debug")
    .option("--log-format <format>", "Log format: text, json or plain")
    .hook("preAction", (thisCommand) => {
      const opts = resolveGlobalOptions(thisCommand.opts<RawGlobalOptions>());
      initLogger(opts.logLevel, opts.logFormat);
    });

  program
    .command("format")
    .description("Parse JSON and print it in compact form")
    .argument("[file]", "Input file (default: stdin)")
    .action((file: string | undefined) => runFormat(file));

  program
    .command("decode")
    .description("Classify and validate one JSON-RPC message")
    .argument("[file]", "Input file (default: stdin)")
    .action((file: string | undefined) => runDecode(file));

  return program;
}
