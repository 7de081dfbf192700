import { Command, InvalidArgumentError } from "commander";
import { createRequire } from "node:module";
import type { OvercallConfig } from "./types.js";

const require = createRequire(import.meta.url);
const { version } = require("../../package.json") as { version: string };

const DEFAULT_MANIFEST = "./commands.json";
const DEFAULT_CALLER = "ConsoleCaller";

const parseTypeName = (value: string): string => {
  const trimmed = value.trim();
  if (trimmed.length === 0 || /\s/.test(trimmed)) {
    throw new InvalidArgumentError(`invalid caller type "${value}"`);
  }
  return trimmed;
};

const createBaseCommand = ({
  name,
  description,
}: {
  name: string;
  description: string;
}): Command =>
  new Command()
    .name(name)
    .description(description)
    .version(version, "-v, --version", "display the current version")
    .helpOption("-h, --help", "display help for command");

const parseMainConfig = (argv: readonly string[]): OvercallConfig => {
  const program = createBaseCommand({
    name: "overcall",
    description: "Resolve a command invocation against a command manifest",
  });

  program
    .argument("<callee>", "command name or alias to invoke")
    .argument("[args...]", "arguments passed to the command as raw tokens")
    .option("--manifest <path>", "command manifest to load", DEFAULT_MANIFEST)
    .option("--caller <type>", "type of the calling identity", parseTypeName, DEFAULT_CALLER)
    .option("--json", "print the resolved call as JSON")
    .option("--no-color", "disable colored diagnostics")
    .passThroughOptions()
    .addHelpText(
      "after",
      [
        "",
        "Example:",
        "  overcall --manifest ./commands.json foo add 5",
      ].join("\n"),
    );

  program.parse(["node", "overcall", ...argv]);
  const opts = program.opts<{
    manifest: string;
    caller: string;
    json?: boolean;
    color: boolean;
  }>();
  const [callee = "", args = []] = program.processedArgs as [string?, string[]?];

  return {
    manifest: opts.manifest,
    caller: opts.caller,
    callee,
    args,
    json: Boolean(opts.json),
    color: opts.color,
  };
};

export const getConfigFromCli = (): OvercallConfig =>
  parseMainConfig(process.argv.slice(2));
