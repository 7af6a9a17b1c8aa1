import { ConfigError } from "../core/errors/index.js";

export interface CliArgs {
  config?: string;
  input?: string;
  output?: string;
  format?: string;
  model?: string;
  backend?: string;
  entities?: string;
  verbose: boolean;
  help: boolean;
}

const VALUE_FLAGS = ["config", "input", "output", "format", "model", "backend", "entities"] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(name: string): name is ValueFlag {
  return (VALUE_FLAGS as readonly string[]).includes(name);
}

export const USAGE = `Usage: codescribe [options]

Options:
  --config <path>     Configuration file (default: config/config.yaml)
  --input <dir>       Source directory to document
  --output <dir>      Directory the documents are written to
  --format <format>   markdown | html
  --model <path>      Model file (GGUF)
  --backend <type>    llama | mistral | mock
  --entities <file>   Document the entities in a JSON file and print the results
  --verbose           Debug logging
  --help              Show this message`;

/** Accepts `--flag value` and `--flag=value`. */
export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { verbose: false, help: false };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i] ?? "";
    if (!token.startsWith("--")) {
      throw new ConfigError(`Unexpected argument: ${token}`);
    }

    const [rawName = "", inlineValue] = token.slice(2).split(/=(.*)/s, 2);
    if (rawName === "verbose") {
      args.verbose = true;
      continue;
    }
    if (rawName === "help") {
      args.help = true;
      continue;
    }
    if (!isValueFlag(rawName)) {
      throw new ConfigError(`Unknown option: --${rawName}`);
    }

    const value = inlineValue ?? argv[i + 1];
    if (value === undefined || (inlineValue === undefined && value.startsWith("--"))) {
      throw new ConfigError(`Option --${rawName} needs a value`);
    }
    if (inlineValue === undefined) i += 1;
    args[rawName] = value;
  }

  return args;
}
