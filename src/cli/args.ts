import { InputError } from "../core/errors.js";

const USAGE = "Usage: bw-assist <test-cases|analyze> <file> [--model <id>]";

interface CliArgs {
  command: "test-cases" | "analyze";
  file: string;
  model?: string;
}

export function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  let model: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--model") {
      model = argv[++i];
      if (!model) throw new InputError("--model needs a value");
    } else {
      positional.push(arg);
    }
  }

  const [command, file] = positional;
  if ((command !== "test-cases" && command !== "analyze") || !file) {
    throw new InputError(USAGE);
  }
  return { command, file, model };
}
