import { PipelineError, UsageError } from "./errors.js";

export type ToolArgs = {
  inputPath: string;
  outputPath: string;
};

export type ToolArgsOptions = {
  usage: string;
  /** When omitted the second positional argument is required. */
  defaultOutput?: string;
};

export function parseToolArgs(argv: string[], options: ToolArgsOptions): ToolArgs {
  const positionals: string[] = [];
  let output: string | undefined;

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index] ?? "";
    if (token === "-h" || token === "--help") {
      throw new UsageError(options.usage);
    }
    if (token === "-o" || token === "--output") {
      output = argv[index + 1];
      if (!output) {
        throw new UsageError(options.usage);
      }
      index += 1;
      continue;
    }
    if (token.startsWith("--output=")) {
      output = token.slice("--output=".length);
      continue;
    }
    positionals.push(token);
  }

  const [inputPath, positionalOutput, ...rest] = positionals;
  if (!inputPath || rest.length > 0 || (output && positionalOutput)) {
    throw new UsageError(options.usage);
  }

  const outputPath = output ?? positionalOutput ?? options.defaultOutput;
  if (!outputPath) {
    throw new UsageError(options.usage);
  }

  return { inputPath, outputPath };
}

/** Exit path shared by the command-line tools: usage to stderr, status 1. */
export function exitWithError(error: unknown): never {
  if (error instanceof UsageError) {
    process.stderr.write(`${error.usage}\n`);
  } else if (error instanceof PipelineError) {
    process.stderr.write(`Error: ${error.message}\n`);
  } else {
    const message = error instanceof Error ? error.stack ?? error.message : String(error);
    process.stderr.write(`${message}\n`);
  }
  process.exit(1);
}
