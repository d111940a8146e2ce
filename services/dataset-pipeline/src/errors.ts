export type PipelineErrorCode =
  | "directory_not_found"
  | "not_a_directory"
  | "output_write_failed"
  | "invalid_usage";

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.code = code;
  }
}

export class DirectoryNotFoundError extends PipelineError {
  readonly directory: string;

  constructor(directory: string, code: "directory_not_found" | "not_a_directory" = "directory_not_found") {
    super(
      code,
      code === "not_a_directory"
        ? `Path is not a directory: ${directory}`
        : `Directory does not exist: ${directory}`,
    );
    this.name = "DirectoryNotFoundError";
    this.directory = directory;
  }
}

export class OutputWriteError extends PipelineError {
  readonly outputFile: string;

  constructor(outputFile: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("output_write_failed", `Error writing output file ${outputFile}: ${reason}`, { cause });
    this.name = "OutputWriteError";
    this.outputFile = outputFile;
  }
}

export class UsageError extends PipelineError {
  readonly usage: string;

  constructor(usage: string) {
    super("invalid_usage", usage);
    this.name = "UsageError";
    this.usage = usage;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
