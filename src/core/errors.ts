/**
 * Error thrown when a run configuration fails validation.
 * Each entry of `issues` names the offending field and what is wrong with it.
 */
export class ConfigError extends Error {
  constructor(
    public readonly configName: string,
    public readonly issues: string[]
  ) {
    super(`Invalid ${configName} configuration:\n${issues.join("\n")}`);
    this.name = "ConfigError";
  }
}

/**
 * Error thrown when an image or animation cannot be encoded or persisted.
 * Fatal to the run; nothing is retried.
 */
export class OutputError extends Error {
  constructor(
    message: string,
    public readonly target: string | null = null,
    options?: ErrorOptions
  ) {
    super(target ? `${message} (${target})` : message, options);
    this.name = "OutputError";
  }
}

/** Message of an unknown thrown value */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Error thrown for malformed command-line arguments
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}
