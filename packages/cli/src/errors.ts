/**
 * Failure that ends a tool run with a message for the user and an exit code.
 */
export class ToolError extends Error {
  constructor(
    message: string,
    readonly exitCode = 1,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UsageError extends ToolError {}

export class InputUnavailableError extends ToolError {
  constructor(
    readonly path: string,
    options?: ErrorOptions
  ) {
    super(`Error: File '${path}' does not exist or is not readable.`, 1, options);
  }
}
