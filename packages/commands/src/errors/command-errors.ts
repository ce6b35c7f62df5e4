import { GraphCommandError } from "./graph-command-error.js";

/**
 * Thrown when a required command argument is missing.
 */
export class MissingArgumentError extends GraphCommandError {
  readonly argumentName: string;

  constructor(argumentName: string, message?: string) {
    super(message ?? `Missing required argument: ${argumentName}`);
    this.name = "MissingArgumentError";
    this.argumentName = argumentName;
  }
}
