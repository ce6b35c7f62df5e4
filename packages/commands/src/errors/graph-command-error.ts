/**
 * Base class for errors raised by graph commands.
 */
export class GraphCommandError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "GraphCommandError";
  }
}
