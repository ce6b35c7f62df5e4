/**
 * Thrown when a value cannot be used as a vertex identity.
 */
export class InvalidVertexIdError extends Error {
  readonly value: unknown;

  constructor(value: unknown, message?: string) {
    super(message ?? `Invalid vertex id: ${String(value)}`);
    this.name = "InvalidVertexIdError";
    this.value = value;
  }
}
