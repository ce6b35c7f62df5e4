/**
 * Base error for all graph storage failures.
 */
export class GraphStorageError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "GraphStorageError";
  }
}

/**
 * Thrown when a filesystem operation fails (permissions, disk full, ...).
 *
 * The original error is available as `cause`.
 */
export class StorageIoError extends GraphStorageError {
  readonly path: string;

  constructor(path: string, message?: string, options?: ErrorOptions) {
    super(message ?? `I/O error on ${path}`, options);
    this.name = "StorageIoError";
    this.path = path;
  }
}

/**
 * Thrown when a hash-addressed object or a named snapshot does not exist.
 */
export class ObjectNotFoundError extends StorageIoError {
  readonly kind: string;
  readonly key: string;

  constructor(kind: string, key: string, path: string, options?: ErrorOptions) {
    super(path, `Object not found: ${kind}/${key}`, options);
    this.name = "ObjectNotFoundError";
    this.kind = kind;
    this.key = key;
  }
}

/**
 * Thrown when stored bytes cannot be decoded (corrupt, truncated or of
 * another kind), or when a value cannot be encoded.
 */
export class SerializationError extends GraphStorageError {
  readonly kind: string;

  constructor(kind: string, message: string, options?: ErrorOptions) {
    super(`Cannot serialize ${kind}: ${message}`, options);
    this.name = "SerializationError";
    this.kind = kind;
  }
}

/**
 * Thrown by verified reads when content does not hash to its address.
 */
export class HashMismatchError extends SerializationError {
  readonly expected: string;
  readonly actual: string;

  constructor(kind: string, expected: string, actual: string) {
    super(kind, `content hash ${actual} does not match address ${expected}`);
    this.name = "HashMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Thrown when text or bytes cannot be parsed as a hash.
 */
export class InvalidHashError extends GraphStorageError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidHashError";
  }
}

/**
 * Thrown when a snapshot name cannot be used as a file name.
 */
export class InvalidSnapshotNameError extends GraphStorageError {
  readonly snapshotName: string;

  constructor(snapshotName: string) {
    super(`Invalid snapshot name: ${JSON.stringify(snapshotName)}`);
    this.name = "InvalidSnapshotNameError";
    this.snapshotName = snapshotName;
  }
}

/**
 * Thrown on object kind registry misuse: duplicate or unknown kind names.
 */
export class ObjectKindError extends GraphStorageError {
  constructor(message: string) {
    super(message);
    this.name = "ObjectKindError";
  }
}
