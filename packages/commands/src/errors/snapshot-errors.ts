import { GraphCommandError } from "./graph-command-error.js";

/**
 * Thrown when a command needs a snapshot that was never initialised.
 */
export class NoSnapshotError extends GraphCommandError {
  readonly snapshotName: string;

  constructor(snapshotName: string, options?: ErrorOptions) {
    super(`Snapshot not initialised: ${snapshotName}`, options);
    this.name = "NoSnapshotError";
    this.snapshotName = snapshotName;
  }
}

/**
 * Thrown by init when the snapshot already exists and force is not set.
 */
export class SnapshotAlreadyExistsError extends GraphCommandError {
  readonly snapshotName: string;

  constructor(snapshotName: string) {
    super(`Snapshot already exists: ${snapshotName}`);
    this.name = "SnapshotAlreadyExistsError";
    this.snapshotName = snapshotName;
  }
}
