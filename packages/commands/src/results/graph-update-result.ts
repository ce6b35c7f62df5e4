import type { GraphHash } from "@histograph/store-files";

/**
 * Result of a command that modifies the snapshot.
 */
export interface GraphUpdateResult {
  /** Root the snapshot points at after the command */
  graphHash: GraphHash;
  /** False when the graph already had the requested shape and nothing was saved */
  changed: boolean;
}
