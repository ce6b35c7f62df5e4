import type { GraphStorageOptions, StorageLocation } from "@histograph/store-files";
import type { FilesApi } from "@statewalker/webrun-files";

/** Snapshot name used when none is configured. */
export const DEFAULT_SNAPSHOT_NAME = "current";

export interface GraphRepositoryConfig {
  files: FilesApi;
  /** Directory holding the object store */
  basePath: string;
  /** Snapshot the commands read and write. Default: "current" */
  snapshotName?: string;
  /** Options passed to every save and load */
  storage?: GraphStorageOptions;
}

/**
 * Everything a command needs to reach its snapshot.
 */
export interface SnapshotContext {
  readonly location: StorageLocation;
  readonly snapshotName: string;
  readonly storage: GraphStorageOptions;
}
