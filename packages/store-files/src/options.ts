import type { FilesApi } from "@statewalker/webrun-files";

/**
 * Where objects live: a file system and the base directory inside it.
 *
 * Passed to every storage call; nothing is kept between calls.
 */
export interface StorageLocation {
  readonly files: FilesApi;
  readonly basePath: string;
}

/**
 * Progress notification fired after each object is written or read.
 */
export interface StorageProgress {
  stage: "write" | "read";
  /** Object kind name (subdirectory) */
  kind: string;
  /** Objects of this batch completed so far */
  current: number;
  /** Objects in this batch */
  total: number;
}

export interface GraphStorageOptions {
  /**
   * Re-hash the content of every hash-addressed read and fail with
   * HashMismatchError when it differs from the address. Default: false.
   */
  verifyHashes?: boolean;
  /**
   * Sort vertex and edge hash lists before writing them, so that graphs with
   * equal vertex and edge sets always produce the same GraphHash.
   * Default: false (enumeration order).
   */
  canonicalOrder?: boolean;
  onProgress?: (progress: StorageProgress) => void;
}
