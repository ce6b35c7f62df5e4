import type { FilesApi } from "@statewalker/webrun-files";
import { NodeFilesApi } from "@statewalker/webrun-files-node";

/**
 * Create a FilesApi backed by the real filesystem.
 *
 * @param rootDir Directory that absolute paths are resolved against;
 * the filesystem root when omitted
 */
export function createNodeFilesApi(rootDir = "/"): FilesApi {
  return new NodeFilesApi({ rootDir });
}
