import { joinPath } from "@statewalker/webrun-files";
import { InvalidSnapshotNameError, ObjectKindError } from "../errors.js";
import type { Hash } from "../hash/index.js";
import type { HashAddressedKind, NamedObjectKind, ObjectKind } from "./object-kinds.js";

const FORBIDDEN_NAME_CHARS = /[/\\\0]/;

/**
 * Check that a snapshot name is usable as a single file name.
 *
 * @throws InvalidSnapshotNameError otherwise
 */
export function validateSnapshotName(name: string): string {
  if (name.length === 0 || name === "." || name === ".." || FORBIDDEN_NAME_CHARS.test(name)) {
    throw new InvalidSnapshotNameError(name);
  }
  return name;
}

/**
 * Directory holding all files of a kind: `<base>/<kind>`
 */
export function kindDirectory<T>(basePath: string, kind: ObjectKind<T>): string {
  return joinPath(basePath, kind.name);
}

/**
 * Path of a hash-addressed object: `<base>/<kind>/<hex>`
 */
export function hashPath<T>(basePath: string, kind: HashAddressedKind<T>, hash: Hash): string {
  assertAddressing(kind, "hash");
  return joinPath(basePath, kind.name, hash.toHex());
}

/**
 * Path of a named object: `<base>/<kind>/<name>`
 */
export function namedPath<T>(basePath: string, kind: NamedObjectKind<T>, name: string): string {
  assertAddressing(kind, "named");
  return joinPath(basePath, kind.name, validateSnapshotName(name));
}

function assertAddressing<T>(kind: ObjectKind<T>, addressing: "hash" | "named"): void {
  if (kind.addressing !== addressing) {
    throw new ObjectKindError(
      `Object kind ${kind.name} is ${kind.addressing}-addressed, not ${addressing}-addressed`,
    );
  }
}
