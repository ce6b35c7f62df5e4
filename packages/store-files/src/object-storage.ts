/**
 * Single-object and batch I/O for stored objects
 *
 * Hash-addressed objects live at `<base>/<kind>/<hex>`, named objects at
 * `<base>/<kind>/<name>`. Batches run all operations concurrently and
 * reject with the first failure; operations already in flight are not
 * cancelled and may still complete.
 */

import { readFile } from "@statewalker/webrun-files";
import { ObjectNotFoundError, StorageIoError } from "./errors.js";
import type { Hash } from "./hash/index.js";
import {
  type HashAddressedKind,
  HashVec,
  type NamedObjectKind,
  ObjectFile,
  type ObjectKind,
  hashPath,
  kindDirectory,
  namedPath,
} from "./objects/index.js";
import type { GraphStorageOptions, StorageLocation } from "./options.js";

/**
 * Create the directory of a kind if missing. Safe to race.
 */
export async function ensureKindDirectory<T>(
  location: StorageLocation,
  kind: ObjectKind<T>,
): Promise<void> {
  const dir = kindDirectory(location.basePath, kind);
  try {
    await location.files.mkdir(dir);
  } catch (error) {
    throw new StorageIoError(dir, `Cannot create directory ${dir}`, { cause: error });
  }
}

/**
 * Write an encoded object under its hash.
 *
 * The kind directory must exist. Writing content that is already stored
 * replaces the file with identical bytes.
 */
export async function writeObjectFile<T>(
  location: StorageLocation,
  file: ObjectFile<T, HashAddressedKind<T>>,
): Promise<Hash> {
  const path = hashPath(location.basePath, file.kind, file.hash);
  await writeContent(location, path, file.content);
  return file.hash;
}

/**
 * Encode, hash and write one object, creating its directory first.
 */
export async function writeObject<T>(
  location: StorageLocation,
  kind: HashAddressedKind<T>,
  value: T,
): Promise<Hash> {
  const file = ObjectFile.fromValue<T, HashAddressedKind<T>>(kind, value);
  await ensureKindDirectory(location, kind);
  return writeObjectFile(location, file);
}

/**
 * Write a batch of objects of one kind concurrently.
 *
 * All values are encoded before the first write, so an encoding failure
 * writes nothing. The returned HashVec keeps the order of `values`.
 */
export async function writeAllObjects<T>(
  location: StorageLocation,
  kind: HashAddressedKind<T>,
  values: Iterable<T>,
  options: GraphStorageOptions = {},
): Promise<HashVec<T>> {
  const { onProgress } = options;
  const files = Array.from(values, (value) =>
    ObjectFile.fromValue<T, HashAddressedKind<T>>(kind, value),
  );
  await ensureKindDirectory(location, kind);

  let current = 0;
  const hashes = await Promise.all(
    files.map(async (file) => {
      const hash = await writeObjectFile(location, file);
      onProgress?.({ stage: "write", kind: kind.name, current: ++current, total: files.length });
      return hash;
    }),
  );
  return new HashVec(kind, hashes);
}

/**
 * Write an object under a caller-chosen name, replacing earlier content.
 */
export async function writeNamedObject<T>(
  location: StorageLocation,
  kind: NamedObjectKind<T>,
  name: string,
  value: T,
): Promise<Hash> {
  const path = namedPath(location.basePath, kind, name);
  const file = ObjectFile.fromValue<T, NamedObjectKind<T>>(kind, value);
  await ensureKindDirectory(location, kind);
  await writeContent(location, path, file.content);
  return file.hash;
}

/**
 * Read the stored file of an object without decoding it.
 *
 * @throws ObjectNotFoundError if no object is stored under the hash
 * @throws HashMismatchError when `verifyHashes` is set and the content
 * does not hash to its address
 */
export async function readObjectFile<T>(
  location: StorageLocation,
  kind: HashAddressedKind<T>,
  hash: Hash,
  options: GraphStorageOptions = {},
): Promise<ObjectFile<T, HashAddressedKind<T>>> {
  const path = hashPath(location.basePath, kind, hash);
  const content = await readContent(location, path, kind.name, hash.toHex());
  const file = ObjectFile.fromContent<T, HashAddressedKind<T>>(kind, content, hash);
  return options.verifyHashes ? file.verify() : file;
}

/**
 * Read and decode one hash-addressed object.
 *
 * @throws ObjectNotFoundError if missing
 * @throws SerializationError if the content cannot be decoded
 */
export async function readObject<T>(
  location: StorageLocation,
  kind: HashAddressedKind<T>,
  hash: Hash,
  options: GraphStorageOptions = {},
): Promise<T> {
  const file = await readObjectFile(location, kind, hash, options);
  return file.decode();
}

/**
 * Read a batch of objects of one kind concurrently, in `hashes` order.
 */
export async function readAllObjects<T>(
  location: StorageLocation,
  kind: HashAddressedKind<T>,
  hashes: Iterable<Hash>,
  options: GraphStorageOptions = {},
): Promise<T[]> {
  const { onProgress } = options;
  const list = Array.from(hashes);

  let current = 0;
  return Promise.all(
    list.map(async (hash) => {
      const value = await readObject(location, kind, hash, options);
      onProgress?.({ stage: "read", kind: kind.name, current: ++current, total: list.length });
      return value;
    }),
  );
}

/**
 * Read and decode an object stored under a name.
 *
 * The address of a named object is not its hash, so there is nothing to
 * verify the content against.
 */
export async function readNamedObject<T>(
  location: StorageLocation,
  kind: NamedObjectKind<T>,
  name: string,
): Promise<T> {
  const path = namedPath(location.basePath, kind, name);
  const content = await readContent(location, path, kind.name, name);
  return ObjectFile.fromContent<T, NamedObjectKind<T>>(kind, content).decode();
}

export async function hasObject<T>(
  location: StorageLocation,
  kind: HashAddressedKind<T>,
  hash: Hash,
): Promise<boolean> {
  return isFile(location, hashPath(location.basePath, kind, hash));
}

export async function hasNamedObject<T>(
  location: StorageLocation,
  kind: NamedObjectKind<T>,
  name: string,
): Promise<boolean> {
  return isFile(location, namedPath(location.basePath, kind, name));
}

async function writeContent(
  location: StorageLocation,
  path: string,
  content: Uint8Array,
): Promise<void> {
  try {
    await location.files.write(path, [content]);
  } catch (error) {
    throw new StorageIoError(path, `Cannot write ${path}`, { cause: error });
  }
}

async function readContent(
  location: StorageLocation,
  path: string,
  kind: string,
  key: string,
): Promise<Uint8Array> {
  if (!(await isFile(location, path))) {
    throw new ObjectNotFoundError(kind, key, path);
  }
  try {
    return await readFile(location.files, path);
  } catch (error) {
    // Removed between the stats call and the read
    if (isNotFoundError(error)) {
      throw new ObjectNotFoundError(kind, key, path, { cause: error });
    }
    throw new StorageIoError(path, `Cannot read ${path}`, { cause: error });
  }
}

async function isFile(location: StorageLocation, path: string): Promise<boolean> {
  try {
    const stats = await location.files.stats(path);
    return stats?.kind === "file";
  } catch (error) {
    if (isNotFoundError(error)) {
      return false;
    }
    throw new StorageIoError(path, `Cannot stat ${path}`, { cause: error });
  }
}

/**
 * Check if error is a "not found" error
 */
function isNotFoundError(error: unknown): boolean {
  if (error && typeof error === "object" && "code" in error) {
    return error.code === "ENOENT";
  }
  return false;
}
