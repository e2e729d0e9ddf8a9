import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { DecodeError, IOError } from "../domain/models/errors";
import {
  createEmptyStore,
  decodeStoreText,
  serializeStore,
  type BookmarkStore
} from "../domain/services/store-codec";

export type LoadStoreResult =
  | { status: "loaded" | "created"; store: BookmarkStore }
  | { status: "declined" };

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Writes the whole store to a temporary sibling and renames it over `path`,
 * so a failed write never leaves a half-written store behind.
 */
export async function saveStore(path: string, store: BookmarkStore): Promise<void> {
  const tmpPath = `${path}.${randomUUID().slice(0, 8)}.tmp`;

  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(tmpPath, serializeStore(store), "utf-8");
    await rename(tmpPath, path);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw new IOError(`Could not write '${path}'`, { cause: error });
  }
}

/**
 * Reads and decodes the store at `path`. When the file does not exist yet the
 * user is asked whether an empty store should be created there.
 */
export async function loadStore(
  path: string,
  confirm: (question: string) => Promise<boolean>
): Promise<LoadStoreResult> {
  let text: string;

  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    if (!isMissingFileError(error)) {
      throw new IOError(`Could not read '${path}'`, { cause: error });
    }

    if (!(await confirm(`Could not find '${path}'. Create a new store?`))) {
      return { status: "declined" };
    }

    const store = createEmptyStore();
    await saveStore(path, store);
    return { status: "created", store };
  }

  try {
    return { status: "loaded", store: decodeStoreText(text) };
  } catch (error) {
    if (error instanceof DecodeError) {
      throw new DecodeError(`${path}: ${error.message}`, { cause: error });
    }
    throw error;
  }
}
