import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";

import { StorageCorruptError } from "../lib/errors.js";
import { decodeSnapshot, encodeSnapshot } from "./snapshot-codec.js";
import type { SnapshotBackend } from "./snapshot-store.js";
import { emptySnapshot, type StoreSnapshot } from "./types.js";

export class FileSnapshotBackend implements SnapshotBackend {
  readonly location: string;

  constructor(filePath: string) {
    this.location = path.resolve(filePath);
  }

  async load(): Promise<StoreSnapshot> {
    let raw: string;
    try {
      raw = await readFile(this.location, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        const initial = emptySnapshot();
        await this.save(initial);
        return initial;
      }
      throw new StorageCorruptError(this.location, "document could not be read", error);
    }

    return decodeSnapshot(raw, this.location);
  }

  async save(snapshot: StoreSnapshot): Promise<void> {
    await mkdir(path.dirname(this.location), { recursive: true });
    const tempPath = `${this.location}.${process.pid}.tmp`;
    await writeFile(tempPath, encodeSnapshot(snapshot), "utf8");
    await rename(tempPath, this.location);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
