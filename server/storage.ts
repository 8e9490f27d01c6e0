import { randomUUID } from "crypto";
import { mkdir, readFile, rename, rm, stat, writeFile } from "fs/promises";
import path from "path";
import { createLogger } from "./logger";

const log = createLogger("storage");

/**
 * Key/value storage for uploads, previews and persisted results.
 * Keys are slash-separated relative paths such as "previews/abc_p0_150.png".
 */
export interface BlobStorage {
  put(key: string, data: Buffer): Promise<void>;
  get(key: string): Promise<Buffer | undefined>;
  exists(key: string): Promise<boolean>;
}

export class MemBlobStorage implements BlobStorage {
  private blobs: Map<string, Buffer>;

  constructor() {
    this.blobs = new Map();
  }

  async put(key: string, data: Buffer): Promise<void> {
    this.blobs.set(key, Buffer.from(data));
  }

  async get(key: string): Promise<Buffer | undefined> {
    const blob = this.blobs.get(key);
    return blob ? Buffer.from(blob) : undefined;
  }

  async exists(key: string): Promise<boolean> {
    return this.blobs.has(key);
  }

  get size(): number {
    return this.blobs.size;
  }
}

/**
 * Filesystem storage rooted at a directory.
 *
 * Writes go to a uniquely named temp file beside the target and are renamed
 * into place, so a reader sees either no file or the complete file.
 */
export class FileBlobStorage implements BlobStorage {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  async put(key: string, data: Buffer): Promise<void> {
    const target = this.resolve(key);
    const temp = `${target}.${randomUUID()}.tmp`;

    await mkdir(path.dirname(target), { recursive: true });
    try {
      await writeFile(temp, data);
      await rename(temp, target);
    } catch (error) {
      await rm(temp, { force: true });
      throw error;
    }

    log.debug("Stored blob", { key, size: data.length });
  }

  async get(key: string): Promise<Buffer | undefined> {
    try {
      return await readFile(this.resolve(key));
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw error;
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      const info = await stat(this.resolve(key));
      return info.isFile();
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  private resolve(key: string): string {
    const resolved = path.resolve(this.root, key);
    if (!resolved.startsWith(this.root + path.sep)) {
      throw new Error(`Storage key escapes the storage root: ${key}`);
    }
    return resolved;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
