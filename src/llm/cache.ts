import crypto from "crypto";
import fs from "fs";
import path from "path";
import stringify from "fast-json-stable-stringify";

export interface CacheEntry<T> {
  key: string;
  value: T;
  createdAt: string;
}

// fs errors may belong to another realm, where `instanceof Error` is false
function errorCode(err: unknown): unknown {
  return typeof err === "object" && err !== null ? Reflect.get(err, "code") : undefined;
}

export function stableHash(input: unknown): string {
  const payload = typeof input === "string" ? input : stringify(input);
  return crypto.createHash("sha1").update(payload).digest("hex");
}

/**
 * One JSON file per key under `directory`. Keys are hashed from their parts
 * with a key-order-independent serializer, so equal requests share an entry.
 * Stored values are checked with `parse` on the way out. A missing entry
 * is a miss; an unreadable or rejected one throws.
 */
export class DiskCache<T> {
  constructor(
    private readonly directory: string,
    private readonly parse: (value: unknown) => T
  ) {}

  private resolvePath(key: string) {
    return path.join(this.directory, `${key}.json`);
  }

  async get(keyParts: unknown[]): Promise<T | undefined> {
    const file = this.resolvePath(stableHash(keyParts));
    let data: string;
    try {
      data = await fs.promises.readFile(file, "utf8");
    } catch (err) {
      if (errorCode(err) === "ENOENT") {
        return undefined;
      }
      throw err;
    }
    const entry: unknown = JSON.parse(data);
    if (typeof entry !== "object" || entry === null || !("value" in entry)) {
      return undefined;
    }
    return this.parse(entry.value);
  }

  async set(keyParts: unknown[], value: T) {
    const key = stableHash(keyParts);
    await fs.promises.mkdir(this.directory, { recursive: true });
    const entry: CacheEntry<T> = {
      key,
      value,
      createdAt: new Date().toISOString(),
    };
    await fs.promises.writeFile(this.resolvePath(key), stringify(entry), "utf8");
  }
}
