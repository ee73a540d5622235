import { randomUUID } from "node:crypto";
import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import type { Readable } from "node:stream";

import { StorageError } from "../errors/appError";
import { type ContentStore, originalKey } from "./contentStore";

/**
 * Filesystem store rooted at `rootDir`. Paths handed out are relative keys
 * ("originals/<id>.png"), never absolute, so records stay portable.
 */
export class LocalContentStore implements ContentStore {
  constructor(private readonly rootDir: string) {}

  private resolve(key: string): string {
    const full = path.resolve(this.rootDir, key);
    const root = path.resolve(this.rootDir);
    if (full !== root && !full.startsWith(root + path.sep)) {
      throw new StorageError(`Path escapes media root: ${key}`, { key });
    }
    return full;
  }

  store(bytes: Buffer, suggestedName: string): Promise<string> {
    return this.put(originalKey(suggestedName), bytes, "application/octet-stream");
  }

  async put(key: string, bytes: Buffer, _contentType: string): Promise<string> {
    const dest = this.resolve(key);
    const tmp = `${dest}.${randomUUID()}.part`;

    let tmpStarted = false;
    try {
      await fsp.mkdir(path.dirname(dest), { recursive: true });
      tmpStarted = true;
      await fsp.writeFile(tmp, bytes);
      await fsp.rename(tmp, dest);
      return key;
    } catch (err) {
      if (tmpStarted) {
        // best effort: the write error is the one reported
        await fsp.rm(tmp, { force: true }).catch(() => undefined);
      }
      throw new StorageError("Failed to save image", { key }, err);
    }
  }

  async read(key: string): Promise<Buffer> {
    try {
      return await fsp.readFile(this.resolve(key));
    } catch (err) {
      throw new StorageError(`Failed to read ${key}`, { key }, err);
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      const st = await fsp.stat(this.resolve(key));
      return st.isFile();
    } catch {
      return false;
    }
  }

  async open(key: string): Promise<Readable> {
    const full = this.resolve(key);
    if (!(await this.exists(key))) {
      throw new StorageError(`Not found: ${key}`, { key });
    }
    return fs.createReadStream(full);
  }

  async signedUrl(_key: string, _expiresInSec: number): Promise<string | null> {
    return null;
  }
}
