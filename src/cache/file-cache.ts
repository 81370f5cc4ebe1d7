import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { sha256Hex } from "../utils/hash";
import { CacheIoError, errorMessage } from "../utils/error";
import { logger } from "../utils/logger";
import type { CacheEntry, CacheStore } from "./types";

export interface FileCacheOptions {
  dir: string;
}

interface StoredEntry {
  key: string;
  storedAt: number;
  value: unknown;
}

const FANOUT_DIR = /^[0-9a-f]{2}$/;

/** Type guard for NodeJS.ErrnoException */
function isNodeError(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}

function isStoredEntry(parsed: unknown): parsed is StoredEntry {
  if (!parsed || typeof parsed !== "object") return false;
  return (
    "key" in parsed &&
    typeof parsed.key === "string" &&
    "storedAt" in parsed &&
    typeof parsed.storedAt === "number" &&
    Number.isFinite(parsed.storedAt) &&
    "value" in parsed
  );
}

/**
 * One JSON file per key, named by the SHA-256 of the key.
 *
 * The value type is not checked here; callers validate the shape of what
 * comes back and treat a mismatch as a miss.
 */
export class FileCache implements CacheStore<unknown> {
  private readonly dir: string;

  constructor(opts: FileCacheOptions) {
    this.dir = opts.dir;
  }

  get root(): string {
    return this.dir;
  }

  private filePathForKey(key: string): string {
    const h = sha256Hex(key);
    // Two-level fanout to avoid too many files in one directory
    return path.join(this.dir, h.slice(0, 2), `${h}.json`);
  }

  private async isSymlink(filePath: string): Promise<boolean> {
    try {
      const stat = await fs.lstat(filePath);
      return stat.isSymbolicLink();
    } catch {
      return false;
    }
  }

  async get(key: string): Promise<CacheEntry<unknown> | null> {
    const filePath = this.filePathForKey(key);
    try {
      if (await this.isSymlink(filePath)) {
        logger.warn(`Symlink detected at cache path, ignoring: ${filePath}`);
        return null;
      }

      const raw = await fs.readFile(filePath, "utf-8");
      const parsed: unknown = JSON.parse(raw);
      if (!isStoredEntry(parsed) || parsed.key !== key) {
        logger.warn(`Discarding malformed cache entry for ${key}`);
        await this.deleteCorruptedFile(filePath);
        return null;
      }
      return { value: parsed.value, storedAt: parsed.storedAt };
    } catch (e) {
      if (isNodeError(e) && e.code === "ENOENT") return null;
      logger.warn(`Cache read error for ${key}: ${errorMessage(e)}`);
      await this.deleteCorruptedFile(filePath);
      return null;
    }
  }

  private async deleteCorruptedFile(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath);
      logger.debug(`Deleted corrupted cache file: ${filePath}`);
    } catch (unlinkErr) {
      if (!isNodeError(unlinkErr) || unlinkErr.code !== "ENOENT") {
        logger.debug(`Failed to delete corrupted cache file: ${filePath}`);
      }
    }
  }

  async put(key: string, value: unknown, storedAt: number): Promise<void> {
    const filePath = this.filePathForKey(key);
    const dir = path.dirname(filePath);

    try {
      if (await this.isSymlink(dir)) {
        throw new Error(`Symlink detected at cache directory: ${dir}`);
      }
      await fs.mkdir(dir, { recursive: true, mode: 0o700 });
    } catch (e) {
      throw new CacheIoError(`Cannot prepare cache directory ${dir}: ${errorMessage(e)}`, key, { cause: e });
    }

    const entry: StoredEntry = { key, storedAt, value };

    // Write temp then rename so readers never see a half-written entry
    const randomSuffix = crypto.randomBytes(16).toString("hex");
    const tmp = `${filePath}.${process.pid}.${randomSuffix}.tmp`;
    try {
      await fs.writeFile(tmp, JSON.stringify(entry), { encoding: "utf-8", mode: 0o600 });
      await fs.rename(tmp, filePath);
    } catch (e) {
      try {
        await fs.unlink(tmp);
      } catch (cleanupErr) {
        logger.debug(`Failed to clean up temp file ${tmp}: ${errorMessage(cleanupErr)}`);
      }
      throw new CacheIoError(`Cache write failed for ${key}: ${errorMessage(e)}`, key, { cause: e });
    }
  }

  /**
   * Delete every entry, then the fan-out directories and the root itself.
   * Anything in the root that this cache did not write is left alone.
   */
  async clear(): Promise<void> {
    let subdirs: string[];
    try {
      subdirs = await fs.readdir(this.dir);
    } catch (e) {
      if (isNodeError(e) && e.code === "ENOENT") return;
      throw new CacheIoError(`Cannot read cache directory ${this.dir}: ${errorMessage(e)}`, "*", { cause: e });
    }

    let foreign = 0;
    for (const subdir of subdirs) {
      const subdirPath = path.join(this.dir, subdir);
      const stat = await fs.lstat(subdirPath);
      if (!FANOUT_DIR.test(subdir) || !stat.isDirectory() || stat.isSymbolicLink()) {
        foreign++;
        continue;
      }

      try {
        const files = await fs.readdir(subdirPath);
        for (const file of files) {
          if (file.endsWith(".json") || file.endsWith(".tmp")) {
            await fs.rm(path.join(subdirPath, file), { force: true });
          }
        }
        await fs.rmdir(subdirPath);
      } catch (e) {
        if (isNodeError(e) && e.code === "ENOTEMPTY") {
          foreign++;
          continue;
        }
        throw new CacheIoError(`Failed to clear ${subdirPath}: ${errorMessage(e)}`, "*", { cause: e });
      }
    }

    if (foreign > 0) {
      logger.warn(`Cache dir not empty after clear: ${this.dir}`);
      return;
    }
    try {
      await fs.rmdir(this.dir);
    } catch (e) {
      if (!isNodeError(e) || e.code !== "ENOENT") {
        throw new CacheIoError(`Failed to remove ${this.dir}: ${errorMessage(e)}`, "*", { cause: e });
      }
    }
  }
}
