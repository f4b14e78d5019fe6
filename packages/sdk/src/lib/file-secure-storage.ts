import { promises as fs, existsSync, mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

import { CardSdkError } from "@cardkit/shared";

import type { SecureStorage } from "./secure-storage.js";

export const DEFAULT_STORAGE_DIR = join(homedir(), ".cardkit", "storage");

function errnoCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * A secure storage implementation that uses the Node.js filesystem.
 * It stores each key as a separate owner-only file in a directory.
 */
export class FileSecureStorage implements SecureStorage {
  private readonly dir: string;

  constructor(dir: string = DEFAULT_STORAGE_DIR) {
    this.dir = dir;
    this.ensureDir();
  }

  private ensureDir(): void {
    if (!existsSync(this.dir)) {
      mkdirSync(this.dir, { recursive: true, mode: 0o700 });
    }
  }

  private pathFor(key: string): string {
    if (key.length === 0 || key.includes("..") || key.includes("/") || key.includes("\\")) {
      throw new CardSdkError("invalidParams", `Invalid storage key: ${key}`);
    }
    return join(this.dir, key);
  }

  async get(key: string): Promise<Uint8Array | null> {
    try {
      return new Uint8Array(await fs.readFile(this.pathFor(key)));
    } catch (error) {
      if (errnoCode(error) === "ENOENT") {
        return null;
      }
      throw error;
    }
  }

  async set(key: string, data: Uint8Array): Promise<void> {
    await fs.writeFile(this.pathFor(key), data, { mode: 0o600 });
  }

  async delete(key: string): Promise<void> {
    await fs.rm(this.pathFor(key), { force: true });
  }
}
