/**
 * On-disk persistence for tenant access tokens, so consecutive invocations
 * can skip the token exchange.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { Logger } from "../core/logger.js";
import type { CachedToken } from "../types/index.js";

export interface TokenStore {
  load(appId: string): Promise<CachedToken | null>;
  save(token: CachedToken): Promise<void>;
  clear(): Promise<void>;
}

const CachedTokenSchema = z.object({
  appId: z.string(),
  token: z.string().min(1),
  expiresAt: z.number(),
});

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Token cache in a JSON file. Filesystem failures are logged as warnings and
 * otherwise ignored.
 */
export class FileTokenStore implements TokenStore {
  constructor(
    private readonly filePath: string,
    private readonly logger: Logger
  ) {}

  async load(appId: string): Promise<CachedToken | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if (!isMissingFile(error)) {
        this.logger.warn(`ignoring token cache ${this.filePath}: ${describeError(error)}`);
      }
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.logger.warn(`ignoring unreadable token cache ${this.filePath}`);
      return null;
    }

    const result = CachedTokenSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn(`ignoring malformed token cache ${this.filePath}`);
      return null;
    }
    // A cache written for another app is never reused
    return result.data.appId === appId ? result.data : null;
  }

  async save(token: CachedToken): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true, mode: 0o700 });
      await fs.writeFile(this.filePath, JSON.stringify(token), { encoding: "utf8", mode: 0o600 });
      // writeFile only applies mode on creation
      await fs.chmod(this.filePath, 0o600);
    } catch (error) {
      this.logger.warn(`cannot write token cache ${this.filePath}: ${describeError(error)}`);
    }
  }

  async clear(): Promise<void> {
    try {
      await fs.rm(this.filePath, { force: true });
    } catch (error) {
      this.logger.warn(`cannot remove token cache ${this.filePath}: ${describeError(error)}`);
    }
  }
}
