/**
 * Config file discovery and loading.
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { FeishuError } from "../api/errors.js";
import type { Logger } from "../core/logger.js";
import { ConfigSchema, resolveCredentials } from "./schema.js";
import type { Config, Credentials } from "./schema.js";

export const CONFIG_FILE_NAME = "feishu_config.json";

const PACKAGE_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..");

/**
 * Default lookup order: the working directory first, then the package itself.
 */
export function defaultConfigPaths(cwd: string = process.cwd()): string[] {
  return [
    path.resolve(cwd, "reference", CONFIG_FILE_NAME),
    path.join(PACKAGE_ROOT, "reference", CONFIG_FILE_NAME),
  ];
}

export interface LoadedConfig {
  config: Config;
  /** File the config came from, absent when none was found */
  path?: string;
  /** Paths that were searched */
  searched: string[];
}

export interface LoadConfigOptions {
  path?: string;
  cwd?: string;
  logger: Logger;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function warnIfExposed(filePath: string, logger: Logger): Promise<void> {
  if (process.platform === "win32") return;
  const stat = await fs.stat(filePath);
  if ((stat.mode & 0o077) !== 0) {
    logger.warn(
      `${filePath} is accessible by other users (mode ${(stat.mode & 0o777).toString(8)}); run chmod 600 on it`
    );
  }
}

async function readConfigFile(filePath: string, logger: Logger): Promise<Config> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    // ENOENT is left to the caller, which decides whether absence is an error
    if (isMissingFile(error)) throw error;
    throw new FeishuError("config_invalid", `${filePath} cannot be read`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new FeishuError("config_invalid", `${filePath} is not valid JSON`, { cause: error });
  }

  const result = ConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new FeishuError("config_invalid", `${filePath} is invalid: ${issues}`);
  }

  await warnIfExposed(filePath, logger);
  logger.debug(`loaded config from ${filePath}`);
  return result.data;
}

/**
 * Load the config file.
 * An explicit path must exist; otherwise the first default path that exists wins,
 * and finding none yields an empty config so the environment can supply credentials.
 */
export async function loadConfig(options: LoadConfigOptions): Promise<LoadedConfig> {
  const { logger } = options;

  if (options.path) {
    const filePath = path.resolve(options.cwd ?? process.cwd(), options.path);
    try {
      return { config: await readConfigFile(filePath, logger), path: filePath, searched: [filePath] };
    } catch (error) {
      if (isMissingFile(error)) {
        throw new FeishuError("config_missing", `config file not found: ${filePath}`);
      }
      throw error;
    }
  }

  const searched = defaultConfigPaths(options.cwd);
  for (const candidate of searched) {
    try {
      return { config: await readConfigFile(candidate, logger), path: candidate, searched };
    } catch (error) {
      if (!isMissingFile(error)) throw error;
    }
  }

  logger.debug("no config file found, falling back to environment variables");
  return { config: ConfigSchema.parse({}), searched };
}

/**
 * Resolve credentials or fail with a message naming where they were looked for.
 */
export function requireCredentials(
  loaded: LoadedConfig,
  env: NodeJS.ProcessEnv = process.env
): Credentials {
  const credentials = resolveCredentials(loaded.config, env);
  if (!credentials) {
    throw new FeishuError(
      "config_missing",
      `Feishu credentials not configured: set app_id and app_secret in one of ${loaded.searched.join(
        ", "
      )}, or FEISHU_APP_ID and FEISHU_APP_SECRET`
    );
  }
  return credentials;
}

/**
 * Resolve where the on-disk token cache lives, or null when it is disabled.
 */
export function resolveTokenCachePath(
  setting: boolean | string | undefined,
  appId: string,
  cwd: string = process.cwd()
): string | null {
  if (setting === undefined || setting === false) return null;
  if (typeof setting === "string") return path.resolve(cwd, setting);
  return path.join(os.homedir(), ".cache", "feishu-doc-reader", `token-${appId}.json`);
}
