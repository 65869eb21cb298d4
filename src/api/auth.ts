/**
 * Tenant access token lifecycle: exchange, in-memory and optional on-disk
 * caching, and invalidation after the API rejects a token.
 */

import { z } from "zod";
import type { Credentials } from "../config/schema.js";
import type { Logger } from "../core/logger.js";
import { silentLogger } from "../core/logger.js";
import type { CachedToken, Transport } from "../types/index.js";
import { FeishuError, toFeishuError } from "./errors.js";
import type { TokenStore } from "./token-store.js";

export const TENANT_TOKEN_URL = "/open-apis/auth/v3/tenant_access_token/internal";

/** Tokens this close to expiry are refreshed instead of used */
export const REFRESH_MARGIN_MS = 60_000;

/** Vendor contract: tenant tokens live for two hours */
const DEFAULT_EXPIRE_SECONDS = 7200;

const TokenResponseSchema = z.object({
  code: z.number(),
  msg: z.string().optional(),
  tenant_access_token: z.string().optional(),
  expire: z.number().optional(),
});

export interface TokenManagerOptions {
  credentials: Credentials;
  transport: Transport;
  store?: TokenStore;
  now?: () => number;
  logger?: Logger;
}

export class TokenManager {
  private readonly credentials: Credentials;
  private readonly transport: Transport;
  private readonly store?: TokenStore;
  private readonly now: () => number;
  private readonly logger: Logger;
  private cached: CachedToken | null = null;

  constructor(options: TokenManagerOptions) {
    this.credentials = options.credentials;
    this.transport = options.transport;
    this.store = options.store;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  private isUsable(token: CachedToken | null): token is CachedToken {
    return token !== null && token.expiresAt - this.now() > REFRESH_MARGIN_MS;
  }

  /**
   * Return a valid tenant access token, exchanging credentials only when
   * neither the memory nor the disk cache holds a usable one.
   */
  async getToken(): Promise<string> {
    if (this.isUsable(this.cached)) {
      return this.cached.token;
    }

    if (this.store) {
      const stored = await this.store.load(this.credentials.appId);
      if (this.isUsable(stored)) {
        this.logger.debug("using tenant access token from disk cache");
        this.cached = stored;
        return stored.token;
      }
    }

    const fresh = await this.fetchToken();
    this.cached = fresh;
    if (this.store) {
      await this.store.save(fresh);
    }
    return fresh.token;
  }

  /**
   * Forget the current token, in memory and on disk.
   */
  async invalidate(): Promise<void> {
    this.cached = null;
    if (this.store) {
      await this.store.clear();
    }
  }

  private async fetchToken(): Promise<CachedToken> {
    let body: unknown;
    try {
      body = await this.transport({
        method: "POST",
        url: TENANT_TOKEN_URL,
        data: {
          app_id: this.credentials.appId,
          app_secret: this.credentials.appSecret,
        },
      });
    } catch (error) {
      const feishuError = toFeishuError(error);
      // Transient failures propagate so the request layer can retry them
      if (feishuError.retryable) throw feishuError;
      throw new FeishuError(
        "auth_failed",
        `failed to obtain tenant access token: ${feishuError.message}`,
        { code: feishuError.code, status: feishuError.status, cause: feishuError }
      );
    }

    const parsed = TokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new FeishuError("malformed_response", "unexpected tenant access token response");
    }

    const { code, msg, tenant_access_token: token, expire } = parsed.data;
    if (code !== 0) {
      throw new FeishuError(
        "auth_failed",
        `failed to obtain tenant access token: ${msg ?? "unknown error"}`,
        { code }
      );
    }
    if (!token) {
      throw new FeishuError("malformed_response", "tenant access token missing from response");
    }

    this.logger.info("obtained tenant access token");
    return {
      appId: this.credentials.appId,
      token,
      expiresAt: this.now() + (expire ?? DEFAULT_EXPIRE_SECONDS) * 1000,
    };
  }
}
