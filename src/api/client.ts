/**
 * Feishu API client wrapper.
 * The Lark SDK client is the HTTP transport; token handling, envelope
 * unwrapping, re-authentication and retries live in ApiClient.
 */

import * as Lark from "@larksuiteoapi/node-sdk";
import axios from "axios";
import { setTimeout as delay } from "node:timers/promises";
import type { z } from "zod";
import type { Credentials, FeishuDomain } from "../config/schema.js";
import type { Logger } from "../core/logger.js";
import { silentLogger } from "../core/logger.js";
import type { ApiRequest, QueryParams, Transport } from "../types/index.js";
import { TokenManager } from "./auth.js";
import { FeishuError, TransportError, classifyVendorError, toFeishuError } from "./errors.js";
import { FileTokenStore } from "./token-store.js";

// ============================================================================
// Client Cache (Singleton Pattern)
// ============================================================================

interface CachedClient {
  client: Lark.Client;
  credentials: Credentials;
}

let cachedClient: CachedClient | null = null;

/**
 * Resolve Lark domain enum from config.
 */
function resolveDomain(domain: FeishuDomain): Lark.Domain {
  return domain === "lark" ? Lark.Domain.Lark : Lark.Domain.Feishu;
}

function describeLogArgs(args: unknown[]): string {
  return args
    .map((arg) => {
      if (typeof arg === "string") return arg;
      if (arg instanceof Error) return arg.message;
      return "[object]";
    })
    .join(" ");
}

/**
 * Create or retrieve the Lark SDK client.
 * The SDK's own token cache is disabled: tokens are supplied per request.
 * SDK log output is routed to debug, reduced to strings and error messages
 * so request payloads (which include the app secret) are never printed.
 */
export function getApiClient(credentials: Credentials, logger: Logger = silentLogger): Lark.Client {
  if (
    cachedClient &&
    cachedClient.credentials.appId === credentials.appId &&
    cachedClient.credentials.appSecret === credentials.appSecret &&
    cachedClient.credentials.domain === credentials.domain
  ) {
    return cachedClient.client;
  }

  const forward = (...args: unknown[]) => logger.debug(`sdk: ${describeLogArgs(args)}`);
  const client = new Lark.Client({
    appId: credentials.appId,
    appSecret: credentials.appSecret,
    appType: Lark.AppType.SelfBuild,
    domain: resolveDomain(credentials.domain),
    disableTokenCache: true,
    loggerLevel: Lark.LoggerLevel.error,
    logger: { error: forward, warn: forward, info: forward, debug: forward, trace: forward },
  });

  cachedClient = { client, credentials };
  return client;
}

/**
 * Clear the client cache.
 * Useful for testing or when credentials change.
 */
export function clearClientCache(): void {
  cachedClient = null;
}

// ============================================================================
// Transport
// ============================================================================

const RATE_LIMIT_RESET_HEADER = "x-ogw-ratelimit-reset";

function toTransportError(error: unknown): unknown {
  if (!axios.isAxiosError(error)) {
    return error;
  }
  const response = error.response;
  if (!response) {
    return new TransportError(error.message, { code: error.code });
  }
  const reset = Number(response.headers[RATE_LIMIT_RESET_HEADER]);
  return new TransportError(error.message, {
    status: response.status,
    body: response.data,
    code: error.code,
    retryAfterMs: Number.isFinite(reset) && reset > 0 ? reset * 1000 : undefined,
  });
}

/**
 * Transport backed by the Lark SDK client.
 */
export function createLarkTransport(client: Lark.Client): Transport {
  return async (request, tenantToken) => {
    try {
      const body: unknown = await client.request(
        {
          method: request.method,
          url: request.url,
          params: request.params,
          data: request.data,
        },
        tenantToken ? Lark.withTenantToken(tenantToken) : undefined
      );
      return body;
    } catch (error) {
      throw toTransportError(error);
    }
  };
}

// ============================================================================
// API Client
// ============================================================================

export interface ApiClientOptions {
  transport: Transport;
  tokens: TokenManager;
  /** Retries for rate-limited and transient network failures */
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_BASE_DELAY_MS = 500;
const DEFAULT_MAX_DELAY_MS = 8_000;

function describeRequest(request: ApiRequest): string {
  return `${request.method} ${request.url}`;
}

export class ApiClient {
  private readonly transport: Transport;
  private readonly tokens: TokenManager;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(options: ApiClientOptions) {
    this.transport = options.transport;
    this.tokens = options.tokens;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
    this.maxDelayMs = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Issue an authenticated request and return the validated `data` payload.
   *
   * A rejected token triggers exactly one re-authentication and replay.
   * Rate limits and transient network failures are retried with exponential
   * backoff; other vendor errors are thrown as they are.
   */
  async request<T>(request: ApiRequest, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    let attempt = 0;
    let reauthenticated = false;

    for (;;) {
      try {
        const token = await this.tokens.getToken();
        const body = await this.transport(request, token);
        return this.unwrap(request, body, schema);
      } catch (error) {
        const feishuError = toFeishuError(error);

        if (feishuError.tokenInvalid) {
          if (reauthenticated) {
            throw new FeishuError(
              "auth_failed",
              `access token rejected again after re-authentication (${describeRequest(request)})`,
              { code: feishuError.code, status: feishuError.status, cause: feishuError }
            );
          }
          reauthenticated = true;
          this.logger.info("access token rejected, re-authenticating");
          await this.tokens.invalidate();
          continue;
        }

        if (feishuError.retryable && attempt < this.maxRetries) {
          const wait = this.backoff(attempt, feishuError.retryAfterMs);
          attempt += 1;
          this.logger.warn(
            `${describeRequest(request)} failed (${feishuError.message}); retry ${attempt}/${this.maxRetries} in ${wait}ms`
          );
          await this.sleep(wait);
          continue;
        }

        throw feishuError;
      }
    }
  }

  /** GET convenience wrapper */
  get<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, params?: QueryParams): Promise<T> {
    return this.request({ method: "GET", url, params }, schema);
  }

  private backoff(attempt: number, retryAfterMs?: number): number {
    const exponential = Math.min(this.maxDelayMs, this.baseDelayMs * 2 ** attempt);
    return retryAfterMs !== undefined ? Math.max(exponential, retryAfterMs) : exponential;
  }

  private unwrap<T>(
    request: ApiRequest,
    body: unknown,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): T {
    if (typeof body !== "object" || body === null || !("code" in body) || typeof body.code !== "number") {
      throw new FeishuError(
        "malformed_response",
        `response to ${describeRequest(request)} is not an API envelope`
      );
    }

    if (body.code !== 0) {
      const msg = "msg" in body && typeof body.msg === "string" ? body.msg : undefined;
      throw classifyVendorError(body.code, msg);
    }

    const data = "data" in body && body.data !== undefined && body.data !== null ? body.data : {};
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? ` at ${issue.path.join(".") || "(root)"}: ${issue.message}` : "";
      throw new FeishuError(
        "malformed_response",
        `unexpected response from ${describeRequest(request)}${where}`
      );
    }
    return parsed.data;
  }
}

// ============================================================================
// Factory
// ============================================================================

export interface CreateApiClientOptions {
  credentials: Credentials;
  logger?: Logger;
  /** On-disk token cache location; null or absent keeps tokens in memory only */
  tokenCachePath?: string | null;
  maxRetries?: number;
  /** Replaces the Lark SDK transport */
  transport?: Transport;
}

/**
 * Wire a transport, token manager and API client for one set of credentials.
 */
export function createApiClient(options: CreateApiClientOptions): ApiClient {
  const logger = options.logger ?? silentLogger;
  const transport =
    options.transport ?? createLarkTransport(getApiClient(options.credentials, logger));
  const store = options.tokenCachePath
    ? new FileTokenStore(options.tokenCachePath, logger)
    : undefined;
  const tokens = new TokenManager({ credentials: options.credentials, transport, store, logger });

  return new ApiClient({ transport, tokens, maxRetries: options.maxRetries, logger });
}
