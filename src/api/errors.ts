/**
 * Error taxonomy for Feishu API access.
 * Every failure the reader can surface is a FeishuError with a kind,
 * the vendor error code when one exists, and an HTTP status when one exists.
 */

// ============================================================================
// Kinds
// ============================================================================

export type FeishuErrorKind =
  | "type_unresolved"
  | "config_missing"
  | "config_invalid"
  | "auth_failed"
  | "not_found"
  | "permission_denied"
  | "rate_limited"
  | "network"
  | "malformed_response"
  | "api_error";

/** Process exit code per error kind */
export const EXIT_CODES: Record<FeishuErrorKind, number> = {
  api_error: 1,
  type_unresolved: 2,
  config_missing: 3,
  config_invalid: 3,
  auth_failed: 4,
  not_found: 5,
  permission_denied: 6,
  rate_limited: 7,
  network: 8,
  malformed_response: 9,
};

const RETRYABLE_KINDS: ReadonlySet<FeishuErrorKind> = new Set(["rate_limited", "network"]);

// ============================================================================
// Vendor Codes
// ============================================================================

/** Tenant token missing, invalid or expired */
export const TOKEN_INVALID_CODES: ReadonlySet<number> = new Set([
  99991661, 99991663, 99991664, 99991665, 99991668,
]);

export const PERMISSION_CODES: ReadonlySet<number> = new Set([
  1770032, 91403, 1254302, 131006, 99991672, 99991679,
]);

export const NOT_FOUND_CODES: ReadonlySet<number> = new Set([1770002, 91402, 1254040, 131005]);

export const RATE_LIMIT_CODES: ReadonlySet<number> = new Set([99991400]);

// ============================================================================
// Error Classes
// ============================================================================

export interface FeishuErrorOptions {
  code?: number;
  status?: number;
  tokenInvalid?: boolean;
  retryAfterMs?: number;
  cause?: unknown;
}

export class FeishuError extends Error {
  readonly kind: FeishuErrorKind;
  readonly code?: number;
  readonly status?: number;
  readonly tokenInvalid: boolean;
  readonly retryAfterMs?: number;

  constructor(kind: FeishuErrorKind, message: string, options: FeishuErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "FeishuError";
    this.kind = kind;
    this.code = options.code;
    this.status = options.status;
    this.tokenInvalid = options.tokenInvalid ?? false;
    this.retryAfterMs = options.retryAfterMs;
  }

  get retryable(): boolean {
    return RETRYABLE_KINDS.has(this.kind);
  }

  get exitCode(): number {
    return EXIT_CODES[this.kind];
  }
}

/**
 * Failure raised by a transport before the vendor envelope could be read:
 * an HTTP error status, or no response at all.
 */
export class TransportError extends Error {
  readonly status?: number;
  readonly body?: unknown;
  /** Low-level error code such as ECONNRESET or ETIMEDOUT */
  readonly code?: string;
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    details: { status?: number; body?: unknown; code?: string; retryAfterMs?: number } = {}
  ) {
    super(message);
    this.name = "TransportError";
    this.status = details.status;
    this.body = details.body;
    this.code = details.code;
    this.retryAfterMs = details.retryAfterMs;
  }
}

// ============================================================================
// Classification
// ============================================================================

/**
 * Map a vendor error code (and HTTP status, when known) to an error.
 */
export function classifyVendorError(
  code: number | undefined,
  msg: string | undefined,
  status?: number
): FeishuError {
  const detail = msg?.trim() || (status ? `HTTP ${status}` : "unknown error");
  const options = { code, status };

  if ((code !== undefined && TOKEN_INVALID_CODES.has(code)) || status === 401) {
    return new FeishuError("auth_failed", `access token rejected: ${detail}`, {
      ...options,
      tokenInvalid: true,
    });
  }
  if ((code !== undefined && RATE_LIMIT_CODES.has(code)) || status === 429) {
    return new FeishuError("rate_limited", `rate limited: ${detail}`, options);
  }
  if ((code !== undefined && PERMISSION_CODES.has(code)) || status === 403) {
    return new FeishuError(
      "permission_denied",
      `permission denied: ${detail}. Check the app's scopes and that the document is shared with the app`,
      options
    );
  }
  if ((code !== undefined && NOT_FOUND_CODES.has(code)) || status === 404) {
    return new FeishuError("not_found", `not found: ${detail}`, options);
  }
  if (status !== undefined && status >= 500) {
    return new FeishuError("network", `server error: ${detail}`, options);
  }
  return new FeishuError("api_error", `API error: ${detail}`, options);
}

const TRANSIENT_NETWORK_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "ENOTFOUND",
  "EPIPE",
  "ERR_NETWORK",
]);

function readEnvelope(body: unknown): { code?: number; msg?: string } {
  if (typeof body !== "object" || body === null) return {};
  const code = "code" in body && typeof body.code === "number" ? body.code : undefined;
  const msg = "msg" in body && typeof body.msg === "string" ? body.msg : undefined;
  return { code, msg };
}

/**
 * Normalize anything thrown while talking to the API into a FeishuError.
 */
export function toFeishuError(error: unknown): FeishuError {
  if (error instanceof FeishuError) {
    return error;
  }

  if (error instanceof TransportError) {
    if (error.status === undefined) {
      const reason = error.code ? `${error.code}: ${error.message}` : error.message;
      return new FeishuError("network", `network failure (${reason})`, { cause: error });
    }
    const { code, msg } = readEnvelope(error.body);
    const classified = classifyVendorError(code, msg ?? error.message, error.status);
    if (error.retryAfterMs === undefined) {
      return classified;
    }
    return new FeishuError(classified.kind, classified.message, {
      code: classified.code,
      status: classified.status,
      tokenInvalid: classified.tokenInvalid,
      retryAfterMs: error.retryAfterMs,
      cause: error,
    });
  }

  if (error instanceof Error) {
    const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
    if (code && TRANSIENT_NETWORK_CODES.has(code)) {
      return new FeishuError("network", `network failure (${code}: ${error.message})`, {
        cause: error,
      });
    }
    return new FeishuError("api_error", error.message, { cause: error });
  }

  return new FeishuError("api_error", String(error));
}

/**
 * Render an error as a single line, with every secret masked.
 */
export function formatError(error: unknown, secrets: readonly string[] = []): string {
  const feishuError = toFeishuError(error);
  const code = feishuError.code !== undefined ? `, code ${feishuError.code}` : "";
  let line = `error (${feishuError.kind}${code}): ${feishuError.message}`;
  for (const secret of secrets) {
    if (secret) {
      line = line.split(secret).join("***");
    }
  }
  return line;
}
