/**
 * Transport-level types shared by the auth and request layers.
 */

export type HttpMethod = "GET" | "POST";

export type QueryParams = Record<string, string | number | boolean | undefined>;

/** A single Open API call, with the URL relative to the API domain */
export interface ApiRequest {
  method: HttpMethod;
  url: string;
  params?: QueryParams;
  data?: Record<string, unknown>;
}

/**
 * Sends one request and resolves with the parsed response body.
 * Rejects with a TransportError on HTTP failures or when no response arrived.
 */
export type Transport = (request: ApiRequest, tenantToken?: string) => Promise<unknown>;

/** Tenant access token with its absolute expiry (epoch ms) */
export interface CachedToken {
  appId: string;
  token: string;
  expiresAt: number;
}
