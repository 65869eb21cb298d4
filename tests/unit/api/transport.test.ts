/**
 * Unit tests for the Lark SDK transport in api/client.ts
 */

import * as Lark from "@larksuiteoapi/node-sdk";
import { AxiosError } from "axios";
import type { AxiosResponse, InternalAxiosRequestConfig } from "axios";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { clearClientCache, createLarkTransport, getApiClient } from "../../../src/api/client.js";
import { TransportError, toFeishuError } from "../../../src/api/errors.js";
import { TEST_CREDENTIALS } from "../../helpers/fake-transport.js";

const DOC_PATH = "/open-apis/docx/v1/documents/docx_1";

type Responder = (config: InternalAxiosRequestConfig) => Promise<AxiosResponse>;

const http = Lark.defaultHttpInstance;
const originalAdapter = http.defaults.adapter;
const seen: InternalAxiosRequestConfig[] = [];

function respondWith(responder: Responder): void {
  http.defaults.adapter = async (config: InternalAxiosRequestConfig) => {
    seen.push(config);
    return responder(config);
  };
}

function response(
  config: InternalAxiosRequestConfig,
  status: number,
  data: unknown,
  headers: Record<string, string> = {}
): AxiosResponse {
  return { data, status, statusText: String(status), headers, config };
}

function transport() {
  return createLarkTransport(getApiClient(TEST_CREDENTIALS));
}

async function captureTransportError(promise: Promise<unknown>): Promise<TransportError> {
  const error = await promise.catch((e: unknown) => e);
  if (!(error instanceof TransportError)) {
    throw new Error(`expected a TransportError, got ${String(error)}`);
  }
  return error;
}

beforeEach(() => {
  clearClientCache();
  seen.length = 0;
});

afterEach(() => {
  http.defaults.adapter = originalAdapter;
  clearClientCache();
});

describe("createLarkTransport", () => {
  it("sends the tenant token as a bearer header and returns the body", async () => {
    const envelope = { code: 0, msg: "success", data: { document: { title: "Plan" } } };
    respondWith(async (config) => response(config, 200, envelope));

    const body = await transport()({ method: "GET", url: DOC_PATH }, "t-abc");

    expect(body).toEqual(envelope);
    expect(seen).toHaveLength(1);
    expect(seen[0]?.method).toBe("get");
    expect(seen[0]?.url?.endsWith(DOC_PATH)).toBe(true);
    expect(seen[0]?.headers.get("Authorization")).toBe("Bearer t-abc");
  });

  it("maps HTTP errors to TransportError with the rate-limit reset hint", async () => {
    const body = { code: 99991400, msg: "request trigger frequency limit" };
    respondWith(async (config) => {
      throw new AxiosError(
        "Request failed with status code 429",
        AxiosError.ERR_BAD_REQUEST,
        config,
        null,
        response(config, 429, body, { "x-ogw-ratelimit-reset": "3" })
      );
    });

    const error = await captureTransportError(transport()({ method: "GET", url: DOC_PATH }, "t-abc"));

    expect(error.status).toBe(429);
    expect(error.body).toEqual(body);
    expect(error.retryAfterMs).toBe(3000);
    expect(toFeishuError(error)).toMatchObject({ kind: "rate_limited", code: 99991400, retryAfterMs: 3000 });
  });

  it("leaves the reset hint out when the header is absent", async () => {
    respondWith(async (config) => {
      throw new AxiosError(
        "Request failed with status code 403",
        AxiosError.ERR_BAD_REQUEST,
        config,
        null,
        response(config, 403, { code: 1770032, msg: "forbidden" })
      );
    });

    const error = await captureTransportError(transport()({ method: "GET", url: DOC_PATH }, "t-abc"));

    expect(error.retryAfterMs).toBeUndefined();
    expect(toFeishuError(error).kind).toBe("permission_denied");
  });

  it("maps failures without a response to network errors", async () => {
    respondWith(async (config) => {
      throw new AxiosError("socket hang up", "ECONNRESET", config);
    });

    const error = await captureTransportError(transport()({ method: "GET", url: DOC_PATH }, "t-abc"));

    expect(error.status).toBeUndefined();
    expect(error.code).toBe("ECONNRESET");
    expect(toFeishuError(error)).toMatchObject({
      kind: "network",
      message: "network failure (ECONNRESET: socket hang up)",
    });
  });
});
