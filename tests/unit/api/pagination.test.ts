/**
 * Unit tests for api/pagination.ts
 */

import { describe, it, expect, vi } from "vitest";
import { collectPages } from "../../../src/api/pagination.js";
import type { Page } from "../../../src/api/pagination.js";
import { FeishuError } from "../../../src/api/errors.js";

function pages<T>(...sequence: Page<T>[]) {
  const queue = [...sequence];
  return vi.fn(async (_pageToken: string | undefined): Promise<Page<T>> => {
    const next = queue.shift();
    if (!next) throw new Error("no more pages");
    return next;
  });
}

describe("collectPages", () => {
  it("accumulates every page in order", async () => {
    const fetchPage = pages(
      { items: [1, 2], has_more: true, page_token: "p2" },
      { items: [3], has_more: true, page_token: "p3" },
      { items: [4, 5], has_more: false }
    );

    const result = await collectPages(fetchPage);

    expect(result).toEqual({ items: [1, 2, 3, 4, 5], truncated: false });
    expect(fetchPage.mock.calls.map(([token]) => token)).toEqual([undefined, "p2", "p3"]);
  });

  it("treats missing or null items as empty pages", async () => {
    const fetchPage = pages<string>(
      { items: null, has_more: true, page_token: "p2" },
      { has_more: false }
    );

    expect(await collectPages(fetchPage)).toEqual({ items: [], truncated: false });
  });

  it("stops at maxItems and reports truncation", async () => {
    const fetchPage = pages(
      { items: [1, 2, 3], has_more: true, page_token: "p2" },
      { items: [4, 5, 6], has_more: true, page_token: "p3" },
      { items: [7], has_more: false }
    );

    const result = await collectPages(fetchPage, { maxItems: 5 });

    expect(result).toEqual({ items: [1, 2, 3, 4, 5], truncated: true });
    expect(fetchPage).toHaveBeenCalledTimes(2);
  });

  it("caps a final page that overshoots maxItems", async () => {
    const fetchPage = pages(
      { items: [1, 2, 3], has_more: true, page_token: "p2" },
      { items: [4, 5, 6], has_more: false }
    );

    expect(await collectPages(fetchPage, { maxItems: 4 })).toEqual({
      items: [1, 2, 3, 4],
      truncated: true,
    });
  });

  it("does not report truncation when the last page ends exactly at maxItems", async () => {
    const fetchPage = pages({ items: [1, 2], has_more: true, page_token: "p2" }, { items: [3], has_more: false });

    expect(await collectPages(fetchPage, { maxItems: 3 })).toEqual({ items: [1, 2, 3], truncated: false });
  });

  it("rejects has_more without a page token", async () => {
    const fetchPage = pages({ items: [1], has_more: true });

    await expect(collectPages(fetchPage)).rejects.toMatchObject({
      name: "FeishuError",
      kind: "malformed_response",
    });
    await expect(collectPages(pages({ items: [1], has_more: true, page_token: "" }))).rejects.toBeInstanceOf(
      FeishuError
    );
  });
});
