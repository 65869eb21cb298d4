/**
 * Page-token pagination shared by the list endpoints.
 */

import { z } from "zod";
import { FeishuError } from "./errors.js";

export interface Page<T> {
  items?: T[] | null;
  has_more?: boolean;
  page_token?: string | null;
}

export interface CollectedPages<T> {
  items: T[];
  /** True when items beyond maxItems were dropped or left unfetched */
  truncated: boolean;
}

export interface CollectPagesOptions {
  maxItems?: number;
}

/**
 * Build the schema of one page whose items match `item`.
 */
export function pageSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    items: z.array(item).nullish(),
    has_more: z.boolean().optional(),
    page_token: z.string().nullish(),
  });
}

/**
 * Fetch pages until the API reports no further page, accumulating items in order.
 */
export async function collectPages<T>(
  fetchPage: (pageToken: string | undefined) => Promise<Page<T>>,
  options: CollectPagesOptions = {}
): Promise<CollectedPages<T>> {
  const items: T[] = [];
  let pageToken: string | undefined;

  for (;;) {
    const page = await fetchPage(pageToken);
    items.push(...(page.items ?? []));

    if (options.maxItems !== undefined && items.length >= options.maxItems) {
      return {
        items: items.slice(0, options.maxItems),
        truncated: items.length > options.maxItems || page.has_more === true,
      };
    }

    if (!page.has_more) {
      return { items, truncated: false };
    }

    if (!page.page_token) {
      throw new FeishuError("malformed_response", "has_more is set but no page_token was returned");
    }
    pageToken = page.page_token;
  }
}
