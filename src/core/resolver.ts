/**
 * Document type resolution from token prefixes and URL paths.
 */

import { FeishuError } from "../api/errors.js";
import type { DocumentRef, DocumentType } from "../types/index.js";

/**
 * Token prefixes, checked in order with startsWith.
 * `docx_` precedes `doc_` so the longer prefix wins.
 */
export const TOKEN_PREFIXES: ReadonlyArray<readonly [string, DocumentType]> = [
  ["docx_", "docx"],
  ["doxcn", "docx"],
  ["doc_", "doc"],
  ["doccn", "doc"],
  ["sheet_", "sheet"],
  ["shtcn", "sheet"],
  ["bascn", "bitable"],
  ["base", "bitable"],
  ["wikcn", "wiki"],
  ["wiki_", "wiki"],
];

/** URL path segment preceding the token */
export const URL_SEGMENTS: Readonly<Record<string, DocumentType>> = {
  docx: "docx",
  doc: "doc",
  docs: "doc",
  sheets: "sheet",
  sheet: "sheet",
  base: "bitable",
  bitable: "bitable",
  wiki: "wiki",
};

export function isUrl(input: string): boolean {
  return /^https?:\/\//i.test(input);
}

/**
 * Detect the document type from a bare token.
 * Returns null for unknown prefixes.
 */
export function detectTokenType(token: string): DocumentType | null {
  for (const [prefix, type] of TOKEN_PREFIXES) {
    if (token.startsWith(prefix)) {
      return type;
    }
  }
  return null;
}

function decodeSegment(segment: string, url: string): string {
  try {
    return decodeURIComponent(segment);
  } catch (error) {
    throw new FeishuError("type_unresolved", `malformed escape in URL: ${url}`, { cause: error });
  }
}

/**
 * Extract the type and token from a document URL.
 * Returns null when no known segment is followed by a token.
 *
 * @throws FeishuError of kind `type_unresolved` when the token is not valid percent-encoding
 */
export function parseDocumentUrl(url: string): { type: DocumentType; token: string } | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }

  const segments = parsed.pathname.split("/").filter(Boolean);
  for (let i = 0; i < segments.length - 1; i++) {
    const segment = segments[i];
    const token = segments[i + 1];
    if (segment === undefined || token === undefined) continue;
    const type = Object.hasOwn(URL_SEGMENTS, segment) ? URL_SEGMENTS[segment] : undefined;
    if (type) {
      return { type, token: decodeSegment(token, url) };
    }
  }
  return null;
}

/**
 * Resolve user input to a single document reference, without any network access.
 *
 * @param explicitType - overrides detection; a URL still supplies the token
 * @throws FeishuError of kind `type_unresolved`
 */
export function resolveDocumentRef(input: string, explicitType?: DocumentType): DocumentRef {
  const trimmed = input.trim();
  if (!trimmed) {
    throw new FeishuError("type_unresolved", "empty document token");
  }

  if (isUrl(trimmed)) {
    const fromUrl = parseDocumentUrl(trimmed);
    if (explicitType) {
      const token = fromUrl?.token ?? lastPathSegment(trimmed);
      if (!token) {
        throw new FeishuError("type_unresolved", `no document token in URL: ${trimmed}`);
      }
      return { type: explicitType, token, source: "explicit" };
    }
    if (!fromUrl) {
      throw new FeishuError(
        "type_unresolved",
        `unknown document type for URL: ${trimmed} (expected a /docx/, /doc/, /sheets/, /base/ or /wiki/ path); pass --type`
      );
    }
    return { ...fromUrl, source: "url" };
  }

  if (explicitType) {
    return { type: explicitType, token: trimmed, source: "explicit" };
  }

  const type = detectTokenType(trimmed);
  if (!type) {
    throw new FeishuError(
      "type_unresolved",
      `unknown document type for token: ${trimmed}; pass --type (docx, doc, sheet, bitable, wiki)`
    );
  }
  return { type, token: trimmed, source: "token" };
}

function lastPathSegment(url: string): string | null {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return null;
  }
  const last = pathname.split("/").filter(Boolean).at(-1);
  return last ? decodeSegment(last, url) : null;
}
