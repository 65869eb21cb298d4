/**
 * Document reading entry points: wires the readers into a context and
 * dispatches a resolved reference to the reader for its type.
 */

import type { ApiClient } from "../api/client.js";
import { FeishuError } from "../api/errors.js";
import { bitableReader } from "../readers/bitable.js";
import { docReader } from "../readers/doc.js";
import { docxReader } from "../readers/docx.js";
import { createReaderRegistry } from "../readers/registry.js";
import { sheetReader } from "../readers/sheet.js";
import type { DocumentReader, ReadContext, ReadOptions, ReaderRegistry } from "../readers/types.js";
import { wikiReader } from "../readers/wiki.js";
import type { DocumentRef, DocumentResult } from "../types/index.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";

export const defaultReaders: readonly DocumentReader[] = [
  docxReader,
  docReader,
  sheetReader,
  bitableReader,
  wikiReader,
];

export interface CreateReadContextParams {
  api: ApiClient;
  logger?: Logger;
  options?: ReadOptions;
  registry?: ReaderRegistry;
}

export function createReadContext(params: CreateReadContextParams): ReadContext {
  const registry = params.registry ?? createReaderRegistry(defaultReaders);

  const context: ReadContext = {
    api: params.api,
    logger: params.logger ?? silentLogger,
    options: params.options ?? {},
    async readObject(type, token) {
      const reader = registry.get(type);
      if (!reader) {
        throw new FeishuError("type_unresolved", `no reader registered for document type "${type}"`);
      }
      return reader.read(token, context);
    },
  };
  return context;
}

/**
 * Read one document and tag the result with what was read.
 */
export async function readDocument(ref: DocumentRef, context: ReadContext): Promise<DocumentResult> {
  context.logger.info(`reading document: type=${ref.type}, token=${ref.token}`);
  const content = await context.readObject(ref.type, ref.token);
  return { ...content, _meta: { type: ref.type, token: ref.token } };
}
