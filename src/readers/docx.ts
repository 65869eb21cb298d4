/**
 * Docx (new-style document) reader.
 */

import { collectPages } from "../api/pagination.js";
import { extractBlocksText } from "../core/text.js";
import type { DocxContent } from "../types/index.js";
import { BlockPageSchema, DocxDocumentSchema } from "./schemas.js";
import type { Block } from "./schemas.js";
import type { DocumentReader, ReadContext } from "./types.js";

export const BLOCK_PAGE_SIZE = 500;

/**
 * List every block of a document, in the order the API returns them.
 */
export async function listAllBlocks(documentId: string, context: ReadContext): Promise<Block[]> {
  const path = `/open-apis/docx/v1/documents/${encodeURIComponent(documentId)}/blocks`;
  const { items } = await collectPages((pageToken) =>
    context.api.get(path, BlockPageSchema, { page_size: BLOCK_PAGE_SIZE, page_token: pageToken })
  );
  return items;
}

export const docxReader: DocumentReader<DocxContent> = {
  type: "docx",

  async read(token: string, context: ReadContext): Promise<DocxContent> {
    const info = await context.api.get(
      `/open-apis/docx/v1/documents/${encodeURIComponent(token)}`,
      DocxDocumentSchema
    );
    const blocks = await listAllBlocks(token, context);
    context.logger.debug(`docx ${token}: ${blocks.length} blocks`);

    return {
      document: info.document ?? {},
      blocks,
      text_content: extractBlocksText(blocks),
    };
  },
};
