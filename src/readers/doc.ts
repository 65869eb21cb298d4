/**
 * Legacy doc reader. The v2 API exposes metadata and a raw-text rendering,
 * not a block tree.
 */

import type { DocContent } from "../types/index.js";
import { DocMetaSchema, DocRawContentSchema } from "./schemas.js";
import type { DocumentReader, ReadContext } from "./types.js";

export const docReader: DocumentReader<DocContent> = {
  type: "doc",

  async read(token: string, context: ReadContext): Promise<DocContent> {
    const encoded = encodeURIComponent(token);
    const meta = await context.api.get(`/open-apis/doc/v2/meta/${encoded}`, DocMetaSchema);
    const raw = await context.api.get(`/open-apis/doc/v2/${encoded}/raw_content`, DocRawContentSchema);

    return {
      document: meta,
      text_content: raw.content ?? "",
    };
  },
};
