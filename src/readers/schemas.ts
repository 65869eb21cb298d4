/**
 * Response schemas for the document endpoints.
 * Objects pass unknown vendor fields through untouched; only the fields the
 * readers depend on are declared.
 */

import { z } from "zod";
import { pageSchema } from "../api/pagination.js";

const looseObject = z.object({}).passthrough();

// ============================================================================
// Docx
// ============================================================================

export const TextElementSchema = z
  .object({
    text_run: z.object({ content: z.string() }).passthrough().optional(),
    mention_user: z
      .object({ user_id: z.string().optional(), name: z.string().optional() })
      .passthrough()
      .optional(),
    mention_doc: z
      .object({ token: z.string().optional(), title: z.string().optional() })
      .passthrough()
      .optional(),
    equation: z.object({ content: z.string() }).passthrough().optional(),
  })
  .passthrough();

export const TextBodySchema = z
  .object({
    elements: z.array(TextElementSchema).optional(),
    style: z.object({ done: z.boolean().optional() }).passthrough().optional(),
  })
  .passthrough();

export const BlockSchema = z
  .object({
    block_id: z.string(),
    block_type: z.number(),
    parent_id: z.string().optional(),
    children: z.array(z.string()).optional(),
  })
  .passthrough();

export const DocxDocumentSchema = z.object({
  document: looseObject.optional(),
});

export const BlockPageSchema = pageSchema(BlockSchema);

// ============================================================================
// Legacy Doc
// ============================================================================

export const DocMetaSchema = looseObject;

export const DocRawContentSchema = z.object({
  content: z.string().optional(),
});

// ============================================================================
// Sheet
// ============================================================================

export const SpreadsheetSchema = z.object({
  spreadsheet: z
    .object({
      title: z.string().optional(),
      owner_id: z.string().optional(),
      token: z.string().optional(),
      url: z.string().optional(),
    })
    .passthrough()
    .optional(),
});

export const SheetPropertiesSchema = z
  .object({
    sheet_id: z.string(),
    title: z.string().optional(),
    index: z.number().optional(),
  })
  .passthrough();

export const SheetListSchema = z.object({
  sheets: z.array(SheetPropertiesSchema).nullish(),
});

export const SheetValuesSchema = z.object({
  valueRange: z
    .object({
      range: z.string().optional(),
      values: z.array(z.array(z.unknown()).nullable()).nullish(),
    })
    .passthrough()
    .optional(),
});

// ============================================================================
// Bitable
// ============================================================================

export const BitableAppSchema = z.object({
  app: looseObject.optional(),
});

export const BitableTableSchema = z
  .object({
    table_id: z.string(),
    name: z.string().optional(),
  })
  .passthrough();

export const BitableTablePageSchema = pageSchema(BitableTableSchema);
export const BitableFieldPageSchema = pageSchema(looseObject);
export const BitableRecordPageSchema = pageSchema(looseObject);

// ============================================================================
// Wiki
// ============================================================================

export const WikiNodeSchema = z
  .object({
    space_id: z.string().optional(),
    node_token: z.string().optional(),
    obj_token: z.string().optional(),
    obj_type: z.string().optional(),
    title: z.string().optional(),
    has_child: z.boolean().optional(),
  })
  .passthrough();

export const WikiNodeResponseSchema = z.object({
  node: WikiNodeSchema,
});

export const WikiNodePageSchema = pageSchema(WikiNodeSchema);

export const WikiSpaceSchema = z.object({
  space: looseObject.optional(),
});

// ============================================================================
// Inferred Types
// ============================================================================

export type TextElement = z.infer<typeof TextElementSchema>;
export type TextBody = z.infer<typeof TextBodySchema>;
export type Block = z.infer<typeof BlockSchema>;
export type SheetProperties = z.infer<typeof SheetPropertiesSchema>;
export type BitableTable = z.infer<typeof BitableTableSchema>;
export type WikiNode = z.infer<typeof WikiNodeSchema>;
