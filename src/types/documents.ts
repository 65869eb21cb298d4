/**
 * Document references and the output shapes produced for each document type.
 * Field names follow the vendor's snake_case so passed-through data and
 * derived fields read the same.
 */

import type { DocumentType } from "../config/schema.js";
import type { Block, SheetProperties, WikiNode } from "../readers/schemas.js";

export type { DocumentType };

export type JsonObject = Record<string, unknown>;

/** How a document reference was determined */
export type RefSource = "token" | "url" | "explicit";

/** A token resolved to exactly one document type */
export interface DocumentRef {
  type: DocumentType;
  token: string;
  source: RefSource;
}

// ============================================================================
// Per-type Content
// ============================================================================

export interface DocxContent {
  document: JsonObject;
  blocks: Block[];
  text_content: string;
}

export interface DocContent {
  document: JsonObject;
  text_content: string;
}

export interface SheetValues {
  sheet_id: string;
  title: string;
  properties: SheetProperties;
  values: unknown[][];
}

export interface SheetFailure {
  sheet_id: string;
  title: string;
  properties: SheetProperties;
  error: string;
}

export interface SheetContent {
  spreadsheet: {
    title: string;
    owner_id: string;
    token: string;
    url?: string;
    sheet_count: number;
  };
  sheets: (SheetValues | SheetFailure)[];
}

export interface BitableTableContent {
  table_id: string;
  name: string;
  fields: JsonObject[];
  records: JsonObject[];
  record_count: number;
  truncated: boolean;
}

export interface BitableTableFailure {
  table_id: string;
  name: string;
  error: string;
}

export interface BitableContent {
  app: JsonObject;
  tables: (BitableTableContent | BitableTableFailure)[];
  table_count: number;
}

/** Placeholder for wiki objects whose type has no reader */
export interface ContentNote {
  note: string;
}

export interface ContentFailure {
  error: string;
}

/** A wiki node annotated with its content and, when read recursively, its subtree */
export type WikiTreeNode = WikiNode & {
  content?: DocumentContent | ContentNote;
  content_error?: string;
  children?: WikiTreeNode[];
  children_error?: string;
};

export interface WikiNodeContent {
  node: WikiNode;
  content: DocumentContent | ContentNote | ContentFailure;
  children: WikiTreeNode[];
  children_error?: string;
}

export interface WikiSpaceContent {
  space: JsonObject;
  nodes: WikiTreeNode[];
  node_count: number;
}

export type DocumentContent =
  | DocxContent
  | DocContent
  | SheetContent
  | BitableContent
  | WikiNodeContent;

export interface DocumentMeta {
  type: DocumentType;
  token: string;
}

export type DocumentResult = DocumentContent & { _meta: DocumentMeta };

/** Anything the CLI can print */
export type ReadResult = DocumentResult | WikiSpaceContent;
