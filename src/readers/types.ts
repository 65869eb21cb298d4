/**
 * Reader type definitions and interfaces
 */

import type { ApiClient } from "../api/client.js";
import type { Logger } from "../core/logger.js";
import type { DocumentContent, DocumentType } from "../types/index.js";

export interface ReadOptions {
  /** Read wiki descendants and their content */
  recursive?: boolean;
}

/**
 * Reader execution context
 */
export interface ReadContext {
  api: ApiClient;
  logger: Logger;
  options: ReadOptions;
  /** Read another object by type, used by wiki nodes to read what they point at */
  readObject(type: DocumentType, token: string): Promise<DocumentContent>;
}

/**
 * Fetches one document type and reshapes it into its output form
 */
export interface DocumentReader<T extends DocumentContent = DocumentContent> {
  readonly type: DocumentType;
  read(token: string, context: ReadContext): Promise<T>;
}

/**
 * Reader registry interface for dispatching by document type
 */
export interface ReaderRegistry {
  register(reader: DocumentReader): void;
  get(type: DocumentType): DocumentReader | undefined;
  types(): DocumentType[];
}
