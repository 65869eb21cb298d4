/**
 * Package entry point.
 * Exports the public APIs for reading Feishu documents.
 */

// Reading
export { createReadContext, readDocument, defaultReaders } from "./core/reader.js";
export { readWikiSpace, expandWikiNodes, listWikiNodes, MAX_WIKI_DEPTH } from "./readers/wiki.js";
export { createReaderRegistry } from "./readers/registry.js";
export { docxReader, listAllBlocks } from "./readers/docx.js";
export { docReader } from "./readers/doc.js";
export { sheetReader } from "./readers/sheet.js";
export { bitableReader, MAX_RECORDS_PER_TABLE } from "./readers/bitable.js";

// Type resolution
export {
  resolveDocumentRef,
  detectTokenType,
  parseDocumentUrl,
  TOKEN_PREFIXES,
  URL_SEGMENTS,
} from "./core/resolver.js";

// Output
export { formatOutput, formatJson } from "./core/formatter.js";
export { extractText, extractBlocksText, orderBlocks, cellToText } from "./core/text.js";
export { createLogger, silentLogger, type Logger } from "./core/logger.js";

// API access
export {
  ApiClient,
  createApiClient,
  createLarkTransport,
  getApiClient,
  clearClientCache,
} from "./api/client.js";
export { TokenManager, TENANT_TOKEN_URL } from "./api/auth.js";
export { FileTokenStore, type TokenStore } from "./api/token-store.js";
export { collectPages, type Page, type CollectedPages } from "./api/pagination.js";
export {
  FeishuError,
  TransportError,
  classifyVendorError,
  toFeishuError,
  formatError,
  EXIT_CODES,
  type FeishuErrorKind,
} from "./api/errors.js";

// Configuration
export {
  ConfigSchema,
  resolveCredentials,
  type Config,
  type Credentials,
  type DocumentType,
  type FeishuDomain,
  type OutputFormat,
} from "./config/schema.js";
export { loadConfig, requireCredentials, defaultConfigPaths } from "./config/loader.js";

// CLI
export { run, createProgram } from "./cli/program.js";

// Types
export type {
  ReadContext,
  ReadOptions,
  DocumentReader,
  ReaderRegistry,
} from "./readers/types.js";
export type {
  ApiRequest,
  Transport,
  CachedToken,
  DocumentRef,
  DocumentResult,
  DocumentContent,
  DocxContent,
  DocContent,
  SheetContent,
  BitableContent,
  WikiNodeContent,
  WikiSpaceContent,
  WikiTreeNode,
  ReadResult,
} from "./types/index.js";
