/**
 * Reader registry implementation for dispatching reads by document type
 */

import type { DocumentType } from "../types/index.js";
import type { DocumentReader, ReaderRegistry } from "./types.js";

/**
 * Creates a reader registry instance
 */
export function createReaderRegistry(readers: readonly DocumentReader[] = []): ReaderRegistry {
  const byType = new Map<DocumentType, DocumentReader>();

  const registry: ReaderRegistry = {
    register(reader: DocumentReader): void {
      // Later registrations replace earlier ones for the same type
      byType.set(reader.type, reader);
    },

    get(type: DocumentType): DocumentReader | undefined {
      return byType.get(type);
    },

    types(): DocumentType[] {
      return Array.from(byType.keys());
    },
  };

  for (const reader of readers) {
    registry.register(reader);
  }
  return registry;
}
