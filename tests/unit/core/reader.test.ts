/**
 * Unit tests for core/reader.ts and readers/registry.ts
 */

import { describe, it, expect } from "vitest";
import { createReadContext, defaultReaders, readDocument } from "../../../src/core/reader.js";
import { createReaderRegistry } from "../../../src/readers/registry.js";
import type { DocumentReader } from "../../../src/readers/types.js";
import type { DocContent } from "../../../src/types/index.js";
import { FakeTransport, createTestApi } from "../../helpers/fake-transport.js";

const stubDoc: DocumentReader<DocContent> = {
  type: "doc",
  async read(token) {
    return { document: { token }, text_content: "stub" };
  },
};

describe("createReaderRegistry", () => {
  it("registers one reader per document type", () => {
    const registry = createReaderRegistry(defaultReaders);

    expect(registry.types()).toEqual(["docx", "doc", "sheet", "bitable", "wiki"]);
  });

  it("lets a later reader replace an earlier one", () => {
    const registry = createReaderRegistry(defaultReaders);
    registry.register(stubDoc);

    expect(registry.get("doc")).toBe(stubDoc);
  });
});

describe("readDocument", () => {
  it("dispatches to the registered reader and tags the result", async () => {
    const { api } = createTestApi(new FakeTransport());
    const context = createReadContext({ api, registry: createReaderRegistry([stubDoc]) });

    const result = await readDocument({ type: "doc", token: "doccn1", source: "token" }, context);

    expect(result).toEqual({
      document: { token: "doccn1" },
      text_content: "stub",
      _meta: { type: "doc", token: "doccn1" },
    });
  });

  it("fails for types without a reader", async () => {
    const { api } = createTestApi(new FakeTransport());
    const context = createReadContext({ api, registry: createReaderRegistry([stubDoc]) });

    await expect(
      readDocument({ type: "sheet", token: "shtcn1", source: "token" }, context)
    ).rejects.toMatchObject({
      kind: "type_unresolved",
      message: 'no reader registered for document type "sheet"',
    });
  });
});
