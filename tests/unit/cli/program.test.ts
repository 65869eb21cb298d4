/**
 * Unit tests for cli/program.ts
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { run } from "../../../src/cli/program.js";
import type { CliDeps } from "../../../src/cli/program.js";
import { FakeTransport, TEST_CREDENTIALS, fail, ok } from "../../helpers/fake-transport.js";

const DOC_URL = "/open-apis/docx/v1/documents/docx_abc";

const env = {
  FEISHU_APP_ID: TEST_CREDENTIALS.appId,
  FEISHU_APP_SECRET: TEST_CREDENTIALS.appSecret,
};

let cwd: string;

beforeEach(async () => {
  cwd = await fs.mkdtemp(path.join(os.tmpdir(), "feishu-cli-"));
});

afterEach(async () => {
  await fs.rm(cwd, { recursive: true, force: true });
});

function harness(fake: FakeTransport, overrides: Partial<CliDeps> = {}) {
  const out: string[] = [];
  const err: string[] = [];
  const deps: CliDeps = {
    io: { stdout: (text) => out.push(text), stderr: (text) => err.push(text) },
    env,
    cwd,
    transport: fake.transport,
    ...overrides,
  };
  return {
    deps,
    stdout: () => out.join(""),
    stderr: () => err.join(""),
  };
}

function docxFake(documentId = "docx_abc"): FakeTransport {
  const url = `/open-apis/docx/v1/documents/${documentId}`;
  return new FakeTransport()
    .auth()
    .reply("GET", url, ok({ document: { document_id: documentId, title: "Plan" } }))
    .reply(
      "GET",
      `${url}/blocks`,
      ok({
        items: [
          { block_id: documentId, block_type: 1, children: ["t1"] },
          { block_id: "t1", block_type: 2, text: { elements: [{ text_run: { content: "Hello" } }] } },
        ],
        has_more: false,
      })
    );
}

describe("run", () => {
  it("prints a docx document as JSON", async () => {
    const fake = docxFake();
    const cli = harness(fake);

    const code = await run(["docx_abc"], cli.deps);

    expect(code).toBe(0);
    const output: unknown = JSON.parse(cli.stdout());
    expect(output).toMatchObject({
      document: { title: "Plan" },
      text_content: "Hello",
      _meta: { type: "docx", token: "docx_abc" },
    });
    expect(cli.stderr()).toBe("");
  });

  it("prints plain text with --output text", async () => {
    const cli = harness(docxFake());

    const code = await run(["https://example.feishu.cn/docx/docx_abc", "-o", "text"], cli.deps);

    expect(code).toBe(0);
    expect(cli.stdout()).toBe("Hello\n");
  });

  it("rejects unknown tokens before any request", async () => {
    const fake = new FakeTransport().auth();
    const cli = harness(fake);

    const code = await run(["mystery"], cli.deps);

    expect(code).toBe(2);
    expect(fake.calls).toHaveLength(0);
    expect(cli.stdout()).toBe("");
    expect(cli.stderr()).toBe(
      "[feishu] error (type_unresolved): unknown document type for token: mystery; pass --type (docx, doc, sheet, bitable, wiki)\n"
    );
  });

  it("reads unknown tokens with an explicit type", async () => {
    const fake = docxFake("PlainToken42");
    const cli = harness(fake);

    const code = await run(["--type", "docx", "PlainToken42"], cli.deps);

    expect(code).toBe(0);
    expect(JSON.parse(cli.stdout())).toMatchObject({
      text_content: "Hello",
      _meta: { type: "docx", token: "PlainToken42" },
    });
    expect(fake.callsTo("/open-apis/docx/v1/documents/PlainToken42")).toHaveLength(1);
  });

  it("rejects invalid option values with exit 1", async () => {
    const fake = new FakeTransport();
    const cli = harness(fake);

    const code = await run(["--wiki-space", ""], cli.deps);

    expect(code).toBe(1);
    expect(fake.calls).toHaveLength(0);
    expect(cli.stderr()).toBe(
      "[feishu] invalid arguments: wikiSpace: String must contain at least 1 character(s)\n"
    );
  });

  it("exits 3 when the config file cannot be read", async () => {
    const configPath = path.join(cwd, "reference", "feishu_config.json");
    await fs.mkdir(configPath, { recursive: true });
    const fake = new FakeTransport();
    const cli = harness(fake);

    const code = await run(["docx_abc"], cli.deps);

    expect(code).toBe(3);
    expect(fake.calls).toHaveLength(0);
    expect(cli.stderr()).toBe(`[feishu] error (config_invalid): ${configPath} cannot be read\n`);
  });

  it("still reads the document when the token cache cannot be written", async () => {
    await fs.writeFile(path.join(cwd, "blocker"), "");
    const fake = docxFake();
    const cli = harness(fake);

    const code = await run(["docx_abc", "--token-cache", "blocker/token.json"], cli.deps);

    expect(code).toBe(0);
    expect(fake.callsTo(DOC_URL)).toHaveLength(1);
    expect(cli.stderr()).toContain(
      `[feishu] warning: cannot write token cache ${path.join(cwd, "blocker", "token.json")}: `
    );
  });

  it("prints usage and exits 1 without a token", async () => {
    const cli = harness(new FakeTransport());

    const code = await run([], cli.deps);

    expect(code).toBe(1);
    expect(cli.stderr()).toContain("Usage: feishu-reader");
  });

  it("exits 3 when no credentials are configured", async () => {
    const fake = new FakeTransport();
    const cli = harness(fake, { env: {} });

    const code = await run(["docx_abc"], cli.deps);

    expect(code).toBe(3);
    expect(fake.calls).toHaveLength(0);
    expect(cli.stderr()).toContain("[feishu] error (config_missing): Feishu credentials not configured");
  });

  it("maps not-found documents to exit code 5", async () => {
    const fake = new FakeTransport().auth().reply("GET", DOC_URL, fail(1770002, "not found"));
    const cli = harness(fake);

    const code = await run(["docx_abc"], cli.deps);

    expect(code).toBe(5);
    expect(cli.stderr()).toBe("[feishu] error (not_found, code 1770002): not found: not found\n");
  });

  it("never prints the app secret", async () => {
    const fake = new FakeTransport().auth(fail(10014, `app secret ${TEST_CREDENTIALS.appSecret} is invalid`));
    const cli = harness(fake);

    const code = await run(["docx_abc"], cli.deps);

    expect(code).toBe(4);
    expect(cli.stderr()).toBe(
      "[feishu] error (auth_failed, code 10014): failed to obtain tenant access token: app secret *** is invalid\n"
    );
  });

  it("reads a wiki space", async () => {
    const fake = new FakeTransport()
      .auth()
      .reply("GET", "/open-apis/wiki/v2/spaces/sp1", ok({ space: { name: "Team" } }))
      .reply("GET", "/open-apis/wiki/v2/spaces/sp1/nodes", ok({ items: [], has_more: false }));
    const cli = harness(fake);

    const code = await run(["--wiki-space", "sp1", "--pretty"], cli.deps);

    expect(code).toBe(0);
    expect(cli.stdout()).toBe(
      '{\n  "space": {\n    "name": "Team"\n  },\n  "nodes": [],\n  "node_count": 0\n}\n'
    );
  });
});
