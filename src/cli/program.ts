/**
 * Command-line interface: argument parsing, wiring and exit codes.
 */

import { Command, CommanderError, Option } from "commander";
import { z } from "zod";
import { createApiClient } from "../api/client.js";
import { FeishuError, formatError, toFeishuError } from "../api/errors.js";
import { loadConfig, requireCredentials, resolveTokenCachePath } from "../config/loader.js";
import { DocumentTypeSchema, DomainSchema, OutputFormatSchema } from "../config/schema.js";
import { formatOutput } from "../core/formatter.js";
import { createLogger } from "../core/logger.js";
import { createReadContext, readDocument } from "../core/reader.js";
import { resolveDocumentRef } from "../core/resolver.js";
import { readWikiSpace } from "../readers/wiki.js";
import type { DocumentRef, ReadResult, Transport } from "../types/index.js";

export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface CliDeps {
  io?: CliIo;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Replaces the Lark SDK transport */
  transport?: Transport;
}

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

const CliOptionsSchema = z.object({
  type: z.union([z.literal("auto"), DocumentTypeSchema]),
  output: OutputFormatSchema,
  pretty: z.boolean(),
  recursive: z.boolean(),
  wikiSpace: z.string().min(1).optional(),
  config: z.string().min(1).optional(),
  tokenCache: z.union([z.boolean(), z.string().min(1)]).optional(),
  domain: DomainSchema.optional(),
  verbose: z.boolean(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export function createProgram(io: CliIo = defaultIo): Command {
  return new Command()
    .name("feishu-reader")
    .description("Read Feishu/Lark documents (docx, doc, sheet, bitable, wiki) as JSON or plain text")
    .argument("[token]", "document token or URL")
    .addOption(
      new Option("-t, --type <type>", "document type")
        .choices(["auto", ...DocumentTypeSchema.options])
        .default("auto")
    )
    .addOption(
      new Option("-o, --output <format>", "output format")
        .choices(OutputFormatSchema.options)
        .default("json")
    )
    .option("-p, --pretty", "indent JSON output", false)
    .option("-r, --recursive", "read wiki descendants and their content", false)
    .option("--wiki-space <id>", "read a whole knowledge space")
    .option("-c, --config <path>", "config file (default: ./reference/feishu_config.json)")
    .option("--token-cache [path]", "keep the tenant access token in an on-disk cache")
    .addOption(new Option("--domain <domain>", "API domain").choices(DomainSchema.options))
    .option("-v, --verbose", "log progress to stderr", false)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
    });
}

type ReadTarget = { kind: "space"; spaceId: string } | { kind: "document"; ref: DocumentRef };

/**
 * A wiki space takes precedence over a document token.
 */
function resolveTarget(input: string | undefined, options: CliOptions): ReadTarget {
  if (options.wikiSpace) {
    return { kind: "space", spaceId: options.wikiSpace };
  }
  if (!input) {
    throw new FeishuError("type_unresolved", "no document token given");
  }
  return {
    kind: "document",
    ref: resolveDocumentRef(input, options.type === "auto" ? undefined : options.type),
  };
}

/**
 * Run the CLI and resolve with the process exit code.
 *
 * @param argv - user arguments, without the node executable and script path
 */
export async function run(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? defaultIo;
  const env = deps.env ?? process.env;
  const cwd = deps.cwd ?? process.cwd();
  const program = createProgram(io);

  try {
    program.parse([...argv], { from: "user" });
  } catch (error) {
    // Help and usage errors have already been written by commander
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }

  const write = (line: string) => io.stderr(`${line}\n`);
  const parsed = CliOptionsSchema.safeParse(program.opts());
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(options)"}: ${issue.message}`)
      .join("; ");
    createLogger({ write }).error(`invalid arguments: ${issues}`);
    return 1;
  }

  const options = parsed.data;
  const input = program.args[0];
  const logger = createLogger({ verbose: options.verbose, write });

  if (!input && !options.wikiSpace) {
    program.outputHelp({ error: true });
    return 1;
  }

  const secrets: string[] = [];
  try {
    // Resolved before any config or network access
    const target = resolveTarget(input, options);

    const loaded = await loadConfig({ path: options.config, cwd, logger });
    const resolved = requireCredentials(loaded, env);
    const credentials = { ...resolved, domain: options.domain ?? resolved.domain };
    secrets.push(credentials.appSecret);

    const api = createApiClient({
      credentials,
      logger,
      tokenCachePath: resolveTokenCachePath(
        options.tokenCache ?? loaded.config.token_cache,
        credentials.appId,
        cwd
      ),
      maxRetries: loaded.config.max_retries,
      transport: deps.transport,
    });
    const context = createReadContext({ api, logger, options: { recursive: options.recursive } });

    let result: ReadResult;
    if (target.kind === "space") {
      logger.info(`reading wiki space ${target.spaceId}`);
      result = await readWikiSpace(target.spaceId, context);
    } else {
      result = await readDocument(target.ref, context);
    }

    io.stdout(`${formatOutput(result, { output: options.output, pretty: options.pretty })}\n`);
    return 0;
  } catch (error) {
    const feishuError = toFeishuError(error);
    logger.error(formatError(feishuError, secrets));
    return feishuError.exitCode;
  }
}
