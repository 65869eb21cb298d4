/**
 * Plain-text projection of document content.
 */

import type { Block, TextElement } from "../readers/schemas.js";
import { TextBodySchema } from "../readers/schemas.js";
import type {
  ContentFailure,
  ContentNote,
  DocumentContent,
  ReadResult,
  SheetContent,
} from "../types/index.js";

// ============================================================================
// Docx Blocks
// ============================================================================

export const BlockType = {
  Page: 1,
  Text: 2,
  Heading1: 3,
  Heading9: 11,
  Bullet: 12,
  Ordered: 13,
  Code: 14,
  Quote: 15,
  Todo: 17,
  Image: 27,
  Table: 31,
} as const;

/** Render inline elements, ignoring element kinds that carry no text */
export function extractElementsText(elements: readonly TextElement[] | undefined): string {
  if (!elements) return "";
  return elements
    .map((element) => {
      if (element.text_run) return element.text_run.content;
      if (element.mention_user) {
        return `@${element.mention_user.name ?? element.mention_user.user_id ?? "user"}`;
      }
      if (element.mention_doc) return `[doc: ${element.mention_doc.title ?? "doc"}]`;
      if (element.equation) return element.equation.content;
      return "";
    })
    .join("");
}

function textProperty(blockType: number): string | null {
  if (blockType === BlockType.Text) return "text";
  if (blockType >= BlockType.Heading1 && blockType <= BlockType.Heading9) {
    return `heading${blockType - BlockType.Heading1 + 1}`;
  }
  switch (blockType) {
    case BlockType.Bullet:
      return "bullet";
    case BlockType.Ordered:
      return "ordered";
    case BlockType.Code:
      return "code";
    case BlockType.Quote:
      return "quote";
    case BlockType.Todo:
      return "todo";
    default:
      return null;
  }
}

/**
 * Render one block as a line of text, or null for blocks without text.
 */
export function renderBlock(block: Block): string | null {
  if (block.block_type === BlockType.Image) return "[image]";
  if (block.block_type === BlockType.Table) return "[table]";

  const property = textProperty(block.block_type);
  if (!property) return null;

  const body = TextBodySchema.safeParse(block[property] ?? block["text"]);
  if (!body.success) return null;

  const text = extractElementsText(body.data.elements);
  if (!text) return null;

  const type = block.block_type;
  if (type >= BlockType.Heading1 && type <= BlockType.Heading9) {
    const level = Math.min(type - BlockType.Heading1 + 1, 6);
    return `${"#".repeat(level)} ${text}`;
  }
  switch (type) {
    case BlockType.Bullet:
      return `- ${text}`;
    case BlockType.Ordered:
      return `1. ${text}`;
    case BlockType.Quote:
      return `> ${text}`;
    case BlockType.Todo:
      return `- [${body.data.style?.done ? "x" : " "}] ${text}`;
    case BlockType.Code:
      return "```\n" + text + "\n```";
    default:
      return text;
  }
}

/**
 * Order blocks as they appear in the document: depth-first from the page
 * root through `children`. Blocks the walk cannot reach follow in list order.
 */
export function orderBlocks(blocks: readonly Block[]): Block[] {
  const byId = new Map(blocks.map((block) => [block.block_id, block]));
  const visited = new Set<string>();
  const ordered: Block[] = [];

  const walk = (block: Block): void => {
    if (visited.has(block.block_id)) return;
    visited.add(block.block_id);
    ordered.push(block);
    for (const childId of block.children ?? []) {
      const child = byId.get(childId);
      if (child) walk(child);
    }
  };

  const root = blocks.find((block) => block.block_type === BlockType.Page);
  if (root) walk(root);
  for (const block of blocks) walk(block);

  return ordered;
}

/**
 * Concatenate the text-bearing blocks of a docx document, one per line.
 */
export function extractBlocksText(blocks: readonly Block[]): string {
  const lines: string[] = [];
  for (const block of orderBlocks(blocks)) {
    const line = renderBlock(block);
    if (line !== null) lines.push(line);
  }
  return lines.join("\n");
}

// ============================================================================
// Sheet Cells
// ============================================================================

/** Render a cell value: rich-text segments and link objects reduce to their text */
export function cellToText(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (Array.isArray(value)) return value.map(cellToText).join("");
  if (typeof value === "object" && "text" in value) return cellToText(value.text);
  return JSON.stringify(value);
}

export function sheetToText(content: SheetContent): string {
  return content.sheets
    .map((sheet) => {
      const header = `## ${sheet.title}`;
      if ("error" in sheet) return `${header}\n[error: ${sheet.error}]`;
      const rows = sheet.values.map((row) => row.map(cellToText).join("\t"));
      return [header, ...rows].join("\n");
    })
    .join("\n\n");
}

// ============================================================================
// Result Projection
// ============================================================================

type TextSource = ReadResult | DocumentContent | ContentNote | ContentFailure;

/**
 * Plain text for a read result, or null when the result has no text form.
 */
export function extractText(result: TextSource): string | null {
  if ("text_content" in result) {
    return result.text_content;
  }
  if ("spreadsheet" in result) {
    return sheetToText(result);
  }
  if ("node" in result) {
    return extractText(result.content);
  }
  return null;
}
