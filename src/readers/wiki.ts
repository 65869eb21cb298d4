/**
 * Wiki (knowledge base) reader.
 *
 * A wiki node is a pointer: `obj_type`/`obj_token` name the document it
 * shows, which is read through the matching reader. Children are listed per
 * space, and read recursively on request.
 */

import { toFeishuError } from "../api/errors.js";
import type { FeishuError } from "../api/errors.js";
import { collectPages } from "../api/pagination.js";
import type {
  ContentNote,
  DocumentContent,
  DocumentType,
  WikiNodeContent,
  WikiSpaceContent,
  WikiTreeNode,
} from "../types/index.js";
import { WikiNodePageSchema, WikiNodeResponseSchema, WikiSpaceSchema } from "./schemas.js";
import type { WikiNode } from "./schemas.js";
import type { DocumentReader, ReadContext } from "./types.js";

export const NODE_PAGE_SIZE = 50;

/** Levels below the starting nodes that a recursive read descends */
export const MAX_WIKI_DEPTH = 5;

const OBJECT_TYPES: ReadonlySet<string> = new Set<DocumentType>(["docx", "doc", "sheet", "bitable"]);

function isObjectType(value: string | undefined): value is DocumentType {
  return value !== undefined && OBJECT_TYPES.has(value);
}

function nestedFailure(error: unknown): FeishuError {
  const feishuError = toFeishuError(error);
  if (feishuError.kind === "auth_failed") throw feishuError;
  return feishuError;
}

/**
 * List the nodes under `parentToken`, or the root nodes of the space when omitted.
 */
export async function listWikiNodes(
  spaceId: string,
  parentToken: string | undefined,
  context: ReadContext
): Promise<WikiNode[]> {
  const { items } = await collectPages((pageToken) =>
    context.api.get(
      `/open-apis/wiki/v2/spaces/${encodeURIComponent(spaceId)}/nodes`,
      WikiNodePageSchema,
      { page_size: NODE_PAGE_SIZE, parent_node_token: parentToken, page_token: pageToken }
    )
  );
  return items;
}

async function readNodeObject(
  node: WikiNode,
  context: ReadContext
): Promise<DocumentContent | ContentNote> {
  const objType = node.obj_type;
  if (!isObjectType(objType) || !node.obj_token) {
    return { note: `reading wiki objects of type "${objType ?? "unknown"}" is not supported` };
  }
  context.logger.debug(`wiki node ${node.node_token ?? "?"} -> ${objType} ${node.obj_token}`);
  return context.readObject(objType, node.obj_token);
}

/**
 * Annotate nodes with their content and, while within MAX_WIKI_DEPTH, their subtrees.
 * Failures on one node are recorded on that node and do not stop the walk.
 */
export async function expandWikiNodes(
  spaceId: string,
  nodes: readonly WikiNode[],
  context: ReadContext,
  depth = 0
): Promise<WikiTreeNode[]> {
  if (depth > MAX_WIKI_DEPTH) {
    return [...nodes];
  }

  const expanded: WikiTreeNode[] = [];
  for (const node of nodes) {
    const tree: WikiTreeNode = { ...node };

    try {
      tree.content = await readNodeObject(node, context);
    } catch (error) {
      const failure = nestedFailure(error);
      context.logger.warn(
        `failed to read content of wiki node "${node.title ?? node.node_token}": ${failure.message}`
      );
      tree.content_error = failure.message;
    }

    if (node.has_child && node.node_token) {
      try {
        const children = await listWikiNodes(spaceId, node.node_token, context);
        tree.children = await expandWikiNodes(spaceId, children, context, depth + 1);
      } catch (error) {
        const failure = nestedFailure(error);
        context.logger.warn(
          `failed to list children of wiki node "${node.title ?? node.node_token}": ${failure.message}`
        );
        tree.children_error = failure.message;
      }
    }

    expanded.push(tree);
  }
  return expanded;
}

export const wikiReader: DocumentReader<WikiNodeContent> = {
  type: "wiki",

  async read(token: string, context: ReadContext): Promise<WikiNodeContent> {
    const { node } = await context.api.get(
      "/open-apis/wiki/v2/spaces/get_node",
      WikiNodeResponseSchema,
      { token }
    );

    let content: WikiNodeContent["content"];
    try {
      content = await readNodeObject(node, context);
    } catch (error) {
      const failure = nestedFailure(error);
      context.logger.warn(`failed to read wiki node content: ${failure.message}`);
      content = { error: failure.message };
    }

    const result: WikiNodeContent = { node, content, children: [] };
    if (!node.has_child || !node.space_id) {
      return result;
    }

    try {
      const children = await listWikiNodes(node.space_id, node.node_token ?? token, context);
      result.children = context.options.recursive
        ? await expandWikiNodes(node.space_id, children, context, 1)
        : children;
    } catch (error) {
      const failure = nestedFailure(error);
      context.logger.warn(`failed to list wiki children: ${failure.message}`);
      result.children_error = failure.message;
    }
    return result;
  },
};

/**
 * Read a whole knowledge space: its metadata and root nodes, and with
 * `recursive` every node's content and descendants.
 */
export async function readWikiSpace(spaceId: string, context: ReadContext): Promise<WikiSpaceContent> {
  const { space } = await context.api.get(
    `/open-apis/wiki/v2/spaces/${encodeURIComponent(spaceId)}`,
    WikiSpaceSchema
  );
  const roots = await listWikiNodes(spaceId, undefined, context);
  const nodes = context.options.recursive ? await expandWikiNodes(spaceId, roots, context) : roots;

  return {
    space: space ?? {},
    nodes,
    node_count: nodes.length,
  };
}
