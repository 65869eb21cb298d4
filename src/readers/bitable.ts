/**
 * Bitable (multidimensional table) reader: app metadata, every table, and
 * each table's fields and records.
 */

import { toFeishuError } from "../api/errors.js";
import { collectPages } from "../api/pagination.js";
import type { BitableContent, BitableTableContent, BitableTableFailure } from "../types/index.js";
import {
  BitableAppSchema,
  BitableFieldPageSchema,
  BitableRecordPageSchema,
  BitableTablePageSchema,
} from "./schemas.js";
import type { BitableTable } from "./schemas.js";
import type { DocumentReader, ReadContext } from "./types.js";

export const RECORD_PAGE_SIZE = 500;
export const TABLE_PAGE_SIZE = 100;
export const FIELD_PAGE_SIZE = 100;

/** Upper bound on records read per table */
export const MAX_RECORDS_PER_TABLE = 10_000;

async function readTable(
  appBase: string,
  table: BitableTable,
  context: ReadContext
): Promise<BitableTableContent | BitableTableFailure> {
  const name = table.name ?? "Table";
  const tableBase = `${appBase}/tables/${encodeURIComponent(table.table_id)}`;

  try {
    const fields = await collectPages((pageToken) =>
      context.api.get(`${tableBase}/fields`, BitableFieldPageSchema, {
        page_size: FIELD_PAGE_SIZE,
        page_token: pageToken,
      })
    );
    const records = await collectPages(
      (pageToken) =>
        context.api.get(`${tableBase}/records`, BitableRecordPageSchema, {
          page_size: RECORD_PAGE_SIZE,
          page_token: pageToken,
        }),
      { maxItems: MAX_RECORDS_PER_TABLE }
    );

    if (records.truncated) {
      context.logger.warn(
        `table "${name}" has more than ${MAX_RECORDS_PER_TABLE} records; output is truncated`
      );
    }

    return {
      table_id: table.table_id,
      name,
      fields: fields.items,
      records: records.items,
      record_count: records.items.length,
      truncated: records.truncated,
    };
  } catch (error) {
    const feishuError = toFeishuError(error);
    // Credential failures affect the whole document, not one part of it
    if (feishuError.kind === "auth_failed") throw feishuError;
    context.logger.warn(`failed to read table "${name}": ${feishuError.message}`);
    return { table_id: table.table_id, name, error: feishuError.message };
  }
}

export const bitableReader: DocumentReader<BitableContent> = {
  type: "bitable",

  async read(token: string, context: ReadContext): Promise<BitableContent> {
    const appBase = `/open-apis/bitable/v1/apps/${encodeURIComponent(token)}`;
    const meta = await context.api.get(appBase, BitableAppSchema);
    const { items: tables } = await collectPages((pageToken) =>
      context.api.get(`${appBase}/tables`, BitableTablePageSchema, {
        page_size: TABLE_PAGE_SIZE,
        page_token: pageToken,
      })
    );

    const contents: (BitableTableContent | BitableTableFailure)[] = [];
    for (const table of tables) {
      contents.push(await readTable(appBase, table, context));
    }

    return {
      app: meta.app ?? {},
      tables: contents,
      table_count: tables.length,
    };
  },
};
