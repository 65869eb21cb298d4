/**
 * Spreadsheet reader: metadata, the sheet list, then the values of each sheet.
 */

import { toFeishuError } from "../api/errors.js";
import type { SheetContent, SheetFailure, SheetValues } from "../types/index.js";
import { SheetListSchema, SheetValuesSchema, SpreadsheetSchema } from "./schemas.js";
import type { SheetProperties } from "./schemas.js";
import type { DocumentReader, ReadContext } from "./types.js";

async function readSheetValues(
  spreadsheetToken: string,
  sheet: SheetProperties,
  context: ReadContext
): Promise<SheetValues | SheetFailure> {
  const title = sheet.title ?? "Sheet";
  try {
    const data = await context.api.get(
      `/open-apis/sheets/v2/spreadsheets/${encodeURIComponent(spreadsheetToken)}/values/${encodeURIComponent(sheet.sheet_id)}`,
      SheetValuesSchema
    );
    const values = (data.valueRange?.values ?? []).map((row) => row ?? []);
    return { sheet_id: sheet.sheet_id, title, properties: sheet, values };
  } catch (error) {
    const feishuError = toFeishuError(error);
    // Credential failures affect the whole document, not one part of it
    if (feishuError.kind === "auth_failed") throw feishuError;
    context.logger.warn(`failed to read sheet "${title}": ${feishuError.message}`);
    return { sheet_id: sheet.sheet_id, title, properties: sheet, error: feishuError.message };
  }
}

export const sheetReader: DocumentReader<SheetContent> = {
  type: "sheet",

  async read(token: string, context: ReadContext): Promise<SheetContent> {
    const base = `/open-apis/sheets/v3/spreadsheets/${encodeURIComponent(token)}`;
    const meta = await context.api.get(base, SpreadsheetSchema);
    const list = await context.api.get(`${base}/sheets/query`, SheetListSchema);
    const sheets = list.sheets ?? [];

    const results: (SheetValues | SheetFailure)[] = [];
    for (const sheet of sheets) {
      results.push(await readSheetValues(token, sheet, context));
    }

    return {
      spreadsheet: {
        title: meta.spreadsheet?.title ?? "",
        owner_id: meta.spreadsheet?.owner_id ?? "",
        token: meta.spreadsheet?.token ?? token,
        url: meta.spreadsheet?.url,
        sheet_count: sheets.length,
      },
      sheets: results,
    };
  },
};
