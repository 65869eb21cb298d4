/**
 * Configuration schema definitions using Zod.
 * All configuration types are derived from schemas via inference.
 */

import { z } from "zod";

// ============================================================================
// Enums
// ============================================================================

export const DomainSchema = z.enum(["feishu", "lark"]);
export const DocumentTypeSchema = z.enum(["docx", "doc", "sheet", "bitable", "wiki"]);
export const OutputFormatSchema = z.enum(["json", "text"]);

// ============================================================================
// Main Configuration Schema
// ============================================================================

/**
 * Shape of `reference/feishu_config.json`.
 * Keys follow the file's snake_case convention; unknown keys are ignored.
 */
export const ConfigSchema = z.object({
  app_id: z.string().optional(),
  app_secret: z.string().optional(),
  domain: DomainSchema.optional().default("feishu"),
  // true for the default location, or an explicit file path
  token_cache: z.union([z.boolean(), z.string().min(1)]).optional(),
  max_retries: z.number().int().min(0).max(10).optional(),
});

// ============================================================================
// Type Exports (inferred from schemas)
// ============================================================================

export type Config = z.infer<typeof ConfigSchema>;
export type FeishuDomain = z.infer<typeof DomainSchema>;
export type DocumentType = z.infer<typeof DocumentTypeSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

// ============================================================================
// Credential Resolution
// ============================================================================

export interface Credentials {
  appId: string;
  appSecret: string;
  domain: FeishuDomain;
}

/**
 * Resolve credentials from config, with environment variable fallback.
 * Returns null if required credentials are missing.
 */
export function resolveCredentials(
  config: Config | undefined,
  env: NodeJS.ProcessEnv = process.env
): Credentials | null {
  const appId = config?.app_id?.trim() || env["FEISHU_APP_ID"]?.trim();
  const appSecret = config?.app_secret?.trim() || env["FEISHU_APP_SECRET"]?.trim();

  if (!appId || !appSecret) {
    return null;
  }

  return {
    appId,
    appSecret,
    domain: config?.domain ?? "feishu",
  };
}
