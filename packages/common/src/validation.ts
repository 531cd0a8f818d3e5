/**
 * Zod validation schemas for configuration, CLI input and import bundles
 */

import { z } from 'zod';

// ============================================================================
// Configuration Schemas
// ============================================================================

export const logFormatSchema = z.enum(['json', 'pretty']);

export const quarryConfigSchema = z.object({
  dbPath: z.string().min(1, 'Database path must not be empty'),
  verbose: z.boolean().default(false),
  logFormat: logFormatSchema.default('pretty'),
});

// ============================================================================
// Transfer Schemas
// ============================================================================

export const transferFormatSchema = z.enum(['sql', 'json', 'csv']);

export const blobValueSchema = z.object({ $base64: z.string() }).strict();

export const bundleValueSchema = z.union([
  z.string(),
  z.number(),
  z.null(),
  blobValueSchema,
]);

export const bundleRowSchema = z.record(bundleValueSchema);

export const exportMetadataSchema = z.object({
  exportedAt: z.string(),
  version: z.string(),
  format: z.string(),
  tableCount: z.number().int().min(0),
  rowCount: z.number().int().min(0),
});

export const exportedTemplateSchema = z.object({
  name: z.string(),
  kind: z.string(),
  description: z.string(),
  content: z.string(),
  metadata: z.record(z.unknown()),
  createdAt: z.string().nullable(),
  updatedAt: z.string().nullable(),
});

export const exportedBlueprintSchema = z.object({
  name: z.string(),
  stack: z.string(),
  description: z.string(),
  config: z.record(z.unknown()),
  createdAt: z.string().nullable(),
  updatedAt: z.string().nullable(),
});

export const exportBundleSchema = z.object({
  metadata: exportMetadataSchema,
  tables: z.record(z.array(bundleRowSchema)),
  templates: z.array(exportedTemplateSchema).optional(),
  blueprints: z.array(exportedBlueprintSchema).optional(),
});

export type BundleValue = z.infer<typeof bundleValueSchema>;
export type BundleRow = z.infer<typeof bundleRowSchema>;
export type ExportMetadata = z.infer<typeof exportMetadataSchema>;
export type ExportedTemplate = z.infer<typeof exportedTemplateSchema>;
export type ExportedBlueprint = z.infer<typeof exportedBlueprintSchema>;
export type ExportBundle = z.infer<typeof exportBundleSchema>;

// ============================================================================
// Utility Functions
// ============================================================================

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

export function validateBody<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    error: result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', ')
  };
}
