/**
 * Category (tag) schemas
 */

import { z } from "zod";
import { envelopeOf } from "./common.ts";

// ============================================================================
// Category
// ============================================================================

export const CategoryWireSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  color: z.string().optional().default(""),
  is_predefined: z.boolean().optional().default(false),
  created_by: z.number().int().nullish(),
  created_at: z.number().int().nullish(),
});

export type CategoryWire = z.input<typeof CategoryWireSchema>;

export type Category = Readonly<{
  id: number;
  name: string;
  /** Hex colour, e.g. "#1abc9c" */
  color: string;
  isPredefined: boolean;
  createdBy?: number;
  createdAt?: number;
}>;

export const CategorySchema: z.ZodType<Category, z.ZodTypeDef, CategoryWire> =
  CategoryWireSchema.transform(
    (wire): Category => ({
      id: wire.id,
      name: wire.name,
      color: wire.color,
      isPredefined: wire.is_predefined,
      ...(wire.created_by != null ? { createdBy: wire.created_by } : {}),
      ...(wire.created_at != null ? { createdAt: wire.created_at } : {}),
    })
  );

// ============================================================================
// Category assignment
// ============================================================================

/**
 * Body of POST / DELETE /2/drive/{driveId}/files/categories/{categoryId}
 */
export const ModifyCategorySchema = z.object({
  file_ids: z.array(z.number().int()).min(1),
});
export type ModifyCategory = z.infer<typeof ModifyCategorySchema>;

/**
 * Per-entry outcome. `result` is false when nothing changed
 * (already tagged on add, not tagged on remove).
 */
export const CategoryResultSchema = z.object({
  id: z.number().int(),
  result: z.boolean(),
});
export type CategoryResult = z.infer<typeof CategoryResultSchema>;

/**
 * Response schema for GET /2/drive/{driveId}/categories
 */
export const ListCategoriesResponseSchema = envelopeOf(z.array(CategorySchema));

/**
 * Response schema for category assignment
 */
export const ModifyCategoryResponseSchema = envelopeOf(z.array(CategoryResultSchema));
