/**
 * Entry schemas
 *
 * The drive speaks snake_case JSON; the rest of the code base works with the
 * camelCase `Entry` produced by `EntrySchema`.
 */

import { z } from "zod";
import { envelopeOf, pageOf } from "./common.ts";

// ============================================================================
// Kind
// ============================================================================

/** Entry type as exposed by the drive ("file" | "dir") */
export const EntryKindSchema = z.enum(["file", "dir"]);
export type EntryKind = z.infer<typeof EntryKindSchema>;

// ============================================================================
// Entry
// ============================================================================

/**
 * Entry exactly as it appears on the wire.
 */
export const EntryWireSchema = z.object({
  id: z.number().int(),
  /** Absent or null for the drive root */
  parent_id: z.number().int().nullish(),
  type: EntryKindSchema,
  name: z.string(),
  /** Bytes; only sent for files */
  size: z.number().int().nonnegative().nullish(),
  /** Unix seconds */
  last_modified_at: z.number().int(),
  /** Unix seconds */
  created_at: z.number().int(),
  depth: z.number().int().nonnegative().optional().default(0),
  status: z.string().nullish(),
  visibility: z.string().nullish(),
  color: z.string().nullish(),
});

export type EntryWire = z.input<typeof EntryWireSchema>;

/**
 * Immutable snapshot of one node of the remote tree.
 */
export type Entry = Readonly<{
  id: number;
  parentId: number;
  kind: EntryKind;
  name: string;
  /** Bytes, 0 for directories */
  size: number;
  /** Unix seconds */
  lastModifiedAt: number;
  /** Unix seconds */
  createdAt: number;
  /** Distance from the drive root */
  depth: number;
  status?: string;
  visibility?: string;
  color?: string;
}>;

export const EntrySchema: z.ZodType<Entry, z.ZodTypeDef, EntryWire> = EntryWireSchema.transform(
  (wire): Entry => ({
    id: wire.id,
    parentId: wire.parent_id ?? 0,
    kind: wire.type,
    name: wire.name,
    size: wire.type === "file" ? (wire.size ?? 0) : 0,
    lastModifiedAt: wire.last_modified_at,
    createdAt: wire.created_at,
    depth: wire.depth,
    ...(wire.status ? { status: wire.status } : {}),
    ...(wire.visibility ? { visibility: wire.visibility } : {}),
    ...(wire.color ? { color: wire.color } : {}),
  })
);

/**
 * Inverse of `EntrySchema`, used by stand-in servers.
 */
export const entryToWire = (entry: Entry): EntryWire => ({
  id: entry.id,
  parent_id: entry.parentId,
  type: entry.kind,
  name: entry.name,
  ...(entry.kind === "file" ? { size: entry.size } : {}),
  last_modified_at: entry.lastModifiedAt,
  created_at: entry.createdAt,
  depth: entry.depth,
  ...(entry.status ? { status: entry.status } : {}),
  ...(entry.visibility ? { visibility: entry.visibility } : {}),
  ...(entry.color ? { color: entry.color } : {}),
});

// ============================================================================
// Responses
// ============================================================================

/**
 * Response schema for GET /3/drive/{driveId}/files/{id}
 */
export const GetEntryResponseSchema = envelopeOf(EntrySchema);
export type GetEntryResponse = z.infer<typeof GetEntryResponseSchema>;

/**
 * Response schema for GET /3/drive/{driveId}/files/{id}/files
 */
export const ListChildrenResponseSchema = pageOf(EntrySchema);
export type ListChildrenResponse = z.infer<typeof ListChildrenResponseSchema>;
