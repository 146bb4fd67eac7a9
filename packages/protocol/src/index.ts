/**
 * Drive protocol - shared schemas and types for the API contract
 *
 * @packageDocumentation
 */

export {
  DriveIdSchema,
  RESULT_SUCCESS,
  ROOT_ENTRY_ID,
} from "./common.ts";

export type {
  Entry,
  EntryKind,
  EntryWire,
  GetEntryResponse,
  ListChildrenResponse,
} from "./entry.ts";
export {
  EntrySchema,
  entryToWire,
  GetEntryResponseSchema,
  ListChildrenResponseSchema,
} from "./entry.ts";

export type { Category, CategoryResult, CategoryWire, ModifyCategory } from "./category.ts";
export {
  ListCategoriesResponseSchema,
  ModifyCategoryResponseSchema,
  ModifyCategorySchema,
} from "./category.ts";

export type { ErrorResponse } from "./errors.ts";
export {
  ErrorResponseSchema,
  NOT_AUTHORIZED,
  OBJECT_NOT_FOUND,
  RATE_LIMIT_EXCEEDED,
} from "./errors.ts";
