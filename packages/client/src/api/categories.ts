/**
 * Category API functions.
 *
 *   GET    /2/drive/{driveId}/categories
 *   POST   /2/drive/{driveId}/files/categories/{categoryId}   add to entries
 *   DELETE /2/drive/{driveId}/files/categories/{categoryId}   remove from entries
 */

import {
  type Category,
  type CategoryResult,
  ListCategoriesResponseSchema,
  type ModifyCategory,
  ModifyCategoryResponseSchema,
} from "@dirscope/protocol";
import type { Transport } from "../transport/transport.ts";
import type { FetchResult } from "../types/client.ts";
import { decodeEnvelope } from "../utils/decode.ts";

export type CategoryMethods = {
  list: (signal?: AbortSignal) => Promise<FetchResult<Category[]>>;
  /** Tag entries; a `false` result means the entry already had the category */
  add: (
    categoryId: number,
    entryIds: number[],
    signal?: AbortSignal
  ) => Promise<FetchResult<CategoryResult[]>>;
  /** Untag entries; a `false` result means the entry did not have the category */
  remove: (
    categoryId: number,
    entryIds: number[],
    signal?: AbortSignal
  ) => Promise<FetchResult<CategoryResult[]>>;
};

type CategoryDeps = {
  transport: Transport;
  driveId: number;
};

export const createCategoryMethods = ({ transport, driveId }: CategoryDeps): CategoryMethods => {
  const modify =
    (method: "POST" | "DELETE") =>
    async (
      categoryId: number,
      entryIds: number[],
      signal?: AbortSignal
    ): Promise<FetchResult<CategoryResult[]>> => {
      const body: ModifyCategory = { file_ids: entryIds };
      const response = await transport.execute(
        method,
        `/2/drive/${driveId}/files/categories/${categoryId}`,
        body,
        signal
      );
      if (!response.ok) return response;
      return decodeEnvelope(response.data, ModifyCategoryResponseSchema, response.status);
    };

  return {
    async list(signal) {
      const response = await transport.execute(
        "GET",
        `/2/drive/${driveId}/categories`,
        undefined,
        signal
      );
      if (!response.ok) return response;
      return decodeEnvelope(response.data, ListCategoriesResponseSchema, response.status);
    },
    add: modify("POST"),
    remove: modify("DELETE"),
  };
};
