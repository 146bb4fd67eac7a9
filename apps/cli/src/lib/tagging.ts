import type { DriveClient, FetchResult } from "@dirscope/client";

export const TAG_BATCH_SIZE = 50;

export type TagMode = "add" | "remove";

export interface TagSummary {
  /** Entries whose categories changed */
  changed: number;
  /** Entries that already had (add) or lacked (remove) the category */
  skipped: number;
}

export interface ApplyCategoryOptions {
  categoryId: number;
  entryIds: readonly number[];
  mode: TagMode;
  batchSize?: number;
  signal?: AbortSignal;
  /** Called after each batch with the number of entries processed so far */
  onProgress?: (done: number, total: number) => void;
}

/**
 * Add or remove a category on many entries, one batch at a time.
 * Stops at the first failing batch; earlier batches stay applied.
 */
export async function applyCategory(
  client: DriveClient,
  options: ApplyCategoryOptions
): Promise<FetchResult<TagSummary>> {
  const { categoryId, entryIds, mode, batchSize = TAG_BATCH_SIZE, signal, onProgress } = options;
  const call = mode === "add" ? client.categories.add : client.categories.remove;
  const summary: TagSummary = { changed: 0, skipped: 0 };

  for (let i = 0; i < entryIds.length; i += batchSize) {
    const batch = entryIds.slice(i, i + batchSize);
    const result = await call(categoryId, batch, signal);
    if (!result.ok) return result;

    for (const item of result.data) {
      if (item.result) summary.changed++;
      else summary.skipped++;
    }
    onProgress?.(i + batch.length, entryIds.length);
  }

  return { ok: true, data: summary, status: 200 };
}
