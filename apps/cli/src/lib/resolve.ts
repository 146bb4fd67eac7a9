import type { DriveClient } from "@dirscope/client";
import type { Category } from "@dirscope/protocol";
import { ROOT_ENTRY_ID } from "@dirscope/protocol";
import { unwrap } from "./errors";

export interface StartPoint {
  id: number;
  name: string;
}

const NUMERIC = /^\d+$/;

/**
 * Resolve a command's `[path|id]` argument.
 *
 * - nothing: the drive root, named "/"
 * - digits: that id, named after the entry (or the id itself if the lookup fails)
 * - anything else: a path from the root
 */
export async function resolveStartPath(
  client: DriveClient,
  arg: string | undefined,
  signal?: AbortSignal
): Promise<StartPoint> {
  if (arg === undefined || arg === "") {
    return { id: ROOT_ENTRY_ID, name: "/" };
  }
  if (NUMERIC.test(arg)) {
    const id = Number(arg);
    const entry = await client.entries.get(id, signal);
    return { id, name: entry.ok ? entry.data.name : arg };
  }
  const entry = unwrap(await client.entries.findByPath(arg, signal));
  return { id: entry.id, name: entry.name };
}

/**
 * Resolve an entry id or a path to an id, without fetching numeric ids.
 */
export async function resolveEntryId(
  client: DriveClient,
  idOrPath: string,
  signal?: AbortSignal
): Promise<number> {
  if (NUMERIC.test(idOrPath)) return Number(idOrPath);
  return unwrap(await client.entries.findByPath(idOrPath, signal)).id;
}

/**
 * Resolve a category by id or by case-insensitive name.
 * An unknown numeric id is passed through, named after itself.
 */
export async function resolveCategory(
  client: DriveClient,
  nameOrId: string,
  signal?: AbortSignal
): Promise<Pick<Category, "id" | "name">> {
  const listed = await client.categories.list(signal);

  if (NUMERIC.test(nameOrId)) {
    const id = Number(nameOrId);
    const match = listed.ok ? listed.data.find((c) => c.id === id) : undefined;
    return { id, name: match?.name ?? nameOrId };
  }

  const wanted = nameOrId.toLowerCase();
  const match = unwrap(listed).find((c) => c.name.toLowerCase() === wanted);
  if (!match) {
    throw new Error(`category '${nameOrId}' not found`);
  }
  return { id: match.id, name: match.name };
}
