/**
 * Entry API functions.
 *
 *   GET /3/drive/{driveId}/files/{id}          single entry
 *   GET /3/drive/{driveId}/files/{id}/files    one page of direct children
 */

import {
  type Entry,
  GetEntryResponseSchema,
  ListChildrenResponseSchema,
  RESULT_SUCCESS,
  ROOT_ENTRY_ID,
} from "@dirscope/protocol";
import type { Transport } from "../transport/transport.ts";
import type { FetchResult, Logger } from "../types/client.ts";
import { decodeEnvelope, decodeJson } from "../utils/decode.ts";
import { createError } from "../utils/errors.ts";

// ============================================================================
// Types
// ============================================================================

export type ListChildren = (dirId: number, signal?: AbortSignal) => Promise<FetchResult<Entry[]>>;

export type EntryMethods = {
  /** Fetch one entry by id */
  get: (id: number, signal?: AbortSignal) => Promise<FetchResult<Entry>>;
  /** All direct children of a directory, every page, in server order */
  listChildren: ListChildren;
  /** Resolve a slash-separated path from the drive root, matching names case-insensitively */
  findByPath: (path: string, signal?: AbortSignal) => Promise<FetchResult<Entry>>;
};

type EntryDeps = {
  transport: Transport;
  driveId: number;
  logger: Logger;
};

// ============================================================================
// Factory
// ============================================================================

export const createEntryMethods = ({ transport, driveId, logger }: EntryDeps): EntryMethods => {
  const entryPath = (id: number) => `/3/drive/${driveId}/files/${id}`;

  const get: EntryMethods["get"] = async (id, signal) => {
    const response = await transport.execute("GET", entryPath(id), undefined, signal);
    if (!response.ok) return response;
    return decodeEnvelope(response.data, GetEntryResponseSchema, response.status);
  };

  const listChildren: ListChildren = async (dirId, signal) => {
    const basePath = `${entryPath(dirId)}/files`;
    const children: Entry[] = [];
    let cursor: string | undefined;
    let pages = 0;

    for (;;) {
      const path = cursor ? `${basePath}?cursor=${encodeURIComponent(cursor)}` : basePath;
      const response = await transport.execute("GET", path, undefined, signal);
      if (!response.ok) return response;

      const page = decodeJson(response.data, ListChildrenResponseSchema, response.status);
      if (!page.ok) return page;
      if (page.data.result !== RESULT_SUCCESS) {
        return {
          ok: false,
          error: createError("API_ERROR", `API error: ${page.data.result}`, response.status),
        };
      }

      children.push(...page.data.data);
      pages++;

      if (!page.data.has_more) break;
      if (!page.data.cursor) {
        return {
          ok: false,
          error: createError(
            "DECODE_ERROR",
            `listing of ${dirId} reported more pages without a cursor`,
            response.status
          ),
        };
      }
      cursor = page.data.cursor;
    }

    logger.debug("listed directory", { dirId, pages, entries: children.length });
    return { ok: true, data: children, status: 200 };
  };

  const findByPath: EntryMethods["findByPath"] = async (path, signal) => {
    const segments = path.split("/").filter((s) => s.length > 0);
    let currentId = ROOT_ENTRY_ID;

    for (const segment of segments) {
      const listed = await listChildren(currentId, signal);
      if (!listed.ok) return listed;

      const wanted = segment.toLowerCase();
      const match = listed.data.find((e) => e.name.toLowerCase() === wanted);
      if (!match) {
        return {
          ok: false,
          error: createError("NOT_FOUND", `path not found: ${segment}`, 404, { path }),
        };
      }
      currentId = match.id;
    }

    return get(currentId, signal);
  };

  return { get, listChildren, findByPath };
};
