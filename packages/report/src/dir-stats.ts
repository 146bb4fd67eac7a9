/**
 * Per-directory file statistics (direct children only).
 */

import type { Entry } from "@dirscope/protocol";

// ============================================================================
// Types
// ============================================================================

export type DirectoryStats = {
  id: number;
  name: string;
  depth: number;
  /** Files directly inside the directory */
  fileCount: number;
  /** Bytes of those files */
  size: number;
};

export type TreeStats = {
  /** Directories with at least one direct file, unordered */
  directories: DirectoryStats[];
  totalFiles: number;
  totalDirs: number;
  totalSize: number;
};

export type DirectorySort = "size" | "files";

export type SelectOptions = {
  sort: DirectorySort;
  /** Minimum direct file count */
  threshold: number;
  /** Row limit, 0 = unlimited */
  top: number;
  /** Skip threshold and limit */
  all?: boolean;
};

export type DirectorySelection = {
  rows: DirectoryStats[];
  /** No directory met the threshold; rows are the top directories regardless */
  belowThreshold: boolean;
};

// ============================================================================
// Aggregation
// ============================================================================

/**
 * Count files and bytes per parent directory.
 * `root` is the crawl root, which the crawl itself does not return.
 */
export const computeDirectoryStats = (
  entries: readonly Entry[],
  root: { id: number; name: string }
): TreeStats => {
  const byId = new Map<number, DirectoryStats>();
  for (const entry of entries) {
    if (entry.kind === "dir") {
      byId.set(entry.id, { id: entry.id, name: entry.name, depth: entry.depth, fileCount: 0, size: 0 });
    }
  }
  byId.set(root.id, { id: root.id, name: root.name, depth: 0, fileCount: 0, size: 0 });

  let totalFiles = 0;
  let totalDirs = 0;
  let totalSize = 0;
  for (const entry of entries) {
    if (entry.kind === "dir") {
      totalDirs++;
      continue;
    }
    totalFiles++;
    totalSize += entry.size;
    const parent = byId.get(entry.parentId);
    if (parent) {
      parent.fileCount++;
      parent.size += entry.size;
    }
  }

  return {
    directories: [...byId.values()].filter((d) => d.fileCount > 0),
    totalFiles,
    totalDirs,
    totalSize,
  };
};

const comparators: Record<DirectorySort, (a: DirectoryStats, b: DirectoryStats) => number> = {
  size: (a, b) => b.size - a.size || b.fileCount - a.fileCount || a.id - b.id,
  files: (a, b) => b.fileCount - a.fileCount || b.size - a.size || a.id - b.id,
};

const limit = <T>(rows: T[], top: number): T[] => (top > 0 ? rows.slice(0, top) : rows);

/**
 * Sort directories descending and keep those with at least `threshold`
 * files, at most `top` of them. When none qualify, the top directories are
 * returned anyway and flagged.
 */
export const selectDirectories = (
  directories: readonly DirectoryStats[],
  options: SelectOptions
): DirectorySelection => {
  const sorted = [...directories].sort(comparators[options.sort]);
  if (options.all) return { rows: sorted, belowThreshold: false };

  const passing = sorted.filter((d) => d.fileCount >= options.threshold);
  if (passing.length === 0 && sorted.length > 0) {
    return { rows: limit(sorted, options.top), belowThreshold: true };
  }
  return { rows: limit(passing, options.top), belowThreshold: false };
};

/** Share of `part` in `total`, in percent; 0 when total is 0 */
export const percentOf = (part: number, total: number): number =>
  total > 0 ? (part / total) * 100 : 0;
