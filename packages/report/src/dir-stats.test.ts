/**
 * Directory statistics tests.
 */

import type { Entry } from "@dirscope/protocol";
import { describe, expect, it } from "vitest";
import { computeDirectoryStats, type DirectoryStats, percentOf, selectDirectories } from "./dir-stats.ts";

const entry = (
  id: number,
  parentId: number,
  kind: Entry["kind"],
  name: string,
  size = 0,
  depth = 1
): Entry => ({ id, parentId, kind, name, size, depth, lastModifiedAt: 0, createdAt: 0 });

// /            (1): a.txt 100
// └── docs     (2): b 300, c 200
//     └── old  (3): (no files)
//         └── x (4): d 50
const ENTRIES: Entry[] = [
  entry(10, 1, "file", "a.txt", 100),
  entry(2, 1, "dir", "docs"),
  entry(11, 2, "file", "b", 300, 2),
  entry(12, 2, "file", "c", 200, 2),
  entry(3, 2, "dir", "old", 0, 2),
  entry(4, 3, "dir", "x", 0, 3),
  entry(13, 4, "file", "d", 50, 4),
];

const row = (id: number, name: string, fileCount: number, size: number, depth: number) => ({
  id,
  name,
  depth,
  fileCount,
  size,
});

describe("computeDirectoryStats", () => {
  it("should count direct files per directory, including the root", () => {
    const stats = computeDirectoryStats(ENTRIES, { id: 1, name: "/" });

    expect(stats.totalFiles).toBe(4);
    expect(stats.totalDirs).toBe(3);
    expect(stats.totalSize).toBe(650);
    expect([...stats.directories].sort((a, b) => a.id - b.id)).toEqual([
      row(1, "/", 1, 100, 0),
      row(2, "docs", 2, 500, 1),
      row(4, "x", 1, 50, 3),
    ]);
  });

  it("should ignore files whose parent is outside the crawl", () => {
    const stats = computeDirectoryStats([entry(20, 99, "file", "orphan", 5)], { id: 1, name: "/" });

    expect(stats.directories).toEqual([]);
    expect(stats.totalFiles).toBe(1);
    expect(stats.totalSize).toBe(5);
  });
});

describe("selectDirectories", () => {
  const dirs: DirectoryStats[] = [
    row(1, "a", 5, 100, 1),
    row(2, "b", 150, 10, 1),
    row(3, "c", 120, 900, 1),
    row(4, "d", 300, 50, 1),
  ];

  it("should sort by size and keep directories over the threshold", () => {
    const selection = selectDirectories(dirs, { sort: "size", threshold: 100, top: 10 });

    expect(selection.belowThreshold).toBe(false);
    expect(selection.rows.map((d) => d.name)).toEqual(["c", "d", "b"]);
  });

  it("should sort by file count and truncate to top", () => {
    const selection = selectDirectories(dirs, { sort: "files", threshold: 100, top: 2 });

    expect(selection.rows.map((d) => d.name)).toEqual(["d", "b"]);
  });

  it("should show the top directories when none reach the threshold", () => {
    const selection = selectDirectories(dirs, { sort: "files", threshold: 1000, top: 3 });

    expect(selection.belowThreshold).toBe(true);
    expect(selection.rows.map((d) => d.name)).toEqual(["d", "b", "c"]);
  });

  it("should return everything with all", () => {
    const selection = selectDirectories(dirs, { sort: "size", threshold: 1000, top: 1, all: true });

    expect(selection.belowThreshold).toBe(false);
    expect(selection.rows.map((d) => d.name)).toEqual(["c", "a", "d", "b"]);
  });

  it("should treat top 0 as unlimited", () => {
    const selection = selectDirectories(dirs, { sort: "size", threshold: 0, top: 0 });

    expect(selection.rows).toHaveLength(4);
  });

  it("should return nothing for no directories", () => {
    expect(selectDirectories([], { sort: "size", threshold: 1, top: 5 })).toEqual({
      rows: [],
      belowThreshold: false,
    });
  });
});

describe("percentOf", () => {
  it("should guard against an empty total", () => {
    expect(percentOf(25, 200)).toBe(12.5);
    expect(percentOf(5, 0)).toBe(0);
  });
});
