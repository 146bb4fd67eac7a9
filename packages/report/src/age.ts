/**
 * File age distribution and stale-file report.
 */

import type { Entry } from "@dirscope/protocol";

// ============================================================================
// Constants
// ============================================================================

export const DAYS_PER_YEAR = 365;
export const DAYS_PER_MONTH = 30;

const SECONDS_PER_DAY = 86_400;

export type AgeBucketDefinition = {
  label: string;
  minDays: number;
  /** Exclusive; null = unbounded */
  maxDays: number | null;
};

export const AGE_BUCKETS: readonly AgeBucketDefinition[] = [
  { label: "< 6 months", minDays: 0, maxDays: 182 },
  { label: "6 months - 1 year", minDays: 182, maxDays: 365 },
  { label: "1 - 2 years", minDays: 365, maxDays: 730 },
  { label: "2 - 3 years", minDays: 730, maxDays: 1095 },
  { label: "3 - 5 years", minDays: 1095, maxDays: 1825 },
  { label: "> 5 years", minDays: 1825, maxDays: null },
];

// ============================================================================
// Types
// ============================================================================

export type AgeBucket = AgeBucketDefinition & {
  count: number;
  size: number;
};

export type StaleFile = {
  id: number;
  name: string;
  size: number;
  /** Unix seconds */
  lastModifiedAt: number;
  ageDays: number;
};

export type AgeReport = {
  buckets: AgeBucket[];
  /** Sorted by size, largest first */
  staleFiles: StaleFile[];
  staleSize: number;
  totalFiles: number;
  totalSize: number;
};

export type AgeReportOptions = {
  thresholdDays: number;
  /** Files smaller than this are never reported stale (default: 0) */
  minSize?: number;
  /** Reference time, ms since epoch (default: Date.now()) */
  now?: number;
};

// ============================================================================
// Parsing / formatting
// ============================================================================

const AGE_PATTERN = /^(\d+)([ymadj]?)$/;

/**
 * Parse "2y", "6m", "90d" (or a bare number of years) into days.
 * "a" and "j" are accepted for years and days.
 */
export const parseAge = (input: string): number => {
  const match = AGE_PATTERN.exec(input.trim().toLowerCase());
  if (!match) {
    throw new Error(`invalid age format "${input}": expected <number>[y|m|d] (e.g. 2y, 6m, 90d)`);
  }
  const value = Number(match[1]);
  switch (match[2]) {
    case "m":
      return value * DAYS_PER_MONTH;
    case "d":
    case "j":
      return value;
    default:
      return value * DAYS_PER_YEAR;
  }
};

export const formatAgeDays = (days: number): string => {
  const years = Math.floor(days / DAYS_PER_YEAR);
  const months = Math.floor((days % DAYS_PER_YEAR) / DAYS_PER_MONTH);
  if (years > 0) return months > 0 ? `${years}y ${months}m` : `${years}y`;
  if (months > 0) return `${months}m`;
  return `${days}d`;
};

// ============================================================================
// Report
// ============================================================================

const bucketIndex = (ageDays: number): number =>
  AGE_BUCKETS.findIndex(
    (b) => ageDays >= b.minDays && (b.maxDays === null || ageDays < b.maxDays)
  );

/**
 * Bucket every file by age and list those older than `thresholdDays`.
 * Directories are ignored. Ages are whole days since `lastModifiedAt`.
 */
export const buildAgeReport = (entries: readonly Entry[], options: AgeReportOptions): AgeReport => {
  const { thresholdDays, minSize = 0, now = Date.now() } = options;
  const nowSeconds = Math.floor(now / 1000);
  const cutoff = nowSeconds - thresholdDays * SECONDS_PER_DAY;

  const buckets: AgeBucket[] = AGE_BUCKETS.map((b) => ({ ...b, count: 0, size: 0 }));
  const staleFiles: StaleFile[] = [];
  let totalFiles = 0;
  let totalSize = 0;

  for (const entry of entries) {
    if (entry.kind !== "file") continue;
    totalFiles++;
    totalSize += entry.size;

    // Timestamps in the future count as age 0.
    const ageDays = Math.max(0, Math.floor((nowSeconds - entry.lastModifiedAt) / SECONDS_PER_DAY));
    const bucket = buckets[bucketIndex(ageDays)];
    if (bucket) {
      bucket.count++;
      bucket.size += entry.size;
    }

    if (entry.lastModifiedAt < cutoff && entry.size >= minSize) {
      staleFiles.push({
        id: entry.id,
        name: entry.name,
        size: entry.size,
        lastModifiedAt: entry.lastModifiedAt,
        ageDays,
      });
    }
  }

  staleFiles.sort((a, b) => b.size - a.size || a.id - b.id);

  return {
    buckets,
    staleFiles,
    staleSize: staleFiles.reduce((sum, f) => sum + f.size, 0),
    totalFiles,
    totalSize,
  };
};
