/**
 * Aggregations over crawled entries
 *
 * @packageDocumentation
 */

export {
  AGE_BUCKETS,
  type AgeBucket,
  type AgeBucketDefinition,
  type AgeReport,
  type AgeReportOptions,
  buildAgeReport,
  DAYS_PER_MONTH,
  DAYS_PER_YEAR,
  formatAgeDays,
  parseAge,
  type StaleFile,
} from "./age.ts";
export {
  computeDirectoryStats,
  type DirectorySelection,
  type DirectorySort,
  type DirectoryStats,
  percentOf,
  type SelectOptions,
  selectDirectories,
  type TreeStats,
} from "./dir-stats.ts";
