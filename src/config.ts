/**
 * Runtime configuration and crawl profiles.
 *
 * Each profile replaces what used to be a one-off scanning script: the pages
 * to walk, how to decide the source is exhausted and how often to save.
 */

import "dotenv/config";

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { InvalidConfigError } from "./errors.js";

import type { CrawlConfig, SnapshotConfig } from "./types/index.js";

// ============================================================================
// Environment
// ============================================================================

function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new InvalidConfigError(`${name} must be a number, got "${raw}"`);
  }
  return parsed;
}

export const METBULL_BASE_URL =
  process.env.METBULL_BASE_URL ?? "https://www.lpi.usra.edu/meteor/metbull.php";

/** Hard per-request timeout */
export const METBULL_TIMEOUT_MS = envNumber("METBULL_TIMEOUT_MS", 45_000);

// Anonymous clients get rejected by the Bulletin server
export const METBULL_USER_AGENT =
  process.env.METBULL_USER_AGENT ??
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36";

export const DATASET_PATH =
  process.env.DATASET_PATH ?? "./Meteorite_Landings_Final.csv";

export const CHECKPOINT_DB_PATH =
  process.env.CHECKPOINT_DB_PATH ?? "./data/checkpoints.db";

// ============================================================================
// Crawl Profiles
// ============================================================================

export const CrawlConfigSchema = Type.Object({
  profile: Type.String({ minLength: 1 }),
  startPage: Type.Integer({ minimum: 0 }),
  endPage: Type.Integer({ minimum: 0 }),
  pageSize: Type.Integer({ minimum: 1, maximum: 5000 }),
  yearFloor: Type.Union([Type.Integer({ minimum: 0 }), Type.Null()]),
  emptyPageLimit: Type.Integer({ minimum: 1 }),
  delayMs: Type.Integer({ minimum: 0 }),
  checkpointEvery: Type.Integer({ minimum: 0 }),
});

const BASE_PROFILE = {
  pageSize: 500,
  yearFloor: null,
  emptyPageLimit: 1,
  delayMs: 1000,
  checkpointEvery: 10,
} satisfies Partial<CrawlConfig>;

export const CRAWL_PROFILES = {
  // Newest ~12,500 records
  recent: { ...BASE_PROFILE, profile: "recent", startPage: 0, endPage: 24 },
  // Walk back until the records predate 2012
  deep: {
    ...BASE_PROFILE,
    profile: "deep",
    startPage: 0,
    endPage: 100,
    yearFloor: 2012,
  },
  // Older pages; tolerate a couple of blank responses before giving up
  history: {
    ...BASE_PROFILE,
    profile: "history",
    startPage: 100,
    endPage: 180,
    emptyPageLimit: 3,
  },
  // Quick pass over recent pages after names were cleaned
  rescan: {
    ...BASE_PROFILE,
    profile: "rescan",
    startPage: 0,
    endPage: 60,
    delayMs: 500,
  },
} satisfies Record<string, CrawlConfig>;

export type ProfileName = keyof typeof CRAWL_PROFILES;

export function isProfileName(value: string): value is ProfileName {
  return Object.prototype.hasOwnProperty.call(CRAWL_PROFILES, value);
}

// Unset CLI flags come through as undefined and must not mask defaults
function definedOnly(overrides: object): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
}

function checkSchema<T extends TSchema>(
  schema: T,
  candidate: unknown,
  label: string
): Static<T> {
  if (!Value.Check(schema, candidate)) {
    const details = [...Value.Errors(schema, candidate)].map(
      (error) => `${error.path || "/"}: ${error.message}`
    );
    throw new InvalidConfigError(`Invalid ${label}`, details);
  }
  return candidate;
}

function checkPageRange(config: { startPage: number; endPage: number }): void {
  if (config.endPage < config.startPage) {
    throw new InvalidConfigError(
      `endPage (${String(config.endPage)}) is before startPage (${String(config.startPage)})`
    );
  }
}

/**
 * Resolve a profile by name and apply overrides, then validate the result.
 */
export function resolveCrawlConfig(
  profileName: string,
  overrides: Partial<Omit<CrawlConfig, "profile">> = {}
): CrawlConfig {
  if (!isProfileName(profileName)) {
    throw new InvalidConfigError(
      `Unknown crawl profile "${profileName}". Available: ${Object.keys(CRAWL_PROFILES).join(", ")}`
    );
  }

  return validateCrawlConfig({
    ...CRAWL_PROFILES[profileName],
    ...definedOnly(overrides),
  });
}

export function validateCrawlConfig(candidate: unknown): CrawlConfig {
  const config = checkSchema(CrawlConfigSchema, candidate, "crawl configuration");
  checkPageRange(config);
  return config;
}

// ============================================================================
// Snapshot
// ============================================================================

export const SnapshotConfigSchema = Type.Object({
  startPage: Type.Integer({ minimum: 0 }),
  endPage: Type.Integer({ minimum: 0 }),
  pageSize: Type.Integer({ minimum: 1, maximum: 5000 }),
  sinceYear: Type.Integer({ minimum: 0 }),
  delayMs: Type.Integer({ minimum: 0 }),
  renderHint: Type.String({ minLength: 1 }),
});

// Newest records back to 2012, rendered as the full table
export const SNAPSHOT_DEFAULTS = {
  startPage: 0,
  endPage: 100,
  pageSize: 500,
  sinceYear: 2012,
  delayMs: 1000,
  renderHint: "Normal table",
} satisfies SnapshotConfig;

export function resolveSnapshotConfig(
  overrides: Partial<SnapshotConfig> = {}
): SnapshotConfig {
  const config = checkSchema(
    SnapshotConfigSchema,
    { ...SNAPSHOT_DEFAULTS, ...definedOnly(overrides) },
    "snapshot configuration"
  );
  checkPageRange(config);
  return config;
}
