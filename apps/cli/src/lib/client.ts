import { createClient, type DriveClient, type FetchFunction, type Logger } from "@dirscope/client";
import { DriveIdSchema } from "@dirscope/protocol";
import { type Config, getProfile, loadConfig, type ProfileConfig } from "./config";
import type { GlobalOptions } from "./options";

// ============================================================================
// Connection settings
// ============================================================================

/**
 * Everything needed to reach one drive, after merging options, environment
 * and profile.
 */
export interface ConnectionSettings {
  /** Profile name used, or null when none was found */
  profile: string | null;
  baseUrl: string;
  driveId: number;
  token: string;
}

type Env = Record<string, string | undefined>;

/**
 * Merge connection settings. Precedence: command-line option, then
 * environment variable, then profile.
 *
 * A profile named explicitly (--profile or DIRSCOPE_PROFILE) must exist;
 * a missing current profile is tolerated so that options and environment
 * alone are enough.
 */
export function resolveSettings(
  opts: Pick<GlobalOptions, "profile" | "baseUrl" | "driveId" | "token">,
  config: Config,
  env: Env = process.env
): ConnectionSettings {
  const explicitProfile = opts.profile || env.DIRSCOPE_PROFILE;
  let profileName: string | null = explicitProfile || config.currentProfile;
  let profile: ProfileConfig | undefined;
  if (explicitProfile) {
    profile = getProfile(config, explicitProfile);
  } else {
    profile = config.profiles[config.currentProfile];
    if (!profile) profileName = null;
  }

  const baseUrl = opts.baseUrl || env.DIRSCOPE_BASE_URL || profile?.baseUrl;
  const token = opts.token || env.DIRSCOPE_API_TOKEN || profile?.token;
  const driveIdText = opts.driveId || env.DIRSCOPE_DRIVE_ID;

  if (!baseUrl) {
    throw new Error(
      "base URL required (--base-url, DIRSCOPE_BASE_URL or 'dirscope config init')"
    );
  }
  if (!token) {
    throw new Error("API token required (--token, DIRSCOPE_API_TOKEN or 'dirscope config set token')");
  }
  let driveId = profile?.driveId;
  if (driveIdText) {
    const parsed = DriveIdSchema.safeParse(driveIdText);
    if (!parsed.success) {
      throw new Error(`drive id must be a positive integer, got "${driveIdText}"`);
    }
    driveId = parsed.data;
  }
  if (driveId === undefined) {
    throw new Error("drive id required (--drive-id, DIRSCOPE_DRIVE_ID or 'dirscope config init')");
  }

  return { profile: profileName, baseUrl, driveId, token };
}

// ============================================================================
// Client
// ============================================================================

export interface ResolvedClient {
  client: DriveClient;
  settings: ConnectionSettings;
}

/**
 * Build a drive client from the global options.
 */
export function createDriveClient(
  opts: GlobalOptions,
  logger: Logger,
  fetch?: FetchFunction
): ResolvedClient {
  const settings = resolveSettings(opts, loadConfig());
  logger.debug("using drive", {
    profile: settings.profile ?? "(none)",
    baseUrl: settings.baseUrl,
    driveId: settings.driveId,
  });

  const client = createClient({
    baseUrl: settings.baseUrl,
    token: settings.token,
    driveId: settings.driveId,
    fetch,
    logger,
  });
  return { client, settings };
}
