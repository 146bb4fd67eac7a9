import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";

// ============================================================================
// Schema
// ============================================================================

export const ProfileConfigSchema = z.object({
  baseUrl: z.string().url(),
  driveId: z.number().int().positive(),
  token: z.string().optional(),
});

export const ConfigSchema = z.object({
  currentProfile: z.string(),
  profiles: z.record(ProfileConfigSchema),
});

export type ProfileConfig = z.infer<typeof ProfileConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;

const DEFAULT_PROFILE = "default";

const defaultConfig = (): Config => ({
  currentProfile: DEFAULT_PROFILE,
  profiles: {},
});

/** Keys accepted by `config get` / `config set` */
export const CONFIG_KEYS = ["currentProfile", "baseUrl", "driveId", "token"] as const;

// ============================================================================
// Paths
// ============================================================================

export function getConfigDir(): string {
  return process.env.DIRSCOPE_CONFIG_DIR || path.join(os.homedir(), ".dirscope");
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), "config.json");
}

export function ensureConfigDir(): void {
  const dir = getConfigDir();
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
}

// ============================================================================
// Load / save
// ============================================================================

/**
 * Read the config file. A missing file yields an empty config; an
 * unreadable or invalid one is an error.
 */
export function loadConfig(): Config {
  const configPath = getConfigPath();
  if (!fs.existsSync(configPath)) {
    return defaultConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`cannot read config file ${configPath}: ${reason}`);
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(
      `invalid config file ${configPath}: ${issue?.path.join(".") || "(root)"}: ${issue?.message}`
    );
  }
  return parsed.data;
}

export function saveConfig(config: Config): void {
  ensureConfigDir();
  fs.writeFileSync(getConfigPath(), `${JSON.stringify(config, null, 2)}\n`, {
    encoding: "utf-8",
    mode: 0o600,
  });
}

// ============================================================================
// Profiles
// ============================================================================

export function getProfile(config: Config, profileName?: string): ProfileConfig {
  const name = profileName || config.currentProfile;
  const profile = config.profiles[name];
  if (!profile) {
    throw new Error(`Profile "${name}" not found. Run 'dirscope config init' to create one.`);
  }
  return profile;
}

function currentProfile(config: Config): ProfileConfig {
  const profile = config.profiles[config.currentProfile];
  if (!profile) {
    throw new Error(`Current profile "${config.currentProfile}" not found`);
  }
  return profile;
}

function parseDriveId(value: string): number {
  const id = Number(value);
  if (!Number.isInteger(id) || id <= 0) {
    throw new Error(`driveId must be a positive integer, got "${value}"`);
  }
  return id;
}

export function setConfigValue(config: Config, key: string, value: string): void {
  switch (key) {
    case "currentProfile":
      if (!config.profiles[value]) {
        throw new Error(`Profile "${value}" does not exist`);
      }
      config.currentProfile = value;
      return;
    case "baseUrl":
      currentProfile(config).baseUrl = ProfileConfigSchema.shape.baseUrl.parse(value);
      return;
    case "driveId":
      currentProfile(config).driveId = parseDriveId(value);
      return;
    case "token":
      currentProfile(config).token = value;
      return;
    default:
      throw new Error(`Unknown config key: ${key} (expected one of ${CONFIG_KEYS.join(", ")})`);
  }
}

export function getConfigValue(config: Config, key: string): string | undefined {
  if (key === "currentProfile") return config.currentProfile;
  const profile = config.profiles[config.currentProfile];
  switch (key) {
    case "baseUrl":
      return profile?.baseUrl;
    case "driveId":
      return profile === undefined ? undefined : String(profile.driveId);
    case "token":
      return profile?.token;
    default:
      return undefined;
  }
}

export function listProfiles(
  config: Config
): Array<{ name: string; current: boolean; baseUrl: string; driveId: number }> {
  return Object.entries(config.profiles).map(([name, profile]) => ({
    name,
    current: name === config.currentProfile,
    baseUrl: profile.baseUrl,
    driveId: profile.driveId,
  }));
}

export function createProfile(config: Config, name: string, profile: ProfileConfig): void {
  if (config.profiles[name]) {
    throw new Error(`Profile "${name}" already exists`);
  }
  config.profiles[name] = ProfileConfigSchema.parse(profile);
}

export function deleteProfile(config: Config, name: string): void {
  if (!config.profiles[name]) {
    throw new Error(`Profile "${name}" does not exist`);
  }
  if (name === config.currentProfile) {
    throw new Error(`Cannot delete current profile. Switch to another profile first.`);
  }
  delete config.profiles[name];
}
