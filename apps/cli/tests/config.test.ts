/**
 * Profiles, settings resolution and the config commands.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { createFakeDrive, fileEntry } from "@dirscope/client/testing";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { resolveSettings } from "../src/lib/client";
import {
  type Config,
  createProfile,
  deleteProfile,
  getConfigPath,
  getConfigValue,
  listProfiles,
  loadConfig,
  saveConfig,
  setConfigValue,
} from "../src/lib/config";
import { removeConfigDir, runCli, useTempConfigDir } from "./helpers";

const withProfiles = (): Config => ({
  currentProfile: "home",
  profiles: {
    home: { baseUrl: "https://home.test", driveId: 1, token: "home-token" },
    work: { baseUrl: "https://work.test", driveId: 2 },
  },
});

describe("config file", () => {
  let configDir: string;

  beforeEach(() => {
    configDir = useTempConfigDir();
  });

  afterEach(() => {
    removeConfigDir(configDir);
  });

  it("should start empty when no file exists", () => {
    expect(loadConfig()).toEqual({ currentProfile: "default", profiles: {} });
  });

  it("should save and load profiles", () => {
    saveConfig(withProfiles());

    expect(getConfigPath()).toBe(path.join(configDir, "config.json"));
    expect(loadConfig()).toEqual(withProfiles());
  });

  it("should reject a config file that does not match the schema", () => {
    fs.writeFileSync(
      getConfigPath(),
      JSON.stringify({ currentProfile: "x", profiles: { x: { baseUrl: "nope", driveId: 1 } } })
    );

    expect(() => loadConfig()).toThrow(
      `invalid config file ${getConfigPath()}: profiles.x.baseUrl: Invalid url`
    );
  });

  it("should reject a config file that is not JSON", () => {
    fs.writeFileSync(getConfigPath(), "{");

    expect(() => loadConfig()).toThrow(`cannot read config file ${getConfigPath()}`);
  });

  it("should get and set values of the current profile", () => {
    const config = withProfiles();

    setConfigValue(config, "driveId", "17");
    setConfigValue(config, "currentProfile", "work");
    setConfigValue(config, "token", "work-token");

    expect(config.profiles.home?.driveId).toBe(17);
    expect(getConfigValue(config, "currentProfile")).toBe("work");
    expect(getConfigValue(config, "token")).toBe("work-token");
    expect(getConfigValue(config, "driveId")).toBe("2");
    expect(() => setConfigValue(config, "driveId", "-3")).toThrow(
      'driveId must be a positive integer, got "-3"'
    );
    expect(() => setConfigValue(config, "colour", "red")).toThrow("Unknown config key: colour");
  });

  it("should manage profiles", () => {
    const config = withProfiles();

    createProfile(config, "lab", { baseUrl: "https://lab.test", driveId: 3 });

    expect(listProfiles(config)).toEqual([
      { name: "home", current: true, baseUrl: "https://home.test", driveId: 1 },
      { name: "work", current: false, baseUrl: "https://work.test", driveId: 2 },
      { name: "lab", current: false, baseUrl: "https://lab.test", driveId: 3 },
    ]);
    expect(() => createProfile(config, "lab", { baseUrl: "https://x.test", driveId: 1 })).toThrow(
      'Profile "lab" already exists'
    );
    expect(() => deleteProfile(config, "home")).toThrow("Cannot delete current profile");

    deleteProfile(config, "lab");
    expect(Object.keys(config.profiles)).toEqual(["home", "work"]);
  });
});

describe("resolveSettings", () => {
  it("should prefer options over environment over profile", () => {
    const config = withProfiles();

    expect(resolveSettings({}, config, {})).toEqual({
      profile: "home",
      baseUrl: "https://home.test",
      driveId: 1,
      token: "home-token",
    });
    expect(
      resolveSettings({}, config, { DIRSCOPE_BASE_URL: "https://env.test", DIRSCOPE_DRIVE_ID: "9" })
    ).toEqual({ profile: "home", baseUrl: "https://env.test", driveId: 9, token: "home-token" });
    expect(
      resolveSettings({ baseUrl: "https://opt.test", token: "opt-token" }, config, {
        DIRSCOPE_BASE_URL: "https://env.test",
        DIRSCOPE_API_TOKEN: "env-token",
      })
    ).toEqual({ profile: "home", baseUrl: "https://opt.test", driveId: 1, token: "opt-token" });
  });

  it("should use a named profile", () => {
    const settings = resolveSettings({ profile: "work" }, withProfiles(), {
      DIRSCOPE_API_TOKEN: "test-secret",
    });

    expect(settings).toEqual({
      profile: "work",
      baseUrl: "https://work.test",
      driveId: 2,
      token: "test-secret",
    });
  });

  it("should require an explicitly named profile to exist", () => {
    expect(() => resolveSettings({}, withProfiles(), { DIRSCOPE_PROFILE: "gone" })).toThrow(
      'Profile "gone" not found'
    );
  });

  it("should work from options alone", () => {
    const empty: Config = { currentProfile: "default", profiles: {} };

    expect(
      resolveSettings({ baseUrl: "https://x.test", driveId: "4", token: "test-secret" }, empty, {})
    ).toEqual({ profile: null, baseUrl: "https://x.test", driveId: 4, token: "test-secret" });
  });

  it("should name what is missing", () => {
    const empty: Config = { currentProfile: "default", profiles: {} };

    expect(() => resolveSettings({}, empty, {})).toThrow("base URL required");
    expect(() => resolveSettings({ baseUrl: "https://x.test" }, empty, {})).toThrow(
      "API token required"
    );
    expect(() =>
      resolveSettings({ baseUrl: "https://x.test", token: "test-secret" }, empty, {})
    ).toThrow("drive id required");
    expect(() =>
      resolveSettings({ baseUrl: "https://x.test", token: "test-secret", driveId: "abc" }, empty, {})
    ).toThrow('drive id must be a positive integer, got "abc"');
  });

  it("should reject drive ids that are not positive integers", () => {
    const connection = { baseUrl: "https://x.test", token: "test-secret" };
    const empty: Config = { currentProfile: "default", profiles: {} };

    expect(() => resolveSettings(connection, empty, { DIRSCOPE_DRIVE_ID: "1.5" })).toThrow(
      'drive id must be a positive integer, got "1.5"'
    );
    expect(() => resolveSettings({ ...connection, driveId: "0" }, empty, {})).toThrow(
      'drive id must be a positive integer, got "0"'
    );
    expect(resolveSettings(connection, withProfiles(), { DIRSCOPE_DRIVE_ID: "12" }).driveId).toBe(12);
  });
});

describe("dirscope config", () => {
  let configDir: string;

  beforeEach(() => {
    configDir = useTempConfigDir();
  });

  afterEach(() => {
    removeConfigDir(configDir);
  });

  it("should create a profile and use it for commands", async () => {
    const drive = createFakeDrive({
      driveId: 42,
      token: "test-secret",
      entries: [fileEntry(10, 1, "a.txt", 100)],
    });

    const created = await runCli([
      "config",
      "create",
      "work",
      "--url",
      "https://drive.test",
      "--drive",
      "42",
      "--api-token",
      "test-secret",
    ]);
    const listed = await runCli(["-f", "json", "config", "list"]);
    const scanned = await runCli(["-f", "json", "scan", "-a"], { fetch: drive.fetch });

    expect(created.code).toBe(0);
    expect(JSON.parse(listed.stdout)).toEqual([
      { name: "work", current: true, baseUrl: "https://drive.test", driveId: 42 },
    ]);
    expect(scanned.code).toBe(0);
    expect(JSON.parse(scanned.stdout).totals).toEqual({ files: 1, directories: 0, size: 100 });
    expect(drive.requests[0]?.authorization).toBe("Bearer test-secret");
  });

  it("should fail on a missing key", async () => {
    const result = await runCli(["config", "get", "token"]);

    expect(result.code).toBe(1);
    expect(result.stderr).toBe('Error: Configuration key "token" not found');
  });

  it("should print the config file path", async () => {
    const result = await runCli(["config", "path"]);

    expect(result.stdout).toBe(path.join(configDir, "config.json"));
  });
});
