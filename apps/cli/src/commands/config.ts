import type { Command } from "commander";
import enquirer from "enquirer";
import {
  CONFIG_KEYS,
  createProfile,
  deleteProfile,
  getConfigPath,
  getConfigValue,
  listProfiles,
  loadConfig,
  ProfileConfigSchema,
  saveConfig,
  setConfigValue,
} from "../lib/config";
import { type CliDeps, commandContext } from "../lib/context";
import { parseIntOption } from "../lib/options";

const { prompt } = enquirer;

interface InitAnswers {
  profileName: string;
  baseUrl: string;
  driveId: string;
  token: string;
}

/** enquirer rejects with an empty string (or an Error on closed input) on Ctrl+C */
function isPromptCancelled(error: unknown): boolean {
  return error === "" || (error instanceof Error && error.message.includes("cancelled"));
}

const maskToken = (token: string | undefined): string =>
  token ? `${token.slice(0, 4)}${"*".repeat(Math.max(0, token.length - 4))}` : "(none)";

export function registerConfigCommands(program: Command, deps: CliDeps): void {
  const config = program.command("config").description("Manage CLI configuration");

  config
    .command("init")
    .description("Interactive configuration setup")
    .action(async () => {
      const { formatter } = commandContext(program, deps);
      const cfg = loadConfig();
      const existing = cfg.profiles[cfg.currentProfile];

      let answers: InitAnswers;
      try {
        answers = await prompt<InitAnswers>([
          {
            type: "input",
            name: "profileName",
            message: "Profile name:",
            initial: cfg.currentProfile,
          },
          {
            type: "input",
            name: "baseUrl",
            message: "API base URL:",
            initial: existing?.baseUrl ?? "https://api.example.com",
          },
          {
            type: "input",
            name: "driveId",
            message: "Drive id:",
            initial: existing ? String(existing.driveId) : "",
          },
          {
            type: "password",
            name: "token",
            message: "API token (leave empty to use DIRSCOPE_API_TOKEN):",
          },
        ]);
      } catch (error) {
        if (isPromptCancelled(error)) {
          formatter.info("Configuration cancelled");
          return;
        }
        throw error;
      }

      const profile = ProfileConfigSchema.parse({
        baseUrl: answers.baseUrl,
        driveId: Number(answers.driveId),
        ...(answers.token ? { token: answers.token } : {}),
      });
      cfg.profiles[answers.profileName] = profile;
      cfg.currentProfile = answers.profileName;
      saveConfig(cfg);

      formatter.success(`Configuration saved to ${getConfigPath()}`);
      formatter.info(`Current profile: ${answers.profileName}`);
    });

  config
    .command("list")
    .alias("ls")
    .description("List all profiles")
    .action(() => {
      const { formatter } = commandContext(program, deps);
      const profiles = listProfiles(loadConfig());

      formatter.output(profiles, () => {
        if (profiles.length === 0) {
          return "No profiles configured. Run 'dirscope config init' to create one.";
        }
        return profiles
          .map((p) => {
            const marker = p.current ? "* " : "  ";
            return `${marker}${p.name.padEnd(15)} ${p.baseUrl} (drive ${p.driveId})`;
          })
          .join("\n");
      });
    });

  config
    .command("set <key> <value>")
    .description(`Set a configuration value (${CONFIG_KEYS.join(", ")})`)
    .action((key: string, value: string) => {
      const { formatter } = commandContext(program, deps);

      const cfg = loadConfig();
      setConfigValue(cfg, key, value);
      saveConfig(cfg);

      formatter.success(`Set ${key} = ${key === "token" ? maskToken(value) : value}`);
    });

  config
    .command("get <key>")
    .description("Get a configuration value")
    .action((key: string) => {
      const { formatter } = commandContext(program, deps);

      const value = getConfigValue(loadConfig(), key);
      if (value === undefined) {
        throw new Error(`Configuration key "${key}" not found`);
      }

      formatter.output({ key, value }, () => value);
    });

  config
    .command("use <profile>")
    .description("Switch to a profile")
    .action((profileName: string) => {
      const { formatter } = commandContext(program, deps);

      const cfg = loadConfig();
      const profile = cfg.profiles[profileName];
      if (!profile) {
        throw new Error(
          `Profile "${profileName}" does not exist (available: ${Object.keys(cfg.profiles).join(", ") || "none"})`
        );
      }

      cfg.currentProfile = profileName;
      saveConfig(cfg);

      formatter.success(`Switched to profile: ${profileName}`);
      formatter.info(`Base URL: ${profile.baseUrl}, drive ${profile.driveId}`);
    });

  config
    .command("path")
    .description("Show configuration file path")
    .action(() => {
      const { formatter } = commandContext(program, deps);
      const configPath = getConfigPath();

      formatter.output({ path: configPath }, () => configPath);
    });

  config
    .command("create <name>")
    .description("Create a new profile")
    .requiredOption("--url <url>", "API base URL")
    .requiredOption("--drive <id>", "drive id", parseIntOption)
    .option("--api-token <token>", "API token stored in the profile")
    .action((name: string, cmdOpts: { url: string; drive: number; apiToken?: string }) => {
      const { formatter } = commandContext(program, deps);

      const cfg = loadConfig();
      createProfile(cfg, name, {
        baseUrl: cmdOpts.url,
        driveId: cmdOpts.drive,
        ...(cmdOpts.apiToken ? { token: cmdOpts.apiToken } : {}),
      });
      if (!cfg.profiles[cfg.currentProfile]) {
        cfg.currentProfile = name;
      }
      saveConfig(cfg);

      formatter.success(`Created profile: ${name}`);
    });

  config
    .command("delete <name>")
    .description("Delete a profile")
    .action((name: string) => {
      const { formatter } = commandContext(program, deps);

      const cfg = loadConfig();
      deleteProfile(cfg, name);
      saveConfig(cfg);

      formatter.success(`Deleted profile: ${name}`);
    });
}
