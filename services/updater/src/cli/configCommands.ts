import { Command } from "commander";
import { DEFAULT_CLI_GUEST_VMM_URL } from "../config/constants.js";
import { ConfigError } from "../errors/updaterErrors.js";
import { defaultPlatformConfig } from "../platformConfig/platformConfigStore.js";
import type { PlatformConfigStore } from "../types/interfaces.js";
import type { PlatformConfig } from "../types/platform.js";

export type Print = (line: string) => void;

/**
 * Operations behind `config ...`. Each one reads the settings file afresh,
 * falling back to the defaults when it is missing or unreadable, and writes it
 * back only when something changed.
 */
export class PlatformConfigCommands {
  constructor(
    private readonly store: PlatformConfigStore,
    private readonly print: Print
  ) {}

  async show(): Promise<void> {
    const config = await this.load();
    this.print("Current Platform Configuration:");
    this.print(`  VMM URL: ${config.vmmUrl ?? "(not set)"}`);
    this.print("  Environment Variables:");
    const entries = Object.entries(config.env ?? {});
    if (entries.length === 0) {
      this.print("    (none)");
      return;
    }
    for (const [key, value] of entries) {
      this.print(`    ${key} = ${value}`);
    }
  }

  async setVmmUrl(url: string): Promise<void> {
    const config = await this.load();
    await this.store.save({ ...config, vmmUrl: url });
    this.print(`✓ VMM URL set to: ${url}`);
  }

  async setEnv(key: string, value: string): Promise<void> {
    if (!key) {
      throw new ConfigError("Environment variable key must not be empty");
    }
    const config = await this.load();
    await this.store.save({ ...config, env: { ...(config.env ?? {}), [key]: value } });
    this.print(`✓ Environment variable set: ${key} = ${value}`);
  }

  async removeEnv(key: string): Promise<void> {
    const config = await this.load();
    if (!config.env) {
      throw new ConfigError("No environment variables configured");
    }
    if (!Object.prototype.hasOwnProperty.call(config.env, key)) {
      throw new ConfigError(`Environment variable '${key}' not found`);
    }
    const env = { ...config.env };
    delete env[key];
    await this.store.save({ ...config, env });
    this.print(`✓ Environment variable removed: ${key}`);
  }

  async listEnv(): Promise<void> {
    const entries = Object.entries((await this.load()).env ?? {});
    if (entries.length === 0) {
      this.print("No environment variables configured");
      return;
    }
    this.print("Environment Variables:");
    for (const [key, value] of entries) {
      this.print(`  ${key} = ${value}`);
    }
  }

  async getEnv(key: string): Promise<void> {
    const env = (await this.load()).env ?? {};
    if (!Object.prototype.hasOwnProperty.call(env, key)) {
      throw new ConfigError(`Environment variable '${key}' not found`);
    }
    this.print(env[key]);
  }

  private async load(): Promise<PlatformConfig> {
    try {
      return await this.store.load();
    } catch {
      // No settings yet (or unreadable): start from the defaults, as a first `set-*` would.
      return defaultPlatformConfig(DEFAULT_CLI_GUEST_VMM_URL);
    }
  }
}

export function buildConfigCommand(commands: () => PlatformConfigCommands): Command {
  const config = new Command("config").description("Manage platform configuration");

  config
    .command("show")
    .description("Show current configuration")
    .action(() => commands().show());

  config
    .command("set-vmm-url")
    .alias("set-endpoint")
    .description("Set the VMM URL handed to the VM (e.g. http://10.0.2.2:16850/)")
    .argument("<url>", "VMM URL")
    .action((url: string) => commands().setVmmUrl(url));

  config
    .command("set-env")
    .description("Set an environment variable")
    .argument("<key>", "Environment variable key")
    .argument("<value>", "Environment variable value")
    .action((key: string, value: string) => commands().setEnv(key, value));

  config
    .command("remove-env")
    .description("Remove an environment variable")
    .argument("<key>", "Environment variable key to remove")
    .action((key: string) => commands().removeEnv(key));

  config
    .command("list-env")
    .description("List all environment variables")
    .action(() => commands().listEnv());

  config
    .command("get-env")
    .description("Get a specific environment variable value")
    .argument("<key>", "Environment variable key")
    .action((key: string) => commands().getEnv(key));

  return config;
}
