import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { APP_NAME } from "../config/constants";
import {
	AppConfigSchema,
	DEFAULT_APP_CONFIG,
	formatIssues,
	safeValidate,
	type AppConfig,
	type AppConfigInput,
} from "../schemas/config";
import { getLogger } from "../utils";
import { getErrorHandler, type ErrorHandler } from "./ErrorHandler";

const logger = getLogger("ConfigService");

/**
 * Configuration storage service
 * Manages ~/.config/viewloop/config.json (or $XDG_CONFIG_HOME/viewloop)
 */
export class ConfigService {
	private readonly configDir: string;
	private readonly configPath: string;
	private readonly errors: ErrorHandler;

	/**
	 * @param errors receives unreadable or invalid config files (default: the shared handler)
	 */
	constructor(configDir?: string, errors: ErrorHandler = getErrorHandler()) {
		this.errors = errors;
		const configHome =
			process.env.XDG_CONFIG_HOME || join(homedir(), ".config");
		this.configDir = configDir ?? join(configHome, APP_NAME);
		this.configPath = join(this.configDir, "config.json");
	}

	getConfigDir(): string {
		return this.configDir;
	}

	getConfigPath(): string {
		return this.configPath;
	}

	/**
	 * Load and validate the configuration.
	 * A missing file gives the defaults; an unreadable or invalid one is
	 * reported as a config error and also gives the defaults.
	 */
	async loadConfig(): Promise<AppConfig> {
		const raw = await this.readRaw();
		if (raw === null) {
			return { ...DEFAULT_APP_CONFIG };
		}

		let problems = "";
		const config = safeValidate(AppConfigSchema, raw, (issues) => {
			problems = formatIssues(issues);
		});
		if (config) {
			return config;
		}

		await this.errors.handleConfigError(
			new Error(`Invalid config at ${this.configPath}, using defaults: ${problems}`),
			"loadConfig",
		);
		return { ...DEFAULT_APP_CONFIG };
	}

	/**
	 * Merge `update` into the stored configuration and write it back
	 * @throws ZodError if the merged configuration is invalid
	 */
	async saveConfig(update: AppConfigInput): Promise<AppConfig> {
		const merged = AppConfigSchema.parse({ ...(await this.loadConfig()), ...update });

		if (!existsSync(this.configDir)) {
			mkdirSync(this.configDir, { recursive: true, mode: 0o700 });
		}
		writeFileSync(this.configPath, `${JSON.stringify(merged, null, 2)}\n`, {
			mode: 0o600,
		});
		logger.debug(`Saved config to ${this.configPath}`);
		return merged;
	}

	/**
	 * Parsed JSON of the config file, or null when absent or unreadable
	 */
	private async readRaw(): Promise<unknown> {
		if (!existsSync(this.configPath)) {
			return null;
		}

		try {
			const parsed: unknown = JSON.parse(readFileSync(this.configPath, "utf-8"));
			return parsed;
		} catch (error) {
			const reason = error instanceof Error ? error.message : String(error);
			await this.errors.handleConfigError(
				new Error(`Could not read config at ${this.configPath}, using defaults: ${reason}`, {
					cause: error,
				}),
				"loadConfig",
			);
			return null;
		}
	}
}

// Singleton instance
let configServiceInstance: ConfigService | null = null;

export function getConfigService(): ConfigService {
	if (!configServiceInstance) {
		configServiceInstance = new ConfigService();
	}
	return configServiceInstance;
}
