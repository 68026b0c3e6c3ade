import {
	existsSync,
	mkdirSync,
	readFileSync,
	rmSync,
	writeFileSync,
} from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import {
	AUTH_TIMEOUT_MS,
	CONFIG_DIR_NAME,
	CONFIG_FILE_NAME,
	DEFAULT_REDIRECT_URI,
	DEFAULT_SCOPES,
	SESSION_FILE_NAME,
} from "../config/constants";
import { ConfigError } from "../errors";
import {
	AuthConfigSchema,
	ConfigFileSchema,
	TokenSetSchema,
	type ConfigFile,
} from "../schemas/auth";
import type { AuthConfig, TokenSet } from "../types";
import { getLogger } from "../utils";

const logger = getLogger("ConfigService");

export interface ConfigServiceOptions {
	/** Defaults to $XDG_CONFIG_HOME/tunedeck or ~/.config/tunedeck */
	configDir?: string;
	/** Defaults to <configDir>/session.json */
	sessionFile?: string;
	env?: NodeJS.ProcessEnv;
}

/**
 * Where the session file lives; only the session manager reads or writes it
 */
export interface ITokenStore {
	saveTokens(tokens: TokenSet): void;
	loadTokens(): TokenSet | null;
	clearTokens(): void;
}

/**
 * Configuration and session storage service
 * Manages ~/.config/tunedeck/
 */
export class ConfigService implements ITokenStore {
	private configDir: string;
	private configPath: string;
	private sessionPath: string;
	private env: NodeJS.ProcessEnv;

	constructor(options: ConfigServiceOptions = {}) {
		this.env = options.env ?? process.env;

		const configHome =
			this.env.XDG_CONFIG_HOME || join(homedir(), ".config");
		this.configDir = options.configDir ?? join(configHome, CONFIG_DIR_NAME);
		this.configPath = join(this.configDir, CONFIG_FILE_NAME);
		this.sessionPath =
			options.sessionFile ??
			(this.env.TUNEDECK_SESSION_FILE ||
				join(this.configDir, SESSION_FILE_NAME));

		this.ensureDir(this.configDir);
	}

	private ensureDir(dir: string): void {
		if (!existsSync(dir)) {
			mkdirSync(dir, { recursive: true, mode: 0o700 });
		}
	}

	getConfigDir(): string {
		return this.configDir;
	}

	getSessionFilePath(): string {
		return this.sessionPath;
	}

	// ─────────────────────────────────────────────────────────────
	// Session file
	// ─────────────────────────────────────────────────────────────

	/**
	 * Persist the token set, readable by the owner only
	 */
	saveTokens(tokens: TokenSet): void {
		this.ensureDir(dirname(this.sessionPath));
		const data: TokenSet = {
			access_token: tokens.access_token,
			refresh_token: tokens.refresh_token,
			expires_in: tokens.expires_in,
			scope: tokens.scope,
		};
		writeFileSync(this.sessionPath, JSON.stringify(data, null, 2), {
			mode: 0o600,
		});
	}

	/**
	 * Load the stored token set
	 * Returns null if the file is absent, unreadable or malformed
	 */
	loadTokens(): TokenSet | null {
		if (!existsSync(this.sessionPath)) {
			return null;
		}

		let raw: unknown;
		try {
			raw = JSON.parse(readFileSync(this.sessionPath, "utf-8"));
		} catch (error) {
			logger.warn("Ignoring unreadable session file", {
				path: this.sessionPath,
				reason: error instanceof Error ? error.message : String(error),
			});
			return null;
		}

		const parsed = TokenSetSchema.safeParse(raw);
		if (!parsed.success) {
			logger.warn("Ignoring malformed session file", {
				path: this.sessionPath,
				issues: parsed.error.issues.map((issue) => issue.path.join(".")),
			});
			return null;
		}

		return parsed.data;
	}

	/**
	 * Delete the session file (logout)
	 */
	clearTokens(): void {
		rmSync(this.sessionPath, { force: true });
	}

	// ─────────────────────────────────────────────────────────────
	// General configuration
	// ─────────────────────────────────────────────────────────────

	/**
	 * Merge values into config.json
	 */
	saveConfig(config: ConfigFile): void {
		const merged = { ...this.loadConfig(), ...config };
		writeFileSync(this.configPath, JSON.stringify(merged, null, 2), {
			mode: 0o600,
		});
	}

	/**
	 * Load config.json; an absent or invalid file reads as empty
	 */
	loadConfig(): ConfigFile {
		if (!existsSync(this.configPath)) {
			return {};
		}

		try {
			const parsed = ConfigFileSchema.safeParse(
				JSON.parse(readFileSync(this.configPath, "utf-8")),
			);
			if (parsed.success) {
				return parsed.data;
			}
			logger.warn("Ignoring invalid config.json", parsed.error.issues);
		} catch (error) {
			logger.warn("Ignoring unreadable config.json", error);
		}
		return {};
	}

	/**
	 * Resolve the OAuth client configuration (environment over config.json)
	 * @throws ConfigError when the client id or secret is missing or a value is invalid
	 */
	getAuthConfig(): AuthConfig {
		const file = this.loadConfig();
		const issues: string[] = [];

		let authTimeoutMs = file.authTimeoutMs ?? AUTH_TIMEOUT_MS;
		const timeoutEnv = this.env.TUNEDECK_AUTH_TIMEOUT_MS;
		if (timeoutEnv !== undefined && timeoutEnv !== "") {
			const parsedTimeout = Number(timeoutEnv);
			if (Number.isInteger(parsedTimeout) && parsedTimeout >= 0) {
				authTimeoutMs = parsedTimeout;
			} else {
				issues.push("TUNEDECK_AUTH_TIMEOUT_MS must be a non-negative integer");
			}
		}

		const result = AuthConfigSchema.safeParse({
			clientId: this.env.SPOTIFY_CLIENT_ID || file.clientId,
			clientSecret: this.env.SPOTIFY_CLIENT_SECRET || file.clientSecret,
			redirectUri:
				this.env.SPOTIFY_REDIRECT_URI || file.redirectUri || DEFAULT_REDIRECT_URI,
			scopes: file.scopes ?? [...DEFAULT_SCOPES],
			authTimeoutMs,
		});

		if (!result.success) {
			issues.push(
				...result.error.issues.map((issue) =>
					issue.path.length > 0
						? `${issue.path.join(".")}: ${issue.message}`
						: issue.message,
				),
			);
		}

		if (!result.success || issues.length > 0) {
			throw new ConfigError(issues);
		}

		return result.data;
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
