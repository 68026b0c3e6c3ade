import type { IAuthenticationController } from "../interfaces";
import type { ApiClient } from "../services/ApiClient";
import type { AuthService } from "../services/AuthService";
import type { ErrorHandler, Notifier } from "../services/ErrorHandler";
import type { SessionManager } from "../services/SessionManager";
import { getLogger } from "../utils";

const logger = getLogger("AuthenticationController");

export interface AuthenticationControllerDeps {
	/** Resolved lazily: login needs client credentials, logout does not */
	auth: () => Pick<AuthService, "login">;
	session: () => SessionManager;
	api: () => ApiClient;
	errorHandler: ErrorHandler;
	notifier: Notifier;
}

/**
 * Authentication Controller
 * Each command reports its outcome and resolves false on failure
 */
export class AuthenticationController implements IAuthenticationController {
	constructor(private deps: AuthenticationControllerDeps) {}

	async login(): Promise<boolean> {
		return this.run("login", async () => {
			const tokens = await this.deps.auth().login();
			this.deps.notifier.notify(
				"info",
				"Logged In",
				`Session saved (access token valid for ${tokens.expires_in}s)`,
			);
			try {
				await this.showProfile();
			} catch (error) {
				// Session is usable even if the profile call fails
				logger.warn("Failed to fetch user profile after login", error);
			}
		});
	}

	async logout(): Promise<boolean> {
		return this.run("logout", async () => {
			this.deps.session().clear();
			this.deps.notifier.notify("info", "Logged Out", "Credentials cleared");
		});
	}

	async status(): Promise<boolean> {
		return this.run("status", async () => {
			const tokens = this.deps.session().getTokens();
			if (!tokens) {
				this.deps.notifier.notify(
					"info",
					"Not logged in",
					"Run `tunedeck login` to sign in",
				);
				return;
			}
			this.deps.notifier.notify(
				"info",
				"Logged in",
				`scopes: ${tokens.scope || "(none)"}; refresh token: ${tokens.refresh_token ? "yes" : "no"}`,
			);
		});
	}

	async refresh(): Promise<boolean> {
		return this.run("refresh", async () => {
			const tokens = await this.deps.session().refresh();
			this.deps.notifier.notify(
				"info",
				"Refreshed",
				`New access token valid for ${tokens.expires_in}s`,
			);
		});
	}

	async whoami(): Promise<boolean> {
		return this.run("whoami", () => this.showProfile());
	}

	private async showProfile(): Promise<void> {
		const profile = await this.deps.api().getCurrentUser();
		const displayName = profile.display_name || profile.id;
		this.deps.notifier.notify(
			"info",
			"Account",
			`${displayName}${profile.product ? ` (${profile.product})` : ""}`,
		);
		if (profile.product && profile.product !== "premium") {
			this.deps.notifier.notify(
				"warning",
				"Premium Required",
				"Playback control needs Spotify Premium; browsing and search still work",
			);
		}
	}

	private async run(
		operation: string,
		action: () => Promise<void>,
	): Promise<boolean> {
		try {
			await action();
			return true;
		} catch (error) {
			logger.debug(`${operation} failed`);
			await this.deps.errorHandler.handleCommandError(error, operation);
			return false;
		}
	}
}
