/**
 * Session/Token Manager
 * Single source of truth for the user session. Refresh is reactive: callers
 * that see a 401 ask for refresh(); expires_in is never used to refresh early.
 */

import { AuthError } from "../errors";
import type { AppEventMap, EventEmitter } from "../events";
import type { TokenSet } from "../types";
import { getLogger } from "../utils";
import type { ITokenStore } from "./ConfigService";
import type { ITokenClient } from "./TokenClient";

const logger = getLogger("SessionManager");

export class SessionManager {
	private tokens: TokenSet | null = null;
	private pendingRefresh: Promise<TokenSet> | null = null;
	/** Bumped whenever the session is installed or cleared */
	private generation = 0;

	constructor(
		private readonly store: ITokenStore,
		private readonly tokenClient: ITokenClient,
		private readonly events?: EventEmitter<AppEventMap>,
	) {
		this.restore();
	}

	/**
	 * Load the persisted session; anything unusable means "not authenticated"
	 */
	private restore(): void {
		try {
			this.tokens = this.store.loadTokens();
		} catch (error) {
			logger.warn("Could not restore previous session", error);
			this.tokens = null;
		}
		logger.debug(
			this.tokens ? "Restored previous session" : "No previous session",
		);
	}

	/**
	 * Install a token set as current and persist it
	 */
	setTokens(tokens: TokenSet): void {
		this.generation++;
		this.tokens = { ...tokens };
		try {
			this.store.saveTokens(this.tokens);
		} catch (error) {
			// In-memory session stays usable for this run
			logger.error("Failed to persist session", error);
		}
		this.events?.emitSync("session:changed", { authenticated: true });
	}

	getTokens(): TokenSet | null {
		return this.tokens ? { ...this.tokens } : null;
	}

	/**
	 * Bearer token of the current session, or null when not authenticated
	 */
	getAccessToken(): string | null {
		return this.tokens?.access_token ?? null;
	}

	/**
	 * @throws AuthError `not_authenticated` when there is no session
	 */
	requireAccessToken(): string {
		const token = this.getAccessToken();
		if (!token) {
			throw new AuthError(
				"not_authenticated",
				"Not authenticated. Please login first.",
			);
		}
		return token;
	}

	isAuthenticated(): boolean {
		return this.tokens !== null;
	}

	canRefresh(): boolean {
		return !!this.tokens?.refresh_token;
	}

	/**
	 * Mint a new access token from the stored refresh token.
	 * Concurrent callers share the same in-flight request.
	 */
	refresh(): Promise<TokenSet> {
		if (!this.pendingRefresh) {
			this.pendingRefresh = this.performRefresh().finally(() => {
				this.pendingRefresh = null;
			});
		}
		return this.pendingRefresh;
	}

	private async performRefresh(): Promise<TokenSet> {
		const refreshToken = this.tokens?.refresh_token;
		if (!refreshToken) {
			throw new AuthError(
				"not_authenticated",
				"No refresh token available. Please login again.",
			);
		}

		logger.info("Refreshing access token");
		const startedAt = this.generation;
		const refreshed = await this.tokenClient.refresh(refreshToken);

		// A logout or login that landed meanwhile wins over this result
		if (this.generation !== startedAt) {
			if (!this.tokens) {
				throw new AuthError(
					"not_authenticated",
					"Session was cleared during refresh. Please login again.",
				);
			}
			logger.info("Session replaced during refresh, discarding result");
			return { ...this.tokens };
		}

		// Rotation is optional for the provider
		const next: TokenSet = {
			...refreshed,
			refresh_token: refreshed.refresh_token || refreshToken,
		};
		this.setTokens(next);
		this.events?.emitSync("session:refreshed", { expiresIn: next.expires_in });
		return { ...next };
	}

	/**
	 * Drop the session and delete the session file (logout)
	 */
	clear(): void {
		this.generation++;
		this.tokens = null;
		this.store.clearTokens();
		this.events?.emitSync("session:changed", { authenticated: false });
		logger.info("Session cleared");
	}
}
