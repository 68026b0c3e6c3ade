/**
 * Spotify OAuth2 authentication broker
 * Implements the Authorization Code with PKCE flow through a loopback redirect
 */

import { SPOTIFY_AUTHORIZE_URL } from "../config/constants";
import { AuthError } from "../errors";
import type { AppEventMap, EventEmitter } from "../events";
import type { AuthConfig, PKCEParameters, TokenSet } from "../types";
import { getLogger } from "../utils";
import { AuthorizationWaiter } from "./AuthorizationWaiter";
import { type BrowserLauncher, launchBrowser } from "./BrowserLauncher";
import {
	CallbackListener,
	type CallbackListenerFactory,
} from "./CallbackListener";
import { generatePKCE } from "./PkceGenerator";
import type { SessionManager } from "./SessionManager";
import type { ITokenClient } from "./TokenClient";

const logger = getLogger("AuthService");

export interface AuthServiceDeps {
	config: AuthConfig;
	tokenClient: ITokenClient;
	session: SessionManager;
	events?: EventEmitter<AppEventMap>;
	launchBrowser?: BrowserLauncher;
	createListener?: CallbackListenerFactory;
	generatePKCE?: () => PKCEParameters;
	authorizeUrl?: string;
}

export class AuthService {
	private readonly config: AuthConfig;
	private readonly tokenClient: ITokenClient;
	private readonly session: SessionManager;
	private readonly events?: EventEmitter<AppEventMap>;
	private readonly launch: BrowserLauncher;
	private readonly createListener: CallbackListenerFactory;
	private readonly makePKCE: () => PKCEParameters;
	private readonly authorizeUrl: string;
	private attemptInFlight = false;

	constructor(deps: AuthServiceDeps) {
		this.config = deps.config;
		this.tokenClient = deps.tokenClient;
		this.session = deps.session;
		this.events = deps.events;
		this.launch = deps.launchBrowser ?? launchBrowser;
		this.createListener =
			deps.createListener ??
			((redirectUri) => CallbackListener.fromRedirectUri(redirectUri));
		this.makePKCE = deps.generatePKCE ?? generatePKCE;
		this.authorizeUrl = deps.authorizeUrl ?? SPOTIFY_AUTHORIZE_URL;
	}

	/**
	 * Build the authorization URL
	 */
	buildAuthUrl(codeChallenge: string, state: string): string {
		const params = new URLSearchParams({
			client_id: this.config.clientId,
			response_type: "code",
			redirect_uri: this.config.redirectUri,
			code_challenge_method: "S256",
			code_challenge: codeChallenge,
			state,
			scope: this.config.scopes.join(" "),
		});

		return `${this.authorizeUrl}?${params.toString()}`;
	}

	get isLoginInProgress(): boolean {
		return this.attemptInFlight;
	}

	/**
	 * Run one browser login and install the resulting tokens in the session.
	 * Only one attempt may run at a time (one listener, one port).
	 */
	async login(): Promise<TokenSet> {
		if (this.attemptInFlight) {
			throw new AuthError(
				"attempt_in_progress",
				"An authentication attempt is already in progress",
			);
		}
		this.attemptInFlight = true;

		const pkce = this.makePKCE();
		const listener = this.createListener(this.config.redirectUri);

		try {
			// Bind before the URL is shown so the redirect has somewhere to land
			await listener.start();

			const url = this.buildAuthUrl(pkce.codeChallenge, pkce.state);
			this.events?.emitSync("auth:urlReady", { url });
			await this.launch(url);

			const waiter = new AuthorizationWaiter(this.events);
			const code = await waiter.wait(listener.result, pkce.state, {
				timeoutMs: this.config.authTimeoutMs,
			});

			const tokens = await this.tokenClient.exchangeCode(
				code,
				pkce.codeVerifier,
			);
			this.session.setTokens(tokens);
			logger.info("Login successful", { scope: tokens.scope });
			return tokens;
		} catch (error) {
			logger.warn(
				"Login failed",
				error instanceof AuthError ? { kind: error.kind } : error,
			);
			throw error;
		} finally {
			// The port stays taken until the close completes
			await listener.close().catch((closeError: unknown) => {
				logger.error("Failed to close callback listener", closeError);
			});
			this.attemptInFlight = false;
		}
	}

	/**
	 * Refresh the current session's access token
	 */
	refresh(): Promise<TokenSet> {
		return this.session.refresh();
	}

	isAuthenticated(): boolean {
		return this.session.isAuthenticated();
	}

	/**
	 * Logout - clear stored credentials
	 */
	logout(): void {
		this.session.clear();
	}
}
