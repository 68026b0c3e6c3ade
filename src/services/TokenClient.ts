/**
 * Token endpoint client
 * Authorization-code exchange and refresh, both with HTTP Basic client auth
 */

import { SPOTIFY_TOKEN_URL } from "../config/constants";
import { AuthError } from "../errors";
import { TokenResponseSchema } from "../schemas/auth";
import type { TokenResponse, TokenSet } from "../types";
import { getLogger } from "../utils";

const logger = getLogger("TokenClient");

export interface TokenClientConfig {
	clientId: string;
	clientSecret: string;
	redirectUri: string;
	tokenUrl?: string;
}

/**
 * What the session manager and broker need from the token endpoint
 */
export interface ITokenClient {
	exchangeCode(code: string, codeVerifier: string): Promise<TokenSet>;
	refresh(refreshToken: string): Promise<TokenSet>;
}

export class TokenClient implements ITokenClient {
	private readonly tokenUrl: string;

	constructor(
		private readonly config: TokenClientConfig,
		private readonly fetchFn: typeof fetch = fetch,
	) {
		this.tokenUrl = config.tokenUrl ?? SPOTIFY_TOKEN_URL;
	}

	/**
	 * Exchange an authorization code (plus its PKCE verifier) for tokens
	 */
	async exchangeCode(code: string, codeVerifier: string): Promise<TokenSet> {
		const tokens = await this.requestToken(
			new URLSearchParams({
				grant_type: "authorization_code",
				code,
				redirect_uri: this.config.redirectUri,
				client_id: this.config.clientId,
				code_verifier: codeVerifier,
			}),
			"Token exchange",
		);

		return {
			access_token: tokens.access_token,
			refresh_token: tokens.refresh_token ?? "",
			expires_in: tokens.expires_in,
			scope: tokens.scope,
		};
	}

	/**
	 * Mint a new access token. Refresh tokens are not guaranteed to rotate, so
	 * the one passed in is kept when the response omits it.
	 */
	async refresh(refreshToken: string): Promise<TokenSet> {
		const tokens = await this.requestToken(
			new URLSearchParams({
				grant_type: "refresh_token",
				refresh_token: refreshToken,
			}),
			"Token refresh",
		);

		return {
			access_token: tokens.access_token,
			refresh_token: tokens.refresh_token ?? refreshToken,
			expires_in: tokens.expires_in,
			scope: tokens.scope,
		};
	}

	private basicAuthHeader(): string {
		const credentials = `${this.config.clientId}:${this.config.clientSecret}`;
		return `Basic ${Buffer.from(credentials, "utf-8").toString("base64")}`;
	}

	private async requestToken(
		body: URLSearchParams,
		operation: string,
	): Promise<TokenResponse> {
		let response: Response;
		try {
			response = await this.fetchFn(this.tokenUrl, {
				method: "POST",
				headers: {
					Authorization: this.basicAuthHeader(),
					"Content-Type": "application/x-www-form-urlencoded",
					Accept: "application/json",
				},
				body: body.toString(),
			});
		} catch (error) {
			const reason = error instanceof Error ? error.message : String(error);
			throw new AuthError("network", `${operation} failed: ${reason}`, {
				cause: error,
			});
		}

		const text = await response.text();

		if (!response.ok) {
			logger.warn(`${operation} rejected with HTTP ${response.status}`);
			throw new AuthError(
				"http_failure",
				`${operation} failed: ${response.status} - ${text}`,
				{ status: response.status, responseBody: text },
			);
		}

		let payload: unknown;
		try {
			payload = JSON.parse(text);
		} catch (error) {
			throw new AuthError(
				"malformed_response",
				`${operation} returned a non-JSON body`,
				{ status: response.status, responseBody: text, cause: error },
			);
		}

		const parsed = TokenResponseSchema.safeParse(payload);
		if (!parsed.success) {
			const missingToken = parsed.error.issues.some(
				(issue) => issue.path[0] === "access_token",
			);
			throw new AuthError(
				"malformed_response",
				missingToken
					? `${operation} response is missing access_token`
					: `${operation} response is invalid: ${parsed.error.issues
							.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
							.join(", ")}`,
				{ status: response.status, responseBody: text },
			);
		}

		logger.debug(`${operation} succeeded`, {
			expires_in: parsed.data.expires_in,
			scope: parsed.data.scope,
			rotated: parsed.data.refresh_token !== undefined,
		});
		return parsed.data;
	}
}
