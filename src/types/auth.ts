/**
 * Authentication Types
 */

/**
 * Token set persisted between runs and superseded on every exchange/refresh
 */
export interface TokenSet {
	access_token: string;
	/** Empty when the provider issued none */
	refresh_token: string;
	/** Validity window in seconds, as reported at issuance */
	expires_in: number;
	/** Space-delimited granted scopes */
	scope: string;
}

/**
 * Raw token endpoint response (RFC 6749 §5.1)
 */
export interface TokenResponse {
	access_token: string;
	token_type?: string;
	expires_in: number;
	refresh_token?: string;
	scope: string;
}

/**
 * Resolved OAuth client configuration
 */
export interface AuthConfig {
	clientId: string;
	clientSecret: string;
	redirectUri: string;
	scopes: string[];
	/** Upper bound on the browser step, 0 waits indefinitely */
	authTimeoutMs: number;
}

/**
 * Per-attempt PKCE parameters, never reused
 */
export interface PKCEParameters {
	codeVerifier: string;
	codeChallenge: string;
	state: string;
}

/**
 * Outcome published once by the callback listener
 */
export type CallbackResult =
	| { kind: "code"; code: string; state: string }
	| { kind: "error"; error: string };

/**
 * Authorization waiter states
 */
export type AuthorizationState =
	| "idle"
	| "awaiting_callback"
	| "succeeded"
	| "failed";
