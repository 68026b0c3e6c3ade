/**
 * Dependency Injection Tokens
 * Use symbols to uniquely identify services for injection
 */

export const TOKENS = {
	// Configuration & Storage
	Config: Symbol("ConfigService"),
	AuthConfig: Symbol("AuthConfig"),

	// Authentication & API
	TokenClient: Symbol("TokenClient"),
	Session: Symbol("SessionManager"),
	Auth: Symbol("AuthService"),
	SpotifyApi: Symbol("ApiClient"),

	// Application Services
	EventBus: Symbol("EventBus"),
	ErrorHandler: Symbol("ErrorHandler"),
} as const;

/**
 * Type-safe token type
 */
export type ServiceToken = (typeof TOKENS)[keyof typeof TOKENS];
