/**
 * Application name and version
 */
export const APP_NAME = "tunedeck";
export const APP_VERSION = "0.1.0";

/**
 * Authentication constants
 */
export const AUTH_TIMEOUT_MS = 5 * 60 * 1000; // 5 minutes, 0 disables
export const DEFAULT_CALLBACK_HOST = "127.0.0.1";
export const DEFAULT_CALLBACK_PORT = 8888;
export const DEFAULT_CALLBACK_PATH = "/callback";
export const DEFAULT_REDIRECT_URI = `http://${DEFAULT_CALLBACK_HOST}:${DEFAULT_CALLBACK_PORT}${DEFAULT_CALLBACK_PATH}`;

/**
 * PKCE constants (OAuth 2.0, RFC 7636)
 */
export const PKCE_VERIFIER_BYTES = 96; // base64url of 96 bytes = 128 chars
export const PKCE_VERIFIER_LENGTH = 128; // Upper bound allowed by RFC 7636
export const STATE_BYTES = 16; // 32 hex chars

/**
 * Spotify accounts service
 */
export const SPOTIFY_AUTHORIZE_URL = "https://accounts.spotify.com/authorize";
export const SPOTIFY_TOKEN_URL = "https://accounts.spotify.com/api/token";

/**
 * Scopes requested for the player
 */
export const DEFAULT_SCOPES = [
	// Playback
	"streaming",
	"user-modify-playback-state",
	"user-read-playback-state",
	"user-read-currently-playing",
	// Library
	"user-library-read",
	// Playlists
	"playlist-read-private",
	"playlist-read-collaborative",
	// User
	"user-read-private",
	"user-read-recently-played",
] as const;

/**
 * API constants
 */
export const SPOTIFY_API_BASE = "https://api.spotify.com/v1";
export const DEFAULT_RATE_LIMIT_RETRY_SECONDS = 5;

/**
 * HTTP Status Codes
 */
export const HTTP_STATUS = {
	OK: 200,
	NO_CONTENT: 204,
	BAD_REQUEST: 400,
	UNAUTHORIZED: 401,
	NOT_FOUND: 404,
	METHOD_NOT_ALLOWED: 405,
	RATE_LIMITED: 429,
} as const;

/**
 * Files under the config directory
 */
export const CONFIG_DIR_NAME = "tunedeck";
export const CONFIG_FILE_NAME = "config.json";
export const SESSION_FILE_NAME = "session.json";
