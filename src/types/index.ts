export type {
	AuthConfig,
	AuthorizationState,
	CallbackResult,
	PKCEParameters,
	TokenResponse,
	TokenSet,
} from "./auth";
export type { SpotifyImage, SpotifyUser } from "./spotify";
