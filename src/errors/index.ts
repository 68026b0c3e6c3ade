export { ApiError } from "./ApiError";
export {
	AuthError,
	isAuthError,
	type AuthErrorKind,
	type AuthErrorOptions,
} from "./AuthError";
export { ConfigError } from "./ConfigError";
export { ValidationError } from "./ValidationError";
