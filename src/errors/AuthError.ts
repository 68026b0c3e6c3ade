/**
 * Failure modes of the authentication broker and session manager
 */
export type AuthErrorKind =
	/** Callback listener could not bind its port */
	| "listener_bind"
	/** Provider redirected back with an `error` parameter */
	| "provider_error"
	/** Returned `state` differs from the one sent */
	| "state_mismatch"
	/** Token endpoint answered with a non-2xx status */
	| "http_failure"
	/** Token endpoint could not be reached */
	| "network"
	/** 2xx token response without a usable token set */
	| "malformed_response"
	/** Caller-imposed bound on the browser step elapsed */
	| "timeout"
	/** No session to use or refresh */
	| "not_authenticated"
	/** Another authentication attempt is already running */
	| "attempt_in_progress";

export interface AuthErrorOptions {
	status?: number;
	responseBody?: string;
	cause?: unknown;
}

export class AuthError extends Error {
	readonly kind: AuthErrorKind;
	readonly status?: number;
	/** Remote error body, verbatim */
	readonly responseBody?: string;

	constructor(kind: AuthErrorKind, message: string, options: AuthErrorOptions = {}) {
		super(message, { cause: options.cause });
		this.name = "AuthError";
		this.kind = kind;
		this.status = options.status;
		this.responseBody = options.responseBody;
	}

	/**
	 * Whether the user can fix this by running login again
	 */
	get requiresLogin(): boolean {
		return (
			this.kind === "not_authenticated" ||
			(this.kind === "http_failure" && this.status === 400)
		);
	}
}

export function isAuthError(error: unknown, kind?: AuthErrorKind): error is AuthError {
	return error instanceof AuthError && (kind === undefined || error.kind === kind);
}
