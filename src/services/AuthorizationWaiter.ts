import { timingSafeEqual } from "node:crypto";
import { AuthError } from "../errors";
import type { AppEventMap, EventEmitter } from "../events";
import type { AuthorizationState, CallbackResult } from "../types";
import { getLogger } from "../utils";

const logger = getLogger("AuthorizationWaiter");

export interface WaitOptions {
	/** Give up after this many ms; absent or 0 waits for as long as the user takes */
	timeoutMs?: number;
}

/**
 * Constant-time string comparison
 */
export function statesMatch(expected: string, actual: string): boolean {
	const a = Buffer.from(expected, "utf-8");
	const b = Buffer.from(actual, "utf-8");
	return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Awaits the callback of one attempt and enforces the state check
 *
 * idle -> awaiting_callback -> succeeded | failed
 */
export class AuthorizationWaiter {
	private current: AuthorizationState = "idle";

	constructor(private readonly events?: EventEmitter<AppEventMap>) {}

	get state(): AuthorizationState {
		return this.current;
	}

	/**
	 * Resolve with the authorization code once a callback carrying the expected
	 * state arrives. Rejects with an AuthError for provider errors, state
	 * mismatches and an elapsed caller timeout.
	 */
	async wait(
		callback: Promise<CallbackResult>,
		expectedState: string,
		options: WaitOptions = {},
	): Promise<string> {
		if (this.current !== "idle") {
			throw new AuthError(
				"attempt_in_progress",
				`Authorization waiter already used (state: ${this.current})`,
			);
		}
		this.transition("awaiting_callback");

		let outcome: CallbackResult;
		try {
			outcome = await this.withTimeout(callback, options.timeoutMs ?? 0);
		} catch (error) {
			this.transition("failed");
			throw error;
		}

		if (outcome.kind === "error") {
			this.transition("failed");
			throw new AuthError(
				"provider_error",
				`Authentication failed: ${outcome.error}`,
				{ responseBody: outcome.error },
			);
		}

		if (!statesMatch(expectedState, outcome.state)) {
			this.transition("failed");
			throw new AuthError(
				"state_mismatch",
				"State mismatch in OAuth callback - possible CSRF attempt",
			);
		}

		this.transition("succeeded");
		return outcome.code;
	}

	private withTimeout(
		callback: Promise<CallbackResult>,
		timeoutMs: number,
	): Promise<CallbackResult> {
		if (timeoutMs <= 0) {
			return callback;
		}

		return new Promise((resolve, reject) => {
			const timer = setTimeout(() => {
				reject(
					new AuthError(
						"timeout",
						`Authentication timed out after ${Math.round(timeoutMs / 1000)}s`,
					),
				);
			}, timeoutMs);

			callback.then(
				(result) => {
					clearTimeout(timer);
					resolve(result);
				},
				(error: unknown) => {
					clearTimeout(timer);
					reject(error);
				},
			);
		});
	}

	private transition(to: AuthorizationState): void {
		const from = this.current;
		this.current = to;
		logger.debug(`Authorization state: ${from} -> ${to}`);
		this.events?.emitSync("auth:stateChanged", { from, to });
	}
}
