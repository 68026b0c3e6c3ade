/**
 * Spotify Web API client
 * Attaches the session's bearer token; on a 401 it refreshes once and retries once.
 */

import type { z } from "zod";
import {
	DEFAULT_RATE_LIMIT_RETRY_SECONDS,
	HTTP_STATUS,
	SPOTIFY_API_BASE,
} from "../config/constants";
import { ApiError, AuthError, ValidationError } from "../errors";
import { SpotifyUserSchema, safeValidate } from "../schemas/spotify";
import type { SpotifyUser } from "../types";
import { getLogger } from "../utils";
import type { SessionManager } from "./SessionManager";

const logger = getLogger("ApiClient");

export class ApiClient {
	constructor(
		private readonly session: SessionManager,
		private readonly fetchFn: typeof fetch = fetch,
		private readonly baseUrl: string = SPOTIFY_API_BASE,
	) {}

	/**
	 * Make an authenticated request and validate the JSON body
	 * Resolves undefined for 204 responses.
	 */
	async request<S extends z.ZodTypeAny>(
		endpoint: string,
		schema: S,
		options: RequestInit = {},
	): Promise<z.output<S> | undefined> {
		const data = await this.requestJson(endpoint, options);
		if (data === undefined) {
			return undefined;
		}

		const validated = safeValidate(schema, data, endpoint);
		if (validated === null) {
			throw new ValidationError(endpoint);
		}
		return validated;
	}

	/**
	 * Make an authenticated API request
	 * @throws AuthError `not_authenticated` without a usable session
	 * @throws ApiError for non-success statuses (including a 401 after refresh)
	 */
	async requestJson(
		endpoint: string,
		options: RequestInit = {},
	): Promise<unknown> {
		let response = await this.send(
			endpoint,
			options,
			this.session.requireAccessToken(),
		);

		if (response.status === HTTP_STATUS.UNAUTHORIZED && this.session.canRefresh()) {
			logger.info(`401 from ${endpoint}, refreshing session and retrying once`);
			const refreshed = await this.session.refresh();
			response = await this.send(endpoint, options, refreshed.access_token);
		}

		if (response.status === HTTP_STATUS.UNAUTHORIZED && !this.session.canRefresh()) {
			throw new AuthError(
				"not_authenticated",
				"Session rejected and cannot be refreshed. Please login again.",
				{ status: response.status, responseBody: await response.text() },
			);
		}

		if (response.status === HTTP_STATUS.RATE_LIMITED) {
			const retryAfter = Number.parseInt(
				response.headers.get("Retry-After") ??
					String(DEFAULT_RATE_LIMIT_RETRY_SECONDS),
				10,
			);
			throw new ApiError(
				response.status,
				await response.text(),
				endpoint,
				Number.isNaN(retryAfter) ? DEFAULT_RATE_LIMIT_RETRY_SECONDS : retryAfter,
			);
		}

		if (response.status === HTTP_STATUS.NO_CONTENT) {
			return undefined;
		}

		if (!response.ok) {
			throw new ApiError(response.status, await response.text(), endpoint);
		}

		const text = await response.text();
		return text === "" ? undefined : JSON.parse(text);
	}

	/**
	 * Get the current user's profile
	 */
	async getCurrentUser(): Promise<SpotifyUser> {
		const user = await this.request("/me", SpotifyUserSchema);
		if (!user) {
			throw new Error("Empty response from /me");
		}
		return user;
	}

	private send(
		endpoint: string,
		options: RequestInit,
		token: string,
	): Promise<Response> {
		const headers = new Headers(options.headers);
		headers.set("Authorization", `Bearer ${token}`);
		if (options.body !== undefined && !headers.has("Content-Type")) {
			headers.set("Content-Type", "application/json");
		}

		return this.fetchFn(`${this.baseUrl}${endpoint}`, { ...options, headers });
	}
}
