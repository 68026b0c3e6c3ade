/**
 * Non-success answer from the Web API
 */
export class ApiError extends Error {
	readonly status: number;
	readonly body: string;
	readonly retryAfterSeconds?: number;

	constructor(
		status: number,
		body: string,
		endpoint: string,
		retryAfterSeconds?: number,
	) {
		super(
			retryAfterSeconds !== undefined
				? `Rate limited on ${endpoint}. Retry after ${retryAfterSeconds} seconds.`
				: `API error ${status} on ${endpoint}: ${body}`,
		);
		this.name = "ApiError";
		this.status = status;
		this.body = body;
		this.retryAfterSeconds = retryAfterSeconds;
	}
}
