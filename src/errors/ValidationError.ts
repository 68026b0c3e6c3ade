/**
 * A response body that does not have the expected shape
 */
export class ValidationError extends Error {
	readonly source: string;

	constructor(source: string) {
		super(`Invalid API response from ${source}`);
		this.name = "ValidationError";
		this.source = source;
	}
}
