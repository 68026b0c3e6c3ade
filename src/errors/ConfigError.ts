/**
 * Missing or invalid client configuration
 */
export class ConfigError extends Error {
	readonly issues: string[];

	constructor(issues: string[]) {
		super(`Invalid configuration: ${issues.join("; ")}`);
		this.name = "ConfigError";
		this.issues = issues;
	}
}
