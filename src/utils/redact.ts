/**
 * Credential scrubbing for log payloads
 */

export const REDACTED = "[redacted]";

// Compared lowercase
const SECRET_KEYS = new Set([
	"access_token",
	"accesstoken",
	"refresh_token",
	"refreshtoken",
	"client_secret",
	"clientsecret",
	"code_verifier",
	"codeverifier",
	"authorization",
]);

const MAX_DEPTH = 6;

/**
 * Copy of `value` with every credential-bearing property replaced by REDACTED
 */
export function redactSecrets(value: unknown, depth = 0): unknown {
	if (value === null || typeof value !== "object" || depth >= MAX_DEPTH) {
		return value;
	}

	if (Array.isArray(value)) {
		return value.map((item) => redactSecrets(item, depth + 1));
	}

	const result: Record<string, unknown> = {};
	for (const [key, entry] of Object.entries(value)) {
		result[key] = SECRET_KEYS.has(key.toLowerCase())
			? REDACTED
			: redactSecrets(entry, depth + 1);
	}
	return result;
}
