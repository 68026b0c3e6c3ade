import { createHash, randomBytes } from "node:crypto";
import {
	PKCE_VERIFIER_BYTES,
	PKCE_VERIFIER_LENGTH,
	STATE_BYTES,
} from "../config/constants";
import type { PKCEParameters } from "../types";

/**
 * SHA-256 of the verifier, base64url without padding (S256 method)
 */
export function deriveCodeChallenge(codeVerifier: string): string {
	return createHash("sha256").update(codeVerifier).digest("base64url");
}

/**
 * Generate a fresh verifier/challenge/state triple for one authorization attempt
 */
export function generatePKCE(): PKCEParameters {
	// base64url output only uses the unreserved [A-Za-z0-9-_] alphabet
	const codeVerifier = randomBytes(PKCE_VERIFIER_BYTES)
		.toString("base64url")
		.substring(0, PKCE_VERIFIER_LENGTH);

	return {
		codeVerifier,
		codeChallenge: deriveCodeChallenge(codeVerifier),
		state: randomBytes(STATE_BYTES).toString("hex"),
	};
}
