/**
 * Zod schemas for token endpoint responses, the session file and config.json
 */

import { z } from "zod";

// ============================================================================
// Token endpoint
// ============================================================================

export const TokenResponseSchema = z.object({
	access_token: z.string().min(1),
	token_type: z.string().optional(),
	expires_in: z.number().int().nonnegative(),
	refresh_token: z.string().optional(),
	scope: z.string(),
});

// ============================================================================
// Session file
// ============================================================================

export const TokenSetSchema = z.object({
	access_token: z.string().min(1),
	refresh_token: z.string(),
	expires_in: z.number().int().nonnegative(),
	scope: z.string(),
});

// ============================================================================
// config.json (all optional, environment overrides)
// ============================================================================

export const ConfigFileSchema = z
	.object({
		clientId: z.string().min(1).optional(),
		clientSecret: z.string().min(1).optional(),
		redirectUri: z.string().url().optional(),
		authTimeoutMs: z.number().int().nonnegative().optional(),
		scopes: z.array(z.string().min(1)).optional(),
	})
	.passthrough();

function isHttpUrl(value: string): boolean {
	try {
		return new URL(value).protocol === "http:";
	} catch {
		return false;
	}
}

export const AuthConfigSchema = z.object({
	clientId: z.string({ required_error: "client id is not set" }).min(1),
	clientSecret: z
		.string({ required_error: "client secret is not set" })
		.min(1),
	redirectUri: z
		.string()
		.url()
		.refine(isHttpUrl, {
			message: "redirect URI must be a plain http loopback URL",
		}),
	scopes: z.array(z.string().min(1)).min(1),
	authTimeoutMs: z.number().int().nonnegative(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
