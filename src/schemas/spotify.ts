/**
 * Zod schemas for Spotify API response validation
 * Provides runtime type safety and graceful error handling
 */

import { z } from "zod";
import { getLogger } from "../utils/Logger";

const logger = getLogger("Validation");

// ============================================================================
// Base Types
// ============================================================================

const ImageSchema = z.object({
	url: z.string().url(),
	height: z.number().nullable(),
	width: z.number().nullable(),
});

// ============================================================================
// User
// ============================================================================

export const SpotifyUserSchema = z
	.object({
		id: z.string(),
		display_name: z.string().nullable(),
		email: z.string().optional(),
		country: z.string().optional(),
		product: z.string().optional(),
		images: z.array(ImageSchema).optional(),
	})
	.passthrough(); // Allow additional fields

export type ValidatedSpotifyUser = z.infer<typeof SpotifyUserSchema>;

// ============================================================================
// Helper: Safe Parse with Error Logging
// ============================================================================

export function safeValidate<S extends z.ZodTypeAny>(
	schema: S,
	data: unknown,
	context: string,
): z.output<S> | null {
	const result = schema.safeParse(data);

	if (!result.success) {
		logger.warn(`Validation failed: ${context}`, result.error.issues);
		return null;
	}

	return result.data;
}
