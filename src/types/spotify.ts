/**
 * Spotify API Types
 */

/**
 * Spotify image
 */
export interface SpotifyImage {
	url: string;
	height: number | null;
	width: number | null;
}

/**
 * Spotify user profile
 */
export interface SpotifyUser {
	id: string;
	display_name: string | null;
	email?: string;
	country?: string;
	product?: string;
	images?: SpotifyImage[];
}
