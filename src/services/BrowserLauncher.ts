import { getLogger } from "../utils";

const logger = getLogger("BrowserLauncher");

/**
 * Points the user at the authorization URL; resolves false when it had to fall back
 */
export type BrowserLauncher = (url: string) => Promise<boolean>;

export const launchBrowser: BrowserLauncher = async (url) => {
	console.log("\nOpening your browser to log in with Spotify...\n");
	console.log("If the browser doesn't open, visit this URL:\n");
	console.log(url);
	console.log("\nWaiting for authentication...\n");

	try {
		const { default: open } = await import("open");
		await open(url);
		return true;
	} catch (error) {
		logger.warn("Could not open browser automatically", error);
		console.log(
			"(Could not open browser automatically - please open the URL above)",
		);
		return false;
	}
};
