import { describe, expect, it, vi } from "vitest";
import { AuthenticationController } from "../../src/controllers";
import { AuthError } from "../../src/errors";
import { ApiClient } from "../../src/services/ApiClient";
import type { AuthService } from "../../src/services/AuthService";
import type { ITokenStore } from "../../src/services/ConfigService";
import { ErrorHandler, type Notifier } from "../../src/services/ErrorHandler";
import { SessionManager } from "../../src/services/SessionManager";
import type { ITokenClient } from "../../src/services/TokenClient";
import type { TokenSet } from "../../src/types";

const TOKENS: TokenSet = {
	access_token: "A",
	refresh_token: "R",
	expires_in: 3600,
	scope: "user-read-private",
};

function setup(initial: TokenSet | null, fetchMock = vi.fn<typeof fetch>()) {
	let saved = initial;
	const store: ITokenStore = {
		saveTokens: (tokens) => {
			saved = tokens;
		},
		loadTokens: () => saved,
		clearTokens: vi.fn(() => {
			saved = null;
		}),
	};
	const session = new SessionManager(store, {
		exchangeCode: vi.fn<ITokenClient["exchangeCode"]>(),
		refresh: vi.fn<ITokenClient["refresh"]>().mockResolvedValue({
			...TOKENS,
			access_token: "A2",
			expires_in: 1800,
		}),
	});
	const notify = vi.fn<Notifier["notify"]>();
	const errorHandler = new ErrorHandler({ notify: vi.fn() });
	const handleCommandError = vi.spyOn(errorHandler, "handleCommandError");
	const login = vi.fn<AuthService["login"]>();

	const controller = new AuthenticationController({
		auth: () => ({ login }),
		session: () => session,
		api: () => new ApiClient(session, fetchMock, "https://api.test/v1"),
		errorHandler,
		notifier: { notify },
	});

	return { controller, session, store, notify, handleCommandError, login, fetchMock };
}

describe("AuthenticationController", () => {
	it("reports a missing session", async () => {
		const { controller, notify } = setup(null);

		await expect(controller.status()).resolves.toBe(true);
		expect(notify).toHaveBeenCalledWith(
			"info",
			"Not logged in",
			"Run `tunedeck login` to sign in",
		);
	});

	it("summarises a stored session", async () => {
		const { controller, notify } = setup(TOKENS);

		await controller.status();

		expect(notify).toHaveBeenCalledWith(
			"info",
			"Logged in",
			"scopes: user-read-private; refresh token: yes",
		);
	});

	it("clears the session on logout", async () => {
		const { controller, session, store } = setup(TOKENS);

		await expect(controller.logout()).resolves.toBe(true);
		expect(session.isAuthenticated()).toBe(false);
		expect(store.clearTokens).toHaveBeenCalledTimes(1);
	});

	it("reports the lifetime of a refreshed token", async () => {
		const { controller, notify, session } = setup(TOKENS);

		await expect(controller.refresh()).resolves.toBe(true);
		expect(session.getAccessToken()).toBe("A2");
		expect(notify).toHaveBeenCalledWith(
			"info",
			"Refreshed",
			"New access token valid for 1800s",
		);
	});

	it("routes a failed login to the error handler", async () => {
		const { controller, login, handleCommandError } = setup(null);
		const failure = new AuthError("provider_error", "Authentication failed: access_denied");
		login.mockRejectedValue(failure);

		await expect(controller.login()).resolves.toBe(false);
		expect(handleCommandError).toHaveBeenCalledWith(failure, "login");
	});

	it("keeps a successful login when the profile call fails", async () => {
		const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(new TypeError("fetch failed"));
		const { controller, login, notify } = setup(TOKENS, fetchMock);
		login.mockResolvedValue(TOKENS);

		await expect(controller.login()).resolves.toBe(true);
		expect(notify).toHaveBeenCalledWith(
			"info",
			"Logged In",
			"Session saved (access token valid for 3600s)",
		);
	});

	it("warns when the account is not premium", async () => {
		const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
			new Response(JSON.stringify({ id: "user-1", display_name: null, product: "free" })),
		);
		const { controller, notify } = setup(TOKENS, fetchMock);

		await expect(controller.whoami()).resolves.toBe(true);
		expect(notify.mock.calls).toEqual([
			["info", "Account", "user-1 (free)"],
			[
				"warning",
				"Premium Required",
				"Playback control needs Spotify Premium; browsing and search still work",
			],
		]);
	});
});
