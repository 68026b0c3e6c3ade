import { describe, expect, it, vi, type Mock } from "vitest";
import { ApiError, AuthError, ValidationError } from "../../src/errors";
import { ApiClient } from "../../src/services/ApiClient";
import type { ITokenStore } from "../../src/services/ConfigService";
import { SessionManager } from "../../src/services/SessionManager";
import type { ITokenClient } from "../../src/services/TokenClient";
import type { TokenSet } from "../../src/types";

const BASE = "https://api.test/v1";

const TOKENS: TokenSet = {
	access_token: "A1",
	refresh_token: "R1",
	expires_in: 3600,
	scope: "user-read-private",
};

function memoryStore(initial: TokenSet | null): ITokenStore {
	let saved = initial;
	return {
		saveTokens: (tokens) => {
			saved = tokens;
		},
		loadTokens: () => saved,
		clearTokens: () => {
			saved = null;
		},
	};
}

function setup(initial: TokenSet | null = TOKENS) {
	const refresh = vi.fn<ITokenClient["refresh"]>().mockResolvedValue({
		...TOKENS,
		access_token: "A2",
	});
	const session = new SessionManager(memoryStore(initial), {
		exchangeCode: vi.fn<ITokenClient["exchangeCode"]>(),
		refresh,
	});
	const fetchMock: Mock<typeof fetch> = vi.fn<typeof fetch>();
	const client = new ApiClient(session, fetchMock, BASE);
	return { client, session, refresh, fetchMock };
}

function bearerOf(fetchMock: Mock<typeof fetch>, call: number): string | null {
	return new Headers(fetchMock.mock.calls[call]?.[1]?.headers).get("Authorization");
}

const USER = { id: "user-1", display_name: "Test User", product: "premium" };

describe("ApiClient", () => {
	it("sends the bearer token to the base URL", async () => {
		const { client, fetchMock } = setup();
		fetchMock.mockResolvedValueOnce(new Response(JSON.stringify(USER)));

		const user = await client.getCurrentUser();

		expect(user).toMatchObject(USER);
		expect(fetchMock.mock.calls[0]?.[0]).toBe("https://api.test/v1/me");
		expect(bearerOf(fetchMock, 0)).toBe("Bearer A1");
	});

	it("refreshes once on 401 and retries with the new token", async () => {
		const { client, session, refresh, fetchMock } = setup();
		fetchMock
			.mockResolvedValueOnce(new Response("expired", { status: 401 }))
			.mockResolvedValueOnce(new Response(JSON.stringify(USER)));

		await expect(client.getCurrentUser()).resolves.toMatchObject({ id: "user-1" });

		expect(refresh).toHaveBeenCalledTimes(1);
		expect(refresh).toHaveBeenCalledWith("R1");
		expect(fetchMock).toHaveBeenCalledTimes(2);
		expect(bearerOf(fetchMock, 1)).toBe("Bearer A2");
		expect(session.getAccessToken()).toBe("A2");
	});

	it("gives up after a second 401", async () => {
		const { client, refresh, fetchMock } = setup();
		fetchMock
			.mockResolvedValueOnce(new Response("expired", { status: 401 }))
			.mockResolvedValueOnce(new Response("still expired", { status: 401 }));

		const error = await client.requestJson("/me").catch((e: unknown) => e);

		expect(error).toBeInstanceOf(ApiError);
		expect(error).toMatchObject({
			status: 401,
			body: "still expired",
			message: "API error 401 on /me: still expired",
		});
		expect(refresh).toHaveBeenCalledTimes(1);
		expect(fetchMock).toHaveBeenCalledTimes(2);
	});

	it("requires a session before any request is sent", async () => {
		const { client, fetchMock } = setup(null);

		await expect(client.requestJson("/me")).rejects.toMatchObject({
			kind: "not_authenticated",
		});
		expect(fetchMock).not.toHaveBeenCalled();
	});

	it("asks for a new login when a 401 cannot be refreshed", async () => {
		const { client, refresh, fetchMock } = setup({ ...TOKENS, refresh_token: "" });
		fetchMock.mockResolvedValueOnce(new Response("expired", { status: 401 }));

		const error = await client.requestJson("/me").catch((e: unknown) => e);

		expect(error).toBeInstanceOf(AuthError);
		expect(error).toMatchObject({ kind: "not_authenticated", status: 401 });
		expect(refresh).not.toHaveBeenCalled();
	});

	it("resolves undefined for 204 No Content", async () => {
		const { client, fetchMock } = setup();
		fetchMock.mockResolvedValueOnce(new Response(null, { status: 204 }));

		await expect(client.requestJson("/me/player")).resolves.toBeUndefined();
	});

	it("reports Retry-After on 429", async () => {
		const { client, fetchMock } = setup();
		fetchMock.mockResolvedValueOnce(
			new Response("slow down", { status: 429, headers: { "Retry-After": "7" } }),
		);

		await expect(client.requestJson("/me/player")).rejects.toMatchObject({
			status: 429,
			retryAfterSeconds: 7,
			message: "Rate limited on /me/player. Retry after 7 seconds.",
		});
	});

	it("rejects a body that fails the schema", async () => {
		const { client, fetchMock } = setup();
		fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({ display_name: 3 })));

		const error = await client.getCurrentUser().catch((e: unknown) => e);

		expect(error).toBeInstanceOf(ValidationError);
		expect(error).toMatchObject({ source: "/me", message: "Invalid API response from /me" });
	});

	it("sets a JSON content type when a body is sent", async () => {
		const { client, fetchMock } = setup();
		fetchMock.mockResolvedValueOnce(new Response(null, { status: 204 }));

		await client.requestJson("/me/player", {
			method: "PUT",
			body: JSON.stringify({ device_ids: ["d1"] }),
		});

		const headers = new Headers(fetchMock.mock.calls[0]?.[1]?.headers);
		expect(headers.get("Content-Type")).toBe("application/json");
		expect(fetchMock.mock.calls[0]?.[1]?.method).toBe("PUT");
	});
});
