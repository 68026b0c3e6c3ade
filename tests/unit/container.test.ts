import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
	ServiceContainer,
	TOKENS,
	registerServices,
	validateServiceRegistration,
} from "../../src/container";
import { ConfigError } from "../../src/errors";
import type { AuthService } from "../../src/services/AuthService";
import { ConfigService } from "../../src/services/ConfigService";
import type { SessionManager } from "../../src/services/SessionManager";

let configDir: string;

beforeEach(() => {
	configDir = mkdtempSync(join(tmpdir(), "tunedeck-container-"));
});

afterEach(() => {
	rmSync(configDir, { recursive: true, force: true });
});

function createContainer(env: NodeJS.ProcessEnv): ServiceContainer {
	const container = new ServiceContainer();
	registerServices(container, {
		config: new ConfigService({ configDir, env }),
		fetch: vi.fn<typeof fetch>(),
	});
	return container;
}

describe("ServiceContainer", () => {
	it("returns the same singleton and fresh transients", () => {
		const container = new ServiceContainer();
		const single = Symbol("single");
		const transient = Symbol("transient");
		container.singleton(single, () => ({}));
		container.register(transient, () => ({}));

		expect(container.resolve(single)).toBe(container.resolve(single));
		expect(container.resolve(transient)).not.toBe(container.resolve(transient));
	});

	it("throws for an unregistered token", () => {
		expect(() => new ServiceContainer().resolve(Symbol("missing"))).toThrow(
			"Service not registered for token: Symbol(missing)",
		);
	});

	it("disposes singletons that can be disposed", () => {
		const container = new ServiceContainer();
		const dispose = vi.fn();
		const token = Symbol("disposable");
		container.singleton(token, () => ({ dispose }));
		container.resolve(token);

		container.dispose();

		expect(dispose).toHaveBeenCalledTimes(1);
		expect(container.has(token)).toBe(false);
	});
});

describe("registerServices", () => {
	it("registers every service token", () => {
		expect(validateServiceRegistration(createContainer({}))).toBe(true);
	});

	it("builds the session without client credentials", () => {
		const session = createContainer({}).resolve<SessionManager>(TOKENS.Session);

		expect(session.isAuthenticated()).toBe(false);
	});

	it("needs client credentials only for the login broker", () => {
		const container = createContainer({});

		expect(() => container.resolve<AuthService>(TOKENS.Auth)).toThrow(ConfigError);
	});

	it("builds the login broker from configured credentials", () => {
		const container = createContainer({
			SPOTIFY_CLIENT_ID: "test-client",
			SPOTIFY_CLIENT_SECRET: "test-secret",
		});

		const auth = container.resolve<AuthService>(TOKENS.Auth);

		expect(auth.isLoginInProgress).toBe(false);
		expect(auth.buildAuthUrl("c", "s")).toContain("client_id=test-client");
	});
});
