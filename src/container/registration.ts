/**
 * Service Registration
 * Wires the authentication broker, session and API client together
 */

import type { ServiceContainer } from "./ServiceContainer";
import { TOKENS } from "./tokens";
import { type AppEventMap, type EventEmitter, getAppEventBus } from "../events";
import { ApiClient } from "../services/ApiClient";
import { AuthService } from "../services/AuthService";
import { ConfigService, getConfigService } from "../services/ConfigService";
import { getErrorHandler } from "../services/ErrorHandler";
import { SessionManager } from "../services/SessionManager";
import { type ITokenClient, TokenClient } from "../services/TokenClient";
import type { AuthConfig } from "../types";
import { getLogger } from "../utils";

const logger = getLogger("ServiceRegistration");

export interface RegistrationOverrides {
	config?: ConfigService;
	fetch?: typeof fetch;
}

/**
 * Register all services with the DI container
 * Nothing is constructed until first resolved, so commands that need no
 * client credentials never fail on missing configuration.
 */
export function registerServices(
	container: ServiceContainer,
	overrides: RegistrationOverrides = {},
): void {
	logger.debug("Registering services with DI container...");
	const fetchFn = overrides.fetch ?? fetch;

	// Core Services (no dependencies)
	container.singleton(TOKENS.Config, () => overrides.config ?? getConfigService());
	container.singleton(TOKENS.EventBus, () => getAppEventBus());
	container.singleton(TOKENS.ErrorHandler, () => getErrorHandler());
	container.singleton(TOKENS.AuthConfig, (c) =>
		c.resolve<ConfigService>(TOKENS.Config).getAuthConfig(),
	);

	// Authentication & API (depend on core services)
	container.singleton(TOKENS.TokenClient, (c) => {
		const config = c.resolve<AuthConfig>(TOKENS.AuthConfig);
		return new TokenClient(
			{
				clientId: config.clientId,
				clientSecret: config.clientSecret,
				redirectUri: config.redirectUri,
			},
			fetchFn,
		);
	});
	container.singleton(TOKENS.Session, (c) => {
		// Client credentials are only required once a refresh actually happens
		const tokenClient: ITokenClient = {
			exchangeCode: async (code, verifier) =>
				c.resolve<TokenClient>(TOKENS.TokenClient).exchangeCode(code, verifier),
			refresh: async (refreshToken) =>
				c.resolve<TokenClient>(TOKENS.TokenClient).refresh(refreshToken),
		};
		return new SessionManager(
			c.resolve<ConfigService>(TOKENS.Config),
			tokenClient,
			c.resolve<EventEmitter<AppEventMap>>(TOKENS.EventBus),
		);
	});
	container.singleton(
		TOKENS.Auth,
		(c) =>
			new AuthService({
				config: c.resolve<AuthConfig>(TOKENS.AuthConfig),
				tokenClient: c.resolve<TokenClient>(TOKENS.TokenClient),
				session: c.resolve<SessionManager>(TOKENS.Session),
				events: c.resolve<EventEmitter<AppEventMap>>(TOKENS.EventBus),
			}),
	);
	container.singleton(
		TOKENS.SpotifyApi,
		(c) => new ApiClient(c.resolve<SessionManager>(TOKENS.Session), fetchFn),
	);

	logger.debug("Service registration complete");
}

/**
 * Check if all required services are registered
 */
export function validateServiceRegistration(
	container: ServiceContainer,
): boolean {
	for (const token of Object.values(TOKENS)) {
		if (!container.has(token)) {
			logger.error(`Missing required service: ${token.toString()}`);
			return false;
		}
	}

	return true;
}
