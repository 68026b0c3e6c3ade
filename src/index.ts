#!/usr/bin/env tsx
import { APP_NAME, APP_VERSION } from "./config/constants";
import {
	createServiceContainer,
	registerServices,
	TOKENS,
	validateServiceRegistration,
	type ServiceContainer,
} from "./container";
import { AuthenticationController } from "./controllers";
import type { AppEventMap, EventEmitter } from "./events";
import type { ApiClient } from "./services/ApiClient";
import type { AuthService } from "./services/AuthService";
import { consoleNotifier, type ErrorHandler } from "./services/ErrorHandler";
import type { SessionManager } from "./services/SessionManager";
import { getLogger, shutdownLogWriter } from "./utils";

const logger = getLogger("Main");

const COMMANDS = ["login", "logout", "status", "refresh", "whoami"] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string): value is Command {
	return COMMANDS.some((command) => command === value);
}

function printUsage(): void {
	console.log(`${APP_NAME} ${APP_VERSION}

Usage: ${APP_NAME} <command>

Commands:
  login    Sign in with Spotify in the browser
  logout   Forget the stored session
  status   Show whether a session is stored
  refresh  Get a new access token using the refresh token
  whoami   Show the signed-in account`);
}

function createController(container: ServiceContainer): AuthenticationController {
	return new AuthenticationController({
		auth: () => container.resolve<AuthService>(TOKENS.Auth),
		session: () => container.resolve<SessionManager>(TOKENS.Session),
		api: () => container.resolve<ApiClient>(TOKENS.SpotifyApi),
		errorHandler: container.resolve<ErrorHandler>(TOKENS.ErrorHandler),
		notifier: consoleNotifier,
	});
}

/**
 * Main entry point
 * Sets up DI container and runs one command
 */
async function main(argv: string[]): Promise<number> {
	const [name] = argv;

	if (!name || name === "help" || name === "--help" || name === "-h") {
		printUsage();
		return 0;
	}
	if (name === "--version" || name === "-v") {
		console.log(APP_VERSION);
		return 0;
	}
	if (!isCommand(name)) {
		console.error(`Unknown command: ${name}\n`);
		printUsage();
		return 1;
	}

	const container = createServiceContainer();
	registerServices(container);
	if (!validateServiceRegistration(container)) {
		logger.error("Service registration validation failed");
		return 1;
	}

	const events = container.resolve<EventEmitter<AppEventMap>>(TOKENS.EventBus);
	events.on("auth:stateChanged", ({ to }) => {
		if (to === "awaiting_callback") {
			console.log("Waiting for the browser to redirect back...");
		}
	});

	const controller = createController(container);
	const ok = await controller[name]();
	container.dispose();
	return ok ? 0 : 1;
}

void main(process.argv.slice(2))
	.then((code) => {
		process.exitCode = code;
	})
	.catch((error: unknown) => {
		logger.error("Fatal error in main:", error);
		console.error(error instanceof Error ? error.message : String(error));
		process.exitCode = 1;
	})
	.finally(() => shutdownLogWriter());
