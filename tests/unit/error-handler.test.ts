import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ApiError, AuthError, ConfigError, ValidationError } from "../../src/errors";
import {
	ErrorCategory,
	ErrorHandler,
	ErrorSeverity,
	type Notifier,
} from "../../src/services/ErrorHandler";

let previousExitCode: typeof process.exitCode;

beforeEach(() => {
	previousExitCode = process.exitCode;
});

afterEach(() => {
	process.exitCode = previousExitCode;
});

function permissionDenied(path: string): Error {
	return Object.assign(new Error(`EACCES: permission denied, open '${path}'`), {
		code: "EACCES",
		syscall: "open",
		path,
	});
}

function createHandler() {
	const notify = vi.fn<Notifier["notify"]>();
	return { handler: new ErrorHandler({ notify }), notify };
}

describe("ErrorHandler.classify", () => {
	const { handler } = createHandler();

	it.each([
		[new ConfigError(["x"]), ErrorCategory.CONFIG, ErrorSeverity.FATAL],
		[new AuthError("network", "down"), ErrorCategory.NETWORK, ErrorSeverity.ERROR],
		[new AuthError("state_mismatch", "bad"), ErrorCategory.AUTH, ErrorSeverity.FATAL],
		[new AuthError("listener_bind", "busy"), ErrorCategory.AUTH, ErrorSeverity.FATAL],
		[new AuthError("provider_error", "denied"), ErrorCategory.AUTH, ErrorSeverity.ERROR],
		[new ApiError(500, "oops", "/me"), ErrorCategory.NETWORK, ErrorSeverity.ERROR],
		[new ValidationError("/me"), ErrorCategory.VALIDATION, ErrorSeverity.ERROR],
		[permissionDenied("/tmp/session.json"), ErrorCategory.FS, ErrorSeverity.ERROR],
		[new Error("boom"), ErrorCategory.UNKNOWN, ErrorSeverity.ERROR],
	])("classifies %s", (error, category, severity) => {
		expect(handler.classify(error)).toEqual({ category, severity });
	});
});

describe("ErrorHandler.handleCommandError", () => {
	it("points an expired session at the login command", async () => {
		const { handler, notify } = createHandler();

		await handler.handleCommandError(
			new AuthError("not_authenticated", "Not authenticated. Please login first."),
			"whoami",
		);

		expect(notify.mock.calls).toEqual([
			["info", "Authentication Required", "Run `tunedeck login` to sign in again"],
			["error", "Authentication Error", "Not authenticated. Please login first."],
		]);
		expect(process.exitCode).toBe(previousExitCode);
	});

	it("sets a failing exit code for fatal errors without exiting", async () => {
		const { handler, notify } = createHandler();

		await handler.handleCommandError(
			new ConfigError(["clientId: client id is not set"]),
			"login",
		);

		expect(notify).toHaveBeenLastCalledWith(
			"error",
			"Configuration Error",
			"Invalid configuration: clientId: client id is not set",
		);
		expect(process.exitCode).toBe(1);
	});

	it("announces the rate-limit delay", async () => {
		const { handler, notify } = createHandler();

		await handler.handleCommandError(new ApiError(429, "", "/me", 12), "whoami");

		expect(notify).toHaveBeenCalledWith("warning", "Rate Limited", "Try again in 12 seconds");
	});

	it("points at the file that could not be accessed", async () => {
		const { handler, notify } = createHandler();

		await handler.handleCommandError(permissionDenied("/tmp/session.json"), "logout");

		expect(notify.mock.calls).toEqual([
			["info", "File Access", "Check the permissions of /tmp/session.json"],
			[
				"error",
				"File System Error",
				"EACCES: permission denied, open '/tmp/session.json'",
			],
		]);
	});

	it("keeps going when a recovery strategy throws", async () => {
		const { handler, notify } = createHandler();
		handler.registerRecoveryStrategy(ErrorCategory.UNKNOWN, () => {
			throw new Error("strategy broke");
		});

		await handler.handleCommandError("plain string failure", "status");

		expect(notify).toHaveBeenCalledWith("error", "Error", "plain string failure");
	});
});
