import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { getLoggingConfig, LogLevel } from "../../src/config/logging";
import { Logger, LogWriter, REDACTED, redactSecrets } from "../../src/utils";

const PLAIN = {
	enableColors: false,
	enableTimestamps: false,
	enableConsoleLogging: true,
	enableFileLogging: false,
	level: LogLevel.DEBUG,
} as const;

describe("redactSecrets", () => {
	it("masks credential fields at any depth and leaves the rest", () => {
		expect(
			redactSecrets({
				scope: "streaming",
				tokens: [{ access_token: "test-access", refresh_token: "test-refresh" }],
				request: { headers: { Authorization: "Bearer test-access" } },
			}),
		).toEqual({
			scope: "streaming",
			tokens: [{ access_token: REDACTED, refresh_token: REDACTED }],
			request: { headers: { Authorization: REDACTED } },
		});
	});

	it("passes primitives through", () => {
		expect(redactSecrets("plain")).toBe("plain");
		expect(redactSecrets(null)).toBeNull();
	});
});

describe("Logger", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("never prints token values", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
		const logger = new Logger("TokenClient", PLAIN);

		logger.info("Token response", { access_token: "test-access", scope: "x" });

		expect(log).toHaveBeenCalledWith(
			'INFO  [TokenClient] Token response \n{\n  "access_token": "[redacted]",\n  "scope": "x"\n}',
		);
	});

	it("drops messages below the configured level", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
		const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
		const logger = new Logger("Session", { ...PLAIN, level: LogLevel.WARN });

		logger.info("hidden");
		logger.warn("shown");

		expect(log).not.toHaveBeenCalled();
		expect(warn).toHaveBeenCalledWith("WARN  [Session] shown");
	});

	it("keeps the context of a child logger", () => {
		expect(new Logger("App", PLAIN).child("AuthService").getContext()).toBe("AuthService");
	});

	it("formats JSON file lines", () => {
		const logger = new Logger("AuthService", { ...PLAIN, fileFormat: "json" });

		const line = JSON.parse(logger.formatPlain("WARN", "Login failed", { kind: "timeout" }));

		expect(line).toMatchObject({
			level: "WARN",
			context: "AuthService",
			message: "Login failed",
			data: { kind: "timeout" },
		});
		expect(typeof line.time).toBe("string");
	});
});

describe("getLoggingConfig", () => {
	it("reads every setting from the environment", () => {
		expect(
			getLoggingConfig({
				TUNEDECK_LOG_LEVEL: "debug",
				TUNEDECK_LOG_FILE: "false",
				TUNEDECK_LOG_CONSOLE: "true",
				TUNEDECK_LOG_DIR: "/tmp/tunedeck-logs",
				TUNEDECK_LOG_FORMAT: "json",
			}),
		).toMatchObject({
			level: LogLevel.DEBUG,
			fileLogging: false,
			consoleLogging: true,
			logDir: "/tmp/tunedeck-logs",
			format: "json",
		});
	});
});

describe("LogWriter", () => {
	let logDir: string;
	let writer: LogWriter | null = null;

	beforeEach(() => {
		logDir = mkdtempSync(join(tmpdir(), "tunedeck-logs-"));
	});

	afterEach(async () => {
		await writer?.shutdown();
		writer = null;
		rmSync(logDir, { recursive: true, force: true });
	});

	it("appends buffered lines on flush", async () => {
		writer = new LogWriter({ logDir, filename: "test.log", flushInterval: 60_000 });

		writer.write("first");
		writer.write("second\n");
		expect(writer.getBufferSize()).toBe(2);
		await writer.flush();

		expect(writer.getBufferSize()).toBe(0);
		expect(readFileSync(join(logDir, "test.log"), "utf-8")).toBe("first\nsecond\n");
	});

	it("rotates once the file reaches its size limit", async () => {
		writer = new LogWriter({
			logDir,
			filename: "test.log",
			maxFileSize: 10,
			flushInterval: 60_000,
		});

		writer.write("0123456789");
		await writer.flush();

		expect(existsSync(join(logDir, "test.log"))).toBe(false);
		expect(readFileSync(join(logDir, "test.log.1"), "utf-8")).toBe("0123456789\n");
	});
});
