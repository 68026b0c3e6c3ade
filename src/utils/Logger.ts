/**
 * Logger Service
 * Context loggers for the auth broker and session manager. Payloads pass
 * through redactSecrets before they reach the console or the log file.
 */

import { getLogWriter, type LogWriter } from "./LogWriter";
import { redactSecrets } from "./redact";
import { getLoggingConfig, LogLevel } from "../config/logging";

export { LogLevel } from "../config/logging";

export interface LoggerConfig {
	level: LogLevel;
	enableTimestamps: boolean;
	enableColors: boolean;
	enableFileLogging: boolean;
	enableConsoleLogging: boolean;
	/** Line format used in the log file */
	fileFormat: "text" | "json";
}

// Get config from centralized logging config
const loggingConfig = getLoggingConfig();

const DEFAULT_CONFIG: LoggerConfig = {
	level: loggingConfig.level,
	enableTimestamps: true,
	enableColors: true,
	enableFileLogging: loggingConfig.fileLogging,
	enableConsoleLogging: loggingConfig.consoleLogging,
	fileFormat: loggingConfig.format,
};

/**
 * ANSI color codes for terminal output
 */
const colors = {
	reset: "\x1b[0m",
	dim: "\x1b[2m",
	red: "\x1b[31m",
	yellow: "\x1b[33m",
	blue: "\x1b[34m",
	cyan: "\x1b[36m",
	gray: "\x1b[90m",
};

/**
 * Logger class with support for different log levels and contexts
 */
export class Logger {
	private config: LoggerConfig;
	private context: string;
	private logWriter: LogWriter | null = null;

	constructor(context: string = "App", config: Partial<LoggerConfig> = {}) {
		this.context = context;
		this.config = { ...DEFAULT_CONFIG, ...config };

		if (this.config.enableFileLogging) {
			try {
				this.logWriter = getLogWriter({
					logDir: loggingConfig.logDir,
					maxFileSize: loggingConfig.maxFileSize,
					maxFiles: loggingConfig.maxFiles,
				});
			} catch {
				// File logging is non-critical, keep console output only
				this.config.enableFileLogging = false;
			}
		}
	}

	/**
	 * Create a child logger with a different context
	 */
	child(context: string): Logger {
		return new Logger(context, this.config);
	}

	getContext(): string {
		return this.context;
	}

	/**
	 * Set the minimum log level
	 */
	setLevel(level: LogLevel): void {
		this.config.level = level;
	}

	/**
	 * Format log message with timestamp and context (with colors for console)
	 */
	private format(
		level: string,
		message: string,
		color: string,
		data?: unknown,
	): string {
		const parts: string[] = [];

		// Timestamp (time of day only; the file log carries the date)
		if (this.config.enableTimestamps) {
			const timestamp = new Date().toISOString().slice(11, 23);
			parts.push(
				this.config.enableColors
					? `${colors.gray}[${timestamp}]${colors.reset}`
					: `[${timestamp}]`,
			);
		}

		// Level and context
		if (this.config.enableColors) {
			parts.push(`${color}${level.padEnd(5)}${colors.reset}`);
			parts.push(`${colors.cyan}[${this.context}]${colors.reset}`);
		} else {
			parts.push(level.padEnd(5));
			parts.push(`[${this.context}]`);
		}

		// Message
		parts.push(message);

		// Data
		if (data !== undefined) {
			const dataStr =
				typeof data === "object" ? JSON.stringify(data, null, 2) : String(data);
			parts.push(
				this.config.enableColors
					? `\n${colors.dim}${dataStr}${colors.reset}`
					: `\n${dataStr}`,
			);
		}

		return parts.join(" ");
	}

	/**
	 * Format a log line for the file (no colors)
	 */
	formatPlain(level: string, message: string, data?: unknown): string {
		const timestamp = new Date().toISOString();

		// One JSON object per line for machine readers
		if (this.config.fileFormat === "json") {
			return JSON.stringify({
				time: timestamp,
				level,
				context: this.context,
				message,
				...(data !== undefined ? { data } : {}),
			});
		}

		const parts = [timestamp, `[${level}]`, `[${this.context}]`, message];
		if (data !== undefined) {
			parts.push(typeof data === "object" ? JSON.stringify(data) : String(data));
		}
		return parts.join(" ");
	}

	/**
	 * Log to both console and file
	 */
	private log(
		level: LogLevel,
		levelStr: string,
		color: string,
		message: string,
		data?: unknown,
	): void {
		// Short-circuit if level is too low
		if (this.config.level > level) return;

		// Tokens and secrets never leave the process
		const safeData = data === undefined ? undefined : redactSecrets(data);

		if (this.config.enableConsoleLogging) {
			const consoleMessage = this.format(levelStr, message, color, safeData);
			const consoleMethod =
				level === LogLevel.ERROR
					? console.error
					: level === LogLevel.WARN
						? console.warn
						: console.log;
			consoleMethod(consoleMessage);
		}

		if (this.config.enableFileLogging && this.logWriter) {
			this.logWriter.write(this.formatPlain(levelStr, message, safeData));
		}
	}

	debug(message: string, data?: unknown): void {
		this.log(LogLevel.DEBUG, "DEBUG", colors.gray, message, data);
	}

	info(message: string, data?: unknown): void {
		this.log(LogLevel.INFO, "INFO", colors.blue, message, data);
	}

	warn(message: string, data?: unknown): void {
		this.log(LogLevel.WARN, "WARN", colors.yellow, message, data);
	}

	/**
	 * Error log (highest priority)
	 */
	error(message: string, error?: unknown): void {
		let errorData: unknown = error;

		// Extract useful info from Error objects
		if (error instanceof Error) {
			errorData = {
				name: error.name,
				message: error.message,
				stack: error.stack,
			};
		}

		this.log(LogLevel.ERROR, "ERROR", colors.red, message, errorData);
	}
}

// Global logger instance
let globalLogger: Logger | null = null;

/**
 * Get or create the global logger instance
 */
export function getLogger(context?: string): Logger {
	if (!globalLogger) {
		globalLogger = new Logger("App");
	}
	return context ? globalLogger.child(context) : globalLogger;
}

/**
 * Configure the global logger
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
	globalLogger = new Logger("App", config);
}
