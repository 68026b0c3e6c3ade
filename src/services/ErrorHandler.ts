import { ApiError, AuthError, ConfigError, ValidationError } from "../errors";
import { getLogger } from "../utils";

const logger = getLogger("ErrorHandler");

/**
 * Error severity levels
 */
export enum ErrorSeverity {
	/** Info - non-blocking, informational */
	INFO = "info",
	/** Warning - degraded functionality but app continues */
	WARNING = "warning",
	/** Error - feature broken but app recoverable */
	ERROR = "error",
	/** Fatal - command cannot continue, exits non-zero */
	FATAL = "fatal",
}

/**
 * Error categories for classification
 */
export enum ErrorCategory {
	/** Authentication errors (login failed, session expired, etc.) */
	AUTH = "auth",
	/** Network/API errors */
	NETWORK = "network",
	/** Missing or invalid configuration */
	CONFIG = "config",
	/** File system errors */
	FS = "fs",
	/** Validation errors */
	VALIDATION = "validation",
	/** Unknown errors */
	UNKNOWN = "unknown",
}

/**
 * Error context for additional information
 */
export interface ErrorContext {
	category: ErrorCategory;
	severity: ErrorSeverity;
	operation?: string; // What was being attempted
	metadata?: Record<string, unknown>;
	recoverable?: boolean;
	userMessage?: string;
}

/**
 * User-facing feedback channel
 */
export interface Notifier {
	notify(level: "info" | "warning" | "error", title: string, message: string): void;
}

/**
 * Prints feedback to the terminal
 */
export const consoleNotifier: Notifier = {
	notify(level, title, message) {
		const line = `${title}: ${message}`;
		if (level === "error") {
			console.error(line);
		} else {
			console.log(line);
		}
	},
};

/**
 * Errors raised by node:fs carry an errno code and the failing syscall
 */
function isFsError(error: unknown): error is NodeJS.ErrnoException {
	return (
		error instanceof Error &&
		"code" in error &&
		typeof error.code === "string" &&
		"syscall" in error &&
		typeof error.syscall === "string"
	);
}

type RecoveryStrategy = (
	error: Error,
	context: ErrorContext,
) => Promise<void> | void;

/**
 * Centralized Error Handler
 * Provides consistent error handling, logging, user feedback, and recovery strategies
 */
export class ErrorHandler {
	private recoveryStrategies = new Map<ErrorCategory, RecoveryStrategy[]>();

	constructor(private notifier: Notifier = consoleNotifier) {
		this.initializeDefaultStrategies();
	}

	private initializeDefaultStrategies(): void {
		// Auth recovery: point the user at the login command
		this.registerRecoveryStrategy(ErrorCategory.AUTH, (error) => {
			if (error instanceof AuthError && error.requiresLogin) {
				this.notifier.notify(
					"info",
					"Authentication Required",
					"Run `tunedeck login` to sign in again",
				);
			}
		});

		this.registerRecoveryStrategy(ErrorCategory.CONFIG, () => {
			this.notifier.notify(
				"info",
				"Configuration",
				"Set SPOTIFY_CLIENT_ID and SPOTIFY_CLIENT_SECRET (https://developer.spotify.com/dashboard/)",
			);
		});

		// Session file or config directory not accessible
		this.registerRecoveryStrategy(ErrorCategory.FS, (error) => {
			if (isFsError(error) && error.path) {
				this.notifier.notify(
					"info",
					"File Access",
					`Check the permissions of ${error.path}`,
				);
			}
		});

		this.registerRecoveryStrategy(ErrorCategory.NETWORK, (error) => {
			if (error instanceof ApiError && error.retryAfterSeconds !== undefined) {
				this.notifier.notify(
					"warning",
					"Rate Limited",
					`Try again in ${error.retryAfterSeconds} seconds`,
				);
			}
		});
	}

	/**
	 * Register a recovery strategy for a specific error category
	 */
	registerRecoveryStrategy(
		category: ErrorCategory,
		strategy: RecoveryStrategy,
	): void {
		const strategies = this.recoveryStrategies.get(category) ?? [];
		strategies.push(strategy);
		this.recoveryStrategies.set(category, strategies);
	}

	/**
	 * Pick category and severity for the errors this app raises
	 */
	classify(error: unknown): Pick<ErrorContext, "category" | "severity"> {
		if (error instanceof ConfigError) {
			return { category: ErrorCategory.CONFIG, severity: ErrorSeverity.FATAL };
		}
		if (error instanceof AuthError) {
			switch (error.kind) {
				case "network":
					return { category: ErrorCategory.NETWORK, severity: ErrorSeverity.ERROR };
				case "listener_bind":
				case "state_mismatch":
				case "malformed_response":
					return { category: ErrorCategory.AUTH, severity: ErrorSeverity.FATAL };
				default:
					return { category: ErrorCategory.AUTH, severity: ErrorSeverity.ERROR };
			}
		}
		if (error instanceof ApiError) {
			return { category: ErrorCategory.NETWORK, severity: ErrorSeverity.ERROR };
		}
		if (error instanceof ValidationError) {
			return { category: ErrorCategory.VALIDATION, severity: ErrorSeverity.ERROR };
		}
		if (isFsError(error)) {
			return { category: ErrorCategory.FS, severity: ErrorSeverity.ERROR };
		}
		return { category: ErrorCategory.UNKNOWN, severity: ErrorSeverity.ERROR };
	}

	/**
	 * Handle an error with context
	 */
	async handle(error: unknown, context: ErrorContext): Promise<void> {
		const err = this.normalizeError(error);

		this.logError(err, context);

		if (context.recoverable !== false) {
			await this.executeRecoveryStrategies(err, context);
		}

		if (
			context.severity === ErrorSeverity.ERROR ||
			context.severity === ErrorSeverity.FATAL
		) {
			this.showUserFeedback(err, context);
		}

		// Never abort mid-flight; the process ends with a failing status instead
		if (context.severity === ErrorSeverity.FATAL) {
			process.exitCode = 1;
		}
	}

	/**
	 * Classify and handle an error raised by a command
	 */
	async handleCommandError(error: unknown, operation: string): Promise<void> {
		await this.handle(error, {
			...this.classify(error),
			operation,
			recoverable: true,
		});
	}

	private normalizeError(error: unknown): Error {
		if (error instanceof Error) {
			return error;
		}
		return new Error(String(error));
	}

	private logError(error: Error, context: ErrorContext): void {
		const logMessage = `[${context.category}] ${context.operation || "Unknown operation"}: ${error.message}`;

		switch (context.severity) {
			case ErrorSeverity.INFO:
				logger.info(logMessage, context.metadata);
				break;
			case ErrorSeverity.WARNING:
				logger.warn(logMessage, context.metadata);
				break;
			case ErrorSeverity.ERROR:
				logger.error(logMessage, context.metadata);
				break;
			case ErrorSeverity.FATAL:
				logger.error(`FATAL: ${logMessage}`, context.metadata);
				break;
		}
	}

	private async executeRecoveryStrategies(
		error: Error,
		context: ErrorContext,
	): Promise<void> {
		const strategies = this.recoveryStrategies.get(context.category) ?? [];

		for (const strategy of strategies) {
			try {
				await strategy(error, context);
			} catch (recoveryError) {
				logger.error("Recovery strategy failed:", recoveryError);
			}
		}
	}

	private showUserFeedback(error: Error, context: ErrorContext): void {
		const title = context.userMessage || this.getDefaultTitle(context.category);
		this.notifier.notify("error", title, error.message);
	}

	private getDefaultTitle(category: ErrorCategory): string {
		switch (category) {
			case ErrorCategory.AUTH:
				return "Authentication Error";
			case ErrorCategory.NETWORK:
				return "Network Error";
			case ErrorCategory.CONFIG:
				return "Configuration Error";
			case ErrorCategory.FS:
				return "File System Error";
			case ErrorCategory.VALIDATION:
				return "Validation Error";
			default:
				return "Error";
		}
	}

	/**
	 * Dispose and cleanup (remove all recovery strategies)
	 */
	dispose(): void {
		this.recoveryStrategies.clear();
	}
}

let instance: ErrorHandler | null = null;

/**
 * Get or create ErrorHandler instance
 */
export function getErrorHandler(): ErrorHandler {
	if (!instance) {
		instance = new ErrorHandler();
	}
	return instance;
}

/**
 * Create a new ErrorHandler instance (for testing)
 */
export function createErrorHandler(notifier?: Notifier): ErrorHandler {
	return new ErrorHandler(notifier);
}
