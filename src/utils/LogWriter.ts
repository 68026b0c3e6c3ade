/**
 * LogWriter - Handles file-based logging with rotation and buffering
 *
 * Features:
 * - Buffered writes (reduces disk I/O)
 * - Size-based log rotation
 * - Async appends off the hot path
 * - Owner-only permissions on the log directory and files
 */

import {
	existsSync,
	mkdirSync,
	renameSync,
	statSync,
	unlinkSync,
} from "node:fs";
import { appendFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";

export interface LogWriterConfig {
	/** Directory where log files are stored */
	logDir: string;
	/** Log file base name */
	filename: string;
	/** Maximum size of a single log file in bytes */
	maxFileSize: number;
	/** Maximum number of rotated log files to keep */
	maxFiles: number;
	/** Interval in milliseconds to flush buffered logs */
	flushInterval: number;
	/** Whether logging is enabled */
	enabled: boolean;
}

const MAX_BUFFERED_LINES = 100;
const MAX_RETAINED_CHUNKS = 1000;

const DEFAULT_CONFIG: LogWriterConfig = {
	logDir: join(homedir(), ".tunedeck", "logs"),
	filename: "tunedeck.log",
	maxFileSize: 5 * 1024 * 1024, // 5MB
	maxFiles: 5,
	flushInterval: 1000,
	enabled: true,
};

/**
 * LogWriter handles file-based logging with rotation
 */
export class LogWriter {
	private config: LogWriterConfig;
	private buffer: string[] = [];
	private currentSize = 0;
	private flushTimer: NodeJS.Timeout | null = null;
	private flushing = false;
	private initialized = false;

	constructor(config: Partial<LogWriterConfig> = {}) {
		this.config = { ...DEFAULT_CONFIG, ...config };
		this.initialize();
	}

	/**
	 * Initialize log directory and start flush timer
	 */
	private initialize(): void {
		if (!this.config.enabled) {
			return;
		}

		try {
			// Create log directory if it doesn't exist
			if (!existsSync(this.config.logDir)) {
				mkdirSync(this.config.logDir, { recursive: true, mode: 0o700 });
			}

			// Continue counting from the existing file
			const logFile = this.getLogFilePath();
			if (existsSync(logFile)) {
				this.currentSize = statSync(logFile).size;
			}

			this.flushTimer = setInterval(() => {
				this.flush().catch((err) => {
					console.error("Log flush error:", err);
				});
			}, this.config.flushInterval);

			// Don't prevent the CLI from exiting
			this.flushTimer.unref();

			this.initialized = true;
		} catch (error) {
			console.error("Failed to initialize LogWriter:", error);
			this.config.enabled = false;
		}
	}

	private getLogFilePath(): string {
		return join(this.config.logDir, this.config.filename);
	}

	private getRotatedLogFilePath(index: number): string {
		return join(this.config.logDir, `${this.config.filename}.${index}`);
	}

	/**
	 * Write a log line (adds to buffer)
	 */
	write(message: string): void {
		if (!this.config.enabled || !this.initialized) {
			return;
		}

		const line = message.endsWith("\n") ? message : `${message}\n`;
		this.buffer.push(line);

		// Flush immediately if buffer is large
		if (this.buffer.length > MAX_BUFFERED_LINES) {
			this.flush().catch((err) => {
				console.error("Log flush error:", err);
			});
		}
	}

	/**
	 * Flush buffered logs to disk
	 */
	async flush(): Promise<void> {
		if (!this.config.enabled || this.buffer.length === 0 || this.flushing) {
			return;
		}

		this.flushing = true;
		const content = this.buffer.join("");
		this.buffer = [];

		try {
			await appendFile(this.getLogFilePath(), content, { mode: 0o600 });
			this.currentSize += Buffer.byteLength(content, "utf-8");

			if (this.currentSize >= this.config.maxFileSize) {
				this.rotate();
			}
		} catch (error) {
			console.error("Log flush failed:", error);
			// Keep the lines for the next attempt (bounded)
			this.buffer = [content, ...this.buffer].slice(-MAX_RETAINED_CHUNKS);
		} finally {
			this.flushing = false;
		}
	}

	/**
	 * Rotate log files: .4 -> .5 (oldest deleted), ..., current -> .1
	 */
	private rotate(): void {
		try {
			// Shift existing rotated logs
			for (let i = this.config.maxFiles; i > 0; i--) {
				const currentRotated = this.getRotatedLogFilePath(i);
				if (!existsSync(currentRotated)) continue;

				if (i === this.config.maxFiles) {
					// Delete oldest
					unlinkSync(currentRotated);
				} else {
					renameSync(currentRotated, this.getRotatedLogFilePath(i + 1));
				}
			}

			const logFile = this.getLogFilePath();
			if (existsSync(logFile)) {
				renameSync(logFile, this.getRotatedLogFilePath(1));
			}

			this.currentSize = 0;
		} catch (error) {
			console.error("Log rotation failed:", error);
		}
	}

	/**
	 * Stop the flush timer and write out what is buffered
	 */
	async shutdown(): Promise<void> {
		if (this.flushTimer) {
			clearInterval(this.flushTimer);
			this.flushTimer = null;
		}
		await this.flush();
	}

	/**
	 * Lines waiting for the next flush
	 */
	getBufferSize(): number {
		return this.buffer.length;
	}
}

// ─────────────────────────────────────────────────────────────
// Singleton
// ─────────────────────────────────────────────────────────────

let instance: LogWriter | null = null;

export function getLogWriter(config?: Partial<LogWriterConfig>): LogWriter {
	if (!instance) {
		instance = new LogWriter(config);
	}
	return instance;
}

/**
 * Flush and drop the singleton
 */
export async function shutdownLogWriter(): Promise<void> {
	if (instance) {
		const writer = instance;
		instance = null;
		await writer.shutdown();
	}
}
