export {
	Logger,
	getLogger,
	configureLogger,
	type LoggerConfig,
} from "./Logger";
export { LogLevel } from "../config/logging";
export { LogWriter, getLogWriter, shutdownLogWriter } from "./LogWriter";
export { escapeHtml } from "./html";
export { REDACTED, redactSecrets } from "./redact";
