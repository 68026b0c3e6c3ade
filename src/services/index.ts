export { ApiClient } from "./ApiClient";
export { AuthService, type AuthServiceDeps } from "./AuthService";
export {
	AuthorizationWaiter,
	statesMatch,
	type WaitOptions,
} from "./AuthorizationWaiter";
export { launchBrowser, type BrowserLauncher } from "./BrowserLauncher";
export {
	CallbackListener,
	MISSING_CODE_ERROR,
	parseCallbackQuery,
	parseRedirectUri,
	type CallbackListenerFactory,
	type CallbackListenerOptions,
	type ICallbackListener,
} from "./CallbackListener";
export {
	ConfigService,
	getConfigService,
	type ConfigServiceOptions,
	type ITokenStore,
} from "./ConfigService";
export {
	ErrorCategory,
	ErrorHandler,
	ErrorSeverity,
	consoleNotifier,
	createErrorHandler,
	getErrorHandler,
	type ErrorContext,
	type Notifier,
} from "./ErrorHandler";
export { deriveCodeChallenge, generatePKCE } from "./PkceGenerator";
export { SessionManager } from "./SessionManager";
export {
	TokenClient,
	type ITokenClient,
	type TokenClientConfig,
} from "./TokenClient";
