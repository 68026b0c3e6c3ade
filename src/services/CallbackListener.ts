import {
	createServer,
	type IncomingMessage,
	type Server,
	type ServerResponse,
} from "node:http";
import {
	DEFAULT_CALLBACK_HOST,
	DEFAULT_CALLBACK_PATH,
	DEFAULT_CALLBACK_PORT,
	HTTP_STATUS,
} from "../config/constants";
import { AuthError } from "../errors";
import type { CallbackResult } from "../types";
import { getLogger } from "../utils";
import {
	renderAlreadyHandledPage,
	renderErrorPage,
	renderSuccessPage,
} from "./callbackPages";

const logger = getLogger("CallbackListener");

export const MISSING_CODE_ERROR = "Missing authorization code";

/**
 * Where the loopback listener binds
 */
export interface CallbackListenerOptions {
	host: string;
	port: number;
	path: string;
}

/**
 * Receives the single authorization redirect of one attempt
 */
export interface ICallbackListener {
	/** Settles once, with the first callback received */
	readonly result: Promise<CallbackResult>;
	start(): Promise<void>;
	close(): Promise<void>;
}

export type CallbackListenerFactory = (redirectUri: string) => ICallbackListener;

/**
 * Derive bind address from the redirect URI registered with the provider
 */
export function parseRedirectUri(redirectUri: string): CallbackListenerOptions {
	const url = new URL(redirectUri);
	const port = url.port ? Number.parseInt(url.port, 10) : DEFAULT_CALLBACK_PORT;

	return {
		// URL keeps IPv6 hosts bracketed
		host: url.hostname.replace(/^\[(.*)\]$/, "$1") || DEFAULT_CALLBACK_HOST,
		port,
		path: url.pathname || DEFAULT_CALLBACK_PATH,
	};
}

function parseRequestUrl(req: IncomingMessage): URL | null {
	try {
		return new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
	} catch {
		return null;
	}
}

/**
 * Map callback query parameters to the published outcome
 */
export function parseCallbackQuery(params: URLSearchParams): CallbackResult {
	const error = params.get("error");
	if (error) {
		return { kind: "error", error };
	}

	const code = params.get("code");
	const state = params.get("state");
	if (code && state) {
		return { kind: "code", code, state };
	}

	return { kind: "error", error: MISSING_CODE_ERROR };
}

/**
 * Short-lived loopback HTTP server for the OAuth redirect
 */
export class CallbackListener implements ICallbackListener {
	readonly result: Promise<CallbackResult>;
	private readonly publishResult: (result: CallbackResult) => void;
	private published = false;
	private server: Server | null = null;

	constructor(private readonly options: CallbackListenerOptions) {
		let publish: (result: CallbackResult) => void = () => undefined;
		this.result = new Promise<CallbackResult>((resolve) => {
			publish = resolve;
		});
		this.publishResult = publish;
	}

	static fromRedirectUri(redirectUri: string): CallbackListener {
		return new CallbackListener(parseRedirectUri(redirectUri));
	}

	/**
	 * Actual bound port (differs from the option when binding port 0)
	 */
	get port(): number {
		const address = this.server?.address();
		if (address && typeof address === "object") {
			return address.port;
		}
		return this.options.port;
	}

	get isListening(): boolean {
		return this.server !== null;
	}

	/**
	 * Bind the listener; rejects with a `listener_bind` AuthError when the port is taken
	 */
	start(): Promise<void> {
		if (this.server) {
			return Promise.resolve();
		}

		const { host, port } = this.options;

		return new Promise((resolve, reject) => {
			const server = createServer((req, res) => this.handleRequest(req, res));

			const onBindError = (err: Error) => {
				reject(
					new AuthError(
						"listener_bind",
						`Failed to start callback server on ${host}:${port}: ${err.message}`,
						{ cause: err },
					),
				);
			};

			server.once("error", onBindError);
			server.listen(port, host, () => {
				server.removeListener("error", onBindError);
				server.on("error", (err) => {
					logger.error("Callback server error", err);
				});
				this.server = server;
				logger.debug(`Listening for callback on ${host}:${this.port}`);
				resolve();
			});
		});
	}

	/**
	 * Stop listening and drop keep-alive sockets; safe to call repeatedly
	 */
	async close(): Promise<void> {
		const server = this.server;
		if (!server) {
			return;
		}
		this.server = null;

		await new Promise<void>((resolve, reject) => {
			server.close((err) => (err ? reject(err) : resolve()));
			server.closeAllConnections();
		});
		logger.debug("Callback server closed");
	}

	private handleRequest(req: IncomingMessage, res: ServerResponse): void {
		const url = parseRequestUrl(req);
		if (!url) {
			logger.warn("Rejected callback request with an unparsable URL or Host header");
			res.writeHead(HTTP_STATUS.BAD_REQUEST, {
				"Content-Type": "text/plain",
				Connection: "close",
			});
			res.end("Bad request");
			return;
		}

		if (url.pathname !== this.options.path) {
			res.writeHead(HTTP_STATUS.NOT_FOUND, {
				"Content-Type": "text/plain",
				Connection: "close",
			});
			res.end("Not found");
			return;
		}

		if (req.method !== "GET") {
			res.writeHead(HTTP_STATUS.METHOD_NOT_ALLOWED, {
				Allow: "GET",
				Connection: "close",
			});
			res.end();
			return;
		}

		// First callback wins; reloads and retries never overwrite it
		if (this.published) {
			this.sendHtml(res, renderAlreadyHandledPage());
			return;
		}

		const outcome = parseCallbackQuery(url.searchParams);
		this.published = true;
		this.publishResult(outcome);

		if (outcome.kind === "code") {
			logger.info("Authorization callback received");
			this.sendHtml(res, renderSuccessPage());
		} else {
			logger.warn(`Authorization callback carried an error: ${outcome.error}`);
			this.sendHtml(res, renderErrorPage(outcome.error));
		}
	}

	private sendHtml(res: ServerResponse, html: string): void {
		res.writeHead(HTTP_STATUS.OK, {
			"Content-Type": "text/html; charset=utf-8",
			"Cache-Control": "no-store",
			Connection: "close",
		});
		res.end(html);
	}
}
