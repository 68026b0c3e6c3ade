import { APP_NAME } from "../config/constants";
import { escapeHtml } from "../utils/html";

const STYLE = `
    body {
      font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
      display: flex;
      justify-content: center;
      align-items: center;
      height: 100vh;
      margin: 0;
      background: #121212;
      color: #fff;
    }
    .container { text-align: center; padding: 40px; border-radius: 12px; background: #1e1e1e; }
    h1.ok { color: #1DB954; }
    h1.fail { color: #e74c3c; }
    p { color: #b3b3b3; }
    .error { color: #ff6b6b; font-family: monospace; }`;

function page(title: string, body: string): string {
	return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>${APP_NAME} - ${title}</title>
  <style>${STYLE}
  </style>
</head>
<body>
  <div class="container">
${body}
  </div>
</body>
</html>`;
}

export function renderSuccessPage(): string {
	return page(
		"Authentication Successful",
		`    <h1 class="ok">Authentication Successful!</h1>
    <p>You can close this window and return to ${APP_NAME}.</p>`,
	);
}

export function renderErrorPage(error: string): string {
	return page(
		"Authentication Failed",
		`    <h1 class="fail">Authentication Failed</h1>
    <p class="error">${escapeHtml(error)}</p>
    <p>You can close this window.</p>`,
	);
}

export function renderAlreadyHandledPage(): string {
	return page(
		"Authentication",
		`    <h1>Request Already Handled</h1>
    <p>This sign-in attempt has already completed. Return to ${APP_NAME}.</p>`,
	);
}
