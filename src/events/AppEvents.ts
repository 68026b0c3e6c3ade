/**
 * Application Events
 * Event types published by the authentication broker and session manager
 */

import type { AuthorizationState } from "../types";
import { createEventEmitter, type EventEmitter } from "./EventEmitter";

export type AuthStateChanged = {
	from: AuthorizationState;
	to: AuthorizationState;
};

export type SessionChanged = {
	authenticated: boolean;
};

/**
 * Application event map
 */
export type AppEventMap = {
	// Authentication flow
	"auth:stateChanged": AuthStateChanged;
	"auth:urlReady": { url: string };

	// Session lifecycle
	"session:changed": SessionChanged;
	"session:refreshed": { expiresIn: number };
};

/**
 * Global application event bus
 */
let appEventBus: EventEmitter<AppEventMap> | null = null;

/**
 * Get or create the global app event bus
 */
export function getAppEventBus(): EventEmitter<AppEventMap> {
	if (!appEventBus) {
		appEventBus = createEventEmitter<AppEventMap>();
	}
	return appEventBus;
}

/**
 * Reset the event bus (useful for testing)
 */
export function resetAppEventBus(): void {
	appEventBus?.removeAllListeners();
	appEventBus = null;
}
