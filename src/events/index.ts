export {
	EventEmitter,
	createEventEmitter,
	type EventListener,
	type EventSubscription,
} from "./EventEmitter";

export {
	getAppEventBus,
	resetAppEventBus,
	type AppEventMap,
	type AuthStateChanged,
	type SessionChanged,
} from "./AppEvents";
