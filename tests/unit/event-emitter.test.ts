import { afterEach, describe, expect, it, vi } from "vitest";
import {
	type AppEventMap,
	createEventEmitter,
	getAppEventBus,
	resetAppEventBus,
} from "../../src/events";

afterEach(() => {
	resetAppEventBus();
});

describe("EventEmitter", () => {
	it("delivers typed payloads until unsubscribed", async () => {
		const events = createEventEmitter<AppEventMap>();
		const listener = vi.fn();
		const subscription = events.on("session:changed", listener);

		await events.emit("session:changed", { authenticated: true });
		subscription.unsubscribe();
		await events.emit("session:changed", { authenticated: false });

		expect(listener).toHaveBeenCalledTimes(1);
		expect(listener).toHaveBeenCalledWith({ authenticated: true });
	});

	it("runs once listeners a single time", async () => {
		const events = createEventEmitter<AppEventMap>();
		const listener = vi.fn();
		events.once("session:refreshed", listener);

		expect(events.listenerCount("session:refreshed")).toBe(1);
		await events.emit("session:refreshed", { expiresIn: 3600 });
		await events.emit("session:refreshed", { expiresIn: 3600 });

		expect(listener).toHaveBeenCalledTimes(1);
		expect(events.listenerCount("session:refreshed")).toBe(0);
	});

	it("isolates a failing listener from the others", async () => {
		const events = createEventEmitter<AppEventMap>();
		const after = vi.fn();
		events.on("auth:urlReady", () => {
			throw new Error("listener broke");
		});
		events.on("auth:urlReady", after);

		await events.emit("auth:urlReady", { url: "https://example.test/authorize" });

		expect(after).toHaveBeenCalledWith({ url: "https://example.test/authorize" });
	});

	it("shares one app bus until reset", () => {
		const bus = getAppEventBus();
		bus.on("session:changed", vi.fn());

		expect(getAppEventBus()).toBe(bus);
		resetAppEventBus();
		expect(getAppEventBus()).not.toBe(bus);
		expect(bus.listenerCount("session:changed")).toBe(0);
	});
});
