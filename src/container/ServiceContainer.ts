/**
 * Simple Dependency Injection Container
 * Manages service lifecycles and dependencies
 */

export type ServiceFactory<T> = (container: ServiceContainer) => T;

interface ServiceRegistration<T> {
	factory: ServiceFactory<T>;
	singleton: boolean;
	instance?: T;
}

interface Disposable {
	dispose(): void;
}

function isDisposable(value: unknown): value is Disposable {
	return (
		typeof value === "object" &&
		value !== null &&
		"dispose" in value &&
		typeof value.dispose === "function"
	);
}

/**
 * ServiceContainer for dependency injection
 * Supports both singleton and transient service lifetimes
 */
export class ServiceContainer {
	private services = new Map<symbol, ServiceRegistration<unknown>>();

	/**
	 * Register a transient service (new instance on each resolve)
	 */
	register<T>(token: symbol, factory: ServiceFactory<T>): void {
		this.services.set(token, { factory, singleton: false });
	}

	/**
	 * Register a singleton service (same instance on each resolve)
	 */
	singleton<T>(token: symbol, factory: ServiceFactory<T>): void {
		this.services.set(token, { factory, singleton: true });
	}

	/**
	 * Resolve a service by token
	 * @throws Error if service is not registered
	 */
	resolve<T>(token: symbol): T {
		const registration = this.services.get(token);

		if (!registration) {
			throw new Error(`Service not registered for token: ${token.toString()}`);
		}

		if (registration.singleton && registration.instance !== undefined) {
			return registration.instance as T;
		}

		const instance = registration.factory(this);

		if (registration.singleton) {
			registration.instance = instance;
		}

		return instance as T;
	}

	has(token: symbol): boolean {
		return this.services.has(token);
	}

	/**
	 * Dispose all singleton instances that have a dispose method
	 */
	dispose(): void {
		for (const registration of this.services.values()) {
			if (registration.singleton && isDisposable(registration.instance)) {
				registration.instance.dispose();
			}
		}
		this.services.clear();
	}
}

export function createServiceContainer(): ServiceContainer {
	return new ServiceContainer();
}
