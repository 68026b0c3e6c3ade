/**
 * Container module
 * Dependency injection container and tokens
 */

export { ServiceContainer, createServiceContainer } from "./ServiceContainer";
export type { ServiceFactory } from "./ServiceContainer";
export { TOKENS } from "./tokens";
export type { ServiceToken } from "./tokens";
export {
	registerServices,
	validateServiceRegistration,
	type RegistrationOverrides,
} from "./registration";
