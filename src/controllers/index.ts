export {
	AuthenticationController,
	type AuthenticationControllerDeps,
} from "./AuthenticationController";
