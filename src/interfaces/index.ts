export type { IAuthenticationController } from "./IAuthenticationController";
