/**
 * Authentication Controller Interface
 * Account commands exposed to the terminal front end
 */

export interface IAuthenticationController {
	/**
	 * Run the browser login flow
	 */
	login(): Promise<boolean>;

	/**
	 * Forget the stored session
	 */
	logout(): Promise<boolean>;

	/**
	 * Report whether a session is present
	 */
	status(): Promise<boolean>;

	/**
	 * Mint a new access token from the refresh token
	 */
	refresh(): Promise<boolean>;

	/**
	 * Fetch the profile of the signed-in user
	 */
	whoami(): Promise<boolean>;
}
