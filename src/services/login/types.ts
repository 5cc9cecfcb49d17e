/**
 * Login collaborator.
 *
 * Establishes who is using a session. The core only cares about the outcome
 * (authenticated + identity); how a provider verifies the user is its own
 * business. Providers throw a ServiceError with code LOGIN_FAILED on refusal.
 */

export interface LoginCredentials {
  username?: string;
}

export interface LoginResult {
  authenticated: true;
  identity: string;
  /** Name of the provider that authenticated the user */
  provider: string;
}

export interface LoginProvider {
  readonly name: string;
  login(credentials: LoginCredentials): Promise<LoginResult>;
}
