/**
 * Mock login provider for development.
 *
 * Accepts any well-formed username and uses it as the identity. There is no
 * password and nothing is verified.
 */

import { ServiceError } from "../../types/errors";
import type { LoginCredentials, LoginProvider, LoginResult } from "./types";

const USERNAME_RE = /^[A-Za-z0-9_.-]{3,30}$/;

export class MockLoginProvider implements LoginProvider {
  readonly name = "mock";

  async login(credentials: LoginCredentials): Promise<LoginResult> {
    const username = credentials.username?.trim() ?? "";

    if (!USERNAME_RE.test(username)) {
      throw new ServiceError(
        "Username must be 3-30 characters: letters, digits, underscores, dots or dashes",
        401,
        "LOGIN_FAILED"
      );
    }

    return { authenticated: true, identity: username, provider: this.name };
  }
}
