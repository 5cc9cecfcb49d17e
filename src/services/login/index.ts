/**
 * Login service: factory and re-exports.
 */

import { env } from "../../config/env";
import { MockLoginProvider } from "./mockProvider";
import type { LoginProvider } from "./types";

export type { LoginProvider, LoginCredentials, LoginResult } from "./types";

/**
 * Create a login provider by name.
 *
 * @throws Error if the provider name is not recognized
 */
export function createLoginProvider(providerName: string): LoginProvider {
  switch (providerName.toLowerCase()) {
    case "mock":
      return new MockLoginProvider();

    default:
      throw new Error(
        `Unknown login provider: "${providerName}". Supported providers: mock`
      );
  }
}

export function getLoginProvider(): LoginProvider {
  return createLoginProvider(env.LOGIN_PROVIDER);
}
