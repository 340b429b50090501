/**
 * Source of the bearer token attached to auth-required channels.
 *
 * Returning `null` or `undefined` means no token is available; the
 * connection then opens without an Authorization header and lets the
 * server decide.
 */
export interface CredentialProvider {
  getAccessToken(): string | null | undefined | Promise<string | null | undefined>;
}

/** Provider that never has a token */
export const anonymousCredentials: CredentialProvider = {
  getAccessToken: () => null,
};

/** Provider returning a fixed token */
export function staticCredentials(token: string | null): CredentialProvider {
  return { getAccessToken: () => token };
}
