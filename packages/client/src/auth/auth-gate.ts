import { AuthRequiredError, DEFAULT_AUTH_FEATURE } from '@scholia/core';

/**
 * Holds the bearer credential for the whole client.
 *
 * Facades ask the gate before any network traffic, so a signed-out learner
 * gets an `AuthRequiredError` naming the feature instead of a failed request.
 * The credential is read once per call; concurrent `setCredential` calls are
 * last-write-wins.
 */
export class AuthGate {
  private credential: string | null = null;

  constructor(credential: string | null = null) {
    this.setCredential(credential);
  }

  setCredential(token: string | null): void {
    const trimmed = token?.trim() ?? '';
    this.credential = trimmed.length > 0 ? trimmed : null;
  }

  hasAuth(): boolean {
    return this.credential !== null;
  }

  requireAuth(feature: string = DEFAULT_AUTH_FEATURE): void {
    if (this.credential === null) {
      throw new AuthRequiredError(feature);
    }
  }

  authorizationHeader(): Record<string, string> {
    const token = this.credential;
    return token === null ? {} : { Authorization: `Bearer ${token}` };
  }
}
