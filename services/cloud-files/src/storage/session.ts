import { err, ok, type Err } from "neverthrow";
import type { IdentityClient, OAuthClientConfig, SignedInUser } from "../identity/types.js";
import type { LoggerService } from "../logger.js";
import { CloudFilesError, type CloudFilesErrorKind } from "./errors.js";
import type { Outcome, ProviderName } from "./types.js";

/**
 * Session plumbing shared by the OAuth-backed adapters. Each adapter owns one
 * `SessionGate` bound to its identity client and required scopes.
 */
export class SessionGate<TPresenter> {
  constructor(
    private readonly provider: ProviderName,
    private readonly identity: IdentityClient<TPresenter>,
    private readonly requiredScopes: readonly string[],
    private readonly logger: LoggerService
  ) {}

  fail(kind: CloudFilesErrorKind, cause?: unknown): Promise<Err<never, CloudFilesError>> {
    this.logger.warn(this.provider, `operation failed: ${kind}`, cause);
    return Promise.resolve(err(new CloudFilesError(kind, this.provider, cause)));
  }

  isLinked(): boolean {
    return hasScopes(this.identity.currentUser(), this.requiredScopes);
  }

  async signIn(client: OAuthClientConfig, presenter: TPresenter): Outcome<void> {
    let user: SignedInUser | undefined;
    try {
      user = await this.identity.signIn(client, presenter);
    } catch (error) {
      return this.fail("signIn", error);
    }
    if (!user) return this.fail("unknown");
    return ok(undefined);
  }

  async authorize(presenter: TPresenter): Outcome<void> {
    const user = this.identity.currentUser();
    if (!user) return this.fail("missingScopes");
    if (hasScopes(user, this.requiredScopes)) {
      this.logger.debug(this.provider, "scopes already granted");
      return ok(undefined);
    }

    try {
      await this.identity.addScopes(this.requiredScopes, presenter);
    } catch (error) {
      return this.fail("authorize", error);
    }

    // A completed consent can still come back with a narrower grant.
    if (!this.isLinked()) return this.fail("missingScopes");
    return ok(undefined);
  }

  unlink(): void {
    this.identity.signOut();
  }
}

export function hasScopes(user: SignedInUser | undefined, required: readonly string[]): boolean {
  if (!user) return false;
  return required.every((scope) => user.grantedScopes.includes(scope));
}
