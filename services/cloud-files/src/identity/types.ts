export type SignedInUser = {
  id: string;
  email?: string;
  name?: string;
  grantedScopes: readonly string[];
  accessToken: string;
  expiresAt: Date;
};

export type OAuthClientConfig = {
  clientId: string;
  clientSecret?: string;
};

export type ConsentResponse = {
  code: string;
  state: string;
  redirectUri: string;
};

/**
 * The surface that shows the provider's consent screen to the user.
 * Identity clients hand it a URL builder because only the presenter knows its redirect URI.
 */
export type ConsentPresenter = {
  present(buildAuthorizationUrl: (redirectUri: string) => string): Promise<ConsentResponse>;
};

/**
 * Holds the process-local session for one provider. `currentUser()` returns
 * undefined once the access token has expired.
 */
export type IdentityClient<TPresenter> = {
  signIn(client: OAuthClientConfig, presenter: TPresenter): Promise<SignedInUser | undefined>;
  currentUser(): SignedInUser | undefined;
  addScopes(scopes: readonly string[], presenter: TPresenter): Promise<SignedInUser | undefined>;
  signOut(): void;
};
