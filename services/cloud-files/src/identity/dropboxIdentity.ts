import { OAuthIdentityClient, type OAuthIdentityDeps, type OAuthProviderProfile } from "./oauthClient.js";

export const dropboxProfile: OAuthProviderProfile = {
  provider: "dropbox",
  authorizationEndpoint: "https://www.dropbox.com/oauth2/authorize",
  tokenEndpoint: "https://api.dropboxapi.com/oauth2/token",
  signInScopes: ["account_info.read"],
  authorizationParams: (incremental): Record<string, string> => ({
    token_access_type: "online",
    ...(incremental ? { include_granted_scopes: "user" } : {})
  }),
  readUser: (token) => (token.account_id ? { id: token.account_id } : undefined)
};

export function createDropboxIdentityClient(deps: OAuthIdentityDeps = {}): OAuthIdentityClient {
  return new OAuthIdentityClient(dropboxProfile, deps);
}
