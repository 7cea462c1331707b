import jwt from "jsonwebtoken";
import { z } from "zod";
import { OAuthIdentityClient, type OAuthIdentityDeps, type OAuthProviderProfile } from "./oauthClient.js";

const idTokenClaimsSchema = z.object({
  sub: z.string().min(1),
  email: z.string().optional(),
  name: z.string().optional()
});

export const googleProfile: OAuthProviderProfile = {
  provider: "drive",
  authorizationEndpoint: "https://accounts.google.com/o/oauth2/v2/auth",
  tokenEndpoint: "https://oauth2.googleapis.com/token",
  signInScopes: ["openid", "email", "profile"],
  authorizationParams: () => ({
    access_type: "online",
    include_granted_scopes: "true"
  }),
  // The ID token arrives directly from the token endpoint over TLS, so it is decoded, not verified.
  readUser: (token) => {
    if (!token.id_token) return undefined;
    const claims = idTokenClaimsSchema.safeParse(jwt.decode(token.id_token));
    if (!claims.success) return undefined;
    return {
      id: claims.data.sub,
      email: claims.data.email,
      name: claims.data.name ?? claims.data.email
    };
  }
};

export function createGoogleIdentityClient(deps: OAuthIdentityDeps = {}): OAuthIdentityClient {
  return new OAuthIdentityClient(googleProfile, deps);
}
