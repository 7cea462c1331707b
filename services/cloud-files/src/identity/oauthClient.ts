import crypto from "crypto";
import { z } from "zod";
import { readJson, send, type FetchLike } from "../http.js";
import type { ProviderName } from "../storage/types.js";
import { Logger, type LoggerService } from "../logger.js";
import type {
  ConsentPresenter,
  IdentityClient,
  OAuthClientConfig,
  SignedInUser
} from "./types.js";

export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.coerce.number().positive().optional(),
  scope: z.string().optional(),
  id_token: z.string().optional(),
  account_id: z.string().optional()
});

export type TokenResponse = z.infer<typeof tokenResponseSchema>;

export type UserProfile = Pick<SignedInUser, "id" | "email" | "name">;

/**
 * Endpoints and quirks of one OAuth 2.0 provider.
 */
export type OAuthProviderProfile = {
  provider: ProviderName;
  authorizationEndpoint: string;
  tokenEndpoint: string;
  signInScopes: readonly string[];
  /** Extra query parameters for the consent URL; `incremental` is set when adding scopes. */
  authorizationParams: (incremental: boolean) => Record<string, string>;
  readUser: (token: TokenResponse) => UserProfile | undefined;
};

export type OAuthIdentityDeps = {
  fetchImpl?: FetchLike;
  now?: () => Date;
  randomToken?: () => string;
  logger?: LoggerService;
};

const DEFAULT_TOKEN_TTL_SECONDS = 3600;

function base64Url(input: Buffer): string {
  return input.toString("base64url");
}

function parseScopes(scope: string | undefined): string[] {
  if (!scope) return [];
  return scope.split(/\s+/).filter(Boolean);
}

/**
 * Authorization-code flow with PKCE against a provider profile. The session lives
 * in this instance only; nothing is persisted.
 */
export class OAuthIdentityClient implements IdentityClient<ConsentPresenter> {
  private readonly fetchImpl: FetchLike;
  private readonly now: () => Date;
  private readonly randomToken: () => string;
  private readonly logger: LoggerService;
  private client: OAuthClientConfig | null = null;
  private session: SignedInUser | null = null;

  constructor(
    private readonly profile: OAuthProviderProfile,
    deps: OAuthIdentityDeps = {}
  ) {
    this.fetchImpl = deps.fetchImpl ?? fetch;
    this.now = deps.now ?? (() => new Date());
    this.randomToken = deps.randomToken ?? (() => base64Url(crypto.randomBytes(32)));
    this.logger = deps.logger ?? Logger;
  }

  private get context(): string {
    return `${this.profile.provider}:identity`;
  }

  async signIn(client: OAuthClientConfig, presenter: ConsentPresenter): Promise<SignedInUser | undefined> {
    this.client = client;
    this.session = null;
    return this.runConsent(client, this.profile.signInScopes, false, presenter);
  }

  currentUser(): SignedInUser | undefined {
    if (!this.session) return undefined;
    if (this.session.expiresAt.getTime() <= this.now().getTime()) {
      this.logger.debug(this.context, "session expired");
      return undefined;
    }
    return this.session;
  }

  async addScopes(scopes: readonly string[], presenter: ConsentPresenter): Promise<SignedInUser | undefined> {
    const user = this.currentUser();
    if (!user || !this.client) return undefined;

    const requested = Array.from(new Set([...user.grantedScopes, ...scopes]));
    return this.runConsent(this.client, requested, true, presenter);
  }

  signOut(): void {
    this.session = null;
    this.client = null;
    this.logger.info(this.context, "signed out");
  }

  private async runConsent(
    client: OAuthClientConfig,
    scopes: readonly string[],
    incremental: boolean,
    presenter: ConsentPresenter
  ): Promise<SignedInUser | undefined> {
    const state = this.randomToken();
    const verifier = this.randomToken();
    const challenge = base64Url(crypto.createHash("sha256").update(verifier).digest());

    const consent = await presenter.present((redirectUri) => {
      const params = new URLSearchParams({
        client_id: client.clientId,
        redirect_uri: redirectUri,
        response_type: "code",
        scope: scopes.join(" "),
        state,
        code_challenge: challenge,
        code_challenge_method: "S256",
        ...this.profile.authorizationParams(incremental)
      });
      return `${this.profile.authorizationEndpoint}?${params.toString()}`;
    });

    if (consent.state !== state) {
      throw new Error("oauth_state_mismatch");
    }

    const token = await this.exchangeCode(client, consent.code, consent.redirectUri, verifier);
    const profile = this.profile.readUser(token);
    if (!profile) {
      this.logger.warn(this.context, "token response carried no user");
      return undefined;
    }

    const ttl = token.expires_in ?? DEFAULT_TOKEN_TTL_SECONDS;
    const session: SignedInUser = {
      ...profile,
      grantedScopes: parseScopes(token.scope),
      accessToken: token.access_token,
      expiresAt: new Date(this.now().getTime() + ttl * 1000)
    };
    this.session = session;
    this.logger.info(this.context, "session established", {
      user: profile.id,
      scopes: session.grantedScopes
    });
    return session;
  }

  private async exchangeCode(
    client: OAuthClientConfig,
    code: string,
    redirectUri: string,
    verifier: string
  ): Promise<TokenResponse> {
    const body = new URLSearchParams({
      code,
      client_id: client.clientId,
      redirect_uri: redirectUri,
      grant_type: "authorization_code",
      code_verifier: verifier
    });
    if (client.clientSecret) body.set("client_secret", client.clientSecret);

    const response = await send(this.profile.provider, this.fetchImpl, this.profile.tokenEndpoint, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body
    });

    const parsed = tokenResponseSchema.safeParse(await readJson(response));
    if (!parsed.success) {
      throw new Error(`${this.profile.provider}_invalid_token_response`);
    }
    return parsed.data;
  }
}
