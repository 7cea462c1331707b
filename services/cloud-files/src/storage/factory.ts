import type { FetchLike } from "../http.js";
import { createDropboxIdentityClient } from "../identity/dropboxIdentity.js";
import { createGoogleIdentityClient } from "../identity/googleIdentity.js";
import type { ConsentPresenter, IdentityClient } from "../identity/types.js";
import type { LoggerService } from "../logger.js";
import { DriveAdapter } from "./drive/driveAdapter.js";
import { DriveRestClient, type DriveFilesApi } from "./drive/driveClient.js";
import { DropboxAdapter } from "./dropbox/dropboxAdapter.js";
import { DropboxHttpClient, type DropboxFilesApi } from "./dropbox/dropboxClient.js";
import { CloudFilesManager } from "./manager.js";
import type { DriveCredentials, DropboxCredentials } from "./types.js";

type ManagerDeps<TClient> = {
  identity?: IdentityClient<ConsentPresenter>;
  client?: TClient;
  fetchImpl?: FetchLike;
  logger?: LoggerService;
};

export type DriveManagerInput = {
  provider: "drive";
  apiKey: string;
  clientId: string;
  clientSecret?: string;
  fileName: string;
} & ManagerDeps<DriveFilesApi>;

export type DropboxManagerInput = {
  provider: "dropbox";
  clientId: string;
  fileName: string;
} & ManagerDeps<DropboxFilesApi>;

export type CreateCloudFilesManagerInput = DriveManagerInput | DropboxManagerInput;

export type AnyCloudFilesManager =
  | CloudFilesManager<DriveCredentials>
  | CloudFilesManager<DropboxCredentials>;

export function createCloudFilesManager(input: DriveManagerInput): CloudFilesManager<DriveCredentials>;
export function createCloudFilesManager(input: DropboxManagerInput): CloudFilesManager<DropboxCredentials>;
export function createCloudFilesManager(input: CreateCloudFilesManagerInput): AnyCloudFilesManager;
export function createCloudFilesManager(input: CreateCloudFilesManagerInput): AnyCloudFilesManager {
  const { fetchImpl, logger } = input;

  if (input.provider === "drive") {
    const identity = input.identity ?? createGoogleIdentityClient({ fetchImpl, logger });
    const client =
      input.client ??
      new DriveRestClient({ accessTokenProvider: () => identity.currentUser()?.accessToken, fetchImpl });
    const credentials: DriveCredentials = {
      apiKey: input.apiKey,
      clientId: input.clientId,
      clientSecret: input.clientSecret
    };
    return new CloudFilesManager(new DriveAdapter({ identity, client, logger }), credentials, input.fileName);
  }

  const identity = input.identity ?? createDropboxIdentityClient({ fetchImpl, logger });
  const client =
    input.client ??
    new DropboxHttpClient({ accessTokenProvider: () => identity.currentUser()?.accessToken, fetchImpl });
  const credentials: DropboxCredentials = { clientId: input.clientId };
  return new CloudFilesManager(new DropboxAdapter({ identity, client, logger }), credentials, input.fileName);
}
