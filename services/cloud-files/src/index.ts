export { CloudFilesManager } from "./storage/manager.js";
export {
  createCloudFilesManager,
  type AnyCloudFilesManager,
  type CreateCloudFilesManagerInput,
  type DriveManagerInput,
  type DropboxManagerInput
} from "./storage/factory.js";
export {
  CloudFilesError,
  TransportError,
  isCloudFilesError,
  mapHttpError,
  needsReauthorization,
  type CloudFilesErrorKind,
  type TransportErrorCode
} from "./storage/errors.js";
export type {
  CloudFilesAdapter,
  DriveCredentials,
  DropboxCredentials,
  FetchResult,
  Metadata,
  Outcome,
  ProviderName,
  UploadMetadata
} from "./storage/types.js";
export { DriveAdapter, REQUIRED_DRIVE_SCOPES } from "./storage/drive/driveAdapter.js";
export { DriveRestClient, type DriveFilesApi } from "./storage/drive/driveClient.js";
export { DropboxAdapter, REQUIRED_DROPBOX_SCOPES } from "./storage/dropbox/dropboxAdapter.js";
export { DropboxHttpClient, type DropboxFilesApi } from "./storage/dropbox/dropboxClient.js";
export { OAuthIdentityClient } from "./identity/oauthClient.js";
export { createGoogleIdentityClient } from "./identity/googleIdentity.js";
export { createDropboxIdentityClient } from "./identity/dropboxIdentity.js";
export { LoopbackConsentPresenter, ConsentDeniedError } from "./identity/loopbackPresenter.js";
export type {
  ConsentPresenter,
  ConsentResponse,
  IdentityClient,
  OAuthClientConfig,
  SignedInUser
} from "./identity/types.js";
export { LoggerService, Logger, type LogLevel } from "./logger.js";
export { parseEnv, toManagerInput, type Env } from "./config.js";
