import type { Result } from "neverthrow";
import type { CloudFilesError } from "./errors.js";

export type ProviderName = "drive" | "dropbox";

export type Metadata = {
  id: string;
  size: number;
  lastModified: Date;
};

export type UploadMetadata = {
  size: number;
  lastModified: Date;
};

export type FetchResult = { kind: "found"; metadata: Metadata } | { kind: "notFound" };

export type DriveCredentials = {
  apiKey: string;
  clientId: string;
  clientSecret?: string;
};

export type DropboxCredentials = {
  clientId: string;
};

export type Outcome<T> = Promise<Result<T, CloudFilesError>>;

/**
 * Operations every provider implements. Operations that touch remote files
 * resolve with `missingScopes` while `isLinked()` is false and never reach the transport.
 */
export type CloudFilesAdapter<TCredentials, TPresenter> = {
  readonly provider: ProviderName;
  signIn(credentials: TCredentials, presenter: TPresenter): Outcome<void>;
  authorize(presenter: TPresenter): Outcome<void>;
  isLinked(): boolean;
  fetch(fileName: string): Outcome<FetchResult>;
  download(fileId: string): Outcome<Buffer>;
  upload(fileName: string, data: Uint8Array): Outcome<UploadMetadata>;
  /** Ends the local session. Grants on the provider side are left in place. */
  unlink(): void;
};
