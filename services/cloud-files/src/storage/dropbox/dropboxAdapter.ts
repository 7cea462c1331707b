import { ok } from "neverthrow";
import type { IdentityClient } from "../../identity/types.js";
import { Logger, type LoggerService } from "../../logger.js";
import { parseDate, parseSize } from "../metadata.js";
import { SessionGate } from "../session.js";
import type {
  CloudFilesAdapter,
  DropboxCredentials,
  FetchResult,
  Outcome,
  ProviderName,
  UploadMetadata
} from "../types.js";
import { isPathNotFound, type DropboxEntry, type DropboxFilesApi } from "./dropboxClient.js";

export const REQUIRED_DROPBOX_SCOPES = [
  "files.metadata.read",
  "files.content.read",
  "files.content.write"
] as const;

const NOT_FOUND: FetchResult = { kind: "notFound" };

type DropboxAdapterDeps<TPresenter> = {
  identity: IdentityClient<TPresenter>;
  client: DropboxFilesApi;
  logger?: LoggerService;
};

// Scoped apps see their app folder as the root, so names become "/<name>".
function appFolderPath(fileName: string): string {
  return `/${fileName.replace(/^\/+/, "")}`;
}

export class DropboxAdapter<TPresenter> implements CloudFilesAdapter<DropboxCredentials, TPresenter> {
  readonly provider: ProviderName = "dropbox";
  private readonly client: DropboxFilesApi;
  private readonly logger: LoggerService;
  private readonly gate: SessionGate<TPresenter>;

  constructor(deps: DropboxAdapterDeps<TPresenter>) {
    this.client = deps.client;
    this.logger = deps.logger ?? Logger;
    this.gate = new SessionGate(this.provider, deps.identity, REQUIRED_DROPBOX_SCOPES, this.logger);
  }

  signIn(credentials: DropboxCredentials, presenter: TPresenter): Outcome<void> {
    return this.gate.signIn({ clientId: credentials.clientId }, presenter);
  }

  authorize(presenter: TPresenter): Outcome<void> {
    return this.gate.authorize(presenter);
  }

  isLinked(): boolean {
    return this.gate.isLinked();
  }

  unlink(): void {
    this.gate.unlink();
  }

  async fetch(fileName: string): Outcome<FetchResult> {
    if (!this.isLinked()) return this.gate.fail("missingScopes");
    this.logger.debug(this.provider, "fetching metadata", { fileName });

    let entry: DropboxEntry | undefined;
    try {
      entry = await this.client.getMetadata(appFolderPath(fileName));
    } catch (error) {
      if (isPathNotFound(error)) return ok(NOT_FOUND);
      return this.gate.fail("fetch", error);
    }

    const size = parseSize(entry?.size);
    const lastModified = parseDate(entry?.server_modified);
    if (!entry || entry[".tag"] !== "file" || !entry.id || size === undefined || !lastModified) {
      return this.gate.fail("unknown");
    }
    const found: FetchResult = { kind: "found", metadata: { id: entry.id, size, lastModified } };
    return ok(found);
  }

  async download(fileId: string): Outcome<Buffer> {
    if (!this.isLinked()) return this.gate.fail("missingScopes");
    this.logger.debug(this.provider, "downloading", { fileId });

    let data: Buffer | undefined;
    try {
      data = await this.client.download(fileId);
    } catch (error) {
      return this.gate.fail("download", error);
    }

    if (!data) return this.gate.fail("unknown");
    return ok(data);
  }

  async upload(fileName: string, data: Uint8Array): Outcome<UploadMetadata> {
    if (!this.isLinked()) return this.gate.fail("missingScopes");
    this.logger.debug(this.provider, "uploading", { fileName, bytes: data.byteLength });

    let entry: DropboxEntry | undefined;
    try {
      entry = await this.client.upload(appFolderPath(fileName), data);
    } catch (error) {
      return this.gate.fail("upload", error);
    }

    const size = parseSize(entry?.size);
    const lastModified = parseDate(entry?.server_modified);
    if (size === undefined || !lastModified) return this.gate.fail("unknown");
    return ok({ size, lastModified });
  }
}
