import { ok } from "neverthrow";
import type { IdentityClient } from "../../identity/types.js";
import { Logger, type LoggerService } from "../../logger.js";
import { TransportError } from "../errors.js";
import { parseDate, parseSize } from "../metadata.js";
import { SessionGate } from "../session.js";
import type {
  CloudFilesAdapter,
  DriveCredentials,
  FetchResult,
  Metadata,
  Outcome,
  ProviderName,
  UploadMetadata
} from "../types.js";
import {
  APP_DATA_SPACE,
  escapeQueryValue,
  type DriveFile,
  type DriveFileList,
  type DriveFilesApi
} from "./driveClient.js";

export const DRIVE_FILE_SCOPE = "https://www.googleapis.com/auth/drive.file";
export const DRIVE_APPDATA_SCOPE = "https://www.googleapis.com/auth/drive.appdata";
export const REQUIRED_DRIVE_SCOPES = [DRIVE_APPDATA_SCOPE, DRIVE_FILE_SCOPE] as const;

const BINARY_MIME_TYPE = "application/octet-stream";
const NOT_FOUND: FetchResult = { kind: "notFound" };

type DriveAdapterDeps<TPresenter> = {
  identity: IdentityClient<TPresenter>;
  client: DriveFilesApi;
  logger?: LoggerService;
};

function toMetadata(file: DriveFile): Metadata | undefined {
  const size = parseSize(file.size);
  const lastModified = parseDate(file.modifiedTime);
  if (!file.id || size === undefined || !lastModified) return undefined;
  return { id: file.id, size, lastModified };
}

/**
 * Google Drive adapter. Files live in the application-data folder, which the
 * user's own Drive listing never shows. Lookups go by name, transfers by file id,
 * since Drive does not keep names unique.
 */
export class DriveAdapter<TPresenter> implements CloudFilesAdapter<DriveCredentials, TPresenter> {
  readonly provider: ProviderName = "drive";
  private readonly client: DriveFilesApi;
  private readonly logger: LoggerService;
  private readonly gate: SessionGate<TPresenter>;

  constructor(deps: DriveAdapterDeps<TPresenter>) {
    this.client = deps.client;
    this.logger = deps.logger ?? Logger;
    this.gate = new SessionGate(this.provider, deps.identity, REQUIRED_DRIVE_SCOPES, this.logger);
  }

  signIn(credentials: DriveCredentials, presenter: TPresenter): Outcome<void> {
    this.client.setApiKey(credentials.apiKey);
    return this.gate.signIn({ clientId: credentials.clientId, clientSecret: credentials.clientSecret }, presenter);
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

    let list: DriveFileList | undefined;
    try {
      list = await this.client.listFiles({
        q: `name = '${escapeQueryValue(fileName)}'`,
        spaces: APP_DATA_SPACE,
        fields: "files(id, size, modifiedTime)",
        orderBy: "modifiedTime desc"
      });
    } catch (error) {
      if (error instanceof TransportError && error.code === "NOT_FOUND") {
        return ok(NOT_FOUND);
      }
      return this.gate.fail("fetch", error);
    }

    if (!list) return this.gate.fail("unknown");
    const [file] = list.files ?? [];
    if (!file) return ok(NOT_FOUND);

    const metadata = toMetadata(file);
    if (!metadata) return this.gate.fail("unknown");
    const found: FetchResult = { kind: "found", metadata };
    return ok(found);
  }

  async download(fileId: string): Outcome<Buffer> {
    if (!this.isLinked()) return this.gate.fail("missingScopes");
    this.logger.debug(this.provider, "downloading", { fileId });

    let data: Buffer | undefined;
    try {
      data = await this.client.getMedia(fileId);
    } catch (error) {
      return this.gate.fail("download", error);
    }

    if (!data) return this.gate.fail("unknown");
    return ok(data);
  }

  async upload(fileName: string, data: Uint8Array): Outcome<UploadMetadata> {
    if (!this.isLinked()) return this.gate.fail("missingScopes");
    this.logger.debug(this.provider, "uploading", { fileName, bytes: data.byteLength });

    let file: DriveFile | undefined;
    try {
      file = await this.client.createFile({
        metadata: { name: fileName, parents: [APP_DATA_SPACE], mimeType: BINARY_MIME_TYPE },
        media: data,
        fields: "size, modifiedTime"
      });
    } catch (error) {
      return this.gate.fail("upload", error);
    }

    const size = parseSize(file?.size);
    const lastModified = parseDate(file?.modifiedTime);
    if (size === undefined || !lastModified) return this.gate.fail("unknown");
    return ok({ size, lastModified });
  }
}
