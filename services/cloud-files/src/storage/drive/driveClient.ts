import { z } from "zod";
import { readJson, send, type FetchLike } from "../../http.js";
import { TransportError } from "../errors.js";
import type { ProviderName } from "../types.js";

const provider: ProviderName = "drive";
const DRIVE_FILES_API = "https://www.googleapis.com/drive/v3/files";
const DRIVE_UPLOAD_API = "https://www.googleapis.com/upload/drive/v3/files";

export const APP_DATA_SPACE = "appDataFolder";

const driveFileSchema = z.object({
  id: z.string().optional(),
  name: z.string().optional(),
  size: z.string().optional(),
  modifiedTime: z.string().optional()
});

const driveFileListSchema = z.object({
  files: z.array(driveFileSchema).optional()
});

export type DriveFile = z.infer<typeof driveFileSchema>;
export type DriveFileList = z.infer<typeof driveFileListSchema>;

export type ListFilesQuery = {
  q: string;
  spaces: string;
  fields: string;
  orderBy?: string;
};

export type CreateFileInput = {
  metadata: { name: string; parents: string[]; mimeType: string };
  media: Uint8Array;
  fields: string;
};

/**
 * The slice of the Drive v3 REST surface the adapter calls. Results are undefined
 * when a success response did not have the expected shape.
 */
export type DriveFilesApi = {
  setApiKey(apiKey: string): void;
  listFiles(query: ListFilesQuery): Promise<DriveFileList | undefined>;
  getMedia(fileId: string): Promise<Buffer | undefined>;
  createFile(input: CreateFileInput): Promise<DriveFile | undefined>;
};

type DriveRestClientOptions = {
  accessTokenProvider: () => string | undefined;
  fetchImpl?: FetchLike;
};

export function escapeQueryValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

function toBase64(content: Uint8Array): string {
  return Buffer.from(content.buffer, content.byteOffset, content.byteLength).toString("base64");
}

export class DriveRestClient implements DriveFilesApi {
  private readonly accessTokenProvider: () => string | undefined;
  private readonly fetchImpl: FetchLike;
  private apiKey: string | undefined;

  constructor(options: DriveRestClientOptions) {
    this.accessTokenProvider = options.accessTokenProvider;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  setApiKey(apiKey: string): void {
    this.apiKey = apiKey;
  }

  private authHeaders(): Record<string, string> {
    const token = this.accessTokenProvider();
    if (!token || token.trim().length === 0) {
      throw new TransportError({
        provider,
        code: "UNAUTHORIZED",
        message: "Missing Google Drive access token"
      });
    }
    return { Authorization: `Bearer ${token}` };
  }

  private url(base: string, params: Record<string, string>): string {
    const query = new URLSearchParams(params);
    if (this.apiKey) query.set("key", this.apiKey);
    return `${base}?${query.toString()}`;
  }

  async listFiles(query: ListFilesQuery): Promise<DriveFileList | undefined> {
    const params: Record<string, string> = { q: query.q, spaces: query.spaces, fields: query.fields };
    if (query.orderBy) params.orderBy = query.orderBy;

    const response = await send(provider, this.fetchImpl, this.url(DRIVE_FILES_API, params), {
      headers: this.authHeaders()
    });
    const parsed = driveFileListSchema.safeParse(await readJson(response));
    return parsed.success ? parsed.data : undefined;
  }

  async getMedia(fileId: string): Promise<Buffer | undefined> {
    const response = await send(
      provider,
      this.fetchImpl,
      this.url(`${DRIVE_FILES_API}/${encodeURIComponent(fileId)}`, { alt: "media" }),
      { headers: this.authHeaders() }
    );
    if (response.status === 204) return undefined;
    return Buffer.from(await response.arrayBuffer());
  }

  async createFile(input: CreateFileInput): Promise<DriveFile | undefined> {
    const multipartBoundary = "cloud_files_boundary";
    const body =
      `--${multipartBoundary}\r\n` +
      "Content-Type: application/json; charset=UTF-8\r\n\r\n" +
      `${JSON.stringify(input.metadata)}\r\n` +
      `--${multipartBoundary}\r\n` +
      `Content-Type: ${input.metadata.mimeType}\r\n` +
      "Content-Transfer-Encoding: base64\r\n\r\n" +
      `${toBase64(input.media)}\r\n` +
      `--${multipartBoundary}--`;

    const response = await send(
      provider,
      this.fetchImpl,
      this.url(DRIVE_UPLOAD_API, { uploadType: "multipart", fields: input.fields }),
      {
        method: "POST",
        headers: {
          ...this.authHeaders(),
          "Content-Type": `multipart/related; boundary=${multipartBoundary}`
        },
        body
      }
    );
    const parsed = driveFileSchema.safeParse(await readJson(response));
    return parsed.success ? parsed.data : undefined;
  }
}
