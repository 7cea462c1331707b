import { z } from "zod";
import { readJson, send, type FetchLike } from "../../http.js";
import { TransportError } from "../errors.js";
import type { ProviderName } from "../types.js";

const provider: ProviderName = "dropbox";
const DROPBOX_API = "https://api.dropboxapi.com/2";
const DROPBOX_CONTENT_API = "https://content.dropboxapi.com/2";

const dropboxEntrySchema = z.object({
  ".tag": z.string().optional(),
  id: z.string().optional(),
  name: z.string().optional(),
  size: z.number().optional(),
  server_modified: z.string().optional()
});

const dropboxErrorSchema = z.object({
  error_summary: z.string()
});

export type DropboxEntry = z.infer<typeof dropboxEntrySchema>;

export type DropboxFilesApi = {
  getMetadata(path: string): Promise<DropboxEntry | undefined>;
  download(pathOrId: string): Promise<Buffer | undefined>;
  upload(path: string, data: Uint8Array): Promise<DropboxEntry | undefined>;
};

type DropboxHttpClientOptions = {
  accessTokenProvider: () => string | undefined;
  fetchImpl?: FetchLike;
};

/**
 * Serializes a `Dropbox-API-Arg` header value. HTTP headers carry ASCII only,
 * so every code unit above 0x7e is written as a JSON unicode escape.
 */
export function dropboxApiArg(value: Record<string, unknown>): string {
  return JSON.stringify(value).replace(
    /[\u007f-\uffff]/g,
    (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, "0")}`
  );
}

/** Dropbox answers a lookup of a missing path with 409 and a `path/not_found` summary. */
export function isPathNotFound(error: unknown): boolean {
  if (!(error instanceof TransportError) || error.status !== 409) return false;
  const details = dropboxErrorSchema.safeParse(error.causeDetails);
  return details.success && details.data.error_summary.startsWith("path/not_found");
}

export class DropboxHttpClient implements DropboxFilesApi {
  private readonly accessTokenProvider: () => string | undefined;
  private readonly fetchImpl: FetchLike;

  constructor(options: DropboxHttpClientOptions) {
    this.accessTokenProvider = options.accessTokenProvider;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  private authHeaders(): Record<string, string> {
    const token = this.accessTokenProvider();
    if (!token || token.trim().length === 0) {
      throw new TransportError({
        provider,
        code: "UNAUTHORIZED",
        message: "Missing Dropbox access token"
      });
    }
    return { Authorization: `Bearer ${token}` };
  }

  async getMetadata(path: string): Promise<DropboxEntry | undefined> {
    const response = await send(provider, this.fetchImpl, `${DROPBOX_API}/files/get_metadata`, {
      method: "POST",
      headers: { ...this.authHeaders(), "Content-Type": "application/json" },
      body: JSON.stringify({ path })
    });
    const parsed = dropboxEntrySchema.safeParse(await readJson(response));
    return parsed.success ? parsed.data : undefined;
  }

  async download(pathOrId: string): Promise<Buffer | undefined> {
    const response = await send(provider, this.fetchImpl, `${DROPBOX_CONTENT_API}/files/download`, {
      method: "POST",
      headers: { ...this.authHeaders(), "Dropbox-API-Arg": dropboxApiArg({ path: pathOrId }) }
    });
    if (response.status === 204) return undefined;
    return Buffer.from(await response.arrayBuffer());
  }

  async upload(path: string, data: Uint8Array): Promise<DropboxEntry | undefined> {
    const response = await send(provider, this.fetchImpl, `${DROPBOX_CONTENT_API}/files/upload`, {
      method: "POST",
      headers: {
        ...this.authHeaders(),
        "Content-Type": "application/octet-stream",
        "Dropbox-API-Arg": dropboxApiArg({ path, mode: "overwrite", mute: true })
      },
      body: Buffer.from(data.buffer, data.byteOffset, data.byteLength)
    });
    const parsed = dropboxEntrySchema.safeParse(await readJson(response));
    return parsed.success ? parsed.data : undefined;
  }
}
