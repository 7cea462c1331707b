import type { CreateFileInput, DriveFile, DriveFileList, DriveFilesApi, ListFilesQuery } from "../storage/drive/driveClient.js";
import { mapHttpError, type TransportError } from "../storage/errors.js";

type StoredFile = {
  id: string;
  name: string;
  space: string;
  data: Buffer;
  modifiedTime: Date;
};

const NAME_QUERY = /^name = '((?:\\.|[^'\\])*)'$/;

/**
 * Drive stand-in keeping files in memory. Each upload creates a new file one
 * second after the previous one, like Drive's create endpoint.
 */
export class InMemoryDriveApi implements DriveFilesApi {
  readonly files: StoredFile[] = [];
  readonly listQueries: ListFilesQuery[] = [];
  apiKey: string | undefined;
  failNext: TransportError | undefined;
  private clock = new Date("2026-03-01T10:00:00.000Z").getTime();

  setApiKey(apiKey: string): void {
    this.apiKey = apiKey;
  }

  private takeFailure(): void {
    const failure = this.failNext;
    if (failure) {
      this.failNext = undefined;
      throw failure;
    }
  }

  async listFiles(query: ListFilesQuery): Promise<DriveFileList | undefined> {
    this.listQueries.push(query);
    this.takeFailure();
    const match = NAME_QUERY.exec(query.q);
    const name = match?.[1]?.replace(/\\(.)/g, "$1");
    const files = this.files
      .filter((file) => file.name === name && file.space === query.spaces)
      .sort((a, b) => b.modifiedTime.getTime() - a.modifiedTime.getTime())
      .map((file) => ({
        id: file.id,
        size: String(file.data.byteLength),
        modifiedTime: file.modifiedTime.toISOString()
      }));
    return { files };
  }

  async getMedia(fileId: string): Promise<Buffer | undefined> {
    this.takeFailure();
    const file = this.files.find((candidate) => candidate.id === fileId);
    if (!file) throw mapHttpError("drive", 404);
    return Buffer.from(file.data);
  }

  async createFile(input: CreateFileInput): Promise<DriveFile | undefined> {
    this.takeFailure();
    this.clock += 1000;
    const file: StoredFile = {
      id: `drive-file-${this.files.length + 1}`,
      name: input.metadata.name,
      space: input.metadata.parents[0] ?? "drive",
      data: Buffer.from(input.media),
      modifiedTime: new Date(this.clock)
    };
    this.files.push(file);
    return { size: String(file.data.byteLength), modifiedTime: file.modifiedTime.toISOString() };
  }
}
