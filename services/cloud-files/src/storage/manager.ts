import type { ConsentPresenter } from "../identity/types.js";
import type { CloudFilesAdapter, FetchResult, Outcome, ProviderName, UploadMetadata } from "./types.js";

/**
 * Provider-agnostic handle on one remote file. Credentials and the file name are
 * fixed at construction; session state belongs to the adapter's identity client.
 *
 * Operations are not serialized here: callers issue one at a time.
 */
export class CloudFilesManager<TCredentials, TPresenter = ConsentPresenter> {
  constructor(
    private readonly adapter: CloudFilesAdapter<TCredentials, TPresenter>,
    private readonly credentials: TCredentials,
    readonly fileName: string
  ) {}

  get provider(): ProviderName {
    return this.adapter.provider;
  }

  /** Signs in with the stored credentials, then requests the provider's file scopes. */
  async link(presenter: TPresenter): Outcome<void> {
    const signedIn = await this.signIn(presenter);
    if (signedIn.isErr()) return signedIn;
    return this.authorize(presenter);
  }

  signIn(presenter: TPresenter): Outcome<void> {
    return this.adapter.signIn(this.credentials, presenter);
  }

  authorize(presenter: TPresenter): Outcome<void> {
    return this.adapter.authorize(presenter);
  }

  isLinked(): boolean {
    return this.adapter.isLinked();
  }

  fetch(): Outcome<FetchResult> {
    return this.adapter.fetch(this.fileName);
  }

  download(fileId: string): Outcome<Buffer> {
    return this.adapter.download(fileId);
  }

  upload(data: Uint8Array): Outcome<UploadMetadata> {
    return this.adapter.upload(this.fileName, data);
  }

  unlink(): void {
    this.adapter.unlink();
  }
}
