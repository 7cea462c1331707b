import { mapHttpError, networkError } from "./storage/errors.js";
import type { ProviderName } from "./storage/types.js";

export type FetchLike = typeof fetch;

export async function parseResponseBody(response: Response): Promise<unknown> {
  const contentType = response.headers.get("content-type") || "";
  if (contentType.includes("application/json")) {
    return response.json();
  }
  return response.text();
}

/** Reads a JSON body, resolving undefined when the body is not JSON. */
export async function readJson(response: Response): Promise<unknown> {
  return response.json().catch(() => undefined);
}

export async function ensureOk(provider: ProviderName, response: Response): Promise<void> {
  if (!response.ok) {
    const details = await parseResponseBody(response).catch(() => undefined);
    throw mapHttpError(provider, response.status, details);
  }
}

/** Runs one request, turning a thrown network failure into a `TransportError`. */
export async function send(
  provider: ProviderName,
  fetchImpl: FetchLike,
  url: string,
  init: RequestInit
): Promise<Response> {
  let response: Response;
  try {
    response = await fetchImpl(url, init);
  } catch (error) {
    throw networkError(provider, error);
  }
  await ensureOk(provider, response);
  return response;
}
