import { vi } from "vitest";

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" }
  });
}

export function bytesResponse(bytes: number[]): Response {
  return new Response(new Uint8Array(bytes), {
    status: 200,
    headers: { "content-type": "application/octet-stream" }
  });
}

export function htmlResponse(body: string): Response {
  return new Response(body, { status: 200, headers: { "content-type": "text/html" } });
}

/** A `fetch` stub answering each request with the next queued response. */
export function stubFetch(...responses: Response[]) {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
    const next = responses.shift();
    if (!next) throw new Error("unexpected request");
    return next;
  });
}

export type FetchStub = ReturnType<typeof stubFetch>;

export function requestAt(fetchImpl: FetchStub, index: number): { url: URL; init: RequestInit; headers: Headers } {
  const call = fetchImpl.mock.calls[index];
  if (!call) throw new Error(`no request #${index}`);
  const init = call[1] ?? {};
  return { url: new URL(String(call[0])), init, headers: new Headers(init.headers) };
}
