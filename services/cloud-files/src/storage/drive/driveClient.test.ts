import { describe, expect, it, vi } from "vitest";
import { bytesResponse, htmlResponse, jsonResponse, requestAt, stubFetch } from "../../testing/http.js";
import { DriveRestClient, escapeQueryValue } from "./driveClient.js";

const listQuery = {
  q: "name = 'notes.txt'",
  spaces: "appDataFolder",
  fields: "files(id, size, modifiedTime)",
  orderBy: "modifiedTime desc"
};

function createClient(fetchImpl: ReturnType<typeof stubFetch>, accessTokenProvider: () => string | undefined = () => "test-token") {
  return new DriveRestClient({ accessTokenProvider, fetchImpl });
}

describe("escapeQueryValue", () => {
  it("escapes quotes and backslashes", () => {
    expect(escapeQueryValue("it's a\\b")).toBe("it\\'s a\\\\b");
  });
});

describe("DriveRestClient", () => {
  it("lists files in the requested space with a bearer token and the API key", async () => {
    const fetchImpl = stubFetch(
      jsonResponse({ files: [{ id: "f1", size: "2", modifiedTime: "2026-03-01T10:00:01.000Z" }] })
    );
    const client = createClient(fetchImpl);
    client.setApiKey("test-api-key");

    const list = await client.listFiles(listQuery);

    expect(list).toEqual({ files: [{ id: "f1", size: "2", modifiedTime: "2026-03-01T10:00:01.000Z" }] });
    const { url, headers } = requestAt(fetchImpl, 0);
    expect(url.origin + url.pathname).toBe("https://www.googleapis.com/drive/v3/files");
    expect(url.searchParams.get("q")).toBe("name = 'notes.txt'");
    expect(url.searchParams.get("spaces")).toBe("appDataFolder");
    expect(url.searchParams.get("fields")).toBe("files(id, size, modifiedTime)");
    expect(url.searchParams.get("orderBy")).toBe("modifiedTime desc");
    expect(url.searchParams.get("key")).toBe("test-api-key");
    expect(headers.get("authorization")).toBe("Bearer test-token");
  });

  it("omits the key parameter until an API key is set", async () => {
    const fetchImpl = stubFetch(jsonResponse({ files: [] }));
    await createClient(fetchImpl).listFiles(listQuery);
    expect(requestAt(fetchImpl, 0).url.searchParams.has("key")).toBe(false);
  });

  it("returns undefined for a list response of the wrong shape", async () => {
    const fetchImpl = stubFetch(jsonResponse({ files: "nope" }));
    await expect(createClient(fetchImpl).listFiles(listQuery)).resolves.toBeUndefined();
  });

  it("maps HTTP failures to transport errors", async () => {
    const fetchImpl = stubFetch(jsonResponse({ error: { code: 404, message: "File not found" } }, 404));
    await expect(createClient(fetchImpl).listFiles(listQuery)).rejects.toMatchObject({
      name: "TransportError",
      code: "NOT_FOUND",
      status: 404,
      causeDetails: { error: { code: 404, message: "File not found" } }
    });
  });

  it("wraps network exceptions", async () => {
    const fetchImpl = vi.fn(async (): Promise<Response> => {
      throw new Error("ECONNRESET");
    });
    const client = new DriveRestClient({ accessTokenProvider: () => "test-token", fetchImpl });
    await expect(client.listFiles(listQuery)).rejects.toMatchObject({
      code: "PROVIDER_ERROR",
      message: "drive request failed: ECONNRESET"
    });
  });

  it("refuses to send a request without an access token", async () => {
    const fetchImpl = stubFetch();
    await expect(createClient(fetchImpl, () => undefined).listFiles(listQuery)).rejects.toMatchObject({
      code: "UNAUTHORIZED",
      message: "Missing Google Drive access token"
    });
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("returns undefined for a successful response that is not JSON", async () => {
    const fetchImpl = stubFetch(htmlResponse("<html>ok</html>"), htmlResponse(""));
    const client = createClient(fetchImpl);

    await expect(client.listFiles(listQuery)).resolves.toBeUndefined();
    await expect(
      client.createFile({
        metadata: { name: "notes.txt", parents: ["appDataFolder"], mimeType: "application/octet-stream" },
        media: new Uint8Array([1]),
        fields: "size, modifiedTime"
      })
    ).resolves.toBeUndefined();
  });

  it("downloads media by file id", async () => {
    const fetchImpl = stubFetch(bytesResponse([0x41, 0x42]));
    const data = await createClient(fetchImpl).getMedia("abc");

    expect(data).toEqual(Buffer.from([0x41, 0x42]));
    expect(requestAt(fetchImpl, 0).url.toString()).toBe("https://www.googleapis.com/drive/v3/files/abc?alt=media");
  });

  it("treats a download without content as missing", async () => {
    const fetchImpl = stubFetch(new Response(null, { status: 204 }));
    await expect(createClient(fetchImpl).getMedia("abc")).resolves.toBeUndefined();
  });

  it("uploads in one multipart request", async () => {
    const fetchImpl = stubFetch(jsonResponse({ size: "2", modifiedTime: "2026-03-01T10:00:01.000Z" }));
    const file = await createClient(fetchImpl).createFile({
      metadata: { name: "notes.txt", parents: ["appDataFolder"], mimeType: "application/octet-stream" },
      media: new Uint8Array([0x41, 0x42]),
      fields: "size, modifiedTime"
    });

    expect(file).toEqual({ size: "2", modifiedTime: "2026-03-01T10:00:01.000Z" });
    const { url, init, headers } = requestAt(fetchImpl, 0);
    expect(init.method).toBe("POST");
    expect(url.origin + url.pathname).toBe("https://www.googleapis.com/upload/drive/v3/files");
    expect(url.searchParams.get("uploadType")).toBe("multipart");
    expect(url.searchParams.get("fields")).toBe("size, modifiedTime");
    expect(headers.get("content-type")).toBe("multipart/related; boundary=cloud_files_boundary");
    expect(init.body).toBe(
      "--cloud_files_boundary\r\n" +
        "Content-Type: application/json; charset=UTF-8\r\n\r\n" +
        '{"name":"notes.txt","parents":["appDataFolder"],"mimeType":"application/octet-stream"}\r\n' +
        "--cloud_files_boundary\r\n" +
        "Content-Type: application/octet-stream\r\n" +
        "Content-Transfer-Encoding: base64\r\n\r\n" +
        "QUI=\r\n" +
        "--cloud_files_boundary--"
    );
  });
});
