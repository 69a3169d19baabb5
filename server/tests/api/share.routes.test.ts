import http from "http";
import { describe, it, expect, afterEach, vi } from "vitest";
import FormData from "form-data";
import { v4 as uuidv4 } from "uuid";
import {
  DAY_MS,
  START_TIME,
  listFiles,
  seedShare,
  startTestServer,
  uploadForm,
  type TestServer,
} from "../helpers/test-utils";

interface RawResponse {
  status: number;
  headers: http.IncomingHttpHeaders;
  body: string;
}

/** Starts a multipart upload and writes `bytes` of file content without finishing it. */
function beginUpload(
  baseUrl: string,
  uploadId: string,
  bytes: number,
): http.ClientRequest {
  const boundary = "disconnect";
  const head = Buffer.from(
    `--${boundary}\r\n` +
      'Content-Disposition: form-data; name="file"; filename="cut.bin"\r\n' +
      "Content-Type: application/octet-stream\r\n\r\n",
  );
  const req = http.request(`${baseUrl}/api/upload?upload_id=${uploadId}`, {
    method: "POST",
    headers: {
      "Content-Type": `multipart/form-data; boundary=${boundary}`,
      "Content-Length": String(head.length + bytes * 2),
    },
  });
  req.on("error", () => undefined);
  req.write(head);
  req.write(Buffer.alloc(bytes, 0x63));
  return req;
}

/** Sends only the request head with the given Content-Length and reads the reply. */
function probeUpload(baseUrl: string, contentLength: number): Promise<RawResponse> {
  return new Promise((resolve, reject) => {
    const req = http.request(`${baseUrl}/api/upload`, {
      method: "POST",
      headers: {
        "Content-Type": "multipart/form-data; boundary=probe",
        "Content-Length": String(contentLength),
      },
    });
    req.on("response", (res) => {
      const chunks: Buffer[] = [];
      res.on("data", (chunk: Buffer) => chunks.push(chunk));
      res.on("end", () => {
        req.destroy();
        resolve({
          status: res.statusCode ?? 0,
          headers: res.headers,
          body: Buffer.concat(chunks).toString("utf8"),
        });
      });
    });
    req.on("error", reject);
    req.flushHeaders();
  });
}

describe("share routes", () => {
  let server: TestServer;

  afterEach(async () => {
    await server.cleanup();
  });

  const post = (form: FormData, params: Record<string, string> = {}) =>
    server.http.post("/api/upload", form, { params, headers: form.getHeaders() });

  it("GET /health answers healthy", async () => {
    server = await startTestServer();

    const res = await server.http.get("/health");

    expect(res.status).toBe(200);
    expect(res.data.status).toBe("healthy");
  });

  it("GET /api/config exposes display settings and the size limit", async () => {
    server = await startTestServer({ maxFileSize: 2048 });

    const res = await server.http.get("/api/config");

    expect(res.data).toEqual({
      title: "File Share",
      subtitle: "Simple, secure file sharing",
      max_file_size: 2048,
    });
  });

  it("uploads a file and serves it until the download cap", async () => {
    server = await startTestServer();
    const uploadId = uuidv4();

    const created = await post(
      uploadForm("hello share", "greeting.txt", {
        expiration_days: "2",
        max_downloads: "2",
      }),
      { upload_id: uploadId },
    );

    expect(created.status).toBe(200);
    const { token } = created.data;
    expect(created.data).toEqual({
      id: 1,
      token,
      url: `${server.baseUrl}/share/${token}`,
      upload_id: uploadId,
      expires_at: new Date(START_TIME + 2 * DAY_MS).toISOString(),
      max_downloads: 2,
    });

    for (let i = 0; i < 2; i++) {
      const res = await server.http.get(`/share/${token}`, { responseType: "text" });
      expect(res.status).toBe(200);
      expect(res.data).toBe("hello share");
      expect(res.headers["content-disposition"]).toBe(
        'attachment; filename="greeting.txt"',
      );
      expect(res.headers["cache-control"]).toBe("no-store");
    }

    const refused = await server.http.get(`/share/${token}`);
    expect(refused.status).toBe(410);
    expect(refused.data).toEqual({ error: "limit_reached", message: "Limit reached" });
    expect(await listFiles(server.uploadDir)).toEqual([]);
  });

  it("defaults to one day and no download cap", async () => {
    server = await startTestServer();

    const created = await post(uploadForm("abc", "a.txt"));

    expect(created.status).toBe(200);
    expect(created.data.expires_at).toBe(new Date(START_TIME + DAY_MS).toISOString());
    expect(created.data.max_downloads).toBeNull();
  });

  it("answers 410 expired once a share has expired", async () => {
    server = await startTestServer();
    const record = await seedShare(server.services, "late");

    server.clock.advance(DAY_MS);

    const res = await server.http.get(`/share/${record.token}`);
    expect(res.status).toBe(410);
    expect(res.data).toEqual({ error: "expired", message: "Expired" });
  });

  describe("HEAD /share/:token", () => {
    it("reports the download headers without counting a download", async () => {
      server = await startTestServer();
      const record = await seedShare(server.services, "only once", {
        filename: "once.txt",
        maxDownloads: 1,
      });

      const head = await server.http.head(`/share/${record.token}`);

      expect(head.status).toBe(200);
      expect(head.headers["content-length"]).toBe("9");
      expect(head.headers["content-disposition"]).toBe(
        'attachment; filename="once.txt"',
      );
      expect((await server.services.registry.get(record.token))?.downloadCount).toBe(
        0,
      );

      const res = await server.http.get(`/share/${record.token}`, {
        responseType: "text",
      });
      expect(res.status).toBe(200);
      expect(res.data).toBe("only once");
    });

    it("answers with the same refusals as a download", async () => {
      server = await startTestServer();
      const record = await seedShare(server.services, "x", { maxDownloads: 1 });
      await server.http.get(`/share/${record.token}`);

      const exhausted = await server.http.head(`/share/${record.token}`);
      const unknown = await server.http.head(`/share/${"A".repeat(22)}`);

      expect(exhausted.status).toBe(410);
      expect(unknown.status).toBe(404);
    });
  });

  it("answers 404 for unknown and malformed tokens", async () => {
    server = await startTestServer();

    const unknown = await server.http.get(`/share/${"A".repeat(22)}`);
    const malformed = await server.http.get("/share/..%2F..%2Fetc");

    expect(unknown.status).toBe(404);
    expect(unknown.data).toEqual({ error: "not_found", message: "Not found" });
    expect(malformed.status).toBe(404);
  });

  describe("with an API key", () => {
    it("requires the bearer key for management routes", async () => {
      server = await startTestServer({ apiKey: "test-secret" });

      const anonymous = await post(uploadForm("abc", "a.txt"));
      const wrong = await server.http.get("/api/files", {
        headers: { Authorization: "Bearer wrong-secret" },
      });
      const allowed = await server.http.get("/api/files", {
        headers: { Authorization: "Bearer test-secret" },
      });

      expect(anonymous.status).toBe(401);
      expect(anonymous.data).toEqual({
        error: "unauthenticated",
        message: "Auth required",
      });
      expect(wrong.status).toBe(401);
      expect(allowed.status).toBe(200);
      expect(allowed.data).toEqual([]);
    });

    it("keeps share links public", async () => {
      server = await startTestServer({ apiKey: "test-secret" });
      const record = await seedShare(server.services, "public");

      const res = await server.http.get(`/share/${record.token}`, {
        responseType: "text",
      });

      expect(res.status).toBe(200);
      expect(res.data).toBe("public");
    });

    it("reports authentication state on /auth/me", async () => {
      server = await startTestServer({ apiKey: "test-secret" });

      const anonymous = await server.http.get("/auth/me");
      const signedIn = await server.http.get("/auth/me", {
        headers: { Authorization: "Bearer test-secret" },
      });

      expect(anonymous.data).toEqual({ authenticated: false });
      expect(signedIn.data).toEqual({ authenticated: true });
    });
  });

  it("lists active shares only", async () => {
    server = await startTestServer();
    await seedShare(server.services, "short", { expirationDays: 1 });
    const kept = await seedShare(server.services, "alpha", {
      filename: "alpha.txt",
      expirationDays: 3,
      maxDownloads: 4,
    });

    server.clock.advance(2 * DAY_MS);

    const res = await server.http.get("/api/files");
    expect(res.status).toBe(200);
    expect(res.data).toEqual([
      {
        id: kept.id,
        filename: "alpha.txt",
        share_id: kept.token,
        size: 5,
        expires_at: new Date(START_TIME + 3 * DAY_MS).toISOString(),
        max_downloads: 4,
        download_count: 0,
      },
    ]);
  });

  it("deletes a share and its file", async () => {
    server = await startTestServer();
    const record = await seedShare(server.services, "bye");

    const deleted = await server.http.delete(`/api/files/${record.id}`);
    const again = await server.http.delete(`/api/files/${record.id}`);
    const invalid = await server.http.delete("/api/files/abc");

    expect(deleted.data).toEqual({ ok: true });
    expect(again.status).toBe(404);
    expect(again.data).toEqual({ error: "not_found", message: "Not found" });
    expect(invalid.status).toBe(400);
    expect(invalid.data.error).toBe("invalid_request");
    expect(await listFiles(server.uploadDir)).toEqual([]);
    expect((await server.http.get(`/share/${record.token}`)).status).toBe(404);
  });

  describe("upload limits", () => {
    it("rejects a body that grows past the limit while streaming", async () => {
      server = await startTestServer({ maxFileSize: 1024 });

      const res = await post(uploadForm(Buffer.alloc(4096, 0x61), "big.bin"));

      expect(res.status).toBe(413);
      expect(res.data).toEqual({
        error: "too_large",
        message: "File too large. Maximum size: 0MB",
      });
      expect(await listFiles(server.uploadDir)).toEqual([]);
    });

    it("rejects an oversize Content-Length before reading the body", async () => {
      server = await startTestServer({ maxFileSize: 1024 });

      const res = await probeUpload(server.baseUrl, 10 * 1024 * 1024);

      expect(res.status).toBe(413);
      expect(res.headers.connection).toBe("close");
      expect(JSON.parse(res.body)).toEqual({
        error: "too_large",
        message: "File too large. Maximum size: 0MB",
      });
      expect(await listFiles(server.uploadDir)).toEqual([]);
    });

    it("cleans up when the client disconnects mid-upload", async () => {
      server = await startTestServer();
      const uploadId = uuidv4();

      const req = beginUpload(server.baseUrl, uploadId, 512 * 1024);
      await vi.waitFor(
        () => {
          expect(server.services.progress.get(uploadId)?.uploaded).toBeGreaterThan(0);
        },
        { timeout: 5000, interval: 20 },
      );

      req.destroy();

      await vi.waitFor(
        async () => {
          expect(server.services.progress.get(uploadId)?.status).toBe("failed");
          expect(await listFiles(server.uploadDir)).toEqual([]);
        },
        { timeout: 5000, interval: 20 },
      );
      expect(await server.services.registry.listActive(server.clock.now())).toEqual(
        [],
      );
    });

    it("rejects out-of-range form fields and keeps no file", async () => {
      server = await startTestServer();

      const res = await post(uploadForm("abc", "a.txt", { expiration_days: "45" }));

      expect(res.status).toBe(400);
      expect(res.data).toEqual({
        error: "invalid_request",
        message: '"expiration_days" must be less than or equal to 30',
      });
      expect(await listFiles(server.uploadDir)).toEqual([]);
    });

    it("rejects a form without a file", async () => {
      server = await startTestServer();
      const empty = new FormData();
      empty.append("expiration_days", "1");

      const res = await post(empty);

      expect(res.status).toBe(400);
      expect(res.data).toEqual({ error: "invalid_request", message: "No file" });
    });

    it("rejects a non-multipart body", async () => {
      server = await startTestServer();

      const res = await server.http.post("/api/upload", { file: "nope" });

      expect(res.status).toBe(400);
      expect(res.data).toEqual({
        error: "invalid_request",
        message: "Expected multipart form data",
      });
    });
  });

  describe("GET /api/upload-progress/:uploadId", () => {
    it("reports a finished upload until retention lapses", async () => {
      server = await startTestServer();
      const uploadId = uuidv4();
      await post(uploadForm("hello world", "h.txt"), { upload_id: uploadId });

      const res = await server.http.get(`/api/upload-progress/${uploadId}`);
      expect(res.status).toBe(200);
      expect(res.data).toEqual({ total: 11, uploaded: 11, status: "completed" });

      server.clock.advance(5 * 60 * 1000);
      const later = await server.http.get(`/api/upload-progress/${uploadId}`);
      expect(later.status).toBe(404);
      expect(later.data).toEqual({ error: "not_found", message: "Upload not found" });
    });

    it("validates the upload id", async () => {
      server = await startTestServer();

      const unknown = await server.http.get(`/api/upload-progress/${uuidv4()}`);
      const invalid = await server.http.get("/api/upload-progress/not-a-uuid");

      expect(unknown.status).toBe(404);
      expect(invalid.status).toBe(400);
      expect(invalid.data.error).toBe("invalid_request");
    });

    it("rejects a malformed upload_id query", async () => {
      server = await startTestServer();

      const res = await post(uploadForm("abc", "a.txt"), { upload_id: "nope" });

      expect(res.status).toBe(400);
      expect(res.data.error).toBe("invalid_request");
    });
  });
});
