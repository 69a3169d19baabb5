import fs from "fs";
import path from "path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createHttpClient } from "../src/services/http";
import {
  ShareApiService,
  filenameFromDisposition,
} from "../src/services/share-api.service";
import {
  createTempDir,
  startStubServer,
  type StubServer,
} from "./helpers/stub-server";

const TOKEN = "B".repeat(22);

describe("ShareApiService", () => {
  let stub: StubServer;
  let dir: string;
  let api: ShareApiService;

  beforeEach(async () => {
    stub = await startStubServer();
    dir = await createTempDir();
    api = new ShareApiService(createHttpClient(stub.url, "test-secret"));
  });

  afterEach(async () => {
    await stub.close();
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it("saves a download under the name the server sends", async () => {
    stub.app.get("/share/:token", (req, res) => {
      res.attachment("report.txt");
      res.send(`contents of ${req.params.token}`);
    });

    const saved = await api.download(TOKEN, { outDir: dir });

    expect(saved).toBe(path.join(dir, "report.txt"));
    expect(await fs.promises.readFile(saved, "utf8")).toBe(`contents of ${TOKEN}`);
  });

  it("saves a non-ASCII download under its real name", async () => {
    stub.app.get("/share/:token", (req, res) => {
      res.attachment("文件.txt");
      res.send("unicode");
    });

    const saved = await api.download(TOKEN, { outDir: dir });

    expect(saved).toBe(path.join(dir, "文件.txt"));
    expect(await fs.promises.readFile(saved, "utf8")).toBe("unicode");
  });

  it("writes to an explicit output path", async () => {
    stub.app.get("/share/:token", (req, res) => {
      res.attachment("report.txt");
      res.send("body");
    });
    const target = path.join(dir, "renamed.bin");

    expect(await api.download(TOKEN, { outPath: target })).toBe(target);
    expect(await fs.promises.readFile(target, "utf8")).toBe("body");
  });

  it("explains refused downloads and writes nothing", async () => {
    stub.app.get("/share/:token", (req, res) => {
      res.status(410).json({ error: "limit_reached", message: "Limit reached" });
    });

    await expect(api.download(TOKEN, { outDir: dir })).rejects.toThrow(
      "Share expired or download limit reached",
    );
    expect(await fs.promises.readdir(dir)).toEqual([]);
  });

  it("reports unexpected statuses", async () => {
    stub.app.get("/share/:token", (req, res) => {
      res.sendStatus(502);
    });

    await expect(api.download(TOKEN, { outDir: dir })).rejects.toThrow(
      "Server answered 502",
    );
  });

  it("lists shares with the API key", async () => {
    const share = {
      id: 3,
      filename: "a.txt",
      share_id: TOKEN,
      size: 1,
      expires_at: "2024-01-02T00:00:00.000Z",
      max_downloads: null,
      download_count: 0,
    };
    let authorization: string | undefined;
    stub.app.get("/api/files", (req, res) => {
      authorization = req.headers.authorization;
      res.json([share]);
    });

    expect(await api.list()).toEqual([share]);
    expect(authorization).toBe("Bearer test-secret");
  });

  it("deletes shares and names a missing one", async () => {
    stub.app.delete("/api/files/:id", (req, res) => {
      if (req.params.id === "1") {
        res.json({ ok: true });
        return;
      }
      res.status(404).json({ error: "not_found", message: "Not found" });
    });

    await expect(api.remove(1)).resolves.toBeUndefined();
    await expect(api.remove(7)).rejects.toThrow("Share 7 not found");
  });
});

describe("filenameFromDisposition", () => {
  it("extracts the quoted filename", () => {
    expect(filenameFromDisposition('attachment; filename="a b.txt"')).toBe("a b.txt");
  });

  it("prefers the UTF-8 filename* form", () => {
    expect(
      filenameFromDisposition(
        "attachment; filename=\"??.txt\"; filename*=UTF-8''%E6%96%87%E4%BB%B6.txt",
      ),
    ).toBe("文件.txt");
  });

  it("falls back to the plain form when filename* is malformed", () => {
    expect(
      filenameFromDisposition("attachment; filename=\"a.txt\"; filename*=UTF-8''%E6%96"),
    ).toBe("a.txt");
  });

  it("keeps only the basename", () => {
    expect(filenameFromDisposition('attachment; filename="../../x.txt"')).toBe("x.txt");
  });

  it("returns null when there is nothing to use", () => {
    expect(filenameFromDisposition(undefined)).toBeNull();
    expect(filenameFromDisposition("inline")).toBeNull();
    expect(filenameFromDisposition('attachment; filename=""')).toBeNull();
  });
});
