import os from "node:os";
import path from "node:path";
import fs from "node:fs/promises";
import axios from "axios";
import { serveTestPage, type TestPageServer } from "../../../src/testpage/server.js";
import { CommandFailedError } from "../../../src/errors.js";

describe("serveTestPage", () => {
  let server: TestPageServer;

  beforeEach(async () => {
    server = await serveTestPage(0, "127.0.0.1");
  });

  afterEach(async () => {
    await server.close();
  });

  it("reports the bound port in its URL", () => {
    expect(server.port).toBeGreaterThan(0);
    expect(server.url).toBe(`http://localhost:${server.port}/`);
  });

  it.each(["/", "/index.html"])("serves the page at %s", async (route) => {
    const res = await axios.get<string>(`http://127.0.0.1:${server.port}${route}`, { proxy: false, responseType: "text" });
    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toBe("text/html; charset=utf-8");
    expect(res.data).toContain("<title>devtools-bridge test page</title>");
  });

  it("answers 404 for anything else", async () => {
    const res = await axios.get<string>(`http://127.0.0.1:${server.port}/favicon.ico`, {
      proxy: false,
      responseType: "text",
      validateStatus: () => true,
    });
    expect(res.status).toBe(404);
    expect(res.data).toBe("Not found");
  });

  it("fails with a port hint when the port is taken", async () => {
    const err: unknown = await serveTestPage(server.port, "127.0.0.1").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CommandFailedError);
    expect(err).toMatchObject({ remediation: `Port ${server.port} is already in use; pick another with --http-port.` });
  });
});

describe("serveTestPage with a custom page", () => {
  it("serves the file it was given", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "devtools-bridge-page-"));
    const page = path.join(dir, "page.html");
    await fs.writeFile(page, "<p>custom</p>");
    const server = await serveTestPage(0, "127.0.0.1", page);
    try {
      const res = await axios.get<string>(server.url.replace("localhost", "127.0.0.1"), { proxy: false, responseType: "text" });
      expect(res.data).toBe("<p>custom</p>");
    } finally {
      await server.close();
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
