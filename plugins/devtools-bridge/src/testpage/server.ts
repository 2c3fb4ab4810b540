import { createServer, type Server } from "node:http";
import { readFileSync } from "node:fs";
import type { AddressInfo } from "node:net";
import { join } from "node:path";
import { CommandFailedError } from "../errors.js";
import { logger } from "../logger.js";

export const DEFAULT_TEST_PAGE_PATH = join(__dirname, "..", "..", "assets", "test-page.html");

export interface TestPageServer {
  readonly url: string;
  readonly port: number;
  close(): Promise<void>;
}

/** Serve the static test page on all interfaces, so the guest can load it too. */
export async function serveTestPage(port: number, host = "0.0.0.0", pagePath = DEFAULT_TEST_PAGE_PATH): Promise<TestPageServer> {
  const page = readFileSync(pagePath, "utf-8");

  const server: Server = createServer((req, res) => {
    if (req.method === "GET" && (req.url === "/" || req.url === "/index.html")) {
      res.writeHead(200, { "Content-Type": "text/html; charset=utf-8" });
      res.end(page);
    } else {
      res.writeHead(404, { "Content-Type": "text/plain" });
      res.end("Not found");
    }
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve();
    });
  }).catch((err: NodeJS.ErrnoException) => {
    throw new CommandFailedError(
      `Could not serve the test page on port ${port}: ${err.message}`,
      err.code === "EADDRINUSE" ? `Port ${port} is already in use; pick another with --http-port.` : "Check the --http-port value.",
      { code: err.code },
    );
  });

  const address: AddressInfo | string | null = server.address();
  const boundPort = address !== null && typeof address !== "string" ? address.port : port;
  const url = `http://localhost:${boundPort}/`;
  logger.info({ url }, "Test page server listening");

  return {
    url,
    port: boundPort,
    close: () => new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve()))),
  };
}
