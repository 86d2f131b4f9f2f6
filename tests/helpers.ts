import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import { mkdtemp } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { configSchema, type AppConfig } from "../src/config/schema.js";

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return configSchema.parse({
    openaiApiKey: "test-key",
    retryBaseDelayMs: 0,
    ...overrides,
  });
}

export function makeTempDir(prefix = "slideshow-test-"): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export type TestServer = {
  url: string;
  close: () => Promise<void>;
};

export async function startServer(
  handler: (req: IncomingMessage, res: ServerResponse, body: Buffer) => void
): Promise<TestServer> {
  const server = createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => handler(req, res, Buffer.concat(chunks)));
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("Server has no port");
  return {
    url: `http://127.0.0.1:${address.port}`,
    close: () => new Promise<void>((resolve) => server.close(() => resolve())),
  };
}

export function sendJson(res: ServerResponse, status: number, body: unknown) {
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(body));
}

export const noSleep = async (_ms: number) => {};
