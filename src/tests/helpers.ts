import * as net from "node:net";
import { setTimeout as sleep } from "node:timers/promises";
import type { BlobStorage } from "../blob_storage.js";
import type { RecordStore } from "../record_store.js";
import { createEntryServer, type EntryServerOptions } from "../server.js";

// In-process stand-in for the data file.
export class MemoryBlobStorage implements BlobStorage {
  readonly name = "memory";
  data: string | null;
  failReads = false;
  failWrites = false;
  writes = 0;
  delayMs = 0;

  constructor(initial: string | null = null) {
    this.data = initial;
  }

  async read(): Promise<string | null> {
    if (this.delayMs > 0) await sleep(this.delayMs);
    if (this.failReads) throw new Error("read failed");
    return this.data;
  }

  async write(data: string): Promise<void> {
    if (this.delayMs > 0) await sleep(this.delayMs);
    if (this.failWrites) throw new Error("disk full");
    this.writes++;
    this.data = data;
  }
}

export async function withServer<T>(
  store: RecordStore,
  fn: (port: number) => Promise<T>,
  opts: Omit<EntryServerOptions, "store"> = {},
): Promise<T> {
  const srv = createEntryServer({ store, ...opts });
  const addr = await srv.listen(0, "127.0.0.1");
  try {
    return await fn(addr.port);
  } finally {
    await srv.close();
  }
}

/**
 * Writes `payload` on a fresh connection and resolves with everything the
 * server sent once the connection is closed. With `end`, the client
 * half-closes right after writing.
 */
export function rawRequest(port: number, payload: string, opts: { end?: boolean } = {}): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    const sock = net.connect({ host: "127.0.0.1", port }, () => {
      sock.write(payload);
      if (opts.end) sock.end();
    });
    sock.on("data", (c: Buffer) => chunks.push(c));
    sock.on("error", reject);
    sock.on("close", () => resolve(Buffer.concat(chunks).toString("utf8")));
  });
}

export function getData(port: number): Promise<string> {
  return rawRequest(port, "GET /data HTTP/1.1\r\nHost: localhost\r\n\r\n");
}

export function postData(port: number, body: string): Promise<string> {
  return rawRequest(
    port,
    "POST /data HTTP/1.1\r\n" +
      "Host: localhost\r\n" +
      "Content-Type: application/json\r\n" +
      `Content-Length: ${Buffer.byteLength(body)}\r\n` +
      "\r\n" +
      body,
  );
}

export function statusLine(raw: string): string {
  return raw.split("\r\n")[0];
}

export function bodyOf(raw: string): string {
  const idx = raw.indexOf("\r\n\r\n");
  return idx < 0 ? "" : raw.slice(idx + 4);
}

export async function waitFor(cond: () => Promise<boolean>, timeoutMs = 2000): Promise<void> {
  const start = Date.now();
  while (!(await cond())) {
    if (Date.now() - start > timeoutMs) throw new Error("timed out waiting for condition");
    await sleep(5);
  }
}
