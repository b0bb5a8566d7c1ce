import { readerFromMemory, type BodyReader } from "./http_body.js";
import { soWrite, type TCPConn } from "./tcp_conn.js";

/* ==================== RESPONSES ==================== */

export type HTTPRes = { code: number; headers: string[]; body: BodyReader };

const kReasons: Record<number, string> = {
  200: "OK",
  201: "Created",
  400: "Bad Request",
  404: "Not Found",
  500: "Internal Server Error",
};

export function reasonPhrase(code: number): string {
  return kReasons[code] ?? "Unknown";
}

export function emptyResp(code: number): HTTPRes {
  return { code, headers: [], body: readerFromMemory(Buffer.alloc(0)) };
}

export function jsonResp(code: number, json: string): HTTPRes {
  return {
    code,
    headers: ["Content-Type: application/json"],
    body: readerFromMemory(Buffer.from(json, "utf8")),
  };
}

// Status line and headers. Content-Length is added for non-empty bodies.
export function encodeHTTPHead(resp: HTTPRes): Buffer {
  const lines = [`HTTP/1.1 ${resp.code} ${reasonPhrase(resp.code)}`, ...resp.headers];
  if (resp.body.length > 0) lines.push(`Content-Length: ${resp.body.length}`);
  return Buffer.from(lines.map(l => `${l}\r\n`).join("") + "\r\n", "latin1");
}

export async function writeHTTPResp(conn: TCPConn, resp: HTTPRes): Promise<void> {
  await soWrite(conn, encodeHTTPHead(resp));
  while (true) {
    const data = await resp.body.read();
    if (data.length === 0) break;
    await soWrite(conn, data);
  }
}
