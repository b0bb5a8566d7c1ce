import * as net from "node:net";
import { cutLine, bufPush, newDynBuf, type DynBuf } from "./dyn_buf.js";
import { decodeBatch, encodeCollection } from "./entry.js";
import { HTTPError, StoreError } from "./errors.js";
import { readFullBody, readerFromConnLength } from "./http_body.js";
import {
  parseContentLength,
  parseHeaders,
  parseRequestLine,
  type HTTPReq,
} from "./http_parser.js";
import { emptyResp, jsonResp, writeHTTPResp, type HTTPRes } from "./http_writer.js";
import { logger } from "./logger.js";
import type { RecordStore } from "./record_store.js";
import { soClose, soInit, soRead, type TCPConn } from "./tcp_conn.js";

/* ==================== LINE READER ==================== */

// Next "\n"-terminated line, or null on EOF before a full line.
async function readLine(conn: TCPConn, buf: DynBuf): Promise<string | null> {
  while (true) {
    const line = cutLine(buf);
    if (line) return line.toString("utf8");
    const data = await soRead(conn);
    if (data.length === 0) return null;
    bufPush(buf, data);
  }
}

/* ==================== ROUTES ==================== */

type Route = "fetchAll" | "append";

function route(req: HTTPReq): Route | null {
  if (req.path !== "/data") return null;
  if (req.method === "GET") return "fetchAll";
  if (req.method === "POST") return "append";
  return null;
}

async function handleFetchAll(store: RecordStore): Promise<HTTPRes> {
  const entries = await store.readAll();
  return jsonResp(200, encodeCollection(entries));
}

async function handleAppend(
  conn: TCPConn,
  buf: DynBuf,
  req: HTTPReq,
  store: RecordStore,
): Promise<HTTPRes> {
  const length = parseContentLength(req.headers.get("Content-Length"));

  // the store lock is not held here; a slow body only stalls this connection
  let body: Buffer;
  try {
    body = await readFullBody(readerFromConnLength(conn, buf, length));
  } catch (exc) {
    if (exc instanceof HTTPError) throw exc;
    throw new HTTPError(400, `error reading body: ${String(exc)}`);
  }
  logger.debug("received POST body:", body.toString("utf8"));

  const batch = decodeBatch(body.toString("utf8"));
  if (!batch.ok) throw new HTTPError(400, `bad body: ${batch.error}`);

  await store.appendBatch(batch.value);
  return emptyResp(201);
}

/* ==================== STATE MACHINE ==================== */

/**
 * Runs one request on a fresh connection and returns the response to send,
 * or null when the connection is abandoned before a request line arrives.
 *
 * AwaitRequestLine -> AwaitHeaders -> Dispatch -> Respond. Closing is left
 * to the caller.
 */
export async function serveClient(conn: TCPConn, store: RecordStore): Promise<HTTPRes | null> {
  const buf = newDynBuf();

  // AwaitRequestLine: any failure here ends the connection silently
  let line: string | null;
  try {
    line = await readLine(conn, buf);
  } catch (exc) {
    logger.debug("error reading request line:", exc);
    return null;
  }
  if (line === null) return null;

  const reqLine = parseRequestLine(line);
  if (!reqLine) throw new HTTPError(400, "bad request line");
  logger.info(reqLine.method, reqLine.path);

  // AwaitHeaders
  const rawHeaders: string[] = [];
  while (true) {
    let h: string | null;
    try {
      h = await readLine(conn, buf);
    } catch (exc) {
      throw new HTTPError(400, `error reading headers: ${String(exc)}`);
    }
    if (h === null) throw new HTTPError(400, "unexpected EOF in headers");
    if (h.trim() === "") break;
    rawHeaders.push(h);
  }
  const req: HTTPReq = { ...reqLine, headers: parseHeaders(rawHeaders) };

  // Dispatch
  const r = route(req);
  if (r === "fetchAll") return handleFetchAll(store);
  if (r === "append") return handleAppend(conn, buf, req, store);
  return emptyResp(404);
}

function errorResp(exc: unknown): HTTPRes | null {
  if (exc instanceof HTTPError) {
    logger.warn(`${exc.code}: ${exc.message}`);
    return emptyResp(exc.code);
  }
  if (exc instanceof StoreError) {
    logger.error(`store ${exc.kind} error: ${exc.message}`, exc.cause ?? "");
    return emptyResp(500);
  }
  logger.error("exception:", exc);
  return null;
}

// Serves one connection from accept to close. Never rejects.
export async function newConn(
  socket: net.Socket,
  store: RecordStore,
  opts: { lingerMs?: number } = {},
): Promise<void> {
  const conn = soInit(socket);
  logger.debug("new connection", socket.remoteAddress, socket.remotePort);

  let resp: HTTPRes | null;
  try {
    resp = await serveClient(conn, store);
  } catch (exc) {
    resp = errorResp(exc);
    if (!resp) {
      socket.destroy();
      return;
    }
  }

  try {
    if (resp) await writeHTTPResp(conn, resp);
  } catch (exc) {
    logger.warn("error writing response:", exc);
  } finally {
    soClose(conn, opts.lingerMs);
    logger.debug("connection closed", socket.remoteAddress, socket.remotePort);
  }
}
