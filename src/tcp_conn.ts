import * as net from "node:net";
import { logger } from "./logger.js";

/* ==================== TYPES ==================== */

// A socket wrapped so that reads become promises. At most one read is
// pending at a time; the socket stays paused between reads.
export type TCPConn = {
  socket: net.Socket;
  err: Error | null;
  ended: boolean;
  closing: boolean;
  reader: null | { resolve: (v: Buffer) => void; reject: (e: Error) => void };
};

/* ==================== TCP WRAPPER ==================== */

export function soInit(socket: net.Socket): TCPConn {
  const conn: TCPConn = { socket, err: null, ended: false, closing: false, reader: null };

  socket.on("data", (data: Buffer) => {
    if (!conn.reader) {
      // expected only while draining after soClose()
      if (!conn.closing) logger.debug(`dropped ${data.length} unread bytes from`, socket.remoteAddress);
      return;
    }
    conn.socket.pause();
    conn.reader.resolve(data);
    conn.reader = null;
  });

  socket.on("end", () => {
    conn.ended = true;
    if (conn.reader) {
      conn.reader.resolve(Buffer.alloc(0)); // EOF
      conn.reader = null;
    }
  });

  socket.on("error", (err: Error) => {
    conn.err = err;
    if (conn.reader) {
      conn.reader.reject(err);
      conn.reader = null;
    }
  });

  return conn;
}

// Resolves with the next chunk, or an empty buffer on EOF.
export function soRead(conn: TCPConn): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    if (conn.err) return reject(conn.err);
    if (conn.ended) return resolve(Buffer.alloc(0));
    conn.reader = { resolve, reject };
    conn.socket.resume();
  });
}

export function soWrite(conn: TCPConn, data: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    if (conn.socket.destroyed || conn.socket.writableEnded) {
      return reject(new Error("write on closed connection"));
    }
    conn.socket.write(data, (err?: Error | null) => (err ? reject(err) : resolve()));
  });
}

const kDefaultLingerMs = 1000;

// Sends FIN so the response is delivered, drains input, then destroys the
// socket on the peer's FIN or after `lingerMs`, whichever comes first.
export function soClose(conn: TCPConn, lingerMs = kDefaultLingerMs): void {
  const socket = conn.socket;
  if (socket.destroyed) return;
  conn.closing = true;

  const timer = setTimeout(() => socket.destroy(), lingerMs);
  timer.unref();
  socket.once("close", () => clearTimeout(timer));

  if (conn.ended) {
    socket.end(() => socket.destroy());
  } else {
    socket.once("end", () => socket.destroy());
    socket.end();
  }
  socket.resume();
}
