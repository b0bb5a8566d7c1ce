import * as net from "node:net";
import { newConn } from "./handler.js";
import { logger } from "./logger.js";
import type { RecordStore } from "./record_store.js";

/* ==================== LISTENER ==================== */

export type EntryServerOptions = {
  store: RecordStore;
  // 0 admits any number of concurrent connections
  maxConnections?: number;
  // how long an answered connection may wait for the peer's FIN
  lingerMs?: number;
};

export type EntryServer = {
  server: net.Server;
  listen: (port: number, host: string) => Promise<net.AddressInfo>;
  close: () => Promise<void>;
};

export function createEntryServer(opts: EntryServerOptions): EntryServer {
  const { store, maxConnections = 0, lingerMs } = opts;
  const sockets = new Set<net.Socket>();

  // allowHalfOpen: a client that half-closes mid-body still gets its 400
  const server = net.createServer({ pauseOnConnect: true, allowHalfOpen: true });
  if (maxConnections > 0) server.maxConnections = maxConnections;

  server.on("connection", socket => {
    sockets.add(socket);
    socket.on("close", () => sockets.delete(socket));
    newConn(socket, store, { lingerMs }).catch(err => logger.error("unhandled connection error:", err));
  });

  server.on("drop", data => {
    logger.warn("connection refused, at max connections:", data?.remoteAddress, data?.remotePort);
  });

  const listen = (port: number, host: string) =>
    new Promise<net.AddressInfo>((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      server.once("error", onError);
      server.listen({ host, port }, () => {
        server.off("error", onError);
        server.on("error", err => logger.error("server error:", err));
        const addr = server.address();
        if (addr === null || typeof addr === "string") {
          reject(new Error(`unexpected listen address: ${String(addr)}`));
          return;
        }
        logger.info(`listening on ${addr.address}:${addr.port}`);
        resolve(addr);
      });
    });

  const close = () =>
    new Promise<void>((resolve, reject) => {
      for (const socket of sockets) socket.destroy();
      server.close(err => (err ? reject(err) : resolve()));
    });

  return { server, listen, close };
}
