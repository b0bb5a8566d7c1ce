import { cutBytes, bufPush, type DynBuf } from "./dyn_buf.js";
import { HTTPError } from "./errors.js";
import { soRead, type TCPConn } from "./tcp_conn.js";

/* ==================== BODY READERS ==================== */

// `read` yields successive chunks and an empty buffer once exhausted.
export type BodyReader = { length: number; read: () => Promise<Buffer> };

export function readerFromMemory(data: Buffer): BodyReader {
  let done = false;
  return {
    length: data.length,
    read: async (): Promise<Buffer> => {
      if (done) return Buffer.alloc(0);
      done = true;
      return data;
    },
  };
}

/**
 * Reads exactly `remain` bytes: first whatever is already buffered after the
 * headers, then from the socket. EOF before the last byte is a 400.
 */
export function readerFromConnLength(conn: TCPConn, buf: DynBuf, remain: number): BodyReader {
  return {
    length: remain,
    read: async (): Promise<Buffer> => {
      if (remain === 0) return Buffer.alloc(0);
      if (buf.length === 0) {
        const data = await soRead(conn);
        if (data.length === 0) throw new HTTPError(400, "unexpected EOF in body");
        bufPush(buf, data);
      }
      const chunk = cutBytes(buf, remain);
      remain -= chunk.length;
      return chunk;
    },
  };
}

export async function readFullBody(reader: BodyReader): Promise<Buffer> {
  const chunks: Buffer[] = [];
  while (true) {
    const chunk = await reader.read();
    if (chunk.length === 0) break;
    chunks.push(chunk);
  }
  return Buffer.concat(chunks);
}
