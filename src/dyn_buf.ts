/* ==================== DYNAMIC BUFFER ==================== */

export type DynBuf = { data: Buffer; length: number };

export function newDynBuf(): DynBuf {
  return { data: Buffer.alloc(0), length: 0 };
}

export function bufPush(buf: DynBuf, data: Buffer): void {
  const newLen = buf.length + data.length;
  if (buf.data.length < newLen) {
    let cap = Math.max(buf.data.length || 32, 32);
    while (cap < newLen) cap *= 2;
    const grown = Buffer.alloc(cap);
    buf.data.copy(grown, 0, 0, buf.length);
    buf.data = grown;
  }
  data.copy(buf.data, buf.length);
  buf.length = newLen;
}

export function bufPop(buf: DynBuf, len: number): void {
  buf.data.copy(buf.data, 0, len, buf.length);
  buf.length -= len;
}

// Removes and returns one line, newline included, or null when the buffer
// holds no complete line yet.
export function cutLine(buf: DynBuf): Buffer | null {
  const idx = buf.data.subarray(0, buf.length).indexOf("\n");
  if (idx < 0) return null;
  const line = Buffer.from(buf.data.subarray(0, idx + 1));
  bufPop(buf, idx + 1);
  return line;
}

// Removes and returns up to `max` bytes from the front of the buffer.
export function cutBytes(buf: DynBuf, max: number): Buffer {
  const n = Math.min(buf.length, max);
  const chunk = Buffer.from(buf.data.subarray(0, n));
  bufPop(buf, n);
  return chunk;
}
