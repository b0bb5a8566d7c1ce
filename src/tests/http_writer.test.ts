import test from "node:test";
import assert from "node:assert/strict";

import { readFullBody, readerFromMemory } from "../http_body.js";
import { emptyResp, encodeHTTPHead, jsonResp, reasonPhrase } from "../http_writer.js";

test("encodeHTTPHead: empty body has only the status line", () => {
  assert.equal(encodeHTTPHead(emptyResp(400)).toString(), "HTTP/1.1 400 Bad Request\r\n\r\n");
  assert.equal(encodeHTTPHead(emptyResp(201)).toString(), "HTTP/1.1 201 Created\r\n\r\n");
});

test("encodeHTTPHead: json body adds type and length", () => {
  assert.equal(
    encodeHTTPHead(jsonResp(200, "[]")).toString(),
    "HTTP/1.1 200 OK\r\nContent-Type: application/json\r\nContent-Length: 2\r\n\r\n",
  );
});

test("reasonPhrase: known and unknown codes", () => {
  assert.equal(reasonPhrase(404), "Not Found");
  assert.equal(reasonPhrase(500), "Internal Server Error");
  assert.equal(reasonPhrase(418), "Unknown");
});

test("readerFromMemory: yields the data once, then EOF", async () => {
  const reader = readerFromMemory(Buffer.from("héllo"));
  assert.equal(reader.length, 6);
  assert.equal((await readFullBody(reader)).toString(), "héllo");
  assert.equal((await reader.read()).length, 0);
});
