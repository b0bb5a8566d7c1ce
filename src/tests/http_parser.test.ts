import test from "node:test";
import assert from "node:assert/strict";

import {
  parseContentLength,
  parseHeaderLine,
  parseHeaders,
  parseRequestLine,
} from "../http_parser.js";

test("parseRequestLine: first two tokens are method and path", () => {
  assert.deepEqual(parseRequestLine("GET /data HTTP/1.1\r\n"), { method: "GET", path: "/data" });
  assert.deepEqual(parseRequestLine("POST   /data\n"), { method: "POST", path: "/data" });
  assert.deepEqual(parseRequestLine("GET\t/x extra tokens"), { method: "GET", path: "/x" });
});

test("parseRequestLine: fewer than two tokens is malformed", () => {
  assert.equal(parseRequestLine("GET\n"), null);
  assert.equal(parseRequestLine(""), null);
  assert.equal(parseRequestLine("   \r\n"), null);
});

test("parseHeaderLine: splits once on the first colon-space", () => {
  assert.deepEqual(parseHeaderLine("Content-Length: 12"), ["Content-Length", "12"]);
  assert.deepEqual(parseHeaderLine("X-Note: a: b"), ["X-Note", "a: b"]);
  assert.equal(parseHeaderLine("X-Odd:value"), null);
  assert.equal(parseHeaderLine("junk"), null);
});

test("parseHeaders: drops malformed lines and stops at the blank line", () => {
  const headers = parseHeaders([
    "Host: localhost\r\n",
    "garbage\r\n",
    "Content-Length: 3\r\n",
    "\r\n",
    "After: 1\r\n",
  ]);
  assert.equal(headers.size, 2);
  assert.equal(headers.get("Host"), "localhost");
  assert.equal(headers.get("Content-Length"), "3");
  assert.equal(headers.has("After"), false);
});

test("parseHeaders: names are case-sensitive and the last repeat wins", () => {
  const headers = parseHeaders(["content-length: 5", "X-A: 1", "X-A: 2"]);
  assert.equal(headers.get("Content-Length"), undefined);
  assert.equal(headers.get("content-length"), "5");
  assert.equal(headers.get("X-A"), "2");
});

test("parseContentLength: non-negative integers only", () => {
  assert.equal(parseContentLength("12"), 12);
  assert.equal(parseContentLength(" 7"), 7);
  assert.equal(parseContentLength("0"), 0);
  assert.equal(parseContentLength(undefined), 0);
  assert.equal(parseContentLength("-1"), 0);
  assert.equal(parseContentLength("abc"), 0);
  assert.equal(parseContentLength("1.5"), 0);
  assert.equal(parseContentLength("12abc"), 0);
});
