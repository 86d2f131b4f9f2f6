import assert from "node:assert/strict";
import { test } from "node:test";
import { getFirstParagraph, sanitizeForScript, unescapeScript } from "../src/script/sanitize.js";

test("sanitizeForScript flattens typographic punctuation and newlines", () => {
  const input = "It\u2019s here \u2014 now\nnext";
  assert.equal(sanitizeForScript(input), "It's here - now\\nnext");
});

test("sanitizeForScript normalizes quotes, ellipsis and spaces", () => {
  assert.equal(
    sanitizeForScript("\u201CWait\u2026\u201D she said\u2013\u2018ok\u2019"),
    '\\"Wait...\\" she said-\'ok\''
  );
  assert.equal(sanitizeForScript("a\u00A0b"), "a b");
});

test("sanitizeForScript escapes backslashes before quotes and handles CRLF and tabs", () => {
  assert.equal(sanitizeForScript('a\\b "c"\r\nd\te'), 'a\\\\b \\"c\\"\\nd e');
  assert.equal(sanitizeForScript("  padded \n"), "padded \\n");
});

test("unescapeScript reverses the escapes", () => {
  const original = 'Line "one" \\ two\nLine three';
  assert.equal(unescapeScript(sanitizeForScript(original)), original);
});

test("getFirstParagraph returns the first non-empty paragraph", () => {
  const sanitized = sanitizeForScript("\n\nWelcome to the show.\nStay a while.\n\nSecond part.");
  assert.equal(getFirstParagraph(sanitized), "Welcome to the show.\nStay a while.");
  assert.equal(getFirstParagraph(""), "");
});
