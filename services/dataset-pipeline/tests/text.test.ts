import assert from "node:assert/strict";
import test from "node:test";

import { cleanHtmlFragment, normalizeText } from "../src/text.js";

test("normalizeText removes zero-width characters and converts no-break spaces", () => {
  assert.equal(normalizeText("a\u200bb\u00a0c\ufeff\u2060\u2028"), "ab c");
});

test("normalizeText keeps ordinary whitespace", () => {
  assert.equal(normalizeText("  line one\nline two  "), "  line one\nline two  ");
});

test("cleanHtmlFragment strips tags, decodes entities and collapses whitespace", () => {
  assert.equal(
    cleanHtmlFragment("<p>Hello&nbsp;<b>world</b>\n  again</p>"),
    "Hello world again",
  );
});
