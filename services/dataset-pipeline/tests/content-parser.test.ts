import assert from "node:assert/strict";
import test from "node:test";

import { extractHtmlContent } from "../src/html/content-parser.js";
import { createCapturingLogger } from "./helpers.js";

test("extractHtmlContent emits trimmed h1/h2/h3/p text in document order", () => {
  const html = [
    "<html><body>",
    "<h1>Title</h1>",
    "<p>Hello <b>bold</b> world</p>",
    "<h2>   </h2>",
    "<div>outside any block</div>",
    "<h3>Sub</h3>",
    "</body></html>",
  ].join("");

  const { blocks, pageData } = extractHtmlContent(html);

  assert.deepEqual(blocks, [
    { tag: "h1", text: "Title", index: 0 },
    { tag: "p", text: "Hello bold world", index: 1 },
    { tag: "h3", text: "Sub", index: 2 },
  ]);
  assert.equal(pageData, null);
});

test("extractHtmlContent drops a block that is never closed", () => {
  const { blocks } = extractHtmlContent("<h1>Kept</h1><p>never closed");
  assert.deepEqual(blocks, [{ tag: "h1", text: "Kept", index: 0 }]);
});

test("extractHtmlContent tracks only the innermost content tag", () => {
  const { blocks } = extractHtmlContent("<h1>Outer <p>Inner</p> tail</h1>");
  assert.deepEqual(blocks, [{ tag: "p", text: "Inner", index: 0 }]);
});

test("extractHtmlContent decodes entities and strips invisible characters", () => {
  const { blocks } = extractHtmlContent("<p>Fish &amp; Chips&nbsp;</p><p>Zero\u200bWidth</p>");
  assert.deepEqual(blocks, [
    { tag: "p", text: "Fish & Chips", index: 0 },
    { tag: "p", text: "ZeroWidth", index: 1 },
  ]);
});

test("extractHtmlContent decodes the page-data script payload", () => {
  const html =
    '<script id="__NEXT_DATA__" type="application/json">{"props":{"text":"<b>Hi</b>"}}</script>' +
    "<p>Body</p>";

  const { blocks, pageData } = extractHtmlContent(html);

  assert.deepEqual(pageData, { props: { text: "<b>Hi</b>" } });
  assert.deepEqual(blocks, [{ tag: "p", text: "Body", index: 0 }]);
});

test("extractHtmlContent ignores scripts with another id", () => {
  const html = '<script id="analytics" type="application/json">{"a":1}</script>';
  assert.equal(extractHtmlContent(html).pageData, null);
});

test("extractHtmlContent logs and drops an undecodable page-data payload", () => {
  const { logger, records } = createCapturingLogger();
  const html = '<script id="__NEXT_DATA__" type="application/json">{not json</script><h2>Still here</h2>';

  const { blocks, pageData } = extractHtmlContent(html, { logger });

  assert.equal(pageData, null);
  assert.deepEqual(blocks, [{ tag: "h2", text: "Still here", index: 0 }]);
  assert.equal(records.length, 1);
  assert.equal(records[0]?.msg, "page_data_decode_failed");
  assert.equal(records[0]?.level, 40);
});

test("extractHtmlContent returns the same sequence on repeated runs", () => {
  const html = "<h1>A</h1><p>B</p><p>C</p>";
  assert.deepEqual(extractHtmlContent(html), extractHtmlContent(html));
});

test("extractHtmlContent skips a paragraph closed only by the next one", () => {
  const { blocks } = extractHtmlContent("<p>first<p>second</p></p><h2>after</h2>");
  assert.deepEqual(blocks, [
    { tag: "p", text: "second", index: 0 },
    { tag: "h2", text: "after", index: 1 },
  ]);
});
