import assert from "node:assert/strict";
import test from "node:test";

import { extractLinks, extractPlainText } from "../src/html/fragments.js";

test("extractLinks keeps every non-empty href in order, duplicates included", () => {
  const html =
    '<p><a href="http://a">A</a> <a href="http://b">B</a><a href="http://a">again</a>' +
    '<a>no href</a><a href="">empty</a></p>';

  assert.deepEqual(extractLinks(html), ["http://a", "http://b", "http://a"]);
});

test("extractLinks decodes entities in attribute values", () => {
  assert.deepEqual(extractLinks('<a href="/claims?a=1&amp;b=2">x</a>'), ["/claims?a=1&b=2"]);
});

test("extractPlainText flattens inline markup", () => {
  assert.equal(extractPlainText("<p>A1 <a href='http://x'>link</a></p>"), "A1 link");
});

test("extractPlainText renders list items and line breaks", () => {
  const html = "<ul><li>One</li><li>Two</li></ul><p>Line<br>break</p>";
  assert.equal(extractPlainText(html), "• One\n• Two\nLine\nbreak");
});

test("extractPlainText collapses runs of spaces", () => {
  assert.equal(extractPlainText("<div>a  \t b</div>"), "a b");
});

test("extractPlainText returns an empty string for empty input", () => {
  assert.equal(extractPlainText(""), "");
  assert.deepEqual(extractLinks(""), []);
});
