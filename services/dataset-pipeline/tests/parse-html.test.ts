import assert from "node:assert/strict";
import path from "node:path";
import test from "node:test";

import { parseHtmlDirectory } from "../src/parse-html.js";
import {
  createCapturingLogger,
  createTempTree,
  exampleSite,
  invalidUtf8,
  removeTempTree,
} from "./helpers.js";

const travelPage = [
  "<html><head>",
  '<script id="__NEXT_DATA__" type="application/json">',
  JSON.stringify({ props: { blocks: [{ strHTML: "<p>Cover &amp; claims</p>" }] } }),
  "</script>",
  "</head><body><h1>Travel insurance</h1><p>Abroad cover</p></body></html>",
].join("");

test("parseHtmlDirectory parses every html file with url and topic provenance", async () => {
  const root = await createTempTree({
    "notes.html": "<p>Loose page</p>",
    "www.example.co.il/insurance/travel/index.html": travelPage,
    "www.example.co.il/insurance/travel/data.json": "{}",
  });
  const { logger } = createCapturingLogger();

  try {
    const result = await parseHtmlDirectory(root, { site: exampleSite, logger });
    const travelFile = path.join(root, "www.example.co.il/insurance/travel/index.html");

    assert.equal(result.total_files, 2);
    assert.equal(result.source_directory, path.resolve(root));
    assert.deepEqual(result.files[0], {
      file_path: path.join(root, "notes.html"),
      url: null,
      topic: null,
      filename: "notes.html",
      content: [{ tag: "p", text: "Loose page", index: 0 }],
      content_count: 1,
      next_data_fields: [],
      next_data_count: 0,
    });
    assert.deepEqual(result.files[1], {
      file_path: travelFile,
      url: "https://www.example.co.il/insurance/travel/index.html",
      topic: "travel",
      filename: "index.html",
      content: [
        { tag: "h1", text: "Travel insurance", index: 0 },
        { tag: "p", text: "Abroad cover", index: 1 },
      ],
      content_count: 2,
      next_data_fields: [
        {
          field: "strHTML",
          original: "<p>Cover &amp; claims</p>",
          clean: "Cover & claims",
          index: 0,
        },
      ],
      next_data_count: 1,
    });
  } finally {
    await removeTempTree(root);
  }
});

test("parseHtmlDirectory logs and skips files that are not valid UTF-8", async () => {
  const root = await createTempTree({
    "bad.html": invalidUtf8,
    "good.html": "<h1>Readable</h1>",
  });
  const { logger, records } = createCapturingLogger();

  try {
    const result = await parseHtmlDirectory(root, { site: exampleSite, logger });

    assert.equal(result.total_files, 1);
    assert.deepEqual(
      result.files.map((file) => file.filename),
      ["good.html"],
    );
    const failures = records.filter((record) => record.msg === "html_read_failed");
    assert.equal(failures.length, 1);
    assert.equal(failures[0]?.file, path.join(root, "bad.html"));
  } finally {
    await removeTempTree(root);
  }
});
