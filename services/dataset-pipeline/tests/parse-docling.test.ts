import assert from "node:assert/strict";
import path from "node:path";
import test from "node:test";

import { DirectoryNotFoundError } from "../src/errors.js";
import { parseDoclingDirectory } from "../src/parse-docling.js";
import { createCapturingLogger, createTempTree, exampleSite, removeTempTree } from "./helpers.js";

test("parseDoclingDirectory pairs text with links and points at the original pdf", async () => {
  const root = await createTempTree({
    "bad.json": "[1, 2",
    "www.example.co.il/insurance/health/policy.json": JSON.stringify({
      texts: [
        { text: "Policy terms", hyperlink: "https://example.co.il/terms" },
        { text: "Exclusions" },
      ],
    }),
    "www.example.co.il/insurance/health/policy.pdf": "%PDF-1.4",
  });
  const { logger, records } = createCapturingLogger();

  try {
    const result = await parseDoclingDirectory(root, { site: exampleSite, logger });

    assert.equal(result.total_files, 1);
    assert.deepEqual(result.files[0], {
      file_path: path.join(root, "www.example.co.il/insurance/health/policy.json"),
      url: "https://www.example.co.il/insurance/health/policy.pdf",
      topic: "health",
      content: [
        { text: "Policy terms", hyperlink: "https://example.co.il/terms", index: 0 },
        { text: "Exclusions", hyperlink: null, index: 1 },
      ],
      content_count: 2,
    });

    const failures = records.filter((record) => record.msg === "json_parse_failed");
    assert.equal(failures.length, 1);
    assert.equal(failures[0]?.file, path.join(root, "bad.json"));
  } finally {
    await removeTempTree(root);
  }
});

test("parseDoclingDirectory rejects a path that is not a directory", async () => {
  const root = await createTempTree({ "single.json": "{}" });
  const { logger } = createCapturingLogger();

  try {
    await assert.rejects(
      parseDoclingDirectory(path.join(root, "single.json"), { site: exampleSite, logger }),
      (error: unknown) =>
        error instanceof DirectoryNotFoundError && error.code === "not_a_directory",
    );
  } finally {
    await removeTempTree(root);
  }
});
