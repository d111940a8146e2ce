import assert from "node:assert/strict";
import test from "node:test";

import {
  AggregateDocumentSchema,
  buildFaqDocuments,
  faqToDocument,
  type AggregateDocument,
} from "../src/faq-documents.js";

function aggregate(content: AggregateDocument["content"]): AggregateDocument {
  return {
    metadata: {
      total_files: content.length,
      source_directory: "/data/site",
      files_processed: content.map((entry) => entry.source_file),
    },
    content,
  };
}

test("faqToDocument joins the tag-free question and the answer text", () => {
  assert.equal(
    faqToDocument("<p>Can I   extend <b>my</b> policy?</p>", "Yes, online."),
    "Can I extend my policy?\nYes, online.",
  );
  assert.equal(faqToDocument("Q", "a".repeat(2000)).length, 1000);
});

test("buildFaqDocuments groups faqs by insurance type in first-seen order", () => {
  const result = buildFaqDocuments(
    aggregate([
      {
        source_file: "site/insurance/health/a-realfaq.json",
        topic: "HEALTH",
        source_url: "https://site/insurance/health/a.html",
        data: { faqs: [{ question: "<p>Who is covered?</p>", answer_text: "Members." }, "not a faq"] },
      },
      {
        source_file: "site/insurance/travel/b-realfaq.json",
        topic: "travel",
        source_url: "https://site/insurance/travel/b.html",
        data: { faqs: [{ question: "Lost luggage?", answer_text: "File a claim." }] },
      },
      {
        source_file: "site/insurance/health/c-realfaq.json",
        topic: "health",
        source_url: null,
        data: { faqs: [{ question: "Dental too?", answer: "<p>No</p>" }, {}] },
      },
    ]),
  );

  assert.deepEqual(result.batches, [
    { insuranceType: "Health", documents: ["Who is covered?\nMembers.", "Dental too?"] },
    { insuranceType: "Travel", documents: ["Lost luggage?\nFile a claim."] },
  ]);
  assert.deepEqual(result.skipped, []);
});

test("buildFaqDocuments reports entries without a known insurance type", () => {
  const result = buildFaqDocuments(
    aggregate([
      { source_file: "pets-realfaq.json", topic: "pets", source_url: null, data: { faqs: [] } },
      { source_file: "misc-realfaq.json", topic: null, source_url: null, data: { faqs: [] } },
      { source_file: "car-realfaq.json", topic: "car", source_url: null, data: { title: "no faqs" } },
    ]),
  );

  assert.deepEqual(result.batches, []);
  assert.deepEqual(result.skipped, [
    { source_file: "pets-realfaq.json", topic: "pets" },
    { source_file: "misc-realfaq.json", topic: null },
  ]);
});

test("AggregateDocumentSchema rejects documents without a content list", () => {
  const parsed = AggregateDocumentSchema.safeParse({
    metadata: { total_files: 0, source_directory: "/data", files_processed: [] },
  });
  assert.equal(parsed.success, false);
});
