import { readFile } from "node:fs/promises";

import { getCollectionName } from "../src/constants.js";
import { AggregateDocumentSchema, buildFaqDocuments } from "../src/faq-documents.js";
import { closeDbPool, getDbPool } from "../src/lib/db.js";
import { createEmbedder } from "../src/lib/embeddings.js";
import { InsuranceVectorStore } from "../src/lib/store.js";
import { createLogger } from "../src/logger.js";

const USAGE = "Usage: load-faq <aggregate.json> [--keep]";

function parseArgs(argv: string[]): { inputPath: string; keep: boolean } {
  let inputPath: string | undefined;
  let keep = false;

  for (const token of argv) {
    if (token === "--keep") {
      keep = true;
      continue;
    }
    if (inputPath || token.startsWith("-")) {
      throw new Error(USAGE);
    }
    inputPath = token;
  }

  if (!inputPath) {
    throw new Error(USAGE);
  }
  return { inputPath, keep };
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const logger = createLogger({ name: "load-faq" });

  const raw: unknown = JSON.parse(await readFile(args.inputPath, "utf8"));
  const aggregate = AggregateDocumentSchema.parse(raw);
  const { batches, skipped } = buildFaqDocuments(aggregate);

  for (const entry of skipped) {
    logger.warn(entry, "faq_entry_skipped");
  }

  const store = new InsuranceVectorStore(getDbPool(), createEmbedder(), {
    collection: getCollectionName(),
  });

  try {
    if (args.keep) {
      await store.ensureCollection();
    } else {
      await store.resetCollection();
    }

    let inserted = 0;
    for (const batch of batches) {
      const ids = await store.insertDocs(batch.insuranceType, batch.documents);
      inserted += ids.length;
      logger.info({ insurance_type: batch.insuranceType, inserted: ids.length }, "faq_batch_inserted");
    }

    logger.info(
      { collection: store.collection, inserted, skipped: skipped.length, reset: !args.keep },
      "faq_load_complete",
    );
  } finally {
    await closeDbPool();
  }
}

main().catch((error) => {
  const message = error instanceof Error ? error.stack ?? error.message : String(error);
  process.stderr.write(`${message}\n`);
  process.exit(1);
});
