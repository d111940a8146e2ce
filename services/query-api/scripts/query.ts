import { DEFAULT_TOP_K, getCollectionName } from "../src/constants.js";
import { closeDbPool, getDbPool } from "../src/lib/db.js";
import { createEmbedder } from "../src/lib/embeddings.js";
import { InsuranceVectorStore } from "../src/lib/store.js";

const USAGE = "Usage: query <insurance_type> <query> [top_k]";

function parseArgs(argv: string[]): { insuranceType: string; query: string; topK: number } {
  const [insuranceType, query, topKRaw, ...rest] = argv;
  if (!insuranceType || !query || rest.length > 0) {
    throw new Error(USAGE);
  }

  const topK = topKRaw === undefined ? DEFAULT_TOP_K : Number(topKRaw);
  if (!Number.isInteger(topK) || topK < 1) {
    throw new Error(USAGE);
  }
  return { insuranceType, query, topK };
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const store = new InsuranceVectorStore(getDbPool(), createEmbedder(), {
    collection: getCollectionName(),
  });

  try {
    const hits = await store.queryCollection(args.insuranceType, args.query, args.topK);
    process.stdout.write(`${JSON.stringify(hits, null, 2)}\n`);
  } finally {
    await closeDbPool();
  }
}

main().catch((error) => {
  const message = error instanceof Error ? error.stack ?? error.message : String(error);
  process.stderr.write(`${message}\n`);
  process.exit(1);
});
