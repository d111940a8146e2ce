import { buildApp } from "./app.js";
import { getCollectionName } from "./constants.js";
import { closeDbPool, getDbPool } from "./lib/db.js";
import { createEmbedder } from "./lib/embeddings.js";
import { InsuranceVectorStore } from "./lib/store.js";

async function main(): Promise<void> {
  const store = new InsuranceVectorStore(getDbPool(), createEmbedder(), {
    collection: getCollectionName(),
  });
  await store.ensureCollection();

  const app = await buildApp({ logger: true, store });
  app.addHook("onClose", async () => {
    await closeDbPool();
  });
  const port = Number(process.env.PORT ?? 8080);
  const host = "0.0.0.0";

  await app.listen({ port, host });
}

main().catch((error) => {
  const message = error instanceof Error ? error.stack ?? error.message : String(error);
  process.stderr.write(`${message}\n`);
  process.exit(1);
});
