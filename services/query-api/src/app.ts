import cors from "@fastify/cors";
import sensible from "@fastify/sensible";
import Fastify, { type FastifyInstance } from "fastify";

import { getCollectionName } from "./constants.js";
import { authorizeRequest, parseApiKeys } from "./lib/auth.js";
import { closeDbPool, getDbPool } from "./lib/db.js";
import { createEmbedder } from "./lib/embeddings.js";
import { InsuranceVectorStore } from "./lib/store.js";
import { registerDocumentRoutes } from "./routes/documents.js";
import { registerSearchRoute } from "./routes/search.js";

export type VectorStore = Pick<InsuranceVectorStore, "insertDocs" | "queryCollection">;

export type BuildAppOptions = {
  logger?: boolean;
  /** Defaults to a store over the shared pg pool and the configured embedder. */
  store?: VectorStore;
};

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger
      ? {
          transport:
            process.env.NODE_ENV === "development"
              ? { target: "pino-pretty" }
              : undefined,
          level: process.env.LOG_LEVEL ?? "info",
        }
      : false,
  });

  const ownsStore = !options.store;
  const store =
    options.store ??
    new InsuranceVectorStore(getDbPool(), createEmbedder(), { collection: getCollectionName() });
  const apiKeys = parseApiKeys();

  await app.register(cors, { origin: true });
  await app.register(sensible);

  app.addHook("onRequest", async (request, reply) => {
    if (request.url.split("?")[0] === "/health") {
      return;
    }
    const auth = authorizeRequest(request, apiKeys);
    if (!auth.ok) {
      return reply.unauthorized(auth.reason ?? "missing_or_invalid_api_token");
    }
  });

  app.get("/health", async () => ({ status: "ok", service: "query-api" }));

  await registerDocumentRoutes(app, store);
  await registerSearchRoute(app, store);

  if (ownsStore) {
    app.addHook("onClose", async () => {
      await closeDbPool();
    });
  }

  return app;
}
