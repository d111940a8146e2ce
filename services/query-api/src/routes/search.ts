import type { FastifyInstance } from "fastify";

import type { VectorStore } from "../app.js";
import { SearchRequestSchema } from "../validation.js";
import { sendStoreError } from "./errors.js";

export async function registerSearchRoute(app: FastifyInstance, store: VectorStore): Promise<void> {
  app.post("/v1/search", async (request, reply) => {
    const parsed = SearchRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.badRequest(parsed.error.message);
    }

    try {
      const results = await store.queryCollection(
        parsed.data.insurance_type,
        parsed.data.query,
        parsed.data.top_k,
      );
      return reply.send({ results });
    } catch (error) {
      return sendStoreError(reply, error);
    }
  });
}
