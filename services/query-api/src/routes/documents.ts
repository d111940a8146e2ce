import type { FastifyInstance } from "fastify";

import type { VectorStore } from "../app.js";
import { InsertDocumentsRequestSchema } from "../validation.js";
import { sendStoreError } from "./errors.js";

export async function registerDocumentRoutes(app: FastifyInstance, store: VectorStore): Promise<void> {
  app.post("/v1/documents", async (request, reply) => {
    const parsed = InsertDocumentsRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.badRequest(parsed.error.message);
    }

    try {
      const ids = await store.insertDocs(parsed.data.insurance_type, parsed.data.documents);
      request.log.info(
        { insurance_type: parsed.data.insurance_type, inserted: ids.length },
        "documents_inserted",
      );
      return reply.code(201).send({ inserted: ids.length, ids });
    } catch (error) {
      return sendStoreError(reply, error);
    }
  });
}
