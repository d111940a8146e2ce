import type { FastifyReply } from "fastify";

import { EmbeddingError, InvalidDocumentError } from "../errors.js";

export function sendStoreError(reply: FastifyReply, error: unknown): FastifyReply {
  if (error instanceof InvalidDocumentError) {
    return reply.badRequest(error.message);
  }
  if (error instanceof EmbeddingError) {
    reply.log.warn({ err: error }, "embedding_failed");
    return reply.badGateway(error.code);
  }
  throw error;
}
