import type { Pool } from "pg";

import { MAX_DOCUMENT_CHARS, MAX_INSURANCE_TYPE_CHARS } from "../constants.js";
import { EmbeddingError, InvalidCollectionNameError, InvalidDocumentError } from "../errors.js";
import { cosineSimilarity, parseStoredEmbedding, type Embedder } from "./embeddings.js";

export type QueryHit = {
  id: number;
  score: number;
  document: string;
};

export type VectorStoreOptions = {
  collection: string;
};

type StoredRow = {
  id: string | number;
  document: string;
  embed: unknown;
};

const COLLECTION_NAME_PATTERN = /^[a-z_][a-z0-9_]*$/;

function validateInsuranceType(insuranceType: string): void {
  if (!insuranceType.trim()) {
    throw new InvalidDocumentError("insurance_type must not be empty");
  }
  if (insuranceType.length > MAX_INSURANCE_TYPE_CHARS) {
    throw new InvalidDocumentError(
      `insurance_type exceeds ${MAX_INSURANCE_TYPE_CHARS} characters: ${insuranceType.slice(0, 20)}...`,
    );
  }
}

/**
 * Documents partitioned by insurance type, each stored with a unit-length
 * embedding. Similarity is cosine over the stored vectors.
 */
export class InsuranceVectorStore {
  readonly collection: string;

  constructor(
    private readonly db: Pool,
    private readonly embedder: Embedder,
    options: VectorStoreOptions,
  ) {
    if (!COLLECTION_NAME_PATTERN.test(options.collection)) {
      throw new InvalidCollectionNameError(options.collection);
    }
    this.collection = options.collection;
  }

  async resetCollection(): Promise<void> {
    await this.db.query(`DROP TABLE IF EXISTS ${this.collection}`);
    await this.ensureCollection();
  }

  async ensureCollection(): Promise<void> {
    await this.db.query(
      `CREATE TABLE IF NOT EXISTS ${this.collection} (
         id BIGSERIAL PRIMARY KEY,
         insurance_type VARCHAR(${MAX_INSURANCE_TYPE_CHARS}) NOT NULL,
         document VARCHAR(${MAX_DOCUMENT_CHARS}) NOT NULL,
         embed JSONB NOT NULL,
         embedding_model TEXT NOT NULL,
         created_at TIMESTAMPTZ NOT NULL DEFAULT now()
       )`,
    );
    await this.db.query(
      `CREATE INDEX IF NOT EXISTS ${this.collection}_insurance_type_idx
         ON ${this.collection} (insurance_type)`,
    );
  }

  async insertDocs(insuranceType: string, docs: string[]): Promise<number[]> {
    validateInsuranceType(insuranceType);
    docs.forEach((doc, index) => {
      if (doc.length > MAX_DOCUMENT_CHARS) {
        throw new InvalidDocumentError(
          `Document ${index} has ${doc.length} characters; the limit is ${MAX_DOCUMENT_CHARS}`,
        );
      }
    });

    if (docs.length === 0) {
      return [];
    }

    const vectors = await this.embedder.embed(docs);
    if (vectors.length !== docs.length) {
      throw new EmbeddingError(`Expected ${docs.length} embeddings, received ${vectors.length}`);
    }

    const params: unknown[] = [];
    const tuples = docs.map((doc, index) => {
      const base = params.length;
      params.push(insuranceType, doc, JSON.stringify(vectors[index]), this.embedder.modelId);
      return `($${base + 1}, $${base + 2}, $${base + 3}::jsonb, $${base + 4})`;
    });

    const result = await this.db.query<{ id: string | number }>(
      `INSERT INTO ${this.collection} (insurance_type, document, embed, embedding_model)
       VALUES ${tuples.join(", ")}
       RETURNING id`,
      params,
    );

    return result.rows.map((row) => Number(row.id));
  }

  async queryCollection(insuranceType: string, query: string, maxDocs = 2): Promise<QueryHit[]> {
    validateInsuranceType(insuranceType);
    if (!Number.isInteger(maxDocs) || maxDocs < 1) {
      return [];
    }

    const [queryVector] = await this.embedder.embed([query]);
    if (!queryVector) {
      throw new EmbeddingError("No embedding returned for query");
    }

    const result = await this.db.query<StoredRow>(
      `SELECT id, document, embed FROM ${this.collection} WHERE insurance_type = $1`,
      [insuranceType],
    );

    const hits: QueryHit[] = [];
    for (const row of result.rows) {
      const vector = parseStoredEmbedding(row.embed);
      if (!vector) {
        continue;
      }
      hits.push({
        id: Number(row.id),
        score: cosineSimilarity(queryVector, vector),
        document: row.document,
      });
    }

    hits.sort((left, right) => right.score - left.score || left.id - right.id);
    return hits.slice(0, maxDocs);
  }
}
