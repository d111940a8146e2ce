import type { Pool } from "pg";

import type { Embedder } from "../src/lib/embeddings.js";

export type RecordedQuery = {
  text: string;
  values?: unknown[];
};

export function createFakeDb(
  rowsFor: (text: string) => Array<Record<string, unknown>> = () => [],
): { db: Pool; queries: RecordedQuery[] } {
  const queries: RecordedQuery[] = [];
  const db = {
    query: async (text: string, values?: unknown[]) => {
      queries.push({ text, values });
      return { rows: rowsFor(text) };
    },
  } as unknown as Pool;
  return { db, queries };
}

export function createFakeEmbedder(vectors: Record<string, number[]>): {
  embedder: Embedder;
  calls: string[][];
} {
  const calls: string[][] = [];
  const embedder: Embedder = {
    modelId: "fake:model",
    embed: async (texts) => {
      calls.push(texts);
      return texts.map((text) => vectors[text] ?? [1, 0]);
    },
  };
  return { embedder, calls };
}

export async function withEnv<T>(
  values: Record<string, string | undefined>,
  run: () => Promise<T>,
): Promise<T> {
  const previous = Object.fromEntries(Object.keys(values).map((key) => [key, process.env[key]]));
  const apply = (next: Record<string, string | undefined>) => {
    for (const [key, value] of Object.entries(next)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  };

  apply(values);
  try {
    return await run();
  } finally {
    apply(previous);
  }
}
