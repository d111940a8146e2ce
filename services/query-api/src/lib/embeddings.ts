import { z } from "zod";

import { EmbeddingError, errorMessage } from "../errors.js";

type EmbeddingsProvider = "openai" | "ollama";

export type EmbeddingConfig = {
  provider: EmbeddingsProvider;
  model: string;
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
};

/** Turns texts into unit-length vectors, one per input and in input order. */
export type Embedder = {
  readonly modelId: string;
  embed(texts: string[]): Promise<number[][]>;
};

const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";
const DEFAULT_OLLAMA_BASE_URL = "http://localhost:11434";

const OpenAIEmbeddingsResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().optional(),
      embedding: z.array(z.number()),
    }),
  ),
});

const OllamaEmbeddingResponseSchema = z.object({
  embedding: z.array(z.number()),
});

function numberEnv(name: string, fallback: number): number {
  const raw = Number(process.env[name]);
  if (!Number.isFinite(raw) || raw <= 0) {
    return fallback;
  }
  return raw;
}

export function getEmbeddingConfig(): EmbeddingConfig {
  const providerRaw = (process.env.RAG_EMBEDDINGS_PROVIDER ?? "openai").toLowerCase();
  const provider: EmbeddingsProvider = providerRaw === "ollama" ? "ollama" : "openai";
  const model =
    process.env.RAG_EMBEDDINGS_MODEL ??
    (provider === "ollama" ? "nomic-embed-text" : "text-embedding-3-small");

  return {
    provider,
    model,
    baseUrl:
      process.env.RAG_EMBEDDINGS_BASE_URL ??
      (provider === "ollama" ? DEFAULT_OLLAMA_BASE_URL : DEFAULT_OPENAI_BASE_URL),
    apiKey: process.env.RAG_EMBEDDINGS_API_KEY,
    timeoutMs: numberEnv("RAG_EMBEDDINGS_TIMEOUT_MS", 12000),
  };
}

export function normalizeVector(values: number[]): number[] | null {
  const clean = values.filter((value) => Number.isFinite(value));
  if (clean.length === 0) {
    return null;
  }

  const magnitude = Math.sqrt(clean.reduce((acc, value) => acc + value * value, 0));
  if (magnitude <= 0) {
    return null;
  }

  return clean.map((value) => value / magnitude);
}

/** The timeout covers `read` as well as the request. */
async function fetchWithTimeout<T>(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  read: (response: Response) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetch(url, {
      ...init,
      signal: controller.signal,
    });
    return await read(response);
  } finally {
    clearTimeout(timeout);
  }
}

function toUnitVector(raw: number[], provider: EmbeddingsProvider): number[] {
  const vector = normalizeVector(raw);
  if (!vector) {
    throw new EmbeddingError(`${provider} returned an empty or zero embedding`);
  }
  return vector;
}

async function postJson(config: EmbeddingConfig, path: string, body: unknown): Promise<unknown> {
  const url = `${config.baseUrl.replace(/\/$/, "")}${path}`;
  try {
    return await fetchWithTimeout(
      url,
      {
        method: "POST",
        headers: {
          "content-type": "application/json",
          ...(config.apiKey ? { authorization: `Bearer ${config.apiKey}` } : {}),
        },
        body: JSON.stringify(body),
      },
      config.timeoutMs,
      async (response) => {
        if (!response.ok) {
          throw new EmbeddingError(`Embedding request to ${url} failed with HTTP ${response.status}`);
        }
        const payload: unknown = await response.json();
        return payload;
      },
    );
  } catch (error) {
    if (error instanceof EmbeddingError) {
      throw error;
    }
    throw new EmbeddingError(`Embedding request to ${url} failed: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

function parsePayload<T>(schema: z.ZodType<T>, payload: unknown, provider: EmbeddingsProvider): T {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new EmbeddingError(`${provider} response did not contain embeddings`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

async function requestOpenAIEmbeddings(config: EmbeddingConfig, inputs: string[]): Promise<number[][]> {
  const payload = await postJson(config, "/embeddings", {
    model: config.model,
    input: inputs,
  });
  const { data } = parsePayload(OpenAIEmbeddingsResponseSchema, payload, "openai");
  if (data.length !== inputs.length) {
    throw new EmbeddingError(`openai returned ${data.length} embeddings for ${inputs.length} inputs`);
  }

  return [...data]
    .sort((left, right) => (left.index ?? 0) - (right.index ?? 0))
    .map((item) => toUnitVector(item.embedding, "openai"));
}

async function requestOllamaEmbeddings(config: EmbeddingConfig, inputs: string[]): Promise<number[][]> {
  const vectors: number[][] = [];
  for (const input of inputs) {
    const payload = await postJson(config, "/api/embeddings", {
      model: config.model,
      prompt: input,
    });
    const { embedding } = parsePayload(OllamaEmbeddingResponseSchema, payload, "ollama");
    vectors.push(toUnitVector(embedding, "ollama"));
  }
  return vectors;
}

export function createEmbedder(config: EmbeddingConfig = getEmbeddingConfig()): Embedder {
  return {
    modelId: `${config.provider}:${config.model}`,
    async embed(texts: string[]): Promise<number[][]> {
      if (texts.length === 0) {
        return [];
      }
      const inputs = texts.map((text) => text.trim());
      return config.provider === "ollama"
        ? requestOllamaEmbeddings(config, inputs)
        : requestOpenAIEmbeddings(config, inputs);
    },
  };
}

export function parseStoredEmbedding(value: unknown): number[] | null {
  if (Array.isArray(value)) {
    return normalizeVector(value.map((entry) => Number(entry)).filter((entry) => Number.isFinite(entry)));
  }

  if (typeof value === "string") {
    try {
      const parsed: unknown = JSON.parse(value);
      return parseStoredEmbedding(parsed);
    } catch {
      return null;
    }
  }

  return null;
}

export function cosineSimilarity(normalizedLeft: number[], normalizedRight: number[]): number {
  if (normalizedLeft.length === 0 || normalizedRight.length === 0) {
    return 0;
  }

  if (normalizedLeft.length !== normalizedRight.length) {
    return 0;
  }

  let dot = 0;
  normalizedLeft.forEach((value, index) => {
    dot += value * (normalizedRight[index] ?? 0);
  });
  return Math.max(-1, Math.min(1, dot));
}
