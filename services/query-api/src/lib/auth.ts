import type { FastifyRequest } from "fastify";

export type AuthResolution = {
  ok: boolean;
  authSubject: string;
  reason?: string;
};

function parseCsv(raw: string | undefined): string[] {
  return (raw ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

export function parseApiKeys(): Set<string> {
  return new Set(parseCsv(process.env.RAG_API_KEYS));
}

function firstHeader(header: string | string[] | undefined): string | null {
  const raw = Array.isArray(header) ? header[0] : header;
  return raw?.trim() || null;
}

function parseBearerToken(header: string | string[] | undefined): string | null {
  const raw = firstHeader(header);
  if (!raw) {
    return null;
  }
  const [scheme, token] = raw.split(/\s+/, 2);
  if (!scheme || !token || scheme.toLowerCase() !== "bearer") {
    return null;
  }
  return token;
}

/** Without configured keys every request is anonymous and allowed. */
export function authorizeRequest(request: FastifyRequest, apiKeys: Set<string>): AuthResolution {
  if (apiKeys.size === 0) {
    return { ok: true, authSubject: "anonymous" };
  }

  const bearer = parseBearerToken(request.headers.authorization);
  const headerKey = firstHeader(request.headers["x-api-key"]);
  const token = bearer ?? headerKey;

  if (!token) {
    return { ok: false, authSubject: "anonymous", reason: "missing_api_token" };
  }
  if (!apiKeys.has(token)) {
    return { ok: false, authSubject: "anonymous", reason: "invalid_api_token" };
  }
  return { ok: true, authSubject: bearer ? "bearer" : "api_key" };
}
