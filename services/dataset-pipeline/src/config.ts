import { z } from "zod";

export const SiteConfigSchema = z
  .object({
    domain: z.string().min(1),
    topicSegment: z.string().min(1),
    scheme: z.string().regex(/^[a-z][a-z0-9+.-]*:\/\/$/),
  })
  .strict();

export type SiteConfig = z.infer<typeof SiteConfigSchema>;

export const DEFAULT_SITE_CONFIG: SiteConfig = {
  domain: "www.harel-group.co.il",
  topicSegment: "insurance",
  scheme: "https://",
};

export const REALFAQ_SUFFIX = "-realfaq.json";
export const TOPICS_FAQ_DIR = "topics-faq";
export const TOPICS_FAQ_SUFFIX = "-faq-realfaq.json";

export const PAGE_DATA_SCRIPT = {
  id: "__NEXT_DATA__",
  type: "application/json",
} as const;

export const DEFAULT_OUTPUT_FILES = {
  parseHtml: "parsed_html_output.json",
  parseDocling: "parsed_output.json",
  aggregateFaq: "aggregated_realfaq.json",
} as const;

const DEFAULT_PDF_DOWNLOAD_TIMEOUT_MS = 20000;

function numberEnv(name: string, fallback: number): number {
  const raw = Number(process.env[name]);
  if (!Number.isFinite(raw) || raw <= 0) {
    return fallback;
  }
  return raw;
}

export function loadSiteConfig(env: NodeJS.ProcessEnv = process.env): SiteConfig {
  return SiteConfigSchema.parse({
    domain: env.DATASET_SITE_DOMAIN ?? DEFAULT_SITE_CONFIG.domain,
    topicSegment: env.DATASET_TOPIC_SEGMENT ?? DEFAULT_SITE_CONFIG.topicSegment,
    scheme: env.DATASET_URL_SCHEME ?? DEFAULT_SITE_CONFIG.scheme,
  });
}

export function getPdfDownloadTimeoutMs(): number {
  return numberEnv("PDF_DOWNLOAD_TIMEOUT_MS", DEFAULT_PDF_DOWNLOAD_TIMEOUT_MS);
}
