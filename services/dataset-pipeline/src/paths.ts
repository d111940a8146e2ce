import { access } from "node:fs/promises";
import path from "node:path";

import { REALFAQ_SUFFIX, TOPICS_FAQ_DIR, TOPICS_FAQ_SUFFIX, type SiteConfig } from "./config.js";

export type OriginalExtension = ".html" | ".pdf";

export type DeriveSourceUrlOptions = {
  extension?: OriginalExtension;
  fallbackToFilename?: boolean;
};

const REALFAQ_MARKER = REALFAQ_SUFFIX.replace(/\.json$/, "");

export function toPosixPath(value: string): string {
  return value.split(path.sep).join("/");
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/** Which sibling of a converted JSON file exists on disk; `.html` when neither does. */
export async function resolveOriginalExtension(jsonPath: string): Promise<OriginalExtension> {
  const parsed = path.parse(jsonPath);
  const base = path.join(parsed.dir, parsed.name);

  if (await fileExists(`${base}.html`)) {
    return ".html";
  }
  if (await fileExists(`${base}.pdf`)) {
    return ".pdf";
  }
  return ".html";
}

export function deriveSourceUrl(
  filePath: string,
  site: SiteConfig,
  options: DeriveSourceUrlOptions = {},
): string | null {
  const normalized = toPosixPath(filePath);
  const start = normalized.indexOf(site.domain);

  let urlPath: string;
  if (start !== -1) {
    urlPath = normalized.slice(start);
  } else if (options.fallbackToFilename) {
    urlPath = `${site.domain}/${path.posix.basename(normalized)}`;
  } else {
    return null;
  }

  if (options.extension && urlPath.endsWith(".json")) {
    urlPath = `${urlPath.slice(0, -".json".length)}${options.extension}`;
  }

  if (!urlPath.startsWith("http")) {
    urlPath = `${site.scheme}${urlPath}`;
  }

  return urlPath;
}

export function extractTopic(pathOrUrl: string, site: SiteConfig): string | null {
  const marker = `${site.domain}/${site.topicSegment}/`;
  const normalized = toPosixPath(pathOrUrl);
  const start = normalized.indexOf(marker);
  if (start === -1) {
    return null;
  }

  const segment = normalized.slice(start + marker.length).split("/")[0] ?? "";
  const topic = segment.split(".")[0] ?? "";
  return topic || null;
}

/**
 * Source page of an FAQ export, from its path relative to the scan root.
 * A path that embeds the site domain wins over the `topics-faq/` short form.
 */
export function deriveFaqSourceUrl(relativePath: string, site: SiteConfig): string | null {
  const normalized = toPosixPath(relativePath);

  const start = normalized.indexOf(site.domain);
  if (start !== -1) {
    const end = normalized.indexOf(REALFAQ_MARKER, start);
    if (end !== -1) {
      return `${site.scheme}${normalized.slice(start, end)}.html`;
    }
  }

  if (normalized.startsWith(`${TOPICS_FAQ_DIR}/`) && normalized.includes(TOPICS_FAQ_SUFFIX)) {
    const topic = path.posix.basename(normalized).replace(TOPICS_FAQ_SUFFIX, "");
    return `${site.scheme}${site.domain}/${site.topicSegment}/${topic}/information/faq/`;
  }

  return null;
}
