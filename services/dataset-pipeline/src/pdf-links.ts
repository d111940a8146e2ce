import { access, mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import type { SiteConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { assertDirectory, findFiles } from "./files.js";
import type { Logger } from "./logger.js";

export type DownloadOutcome = "downloaded" | "skipped" | "failed";

export type PdfScanSummary = {
  scanned_files: number;
  unique_urls: string[];
  downloaded: number;
  skipped: number;
  failed: number;
};

export type PdfScanContext = {
  site: SiteConfig;
  logger: Logger;
  timeoutMs: number;
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Media-host PDF links, e.g. `https://media.<site>/media/…/file.pdf`. */
export function buildPdfUrlPattern(site: SiteConfig): RegExp {
  const mediaHost = `media.${site.domain.replace(/^www\./, "")}`;
  return new RegExp(`${escapeRegExp(site.scheme)}${escapeRegExp(mediaHost)}/media/.*?\\.pdf`, "gi");
}

export function findPdfUrls(text: string, pattern: RegExp): string[] {
  return Array.from(text.matchAll(pattern), (match) => match[0]);
}

/** Fetches `url` and reads the whole body; the timeout covers both. */
export async function fetchPdf(url: string, timeoutMs: number): Promise<Buffer> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetch(url, { signal: controller.signal });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} for ${url}`);
    }
    return Buffer.from(await response.arrayBuffer());
  } finally {
    clearTimeout(timeout);
  }
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

export function pdfFileName(url: string): string {
  return path.posix.basename(new URL(url).pathname);
}

/** Downloads one PDF into `outputDir`; an existing file of the same name is kept. */
export async function downloadPdf(
  url: string,
  outputDir: string,
  context: Pick<PdfScanContext, "logger" | "timeoutMs">,
): Promise<DownloadOutcome> {
  try {
    const fileName = pdfFileName(url);
    const outputPath = path.join(outputDir, fileName);
    if (await exists(outputPath)) {
      return "skipped";
    }

    const body = await fetchPdf(url, context.timeoutMs);
    await writeFile(outputPath, body);
    context.logger.info({ url, file: fileName }, "pdf_downloaded");
    return "downloaded";
  } catch (error) {
    context.logger.warn({ url, reason: errorMessage(error) }, "pdf_download_failed");
    return "failed";
  }
}

/**
 * Scans every file under `inputDir` for media-host PDF links and downloads
 * each distinct link once. Unreadable files and failed downloads are logged
 * and skipped.
 */
export async function scanAndDownloadPdfs(
  inputDir: string,
  outputDir: string,
  context: PdfScanContext,
): Promise<PdfScanSummary> {
  await assertDirectory(inputDir);
  await mkdir(outputDir, { recursive: true });

  const pattern = buildPdfUrlPattern(context.site);
  const files = await findFiles(inputDir, () => true);
  const seen = new Set<string>();
  const summary: PdfScanSummary = {
    scanned_files: 0,
    unique_urls: [],
    downloaded: 0,
    skipped: 0,
    failed: 0,
  };

  for (const filePath of files) {
    let text: string;
    try {
      text = await readFile(filePath, "utf8");
    } catch (error) {
      context.logger.warn({ file: filePath, reason: errorMessage(error) }, "file_read_failed");
      continue;
    }
    summary.scanned_files += 1;

    for (const url of findPdfUrls(text, pattern)) {
      if (seen.has(url)) {
        continue;
      }
      seen.add(url);
      summary.unique_urls.push(url);
      context.logger.info({ url }, "pdf_link_found");

      const outcome = await downloadPdf(url, outputDir, context);
      summary[outcome] += 1;
    }
  }

  return summary;
}
