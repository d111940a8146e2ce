import { exitWithError, parseToolArgs } from "../src/cli.js";
import { getPdfDownloadTimeoutMs, loadSiteConfig } from "../src/config.js";
import { createLogger } from "../src/logger.js";
import { scanAndDownloadPdfs } from "../src/pdf-links.js";

const USAGE = "Usage: extract-pdf-links <input_dir> <output_dir>";

async function main(): Promise<void> {
  const args = parseToolArgs(process.argv.slice(2), { usage: USAGE });
  const logger = createLogger({ name: "extract-pdf-links" });

  const summary = await scanAndDownloadPdfs(args.inputPath, args.outputPath, {
    site: loadSiteConfig(),
    logger,
    timeoutMs: getPdfDownloadTimeoutMs(),
  });

  logger.info(
    {
      scanned_files: summary.scanned_files,
      unique_urls: summary.unique_urls.length,
      downloaded: summary.downloaded,
      skipped: summary.skipped,
      failed: summary.failed,
    },
    "pdf_scan_complete",
  );
}

main().catch(exitWithError);
