import { exitWithError, parseToolArgs } from "../src/cli.js";
import { DEFAULT_OUTPUT_FILES, loadSiteConfig } from "../src/config.js";
import { writeJsonDocument } from "../src/files.js";
import { createLogger } from "../src/logger.js";
import { parseHtmlDirectory } from "../src/parse-html.js";

const USAGE = [
  "Usage: parse-html-files <directory> [output_file]",
  "  <directory>   : Directory containing HTML files",
  `  [output_file] : Optional output JSON file (default: ${DEFAULT_OUTPUT_FILES.parseHtml})`,
].join("\n");

async function main(): Promise<void> {
  const args = parseToolArgs(process.argv.slice(2), {
    usage: USAGE,
    defaultOutput: DEFAULT_OUTPUT_FILES.parseHtml,
  });
  const logger = createLogger({ name: "parse-html-files" });

  logger.info({ directory: args.inputPath }, "processing_directory");
  const result = await parseHtmlDirectory(args.inputPath, { site: loadSiteConfig(), logger });

  await writeJsonDocument(args.outputPath, result);
  logger.info({ processed: result.total_files, output: args.outputPath }, "output_written");
}

main().catch(exitWithError);
