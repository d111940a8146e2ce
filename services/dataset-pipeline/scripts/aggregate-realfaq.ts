import { aggregateRealFaq } from "../src/aggregate.js";
import { exitWithError, parseToolArgs } from "../src/cli.js";
import { DEFAULT_OUTPUT_FILES, loadSiteConfig } from "../src/config.js";
import { writeJsonDocument } from "../src/files.js";
import { createLogger } from "../src/logger.js";

const USAGE = [
  "Usage: aggregate-realfaq <directory> [output_file | -o output_file]",
  "  <directory>   : Directory to scan for *-realfaq.json files",
  `  [output_file] : Output file name (default: ${DEFAULT_OUTPUT_FILES.aggregateFaq})`,
].join("\n");

async function main(): Promise<void> {
  const args = parseToolArgs(process.argv.slice(2), {
    usage: USAGE,
    defaultOutput: DEFAULT_OUTPUT_FILES.aggregateFaq,
  });
  const logger = createLogger({ name: "aggregate-realfaq" });

  const aggregate = await aggregateRealFaq(args.inputPath, { site: loadSiteConfig(), logger });

  await writeJsonDocument(args.outputPath, aggregate);
  logger.info(
    {
      output: args.outputPath,
      total_files: aggregate.metadata.total_files,
      files_processed: aggregate.metadata.files_processed.length,
    },
    "aggregation_complete",
  );
}

main().catch(exitWithError);
