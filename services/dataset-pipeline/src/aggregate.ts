import path from "node:path";

import { REALFAQ_SUFFIX } from "./config.js";
import { processFaqContent } from "./faq.js";
import { assertDirectory, findFiles, readJsonFile } from "./files.js";
import type { ParseContext } from "./parse-html.js";
import { deriveFaqSourceUrl, extractTopic, toPosixPath } from "./paths.js";
import type { AggregateDocument } from "./types.js";

export async function findRealFaqFiles(directory: string): Promise<string[]> {
  await assertDirectory(directory);
  return findFiles(directory, (name) => name.endsWith(REALFAQ_SUFFIX));
}

/**
 * Merges every `*-realfaq.json` export under `directory` into one document.
 * `metadata.total_files` counts every file found; files that fail to parse
 * are logged and left out of `files_processed` and `content`.
 */
export async function aggregateRealFaq(
  directory: string,
  context: ParseContext,
): Promise<AggregateDocument> {
  const realFaqFiles = await findRealFaqFiles(directory);

  if (realFaqFiles.length === 0) {
    context.logger.warn({ directory }, "no_realfaq_files_found");
  } else {
    context.logger.info({ directory, count: realFaqFiles.length }, "realfaq_files_found");
  }

  const aggregate: AggregateDocument = {
    metadata: {
      total_files: realFaqFiles.length,
      source_directory: path.resolve(directory),
      files_processed: [],
    },
    content: [],
  };

  for (const filePath of realFaqFiles) {
    context.logger.debug({ file: filePath }, "processing_file");
    const data = await readJsonFile(filePath, context.logger);
    if (data === undefined) {
      continue;
    }

    const sourceFile = toPosixPath(path.relative(directory, filePath));
    const sourceUrl = deriveFaqSourceUrl(sourceFile, context.site);

    aggregate.content.push({
      source_file: sourceFile,
      topic: sourceUrl ? extractTopic(sourceUrl, context.site) : null,
      source_url: sourceUrl,
      data: processFaqContent(data),
    });
    aggregate.metadata.files_processed.push(sourceFile);
  }

  return aggregate;
}
