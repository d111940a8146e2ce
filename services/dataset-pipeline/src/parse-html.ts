import path from "node:path";

import type { SiteConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { assertDirectory, findFiles, readUtf8File } from "./files.js";
import { extractHtmlContent } from "./html/content-parser.js";
import { extractEmbeddedFields } from "./json-content.js";
import type { Logger } from "./logger.js";
import { deriveSourceUrl, extractTopic } from "./paths.js";
import type { ParsedDirectory, ParsedHtmlFile } from "./types.js";

export type ParseContext = {
  site: SiteConfig;
  logger: Logger;
};

export async function parseHtmlFile(
  filePath: string,
  context: ParseContext,
): Promise<ParsedHtmlFile | null> {
  let html: string;
  try {
    html = await readUtf8File(filePath);
  } catch (error) {
    context.logger.warn({ file: filePath, reason: errorMessage(error) }, "html_read_failed");
    return null;
  }

  const { blocks, pageData } = extractHtmlContent(html, {
    logger: context.logger.child({ file: filePath }),
  });
  const nextDataFields = pageData === null ? [] : extractEmbeddedFields(pageData);

  return {
    file_path: path.resolve(filePath),
    url: deriveSourceUrl(filePath, context.site),
    topic: extractTopic(filePath, context.site),
    filename: path.basename(filePath),
    content: blocks,
    content_count: blocks.length,
    next_data_fields: nextDataFields,
    next_data_count: nextDataFields.length,
  };
}

export async function parseHtmlDirectory(
  directory: string,
  context: ParseContext,
): Promise<ParsedDirectory<ParsedHtmlFile>> {
  await assertDirectory(directory);

  const htmlFiles = await findFiles(directory, (name) => name.endsWith(".html"));
  context.logger.info({ directory, count: htmlFiles.length }, "html_files_found");

  const files: ParsedHtmlFile[] = [];
  for (const htmlFile of htmlFiles) {
    context.logger.debug({ file: htmlFile }, "processing_file");
    const parsed = await parseHtmlFile(htmlFile, context);
    if (parsed) {
      files.push(parsed);
    }
  }

  return {
    total_files: files.length,
    source_directory: path.resolve(directory),
    files,
  };
}
