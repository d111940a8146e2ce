import path from "node:path";

import { assertDirectory, findFiles, readJsonFile } from "./files.js";
import { extractLinkedText } from "./json-content.js";
import type { ParseContext } from "./parse-html.js";
import { deriveSourceUrl, extractTopic, resolveOriginalExtension } from "./paths.js";
import type { ParsedDirectory, ParsedJsonFile } from "./types.js";

/** Text/link pairs of one Docling export, with the page it was converted from. */
export async function parseDoclingFile(
  filePath: string,
  context: ParseContext,
): Promise<ParsedJsonFile | null> {
  const data = await readJsonFile(filePath, context.logger);
  if (data === undefined) {
    return null;
  }

  const content = extractLinkedText(data);
  const extension = await resolveOriginalExtension(filePath);

  return {
    file_path: path.resolve(filePath),
    url: deriveSourceUrl(filePath, context.site, { extension, fallbackToFilename: true }),
    topic: extractTopic(filePath, context.site),
    content,
    content_count: content.length,
  };
}

export async function parseDoclingDirectory(
  directory: string,
  context: ParseContext,
): Promise<ParsedDirectory<ParsedJsonFile>> {
  await assertDirectory(directory);

  const jsonFiles = await findFiles(directory, (name) => name.endsWith(".json"));
  context.logger.info({ directory, count: jsonFiles.length }, "json_files_found");

  const files: ParsedJsonFile[] = [];
  for (const jsonFile of jsonFiles) {
    context.logger.debug({ file: jsonFile }, "processing_file");
    const parsed = await parseDoclingFile(jsonFile, context);
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
