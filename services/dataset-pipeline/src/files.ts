import { readdir, readFile, stat, writeFile } from "node:fs/promises";
import path from "node:path";

import { DirectoryNotFoundError, errorMessage, OutputWriteError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { JsonValue } from "./types.js";

const utf8 = new TextDecoder("utf-8", { fatal: true });

export async function assertDirectory(directory: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(directory)).isDirectory();
  } catch {
    throw new DirectoryNotFoundError(directory);
  }

  if (!isDirectory) {
    throw new DirectoryNotFoundError(directory, "not_a_directory");
  }
}

function compareNames(left: string, right: string): number {
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
}

/**
 * Depth-first listing of regular files under `root` whose name satisfies
 * `matches`. Entries of each directory are visited in name order so repeated
 * runs over the same tree produce the same sequence.
 */
export async function findFiles(
  root: string,
  matches: (fileName: string) => boolean,
): Promise<string[]> {
  const found: string[] = [];

  const visit = async (directory: string): Promise<void> => {
    const entries = await readdir(directory, { withFileTypes: true });
    entries.sort((left, right) => compareNames(left.name, right.name));

    for (const entry of entries) {
      const fullPath = path.join(directory, entry.name);
      if (entry.isDirectory()) {
        await visit(fullPath);
      } else if (entry.isFile() && matches(entry.name)) {
        found.push(fullPath);
      }
    }
  };

  await visit(root);
  return found;
}

/** Reads a file as strict UTF-8; invalid byte sequences throw. */
export async function readUtf8File(filePath: string): Promise<string> {
  return utf8.decode(await readFile(filePath));
}

/**
 * Reads and decodes one JSON file. Read, decode and parse failures are logged
 * as `json_parse_failed` and yield `undefined`.
 */
export async function readJsonFile(filePath: string, logger: Logger): Promise<JsonValue | undefined> {
  try {
    const value: JsonValue = JSON.parse(await readUtf8File(filePath));
    return value;
  } catch (error) {
    logger.warn({ file: filePath, reason: errorMessage(error) }, "json_parse_failed");
    return undefined;
  }
}

export async function writeJsonDocument(outputFile: string, document: unknown): Promise<void> {
  try {
    await writeFile(outputFile, JSON.stringify(document, null, 2), "utf8");
  } catch (error) {
    throw new OutputWriteError(outputFile, error);
  }
}
