import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import type { SiteConfig } from "../src/config.js";
import { createLogger, type Logger } from "../src/logger.js";

export type LogRecord = {
  level: number;
  msg: string;
  [key: string]: unknown;
};

export const exampleSite: SiteConfig = {
  domain: "www.example.co.il",
  topicSegment: "insurance",
  scheme: "https://",
};

export function createCapturingLogger(): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const logger = createLogger({
    level: "debug",
    destination: {
      write(line: string) {
        records.push(JSON.parse(line));
      },
    },
  });
  return { logger, records };
}

export async function createTempTree(files: Record<string, string | Uint8Array>): Promise<string> {
  const root = await mkdtemp(path.join(os.tmpdir(), "dataset-pipeline-"));
  for (const [relativePath, content] of Object.entries(files)) {
    const fullPath = path.join(root, relativePath);
    await mkdir(path.dirname(fullPath), { recursive: true });
    await writeFile(fullPath, content);
  }
  return root;
}

/** Bytes that are not valid UTF-8. */
export const invalidUtf8 = Uint8Array.from([0xff, 0xfe, 0x3c]);

export async function removeTempTree(root: string): Promise<void> {
  await rm(root, { recursive: true, force: true });
}
