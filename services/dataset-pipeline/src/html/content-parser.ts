import { Parser } from "htmlparser2";

import { PAGE_DATA_SCRIPT } from "../config.js";
import { errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { normalizeText } from "../text.js";
import type { ContentTag, JsonValue, TaggedBlock } from "../types.js";

const CONTENT_TAGS: ReadonlySet<string> = new Set<ContentTag>(["h1", "h2", "h3", "p"]);

export type ScriptSelector = {
  id: string;
  type: string;
};

export type HtmlContent = {
  blocks: TaggedBlock[];
  pageData: JsonValue | null;
};

export type ExtractHtmlContentOptions = {
  logger?: Logger;
  script?: ScriptSelector;
};

type ParserState = {
  activeTag: ContentTag | null;
  buffer: string[];
  inScript: boolean;
  scriptChunks: string[];
};

function isContentTag(name: string): name is ContentTag {
  return CONTENT_TAGS.has(name);
}

function decodePageData(chunks: string[], logger?: Logger): JsonValue | null {
  if (chunks.length === 0) {
    return null;
  }

  try {
    const value: JsonValue = JSON.parse(chunks.join(""));
    return value;
  } catch (error) {
    logger?.warn({ reason: errorMessage(error) }, "page_data_decode_failed");
    return null;
  }
}

/**
 * Walks the tag stream of one document and collects the text of every
 * h1/h2/h3/p element, plus the JSON payload of the page-data script.
 *
 * Only the innermost content tag is tracked: opening another one drops the
 * buffered text of the previous. A content tag that is only closed implicitly
 * (auto-closed by the parser or left open at end of input) emits nothing.
 */
export function extractHtmlContent(
  html: string,
  options: ExtractHtmlContentOptions = {},
): HtmlContent {
  const script = options.script ?? PAGE_DATA_SCRIPT;
  const blocks: TaggedBlock[] = [];
  const state: ParserState = {
    activeTag: null,
    buffer: [],
    inScript: false,
    scriptChunks: [],
  };

  const parser = new Parser(
    {
      onopentag(name, attribs, isImplied) {
        // A stray </p> is reported as an implied <p> followed by its close.
        if (isImplied) {
          return;
        }

        if (isContentTag(name)) {
          state.activeTag = name;
          state.buffer = [];
          return;
        }

        if (name === "script" && attribs.id === script.id && attribs.type === script.type) {
          state.inScript = true;
          state.scriptChunks = [];
        }
      },
      ontext(data) {
        if (state.activeTag) {
          state.buffer.push(data);
        } else if (state.inScript) {
          state.scriptChunks.push(data);
        }
      },
      onclosetag(name, isImplied) {
        if (isContentTag(name) && state.activeTag === name) {
          if (isImplied) {
            return;
          }

          const text = normalizeText(state.buffer.join("")).trim();
          if (text) {
            blocks.push({ tag: name, text, index: blocks.length });
          }
          state.activeTag = null;
          state.buffer = [];
          return;
        }

        if (name === "script" && state.inScript) {
          state.inScript = false;
        }
      },
    },
    { decodeEntities: true },
  );

  parser.write(html);
  parser.end();

  return {
    blocks,
    pageData: decodePageData(state.scriptChunks, options.logger),
  };
}
