import { extractLinks, extractPlainText } from "./html/fragments.js";
import { isJsonObject } from "./json-content.js";
import { normalizeText } from "./text.js";
import type { JsonObject, JsonValue } from "./types.js";

function uniqueInOrder(values: string[]): string[] {
  return Array.from(new Set(values));
}

/**
 * Adds `answer_text` (plain-text answer) and `more_reference` (links from the
 * question, then the answer, each once) to an FAQ record, and strips invisible
 * characters from the question and answer HTML. Fields that are not strings
 * are left as they are.
 */
export function processFaqRecord(faq: JsonObject): JsonObject {
  const question = faq.question ?? "";
  const answer = faq.answer ?? "";
  const links: string[] = [];

  const processed: JsonObject = { ...faq };

  if (typeof question === "string") {
    links.push(...extractLinks(question));
    processed.question = normalizeText(question);
  }

  if (typeof answer === "string") {
    links.push(...extractLinks(answer));
    processed.answer = normalizeText(answer);
    processed.answer_text = normalizeText(extractPlainText(answer));
  } else {
    processed.answer_text = "";
  }

  processed.more_reference = uniqueInOrder(links);
  return processed;
}

/** Applies {@link processFaqRecord} to every object under a top-level `faqs` array. */
export function processFaqContent(data: JsonValue): JsonValue {
  if (!isJsonObject(data) || !Array.isArray(data.faqs)) {
    return data;
  }

  return {
    ...data,
    faqs: data.faqs.map((faq) => (isJsonObject(faq) ? processFaqRecord(faq) : faq)),
  };
}
