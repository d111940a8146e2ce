import { cleanHtmlFragment } from "./text.js";
import type { EmbeddedField, JsonObject, JsonValue, LinkedText } from "./types.js";

export const LINK_KEYS = ["hyperlink", "href", "url", "link"] as const;

const EMBEDDED_FIELD_KEYS = new Set<string>(["text", "strHTML"]);

export function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function walkObjects(value: JsonValue, onObject: (node: JsonObject) => void): void {
  if (Array.isArray(value)) {
    for (const item of value) {
      walkObjects(item, onObject);
    }
    return;
  }

  if (!isJsonObject(value)) {
    return;
  }

  onObject(value);
  for (const child of Object.values(value)) {
    walkObjects(child, onObject);
  }
}

function findLink(value: JsonObject): string | null {
  for (const key of LINK_KEYS) {
    const candidate = value[key];
    if (typeof candidate === "string") {
      return candidate;
    }
  }
  return null;
}

/**
 * Depth-first walk that pairs every non-empty string `text` field with the
 * first string-valued link key on the same object. Link keys are never looked
 * up on parents or children.
 */
export function extractLinkedText(value: JsonValue): LinkedText[] {
  const items: LinkedText[] = [];

  walkObjects(value, (node) => {
    const text = node.text;
    if (typeof text === "string" && text) {
      items.push({ text, hyperlink: findLink(node), index: items.length });
    }
  });

  return items;
}

/** Collects `text` and `strHTML` string fields from a page-data payload. */
export function extractEmbeddedFields(value: JsonValue): EmbeddedField[] {
  const fields: EmbeddedField[] = [];

  const visit = (node: JsonValue): void => {
    if (Array.isArray(node)) {
      for (const item of node) {
        visit(item);
      }
      return;
    }

    if (!isJsonObject(node)) {
      return;
    }

    for (const [key, child] of Object.entries(node)) {
      if (EMBEDDED_FIELD_KEYS.has(key) && typeof child === "string") {
        fields.push({
          field: key === "strHTML" ? "strHTML" : "text",
          original: child,
          clean: cleanHtmlFragment(child),
          index: fields.length,
        });
        continue;
      }
      visit(child);
    }
  };

  visit(value);
  return fields;
}
