import { decodeHTML } from "entities";

const INVISIBLE_CHARS = /[\u200b\u200c\u200d\u2060\ufeff\u2028\u2029]/g;
const NO_BREAK_SPACE = /\u00a0/g;

/**
 * Removes zero-width and separator characters that survive HTML decoding and
 * turns no-break spaces into plain spaces. Whitespace is otherwise untouched.
 */
export function normalizeText(value: string): string {
  if (!value) {
    return value;
  }
  return value.replace(INVISIBLE_CHARS, "").replace(NO_BREAK_SPACE, " ");
}

export function stripTags(value: string): string {
  return value.replace(/<[^>]+>/g, "");
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/** Tags removed, entities decoded, whitespace runs collapsed to one space. */
export function cleanHtmlFragment(html: string): string {
  return collapseWhitespace(decodeHTML(stripTags(html)));
}
