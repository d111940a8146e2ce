import { Parser } from "htmlparser2";

const BREAK_AFTER = new Set(["p", "div", "li", "ul", "ol"]);

/** `href` of every anchor in document order, duplicates kept. */
export function extractLinks(html: string): string[] {
  if (!html) {
    return [];
  }

  const links: string[] = [];
  const parser = new Parser(
    {
      onopentag(name, attribs) {
        if (name === "a" && attribs.href) {
          links.push(attribs.href);
        }
      },
    },
    { decodeEntities: true },
  );

  parser.write(html);
  parser.end();
  return links;
}

export function extractPlainText(html: string): string {
  if (!html) {
    return "";
  }

  const parts: string[] = [];
  const parser = new Parser(
    {
      onopentag(name, _attribs, isImplied) {
        if (isImplied) {
          return;
        }
        if (name === "li") {
          parts.push("• ");
        } else if (name === "br") {
          parts.push("\n");
        }
      },
      ontext(data) {
        parts.push(data);
      },
      onclosetag(name, isImplied) {
        if (!isImplied && BREAK_AFTER.has(name)) {
          parts.push("\n");
        }
      },
    },
    { decodeEntities: true },
  );

  parser.write(html);
  parser.end();

  return parts
    .join("")
    .replace(/\n\s*\n/g, "\n")
    .replace(/[ \t]+/g, " ")
    .trim();
}
