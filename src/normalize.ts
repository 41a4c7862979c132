import * as cheerio from "cheerio";
import { isTag, isText, type AnyNode } from "domhandler";

// Never part of the visible page; often carries per-request nonces and timestamps.
const HIDDEN_SELECTOR = "script, style, noscript, template";

const BLOCK_TAGS = new Set([
  "address", "article", "aside", "blockquote", "body", "caption", "dd", "details",
  "dialog", "div", "dl", "dt", "fieldset", "figcaption", "figure", "footer", "form",
  "h1", "h2", "h3", "h4", "h5", "h6", "head", "header", "hr", "html", "li", "main",
  "nav", "ol", "option", "p", "pre", "section", "summary", "table", "tbody", "td",
  "textarea", "tfoot", "th", "thead", "title", "tr", "ul",
]);

// Text under these keeps its own line breaks and spacing
const PREFORMATTED_TAGS = new Set(["pre", "textarea", "listing", "plaintext"]);

// HTML whitespace only; a non-breaking space is content
const WHITESPACE_RUN = /[ \t\n\r\f]+/g;

class TextCollector {
  private parts: string[] = [];
  private last = "\n";

  push(text: string): void {
    if (!text) return;
    // one space between inline runs, none at the start of a line
    const next = text.startsWith(" ") && (this.last === " " || this.last === "\n") ? text.slice(1) : text;
    if (!next) return;
    this.parts.push(next);
    this.last = next.charAt(next.length - 1);
  }

  newline(): void {
    this.push("\n");
  }

  toString(): string {
    return this.parts.join("");
  }
}

function collectText(node: AnyNode, out: TextCollector, preformatted: boolean): void {
  if (isText(node)) {
    out.push(preformatted ? node.data : node.data.replace(WHITESPACE_RUN, " "));
    return;
  }
  // comments, doctype and processing instructions carry no visible text
  if (!isTag(node)) return;

  if (node.name === "br") {
    out.newline();
    return;
  }

  const block = BLOCK_TAGS.has(node.name);
  const pre = preformatted || PREFORMATTED_TAGS.has(node.name);
  if (block) out.newline();
  for (const child of node.children) collectText(child, out, pre);
  if (block) out.newline();
}

function toLines(text: string): string {
  return text
    .split(/\r\n|\r|\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join("\n");
}

function stripTags(markup: string): string {
  return markup
    .replace(/<(script|style|noscript|template)\b[\s\S]*?<\/\1\s*>/gi, "")
    .replace(/<!--[\s\S]*?-->/g, "")
    .replace(/<[^>]*>/g, " ")
    .replace(WHITESPACE_RUN, " ");
}

/**
 * Reduce page markup to its visible text: one trimmed, non-empty line per
 * block of content, whitespace inside a block collapsed to single spaces
 * (except in preformatted text). Pure; the same markup always gives the same text.
 */
export function normalize(rawMarkup: string): string {
  try {
    const $ = cheerio.load(rawMarkup);
    $(HIDDEN_SELECTOR).remove();

    const out = new TextCollector();
    for (const node of $.root().contents().toArray()) {
      collectText(node, out, false);
    }
    return toLines(out.toString());
  } catch {
    // parse5 recovers from almost anything; this covers what it does not
    return toLines(stripTags(rawMarkup));
  }
}
