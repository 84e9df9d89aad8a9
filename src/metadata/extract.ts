/**
 * Regex-based extraction of article title and author from raw HTML.
 *
 * Only single-page metadata is read: meta tags, <title>, and the first
 * element carrying a known author class.
 */

const AUTHOR_META_KEYS = [
  "author",
  "article:author",
  "og:article:author",
  "twitter:creator",
] as const;

const AUTHOR_CLASSES = ["author", "byline", "author-name", "post-author"] as const;

const AUTHOR_PREFIXES = ["By ", "by ", "Written by ", "Author: "] as const;

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
  ndash: "–",
  mdash: "—",
  lsquo: "‘",
  rsquo: "’",
  ldquo: "“",
  rdquo: "”",
  hellip: "…",
};

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

function fromCodePoint(code: number): string {
  return Number.isInteger(code) && code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : "";
}

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity[0] === "#") {
      const code =
        entity[1] === "x" || entity[1] === "X"
          ? Number.parseInt(entity.slice(2), 16)
          : Number.parseInt(entity.slice(1), 10);
      return fromCodePoint(code);
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });
}

export const normalizeWhitespace = (text: string): string =>
  text.replace(/\s+/g, " ").trim();

const stripTags = (html: string): string =>
  html
    .replace(/<script[\s\S]*?<\/script>/gi, " ")
    .replace(/<style[\s\S]*?<\/style>/gi, " ")
    .replace(/<[^>]+>/g, " ");

function clean(value: string): string | null {
  const text = normalizeWhitespace(decodeEntities(value));
  return text || null;
}

/**
 * Content of the first <meta> whose name/property/itemprop equals `key`.
 */
export function findMetaContent(html: string, key: string): string | null {
  const metaRe = new RegExp(
    `<meta\\b[^>]*\\b(?:property|name|itemprop)\\s*=\\s*["']${escapeRegExp(key)}["'][^>]*>`,
    "gi"
  );

  for (const match of html.matchAll(metaRe)) {
    const content = match[0].match(/\bcontent\s*=\s*(["'])([\s\S]*?)\1/i);
    const value = content ? clean(content[2]) : null;
    if (value) return value;
  }
  return null;
}

/**
 * Text of the first element whose class list contains `className`.
 */
export function findElementTextByClass(html: string, className: string): string | null {
  const openTagRe = /<([a-z][a-z0-9-]*)\b[^>]*\bclass\s*=\s*(["'])([^"']*)\2[^>]*>/gi;

  for (const match of html.matchAll(openTagRe)) {
    const classes = match[3].split(/\s+/);
    if (!classes.includes(className)) continue;

    const tagName = match[1];
    const start = (match.index ?? 0) + match[0].length;
    const close = html.slice(start).search(new RegExp(`</${escapeRegExp(tagName)}\\s*>`, "i"));
    if (close === -1) continue;

    const text = clean(stripTags(html.slice(start, start + close)));
    if (text) return text;
  }
  return null;
}

export function extractTitle(html: string): string | null {
  const ogTitle = findMetaContent(html, "og:title");
  if (ogTitle) return ogTitle;

  const titleMatch = html.match(/<title[^>]*>([\s\S]*?)<\/title>/i);
  return titleMatch ? clean(titleMatch[1]) : null;
}

export function extractAuthor(html: string): string | null {
  for (const key of AUTHOR_META_KEYS) {
    const author = findMetaContent(html, key);
    if (author) return author;
  }

  for (const className of AUTHOR_CLASSES) {
    const text = findElementTextByClass(html, className);
    if (text) return stripAuthorPrefix(text);
  }

  return null;
}

export function stripAuthorPrefix(text: string): string {
  let result = text;
  for (const prefix of AUTHOR_PREFIXES) {
    if (result.startsWith(prefix)) {
      result = result.slice(prefix.length);
    }
  }
  return result.trim();
}
