import * as cheerio from "cheerio";

// iOS/iPad "install as app" banners picked up by the web scraper.
const NOISE_PATTERNS: RegExp[] = [
  /install\s+pwa\s+using\s+add\s+to\s+home\s+screen/i,
  /for\s+ios\s+and\s+ipad\s+browsers.*add\s+to\s+(home\s+screen|dock)/i,
  /add\s+to\s+home\s+screen\s+in\s+ios\s+safari/i,
];

const URL_RE = /\bhttps?:\/\/\S+|\bwww\.\S+/gi;
const HASHTAG_RE = /#[^\s#]+/g;
const EMPHASIS_RE = /\*\*|__/g;
const HTML_RE = /<\/?[a-z][a-z0-9]*(?:\s[^<>]*)?\/?>/i;
const LEADING_JUNK_RE = /^[\s\-•●*·–—,;:.]+/;
const TRAILING_JUNK_RE = /[\s\-•●*·–—,;:]+$/;

/**
 * Split like a line reader would: CR, LF and CRLF all end a line, and a
 * trailing newline does not produce an extra empty line.
 */
export function splitLines(text: string): string[] {
  if (!text) return [];
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/**
 * Strip diacritics and lowercase a string so that e.g.
 * "Trípoli" matches a query of "tripoli".
 */
export function foldText(s: string): string {
  return stripDiacritics(s).toLowerCase();
}

export function stripDiacritics(s: string): string {
  return s.normalize("NFD").replace(/[\u0300-\u036f]/g, "");
}

export function collapseWhitespace(s: string): string {
  return s.replace(/\s+/g, " ").trim();
}

/** Whitespace-collapsed, lowercased join of the parts; used as a dedup key. */
export function normalizeKey(...parts: Array<string | null | undefined>): string {
  return collapseWhitespace(parts.map((p) => p ?? "").join(" ")).toLowerCase();
}

export function looksLikeHtml(text: string): boolean {
  return HTML_RE.test(text);
}

export function htmlToText(html: string): string {
  const $ = cheerio.load(html);
  $("script, style, noscript").remove();
  $("br").replaceWith("\n");
  $("p, div, li, h1, h2, h3, h4, h5, h6, tr").append("\n");
  return $.root().text();
}

export function removeNoiseLines(text: string): string {
  if (!text) return text;
  return text
    .split(/\r?\n/)
    .filter((line) => !NOISE_PATTERNS.some((p) => p.test(line.trim())))
    .join("\n");
}

export function extractUrls(text: string): string[] {
  return Array.from(text.matchAll(URL_RE), (m) => m[0].replace(/[)\].,;]+$/, ""));
}

export function stripUrlsAndHashtags(text: string): string {
  return text.replace(URL_RE, " ").replace(HASHTAG_RE, " ");
}

/**
 * Reduce a raw message to a single clean line of text. Never throws;
 * empty input gives empty output.
 */
export function normalizeText(raw: string | null | undefined): string {
  if (!raw) return "";
  let text = looksLikeHtml(raw) ? htmlToText(raw) : raw;
  text = removeNoiseLines(text);
  text = stripUrlsAndHashtags(text).replace(EMPHASIS_RE, "");
  text = collapseWhitespace(text);
  return text.replace(LEADING_JUNK_RE, "").replace(TRAILING_JUNK_RE, "");
}

/**
 * Short summary for report rows: drops attribution lines ("via ..."),
 * keeps the first two sentences and caps the length.
 */
export function cleanSummary(text: string, maxLength = 600): string {
  const lines = removeNoiseLines(text)
    .split(/\r?\n/)
    .map((line) => collapseWhitespace(stripUrlsAndHashtags(line).replace(EMPHASIS_RE, "")))
    .filter((line) => line && !/^via\s/i.test(line));

  const joined = lines.join(" ").replace(LEADING_JUNK_RE, "");
  const sentences = joined.split(/(?<=[.!?])\s+/).filter(Boolean);
  let out = sentences.slice(0, 2).join(" ").trim();
  if (out.length > maxLength) {
    out = `${out.slice(0, maxLength - 3).trimEnd()}...`;
  }
  return out;
}
