import * as cheerio from "cheerio";
import { isText } from "domhandler";
import { parseDateText } from "../normalize/date";
import { RawArtifact } from "../types/rawArtifact";
import { collapseWhitespace } from "../utils/text";

export interface ParsedListingEntry {
  name: string;
  modifiedAt: Date | null;
}

function looksLikeHtml(artifact: RawArtifact): boolean {
  if (artifact.contentType?.toLowerCase().includes("html")) return true;
  return /<a\s[^>]*href=/i.test(artifact.body);
}

function entryName(href: string): string | null {
  if (!href || href.startsWith("?") || href.startsWith("#") || href.startsWith("/")) return null;
  if (href.includes("://") || href.startsWith("mailto:")) return null;
  const path = href.split(/[?#]/)[0].replace(/^\.\//, "").replace(/\/$/, "");
  const last = path.split("/").pop() ?? "";
  let name = last;
  try {
    name = decodeURIComponent(last);
  } catch {
    name = last;
  }
  return name && name !== ".." && name !== "." ? name : null;
}

function dateFromContext(context: string, name: string): Date | null {
  return parseDateText(context.replace(name, " ")) ?? parseDateText(name);
}

function parseHtmlIndex(html: string): ParsedListingEntry[] {
  const $ = cheerio.load(html);
  const entries: ParsedListingEntry[] = [];
  const seen = new Set<string>();

  $("a[href]").each((_, element) => {
    const name = entryName($(element).attr("href") ?? "");
    if (!name || seen.has(name)) return;
    seen.add(name);

    const row = $(element).closest("tr");
    let context = row.length ? row.text() : $(element).text();
    if (!row.length && element.next && isText(element.next)) {
      context += ` ${element.next.data}`;
    }
    entries.push({ name, modifiedAt: dateFromContext(collapseWhitespace(context), name) });
  });

  return entries;
}

function parseTextListing(text: string): ParsedListingEntry[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => {
      const tokens = line.split(/\s+/);
      const name = tokens[tokens.length - 1];
      return { name, modifiedAt: dateFromContext(line, name) };
    })
    .filter((entry) => entry.name !== "." && entry.name !== "..");
}

/**
 * Entries of a directory listing: the transport's structured listing when
 * present, otherwise an HTML index page or a plain one-entry-per-line body.
 */
export function parseListing(artifact: RawArtifact): ParsedListingEntry[] {
  if (artifact.listing) {
    return artifact.listing.map((entry) => ({
      name: entry.name,
      modifiedAt: entry.modifiedAt ?? parseDateText(entry.name)
    }));
  }
  if (artifact.body.trim().length === 0) return [];
  return looksLikeHtml(artifact) ? parseHtmlIndex(artifact.body) : parseTextListing(artifact.body);
}
