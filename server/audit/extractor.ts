import * as cheerio from "cheerio";
import type { ExtractedPage } from "./types";
import { normalizeUrl, isSameSite, resolveUrl } from "./url-utils";

const NON_CONTENT_SELECTORS = ["script", "style", "noscript", "template", "svg", "iframe"];

export function emptyExtraction(): ExtractedPage {
  return {
    title: null,
    metaDescription: null,
    canonical: null,
    h1: [],
    outboundLinks: [],
    internalLinks: [],
    internalHrefs: [],
    externalLinks: [],
    imageCount: 0,
    imagesWithoutAlt: 0,
    structuredDataTypes: [],
    scriptCount: 0,
    textLength: 0,
  };
}

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function nonEmpty(value: string | undefined): string | null {
  if (value === undefined) return null;
  const collapsed = collapse(value);
  return collapsed ? collapsed : null;
}

function collectTypes(value: unknown, types: Set<string>): void {
  if (Array.isArray(value)) {
    value.forEach((item) => collectTypes(item, types));
    return;
  }
  if (typeof value !== "object" || value === null) return;

  for (const [key, child] of Object.entries(value)) {
    if (key === "@type") {
      const typeValues = Array.isArray(child) ? child : [child];
      for (const t of typeValues) {
        if (typeof t === "string") types.add(t);
      }
    } else if (typeof child === "object" && child !== null) {
      collectTypes(child, types);
    }
  }
}

function extractStructuredDataTypes($: cheerio.CheerioAPI): string[] {
  const types = new Set<string>();

  $('script[type="application/ld+json"]').each((_, el) => {
    const raw = $(el).text().trim();
    if (!raw) return;
    try {
      collectTypes(JSON.parse(raw), types);
    } catch {
      // Malformed JSON-LD counts as no structured data.
      return;
    }
  });

  return Array.from(types).sort();
}

/** Resolved but not normalized: relative links depend on the trailing slash. */
function resolveBase(baseHref: string | undefined, url: string): string {
  if (!baseHref) return url;
  try {
    const resolved = new URL(baseHref, url);
    return resolved.protocol === "http:" || resolved.protocol === "https:" ? resolved.toString() : url;
  } catch {
    return url;
  }
}

/**
 * Reads the SEO-relevant fields out of an HTML document. Links are resolved
 * against `url` (or a `<base href>`) and split into internal and external by
 * site, relative to `rootUrl`.
 */
export function extractPageData(
  html: string,
  url: string,
  rootUrl: string,
  includeSubdomains = false
): ExtractedPage {
  const $ = cheerio.load(html);

  const title = nonEmpty($("title").first().text());

  const metaDescription = nonEmpty($('meta[name="description" i]').attr("content"));

  const base = resolveBase($("base[href]").attr("href"), url);

  const canonicalHref = $('link[rel="canonical" i]').attr("href");
  const canonical = canonicalHref ? normalizeUrl(canonicalHref, base) : null;

  const h1: string[] = [];
  $("h1").each((_, el) => {
    h1.push(collapse($(el).text()));
  });

  const outboundLinks: string[] = [];
  const internalLinks: string[] = [];
  const internalHrefs: string[] = [];
  const externalLinks: string[] = [];
  const seenLinks = new Set<string>();
  $("a[href]").each((_, el) => {
    const href = $(el).attr("href");
    if (href === undefined) return;
    outboundLinks.push(href);

    const normalized = normalizeUrl(href, base);
    if (!normalized || seenLinks.has(normalized)) return;
    seenLinks.add(normalized);

    if (isSameSite(normalized, rootUrl, includeSubdomains)) {
      internalLinks.push(normalized);
      internalHrefs.push(resolveUrl(href, base) ?? normalized);
    } else {
      externalLinks.push(normalized);
    }
  });

  const images = $("img");
  let imagesWithoutAlt = 0;
  images.each((_, el) => {
    const alt = $(el).attr("alt");
    if (alt === undefined) imagesWithoutAlt++;
  });

  const structuredDataTypes = extractStructuredDataTypes($);
  const scriptCount = $("script").length;

  const $body = $("body").clone();
  NON_CONTENT_SELECTORS.forEach((sel) => {
    $body.find(sel).remove();
  });
  const textLength = collapse($body.text()).length;

  return {
    title,
    metaDescription,
    canonical,
    h1,
    outboundLinks,
    internalLinks,
    internalHrefs,
    externalLinks,
    imageCount: images.length,
    imagesWithoutAlt,
    structuredDataTypes,
    scriptCount,
    textLength,
  };
}

export function isHtmlContent(contentType: string, body: string): boolean {
  if (contentType) {
    return /text\/html|application\/xhtml\+xml/i.test(contentType);
  }
  return /^\s*(<!doctype html|<html[\s>])/i.test(body);
}
