import type { HttpClient } from "./types";
import { describeFailure, fetchPage } from "./fetcher";

export type SitemapDocument =
  | { kind: "urlset"; urls: string[] }
  | { kind: "index"; sitemaps: string[] }
  | { kind: "invalid"; reason: string };

const XML_ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&apos;": "'",
};

function decodeXmlText(value: string): string {
  const cdata = value.match(/^<!\[CDATA\[([\s\S]*?)\]\]>$/);
  if (cdata) return cdata[1].trim();
  return value.replace(/&(amp|lt|gt|quot|apos);/g, (entity) => XML_ENTITIES[entity] ?? entity).trim();
}

function extractLocs(xml: string): string[] {
  const locs: string[] = [];
  for (const match of xml.matchAll(/<(?:[\w-]+:)?loc>\s*([\s\S]*?)\s*<\/(?:[\w-]+:)?loc>/gi)) {
    const loc = decodeXmlText(match[1]);
    if (loc) locs.push(loc);
  }
  return locs;
}

/**
 * Parses a sitemap body: an XML `<urlset>`, an XML `<sitemapindex>`, or the
 * plain-text form with one URL per line.
 */
export function parseSitemap(body: string): SitemapDocument {
  const trimmed = body.trim();
  if (!trimmed) {
    return { kind: "invalid", reason: "empty document" };
  }

  if (/<(?:[\w-]+:)?sitemapindex[\s>]/i.test(trimmed)) {
    return { kind: "index", sitemaps: extractLocs(trimmed) };
  }
  if (/<(?:[\w-]+:)?urlset[\s>]/i.test(trimmed)) {
    return { kind: "urlset", urls: extractLocs(trimmed) };
  }

  if (!trimmed.startsWith("<")) {
    const lines = trimmed.split(/\r?\n/).map((l) => l.trim()).filter(Boolean);
    if (lines.every((l) => /^https?:\/\/\S+$/i.test(l))) {
      return { kind: "urlset", urls: lines };
    }
  }

  return { kind: "invalid", reason: "no <urlset> or <sitemapindex> root element" };
}

export interface SitemapCollection {
  urls: string[];
  fetched: string[];
  warnings: string[];
}

export interface CollectSitemapOptions {
  http: HttpClient;
  userAgent: string;
  timeoutMs: number;
  maxSitemaps: number;
  maxUrls: number;
  blockPrivateNetworks: boolean;
  /** Stops the walk; sitemaps not yet fetched are left out without a warning. */
  signal?: AbortSignal;
}

/**
 * Walks sitemap indexes breadth-first, bounded by document count and total
 * URL count. A sitemap that cannot be fetched or parsed is skipped.
 */
export async function collectSitemapUrls(entryPoints: string[], options: CollectSitemapOptions): Promise<SitemapCollection> {
  const queue = [...entryPoints];
  const queued = new Set(entryPoints);
  const urls: string[] = [];
  const seenUrls = new Set<string>();
  const fetched: string[] = [];
  const warnings: string[] = [];

  while (queue.length > 0 && fetched.length < options.maxSitemaps && urls.length < options.maxUrls) {
    if (options.signal?.aborted) break;
    const sitemapUrl = queue.shift();
    if (sitemapUrl === undefined) break;
    fetched.push(sitemapUrl);

    const outcome = await fetchPage(sitemapUrl, {
      http: options.http,
      userAgent: options.userAgent,
      timeoutMs: options.timeoutMs,
      retryTimeoutMs: options.timeoutMs,
      maxRedirects: 5,
      blockPrivateNetworks: options.blockPrivateNetworks,
      signal: options.signal,
    });

    if (!outcome.ok) {
      if (outcome.failure.kind === "Aborted") break;
      warnings.push(`Skipped sitemap ${sitemapUrl}: ${describeFailure(outcome.failure)}`);
      continue;
    }

    const doc = parseSitemap(outcome.body);
    if (doc.kind === "invalid") {
      warnings.push(`Skipped sitemap ${sitemapUrl}: ${doc.reason}`);
      continue;
    }

    if (doc.kind === "index") {
      for (const child of doc.sitemaps) {
        if (!queued.has(child)) {
          queued.add(child);
          queue.push(child);
        }
      }
      continue;
    }

    for (const url of doc.urls) {
      if (urls.length >= options.maxUrls) {
        warnings.push(`Sitemap URL limit of ${options.maxUrls} reached; remaining entries ignored`);
        break;
      }
      if (!seenUrls.has(url)) {
        seenUrls.add(url);
        urls.push(url);
      }
    }
  }

  if (queue.length > 0 && fetched.length >= options.maxSitemaps) {
    warnings.push(`Sitemap limit of ${options.maxSitemaps} documents reached; ${queue.length} not fetched`);
  }

  return { urls, fetched, warnings };
}
