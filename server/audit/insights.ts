import { FINDING_CATEGORIES } from "./types";
import type { Finding, FindingCategory, LinkGraph, PageRecord } from "./types";
import { describeFailure } from "./fetcher";
import { normalizeUrl } from "./url-utils";

export const DEFAULT_THIN_CONTENT_THRESHOLD = 2048;
export const DEFAULT_DEEP_PAGE_THRESHOLD = 4;

const TITLE_LENGTH = { min: 30, max: 60 };
const META_DESCRIPTION_LENGTH = { min: 120, max: 160 };
const LONG_URL_LENGTH = 100;
const RENDERED_TEXT_FLOOR = 100;

export interface AnalyzeOptions {
  /** Normalized, in-scope URLs declared by the site's sitemaps. */
  sitemapUrls?: string[];
  thinContentThreshold?: number;
  deepPageThreshold?: number;
  /** Defaults to the graph's first seed. */
  rootUrl?: string;
}

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? "" : "s"}`;
}

function htmlResponses(pages: PageRecord[]): PageRecord[] {
  return pages.filter((p) => !p.failure && p.isHtml && p.statusCode === 200);
}

/**
 * One record per fetched HTML document. Records that redirected to the same
 * final URL describe one document: the record crawled at that URL wins,
 * otherwise the first by URL.
 */
export function htmlPages(pages: PageRecord[]): PageRecord[] {
  const byDocument = new Map<string, PageRecord>();
  for (const page of htmlResponses(pages)) {
    const key = normalizeUrl(page.finalUrl) ?? page.url;
    const current = byDocument.get(key);
    if (!current || page.url === key || (current.url !== key && page.url < current.url)) {
      byDocument.set(key, page);
    }
  }
  return Array.from(byDocument.values());
}

function hasH1(page: PageRecord): boolean {
  return page.h1.some((text) => text.length > 0);
}

function duplicates(
  pages: PageRecord[],
  category: "DUPLICATE_TITLE" | "DUPLICATE_META",
  pick: (page: PageRecord) => string | null,
  label: string
): Finding[] {
  const groups = new Map<string, string[]>();
  for (const page of htmlPages(pages)) {
    const raw = pick(page);
    if (raw === null) continue;
    const key = collapse(raw);
    if (!key) continue;
    const members = groups.get(key) ?? [];
    members.push(page.url);
    groups.set(key, members);
  }

  const findings: Finding[] = [];
  groups.forEach((urls, text) => {
    if (urls.length < 2) return;
    findings.push({
      category,
      severity: category === "DUPLICATE_TITLE" ? "med" : "low",
      urls: [...urls].sort(),
      message: `${urls.length} pages share the same ${label}`,
      detail: text,
    });
  });
  return findings;
}

export function findDuplicateTitles(pages: PageRecord[]): Finding[] {
  return duplicates(pages, "DUPLICATE_TITLE", (p) => p.title, "title");
}

export function findDuplicateMeta(pages: PageRecord[]): Finding[] {
  return duplicates(pages, "DUPLICATE_META", (p) => p.metaDescription, "meta description");
}

export function findMissingMeta(pages: PageRecord[]): Finding[] {
  const findings: Finding[] = [];
  for (const page of htmlPages(pages)) {
    if (page.title === null) {
      findings.push({ category: "MISSING_META", severity: "high", urls: [page.url], message: "Missing <title>" });
    }
    if (page.metaDescription === null) {
      findings.push({ category: "MISSING_META", severity: "med", urls: [page.url], message: "Missing meta description" });
    }
    if (!hasH1(page)) {
      findings.push({ category: "MISSING_META", severity: "med", urls: [page.url], message: "Missing H1" });
    }
  }
  return findings;
}

export function findBrokenLinks(pages: PageRecord[], graph: LinkGraph, sitemapUrls: string[] = []): Finding[] {
  const inbound = new Map<string, Set<string>>();
  for (const edge of graph.edges) {
    const sources = inbound.get(edge.target) ?? new Set<string>();
    sources.add(edge.source);
    inbound.set(edge.target, sources);
  }
  const declared = new Set(sitemapUrls);

  const findings: Finding[] = [];
  for (const page of pages) {
    if (!page.failure) continue;
    const sources = Array.from(inbound.get(page.url) ?? []).sort();
    const reason = describeFailure(page.failure);

    let where: string;
    if (sources.length > 0) {
      where = `linked from ${plural(sources.length, "page")}`;
    } else if (declared.has(page.url)) {
      where = "declared in the sitemap";
    } else {
      where = "requested as a crawl seed";
    }

    findings.push({
      category: "BROKEN_LINK",
      severity: "high",
      urls: [page.url, ...sources],
      message: `${reason} (${where})`,
      detail: page.failure.message,
    });
  }
  return findings;
}

export function findRedirectChains(pages: PageRecord[]): Finding[] {
  return pages
    .filter((p) => p.redirectChain.length > 1)
    .map((p): Finding => {
      const hops = p.redirectChain.length - 1;
      return {
        category: "REDIRECT_CHAIN",
        severity: p.redirectChain.length >= 3 ? "high" : "med",
        urls: [...p.redirectChain],
        message: `${plural(hops, "redirect")} before the final response`,
      };
    });
}

/** Sitemap seeds are graph seeds too, so this reads edges rather than `graph.orphans`. */
export function findOrphanPages(graph: LinkGraph, sitemapUrls: string[], rootUrl = graph.seeds[0]): Finding[] {
  const linked = new Set(graph.edges.map((e) => e.target));
  return Array.from(new Set(sitemapUrls))
    .filter((url) => !linked.has(url) && url !== rootUrl)
    .map((url): Finding => ({
      category: "ORPHAN_PAGE",
      severity: "med",
      urls: [url],
      message: "Declared in the sitemap but no crawled page links to it",
    }));
}

export function findThinContent(pages: PageRecord[], threshold = DEFAULT_THIN_CONTENT_THRESHOLD): Finding[] {
  return htmlPages(pages)
    .filter((p) => p.contentLength < threshold)
    .map((p): Finding => ({
      category: "THIN_CONTENT",
      severity: "low",
      urls: [p.url],
      message: `Only ${p.contentLength} bytes of HTML (threshold ${threshold})`,
    }));
}

export function findMultipleH1(pages: PageRecord[]): Finding[] {
  return htmlPages(pages)
    .filter((p) => p.h1.length > 1)
    .map((p): Finding => ({
      category: "MULTIPLE_H1",
      severity: "low",
      urls: [p.url],
      message: `${p.h1.length} H1 elements on the page`,
    }));
}

export function findCanonicalIssues(pages: PageRecord[]): Finding[] {
  const findings: Finding[] = [];
  for (const page of htmlPages(pages)) {
    if (page.canonical === null) {
      findings.push({
        category: "MISSING_CANONICAL",
        severity: "low",
        urls: [page.url],
        message: "No canonical link",
      });
      continue;
    }
    const self = normalizeUrl(page.finalUrl) ?? page.url;
    if (page.canonical !== self) {
      findings.push({
        category: "CANONICAL_MISMATCH",
        severity: "med",
        urls: [page.url],
        message: "Canonical link points to a different URL",
        detail: page.canonical,
      });
    }
  }
  return findings;
}

function lengthFindings(
  pages: PageRecord[],
  category: "TITLE_LENGTH" | "META_DESCRIPTION_LENGTH",
  pick: (page: PageRecord) => string | null,
  bounds: { min: number; max: number },
  label: string
): Finding[] {
  const findings: Finding[] = [];
  for (const page of htmlPages(pages)) {
    const value = pick(page);
    if (value === null) continue;
    const length = value.length;
    if (length >= bounds.min && length <= bounds.max) continue;
    findings.push({
      category,
      severity: "low",
      urls: [page.url],
      message: `${label} is ${length} characters (recommended ${bounds.min}-${bounds.max})`,
    });
  }
  return findings;
}

export function findTitleLength(pages: PageRecord[]): Finding[] {
  return lengthFindings(pages, "TITLE_LENGTH", (p) => p.title, TITLE_LENGTH, "Title");
}

export function findMetaDescriptionLength(pages: PageRecord[]): Finding[] {
  return lengthFindings(
    pages,
    "META_DESCRIPTION_LENGTH",
    (p) => p.metaDescription,
    META_DESCRIPTION_LENGTH,
    "Meta description"
  );
}

export function findImagesMissingAlt(pages: PageRecord[]): Finding[] {
  return htmlPages(pages)
    .filter((p) => p.imagesWithoutAlt > 0)
    .map((p): Finding => ({
      category: "IMAGES_MISSING_ALT",
      severity: "low",
      urls: [p.url],
      message: `${p.imagesWithoutAlt} of ${plural(p.imageCount, "image")} have no alt attribute`,
    }));
}

export function findMissingStructuredData(pages: PageRecord[], rootUrl: string | undefined): Finding[] {
  if (!rootUrl) return [];
  const root = htmlResponses(pages).find((p) => p.url === rootUrl);
  if (!root || root.structuredDataTypes.length > 0) return [];
  return [
    {
      category: "MISSING_STRUCTURED_DATA",
      severity: "low",
      urls: [root.url],
      message: "Home page has no JSON-LD structured data",
    },
  ];
}

/** Most pages carry almost no text and no headings: content is built by scripts. */
export function findClientRendered(pages: PageRecord[]): Finding[] {
  const html = htmlPages(pages);
  const sparse = html.filter((p) => p.textLength < RENDERED_TEXT_FLOOR && !hasH1(p));
  if (html.length === 0 || sparse.length * 2 <= html.length) return [];
  return [
    {
      category: "CLIENT_RENDERED",
      severity: "high",
      urls: sparse.map((p) => p.url).sort(),
      message: `${sparse.length} of ${plural(html.length, "page")} have almost no server-rendered text`,
    },
  ];
}

export function findUncataloguedPages(pages: PageRecord[], sitemapUrls: string[]): Finding[] {
  if (sitemapUrls.length === 0) return [];
  const declared = new Set(sitemapUrls);
  return pages
    .filter((p) => !p.failure && p.source === "link" && !declared.has(p.url))
    .map((p): Finding => ({
      category: "UNCATALOGUED_PAGE",
      severity: "low",
      urls: [p.url],
      message: "Reachable through links but missing from the sitemap",
    }));
}

export function findDeepPages(pages: PageRecord[], graph: LinkGraph, threshold = DEFAULT_DEEP_PAGE_THRESHOLD): Finding[] {
  const crawled = new Set(pages.filter((p) => !p.failure).map((p) => p.url));
  return graph.nodes
    .filter((n) => crawled.has(n.url) && n.depth !== null && n.depth > threshold)
    .map((n): Finding => ({
      category: "DEEP_PAGE",
      severity: "low",
      urls: [n.url],
      message: `${plural(n.depth ?? 0, "click")} from the nearest seed (threshold ${threshold})`,
    }));
}

export function findLongUrls(pages: PageRecord[]): Finding[] {
  return pages
    .filter((p) => p.url.length > LONG_URL_LENGTH)
    .map((p): Finding => ({
      category: "LONG_URL",
      severity: "low",
      urls: [p.url],
      message: `URL is ${p.url.length} characters long`,
    }));
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function compareFindings(a: Finding, b: Finding): number {
  const byCategory = FINDING_CATEGORIES.indexOf(a.category) - FINDING_CATEGORIES.indexOf(b.category);
  if (byCategory !== 0) return byCategory;
  const byUrl = compareText(a.urls[0] ?? "", b.urls[0] ?? "");
  if (byUrl !== 0) return byUrl;
  return compareText(a.message, b.message);
}

/**
 * Turns crawled pages and the link graph into a sorted list of findings.
 * Pure: the same input always yields the same list.
 */
export function analyze(pages: PageRecord[], graph: LinkGraph, options: AnalyzeOptions = {}): Finding[] {
  const sitemapUrls = options.sitemapUrls ?? [];
  const rootUrl = options.rootUrl ?? graph.seeds[0];

  const findings = [
    ...findBrokenLinks(pages, graph, sitemapUrls),
    ...findRedirectChains(pages),
    ...findDuplicateTitles(pages),
    ...findDuplicateMeta(pages),
    ...findMissingMeta(pages),
    ...findMultipleH1(pages),
    ...findCanonicalIssues(pages),
    ...findTitleLength(pages),
    ...findMetaDescriptionLength(pages),
    ...findThinContent(pages, options.thinContentThreshold),
    ...findImagesMissingAlt(pages),
    ...findMissingStructuredData(pages, rootUrl),
    ...findClientRendered(pages),
    ...findOrphanPages(graph, sitemapUrls, rootUrl),
    ...findUncataloguedPages(pages, sitemapUrls),
    ...findDeepPages(pages, graph, options.deepPageThreshold),
    ...findLongUrls(pages),
  ];

  return findings.sort(compareFindings);
}

/** Findings keyed by category, in the order the categories first appear. */
export function groupFindingsByCategory(findings: Finding[]): Map<FindingCategory, Finding[]> {
  const groups = new Map<FindingCategory, Finding[]>();
  for (const finding of findings) {
    const group = groups.get(finding.category) ?? [];
    group.push(finding);
    groups.set(finding.category, group);
  }
  return groups;
}
