import type { AuditConfig, CrawlPolicy, CrawlSeed, HttpClient, PolicyResolution } from "./types";
import { createCrawlPolicy, parseRobotsTxt, permissivePolicy, selectGroup } from "./robots";
import { collectSitemapUrls } from "./sitemap";
import type { SitemapCollection } from "./sitemap";
import { describeFailure, fetchPage } from "./fetcher";
import { getHost, getRobotsUrl, getSitemapUrls, isSameSite, normalizeUrl, resolveUrl } from "./url-utils";

type PolicyConfig = Pick<
  AuditConfig,
  | "userAgent"
  | "respectRobots"
  | "includeSubdomains"
  | "crawlDelayMs"
  | "policyTimeoutMs"
  | "maxSitemaps"
  | "maxSitemapUrls"
  | "blockPrivateNetworks"
>;

function warn(warnings: string[], message: string): void {
  warnings.push(message);
  console.warn(`[policy] ${message}`);
}

async function loadRobots(
  rootUrl: string,
  config: PolicyConfig,
  http: HttpClient,
  warnings: string[],
  signal?: AbortSignal
): Promise<CrawlPolicy> {
  const robotsUrl = getRobotsUrl(rootUrl);
  if (!robotsUrl) {
    warn(warnings, `Could not derive a robots.txt location from ${rootUrl}; crawling without restrictions`);
    return permissivePolicy(config.userAgent);
  }

  const outcome = await fetchPage(robotsUrl, {
    http,
    userAgent: config.userAgent,
    timeoutMs: config.policyTimeoutMs,
    retryTimeoutMs: config.policyTimeoutMs,
    maxRedirects: 5,
    blockPrivateNetworks: config.blockPrivateNetworks,
    signal,
  });

  if (!outcome.ok) {
    if (outcome.failure.kind === "Aborted") return permissivePolicy(config.userAgent);
    warn(warnings, `robots.txt unavailable (${describeFailure(outcome.failure)}); crawling without restrictions`);
    return permissivePolicy(config.userAgent);
  }

  // Catch-all routes answer /robots.txt with an HTML page.
  if (/^\s*</.test(outcome.body) || /text\/html/i.test(outcome.contentType)) {
    warn(warnings, "robots.txt is not a plain-text file; crawling without restrictions");
    return permissivePolicy(config.userAgent);
  }

  const parsed = parseRobotsTxt(outcome.body);
  const group = selectGroup(parsed, config.userAgent);
  const robotsDelayMs = group.crawlDelaySec === null ? 0 : Math.round(group.crawlDelaySec * 1000);

  if (parsed.groups.length === 0) {
    warn(warnings, "robots.txt declares no User-agent groups");
  }
  if (parsed.sitemaps.length === 0) {
    warn(warnings, "robots.txt does not reference a sitemap");
  }

  return createCrawlPolicy({
    source: "robots",
    userAgent: config.userAgent,
    rules: group.rules,
    crawlDelayMs: robotsDelayMs,
    sitemaps: parsed.sitemaps,
  });
}

async function loadSitemaps(
  rootUrl: string,
  declared: readonly string[],
  config: PolicyConfig,
  http: HttpClient,
  signal?: AbortSignal
): Promise<SitemapCollection> {
  const options = {
    http,
    userAgent: config.userAgent,
    timeoutMs: config.policyTimeoutMs,
    maxSitemaps: config.maxSitemaps,
    maxUrls: config.maxSitemapUrls,
    blockPrivateNetworks: config.blockPrivateNetworks,
    signal,
  };

  if (declared.length > 0) {
    return collectSitemapUrls([...declared], options);
  }

  // Nothing declared: try the usual locations, stopping at the first that has URLs.
  const fetched: string[] = [];
  for (const candidate of getSitemapUrls(rootUrl)) {
    if (fetched.length >= config.maxSitemaps || signal?.aborted) break;
    const collection = await collectSitemapUrls([candidate], {
      ...options,
      maxSitemaps: config.maxSitemaps - fetched.length,
    });
    fetched.push(...collection.fetched);
    if (collection.urls.length > 0) {
      return { urls: collection.urls, fetched, warnings: collection.warnings };
    }
  }

  if (signal?.aborted) return { urls: [], fetched, warnings: [] };
  return { urls: [], fetched, warnings: ["No sitemap found in robots.txt or the usual locations"] };
}

/**
 * Builds the crawl policy from robots.txt and seeds the crawl with the root URL
 * plus every in-scope sitemap URL. Never throws for network or parse problems:
 * those fall back to a permissive policy and are reported as warnings. When
 * `signal` aborts (the run deadline), it returns what it has so far.
 */
export async function resolvePolicy(
  rootUrl: string,
  config: PolicyConfig,
  http: HttpClient,
  signal?: AbortSignal
): Promise<PolicyResolution> {
  const warnings: string[] = [];

  const robotsPolicy = await loadRobots(rootUrl, config, http, warnings, signal);
  const sitemaps = await loadSitemaps(rootUrl, robotsPolicy.sitemaps, config, http, signal);
  sitemaps.warnings.forEach((message) => warn(warnings, message));
  if (signal?.aborted) {
    warn(warnings, "Wall-clock budget reached while reading robots.txt and sitemaps");
  }

  const crawlDelayMs = Math.max(config.crawlDelayMs, robotsPolicy.crawlDelayMs);
  const policy = createCrawlPolicy({
    source: robotsPolicy.source,
    userAgent: config.userAgent,
    rules: config.respectRobots ? [...robotsPolicy.rules] : [],
    crawlDelayMs,
    sitemaps: [...robotsPolicy.sitemaps],
  });

  const root = normalizeUrl(rootUrl);
  const seeds: CrawlSeed[] = [];
  const seen = new Set<string>();
  if (root) {
    seeds.push({ url: root, href: resolveUrl(rootUrl) ?? root, source: "seed" });
    seen.add(root);
  }

  const sitemapUrls = new Set<string>();
  let offSite = 0;
  for (const raw of sitemaps.urls) {
    const normalized = normalizeUrl(raw);
    if (!normalized) continue;
    if (!isSameSite(normalized, rootUrl, config.includeSubdomains)) {
      offSite++;
      continue;
    }
    sitemapUrls.add(normalized);
    if (!seen.has(normalized)) {
      seen.add(normalized);
      seeds.push({ url: normalized, href: resolveUrl(raw) ?? normalized, source: "sitemap" });
    }
  }

  if (offSite > 0) {
    warn(warnings, `${offSite} sitemap URLs point outside ${getHost(rootUrl)} and were ignored`);
  }

  return { policy, seeds, sitemapUrls: Array.from(sitemapUrls), warnings };
}
