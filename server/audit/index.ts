import type { AuditConfigInput, AuditResult, CrawlResult, HttpClient, PolicyResolution } from "./types";
import { AuditConfigSchema } from "./types";
import { resolvePolicy } from "./policy";
import { crawlSite } from "./crawler";
import { analyze, groupFindingsByCategory } from "./insights";
import { isSSRFSafe, normalizeUrl, resolveUrl } from "./url-utils";

export interface AuditDeps {
  /** Defaults to the global `fetch`. */
  http?: HttpClient;
}

export async function runAudit(config: AuditConfigInput, deps: AuditDeps = {}): Promise<AuditResult> {
  const startTime = Date.now();

  const validatedConfig = AuditConfigSchema.parse(config);
  const http: HttpClient = deps.http ?? fetch;

  const rootHref = resolveUrl(validatedConfig.url);
  const rootUrl = rootHref && normalizeUrl(rootHref);
  if (!rootHref || !rootUrl) {
    throw new Error(`Only http(s) URLs can be audited: ${validatedConfig.url}`);
  }

  if (validatedConfig.blockPrivateNetworks) {
    const ssrfCheck = await isSSRFSafe(rootUrl);
    if (!ssrfCheck.safe) {
      throw new Error(`SSRF protection: ${ssrfCheck.reason}`);
    }
  }

  // One deadline for the whole run, policy stage included.
  const runController = new AbortController();
  const deadlineTimer = setTimeout(() => runController.abort(), validatedConfig.wallClockBudgetMs);

  let resolution: PolicyResolution;
  let crawlResult: CrawlResult;
  try {
    resolution = await resolvePolicy(rootHref, validatedConfig, http, runController.signal);
    crawlResult = await crawlSite(rootUrl, resolution, validatedConfig, http, runController.signal);
  } finally {
    clearTimeout(deadlineTimer);
  }
  const { pages, graph, status, stopReason } = crawlResult;

  const findings = analyze(pages, graph, {
    sitemapUrls: resolution.sitemapUrls,
    thinContentThreshold: validatedConfig.thinContentThreshold,
    deepPageThreshold: validatedConfig.deepPageThreshold,
    rootUrl,
  });

  const pagesSucceeded = pages.filter((p) => !p.failure).length;
  const durationMs = Date.now() - startTime;

  const summary = Array.from(groupFindingsByCategory(findings), ([category, group]) => `${category} ${group.length}`);
  console.warn(
    `[audit] ${rootUrl}: ${pages.length} pages (${status}, ${stopReason}) in ${durationMs}ms; ${findings.length} findings${
      summary.length > 0 ? ` (${summary.join(", ")})` : ""
    }`
  );

  return {
    rootUrl,
    pages,
    graph,
    findings,
    policy: {
      source: resolution.policy.source,
      crawlDelayMs: resolution.policy.crawlDelayMs,
      rules: [...resolution.policy.rules],
      sitemaps: [...resolution.policy.sitemaps],
      sitemapUrlCount: resolution.sitemapUrls.length,
    },
    meta: {
      status,
      stopReason,
      startedAt: new Date(startTime).toISOString(),
      durationMs,
      pagesAttempted: pages.length,
      pagesSucceeded,
      pagesFailed: pages.length - pagesSucceeded,
      warnings: resolution.warnings,
    },
  };
}

export { AuditConfigSchema } from "./types";
export type {
  AuditConfig,
  AuditConfigInput,
  AuditResult,
  Finding,
  FindingCategory,
  HttpClient,
  LinkGraph,
  PageRecord,
} from "./types";
export { InvariantError } from "./errors";
export { analyze } from "./insights";
