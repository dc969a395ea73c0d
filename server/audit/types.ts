import { z } from "zod";

export const AuditConfigSchema = z.object({
  url: z.string().url(),
  maxPages: z.number().int().positive().default(150),
  maxDepth: z.number().int().nonnegative().default(3),
  concurrency: z.number().int().positive().max(32).default(8),
  timeoutMs: z.number().int().positive().default(12000),
  retryTimeoutMs: z.number().int().positive().default(30000),
  maxRedirects: z.number().int().nonnegative().default(5),
  wallClockBudgetMs: z.number().int().positive().default(300000),
  crawlDelayMs: z.number().int().nonnegative().default(0),
  userAgent: z.string().min(1).default("site-seo-audit/1.0"),
  respectRobots: z.boolean().default(true),
  includeSubdomains: z.boolean().default(false),
  maxSitemaps: z.number().int().nonnegative().default(10),
  maxSitemapUrls: z.number().int().nonnegative().default(5000),
  policyTimeoutMs: z.number().int().positive().default(10000),
  thinContentThreshold: z.number().int().nonnegative().default(2048),
  deepPageThreshold: z.number().int().positive().default(4),
  blockPrivateNetworks: z.boolean().default(true),
});

export type AuditConfig = z.infer<typeof AuditConfigSchema>;
export type AuditConfigInput = z.input<typeof AuditConfigSchema>;

// ─── HTTP boundary ───────────────────────────────────────────────────────────

export interface HttpRequestInit {
  method: "GET";
  signal: AbortSignal;
  headers: Record<string, string>;
  redirect: "manual";
}

export interface HttpResponse {
  status: number;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
}

/** Global `fetch` satisfies this; tests pass an in-process stand-in. */
export type HttpClient = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

// ─── Fetch results ───────────────────────────────────────────────────────────

export type NetworkFailureKind =
  | "DNSError"
  | "ConnectTimeout"
  | "ReadTimeout"
  | "TLSError"
  | "ConnectionRefused"
  | "NetworkError"
  | "Blocked"
  | "Aborted";

export type FetchFailure =
  | { kind: NetworkFailureKind; message: string }
  | { kind: "HTTPError"; code: number; message: string }
  | { kind: "TooManyRedirects"; message: string };

export type FailureKind = FetchFailure["kind"];

interface FetchTrace {
  finalUrl: string;
  redirectChain: string[];
  fetchMs: number;
}

export type FetchOutcome =
  | (FetchTrace & {
      ok: true;
      statusCode: number;
      contentType: string;
      body: string;
      contentLength: number;
    })
  | (FetchTrace & {
      ok: false;
      statusCode: number | null;
      failure: FetchFailure;
    });

// ─── Pages ───────────────────────────────────────────────────────────────────

export type DiscoverySource = "seed" | "sitemap" | "link";

/** Fields read out of an HTML document. `null` marks an absent tag. */
export interface ExtractedPage {
  title: string | null;
  metaDescription: string | null;
  canonical: string | null;
  h1: string[];
  outboundLinks: string[];
  internalLinks: string[];
  /** Resolved href each internal link was first found under; parallel to `internalLinks`. */
  internalHrefs: string[];
  externalLinks: string[];
  imageCount: number;
  imagesWithoutAlt: number;
  structuredDataTypes: string[];
  scriptCount: number;
  textLength: number;
}

export interface PageRecord extends ExtractedPage {
  url: string;
  statusCode: number | null;
  failure: FetchFailure | null;
  finalUrl: string;
  redirectChain: string[];
  contentType: string | null;
  isHtml: boolean;
  contentLength: number;
  fetchMs: number;
  depth: number;
  source: DiscoverySource;
}

// ─── Policy ──────────────────────────────────────────────────────────────────

export interface RobotsRule {
  type: "allow" | "disallow";
  pattern: string;
}

export interface CrawlPolicy {
  readonly source: "robots" | "default";
  readonly userAgent: string;
  readonly rules: readonly RobotsRule[];
  readonly crawlDelayMs: number;
  readonly sitemaps: readonly string[];
  isAllowed(url: string): boolean;
}

export interface CrawlSeed {
  /** Normalized identity. */
  url: string;
  /** What gets requested: the URL as declared, resolved but not normalized. */
  href: string;
  source: DiscoverySource;
}

export interface PolicyResolution {
  policy: CrawlPolicy;
  seeds: CrawlSeed[];
  sitemapUrls: string[];
  warnings: string[];
}

// ─── Link graph ──────────────────────────────────────────────────────────────

export interface GraphNode {
  url: string;
  inDegree: number;
  outDegree: number;
  /** BFS distance from the nearest seed; `null` when unreachable. */
  depth: number | null;
  authority: number;
  pageRank: number;
}

export interface GraphEdge {
  source: string;
  target: string;
}

export interface LinkGraph {
  seeds: string[];
  nodes: GraphNode[];
  edges: GraphEdge[];
  orphans: string[];
}

// ─── Findings ────────────────────────────────────────────────────────────────

export const FINDING_CATEGORIES = [
  "BROKEN_LINK",
  "REDIRECT_CHAIN",
  "DUPLICATE_TITLE",
  "DUPLICATE_META",
  "MISSING_META",
  "MULTIPLE_H1",
  "MISSING_CANONICAL",
  "CANONICAL_MISMATCH",
  "TITLE_LENGTH",
  "META_DESCRIPTION_LENGTH",
  "THIN_CONTENT",
  "IMAGES_MISSING_ALT",
  "MISSING_STRUCTURED_DATA",
  "CLIENT_RENDERED",
  "ORPHAN_PAGE",
  "UNCATALOGUED_PAGE",
  "DEEP_PAGE",
  "LONG_URL",
] as const;

export type FindingCategory = (typeof FINDING_CATEGORIES)[number];

export type FindingSeverity = "low" | "med" | "high";

export interface Finding {
  category: FindingCategory;
  severity: FindingSeverity;
  urls: string[];
  message: string;
  detail?: string;
}

// ─── Audit result ────────────────────────────────────────────────────────────

export type RunStatus = "Complete" | "Partial";

export type StopReason = "frontier-exhausted" | "page-budget" | "time-budget";

export interface CrawlResult {
  pages: PageRecord[];
  graph: LinkGraph;
  status: RunStatus;
  stopReason: StopReason;
}

export interface AuditMeta {
  status: RunStatus;
  stopReason: StopReason;
  startedAt: string;
  durationMs: number;
  pagesAttempted: number;
  pagesSucceeded: number;
  pagesFailed: number;
  warnings: string[];
}

export interface PolicySummary {
  source: CrawlPolicy["source"];
  crawlDelayMs: number;
  rules: RobotsRule[];
  sitemaps: string[];
  sitemapUrlCount: number;
}

export interface AuditResult {
  rootUrl: string;
  pages: PageRecord[];
  graph: LinkGraph;
  findings: Finding[];
  policy: PolicySummary;
  meta: AuditMeta;
}
