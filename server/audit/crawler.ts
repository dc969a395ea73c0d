import pLimit from "p-limit";
import type {
  AuditConfig,
  CrawlResult,
  FetchOutcome,
  HttpClient,
  PageRecord,
  PolicyResolution,
  StopReason,
} from "./types";
import { fetchPage } from "./fetcher";
import { emptyExtraction, extractPageData, isHtmlContent } from "./extractor";
import { Frontier } from "./frontier";
import type { FrontierItem } from "./frontier";
import { HostClock } from "./host-clock";
import { LinkGraphBuilder } from "./link-graph";
import { normalizeUrl } from "./url-utils";

export type CrawlConfig = Pick<
  AuditConfig,
  | "maxPages"
  | "maxDepth"
  | "concurrency"
  | "timeoutMs"
  | "retryTimeoutMs"
  | "maxRedirects"
  | "wallClockBudgetMs"
  | "userAgent"
  | "includeSubdomains"
  | "blockPrivateNetworks"
>;

interface Settled {
  item: FrontierItem;
  outcome: FetchOutcome;
}

type Wakeup = Settled | "deadline" | "tick";

export function buildPageRecord(
  item: FrontierItem,
  outcome: FetchOutcome,
  rootUrl: string,
  includeSubdomains = false
): PageRecord {
  const base = {
    url: item.url,
    statusCode: outcome.statusCode,
    finalUrl: outcome.finalUrl,
    redirectChain: outcome.redirectChain,
    fetchMs: outcome.fetchMs,
    depth: item.depth,
    source: item.source,
  };

  if (!outcome.ok) {
    return {
      ...emptyExtraction(),
      ...base,
      failure: outcome.failure,
      contentType: null,
      isHtml: false,
      contentLength: 0,
    };
  }

  const isHtml = isHtmlContent(outcome.contentType, outcome.body);
  const extracted = isHtml
    ? extractPageData(outcome.body, outcome.finalUrl, rootUrl, includeSubdomains)
    : emptyExtraction();

  return {
    ...extracted,
    ...base,
    failure: null,
    contentType: outcome.contentType || null,
    isHtml,
    contentLength: outcome.contentLength,
  };
}

function sleep(ms: number): { promise: Promise<"tick">; cancel: () => void } {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const promise = new Promise<"tick">((resolve) => {
    timer = setTimeout(() => resolve("tick"), ms);
  });
  return { promise, cancel: () => clearTimeout(timer) };
}

/**
 * Crawls from the resolved seeds until the frontier empties, the page budget
 * runs out or `signal` aborts (the run's wall-clock deadline). This function
 * is the only owner of the frontier and the graph builder; fetches run in a
 * p-limit pool and report back through `Promise.race`.
 */
export async function crawlSite(
  rootUrl: string,
  resolution: PolicyResolution,
  config: CrawlConfig,
  http: HttpClient,
  signal: AbortSignal
): Promise<CrawlResult> {
  const root = normalizeUrl(rootUrl);
  if (!root) {
    throw new Error("Invalid root URL");
  }

  const limit = pLimit(config.concurrency);
  const clock = new HostClock(resolution.policy.crawlDelayMs);
  const frontier = new Frontier({
    rootUrl: root,
    policy: resolution.policy,
    maxDepth: config.maxDepth,
    concurrency: config.concurrency,
    includeSubdomains: config.includeSubdomains,
    clock,
  });

  const seeds: string[] = [];
  for (const seed of resolution.seeds) {
    const result = frontier.enqueue(seed.href, 0, seed.source);
    if (result.accepted) seeds.push(result.url);
  }
  if (!seeds.includes(root)) seeds.unshift(root);
  const graph = new LinkGraphBuilder(seeds);

  // Registered before any fetch listens, so the deadline wins the race against aborted fetches.
  const deadline = new Promise<"deadline">((resolve) => {
    if (signal.aborted) resolve("deadline");
    else signal.addEventListener("abort", () => resolve("deadline"), { once: true });
  });

  const inFlight = new Map<string, Promise<Settled>>();
  const pages: PageRecord[] = [];
  let attempted = 0;
  let stopReason: StopReason = "frontier-exhausted";

  const dispatch = (item: FrontierItem) => {
    const task = limit(async (): Promise<Settled> => {
      const outcome = await fetchPage(item.fetchUrl, {
        http,
        userAgent: config.userAgent,
        timeoutMs: config.timeoutMs,
        retryTimeoutMs: config.retryTimeoutMs,
        maxRedirects: config.maxRedirects,
        blockPrivateNetworks: config.blockPrivateNetworks,
        signal,
        clock,
      });
      return { item, outcome };
    });
    inFlight.set(item.url, task);
    attempted++;
  };

  for (;;) {
    if (signal.aborted) {
      stopReason = "time-budget";
      break;
    }

    let waitMs: number | null = null;
    while (attempted < config.maxPages) {
      const next = frontier.next(Date.now());
      if (next.kind === "ready") {
        dispatch(next.item);
        continue;
      }
      if (next.kind === "wait") waitMs = next.ms;
      break;
    }

    if (inFlight.size === 0) {
      if (frontier.pendingCount === 0) {
        stopReason = "frontier-exhausted";
        break;
      }
      if (attempted >= config.maxPages) {
        stopReason = "page-budget";
        break;
      }
    }

    const waiters: Promise<Wakeup>[] = [deadline, ...inFlight.values()];
    const pause = waitMs === null ? null : sleep(waitMs);
    if (pause) waiters.push(pause.promise);

    const wakeup = await Promise.race(waiters);
    pause?.cancel();

    if (wakeup === "deadline") {
      stopReason = "time-budget";
      break;
    }
    if (wakeup === "tick") continue;

    const { item, outcome } = wakeup;
    inFlight.delete(item.url);

    if (!outcome.ok && outcome.failure.kind === "Aborted") {
      frontier.abandon(item.url);
      continue;
    }

    const record = buildPageRecord(item, outcome, root, config.includeSubdomains);
    pages.push(record);
    if (!record.failure) {
      graph.addPage(record);
    }
    frontier.onResult(item.url, record);
  }

  if (stopReason === "time-budget") {
    inFlight.forEach((_, url) => frontier.abandon(url));
    console.warn(
      `[crawler] Wall-clock budget of ${config.wallClockBudgetMs}ms reached after ${pages.length} pages; ${inFlight.size} in-flight requests discarded`
    );
  } else if (stopReason === "page-budget") {
    console.warn(
      `[crawler] Page budget of ${config.maxPages} reached; ${frontier.pendingCount} discovered URLs not fetched`
    );
  }

  pages.sort((a, b) => (a.url < b.url ? -1 : a.url > b.url ? 1 : 0));

  return {
    pages,
    graph: graph.finalize(),
    status: stopReason === "frontier-exhausted" ? "Complete" : "Partial",
    stopReason,
  };
}
