import type { CrawlPolicy, DiscoverySource, PageRecord } from "./types";
import { invariant } from "./errors";
import { HostClock } from "./host-clock";
import { isSameSite, normalizeUrl, resolveUrl } from "./url-utils";

export interface FrontierItem {
  /** Normalized identity. */
  url: string;
  /** The first href this URL was found under; this is what gets requested. */
  fetchUrl: string;
  depth: number;
  source: DiscoverySource;
  /** Enqueue order, used as the FIFO tie-breaker. */
  seq: number;
}

export type EnqueueResult =
  | { accepted: true; url: string }
  | { accepted: false; url: string | null; reason: "invalid" | "seen" | "too-deep" | "off-site" | "disallowed" };

export type NextResult =
  | { kind: "ready"; item: FrontierItem }
  | { kind: "wait"; ms: number }
  | { kind: "idle" };

export interface FrontierOptions {
  rootUrl: string;
  policy: CrawlPolicy;
  maxDepth: number;
  concurrency: number;
  includeSubdomains: boolean;
  /** Shared with the fetcher so retries and redirect hops are spaced too. */
  clock?: HostClock;
}

type UrlState = "pending" | "in-flight" | "completed" | "failed";

/**
 * Crawl bookkeeping for one run. Only the coordinator calls into it, so every
 * mutation is synchronous.
 */
export class Frontier {
  private readonly options: FrontierOptions;
  private readonly states = new Map<string, UrlState>();
  private readonly pending = new Map<string, FrontierItem>();
  private readonly inFlight = new Map<string, FrontierItem>();
  /** Depth and link hrefs of completed pages, for re-offering links after a shallower discovery. */
  private readonly completed = new Map<string, { depth: number; hrefs: string[] }>();
  private seq = 0;
  readonly clock: HostClock;

  constructor(options: FrontierOptions) {
    this.options = options;
    this.clock = options.clock ?? new HostClock(options.policy.crawlDelayMs);
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  get isDone(): boolean {
    return this.pending.size === 0 && this.inFlight.size === 0;
  }

  stateOf(url: string): UrlState | undefined {
    return this.states.get(url);
  }

  enqueue(rawUrl: string, depth: number, source: DiscoverySource, base?: string): EnqueueResult {
    const url = normalizeUrl(rawUrl, base);
    if (!url) {
      return { accepted: false, url: null, reason: "invalid" };
    }

    if (this.states.has(url)) {
      this.lowerDepth(url, depth);
      return { accepted: false, url, reason: "seen" };
    }
    if (depth > this.options.maxDepth) {
      return { accepted: false, url, reason: "too-deep" };
    }
    if (!isSameSite(url, this.options.rootUrl, this.options.includeSubdomains)) {
      return { accepted: false, url, reason: "off-site" };
    }
    if (!this.options.policy.isAllowed(url)) {
      return { accepted: false, url, reason: "disallowed" };
    }

    this.states.set(url, "pending");
    this.pending.set(url, { url, fetchUrl: resolveUrl(rawUrl, base) ?? url, depth, source, seq: this.seq++ });
    return { accepted: true, url };
  }

  /**
   * Depth is the shallowest discovery. A waiting or in-flight item takes the
   * new depth as is; a completed page keeps its record but offers its links
   * again one level below.
   */
  private lowerDepth(url: string, depth: number): void {
    const queued = this.pending.get(url) ?? this.inFlight.get(url);
    if (queued) {
      if (depth < queued.depth) queued.depth = depth;
      return;
    }

    const done = this.completed.get(url);
    if (!done || depth >= done.depth) return;
    done.depth = depth;
    for (const href of done.hrefs) {
      this.enqueue(href, depth + 1, "link");
    }
  }

  /**
   * Picks the shallowest pending URL (FIFO among equals) whose host is out of
   * its crawl-delay window, and moves it to in-flight. The host's dispatch
   * time is recorded in the same step.
   */
  next(now: number): NextResult {
    if (this.pending.size === 0) return { kind: "idle" };
    if (this.inFlight.size >= this.options.concurrency) return { kind: "idle" };

    let best: FrontierItem | null = null;
    let soonest = Infinity;

    for (const item of this.pending.values()) {
      const readyAt = this.clock.readyAt(item.fetchUrl);
      if (readyAt > now) {
        soonest = Math.min(soonest, readyAt);
        continue;
      }
      if (!best || item.depth < best.depth || (item.depth === best.depth && item.seq < best.seq)) {
        best = item;
      }
    }

    if (!best) {
      return { kind: "wait", ms: soonest - now };
    }

    this.pending.delete(best.url);
    this.inFlight.set(best.url, best);
    this.states.set(best.url, "in-flight");
    this.clock.stamp(best.fetchUrl, now);
    return { kind: "ready", item: best };
  }

  /**
   * Settles an in-flight URL. A successful page feeds its internal links back
   * in one level deeper; returns the URLs that were newly accepted.
   */
  onResult(url: string, record: PageRecord): string[] {
    const item = this.inFlight.get(url);
    invariant(item, `onResult called for ${url}, which is not in flight`);
    invariant(record.url === url, `Record for ${record.url} settled against ${url}`);

    this.inFlight.delete(url);

    if (record.failure) {
      this.states.set(url, "failed");
      return [];
    }

    this.states.set(url, "completed");
    this.completed.set(url, { depth: item.depth, hrefs: record.internalHrefs });
    const accepted: string[] = [];
    for (const href of record.internalHrefs) {
      const result = this.enqueue(href, item.depth + 1, "link");
      if (result.accepted) accepted.push(result.url);
    }
    return accepted;
  }

  /** Drops an in-flight URL whose result will never be used (run cancelled). */
  abandon(url: string): void {
    if (this.inFlight.delete(url)) {
      this.states.set(url, "failed");
    }
  }
}
