import type { GraphEdge, GraphNode, LinkGraph, PageRecord } from "./types";
import { invariant } from "./errors";
import { isNormalizedUrl } from "./url-utils";

const DAMPING = 0.85;
const MAX_ITERATIONS = 100;
const TOLERANCE = 1e-9;

/**
 * Accumulates the internal link graph while the crawl runs. Nodes live in an
 * arena (URL → index) with index-based adjacency, so cycles cost nothing.
 */
export class LinkGraphBuilder {
  private readonly seeds: string[];
  private readonly index = new Map<string, number>();
  private readonly urls: string[] = [];
  private readonly outgoing: Set<number>[] = [];
  private readonly pages = new Set<number>();
  private finalized = false;

  constructor(seeds: string[]) {
    seeds.forEach((seed) => invariant(isNormalizedUrl(seed), `Graph seed is not normalized: ${seed}`));
    this.seeds = [...seeds];
    this.seeds.forEach((seed) => this.nodeFor(seed));
  }

  private nodeFor(url: string): number {
    const existing = this.index.get(url);
    if (existing !== undefined) return existing;
    const id = this.urls.length;
    this.index.set(url, id);
    this.urls.push(url);
    this.outgoing.push(new Set());
    return id;
  }

  private assertOpen(): void {
    invariant(!this.finalized, "Link graph is already finalized");
  }

  /** Registers a URL that was discovered but has no page of its own (yet). */
  addNode(url: string): void {
    this.assertOpen();
    invariant(isNormalizedUrl(url), `Graph node URL is not normalized: ${url}`);
    this.nodeFor(url);
  }

  /** Adds a fetched page and one edge per distinct internal link target. */
  addPage(record: Pick<PageRecord, "url" | "internalLinks">): void {
    this.assertOpen();
    invariant(isNormalizedUrl(record.url), `Page URL is not normalized: ${record.url}`);

    const source = this.nodeFor(record.url);
    invariant(!this.pages.has(source), `Page added to the link graph twice: ${record.url}`);
    this.pages.add(source);

    for (const link of record.internalLinks) {
      invariant(isNormalizedUrl(link), `Link target is not normalized: ${link}`);
      const target = this.nodeFor(link);
      if (target !== source) this.outgoing[source].add(target);
    }
  }

  hasPage(url: string): boolean {
    const id = this.index.get(url);
    return id !== undefined && this.pages.has(id);
  }

  finalize(): LinkGraph {
    this.assertOpen();
    this.finalized = true;

    const n = this.urls.length;
    const inDegree = new Array<number>(n).fill(0);
    const incoming: number[][] = Array.from({ length: n }, () => []);
    const edges: GraphEdge[] = [];

    this.outgoing.forEach((targets, source) => {
      for (const target of targets) {
        inDegree[target]++;
        incoming[target].push(source);
        edges.push({ source: this.urls[source], target: this.urls[target] });
      }
    });

    const depth = this.bfsDepths();
    const pageRank = this.pageRank(incoming);
    const maxInDegree = Math.max(0, ...inDegree);
    const seedIds = new Set(this.seeds.map((seed) => this.nodeFor(seed)));

    const nodes: GraphNode[] = this.urls.map((url, id) => ({
      url,
      inDegree: inDegree[id],
      outDegree: this.outgoing[id].size,
      depth: depth[id],
      authority: maxInDegree > 0 ? inDegree[id] / maxInDegree : 0,
      pageRank: pageRank[id],
    }));

    const orphans = nodes
      .filter((node, id) => node.inDegree === 0 && !seedIds.has(id))
      .map((node) => node.url)
      .sort();

    return { seeds: [...this.seeds], nodes, edges, orphans };
  }

  private bfsDepths(): (number | null)[] {
    const depth: (number | null)[] = new Array<number | null>(this.urls.length).fill(null);
    const queue: number[] = [];

    for (const seed of this.seeds) {
      const id = this.nodeFor(seed);
      if (depth[id] === null) {
        depth[id] = 0;
        queue.push(id);
      }
    }

    for (let head = 0; head < queue.length; head++) {
      const current = queue[head];
      const nextDepth = (depth[current] ?? 0) + 1;
      for (const target of this.outgoing[current]) {
        if (depth[target] === null) {
          depth[target] = nextDepth;
          queue.push(target);
        }
      }
    }

    return depth;
  }

  private pageRank(incoming: number[][]): number[] {
    const n = this.urls.length;
    if (n === 0) return [];

    let rank = new Array<number>(n).fill(1 / n);
    for (let iteration = 0; iteration < MAX_ITERATIONS; iteration++) {
      let dangling = 0;
      for (let id = 0; id < n; id++) {
        if (this.outgoing[id].size === 0) dangling += rank[id];
      }

      const base = (1 - DAMPING) / n + (DAMPING * dangling) / n;
      const next = new Array<number>(n);
      let delta = 0;
      for (let id = 0; id < n; id++) {
        let sum = 0;
        for (const source of incoming[id]) {
          sum += rank[source] / this.outgoing[source].size;
        }
        next[id] = base + DAMPING * sum;
        delta += Math.abs(next[id] - rank[id]);
      }

      rank = next;
      if (delta < TOLERANCE) break;
    }

    return rank;
  }
}
