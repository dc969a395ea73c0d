import type { CrawlPolicy, RobotsRule } from "./types";

export interface RobotsGroup {
  agents: string[];
  rules: RobotsRule[];
  crawlDelaySec: number | null;
}

export interface ParsedRobots {
  groups: RobotsGroup[];
  sitemaps: string[];
}

export function parseRobotsTxt(content: string): ParsedRobots {
  const groups: RobotsGroup[] = [];
  const sitemaps: string[] = [];
  let current: RobotsGroup | null = null;
  let collectingAgents = false;

  for (const rawLine of content.split(/\r\n|\r|\n/)) {
    const line = rawLine.replace(/#.*$/, "").trim();
    if (!line) continue;

    const separator = line.indexOf(":");
    if (separator === -1) continue;

    const field = line.slice(0, separator).trim().toLowerCase();
    const value = line.slice(separator + 1).trim();

    switch (field) {
      case "user-agent": {
        if (!current || !collectingAgents) {
          current = { agents: [], rules: [], crawlDelaySec: null };
          groups.push(current);
        }
        current.agents.push(value.toLowerCase());
        collectingAgents = true;
        break;
      }
      case "allow":
      case "disallow": {
        collectingAgents = false;
        // An empty Disallow matches nothing.
        if (current && value) {
          current.rules.push({ type: field, pattern: value });
        }
        break;
      }
      case "crawl-delay": {
        collectingAgents = false;
        const seconds = Number.parseFloat(value);
        if (current && Number.isFinite(seconds) && seconds >= 0) {
          current.crawlDelaySec = seconds;
        }
        break;
      }
      case "sitemap": {
        if (value) sitemaps.push(value);
        break;
      }
      default:
        break;
    }
  }

  return { groups, sitemaps };
}

/** "Mozilla/5.0 (compatible; site-seo-audit/1.0)" style strings reduce to their bot token. */
export function productToken(userAgent: string): string {
  const compatible = userAgent.match(/compatible;\s*([^/;)\s]+)/i);
  const token = compatible ? compatible[1] : userAgent.split(/[/\s]/)[0];
  return token.toLowerCase();
}

/**
 * Rules and crawl delay for a user agent: every group naming its product token
 * is merged; otherwise every `*` group is.
 */
export function selectGroup(parsed: ParsedRobots, userAgent: string): { rules: RobotsRule[]; crawlDelaySec: number | null } {
  const token = productToken(userAgent);
  const named = parsed.groups.filter((g) => g.agents.includes(token));
  const chosen = named.length > 0 ? named : parsed.groups.filter((g) => g.agents.includes("*"));

  const rules = chosen.flatMap((g) => g.rules);
  const delays = chosen.map((g) => g.crawlDelaySec).filter((d): d is number => d !== null);

  return { rules, crawlDelaySec: delays.length > 0 ? Math.max(...delays) : null };
}

function patternToRegExp(pattern: string): RegExp {
  const anchored = pattern.endsWith("$");
  const body = anchored ? pattern.slice(0, -1) : pattern;
  const source = body
    .split("*")
    .map((part) => part.replace(/[.*+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
  return new RegExp(`^${source}${anchored ? "$" : ""}`);
}

export function matchesPattern(pattern: string, path: string): boolean {
  return patternToRegExp(pattern).test(path);
}

/** Longest matching pattern wins; on a tie, allow wins. */
export function isPathAllowed(rules: readonly RobotsRule[], path: string): boolean {
  if (path === "/robots.txt") return true;

  let best: RobotsRule | null = null;
  for (const rule of rules) {
    if (!matchesPattern(rule.pattern, path)) continue;
    if (
      !best ||
      rule.pattern.length > best.pattern.length ||
      (rule.pattern.length === best.pattern.length && rule.type === "allow")
    ) {
      best = rule;
    }
  }

  return !best || best.type === "allow";
}

export function createCrawlPolicy(options: {
  source: CrawlPolicy["source"];
  userAgent: string;
  rules?: RobotsRule[];
  crawlDelayMs?: number;
  sitemaps?: string[];
}): CrawlPolicy {
  const rules = Object.freeze([...(options.rules ?? [])]);

  return Object.freeze({
    source: options.source,
    userAgent: options.userAgent,
    rules,
    crawlDelayMs: options.crawlDelayMs ?? 0,
    sitemaps: Object.freeze([...(options.sitemaps ?? [])]),
    isAllowed(url: string): boolean {
      let path: string;
      try {
        const parsed = new URL(url);
        path = `${parsed.pathname}${parsed.search}`;
      } catch {
        return false;
      }
      return isPathAllowed(rules, path);
    },
  });
}

export function permissivePolicy(userAgent: string): CrawlPolicy {
  return createCrawlPolicy({ source: "default", userAgent });
}
