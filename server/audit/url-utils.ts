import { URL } from "url";
import * as dns from "dns";
import * as net from "net";

const PRIVATE_IP_RANGES = [
  /^127\./,
  /^10\./,
  /^172\.(1[6-9]|2[0-9]|3[01])\./,
  /^192\.168\./,
  /^169\.254\./,
  /^0\./,
  /^::1$/,
  /^fe80:/i,
  /^fc00:/i,
  /^fd00:/i,
];

const BLOCKED_HOSTS = [
  "localhost",
  "127.0.0.1",
  "0.0.0.0",
  "::1",
  "[::1]",
];

const TRACKING_PARAMS = ["utm_source", "utm_medium", "utm_campaign", "utm_term", "utm_content", "ref", "source"];

export function isPrivateIP(ip: string): boolean {
  return PRIVATE_IP_RANGES.some((regex) => regex.test(ip));
}

export function isBlockedHost(hostname: string): boolean {
  const lower = hostname.toLowerCase();
  return BLOCKED_HOSTS.includes(lower) || lower.endsWith(".local");
}

export async function resolveHostToIP(hostname: string): Promise<string[]> {
  return new Promise((resolve) => {
    dns.lookup(hostname, { all: true }, (err, addresses) => {
      if (err) {
        resolve([]);
      } else {
        resolve(addresses.map((a) => a.address));
      }
    });
  });
}

export async function isSSRFSafe(urlString: string): Promise<{ safe: boolean; reason?: string }> {
  let parsed: URL;
  try {
    parsed = new URL(urlString);
  } catch (e) {
    return { safe: false, reason: `Invalid URL: ${String(e)}` };
  }

  if (!["http:", "https:"].includes(parsed.protocol)) {
    return { safe: false, reason: `Blocked protocol: ${parsed.protocol}` };
  }

  if (isBlockedHost(parsed.hostname)) {
    return { safe: false, reason: `Blocked host: ${parsed.hostname}` };
  }

  // URL keeps the brackets around IPv6 literals.
  const host = parsed.hostname.replace(/^\[|\]$/g, "");
  if (net.isIP(host)) {
    if (isPrivateIP(host)) {
      return { safe: false, reason: `Private IP blocked: ${host}` };
    }
    return { safe: true };
  }

  const ips = await resolveHostToIP(host);
  for (const ip of ips) {
    if (isPrivateIP(ip)) {
      return { safe: false, reason: `Hostname resolves to private IP: ${ip}` };
    }
  }

  return { safe: true };
}

/**
 * Canonical identity for a URL: lowercased scheme and host, no fragment, no
 * default port, no tracking parameters and no trailing slash (except the root
 * path). Returns null for anything that is not an http(s) URL.
 */
export function normalizeUrl(urlString: string, baseUrl?: string): string | null {
  const resolved = resolveUrl(urlString, baseUrl);
  if (!resolved) return null;

  const url = new URL(resolved);
  TRACKING_PARAMS.forEach((param) => url.searchParams.delete(param));

  let pathname = url.pathname;
  while (pathname.length > 1 && pathname.endsWith("/")) {
    pathname = pathname.slice(0, -1);
  }
  url.pathname = pathname;

  return url.toString();
}

/**
 * The URL to request for an href: resolved against `baseUrl`, without the
 * fragment or credentials, path and query kept as written. Null for anything
 * that is not http(s).
 */
export function resolveUrl(urlString: string, baseUrl?: string): string | null {
  let url: URL;
  try {
    url = baseUrl ? new URL(urlString.trim(), baseUrl) : new URL(urlString.trim());
  } catch {
    return null;
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") {
    return null;
  }

  url.hash = "";
  url.username = "";
  url.password = "";
  return url.toString();
}

export function isNormalizedUrl(url: string): boolean {
  return normalizeUrl(url) === url;
}

/** Hostname without a leading `www.`, lowercased. */
export function siteHost(urlString: string): string | null {
  try {
    return new URL(urlString).hostname.toLowerCase().replace(/^www\./, "");
  } catch {
    return null;
  }
}

export function getHost(urlString: string): string {
  try {
    return new URL(urlString).host.toLowerCase();
  } catch {
    return "";
  }
}

/**
 * Same site ignores scheme and a leading `www.`. With `includeSubdomains`, any
 * host ending in `.<root host>` also counts.
 */
export function isSameSite(url: string, rootUrl: string, includeSubdomains = false): boolean {
  const host = siteHost(url);
  const rootHost = siteHost(rootUrl);
  if (!host || !rootHost) return false;
  if (host === rootHost) return true;
  return includeSubdomains && host.endsWith(`.${rootHost}`);
}

export function getSitemapUrls(rootUrl: string): string[] {
  try {
    const parsed = new URL(rootUrl);
    const base = `${parsed.protocol}//${parsed.host}`;
    return [
      `${base}/sitemap.xml`,
      `${base}/sitemap_index.xml`,
      `${base}/sitemap/sitemap.xml`,
    ];
  } catch {
    return [];
  }
}

export function getRobotsUrl(rootUrl: string): string | null {
  try {
    const parsed = new URL(rootUrl);
    return `${parsed.protocol}//${parsed.host}/robots.txt`;
  } catch {
    return null;
  }
}
