import type { PageRecord } from '../../server/audit/types';

/**
 * A fetched HTML page that trips no insight rule on its own. Link hrefs follow
 * `internalLinks` unless given.
 */
export function makePage(url: string, overrides: Partial<PageRecord> = {}): PageRecord {
  const page: PageRecord = {
    url,
    statusCode: 200,
    failure: null,
    finalUrl: url,
    redirectChain: [],
    contentType: 'text/html; charset=utf-8',
    isHtml: true,
    contentLength: 5000,
    fetchMs: 10,
    depth: 0,
    source: 'seed',
    title: `Title for ${url}`,
    metaDescription: `Description of ${url}`.padEnd(130, '.'),
    canonical: url,
    h1: ['Heading'],
    outboundLinks: [],
    internalLinks: [],
    internalHrefs: [],
    externalLinks: [],
    imageCount: 0,
    imagesWithoutAlt: 0,
    structuredDataTypes: ['WebPage'],
    scriptCount: 0,
    textLength: 500,
    ...overrides,
  };
  return { ...page, internalHrefs: overrides.internalHrefs ?? page.internalLinks };
}

export function makeFailedPage(url: string, code: number, overrides: Partial<PageRecord> = {}): PageRecord {
  return makePage(url, {
    statusCode: code,
    failure: { kind: 'HTTPError', code, message: `HTTP ${code}` },
    contentType: null,
    isHtml: false,
    contentLength: 0,
    title: null,
    metaDescription: null,
    canonical: null,
    h1: [],
    structuredDataTypes: [],
    textLength: 0,
    ...overrides,
  });
}
