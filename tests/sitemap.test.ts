import { describe, it, expect } from 'vitest';
import { collectSitemapUrls, parseSitemap } from '../server/audit/sitemap';
import { FakeSite } from './helpers/fake-site';

const XML = { 'content-type': 'application/xml' };

function urlset(urls: string[]): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
${urls.map((u) => `  <url><loc>${u}</loc></url>`).join('\n')}
</urlset>`;
}

function sitemapIndex(urls: string[]): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<sitemapindex xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
${urls.map((u) => `  <sitemap><loc>${u}</loc></sitemap>`).join('\n')}
</sitemapindex>`;
}

const OPTIONS = {
  userAgent: 'site-seo-audit/1.0',
  timeoutMs: 1000,
  maxSitemaps: 10,
  maxUrls: 100,
  blockPrivateNetworks: false,
};

describe('parseSitemap', () => {
  it('reads a urlset, decoding entities and CDATA', () => {
    const doc = parseSitemap(`<urlset>
      <url><loc> https://example.com/a?x=1&amp;y=2 </loc></url>
      <url><loc><![CDATA[https://example.com/b]]></loc></url>
    </urlset>`);
    expect(doc).toEqual({ kind: 'urlset', urls: ['https://example.com/a?x=1&y=2', 'https://example.com/b'] });
  });

  it('reads a sitemap index', () => {
    expect(parseSitemap(sitemapIndex(['https://example.com/s1.xml']))).toEqual({
      kind: 'index',
      sitemaps: ['https://example.com/s1.xml'],
    });
  });

  it('handles namespaced tags', () => {
    const doc = parseSitemap('<sm:urlset xmlns:sm="x"><sm:url><sm:loc>https://example.com/n</sm:loc></sm:url></sm:urlset>');
    expect(doc).toEqual({ kind: 'urlset', urls: ['https://example.com/n'] });
  });

  it('accepts the plain-text form', () => {
    expect(parseSitemap('https://example.com/a\nhttps://example.com/b\n')).toEqual({
      kind: 'urlset',
      urls: ['https://example.com/a', 'https://example.com/b'],
    });
  });

  it('rejects empty and unrelated documents', () => {
    expect(parseSitemap('  ')).toEqual({ kind: 'invalid', reason: 'empty document' });
    expect(parseSitemap('<html><body>hi</body></html>').kind).toBe('invalid');
  });
});

describe('collectSitemapUrls', () => {
  it('walks an index breadth-first and dedupes URLs', async () => {
    const site = new FakeSite({
      'https://example.com/sitemap.xml': {
        headers: XML,
        body: sitemapIndex(['https://example.com/s1.xml', 'https://example.com/s2.xml']),
      },
      'https://example.com/s1.xml': { headers: XML, body: urlset(['https://example.com/a', 'https://example.com/b']) },
      'https://example.com/s2.xml': { headers: XML, body: urlset(['https://example.com/b', 'https://example.com/c']) },
    });

    const result = await collectSitemapUrls(['https://example.com/sitemap.xml'], { ...OPTIONS, http: site.http });

    expect(result.urls).toEqual(['https://example.com/a', 'https://example.com/b', 'https://example.com/c']);
    expect(result.fetched).toEqual([
      'https://example.com/sitemap.xml',
      'https://example.com/s1.xml',
      'https://example.com/s2.xml',
    ]);
    expect(result.warnings).toEqual([]);
  });

  it('skips sitemaps that fail and keeps the rest', async () => {
    const site = new FakeSite({
      'https://example.com/sitemap.xml': {
        headers: XML,
        body: sitemapIndex(['https://example.com/missing.xml', 'https://example.com/ok.xml']),
      },
      'https://example.com/ok.xml': { headers: XML, body: urlset(['https://example.com/a']) },
    });

    const result = await collectSitemapUrls(['https://example.com/sitemap.xml'], { ...OPTIONS, http: site.http });

    expect(result.urls).toEqual(['https://example.com/a']);
    expect(result.warnings).toEqual(['Skipped sitemap https://example.com/missing.xml: HTTP 404']);
  });

  it('stops at the URL limit', async () => {
    const site = new FakeSite({
      'https://example.com/sitemap.xml': {
        headers: XML,
        body: urlset(['https://example.com/1', 'https://example.com/2', 'https://example.com/3']),
      },
    });

    const result = await collectSitemapUrls(['https://example.com/sitemap.xml'], {
      ...OPTIONS,
      maxUrls: 2,
      http: site.http,
    });

    expect(result.urls).toEqual(['https://example.com/1', 'https://example.com/2']);
    expect(result.warnings).toEqual(['Sitemap URL limit of 2 reached; remaining entries ignored']);
  });

  it('stops at the document limit', async () => {
    const site = new FakeSite({
      'https://example.com/sitemap.xml': {
        headers: XML,
        body: sitemapIndex(['https://example.com/s1.xml', 'https://example.com/s2.xml']),
      },
      'https://example.com/s1.xml': { headers: XML, body: urlset(['https://example.com/a']) },
    });

    const result = await collectSitemapUrls(['https://example.com/sitemap.xml'], {
      ...OPTIONS,
      maxSitemaps: 2,
      http: site.http,
    });

    expect(result.urls).toEqual(['https://example.com/a']);
    expect(result.warnings).toEqual(['Sitemap limit of 2 documents reached; 1 not fetched']);
    expect(site.requestsTo('https://example.com/s2.xml')).toHaveLength(0);
  });
});
