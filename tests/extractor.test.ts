import { describe, it, expect } from 'vitest';
import { emptyExtraction, extractPageData, isHtmlContent } from '../server/audit/extractor';

const ROOT = 'https://example.com/';

const PRODUCT_PAGE = `<html><head>
<title>  Widgets   and Gadgets </title>
<meta name="Description" content="All about widgets.">
<link rel="canonical" href="/products/">
<script type="application/ld+json">{"@context":"https://schema.org","@graph":[{"@type":"Organization"},{"@type":["WebPage","ItemPage"]}]}</script>
<script type="application/ld+json">{not json</script>
</head><body>
<h1>Widgets</h1><h1> </h1>
<a href="/about#team">About</a>
<a href="https://www.example.com/contact/">Contact</a>
<a href="/about">About again</a>
<a href="https://other.org/x">Other</a>
<a href="mailto:hi@example.com">Mail</a>
<img src="a.png" alt="A"><img src="b.png"><img src="c.png" alt="">
<script>var x = 1;</script>
</body></html>`;

describe('extractPageData', () => {
  const data = extractPageData(PRODUCT_PAGE, 'https://example.com/products/item', ROOT);

  it('reads title, description and canonical', () => {
    expect(data.title).toBe('Widgets and Gadgets');
    expect(data.metaDescription).toBe('All about widgets.');
    expect(data.canonical).toBe('https://example.com/products');
  });

  it('keeps every h1, empty ones included', () => {
    expect(data.h1).toEqual(['Widgets', '']);
  });

  it('splits normalized links into internal and external', () => {
    expect(data.outboundLinks).toEqual([
      '/about#team',
      'https://www.example.com/contact/',
      '/about',
      'https://other.org/x',
      'mailto:hi@example.com',
    ]);
    expect(data.internalLinks).toEqual(['https://example.com/about', 'https://www.example.com/contact']);
    expect(data.externalLinks).toEqual(['https://other.org/x']);
  });

  it('keeps the first href of each internal link as it would be requested', () => {
    expect(data.internalHrefs).toEqual(['https://example.com/about', 'https://www.example.com/contact/']);

    const html = '<a href="/docs/?ref=nav#top">Docs</a><a href="/docs">Docs again</a>';
    const docs = extractPageData(html, ROOT, ROOT);
    expect(docs.internalLinks).toEqual(['https://example.com/docs']);
    expect(docs.internalHrefs).toEqual(['https://example.com/docs/?ref=nav']);
  });

  it('counts images without an alt attribute', () => {
    expect(data.imageCount).toBe(3);
    expect(data.imagesWithoutAlt).toBe(1);
  });

  it('collects JSON-LD types and skips malformed blocks', () => {
    expect(data.structuredDataTypes).toEqual(['ItemPage', 'Organization', 'WebPage']);
    expect(data.scriptCount).toBe(3);
  });

  it('measures visible text only', () => {
    const html = '<html><body><p>Hello   world</p><script>var hidden = "text";</script><style>p{}</style></body></html>';
    expect(extractPageData(html, ROOT, ROOT).textLength).toBe(11);
  });

  it('resolves links against <base href>', () => {
    const html = '<html><head><base href="https://example.com/docs/"></head><body><a href="intro">Intro</a></body></html>';
    expect(extractPageData(html, 'https://example.com/other', ROOT).internalLinks).toEqual([
      'https://example.com/docs/intro',
    ]);
  });

  it('uses null for absent or empty tags', () => {
    const data = extractPageData('<html><head><title> </title></head><body></body></html>', ROOT, ROOT);
    expect(data).toEqual({ ...emptyExtraction() });
  });

  it('counts subdomain links as internal only when asked', () => {
    const html = '<a href="https://blog.example.com/post">Post</a>';
    expect(extractPageData(html, ROOT, ROOT).externalLinks).toEqual(['https://blog.example.com/post']);
    expect(extractPageData(html, ROOT, ROOT, true).internalLinks).toEqual(['https://blog.example.com/post']);
  });
});

describe('isHtmlContent', () => {
  it('trusts the content type when present', () => {
    expect(isHtmlContent('text/html; charset=utf-8', '')).toBe(true);
    expect(isHtmlContent('application/xhtml+xml', '')).toBe(true);
    expect(isHtmlContent('application/json', '<html></html>')).toBe(false);
  });

  it('sniffs the body otherwise', () => {
    expect(isHtmlContent('', '  <!DOCTYPE html><html></html>')).toBe(true);
    expect(isHtmlContent('', '{"a":1}')).toBe(false);
  });
});
