import { describe, it, expect } from 'vitest';
import {
  createCrawlPolicy,
  isPathAllowed,
  matchesPattern,
  parseRobotsTxt,
  permissivePolicy,
  productToken,
  selectGroup,
} from '../server/audit/robots';

const ROBOTS = `
# house rules
User-agent: *
Disallow: /admin
Allow: /admin/public
Crawl-delay: 2

User-agent: site-seo-audit
User-agent: otherbot
Disallow: /private   # keep out
Crawl-delay: 0.5

Sitemap: https://example.com/sitemap.xml
`;

describe('parseRobotsTxt', () => {
  it('groups consecutive user-agent lines and strips comments', () => {
    const parsed = parseRobotsTxt(ROBOTS);
    expect(parsed.groups).toEqual([
      {
        agents: ['*'],
        rules: [
          { type: 'disallow', pattern: '/admin' },
          { type: 'allow', pattern: '/admin/public' },
        ],
        crawlDelaySec: 2,
      },
      {
        agents: ['site-seo-audit', 'otherbot'],
        rules: [{ type: 'disallow', pattern: '/private' }],
        crawlDelaySec: 0.5,
      },
    ]);
    expect(parsed.sitemaps).toEqual(['https://example.com/sitemap.xml']);
  });

  it('ignores an empty Disallow', () => {
    const parsed = parseRobotsTxt('User-agent: *\nDisallow:\n');
    expect(parsed.groups[0].rules).toEqual([]);
  });

  it('returns no groups for an empty file', () => {
    expect(parseRobotsTxt('')).toEqual({ groups: [], sitemaps: [] });
  });
});

describe('productToken', () => {
  it('reduces user agent strings to the bot token', () => {
    expect(productToken('site-seo-audit/1.0')).toBe('site-seo-audit');
    expect(productToken('Mozilla/5.0 (compatible; SiteBot/2.1; +https://example.com)')).toBe('sitebot');
  });
});

describe('selectGroup', () => {
  it('prefers the group naming the agent', () => {
    const group = selectGroup(parseRobotsTxt(ROBOTS), 'site-seo-audit/1.0');
    expect(group.rules).toEqual([{ type: 'disallow', pattern: '/private' }]);
    expect(group.crawlDelaySec).toBe(0.5);
  });

  it('falls back to the wildcard group', () => {
    const group = selectGroup(parseRobotsTxt(ROBOTS), 'unknownbot/3');
    expect(group.rules).toHaveLength(2);
    expect(group.crawlDelaySec).toBe(2);
  });

  it('returns no rules when nothing matches', () => {
    const group = selectGroup(parseRobotsTxt('User-agent: otherbot\nDisallow: /'), 'site-seo-audit/1.0');
    expect(group).toEqual({ rules: [], crawlDelaySec: null });
  });
});

describe('matchesPattern / isPathAllowed', () => {
  it('supports wildcards and end anchors', () => {
    expect(matchesPattern('/*.pdf$', '/files/report.pdf')).toBe(true);
    expect(matchesPattern('/*.pdf$', '/files/report.pdf?x=1')).toBe(false);
    expect(matchesPattern('/search', '/search?q=a')).toBe(true);
  });

  it('lets the longest match win, with allow winning ties', () => {
    const rules = [
      { type: 'disallow' as const, pattern: '/admin' },
      { type: 'allow' as const, pattern: '/admin/public' },
    ];
    expect(isPathAllowed(rules, '/admin/users')).toBe(false);
    expect(isPathAllowed(rules, '/admin/public/page')).toBe(true);
    expect(isPathAllowed(rules, '/about')).toBe(true);

    const tie = [
      { type: 'disallow' as const, pattern: '/page' },
      { type: 'allow' as const, pattern: '/page' },
    ];
    expect(isPathAllowed(tie, '/page')).toBe(true);
  });

  it('never disallows robots.txt itself', () => {
    expect(isPathAllowed([{ type: 'disallow', pattern: '/' }], '/robots.txt')).toBe(true);
  });
});

describe('createCrawlPolicy', () => {
  it('checks path and query of absolute URLs', () => {
    const policy = createCrawlPolicy({
      source: 'robots',
      userAgent: 'site-seo-audit/1.0',
      rules: [{ type: 'disallow', pattern: '/*?sort=' }],
      crawlDelayMs: 500,
    });
    expect(policy.isAllowed('https://example.com/list')).toBe(true);
    expect(policy.isAllowed('https://example.com/list?sort=asc')).toBe(false);
    expect(policy.isAllowed('::not a url::')).toBe(false);
    expect(policy.crawlDelayMs).toBe(500);
    expect(Object.isFrozen(policy)).toBe(true);
  });

  it('permissive policy allows everything with no delay', () => {
    const policy = permissivePolicy('site-seo-audit/1.0');
    expect(policy.source).toBe('default');
    expect(policy.crawlDelayMs).toBe(0);
    expect(policy.isAllowed('https://example.com/anything')).toBe(true);
  });
});
