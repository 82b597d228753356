import { buildSitemap } from '../../test/helpers/fixtures';
import {
  createStubHttpClient,
  StubHttpClient,
} from '../../test/helpers/stub-http-client';
import { loadScraperConfig, ScraperConfig } from '../config/scraper.config';
import { SitemapParseError } from '../errors/scraper.errors';
import { parseSitemap, SitemapService } from './sitemap.service';

const SITEMAP_URL = 'https://wines.example/sitemap.xml';

describe('SitemapService', () => {
  let config: ScraperConfig;
  let stub: StubHttpClient;
  let service: SitemapService;

  beforeEach(() => {
    config = loadScraperConfig({
      SCRAPER_SITEMAP_URL: SITEMAP_URL,
      SCRAPER_EXCLUSIONS: 'https://wines.example/contact',
      SCRAPER_USER_AGENT: 'test-agent/1.0',
    });
    stub = createStubHttpClient(config, {});
    service = new SitemapService(stub.client, config);
  });

  describe('filterEntries', () => {
    it('emits only entries outside the exclusion list', () => {
      const $ = parseSitemap(
        buildSitemap([
          { loc: 'https://wines.example/contact', title: 'Contact' },
          { loc: 'https://wines.example/alice', title: 'Alice' },
        ]),
        SITEMAP_URL,
      );

      expect(service.filterEntries($)).toEqual([
        { location: 'https://wines.example/alice', title: 'Alice' },
      ]);
    });

    it('excludes locations that merely contain an excluded fragment', () => {
      const $ = parseSitemap(
        buildSitemap([
          { loc: 'https://wines.example/contact-us', title: 'Contact' },
          { loc: 'https://wines.example/bob', title: 'Bob' },
        ]),
        SITEMAP_URL,
      );

      expect(service.filterEntries($).map((e) => e.location)).toEqual([
        'https://wines.example/bob',
      ]);
    });

    it('drops entries without a title or a location', () => {
      const $ = parseSitemap(
        buildSitemap([
          { loc: 'https://wines.example/bob' },
          { title: 'Carol' },
          { loc: 'https://wines.example/dora', title: 'Dora' },
        ]),
        SITEMAP_URL,
      );

      expect(service.filterEntries($)).toEqual([
        { location: 'https://wines.example/dora', title: 'Dora' },
      ]);
    });

    it('drops entries whose title is blank', () => {
      const $ = parseSitemap(
        buildSitemap([{ loc: 'https://wines.example/erik', title: '   ' }]),
        SITEMAP_URL,
      );

      expect(service.filterEntries($)).toEqual([]);
    });

    it('keeps document order and trims surrounding whitespace', () => {
      const xml = `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9" xmlns:image="http://www.google.com/schemas/sitemap-image/1.1">
  <url>
    <loc>
      https://wines.example/zoe
    </loc>
    <image:image><image:title> Zoë </image:title></image:image>
  </url>
  <url>
    <loc>https://wines.example/adam</loc>
    <image:image><image:title>Adam</image:title></image:image>
  </url>
</urlset>`;

      expect(service.filterEntries(parseSitemap(xml, SITEMAP_URL))).toEqual([
        { location: 'https://wines.example/zoe', title: 'Zoë' },
        { location: 'https://wines.example/adam', title: 'Adam' },
      ]);
    });

    it('accepts an explicit exclusion list', () => {
      const $ = parseSitemap(
        buildSitemap([
          { loc: 'https://wines.example/contact', title: 'Contact' },
          { loc: 'https://wines.example/alice', title: 'Alice' },
        ]),
        SITEMAP_URL,
      );

      expect(service.filterEntries($, ['/alice'])).toEqual([
        { location: 'https://wines.example/contact', title: 'Contact' },
      ]);
    });
  });

  describe('fetchSitemap', () => {
    it('requests the configured sitemap with the custom User-Agent', async () => {
      stub.routes.set(
        SITEMAP_URL,
        buildSitemap([{ loc: 'https://wines.example/alice', title: 'Alice' }]),
      );

      const candidates = await service.getCandidates();

      expect(stub.requests).toEqual([
        { url: SITEMAP_URL, userAgent: 'test-agent/1.0' },
      ]);
      expect(candidates).toEqual([
        { location: 'https://wines.example/alice', title: 'Alice' },
      ]);
    });

    it('rejects a body that is not XML', async () => {
      stub.routes.set(SITEMAP_URL, 'Service temporarily unavailable');

      await expect(service.fetchSitemap()).rejects.toThrow(SitemapParseError);
      await expect(service.fetchSitemap()).rejects.toThrow(
        `Sitemap at ${SITEMAP_URL} is not an XML document`,
      );
    });

    it('yields no candidates for a sitemap index', async () => {
      stub.routes.set(
        SITEMAP_URL,
        `<?xml version="1.0" encoding="UTF-8"?>
<sitemapindex xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
  <sitemap><loc>https://wines.example/sitemap-pages.xml</loc></sitemap>
</sitemapindex>`,
      );

      await expect(service.getCandidates()).resolves.toEqual([]);
    });

    it('rejects an empty body', async () => {
      stub.routes.set(SITEMAP_URL, '');

      await expect(service.fetchSitemap()).rejects.toThrow(
        `Sitemap at ${SITEMAP_URL} is empty`,
      );
    });

    it('propagates transport failures', async () => {
      await expect(service.fetchSitemap()).rejects.toThrow(
        'Request failed with status code 404',
      );
    });
  });
});
