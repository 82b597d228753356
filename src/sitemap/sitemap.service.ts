import { Inject, Injectable, Logger } from '@nestjs/common';
import { AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import { SCRAPER_CONFIG, ScraperConfig } from '../config/scraper.config';
import { SitemapParseError } from '../errors/scraper.errors';
import { fetchText, HTTP_CLIENT } from '../http/http-client.provider';

export interface SitemapEntry {
  location: string;
  title: string;
}

/**
 * Parses a sitemap body as XML. Bodies without any root element are
 * rejected; a document of another kind (a <sitemapindex>, say) parses and
 * simply yields no entries.
 */
export function parseSitemap(body: string, source: string): cheerio.CheerioAPI {
  if (body.trim() === '') {
    throw new SitemapParseError(`Sitemap at ${source} is empty`);
  }

  const $ = cheerio.load(body, { xml: true });
  if ($.root().children().length === 0) {
    throw new SitemapParseError(`Sitemap at ${source} is not an XML document`);
  }
  return $;
}

@Injectable()
export class SitemapService {
  private readonly logger = new Logger(SitemapService.name);

  constructor(
    @Inject(HTTP_CLIENT) private readonly httpClient: AxiosInstance,
    @Inject(SCRAPER_CONFIG) private readonly config: ScraperConfig,
  ) {}

  async fetchSitemap(
    sitemapUrl: string = this.config.sitemapUrl,
  ): Promise<cheerio.CheerioAPI> {
    this.logger.log(`Fetching sitemap: ${sitemapUrl}`);
    const body = await fetchText(this.httpClient, sitemapUrl);
    const $ = parseSitemap(body, sitemapUrl);
    if ($('url').length === 0) {
      this.logger.warn(`Sitemap at ${sitemapUrl} lists no <url> entries`);
    }
    return $;
  }

  /**
   * Candidate (location, title) pairs in document order. Entries without a
   * <loc> or an <image:title> are dropped, as are locations containing any
   * of the exclusion substrings.
   */
  filterEntries(
    $: cheerio.CheerioAPI,
    exclusions: readonly string[] = this.config.exclusions,
  ): SitemapEntry[] {
    const entries: SitemapEntry[] = [];
    let incomplete = 0;
    let excluded = 0;

    $('url').each((_, element) => {
      const url = $(element);
      // Namespaced names such as image:title are matched on the literal tag name.
      const childText = (tagName: string): string | undefined => {
        const child = url
          .find('*')
          .filter((_, el) => el.name === tagName)
          .first();
        const text = child.text().trim();
        return text.length > 0 ? text : undefined;
      };

      const location = childText('loc');
      const title = childText('image:title');

      if (location === undefined || title === undefined) {
        incomplete++;
        return;
      }
      if (exclusions.some((fragment) => location.includes(fragment))) {
        excluded++;
        return;
      }

      entries.push({ location, title });
    });

    if (incomplete > 0) {
      this.logger.warn(
        `Dropped ${incomplete} sitemap entries without a location or title`,
      );
    }
    this.logger.log(
      `Found ${entries.length} candidate profiles (${excluded} excluded)`,
    );
    return entries;
  }

  async getCandidates(): Promise<SitemapEntry[]> {
    const $ = await this.fetchSitemap();
    return this.filterEntries($);
  }
}
