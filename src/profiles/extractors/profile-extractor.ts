import { CheerioAPI } from 'cheerio';

export const PROFILE_EXTRACTOR = 'PROFILE_EXTRACTOR';

/**
 * Pulls the descriptive text out of one site's profile page template.
 * Each target site gets its own implementation.
 */
export interface ProfileExtractor {
  extract($: CheerioAPI): string;
}
