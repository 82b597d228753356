import { CheerioAPI } from 'cheerio';
import { ProfileExtractor } from './profile-extractor';

/**
 * Squarespace-style pages: text lives in <p> elements inside
 * `div.sqs-block-content` blocks.
 */
export class ContentBlockExtractor implements ProfileExtractor {
  constructor(
    private readonly blockSelector = 'div.sqs-block-content',
    private readonly paragraphSelector = 'p',
  ) {}

  extract($: CheerioAPI): string {
    const paragraphs: string[] = [];

    $(this.blockSelector).each((_, block) => {
      $(block)
        .find(this.paragraphSelector)
        .each((_, p) => {
          const text = $(p).text().trim();
          // trim() also strips U+00A0, so &nbsp; spacer paragraphs end up empty
          if (text.length > 0) {
            paragraphs.push(text);
          }
        });
    });

    return paragraphs.join(' ');
  }
}
