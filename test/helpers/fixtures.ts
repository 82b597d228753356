import { Translator } from '../../src/translation/translator';

export interface SitemapFixtureEntry {
  loc?: string;
  title?: string;
}

export function buildSitemap(entries: SitemapFixtureEntry[]): string {
  const urls = entries
    .map(({ loc, title }) => {
      const location = loc === undefined ? '' : `<loc>${loc}</loc>`;
      const image =
        title === undefined
          ? ''
          : `<image:image><image:loc>https://images.example/${encodeURIComponent(title)}.jpg</image:loc><image:title>${title}</image:title></image:image>`;
      return `  <url>${location}<lastmod>2024-01-01</lastmod>${image}</url>`;
    })
    .join('\n');

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9" xmlns:image="http://www.google.com/schemas/sitemap-image/1.1">',
    urls,
    '</urlset>',
  ].join('\n');
}

export function buildProfilePage(paragraphs: string[]): string {
  const blocks = paragraphs
    .map((text) => `<div class="sqs-block-content"><p>${text}</p></div>`)
    .join('\n');
  return `<html><head><title>Profile</title></head><body><nav><p>Menu</p></nav>${blocks}</body></html>`;
}

export class FakeTranslator implements Translator {
  readonly calls: Array<{ text: string; from: string; to: string }> = [];

  async translate(text: string, from: string, to: string): Promise<string> {
    this.calls.push({ text, from, to });
    return `[${to}] ${text}`;
  }
}
