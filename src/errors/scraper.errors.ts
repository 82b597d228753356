export class ScraperError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends ScraperError {}

export class SitemapParseError extends ScraperError {}

export class ProfileTableError extends ScraperError {}

export class TranslationError extends ScraperError {}

export class ResponseBodyError extends ScraperError {}
