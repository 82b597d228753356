import { plainToInstance, Transform, Type } from 'class-transformer';
import {
  IsArray,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  Min,
  validateSync,
} from 'class-validator';
import { ConfigurationError } from '../errors/scraper.errors';

export const SCRAPER_CONFIG = 'SCRAPER_CONFIG';

export const DEFAULT_EXCLUSIONS = [
  'https://www.terrovin.be/bestellen',
  'https://www.terrovin.be/prijslijst',
  'https://www.terrovin.be/contact',
  'https://www.terrovin.be/events',
  'https://www.terrovin.be/intro',
];

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:106.0) Gecko/20100101 Firefox/106.0';

function toList({ value }: { value: unknown }): unknown {
  if (typeof value !== 'string') return value;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export class ScraperConfig {
  @IsUrl({ require_tld: false })
  sitemapUrl!: string;

  @IsArray()
  @IsString({ each: true })
  @Transform(toList)
  exclusions!: string[];

  @IsString()
  @IsNotEmpty()
  outputFile!: string;

  @IsString()
  @IsNotEmpty()
  userAgent!: string;

  @IsString()
  @IsNotEmpty()
  sourceLanguage!: string;

  @IsString()
  @IsNotEmpty()
  targetLanguage!: string;

  // 0 keeps the axios default (no timeout)
  @Type(() => Number)
  @IsInt()
  @Min(0)
  requestTimeoutMs!: number;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  requestDelayMs!: number;

  @IsString()
  @IsNotEmpty()
  contentSelector!: string;

  @IsString()
  @IsNotEmpty()
  paragraphSelector!: string;

  @IsOptional()
  @IsString()
  anthropicApiKey?: string;

  @IsString()
  @IsNotEmpty()
  translationModel!: string;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  translationMaxTokens!: number;
}

export type ScraperEnv = Record<string, string | undefined>;

function read(env: ScraperEnv, key: string, fallback: string): string {
  const value = env[key];
  return value !== undefined && value.trim() !== '' ? value.trim() : fallback;
}

/**
 * Builds the scraper configuration from environment variables.
 * Unset or blank variables fall back to the defaults for the terrovin.be
 * winemaker catalogue.
 */
export function loadScraperConfig(env: ScraperEnv = process.env): ScraperConfig {
  const plain = {
    sitemapUrl: read(env, 'SCRAPER_SITEMAP_URL', 'https://www.terrovin.be/sitemap.xml'),
    exclusions: read(env, 'SCRAPER_EXCLUSIONS', DEFAULT_EXCLUSIONS.join(',')),
    outputFile: read(env, 'SCRAPER_OUTPUT_FILE', 'winemaker_profiles.csv'),
    userAgent: read(env, 'SCRAPER_USER_AGENT', DEFAULT_USER_AGENT),
    sourceLanguage: read(env, 'SCRAPER_SOURCE_LANGUAGE', 'nl'),
    targetLanguage: read(env, 'SCRAPER_TARGET_LANGUAGE', 'en'),
    requestTimeoutMs: read(env, 'SCRAPER_REQUEST_TIMEOUT_MS', '0'),
    requestDelayMs: read(env, 'SCRAPER_REQUEST_DELAY_MS', '0'),
    contentSelector: read(env, 'SCRAPER_CONTENT_SELECTOR', 'div.sqs-block-content'),
    paragraphSelector: read(env, 'SCRAPER_PARAGRAPH_SELECTOR', 'p'),
    anthropicApiKey: env.ANTHROPIC_API_KEY || undefined,
    translationModel: read(env, 'TRANSLATION_MODEL', 'claude-3-haiku-20240307'),
    translationMaxTokens: read(env, 'TRANSLATION_MAX_TOKENS', '4096'),
  };

  const config = plainToInstance(ScraperConfig, plain);
  const errors = validateSync(config);

  if (errors.length > 0) {
    const problems = errors.flatMap((error) =>
      Object.values(error.constraints ?? {}),
    );
    throw new ConfigurationError(
      `Invalid scraper configuration: ${problems.join('; ')}`,
    );
  }

  return config;
}
