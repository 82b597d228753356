import { Inject, Injectable, Logger } from '@nestjs/common';
import { SCRAPER_CONFIG, ScraperConfig } from '../config/scraper.config';
import {
  PROFILE_EXTRACTOR,
  ProfileExtractor,
} from '../profiles/extractors/profile-extractor';
import { ProfileStoreService } from '../profiles/profile-store.service';
import { ProfileRecord } from '../profiles/profile-table';
import { ProfileService } from '../profiles/profile.service';
import { SitemapEntry, SitemapService } from '../sitemap/sitemap.service';
import { TRANSLATOR, Translator } from '../translation/translator';

export interface PipelineSummary {
  candidates: number;
  fetched: number;
  skipped: number;
  totalRows: number;
  outputPath: string;
}

/**
 * One incremental scrape: load the stored table, walk the sitemap
 * candidates, fetch/extract/translate the ones not stored yet, then rewrite
 * the table. Nothing is written until every candidate has been processed.
 */
@Injectable()
export class ProfilePipelineService {
  private readonly logger = new Logger(ProfilePipelineService.name);

  constructor(
    @Inject(SCRAPER_CONFIG) private readonly config: ScraperConfig,
    private readonly profileStore: ProfileStoreService,
    private readonly sitemapService: SitemapService,
    private readonly profileService: ProfileService,
    @Inject(PROFILE_EXTRACTOR) private readonly extractor: ProfileExtractor,
    @Inject(TRANSLATOR) private readonly translator: Translator,
  ) {}

  async run(): Promise<PipelineSummary> {
    const table = await this.profileStore.load();
    const candidates = await this.sitemapService.getCandidates();

    let fetched = 0;
    let skipped = 0;

    for (const candidate of candidates) {
      if (table.has(candidate.location)) {
        skipped++;
        this.logger.debug(`Already stored, skipping: ${candidate.location}`);
        continue;
      }

      if (fetched > 0 && this.config.requestDelayMs > 0) {
        await this.sleep(this.config.requestDelayMs);
      }

      table.append(await this.processCandidate(candidate));
      fetched++;
    }

    await this.profileStore.save(table);

    return {
      candidates: candidates.length,
      fetched,
      skipped,
      totalRows: table.size,
      outputPath: this.config.outputFile,
    };
  }

  async processCandidate({
    location,
    title,
  }: SitemapEntry): Promise<ProfileRecord> {
    const $ = await this.profileService.fetchProfile(location);
    this.logger.log(`Retrieved profile for ${title} at ${location}`);

    const information = this.extractor.extract($);

    this.logger.log(`Translating ${title} profile...`);
    const translatedInformation = await this.translator.translate(
      information,
      this.config.sourceLanguage,
      this.config.targetLanguage,
    );

    return {
      url: location,
      winemaker: title,
      translatedInformation,
      information,
    };
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
