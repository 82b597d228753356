import { Module } from '@nestjs/common';
import { SCRAPER_CONFIG, ScraperConfig } from '../config/scraper.config';
import { httpClientProvider } from '../http/http-client.provider';
import { ProfilePipelineService } from '../pipeline/profile-pipeline.service';
import { SitemapService } from '../sitemap/sitemap.service';
import { TranslationModule } from '../translation/translation.module';
import { ContentBlockExtractor } from './extractors/content-block.extractor';
import { PROFILE_EXTRACTOR } from './extractors/profile-extractor';
import { ProfileStoreService } from './profile-store.service';
import { ProfileService } from './profile.service';

@Module({
  imports: [TranslationModule],
  providers: [
    httpClientProvider,
    {
      provide: PROFILE_EXTRACTOR,
      useFactory: (config: ScraperConfig) =>
        new ContentBlockExtractor(
          config.contentSelector,
          config.paragraphSelector,
        ),
      inject: [SCRAPER_CONFIG],
    },
    SitemapService,
    ProfileService,
    ProfileStoreService,
    ProfilePipelineService,
  ],
  exports: [ProfilePipelineService],
})
export class ProfilesModule {}
