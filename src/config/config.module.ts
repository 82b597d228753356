import { Global, Module } from '@nestjs/common';
import { loadScraperConfig, SCRAPER_CONFIG } from './scraper.config';

@Global()
@Module({
  providers: [
    {
      provide: SCRAPER_CONFIG,
      useFactory: () => loadScraperConfig(process.env),
    },
  ],
  exports: [SCRAPER_CONFIG],
})
export class ScraperConfigModule {}
