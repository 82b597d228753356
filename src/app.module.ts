import { Module } from '@nestjs/common';
import { ScraperConfigModule } from './config/config.module';
import { ProfilesModule } from './profiles/profiles.module';

@Module({
  imports: [ScraperConfigModule, ProfilesModule],
})
export class AppModule {}
