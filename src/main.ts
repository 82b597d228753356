import 'reflect-metadata';
import { INestApplicationContext, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { config as dotenvConfig } from 'dotenv';
import { AppModule } from './app.module';
import { ProfilePipelineService } from './pipeline/profile-pipeline.service';

export type ContextFactory = () => Promise<INestApplicationContext>;

const createAppContext: ContextFactory = () =>
  NestFactory.createApplicationContext(AppModule, { abortOnError: false });

export async function bootstrap(createContext: ContextFactory = createAppContext) {
  const app = await createContext();

  try {
    const summary = await app.get(ProfilePipelineService).run();
    Logger.log(
      `Scrape complete: ${summary.fetched} new, ${summary.skipped} already stored, ${summary.totalRows} rows in ${summary.outputPath}`,
      'Bootstrap',
    );
  } finally {
    await app.close();
  }
}

/** Runs one scrape; a failure is logged and turns into exit code 1. */
export async function runCli(createContext?: ContextFactory): Promise<void> {
  try {
    await bootstrap(createContext);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    const stack = error instanceof Error ? error.stack : undefined;
    Logger.error(`Scrape failed: ${message}`, stack, 'Bootstrap');
    process.exitCode = 1;
  }
}

if (require.main === module) {
  dotenvConfig();
  void runCli();
}
