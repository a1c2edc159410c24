// Loaded before AppModule so decorator options see values from .env
import 'dotenv/config';
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { ScheduleConfig } from './config/schedule.config';
import { IndexerService } from './indexer/indexer.service';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.createApplicationContext(AppModule);
  const indexer = app.get(IndexerService);

  // Fail fast when the search backend is unreachable
  await indexer.healthz();

  const schedule = app.get(ConfigService).getOrThrow<ScheduleConfig>('schedule');
  if (schedule.enabled) {
    app.enableShutdownHooks();
    logger.log(`Scheduled re-indexing enabled (${schedule.cron})`);
    return;
  }

  const controller = new AbortController();
  const abort = () => controller.abort();
  process.once('SIGINT', abort);
  process.once('SIGTERM', abort);

  try {
    const report = await indexer.run(controller.signal);
    logger.log(
      `Revision ${report.revisionID} ${report.outcome}: ${report.documentCount} documents indexed`,
    );
    process.exitCode = report.outcome === 'committed' ? 0 : 2;
  } finally {
    process.off('SIGINT', abort);
    process.off('SIGTERM', abort);
    await app.close();
  }
}

bootstrap().catch(error => {
  new Logger('Bootstrap').error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
