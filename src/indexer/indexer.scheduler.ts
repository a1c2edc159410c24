import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron } from '@nestjs/schedule';
import { errorMessage } from '../common/utils/error.utils';
import { DEFAULT_REINDEX_CRON, ScheduleConfig } from '../config/schedule.config';
import { IndexerService } from './indexer.service';

@Injectable()
export class IndexerScheduler {
  private readonly logger = new Logger(IndexerScheduler.name);
  private readonly enabled: boolean;

  constructor(
    private readonly indexerService: IndexerService,
    configService: ConfigService,
  ) {
    this.enabled = configService.get<ScheduleConfig>('schedule')?.enabled ?? false;
  }

  // The expression is read when the class is defined; main loads .env before that
  @Cron(process.env.REINDEX_CRON || DEFAULT_REINDEX_CRON, { name: 'reindex' })
  async scheduledBuild(): Promise<void> {
    if (!this.enabled) {
      return;
    }
    if (this.indexerService.isRunning) {
      this.logger.warn('Skipping scheduled build, previous build still running');
      return;
    }

    try {
      const report = await this.indexerService.run();
      this.logger.log(
        `Scheduled build of revision ${report.revisionID} ${report.outcome} (${report.documentCount} documents)`,
      );
    } catch (error) {
      this.logger.error(`Scheduled build failed: ${errorMessage(error)}`);
    }
  }
}
