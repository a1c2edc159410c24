import { registerAs } from '@nestjs/config';

export const DEFAULT_REINDEX_CRON = '0 0 3 * * *';

export interface ScheduleConfig {
  enabled: boolean;
  cron: string;
}

export default registerAs(
  'schedule',
  (): ScheduleConfig => ({
    enabled: process.env.REINDEX_SCHEDULE_ENABLED === 'true',
    cron: process.env.REINDEX_CRON || DEFAULT_REINDEX_CRON,
  }),
);
