import cron, { type ScheduledTask } from 'node-cron';
import { createLogger } from '../utils/logger.js';
import type { ForecastPrefetchJob } from './ForecastPrefetchJob.js';

const logger = createLogger({ component: 'scheduler' });

export function scheduleForecastPrefetch(
  job: ForecastPrefetchJob,
  cronExpression: string,
  timezone?: string
): ScheduledTask {
  if (!cron.validate(cronExpression)) {
    throw new Error(`Invalid PREFETCH_CRON expression: ${cronExpression}`);
  }

  logger.info({ cronExpression }, 'Scheduling forecast prefetch job');

  return cron.schedule(
    cronExpression,
    () => {
      job.run().catch((error) => {
        logger.error({ error }, 'Forecast prefetch job failed');
      });
    },
    timezone && timezone !== 'auto' ? { timezone } : {}
  );
}
