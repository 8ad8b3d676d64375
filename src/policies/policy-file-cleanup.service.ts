import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { PoliciesService } from './policies.service';

/**
 * Background job that drops retained policy documents once their
 * expiresAt has passed. The analysis record itself stays.
 */
@Injectable()
export class PolicyFileCleanupService {
  private readonly logger = new Logger(PolicyFileCleanupService.name);

  constructor(private readonly policiesService: PoliciesService) {}

  @Cron(CronExpression.EVERY_HOUR, {
    name: 'policy-file-cleanup',
    timeZone: 'UTC',
  })
  async handleFileCleanup(): Promise<void> {
    const startTime = Date.now();
    this.logger.log('Starting retained file cleanup job...');

    try {
      const released = await this.policiesService.purgeExpiredFiles();
      this.logger.log(
        `Retained file cleanup completed: ${released} file(s) purged in ${Date.now() - startTime}ms`,
      );
    } catch (error) {
      this.logger.error(
        'Retained file cleanup job failed',
        error instanceof Error ? error.stack : String(error),
      );
    }
  }
}
