/**
 * node-cron jobs for periodic collection and, when configured, brief generation.
 * Started by `daybrief watch` and `daybrief serve`.
 */

import cron, { type ScheduledTask } from 'node-cron';
import type { Config } from '../shared/config.js';
import type { Coordinator } from '../collect/coordinator.js';
import type { BriefGenerator } from '../brief/generator.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface SchedulerDeps {
  coordinator: Coordinator;
  /** Built on first use so a missing API key only matters when a brief is due. */
  briefGenerator?: () => BriefGenerator;
}

export async function runScheduledCollect(coordinator: Coordinator): Promise<void> {
  if (coordinator.isRunning) {
    logger.warn('Previous collection still running, skipping this tick');
    return;
  }
  logger.info('Scheduled collection starting');
  try {
    const stats = await coordinator.collectAll();
    logger.info(stats, 'Scheduled collection complete');
  } catch (e) {
    logger.error({ error: errorMessage(e) }, 'Scheduled collection failed');
  }
}

export async function runScheduledBrief(build: () => BriefGenerator): Promise<void> {
  logger.info('Scheduled brief starting');
  try {
    const result = await build().generate();
    logger.info({ status: result.status, items: result.plan.items.length }, 'Scheduled brief complete');
  } catch (e) {
    logger.error({ error: errorMessage(e) }, 'Scheduled brief failed');
  }
}

export class Scheduler {
  private tasks: ScheduledTask[] = [];

  constructor(
    private readonly schedule: Config['schedule'],
    private readonly deps: SchedulerDeps,
  ) {}

  /**
   * Returns false when an expression is invalid; nothing is scheduled then.
   */
  start(): boolean {
    const { collect_cron: collectCron, analyze_cron: analyzeCron } = this.schedule;
    const build = this.deps.briefGenerator;

    if (!cron.validate(collectCron)) {
      logger.warn({ collectCron }, 'Invalid collect_cron expression, scheduler not started');
      return false;
    }
    if (analyzeCron && !cron.validate(analyzeCron)) {
      logger.warn({ analyzeCron }, 'Invalid analyze_cron expression, scheduler not started');
      return false;
    }

    this.tasks.push(
      cron.schedule(collectCron, () => {
        void runScheduledCollect(this.deps.coordinator);
      }),
    );

    if (analyzeCron && build) {
      this.tasks.push(
        cron.schedule(analyzeCron, () => {
          void runScheduledBrief(build);
        }),
      );
    }

    logger.info({ collect_cron: collectCron, analyze_cron: analyzeCron || null }, 'Scheduler started');
    return true;
  }

  stop(): void {
    for (const task of this.tasks) task.stop();
    this.tasks = [];
    logger.info('Scheduler stopped');
  }
}
