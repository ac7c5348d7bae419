import * as cron from 'node-cron';
import { PipelineDefinition } from '../models/Pipeline.js';
import { TriggerType } from '../models/types/index.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { PipelineDefinitionService } from './pipeline-definition.service.js';
import { RunCoordinatorService } from './run-coordinator.service.js';

const logger = createLogger('SchedulerService');

export class SchedulerService {
  private scheduledJobs = new Map<string, cron.ScheduledTask>();

  constructor(
    private coordinator: RunCoordinatorService,
    private definitions: PipelineDefinitionService
  ) {}

  initialize(): void {
    const scheduled = this.definitions.list().filter(definition => definition.schedule);
    logger.info(`Found ${scheduled.length} pipelines with schedules`);
    for (const definition of scheduled) {
      this.schedulePipeline(definition);
    }
  }

  schedulePipeline(definition: PipelineDefinition): boolean {
    this.unschedulePipeline(definition.name);

    const schedule = definition.schedule;
    if (!schedule?.cron) {
      return false;
    }

    if (!cron.validate(schedule.cron)) {
      logger.error(`Invalid cron expression for pipeline ${definition.name}: ${schedule.cron}`);
      return false;
    }

    const job = cron.schedule(schedule.cron, () => {
      try {
        logger.info(`Triggering scheduled run for pipeline ${definition.name}`);
        this.coordinator.start(definition, { trigger: TriggerType.Scheduled });
      } catch (error) {
        logger.error(`Error running scheduled pipeline ${definition.name}: ${errorMessage(error)}`);
      }
    }, {
      timezone: schedule.timezone || 'UTC'
    });

    this.scheduledJobs.set(definition.name, job);
    logger.info(`Scheduled pipeline ${definition.name} with cron: ${schedule.cron}`);
    return true;
  }

  unschedulePipeline(name: string): void {
    const job = this.scheduledJobs.get(name);
    if (job) {
      job.stop();
      this.scheduledJobs.delete(name);
      logger.info(`Unscheduled pipeline ${name}`);
    }
  }

  scheduledPipelines(): string[] {
    return [...this.scheduledJobs.keys()];
  }

  stopAll(): void {
    logger.info(`Stopping all scheduled jobs (${this.scheduledJobs.size} jobs)`);
    for (const [name, job] of this.scheduledJobs) {
      job.stop();
      logger.debug(`Stopped schedule for pipeline ${name}`);
    }
    this.scheduledJobs.clear();
  }
}
