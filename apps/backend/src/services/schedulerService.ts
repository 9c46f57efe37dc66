import cron from 'node-cron';
import type { DeletionAuditRepository } from '../repositories/deletionAuditRepository.js';
import type { ScanScheduleRepository } from '../repositories/scanScheduleRepository.js';
import type { ScheduleJobType } from '../db/schema.js';
import type { DuplicateScanService } from './duplicateScanService.js';
import defaultLogger, { type AppLogger } from './logger.js';

export interface SchedulerConfig {
  auditRetentionDays: number;
  timezone?: string;
}

export interface CronTask {
  stop(): void;
}

export interface CronApi {
  validate(expression: string): boolean;
  schedule(expression: string, handler: () => void, options?: { timezone?: string }): CronTask;
}

export interface SchedulerDeps {
  schedules: ScanScheduleRepository;
  /** Null when no catalog is configured or scanning is disabled. */
  scanService: Pick<DuplicateScanService, 'scanAll'> | null;
  audit: Pick<DeletionAuditRepository, 'pruneOlderThan'>;
  cronApi?: CronApi;
  log?: AppLogger;
}

type JobHandler = () => Promise<void>;

export class SchedulerService {
  private tasks = new Map<string, CronTask>();
  private running = new Set<string>();
  private isRunning = false;
  private readonly cronApi: CronApi;
  private readonly log: AppLogger;

  constructor(
    private readonly config: SchedulerConfig,
    private readonly deps: SchedulerDeps,
  ) {
    this.cronApi = deps.cronApi ?? cron;
    this.log = deps.log ?? defaultLogger;
  }

  start(): void {
    if (this.isRunning) {
      this.log.warn('Scheduler already running');
      return;
    }

    this.isRunning = true;
    this.loadSchedules();
  }

  stop(): void {
    if (!this.isRunning) {
      return;
    }

    for (const task of this.tasks.values()) {
      task.stop();
    }
    this.tasks.clear();
    this.isRunning = false;
    this.log.info('Scheduler stopped');
  }

  reload(): void {
    this.stop();
    this.start();
  }

  private loadSchedules(): void {
    const schedules = this.deps.schedules.listEnabled();

    for (const schedule of schedules) {
      if (schedule.jobType === 'duplicate_scan' && !this.deps.scanService) {
        this.log.info('Scanning unavailable, duplicate scan schedule not started', { scheduleId: schedule.id });
        continue;
      }

      try {
        this.scheduleJob(schedule.id, schedule.cronExpression, schedule.jobType);
      } catch (error) {
        this.log.error('Failed to schedule job', { scheduleId: schedule.id, error });
      }
    }

    this.log.info('Scheduler started', { jobs: this.tasks.size });
  }

  private scheduleJob(id: string, cronExpression: string, jobType: ScheduleJobType): void {
    if (!this.cronApi.validate(cronExpression)) {
      throw new Error(`Invalid cron expression: ${cronExpression}`);
    }

    this.tasks.get(id)?.stop();

    const task = this.cronApi.schedule(
      cronExpression,
      () => {
        void this.runSchedule(id, jobType);
      },
      { timezone: this.config.timezone },
    );

    this.tasks.set(id, task);
    this.log.debug('Scheduled job', { scheduleId: id, jobType, cronExpression });
  }

  /**
   * Runs one schedule's job. Overlapping ticks of the same schedule are
   * skipped; errors are logged, never thrown.
   */
  async runSchedule(id: string, jobType: ScheduleJobType): Promise<void> {
    if (this.running.has(id)) {
      this.log.warn('Previous run still in progress, skipping tick', { scheduleId: id, jobType });
      return;
    }

    this.running.add(id);
    const startTime = Date.now();

    try {
      await this.createJobHandler(jobType)();
      this.deps.schedules.recordRun(id, new Date().toISOString());
      this.log.info('Completed scheduled job', { scheduleId: id, jobType, durationMs: Date.now() - startTime });
    } catch (error) {
      this.log.error('Scheduled job failed', { scheduleId: id, jobType, error });
    } finally {
      this.running.delete(id);
    }
  }

  private createJobHandler(jobType: ScheduleJobType): JobHandler {
    switch (jobType) {
      case 'duplicate_scan':
        return async () => {
          if (!this.deps.scanService) {
            this.log.info('Scanning unavailable, scheduled scan skipped');
            return;
          }
          const outcome = await this.deps.scanService.scanAll();
          if (outcome.status === 'busy') {
            this.log.info('Scan already running, scheduled scan skipped', { owner: outcome.owner });
          }
        };

      case 'audit_retention':
        return async () => {
          if (this.config.auditRetentionDays <= 0) {
            this.log.info('Audit retention disabled, nothing pruned');
            return;
          }
          const removed = this.deps.audit.pruneOlderThan(this.config.auditRetentionDays);
          this.log.info('Pruned deletion audit records', {
            removed,
            retentionDays: this.config.auditRetentionDays,
          });
        };
    }
  }

  getActiveTasks(): string[] {
    return Array.from(this.tasks.keys());
  }

  isActive(): boolean {
    return this.isRunning;
  }
}
