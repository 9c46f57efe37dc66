import { eq } from 'drizzle-orm';
import type { DrizzleDatabase } from '../db/index.js';
import {
  insertScanScheduleSchema,
  scanSchedules,
  type InsertScanSchedule,
  type ScanSchedule,
  type ScheduleJobType,
} from '../db/schema.js';

export class ScanScheduleRepository {
  constructor(private readonly db: DrizzleDatabase) {}

  create(input: InsertScanSchedule): ScanSchedule {
    const parsed = insertScanScheduleSchema.parse(input);

    return this.db
      .insert(scanSchedules)
      .values({
        jobType: parsed.jobType,
        cronExpression: parsed.cronExpression,
        enabled: parsed.enabled ?? true,
        lastRunAt: parsed.lastRunAt ?? null,
        nextRunAt: parsed.nextRunAt ?? null,
      })
      .returning()
      .get();
  }

  listAll(): ScanSchedule[] {
    return this.db.select().from(scanSchedules).all();
  }

  listEnabled(): ScanSchedule[] {
    return this.db.select().from(scanSchedules).where(eq(scanSchedules.enabled, true)).all();
  }

  getById(id: string): ScanSchedule | null {
    return this.db.select().from(scanSchedules).where(eq(scanSchedules.id, id)).get() ?? null;
  }

  getByJobType(jobType: ScheduleJobType): ScanSchedule | null {
    return this.db.select().from(scanSchedules).where(eq(scanSchedules.jobType, jobType)).get() ?? null;
  }

  update(id: string, input: Partial<InsertScanSchedule>): ScanSchedule | null {
    const parsed = insertScanScheduleSchema.partial().parse(input);
    if (Object.keys(parsed).length === 0) {
      return this.getById(id);
    }

    return this.db.update(scanSchedules).set(parsed).where(eq(scanSchedules.id, id)).returning().get() ?? null;
  }

  recordRun(id: string, lastRunAt: string): void {
    this.db.update(scanSchedules).set({ lastRunAt }).where(eq(scanSchedules.id, id)).run();
  }

  delete(id: string): boolean {
    return this.db.delete(scanSchedules).where(eq(scanSchedules.id, id)).run().changes > 0;
  }

  /**
   * Creates the schedule for a job type, or updates its cron expression and
   * enabled flag when one exists.
   */
  upsert(jobType: ScheduleJobType, cronExpression: string, enabled = true): ScanSchedule {
    const existing = this.getByJobType(jobType);

    if (existing) {
      const updated = this.update(existing.id, { cronExpression, enabled });
      if (!updated) {
        throw new Error(`Failed to update scan schedule for job type: ${jobType}`);
      }
      return updated;
    }

    return this.create({ jobType, cronExpression, enabled });
  }
}
