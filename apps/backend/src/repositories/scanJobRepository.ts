import { desc, eq, inArray } from 'drizzle-orm';
import type { ScanJob, ScanJobStatus } from '@reelsift/shared';
import type { DrizzleDatabase } from '../db/index.js';
import { scanJobs, type ScanJobRow } from '../db/schema.js';

export type ScanJobUpdate = Partial<
  Pick<ScanJob, 'status' | 'progressPercentage' | 'statusMessage' | 'finishedAt' | 'duplicatesFound' | 'itemsProcessed'>
>;

const DEFAULT_LIST_LIMIT = 20;

const toScanJob = (row: ScanJobRow): ScanJob => ({
  jobId: row.id,
  libraryId: row.libraryId,
  status: row.status,
  progressPercentage: row.progressPercentage,
  statusMessage: row.statusMessage,
  startedAt: row.startedAt,
  finishedAt: row.finishedAt,
  duplicatesFound: row.duplicatesFound,
  itemsProcessed: row.itemsProcessed,
});

export class ScanJobRepository {
  constructor(private readonly db: DrizzleDatabase) {}

  create(libraryId: string | null, startedAt: Date = new Date()): ScanJob {
    const row = this.db
      .insert(scanJobs)
      .values({
        libraryId,
        status: 'pending',
        statusMessage: 'Queued',
        startedAt: startedAt.toISOString(),
      })
      .returning()
      .get();

    return toScanJob(row);
  }

  getById(jobId: string): ScanJob | null {
    const row = this.db.select().from(scanJobs).where(eq(scanJobs.id, jobId)).get();
    return row ? toScanJob(row) : null;
  }

  listRecent(limit = DEFAULT_LIST_LIMIT): ScanJob[] {
    const safeLimit = Number.isInteger(limit) && limit > 0 ? limit : DEFAULT_LIST_LIMIT;
    return this.db
      .select()
      .from(scanJobs)
      .orderBy(desc(scanJobs.startedAt))
      .limit(safeLimit)
      .all()
      .map(toScanJob);
  }

  update(jobId: string, update: ScanJobUpdate): ScanJob | null {
    if (Object.keys(update).length === 0) {
      return this.getById(jobId);
    }

    const row = this.db.update(scanJobs).set(update).where(eq(scanJobs.id, jobId)).returning().get();
    return row ? toScanJob(row) : null;
  }

  /**
   * Marks jobs left pending or running by a previous process as failed.
   */
  failInterrupted(message = 'Interrupted by restart', finishedAt: Date = new Date()): number {
    const active: ScanJobStatus[] = ['pending', 'running'];
    const result = this.db
      .update(scanJobs)
      .set({ status: 'failed', statusMessage: message, finishedAt: finishedAt.toISOString() })
      .where(inArray(scanJobs.status, active))
      .run();
    return result.changes;
  }
}
