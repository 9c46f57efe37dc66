import { randomUUID } from 'node:crypto';
import { and, asc, desc, eq, gte, lt, lte, type SQL } from 'drizzle-orm';
import type { DeletionAuditRecord } from '@reelsift/shared';
import type { DrizzleDatabase } from '../db/index.js';
import { deletionAuditRecords, type DeletionAuditRow } from '../db/schema.js';
import { auditMonthKey } from '../utils/timestamps.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export type NewDeletionAuditRecord = Omit<DeletionAuditRecord, 'recordId' | 'timestamp'> & {
  recordId?: string;
  timestamp?: Date;
};

export interface AuditRange {
  from?: Date | null;
  to?: Date | null;
}

const toRecord = (row: DeletionAuditRow): DeletionAuditRecord => ({
  recordId: row.recordId,
  groupId: row.groupId,
  itemId: row.itemId,
  filePath: row.filePath,
  qualityScore: row.qualityScore,
  deletionReason: row.deletionReason,
  userInitiated: row.userInitiated,
  userId: row.userId,
  timestamp: row.timestamp,
  success: row.success,
  errorMessage: row.errorMessage,
});

/**
 * Append-only log of deletion attempts, partitioned by UTC month.
 */
export class DeletionAuditRepository {
  constructor(private readonly db: DrizzleDatabase) {}

  append(input: NewDeletionAuditRecord): DeletionAuditRecord {
    const timestamp = input.timestamp ?? new Date();

    const row = this.db
      .insert(deletionAuditRecords)
      .values({
        recordId: input.recordId ?? randomUUID(),
        groupId: input.groupId,
        itemId: input.itemId,
        filePath: input.filePath,
        qualityScore: input.qualityScore,
        deletionReason: input.deletionReason,
        userInitiated: input.userInitiated,
        userId: input.userId,
        timestamp: timestamp.toISOString(),
        month: auditMonthKey(timestamp),
        success: input.success,
        errorMessage: input.errorMessage,
      })
      .returning()
      .get();

    return toRecord(row);
  }

  /**
   * Records within the inclusive range, newest first.
   */
  list({ from, to }: AuditRange = {}): DeletionAuditRecord[] {
    const conditions: SQL[] = [];
    if (from) conditions.push(gte(deletionAuditRecords.timestamp, from.toISOString()));
    if (to) conditions.push(lte(deletionAuditRecords.timestamp, to.toISOString()));

    return this.db
      .select()
      .from(deletionAuditRecords)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(desc(deletionAuditRecords.timestamp))
      .all()
      .map(toRecord);
  }

  listMonths(): string[] {
    return this.db
      .selectDistinct({ month: deletionAuditRecords.month })
      .from(deletionAuditRecords)
      .orderBy(desc(deletionAuditRecords.month))
      .all()
      .map((row) => row.month);
  }

  /**
   * One JSON object per line in chronological order; empty string for a
   * month without records.
   */
  exportMonth(month: string): string {
    const records = this.db
      .select()
      .from(deletionAuditRecords)
      .where(eq(deletionAuditRecords.month, month))
      .orderBy(asc(deletionAuditRecords.timestamp))
      .all()
      .map(toRecord);

    return records.map((record) => `${JSON.stringify(record)}\n`).join('');
  }

  pruneOlderThan(days: number, now: Date = new Date()): number {
    const cutoff = new Date(now.getTime() - days * DAY_MS).toISOString();
    const result = this.db.delete(deletionAuditRecords).where(lt(deletionAuditRecords.timestamp, cutoff)).run();
    return result.changes;
  }
}
