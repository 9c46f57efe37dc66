import { randomUUID } from 'node:crypto';
import { integer, sqliteTable, text, index } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';
import { createInsertSchema } from 'drizzle-zod';
import { z } from 'zod';
import type { DuplicateGroup, LibraryPreferences } from '@reelsift/shared';

const scanJobStatuses = ['pending', 'running', 'completed', 'failed', 'cancelled'] as const;
const scheduleJobTypes = ['duplicate_scan', 'audit_retention'] as const;

export type ScheduleJobType = (typeof scheduleJobTypes)[number];

export const duplicateGroupDocuments = sqliteTable('duplicate_group_documents', {
  libraryId: text('library_id').primaryKey(),
  document: text('document', { mode: 'json' }).$type<DuplicateGroup[]>().notNull(),
  groupCount: integer('group_count').notNull().default(0),
  updatedAt: text('updated_at')
    .notNull()
    .default(sql`CURRENT_TIMESTAMP`),
});

export type DuplicateGroupDocument = typeof duplicateGroupDocuments.$inferSelect;

export const deletionAuditRecords = sqliteTable(
  'deletion_audit_records',
  {
    recordId: text('record_id')
      .primaryKey()
      .$defaultFn(() => randomUUID()),
    groupId: text('group_id').notNull(),
    itemId: text('item_id').notNull(),
    filePath: text('file_path').notNull(),
    qualityScore: integer('quality_score').notNull().default(0),
    deletionReason: text('deletion_reason').notNull().default(''),
    userInitiated: integer('user_initiated', { mode: 'boolean' }).notNull().default(false),
    userId: text('user_id'),
    timestamp: text('timestamp').notNull(),
    month: text('month').notNull(),
    success: integer('success', { mode: 'boolean' }).notNull().default(false),
    errorMessage: text('error_message'),
  },
  (table) => ({
    monthIdx: index('idx_deletion_audit_month').on(table.month),
    timestampIdx: index('idx_deletion_audit_timestamp').on(table.timestamp),
  }),
);

export type DeletionAuditRow = typeof deletionAuditRecords.$inferSelect;

export const libraryPreferences = sqliteTable('library_preferences', {
  libraryId: text('library_id').primaryKey(),
  payload: text('payload', { mode: 'json' }).$type<LibraryPreferences>().notNull(),
  updatedAt: integer('updated_at').notNull(),
});

export const scanJobs = sqliteTable('scan_jobs', {
  id: text('id')
    .primaryKey()
    .$defaultFn(() => randomUUID()),
  libraryId: text('library_id'),
  status: text('status', { enum: scanJobStatuses }).notNull().default('pending'),
  progressPercentage: integer('progress_percentage').notNull().default(0),
  statusMessage: text('status_message').notNull().default(''),
  duplicatesFound: integer('duplicates_found').notNull().default(0),
  itemsProcessed: integer('items_processed').notNull().default(0),
  startedAt: text('started_at').notNull(),
  finishedAt: text('finished_at'),
});

export type ScanJobRow = typeof scanJobs.$inferSelect;

export const scanSchedules = sqliteTable('scan_schedules', {
  id: text('id')
    .primaryKey()
    .$defaultFn(() => randomUUID()),
  jobType: text('job_type', { enum: scheduleJobTypes }).notNull(),
  cronExpression: text('cron_expression').notNull(),
  enabled: integer('enabled', { mode: 'boolean' }).notNull().default(true),
  lastRunAt: text('last_run_at'),
  nextRunAt: text('next_run_at'),
  createdAt: text('created_at')
    .notNull()
    .default(sql`CURRENT_TIMESTAMP`),
  updatedAt: text('updated_at')
    .notNull()
    .default(sql`CURRENT_TIMESTAMP`),
});

export const insertScanScheduleSchema = createInsertSchema(scanSchedules, {
  cronExpression: z.string().trim().min(1),
}).omit({
  id: true,
  createdAt: true,
  updatedAt: true,
});
export type InsertScanSchedule = z.infer<typeof insertScanScheduleSchema>;
export type ScanSchedule = typeof scanSchedules.$inferSelect;
