import { eq } from 'drizzle-orm';
import type { DuplicateGroup, ReviewStatus } from '@reelsift/shared';
import type { DrizzleDatabase } from '../db/index.js';
import { duplicateGroupDocuments } from '../db/schema.js';

export interface ReviewUpdate {
  status: ReviewStatus;
  primaryVersionId?: string;
  reviewedAt?: string;
}

export type ReviewResult =
  | { ok: true; group: DuplicateGroup }
  | { ok: false; reason: 'group-not-found' | 'primary-not-member' };

export class DuplicateGroupRepository {
  constructor(private readonly db: DrizzleDatabase) {}

  /**
   * Replaces the library's whole document.
   */
  save(libraryId: string, groups: readonly DuplicateGroup[]): void {
    const document = [...groups];
    const updatedAt = new Date().toISOString();

    this.db
      .insert(duplicateGroupDocuments)
      .values({ libraryId, document, groupCount: document.length, updatedAt })
      .onConflictDoUpdate({
        target: duplicateGroupDocuments.libraryId,
        set: { document, groupCount: document.length, updatedAt },
      })
      .run();
  }

  /**
   * Groups of a library, or an empty list when it was never scanned.
   */
  load(libraryId: string): DuplicateGroup[] {
    const row = this.db
      .select()
      .from(duplicateGroupDocuments)
      .where(eq(duplicateGroupDocuments.libraryId, libraryId))
      .get();

    return row?.document ?? [];
  }

  findGroup(libraryId: string, groupId: string): DuplicateGroup | null {
    return this.load(libraryId).find((group) => group.groupId === groupId) ?? null;
  }

  listLibraryIds(): string[] {
    return this.db
      .select({ libraryId: duplicateGroupDocuments.libraryId })
      .from(duplicateGroupDocuments)
      .all()
      .map((row) => row.libraryId);
  }

  updateReview(libraryId: string, groupId: string, update: ReviewUpdate): ReviewResult {
    return this.db.transaction((): ReviewResult => {
      const groups = this.load(libraryId);
      const group = groups.find((candidate) => candidate.groupId === groupId);

      if (!group) {
        return { ok: false, reason: 'group-not-found' };
      }

      if (
        update.primaryVersionId !== undefined &&
        !group.versions.some((version) => version.itemId === update.primaryVersionId)
      ) {
        return { ok: false, reason: 'primary-not-member' };
      }

      group.status = update.status;
      group.lastReviewedAt = update.reviewedAt ?? new Date().toISOString();
      if (update.primaryVersionId !== undefined) {
        group.primaryVersionId = update.primaryVersionId;
      }

      this.save(libraryId, groups);
      return { ok: true, group };
    });
  }
}
