import { eq } from 'drizzle-orm';
import type { LibraryPreferences } from '@reelsift/shared';
import type { DrizzleDatabase } from '../db/index.js';
import { libraryPreferences } from '../db/schema.js';
import {
  createDefaultPreferences,
  preferencesUpdateSchema,
  type PreferencesUpdate,
} from '../services/detection/preferences.js';

export class LibraryPreferencesRepository {
  constructor(private readonly db: DrizzleDatabase) {}

  /**
   * Stored preferences merged over the defaults, so rows written before a
   * field existed still yield a complete record.
   */
  get(libraryId: string): LibraryPreferences {
    const row = this.db
      .select()
      .from(libraryPreferences)
      .where(eq(libraryPreferences.libraryId, libraryId))
      .get();

    const defaults = createDefaultPreferences(libraryId);
    return row ? { ...defaults, ...row.payload, libraryId } : defaults;
  }

  has(libraryId: string): boolean {
    return Boolean(
      this.db
        .select({ libraryId: libraryPreferences.libraryId })
        .from(libraryPreferences)
        .where(eq(libraryPreferences.libraryId, libraryId))
        .get(),
    );
  }

  upsert(libraryId: string, input: PreferencesUpdate): LibraryPreferences {
    const update = preferencesUpdateSchema.parse(input);
    const next: LibraryPreferences = { ...this.get(libraryId), ...update, libraryId };
    const updatedAt = Date.now();

    this.db
      .insert(libraryPreferences)
      .values({ libraryId, payload: next, updatedAt })
      .onConflictDoUpdate({
        target: libraryPreferences.libraryId,
        set: { payload: next, updatedAt },
      })
      .run();

    return next;
  }

  delete(libraryId: string): boolean {
    const result = this.db.delete(libraryPreferences).where(eq(libraryPreferences.libraryId, libraryId)).run();
    return result.changes > 0;
  }
}
