import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ZodError } from 'zod';

import { LibraryPreferencesRepository } from '../../src/repositories/libraryPreferencesRepository.js';
import { createDefaultPreferences } from '../../src/services/detection/preferences.js';
import { createTestDatabase, type TestDatabaseHandle } from '../helpers/testDatabase.js';

describe('LibraryPreferencesRepository', () => {
  let dbHandle: TestDatabaseHandle;
  let repository: LibraryPreferencesRepository;

  beforeEach(() => {
    dbHandle = createTestDatabase();
    repository = new LibraryPreferencesRepository(dbHandle.db);
  });

  afterEach(() => {
    dbHandle.cleanup();
  });

  it('falls back to defaults for unknown libraries', () => {
    expect(repository.get('lib-1')).toEqual(createDefaultPreferences('lib-1'));
    expect(repository.has('lib-1')).toBe(false);
  });

  it('merges partial updates over the stored record', () => {
    repository.upsert('lib-1', { similarityThreshold: 90 });
    const updated = repository.upsert('lib-1', { codecPriority: ['HEVC', 'AV1'] });

    expect(updated).toEqual({
      ...createDefaultPreferences('lib-1'),
      similarityThreshold: 90,
      codecPriority: ['HEVC', 'AV1'],
    });
    expect(repository.get('lib-1')).toEqual(updated);
    expect(repository.has('lib-1')).toBe(true);
  });

  it('rejects invalid values', () => {
    expect(() => repository.upsert('lib-1', { similarityThreshold: 200 })).toThrow(ZodError);
    expect(repository.has('lib-1')).toBe(false);
  });

  it('deletes stored preferences', () => {
    repository.upsert('lib-1', { autoDeleteEnabled: true });

    expect(repository.delete('lib-1')).toBe(true);
    expect(repository.get('lib-1').autoDeleteEnabled).toBe(false);
  });
});
