import { describe, expect, it, vi } from 'vitest';

import { bucketByTitle, groupDuplicates } from '../../../src/services/detection/duplicateGrouper.js';
import { makeItem } from '../../helpers/mediaItems.js';
import { createSilentLogger } from '../../helpers/silentLogger.js';

const sequentialIds = () => {
  let next = 0;
  return () => `group-${++next}`;
};

const fixedNow = () => new Date('2026-01-02T03:04:05.000Z');

describe('bucketByTitle', () => {
  it('buckets by normalized title and skips empty keys and repeated ids', () => {
    const first = makeItem({ id: 'a', name: 'The Matrix' });
    const buckets = bucketByTitle([
      first,
      makeItem({ id: 'b', name: 'the matrix!' }),
      makeItem({ id: 'c', name: '   ' }),
      first,
      makeItem({ id: 'd', name: 'Heat' }),
    ]);

    expect(Array.from(buckets.keys())).toEqual(['the matrix', 'heat']);
    expect(buckets.get('the matrix')?.map((item) => item.id)).toEqual(['a', 'b']);
  });
});

describe('groupDuplicates', () => {
  const matrixA = makeItem({
    id: 'a',
    name: 'The Matrix',
    productionYear: 1999,
    providerIds: { Imdb: 'tt0133093' },
    path: '/movies/a.mkv',
  });
  const matrixB = makeItem({
    id: 'b',
    name: 'the matrix',
    productionYear: 1999,
    providerIds: { imdb: 'tt0133093' },
    path: '/movies/b.mkv',
  });

  it('groups matching items with the first candidate as provisional primary', () => {
    const groups = groupDuplicates([matrixA, matrixB], {
      libraryId: 'lib-1',
      similarityThreshold: 50,
      getFileSize: (filePath) => (filePath === '/movies/a.mkv' ? 100 : 200),
      now: fixedNow,
      idFactory: sequentialIds(),
    });

    expect(groups).toHaveLength(1);
    expect(groups[0]).toMatchObject({
      groupId: 'group-1',
      libraryId: 'lib-1',
      primaryVersionId: 'a',
      detectedAt: '2026-01-02T03:04:05.000Z',
      lastReviewedAt: null,
      status: 'pending',
    });
    expect(groups[0].versions.map((version) => [version.itemId, version.filePath, version.fileSize])).toEqual([
      ['a', '/movies/a.mkv', 100],
      ['b', '/movies/b.mkv', 200],
    ]);
    expect(groups[0].versions[0].qualityScore).toBe(0);
  });

  it('produces no group when every pair scores below the threshold', () => {
    const groups = groupDuplicates(
      [
        makeItem({ id: 'a', name: 'Heat', productionYear: 1995 }),
        makeItem({ id: 'b', name: 'Heat', productionYear: 1986 }),
        makeItem({ id: 'c', name: 'Heat', productionYear: 2005 }),
      ],
      { libraryId: 'lib-1', similarityThreshold: 50 },
    );

    expect(groups).toEqual([]);
  });

  it('never groups items whose titles normalize to nothing', () => {
    const groups = groupDuplicates(
      [
        makeItem({ id: 'a', name: '!!!', providerIds: { Imdb: 'tt1' } }),
        makeItem({ id: 'b', name: '???', providerIds: { Imdb: 'tt1' } }),
      ],
      { libraryId: 'lib-1', similarityThreshold: 0 },
    );

    expect(groups).toEqual([]);
  });

  describe('grouping modes', () => {
    const dune = [
      makeItem({ id: 'a', name: 'Dune', productionYear: 2021, providerIds: { Imdb: 'tt1160419' } }),
      makeItem({ id: 'c', name: 'Dune', productionYear: 1984, providerIds: { Imdb: 'tt0087182' } }),
      makeItem({ id: 'b', name: 'Dune', productionYear: 2021, providerIds: { Imdb: 'tt1160419' } }),
      makeItem({ id: 'd', name: 'Dune', productionYear: 1984, providerIds: { Imdb: 'tt0087182' } }),
    ];

    it('edge mode puts every linked item of a bucket into one group', () => {
      const groups = groupDuplicates(dune, { libraryId: 'lib-1', similarityThreshold: 50 });

      expect(groups.map((group) => group.versions.map((version) => version.itemId))).toEqual([['a', 'c', 'b', 'd']]);
    });

    it('component mode splits unconnected matches', () => {
      const groups = groupDuplicates(dune, {
        libraryId: 'lib-1',
        similarityThreshold: 50,
        mode: 'component',
        idFactory: sequentialIds(),
      });

      expect(groups.map((group) => group.versions.map((version) => version.itemId))).toEqual([
        ['a', 'b'],
        ['c', 'd'],
      ]);
      expect(groups.map((group) => group.primaryVersionId)).toEqual(['a', 'c']);
    });
  });

  it('logs the score breakdown of each matched pair', () => {
    const log = createSilentLogger();

    groupDuplicates([matrixA, matrixB], { libraryId: 'lib-1', similarityThreshold: 50, log });

    expect(log.debug).toHaveBeenCalledWith('Duplicate pair matched', {
      itemIds: ['a', 'b'],
      threshold: 50,
      breakdown: { title: 30, year: 20, imdb: 40, tmdb: 0, runtime: 0, total: 90 },
    });
  });

  it('treats a failing size lookup as zero and logs it', () => {
    const log = createSilentLogger();
    const getFileSize = vi.fn(() => {
      throw new Error('EACCES');
    });

    const groups = groupDuplicates([matrixA, matrixB, makeItem({ id: 'x', name: 'Solo' })], {
      libraryId: 'lib-1',
      similarityThreshold: 50,
      getFileSize,
      log,
    });

    expect(groups[0].versions.map((version) => version.fileSize)).toEqual([0, 0]);
    expect(getFileSize).toHaveBeenCalledTimes(2);
    expect(log.warn).toHaveBeenCalledTimes(2);
  });
});
