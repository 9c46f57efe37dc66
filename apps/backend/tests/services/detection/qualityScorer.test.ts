import type { DuplicateGroup, MediaItem } from '@reelsift/shared';
import { describe, expect, it } from 'vitest';

import { groupDuplicates } from '../../../src/services/detection/duplicateGrouper.js';
import { createDefaultPreferences } from '../../../src/services/detection/preferences.js';
import {
  calculateQualityScore,
  priorityScore,
  rankGroup,
} from '../../../src/services/detection/qualityScorer.js';
import { extractTechnicalAttributes } from '../../../src/services/detection/technicalAttributes.js';
import { hdWebDl, uhdRemux } from '../../helpers/mediaItems.js';
import { createSilentLogger } from '../../helpers/silentLogger.js';

const defaults = createDefaultPreferences('lib-1');

const buildGroup = (items: MediaItem[]): DuplicateGroup => {
  const [group] = groupDuplicates(items, { libraryId: 'lib-1', similarityThreshold: 50, idFactory: () => 'g-1' });
  if (!group) {
    throw new Error('expected a duplicate group');
  }
  return group;
};

const resolvedMap = (items: MediaItem[]) => new Map(items.map((item) => [item.id, item]));

describe('priorityScore', () => {
  it('scores by position in the list', () => {
    expect(priorityScore('4320p', defaults.resolutionPriority)).toBe(100);
    expect(priorityScore('2160p', defaults.resolutionPriority)).toBe(86);
    expect(priorityScore('480p', defaults.resolutionPriority)).toBe(14);
    expect(priorityScore('hevc', defaults.codecPriority)).toBe(80);
  });

  it('returns zero for absent values and empty lists', () => {
    expect(priorityScore('360p', defaults.resolutionPriority)).toBe(0);
    expect(priorityScore('', defaults.resolutionPriority)).toBe(0);
    expect(priorityScore(null, defaults.resolutionPriority)).toBe(0);
    expect(priorityScore('1080p', [])).toBe(0);
  });

  it('never increases further down the list', () => {
    const list = defaults.audioPriority;
    const scores = list.map((value) => priorityScore(value, list));

    for (let index = 1; index < scores.length; index++) {
      expect(scores[index]).toBeLessThanOrEqual(scores[index - 1]);
      expect(scores[index]).toBeGreaterThan(0);
    }
  });
});

describe('calculateQualityScore', () => {
  it('weights each component with the default priorities', () => {
    const uhd = extractTechnicalAttributes(uhdRemux('a')).attributes;
    const hd = extractTechnicalAttributes(hdWebDl('b')).attributes;

    // 0.3*86 + 0.25*60 + 0.2*80 + 0.15*100 + 0.1*100
    expect(calculateQualityScore(uhd, defaults)).toBe(82);
    // 0.3*57 + 0.25*20 + 0.2*60 + 0.15*14 + 0.1*67
    expect(calculateQualityScore(hd, defaults)).toBe(43);
  });
});

describe('rankGroup', () => {
  it('orders versions best first and promotes the best to primary', () => {
    const items = [hdWebDl('b'), uhdRemux('a')];
    const group = buildGroup(items);
    expect(group.primaryVersionId).toBe('b');

    const summary = rankGroup(group, resolvedMap(items), defaults);

    expect(summary).toEqual({ scored: 2, skipped: [] });
    expect(group.versions.map((version) => [version.itemId, version.qualityScore])).toEqual([
      ['a', 82],
      ['b', 43],
    ]);
    expect(group.primaryVersionId).toBe('a');
    expect(group.versions[0]).toMatchObject({
      resolution: '2160p',
      codec: 'HEVC',
      dynamicRange: 'HDR10',
      audioCodec: 'TrueHD Atmos',
      audioChannels: '7.1',
      sourceType: 'Remux',
      bitrate: 60000,
    });
  });

  it('gives the same ranking whatever the member order', () => {
    const forward = [uhdRemux('a'), hdWebDl('b')];
    const backward = [hdWebDl('b'), uhdRemux('a')];
    const first = buildGroup(forward);
    const second = buildGroup(backward);

    rankGroup(first, resolvedMap(forward), defaults);
    rankGroup(second, resolvedMap(backward), defaults);

    expect(second.versions).toEqual(first.versions);
    expect(second.primaryVersionId).toBe(first.primaryVersionId);
  });

  it('keeps an operator-chosen primary when asked to', () => {
    const items = [hdWebDl('b'), uhdRemux('a')];
    const group = buildGroup(items);

    rankGroup(group, resolvedMap(items), defaults, { keepPrimary: true });

    expect(group.primaryVersionId).toBe('b');
    expect(group.versions[0].itemId).toBe('a');
  });

  it('scores unresolved members zero and reports them', () => {
    const items = [hdWebDl('b'), uhdRemux('a')];
    const group = buildGroup(items);
    const log = createSilentLogger();

    const summary = rankGroup(group, resolvedMap([items[0]]), defaults, { log });

    expect(summary).toEqual({ scored: 1, skipped: ['a'] });
    expect(group.versions.map((version) => [version.itemId, version.qualityScore])).toEqual([
      ['b', 43],
      ['a', 0],
    ]);
    expect(log.warn).toHaveBeenCalledWith('Version could not be resolved for quality scoring', {
      groupId: 'g-1',
      itemId: 'a',
    });
  });
});
