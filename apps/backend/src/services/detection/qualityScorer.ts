import type { DuplicateGroup, LibraryPreferences, MediaItem, VersionRecord } from '@reelsift/shared';

import type { AppLogger } from '../logger.js';
import { extractTechnicalAttributes, type TechnicalAttributes } from './technicalAttributes.js';

export const QUALITY_WEIGHTS = {
  resolution: 0.3,
  dynamicRange: 0.25,
  codec: 0.2,
  audio: 0.15,
  sourceType: 0.1,
} as const;

type PriorityLists = Pick<
  LibraryPreferences,
  'resolutionPriority' | 'dynamicRangePriority' | 'codecPriority' | 'audioPriority' | 'sourceTypePriority'
>;

type ScoredAttributes = Pick<TechnicalAttributes, 'resolution' | 'dynamicRange' | 'codec' | 'audioFormat' | 'sourceType'>;

/**
 * Position-based score for a categorical value: the first entry of the list
 * scores 100, the last 100/len, anything absent 0.
 */
export const priorityScore = (value: string | null | undefined, priorityList: readonly string[]): number => {
  if (!value || priorityList.length === 0) {
    return 0;
  }

  const wanted = value.toLowerCase();
  const index = priorityList.findIndex((entry) => entry.toLowerCase() === wanted);

  if (index < 0) {
    return 0;
  }

  return Math.round(((priorityList.length - index) / priorityList.length) * 100);
};

export const calculateQualityScore = (attributes: ScoredAttributes, preferences: PriorityLists): number => {
  const score =
    QUALITY_WEIGHTS.resolution * priorityScore(attributes.resolution, preferences.resolutionPriority) +
    QUALITY_WEIGHTS.dynamicRange * priorityScore(attributes.dynamicRange, preferences.dynamicRangePriority) +
    QUALITY_WEIGHTS.codec * priorityScore(attributes.codec, preferences.codecPriority) +
    QUALITY_WEIGHTS.audio * priorityScore(attributes.audioFormat, preferences.audioPriority) +
    QUALITY_WEIGHTS.sourceType * priorityScore(attributes.sourceType, preferences.sourceTypePriority);

  return Math.round(score);
};

export const applyAttributes = (version: VersionRecord, attributes: TechnicalAttributes): void => {
  version.resolution = attributes.resolution;
  version.dynamicRange = attributes.dynamicRange;
  version.codec = attributes.codec;
  version.audioCodec = attributes.audioCodec;
  version.audioChannels = attributes.audioChannels;
  version.sourceType = attributes.sourceType;
  version.bitrate = attributes.bitrate;
};

export interface RankOptions {
  /** Keep an explicitly chosen primary (e.g. an operator's pick) instead of the top-ranked member. */
  keepPrimary?: boolean;
  log?: AppLogger;
}

export interface RankSummary {
  scored: number;
  skipped: string[];
}

/**
 * Fills each member's technical labels and score, then orders the group best
 * first. Members without a resolved item keep score 0. Array#sort is stable,
 * so equal scores keep their detection order.
 *
 * The grouper's provisional primary (first candidate) is replaced by the
 * top-ranked member unless `keepPrimary` is set and the current primary is
 * still a member.
 */
export const rankGroup = (
  group: DuplicateGroup,
  resolved: ReadonlyMap<string, MediaItem>,
  preferences: PriorityLists,
  { keepPrimary = false, log }: RankOptions = {},
): RankSummary => {
  const summary: RankSummary = { scored: 0, skipped: [] };

  for (const version of group.versions) {
    const item = resolved.get(version.itemId);
    if (!item) {
      log?.warn('Version could not be resolved for quality scoring', {
        groupId: group.groupId,
        itemId: version.itemId,
      });
      version.qualityScore = 0;
      summary.skipped.push(version.itemId);
      continue;
    }

    const extraction = extractTechnicalAttributes(item, version.filePath || item.path || null);
    if (!extraction.ok) {
      log?.debug('Incomplete stream data; missing attributes score zero', {
        itemId: version.itemId,
        reason: extraction.reason,
      });
    }

    applyAttributes(version, extraction.attributes);
    version.qualityScore = calculateQualityScore(extraction.attributes, preferences);
    summary.scored += 1;
  }

  group.versions.sort((a, b) => b.qualityScore - a.qualityScore);

  const primaryIsMember = group.versions.some((version) => version.itemId === group.primaryVersionId);
  const keepCurrent = keepPrimary && Boolean(group.primaryVersionId) && primaryIsMember;

  if (!keepCurrent && group.versions.length > 0) {
    group.primaryVersionId = group.versions[0].itemId;
  }

  return summary;
};
