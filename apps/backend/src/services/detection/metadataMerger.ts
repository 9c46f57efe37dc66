import type { DuplicateGroup, MediaItem, MergedMetadata } from '@reelsift/shared';

import type { AppLogger } from '../logger.js';

export interface ResolvedMember {
  itemId: string;
  item: MediaItem;
  /** Cast and crew names as reported by the catalog. */
  people: string[];
}

export type MergeResult =
  | { ok: true; merged: MergedMetadata; contributors: number }
  | { ok: false; reason: 'no-resolvable-members' };

export type ContributionField =
  | 'title'
  | 'genres'
  | 'tags'
  | 'people'
  | 'studios'
  | 'rating'
  | 'releaseDate'
  | 'externalIds'
  | 'descriptions';

/**
 * Case-insensitive union that keeps the first spelling seen.
 */
class CaseInsensitiveSet {
  private readonly keys = new Set<string>();
  readonly values: string[] = [];

  /** Returns true when the value was new. */
  add(value: string | null | undefined): boolean {
    if (!value || value.trim().length === 0) {
      return false;
    }

    const key = value.toLowerCase();
    if (this.keys.has(key)) {
      return false;
    }

    this.keys.add(key);
    this.values.push(value);
    return true;
  }

  addAll(values: readonly string[] | null | undefined): boolean {
    let added = false;
    for (const value of values ?? []) {
      added = this.add(value) || added;
    }
    return added;
  }
}

const toTimestamp = (value: string | null | undefined): number | null => {
  if (!value) {
    return null;
  }
  const parsed = Date.parse(value);
  return Number.isFinite(parsed) ? parsed : null;
};

/**
 * Consolidates descriptive metadata across every resolved member of a group
 * and records, on each version, which fields it contributed. Output depends
 * only on the member list, so re-running it reproduces the same record.
 */
export const mergeMetadata = (
  group: DuplicateGroup,
  members: readonly ResolvedMember[],
  log?: AppLogger,
): MergeResult => {
  if (members.length === 0) {
    log?.warn('No resolvable members for duplicate group', { groupId: group.groupId });
    return { ok: false, reason: 'no-resolvable-members' };
  }

  const contributions = new Map<string, Set<ContributionField>>();
  const contribute = (itemId: string, field: ContributionField) => {
    const fields = contributions.get(itemId) ?? new Set<ContributionField>();
    fields.add(field);
    contributions.set(itemId, fields);
  };

  let title = '';
  let titleOwner: string | null = null;
  const genres = new CaseInsensitiveSet();
  const tags = new CaseInsensitiveSet();
  const people = new CaseInsensitiveSet();
  const studios = new CaseInsensitiveSet();
  const descriptions = new CaseInsensitiveSet();
  const externalIds: Record<string, string> = {};
  const ratings: number[] = [];
  let earliest: { at: number; owner: string } | null = null;

  for (const { itemId, item, people: memberPeople } of members) {
    const name = item.name ?? '';
    if (name.length > title.length) {
      title = name;
      titleOwner = itemId;
    }

    if (genres.addAll(item.genres)) contribute(itemId, 'genres');
    if (tags.addAll(item.tags)) contribute(itemId, 'tags');
    if (people.addAll(memberPeople)) contribute(itemId, 'people');
    if (studios.addAll(item.studios)) contribute(itemId, 'studios');
    if (descriptions.add(item.overview)) contribute(itemId, 'descriptions');

    for (const [provider, value] of Object.entries(item.providerIds ?? {})) {
      if (!(provider in externalIds)) {
        externalIds[provider] = value;
        contribute(itemId, 'externalIds');
      }
    }

    if (typeof item.communityRating === 'number' && Number.isFinite(item.communityRating)) {
      ratings.push(item.communityRating);
      contribute(itemId, 'rating');
    }

    const premiere = toTimestamp(item.premiereDate);
    if (premiere !== null && (earliest === null || premiere < earliest.at)) {
      earliest = { at: premiere, owner: itemId };
    }
  }

  if (titleOwner) contribute(titleOwner, 'title');
  if (earliest) contribute(earliest.owner, 'releaseDate');

  const merged: MergedMetadata = {
    title,
    genres: genres.values,
    tags: tags.values,
    people: people.values,
    averageRating: ratings.length > 0 ? ratings.reduce((sum, value) => sum + value, 0) / ratings.length : 0,
    releaseDate: earliest ? new Date(earliest.at).toISOString() : null,
    studios: studios.values,
    externalIds,
    descriptions: descriptions.values,
  };

  group.mergedMetadata = merged;
  for (const version of group.versions) {
    version.metadataContribution = Array.from(contributions.get(version.itemId) ?? []);
  }

  log?.debug('Merged metadata for duplicate group', { groupId: group.groupId, contributors: members.length });

  return { ok: true, merged, contributors: members.length };
};
