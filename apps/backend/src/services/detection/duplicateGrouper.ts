import { randomUUID } from 'node:crypto';
import type { DuplicateGroup, MediaItem, MergedMetadata, VersionRecord } from '@reelsift/shared';

import type { AppLogger } from '../logger.js';
import { scoreBreakdown } from './similarityScorer.js';
import { normalizeTitle } from './titleNormalizer.js';

/**
 * `edge`: any item scoring above threshold against at least one other bucket
 * member joins the bucket's single group, so dissimilar items can be chained
 * through a shared match.
 * `component`: each connected component of the above-threshold graph becomes
 * its own group.
 */
export type GroupingMode = 'edge' | 'component';

export type FileSizeLookup = (filePath: string) => number;

export interface GroupingOptions {
  libraryId: string;
  similarityThreshold: number;
  mode?: GroupingMode;
  getFileSize?: FileSizeLookup;
  now?: () => Date;
  idFactory?: () => string;
  log?: AppLogger;
}

export const createEmptyMergedMetadata = (): MergedMetadata => ({
  title: '',
  genres: [],
  tags: [],
  people: [],
  averageRating: 0,
  releaseDate: null,
  studios: [],
  externalIds: {},
  descriptions: [],
});

export const createVersionRecord = (item: MediaItem, fileSize: number): VersionRecord => ({
  itemId: item.id,
  filePath: item.path ?? '',
  qualityScore: 0,
  resolution: '',
  codec: '',
  dynamicRange: '',
  audioCodec: '',
  audioChannels: '',
  sourceType: '',
  fileSize,
  bitrate: 0,
  metadataContribution: [],
});

/**
 * Buckets items by normalized title. Items with an empty key and repeated
 * item ids are left out; bucket order follows first appearance.
 */
export const bucketByTitle = (items: readonly MediaItem[]): Map<string, MediaItem[]> => {
  const buckets = new Map<string, MediaItem[]>();
  const seen = new Set<string>();

  for (const item of items) {
    const key = normalizeTitle(item.name);
    if (!key || seen.has(item.id)) {
      continue;
    }
    seen.add(item.id);

    const bucket = buckets.get(key);
    if (bucket) {
      bucket.push(item);
    } else {
      buckets.set(key, [item]);
    }
  }

  return buckets;
};

interface Edge {
  a: number;
  b: number;
}

const findMatchingPairs = (bucket: readonly MediaItem[], threshold: number, log?: AppLogger): Edge[] => {
  const edges: Edge[] = [];

  for (let i = 0; i < bucket.length; i++) {
    for (let j = i + 1; j < bucket.length; j++) {
      const breakdown = scoreBreakdown(bucket[i], bucket[j]);
      if (breakdown.total >= threshold) {
        log?.debug('Duplicate pair matched', { itemIds: [bucket[i].id, bucket[j].id], threshold, breakdown });
        edges.push({ a: i, b: j });
      }
    }
  }

  return edges;
};

const edgeMembers = (bucket: readonly MediaItem[], edges: readonly Edge[]): MediaItem[][] => {
  const linked = new Set<number>();
  for (const edge of edges) {
    linked.add(edge.a);
    linked.add(edge.b);
  }

  const members = bucket.filter((_item, index) => linked.has(index));
  return members.length >= 2 ? [members] : [];
};

const componentMembers = (bucket: readonly MediaItem[], edges: readonly Edge[]): MediaItem[][] => {
  const parent = bucket.map((_item, index) => index);

  const find = (index: number): number => {
    let root = index;
    while (parent[root] !== root) {
      root = parent[root];
    }
    parent[index] = root;
    return root;
  };

  for (const edge of edges) {
    const rootA = find(edge.a);
    const rootB = find(edge.b);
    if (rootA !== rootB) {
      parent[Math.max(rootA, rootB)] = Math.min(rootA, rootB);
    }
  }

  const components = new Map<number, MediaItem[]>();
  bucket.forEach((item, index) => {
    const root = find(index);
    const component = components.get(root);
    if (component) {
      component.push(item);
    } else {
      components.set(root, [item]);
    }
  });

  return Array.from(components.values()).filter((component) => component.length >= 2);
};

const safeFileSize = (item: MediaItem, lookup: FileSizeLookup | undefined, log?: AppLogger): number => {
  if (!lookup || !item.path) {
    return 0;
  }

  try {
    return lookup(item.path);
  } catch (error) {
    log?.warn('Failed to read file size', { itemId: item.id, path: item.path, error });
    return 0;
  }
};

/**
 * Partitions a library snapshot into duplicate groups. Versions carry only
 * identity, path and size; scoring and merging fill in the rest.
 */
export const groupDuplicates = (items: readonly MediaItem[], options: GroupingOptions): DuplicateGroup[] => {
  const mode = options.mode ?? 'edge';
  const now = options.now ?? (() => new Date());
  const idFactory = options.idFactory ?? randomUUID;
  const groups: DuplicateGroup[] = [];

  for (const bucket of bucketByTitle(items).values()) {
    if (bucket.length < 2) {
      continue;
    }

    const edges = findMatchingPairs(bucket, options.similarityThreshold, options.log);
    if (edges.length === 0) {
      continue;
    }

    const memberSets = mode === 'component' ? componentMembers(bucket, edges) : edgeMembers(bucket, edges);

    for (const members of memberSets) {
      const versions = members.map((item) =>
        createVersionRecord(item, safeFileSize(item, options.getFileSize, options.log)),
      );

      groups.push({
        groupId: idFactory(),
        libraryId: options.libraryId,
        primaryVersionId: versions[0].itemId,
        versions,
        mergedMetadata: createEmptyMergedMetadata(),
        detectedAt: now().toISOString(),
        lastReviewedAt: null,
        status: 'pending',
      });
    }
  }

  return groups;
};
