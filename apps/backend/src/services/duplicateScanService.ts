import type { CatalogLibrary, DuplicateGroup, LibraryPreferences, MediaItem, ScanJob } from '@reelsift/shared';

import type { DuplicateGroupRepository } from '../repositories/duplicateGroupRepository.js';
import type { LibraryPreferencesRepository } from '../repositories/libraryPreferencesRepository.js';
import type { ScanJobRepository, ScanJobUpdate } from '../repositories/scanJobRepository.js';
import { runPool } from '../utils/workerPool.js';
import type { MediaCatalog } from './catalog/mediaCatalog.js';
import { groupDuplicates, type FileSizeLookup, type GroupingMode } from './detection/duplicateGrouper.js';
import { mergeMetadata, type ResolvedMember } from './detection/metadataMerger.js';
import { rankGroup } from './detection/qualityScorer.js';
import defaultLogger, { type AppLogger } from './logger.js';
import { ScanLock, type ScanLockHandle } from './scanLock.js';

export interface ScanProgress {
  libraryId: string;
  groupsDone: number;
  groupsTotal: number;
}

export interface ScanLibraryOptions {
  signal?: AbortSignal;
  onProgress?: (progress: ScanProgress) => void;
}

export type ScanFailureReason = 'catalog-unavailable' | 'scan-error';

export type ScanOutcome =
  | { status: 'completed'; libraryId: string; groups: DuplicateGroup[]; itemsProcessed: number }
  | { status: 'cancelled'; libraryId: string; groups: DuplicateGroup[]; itemsProcessed: number }
  | { status: 'failed'; libraryId: string; reason: ScanFailureReason; error: Error };

export interface LibraryScanSummary {
  libraryId: string;
  status: ScanOutcome['status'];
  groups: number;
  itemsProcessed: number;
  error?: string;
}

export type ScanAllOutcome =
  | { status: 'busy'; owner: string | null }
  | { status: 'disabled' }
  | { status: 'completed' | 'cancelled' | 'failed'; job: ScanJob; libraries: LibraryScanSummary[] };

export type StartScanResult =
  | { status: 'started'; job: ScanJob }
  | { status: 'busy'; owner: string | null }
  | { status: 'disabled' };

export interface ScanAllOptions {
  signal?: AbortSignal;
  /** Restrict the run to these libraries instead of every catalog library. */
  libraryIds?: string[];
}

export interface DuplicateScanServiceOptions {
  enabled: boolean;
  workers: number;
  groupingMode?: GroupingMode;
}

export interface DuplicateScanServiceDeps {
  catalog: MediaCatalog;
  groups: DuplicateGroupRepository;
  preferences: LibraryPreferencesRepository;
  jobs: ScanJobRepository;
  options: DuplicateScanServiceOptions;
  lock?: ScanLock;
  getFileSize?: FileSizeLookup;
  log?: AppLogger;
}

interface ActiveJob {
  controller: AbortController;
  done: Promise<unknown>;
}

const toError = (error: unknown): Error => (error instanceof Error ? error : new Error(String(error)));

const memberKey = (group: DuplicateGroup): string =>
  group.versions
    .map((version) => version.itemId)
    .sort()
    .join('\u0000');

/**
 * Carries review state of a previously stored group with the same member set
 * onto its rescanned counterpart. Returns whether an operator picked the
 * primary.
 */
const carryOverReview = (group: DuplicateGroup, previous: DuplicateGroup | undefined): boolean => {
  if (!previous) {
    return false;
  }

  group.groupId = previous.groupId;
  group.detectedAt = previous.detectedAt;
  group.status = previous.status;
  group.lastReviewedAt = previous.lastReviewedAt;

  if (previous.lastReviewedAt !== null) {
    group.primaryVersionId = previous.primaryVersionId;
    return true;
  }

  return false;
};

export class DuplicateScanService {
  private readonly catalog: MediaCatalog;
  private readonly groups: DuplicateGroupRepository;
  private readonly preferences: LibraryPreferencesRepository;
  private readonly jobs: ScanJobRepository;
  private readonly options: DuplicateScanServiceOptions;
  private readonly lock: ScanLock;
  private readonly getFileSize?: FileSizeLookup;
  private readonly log: AppLogger;
  private readonly active = new Map<string, ActiveJob>();

  constructor(deps: DuplicateScanServiceDeps) {
    this.catalog = deps.catalog;
    this.groups = deps.groups;
    this.preferences = deps.preferences;
    this.jobs = deps.jobs;
    this.options = deps.options;
    this.lock = deps.lock ?? new ScanLock();
    this.getFileSize = deps.getFileSize;
    this.log = deps.log ?? defaultLogger;
  }

  isEnabled(): boolean {
    return this.options.enabled;
  }

  isScanning(): boolean {
    return this.lock.isHeld();
  }

  /**
   * Detects, ranks and merges the duplicate groups of one library. Never
   * throws; catalog and pipeline errors come back as a `failed` outcome.
   */
  async scanLibrary(
    libraryId: string,
    preferences: LibraryPreferences,
    { signal, onProgress }: ScanLibraryOptions = {},
  ): Promise<ScanOutcome> {
    if (signal?.aborted) {
      return { status: 'cancelled', libraryId, groups: [], itemsProcessed: 0 };
    }

    let items: MediaItem[];
    try {
      items = await this.catalog.listItems(libraryId);
    } catch (error) {
      this.log.error('Failed to list library items', { libraryId, error });
      return { status: 'failed', libraryId, reason: 'catalog-unavailable', error: toError(error) };
    }

    try {
      const candidates = groupDuplicates(items, {
        libraryId,
        similarityThreshold: preferences.similarityThreshold,
        mode: this.options.groupingMode,
        getFileSize: this.getFileSize,
        log: this.log,
      });
      const previous = new Map(this.groups.load(libraryId).map((group) => [memberKey(group), group]));
      const completed: DuplicateGroup[] = [];

      this.log.debug('Candidate duplicate groups found', { libraryId, items: items.length, candidates: candidates.length });

      for (const [index, group] of candidates.entries()) {
        if (signal?.aborted) {
          this.log.info('Library scan cancelled', { libraryId, groupsDone: index });
          return { status: 'cancelled', libraryId, groups: completed, itemsProcessed: items.length };
        }

        const processed = await this.processGroup(group, preferences, previous);
        if (processed) {
          completed.push(processed);
        }

        onProgress?.({ libraryId, groupsDone: index + 1, groupsTotal: candidates.length });
      }

      return { status: 'completed', libraryId, groups: completed, itemsProcessed: items.length };
    } catch (error) {
      this.log.error('Library scan failed', { libraryId, error });
      return { status: 'failed', libraryId, reason: 'scan-error', error: toError(error) };
    }
  }

  private async processGroup(
    group: DuplicateGroup,
    preferences: LibraryPreferences,
    previous: ReadonlyMap<string, DuplicateGroup>,
  ): Promise<DuplicateGroup | null> {
    const tasks = group.versions.map((version) => async (): Promise<ResolvedMember | null> => {
      try {
        const item = await this.catalog.resolveItem(version.itemId);
        if (!item) {
          return null;
        }
        return { itemId: version.itemId, item, people: await this.catalog.getPeople(item) };
      } catch (error) {
        this.log.warn('Catalog lookup failed, skipping member', {
          groupId: group.groupId,
          itemId: version.itemId,
          error,
        });
        return null;
      }
    });

    const results = await runPool(tasks, this.options.workers);
    const resolved = new Map<string, ResolvedMember>();
    for (const member of results) {
      if (member) {
        resolved.set(member.itemId, member);
      }
    }

    const missing = group.versions.filter((version) => !resolved.has(version.itemId)).map((version) => version.itemId);
    if (missing.length > 0) {
      this.log.warn('Dropping unresolvable group members', { groupId: group.groupId, itemIds: missing });
      group.versions = group.versions.filter((version) => resolved.has(version.itemId));
    }

    if (group.versions.length < 2) {
      this.log.info('Group no longer has duplicates after resolution', {
        groupId: group.groupId,
        remaining: group.versions.length,
      });
      return null;
    }

    const keepPrimary = carryOverReview(group, previous.get(memberKey(group)));
    const items = new Map(Array.from(resolved.values(), (member) => [member.itemId, member.item]));

    rankGroup(group, items, preferences, { keepPrimary, log: this.log });

    // Ranked order, so ties in the merge favour the better file.
    const members = group.versions.flatMap((version) => {
      const member = resolved.get(version.itemId);
      return member ? [member] : [];
    });
    const merge = mergeMetadata(group, members, this.log);
    if (!merge.ok) {
      return null;
    }

    return group;
  }

  /**
   * Scans every library (or the given ones) in turn under the process-wide
   * lock, persisting each library that completes.
   */
  async scanAll({ signal, libraryIds }: ScanAllOptions = {}): Promise<ScanAllOutcome> {
    if (!this.options.enabled) {
      this.log.info('Scanner disabled, skipping scan');
      return { status: 'disabled' };
    }

    const acquired = this.acquire(libraryIds);
    if (!acquired) {
      return { status: 'busy', owner: this.lock.currentOwner() };
    }

    return this.runJob(acquired.job, acquired.handle, signal, libraryIds);
  }

  /**
   * Starts a scan in the background and returns its job immediately.
   */
  startScan(libraryIds?: string[]): StartScanResult {
    if (!this.options.enabled) {
      return { status: 'disabled' };
    }

    const acquired = this.acquire(libraryIds);
    if (!acquired) {
      return { status: 'busy', owner: this.lock.currentOwner() };
    }

    const { job, handle } = acquired;
    const controller = new AbortController();
    const done = this.runJob(job, handle, controller.signal, libraryIds)
      .catch((error: unknown) => {
        this.log.error('Background scan crashed', { jobId: job.jobId, error });
      })
      .finally(() => {
        this.active.delete(job.jobId);
      });

    this.active.set(job.jobId, { controller, done });
    return { status: 'started', job };
  }

  /**
   * Requests cancellation; the scan stops before its next group.
   */
  cancel(jobId: string): boolean {
    const active = this.active.get(jobId);
    if (!active) {
      return false;
    }
    active.controller.abort();
    return true;
  }

  /** Resolves once every background scan has finished. */
  async waitForIdle(): Promise<void> {
    await Promise.all(Array.from(this.active.values(), (job) => job.done));
  }

  private acquire(libraryIds?: string[]): { job: ScanJob; handle: ScanLockHandle } | null {
    if (this.lock.isHeld()) {
      return null;
    }

    const job = this.jobs.create(libraryIds?.length === 1 ? libraryIds[0] : null);
    const handle = this.lock.tryAcquire(`scan:${job.jobId}`);
    if (!handle) {
      this.jobs.update(job.jobId, {
        status: 'cancelled',
        statusMessage: 'Another scan is already running',
        finishedAt: new Date().toISOString(),
      });
      return null;
    }

    return { job, handle };
  }

  private async resolveLibraries(libraryIds?: string[]): Promise<CatalogLibrary[]> {
    if (libraryIds && libraryIds.length > 0) {
      return libraryIds.map((id) => ({ id, name: id }));
    }
    return this.catalog.listLibraries();
  }

  private async runJob(
    job: ScanJob,
    handle: ScanLockHandle,
    signal: AbortSignal | undefined,
    libraryIds: string[] | undefined,
  ): Promise<ScanAllOutcome> {
    const summaries: LibraryScanSummary[] = [];
    let duplicatesFound = 0;
    let itemsProcessed = 0;
    let lastPercentage = -1;

    try {
      this.jobs.update(job.jobId, { status: 'running', statusMessage: 'Listing libraries' });

      let libraries: CatalogLibrary[];
      try {
        libraries = await this.resolveLibraries(libraryIds);
      } catch (error) {
        this.log.error('Failed to list libraries', { jobId: job.jobId, error });
        return this.finishJob(job, 'failed', `Catalog unavailable: ${toError(error).message}`, summaries, {
          duplicatesFound,
          itemsProcessed,
        });
      }

      this.log.info('Duplicate scan started', { jobId: job.jobId, libraries: libraries.length });
      let cancelled = false;

      for (const [index, library] of libraries.entries()) {
        if (signal?.aborted) {
          cancelled = true;
          break;
        }

        this.jobs.update(job.jobId, { statusMessage: `Scanning ${library.name}` });

        const outcome = await this.scanLibrary(library.id, this.preferences.get(library.id), {
          signal,
          onProgress: ({ groupsDone, groupsTotal }) => {
            const fraction = groupsTotal > 0 ? groupsDone / groupsTotal : 1;
            const percentage = Math.floor(((index + fraction) / libraries.length) * 100);
            if (percentage !== lastPercentage) {
              lastPercentage = percentage;
              this.jobs.update(job.jobId, { progressPercentage: percentage });
            }
          },
        });

        if (outcome.status === 'failed') {
          summaries.push({
            libraryId: library.id,
            status: 'failed',
            groups: 0,
            itemsProcessed: 0,
            error: outcome.error.message,
          });
          continue;
        }

        if (outcome.status === 'cancelled') {
          summaries.push({ libraryId: library.id, status: 'cancelled', groups: 0, itemsProcessed: 0 });
          cancelled = true;
          break;
        }

        this.groups.save(library.id, outcome.groups);
        duplicatesFound += outcome.groups.length;
        itemsProcessed += outcome.itemsProcessed;
        summaries.push({
          libraryId: library.id,
          status: 'completed',
          groups: outcome.groups.length,
          itemsProcessed: outcome.itemsProcessed,
        });
        this.jobs.update(job.jobId, { duplicatesFound, itemsProcessed });
      }

      const failures = summaries.filter((summary) => summary.status === 'failed').length;
      const totals = { duplicatesFound, itemsProcessed };

      if (cancelled) {
        return this.finishJob(job, 'cancelled', 'Scan cancelled', summaries, totals);
      }
      if (libraries.length > 0 && failures === libraries.length) {
        return this.finishJob(job, 'failed', 'All libraries failed to scan', summaries, totals);
      }

      const message =
        failures > 0
          ? `Found ${duplicatesFound} duplicate groups; ${failures} libraries failed`
          : `Found ${duplicatesFound} duplicate groups`;
      return this.finishJob(job, 'completed', message, summaries, totals);
    } finally {
      handle.release();
    }
  }

  private finishJob(
    job: ScanJob,
    status: 'completed' | 'cancelled' | 'failed',
    statusMessage: string,
    libraries: LibraryScanSummary[],
    totals: { duplicatesFound: number; itemsProcessed: number },
  ): ScanAllOutcome {
    const update: ScanJobUpdate = { status, statusMessage, ...totals, finishedAt: new Date().toISOString() };
    if (status === 'completed') {
      update.progressPercentage = 100;
    }
    const updated = this.jobs.update(job.jobId, update) ?? job;

    if (status === 'failed') {
      this.log.error('Duplicate scan finished', { jobId: job.jobId, status, ...totals });
    } else {
      this.log.info('Duplicate scan finished', { jobId: job.jobId, status, ...totals });
    }

    return { status, job: updated, libraries };
  }
}

export default DuplicateScanService;
