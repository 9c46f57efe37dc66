export type MediaKind = 'movie' | 'episode';

export interface MediaStreamInfo {
  width?: number;
  height?: number;
  videoCodec?: string;
  videoProfile?: string;
  videoRange?: string;
  videoBitrate?: number;
  audioCodec?: string;
  audioChannels?: number;
}

/**
 * Catalog entry as delivered by the media server. Read-only for the pipeline.
 */
export interface MediaItem {
  id: string;
  kind: MediaKind;
  name: string;
  productionYear?: number | null;
  providerIds: Record<string, string>;
  /** Runtime in minutes. */
  runtimeMinutes?: number | null;
  genres: string[];
  tags: string[];
  people: string[];
  communityRating?: number | null;
  premiereDate?: string | null;
  studios: string[];
  overview?: string | null;
  path?: string | null;
  streams?: MediaStreamInfo | null;
}

export interface VersionRecord {
  itemId: string;
  filePath: string;
  qualityScore: number;
  resolution: string;
  codec: string;
  dynamicRange: string;
  audioCodec: string;
  audioChannels: string;
  sourceType: string;
  fileSize: number;
  /** Overall video bitrate in kbps. */
  bitrate: number;
  metadataContribution: string[];
}

export interface MergedMetadata {
  title: string;
  genres: string[];
  tags: string[];
  people: string[];
  averageRating: number;
  releaseDate: string | null;
  studios: string[];
  externalIds: Record<string, string>;
  descriptions: string[];
}

export type ReviewStatus = 'pending' | 'reviewed' | 'ignored';

export interface DuplicateGroup {
  groupId: string;
  libraryId: string;
  primaryVersionId: string;
  versions: VersionRecord[];
  mergedMetadata: MergedMetadata;
  detectedAt: string;
  lastReviewedAt: string | null;
  status: ReviewStatus;
}

export interface LibraryPreferences {
  libraryId: string;
  resolutionPriority: string[];
  dynamicRangePriority: string[];
  codecPriority: string[];
  audioPriority: string[];
  sourceTypePriority: string[];
  similarityThreshold: number;
  autoDeleteEnabled: boolean;
  minimumQualityThreshold: string;
  requireManualReview: boolean;
}

export interface DeletionAuditRecord {
  recordId: string;
  groupId: string;
  itemId: string;
  filePath: string;
  qualityScore: number;
  deletionReason: string;
  userInitiated: boolean;
  userId: string | null;
  timestamp: string;
  success: boolean;
  errorMessage: string | null;
}

export type ScanJobStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';

export interface ScanJob {
  jobId: string;
  libraryId: string | null;
  status: ScanJobStatus;
  progressPercentage: number;
  statusMessage: string;
  startedAt: string;
  finishedAt: string | null;
  duplicatesFound: number;
  itemsProcessed: number;
}

export interface CatalogLibrary {
  id: string;
  name: string;
  collectionType?: string;
}

export interface HealthStatus {
  status: 'ok' | 'degraded' | 'error';
  details?: Record<string, unknown>;
}
