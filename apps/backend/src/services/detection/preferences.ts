import { z } from 'zod';
import type { LibraryPreferences } from '@reelsift/shared';

export const DEFAULT_SIMILARITY_THRESHOLD = 50;

const DEFAULT_PRIORITIES = {
  resolutionPriority: ['4320p', '2160p', '1440p', '1080p', '720p', '576p', '480p'],
  dynamicRangePriority: ['HDR10+', 'Dolby Vision', 'HDR10', 'HLG', 'SDR'],
  codecPriority: ['AV1', 'HEVC', 'H.264', 'VP9', 'MPEG-4'],
  audioPriority: ['Dolby Atmos', 'DTS:X', 'TrueHD 7.1', 'DTS-HD MA 7.1', 'DTS-HD MA 5.1', 'AC3 5.1', 'AAC Stereo'],
  sourceTypePriority: ['Remux', 'BluRay', 'WEB-DL', 'WEBRip', 'HDTV', 'DVDRip'],
} as const;

export const createDefaultPreferences = (libraryId: string): LibraryPreferences => ({
  libraryId,
  resolutionPriority: [...DEFAULT_PRIORITIES.resolutionPriority],
  dynamicRangePriority: [...DEFAULT_PRIORITIES.dynamicRangePriority],
  codecPriority: [...DEFAULT_PRIORITIES.codecPriority],
  audioPriority: [...DEFAULT_PRIORITIES.audioPriority],
  sourceTypePriority: [...DEFAULT_PRIORITIES.sourceTypePriority],
  similarityThreshold: DEFAULT_SIMILARITY_THRESHOLD,
  autoDeleteEnabled: false,
  minimumQualityThreshold: '',
  requireManualReview: true,
});

const priorityList = z.array(z.string().trim().min(1)).max(32);

/**
 * Body accepted by the preferences endpoint. Omitted fields keep their
 * stored (or default) values.
 */
export const preferencesUpdateSchema = z
  .object({
    resolutionPriority: priorityList,
    dynamicRangePriority: priorityList,
    codecPriority: priorityList,
    audioPriority: priorityList,
    sourceTypePriority: priorityList,
    similarityThreshold: z.number().int().min(0).max(140),
    autoDeleteEnabled: z.boolean(),
    minimumQualityThreshold: z.string().trim(),
    requireManualReview: z.boolean(),
  })
  .partial()
  .strict();

export type PreferencesUpdate = z.infer<typeof preferencesUpdateSchema>;
