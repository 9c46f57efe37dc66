/**
 * Technical attribute extraction.
 * Reduces an item's raw stream descriptor to the categorical labels the
 * quality scorer ranks against (resolution bucket, codec family, dynamic
 * range, audio format, source type).
 */

import path from 'node:path';
import type { MediaItem, MediaStreamInfo } from '@reelsift/shared';

export interface TechnicalAttributes {
  resolution: string;
  dynamicRange: string;
  codec: string;
  audioCodec: string;
  audioChannels: string;
  audioFormat: string;
  sourceType: string;
  /** kbps; 0 when the stream reports no bitrate. */
  bitrate: number;
}

export type ExtractionResult =
  | { ok: true; attributes: TechnicalAttributes }
  | { ok: false; reason: string; attributes: TechnicalAttributes };

// ──────────────────────────────────────────────────────────────────
// Resolution
// ──────────────────────────────────────────────────────────────────

const RESOLUTION_BUCKETS: ReadonlyArray<readonly [number, string]> = [
  [2160, '2160p'],
  [1440, '1440p'],
  [1080, '1080p'],
  [720, '720p'],
  [576, '576p'],
  [480, '480p'],
];

export const resolutionLabel = (height?: number | null): string => {
  if (typeof height !== 'number' || !Number.isFinite(height)) {
    return '';
  }

  const bucket = RESOLUTION_BUCKETS.find(([minHeight]) => height >= minHeight);
  return bucket ? bucket[1] : '';
};

// ──────────────────────────────────────────────────────────────────
// Dynamic range
// ──────────────────────────────────────────────────────────────────

export const dynamicRangeLabel = (profile?: string | null, videoRange?: string | null): string => {
  const upperProfile = (profile ?? '').toUpperCase();

  if (upperProfile.includes('DOLBY VISION')) {
    return 'Dolby Vision';
  }

  if (upperProfile.includes('HDR10+') || upperProfile.includes('HDR10PLUS')) {
    return 'HDR10+';
  }

  const upperRange = (videoRange ?? '').toUpperCase();

  if (upperRange.includes('HDR')) {
    return 'HDR10';
  }

  if (upperRange.includes('HLG')) {
    return 'HLG';
  }

  return 'SDR';
};

// ──────────────────────────────────────────────────────────────────
// Video codec
// ──────────────────────────────────────────────────────────────────

export const codecLabel = (codec?: string | null): string => {
  if (!codec) {
    return '';
  }

  const upper = codec.toUpperCase();

  if (upper.includes('HEVC') || upper.includes('H265') || upper.includes('H.265')) {
    return 'HEVC';
  }

  if (upper.includes('H264') || upper.includes('H.264') || upper.includes('AVC')) {
    return 'H.264';
  }

  if (upper.includes('AV1')) {
    return 'AV1';
  }

  if (upper.includes('VP9')) {
    return 'VP9';
  }

  if (upper.includes('MPEG')) {
    return 'MPEG-4';
  }

  return upper;
};

// ──────────────────────────────────────────────────────────────────
// Audio
// ──────────────────────────────────────────────────────────────────

export const channelLabel = (channels?: number | null): string => {
  if (typeof channels !== 'number' || !Number.isFinite(channels)) {
    return '';
  }

  switch (channels) {
    case 8:
      return '7.1';
    case 6:
      return '5.1';
    case 2:
      return 'Stereo';
    case 1:
      return 'Mono';
    default:
      return String(channels);
  }
};

export const audioFormatLabel = (codec?: string | null, channels = ''): string => {
  if (!codec) {
    return '';
  }

  const upper = codec.toUpperCase();

  if (upper.includes('ATMOS')) {
    return 'Dolby Atmos';
  }

  if (upper.includes('DTS:X') || upper.includes('DTSX')) {
    return 'DTS:X';
  }

  if (upper.includes('TRUEHD')) {
    return channels === '7.1' ? 'TrueHD 7.1' : 'TrueHD 5.1';
  }

  if (upper.includes('DTS-HD') || upper.includes('DTSHD')) {
    return channels === '7.1' ? 'DTS-HD MA 7.1' : 'DTS-HD MA 5.1';
  }

  if (upper.includes('AC3') || upper.includes('DD')) {
    return 'AC3 5.1';
  }

  if (upper.includes('AAC')) {
    return 'AAC Stereo';
  }

  return `${upper} ${channels}`;
};

// ──────────────────────────────────────────────────────────────────
// Source type from the release name
// ──────────────────────────────────────────────────────────────────

const SOURCE_PATTERNS: ReadonlyArray<readonly [string[], string]> = [
  [['REMUX'], 'Remux'],
  [['BLURAY', 'BLU-RAY'], 'BluRay'],
  [['WEB-DL', 'WEBDL'], 'WEB-DL'],
  [['WEBRIP'], 'WEBRip'],
  [['HDTV'], 'HDTV'],
  [['DVDRIP', 'DVD-RIP'], 'DVDRip'],
];

export const sourceTypeLabel = (filePath?: string | null): string => {
  // Windows-style separators show up in paths reported by Windows media servers.
  const fileName = path.basename((filePath ?? '').replace(/\\/g, '/')).toUpperCase();
  const match = SOURCE_PATTERNS.find(([tokens]) => tokens.some((token) => fileName.includes(token)));
  return match ? match[1] : 'Unknown';
};

// ──────────────────────────────────────────────────────────────────
// Full extraction
// ──────────────────────────────────────────────────────────────────

const emptyAttributes = (sourceType: string): TechnicalAttributes => ({
  resolution: '',
  dynamicRange: '',
  codec: '',
  audioCodec: '',
  audioChannels: '',
  audioFormat: '',
  sourceType,
  bitrate: 0,
});

const hasVideo = (streams: MediaStreamInfo): boolean =>
  Boolean(streams.videoCodec) || typeof streams.height === 'number' || typeof streams.width === 'number';

export const extractTechnicalAttributes = (
  item: Pick<MediaItem, 'path' | 'streams'>,
  filePath: string | null = item.path ?? null,
): ExtractionResult => {
  const sourceType = sourceTypeLabel(filePath);
  const streams = item.streams;

  if (!streams) {
    return { ok: false, reason: 'no-stream-data', attributes: emptyAttributes(sourceType) };
  }

  const attributes = emptyAttributes(sourceType);

  if (hasVideo(streams)) {
    attributes.resolution = resolutionLabel(streams.height);
    attributes.codec = codecLabel(streams.videoCodec);
    attributes.dynamicRange = dynamicRangeLabel(streams.videoProfile, streams.videoRange);
    if (typeof streams.videoBitrate === 'number' && streams.videoBitrate > 0) {
      attributes.bitrate = Math.floor(streams.videoBitrate / 1000);
    }
  }

  if (streams.audioCodec) {
    attributes.audioCodec = streams.audioCodec;
    attributes.audioChannels = channelLabel(streams.audioChannels);
    attributes.audioFormat = audioFormatLabel(streams.audioCodec, attributes.audioChannels);
  }

  return { ok: true, attributes };
};
