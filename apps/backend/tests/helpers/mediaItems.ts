import type { MediaItem } from '@reelsift/shared';

export const makeItem = (overrides: Partial<MediaItem> & Pick<MediaItem, 'id'>): MediaItem => ({
  kind: 'movie',
  name: 'Untitled',
  productionYear: null,
  providerIds: {},
  runtimeMinutes: null,
  genres: [],
  tags: [],
  people: [],
  communityRating: null,
  premiereDate: null,
  studios: [],
  overview: null,
  path: null,
  streams: null,
  ...overrides,
});

export const uhdRemux = (id: string, extra: Partial<MediaItem> = {}): MediaItem =>
  makeItem({
    id,
    name: 'The Matrix',
    productionYear: 1999,
    providerIds: { Imdb: 'tt0133093' },
    runtimeMinutes: 136,
    path: `/media/movies/The.Matrix.1999.2160p.UHD.BluRay.REMUX.HEVC-${id}.mkv`,
    streams: {
      width: 3840,
      height: 2160,
      videoCodec: 'hevc',
      videoRange: 'HDR',
      videoBitrate: 60_000_000,
      audioCodec: 'TrueHD Atmos',
      audioChannels: 8,
    },
    ...extra,
  });

export const hdWebDl = (id: string, extra: Partial<MediaItem> = {}): MediaItem =>
  makeItem({
    id,
    name: 'the matrix',
    productionYear: 1999,
    providerIds: { imdb: 'tt0133093' },
    runtimeMinutes: 136,
    path: `/media/movies/The.Matrix.1999.1080p.WEB-DL.H264-${id}.mkv`,
    streams: {
      width: 1920,
      height: 1080,
      videoCodec: 'h264',
      videoRange: 'SDR',
      videoBitrate: 8_000_000,
      audioCodec: 'aac',
      audioChannels: 2,
    },
    ...extra,
  });
