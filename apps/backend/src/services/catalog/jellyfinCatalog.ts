import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import type { CatalogLibrary, MediaItem, MediaKind, MediaStreamInfo } from '@reelsift/shared';

import type { MediaCatalog } from './mediaCatalog.js';

export interface JellyfinConfig {
  baseUrl: string;
  apiKey: string;
  timeoutMs?: number;
  pageSize?: number;
}

export interface HttpClient {
  get<T>(url: string, config?: AxiosRequestConfig): Promise<{ data: T }>;
}

export interface JellyfinMediaStream {
  Type: 'Video' | 'Audio' | 'Subtitle' | 'EmbeddedImage' | 'Data' | string;
  Codec?: string;
  Profile?: string;
  Width?: number;
  Height?: number;
  BitRate?: number;
  Channels?: number;
  VideoRange?: string;
  VideoRangeType?: string;
}

export interface JellyfinPerson {
  Name: string;
  Id?: string;
  Role?: string;
  Type?: string;
}

export interface JellyfinItem {
  Id: string;
  Name?: string;
  Type?: string;
  ProductionYear?: number;
  ProviderIds?: Record<string, string>;
  RunTimeTicks?: number;
  Genres?: string[];
  Tags?: string[];
  People?: JellyfinPerson[];
  CommunityRating?: number;
  PremiereDate?: string;
  Studios?: Array<{ Name: string; Id?: string }>;
  Overview?: string;
  Path?: string;
  MediaStreams?: JellyfinMediaStream[];
}

export interface JellyfinVirtualFolder {
  ItemId: string;
  Name: string;
  CollectionType?: string;
  Locations?: string[];
}

interface JellyfinItemsPayload {
  Items: JellyfinItem[];
  TotalRecordCount: number;
}

const defaultTimeout = 30_000;
const defaultPageSize = 250;
const TICKS_PER_MINUTE = 600_000_000;

const ITEM_FIELDS = [
  'Path',
  'ProviderIds',
  'Genres',
  'Tags',
  'People',
  'Studios',
  'Overview',
  'PremiereDate',
  'ProductionYear',
  'MediaStreams',
].join(',');

const createHttpClient = (config: JellyfinConfig): AxiosInstance =>
  axios.create({
    baseURL: config.baseUrl.replace(/\/$/, ''),
    timeout: config.timeoutMs ?? defaultTimeout,
    headers: {
      'X-Emby-Token': config.apiKey,
      Accept: 'application/json',
    },
  });

const toStreamInfo = (streams: JellyfinMediaStream[] | undefined): MediaStreamInfo | null => {
  if (!streams || streams.length === 0) {
    return null;
  }

  const video = streams.find((stream) => stream.Type === 'Video');
  const audio = streams.find((stream) => stream.Type === 'Audio');

  return {
    width: video?.Width,
    height: video?.Height,
    videoCodec: video?.Codec,
    videoProfile: video?.Profile,
    videoRange: video?.VideoRangeType ?? video?.VideoRange,
    videoBitrate: video?.BitRate,
    audioCodec: audio?.Codec,
    audioChannels: audio?.Channels,
  };
};

export const toMediaItem = (raw: JellyfinItem): MediaItem => ({
  id: raw.Id,
  kind: (raw.Type === 'Episode' ? 'episode' : 'movie') satisfies MediaKind,
  name: raw.Name ?? '',
  productionYear: raw.ProductionYear ?? null,
  providerIds: raw.ProviderIds ?? {},
  runtimeMinutes: typeof raw.RunTimeTicks === 'number' ? raw.RunTimeTicks / TICKS_PER_MINUTE : null,
  genres: raw.Genres ?? [],
  tags: raw.Tags ?? [],
  people: (raw.People ?? []).map((person) => person.Name).filter((name) => name.length > 0),
  communityRating: raw.CommunityRating ?? null,
  premiereDate: raw.PremiereDate ?? null,
  studios: (raw.Studios ?? []).map((studio) => studio.Name),
  overview: raw.Overview ?? null,
  path: raw.Path ?? null,
  streams: toStreamInfo(raw.MediaStreams),
});

const isNotFound = (error: unknown): boolean =>
  axios.isAxiosError(error) && error.response?.status === 404;

/**
 * Read-only Jellyfin catalog. Never writes to the server.
 */
export class JellyfinCatalog implements MediaCatalog {
  private readonly httpClient: HttpClient;
  private readonly pageSize: number;

  constructor(config: JellyfinConfig, httpClient?: HttpClient) {
    this.httpClient = httpClient ?? createHttpClient(config);
    this.pageSize = config.pageSize ?? defaultPageSize;
  }

  async listLibraries(): Promise<CatalogLibrary[]> {
    const response = await this.httpClient.get<JellyfinVirtualFolder[]>('/Library/VirtualFolders');

    return (response.data ?? []).map((folder) => ({
      id: folder.ItemId,
      name: folder.Name,
      collectionType: folder.CollectionType,
    }));
  }

  async listItems(libraryId: string): Promise<MediaItem[]> {
    const items: MediaItem[] = [];
    let startIndex = 0;

    while (true) {
      const response = await this.httpClient.get<JellyfinItemsPayload>('/Items', {
        params: {
          ParentId: libraryId,
          Recursive: true,
          IncludeItemTypes: 'Movie,Episode',
          Fields: ITEM_FIELDS,
          StartIndex: startIndex,
          Limit: this.pageSize,
        },
      });

      const page = response.data.Items ?? [];
      items.push(...page.map(toMediaItem));
      startIndex += this.pageSize;

      if (page.length === 0 || startIndex >= response.data.TotalRecordCount) {
        break;
      }
    }

    return items;
  }

  async resolveItem(itemId: string): Promise<MediaItem | null> {
    try {
      const response = await this.httpClient.get<JellyfinItemsPayload>('/Items', {
        params: {
          Ids: itemId,
          Fields: ITEM_FIELDS,
        },
      });

      const [raw] = response.data.Items ?? [];
      return raw ? toMediaItem(raw) : null;
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async getPeople(item: MediaItem): Promise<string[]> {
    return item.people;
  }
}

export const createJellyfinCatalog = (config: JellyfinConfig, httpClient?: HttpClient): JellyfinCatalog =>
  new JellyfinCatalog(config, httpClient);
