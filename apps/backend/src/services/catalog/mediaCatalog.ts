import type { CatalogLibrary, MediaItem } from '@reelsift/shared';

/**
 * The narrow view of the media server the scan pipeline depends on.
 */
export interface MediaCatalog {
  listLibraries(): Promise<CatalogLibrary[]>;
  /** Movies and episodes found recursively under the library. */
  listItems(libraryId: string): Promise<MediaItem[]>;
  resolveItem(itemId: string): Promise<MediaItem | null>;
  getPeople(item: MediaItem): Promise<string[]>;
}
