export interface ArtistRef {
  readonly id: string;
  readonly name: string;
}

export interface AlbumImage {
  readonly url: string;
  readonly height: number | null;
  readonly width: number | null;
}

export type AlbumType = "album" | "single" | "compilation" | "appears_on";

/**
 * Canonical track as returned by a full track lookup.
 */
export interface TrackRecord {
  readonly id: string;
  readonly name: string;
  readonly artists: readonly ArtistRef[];
  readonly album: {
    readonly id: string;
    readonly name: string;
    readonly release_date: string | null;
    readonly total_tracks: number;
    readonly images: readonly AlbumImage[];
  };
  readonly track_details: {
    readonly duration_ms: number;
    readonly explicit: boolean;
    readonly popularity: number;
    readonly preview_url: string | null;
    readonly track_number: number;
    readonly disc_number: number;
    readonly is_playable: boolean;
    readonly external_ids: Readonly<Record<string, string>>;
  };
  readonly external_urls: Readonly<Record<string, string>>;
}

/**
 * Track as it appears inside listings (top tracks, album items).
 * Album listings omit popularity, so it may be null.
 */
export interface TrackSummary {
  readonly id: string;
  readonly name: string;
  readonly artists: readonly ArtistRef[];
  readonly popularity: number | null;
  readonly preview_url: string | null;
  readonly external_urls: Readonly<Record<string, string>>;
}

export interface AlbumSummary {
  readonly id: string;
  readonly name: string;
  readonly album_type: string;
  readonly release_date: string | null;
  readonly total_tracks: number;
}

/**
 * Authenticated, read-only view of the catalog. Every method rejects with
 * a CatalogError on failure.
 */
export interface CatalogClient {
  fetchTrack(id: string, market: string): Promise<TrackRecord>;
  fetchTrackFull(id: string): Promise<TrackRecord>;
  fetchArtistTopTracks(artistId: string, market: string): Promise<TrackSummary[]>;
  fetchAlbumTracks(albumId: string): Promise<TrackSummary[]>;
  fetchArtistAlbums(
    artistId: string,
    types: readonly AlbumType[],
    limit: number
  ): Promise<AlbumSummary[]>;
}
