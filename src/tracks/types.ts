import type { CatalogError } from "../lib/errors";
import type { Result } from "../lib/result";
import type { AlbumImage, CatalogClient, TrackRecord } from "../services/types";

export type SimilarSourceName = "artist_top_tracks" | "same_album" | "other_album";

export interface SimilarTrack {
  readonly id: string;
  readonly name: string;
  readonly artists: readonly string[];
  readonly popularity: number;
  readonly preview_url: string | null;
  readonly external_urls: Readonly<Record<string, string>>;
  readonly source: SimilarSourceName;
}

/**
 * Common context passed to every similar-track source.
 */
export interface SimilarContext {
  client: CatalogClient;
  market: string;
}

export type SimilarSource = {
  name: SimilarSourceName;
  run(seed: TrackRecord, ctx: SimilarContext): Promise<Result<SimilarTrack[], CatalogError>>;
};

export interface RetrievedTrackResult {
  readonly track_id: string;
  readonly actual_track_id: string;
  readonly status: "retrieved";
  readonly name: string;
  readonly artists: readonly string[];
  readonly album: {
    readonly name: string;
    readonly release_date: string | null;
    readonly total_tracks: number;
    readonly images: readonly AlbumImage[];
  };
  readonly track_details: TrackRecord["track_details"];
  readonly external_urls: Readonly<Record<string, string>>;
  readonly similar_tracks: readonly SimilarTrack[];
  readonly similar_tracks_count: number;
}

export interface FailedTrackResult {
  readonly track_id: string;
  readonly status: "failed";
  readonly error: string;
}

export type TrackResult = RetrievedTrackResult | FailedTrackResult;

export interface ResultSet {
  readonly track_count: number;
  readonly tracks: readonly TrackResult[];
}
