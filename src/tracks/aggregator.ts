import { runConcurrent } from "../lib/concurrent";
import { errorMessage } from "../lib/errors";
import { debug } from "../lib/logger";
import { toCatalogResult } from "../lib/result";
import type { CatalogClient, TrackRecord } from "../services/types";
import { normalizeTrackId } from "./identifiers";
import { discoverSimilarTracks, type DiscoverOptions } from "./similar";
import type {
  FailedTrackResult,
  ResultSet,
  RetrievedTrackResult,
  SimilarTrack,
  TrackResult,
} from "./types";

export type AggregateOptions = {
  market: string;
  concurrency?: number | undefined;
  sources?: DiscoverOptions["sources"];
  onProgress?:
    | ((done: number, total: number, identifier: string, status: TrackResult["status"]) => void)
    | undefined;
};

export function buildRetrievedResult(
  identifier: string,
  track: TrackRecord,
  similar: readonly SimilarTrack[]
): RetrievedTrackResult {
  return {
    track_id: identifier,
    actual_track_id: track.id,
    status: "retrieved",
    name: track.name,
    artists: track.artists.map((artist) => artist.name),
    album: {
      name: track.album.name,
      release_date: track.album.release_date,
      total_tracks: track.album.total_tracks,
      images: track.album.images,
    },
    track_details: track.track_details,
    external_urls: track.external_urls,
    similar_tracks: similar,
    similar_tracks_count: similar.length,
  };
}

export function buildFailedResult(identifier: string, error: unknown): FailedTrackResult {
  return { track_id: identifier, status: "failed", error: errorMessage(error) };
}

/**
 * Resolve one identifier. Catalog failures become a failed result; the
 * returned promise does not reject on them.
 */
export async function resolveIdentifier(
  client: CatalogClient,
  identifier: string,
  options: AggregateOptions
): Promise<TrackResult> {
  const trackId = normalizeTrackId(identifier);
  debug(`[fetch] Fetching track info for ${identifier}`);

  const fetched = await toCatalogResult(() => client.fetchTrack(trackId, options.market));
  if (!fetched.ok) {
    debug(`[fetch] Failed to get info for track ${identifier}: ${fetched.error.message}`);
    return buildFailedResult(identifier, fetched.error);
  }

  const track = fetched.value;
  if (track.id !== trackId) {
    debug(`[fetch] ${trackId} resolved to linked track ${track.id}`);
  }

  const similar = await discoverSimilarTracks(client, track, {
    market: options.market,
    ...(options.sources ? { sources: options.sources } : {}),
  });
  return buildRetrievedResult(identifier, track, similar);
}

/**
 * Resolve every identifier, in input order. With the default concurrency
 * of 1 identifiers are processed strictly one at a time.
 */
export async function aggregateTracks(
  client: CatalogClient,
  identifiers: readonly string[],
  options: AggregateOptions
): Promise<TrackResult[]> {
  const total = identifiers.length;
  let done = 0;

  const tasks = identifiers.map((identifier) => async () => {
    const result = await resolveIdentifier(client, identifier, options);
    done++;
    try {
      options.onProgress?.(done, total, identifier, result.status);
    } catch (error) {
      debug(`[fetch] Progress callback failed: ${errorMessage(error)}`);
    }
    return result;
  });

  const settled = await runConcurrent(tasks, options.concurrency ?? 1);
  return settled.map((entry, index) =>
    entry.ok ? entry.value : buildFailedResult(identifiers[index] ?? "", entry.error)
  );
}

export function buildResultSet(tracks: readonly TrackResult[]): ResultSet {
  return { track_count: tracks.length, tracks };
}
