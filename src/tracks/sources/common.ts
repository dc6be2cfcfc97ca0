import { debug } from "../../lib/logger";
import { toCatalogResult } from "../../lib/result";
import type { TrackSummary } from "../../services/types";
import type { SimilarContext, SimilarSourceName, SimilarTrack } from "../types";

export function toSimilarTrack(
  track: TrackSummary,
  source: SimilarSourceName,
  popularity: number
): SimilarTrack {
  return {
    id: track.id,
    name: track.name,
    artists: track.artists.map((artist) => artist.name),
    popularity,
    preview_url: track.preview_url,
    external_urls: track.external_urls,
    source,
  };
}

/**
 * Album listings carry no popularity, so it takes a full track lookup.
 * A failed lookup leaves the entry in place with popularity 0.
 */
export async function resolvePopularity(
  ctx: SimilarContext,
  trackId: string
): Promise<number> {
  const full = await toCatalogResult(() => ctx.client.fetchTrackFull(trackId));
  if (full.ok) return full.value.track_details.popularity;
  debug(`[similar] Popularity lookup failed for ${trackId}: ${full.error.message}`);
  return 0;
}
