import { debug, log } from "../lib/logger";
import type { CatalogError } from "../lib/errors";
import { concatSuccesses, toCatalogResult, type Result } from "../lib/result";
import type { CatalogClient, TrackRecord } from "../services/types";
import { artistTopTracksSource } from "./sources/artistTopTracks";
import { otherAlbumsSource } from "./sources/otherAlbums";
import { sameAlbumSource } from "./sources/sameAlbum";
import type { SimilarContext, SimilarSource, SimilarTrack } from "./types";

export const SIMILAR_SOURCES: readonly SimilarSource[] = [
  artistTopTracksSource,
  sameAlbumSource,
  otherAlbumsSource,
];

export type DiscoverOptions = {
  market: string;
  sources?: readonly SimilarSource[];
};

async function settleSource(
  source: SimilarSource,
  seed: TrackRecord,
  ctx: SimilarContext
): Promise<Result<SimilarTrack[], CatalogError>> {
  const settled = await toCatalogResult(() => source.run(seed, ctx));
  return settled.ok ? settled.value : settled;
}

/**
 * Best-effort list of tracks related to `seed`: artist top tracks, then
 * same-album tracks, then the opening tracks of other albums. Sources run
 * one after another and a failing source only loses its own entries, so
 * this never rejects. Entries are not deduplicated across sources.
 */
export async function discoverSimilarTracks(
  client: CatalogClient,
  seed: TrackRecord,
  options: DiscoverOptions
): Promise<SimilarTrack[]> {
  const sources = options.sources ?? SIMILAR_SOURCES;
  const ctx: SimilarContext = { client, market: options.market };

  const results: Result<SimilarTrack[], CatalogError>[] = [];
  for (const source of sources) {
    results.push(await settleSource(source, seed, ctx));
  }

  const tracks = concatSuccesses(results, (error, index) => {
    log(`[similar] ${sources[index]?.name ?? "source"} failed for ${seed.id}: ${error.message}`);
  });
  debug(`[similar] ${seed.id}: ${tracks.length} similar tracks`);
  return tracks;
}
