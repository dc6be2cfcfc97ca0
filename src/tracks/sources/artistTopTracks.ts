import { debug } from "../../lib/logger";
import { ok, toCatalogResult } from "../../lib/result";
import type { TrackRecord } from "../../services/types";
import type { SimilarContext, SimilarSource } from "../types";
import { toSimilarTrack } from "./common";

const TOP_TRACK_LIMIT = 3;

export const artistTopTracksSource: SimilarSource = {
  name: "artist_top_tracks",
  async run(seed: TrackRecord, ctx: SimilarContext) {
    const artist = seed.artists[0];
    if (!artist?.id) {
      debug(`[similar] ${seed.id} has no primary artist, skipping top tracks`);
      return ok([]);
    }

    debug(`[similar] Getting top tracks for artist: ${artist.id}`);
    const topTracks = await toCatalogResult(() =>
      ctx.client.fetchArtistTopTracks(artist.id, ctx.market)
    );
    if (!topTracks.ok) return topTracks;

    return ok(
      topTracks.value
        .slice(0, TOP_TRACK_LIMIT)
        .filter((track) => track.id !== seed.id)
        .map((track) => toSimilarTrack(track, "artist_top_tracks", track.popularity ?? 0))
    );
  },
};
