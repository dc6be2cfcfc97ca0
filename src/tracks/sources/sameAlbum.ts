import { debug } from "../../lib/logger";
import { ok, toCatalogResult } from "../../lib/result";
import type { TrackRecord } from "../../services/types";
import type { SimilarContext, SimilarSource, SimilarTrack } from "../types";
import { resolvePopularity, toSimilarTrack } from "./common";

const SAME_ALBUM_LIMIT = 2;

export const sameAlbumSource: SimilarSource = {
  name: "same_album",
  async run(seed: TrackRecord, ctx: SimilarContext) {
    const albumId = seed.album.id;
    if (!albumId) return ok([]);

    debug(`[similar] Getting tracks from album: ${albumId}`);
    const listing = await toCatalogResult(() => ctx.client.fetchAlbumTracks(albumId));
    if (!listing.ok) return listing;

    const picks = listing.value
      .filter((track) => track.id !== seed.id)
      .slice(0, SAME_ALBUM_LIMIT);

    const tracks: SimilarTrack[] = [];
    for (const track of picks) {
      const popularity = await resolvePopularity(ctx, track.id);
      tracks.push(toSimilarTrack(track, "same_album", popularity));
    }
    return ok(tracks);
  },
};
