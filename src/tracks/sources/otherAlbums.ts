import { debug, log } from "../../lib/logger";
import type { CatalogError } from "../../lib/errors";
import { concatSuccesses, ok, toCatalogResult, type Result } from "../../lib/result";
import type { AlbumSummary, AlbumType, TrackRecord } from "../../services/types";
import type { SimilarContext, SimilarSource, SimilarTrack } from "../types";
import { resolvePopularity, toSimilarTrack } from "./common";

const ALBUM_TYPES: readonly AlbumType[] = ["album", "single"];
const ALBUM_LIMIT = 2;

async function firstTrackOf(
  album: AlbumSummary,
  seed: TrackRecord,
  ctx: SimilarContext
): Promise<Result<SimilarTrack[], CatalogError>> {
  const listing = await toCatalogResult(() => ctx.client.fetchAlbumTracks(album.id));
  if (!listing.ok) return listing;

  const first = listing.value[0];
  if (!first || first.id === seed.id) return ok([]);

  const popularity = await resolvePopularity(ctx, first.id);
  return ok([toSimilarTrack(first, "other_album", popularity)]);
}

/**
 * Opening track of each of the artist's other releases. Each album is
 * looked up on its own; one failing listing does not drop the others.
 */
export const otherAlbumsSource: SimilarSource = {
  name: "other_album",
  async run(seed: TrackRecord, ctx: SimilarContext) {
    const artist = seed.artists[0];
    if (!artist?.id) return ok([]);

    debug(`[similar] Getting other albums from artist: ${artist.id}`);
    const albums = await toCatalogResult(() =>
      ctx.client.fetchArtistAlbums(artist.id, ALBUM_TYPES, ALBUM_LIMIT)
    );
    if (!albums.ok) return albums;

    const others = albums.value.filter((album) => album.id !== seed.album.id);
    const perAlbum: Result<SimilarTrack[], CatalogError>[] = [];
    for (const album of others) {
      perAlbum.push(await firstTrackOf(album, seed, ctx));
    }

    return ok(
      concatSuccesses(perAlbum, (error, index) => {
        log(`[similar] Album ${others[index]?.id ?? "?"} skipped: ${error.message}`);
      })
    );
  },
};
