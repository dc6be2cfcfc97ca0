import { beforeEach, describe, expect, it, vi } from "vitest";
import { err, ok } from "../../lib/result";
import { CatalogError } from "../../lib/errors";
import { discoverSimilarTracks } from "../similar";
import type { SimilarSource } from "../types";
import {
  createFakeCatalog,
  makeAlbum,
  makeSummary,
  makeTrack,
  type FakeCatalogData,
} from "./fakeCatalog";

const seed = makeTrack({ id: "SEED", artistId: "ART1", albumId: "ALB1", popularity: 90 });

function fullCatalog(overrides: Partial<FakeCatalogData> = {}): FakeCatalogData {
  return {
    tracks: {
      SEED: seed,
      A1: makeTrack({ id: "A1", popularity: 41 }),
      A2: makeTrack({ id: "A2", popularity: 42 }),
      B1: makeTrack({ id: "B1", popularity: 33 }),
    },
    topTracks: {
      ART1: [makeSummary("T1", 80), makeSummary("SEED", 90), makeSummary("T2", 70), makeSummary("T3", 60)],
    },
    albumTracks: {
      ALB1: [makeSummary("SEED"), makeSummary("A1"), makeSummary("A2"), makeSummary("A3")],
      ALB2: [makeSummary("B1"), makeSummary("B2")],
    },
    artistAlbums: {
      ART1: [makeAlbum("ALB1"), makeAlbum("ALB2", "single")],
    },
    ...overrides,
  };
}

describe("discoverSimilarTracks", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("combines top tracks, same-album and other-album tracks in order", async () => {
    const client = createFakeCatalog(fullCatalog());
    const similar = await discoverSimilarTracks(client, seed, { market: "US" });

    expect(similar.map((t) => [t.id, t.source, t.popularity])).toEqual([
      ["T1", "artist_top_tracks", 80],
      ["T2", "artist_top_tracks", 70],
      ["A1", "same_album", 41],
      ["A2", "same_album", 42],
      ["B1", "other_album", 33],
    ]);
  });

  it("never includes the seed track", async () => {
    const client = createFakeCatalog(fullCatalog());
    const similar = await discoverSimilarTracks(client, seed, { market: "US" });
    expect(similar.some((t) => t.id === "SEED")).toBe(false);
  });

  it("queries top tracks in the requested market and albums of type album/single", async () => {
    const client = createFakeCatalog(fullCatalog());
    await discoverSimilarTracks(client, seed, { market: "SE" });

    expect(client.calls).toContain("top:ART1:SE");
    expect(client.calls).toContain("albums:ART1:album,single:2");
  });

  it("only looks at the first three top tracks", async () => {
    const client = createFakeCatalog(
      fullCatalog({
        topTracks: {
          ART1: [makeSummary("T1", 1), makeSummary("T2", 2), makeSummary("T3", 3), makeSummary("T4", 4)],
        },
      })
    );
    const similar = await discoverSimilarTracks(client, seed, { market: "US" });
    const top = similar.filter((t) => t.source === "artist_top_tracks").map((t) => t.id);
    expect(top).toEqual(["T1", "T2", "T3"]);
  });

  it("defaults popularity to 0 when the full track lookup fails", async () => {
    const client = createFakeCatalog(fullCatalog({ failing: ["full:A2", "full:B1"] }));
    const similar = await discoverSimilarTracks(client, seed, { market: "US" });

    expect(similar.find((t) => t.id === "A2")?.popularity).toBe(0);
    expect(similar.find((t) => t.id === "B1")?.popularity).toBe(0);
    expect(similar).toHaveLength(5);
  });

  it("returns an empty list when every source fails", async () => {
    const client = createFakeCatalog(
      fullCatalog({ failing: ["top:ART1", "album:ALB1", "albums:ART1"] })
    );
    await expect(discoverSimilarTracks(client, seed, { market: "US" })).resolves.toEqual([]);
  });

  it("keeps the other sources when one fails", async () => {
    const client = createFakeCatalog(fullCatalog({ failing: ["album:ALB1"] }));
    const similar = await discoverSimilarTracks(client, seed, { market: "US" });
    expect(similar.map((t) => t.id)).toEqual(["T1", "T2", "B1"]);
  });

  it("skips an other album whose listing fails and still tries the next one", async () => {
    const client = createFakeCatalog(
      fullCatalog({
        artistAlbums: { ART1: [makeAlbum("ALB2"), makeAlbum("ALB3")] },
        albumTracks: {
          ALB1: [],
          ALB3: [makeSummary("C1"), makeSummary("C2")],
        },
        failing: ["album:ALB2"],
      })
    );
    const similar = await discoverSimilarTracks(client, seed, { market: "US" });
    expect(similar.filter((t) => t.source === "other_album").map((t) => t.id)).toEqual(["C1"]);
  });

  it("drops another album whose opening track is the seed itself", async () => {
    const client = createFakeCatalog(
      fullCatalog({
        artistAlbums: { ART1: [makeAlbum("ALB2"), makeAlbum("ALB3")] },
        albumTracks: {
          ALB1: [],
          ALB2: [makeSummary("SEED"), makeSummary("X")],
          ALB3: [makeSummary("C1")],
        },
      })
    );
    const similar = await discoverSimilarTracks(client, seed, { market: "US" });

    expect(similar.filter((t) => t.source === "other_album").map((t) => t.id)).toEqual(["C1"]);
    expect(client.calls).toContain("album:ALB2");
    expect(client.calls).not.toContain("full:SEED");
    expect(client.calls).not.toContain("full:X");
  });

  it("does not deduplicate a track found by two sources", async () => {
    const client = createFakeCatalog(
      fullCatalog({
        albumTracks: { ALB1: [], ALB2: [makeSummary("T1")] },
        tracks: { T1: makeTrack({ id: "T1", popularity: 80 }) },
      })
    );
    const similar = await discoverSimilarTracks(client, seed, { market: "US" });
    expect(similar.map((t) => `${t.id}/${t.source}`)).toEqual([
      "T1/artist_top_tracks",
      "T2/artist_top_tracks",
      "T1/other_album",
    ]);
  });

  it("keeps a missing preview URL as null and copies preview URLs through", async () => {
    const client = createFakeCatalog(
      fullCatalog({
        topTracks: {
          ART1: [makeSummary("T1", 80, "https://p.scdn.test/t1"), makeSummary("T2", 70)],
        },
      })
    );
    const similar = await discoverSimilarTracks(client, seed, { market: "US" });
    expect(similar[0]?.preview_url).toBe("https://p.scdn.test/t1");
    expect(similar[1]?.preview_url).toBeNull();
  });

  it("projects listing entries into similar tracks", async () => {
    const client = createFakeCatalog(fullCatalog());
    const [first] = await discoverSimilarTracks(client, seed, { market: "US" });
    expect(first).toEqual({
      id: "T1",
      name: "Track T1",
      artists: ["Test Artist"],
      popularity: 80,
      preview_url: null,
      external_urls: { spotify: "https://open.spotify.com/track/T1" },
      source: "artist_top_tracks",
    });
  });

  it("only uses the album source for a seed without artists", async () => {
    const lonely = makeTrack({ id: "SEED", artistId: "", albumId: "ALB1" });
    const client = createFakeCatalog(fullCatalog());
    const similar = await discoverSimilarTracks(client, lonely, { market: "US" });

    expect(similar.map((t) => t.source)).toEqual(["same_album", "same_album"]);
    expect(client.calls.some((call) => call.startsWith("top:"))).toBe(false);
  });

  it("contains a source that rejects outside the catalog client", async () => {
    const broken: SimilarSource = {
      name: "same_album",
      run: async () => {
        throw new TypeError("boom");
      },
    };
    const steady: SimilarSource = {
      name: "artist_top_tracks",
      run: async () => ok([]),
    };
    const failing: SimilarSource = {
      name: "other_album",
      run: async () => err(new CatalogError("down")),
    };
    const client = createFakeCatalog();
    const similar = await discoverSimilarTracks(client, seed, {
      market: "US",
      sources: [steady, broken, failing],
    });
    expect(similar).toEqual([]);
  });
});
