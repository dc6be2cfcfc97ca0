import { debug } from "../lib/logger";
import { CatalogError, errorMessage } from "../lib/errors";
import type { TokenProvider } from "./spotifyAuth";
import type {
  AlbumImage,
  AlbumSummary,
  AlbumType,
  ArtistRef,
  CatalogClient,
  TrackRecord,
  TrackSummary,
} from "./types";

const REQUEST_TIMEOUT_MS = 15_000;

export type SpotifyClientOptions = {
  tokenProvider: TokenProvider;
  baseUrl: string;
  fetchFn?: typeof fetch;
};

// --- Raw payload shapes (everything optional, validated on read) ---

type RawArtist = { id?: unknown; name?: unknown };
type RawImage = { url?: unknown; height?: unknown; width?: unknown };

type RawAlbum = {
  id?: unknown;
  name?: unknown;
  album_type?: unknown;
  release_date?: unknown;
  total_tracks?: unknown;
  images?: unknown;
};

type RawTrack = {
  id?: unknown;
  name?: unknown;
  artists?: unknown;
  album?: RawAlbum;
  duration_ms?: unknown;
  explicit?: unknown;
  popularity?: unknown;
  preview_url?: unknown;
  track_number?: unknown;
  disc_number?: unknown;
  is_playable?: unknown;
  external_ids?: unknown;
  external_urls?: unknown;
};

// --- Field readers ---

function str(value: unknown, fallback = ""): string {
  return typeof value === "string" ? value : fallback;
}

function num(value: unknown, fallback = 0): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

function nullableStr(value: unknown): string | null {
  return typeof value === "string" && value.length > 0 ? value : null;
}

function nullableNum(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function stringMap(value: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  if (!value || typeof value !== "object") return out;
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === "string") out[key] = entry;
  }
  return out;
}

function list(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function mapArtists(value: unknown): ArtistRef[] {
  return list(value).map((item) => {
    const artist = (item ?? {}) as RawArtist;
    return { id: str(artist.id), name: str(artist.name, "Unknown") };
  });
}

function mapImages(value: unknown): AlbumImage[] {
  const images: AlbumImage[] = [];
  for (const item of list(value)) {
    const image = (item ?? {}) as RawImage;
    if (typeof image.url !== "string") continue;
    images.push({
      url: image.url,
      height: nullableNum(image.height),
      width: nullableNum(image.width),
    });
  }
  return images;
}

// --- Normalizers ---

export function normalizeTrack(payload: unknown): TrackRecord {
  const raw = (payload ?? {}) as RawTrack;
  const id = str(raw.id);
  if (!id) {
    throw new CatalogError("Malformed track payload: missing id");
  }
  const album = raw.album ?? {};

  return {
    id,
    name: str(raw.name, "Unknown"),
    artists: mapArtists(raw.artists),
    album: {
      id: str(album.id),
      name: str(album.name, "Unknown"),
      release_date: nullableStr(album.release_date),
      total_tracks: num(album.total_tracks),
      images: mapImages(album.images),
    },
    track_details: {
      duration_ms: num(raw.duration_ms),
      explicit: raw.explicit === true,
      popularity: num(raw.popularity),
      preview_url: nullableStr(raw.preview_url),
      track_number: num(raw.track_number, 1),
      disc_number: num(raw.disc_number, 1),
      is_playable: typeof raw.is_playable === "boolean" ? raw.is_playable : true,
      external_ids: stringMap(raw.external_ids),
    },
    external_urls: stringMap(raw.external_urls),
  };
}

/**
 * Listing entries without an id (local files, unavailable items) are
 * dropped.
 */
export function normalizeTrackSummaries(items: unknown): TrackSummary[] {
  const tracks: TrackSummary[] = [];
  for (const item of list(items)) {
    const raw = (item ?? {}) as RawTrack;
    const id = str(raw.id);
    if (!id) continue;
    tracks.push({
      id,
      name: str(raw.name, "Unknown"),
      artists: mapArtists(raw.artists),
      popularity: nullableNum(raw.popularity),
      preview_url: nullableStr(raw.preview_url),
      external_urls: stringMap(raw.external_urls),
    });
  }
  return tracks;
}

export function normalizeAlbumSummaries(items: unknown): AlbumSummary[] {
  const albums: AlbumSummary[] = [];
  for (const item of list(items)) {
    const raw = (item ?? {}) as RawAlbum;
    const id = str(raw.id);
    if (!id) continue;
    albums.push({
      id,
      name: str(raw.name, "Unknown"),
      album_type: str(raw.album_type),
      release_date: nullableStr(raw.release_date),
      total_tracks: num(raw.total_tracks),
    });
  }
  return albums;
}

// --- Client ---

type Query = Record<string, string | number | undefined>;

function buildUrl(baseUrl: string, path: string, query: Query = {}): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) params.set(key, String(value));
  }
  const qs = params.toString();
  return `${baseUrl.replace(/\/+$/, "")}${path}${qs ? `?${qs}` : ""}`;
}

async function readErrorDetail(response: Response): Promise<string | undefined> {
  try {
    const body = (await response.json()) as { error?: { message?: unknown } | string };
    if (typeof body.error === "string") return body.error;
    const message = body.error?.message;
    return typeof message === "string" ? message : undefined;
  } catch {
    return undefined;
  }
}

export function createSpotifyClient(options: SpotifyClientOptions): CatalogClient {
  const fetchFn = options.fetchFn ?? fetch;

  async function spotifyGet(path: string, query?: Query): Promise<unknown> {
    const url = buildUrl(options.baseUrl, path, query);
    const token = await options.tokenProvider.getToken();
    debug(`[spotify] GET ${path}`);

    // The timer stays armed until the body has been read
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);
    try {
      let response: Response;
      try {
        response = await fetchFn(url, {
          headers: { Authorization: `Bearer ${token}`, Accept: "application/json" },
          signal: controller.signal,
        });
      } catch (error) {
        throw new CatalogError(`Spotify network error: ${errorMessage(error)} (${path})`, {
          endpoint: path,
        });
      }

      if (!response.ok) {
        const detail = await readErrorDetail(response);
        throw new CatalogError(
          `Spotify API ${response.status} (${path})${detail ? `: ${detail}` : ""}`,
          { status: response.status, endpoint: path }
        );
      }

      try {
        return await response.json();
      } catch (error) {
        if (controller.signal.aborted) {
          throw new CatalogError(`Spotify request timed out (${path})`, {
            status: response.status,
            endpoint: path,
          });
        }
        throw new CatalogError(`Spotify returned invalid JSON (${path}): ${errorMessage(error)}`, {
          status: response.status,
          endpoint: path,
        });
      }
    } finally {
      clearTimeout(timeout);
    }
  }

  const trackPath = (id: string) => `/tracks/${encodeURIComponent(id)}`;

  return {
    async fetchTrack(id, market) {
      return normalizeTrack(await spotifyGet(trackPath(id), { market }));
    },

    async fetchTrackFull(id) {
      return normalizeTrack(await spotifyGet(trackPath(id)));
    },

    async fetchArtistTopTracks(artistId, market) {
      const data = (await spotifyGet(
        `/artists/${encodeURIComponent(artistId)}/top-tracks`,
        { market }
      )) as { tracks?: unknown } | null;
      return normalizeTrackSummaries(data?.tracks);
    },

    async fetchAlbumTracks(albumId) {
      const data = (await spotifyGet(
        `/albums/${encodeURIComponent(albumId)}/tracks`
      )) as { items?: unknown } | null;
      return normalizeTrackSummaries(data?.items);
    },

    async fetchArtistAlbums(artistId: string, types: readonly AlbumType[], limit: number) {
      const data = (await spotifyGet(
        `/artists/${encodeURIComponent(artistId)}/albums`,
        { include_groups: types.join(","), limit }
      )) as { items?: unknown } | null;
      return normalizeAlbumSummaries(data?.items);
    },
  };
}
