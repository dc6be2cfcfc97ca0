import { requireCredentials, type TrackinfoConfig } from "../lib/config";
import { ConfigError, errorMessage } from "../lib/errors";
import { debug } from "../lib/logger";
import { createSpotifyClient } from "./spotifyApi";
import { createTokenProvider } from "./spotifyAuth";
import type { CatalogClient } from "./types";

/**
 * Build the authenticated catalog client once, at startup. The first token
 * is requested eagerly so bad credentials fail the run before any track
 * is processed.
 */
export async function connectCatalog(
  config: TrackinfoConfig,
  fetchFn: typeof fetch = fetch
): Promise<CatalogClient> {
  const credentials = requireCredentials(config);
  const tokenProvider = createTokenProvider({
    credentials,
    tokenUrl: config.spotify.token_url,
    fetchFn,
  });

  try {
    await tokenProvider.getToken();
  } catch (error) {
    throw new ConfigError(`Spotify authentication failed: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  debug("[auth] Authenticated with Spotify");

  return createSpotifyClient({
    tokenProvider,
    baseUrl: config.spotify.api_url,
    fetchFn,
  });
}
