import { debug } from "../lib/logger";
import { CatalogError, errorMessage } from "../lib/errors";
import type { SpotifyCredentials } from "../lib/config";

// Refresh a little before the token actually expires
const EXPIRY_MARGIN_MS = 60_000;
const REQUEST_TIMEOUT_MS = 15_000;

export interface TokenProvider {
  getToken(): Promise<string>;
}

export type TokenProviderOptions = {
  credentials: SpotifyCredentials;
  tokenUrl: string;
  fetchFn?: typeof fetch;
  now?: () => number;
};

type TokenResponse = {
  access_token?: unknown;
  expires_in?: unknown;
  error?: unknown;
  error_description?: unknown;
};

function buildTokenBody(credentials: SpotifyCredentials): string {
  const params = new URLSearchParams();
  if (credentials.refreshToken) {
    params.set("grant_type", "refresh_token");
    params.set("refresh_token", credentials.refreshToken);
  } else {
    params.set("grant_type", "client_credentials");
  }
  return params.toString();
}

/**
 * Client-credentials (or refresh-token) grant against the Spotify
 * accounts service. The token is cached until shortly before it expires.
 */
export function createTokenProvider(options: TokenProviderOptions): TokenProvider {
  const fetchFn = options.fetchFn ?? fetch;
  const now = options.now ?? Date.now;
  const { clientId, clientSecret } = options.credentials;
  const basic = Buffer.from(`${clientId}:${clientSecret}`).toString("base64");

  let accessToken: string | null = null;
  let expiresAt = 0;

  async function requestToken(): Promise<string> {
    const grant = options.credentials.refreshToken ? "refresh_token" : "client_credentials";
    debug(`[auth] Requesting access token (${grant})`);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);
    try {
      let response: Response;
      try {
        response = await fetchFn(options.tokenUrl, {
          method: "POST",
          headers: {
            "Content-Type": "application/x-www-form-urlencoded",
            Authorization: `Basic ${basic}`,
          },
          body: buildTokenBody(options.credentials),
          signal: controller.signal,
        });
      } catch (error) {
        throw new CatalogError(`Spotify auth network error: ${errorMessage(error)}`, {
          endpoint: options.tokenUrl,
        });
      }

      let payload: TokenResponse;
      try {
        payload = (await response.json()) as TokenResponse;
      } catch (error) {
        if (controller.signal.aborted) {
          throw new CatalogError("Spotify auth request timed out", {
            status: response.status,
            endpoint: options.tokenUrl,
          });
        }
        debug(`[auth] Unreadable token response: ${errorMessage(error)}`);
        payload = {};
      }
      return storeToken(response, payload);
    } finally {
      clearTimeout(timeout);
    }
  }

  function storeToken(response: Response, payload: TokenResponse): string {
    if (!response.ok) {
      const detail =
        typeof payload.error_description === "string"
          ? payload.error_description
          : typeof payload.error === "string"
            ? payload.error
            : response.statusText;
      throw new CatalogError(`Spotify auth failed (${response.status}): ${detail}`, {
        status: response.status,
        endpoint: options.tokenUrl,
      });
    }

    if (typeof payload.access_token !== "string" || !payload.access_token) {
      throw new CatalogError("Spotify auth response did not include an access token", {
        endpoint: options.tokenUrl,
      });
    }
    const expiresIn = typeof payload.expires_in === "number" ? payload.expires_in : 3600;

    accessToken = payload.access_token;
    expiresAt = now() + expiresIn * 1000 - EXPIRY_MARGIN_MS;
    return payload.access_token;
  }

  // Shared by every caller that arrives while a token request is out
  let pending: Promise<string> | null = null;

  return {
    async getToken(): Promise<string> {
      if (accessToken && now() < expiresAt) return accessToken;
      if (!pending) {
        if (accessToken) debug("[auth] Access token expired, refreshing");
        pending = requestToken().finally(() => {
          pending = null;
        });
      }
      return pending;
    },
  };
}
