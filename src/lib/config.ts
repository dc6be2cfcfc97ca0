import fs from "fs";
import yaml from "yaml";
import { ConfigError, errorMessage } from "./errors";
import { defaultConfigPath, expandHome } from "./paths";

export type TrackinfoConfig = {
  spotify: {
    client_id: string;
    client_secret: string;
    refresh_token: string | undefined;
    market: string;
    api_url: string;
    token_url: string;
  };
  fetch: {
    concurrency: number;
  };
  debug: boolean;
};

type PartialConfig = {
  spotify?: Partial<TrackinfoConfig["spotify"]>;
  fetch?: Partial<TrackinfoConfig["fetch"]>;
  debug?: boolean;
};

const DEFAULT_CONFIG: TrackinfoConfig = {
  spotify: {
    client_id: "",
    client_secret: "",
    refresh_token: undefined,
    market: "US",
    api_url: "https://api.spotify.com/v1",
    token_url: "https://accounts.spotify.com/api/token",
  },
  fetch: {
    concurrency: 1,
  },
  debug: false,
};

type Env = Record<string, string | undefined>;

function readConfigFile(configPath: string): PartialConfig {
  if (!fs.existsSync(configPath)) return {};

  let parsed: unknown;
  try {
    parsed = yaml.parse(fs.readFileSync(configPath, "utf8"));
  } catch (error) {
    throw new ConfigError(
      `Could not read config ${configPath}: ${errorMessage(error)}`
    );
  }

  if (parsed == null) return {};
  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigError(`Config ${configPath} must be a YAML mapping`);
  }
  return parsed as PartialConfig;
}

function parseConcurrency(value: unknown): number | undefined {
  const parsed =
    typeof value === "number" ? value : Number.parseInt(String(value), 10);
  if (!Number.isFinite(parsed) || parsed < 1) return undefined;
  return Math.floor(parsed);
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value == null || value === "") return undefined;
  return ["1", "true", "yes", "on"].includes(value.toLowerCase());
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: Env = process.env): TrackinfoConfig {
  const configPath = expandHome(
    env.TRACKINFO_CONFIG_PATH ?? defaultConfigPath()
  );
  const fileConfig = readConfigFile(configPath);

  const merged: TrackinfoConfig = {
    spotify: {
      client_id: fileConfig.spotify?.client_id ?? DEFAULT_CONFIG.spotify.client_id,
      client_secret:
        fileConfig.spotify?.client_secret ?? DEFAULT_CONFIG.spotify.client_secret,
      refresh_token:
        fileConfig.spotify?.refresh_token ?? DEFAULT_CONFIG.spotify.refresh_token,
      market: fileConfig.spotify?.market ?? DEFAULT_CONFIG.spotify.market,
      api_url: fileConfig.spotify?.api_url ?? DEFAULT_CONFIG.spotify.api_url,
      token_url: fileConfig.spotify?.token_url ?? DEFAULT_CONFIG.spotify.token_url,
    },
    fetch: {
      concurrency:
        parseConcurrency(fileConfig.fetch?.concurrency) ??
        DEFAULT_CONFIG.fetch.concurrency,
    },
    debug: fileConfig.debug === true,
  };

  return {
    spotify: {
      client_id: nonEmpty(env.SPOTIFY_CLIENT_ID) ?? merged.spotify.client_id,
      client_secret:
        nonEmpty(env.SPOTIFY_CLIENT_SECRET) ?? merged.spotify.client_secret,
      refresh_token:
        nonEmpty(env.SPOTIFY_REFRESH_TOKEN) ?? merged.spotify.refresh_token,
      market: (nonEmpty(env.SPOTIFY_MARKET) ?? merged.spotify.market).toUpperCase(),
      api_url: nonEmpty(env.SPOTIFY_API_URL) ?? merged.spotify.api_url,
      token_url: nonEmpty(env.SPOTIFY_TOKEN_URL) ?? merged.spotify.token_url,
    },
    fetch: {
      concurrency:
        parseConcurrency(env.TRACKINFO_CONCURRENCY) ?? merged.fetch.concurrency,
    },
    debug: parseFlag(env.TRACKINFO_DEBUG) ?? merged.debug,
  };
}

export type SpotifyCredentials = {
  clientId: string;
  clientSecret: string;
  refreshToken: string | undefined;
};

export function requireCredentials(config: TrackinfoConfig): SpotifyCredentials {
  const missing: string[] = [];
  if (!config.spotify.client_id) missing.push("SPOTIFY_CLIENT_ID");
  if (!config.spotify.client_secret) missing.push("SPOTIFY_CLIENT_SECRET");
  if (missing.length > 0) {
    throw new ConfigError(
      `Spotify credentials not found. Set ${missing.join(" and ")} ` +
        "in the environment or in the trackinfo config file."
    );
  }
  return {
    clientId: config.spotify.client_id,
    clientSecret: config.spotify.client_secret,
    refreshToken: config.spotify.refresh_token,
  };
}
