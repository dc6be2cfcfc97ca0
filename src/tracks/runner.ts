import path from "path";
import { loadConfig, type TrackinfoConfig } from "../lib/config";
import { log, setVerbose } from "../lib/logger";
import { connectCatalog } from "../services/catalog";
import type { CatalogClient } from "../services/types";
import { aggregateTracks, buildResultSet } from "./aggregator";
import { formatProgress, formatSummary } from "./formatting";
import { readIdentifiers } from "./identifiers";
import { deriveOutputPath, relocateExisting, writeResultSet } from "./output";
import type { ResultSet } from "./types";

export interface FetchOptions {
  output?: string | undefined;
  market?: string | undefined;
  concurrency?: number | undefined;
  verbose?: boolean | undefined;
}

export interface FetchDependencies {
  config?: TrackinfoConfig;
  client?: CatalogClient;
  cwd?: string;
  print?: (text: string) => void;
}

export interface FetchSummary {
  outputPath: string;
  relocatedTo: string | null;
  resultSet: ResultSet;
}

function normalizeConcurrency(value: number | undefined, fallback: number): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 1) {
    return fallback;
  }
  return Math.floor(value);
}

// --- Main Orchestrator ---

export async function runFetch(
  input: string,
  options: FetchOptions,
  deps: FetchDependencies = {}
): Promise<FetchSummary> {
  const cwd = deps.cwd ?? process.cwd();
  const print = deps.print ?? ((text: string) => console.log(text));

  // 1. Parse input before touching the network
  const identifiers = readIdentifiers(input);

  const config = deps.config ?? loadConfig();
  setVerbose(Boolean(options.verbose) || config.debug);
  log(`[fetch] Processing ${identifiers.length} track IDs`);

  // 2. Authenticate once; the client is shared by every lookup
  const client = deps.client ?? (await connectCatalog(config));

  // 3. Resolve tracks + similar tracks
  const market = (options.market ?? config.spotify.market).toUpperCase();
  const tracks = await aggregateTracks(client, identifiers, {
    market,
    concurrency: normalizeConcurrency(options.concurrency, config.fetch.concurrency),
    onProgress: (done, total, identifier, status) => {
      log(formatProgress(done, total, identifier, status));
    },
  });
  const resultSet = buildResultSet(tracks);

  // 4. Write, keeping any earlier output under a numbered name
  const outputPath = options.output
    ? path.resolve(cwd, options.output)
    : deriveOutputPath(input, cwd);
  const relocatedTo = relocateExisting(outputPath);
  writeResultSet(outputPath, resultSet);

  print(formatSummary(resultSet, outputPath, relocatedTo));
  return { outputPath, relocatedTo, resultSet };
}
