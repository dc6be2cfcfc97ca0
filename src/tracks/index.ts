// Public API for the tracks module
export { runFetch, type FetchOptions, type FetchDependencies, type FetchSummary } from "./runner";
export { aggregateTracks, buildResultSet, resolveIdentifier, type AggregateOptions } from "./aggregator";
export { discoverSimilarTracks, SIMILAR_SOURCES } from "./similar";
export { readIdentifiers, normalizeTrackId, MAX_IDENTIFIERS } from "./identifiers";
export { deriveOutputPath, relocateExisting, writeResultSet } from "./output";
export type { ResultSet, SimilarTrack, TrackResult } from "./types";
