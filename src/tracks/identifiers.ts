import fs from "fs";
import { debug } from "../lib/logger";
import { TooManyIdentifiersError } from "../lib/errors";

export const MAX_IDENTIFIERS = 100;

const SHARE_LINK = /open\.spotify\.com\/(?:intl-[a-z-]+\/)?track\/([A-Za-z0-9]+)/;

export function isFileSource(source: string): boolean {
  try {
    return fs.statSync(source).isFile();
  } catch {
    return false;
  }
}

export function parseIdentifierLines(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export function parseIdentifierList(value: string): string[] {
  return value
    .split(",")
    .map((id) => id.trim())
    .filter((id) => id.length > 0);
}

/**
 * Read track identifiers from a newline-delimited file, or from an inline
 * comma-separated list when `source` is not a file. Identifiers are kept
 * exactly as given (trimmed); URI prefixes are stripped later, per track.
 */
export function readIdentifiers(source: string): string[] {
  let identifiers: string[];
  if (isFileSource(source)) {
    debug(`[fetch] Reading track IDs from file: ${source}`);
    identifiers = parseIdentifierLines(fs.readFileSync(source, "utf8"));
  } else {
    debug("[fetch] Reading track IDs from command line argument");
    identifiers = parseIdentifierList(source);
  }

  if (identifiers.length > MAX_IDENTIFIERS) {
    throw new TooManyIdentifiersError(identifiers.length, MAX_IDENTIFIERS);
  }
  return identifiers;
}

/**
 * "spotify:track:ABC123"                        → "ABC123"
 * "https://open.spotify.com/track/ABC123?si=x"  → "ABC123"
 * "ABC123"                                      → "ABC123"
 */
export function normalizeTrackId(identifier: string): string {
  const trimmed = identifier.trim();
  const link = SHARE_LINK.exec(trimmed);
  if (link?.[1]) return link[1];

  const colon = trimmed.lastIndexOf(":");
  return colon === -1 ? trimmed : trimmed.slice(colon + 1);
}
