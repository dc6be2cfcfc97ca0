import fs from "fs";
import path from "path";
import { errorMessage, OutputError } from "../lib/errors";
import { debug } from "../lib/logger";
import { isFileSource } from "./identifiers";
import type { ResultSet } from "./types";

export const DEFAULT_OUTPUT_NAME = "trackinfo.json";

/**
 * `<stem>.json` for a file input, the default name for an inline list.
 * Relative to `cwd`, like the input itself.
 */
export function deriveOutputPath(source: string, cwd: string = process.cwd()): string {
  if (isFileSource(source)) {
    const stem = path.parse(source).name;
    return path.join(cwd, `${stem}.json`);
  }
  return path.join(cwd, DEFAULT_OUTPUT_NAME);
}

export function nextFreePath(outputPath: string): string {
  const { dir, name, ext } = path.parse(outputPath);
  const extension = ext || ".json";
  for (let counter = 1; ; counter++) {
    const candidate = path.join(dir, `${name}_${counter}${extension}`);
    if (!fs.existsSync(candidate)) return candidate;
  }
}

/**
 * Move an existing file out of the way so the new document can take its
 * name. Returns where the old file went, or null when nothing was there.
 */
export function relocateExisting(outputPath: string): string | null {
  if (!fs.existsSync(outputPath)) return null;

  const target = nextFreePath(outputPath);
  try {
    fs.renameSync(outputPath, target);
  } catch (error) {
    throw new OutputError(
      `Could not rename existing ${outputPath}: ${errorMessage(error)}`,
      outputPath
    );
  }
  debug(`[output] Renamed existing file to ${target}`);
  return target;
}

export function serializeResultSet(resultSet: ResultSet): string {
  return `${JSON.stringify(resultSet, null, 2)}\n`;
}

export function writeResultSet(outputPath: string, resultSet: ResultSet): void {
  try {
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    fs.writeFileSync(outputPath, serializeResultSet(resultSet), "utf8");
  } catch (error) {
    throw new OutputError(`Could not write ${outputPath}: ${errorMessage(error)}`, outputPath);
  }
}
