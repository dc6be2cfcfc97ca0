import { Command, InvalidArgumentError } from "commander";
import { runFetch, type FetchOptions } from "../tracks";

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}"`);
  }
  return parsed;
}

export function registerFetchCommand(program: Command): void {
  program
    .command("fetch", { isDefault: true })
    .description("Fetch track info and similar tracks into a JSON file")
    .argument(
      "<input>",
      "File with one track ID per line, or comma-separated track IDs"
    )
    .option("-o, --output <path>", "Output file (default: <input stem>.json or trackinfo.json)")
    .option("--market <code>", "Market used for track and top-track lookups")
    .option("--concurrency <count>", "Tracks to process in parallel (default: 1)", parsePositiveInt)
    .option("-v, --verbose", "Print debug output")
    .action(async (input: string, options: FetchOptions) => {
      await runFetch(input, options);
    });
}
