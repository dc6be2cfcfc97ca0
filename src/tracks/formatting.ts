import type { ResultSet, TrackResult } from "./types";

export function countByStatus(tracks: readonly TrackResult[]): { retrieved: number; failed: number } {
  let retrieved = 0;
  let failed = 0;
  for (const track of tracks) {
    if (track.status === "retrieved") retrieved++;
    else failed++;
  }
  return { retrieved, failed };
}

export function formatProgress(
  done: number,
  total: number,
  identifier: string,
  status: TrackResult["status"]
): string {
  return `[fetch] (${done}/${total}) ${identifier}: ${status}`;
}

export function formatSummary(
  resultSet: ResultSet,
  outputPath: string,
  relocatedTo: string | null
): string {
  const { retrieved, failed } = countByStatus(resultSet.tracks);
  const lines: string[] = [];
  if (relocatedTo) {
    lines.push(`Moved previous output to ${relocatedTo}`);
  }
  lines.push(
    `Saved ${resultSet.track_count} tracks to ${outputPath} (${retrieved} retrieved, ${failed} failed).`
  );
  for (const track of resultSet.tracks) {
    if (track.status === "failed") {
      lines.push(`  FAILED ${track.track_id}: ${track.error}`);
    }
  }
  return lines.join("\n");
}
