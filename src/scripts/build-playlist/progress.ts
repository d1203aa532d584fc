import type { AppConfig, RunSummary } from "../../core/types.js";
import type { PipelineEvent } from "../../orchestrator/playlist-pipeline.js";

type Print = (line: string) => void;

const defaultPrint: Print = (line) => console.log(line);

export function printBanner(
  config: AppConfig,
  dryRun: boolean,
  print: Print = defaultPrint,
): void {
  print("Jazz Standards Playlist Builder");
  print("===============================");
  print(`  Source:      ${config.source.baseUrl}${config.source.indexPath}`);
  print(`  Top works:   ${config.source.topN}`);
  print(`  Recordings:  ${config.source.maxRecordings} per work`);
  print(`  Playlist:    ${config.playlist.name}`);
  print(`  Interactive: ${config.resolver.interactive}`);
  print(`  Dry run:     ${dryRun}`);
  print("");
}

/** Console lines for one pipeline event. */
export function formatEvent(event: PipelineEvent): string[] {
  if (event.type === "work") {
    return [
      "",
      `[${event.index + 1}/${event.total}] ${event.work.title}`,
      `  Found ${event.citations} recommended recordings`,
    ];
  }

  const { citation } = event;
  switch (event.outcome) {
    case "added":
      return [`  + ${citation.displayText}`];
    case "duplicate":
      return [`  = ${citation.displayText} (already in playlist)`];
    case "unmatched":
      return [`  - ${citation.displayText} (no match)`];
  }
}

export function printEvent(event: PipelineEvent, print: Print = defaultPrint): void {
  for (const line of formatEvent(event)) print(line);
}

export function printSummary(summary: RunSummary, print: Print = defaultPrint): void {
  const title =
    summary.status === "aborted" ? "=== Run Aborted ===" : "=== Run Complete ===";

  print("");
  print(title);
  print(`  Works processed:   ${summary.worksProcessed}/${summary.worksTotal}`);
  print(`  Recordings cited:  ${summary.citations}`);
  print(`  Auto-accepted:     ${summary.acceptedAutomatically}`);
  print(`  Accepted by you:   ${summary.acceptedByUser}`);
  print(`  Unmatched:         ${summary.unmatched}`);
  print(`  Duplicates:        ${summary.duplicates}`);
  print(`  Tracks added:      ${summary.tracksAppended}`);
  if (summary.tracksLost > 0) {
    print(`  Tracks lost:       ${summary.tracksLost}`);
  }
  print(`  Duration:          ${formatDuration(summary.durationMs / 1000)}`);
  if (summary.playlistUrl) {
    print(`  Playlist URL:      ${summary.playlistUrl}`);
  }
}

export function formatDuration(seconds: number): string {
  if (seconds < 60) return `${Math.round(seconds)}s`;
  const m = Math.floor(seconds / 60);
  const s = Math.round(seconds % 60);
  if (m < 60) return `${m}m ${s}s`;
  const h = Math.floor(m / 60);
  const rm = m % 60;
  return `${h}h ${rm}m`;
}
