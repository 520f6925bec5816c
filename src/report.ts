import { formatBytes, formatDuration, formatRatio } from "./utils.js";
import type { BatchSummary, ReconciliationResult } from "./types.js";

export function summarize(results: ReconciliationResult[], elapsedMs: number, aborted = false): BatchSummary {
  let succeeded = 0;
  let totalOriginalBytes = 0;
  let totalNewBytes = 0;

  for (const result of results) {
    if (!result.ok) continue;
    succeeded++;
    totalOriginalBytes += result.originalSizeBytes;
    totalNewBytes += result.newSizeBytes;
  }

  return {
    results,
    succeeded,
    failed: results.length - succeeded,
    totalOriginalBytes,
    totalNewBytes,
    ratio: totalOriginalBytes > 0 ? totalNewBytes / totalOriginalBytes : 1,
    elapsedMs,
    aborted,
  };
}

const SIZE_WIDTH = 10;
const RATIO_WIDTH = 7;
const KEPT_WIDTH = 8;

function row(index: string, original: string, next: string, ratio: string, kept: string, file: string): string {
  return [
    index.padStart(3),
    original.padStart(SIZE_WIDTH),
    next.padStart(SIZE_WIDTH),
    ratio.padStart(RATIO_WIDTH),
    kept.padEnd(KEPT_WIDTH),
    file,
  ].join("  ");
}

/** One row per task in task order; a failed task gets its error on the following line. */
export function renderTable(results: readonly ReconciliationResult[]): string[] {
  const lines = [row("#", "Original", "New", "Ratio", "Kept", "File")];

  for (const result of [...results].sort((a, b) => a.taskId - b.taskId)) {
    const index = String(result.taskId + 1);
    if (result.ok) {
      lines.push(
        row(
          index,
          formatBytes(result.originalSizeBytes),
          formatBytes(result.newSizeBytes),
          formatRatio(result.ratio),
          result.kept,
          result.finalPath,
        ),
      );
    } else {
      lines.push(row(index, formatBytes(result.originalSizeBytes), "-", "-", "failed", result.finalPath));
      lines.push(`     ${result.errorMessage}`);
    }
  }

  return lines;
}

export function renderSummary(summary: BatchSummary): string[] {
  return [
    `  Succeeded:   ${summary.succeeded}`,
    `  Failed:      ${summary.failed}`,
    `  Original:    ${formatBytes(summary.totalOriginalBytes)}`,
    `  New:         ${formatBytes(summary.totalNewBytes)}`,
    `  Ratio:       ${formatRatio(summary.ratio)}`,
    `  Total time:  ${formatDuration(summary.elapsedMs)}`,
  ];
}
