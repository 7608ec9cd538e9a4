/**
 * Stats Module
 * Displays a run summary on stderr (--verbose)
 */

import { chalkStderr as chalk } from "chalk";
import type { Issue, ProcessingStats } from "../types";
import type { Tracker } from "../utils";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * Format a stat row with icon, label and value
 */
function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

// ============================================================================
// Section Displays
// ============================================================================

function imagesSection(stats: ProcessingStats): string[] {
  const total =
    stats.downloadedImages + stats.reusedImages + stats.failedImages;
  if (total === 0) return [];

  const lines = [sectionHeader("Images")];
  lines.push(
    statRow(chalk.green("◉"), "Downloaded", stats.downloadedImages, chalk.green),
  );
  if (stats.reusedImages > 0) {
    lines.push(
      statRow(chalk.cyan("◉"), "Reused", stats.reusedImages, chalk.cyan),
    );
  }
  if (stats.failedImages > 0) {
    lines.push(
      statRow(chalk.red("◉"), "Failed", stats.failedImages, chalk.red),
    );
  }
  return lines;
}

function mathSection(stats: ProcessingStats): string[] {
  if (stats.convertedMath + stats.unresolvedMath === 0) return [];

  const lines = [sectionHeader("Math")];
  lines.push(
    statRow(chalk.green("◉"), "Converted", stats.convertedMath, chalk.green),
  );
  if (stats.unresolvedMath > 0) {
    lines.push(
      statRow(chalk.yellow("◉"), "No TeX source", stats.unresolvedMath, chalk.yellow),
    );
  }
  return lines;
}

function issuesSection(issues: Issue[]): string[] {
  if (issues.length === 0) return [];

  const lines = [sectionHeader(chalk.red("Issues"))];
  for (const issue of issues) {
    lines.push(`      ${chalk.dim("·")} ${issue.type} ${issue.reason}: ${issue.path}`);
  }
  return lines;
}

// ============================================================================
// Main Stats Display
// ============================================================================

export function formatStats(stats: ProcessingStats): string[] {
  const statusIcon =
    stats.issues.length > 0 ? chalk.yellow("◆") : chalk.green("✔");

  return [
    "",
    `  ${statusIcon} ${chalk.bold("Conversion Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
    ...imagesSection(stats),
    ...mathSection(stats),
    sectionHeader("Bibliography"),
    statRow(chalk.green("◉"), "Anchors", stats.restoredAnchors, chalk.green),
    ...issuesSection(stats.issues),
    "",
  ];
}

/**
 * Display processing statistics on stderr
 */
export function stats(tracker: Tracker): void {
  for (const line of formatStats(tracker.getStats())) {
    console.error(line);
  }
}
