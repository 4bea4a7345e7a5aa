/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { AgencyOutcome, RunReport } from "../../services/sync/run.js";
import type { RegisterAgency } from "../../types/index.js";

const MAX_LISTED_FAILURES = 20;

export interface IndexStatusRow {
  agency: string;
  entries: number;
  newestDocument: string | null;
  newestDate: string | null;
}

/**
 * Format milliseconds as "850ms", "12.3s" or "4m 05s"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${String(Math.round(ms))}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.floor((ms % 60_000) / 1000);
  return `${String(minutes)}m ${String(seconds).padStart(2, "0")}s`;
}

/**
 * Plain table cells for one row per agency:
 * agency, status, processed, recovered, skipped, failed, pages, time
 */
export function agencyRowCells(outcome: AgencyOutcome): string[] {
  if (outcome.status === "failed") {
    return [outcome.agency, "FAILED", "-", "-", "-", "-", "-", "-"];
  }

  const { summary } = outcome;
  return [
    outcome.agency,
    summary.stoppedEarly ? "UP TO DATE" : "COMPLETE",
    String(summary.processed),
    String(summary.recovered),
    String(summary.skipped),
    String(summary.failed),
    String(summary.pages),
    formatDuration(summary.elapsedMs),
  ];
}

/**
 * Failure lines: failed agencies first, then failed notices, capped.
 */
export function failureLines(report: RunReport): string[] {
  const lines: string[] = [];

  for (const outcome of report.agencies) {
    if (outcome.status === "failed") {
      lines.push(`${outcome.agency}: ${outcome.error}`);
    }
  }
  for (const outcome of report.agencies) {
    if (outcome.status === "completed") {
      for (const failure of outcome.summary.failures) {
        lines.push(
          `${outcome.agency} ${failure.documentNumber}: ${failure.reason}`
        );
      }
    }
  }

  if (lines.length > MAX_LISTED_FAILURES) {
    const hidden = lines.length - MAX_LISTED_FAILURES;
    return [
      ...lines.slice(0, MAX_LISTED_FAILURES),
      `... and ${String(hidden)} more`,
    ];
  }
  return lines;
}

/**
 * Display the run summary table and failures
 */
export function displayRunReport(report: RunReport): void {
  console.log("\n" + "═".repeat(80));
  console.log(
    chalk.bold(
      `SYNC SUMMARY (${report.mode}, ${formatDuration(report.durationMs)})`
    )
  );
  console.log("═".repeat(80));

  if (report.agencies.length > 0) {
    const table = new CliTable3({
      head: [
        "Agency",
        "Status",
        "New",
        "Recovered",
        "Skipped",
        "Failed",
        "Pages",
        "Time",
      ].map((h) => chalk.cyan(h)),
    });

    for (const outcome of report.agencies) {
      const cells = agencyRowCells(outcome);
      if (outcome.status === "failed") {
        table.push(cells.map((cell) => chalk.red(cell)));
      } else {
        table.push(cells);
      }
    }
    console.log(table.toString());
  }

  const { totals } = report;
  console.log(
    `\n${chalk.green("✓")} New: ${String(totals.processed)}   Recovered: ${String(totals.recovered)}   Skipped: ${String(totals.skipped)}   ${totals.failed > 0 ? chalk.red(`✗ Failed: ${String(totals.failed)}`) : "Failed: 0"}`
  );

  const failures = failureLines(report);
  if (failures.length > 0) {
    console.log("\n" + "─".repeat(80));
    console.log("FAILURES:");
    console.log("─".repeat(80));
    for (const line of failures) {
      console.log(`  ${line}`);
    }
    console.log("─".repeat(80));
  }

  if (report.fatalError !== undefined) {
    printError(report.fatalError);
  } else if (!report.indexPersisted) {
    printWarning("Abstract index was not saved");
  }
}

/**
 * Display per-agency index counts and watermarks
 */
export function displayIndexStatus(rows: IndexStatusRow[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Agency"),
      chalk.cyan("Entries"),
      chalk.cyan("Newest document"),
      chalk.cyan("Published"),
    ],
  });

  for (const row of rows) {
    table.push([
      row.agency,
      String(row.entries),
      row.newestDocument ?? chalk.gray("none"),
      row.newestDate ?? chalk.gray("-"),
    ]);
  }

  console.log(table.toString());
}

/**
 * Display register agencies in a formatted table
 */
export function displayAgenciesTable(agencies: RegisterAgency[]): void {
  const table = new CliTable3({
    head: [chalk.cyan("Short name"), chalk.cyan("Name"), chalk.cyan("Slug")],
    colWidths: [14, 60, 40],
    wordWrap: true,
  });

  for (const agency of agencies) {
    table.push([
      agency.short_name !== null ? chalk.green(agency.short_name) : "",
      agency.name,
      agency.slug,
    ]);
  }

  console.log(table.toString());
  console.log(chalk.gray(`\n${String(agencies.length)} agencies\n`));
}

/**
 * Print error message
 */
export function printError(message: string): void {
  console.error(chalk.red("Error:"), message);
}

/**
 * Print warning message
 */
export function printWarning(message: string): void {
  console.log(chalk.yellow("Warning:"), message);
}
