import ora, { type Ora } from "ora";

import { describeError } from "../../errors.js";
import { RunController } from "../../services/sync/index.js";
import { displayRunReport, printError } from "../utils/display.js";
import { createServices } from "../utils/services.js";

import type { RunReport } from "../../services/sync/index.js";
import type { SyncEvent, SyncMode } from "../../types/sync.js";
import type { Command } from "commander";

interface SyncCommandOptions {
  full?: boolean;
  agency?: string[];
  config?: string;
  json?: boolean;
}

export function describeEvent(event: SyncEvent): string {
  switch (event.type) {
    case "page":
      return `${event.agency}: page ${String(event.page)} (${String(event.count)} notices)`;
    case "stored":
      return `${event.agency}: stored ${event.documentNumber}`;
    case "recovered":
      return `${event.agency}: indexed existing ${event.documentNumber}`;
    case "skipped":
      return `${event.agency}: skipped ${event.documentNumber}`;
    case "failed":
      return `${event.agency}: failed ${event.documentNumber}`;
    case "stopped":
      return `${event.agency}: up to date at ${event.documentNumber}`;
  }
}

/**
 * Print the run report. JSON output stays clean: the spinner was never
 * started, so it prints no closing line either.
 */
export function printRunOutcome(
  report: RunReport,
  json: boolean,
  spinner: Pick<Ora, "succeed" | "fail">
): void {
  if (json) {
    console.log(JSON.stringify(report, null, 2));
    return;
  }

  if (report.exitCode === 0) {
    spinner.succeed(
      `Sync finished: ${String(report.totals.processed)} new documents`
    );
  } else {
    spinner.fail("Sync finished with errors");
  }
  displayRunReport(report);
}

// ============================================================================
// Sync Command
// ============================================================================

export function registerSyncCommand(program: Command): void {
  program
    .command("sync")
    .description("Archive new notices for every configured agency")
    .option(
      "--full",
      "Visit every notice instead of stopping at the first archived one"
    )
    .option("-a, --agency <ids...>", "Only sync these configured agencies")
    .option("-c, --config <path>", "Configuration file (default: config.yaml)")
    .option("-j, --json", "Print the run report as JSON")
    .addHelpText(
      "after",
      `
MODES:
  incremental (default)  Stops each agency at the first notice already in
                         the abstract index.
  --full                 Walks each agency's whole history; notices already
                         indexed are skipped, not downloaded again.

EXIT STATUS:
  0  every agency completed (individual document failures are reported)
  1  an agency failed outright, or the index could not be loaded or saved
`
    )
    .action(async (options: SyncCommandOptions) => {
      const mode: SyncMode = options.full === true ? "full" : "incremental";
      const spinner = ora(`Starting ${mode} sync...`);

      try {
        const { config, source, store } = createServices(options.config);
        if (options.json !== true) {
          spinner.start();
        }

        await store.ensureBucket();

        const controller = new RunController(config, source, store);
        let current = "";

        const report = await controller.run({
          mode,
          agencies: options.agency,
          onAgencyStart: (agency, position, total) => {
            current = `[${String(position)}/${String(total)}]`;
            spinner.text = `${current} ${agency}`;
          },
          onEvent: (event) => {
            spinner.text = `${current} ${describeEvent(event)}`;
          },
        });

        printRunOutcome(report, options.json === true, spinner);

        process.exitCode = report.exitCode;
      } catch (error) {
        if (spinner.isSpinning) {
          spinner.fail(`Failed: ${describeError(error)}`);
        }
        printError(describeError(error));
        process.exitCode = 1;
      }
    });
}
