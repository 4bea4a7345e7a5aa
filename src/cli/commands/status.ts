/**
 * Status command - Show what the abstract index holds per agency
 */

import { describeError } from "../../errors.js";
import { AbstractIndex, indexKey } from "../../services/sync/index.js";
import {
  displayIndexStatus,
  printError,
  type IndexStatusRow,
} from "../utils/display.js";
import { createServices } from "../utils/services.js";

import type { Command } from "commander";

export function indexStatusRows(
  index: AbstractIndex,
  agencies: readonly string[]
): IndexStatusRow[] {
  const ordered = [
    ...agencies,
    ...index.agencies().filter((agency) => !agencies.includes(agency)),
  ];

  return ordered.map((agency) => {
    const newest = index.watermark(agency);
    return {
      agency,
      entries: index.size(agency),
      newestDocument: newest?.documentNumber ?? null,
      newestDate: newest?.publicationDate ?? null,
    };
  });
}

export function registerStatusCommand(program: Command): void {
  program
    .command("status")
    .description("Show archived notice counts and watermarks per agency")
    .option("-c, --config <path>", "Configuration file (default: config.yaml)")
    .option("-j, --json", "Output as JSON")
    .action(async (options: { config?: string; json?: boolean }) => {
      try {
        const { config, store } = createServices(options.config);
        const key = indexKey(config.parentFolder);
        const index = await AbstractIndex.load(store, key, config.agencies);
        const rows = indexStatusRows(index, config.agencies);

        if (options.json === true) {
          console.log(JSON.stringify(rows, null, 2));
        } else {
          console.log(`\nAbstract index: ${config.bucket}/${key}\n`);
          displayIndexStatus(rows);
        }
      } catch (error) {
        printError(describeError(error));
        process.exitCode = 1;
      }
    });
}
