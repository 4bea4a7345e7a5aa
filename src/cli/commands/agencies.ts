/**
 * Agencies command - List register agencies to pick configuration names from
 */

import { describeError } from "../../errors.js";
import { RegisterClient, agencyDisplayName } from "../../scraper/client.js";
import { displayAgenciesTable, printError } from "../utils/display.js";

import type { RegisterAgency } from "../../types/index.js";
import type { Command } from "commander";

export function filterAgencies(
  agencies: RegisterAgency[],
  search?: string
): RegisterAgency[] {
  const sorted = [...agencies].sort((a, b) =>
    agencyDisplayName(a).localeCompare(agencyDisplayName(b))
  );
  if (search === undefined || search.trim() === "") {
    return sorted;
  }

  const needle = search.trim().toLowerCase();
  return sorted.filter(
    (agency) =>
      agency.name.toLowerCase().includes(needle) ||
      (agency.short_name?.toLowerCase().includes(needle) ?? false) ||
      agency.slug.includes(needle)
  );
}

export function registerAgenciesCommand(program: Command): void {
  program
    .command("agencies")
    .description("List agencies known to the register")
    .option("-s, --search <text>", "Filter by name, short name or slug")
    .option("-j, --json", "Output as JSON")
    .action(async (options: { search?: string; json?: boolean }) => {
      try {
        const client = new RegisterClient();
        const agencies = filterAgencies(
          await client.fetchAgencies(),
          options.search
        );

        if (options.json === true) {
          console.log(JSON.stringify(agencies, null, 2));
        } else {
          displayAgenciesTable(agencies);
        }
      } catch (error) {
        printError(describeError(error));
        process.exitCode = 1;
      }
    });
}
