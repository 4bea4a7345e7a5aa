#!/usr/bin/env node

/**
 * Register Notice Archiver CLI
 *
 * Batch job that archives Federal Register notice PDFs into an S3-compatible
 * bucket and keeps an abstract index next to them.
 */

import { Command } from "commander";

import { registerAgenciesCommand } from "./commands/agencies.js";
import { registerStatusCommand } from "./commands/status.js";
import { registerSyncCommand } from "./commands/sync.js";

const program = new Command();

program
  .name("notice-archiver")
  .description("Federal Register notice archiver")
  .version("0.1.0");

// Register all commands
registerSyncCommand(program);
registerStatusCommand(program);
registerAgenciesCommand(program);

program.action(() => {
  // Show help by default
  program.outputHelp();
});

await program.parseAsync();
