#!/usr/bin/env node

/**
 * CLI entry point for the ar5iv to Markdown converter
 * Handles command-line argument parsing
 */

import { Command } from "commander";
import { convertCommand } from "./commands/convert";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("ar5iv2md")
  .description(
    "Convert an ar5iv paper into Markdown with local images and TeX math",
  )
  .version("0.1.0");

// Main conversion command (default action)
program
  .argument("[source]", "arXiv identifier or ar5iv URL")
  .option("-d, --download-dir <path>", "Directory the paper folder is created in")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "Verbose output")
  .action(async (source: string | undefined, options: unknown) => {
    if (!source) {
      return program.help({ error: true });
    }
    await convertCommand(source, options);
  });

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
