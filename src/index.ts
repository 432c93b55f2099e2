#!/usr/bin/env node

import { Command } from "commander";
import { loadConfig, ConfigError } from "./lib/config.js";
import { SelectionFileError } from "./lib/selection.js";
import { RECOGNIZED_FLAGS } from "./types/selection.js";
import { CLI_NAME } from "./lib/branding.js";
import type { BuildCommandOptions } from "./commands/build.js";

const program = new Command();

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function globalConfigPath(): string | undefined {
  return program.opts<{ config?: string }>().config;
}

function reportFatal(context: string, error: unknown): never {
  if (error instanceof ConfigError) {
    console.error(`Configuration error: ${error.message}`);
  } else if (error instanceof SelectionFileError) {
    console.error(`Selection error: ${error.message}`);
  } else {
    console.error(`${context}: ${error instanceof Error ? error.message : String(error)}`);
  }
  process.exit(1);
}

program
  .name(CLI_NAME)
  .description("Assemble and run PyInstaller commands for Python scripts")
  .version("1.0.0")
  .option("-c, --config <path>", "Path to configuration file");

program
  .command("scan")
  .description("List the modules a Python script imports")
  .argument("<script>", "Python script to scan")
  .option("--json", "Output in JSON format")
  .action(async (script: string, options: { json?: boolean }) => {
    try {
      const config = await loadConfig(globalConfigPath());
      const { scanCommand } = await import("./commands/scan.js");
      await scanCommand(script, options, config);
    } catch (error) {
      reportFatal("Scan failed", error);
    }
  });

const build = program
  .command("build")
  .description("Build an executable from a Python script")
  .argument("[script]", "Python script to package (may come from --selection)");

for (const flag of RECOGNIZED_FLAGS) {
  build.option(flag.token, flag.description);
}

build
  .option("--name <name>", "Name of the executable")
  .option("--icon <path>", "Icon image (png/jpg/bmp/ico); converted to .ico when needed")
  .option("--add-data <spec>", "Data to bundle, passed through verbatim (e.g. 'data.txt;data')")
  .option("--distpath <dir>", "Output directory (default: the script's directory)")
  .option("--hidden-import <module>", "Module to declare as hidden import (repeatable)", collect, [])
  .option("--all-detected", "Declare every detected import as hidden import")
  .option("--selection <file>", "Load options from a selection JSON file")
  .option("--save-selection <file>", "Write the effective options to a selection JSON file")
  .option("--dry-run", "Print the command without running it")
  .option("--json", "Output in JSON format")
  .action(async (script: string | undefined, options: BuildCommandOptions) => {
    try {
      const config = await loadConfig(globalConfigPath());
      const { buildCommandAction } = await import("./commands/build.js");
      process.exitCode = await buildCommandAction(script, options, config);
    } catch (error) {
      reportFatal("Build failed", error);
    }
  });

program
  .command("init")
  .description(`Write a default configuration file in the current directory`)
  .option("-f, --force", "Overwrite an existing file")
  .action(async (options: { force?: boolean }) => {
    try {
      const { initCommand } = await import("./commands/init.js");
      await initCommand({ force: options.force });
    } catch (error) {
      reportFatal("Failed to write configuration", error);
    }
  });

program
  .command("doctor")
  .description("Diagnose configuration and packaging tool availability")
  .action(async () => {
    try {
      const { doctorCommand } = await import("./commands/doctor.js");
      const ok = await doctorCommand(globalConfigPath());
      if (!ok) process.exitCode = 1;
    } catch (error) {
      reportFatal("Doctor failed", error);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  reportFatal("Fatal error", error);
});
