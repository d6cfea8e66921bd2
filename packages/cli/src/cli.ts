#!/usr/bin/env node
/**
 * Vitals CLI
 */

import { program, type Command } from "commander";
import { createInterface } from "readline";
import type {
  AddOptions,
  CommandContext,
  EditOptions,
  Prompt,
  RemoveOptions,
  SelectionOptions,
} from "./commands.js";
import { addCommand, editCommand, removeCommand, showCommand, summaryCommand } from "./commands.js";
import type { GlobalOptions } from "./settings.js";
import { loadEnvironment, resolveSettings } from "./settings.js";
import { loadVitalsFile, saveVitalsFile } from "./storage.js";

/**
 * Prompt user for yes/no
 */
function confirm(question: string): Promise<boolean> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(`${question} (y/n) `, (answer) => {
      rl.close();
      resolve(answer.toLowerCase().startsWith("y"));
    });
  });
}

/**
 * Prompt user to select from list. Anything but a listed number backs out.
 */
function pick(items: string[], prompt: string): Promise<number | null> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  console.log(prompt);
  items.forEach((item, i) => console.log(`  ${i + 1}. ${item}`));

  return new Promise((resolve) => {
    rl.question("Enter number (blank to cancel): ", (answer) => {
      rl.close();
      const num = parseInt(answer, 10);
      resolve(num >= 1 && num <= items.length ? num - 1 : null);
    });
  });
}

const terminalPrompt: Prompt = { confirm, pick };

/**
 * Build the command context from the global options
 */
function createContext(): CommandContext {
  const settings = resolveSettings(program.opts<GlobalOptions>());
  const { file, config } = settings;

  return {
    config,
    file: {
      path: file,
      load: () => {
        const loaded = loadVitalsFile(file, config, !settings.dryRun);
        if (loaded.status === "ok") console.log(loaded.message);
        return loaded;
      },
      save: (store) => saveVitalsFile(file, store),
    },
    prompt: terminalPrompt,
    logger: console,
    dryRun: settings.dryRun,
    now: () => Date.now(),
  };
}

/**
 * Run a command and exit with its code
 */
async function run(task: () => number | Promise<number>): Promise<void> {
  try {
    process.exit(await task());
  } catch (error) {
    console.error("Error:", error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

function withSelectionOptions(command: Command) {
  return command
    .option("--latest", "Start from the most recent record")
    .option("--date <date>", "Start from a record on this date (YYYY-MM-DD or DD/MM/YYYY)")
    .option("--day", "Every record of that day")
    .option("--month", "Every record of that month")
    .option("--before <n>", "N records ending at that record")
    .option("--columns <preset>", "all, glucose, blood_pressure, pulse or blood_pressure_pulse");
}

function withMeasurementOptions(command: Command) {
  return command
    .option("--sys <mmHg>", "Systolic blood pressure")
    .option("--dia <mmHg>", "Diastolic blood pressure")
    .option("--pulse <bpm>", "Pulse rate")
    .option("--glucose <mmol>", "Blood glucose level");
}

loadEnvironment();

program
  .name("vitals")
  .description("View and edit a log of blood pressure, pulse and blood glucose readings")
  .version("0.1.0")
  .option("--file <path>", "Vitals CSV file (default: $VITALS_FILE or myVitals.csv)")
  .option("--timezone <zone>", "IANA timezone for dates (default: $VITALS_TIMEZONE or UTC)")
  .option("--dry-run", "Show what would change without saving");

withSelectionOptions(program.command("show").description("Show records"))
  .action((options: SelectionOptions) => run(() => showCommand(createContext(), options)));

withSelectionOptions(program.command("summary").description("Summarise records"))
  .action((options: SelectionOptions) => run(() => summaryCommand(createContext(), options)));

withMeasurementOptions(program.command("add").description("Add a record"))
  .option("--at <datetime>", "Date and time of the reading (default: now)")
  .action((options: AddOptions) => run(() => addCommand(createContext(), options)));

// Use "none" as a value to clear a measurement
withMeasurementOptions(program.command("edit <date>").description("Edit a record of a date"))
  .option("--new-date <date>", "Move the record to another date, keeping its time")
  .option("--new-time <HH:MM>", "Move the record to another time, keeping its date")
  .action((date: string, options: EditOptions) =>
    run(() => editCommand(createContext(), date, options))
  );

program
  .command("remove <date>")
  .description("Remove a record of a date")
  .option("--yes", "Do not ask for confirmation")
  .action((date: string, options: RemoveOptions) =>
    run(() => removeCommand(createContext(), date, options))
  );

program.parseAsync().catch((error: unknown) => {
  console.error("Error:", error);
  process.exit(1);
});
