#!/usr/bin/env tsx
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { ZodError } from "zod";
import { type CliOptions, parseCliOptions } from "./lib/config";
import { createLogger, LOG_LEVELS } from "./lib/logger";
import { parseDate, updateWorkbookDates, WorkbookPatchError } from "./lib/workbook";

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

const defaultIO: CliIO = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
};

function buildParser(argv: string[]) {
  return yargs(argv)
    .scriptName("patch-workbook-dates")
    .usage(
      "$0 <workbook> --start-date <date> --end-date <date>\n\n" +
        "Update one row of an Excel sheet by matching column headers and " +
        "writing new Target Start/End Date values."
    )
    .demandCommand(
      1,
      1,
      "Provide the path of the .xlsx workbook to edit",
      "Only one workbook may be given"
    )
    .option("sheet", { type: "string", describe: "Worksheet name to update (default: Sheet1)" })
    .option("row", {
      type: "number",
      describe: "1-based row number to update (default: 2, the first data row)",
    })
    .option("start-date", {
      type: "string",
      demandOption: true,
      describe: "New Target Start Date value (parsed with --date-format)",
    })
    .option("end-date", {
      type: "string",
      demandOption: true,
      describe: "New Target End Date value (parsed with --date-format)",
    })
    .option("date-format", {
      type: "string",
      describe: "strptime-style format for parsing the inputs (default: %Y-%m-%d)",
    })
    .option("output", {
      type: "string",
      describe: "Optional path for the updated workbook. Default: edit in place",
    })
    .option("backup", {
      type: "boolean",
      default: true,
      describe: "Create <workbook>.bak when editing in place (--no-backup to skip)",
    })
    .option("style", {
      type: "boolean",
      default: true,
      describe: "Apply the date display format to both cells (--no-style to skip)",
    })
    .option("start-header", { type: "string", describe: "Header of the start date column" })
    .option("end-header", { type: "string", describe: "Header of the end date column" })
    .option("display-format", {
      type: "string",
      describe: "Number format written for the dates (default: yyyy-mm-dd hh:mm)",
    })
    .option("log-level", {
      choices: LOG_LEVELS,
      describe: "Diagnostic log level on stderr (default: $LOG_LEVEL or warn)",
    })
    .strict()
    .help()
    .version(false)
    .exitProcess(false);
}

/** Run the patcher; resolves to the process exit code. */
export async function main(argv = process.argv, io: CliIO = defaultIO): Promise<number> {
  const failure: { message?: string } = {};
  const parser = buildParser(hideBin(argv)).fail((msg, err) => {
    failure.message = msg || err?.message || "invalid arguments";
  });
  const args = await parser.parse();
  if (failure.message !== undefined) {
    io.stderr(`error: ${failure.message}`);
    return 2;
  }
  if ("help" in args && args.help) return 0;

  let opts: CliOptions;
  try {
    opts = parseCliOptions({
      workbook: args._[0] === undefined ? undefined : String(args._[0]),
      sheet: args.sheet,
      row: args.row,
      startDate: args.startDate,
      endDate: args.endDate,
      dateFormat: args.dateFormat,
      output: args.output,
      backup: args.backup,
      style: args.style,
      startHeader: args.startHeader,
      endHeader: args.endHeader,
      displayFormat: args.displayFormat,
      logLevel: args.logLevel,
    });
  } catch (err) {
    if (!(err instanceof ZodError)) throw err;
    for (const issue of err.issues) io.stderr(`error: ${issue.path.join(".")}: ${issue.message}`);
    return 2;
  }

  const logger = createLogger(opts.logLevel);
  try {
    const result = await updateWorkbookDates({
      workbookPath: opts.workbook,
      sheetName: opts.sheet,
      row: opts.row,
      startDate: parseDate(opts.startDate, opts.dateFormat),
      endDate: parseDate(opts.endDate, opts.dateFormat),
      output: opts.output,
      backup: opts.backup,
      applyDateStyle: opts.style,
      dateDisplayFormat: opts.displayFormat,
      startHeader: opts.startHeader,
      endHeader: opts.endHeader,
      logger,
    });
    if (result.backupPath) io.stdout(`Backup saved to ${result.backupPath}`);
    io.stdout(`Updated '${result.sheetName}' row ${result.row} in ${result.destination}`);
    return 0;
  } catch (err) {
    if (!(err instanceof WorkbookPatchError)) throw err;
    logger.debug({ err }, "patch failed");
    io.stderr(`error: ${err.message}`);
    return 1;
  }
}

// Only run if invoked as a binary, not imported by tests.
const isInvokedAsBin = (() => {
  try {
    return realpathSync(process.argv[1]) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
})();

if (isInvokedAsBin) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    }
  );
}
