import { z } from "zod";
import { DEFAULT_INPUT_DATE_FORMAT } from "./workbook/date";
import { DEFAULT_END_HEADER, DEFAULT_START_HEADER } from "./workbook/headers";
import { DEFAULT_DATE_DISPLAY_FORMAT } from "./workbook/styles";
import { DEFAULT_SHEET_NAME, DEFAULT_TARGET_ROW } from "./workbook/updateDates";
import { LOG_LEVELS } from "./logger";

const nonEmpty = (what: string) => z.string().trim().min(1, `${what} must not be empty`);

/** Command-line options after parsing, with defaults applied. */
export const CliOptionsSchema = z.object({
  workbook: nonEmpty("workbook path"),
  sheet: nonEmpty("sheet name").default(DEFAULT_SHEET_NAME),
  row: z.coerce
    .number()
    .int("row must be an integer")
    .positive("row must be 1 or greater")
    .default(DEFAULT_TARGET_ROW),
  startDate: nonEmpty("start date"),
  endDate: nonEmpty("end date"),
  dateFormat: z.string().min(1).default(DEFAULT_INPUT_DATE_FORMAT),
  output: z.string().trim().min(1).optional(),
  backup: z.boolean().default(true),
  style: z.boolean().default(true),
  startHeader: nonEmpty("start header").default(DEFAULT_START_HEADER),
  endHeader: nonEmpty("end header").default(DEFAULT_END_HEADER),
  displayFormat: z.string().min(1).default(DEFAULT_DATE_DISPLAY_FORMAT),
  logLevel: z.enum(LOG_LEVELS).default("warn"),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

/** Validate raw option values; `LOG_LEVEL` fills in an absent log level. */
export function parseCliOptions(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env
): CliOptions {
  return CliOptionsSchema.parse({
    ...raw,
    logLevel: raw.logLevel ?? (env.LOG_LEVEL || undefined),
  });
}
