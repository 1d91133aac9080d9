import type { Logger } from "pino";

/** Stored metadata of one container member, as listed by the archive reader. */
export interface ArchiveMember {
  name: string;
  dir: boolean;
  date: Date;
  comment: string;
  /** How the member's data is stored in the container. */
  compression: "STORE" | "DEFLATE";
}

/** Lower-cased header text -> column letter, taken from row 1. */
export type HeaderMap = Map<string, string>;

/** Result of ensuring the date display style exists in the style table. */
export interface DateStyle {
  numFmtId: number;
  /** Index into `cellXfs`; written as the cell's `s` attribute. */
  xfIndex: number;
}

export interface UpdateWorkbookDatesOptions {
  workbookPath: string;
  /**
   * Only the UTC calendar day is used: `new Date(2024, 0, 1)` built in a zone
   * east of UTC falls on 2023-12-31. Build dates with `Date.UTC` or `parseDate`.
   */
  startDate: Date;
  /** UTC calendar day, as for `startDate`. */
  endDate: Date;
  /** Defaults to "Sheet1". */
  sheetName?: string;
  /** 1-based row number. Defaults to 2, the first data row. */
  row?: number;
  /** Destination path. Defaults to editing `workbookPath` in place. */
  output?: string;
  /** Keep `<workbook>.bak` when editing in place. Defaults to true. */
  backup?: boolean;
  /** Write the date display style onto both cells. Defaults to true. */
  applyDateStyle?: boolean;
  dateDisplayFormat?: string;
  startHeader?: string;
  endHeader?: string;
  logger?: Logger;
}

export interface PatchedCell {
  ref: string;
  serial: number;
}

export interface UpdateWorkbookDatesResult {
  sheetName: string;
  sheetPath: string;
  row: number;
  destination: string;
  backupPath: string | null;
  start: PatchedCell;
  end: PatchedCell;
  style: DateStyle | null;
}
