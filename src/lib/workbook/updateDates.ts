import { resolve } from "node:path";
import pino from "pino";
import { WorkbookArchive } from "./archive/archive";
import { rewriteArchive } from "./archive/rewrite";
import { cellRef } from "./cellRef";
import { toExcelSerial } from "./date";
import {
  buildHeaderMap,
  DEFAULT_END_HEADER,
  DEFAULT_START_HEADER,
  resolveTargetColumns,
} from "./headers";
import { findRelatedPart, resolveWorkbookPath } from "./packageParts";
import { DEFAULT_SHARED_STRINGS_PART, loadSharedStrings } from "./sharedStrings";
import { findOrCreateCell, findOrCreateRow, writeSerialValue } from "./sheetEdit";
import { resolveSheetPath } from "./sheetPath";
import { DEFAULT_DATE_DISPLAY_FORMAT, DEFAULT_STYLES_PART, ensureDateStyle } from "./styles";
import type {
  DateStyle,
  UpdateWorkbookDatesOptions,
  UpdateWorkbookDatesResult,
} from "./types";
import { parseXml, serializeXml } from "./xml/xml";

export const DEFAULT_SHEET_NAME = "Sheet1";
export const DEFAULT_TARGET_ROW = 2;

/**
 * Write the start and end dates into one row of a worksheet, matching the
 * target columns by their row-1 headers.
 *
 * Only the worksheet member and, when styling, the style table are
 * re-serialized; every other member is carried over unchanged. Nothing on
 * disk changes unless every step succeeds.
 */
export async function updateWorkbookDates(
  opts: UpdateWorkbookDatesOptions
): Promise<UpdateWorkbookDatesResult> {
  const {
    startDate,
    endDate,
    sheetName = DEFAULT_SHEET_NAME,
    row = DEFAULT_TARGET_ROW,
    backup = true,
    applyDateStyle = true,
    dateDisplayFormat = DEFAULT_DATE_DISPLAY_FORMAT,
    startHeader = DEFAULT_START_HEADER,
    endHeader = DEFAULT_END_HEADER,
    logger = pino({ level: "silent" }),
  } = opts;
  if (!Number.isInteger(row) || row < 1)
    throw new RangeError(`Row must be a positive integer, got ${row}`);

  const workbookPath = resolve(opts.workbookPath);
  const destination = opts.output ? resolve(opts.output) : workbookPath;
  const backupPath = destination === workbookPath && backup ? `${workbookPath}.bak` : null;
  const startSerial = toExcelSerial(startDate);
  const endSerial = toExcelSerial(endDate);

  const archive = await WorkbookArchive.open(workbookPath);
  const workbookPart = await resolveWorkbookPath(archive);
  const sharedStringsPart = await findRelatedPart(
    archive,
    workbookPart,
    "/sharedStrings",
    DEFAULT_SHARED_STRINGS_PART
  );
  const sharedStrings = await loadSharedStrings(archive, sharedStringsPart);
  logger.debug({ workbookPart, sharedStrings: sharedStrings.length }, "workbook opened");

  const replacements = new Map<string, string>();
  let style: DateStyle | null = null;
  if (applyDateStyle) {
    const stylesPart = await findRelatedPart(
      archive,
      workbookPart,
      "/styles",
      DEFAULT_STYLES_PART
    );
    if (archive.has(stylesPart)) {
      const stylesDoc = parseXml(await archive.readText(stylesPart), stylesPart);
      style = ensureDateStyle(stylesDoc, dateDisplayFormat);
      replacements.set(stylesPart, serializeXml(stylesDoc));
      logger.debug({ stylesPart, ...style }, "date style ready");
    } else {
      logger.warn({ stylesPart }, "workbook has no style table; dates left unformatted");
    }
  }

  const sheetPath = await resolveSheetPath(archive, workbookPart, sheetName);
  const sheet = parseXml(await archive.readText(sheetPath), sheetPath);
  const headers = buildHeaderMap(sheet, sharedStrings);
  const columns = resolveTargetColumns(headers, startHeader, endHeader);
  logger.debug({ sheetPath, ...columns }, "target columns resolved");

  const rowEl = findOrCreateRow(sheet, row);
  const startCell = findOrCreateCell(rowEl, columns.start, row);
  const endCell = findOrCreateCell(rowEl, columns.end, row);
  writeSerialValue(startCell, startSerial, style?.xfIndex);
  writeSerialValue(endCell, endSerial, style?.xfIndex);
  replacements.set(sheetPath, serializeXml(sheet));

  await rewriteArchive(archive, replacements, { destination, backupPath, logger });

  return {
    sheetName,
    sheetPath,
    row,
    destination,
    backupPath,
    start: { ref: cellRef(columns.start, row), serial: startSerial },
    end: { ref: cellRef(columns.end, row), serial: endSerial },
    style,
  };
}
