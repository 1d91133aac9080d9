export { WorkbookArchive } from "./archive/archive";
export { rewriteArchive, type RewriteOptions } from "./archive/rewrite";
export { cellRef, columnIndex, columnLetter, columnName, rowColumnIndexes } from "./cellRef";
export { DEFAULT_INPUT_DATE_FORMAT, parseDate, toExcelSerial } from "./date";
export * from "./errors";
export {
  buildHeaderMap,
  cellColumns,
  DEFAULT_END_HEADER,
  DEFAULT_START_HEADER,
  HEADER_ROW_INDEX,
  readCellText,
  resolveTargetColumns,
} from "./headers";
export { loadSharedStrings } from "./sharedStrings";
export { findOrCreateCell, findOrCreateRow, writeSerialValue } from "./sheetEdit";
export { listSheetNames, resolveSheetPath } from "./sheetPath";
export { DEFAULT_DATE_DISPLAY_FORMAT, ensureDateStyle } from "./styles";
export type * from "./types";
export {
  DEFAULT_SHEET_NAME,
  DEFAULT_TARGET_ROW,
  updateWorkbookDates,
} from "./updateDates";
