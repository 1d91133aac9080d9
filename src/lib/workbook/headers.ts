import { columnName, rowColumnIndexes } from "./cellRef";
import { ArchiveError, MissingColumnError, MissingHeaderRowError } from "./errors";
import type { HeaderMap } from "./types";
import { childElements, descendants, firstChild } from "./xml/xml";

export const HEADER_ROW_INDEX = 1;
export const DEFAULT_START_HEADER = "Target Start Date";
export const DEFAULT_END_HEADER = "Target End Date";

/** Normalize header text for lookup: trim, lowercase. */
export function normHeader(h: string): string {
  return h.trim().toLowerCase();
}

/** Display text of a cell: inline string, shared string or literal value. */
export function readCellText(cell: Element, sharedStrings: readonly string[]): string {
  const type = cell.getAttribute("t");
  if (type === "inlineStr") {
    const is = firstChild(cell, "is");
    return is ? descendants(is, "t").map((t) => t.textContent ?? "").join("") : "";
  }
  const v = firstChild(cell, "v");
  if (!v) return "";
  const raw = v.textContent ?? "";
  if (type === "s") return sharedStrings[Number(raw)] ?? "";
  return raw;
}

export function findRow(sheetData: Element, rowNumber: number): Element | null {
  const wanted = String(rowNumber);
  return childElements(sheetData, "row").find((r) => r.getAttribute("r") === wanted) ?? null;
}

/** 1-based column of every cell in `row`; omitted references are inferred. */
export function cellColumns(row: Element): number[] {
  const refs = childElements(row, "c").map((c) => c.getAttribute("r") || null);
  try {
    return rowColumnIndexes(refs);
  } catch (err) {
    if (!(err instanceof RangeError)) throw err;
    throw new ArchiveError(`Row ${row.getAttribute("r") || "?"}: ${err.message}`, { cause: err });
  }
}

/** Map of lower-cased header text to column letter, read from row 1. */
export function buildHeaderMap(sheet: Document, sharedStrings: readonly string[]): HeaderMap {
  const sheetData = firstChild(sheet.documentElement, "sheetData");
  if (!sheetData) throw new MissingHeaderRowError("Worksheet is missing <sheetData>");
  const headerRow = findRow(sheetData, HEADER_ROW_INDEX);
  if (!headerRow) throw new MissingHeaderRowError();
  const map: HeaderMap = new Map();
  const columns = cellColumns(headerRow);
  for (const [i, cell] of childElements(headerRow, "c").entries()) {
    const header = normHeader(readCellText(cell, sharedStrings));
    if (!header) continue;
    map.set(header, columnName(columns[i]));
  }
  return map;
}

export interface TargetColumns {
  start: string;
  end: string;
}

export function resolveTargetColumns(
  headers: HeaderMap,
  startHeader = DEFAULT_START_HEADER,
  endHeader = DEFAULT_END_HEADER
): TargetColumns {
  const start = headers.get(normHeader(startHeader));
  const end = headers.get(normHeader(endHeader));
  if (!start || !end) {
    const missing = [
      ...(start ? [] : [startHeader]),
      ...(end ? [] : [endHeader]),
    ];
    throw new MissingColumnError(missing, [startHeader, endHeader]);
  }
  return { start, end };
}
