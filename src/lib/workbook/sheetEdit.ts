import { cellRef, columnIndex, columnName } from "./cellRef";
import { cellColumns, findRow } from "./headers";
import { childElements, createChildElement, firstChild } from "./xml/xml";

function sheetDataOf(sheet: Document): Element {
  const root = sheet.documentElement;
  const existing = firstChild(root, "sheetData");
  if (existing) return existing;
  const sheetData = createChildElement(root, "sheetData");
  root.appendChild(sheetData);
  return sheetData;
}

/**
 * Row element with index `rowNumber`. A missing row is appended after the
 * last row; existing rows are not reordered.
 */
export function findOrCreateRow(sheet: Document, rowNumber: number): Element {
  const sheetData = sheetDataOf(sheet);
  const existing = findRow(sheetData, rowNumber);
  if (existing) return existing;
  const row = createChildElement(sheetData, "row");
  row.setAttribute("r", String(rowNumber));
  sheetData.appendChild(row);
  return row;
}

/**
 * Cell `{column}{rowNumber}` in `row`; after an insert the row's cells are
 * sorted by column. Cells that omit `r` get an explicit reference first so
 * they keep their column when moved.
 */
export function findOrCreateCell(row: Element, column: string, rowNumber: number): Element {
  const target = columnIndex(column);
  const columns = cellColumns(row);
  const cells = childElements(row, "c");
  for (const [i, c] of cells.entries()) {
    if (!c.getAttribute("r")) c.setAttribute("r", cellRef(columnName(columns[i]), rowNumber));
  }
  const existing = cells.find((_, i) => columns[i] === target);
  if (existing) return existing;
  const cell = createChildElement(row, "c");
  cell.setAttribute("r", cellRef(column, rowNumber));
  // insertBefore moves nodes, so re-inserting in order sorts in place.
  const tail = firstChild(row, "extLst");
  const placed = [...cells.map((c, i) => ({ c, col: columns[i] })), { c: cell, col: target }];
  placed.sort((a, b) => a.col - b.col);
  for (const { c } of placed) row.insertBefore(c, tail);
  return cell;
}

/**
 * Turn `cell` into a plain numeric cell holding `serial`. With a style index
 * the cell's `s` points at it; without one any previous style is dropped.
 */
export function writeSerialValue(cell: Element, serial: number, styleIndex?: number | null): void {
  cell.removeAttribute("t");
  for (const stale of [...childElements(cell, "is"), ...childElements(cell, "f")])
    cell.removeChild(stale);
  let v = firstChild(cell, "v");
  if (!v) {
    v = createChildElement(cell, "v");
    cell.appendChild(v);
  }
  v.textContent = String(serial);
  if (styleIndex === undefined || styleIndex === null) cell.removeAttribute("s");
  else cell.setAttribute("s", String(styleIndex));
}
