import type { DateStyle } from "./types";
import { childElements, createChildElement, firstChild, isElement } from "./xml/xml";

export const DEFAULT_STYLES_PART = "xl/styles.xml";
export const DEFAULT_DATE_DISPLAY_FORMAT = "yyyy-mm-dd hh:mm";
/** Ids up to here belong to built-in formats. */
export const RESERVED_NUM_FMT_MAX = 163;

// Child order of <styleSheet> required by the schema.
const STYLE_SHEET_ORDER = [
  "numFmts",
  "fonts",
  "fills",
  "borders",
  "cellStyleXfs",
  "cellXfs",
  "cellStyles",
  "dxfs",
  "tableStyles",
  "colors",
  "extLst",
];

const DEFAULT_XF_ATTRIBUTES: [string, string][] = [
  ["fontId", "0"],
  ["fillId", "0"],
  ["borderId", "0"],
  ["xfId", "0"],
];

function ensureSection(root: Element, name: string): Element {
  const existing = firstChild(root, name);
  if (existing) return existing;
  const section = createChildElement(root, name);
  const later = STYLE_SHEET_ORDER.slice(STYLE_SHEET_ORDER.indexOf(name) + 1);
  const next = Array.from(root.childNodes).find(
    (n) => isElement(n) && later.includes(n.localName)
  );
  root.insertBefore(section, next ?? null);
  return section;
}

function updateCount(section: Element, childName: string): void {
  section.setAttribute("count", String(childElements(section, childName).length));
}

function isTrue(flag: string | null): boolean {
  return flag === "1" || flag === "true";
}

/** Id of the numFmt with `formatCode`, adding one above the built-in range if needed. */
export function ensureNumFmt(styles: Document, formatCode: string): number {
  const root = styles.documentElement;
  const numFmts = firstChild(root, "numFmts");
  const existing = numFmts ? childElements(numFmts, "numFmt") : [];
  const match = existing.find((f) => f.getAttribute("formatCode") === formatCode);
  if (match) return Number(match.getAttribute("numFmtId"));

  const ids = existing
    .map((f) => Number(f.getAttribute("numFmtId")))
    .filter((n) => Number.isFinite(n));
  const id = Math.max(RESERVED_NUM_FMT_MAX, ...ids) + 1;
  const section = numFmts ?? ensureSection(root, "numFmts");
  const numFmt = createChildElement(section, "numFmt");
  numFmt.setAttribute("numFmtId", String(id));
  numFmt.setAttribute("formatCode", formatCode);
  section.appendChild(numFmt);
  updateCount(section, "numFmt");
  return id;
}

/**
 * Index of a cellXfs record applying `numFmtId`. A new record copies the
 * attributes of the first one, so fonts, fills and borders stay the workbook
 * defaults.
 */
export function ensureCellXf(styles: Document, numFmtId: number): number {
  const cellXfs = ensureSection(styles.documentElement, "cellXfs");
  const xfs = childElements(cellXfs, "xf");
  const idx = xfs.findIndex(
    (xf) =>
      Number(xf.getAttribute("numFmtId")) === numFmtId &&
      isTrue(xf.getAttribute("applyNumberFormat"))
  );
  if (idx >= 0) return idx;

  const xf = createChildElement(cellXfs, "xf");
  const template = xfs[0];
  if (template) {
    for (const attr of Array.from(template.attributes))
      xf.setAttributeNS(attr.namespaceURI, attr.name, attr.value);
    xf.setAttribute("numFmtId", String(numFmtId));
  } else {
    xf.setAttribute("numFmtId", String(numFmtId));
    for (const [name, value] of DEFAULT_XF_ATTRIBUTES) xf.setAttribute(name, value);
  }
  xf.setAttribute("applyNumberFormat", "1");
  cellXfs.appendChild(xf);
  updateCount(cellXfs, "xf");
  return xfs.length;
}

/** Make sure the style table can render `formatCode`; mutates `styles`. */
export function ensureDateStyle(
  styles: Document,
  formatCode = DEFAULT_DATE_DISPLAY_FORMAT
): DateStyle {
  const numFmtId = ensureNumFmt(styles, formatCode);
  return { numFmtId, xfIndex: ensureCellXf(styles, numFmtId) };
}
