import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import JSZip from "jszip";
import { afterEach } from "vitest";
import { parseXml, REL_NS, SPREADSHEET_NS } from "../xml/xml";

const DECL = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n';
const PKG_RELS = "http://schemas.openxmlformats.org/package/2006/relationships";
const DOC_REL = "http://schemas.openxmlformats.org/officeDocument/2006/relationships";

/** A few bytes that are not valid UTF-8, standing in for an embedded image. */
export const MEDIA_BYTES = Uint8Array.from([0x89, 0x50, 0x4e, 0x47, 0xff, 0xfe, 0x00, 0x01]);

export const DEFAULT_HEADERS = ["Target Start Date", "Target End Date", "Notes"];

export const MINIMAL_STYLES =
  DECL +
  `<styleSheet xmlns="${SPREADSHEET_NS}">` +
  '<fonts count="1"><font><sz val="11"/><name val="Calibri"/></font></fonts>' +
  '<fills count="1"><fill><patternFill patternType="none"/></fill></fills>' +
  '<borders count="1"><border><left/><right/><top/><bottom/><diagonal/></border></borders>' +
  '<cellStyleXfs count="1"><xf numFmtId="0" fontId="0" fillId="0" borderId="0"/></cellStyleXfs>' +
  '<cellXfs count="1"><xf numFmtId="0" fontId="0" fillId="0" borderId="0" xfId="0"/></cellXfs>' +
  '<cellStyles count="1"><cellStyle name="Normal" xfId="0" builtinId="0"/></cellStyles>' +
  "</styleSheet>";

export function worksheetXml(rows: string): string {
  return (
    DECL +
    `<worksheet xmlns="${SPREADSHEET_NS}" xmlns:r="${REL_NS}">` +
    '<dimension ref="A1:C1"/>' +
    `<sheetData>${rows}</sheetData>` +
    '<pageMargins left="0.7" right="0.7" top="0.75" bottom="0.75" header="0.3" footer="0.3"/>' +
    "</worksheet>"
  );
}

/** Header row whose cells reference the shared strings 0..n-1 in columns A... */
export function sharedHeaderRow(count: number): string {
  const cells = Array.from(
    { length: count },
    (_, i) => `<c r="${String.fromCharCode(65 + i)}1" t="s"><v>${i}</v></c>`
  ).join("");
  return `<row r="1">${cells}</row>`;
}

export function sharedStringsXml(strings: string[]): string {
  const items = strings.map((s) => `<si><t>${s}</t></si>`).join("");
  return (
    DECL +
    `<sst xmlns="${SPREADSHEET_NS}" count="${strings.length}" uniqueCount="${strings.length}">` +
    `${items}</sst>`
  );
}

export interface FixtureOptions {
  /** Worksheet XML for "Sheet1"; defaults to a header row over DEFAULT_HEADERS. */
  sheetXml?: string;
  sharedStrings?: string[] | null;
  stylesXml?: string | null;
}

export async function buildWorkbook(opts: FixtureOptions = {}): Promise<Buffer> {
  const sharedStrings = opts.sharedStrings === undefined ? DEFAULT_HEADERS : opts.sharedStrings;
  const stylesXml = opts.stylesXml === undefined ? MINIMAL_STYLES : opts.stylesXml;
  const sheetXml = opts.sheetXml ?? worksheetXml(sharedHeaderRow(DEFAULT_HEADERS.length));

  const zip = new JSZip();
  const overrides = [
    '<Override PartName="/xl/workbook.xml" ContentType="application/vnd.openxmlformats-officedocument.spreadsheetml.sheet.main+xml"/>',
    '<Override PartName="/xl/worksheets/sheet1.xml" ContentType="application/vnd.openxmlformats-officedocument.spreadsheetml.worksheet+xml"/>',
    '<Override PartName="/xl/worksheets/sheet2.xml" ContentType="application/vnd.openxmlformats-officedocument.spreadsheetml.worksheet+xml"/>',
  ];
  const workbookRels = [
    `<Relationship Id="rId1" Type="${DOC_REL}/worksheet" Target="worksheets/sheet1.xml"/>`,
    `<Relationship Id="rId2" Type="${DOC_REL}/worksheet" Target="worksheets/sheet2.xml"/>`,
  ];
  if (stylesXml !== null) {
    zip.file("xl/styles.xml", stylesXml);
    overrides.push(
      '<Override PartName="/xl/styles.xml" ContentType="application/vnd.openxmlformats-officedocument.spreadsheetml.styles+xml"/>'
    );
    workbookRels.push(`<Relationship Id="rId3" Type="${DOC_REL}/styles" Target="styles.xml"/>`);
  }
  if (sharedStrings !== null) {
    zip.file("xl/sharedStrings.xml", sharedStringsXml(sharedStrings));
    overrides.push(
      '<Override PartName="/xl/sharedStrings.xml" ContentType="application/vnd.openxmlformats-officedocument.spreadsheetml.sharedStrings+xml"/>'
    );
    workbookRels.push(
      `<Relationship Id="rId4" Type="${DOC_REL}/sharedStrings" Target="sharedStrings.xml"/>`
    );
  }

  zip.file(
    "[Content_Types].xml",
    DECL +
      '<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">' +
      '<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>' +
      '<Default Extension="xml" ContentType="application/xml"/>' +
      '<Default Extension="png" ContentType="image/png"/>' +
      overrides.join("") +
      "</Types>"
  );
  zip.file(
    "_rels/.rels",
    DECL +
      `<Relationships xmlns="${PKG_RELS}">` +
      `<Relationship Id="rId1" Type="${DOC_REL}/officeDocument" Target="xl/workbook.xml"/>` +
      "</Relationships>"
  );
  zip.file(
    "xl/workbook.xml",
    DECL +
      `<workbook xmlns="${SPREADSHEET_NS}" xmlns:r="${REL_NS}"><sheets>` +
      '<sheet name="Sheet1" sheetId="1" r:id="rId1"/>' +
      '<sheet name="Summary" sheetId="2" r:id="rId2"/>' +
      "</sheets></workbook>"
  );
  zip.file(
    "xl/_rels/workbook.xml.rels",
    DECL + `<Relationships xmlns="${PKG_RELS}">${workbookRels.join("")}</Relationships>`
  );
  zip.file("xl/worksheets/sheet1.xml", sheetXml);
  zip.file("xl/worksheets/sheet2.xml", worksheetXml('<row r="1"><c r="A1"><v>7</v></c></row>'));
  zip.file("xl/media/image1.png", MEDIA_BYTES, { compression: "STORE" });
  zip.file("docProps/app.xml", DECL + "<Properties><Application>Fixture</Application></Properties>");
  return zip.generateAsync({ type: "nodebuffer", compression: "DEFLATE" });
}

const tempDirs: string[] = [];

afterEach(async () => {
  await Promise.all(tempDirs.splice(0).map((d) => rm(d, { recursive: true, force: true })));
});

/** Fresh directory removed after the current test. */
export async function makeTempDir(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), "workbook-date-patcher-"));
  tempDirs.push(dir);
  return dir;
}

export async function writeWorkbook(
  dir: string,
  opts: FixtureOptions = {},
  name = "book.xlsx"
): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, await buildWorkbook(opts));
  return path;
}

/** Uncompressed bytes of every file member, keyed by name. */
export async function readMembers(path: string): Promise<Map<string, Buffer>> {
  const zip = await JSZip.loadAsync(await readFile(path));
  const members = new Map<string, Buffer>();
  for (const entry of Object.values(zip.files)) {
    if (!entry.dir) members.set(entry.name, await entry.async("nodebuffer"));
  }
  return members;
}

export async function readMemberXml(path: string, member: string): Promise<Document> {
  const bytes = (await readMembers(path)).get(member);
  if (!bytes) throw new Error(`fixture member '${member}' missing`);
  return parseXml(bytes.toString("utf8"), member);
}

export function xmlDoc(text: string): Document {
  return parseXml(text, "fixture.xml");
}
