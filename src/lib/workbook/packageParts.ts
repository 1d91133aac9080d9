import { posix } from "node:path";
import type { WorkbookArchive } from "./archive/archive";
import { childElements, PACKAGE_REL_NS, parseXml } from "./xml/xml";

const OFFICE_DOCUMENT_REL =
  "http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument";

export const DEFAULT_WORKBOOK_PART = "xl/workbook.xml";

export interface Relationship {
  id: string;
  type: string;
  target: string | null;
}

/** "xl/workbook.xml" -> "xl/_rels/workbook.xml.rels" */
export function relsPathFor(part: string): string {
  const dir = posix.dirname(part);
  const rels = `_rels/${posix.basename(part)}.rels`;
  return dir === "." ? rels : `${dir}/${rels}`;
}

/** Resolve a relationship target against the part that declares it. */
export function resolveTarget(sourcePart: string, target: string): string {
  if (target.startsWith("/")) return posix.normalize(target).replace(/^\/+/, "");
  return posix.normalize(posix.join(posix.dirname(sourcePart), target));
}

export async function readRelationships(
  archive: WorkbookArchive,
  relsPath: string
): Promise<Relationship[]> {
  if (!archive.has(relsPath)) return [];
  const doc = parseXml(await archive.readText(relsPath), relsPath);
  return childElements(doc.documentElement, "Relationship", PACKAGE_REL_NS).map(
    (rel) => ({
      id: rel.getAttribute("Id") ?? "",
      type: rel.getAttribute("Type") ?? "",
      target: rel.getAttribute("Target") || null,
    })
  );
}

/** Follow the package's officeDocument relationship to the workbook part. */
export async function resolveWorkbookPath(archive: WorkbookArchive): Promise<string> {
  const rels = await readRelationships(archive, "_rels/.rels");
  const main = rels.find((r) => r.type === OFFICE_DOCUMENT_REL && r.target);
  return main?.target ? resolveTarget("", main.target) : DEFAULT_WORKBOOK_PART;
}

/**
 * Locate a workbook-level part (shared strings, styles) by relationship type,
 * falling back to its conventional member name.
 */
export async function findRelatedPart(
  archive: WorkbookArchive,
  workbookPath: string,
  typeSuffix: string,
  fallback: string
): Promise<string> {
  const rels = await readRelationships(archive, relsPathFor(workbookPath));
  const rel = rels.find((r) => r.type.endsWith(typeSuffix) && r.target);
  return rel?.target ? resolveTarget(workbookPath, rel.target) : fallback;
}
