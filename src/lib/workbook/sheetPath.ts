import type { WorkbookArchive } from "./archive/archive";
import { RelationshipError, SheetNotFoundError } from "./errors";
import { readRelationships, relsPathFor, resolveTarget } from "./packageParts";
import { childElements, firstChild, parseXml, REL_NS } from "./xml/xml";

function sheetDeclarations(workbook: Document): Element[] {
  const sheets = firstChild(workbook.documentElement, "sheets");
  return sheets ? childElements(sheets, "sheet") : [];
}

export function listSheetNames(workbook: Document): string[] {
  return sheetDeclarations(workbook).map((el) => el.getAttribute("name") || "?");
}

/**
 * Member path of the worksheet called `sheetName` (exact match), resolved
 * through the workbook's relationship manifest.
 */
export async function resolveSheetPath(
  archive: WorkbookArchive,
  workbookPath: string,
  sheetName: string
): Promise<string> {
  const workbook = parseXml(await archive.readText(workbookPath), workbookPath);
  const sheet = sheetDeclarations(workbook).find(
    (el) => el.getAttribute("name") === sheetName
  );
  if (!sheet) throw new SheetNotFoundError(sheetName, listSheetNames(workbook));

  const relId = sheet.getAttributeNS(REL_NS, "id");
  if (!relId) throw new RelationshipError(`Worksheet '${sheetName}' missing relationship id`);

  const rels = await readRelationships(archive, relsPathFor(workbookPath));
  const rel = rels.find((r) => r.id === relId);
  if (!rel?.target)
    throw new RelationshipError(
      `Could not resolve sheet path for '${sheetName}' (relationship '${relId}')`
    );
  return resolveTarget(workbookPath, rel.target);
}
